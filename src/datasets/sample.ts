// sample.ts
import { z } from 'zod';
import { SchemaViolationError, describeError } from '../errors';
import { SurfacePoint, SurfaceRef, Tolerance, UNIT_SCALE, assertSameSurface, surfaceShape } from '../geometry/units';

export const ACTION_KINDS = ['double_click', 'left_click', 'wait', 'scroll'] as const;
export type ActionKind = typeof ACTION_KINDS[number];

export const TASK_KINDS = ['click-desktop-icon', 'click-taskbar-icon', 'click-icon', 'iconlist', 'wait-loading'] as const;
export type TaskKind = typeof TASK_KINDS[number];

export const SPLITS = ['train', 'val', 'test'] as const;
export type SplitTag = typeof SPLITS[number];

export type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

export interface Action {
  kind: ActionKind;
  coordinate?: SurfacePoint;
  tolerance: Tolerance;
  duration?: number;       // seconds, wait only
  target?: 'none';         // explicit "no spatial target"
}

export interface TrainingSample {
  id: string;
  taskKind: TaskKind;
  prompt: string;
  action: Action;
  /** Surface whose image ships with this sample. */
  surface: SurfaceRef;
  sceneIndex: number;
  metadata: { [key: string]: Json };
}

/** Builds a sample, refusing a coordinate measured on any surface but the shipped one. */
export function makeSample(sample: TrainingSample): TrainingSample {
  if (sample.action.coordinate) assertSameSurface(sample.surface, sample.action.coordinate);
  return sample;
}

// -------- persisted form --------

const UnitSchema = z.number().int().min(0).max(UNIT_SCALE);

export const SampleRecordSchema = z.object({
  id: z.string().min(1),
  prompt: z.string().min(1),
  action: z.object({
    kind: z.enum(ACTION_KINDS),
    coordinate: z.tuple([UnitSchema, UnitSchema]).optional(),
    tolerance: z.tuple([z.number().nonnegative(), z.number().nonnegative()]),
    duration: z.number().positive().optional(),
    target: z.literal('none').optional(),
  }),
  image: z.string().min(1),
  split: z.enum(SPLITS),
  key: z.string().min(1),
  surface: z.object({
    id: z.string().min(1),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
  }),
  taskKind: z.enum(TASK_KINDS),
  metadata: z.record(z.unknown()).default({}),
});

export type SampleRecord = z.infer<typeof SampleRecordSchema>;

export function toRecord(sample: TrainingSample, placement: { image: string; split: SplitTag; key: string }): SampleRecord {
  const { action } = sample;
  const coordinate: [number, number] | undefined = action.coordinate && [action.coordinate.x, action.coordinate.y];
  return {
    id: sample.id,
    prompt: sample.prompt,
    action: {
      kind: action.kind,
      ...(coordinate ? { coordinate } : {}),
      tolerance: [action.tolerance[0], action.tolerance[1]],
      ...(action.duration !== undefined ? { duration: action.duration } : {}),
      ...(action.target ? { target: action.target } : {}),
    },
    image: placement.image,
    split: placement.split,
    key: placement.key,
    surface: surfaceShape(sample.surface),
    taskKind: sample.taskKind,
    metadata: sample.metadata,
  };
}

/** Parses one JSONL line; `where` names the file and line for the error. */
export function parseRecord(line: string, where: string): SampleRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new SchemaViolationError(`${where}: not valid JSON (${describeError(err)})`);
  }
  const parsed = SampleRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const id = typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string' ? [raw.id] : [];
    throw new SchemaViolationError(`${where}: ${issue.path.join('.') || '<root>'}: ${issue.message}`, id);
  }
  return parsed.data;
}

/**
 * Record-level invariants zod cannot express: a wait without a coordinate
 * must say so, and no click or wait target may be the (0,0)/(0,0) placeholder.
 */
export function checkRecord(record: SampleRecord): string | undefined {
  const { action } = record;
  const isClick = action.kind === 'double_click' || action.kind === 'left_click';
  if (isClick && !action.coordinate) return 'click action without a coordinate';
  if (action.kind === 'wait' && !action.coordinate && action.target !== 'none') {
    return 'wait action without a coordinate must carry target "none"';
  }
  if (action.coordinate && action.target === 'none') return 'action has a coordinate and target "none"';
  if (
    action.coordinate &&
    action.coordinate[0] === 0 && action.coordinate[1] === 0 &&
    action.tolerance[0] === 0 && action.tolerance[1] === 0
  ) {
    return 'placeholder target (0,0) with zero tolerance';
  }
  if (action.kind === 'wait' && action.coordinate && record.metadata.loadingVisible !== true) {
    return 'wait target on a scene without a visible loading indicator';
  }
  return undefined;
}
