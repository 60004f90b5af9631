// config.ts
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../errors';
import { isTaskKind } from '../tasks/registry';
import { DEFAULT_WAIT_PROMPTS, asksForClick } from '../tasks/types';
import { DEFAULT_SCENE_CONTEXT } from './constants';
import type { TaskKind } from './sample';

const Fraction = z.number().min(0).max(1);

export const DatasetConfigSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1).default('1'),
  seed: z.number().int(),
  outputDir: z.string().min(1),
  /** Annotation document to load when the caller does not pass a catalog. */
  layout: z.string().min(1).optional(),
  /** Sample quota per task kind; generation follows this key order. */
  tasks: z.record(z.string(), z.number().int().nonnegative()),
  /** Multiplies every quota, e.g. 0.01 for a smoke run. */
  scale: z.number().gt(0).max(1).default(1),
  split: z.object({
    train: z.number().gt(0).max(1).default(0.8),
  }).default({}),
  heldOut: z.object({
    fraction: z.number().gt(0).lt(1),
    key: z.enum(['date', 'scene']).default('date'),
  }).optional(),
  scene: z.object({
    desktopMinFrac: Fraction.default(DEFAULT_SCENE_CONTEXT.desktopMinFrac),
    taskbarMinFrac: Fraction.default(DEFAULT_SCENE_CONTEXT.taskbarMinFrac),
    loadingProbability: Fraction.default(DEFAULT_SCENE_CONTEXT.loadingProbability),
    datetime: z.object({
      start: z.string().min(1),
      end: z.string().min(1),
    }).default(DEFAULT_SCENE_CONTEXT.datetime),
  }).default({}),
  wait: z.object({
    target: z.enum(['indicator', 'none']).default('none'),
    duration: z.object({
      min: z.number().int().positive().default(1),
      max: z.number().int().positive().default(5),
    }).default({}),
    prompts: z.array(
      z.string().min(1).refine(p => !asksForClick(p), { message: 'wait prompts must not ask for a click' }),
    ).min(1).default(DEFAULT_WAIT_PROMPTS),
    loadingProbability: Fraction.default(1),
  }).default({}),
  render: z.object({
    /** Region ids the renderer also ships as cropped surfaces. */
    crops: z.array(z.string().min(1)).default([]),
  }).default({}),
  /** Consecutive scenes a task may yield nothing before the run gives up. */
  maxIdleScenes: z.number().int().positive().default(50),
});

export type DatasetConfig = z.output<typeof DatasetConfigSchema>;
export type DatasetConfigInput = z.input<typeof DatasetConfigSchema>;

export function parseConfig(input: unknown): DatasetConfig {
  const parsed = DatasetConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid dataset config at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  const config = parsed.data;
  for (const kind of Object.keys(config.tasks)) {
    if (!isTaskKind(kind)) throw new ConfigurationError(`Quota references unknown task kind "${kind}"`);
  }
  if (config.wait.duration.max < config.wait.duration.min) {
    throw new ConfigurationError(`wait.duration.max (${config.wait.duration.max}) is below min (${config.wait.duration.min})`);
  }
  return config;
}

export async function loadConfig(path: string): Promise<DatasetConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read dataset config ${path}: ${describeError(err)}`);
  }
  return parseConfig(raw);
}

/** Scaled quotas in config order; a non-zero quota never scales below one. */
export function quotas(config: DatasetConfig): Array<[TaskKind, number]> {
  const out: Array<[TaskKind, number]> = [];
  for (const [kind, count] of Object.entries(config.tasks)) {
    if (!isTaskKind(kind)) throw new ConfigurationError(`Quota references unknown task kind "${kind}"`);
    out.push([kind, count === 0 ? 0 : Math.max(1, Math.floor(count * config.scale))]);
  }
  return out;
}
