// store.ts
import { access, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { SchemaViolationError, describeError } from '../errors';
import { SampleRecord, parseRecord } from './sample';

/** File names inside a dataset root. Image paths in records are relative to the root. */
export const FILES = {
  run: 'config.json',
  all: 'data.jsonl',
  train: 'train.jsonl',
  val: 'val.jsonl',
  images: 'images',
  test: 'test/test.jsonl',
  testImages: 'test/images',
  report: 'verify-report.json',
  preprocessed: 'preprocessed',
  manifest: 'metadata.json',   // under preprocessed/
} as const;

export const RunRecordSchema = z.object({
  name: z.string(),
  version: z.string(),
  seed: z.number().int(),
  layout: z.object({ name: z.string(), version: z.string(), width: z.number(), height: z.number() }),
  quotas: z.record(z.string(), z.number().int()),
  scenes: z.record(z.string(), z.number().int()),
  splits: z.object({ train: z.number().int(), val: z.number().int(), test: z.number().int() }),
  trainRatio: z.number(),
  heldOut: z.object({ fraction: z.number(), key: z.enum(['date', 'scene']), testKeys: z.array(z.string()) }).nullable(),
  waitTarget: z.enum(['indicator', 'none']),
});

export type RunRecord = z.infer<typeof RunRecordSchema>;

export interface StoredDataset {
  root: string;
  run: RunRecord;
  train: SampleRecord[];
  val: SampleRecord[];
  test: SampleRecord[];
}

export function toJsonl(records: readonly SampleRecord[]): string {
  return records.map(r => JSON.stringify(r)).join('\n') + (records.length ? '\n' : '');
}

export async function writeJsonl(path: string, records: readonly SampleRecord[]) {
  await writeFile(path, toJsonl(records), 'utf8');
}

export async function readJsonl(path: string): Promise<SampleRecord[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new SchemaViolationError(`Cannot read index ${path}: ${describeError(err)}`);
  }
  const records: SampleRecord[] = [];
  text.split('\n').forEach((line, i) => {
    if (line.trim()) records.push(parseRecord(line, `${path}:${i + 1}`));
  });
  return records;
}

export async function readRunRecord(root: string): Promise<RunRecord> {
  const path = join(root, FILES.run);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new SchemaViolationError(`Cannot read run config ${path}: ${describeError(err)}`);
  }
  const parsed = RunRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SchemaViolationError(`${path}: ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  return parsed.data;
}

/** Loads a persisted dataset; the run config must exist, since it is written last. */
export async function readDataset(root: string): Promise<StoredDataset> {
  const run = await readRunRecord(root);
  const [train, val, test] = await Promise.all([
    readJsonl(join(root, FILES.train)),
    readJsonl(join(root, FILES.val)),
    readJsonl(join(root, FILES.test)),
  ]);
  return { root, run, train, val, test };
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
