// leakage.ts
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { LeakageError } from '../errors';
import type { SampleRecord } from '../datasets/sample';
import { FILES, readDataset } from '../datasets/store';

export interface LeakageViolation {
  key: string;
  trainVal: number;   // samples carrying the key in train ∪ val
  test: number;       // samples carrying the key in test
}

export interface LeakageReport {
  ok: boolean;
  violations: LeakageViolation[];
  keys: { trainVal: number; test: number };
  samples: { trainVal: number; test: number };
}

function countKeys(records: readonly SampleRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const r of records) counts.set(r.key, (counts.get(r.key) ?? 0) + 1);
  return counts;
}

/**
 * Audits a dataset for disjointness: no key may appear on both sides of the
 * test / train∪val boundary. Reads only; knows nothing of how the assembler
 * picked its keys.
 */
export function verifyDataset(dataset: { train: readonly SampleRecord[]; val: readonly SampleRecord[]; test: readonly SampleRecord[] }): LeakageReport {
  const trainVal = countKeys([...dataset.train, ...dataset.val]);
  const test = countKeys(dataset.test);

  const violations: LeakageViolation[] = [];
  for (const [key, n] of test) {
    const shared = trainVal.get(key);
    if (shared !== undefined) violations.push({ key, trainVal: shared, test: n });
  }
  violations.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

  return {
    ok: violations.length === 0,
    violations,
    keys: { trainVal: trainVal.size, test: test.size },
    samples: { trainVal: dataset.train.length + dataset.val.length, test: dataset.test.length },
  };
}

/** Verifies a persisted dataset and writes the report beside it. */
export async function verify(datasetPath: string): Promise<LeakageReport> {
  const dataset = await readDataset(datasetPath);
  const report = verifyDataset(dataset);
  await writeFile(join(datasetPath, FILES.report), JSON.stringify(report, null, 2) + '\n', 'utf8');
  return report;
}

export function assertNoLeakage(report: LeakageReport) {
  if (!report.ok) {
    const keys = report.violations.map(v => v.key);
    throw new LeakageError(`${keys.length} disjointness key(s) appear in both test and train/val: ${keys.join(', ')}`, keys);
  }
}
