import { appendFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { LeakageError } from '../src/errors';
import { generate } from '../src/datasets/assembler';
import type { SampleRecord, SplitTag } from '../src/datasets/sample';
import { silentLogger } from '../src/utils/log';
import { assertNoLeakage, verify, verifyDataset } from '../src/verify/leakage';
import { makeCatalog, makeConfig, tempDir } from './fixtures/helpers';

function rec(id: string, key: string, split: SplitTag): SampleRecord {
  return {
    id,
    prompt: 'Open Notes.',
    action: { kind: 'double_click', coordinate: [300, 167], tolerance: [50, 83] },
    image: `images/${id}.png`,
    split,
    key,
    surface: { id: 'full', width: 200, height: 120 },
    taskKind: 'iconlist',
    metadata: {},
  };
}

describe('verifyDataset', () => {
  it('passes when test keys are disjoint from train/val', () => {
    const report = verifyDataset({
      train: [rec('a', '2025-01-01', 'train'), rec('b', '2025-01-02', 'train')],
      val: [rec('c', '2025-01-03', 'val')],
      test: [rec('d', '2025-01-04', 'test'), rec('e', '2025-01-04', 'test')],
    });
    expect(report).toEqual({
      ok: true,
      violations: [],
      keys: { trainVal: 3, test: 1 },
      samples: { trainVal: 3, test: 2 },
    });
    expect(() => assertNoLeakage(report)).not.toThrow();
  });

  it('reports every shared key with its counts', () => {
    const report = verifyDataset({
      train: [rec('a', '2025-01-02', 'train'), rec('b', '2025-01-02', 'train'), rec('c', '2025-01-01', 'train')],
      val: [rec('d', '2025-01-05', 'val')],
      test: [rec('e', '2025-01-05', 'test'), rec('f', '2025-01-02', 'test'), rec('g', '2025-01-09', 'test')],
    });
    expect(report.ok).toBe(false);
    expect(report.violations).toEqual([
      { key: '2025-01-02', trainVal: 2, test: 1 },
      { key: '2025-01-05', trainVal: 1, test: 1 },
    ]);
    expect(() => assertNoLeakage(report)).toThrow(LeakageError);
    try {
      assertNoLeakage(report);
    } catch (err) {
      expect(err instanceof LeakageError && err.keys).toEqual(['2025-01-02', '2025-01-05']);
    }
  });
});

describe('verify', () => {
  it('audits a generated dataset and catches a planted leak', async () => {
    const root = join(await tempDir(), 'ds');
    await generate(makeConfig(root), { catalog: makeCatalog(), logger: silentLogger });

    const clean = await verify(root);
    expect(clean.ok).toBe(true);
    const written = JSON.parse(await readFile(join(root, 'verify-report.json'), 'utf8'));
    expect(written).toEqual(clean);

    const [firstTest] = (await readFile(join(root, 'test/test.jsonl'), 'utf8')).split('\n');
    const planted: unknown = JSON.parse(firstTest);
    if (typeof planted !== 'object' || planted === null || !('key' in planted) || typeof planted.key !== 'string') {
      throw new Error('test record has no key');
    }
    await appendFile(join(root, 'train.jsonl'), JSON.stringify({ ...planted, id: 'planted', split: 'train' }) + '\n');

    const leaky = await verify(root);
    expect(leaky.ok).toBe(false);
    expect(leaky.violations.map(v => v.key)).toEqual([planted.key]);
    expect(leaky.violations[0].trainVal).toBe(1);
  });
});
