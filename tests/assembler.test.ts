import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import sharp from 'sharp';
import { describe, it, expect, beforeAll } from 'vitest';
import { ConfigurationError, SurfaceMismatchError } from '../src/errors';
import { Dataset, generate } from '../src/datasets/assembler';
import { toPixel } from '../src/geometry/units';
import { pathExists, readDataset, readRunRecord } from '../src/datasets/store';
import { SchematicRenderer } from '../src/render/schematic';
import { Renderer, validateFrame } from '../src/render/surface';
import { silentLogger } from '../src/utils/log';
import { verifyDataset } from '../src/verify/leakage';
import { makeCatalog, makeConfig, makeScene, tempDir } from './fixtures/helpers';

const deps = () => ({ catalog: makeCatalog(), logger: silentLogger });

describe('generate', () => {
  let root: string;
  let dataset: Dataset;

  beforeAll(async () => {
    root = join(await tempDir(), 'ds');
    dataset = await generate(makeConfig(root), deps());
  });

  it('fills every quota and partitions all samples', () => {
    const all = [...dataset.train, ...dataset.val, ...dataset.test];
    expect(all).toHaveLength(20);
    expect(all.filter(r => r.taskKind === 'click-desktop-icon')).toHaveLength(12);
    expect(all.filter(r => r.taskKind === 'iconlist')).toHaveLength(8);
    expect(new Set(all.map(r => r.id)).size).toBe(20);
    expect(dataset.test.length).toBeGreaterThanOrEqual(5);
    expect(dataset.root).toBe(root);
  });

  it('writes the run config last and publishes only the final directory', async () => {
    const run = await readRunRecord(root);
    expect(run.seed).toBe(420);
    expect(run.quotas).toEqual({ 'click-desktop-icon': 12, 'iconlist': 8 });
    expect(run.splits).toEqual({ train: dataset.train.length, val: dataset.val.length, test: dataset.test.length });
    expect(run.layout).toEqual({ name: 'test-desktop', version: '3', width: 200, height: 120 });
    expect(run.heldOut?.key).toBe('scene');
    expect(run.heldOut?.testKeys.every(k => k.startsWith('scene-'))).toBe(true);
    expect(await pathExists(`${root}.partial`)).toBe(false);
  });

  it('gives every sample a tolerance, a resolvable image and a coordinate inside its surface', async () => {
    for (const record of [...dataset.train, ...dataset.val, ...dataset.test]) {
      expect(record.action.tolerance).toHaveLength(2);
      expect(record.surface).toEqual({ id: 'full', width: 200, height: 120 });
      const meta = await sharp(join(root, record.image)).metadata();
      expect([meta.width, meta.height]).toEqual([200, 120]);
      const c = record.action.coordinate;
      if (!c) throw new Error(`${record.id} has no coordinate`);
      const [px, py] = [toPixel(c[0], record.surface.width), toPixel(c[1], record.surface.height)];
      expect(px).toBeGreaterThanOrEqual(0);
      expect(px).toBeLessThanOrEqual(meta.width ?? 0);
      expect(py).toBeGreaterThanOrEqual(0);
      expect(py).toBeLessThanOrEqual(meta.height ?? 0);
    }
  });

  it('keeps held-out images and keys apart from train/val', () => {
    for (const r of dataset.test) expect(r.image.startsWith('test/images/')).toBe(true);
    for (const r of [...dataset.train, ...dataset.val]) expect(r.image.startsWith('images/')).toBe(true);
    expect(verifyDataset(dataset).ok).toBe(true);
  });

  it('draws 4 or 5 desktop icons per scene for seed 420', () => {
    for (const r of [...dataset.train, ...dataset.val, ...dataset.test]) {
      const icons = r.metadata.desktopIcons;
      if (!Array.isArray(icons)) throw new Error(`${r.id} has no desktop icon list`);
      expect([4, 5]).toContain(icons.length);
    }
  });

  it('reads back what it wrote', async () => {
    const stored = await readDataset(root);
    expect(stored.train).toEqual(dataset.train);
    expect(stored.test).toEqual(dataset.test);
    const all = (await readFile(join(root, 'data.jsonl'), 'utf8')).trim().split('\n');
    expect(all).toHaveLength(20);
  });

  it('produces byte-identical output for the same seed and config', async () => {
    const again = join(await tempDir(), 'ds');
    await generate(makeConfig(again), deps());
    for (const file of ['config.json', 'data.jsonl', 'train.jsonl', 'val.jsonl', 'test/test.jsonl']) {
      expect(await readFile(join(again, file), 'utf8')).toBe(await readFile(join(root, file), 'utf8'));
    }
    for (const dir of ['images', 'test/images']) {
      const names = await readdir(join(root, dir));
      expect(await readdir(join(again, dir))).toEqual(names);
      for (const name of names) {
        expect((await readFile(join(again, dir, name))).equals(await readFile(join(root, dir, name)))).toBe(true);
      }
    }
  });

  it('never overwrites an existing dataset', async () => {
    await expect(generate(makeConfig(root), deps())).rejects.toThrow(ConfigurationError);
  });
});

describe('generate failures', () => {
  it('rejects unknown task kinds before touching the disk', async () => {
    const out = join(await tempDir(), 'ds');
    await expect(generate(makeConfig(out, { tasks: { grounding: 5 } }), deps())).rejects.toThrow(ConfigurationError);
    expect(await pathExists(`${out}.partial`)).toBe(false);
  });

  it('gives up on a task that never yields and removes the staging directory', async () => {
    const out = join(await tempDir(), 'ds');
    const config = makeConfig(out, {
      tasks: { 'wait-loading': 3 },
      heldOut: undefined,
      wait: { loadingProbability: 0 },
      maxIdleScenes: 3,
    });
    await expect(generate(config, deps())).rejects.toThrow(ConfigurationError);
    expect(await pathExists(out)).toBe(false);
    expect(await pathExists(`${out}.partial`)).toBe(false);
  });

  it('refuses an image whose pixels do not match its declared surface', async () => {
    const inner = new SchematicRenderer();
    const lying: Renderer = {
      async render(scene, catalog) {
        const frame = await inner.render(scene, catalog);
        const image = await sharp(frame.full.image).resize(100, 60).png().toBuffer();
        return { full: { ...frame.full, image }, crops: [] };
      },
    };
    const out = join(await tempDir(), 'ds');
    await expect(generate(makeConfig(out), { ...deps(), renderer: lying })).rejects.toThrow(SurfaceMismatchError);
    expect(await pathExists(out)).toBe(false);
    expect(await pathExists(`${out}.partial`)).toBe(false);
  });
});

describe('wait datasets', () => {
  it('marks waits without a target by default', async () => {
    const out = join(await tempDir(), 'ds');
    const ds = await generate(makeConfig(out, { tasks: { 'wait-loading': 4 }, heldOut: undefined }), deps());
    const all = [...ds.train, ...ds.val];
    expect(all).toHaveLength(4);
    expect(ds.test).toEqual([]);
    for (const r of all) {
      expect(r.action.kind).toBe('wait');
      expect(r.action.coordinate).toBeUndefined();
      expect(r.action.target).toBe('none');
      expect(r.action.tolerance).toEqual([0, 0]);
      expect(r.metadata.loadingVisible).toBe(true);
    }
  });

  it('points at the loading panel only when it is visible', async () => {
    const out = join(await tempDir(), 'ds');
    const config = makeConfig(out, {
      tasks: { 'wait-loading': 4 },
      heldOut: undefined,
      wait: { target: 'indicator', loadingProbability: 0.5 },
    });
    const ds = await generate(config, deps());
    for (const r of [...ds.train, ...ds.val]) {
      expect(r.action.coordinate).toEqual([700, 417]);
      expect(r.action.tolerance).toEqual([200, 167]);
      expect(r.metadata.loadingVisible).toBe(true);
    }
  });
});

describe('cropped surfaces', () => {
  it('renders a region crop that sits inside the full frame', async () => {
    const catalog = makeCatalog();
    const frame = await new SchematicRenderer({ crops: ['taskbar'] }).render(makeScene(), catalog);
    expect(frame.crops).toHaveLength(1);
    const [crop] = frame.crops;
    expect(crop).toMatchObject({ id: 'taskbar', width: 200, height: 20, origin: { x: 0, y: 100 } });
    const meta = await sharp(crop.image).metadata();
    expect([meta.width, meta.height]).toEqual([200, 20]);
    expect(() => validateFrame(frame, catalog)).not.toThrow();

    const fromFull = await sharp(frame.full.image).extract({ left: 0, top: 100, width: 200, height: 20 }).raw().toBuffer();
    expect((await sharp(crop.image).raw().toBuffer()).equals(fromFull)).toBe(true);
  });

  it('still ships the full frame when the config asks for crops', async () => {
    const out = join(await tempDir(), 'ds');
    const ds = await generate(makeConfig(out, { render: { crops: ['taskbar'] } }), deps());
    const all = [...ds.train, ...ds.val, ...ds.test];
    expect(all).toHaveLength(20);
    for (const record of all) {
      expect(record.surface).toEqual({ id: 'full', width: 200, height: 120 });
      const meta = await sharp(join(out, record.image)).metadata();
      expect([meta.width, meta.height]).toEqual([200, 120]);
      const c = record.action.coordinate;
      if (!c) throw new Error(`${record.id} has no coordinate`);
      for (const v of c) {
        expect(v).toBeGreaterThanOrEqual(0);
        expect(v).toBeLessThanOrEqual(1000);
      }
    }
    expect((await readRunRecord(out)).seed).toBe(420);
  });

  it('fails the run when a crop names an unknown region', async () => {
    const out = join(await tempDir(), 'ds');
    await expect(generate(makeConfig(out, { render: { crops: ['sidebar'] } }), deps())).rejects.toThrow(ConfigurationError);
    expect(await pathExists(out)).toBe(false);
    expect(await pathExists(`${out}.partial`)).toBe(false);
  });
});
