import { readFileSync } from 'node:fs';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { SceneState } from '../../src/datasets/constants';
import type { DatasetConfigInput } from '../../src/datasets/config';
import { LayoutCatalog, parseCatalog } from '../../src/layout/catalog';
import type { RenderedFrame, RenderedSurface } from '../../src/render/surface';

export const LAYOUT_PATH = fileURLToPath(new URL('./layout.json', import.meta.url));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function layoutDocument(): Record<string, unknown> {
  const doc: unknown = JSON.parse(readFileSync(LAYOUT_PATH, 'utf8'));
  if (!isRecord(doc)) throw new Error('layout fixture is not an object');
  return doc;
}

export function makeCatalog(): LayoutCatalog {
  return parseCatalog(layoutDocument());
}

export function makeScene(overrides: Partial<SceneState> = {}): SceneState {
  return {
    index: 7,
    desktopIcons: ['recycle', 'docs', 'notes'],
    taskbarIcons: ['start', 'edge'],
    datetime: '2025-03-14T15:09:00.000Z',
    datetimeText: '3:09 PM\n3/14/2025',
    loadingVisible: false,
    seed: 1,
    rngCalls: [0, 0],
    ...overrides,
  };
}

export function makeSurface(overrides: Partial<RenderedSurface> = {}): RenderedSurface {
  return { id: 'full', width: 200, height: 120, origin: { x: 0, y: 0 }, image: Buffer.alloc(0), ...overrides };
}

export function makeFrame(crops: RenderedSurface[] = []): RenderedFrame {
  return { full: makeSurface(), crops };
}

export function makeConfig(outputDir: string, overrides: Partial<DatasetConfigInput> = {}): DatasetConfigInput {
  return {
    name: 'test-set',
    seed: 420,
    outputDir,
    tasks: { 'click-desktop-icon': 12, 'iconlist': 8 },
    split: { train: 0.75 },
    heldOut: { fraction: 0.25, key: 'scene' },
    ...overrides,
  };
}

export function tempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'desksynth-'));
}
