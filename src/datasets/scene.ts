// scene.ts
import { ConfigurationError } from '../errors';
import type { LayoutCatalog, LayoutElement } from '../layout/catalog';
import type { Rng } from '../utils/rng';
import { DEFAULT_SCENE_CONTEXT, DatetimeRange, IconRegion, SceneContext, SceneState } from './constants';

const MINUTE_MS = 60_000;

// -------- vary-N selection --------

/** Lower bound of the optional-subset size; tolerant of 0.7 * 10 = 7.000000000000001. */
export function minSubsetSize(optionalCount: number, minFrac: number): number {
  if (optionalCount === 0) return 0;
  return Math.min(optionalCount, Math.ceil(optionalCount * minFrac - 1e-9));
}

/** Draws k uniformly from [ceil(m * minFrac), m]; an empty pool gives 0. */
export function drawSubsetSize(rng: Rng, optionalCount: number, minFrac: number): number {
  if (!(minFrac >= 0 && minFrac <= 1)) {
    throw new ConfigurationError(`minFrac must be within [0, 1], got ${minFrac}`);
  }
  if (optionalCount === 0) return 0;
  return rng.int(minSubsetSize(optionalCount, minFrac), optionalCount);
}

/** required ∪ (random k-subset of optional), k drawn by `drawSubsetSize`. */
export function varyN<T>(rng: Rng, required: readonly T[], optional: readonly T[], minFrac: number): T[] {
  const k = drawSubsetSize(rng, optional.length, minFrac);
  return [...required, ...rng.sample(optional, k)];
}

// -------- datetime --------

function parseInstant(value: string, field: string): number {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) throw new ConfigurationError(`datetime.${field} is not a valid date: "${value}"`);
  return ms;
}

export function drawDatetime(rng: Rng, range: DatetimeRange): Date {
  const start = parseInstant(range.start, 'start');
  const end = parseInstant(range.end, 'end');
  if (end < start) throw new ConfigurationError(`datetime range ends (${range.end}) before it starts (${range.start})`);
  const first = Math.ceil(start / MINUTE_MS) * MINUTE_MS;
  const last = Math.floor(end / MINUTE_MS) * MINUTE_MS;
  if (last < first) throw new ConfigurationError(`datetime range ${range.start}..${range.end} holds no whole minute`);
  return new Date(first + rng.int(0, (last - first) / MINUTE_MS) * MINUTE_MS);
}

/** Taskbar clock text: "3:45 PM\n11/18/2025" (UTC). */
export function formatClock(d: Date): string {
  const h24 = d.getUTCHours();
  const h12 = h24 % 12 === 0 ? 12 : h24 % 12;
  const mm = String(d.getUTCMinutes()).padStart(2, '0');
  const meridiem = h24 < 12 ? 'AM' : 'PM';
  return `${h12}:${mm} ${meridiem}\n${d.getUTCMonth() + 1}/${d.getUTCDate()}/${d.getUTCFullYear()}`;
}

// -------- scene --------

function regionIcons(catalog: LayoutCatalog, region: IconRegion, rng: Rng, minFrac: number): string[] {
  const ids = (els: LayoutElement[]) => els.map(e => e.id);
  const picked = varyN(rng, ids(catalog.requiredIcons(region)), ids(catalog.optionalIcons(region)), minFrac);
  return catalog.inCatalogOrder(picked);
}

/**
 * Draws one scene. Draw order is fixed (desktop subset, taskbar subset,
 * loading flag, datetime) so a seed always replays the same scenes.
 */
export function sampleScene(
  rng: Rng,
  catalog: LayoutCatalog,
  context: Partial<SceneContext> = {},
  index = 0,
): SceneState {
  const ctx: SceneContext = { ...DEFAULT_SCENE_CONTEXT, ...context };
  if (!(ctx.loadingProbability >= 0 && ctx.loadingProbability <= 1)) {
    throw new ConfigurationError(`loadingProbability must be within [0, 1], got ${ctx.loadingProbability}`);
  }
  const firstCall = rng.calls;

  const desktopIcons = regionIcons(catalog, 'desktop', rng, ctx.desktopMinFrac);
  const taskbarIcons = regionIcons(catalog, 'taskbar', rng, ctx.taskbarMinFrac);
  const loadingVisible = rng.next() < ctx.loadingProbability;
  const when = drawDatetime(rng, ctx.datetime);

  return Object.freeze({
    index,
    desktopIcons: Object.freeze(desktopIcons),
    taskbarIcons: Object.freeze(taskbarIcons),
    datetime: when.toISOString(),
    datetimeText: formatClock(when),
    loadingVisible,
    seed: rng.seed,
    rngCalls: Object.freeze([firstCall, rng.calls] as const),
  });
}

/** Disjointness key of a scene: its calendar date, or its synthetic scene id. */
export function sceneKey(scene: SceneState, kind: 'date' | 'scene'): string {
  return kind === 'date' ? scene.datetime.slice(0, 10) : `scene-${String(scene.index).padStart(6, '0')}`;
}
