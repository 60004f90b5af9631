import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../src/errors';
import { drawDatetime, formatClock, minSubsetSize, sampleScene, sceneKey, varyN } from '../src/datasets/scene';
import { Rng } from '../src/utils/rng';
import { makeCatalog, makeScene } from './fixtures/helpers';

const REQUIRED = ['r1', 'r2'];
const OPTIONAL = ['o0', 'o1', 'o2', 'o3', 'o4', 'o5', 'o6', 'o7', 'o8', 'o9'];

describe('vary-N selection', () => {
  it('computes the subset floor', () => {
    expect(minSubsetSize(5, 0.6)).toBe(3);
    expect(minSubsetSize(10, 0.7)).toBe(7);
    expect(minSubsetSize(2, 0.4)).toBe(1);
    expect(minSubsetSize(0, 0.6)).toBe(0);
  });

  for (const [minFrac, floor] of [[0.6, 6], [0.4, 4]] as const) {
    it(`keeps required items and ${floor}..10 optional ones over 10,000 draws (minFrac ${minFrac})`, () => {
      const rng = new Rng(7);
      const sizes = new Set<number>();
      for (let trial = 0; trial < 10_000; trial++) {
        const picked = varyN(rng, REQUIRED, OPTIONAL, minFrac);
        const optional = picked.slice(REQUIRED.length);
        expect(picked.slice(0, REQUIRED.length)).toEqual(REQUIRED);
        expect(new Set(optional).size).toBe(optional.length);
        expect(optional.every(id => OPTIONAL.includes(id))).toBe(true);
        expect(optional.length).toBeGreaterThanOrEqual(floor);
        expect(optional.length).toBeLessThanOrEqual(OPTIONAL.length);
        sizes.add(optional.length);
      }
      expect([...sizes].sort((a, b) => a - b)).toEqual(
        Array.from({ length: OPTIONAL.length - floor + 1 }, (_, i) => floor + i),
      );
    });
  }

  it('returns only the required items for an empty pool', () => {
    expect(varyN(new Rng(1), REQUIRED, [], 0.6)).toEqual(REQUIRED);
  });

  it('rejects a fraction outside [0, 1]', () => {
    expect(() => varyN(new Rng(1), REQUIRED, OPTIONAL, 1.5)).toThrow(ConfigurationError);
  });
});

describe('sampleScene', () => {
  const catalog = makeCatalog();

  it('places required icons and a bounded optional subset, in catalog order (seed 420)', () => {
    const rng = new Rng(420);
    const order = catalog.elements.map(e => e.id);
    for (let i = 0; i < 200; i++) {
      const scene = sampleScene(rng, catalog, {}, i);
      expect([4, 5]).toContain(scene.desktopIcons.length);
      expect([2, 3]).toContain(scene.taskbarIcons.length);
      expect(scene.desktopIcons.slice(0, 2)).toEqual(['recycle', 'docs']);
      expect(scene.taskbarIcons[0]).toBe('start');
      const positions = scene.desktopIcons.map(id => order.indexOf(id));
      expect(positions).toEqual([...positions].sort((a, b) => a - b));
    }
  });

  it('replays the same scenes from the same seed', () => {
    const a = new Rng(99);
    const b = new Rng(99);
    for (let i = 0; i < 20; i++) {
      expect(sampleScene(a, catalog, {}, i)).toEqual(sampleScene(b, catalog, {}, i));
    }
  });

  it('records the stream offsets it consumed', () => {
    const rng = new Rng(3);
    const first = sampleScene(rng, catalog, {}, 0);
    const second = sampleScene(rng, catalog, {}, 1);
    expect(first.rngCalls[0]).toBe(0);
    expect(first.rngCalls[1]).toBeGreaterThan(0);
    expect(second.rngCalls[0]).toBe(first.rngCalls[1]);
    expect(second.rngCalls[1]).toBe(rng.calls);
  });

  it('honours the loading probability at both extremes', () => {
    const rng = new Rng(5);
    for (let i = 0; i < 50; i++) {
      expect(sampleScene(rng, catalog, { loadingProbability: 0 }).loadingVisible).toBe(false);
      expect(sampleScene(rng, catalog, { loadingProbability: 1 }).loadingVisible).toBe(true);
    }
    expect(() => sampleScene(rng, catalog, { loadingProbability: 1.5 })).toThrow(ConfigurationError);
  });

  it('freezes the scene', () => {
    const scene = sampleScene(new Rng(1), catalog);
    expect(Object.isFrozen(scene)).toBe(true);
    expect(Object.isFrozen(scene.desktopIcons)).toBe(true);
  });
});

describe('datetime', () => {
  it('draws whole minutes inside the range', () => {
    const rng = new Rng(11);
    const range = { start: '2025-06-01T10:00:30.000Z', end: '2025-06-01T10:05:00.000Z' };
    for (let i = 0; i < 100; i++) {
      const d = drawDatetime(rng, range);
      expect(d.getUTCSeconds()).toBe(0);
      expect(d.getUTCMilliseconds()).toBe(0);
      expect(d.getTime()).toBeGreaterThanOrEqual(Date.parse('2025-06-01T10:01:00.000Z'));
      expect(d.getTime()).toBeLessThanOrEqual(Date.parse(range.end));
    }
  });

  it('rejects ranges without a whole minute or in the wrong order', () => {
    const rng = new Rng(1);
    expect(() => drawDatetime(rng, { start: '2025-01-01T00:00:10Z', end: '2025-01-01T00:00:50Z' })).toThrow(ConfigurationError);
    expect(() => drawDatetime(rng, { start: '2025-02-01T00:00:00Z', end: '2025-01-01T00:00:00Z' })).toThrow(ConfigurationError);
    expect(() => drawDatetime(rng, { start: 'soon', end: '2025-01-01T00:00:00Z' })).toThrow(ConfigurationError);
  });

  it('formats the taskbar clock', () => {
    expect(formatClock(new Date('2025-03-14T15:09:00Z'))).toBe('3:09 PM\n3/14/2025');
    expect(formatClock(new Date('2025-11-02T00:05:00Z'))).toBe('12:05 AM\n11/2/2025');
    expect(formatClock(new Date('2025-11-02T12:00:00Z'))).toBe('12:00 PM\n11/2/2025');
  });
});

describe('sceneKey', () => {
  it('keys a scene by date or by scene id', () => {
    const scene = makeScene();
    expect(sceneKey(scene, 'date')).toBe('2025-03-14');
    expect(sceneKey(scene, 'scene')).toBe('scene-000007');
  });
});
