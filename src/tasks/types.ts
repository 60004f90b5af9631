// types.ts
import { ConfigurationError } from '../errors';
import type { IconRegion, SceneContext, SceneState } from '../datasets/constants';
import type { Json, TaskKind, TrainingSample } from '../datasets/sample';
import type { LayoutCatalog, LayoutElement } from '../layout/catalog';
import type { RenderedFrame } from '../render/surface';
import type { Rng } from '../utils/rng';

export interface WaitOptions {
  /** 'indicator': point at the visible loading panel; 'none': no spatial target. */
  target: 'indicator' | 'none';
  duration: { min: number; max: number };   // whole seconds, inclusive
  prompts: string[];
  loadingProbability: number;               // scene context for wait scenes
}

export const DEFAULT_WAIT_PROMPTS = [
  'A loading screen is visible. What action should you take?',
  'The application is loading. What should you do?',
  'The application is starting up. What action is appropriate?',
];

// a wait prompt must not ask for a pointer action
const CLICK_VERB = /\b(?:(?:double|right|left)[- ]?)?(?:click|tap)(?:s|ed|ing)?\b/i;

export function asksForClick(prompt: string): boolean {
  return CLICK_VERB.test(prompt);
}

export const DEFAULT_WAIT_OPTIONS: WaitOptions = {
  target: 'none',
  duration: { min: 1, max: 5 },
  prompts: DEFAULT_WAIT_PROMPTS,
  loadingProbability: 1,
};

export interface GeneratorEnv {
  catalog: LayoutCatalog;
  wait: WaitOptions;
}

/**
 * Turns one sampled scene and its rendered surfaces into annotated samples.
 * Generators are stateless between calls; all randomness comes from `rng`.
 */
export interface TaskGenerator {
  readonly kind: TaskKind;
  /** Scene settings this task needs on top of the run's defaults. */
  readonly sceneContext: Partial<SceneContext>;
  generate(scene: SceneState, frame: RenderedFrame, rng: Rng): TrainingSample[];
}

export function sceneIcons(scene: SceneState, region: IconRegion): readonly string[] {
  return region === 'desktop' ? scene.desktopIcons : scene.taskbarIcons;
}

/** Looks up an icon the scene placed; a scene naming an icon the layout lacks is a configuration fault. */
export function requireIcon(catalog: LayoutCatalog, id: string, region: IconRegion): LayoutElement {
  const el = catalog.get(id);
  if (!el || el.kind !== 'icon' || el.region !== region) {
    throw new ConfigurationError(`Scene places ${region} icon "${id}" but layout ${catalog.screen.name}@${catalog.version} has no such icon`);
  }
  return el;
}

export function sampleId(kind: TaskKind, scene: SceneState, suffix: string): string {
  return `${kind}_${String(scene.index).padStart(6, '0')}_${suffix}`;
}

export function sceneMetadata(scene: SceneState): { [key: string]: Json } {
  return {
    sceneIndex: scene.index,
    datetime: scene.datetime,
    loadingVisible: scene.loadingVisible,
    desktopIcons: [...scene.desktopIcons],
    taskbarIcons: [...scene.taskbarIcons],
  };
}
