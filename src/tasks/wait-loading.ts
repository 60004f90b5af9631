// wait-loading.ts
import { ConfigurationError } from '../errors';
import type { SceneContext, SceneState } from '../datasets/constants';
import { Action, TrainingSample, makeSample } from '../datasets/sample';
import { pointOnSurface, toleranceOnSurface } from '../geometry/units';
import type { LayoutCatalog } from '../layout/catalog';
import { RenderedFrame, boxCenter, toSurfaceBox, validateFrame } from '../render/surface';
import type { Rng } from '../utils/rng';
import { TaskGenerator, WaitOptions, asksForClick, sampleId, sceneMetadata } from './types';

/**
 * Emits a wait sample only while the loading indicator is on screen. The
 * prompt always describes the loading state; the target is either the
 * indicator itself or an explicit "none".
 */
export class WaitLoadingGenerator implements TaskGenerator {
  readonly kind = 'wait-loading' as const;
  readonly sceneContext: Partial<SceneContext>;
  private indicatorId: string;

  constructor(private catalog: LayoutCatalog, private opts: WaitOptions) {
    if (opts.prompts.length === 0) throw new ConfigurationError('wait-loading needs at least one prompt');
    const clicky = opts.prompts.find(asksForClick);
    if (clicky !== undefined) throw new ConfigurationError(`wait-loading prompt asks for a click: "${clicky}"`);
    const { min, max } = opts.duration;
    if (!Number.isInteger(min) || !Number.isInteger(max) || min < 1 || max < min) {
      throw new ConfigurationError(`wait duration range must be whole seconds with 1 <= min <= max, got [${min}, ${max}]`);
    }
    if (!catalog.loadingIndicatorId) {
      throw new ConfigurationError(`wait-loading needs a loadingIndicator in layout ${catalog.screen.name}@${catalog.version}`);
    }
    this.indicatorId = catalog.loadingIndicatorId;
    this.sceneContext = { loadingProbability: opts.loadingProbability };
  }

  generate(scene: SceneState, frame: RenderedFrame, rng: Rng): TrainingSample[] {
    if (!scene.loadingVisible) return [];
    validateFrame(frame, this.catalog);
    const surface = frame.full;

    const prompt = rng.pick(this.opts.prompts);
    const duration = rng.int(this.opts.duration.min, this.opts.duration.max);

    let action: Action;
    if (this.opts.target === 'indicator') {
      const panel = this.catalog.require(this.indicatorId);
      const box = toSurfaceBox(surface, panel.bbox);
      const c = boxCenter(box);
      action = {
        kind: 'wait',
        coordinate: pointOnSurface(surface, c.x, c.y),
        tolerance: toleranceOnSurface(surface, box[2], box[3]),
        duration,
      };
    } else {
      action = { kind: 'wait', tolerance: [0, 0], duration, target: 'none' };
    }

    return [makeSample({
      id: sampleId(this.kind, scene, 'wait'),
      taskKind: this.kind,
      prompt,
      action,
      surface,
      sceneIndex: scene.index,
      metadata: {
        ...sceneMetadata(scene),
        waitSeconds: duration,
        waitTarget: this.opts.target,
        loadingIndicator: this.indicatorId,
      },
    })];
  }
}
