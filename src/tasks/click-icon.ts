// click-icon.ts
import type { IconRegion, SceneContext, SceneState } from '../datasets/constants';
import { TaskKind, TrainingSample, makeSample } from '../datasets/sample';
import { pointOnSurface, toleranceOnSurface } from '../geometry/units';
import type { LayoutCatalog } from '../layout/catalog';
import { RenderedFrame, boxCenter, toSurfaceBox, validateFrame } from '../render/surface';
import { TaskGenerator, requireIcon, sampleId, sceneIcons, sceneMetadata } from './types';

const PROMPTS: Record<IconRegion, (label: string) => string> = {
  desktop: label => `Double-click on the ${label} icon on the desktop.`,
  taskbar: label => `Double-click on ${label} in the taskbar.`,
};

/**
 * One double-click sample per icon present in the scene. Coordinates are
 * always measured on the full frame, the image every sample ships with.
 */
export class ClickIconGenerator implements TaskGenerator {
  readonly sceneContext: Partial<SceneContext> = {};

  constructor(
    readonly kind: TaskKind,
    private catalog: LayoutCatalog,
    private regions: IconRegion[],
  ) {}

  generate(scene: SceneState, frame: RenderedFrame): TrainingSample[] {
    validateFrame(frame, this.catalog);
    const surface = frame.full;
    const samples: TrainingSample[] = [];

    for (const region of this.regions) {
      for (const id of sceneIcons(scene, region)) {
        const icon = requireIcon(this.catalog, id, region);
        const label = icon.label ?? icon.id;
        const box = toSurfaceBox(surface, icon.bbox);
        const c = boxCenter(box);

        samples.push(makeSample({
          id: sampleId(this.kind, scene, `${region}_${id}`),
          taskKind: this.kind,
          prompt: PROMPTS[region](label),
          action: {
            kind: 'double_click',
            coordinate: pointOnSurface(surface, c.x, c.y),
            tolerance: toleranceOnSurface(surface, box[2], box[3]),
          },
          surface,
          sceneIndex: scene.index,
          metadata: {
            ...sceneMetadata(scene),
            iconRegion: region,
            iconId: id,
            iconLabel: label,
            iconBounds: [...icon.bbox],
          },
        }));
      }
    }
    return samples;
  }
}
