// iconlist.ts
import { ConfigurationError } from '../errors';
import type { SceneContext, SceneState } from '../datasets/constants';
import { Json, TrainingSample, makeSample } from '../datasets/sample';
import { pointOnSurface, toleranceOnSurface } from '../geometry/units';
import type { ClickTemplate, LayoutCatalog } from '../layout/catalog';
import { RenderedFrame, boxCenter, toSurfaceBox, validateFrame } from '../render/surface';
import { TaskGenerator, requireIcon, sampleId, sceneMetadata } from './types';

export const ICON_LABEL = '[icon_label]';
const LIST_REGION = 'desktop';

export function fillTemplate(template: ClickTemplate, label: string): string {
  return template.prompt.split(ICON_LABEL).join(label);
}

/**
 * Enumerates the desktop icon list: one sample per (click template, visible
 * icon), walking icons in list order. Uses the same full-frame convention as
 * the single-icon click task.
 */
export class IconListGenerator implements TaskGenerator {
  readonly kind = 'iconlist' as const;
  readonly sceneContext: Partial<SceneContext> = {};
  private templates: ClickTemplate[];

  constructor(private catalog: LayoutCatalog) {
    this.templates = catalog.templatesFor(LIST_REGION);
    if (this.templates.length === 0) {
      throw new ConfigurationError(`iconlist needs at least one click task targeting "${LIST_REGION}" in the layout document`);
    }
    for (const t of this.templates) {
      if (!t.prompt.includes(ICON_LABEL)) {
        throw new ConfigurationError(`Task "${t.id}" prompt has no ${ICON_LABEL} placeholder: "${t.prompt}"`);
      }
    }
  }

  generate(scene: SceneState, frame: RenderedFrame): TrainingSample[] {
    validateFrame(frame, this.catalog);
    const surface = frame.full;

    const ordered = this.catalog.inCatalogOrder(scene.desktopIcons);
    if (ordered.length !== scene.desktopIcons.length || ordered.some((id, i) => id !== scene.desktopIcons[i])) {
      throw new ConfigurationError(`Scene ${scene.index} desktop icons are not in list order: [${scene.desktopIcons.join(', ')}]`);
    }

    const icons = ordered.map(id => {
      const el = requireIcon(this.catalog, id, LIST_REGION);
      const box = toSurfaceBox(surface, el.bbox);
      const c = boxCenter(box);
      return { el, label: el.label ?? el.id, box, point: pointOnSurface(surface, c.x, c.y) };
    });
    const list: Json[] = icons.map(i => ({ id: i.el.id, label: i.label, center: [i.point.x, i.point.y] }));

    const samples: TrainingSample[] = [];
    for (const template of this.templates) {
      icons.forEach((icon, position) => {
        const prompt = fillTemplate(template, icon.label);
        if (!prompt.includes(icon.label)) {
          throw new ConfigurationError(`Prompt "${prompt}" lost the label "${icon.label}"`);
        }
        samples.push(makeSample({
          id: sampleId(this.kind, scene, `${template.id}_${icon.el.id}`),
          taskKind: this.kind,
          prompt,
          action: {
            kind: template.action,
            coordinate: icon.point,
            tolerance: toleranceOnSurface(surface, icon.box[2], icon.box[3]),
          },
          surface,
          sceneIndex: scene.index,
          metadata: {
            ...sceneMetadata(scene),
            template: template.id,
            iconId: icon.el.id,
            iconLabel: icon.label,
            iconBounds: [...icon.el.bbox],
            listPosition: position,
            iconList: list,
          },
        }));
      });
    }
    return samples;
  }
}
