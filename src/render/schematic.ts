// schematic.ts
import sharp from 'sharp';
import type { SceneState } from '../datasets/constants';
import type { LayoutCatalog, PixelBox } from '../layout/catalog';
import { FULL_FRAME, RenderedFrame, RenderedSurface, Renderer } from './surface';

type RGB = [number, number, number];

const PALETTE: Record<'background' | 'region' | 'desktop' | 'taskbar' | 'panel', RGB> = {
  background: [30, 30, 30],
  region: [52, 58, 70],     // taskbar and other regions
  desktop: [85, 180, 245],  // desktop icon - blue
  taskbar: [245, 205, 85],  // taskbar icon - yellow
  panel: [242, 242, 242],   // loading panel
};

export interface SchematicOptions {
  /** Region ids to ship as extra cropped surfaces. */
  crops?: string[];
}

/**
 * Stand-in for the compositing engine: flat, class-tinted boxes on a dark
 * background, encoded as PNG. Enough for the pipeline to measure, persist
 * and preprocess real images without the production assets.
 */
export class SchematicRenderer implements Renderer {
  private crops: string[];

  constructor(opts: SchematicOptions = {}) {
    this.crops = opts.crops ?? [];
  }

  async render(scene: SceneState, catalog: LayoutCatalog): Promise<RenderedFrame> {
    const W = catalog.screen.width, H = catalog.screen.height;
    const rgb = new Uint8ClampedArray(W * H * 3);
    fill(rgb, W, [0, 0, W, H], PALETTE.background);

    for (const el of catalog.elements) {
      if (el.kind === 'region' && el.id !== catalog.loadingIndicatorId) {
        fill(rgb, W, el.bbox, PALETTE.region);
      }
    }
    for (const id of scene.desktopIcons) fill(rgb, W, catalog.require(id).bbox, PALETTE.desktop);
    for (const id of scene.taskbarIcons) fill(rgb, W, catalog.require(id).bbox, PALETTE.taskbar);

    for (const el of catalog.elements) {
      if (el.kind === 'text') drawText(rgb, W, el.bbox, scene.datetimeText);
    }
    if (scene.loadingVisible && catalog.loadingIndicatorId) {
      fill(rgb, W, catalog.require(catalog.loadingIndicatorId).bbox, PALETTE.panel);
    }

    const raw = Buffer.from(rgb.buffer, rgb.byteOffset, rgb.byteLength);
    const full: RenderedSurface = {
      id: FULL_FRAME,
      width: W,
      height: H,
      origin: { x: 0, y: 0 },
      image: await encode(raw, W, H),
    };

    const crops: RenderedSurface[] = [];
    for (const id of this.crops) {
      const [x, y, w, h] = catalog.require(id).bbox;
      crops.push({ id, width: w, height: h, origin: { x, y }, image: await encode(raw, W, H, { left: x, top: y, width: w, height: h }) });
    }
    return { full, crops };
  }
}

function fill(rgb: Uint8ClampedArray, W: number, bbox: PixelBox, color: RGB) {
  const [x0, y0, w, h] = bbox;
  for (let y = y0; y < y0 + h; y++) {
    for (let x = x0; x < x0 + w; x++) {
      const i = (y * W + x) * 3;
      rgb[i + 0] = color[0];
      rgb[i + 1] = color[1];
      rgb[i + 2] = color[2];
    }
  }
}

// one grey column band per character, so different clock texts give different pixels
function drawText(rgb: Uint8ClampedArray, W: number, bbox: PixelBox, text: string) {
  const [x0, y0, w, h] = bbox;
  const chars = text.replace(/\n/g, ' ');
  if (!chars.length) return;
  const band = Math.max(1, Math.floor(w / chars.length));
  for (let c = 0; c < chars.length && c * band < w; c++) {
    const shade = 40 + ((chars.charCodeAt(c) * 7) % 200);
    fill(rgb, W, [x0 + c * band, y0, Math.min(band, w - c * band), h], [shade, shade, shade]);
  }
}

async function encode(
  raw: Buffer,
  width: number,
  height: number,
  region?: { left: number; top: number; width: number; height: number },
): Promise<Buffer> {
  let img = sharp(raw, { raw: { width, height, channels: 3 } });
  if (region) img = img.extract(region);
  return img.png().toBuffer();
}
