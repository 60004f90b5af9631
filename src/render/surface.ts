// surface.ts
import { SurfaceMismatchError } from '../errors';
import type { SurfaceRef } from '../geometry/units';
import type { LayoutCatalog, PixelBox } from '../layout/catalog';
import type { SceneState } from '../datasets/constants';

export const FULL_FRAME = 'full';

/** One image the renderer produced, plus where it sits inside the full frame. */
export interface RenderedSurface extends SurfaceRef {
  readonly origin: { readonly x: number; readonly y: number };
  readonly image: Buffer; // PNG
}

export interface RenderedFrame {
  readonly full: RenderedSurface;
  readonly crops: readonly RenderedSurface[];
}

/** The compositing engine. Lives outside this package; `SchematicRenderer` stands in for it. */
export interface Renderer {
  render(scene: SceneState, catalog: LayoutCatalog): Promise<RenderedFrame>;
}

/** Maps a full-frame layout box into `surface`'s pixel space. */
export function toSurfaceBox(surface: RenderedSurface, bbox: PixelBox): PixelBox {
  const [x, y, w, h] = bbox;
  return [x - surface.origin.x, y - surface.origin.y, w, h];
}

export function boxCenter(bbox: PixelBox): { x: number; y: number } {
  const [x, y, w, h] = bbox;
  return { x: x + w / 2, y: y + h / 2 };
}

export function findSurface(frame: RenderedFrame, id: string): RenderedSurface | undefined {
  return id === frame.full.id ? frame.full : frame.crops.find(c => c.id === id);
}

/**
 * Checks a frame before anything is measured on it: the full frame must match
 * the layout's screen and every crop must lie inside the full frame.
 */
export function validateFrame(frame: RenderedFrame, catalog: LayoutCatalog) {
  const { full } = frame;
  if (full.id !== FULL_FRAME || full.origin.x !== 0 || full.origin.y !== 0) {
    throw new SurfaceMismatchError(`Full frame must be "${FULL_FRAME}" at origin (0, 0), got "${full.id}" at (${full.origin.x}, ${full.origin.y})`);
  }
  if (full.width !== catalog.screen.width || full.height !== catalog.screen.height) {
    throw new SurfaceMismatchError(
      `Renderer produced ${full.width}x${full.height} but layout ${catalog.screen.name}@${catalog.version} ` +
        `is authored at ${catalog.screen.width}x${catalog.screen.height}`,
      { id: FULL_FRAME, width: catalog.screen.width, height: catalog.screen.height },
      { id: full.id, width: full.width, height: full.height },
    );
  }
  for (const crop of frame.crops) {
    const { x, y } = crop.origin;
    if (x < 0 || y < 0 || x + crop.width > full.width || y + crop.height > full.height) {
      throw new SurfaceMismatchError(
        `Crop "${crop.id}" [${x}, ${y}, ${crop.width}, ${crop.height}] lies outside the ${full.width}x${full.height} full frame`,
      );
    }
  }
}
