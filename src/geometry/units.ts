// units.ts
import { SurfaceMismatchError } from '../errors';

/** Unit coordinates live on a 0..UNIT_SCALE grid regardless of surface size. */
export const UNIT_SCALE = 1000;

export function toUnits(pixel: number, surfaceDim: number): number {
  if (!(surfaceDim > 0) || !Number.isFinite(surfaceDim)) {
    throw new RangeError(`toUnits: surface dimension must be positive, got ${surfaceDim}`);
  }
  return Math.round((pixel / surfaceDim) * UNIT_SCALE);
}

/** Approximate inverse of `toUnits`; exact to within half a unit of the surface. */
export function toPixel(units: number, surfaceDim: number): number {
  if (!(surfaceDim > 0) || !Number.isFinite(surfaceDim)) {
    throw new RangeError(`toPixel: surface dimension must be positive, got ${surfaceDim}`);
  }
  return (units / UNIT_SCALE) * surfaceDim;
}

/** Anything with an id and exact pixel dimensions a coordinate can be measured on. */
export interface SurfaceRef<Id extends string = string> {
  readonly id: Id;
  readonly width: number;
  readonly height: number;
}

/**
 * A unit coordinate that remembers which surface it was normalized against.
 * Built only by `pointOnSurface`, never from a bare pair.
 */
export interface SurfacePoint<Id extends string = string> {
  readonly surface: SurfaceRef<Id>;
  readonly x: number;
  readonly y: number;
}

export type Tolerance = readonly [number, number];

/** Normalizes a pixel position measured in `surface`'s own pixel space. */
export function pointOnSurface<Id extends string>(surface: SurfaceRef<Id>, px: number, py: number): SurfacePoint<Id> {
  if (px < 0 || py < 0 || px > surface.width || py > surface.height) {
    throw new SurfaceMismatchError(
      `Pixel (${px}, ${py}) lies outside surface "${surface.id}" (${surface.width}x${surface.height})`,
      surfaceShape(surface),
    );
  }
  return Object.freeze({
    surface,
    x: toUnits(px, surface.width),
    y: toUnits(py, surface.height),
  });
}

/** Half of a pixel extent, in the surface's unit space. */
export function toleranceOnSurface(surface: SurfaceRef, widthPx: number, heightPx: number): Tolerance {
  return [toUnits(widthPx / 2, surface.width), toUnits(heightPx / 2, surface.height)] as const;
}

/** Converts a unit point back to pixels on the surface it was measured against. */
export function pointToPixels(point: SurfacePoint): { x: number; y: number } {
  return {
    x: toPixel(point.x, point.surface.width),
    y: toPixel(point.y, point.surface.height),
  };
}

export function sameSurface(a: SurfaceRef, b: SurfaceRef): boolean {
  return a.id === b.id && a.width === b.width && a.height === b.height;
}

/** Fails unless a coordinate was measured on the surface whose image ships with it. */
export function assertSameSurface(image: SurfaceRef, point: SurfacePoint) {
  if (!sameSurface(image, point.surface)) {
    throw new SurfaceMismatchError(
      `Coordinate measured on "${point.surface.id}" (${point.surface.width}x${point.surface.height}) ` +
        `but the image is "${image.id}" (${image.width}x${image.height})`,
      surfaceShape(image),
      surfaceShape(point.surface),
    );
  }
}

export function surfaceShape(s: SurfaceRef): { id: string; width: number; height: number } {
  return { id: s.id, width: s.width, height: s.height };
}
