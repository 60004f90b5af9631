// transform.ts
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import sharp from 'sharp';
import { SurfaceMismatchError } from '../errors';
import type { SampleRecord, SplitTag } from '../datasets/sample';
import { pixelsToTensor } from '../utils/tensors';

export interface ResizeOptions {
  patchSize: number;   // vision patch edge in pixels
  mergeSize: number;   // patches merged per token edge
  minPixels: number;
  maxPixels: number;
}

export const DEFAULT_RESIZE: ResizeOptions = {
  patchSize: 16,
  mergeSize: 2,
  minPixels: 4 * 32 * 32,
  maxPixels: 1280 * 32 * 32,
};

const MAX_ASPECT = 200;

/**
 * Rounds both sides to multiples of patchSize * mergeSize while keeping the
 * pixel count within [minPixels, maxPixels] and the aspect ratio close to the
 * source's. Returns [height, width].
 */
export function smartResize(height: number, width: number, opts: ResizeOptions = DEFAULT_RESIZE): [number, number] {
  const factor = opts.patchSize * opts.mergeSize;
  if (Math.max(height, width) / Math.min(height, width) > MAX_ASPECT) {
    throw new RangeError(`Aspect ratio of ${width}x${height} exceeds ${MAX_ASPECT}`);
  }
  let h = Math.max(factor, Math.round(height / factor) * factor);
  let w = Math.max(factor, Math.round(width / factor) * factor);
  if (h * w > opts.maxPixels) {
    const beta = Math.sqrt((height * width) / opts.maxPixels);
    h = Math.max(factor, Math.floor(height / beta / factor) * factor);
    w = Math.max(factor, Math.floor(width / beta / factor) * factor);
  } else if (h * w < opts.minPixels) {
    const beta = Math.sqrt(opts.minPixels / (height * width));
    h = Math.ceil((height * beta) / factor) * factor;
    w = Math.ceil((width * beta) / factor) * factor;
  }
  return [h, w];
}

export interface ManifestEntry {
  index: number;                           // position in the pass, train then val
  id: string;
  split: SplitTag;
  taskKind: string;
  image: string;
  tensor: string;                          // relative to the dataset root
  source: [number, number];                // [width, height] of the stored image
  shape: [number, number, number];         // [H, W, 3] of the tensor
  mean: number[];
  std: number[];
}

export interface TransformContext {
  root: string;
  /** Absolute directory this pass writes into; `publishedDir` is where it will live. */
  outDir: string;
  publishedDir: string;
  split: SplitTag;
  resize: ResizeOptions;
}

export type SampleTransform = (record: SampleRecord, index: number, ctx: TransformContext) => Promise<ManifestEntry>;

/**
 * Re-validates one sample against its stored image and re-encodes the image
 * as a patch-aligned float tensor file.
 */
export const toPixelTensor: SampleTransform = async (record, index, ctx) => {
  const bytes = await readFile(join(ctx.root, record.image));
  const meta = await sharp(bytes).metadata();
  if (meta.width !== record.surface.width || meta.height !== record.surface.height) {
    throw new SurfaceMismatchError(
      `${record.id}: record declares surface "${record.surface.id}" ${record.surface.width}x${record.surface.height} ` +
        `but ${record.image} is ${meta.width}x${meta.height}`,
      record.surface,
      { id: record.image, width: meta.width ?? 0, height: meta.height ?? 0 },
    );
  }

  const [h, w] = smartResize(record.surface.height, record.surface.width, ctx.resize);
  const { data, info } = await sharp(bytes)
    .removeAlpha()
    .resize(w, h, { fit: 'fill' })
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 3) throw new RangeError(`${record.id}: expected 3 channels after decode, got ${info.channels}`);

  const pixels = pixelsToTensor(new Uint8Array(data.buffer, data.byteOffset, data.byteLength), h, w);
  const name = `sample_${String(index).padStart(6, '0')}.bin`;
  await writeFile(join(ctx.outDir, ctx.split, name), Buffer.from(pixels.data.buffer, pixels.data.byteOffset, pixels.data.byteLength));

  return {
    index,
    id: record.id,
    split: ctx.split,
    taskKind: record.taskKind,
    image: record.image,
    tensor: `${ctx.publishedDir}/${ctx.split}/${name}`,
    source: [record.surface.width, record.surface.height],
    shape: pixels.shape,
    mean: pixels.mean,
    std: pixels.std,
  };
};
