// pipeline.ts
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '../errors';
import type { SplitTag } from '../datasets/sample';
import { FILES, pathExists, readDataset } from '../datasets/store';
import { Logger, formatCount } from '../utils/log';
import { ensureCpuBackend } from '../utils/tensors';
import { DEFAULT_RESIZE, ManifestEntry, ResizeOptions, SampleTransform, toPixelTensor } from './transform';
import { runPool } from './worker';

export interface PreprocessOptions {
  resize?: Partial<ResizeOptions>;
  transform?: SampleTransform;
  logger?: Logger;
}

export interface Manifest {
  dataset: string;
  seed: number;
  resize: ResizeOptions;
  counts: { train: number; val: number };
  samples: ManifestEntry[];
}

const PROCESSED_SPLITS: SplitTag[] = ['train', 'val'];

/**
 * Converts every train and val image into a float tensor file. Train and
 * val share one pool and one index space (train first). The pass is
 * all or nothing: output lands in `preprocessed.partial/` and is renamed to
 * `preprocessed/`, with metadata.json, only once every sample succeeded.
 */
export async function preprocess(datasetPath: string, workerCount: number, options: PreprocessOptions = {}): Promise<Manifest> {
  const logger = options.logger ?? console;
  const transform = options.transform ?? toPixelTensor;
  const resize = { ...DEFAULT_RESIZE, ...options.resize };

  const dataset = await readDataset(datasetPath);
  const published = join(datasetPath, FILES.preprocessed);
  if (await pathExists(published)) {
    throw new ConfigurationError(`${published} already exists; remove it to preprocess again`);
  }
  const staging = `${published}.partial`;
  await rm(staging, { recursive: true, force: true });
  for (const split of PROCESSED_SPLITS) await mkdir(join(staging, split), { recursive: true });
  await ensureCpuBackend();

  try {
    // one pass over train then val, indexed globally so a failure names exactly one sample
    const queue = PROCESSED_SPLITS.flatMap(split => dataset[split].map(record => ({ record, split })));
    logger.log(
      `Preprocessing ${formatCount(dataset.train.length)} train + ${formatCount(dataset.val.length)} val samples on ${workerCount} workers`,
    );
    const base = { root: datasetPath, outDir: staging, publishedDir: FILES.preprocessed, resize };
    const samples = await runPool(queue, workerCount, ({ record, split }, index) => transform(record, index, { ...base, split }));

    const manifest: Manifest = {
      dataset: dataset.run.name,
      seed: dataset.run.seed,
      resize,
      counts: { train: dataset.train.length, val: dataset.val.length },
      samples,
    };
    await writeFile(join(staging, FILES.manifest), JSON.stringify(manifest, null, 2) + '\n', 'utf8');
    await rename(staging, published);
    return manifest;
  } catch (err) {
    await rm(staging, { recursive: true, force: true });
    throw err;
  }
}
