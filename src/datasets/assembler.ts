// assembler.ts
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import sharp from 'sharp';
import { ConfigurationError, SchemaViolationError, SurfaceMismatchError } from '../errors';
import { sameSurface, surfaceShape } from '../geometry/units';
import { LayoutCatalog, loadCatalog } from '../layout/catalog';
import { SchematicRenderer } from '../render/schematic';
import { RenderedFrame, RenderedSurface, Renderer, findSurface, validateFrame } from '../render/surface';
import { createGenerator } from '../tasks/registry';
import type { TaskGenerator } from '../tasks/types';
import { Logger, formatCount } from '../utils/log';
import { Rng } from '../utils/rng';
import { DatasetConfig, DatasetConfigInput, parseConfig, quotas } from './config';
import { SampleRecord, SampleRecordSchema, SplitTag, TrainingSample, checkRecord, toRecord } from './sample';
import { sampleScene, sceneKey } from './scene';
import { partition } from './split';
import { FILES, RunRecord, StoredDataset, pathExists, writeJsonl } from './store';

export interface GenerateDeps {
  catalog?: LayoutCatalog;
  renderer?: Renderer;
  logger?: Logger;
}

export type Dataset = StoredDataset;

interface Placed {
  sample: TrainingSample;
  key: string;
  image: string;   // file name under images/
}

/**
 * Builds one dataset from a config: drains every task quota on a single
 * seeded stream, partitions the samples and persists them. Work happens in
 * `<outputDir>.partial`, which only becomes `outputDir` once every record
 * has passed the schema check.
 */
export class DatasetAssembler {
  readonly config: DatasetConfig;
  private catalog: LayoutCatalog;
  private renderer: Renderer;
  private logger: Logger;
  private rng: Rng;
  private staging: string;

  constructor(config: DatasetConfig, catalog: LayoutCatalog, renderer: Renderer, logger: Logger) {
    this.config = config;
    this.catalog = catalog;
    this.renderer = renderer;
    this.logger = logger;
    this.rng = new Rng(config.seed);
    this.staging = `${config.outputDir}.partial`;
  }

  async build(): Promise<Dataset> {
    const { outputDir } = this.config;
    if (await pathExists(outputDir)) {
      throw new ConfigurationError(`Output directory ${outputDir} already exists; datasets are never overwritten`);
    }
    const env = { catalog: this.catalog, wait: this.config.wait };
    const plan = quotas(this.config).map(([kind, quota]) => ({ generator: createGenerator(kind, env), quota }));

    await rm(this.staging, { recursive: true, force: true });
    await mkdir(join(this.staging, FILES.images), { recursive: true });
    await mkdir(join(this.staging, FILES.testImages), { recursive: true });

    try {
      const placed: Placed[] = [];
      const scenes: Record<string, number> = {};
      let sceneIndex = 0;
      for (const { generator, quota } of plan) {
        if (quota === 0) {
          this.logger.warn(`Skipping ${generator.kind}: quota is 0`);
          scenes[generator.kind] = 0;
          continue;
        }
        this.logger.log(`Generating ${generator.kind}: ${formatCount(quota)} samples`);
        const before = sceneIndex;
        sceneIndex = await this.drain(generator, quota, sceneIndex, placed);
        scenes[generator.kind] = sceneIndex - before;
      }

      const dataset = await this.persist(placed, scenes);
      await rename(this.staging, outputDir);
      this.logger.log(
        `Dataset ${this.config.name}: ${dataset.train.length} train, ${dataset.val.length} val, ${dataset.test.length} test → ${outputDir}`,
      );
      return { ...dataset, root: outputDir };
    } catch (err) {
      await rm(this.staging, { recursive: true, force: true });
      throw err;
    }
  }

  // Samples scenes for one task until its quota is met; returns the next scene index.
  private async drain(generator: TaskGenerator, quota: number, sceneIndex: number, placed: Placed[]): Promise<number> {
    const context = { ...this.config.scene, ...generator.sceneContext };
    const keyKind = this.config.heldOut?.key ?? 'date';
    let emitted = 0;
    let idle = 0;

    while (emitted < quota) {
      const scene = sampleScene(this.rng, this.catalog, context, sceneIndex++);
      const frame = await this.renderer.render(scene, this.catalog);
      validateFrame(frame, this.catalog);

      const samples = generator.generate(scene, frame, this.rng).slice(0, quota - emitted);
      if (samples.length === 0) {
        if (++idle >= this.config.maxIdleScenes) {
          throw new ConfigurationError(
            `${generator.kind} produced no samples in ${idle} consecutive scenes; check its scene settings`,
          );
        }
        continue;
      }
      idle = 0;

      const written = new Map<string, string>();
      for (const sample of samples) {
        const surface = shippedSurface(frame, sample);
        let image = written.get(surface.id);
        if (!image) {
          image = `${String(scene.index).padStart(6, '0')}_${surface.id}.png`;
          await writeSurface(join(this.staging, FILES.images, image), surface);
          written.set(surface.id, image);
        }
        placed.push({ sample, key: sceneKey(scene, keyKind), image });
      }
      emitted += samples.length;
    }
    return sceneIndex;
  }

  private async persist(placed: Placed[], scenes: Record<string, number>): Promise<StoredDataset> {
    const { heldOut } = this.config;
    const parts = partition(this.rng, placed, {
      trainRatio: this.config.split.train,
      heldOutFraction: heldOut?.fraction,
    });

    const testImages = new Set(parts.test.map(p => p.image));
    for (const p of [...parts.train, ...parts.val]) {
      if (testImages.has(p.image)) {
        throw new SchemaViolationError(`Image ${p.image} is shared by held-out and train/val samples`, [p.sample.id]);
      }
    }
    for (const image of [...testImages].sort()) {
      await rename(join(this.staging, FILES.images, image), join(this.staging, FILES.testImages, image));
    }

    const records = (items: Placed[], split: SplitTag, dir: string) =>
      items.map(p => toRecord(p.sample, { image: `${dir}/${p.image}`, split, key: p.key }));
    const train = records(parts.train, 'train', FILES.images);
    const val = records(parts.val, 'val', FILES.images);
    const test = records(parts.test, 'test', FILES.testImages);
    await this.checkSchema([...train, ...val, ...test]);

    await writeJsonl(join(this.staging, FILES.all), [...train, ...val, ...test]);
    await writeJsonl(join(this.staging, FILES.train), train);
    await writeJsonl(join(this.staging, FILES.val), val);
    await writeJsonl(join(this.staging, FILES.test), test);

    const run: RunRecord = {
      name: this.config.name,
      version: this.config.version,
      seed: this.config.seed,
      layout: {
        name: this.catalog.screen.name,
        version: this.catalog.version,
        width: this.catalog.screen.width,
        height: this.catalog.screen.height,
      },
      quotas: Object.fromEntries(quotas(this.config)),
      scenes,
      splits: { train: train.length, val: val.length, test: test.length },
      trainRatio: this.config.split.train,
      heldOut: heldOut ? { fraction: heldOut.fraction, key: heldOut.key, testKeys: parts.testKeys } : null,
      waitTarget: this.config.wait.target,
    };
    // written last: a dataset without its run config is incomplete
    await writeFile(join(this.staging, FILES.run), JSON.stringify(run, null, 2) + '\n', 'utf8');

    return { root: this.staging, run, train, val, test };
  }

  private async checkSchema(records: SampleRecord[]) {
    const problems: string[] = [];
    const ids: string[] = [];
    for (const record of records) {
      const parsed = SampleRecordSchema.safeParse(record);
      const problem = parsed.success
        ? checkRecord(parsed.data) ?? (await pathExists(join(this.staging, record.image)) ? undefined : `image ${record.image} does not resolve`)
        : parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      if (problem) {
        problems.push(`${record.id}: ${problem}`);
        ids.push(record.id);
      }
    }
    if (problems.length) {
      throw new SchemaViolationError(`${problems.length} sample(s) violate the record schema:\n  ${problems.slice(0, 20).join('\n  ')}`, ids);
    }
  }
}

function shippedSurface(frame: RenderedFrame, sample: TrainingSample): RenderedSurface {
  const surface = findSurface(frame, sample.surface.id);
  if (!surface || !sameSurface(surface, sample.surface)) {
    throw new SurfaceMismatchError(
      `Sample ${sample.id} ships surface "${sample.surface.id}" (${sample.surface.width}x${sample.surface.height}) which the renderer did not produce`,
      undefined,
      surfaceShape(sample.surface),
    );
  }
  return surface;
}

// The encoded image must have exactly the dimensions coordinates were normalized against.
async function writeSurface(path: string, surface: RenderedSurface) {
  const meta = await sharp(surface.image).metadata();
  if (meta.width !== surface.width || meta.height !== surface.height) {
    throw new SurfaceMismatchError(
      `Surface "${surface.id}" declares ${surface.width}x${surface.height} but its image is ${meta.width}x${meta.height}`,
      surfaceShape(surface),
      { id: surface.id, width: meta.width ?? 0, height: meta.height ?? 0 },
    );
  }
  await writeFile(path, surface.image);
}

/** Entry point: validate the config, resolve the layout and renderer, build. */
export async function generate(input: DatasetConfig | DatasetConfigInput, deps: GenerateDeps = {}): Promise<Dataset> {
  const config = parseConfig(input);
  let catalog = deps.catalog;
  if (!catalog) {
    if (!config.layout) throw new ConfigurationError('No layout catalog given and config.layout is not set');
    catalog = await loadCatalog(config.layout);
  }
  const renderer = deps.renderer ?? new SchematicRenderer({ crops: config.render.crops });
  const assembler = new DatasetAssembler(config, catalog, renderer, deps.logger ?? console);
  return assembler.build();
}

