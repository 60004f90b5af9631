// index.ts
export * from './errors';
export { UNIT_SCALE, toUnits, toPixel, pointOnSurface, toleranceOnSurface, assertSameSurface } from './geometry/units';
export type { SurfacePoint, SurfaceRef, Tolerance } from './geometry/units';
export { LayoutCatalog, parseCatalog, loadCatalog } from './layout/catalog';
export type { LayoutElement, ClickTemplate, ScreenSpec } from './layout/catalog';
export { Rng } from './utils/rng';
export type { Logger } from './utils/log';
export { sampleScene, sceneKey, varyN } from './datasets/scene';
export type { SceneContext, SceneState } from './datasets/constants';
export { FULL_FRAME, validateFrame } from './render/surface';
export type { Renderer, RenderedFrame, RenderedSurface } from './render/surface';
export { SchematicRenderer } from './render/schematic';
export { createGenerator } from './tasks/registry';
export type { TaskGenerator } from './tasks/types';
export { parseConfig, loadConfig } from './datasets/config';
export type { DatasetConfig, DatasetConfigInput } from './datasets/config';
export { TASK_KINDS } from './datasets/sample';
export type { SampleRecord, TrainingSample, TaskKind } from './datasets/sample';
export { DatasetAssembler, generate } from './datasets/assembler';
export type { Dataset, GenerateDeps } from './datasets/assembler';
export { readDataset } from './datasets/store';
export { verify, verifyDataset, assertNoLeakage } from './verify/leakage';
export type { LeakageReport, LeakageViolation } from './verify/leakage';
export { runPool } from './preprocess/worker';
export { preprocess } from './preprocess/pipeline';
export type { Manifest, PreprocessOptions } from './preprocess/pipeline';
export { smartResize } from './preprocess/transform';
