// registry.ts
import { ConfigurationError } from '../errors';
import { TASK_KINDS, TaskKind } from '../datasets/sample';
import { ClickIconGenerator } from './click-icon';
import { IconListGenerator } from './iconlist';
import { GeneratorEnv, TaskGenerator } from './types';
import { WaitLoadingGenerator } from './wait-loading';

type GeneratorFactory = (env: GeneratorEnv) => TaskGenerator;

const REGISTRY: Record<TaskKind, GeneratorFactory> = {
  'click-desktop-icon': env => new ClickIconGenerator('click-desktop-icon', env.catalog, ['desktop']),
  'click-taskbar-icon': env => new ClickIconGenerator('click-taskbar-icon', env.catalog, ['taskbar']),
  'click-icon': env => new ClickIconGenerator('click-icon', env.catalog, ['desktop', 'taskbar']),
  'iconlist': env => new IconListGenerator(env.catalog),
  'wait-loading': env => new WaitLoadingGenerator(env.catalog, env.wait),
};

export function isTaskKind(kind: string): kind is TaskKind {
  return TASK_KINDS.some(k => k === kind);
}

export function createGenerator(kind: string, env: GeneratorEnv): TaskGenerator {
  if (!isTaskKind(kind)) {
    throw new ConfigurationError(`Unknown task kind "${kind}". Choose one of: ${TASK_KINDS.join(', ')}.`);
  }
  return REGISTRY[kind](env);
}
