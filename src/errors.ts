// errors.ts

/** Base class for every failure the generator raises on purpose. */
export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A quota names an unknown task kind, or the layout is missing something a task needs. */
export class ConfigurationError extends DatasetError {}

/** A coordinate and the image it ships with were measured against different surfaces. */
export class SurfaceMismatchError extends DatasetError {
  constructor(
    message: string,
    readonly expected?: { id: string; width: number; height: number },
    readonly actual?: { id: string; width: number; height: number },
  ) {
    super(message);
  }
}

/** A sample record is missing a required field or points at an image that does not exist. */
export class SchemaViolationError extends DatasetError {
  constructor(message: string, readonly sampleIds: string[] = []) {
    super(message);
  }
}

export class LeakageError extends DatasetError {
  constructor(message: string, readonly keys: string[]) {
    super(message);
  }
}

/** One or more preprocessing transforms threw; the whole pass is void. */
export class WorkerFailure extends DatasetError {
  constructor(
    readonly failingIndices: number[],
    readonly causes: Map<number, unknown>,
  ) {
    const preview = failingIndices.slice(0, 10).join(', ');
    const more = failingIndices.length > 10 ? `, … (+${failingIndices.length - 10})` : '';
    super(`${failingIndices.length} sample(s) failed preprocessing: [${preview}${more}]`);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
