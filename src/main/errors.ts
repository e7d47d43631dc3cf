import { ErrorKind } from '../shared/types/events';

/**
 * Base for every error the pipeline turns into an event. `kind` is what ends
 * up on the wire.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Device failure or permission loss. Terminal for the session. */
export class CaptureError extends PipelineError {
  readonly kind = 'capture' as const;
}

export class ClassifierError extends PipelineError {
  readonly kind = 'classifier' as const;
}

export class EngineError extends PipelineError {
  readonly kind = 'engine' as const;
}

export class SinkError extends PipelineError {
  readonly kind = 'sink' as const;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n- ${problems.join('\n- ')}`);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toEngineError(err: unknown): EngineError {
  if (err instanceof EngineError) return err;
  return new EngineError(describeError(err), { cause: err });
}
