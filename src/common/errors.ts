// src/common/errors.ts
import { TimeRange } from './interfaces/pipeline.interface';

export type ClipErrorKind = 'OutOfRange' | 'EmptyRange' | 'EncodeFailure';
export type AssemblyErrorKind = 'NoClips' | 'EncodeFailure';
export type LedgerErrorKind = 'WriteFailure';
export type CollaboratorErrorKind = 'RateLimited' | 'AuthFailure' | 'NotFound';

/**
 * Base class for every failure the pipeline distinguishes.
 * `kind` is the discriminant callers switch on.
 */
export abstract class PipelineError<K extends string = string> extends Error {
  constructor(
    readonly kind: K,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class ClipError extends PipelineError<ClipErrorKind> {
  constructor(
    kind: ClipErrorKind,
    readonly range: TimeRange,
    message: string,
    cause?: unknown,
  ) {
    super(kind, message, cause);
  }
}

export class AssemblyError extends PipelineError<AssemblyErrorKind> {}

export class LedgerError extends PipelineError<LedgerErrorKind> {}

export class CollaboratorError extends PipelineError<CollaboratorErrorKind> {
  get retryable(): boolean {
    return this.kind === 'RateLimited';
  }
}

export class PipelineCancelledError extends Error {
  constructor(readonly reason: string = 'Pipeline run was cancelled') {
    super(reason);
    this.name = 'PipelineCancelledError';
  }
}

export class ConfigValidationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Configuration error!\n${problems.map(p => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Throw if the run has been asked to stop. Called at the suspension
 * points between videos and between segments.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    const reason = signal.reason instanceof Error ? signal.reason.message : undefined;
    throw new PipelineCancelledError(reason);
  }
}
