/**
 * Error taxonomy for the conversion pipeline. Every error carries a stable
 * `code` that the HTTP layer maps to a response.
 */

export type ConversionErrorCode =
  | 'GEOMETRY_INVALID'
  | 'UNKNOWN_PRESET'
  | 'WATERMARK_ASSET_INVALID'
  | 'PROBE_FAILED'
  | 'DESCRIPTOR_BUILD_FAILED'
  | 'ENCODER_SPAWN_FAILED'
  | 'ENCODER_RUNTIME_FAILED'
  | 'CANCELLED'
  | 'INVALID_JOB'
  | 'INVALID_SOURCE'
  | 'ILLEGAL_TRANSITION';

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class GeometryError extends ConversionError {
  constructor(message: string) {
    super('GEOMETRY_INVALID', message);
  }
}

export class UnknownPresetError extends ConversionError {
  constructor(preset: string) {
    super('UNKNOWN_PRESET', `Unknown quality preset: ${preset}`);
  }
}

export class WatermarkAssetError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('WATERMARK_ASSET_INVALID', message, options);
  }
}

export class ProbeError extends ConversionError {
  constructor(message: string) {
    super('PROBE_FAILED', message);
  }
}

/**
 * Wraps the first failure hit while resolving a job's transform, tagged with
 * the job it belongs to.
 */
export class DescriptorBuildError extends ConversionError {
  readonly jobId: string;

  constructor(jobId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('DESCRIPTOR_BUILD_FAILED', `Job ${jobId}: ${reason}`, { cause });
    this.jobId = jobId;
  }
}

export class EncoderSpawnError extends ConversionError {
  constructor(binary: string, reason: string) {
    super('ENCODER_SPAWN_FAILED', `${binary} spawn failed: ${reason}`);
  }
}

export class EncoderRuntimeError extends ConversionError {
  readonly exitCode: number | null;

  constructor(exitCode: number | null, signal: string | null, diagnostic: string) {
    super('ENCODER_RUNTIME_FAILED', `ffmpeg exited with code ${exitCode ?? signal}. ${diagnostic}`);
    this.exitCode = exitCode;
  }
}

/** Raised when a run is stopped on request. A status, not a fault. */
export class CancelledError extends ConversionError {
  constructor(reason = 'cancelled') {
    super('CANCELLED', reason);
  }
}

export class JobValidationError extends ConversionError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_JOB', `Invalid job parameters: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class InvalidSourceError extends ConversionError {
  constructor(message: string) {
    super('INVALID_SOURCE', message);
  }
}

export class JobStateError extends ConversionError {
  constructor(message: string) {
    super('ILLEGAL_TRANSITION', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
