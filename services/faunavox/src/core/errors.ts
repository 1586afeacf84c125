export class FaunavoxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FaunavoxError';
    Object.setPrototypeOf(this, FaunavoxError.prototype);
  }
}

export class ValidationError extends FaunavoxError {
  constructor(message: string, code = 'VALIDATION_ERROR', statusCode = 400, details?: Record<string, unknown>) {
    super(message, code, statusCode, details);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class UnsupportedFormatError extends ValidationError {
  constructor(format: string, supported: readonly string[]) {
    super(`Audio format '${format}' is not supported`, 'UNSUPPORTED_FORMAT', 415, {
      format,
      supported_formats: [...supported],
    });
    this.name = 'UnsupportedFormatError';
    Object.setPrototypeOf(this, UnsupportedFormatError.prototype);
  }
}

export class FileTooLargeError extends ValidationError {
  constructor(sizeBytes: number, maxBytes: number) {
    super(`Audio file exceeds maximum allowed size of ${maxBytes} bytes`, 'FILE_TOO_LARGE', 413, {
      size_bytes: sizeBytes,
      max_bytes: maxBytes,
    });
    this.name = 'FileTooLargeError';
    Object.setPrototypeOf(this, FileTooLargeError.prototype);
  }
}

export class UnsupportedSpeciesError extends ValidationError {
  constructor(species: string) {
    super(`Species '${species}' is not supported`, 'UNSUPPORTED_SPECIES', 400, { species });
    this.name = 'UnsupportedSpeciesError';
    Object.setPrototypeOf(this, UnsupportedSpeciesError.prototype);
  }
}

export class EmptyUploadError extends ValidationError {
  constructor() {
    super('Audio file is empty', 'EMPTY_UPLOAD', 400);
    this.name = 'EmptyUploadError';
    Object.setPrototypeOf(this, EmptyUploadError.prototype);
  }
}

export class NotFoundError extends FaunavoxError {
  constructor(message = 'Resource not found', code = 'NOT_FOUND') {
    super(message, code, 404);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ArtifactNotFoundError extends NotFoundError {
  constructor(key: string) {
    super(`No stored object for key ${key}`, 'ARTIFACT_NOT_FOUND');
    this.name = 'ArtifactNotFoundError';
    Object.setPrototypeOf(this, ArtifactNotFoundError.prototype);
  }
}

export class StorageUnavailableError extends FaunavoxError {
  constructor(message = 'Artifact storage is unavailable', cause?: unknown) {
    super(message, 'STORAGE_UNAVAILABLE', 503, cause instanceof Error ? { cause: cause.message } : undefined);
    this.name = 'StorageUnavailableError';
    Object.setPrototypeOf(this, StorageUnavailableError.prototype);
  }
}

/** Informational: the caller gets the existing handle back, never this error. */
export class DuplicateActiveJobError extends FaunavoxError {
  constructor(public readonly activeJobId: string) {
    super('An analysis job is already active for this artifact', 'DUPLICATE_ACTIVE_JOB', 409, {
      job_id: activeJobId,
    });
    this.name = 'DuplicateActiveJobError';
    Object.setPrototypeOf(this, DuplicateActiveJobError.prototype);
  }
}

export class QualityRejectedError extends FaunavoxError {
  constructor(flags: readonly string[]) {
    super(`Audio failed quality control (${flags.join(', ') || 'unusable'})`, 'QUALITY_REJECTED', 422, {
      flags: [...flags],
    });
    this.name = 'QualityRejectedError';
    Object.setPrototypeOf(this, QualityRejectedError.prototype);
  }
}

export class InferenceUnavailableError extends FaunavoxError {
  constructor(message = 'Inference backend is unavailable') {
    super(message, 'INFERENCE_UNAVAILABLE', 503);
    this.name = 'InferenceUnavailableError';
    Object.setPrototypeOf(this, InferenceUnavailableError.prototype);
  }
}

export class ModelError extends FaunavoxError {
  constructor(message: string, code = 'MODEL_ERROR') {
    super(message, code, 422);
    this.name = 'ModelError';
    Object.setPrototypeOf(this, ModelError.prototype);
  }
}

export class JobTimeoutError extends FaunavoxError {
  constructor(budgetMs: number) {
    super(`Analysis exceeded its ${budgetMs}ms budget`, 'TIMEOUT', 504, { budget_ms: budgetMs });
    this.name = 'JobTimeoutError';
    Object.setPrototypeOf(this, JobTimeoutError.prototype);
  }
}

export class JobCancelledError extends FaunavoxError {
  constructor() {
    super('Analysis was cancelled', 'CANCELLED', 409);
    this.name = 'JobCancelledError';
    Object.setPrototypeOf(this, JobCancelledError.prototype);
  }
}

export class AudioDecodeError extends FaunavoxError {
  constructor(message: string) {
    super(message, 'AUDIO_DECODE_FAILED', 422);
    this.name = 'AudioDecodeError';
    Object.setPrototypeOf(this, AudioDecodeError.prototype);
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
