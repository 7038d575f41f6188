export class ForgeError extends Error {
  constructor(
    message: string,
    public readonly internalDetails?: string,
  ) {
    super(message);
    this.name = "ForgeError";
    Object.setPrototypeOf(this, ForgeError.prototype);
  }
}

export class ConfigError extends ForgeError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** An unreadable path. Recovered and recorded during a scan, fatal only for the root. */
export class ScanError extends ForgeError {
  constructor(
    message: string,
    public readonly path: string,
    internalDetails?: string,
  ) {
    super(message, internalDetails);
    this.name = "ScanError";
    Object.setPrototypeOf(this, ScanError.prototype);
  }
}

/** A single file larger than the whole budget. Recovered by truncation. */
export class BudgetExceededError extends ForgeError {
  constructor(
    public readonly path: string,
    public readonly size: number,
    public readonly budget: number,
  ) {
    super(
      `${path} (${size}) exceeds the context budget of ${budget} and was truncated.`,
    );
    this.name = "BudgetExceededError";
    Object.setPrototypeOf(this, BudgetExceededError.prototype);
  }
}

export class InferenceError extends ForgeError {
  constructor(
    message: string,
    internalDetails?: string,
    public readonly status?: number,
  ) {
    super(message, internalDetails);
    this.name = "InferenceError";
    Object.setPrototypeOf(this, InferenceError.prototype);
  }
}

/** Connection failures, 5xx, 408, 429 and timeouts. Retried with backoff. */
export class InferenceTransientError extends InferenceError {
  constructor(message: string, internalDetails?: string, status?: number) {
    super(message, internalDetails, status);
    this.name = "InferenceTransientError";
    Object.setPrototypeOf(this, InferenceTransientError.prototype);
  }
}

/** Malformed requests, validation errors and unparseable replies. Never retried. */
export class InferenceFatalError extends InferenceError {
  constructor(message: string, internalDetails?: string, status?: number) {
    super(message, internalDetails, status);
    this.name = "InferenceFatalError";
    Object.setPrototypeOf(this, InferenceFatalError.prototype);
  }
}

/** The response stream ended before the server's final frame. */
export class InferenceTruncatedError extends InferenceError {
  constructor(
    message: string,
    public readonly partialText: string,
  ) {
    super(message, `Received ${partialText.length} characters before the stream ended.`);
    this.name = "InferenceTruncatedError";
    Object.setPrototypeOf(this, InferenceTruncatedError.prototype);
  }
}

export class InferenceAbortedError extends InferenceError {
  constructor(message = "Inference request was cancelled.") {
    super(message);
    this.name = "InferenceAbortedError";
    Object.setPrototypeOf(this, InferenceAbortedError.prototype);
  }
}

export class MergeValidationError extends ForgeError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = "MergeValidationError";
    Object.setPrototypeOf(this, MergeValidationError.prototype);
  }
}

export class DatasetIntegrityError extends ForgeError {
  constructor(
    message: string,
    public readonly source: string,
    internalDetails?: string,
  ) {
    super(message, internalDetails);
    this.name = "DatasetIntegrityError";
    Object.setPrototypeOf(this, DatasetIntegrityError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
