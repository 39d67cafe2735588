/**
 * Error classes shared by admission, the document model and the job workers.
 */

export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type SubmissionErrorCode =
  | "missing-package"
  | "unsupported-package-type"
  | "missing-slide-images"
  | "unsupported-image-type"
  | "slide-image-count-mismatch"
  | "invalid-kind";

/**
 * Structural problem with a submission. Never enqueued.
 */
export class SubmissionError extends ServiceError {
  constructor(
    message: string,
    public readonly submissionCode: SubmissionErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, submissionCode, context);
  }

  static countMismatch(slideCount: number, imageCount: number): SubmissionError {
    return new SubmissionError(
      `Expected one still image per slide (${slideCount} slides, ${imageCount} images).`,
      "slide-image-count-mismatch",
      { slideCount, imageCount },
    );
  }
}

export class UnreadablePackageError extends ServiceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "unreadable-package", context);
  }

  static fromCause(error: unknown, context?: Record<string, unknown>): UnreadablePackageError {
    const message = error instanceof Error ? error.message : String(error);
    return new UnreadablePackageError(`Package could not be opened: ${message}`, {
      ...context,
      originalError: message,
    });
  }
}

export class JobTimeoutError extends ServiceError {
  constructor(jobId: string, timeoutMs: number) {
    super(`Job ${jobId} did not finish within ${timeoutMs} ms.`, "timeout", { jobId, timeoutMs });
  }
}

export class ConfigError extends ServiceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "config", context);
  }
}
