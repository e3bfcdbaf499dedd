/**
 * Review Error Types
 *
 * Validation errors stop an operation before any provider call is made.
 * Provider failures are not represented here: they arrive as GatewayErrors
 * and are turned into events by the orchestrators.
 */

export class ReviewValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ReviewValidationError";
  }
}

export class DocumentTooLargeError extends ReviewValidationError {
  readonly size: number;
  readonly maxSize: number;
  constructor(size: number, maxSize: number) {
    const mb = (size / (1024 * 1024)).toFixed(1);
    const maxMb = Math.round(maxSize / (1024 * 1024));
    super(
      `PDF is ${mb} MB, which exceeds the ${maxMb} MB limit. Try a smaller file or compress the PDF.`
    );
    this.name = "DocumentTooLargeError";
    this.size = size;
    this.maxSize = maxSize;
  }
}

export class MissingCredentialsError extends ReviewValidationError {
  readonly provider: string;
  constructor(provider: string) {
    super(`No API key configured for ${provider}. Add one before starting a review.`);
    this.name = "MissingCredentialsError";
    this.provider = provider;
  }
}

export class SessionNotFoundError extends Error {
  readonly path: string;
  constructor(path: string) {
    super(`Lecture session not found: ${path}`);
    this.name = "SessionNotFoundError";
    this.path = path;
  }
}

export class SessionFormatError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SessionFormatError";
  }
}

export class ReviewTargetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReviewTargetError";
  }
}

export class SettingsFormatError extends Error {
  readonly path: string;
  constructor(path: string, message: string, options?: ErrorOptions) {
    super(`Invalid settings file ${path}: ${message}`, options);
    this.name = "SettingsFormatError";
    this.path = path;
  }
}
