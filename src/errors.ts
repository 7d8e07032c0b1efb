export class TUFError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Malformed or wrongly typed metadata document
export class MetadataError extends TUFError {}

// Key material or signature bytes that cannot be decoded
export class CryptoError extends TUFError {}

export class ExpiredMetadataError extends TUFError {}

export class SignatureThresholdError extends TUFError {}

export class RollbackError extends TUFError {}

export class VersionMismatchError extends TUFError {}

export class RetrievalError extends TUFError {
  readonly url: string;
  readonly status?: number;

  constructor(
    message: string,
    url: string,
    status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.url = url;
    this.status = status;
  }

  // Repositories answer 403 or 404 for a root version that was never published
  get notFound(): boolean {
    return this.status === 403 || this.status === 404;
  }
}

export class RetrievalTimeoutError extends RetrievalError {}

export class IntegrityError extends TUFError {}

export class MissingContentAddressError extends TUFError {}

export class ConfigurationError extends TUFError {}
