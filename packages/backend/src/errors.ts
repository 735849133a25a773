/**
 * Error taxonomy for the CSR builder
 *
 * ConfigurationError is raised by the mutator that received the bad value,
 * EncodingError by setExtension, RemoteServiceError by signing clients.
 */

export class CsrError extends Error {
  /** Machine-readable code, e.g. CONFIG_SUBJECT */
  public readonly code: string;

  public readonly details?: Record<string, unknown>;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CsrError";
    this.code = code;
    this.details = options?.details;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export class ConfigurationError extends CsrError {
  constructor(
    message: string,
    code = "CONFIG_INVALID",
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, code, options);
    this.name = "ConfigurationError";
  }
}

/** The remote key reports no signing algorithm family this builder understands */
export class UnsupportedKeyTypeError extends ConfigurationError {
  constructor(keyId: string, signingAlgorithms: readonly string[]) {
    super(
      `Key ${keyId} reports no RSA-PSS or ECDSA signing algorithm`,
      "CONFIG_UNSUPPORTED_KEY_TYPE",
      { details: { keyId, signingAlgorithms: [...signingAlgorithms] } },
    );
    this.name = "UnsupportedKeyTypeError";
  }
}

export class EncodingError extends CsrError {
  constructor(message: string, code = "ENCODING_INVALID_VALUE", details?: Record<string, unknown>) {
    super(message, code, { details });
    this.name = "EncodingError";
  }
}

export class RemoteServiceError extends CsrError {
  /** Error name reported by the remote service, e.g. NotFoundException */
  public readonly remoteCode: string;

  constructor(
    message: string,
    remoteCode: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, `REMOTE_${remoteCode.toUpperCase()}`, options);
    this.name = "RemoteServiceError";
    this.remoteCode = remoteCode;
  }
}
