/**
 * Error types and codes for layersmith.
 * This is the error contract - all pipeline errors extend LayerError.
 */

/**
 * Pipeline stage an error surfaced from.
 */
export type Stage = 'parse' | 'build' | 'publish';

/**
 * Stable error kinds exposed in the `{stage, kind, message}` result payload.
 */
export type ErrorKind =
  | 'invalid-spec'
  | 'configuration'
  | 'install'
  | 'archive'
  | 'size-limit'
  | 'remote-api'
  | 'timeout'
  | 'cancelled'
  | 'internal';

/**
 * Base error class for all layersmith errors.
 */
export class LayerError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly kind: ErrorKind = 'internal',
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LayerError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Malformed package specifier input. Always user-fixable, never retried.
 */
export class InvalidSpecError extends LayerError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 'invalid-spec', details);
    this.name = 'InvalidSpecError';
  }
}

/**
 * Missing or invalid credentials, region or configuration file.
 */
export class ConfigurationError extends LayerError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 'configuration', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Dependency installation failed.
 * `details.package` names the offending requirement when the installer reports one.
 */
export class InstallError extends LayerError {
  constructor(
    code: string,
    message: string,
    kind: 'install' | 'timeout' | 'cancelled' = 'install',
    details?: Record<string, unknown>
  ) {
    super(code, message, kind, details);
    this.name = 'InstallError';
  }
}

/**
 * Archive creation or size-limit failure.
 */
export class PackagingError extends LayerError {
  constructor(
    code: string,
    message: string,
    kind: 'archive' | 'size-limit' | 'cancelled' = 'archive',
    details?: Record<string, unknown>
  ) {
    super(code, message, kind, details);
    this.name = 'PackagingError';
  }
}

/**
 * Cloud API failure. Only `retryable` errors are retried, and only inside the publisher.
 */
export class RemoteApiError extends LayerError {
  constructor(
    public readonly apiCode: string,
    message: string,
    public readonly retryable: boolean,
    kind: 'remote-api' | 'timeout' | 'cancelled' = 'remote-api',
    details?: Record<string, unknown>
  ) {
    super(ErrorCodes.REMOTE_API, message, kind, { ...details, apiCode, retryable });
    this.name = 'RemoteApiError';
  }
}

/**
 * An error enriched with the pipeline stage it came from.
 * The orchestrator wraps, it never swallows: the original error stays in `cause`.
 */
export class StageError extends LayerError {
  constructor(
    public readonly stage: Stage,
    cause: unknown,
    kind: ErrorKind,
    code: string,
    message: string
  ) {
    super(code, message, kind, { stage });
    this.name = 'StageError';
    this.cause = cause;
  }

  static wrap(stage: Stage, error: unknown): StageError {
    if (error instanceof StageError) {
      return error;
    }
    if (error instanceof LayerError) {
      return new StageError(stage, error, error.kind, error.code, error.message);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new StageError(stage, error, 'internal', ErrorCodes.INTERNAL, message);
  }

  /**
   * The stable failure payload rendered by the CLI.
   */
  toPayload(): { stage: Stage; kind: ErrorKind; message: string } {
    return { stage: this.stage, kind: this.kind, message: this.message };
  }
}

export const ErrorCodes = {
  // Input parsing (P001-P009)
  EMPTY_SPEC: 'P001',
  EMPTY_TOKEN: 'P002',
  INVALID_NAME: 'P003',
  INVALID_OPERATOR: 'P004',
  INVALID_VERSION: 'P005',
  DUPLICATE_PACKAGE: 'P006',
  UNSUPPORTED_RUNTIME: 'P007',
  INVALID_ARN: 'P008',
  UNSUPPORTED_ARCHITECTURE: 'P009',

  // Configuration (C001-C003)
  MISSING_CREDENTIALS: 'C001',
  MISSING_REGION: 'C002',
  INVALID_CONFIG: 'C003',

  // Build (B001-B006)
  INSTALL_FAILED: 'B001',
  INSTALLER_NOT_FOUND: 'B002',
  INSTALL_TIMEOUT: 'B003',
  ARCHIVE_FAILED: 'B004',
  SIZE_LIMIT: 'B005',
  BUILD_CANCELLED: 'B006',

  // Publish (R001)
  REMOTE_API: 'R001',

  INTERNAL: 'X001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
