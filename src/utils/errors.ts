export enum ErrorCode {
  // Device Errors (1xxx)
  SSH_CONNECTION_FAILED = 1001,
  SSH_COMMAND_TIMEOUT = 1002,
  SSH_AUTH_FAILED = 1003,
  SSH_CONNECT_TIMEOUT = 1004,
  SSH_COMMAND_FAILED = 1005,

  // Configuration Errors (2xxx)
  CONFIG_INVALID = 2002,

  // Collection Errors (3xxx)
  COLLECTION_FAILED = 3001,

  // Policy Engine Errors (4xxx)
  ISE_REQUEST_FAILED = 4001,
  ISE_RESPONSE_INVALID = 4002,
  ISE_ENDPOINT_NOT_FOUND = 4003,
}

// Device-facing failures are never retried
export type FailureKind = 'auth' | 'timeout' | 'transport';

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
  timestamp: Date;
}

export class AuditError extends Error {
  readonly code: ErrorCode;
  readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: Error | undefined;
      context?: Record<string, unknown> | undefined;
    }
  ) {
    super(message);
    this.name = 'AuditError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
    this.timestamp = new Date();

    Error.captureStackTrace?.(this, AuditError);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      cause: this.cause,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

const CONNECT_CODES: Record<FailureKind, ErrorCode> = {
  auth: ErrorCode.SSH_AUTH_FAILED,
  timeout: ErrorCode.SSH_CONNECT_TIMEOUT,
  transport: ErrorCode.SSH_CONNECTION_FAILED,
};

const COMMAND_CODES: Record<FailureKind, ErrorCode> = {
  auth: ErrorCode.SSH_AUTH_FAILED,
  timeout: ErrorCode.SSH_COMMAND_TIMEOUT,
  transport: ErrorCode.SSH_COMMAND_FAILED,
};

// Includes a rejected enable secret, as kind `auth`
export class ConnectError extends AuditError {
  readonly kind: FailureKind;
  readonly host: string;

  constructor(
    kind: FailureKind,
    host: string,
    message: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined }
  ) {
    super(CONNECT_CODES[kind], message, { ...options, context: { host, kind, ...options?.context } });
    this.name = 'ConnectError';
    this.kind = kind;
    this.host = host;
  }
}

export class CommandError extends AuditError {
  readonly kind: FailureKind;
  readonly command: string;

  constructor(
    kind: FailureKind,
    command: string,
    message: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined }
  ) {
    super(COMMAND_CODES[kind], message, { ...options, context: { command, kind, ...options?.context } });
    this.name = 'CommandError';
    this.kind = kind;
    this.command = command;
  }
}

export class CollectionError extends AuditError {
  readonly kind: FailureKind;
  readonly target: string;
  readonly stage: 'connect' | 'command';

  constructor(target: string, cause: ConnectError | CommandError) {
    const stage = cause instanceof ConnectError ? 'connect' : 'command';
    super(ErrorCode.COLLECTION_FAILED, `Collection from ${target} failed: ${cause.message}`, {
      cause,
      context: { target, stage, kind: cause.kind },
    });
    this.name = 'CollectionError';
    this.kind = cause.kind;
    this.target = target;
    this.stage = stage;
  }
}

export class PolicyEngineError extends AuditError {
  readonly status?: number | undefined;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined; status?: number | undefined }
  ) {
    super(code, message, {
      cause: options?.cause,
      context: { ...options?.context, status: options?.status },
    });
    this.name = 'PolicyEngineError';
    this.status = options?.status;
  }
}

export class ConfigurationError extends AuditError {
  constructor(
    message: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined }
  ) {
    super(ErrorCode.CONFIG_INVALID, message, options);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
