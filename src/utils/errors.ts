export type ErrorStage = 'connection' | 'prepare' | 'bind' | 'execute' | 'configuration';

export type ErrorContext = Record<string, unknown>;

export abstract class DatabaseError extends Error {
  abstract readonly type: string;
  abstract readonly stage: ErrorStage;
  readonly context: ErrorContext;
  readonly cause?: Error;

  constructor(message: string, context: ErrorContext = {}, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.cause = cause;
  }
}

export class ConnectionError extends DatabaseError {
  readonly type = 'CONNECTION_ERROR' as const;
  readonly stage = 'connection' as const;

  constructor(message: string, context: ErrorContext = {}, cause?: Error) {
    super(message, context, cause);
  }
}

export class PrepareError extends DatabaseError {
  readonly type = 'PREPARE_ERROR' as const;
  readonly stage = 'prepare' as const;
  readonly sql: string;

  constructor(message: string, sql: string, context: ErrorContext = {}, cause?: Error) {
    super(message, context, cause);
    this.sql = sql;
  }
}

export class BindError extends DatabaseError {
  readonly type = 'BIND_ERROR' as const;
  readonly stage = 'bind' as const;

  constructor(message: string, context: ErrorContext = {}, cause?: Error) {
    super(message, context, cause);
  }
}

export class ExecuteError extends DatabaseError {
  readonly type = 'EXECUTE_ERROR' as const;
  readonly stage = 'execute' as const;
  /** MySQL error code reported by the server, e.g. `ER_DUP_ENTRY`. */
  readonly code?: string;

  constructor(message: string, context: ErrorContext = {}, cause?: Error, code?: string) {
    super(message, context, cause);
    this.code = code;
  }
}

export class ConfigurationError extends DatabaseError {
  readonly type = 'CONFIGURATION_ERROR' as const;
  readonly stage = 'configuration' as const;
  readonly issues: string[];

  constructor(issues: string[], context: ErrorContext = {}) {
    super(`Invalid database configuration: ${issues.join('; ')}`, context);
    this.issues = issues;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Driver error text as the server or client library reported it.
 */
export function describeDriverError(value: unknown): string {
  const error = toError(value);
  return error.message || error.name;
}
