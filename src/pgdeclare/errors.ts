// errors.ts

export enum ErrorCode {
  CONFIGURATION = "CONFIGURATION",
  DUPLICATE_LABEL = "DUPLICATE_LABEL",
  DUPLICATE_VALUE = "DUPLICATE_VALUE",
  VALIDATION = "VALIDATION",
  INTEGRITY = "INTEGRITY",
  EXECUTION = "EXECUTION",
}

export class PgDeclareError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "PgDeclareError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Declaration shape is wrong. Raised at build time, never at render time. */
export class ConfigurationError extends PgDeclareError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    code: ErrorCode = ErrorCode.CONFIGURATION
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

export class DuplicateLabelError extends ConfigurationError {
  readonly namespace: string;
  readonly label: string;

  constructor(namespace: string, label: string) {
    super(
      `Duplicate label "${label}" in enum ${namespace}`,
      { namespace, label },
      ErrorCode.DUPLICATE_LABEL
    );
    this.name = "DuplicateLabelError";
    this.namespace = namespace;
    this.label = label;
  }
}

export class DuplicateValueError extends ConfigurationError {
  readonly namespace: string;
  readonly value: string;

  constructor(namespace: string, value: string) {
    super(
      `Duplicate value "${value}" in enum ${namespace}`,
      { namespace, value },
      ErrorCode.DUPLICATE_VALUE
    );
    this.name = "DuplicateValueError";
    this.namespace = namespace;
    this.value = value;
  }
}

/** A write was rejected before reaching the executor. */
export class ValidationError extends PgDeclareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION, context);
    this.name = "ValidationError";
  }
}

/** A stored value no longer matches its enum: the write-time invariant is broken. */
export class IntegrityError extends PgDeclareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INTEGRITY, context);
    this.name = "IntegrityError";
  }
}

export class ExecutionError extends PgDeclareError {
  readonly subject: string;

  constructor(subject: string, cause: unknown) {
    super(
      `${subject}: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCode.EXECUTION,
      { subject },
      { cause }
    );
    this.name = "ExecutionError";
    this.subject = subject;
  }
}

export function isPgDeclareError(error: unknown): error is PgDeclareError {
  return error instanceof PgDeclareError;
}
