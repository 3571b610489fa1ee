import type { ZodIssue } from 'zod';

/**
 * Base class for every error raised by this package.
 * Business-logic failures are never raised; they are recorded on the service object.
 */
export class ServiceObjectError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * An entry in a service object's error list is not a plain object.
 */
export class InvalidErrorTypeError extends ServiceObjectError {
  readonly error: unknown;
  readonly typeName: string;

  constructor(error: unknown, typeName: string) {
    super(`Invalid error type. Valid error types are plain objects. Received type '${typeName}'`);
    this.error = error;
    this.typeName = typeName;
  }
}

/**
 * A plain object passed to `addError` does not look like an error record.
 */
export class InvalidErrorRecordError extends ServiceObjectError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    const details = issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    super(`Invalid error record: ${details.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * The abstract ServiceObject base was constructed directly.
 */
export class AbstractServiceObjectError extends ServiceObjectError {
  constructor() {
    super('ServiceObject is abstract and cannot be instantiated directly');
  }
}

/**
 * An environment variable read by `loadConfig` failed validation.
 */
export class ConfigurationError extends ServiceObjectError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(`Invalid configuration: ${issues.map(issue => issue.path.join('.')).join(', ')}`);
    this.issues = issues;
  }
}
