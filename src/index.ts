// Service objects
export { ServiceObject } from './service-object';

// Error records
export { errorRecordSchema, assertErrorRecord, isErrorRecordShape, describeType } from './error-record';
export type { ServiceErrorRecord } from './error-record';

// Errors
export {
  ServiceObjectError,
  InvalidErrorTypeError,
  InvalidErrorRecordError,
  AbstractServiceObjectError,
  ConfigurationError,
} from './errors';

// Configuration and logging
export { config, loadConfig } from './config';
export type { Config, LogLevel } from './config';
export { default as logger } from './logger';
