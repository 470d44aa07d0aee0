/**
 * @blogstore/core
 * Configuration, logging and errors shared by the blogstore packages
 */

// Config
export {
  DEFAULT_TABLE_NAME,
  DEFAULT_ENDPOINT,
  loadConfig,
  getConfig,
  resetConfig,
  type AppConfig,
  type StoreConfig,
  type Env,
} from "./config.js";

// Logger
export {
  logger,
  type Logger,
  type LogLevel,
  type LogFormat,
  type LogContext,
  type LogEntry,
  type LogHandler,
} from "./logger.js";

// Errors
export {
  BlogStoreError,
  ValidationError,
  NotFoundError,
  ForeignKeyError,
  ConflictError,
  CascadeError,
  DecodeError,
  StoreUnavailableError,
  ConfigError,
  isBlogStoreError,
  isErrorKind,
  isRetryableError,
  wrapError,
  toHttpStatus,
  type ErrorKind,
  type CascadeRef,
} from "./errors.js";
