// Types
export type { Logger, ObjectStore } from "./types.js";

// Config
export type { ArchiverConfig, AuthSettings } from "./config.js";
export {
  DEFAULT_TOKEN_URI,
  GMAIL_READONLY_SCOPE,
  loadConfig,
  missingAuthSettings,
  requireAuthSettings,
} from "./config.js";

// Errors
export type { ErrorKind } from "./errors.js";
export {
  ArchiverError,
  AuthError,
  ConfigurationError,
  DecodeError,
  describeError,
  FetchError,
  ListError,
  ValidationError,
  WriteError,
} from "./errors.js";

// Logger
export { ConsoleLogger, createLogger } from "./logger.js";

// Local output
export { createFileObjectStore, FileObjectStore } from "./output.js";
