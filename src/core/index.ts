// Configuration
export { loadConfig, requireApiKey, type PolisherConfig } from "./config.js";

// Models
export { MODELS, DEFAULT_MODEL, type Model } from "./models.js";

// Logger
export { log, setLogger, createTimestampedLogger, type Logger, type LogLevel } from "./logger.js";

// Errors
export {
  PolisherError,
  InvalidPathError,
  ConfigError,
  AuthenticationError,
  TransientServiceError,
  MalformedResponseError,
  WriteError,
  classifyFailure,
  type FailureKind,
  type ClassifiedFailure,
} from "./errors.js";

// Content
export { fingerprint, takeSnapshot, countAddedLines, type ContentSnapshot } from "./fingerprint.js";
export { ENHANCE_INSTRUCTIONS, buildEnhancementRequest, cleanEnhancedText, type EnhancementRequest } from "./prompts.js";

// Engine
export { createClaudeEngine, type Engine, type EngineOptions, type EngineResult, type QueryFn } from "./engine/index.js";
