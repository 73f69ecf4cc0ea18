export type {
  Engine,
  EngineOptions,
  EngineResult,
  EngineUsage,
} from "./types.js";

export { createClaudeEngine, buildQueryOptions, type QueryFn } from "./claude.js";
