import type { Model } from "../models.js";

export interface EngineUsage {
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  durationMs: number;
}

export interface EngineResult {
  text: string;
  usage?: EngineUsage | undefined;
}

export interface EngineOptions {
  systemPrompt?: string | undefined;
  model?: Model | undefined;
}

/**
 * A single-shot text generator. Implementations throw the typed errors from
 * `core/errors.ts` so callers can tell auth, transient and malformed
 * failures apart.
 */
export interface Engine {
  run(
    message: string,
    options: EngineOptions,
    abortController?: AbortController,
  ): Promise<EngineResult>;
}
