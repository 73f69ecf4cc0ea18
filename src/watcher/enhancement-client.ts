import { log } from "../core/logger.js";
import { requireApiKey, type PolisherConfig } from "../core/config.js";
import {
  MalformedResponseError,
  TransientServiceError,
  classifyFailure,
} from "../core/errors.js";
import type { Engine } from "../core/engine/index.js";
import type { Model } from "../core/models.js";
import { buildEnhancementRequest, cleanEnhancedText } from "../core/prompts.js";
import type { EnhancementResult } from "./types.js";

export interface EnhancementClientOptions {
  engine: Engine;
  config: Pick<PolisherConfig, "apiKey" | "model" | "timeoutMs">;
}

type Settled =
  | { kind: "done"; text: string }
  | { kind: "timeout" }
  | { kind: "cancelled" };

/**
 * Sends one document to the engine and turns whatever happens into an
 * {@link EnhancementResult}. Never throws.
 */
export class EnhancementClient {
  private readonly engine: Engine;
  private readonly model: Model;
  private readonly timeoutMs: number;
  private readonly config: Pick<PolisherConfig, "apiKey">;

  constructor(options: EnhancementClientOptions) {
    this.engine = options.engine;
    this.model = options.config.model;
    this.timeoutMs = options.config.timeoutMs;
    this.config = options.config;
  }

  async enhance(sourceText: string, signal?: AbortSignal): Promise<EnhancementResult> {
    if (sourceText.trim() === "") {
      return { status: "skipped", reason: "empty-input" };
    }
    if (signal?.aborted) {
      return { status: "failed", failure: "cancelled", message: "shutdown in progress", retryable: false };
    }

    try {
      requireApiKey(this.config);
      const request = buildEnhancementRequest(sourceText);
      const settled = await this.runWithTimeout(request.sourceText, request.instructions, signal);

      if (settled.kind === "cancelled") {
        return { status: "failed", failure: "cancelled", message: "enhancement abandoned on shutdown", retryable: false };
      }
      if (settled.kind === "timeout") {
        throw new TransientServiceError(`no response within ${this.timeoutMs}ms`);
      }

      const enhancedText = cleanEnhancedText(settled.text, sourceText);
      if (!enhancedText.trim()) {
        throw new MalformedResponseError("response contained no document text");
      }
      return { status: "enhanced", enhancedText };
    } catch (err) {
      const classified = classifyFailure(err);
      log.debug("client", `enhancement failed (${classified.failure}): ${classified.message}`);
      return { status: "failed", ...classified };
    }
  }

  /**
   * Races the engine against the timeout and the caller's abort signal. The
   * losing engine call is aborted and never awaited, so a partial response
   * cannot reach the caller.
   */
  private runWithTimeout(message: string, systemPrompt: string, signal?: AbortSignal): Promise<Settled> {
    const abortController = new AbortController();

    return new Promise<Settled>((resolve, reject) => {
      let finished = false;
      const finish = (outcome: () => void) => {
        if (finished) return;
        finished = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        outcome();
      };

      const timer = setTimeout(() => {
        finish(() => resolve({ kind: "timeout" }));
        abortController.abort();
      }, this.timeoutMs);

      const onAbort = () => {
        finish(() => resolve({ kind: "cancelled" }));
        abortController.abort();
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      void this.engine.run(message, { systemPrompt, model: this.model }, abortController).then(
        (result) => finish(() => resolve({ kind: "done", text: result.text })),
        (err: unknown) => finish(() => reject(err)),
      );
    });
  }
}
