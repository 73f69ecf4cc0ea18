import crypto from "node:crypto";
import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import { z } from "zod/v4";
import { log } from "../logger.js";
import {
  PolisherError,
  MalformedResponseError,
  errorFromCode,
  errorFromMessage,
} from "../errors.js";
import { DEFAULT_MODEL } from "../models.js";
import type { Engine, EngineOptions, EngineResult } from "./types.js";

/** The subset of the SDK's `query` the engine relies on. */
export type QueryFn = (params: { prompt: string; options: Options }) => AsyncIterable<unknown>;

// Enhancement is pure text in, text out. No SDK-native tool may run.
const DISALLOWED_TOOLS = [
  "Task", "Bash", "BashOutput", "KillShell", "Glob", "Grep", "Read", "Edit", "MultiEdit",
  "Write", "NotebookEdit", "WebFetch", "WebSearch", "TodoWrite", "ExitPlanMode", "SlashCommand",
];

const EventHeaderSchema = z.object({
  type: z.string(),
  subtype: z.string().optional(),
});

const SystemInitEventSchema = z.object({
  type: z.literal("system"),
  subtype: z.literal("init"),
  model: z.string().optional(),
});

const AssistantEventSchema = z.object({
  type: z.literal("assistant"),
  error: z.string().optional(),
  message: z.object({
    content: z.array(z.object({
      type: z.string(),
      text: z.string().optional(),
    })),
  }),
});

const ResultEventSchema = z.object({
  type: z.literal("result"),
  subtype: z.string(),
  is_error: z.boolean().optional(),
  result: z.string().optional(),
  errors: z.array(z.string()).optional(),
  total_cost_usd: z.number().optional(),
  duration_ms: z.number().optional(),
  usage: z.object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
  }).optional(),
});

/** Generate a short random run ID for log correlation */
function runId(): string {
  return crypto.randomBytes(3).toString("hex");
}

function abortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const err = new Error("aborted");
  err.name = "AbortError";
  return err;
}

export function buildQueryOptions(options: EngineOptions, abortController?: AbortController): Options {
  return {
    model: options.model ?? DEFAULT_MODEL,
    maxTurns: 1,
    allowedTools: [],
    disallowedTools: DISALLOWED_TOOLS,
    settingSources: [],
    ...(options.systemPrompt ? { systemPrompt: options.systemPrompt } : {}),
    ...(abortController ? { abortController } : {}),
  };
}

async function execQuery(
  queryFn: QueryFn,
  message: string,
  options: EngineOptions,
  abortController: AbortController | undefined,
): Promise<EngineResult> {
  const tag = `engine:${runId()}`;
  const queryOptions = buildQueryOptions(options, abortController);
  log.debug(tag, `running (model=${String(queryOptions.model)}, ${message.length} chars)`);

  let assistantText = "";
  let resultText: string | undefined;
  let usage: EngineResult["usage"];
  let assistantError: PolisherError | undefined;

  for await (const raw of queryFn({ prompt: message, options: queryOptions })) {
    const header = EventHeaderSchema.safeParse(raw);
    if (!header.success) {
      throw new MalformedResponseError("engine produced an event without a type");
    }
    log.debug(tag, `event: ${header.data.type}${header.data.subtype ? `:${header.data.subtype}` : ""}`);

    if (header.data.type === "system") {
      const init = SystemInitEventSchema.safeParse(raw);
      if (init.success && init.data.model) {
        log.debug(tag, `model: ${init.data.model}`);
      }
    } else if (header.data.type === "assistant") {
      const parsed = AssistantEventSchema.safeParse(raw);
      if (!parsed.success) {
        throw new MalformedResponseError("engine produced an unreadable assistant message");
      }
      const text = parsed.data.message.content
        .filter((block) => block.type === "text" && block.text)
        .map((block) => block.text ?? "")
        .join("");
      if (parsed.data.error) {
        assistantError = errorFromCode(parsed.data.error, text || parsed.data.error);
      } else if (text) {
        assistantText = text;
      }
    } else if (header.data.type === "result") {
      const parsed = ResultEventSchema.safeParse(raw);
      if (!parsed.success) {
        throw new MalformedResponseError("engine produced an unreadable result");
      }
      const event = parsed.data;
      if (event.subtype === "success" && !event.is_error) {
        resultText = event.result;
        usage = {
          inputTokens: event.usage?.input_tokens ?? 0,
          outputTokens: event.usage?.output_tokens ?? 0,
          costUsd: event.total_cost_usd ?? 0,
          durationMs: event.duration_ms ?? 0,
        };
        log.debug(tag, `done, cost: $${usage.costUsd}, duration: ${usage.durationMs}ms`);
      } else if (event.subtype === "error_max_turns") {
        throw new MalformedResponseError("model did not answer with text in a single turn");
      } else {
        if (assistantError) throw assistantError;
        const detail = event.errors?.join("; ") || event.result || event.subtype;
        throw errorFromMessage(detail);
      }
    }
  }

  if (abortController?.signal.aborted) {
    throw abortError(abortController.signal);
  }
  if (assistantError) throw assistantError;

  const text = resultText?.trim() ? resultText : assistantText;
  if (!text.trim()) {
    throw new MalformedResponseError("engine returned an empty response");
  }
  return { text, usage };
}

export function createClaudeEngine(queryFn: QueryFn = query): Engine {
  return {
    async run(message, options, abortController) {
      try {
        return await execQuery(queryFn, message, options, abortController);
      } catch (err) {
        if (abortController?.signal.aborted) throw abortError(abortController.signal);
        if (err instanceof PolisherError) throw err;
        const msg = err instanceof Error ? err.message : String(err);
        throw errorFromMessage(msg, err);
      }
    },
  };
}
