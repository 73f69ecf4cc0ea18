import { z } from "zod/v4";
import { ConfigError, AuthenticationError } from "./errors.js";
import { MODELS, DEFAULT_MODEL } from "./models.js";

/** Blank env values count as unset. */
function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

function intSetting(fallback: number, min: number, max: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));
}

const flagSetting = z.preprocess((value) => {
  const v = blankToUndefined(value);
  if (typeof v !== "string") return v;
  return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
}, z.boolean().default(false));

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  NOTE_POLISHER_MODEL: z.preprocess(blankToUndefined, z.enum(MODELS).default(DEFAULT_MODEL)),
  NOTE_POLISHER_DEBOUNCE_MS: intSetting(1500, 0, 60_000),
  NOTE_POLISHER_TIMEOUT_MS: intSetting(60_000, 1_000, 600_000),
  NOTE_POLISHER_MAX_ATTEMPTS: intSetting(3, 1, 10),
  NOTE_POLISHER_BACKOFF_MS: intSetting(1_000, 0, 60_000),
  NOTE_POLISHER_MIN_CHANGED_LINES: intSetting(1, 0, 1_000),
  NOTE_POLISHER_VERBOSE: flagSetting,
});

export interface PolisherConfig {
  /** Raw credential; validated lazily by {@link requireApiKey}. */
  apiKey: string | undefined;
  model: (typeof MODELS)[number];
  debounceMs: number;
  timeoutMs: number;
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs: number;
  minChangedLines: number;
  verbose: boolean;
}

/**
 * Read settings from the environment. Startup only needs the non-secret
 * settings to be valid; the credential is checked at the first remote call.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PolisherConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration (${details})`);
  }

  const data = parsed.data;
  const backoffMs = data.NOTE_POLISHER_BACKOFF_MS;
  return {
    apiKey: data.ANTHROPIC_API_KEY,
    model: data.NOTE_POLISHER_MODEL,
    debounceMs: data.NOTE_POLISHER_DEBOUNCE_MS,
    timeoutMs: data.NOTE_POLISHER_TIMEOUT_MS,
    maxAttempts: data.NOTE_POLISHER_MAX_ATTEMPTS,
    backoffMs,
    maxBackoffMs: backoffMs * 8,
    minChangedLines: data.NOTE_POLISHER_MIN_CHANGED_LINES,
    verbose: data.NOTE_POLISHER_VERBOSE,
  };
}

const ApiKeySchema = z.string().regex(/^[\x21-\x7e]{8,}$/);

/** Returns the credential or throws {@link AuthenticationError}. */
export function requireApiKey(config: Pick<PolisherConfig, "apiKey">): string {
  const key = config.apiKey?.trim();
  if (!key) {
    throw new AuthenticationError("ANTHROPIC_API_KEY is not set");
  }
  if (!ApiKeySchema.safeParse(key).success) {
    throw new AuthenticationError("ANTHROPIC_API_KEY is malformed");
  }
  return key;
}
