/**
 * Claude models the enhancer can be pointed at.
 * `haiku` is the default: note cleanup is a short, single-turn job.
 */
export const MODELS = ["haiku", "sonnet", "opus"] as const;

export type Model = (typeof MODELS)[number];

export const DEFAULT_MODEL: Model = "haiku";
