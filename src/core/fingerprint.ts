import crypto from "node:crypto";

export interface ContentSnapshot {
  rawText: string;
  fingerprint: string;
}

/** SHA-256 of the UTF-8 text, hex encoded. */
export function fingerprint(text: string): string {
  return crypto.createHash("sha256").update(text, "utf8").digest("hex");
}

export function takeSnapshot(rawText: string): ContentSnapshot {
  return { rawText, fingerprint: fingerprint(rawText) };
}

/**
 * Number of non-blank lines in `next` that are not accounted for by lines in
 * `previous`. Deleted lines do not count.
 */
export function countAddedLines(previous: string, next: string): number {
  const remaining = new Map<string, number>();
  for (const line of previous.split(/\r?\n/)) {
    const key = line.trim();
    remaining.set(key, (remaining.get(key) ?? 0) + 1);
  }

  let added = 0;
  for (const line of next.split(/\r?\n/)) {
    const key = line.trim();
    if (!key) continue;
    const left = remaining.get(key) ?? 0;
    if (left > 0) {
      remaining.set(key, left - 1);
    } else {
      added++;
    }
  }
  return added;
}
