import fs from "fs";
import os from "os";
import path from "path";
import { InvalidPathError } from "../core/errors.js";
import type { WatchTarget } from "./types.js";

export interface ResolveOptions {
  cwd?: string | undefined;
  homeDir?: string | undefined;
}

/**
 * Undo the usual shell copy-paste damage: surrounding whitespace and line
 * breaks, one pair of wrapping quotes, backslash-escaped spaces and a
 * leading `~`.
 */
export function normalizePathInput(input: string | readonly string[], homeDir: string = os.homedir()): string {
  let raw = (typeof input === "string" ? input : input.join(" ")).trim();

  const first = raw[0];
  if (raw.length >= 2 && (first === "\"" || first === "'") && raw.endsWith(first)) {
    raw = raw.slice(1, -1).trim();
  }

  raw = raw.replace(/\\ /g, " ");

  if (raw === "~") return homeDir;
  if (raw.startsWith("~/") || raw.startsWith("~\\")) {
    return path.join(homeDir, raw.slice(2));
  }
  return raw;
}

export function resolveWatchTarget(input: string | readonly string[], options: ResolveOptions = {}): WatchTarget {
  const normalized = normalizePathInput(input, options.homeDir);
  if (!normalized) {
    throw new InvalidPathError("", "No file path given");
  }

  const absolute = path.resolve(options.cwd ?? process.cwd(), normalized);

  let canonical: string;
  try {
    canonical = fs.realpathSync(absolute);
  } catch {
    throw new InvalidPathError(absolute, "File does not exist");
  }

  if (!fs.statSync(canonical).isFile()) {
    throw new InvalidPathError(canonical, "Not a regular file");
  }

  try {
    fs.accessSync(canonical, fs.constants.R_OK);
  } catch {
    throw new InvalidPathError(canonical, "File is not readable");
  }

  return Object.freeze({
    absolutePath: canonical,
    parentDirectory: path.dirname(canonical),
  });
}
