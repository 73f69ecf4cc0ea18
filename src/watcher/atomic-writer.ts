import crypto from "node:crypto";
import fs from "fs";
import path from "path";
import { log } from "../core/logger.js";
import { WriteError } from "../core/errors.js";

export interface AtomicWriterOps {
  rename(from: string, to: string): Promise<void>;
}

const defaultOps: AtomicWriterOps = {
  rename: (from, to) => fs.promises.rename(from, to),
};

export function tempPathFor(target: string): string {
  const suffix = `${process.pid}.${crypto.randomBytes(4).toString("hex")}`;
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`);
}

/**
 * Replaces a file's content via a temp sibling and a rename, so readers see
 * either the old or the new content and never a partial write.
 */
export class AtomicWriter {
  private readonly ops: AtomicWriterOps;

  constructor(ops: Partial<AtomicWriterOps> = {}) {
    this.ops = { ...defaultOps, ...ops };
  }

  async write(target: string, content: string): Promise<void> {
    const tempPath = tempPathFor(target);

    let mode: number | undefined;
    try {
      mode = (await fs.promises.stat(target)).mode & 0o777;
    } catch {
      mode = undefined;
    }

    try {
      const handle = await fs.promises.open(tempPath, "wx", mode ?? 0o644);
      try {
        await handle.writeFile(content, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await this.ops.rename(tempPath, target);
    } catch (err) {
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        log.warn("writer", `could not remove temp file ${tempPath}:`, cleanupErr);
      });
      const reason = err instanceof Error ? err.message : String(err);
      throw new WriteError(target, `Could not write ${target}: ${reason}`, { cause: err });
    }

    log.debug("writer", `replaced ${target} (${content.length} chars)`);
  }
}
