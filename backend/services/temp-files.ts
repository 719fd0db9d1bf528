// backend/services/temp-files.ts
import { promises as fs } from "fs";
import path from "path";

import { getErrorMessage } from "./errors";
import { createLog } from "./log";

const log = createLog("temp-files");

/**
 * Per-request set of files to remove when the request ends, whatever the
 * outcome. Missing files are ignored; removal errors are logged.
 */
export class TempFileScope {
  private readonly paths = new Set<string>();

  track(filePath: string) {
    this.paths.add(filePath);
    return filePath;
  }

  get tracked(): string[] {
    return [...this.paths];
  }

  async dispose(): Promise<number> {
    let removed = 0;
    for (const p of this.paths) {
      try {
        await fs.rm(p, { force: true });
        removed++;
      } catch (e) {
        log.warn(`Failed to delete ${path.basename(p)}: ${getErrorMessage(e)}`);
      }
    }
    this.paths.clear();
    return removed;
  }
}

/** Run `fn` with a fresh scope and dispose it on every exit path. */
export async function withTempFiles<T>(fn: (scope: TempFileScope) => Promise<T>): Promise<T> {
  const scope = new TempFileScope();
  try {
    return await fn(scope);
  } finally {
    await scope.dispose();
  }
}

/**
 * Delete plain files in `dir` older than `maxAgeMinutes`. Returns the number
 * deleted; a missing directory counts as nothing to do.
 */
export async function sweepStaleFiles(dir: string, maxAgeMinutes = 30, now = Date.now()): Promise<number> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return 0;
    throw e;
  }

  const maxAgeMs = maxAgeMinutes * 60 * 1000;
  let deleted = 0;
  for (const name of names) {
    const filePath = path.join(dir, name);
    try {
      const stat = await fs.stat(filePath);
      if (!stat.isFile()) continue;
      if (now - stat.mtimeMs > maxAgeMs) {
        await fs.rm(filePath, { force: true });
        deleted++;
        log.debug(`Deleted old file: ${name}`);
      }
    } catch (e) {
      log.warn(`Failed to sweep ${name}: ${getErrorMessage(e)}`);
    }
  }
  return deleted;
}
