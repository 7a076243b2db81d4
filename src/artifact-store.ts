import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";

import { ValidationError } from "./errors";

export interface ArtifactRef {
  id: string;
  path: string;
}

const ID_PATTERN = /^[a-z_]+_[0-9a-f-]{36}\.(png|jpg)$/;
const TMP_PATTERN = /^\.[a-z_]+_[0-9a-f-]{36}\.(png|jpg)\.tmp$/;

/**
 * Output images on disk. Every artifact gets a fresh UUID name and is written
 * under a temporary name first, so a reader sees a whole file or none.
 */
export class ArtifactStore {
  constructor(readonly dir: string) {}

  async put(prefix: string, data: Buffer, ext: "png" | "jpg" = "png", signal?: AbortSignal): Promise<ArtifactRef> {
    await mkdir(this.dir, { recursive: true });
    const id = `${prefix}_${randomUUID()}.${ext}`;
    const finalPath = path.join(this.dir, id);
    const tmpPath = path.join(this.dir, `.${id}.tmp`);
    try {
      await writeFile(tmpPath, data, { signal });
      await rename(tmpPath, finalPath);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
    return { id, path: finalPath };
  }

  async get(id: string): Promise<Buffer> {
    if (!ID_PATTERN.test(id)) throw new ValidationError(`not an artifact id: ${id}`, { id });
    return readFile(path.join(this.dir, id));
  }

  async remove(id: string): Promise<void> {
    if (!ID_PATTERN.test(id)) throw new ValidationError(`not an artifact id: ${id}`, { id });
    await rm(path.join(this.dir, id), { force: true });
  }

  /**
   * Removes artifacts, and temporary files of interrupted writes, last
   * modified more than `maxAgeMs` before `now`. Other files are left alone.
   * Returns the names removed.
   */
  async cleanup(maxAgeMs: number, now: number = Date.now()): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const removed: string[] = [];
    for (const name of names) {
      if (!ID_PATTERN.test(name) && !TMP_PATTERN.test(name)) continue;
      const file = path.join(this.dir, name);
      // another cleanup may have got there first
      const info = await stat(file).catch((err: unknown) => {
        if (isNotFound(err)) return undefined;
        throw err;
      });
      if (!info?.isFile() || now - info.mtimeMs <= maxAgeMs) continue;
      await rm(file, { force: true });
      removed.push(name);
    }
    return removed;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
