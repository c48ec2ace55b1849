/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs.
 * Writes go to a temporary sibling file that is flushed to disk and then
 * renamed over the target, so the target is always either the old or the
 * new content.
 *
 * Dependencies: node:fs/promises, node:path.
 */

import { mkdir, open, readFile, rename, rm, stat } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { TtError } from "../../domain/entities/errors.ts";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (e) {
      if (isNotFound(e)) {
        throw new TtError("io_error", `File not found: ${path}`, { cause: e });
      }
      throw new TtError("io_error", `Failed to read file: ${path}`, { cause: e });
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    const dir = dirname(path);
    const tmpPath = join(dir, `.${basename(path)}.${process.pid}.tmp`);
    try {
      await mkdir(dir, { recursive: true });
      const handle = await open(tmpPath, "w");
      try {
        await handle.writeFile(content, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, path);
    } catch (e) {
      await rm(tmpPath, { force: true });
      throw new TtError("io_error", `Failed to write file: ${path}`, { cause: e });
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (e) {
      if (isNotFound(e)) {
        return false;
      }
      throw new TtError("io_error", `Failed to access: ${path}`, { cause: e });
    }
  }
}
