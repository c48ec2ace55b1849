/**
 * Adapter: InMemoryFileSystem
 *
 * In-memory FileSystem implementation for testing.
 * All operations work on a Map<string, string> of files.
 *
 * Dependencies: domain ports only.
 */

import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { TtError } from "../../domain/entities/errors.ts";

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private failingWrites = new Set<string>();

  // --- FileSystem interface ---

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      return Promise.reject(
        new TtError("io_error", `File not found: ${path}`),
      );
    }
    return Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    if (this.failingWrites.has(path)) {
      return Promise.reject(
        new TtError("io_error", `Failed to write file: ${path}`),
      );
    }
    this.files.set(path, content);
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path));
  }

  // --- Test helpers ---

  /** Set a file directly (convenience for test setup). */
  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  /** Get a file's content, or undefined when absent. */
  getFile(path: string): string | undefined {
    return this.files.get(path);
  }

  /** Make every write to `path` fail with `io_error`. */
  failWritesTo(path: string): void {
    this.failingWrites.add(path);
  }

  /** Get the number of stored files. */
  get size(): number {
    return this.files.size;
  }
}
