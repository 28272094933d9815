/**
 * Adapter: InMemoryFileSystem
 *
 * FileSystem held in memory, for tests. Paths are "/"-joined strings. A
 * directory exists as soon as a file is stored below it.
 *
 * Dependencies: domain ports only.
 */

import type { DirEntry, FileSystem } from "../../domain/ports/filesystem.js";
import { NoteError } from "../../domain/entities/errors.js";

/** Entry of `dir` that `path` lies in, or null when it is elsewhere. */
function childOf(dir: string, path: string): DirEntry | null {
  const prefix = dir.endsWith("/") ? dir : `${dir}/`;
  if (!path.startsWith(prefix)) return null;
  const [name, ...below] = path.slice(prefix.length).split("/");
  if (!name) return null;
  const isFile = below.length === 0;
  return { name, isFile, isDirectory: !isFile };
}

export class InMemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, string>();
  private writes = 0;

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    return content === undefined
      ? Promise.reject(new NoteError("io_error", `File not found: ${path}`))
      : Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    this.files.set(path, content);
    this.writes++;
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    if (this.files.has(path)) return Promise.resolve(true);
    for (const file of this.files.keys()) {
      if (childOf(path, file) !== null) return Promise.resolve(true);
    }
    return Promise.resolve(false);
  }

  async *readDir(path: string): AsyncIterable<DirEntry> {
    const seen = new Set<string>();
    for (const file of this.files.keys()) {
      const entry = childOf(path, file);
      if (entry === null || seen.has(entry.name)) continue;
      seen.add(entry.name);
      yield entry;
    }
  }

  // --- Test helpers ---

  /** Store a file without counting it as a write. */
  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  getAll(): Map<string, string> {
    return new Map(this.files);
  }

  /** writeFile calls since construction. */
  get writeCount(): number {
    return this.writes;
  }
}
