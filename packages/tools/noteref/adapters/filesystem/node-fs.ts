/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs/promises.
 * Failures surface as NoteError("io_error").
 *
 * Dependencies: node:fs/promises, node:path.
 */

import type { Dirent } from "node:fs";
import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { DirEntry, FileSystem } from "../../domain/ports/filesystem.js";
import { NoteError } from "../../domain/entities/errors.js";

function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf-8");
    } catch (e) {
      if (errorCode(e) === "ENOENT") {
        throw new NoteError("io_error", `File not found: ${path}`);
      }
      throw new NoteError("io_error", `Failed to read file: ${path}`);
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, "utf-8");
    } catch {
      throw new NoteError("io_error", `Failed to write file: ${path}`);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (e) {
      if (errorCode(e) === "ENOENT" || errorCode(e) === "ENOTDIR") {
        return false;
      }
      throw new NoteError("io_error", `Failed to stat: ${path}`);
    }
  }

  async *readDir(path: string): AsyncIterable<DirEntry> {
    let entries: Dirent[];
    try {
      entries = await readdir(path, { withFileTypes: true });
    } catch (e) {
      const code = errorCode(e);
      if (code === "ENOENT" || code === "ENOTDIR") return;
      throw new NoteError("io_error", `Failed to read directory: ${path}`);
    }
    for (const entry of entries) {
      yield {
        name: entry.name,
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory(),
      };
    }
  }
}
