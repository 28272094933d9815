/**
 * Adapter: FileSystemNoteTree
 *
 * NoteTree over any FileSystem port. Listings are sorted by code unit order
 * so results do not depend on the platform's directory order.
 *
 * Dependencies: FileSystem (port), node:path.
 */

import { extname, join } from "node:path";
import { INDEX_FILE_PREFIX } from "../../domain/entities/collection.js";
import {
  NOTE_EXTENSIONS,
  type NoteEntry,
} from "../../domain/entities/reference.js";
import type { FileSystem } from "../../domain/ports/filesystem.js";
import type { NoteTree } from "../../domain/ports/note-tree.js";

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class FileSystemNoteTree implements NoteTree {
  constructor(
    private readonly fs: FileSystem,
    private readonly extensions: readonly string[] = NOTE_EXTENSIONS,
  ) {}

  async listEntries(dir: string): Promise<NoteEntry[]> {
    const byStem = new Map<string, NoteEntry>();
    for await (const entry of this.fs.readDir(dir)) {
      if (!entry.isFile) continue;
      const extension = extname(entry.name);
      const rank = this.extensions.indexOf(extension);
      if (rank < 0) continue;
      const stem = entry.name.slice(0, -extension.length);
      if (stem === "") continue;

      const current = byStem.get(stem);
      if (current && this.extensions.indexOf(current.extension) <= rank) {
        continue;
      }
      byStem.set(stem, { path: join(dir, entry.name), stem, extension });
    }
    return [...byStem.values()].sort((a, b) => byCodeUnit(a.stem, b.stem));
  }

  async listDirectories(dir: string): Promise<string[]> {
    const names: string[] = [];
    for await (const entry of this.fs.readDir(dir)) {
      if (entry.isDirectory) names.push(entry.name);
    }
    return names.sort(byCodeUnit);
  }

  async listIndexFiles(dir: string): Promise<string[]> {
    const entries = await this.listEntries(dir);
    return entries
      .filter((e) => e.stem.startsWith(INDEX_FILE_PREFIX))
      .map((e) => e.path);
  }

  readFile(path: string): Promise<string> {
    return this.fs.readFile(path);
  }

  exists(path: string): Promise<boolean> {
    return this.fs.exists(path);
  }
}
