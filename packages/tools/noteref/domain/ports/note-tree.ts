// Note tree port - read-only view of the note directories

import type { NoteEntry } from "../entities/reference.js";

export interface NoteTree {
  /**
   * Note files directly inside `dir`, filtered to recognized extensions and
   * sorted by stem (code unit order). When one stem exists with several
   * extensions only the preferred extension is returned.
   */
  listEntries(dir: string): Promise<NoteEntry[]>;

  /** Immediate subdirectories of `dir`, sorted by name. */
  listDirectories(dir: string): Promise<string[]>;

  /** Root-level index files (`#<name>` notes) of a collection, sorted by name. */
  listIndexFiles(dir: string): Promise<string[]>;

  readFile(path: string): Promise<string>;

  exists(path: string): Promise<boolean>;
}
