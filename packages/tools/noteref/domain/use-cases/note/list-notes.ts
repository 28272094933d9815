/**
 * Use Case: ListNotes
 *
 * Browse a collection without resolving a reference:
 *   - no filter:   top-level permanent notes in `note/`
 *   - `#daily`:    the date directories under `#daily/`
 *   - `#<tag>`:    the content of the `#<tag>.md` index file
 *   - otherwise:   the `note/<hash>/` directory of a source string, or the
 *                  `#daily/<filter>/` directory of a date
 *
 * Directory listings put subdirectories first (with a trailing "/"), then
 * note files, and skip hidden names.
 *
 * Dependencies: NoteTree, SlugService (ports).
 */

import { join } from "node:path";
import {
  DAILY_DIR,
  INDEX_FILE_PREFIX,
  NOTE_DIR,
} from "../../entities/collection.js";
import { NoteError } from "../../entities/errors.js";
import type { NoteTree } from "../../ports/note-tree.js";
import type { SlugService } from "../../ports/slug-service.js";

export interface ListNotesInput {
  readonly root: string;
  readonly filter?: string;
}

export type ListNotesOutput =
  | { readonly kind: "names"; readonly dir: string; readonly names: string[] }
  | { readonly kind: "index"; readonly path: string; readonly content: string };

export class ListNotesUseCase {
  constructor(
    private readonly tree: NoteTree,
    private readonly slugService: SlugService,
  ) {}

  async execute(input: ListNotesInput): Promise<ListNotesOutput> {
    const filter = input.filter?.trim() ?? "";
    if (filter === "") {
      const dir = join(input.root, NOTE_DIR);
      const entries = await this.tree.listEntries(dir);
      return {
        kind: "names",
        dir,
        names: entries.map((e) => `${e.stem}${e.extension}`),
      };
    }

    if (filter.startsWith(INDEX_FILE_PREFIX)) {
      return await this.listTag(input.root, filter.replace(/^#+/, ""));
    }

    const hash = this.slugService.hashSource(filter);
    const places = [
      join(input.root, NOTE_DIR, hash),
      join(input.root, DAILY_DIR, filter),
    ];
    for (const dir of places) {
      if (await this.tree.exists(dir)) {
        return { kind: "names", dir, names: await this.listDirectory(dir) };
      }
    }
    throw new NoteError(
      "not_found",
      `Not found: ${NOTE_DIR}/${hash}/ or ${DAILY_DIR}/${filter}/`,
    );
  }

  private async listTag(root: string, tag: string): Promise<ListNotesOutput> {
    if (tag === "daily") {
      const dir = join(root, DAILY_DIR);
      if (!(await this.tree.exists(dir))) {
        throw new NoteError(
          "not_found",
          "Daily directory not found. Create a daily note first.",
        );
      }
      const names = await this.tree.listDirectories(dir);
      return { kind: "names", dir, names: names.filter((n) => !isHidden(n)) };
    }

    const path = join(root, `${INDEX_FILE_PREFIX}${tag}.md`);
    if (!(await this.tree.exists(path))) {
      throw new NoteError("not_found", `Tag '#${tag}' not found`);
    }
    return { kind: "index", path, content: await this.tree.readFile(path) };
  }

  private async listDirectory(dir: string): Promise<string[]> {
    const dirs = (await this.tree.listDirectories(dir))
      .filter((n) => !isHidden(n))
      .map((n) => `${n}/`);
    const files = (await this.tree.listEntries(dir))
      .map((e) => `${e.stem}${e.extension}`)
      .filter((n) => !isHidden(n));
    return [...dirs, ...files];
  }
}

function isHidden(name: string): boolean {
  return name.startsWith(".");
}
