// CreatePermanentNoteUseCase - Write a note under note/, or under note/<hash>/ when filed by source

import { join } from "node:path";
import { NOTE_DIR, SOURCE_FILE } from "../../entities/collection.js";
import { NoteError } from "../../entities/errors.js";
import type { Clock } from "../../ports/clock.js";
import type { FileSystem } from "../../ports/filesystem.js";
import type { SlugService } from "../../ports/slug-service.js";

export interface CreatePermanentNoteInput {
  readonly root: string;
  readonly title?: string;
  readonly source?: string;
  readonly content?: string;
}

export interface CreatePermanentNoteOutput {
  readonly path: string;
  readonly sourceHash: string | null;
}

export class CreatePermanentNoteUseCase {
  constructor(
    private readonly fs: FileSystem,
    private readonly slugService: SlugService,
    private readonly clock: Clock,
  ) {}

  async execute(
    input: CreatePermanentNoteInput,
  ): Promise<CreatePermanentNoteOutput> {
    const title = input.title?.trim() ?? "";
    let stem: string;
    if (title === "") {
      // Untitled notes are named by their full timestamp.
      const { date, time } = this.clock.now();
      stem = `${date}${time}`;
    } else {
      stem = this.slugService.slugify(title);
      if (stem === "") {
        throw new NoteError(
          "invalid_args",
          `Title '${title}' has no characters usable in a file name`,
        );
      }
    }

    const source = input.source?.trim() || null;
    const sourceHash = source === null
      ? null
      : this.slugService.hashSource(source);
    const dir = sourceHash === null
      ? join(input.root, NOTE_DIR)
      : join(input.root, NOTE_DIR, sourceHash);

    const path = join(dir, `${stem}.md`);
    if (await this.fs.exists(path)) {
      throw new NoteError("invalid_args", `Note already exists: ${path}`);
    }
    await this.fs.writeFile(
      path,
      input.content ?? (title === "" ? "" : `# ${title}\n`),
    );
    if (source !== null) {
      await this.fs.writeFile(join(dir, SOURCE_FILE), source);
    }

    return { path, sourceHash };
  }
}
