/**
 * Use Case: CreateDailyNote
 *
 * Writes `#daily/<YYYYMMDD>/<HHmmSS>[-<slug>].md` and links it from the
 * collection's daily index (`#daily.md`).
 *
 * Dependencies: FileSystem, SlugService, Clock (ports).
 */

import { join } from "node:path";
import {
  DAILY_DIR,
  DAILY_INDEX_FILE,
  DAILY_INDEX_HEADER,
} from "../../entities/collection.js";
import { NoteError } from "../../entities/errors.js";
import type { Clock } from "../../ports/clock.js";
import type { FileSystem } from "../../ports/filesystem.js";
import type { SlugService } from "../../ports/slug-service.js";

export const DEFAULT_DAILY_TITLE = "Daily Note";

export interface CreateDailyNoteInput {
  readonly root: string;
  readonly title?: string;
  readonly content?: string;
}

export interface CreateDailyNoteOutput {
  readonly path: string;
  readonly indexPath: string;
  readonly link: string;
}

export class CreateDailyNoteUseCase {
  constructor(
    private readonly fs: FileSystem,
    private readonly slugService: SlugService,
    private readonly clock: Clock,
  ) {}

  async execute(input: CreateDailyNoteInput): Promise<CreateDailyNoteOutput> {
    const title = input.title?.trim() || DEFAULT_DAILY_TITLE;
    const { date, time } = this.clock.now();
    const slug = title === DEFAULT_DAILY_TITLE
      ? ""
      : this.slugService.slugify(title);
    const filename = slug === "" ? `${time}.md` : `${time}-${slug}.md`;

    const path = join(input.root, DAILY_DIR, date, filename);
    if (await this.fs.exists(path)) {
      throw new NoteError("invalid_args", `Note already exists: ${path}`);
    }
    await this.fs.writeFile(path, input.content ?? `# ${title}\n`);

    const link = `- [${title}](${DAILY_DIR}/${date}/${filename})`;
    const indexPath = join(input.root, DAILY_INDEX_FILE);
    const current = await this.fs.exists(indexPath)
      ? await this.fs.readFile(indexPath)
      : `${DAILY_INDEX_HEADER}\n\n`;
    const separator = current === "" || current.endsWith("\n") ? "" : "\n";
    await this.fs.writeFile(indexPath, `${current}${separator}${link}\n`);

    return { path, indexPath, link };
  }
}
