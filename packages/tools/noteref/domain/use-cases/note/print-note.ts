// PrintNoteUseCase - Resolve a reference to one note and read its content

import type { ResolutionContext } from "../../entities/reference.js";
import type { NoteTree } from "../../ports/note-tree.js";
import {
  type ResolveReferenceUseCase,
  selectPaths,
} from "../reference/resolve-reference.js";

export interface PrintNoteInput {
  readonly raw: string;
  readonly context: ResolutionContext;
}

export interface PrintNoteOutput {
  readonly path: string;
  readonly content: string;
}

export class PrintNoteUseCase {
  constructor(
    private readonly resolver: ResolveReferenceUseCase,
    private readonly tree: NoteTree,
  ) {}

  async execute(input: PrintNoteInput): Promise<PrintNoteOutput> {
    const { outcome } = await this.resolver.execute(input);
    // Ambiguity and misses throw here, with the candidate paths attached.
    const [path] = selectPaths(outcome, input.raw.trim());
    return { path, content: await this.tree.readFile(path) };
  }
}
