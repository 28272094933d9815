import { expect, test } from "vitest";
import { PrintNoteUseCase } from "./print-note.js";
import { ParseReferenceUseCase } from "../reference/parse-reference.js";
import { ResolutionRuleChain } from "../reference/resolution-rules.js";
import { ResolveReferenceUseCase } from "../reference/resolve-reference.js";
import { InMemoryFileSystem } from "../../../adapters/filesystem/in-memory-fs.js";
import { FileSystemNoteTree } from "../../../adapters/filesystem/note-tree.js";
import { Sha256SlugService } from "../../../adapters/services/sha256-slug.js";
import { NoteError } from "../../entities/errors.js";

async function setup(files: Record<string, string>) {
  const fs = new InMemoryFileSystem();
  for (const [path, content] of Object.entries(files)) {
    fs.setFile(`/c/${path}`, content);
  }
  const slugService = new Sha256SlugService();
  const tree = new FileSystemNoteTree(fs);
  const resolver = new ResolveReferenceUseCase(
    new ParseReferenceUseCase(slugService),
    new ResolutionRuleChain(tree, slugService),
    tree,
  );
  return {
    printNote: new PrintNoteUseCase(resolver, tree),
    context: await resolver.contextFor("/c", "20260212"),
  };
}

test("PrintNote - reads the uniquely resolved note", async () => {
  const { printNote, context } = await setup({
    "#daily/20260212/222714-some-task.md": "# Some task\n\nbody\n",
  });

  expect(await printNote.execute({ raw: "22", context })).toEqual({
    path: "/c/#daily/20260212/222714-some-task.md",
    content: "# Some task\n\nbody\n",
  });
});

test("PrintNote - ambiguity carries the candidate paths", async () => {
  const { printNote, context } = await setup({
    "#daily/20260212/140000-a.md": "a",
    "#daily/20260212/143000-b.md": "b",
  });

  const err = await printNote.execute({ raw: "14", context }).then(
    () => null,
    (e: unknown) => e,
  );

  expect(err).toBeInstanceOf(NoteError);
  expect(err).toMatchObject({
    code: "ambiguous",
    candidates: ["/c/#daily/20260212/140000-a.md", "/c/#daily/20260212/143000-b.md"],
  });
});

test("PrintNote - missing note is not_found", async () => {
  const { printNote, context } = await setup({});

  await expect(printNote.execute({ raw: "idea", context })).rejects.toThrow(
    "Note 'idea' not found",
  );
});
