import { expect, test } from "vitest";
import { ListNotesUseCase } from "./list-notes.js";
import { InMemoryFileSystem } from "../../../adapters/filesystem/in-memory-fs.js";
import { FileSystemNoteTree } from "../../../adapters/filesystem/note-tree.js";
import { Sha256SlugService } from "../../../adapters/services/sha256-slug.js";

const slugService = new Sha256SlugService();

function setup(files: Record<string, string>) {
  const fs = new InMemoryFileSystem();
  for (const [path, content] of Object.entries(files)) {
    fs.setFile(`/c/${path}`, content);
  }
  return new ListNotesUseCase(new FileSystemNoteTree(fs), slugService);
}

test("ListNotes - without filter lists top-level permanent notes", async () => {
  const listNotes = setup({
    "note/zeta.md": "",
    "note/alpha.txt": "",
    "note/abcdef012345/inner.md": "",
  });

  expect(await listNotes.execute({ root: "/c" })).toEqual({
    kind: "names",
    dir: "/c/note",
    names: ["alpha.txt", "zeta.md"],
  });
  expect(await setup({}).execute({ root: "/c" })).toEqual({
    kind: "names",
    dir: "/c/note",
    names: [],
  });
});

test("ListNotes - a date lists that day's directory", async () => {
  const listNotes = setup({
    "#daily/20260212/143022-review.md": "",
    "#daily/20260212/090000.md": "",
    "#daily/20260212/attachments/pic.png": "",
  });

  expect(await listNotes.execute({ root: "/c", filter: "20260212" })).toEqual({
    kind: "names",
    dir: "/c/#daily/20260212",
    names: ["attachments/", "090000.md", "143022-review.md"],
  });
});

test("ListNotes - a source string lists its hash directory", async () => {
  const hash = slugService.hashSource("book:xyz");
  const listNotes = setup({
    [`note/${hash}/chapter-one.md`]: "",
    [`note/${hash}/.source`]: "book:xyz",
  });

  expect(await listNotes.execute({ root: "/c", filter: "book:xyz" })).toEqual({
    kind: "names",
    dir: `/c/note/${hash}`,
    names: ["chapter-one.md"],
  });
});

test("ListNotes - #daily lists the dates and #tag prints the index", async () => {
  const listNotes = setup({
    "#daily/20260212/100000.md": "",
    "#daily/20260211/100000.md": "",
    "#project.md": "# Project\n",
  });

  expect(await listNotes.execute({ root: "/c", filter: "#daily" })).toEqual({
    kind: "names",
    dir: "/c/#daily",
    names: ["20260211", "20260212"],
  });
  expect(await listNotes.execute({ root: "/c", filter: "#project" })).toEqual({
    kind: "index",
    path: "/c/#project.md",
    content: "# Project\n",
  });
});

test("ListNotes - unknown filters are not_found", async () => {
  const listNotes = setup({});
  const hash = slugService.hashSource("nothing");

  await expect(listNotes.execute({ root: "/c", filter: "nothing" })).rejects
    .toThrow(`Not found: note/${hash}/ or #daily/nothing/`);
  await expect(listNotes.execute({ root: "/c", filter: "#ghost" })).rejects
    .toThrow("Tag '#ghost' not found");
  await expect(listNotes.execute({ root: "/c", filter: "#daily" })).rejects
    .toMatchObject({ code: "not_found" });
});
