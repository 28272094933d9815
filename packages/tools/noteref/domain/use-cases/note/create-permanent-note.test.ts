import { expect, test } from "vitest";
import { CreatePermanentNoteUseCase } from "./create-permanent-note.js";
import { InMemoryFileSystem } from "../../../adapters/filesystem/in-memory-fs.js";
import { Sha256SlugService } from "../../../adapters/services/sha256-slug.js";
import type { Clock } from "../../ports/clock.js";

const clock: Clock = {
  now: () => ({ date: "20260212", time: "143022", stamp: "2026-02-12 14:30" }),
};
const slugService = new Sha256SlugService();

function setup() {
  const fs = new InMemoryFileSystem();
  const useCase = new CreatePermanentNoteUseCase(fs, slugService, clock);
  return { fs, useCase };
}

test("CreatePermanentNote - titled note is named by its slug", async () => {
  const { fs, useCase } = setup();

  const output = await useCase.execute({ root: "/c", title: "Design Principles" });

  expect(output).toEqual({
    path: "/c/note/design-principles.md",
    sourceHash: null,
  });
  expect(fs.getAll().get(output.path)).toBe("# Design Principles\n");
});

test("CreatePermanentNote - untitled note is named by the full timestamp", async () => {
  const { fs, useCase } = setup();

  const output = await useCase.execute({ root: "/c" });

  expect(output.path).toBe("/c/note/20260212143022.md");
  expect(fs.getAll().get(output.path)).toBe("");
});

test("CreatePermanentNote - source files the note under its hash directory", async () => {
  const { fs, useCase } = setup();
  const hash = slugService.hashSource("book:xyz");

  const output = await useCase.execute({
    root: "/c",
    title: "Chapter One",
    source: "book:xyz",
  });

  expect(output).toEqual({
    path: `/c/note/${hash}/chapter-one.md`,
    sourceHash: hash,
  });
  expect(fs.getAll().get(`/c/note/${hash}/.source`)).toBe("book:xyz");
});

test("CreatePermanentNote - rejects unusable titles and existing files", async () => {
  const { fs, useCase } = setup();
  fs.setFile("/c/note/idea.md", "");

  await expect(useCase.execute({ root: "/c", title: "!!!" })).rejects.toThrow(
    "Title '!!!' has no characters usable in a file name",
  );
  await expect(useCase.execute({ root: "/c", title: "Idea" })).rejects
    .toMatchObject({ code: "invalid_args" });
});
