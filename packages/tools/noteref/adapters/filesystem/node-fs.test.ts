import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { NodeFileSystem } from "./node-fs.js";
import type { DirEntry } from "../../domain/ports/filesystem.js";

const fs = new NodeFileSystem();
let dir = "";

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "noteref-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

test("NodeFileSystem - writes create parent directories", async () => {
  const path = join(dir, "#daily", "20260212", "143022.md");

  await fs.writeFile(path, "# Daily Note\n");

  expect(await fs.readFile(path)).toBe("# Daily Note\n");
  expect(await fs.exists(join(dir, "#daily", "20260212"))).toBe(true);
});

test("NodeFileSystem - missing files and directories", async () => {
  const missing = join(dir, "nope.md");

  expect(await fs.exists(missing)).toBe(false);
  expect(await fs.exists(join(missing, "below"))).toBe(false);
  await expect(fs.readFile(missing)).rejects.toMatchObject({
    code: "io_error",
    message: `File not found: ${missing}`,
  });

  const names: string[] = [];
  for await (const entry of fs.readDir(join(dir, "absent"))) {
    names.push(entry.name);
  }
  expect(names).toEqual([]);
});

test("NodeFileSystem - readDir reports files and directories", async () => {
  await fs.writeFile(join(dir, "note", "idea.md"), "");
  await fs.writeFile(join(dir, "#tags.md"), "");

  const entries: DirEntry[] = [];
  for await (const entry of fs.readDir(dir)) entries.push(entry);
  entries.sort((a, b) => (a.name < b.name ? -1 : 1));

  expect(entries).toEqual([
    { name: "#tags.md", isFile: true, isDirectory: false },
    { name: "note", isFile: false, isDirectory: true },
  ]);
});

test("NodeFileSystem - exists reports unusable paths as io_error", async () => {
  const bad = join(dir, "bad\0name.md");

  await expect(fs.exists(bad)).rejects.toMatchObject({
    code: "io_error",
    message: `Failed to stat: ${bad}`,
  });
});
