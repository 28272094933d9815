import { expect, test } from "vitest";
import { CommentTaskUseCase } from "./comment-task.js";
import { ParseLedgerUseCase } from "../ledger/parse-ledger.js";
import { findEntry } from "../../entities/ledger.js";
import { YamlParserService } from "../../../adapters/services/yaml-parser.js";
import type { Clock } from "../../ports/clock.js";

const clock: Clock = {
  now: () => ({ date: "20260212", time: "091500", stamp: "2026-02-12 09:15" }),
};

const parser = new ParseLedgerUseCase(new YamlParserService());
const commentTask = new CommentTaskUseCase(clock);

const LEDGER = parser.execute({
  content: [
    "- [ ] [Parser][task-1] @alice",
    "  - 2026-02-11 18:00 first pass",
    "",
    "---",
    "[task-1]: a",
    "[task-2]: b",
    "",
  ].join("\n"),
});

test("CommentTask - appends a timestamped line", () => {
  const output = commentTask.execute({
    ledger: LEDGER,
    id: "task-1",
    text: "  second pass ",
  });

  expect(output.comment).toEqual({
    indent: "  ",
    bullet: true,
    timestamp: "2026-02-12 09:15",
    text: "second pass",
    hash: null,
  });
  expect(parser.serialize(output.ledger)).toBe(
    [
      "- [ ] [Parser][task-1] @alice",
      "  - 2026-02-11 18:00 first pass",
      "  - 2026-02-12 09:15 second pass",
      "",
      "---",
      "[task-1]: a",
      "[task-2]: b",
      "",
    ].join("\n"),
  );
});

test("CommentTask - git hash is appended as a short reference", () => {
  const output = commentTask.execute({
    ledger: LEDGER,
    id: "task-1",
    text: "fixed",
    gitHash: "a1b2c3d",
  });

  expect(output.comment.hash).toBe("a1b2c3d");
  expect(parser.serialize(output.ledger).split("\n")[2]).toBe(
    "  - 2026-02-12 09:15 fixed [a1b2c3d]",
  );
});

test("CommentTask - never touches title, owner or done", () => {
  const output = commentTask.execute({ ledger: LEDGER, id: "task-1", text: "x" });
  const [node] = output.ledger.body;

  expect(node.kind === "entry" && node.entry.owner).toBe("alice");
  expect(node.kind === "entry" && node.entry.title).toBe("Parser");
  expect(node.kind === "entry" && node.entry.done).toBe(false);
});

test("CommentTask - backlog tasks cannot be commented", () => {
  expect(() => commentTask.execute({ ledger: LEDGER, id: "task-2", text: "x" }))
    .toThrow("Task 'task-2' is not in progress (take it before commenting)");
});

test("CommentTask - rejects invalid hashes and empty text", () => {
  expect(() =>
    commentTask.execute({
      ledger: LEDGER,
      id: "task-1",
      text: "x",
      gitHash: "not-a-hash",
    })
  ).toThrow("Invalid git hash 'not-a-hash': expected 4-40 hex characters");
  expect(() => commentTask.execute({ ledger: LEDGER, id: "task-1", text: " " }))
    .toThrow("Comment text must be a single non-empty line");
});

test("CommentTask - stored comment matches the line read back", () => {
  for (const [text, expected] of [
    ["[beef]", { text: "", hash: "beef" }],
    ["fix [abc1]", { text: "fix", hash: "abc1" }],
  ] as const) {
    const output = commentTask.execute({ ledger: LEDGER, id: "task-1", text });

    expect(output.comment).toMatchObject(expected);
    const reloaded = parser.execute({ content: parser.serialize(output.ledger) });
    expect(findEntry(reloaded, "task-1")?.entry.comments[1]).toEqual(
      output.comment,
    );
  }
});
