import { expect, test } from "vitest";
import { ReleaseTaskUseCase } from "./release-task.js";
import { ParseLedgerUseCase } from "../ledger/parse-ledger.js";
import { YamlParserService } from "../../../adapters/services/yaml-parser.js";
import { NoteError } from "../../entities/errors.js";
import { taskView } from "../../entities/ledger.js";

const parser = new ParseLedgerUseCase(new YamlParserService());
const releaseTask = new ReleaseTaskUseCase();

const LEDGER = parser.execute({
  content: [
    "- [ ] [One][task-1] @alice",
    "- [ ] [Two][task-2] @bob",
    "- [ ] [Three][task-3]",
    "",
    "---",
    "[task-1]: a",
    "[task-2]: b",
    "[task-3]: c",
    "[task-4]: d",
    "",
  ].join("\n"),
});

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (e) {
    if (e instanceof NoteError) return e.code;
    throw e;
  }
  return "none";
}

test("ReleaseTask - clears the owner and keeps the task in progress", () => {
  const output = releaseTask.execute({ ledger: LEDGER, ids: ["task-1"] });

  expect(output.tasks).toMatchObject([
    { id: "task-1", status: "doing", owner: null },
  ]);
  expect(parser.serialize(output.ledger).split("\n")[0]).toBe(
    "- [ ] [One][task-1]",
  );
});

test("ReleaseTask - done marks the entry done", () => {
  const output = releaseTask.execute({
    ledger: LEDGER,
    ids: ["task-1", "task-2"],
    done: true,
  });

  expect(output.tasks.map((t) => [t.id, t.status, t.owner])).toEqual([
    ["task-1", "done", null],
    ["task-2", "done", null],
  ]);
});

test("ReleaseTask - unowned entry needs force", () => {
  expect(codeOf(() => releaseTask.execute({ ledger: LEDGER, ids: ["task-3"] })))
    .toBe("not_owned");

  const forced = releaseTask.execute({
    ledger: LEDGER,
    ids: ["task-3"],
    force: true,
  });
  expect(taskView(forced.ledger, "task-3")?.status).toBe("doing");
});

test("ReleaseTask - done also releases an unowned entry", () => {
  const output = releaseTask.execute({
    ledger: LEDGER,
    ids: ["task-3"],
    done: true,
  });

  expect(taskView(output.ledger, "task-3")?.status).toBe("done");
});

test("ReleaseTask - force with two ids fails before any check", () => {
  const err = (() => {
    try {
      releaseTask.execute({
        ledger: LEDGER,
        ids: ["task-3", "task-99"],
        force: true,
      });
    } catch (e) {
      return e;
    }
    return null;
  })();

  expect(err).toBeInstanceOf(NoteError);
  expect(err).toMatchObject({
    code: "invalid_args",
    message: "--force can only be used with a single task id",
  });
});

test("ReleaseTask - batch is validated before anything changes", () => {
  expect(
    codeOf(() =>
      releaseTask.execute({ ledger: LEDGER, ids: ["task-1", "task-4"] })
    ),
  ).toBe("not_found");
  expect(
    codeOf(() =>
      releaseTask.execute({ ledger: LEDGER, ids: ["task-1", "task-3"] })
    ),
  ).toBe("not_owned");
  expect(taskView(LEDGER, "task-1")?.owner).toBe("alice");
});

test("ReleaseTask - repeated ids are released once", () => {
  const output = releaseTask.execute({
    ledger: LEDGER,
    ids: ["task-2", "task-2"],
  });

  expect(output.tasks.map((t) => t.id)).toEqual(["task-2"]);
});

test("ReleaseTask - no ids is an argument error", () => {
  expect(codeOf(() => releaseTask.execute({ ledger: LEDGER, ids: [] })))
    .toBe("invalid_args");
});
