import { expect, test } from "vitest";
import { AddTaskUseCase, appendDefinition } from "./add-task.js";
import { CommentTaskUseCase } from "./comment-task.js";
import { ReleaseTaskUseCase } from "./release-task.js";
import { TakeTaskUseCase } from "./take-task.js";
import { ParseLedgerUseCase } from "../ledger/parse-ledger.js";
import { ParseReferenceUseCase } from "../reference/parse-reference.js";
import { ResolutionRuleChain } from "../reference/resolution-rules.js";
import { ResolveReferenceUseCase } from "../reference/resolve-reference.js";
import { InMemoryFileSystem } from "../../../adapters/filesystem/in-memory-fs.js";
import { FileSystemNoteTree } from "../../../adapters/filesystem/note-tree.js";
import { Sha256SlugService } from "../../../adapters/services/sha256-slug.js";
import { YamlParserService } from "../../../adapters/services/yaml-parser.js";
import { DEFAULT_LEDGER_TEXT, definitions, taskView } from "../../entities/ledger.js";
import type { Clock } from "../../ports/clock.js";

// --- Fixtures ---

const clock: Clock = {
  now: () => ({ date: "20260212", time: "143000", stamp: "2026-02-12 14:30" }),
};

const ledgerParser = new ParseLedgerUseCase(new YamlParserService());

async function setup(files: string[]) {
  const fs = new InMemoryFileSystem();
  for (const path of files) fs.setFile(`/c/${path}`, "");
  const slugService = new Sha256SlugService();
  const tree = new FileSystemNoteTree(fs);
  const resolver = new ResolveReferenceUseCase(
    new ParseReferenceUseCase(slugService),
    new ResolutionRuleChain(tree, slugService),
    tree,
  );
  return {
    addTask: new AddTaskUseCase(resolver),
    context: await resolver.contextFor("/c", "20260212"),
  };
}

// --- add ---

test("AddTask - allocates the first id and appends a definition", async () => {
  const { addTask, context } = await setup(["#daily/20260212/143022-meeting.md"]);
  const ledger = ledgerParser.execute({ content: DEFAULT_LEDGER_TEXT });

  const output = await addTask.execute({ ledger, nodeRef: "143022", context });

  expect(output.id).toBe("task-1");
  expect(output.created).toBe(true);
  expect(output.path).toBe("/c/#daily/20260212/143022-meeting.md");
  expect(taskView(output.ledger, "task-1")?.status).toBe("backlog");
  expect(output.ledger.body).toEqual(ledger.body);
  expect(ledgerParser.serialize(output.ledger)).toBe(
    "---\nPREFIX: task-\n---\n\n---\n\n[task-1]: 143022\n",
  );
});

test("AddTask - same node_ref twice returns the same id without a new line", async () => {
  const { addTask, context } = await setup(["#daily/20260212/143022-meeting.md"]);
  const ledger = ledgerParser.execute({ content: DEFAULT_LEDGER_TEXT });

  const first = await addTask.execute({ ledger, nodeRef: "143022", context });
  const second = await addTask.execute({
    ledger: first.ledger,
    nodeRef: "143022",
    context,
  });

  expect(second.id).toBe(first.id);
  expect(second.created).toBe(false);
  expect(second.ledger).toBe(first.ledger);
  expect(definitions(second.ledger)).toEqual([
    { id: "task-1", target: "143022" },
  ]);
});

test("AddTask - continues numbering after existing ids", async () => {
  const { addTask, context } = await setup(["note/design.md"]);
  const ledger = ledgerParser.execute({
    content: "---\nPREFIX: task-\n---\n\n---\n[task-7]: old\n<!-- end -->\n",
  });

  const output = await addTask.execute({ ledger, nodeRef: "design", context });

  expect(output.id).toBe("task-8");
  expect(ledgerParser.serialize(output.ledger)).toBe(
    "---\nPREFIX: task-\n---\n\n---\n[task-7]: old\n[task-8]: design\n<!-- end -->\n",
  );
});

test("AddTask - ids past 2^53 keep counting exactly", async () => {
  const { addTask, context } = await setup(["note/design.md", "note/idea.md"]);
  const ledger = ledgerParser.execute({
    content: "---\nPREFIX: task-\n---\n\n---\n[task-9007199254740993]: x\n",
  });

  const first = await addTask.execute({ ledger, nodeRef: "design", context });
  const second = await addTask.execute({
    ledger: first.ledger,
    nodeRef: "idea",
    context,
  });

  expect(first.id).toBe("task-9007199254740994");
  expect(second.id).toBe("task-9007199254740995");
  const reloaded = ledgerParser.execute({
    content: ledgerParser.serialize(second.ledger),
  });
  expect(definitions(reloaded).map((d) => d.id)).toEqual([
    "task-9007199254740993",
    "task-9007199254740994",
    "task-9007199254740995",
  ]);
});

test("AddTask - appending an id that is already defined fails", () => {
  const ledger = ledgerParser.execute({
    content: "---\nPREFIX: task-\n---\n\n---\n[task-1]: a\n",
  });

  expect(() => appendDefinition(ledger, "task-1", "b")).toThrow(
    "Task id 'task-1' is already defined in the reference block",
  );
});

test("AddTask - ledger without reference block gains one", async () => {
  const { addTask, context } = await setup(["#daily/20260212/143022-meeting.md"]);
  const ledger = ledgerParser.execute({ content: "# Tasks\n" });

  const output = await addTask.execute({ ledger, nodeRef: "143022", context });

  expect(ledgerParser.serialize(output.ledger)).toBe(
    "# Tasks\n---\n[task-1]: 143022\n",
  );
});

test("AddTask - node_ref must resolve to exactly one note", async () => {
  const { addTask, context } = await setup([
    "#daily/20260212/140000-coffee.md",
    "#daily/20260212/143000-meeting.md",
  ]);
  const ledger = ledgerParser.execute({ content: DEFAULT_LEDGER_TEXT });

  await expect(addTask.execute({ ledger, nodeRef: "14", context }))
    .rejects.toMatchObject({ code: "ambiguous" });
  await expect(addTask.execute({ ledger, nodeRef: "09", context }))
    .rejects.toMatchObject({ code: "not_found" });
  await expect(addTask.execute({ ledger, nodeRef: "  ", context }))
    .rejects.toMatchObject({ code: "invalid_args" });
});

// --- Full lifecycle ---

test("TaskLifecycle - add, take, comment, release on an empty ledger", async () => {
  const { addTask, context } = await setup(["#daily/20260212/143022-meeting.md"]);
  let ledger = ledgerParser.execute({ content: DEFAULT_LEDGER_TEXT });

  const added = await addTask.execute({ ledger, nodeRef: "143022", context });
  expect(added.id).toBe("task-1");
  ledger = added.ledger;

  const taken = new TakeTaskUseCase(clock).execute({
    ledger,
    id: "task-1",
    title: "Implement X",
    agent: "bot",
  });
  expect(taken.task).toMatchObject({ status: "doing", owner: "bot" });
  ledger = taken.ledger;

  ledger = new CommentTaskUseCase(clock).execute({
    ledger,
    id: "task-1",
    text: "did work",
  }).ledger;

  const released = new ReleaseTaskUseCase().execute({
    ledger,
    ids: ["task-1"],
    done: true,
  });

  expect(released.tasks).toEqual([
    {
      id: "task-1",
      nodeRef: "143022",
      status: "done",
      title: "Implement X",
      owner: null,
      comments: [
        {
          indent: "  ",
          bullet: true,
          timestamp: "2026-02-12 14:30",
          text: "did work",
          hash: null,
        },
      ],
    },
  ]);
  expect(ledgerParser.serialize(released.ledger)).toBe(
    [
      "---",
      "PREFIX: task-",
      "---",
      "",
      "- [x] [Implement X][task-1]",
      "  - 2026-02-12 14:30 did work",
      "",
      "---",
      "",
      "[task-1]: 143022",
      "",
    ].join("\n"),
  );
});

test("TaskLifecycle - take without an agent identity leaves the owner unset", async () => {
  const { addTask, context } = await setup(["#daily/20260212/143022-meeting.md"]);
  const added = await addTask.execute({
    ledger: ledgerParser.execute({ content: DEFAULT_LEDGER_TEXT }),
    nodeRef: "143022",
    context,
  });

  const taken = new TakeTaskUseCase(clock).execute({
    ledger: added.ledger,
    id: "task-1",
    title: "Implement X",
    agent: null,
  });

  expect(taken.task.owner).toBeNull();
  expect(taken.task.status).toBe("doing");
});
