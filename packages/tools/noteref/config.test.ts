import { expect, test } from "vitest";
import { loadConfig, validateAgentName } from "./config.js";

test("config - defaults when nothing is set", () => {
  expect(loadConfig({}, "/work")).toEqual({
    home: "/work",
    taskFile: "TASK.md",
    agent: null,
    timestamp: null,
    logLevel: "warn",
  });
});

test("config - reads every variable and ignores blank ones", () => {
  const config = loadConfig(
    {
      NOTEREF_HOME: "/notes",
      NOTEREF_TASKFILE: "TODO.md",
      NOTEREF_AGENT_NAME: "  ",
      NOTEREF_TIMESTAMP: "2026-02-12 14:30",
      NOTEREF_LOG_LEVEL: "debug",
    },
    "/work",
  );

  expect(config.home).toBe("/notes");
  expect(config.taskFile).toBe("TODO.md");
  expect(config.agent).toBeNull();
  expect(config.timestamp?.getHours()).toBe(14);
  expect(config.logLevel).toBe("debug");
});

test("config - invalid values are argument errors", () => {
  expect(() => loadConfig({ NOTEREF_LOG_LEVEL: "loud" }, "/work")).toThrow(
    /^Invalid NOTEREF_LOG_LEVEL: /,
  );
  expect(() => loadConfig({ NOTEREF_AGENT_NAME: "two words" }, "/work"))
    .toThrow("Invalid NOTEREF_AGENT_NAME: must not contain whitespace");
  expect(() => loadConfig({ NOTEREF_TIMESTAMP: "2026-02-30 10:00" }, "/work"))
    .toThrow("Invalid timestamp '2026-02-30 10:00'");
});

test("config - agent names are single tokens", () => {
  expect(validateAgentName("agent-1")).toBe("agent-1");
  expect(() => validateAgentName("a b")).toThrow(
    "Invalid agent name 'a b': must be non-empty and contain no whitespace",
  );
});
