import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ExecuteOptions } from "../src/executor/executor.js";
import { createAllowList } from "../src/safety/allow-list.js";
import { AuditLogger } from "../src/skills/audit.js";
import { SkillRegistry } from "../src/skills/registry.js";
import { errorOutput, textOutput, type Skill, type SkillDescriptor } from "../src/skills/types.js";
import { ApprovalQueue } from "../src/tools/approval-queue.js";
import { ToolDispatcher } from "../src/tools/dispatch.js";
import type { ToolContext } from "../src/tools/types.js";
import { commandResult, makeTmpDir } from "./helpers.js";

let root: string;
let ctx: ToolContext;

beforeEach(() => {
  root = makeTmpDir("dispatch-");
  fs.writeFileSync(path.join(root, "notes.txt"), "hello");
  fs.mkdirSync(path.join(root, "sub"));
  ctx = {
    mode: "find",
    cwd: root,
    homeDir: root,
    allowList: createAllowList([root]),
    terminalEnabled: true,
    internetEnabled: true,
    commandTimeoutSec: 5,
  };
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

function skill(descriptor: Partial<SkillDescriptor> & { id: string }, run?: Skill["execute"]): Skill {
  return {
    descriptor: {
      name: descriptor.id,
      description: "test skill",
      modes: ["find"],
      permissionLevel: "Safe",
      ...descriptor,
    },
    execute: run ?? (async (input) => textOutput(`echo: ${input.query}`)),
  };
}

describe("ToolDispatcher: search", () => {
  it("is blocked when internet research is off", async () => {
    const search = vi.fn();
    const dispatcher = new ToolDispatcher({ approvals: new ApprovalQueue(), search });
    const outcome = await dispatcher.dispatch({ kind: "search", query: "cats" }, { ...ctx, internetEnabled: false });
    expect(outcome).toEqual({ content: "[Search blocked]", isError: true });
    expect(search).not.toHaveBeenCalled();
  });

  it("labels results with the query", async () => {
    const dispatcher = new ToolDispatcher({
      approvals: new ApprovalQueue(),
      search: async () => ({ output: "1. Cats\n   small\n   URL: https://a.test\n", source: "brave", count: 1 }),
    });
    expect(await dispatcher.dispatch({ kind: "search", query: "cats" }, ctx)).toEqual({
      label: "[Search Results for 'cats']",
      content: "1. Cats\n   small\n   URL: https://a.test\n",
      isError: false,
    });
  });

  it("turns backend failures into a result", async () => {
    const dispatcher = new ToolDispatcher({
      approvals: new ApprovalQueue(),
      search: async () => {
        throw new Error("boom");
      },
    });
    const outcome = await dispatcher.dispatch({ kind: "search", query: "cats" }, ctx);
    expect(outcome).toEqual({ content: "[Search failed for 'cats']: boom", isError: true });
  });
});

describe("ToolDispatcher: command", () => {
  const setup = () => {
    const approvals = new ApprovalQueue();
    const execute = vi.fn(async (command: string, _options: ExecuteOptions) => commandResult(command, "a.txt\nb.txt\n"));
    return { approvals, execute, dispatcher: new ToolDispatcher({ approvals, execute }) };
  };

  it("refuses when the terminal is disabled", async () => {
    const { dispatcher, execute } = setup();
    const outcome = await dispatcher.dispatch({ kind: "command", command: "ls" }, { ...ctx, terminalEnabled: false });
    expect(outcome).toEqual({ content: "[Command blocked: terminal disabled]", isError: true });
    expect(execute).not.toHaveBeenCalled();
  });

  it("refuses paths outside the allow-list", async () => {
    const { dispatcher } = setup();
    const outcome = await dispatcher.dispatch({ kind: "command", command: "cat /etc/hosts" }, ctx);
    expect(outcome).toEqual({ content: "[Command blocked: path /etc/hosts not in allow-list]", isError: true });
  });

  it("refuses Blocked commands without queueing them", async () => {
    const { dispatcher, approvals } = setup();
    const outcome = await dispatcher.dispatch({ kind: "command", command: "nmap localhost" }, ctx);
    expect(outcome).toEqual({ content: "[Command blocked for safety]", isError: true });
    expect(approvals.size).toBe(0);
  });

  it("runs Safe commands right away", async () => {
    const { dispatcher, execute } = setup();
    const command = `ls ${root}`;
    const outcome = await dispatcher.dispatch({ kind: "command", command }, ctx);

    expect(execute).toHaveBeenCalledWith(command, { timeoutSec: 5, cwd: root, signal: undefined });
    expect(outcome.label).toBe(`[Command output]\n$ ${command}`);
    expect(outcome.content).toBe("a.txt\nb.txt\n");
    expect(outcome.isError).toBe(false);
    expect(outcome.executed?.command).toBe(command);
  });

  it("reports empty output explicitly", async () => {
    const dispatcher = new ToolDispatcher({
      approvals: new ApprovalQueue(),
      execute: async (command) => commandResult(command, ""),
    });
    const outcome = await dispatcher.dispatch({ kind: "command", command: "pwd" }, ctx);
    expect(outcome.content).toBe("(no output)");
  });

  it("queues anything that needs approval", async () => {
    const { dispatcher, execute, approvals } = setup();
    const command = `mv ${root}/notes.txt ${root}/sub/notes.txt`;
    const outcome = await dispatcher.dispatch({ kind: "command", command }, ctx);

    expect(outcome).toEqual({
      content: `[Command '${command}' queued for user approval]`,
      isError: false,
      queued: { command, level: "NeedsConfirmation" },
    });
    expect(approvals.list().map((p) => [p.command, p.level])).toEqual([[command, "NeedsConfirmation"]]);
    expect(execute).not.toHaveBeenCalled();
  });

  it("uses an injected classifier", async () => {
    const approvals = new ApprovalQueue();
    const dispatcher = new ToolDispatcher({ approvals, classify: () => "Dangerous" });
    const outcome = await dispatcher.dispatch({ kind: "command", command: "uptime" }, ctx);
    expect(outcome.queued).toEqual({ command: "uptime", level: "Dangerous" });
  });

  it("queues sudo commands with their level", async () => {
    const approvals = new ApprovalQueue();
    const dispatcher = new ToolDispatcher({ approvals, classify: () => "NeedsSudo" });
    const outcome = await dispatcher.dispatch({ kind: "command", command: "uptime" }, ctx);
    expect(outcome.queued).toEqual({ command: "uptime", level: "NeedsSudo" });
    expect(approvals.list().map((p) => p.level)).toEqual(["NeedsSudo"]);
  });
});

describe("ToolDispatcher: preview", () => {
  const dispatcher = () => new ToolDispatcher({ approvals: new ApprovalQueue() });

  it("marks an allowed file for the preview panel", async () => {
    expect(await dispatcher().dispatch({ kind: "preview", path: "~/notes.txt" }, ctx)).toEqual({
      content: "File opened in preview panel.",
      isError: false,
      preview: path.join(root, "notes.txt"),
    });
  });

  it("rejects missing files and directories", async () => {
    expect(await dispatcher().dispatch({ kind: "preview", path: "missing.txt" }, ctx)).toEqual({
      content: "[Preview failed: file not found: missing.txt]",
      isError: true,
    });
    expect(await dispatcher().dispatch({ kind: "preview", path: "sub" }, ctx)).toEqual({
      content: "[Preview failed: sub is not a file]",
      isError: true,
    });
  });

  it("rejects sensitive and disallowed paths", async () => {
    expect(await dispatcher().dispatch({ kind: "preview", path: "/etc/hosts" }, ctx)).toEqual({
      content: "[Preview blocked: path /etc/hosts not in allow-list]",
      isError: true,
    });
    expect(await dispatcher().dispatch({ kind: "preview", path: "~/.ssh/id_ed25519" }, ctx)).toEqual({
      content: "[Preview blocked: path ~/.ssh/id_ed25519 is a sensitive location]",
      isError: true,
    });
  });
});

describe("ToolDispatcher: skill", () => {
  let registry: SkillRegistry;
  let auditor: AuditLogger;
  let dispatcher: ToolDispatcher;

  beforeEach(() => {
    registry = new SkillRegistry();
    auditor = new AuditLogger(path.join(root, "audit"));
    dispatcher = new ToolDispatcher({ approvals: new ApprovalQueue(), skills: registry, auditor });
  });

  const use = (skillId: string, query = "hello") => dispatcher.dispatch({ kind: "skill", skillId, query, params: {} }, ctx);

  it("is unavailable without a registry", async () => {
    const bare = new ToolDispatcher({ approvals: new ApprovalQueue() });
    expect(await bare.dispatch({ kind: "skill", skillId: "x", query: "", params: {} }, ctx)).toEqual({
      content: "[Skill unavailable: x]",
      isError: true,
    });
  });

  it("runs an allowed skill and renders its output", async () => {
    registry.register(skill({ id: "echo" }));
    expect(await use("echo")).toEqual({ label: "[Skill echo]", content: "echo: hello", isError: false });
    await auditor.flush();
    expect(auditor.query({ kind: "skill_exec" }).map((e) => e.kind === "skill_exec" && e.status)).toEqual(["completed"]);
  });

  it("explains each permission outcome", async () => {
    registry.register(skill({ id: "data_only", modes: ["data"] }));
    registry.register(skill({ id: "writer", permissionLevel: "Sensitive" }));
    registry.register(skill({ id: "admin", permissionLevel: "Admin" }));
    registry.register(skill({ id: "off" }));
    registry.setUserPermission("off", "Deny");
    registry.setUserPermission("admin", "Auto");

    expect((await use("nope")).content).toBe("[Skill not found: nope]");
    expect((await use("data_only")).content).toBe("[Skill 'data_only' is not available in find mode]");
    expect((await use("writer")).content).toBe("[Skill 'writer' needs your approval before it can run]");
    expect((await use("admin")).content).toBe("[Skill 'admin' needs administrator access]");
    expect((await use("off")).content).toBe("[Skill 'off' is disabled in settings]");

    await auditor.flush();
    const denied = auditor.query({ skillId: "off" });
    expect(denied).toHaveLength(1);
    expect(denied[0]?.kind === "skill_exec" && denied[0].status).toBe("denied");
  });

  it("reports skill failures as error results", async () => {
    registry.register(skill({ id: "broken" }, async () => errorOutput("disk full")));
    expect(await use("broken")).toEqual({ content: "[Skill 'broken' failed: disk full]", isError: true });
  });
});
