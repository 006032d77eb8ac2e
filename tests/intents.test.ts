import { describe, expect, it } from "vitest";
import { intentFromToolUse, parseTextIntents, stripIntentTags } from "../src/tools/intents.js";
import { toolNameOf } from "../src/tools/types.js";

describe("parseTextIntents", () => {
  it("extracts tags in document order with trimmed bodies", () => {
    const text = "Let me look.\n<command> ls -la ~/Downloads </command>\nThen <search>weather today</search>";
    expect(parseTextIntents(text)).toEqual([
      { kind: "command", command: "ls -la ~/Downloads" },
      { kind: "search", query: "weather today" },
    ]);
  });

  it("accepts the command aliases", () => {
    expect(parseTextIntents("<cmd>pwd</cmd><run>date</run><request>whoami</request>")).toEqual([
      { kind: "command", command: "pwd" },
      { kind: "command", command: "date" },
      { kind: "command", command: "whoami" },
    ]);
  });

  it("drops exact repeats and empty bodies", () => {
    expect(parseTextIntents("<command>ls</command><cmd>ls</cmd><command>  </command>")).toEqual([
      { kind: "command", command: "ls" },
    ]);
  });

  it("reads preview paths from the attribute or the body", () => {
    expect(parseTextIntents('<preview type="file" path="~/a.txt"></preview>')).toEqual([{ kind: "preview", path: "~/a.txt" }]);
    expect(parseTextIntents("<preview type='file' path='/tmp/b.png'></preview>")).toEqual([
      { kind: "preview", path: "/tmp/b.png" },
    ]);
    expect(parseTextIntents("<preview>/tmp/c.md</preview>")).toEqual([{ kind: "preview", path: "/tmp/c.md" }]);
  });

  it("is case-sensitive on tag names", () => {
    expect(parseTextIntents("<COMMAND>ls</COMMAND>")).toEqual([]);
  });
});

describe("stripIntentTags", () => {
  it("removes tags and thinking blocks and collapses blank runs", () => {
    const text = "Here:\n<command>ls</command>\n\n\n\nDone <thinking>hmm</thinking>";
    expect(stripIntentTags(text)).toBe("Here:\n\nDone");
    expect(parseTextIntents(stripIntentTags(text))).toEqual([]);
  });
});

describe("intentFromToolUse", () => {
  it("maps each native tool onto an intent", () => {
    expect(intentFromToolUse("web_search", { query: "  remote jobs " })).toEqual({
      ok: true,
      intent: { kind: "search", query: "remote jobs" },
    });
    expect(intentFromToolUse("run_command", { command: "df -h" })).toEqual({
      ok: true,
      intent: { kind: "command", command: "df -h" },
    });
    expect(intentFromToolUse("preview_file", { path: "~/a.pdf" })).toEqual({
      ok: true,
      intent: { kind: "preview", path: "~/a.pdf" },
    });
    expect(intentFromToolUse("use_skill", { skill_id: "fuzzy_search", query: "tax" })).toEqual({
      ok: true,
      intent: { kind: "skill", skillId: "fuzzy_search", query: "tax", params: {} },
    });
  });

  it("explains malformed or unknown calls", () => {
    expect(intentFromToolUse("run_command", { command: 42 })).toEqual({
      ok: false,
      reason: "run_command needs a 'command' string",
    });
    expect(intentFromToolUse("use_skill", { skill_id: "x", params: ["a"] })).toEqual({
      ok: false,
      reason: "use_skill 'params' must be an object",
    });
    expect(intentFromToolUse("delete_everything", {})).toEqual({ ok: false, reason: "unknown tool 'delete_everything'" });
  });

  it("round-trips through the native tool names", () => {
    expect(toolNameOf({ kind: "search", query: "q" })).toBe("web_search");
    expect(toolNameOf({ kind: "skill", skillId: "s", query: "", params: {} })).toBe("use_skill");
  });
});
