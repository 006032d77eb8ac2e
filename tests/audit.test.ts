import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AuditLogger } from "../src/skills/audit.js";
import { makeTmpDir } from "./helpers.js";

let root: string;

beforeEach(() => {
  root = makeTmpDir("audit-");
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

function readLines(file: string): unknown[] {
  return fs
    .readFileSync(file, "utf-8")
    .split("\n")
    .filter((line) => line.trim())
    .map((line): unknown => JSON.parse(line));
}

describe("AuditLogger", () => {
  it("writes JSON lines and answers queries newest first", async () => {
    const logger = new AuditLogger(root);
    void logger.log({ kind: "skill_exec", skillId: "notes", mode: "find", status: "completed", durationMs: 4 });
    void logger.log({ kind: "file_op", operation: "create", path: "/tmp/a.txt", success: true });
    void logger.log({ kind: "permission_change", skillId: "notes", from: "Ask", to: "Auto" });
    await logger.flush();

    expect(readLines(logger.logFile)).toHaveLength(3);
    expect(logger.query({ kind: "file_op" }).map((e) => e.kind)).toEqual(["file_op"]);
    expect(logger.query({ skillId: "notes" }).map((e) => e.kind)).toEqual(["permission_change", "skill_exec"]);
    expect(logger.query({ path: "/tmp/a.txt" })).toHaveLength(1);
    expect(logger.query({ limit: 1 }).map((e) => e.kind)).toEqual(["permission_change"]);
    expect(logger.recent(2).map((e) => e.kind)).toEqual(["permission_change", "file_op"]);
  });

  it("stamps every entry with an id and ISO timestamp", async () => {
    const logger = new AuditLogger(root);
    await logger.log({ kind: "error", source: "test", message: "boom" });
    const [entry] = logger.recent(1);
    expect(entry?.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(entry && new Date(entry.timestamp).toISOString()).toBe(entry?.timestamp);
  });

  it("warms the cache on open and skips a torn last line", async () => {
    const first = new AuditLogger(root);
    await first.log({ kind: "error", source: "test", message: "one" });
    await first.log({ kind: "error", source: "test", message: "two" });
    fs.appendFileSync(first.logFile, '{"kind":"err');

    const reopened = await AuditLogger.open(root);
    expect(reopened.recent(10).map((e) => (e.kind === "error" ? e.message : e.kind))).toEqual(["two", "one"]);
  });

  it("skips lines whose shape does not match their kind", async () => {
    const first = new AuditLogger(root);
    await first.log({ kind: "file_op", operation: "copy", path: "/tmp/a", target: "/tmp/b", success: true });
    const meta = '"id":"x","timestamp":"2024-01-02T03:04:05.000Z"';
    fs.appendFileSync(first.logFile, `{"kind":"file_op","path":"/tmp/c",${meta}}\n`);
    fs.appendFileSync(
      first.logFile,
      `{"kind":"skill_exec","skillId":"notes","mode":"chat","status":"completed","durationMs":1,${meta}}\n`,
    );
    fs.appendFileSync(first.logFile, `{"kind":"error","source":"test","message":"no id"}\n`);

    const reopened = await AuditLogger.open(root);
    expect(reopened.recent(10).map((e) => e.kind)).toEqual(["file_op"]);
    expect(reopened.query({ path: "/tmp/b" })).toHaveLength(1);
  });

  it("keeps only cacheSize entries in memory", async () => {
    const logger = new AuditLogger(root, { cacheSize: 2 });
    for (const message of ["a", "b", "c"]) {
      void logger.log({ kind: "error", source: "test", message });
    }
    await logger.flush();
    expect(logger.query().map((e) => (e.kind === "error" ? e.message : e.kind))).toEqual(["c", "b"]);
    expect(readLines(logger.logFile)).toHaveLength(3);
  });

  it("rotates and drops the oldest file", async () => {
    const logger = new AuditLogger(root, { maxFileBytes: 1, maxRotatedFiles: 2 });
    for (const message of ["e1", "e2", "e3", "e4"]) {
      await logger.log({ kind: "error", source: "test", message });
    }

    expect(await logger.logFiles()).toEqual([
      path.join(root, "audit.jsonl"),
      path.join(root, "audit.1.jsonl"),
      path.join(root, "audit.2.jsonl"),
    ]);
    const messageOf = (file: string) => readLines(path.join(root, file)).map((line) => Reflect.get(Object(line), "message"));
    expect(messageOf("audit.jsonl")).toEqual(["e4"]);
    expect(messageOf("audit.1.jsonl")).toEqual(["e3"]);
    expect(messageOf("audit.2.jsonl")).toEqual(["e2"]);
  });

  it("reports write failures instead of rejecting", async () => {
    const blocker = path.join(root, "blocker");
    fs.writeFileSync(blocker, "");
    const onWriteError = vi.fn();
    const logger = new AuditLogger(path.join(blocker, "audit"), { onWriteError });

    await expect(logger.log({ kind: "error", source: "test", message: "lost" })).resolves.toBeUndefined();
    expect(onWriteError).toHaveBeenCalledTimes(1);
    expect(onWriteError.mock.calls[0]?.[0]).toMatch(/^failed to write audit entry: /);
    expect(logger.recent(1)).toHaveLength(1);
  });
});
