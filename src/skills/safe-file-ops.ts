/**
 * Safe file operations: create, modify, move, copy and archive. No delete.
 *
 * Deleting is replaced by archiving: the file moves to
 * <archiveRoot>/YYYYMMDD_HHMMSS/<name>. Every source and destination must
 * lie inside the allow-list (the archive root is the one exception), and
 * every operation is written to the audit log, failed ones included.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { CoreError, describeError, isCoreError } from "../errors.js";
import { canonicalizePath, isPathAllowed, type AllowList, type GateOptions } from "../safety/allow-list.js";
import type { AuditEvent, AuditLogger } from "./audit.js";
import type { FileAction } from "./types.js";

type FileOperation = Extract<AuditEvent, { kind: "file_op" }>["operation"];

export function archiveTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export interface SafeFileOpsOptions extends GateOptions {
  auditor?: AuditLogger;
  now?: () => Date;
}

export class SafeFileOps {
  readonly archiveRoot: string;
  private readonly allowList: AllowList;
  private readonly auditor?: AuditLogger;
  private readonly gate: GateOptions;
  private readonly now: () => Date;

  constructor(archiveRoot: string, allowList: AllowList, options: SafeFileOpsOptions = {}) {
    this.archiveRoot = archiveRoot;
    this.allowList = allowList;
    this.auditor = options.auditor;
    this.gate = { cwd: options.cwd, homeDir: options.homeDir };
    this.now = options.now ?? (() => new Date());
  }

  /** Fails when the file already exists; use modifyFile for that */
  createFile(target: string, content: string): Promise<FileAction> {
    return this.run("create", target, undefined, async (file) => {
      if (await pathExists(file)) {
        throw new CoreError("ExecutorFailed", `File already exists: ${file}. Use modify instead.`);
      }
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, content, { encoding: "utf-8", flag: "wx" });
      return { kind: "created" };
    });
  }

  /** Fails when the file does not exist yet */
  modifyFile(target: string, content: string): Promise<FileAction> {
    return this.run("modify", target, undefined, async (file) => {
      if (!(await pathExists(file))) {
        throw new CoreError("ExecutorFailed", `File does not exist: ${file}. Use create instead.`);
      }
      await fs.writeFile(file, content, "utf-8");
      return { kind: "modified" };
    });
  }

  appendFile(target: string, content: string): Promise<FileAction> {
    return this.run("append", target, undefined, async (file) => {
      const existed = await pathExists(file);
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.appendFile(file, content, "utf-8");
      return existed ? { kind: "modified" } : { kind: "created" };
    });
  }

  /** Fails when the destination exists; archive it first */
  moveFile(from: string, to: string): Promise<FileAction> {
    return this.run("move", from, to, async (source, dest) => {
      const destination = dest ?? source;
      await requireExisting(source);
      if (await pathExists(destination)) {
        throw new CoreError("ExecutorFailed", `Destination already exists: ${destination}. Archive it first.`);
      }
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.rename(source, destination);
      return { kind: "moved", from: source };
    });
  }

  copyFile(from: string, to: string): Promise<FileAction> {
    return this.run("copy", from, to, async (source, dest) => {
      const destination = dest ?? source;
      await requireExisting(source);
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.copyFile(source, destination, fs.constants.COPYFILE_EXCL);
      return { kind: "created" };
    });
  }

  createDir(target: string): Promise<FileAction> {
    return this.run("mkdir", target, undefined, async (dir) => {
      await fs.mkdir(dir, { recursive: true });
      return { kind: "created" };
    });
  }

  /** Move a file into <archiveRoot>/<timestamp>/<name> */
  archive(target: string): Promise<FileAction> {
    return this.archiveInto(target, this.archiveRoot);
  }

  /** Move a file into <archiveRoot>/<subdir>/<timestamp>/<name> */
  archiveTo(target: string, subdir: string): Promise<FileAction> {
    const cleaned = subdir.replace(/\.\.+/g, "").replace(/^[/\\]+/, "");
    return this.archiveInto(target, path.join(this.archiveRoot, cleaned));
  }

  // ============== Private ==============

  private archiveInto(target: string, base: string): Promise<FileAction> {
    return this.run("archive", target, undefined, async (source) => {
      await requireExisting(source);
      const archived = path.join(base, archiveTimestamp(this.now()), path.basename(source) || "unknown");
      if (await pathExists(archived)) {
        throw new CoreError("ExecutorFailed", `Archive target already exists: ${archived}`);
      }
      await fs.mkdir(path.dirname(archived), { recursive: true });
      await fs.rename(source, archived);
      return { kind: "archived", to: archived };
    });
  }

  private resolveAllowed(target: string): string {
    if (!isPathAllowed(target, this.allowList, this.gate)) {
      throw new CoreError("ToolBlocked", `path ${target} not in allow-list`);
    }
    return canonicalizePath(target, this.gate);
  }

  private async run(
    operation: FileOperation,
    target: string,
    destination: string | undefined,
    action: (file: string, dest?: string) => Promise<FileAction>,
  ): Promise<FileAction> {
    try {
      const file = this.resolveAllowed(target);
      const dest = destination !== undefined ? this.resolveAllowed(destination) : undefined;
      const result = await action(file, dest);
      const recordedTarget = result.kind === "archived" ? result.to : dest;
      await this.audit({ kind: "file_op", operation, path: file, target: recordedTarget, success: true });
      return result;
    } catch (err) {
      await this.audit({
        kind: "file_op",
        operation,
        path: target,
        target: destination,
        success: false,
        error: describeError(err),
      });
      if (isCoreError(err)) throw err;
      throw new CoreError("ExecutorFailed", `Failed to ${operation} ${target}: ${describeError(err)}`, { cause: err });
    }
  }

  private async audit(event: AuditEvent): Promise<void> {
    if (this.auditor) await this.auditor.log(event);
  }
}

async function pathExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

async function requireExisting(file: string): Promise<void> {
  if (!(await pathExists(file))) {
    throw new CoreError("ExecutorFailed", `Source does not exist: ${file}`);
  }
}
