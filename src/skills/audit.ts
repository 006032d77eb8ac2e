/**
 * Audit log
 *
 * Durable record of skill executions, file operations, permission changes
 * and errors.
 *
 * - JSON lines in <dir>/audit.jsonl
 * - the last 1000 entries are cached in memory; queries read the cache
 * - when the file passes 10 MB it rotates: audit.jsonl → audit.1.jsonl → … → audit.5.jsonl (oldest dropped)
 * - appends and rotations go through one promise chain, so there is a single writer
 */

import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { describeError } from "../errors.js";
import { isMode, type Mode } from "../session.js";

export const AUDIT_CACHE_SIZE = 1_000;
export const AUDIT_MAX_FILE_BYTES = 10 * 1024 * 1024;
export const AUDIT_MAX_ROTATED_FILES = 5;

// ============== Entries ==============

const SkillExecEventSchema = z.object({
  kind: z.literal("skill_exec"),
  skillId: z.string(),
  mode: z.custom<Mode>((value) => typeof value === "string" && isMode(value), "unknown mode"),
  status: z.enum(["completed", "failed", "timeout", "denied"]),
  durationMs: z.number(),
  error: z.string().optional(),
});

const FileOpEventSchema = z.object({
  kind: z.literal("file_op"),
  operation: z.enum(["create", "modify", "append", "move", "copy", "mkdir", "archive"]),
  path: z.string(),
  target: z.string().optional(),
  success: z.boolean(),
  error: z.string().optional(),
});

const PermissionChangeEventSchema = z.object({
  kind: z.literal("permission_change"),
  skillId: z.string(),
  from: z.string().optional(),
  to: z.string(),
});

const ErrorEventSchema = z.object({
  kind: z.literal("error"),
  source: z.string(),
  message: z.string(),
});

export const AuditEventSchema = z.discriminatedUnion("kind", [
  SkillExecEventSchema,
  FileOpEventSchema,
  PermissionChangeEventSchema,
  ErrorEventSchema,
]);

export const AuditEntrySchema = AuditEventSchema.and(z.object({ id: z.string(), timestamp: z.string() }));

export type AuditEvent = z.infer<typeof AuditEventSchema>;

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export type AuditKind = AuditEvent["kind"];

export interface AuditFilter {
  kind?: AuditKind;
  skillId?: string;
  /** Matches file_op path or target */
  path?: string;
  /** ISO timestamp, inclusive */
  since?: string;
  limit?: number;
}

export interface AuditLoggerOptions {
  maxFileBytes?: number;
  maxRotatedFiles?: number;
  cacheSize?: number;
  onWriteError?: (message: string) => void;
}

// ============== Logger ==============

export class AuditLogger {
  readonly dir: string;
  readonly logFile: string;
  private readonly maxFileBytes: number;
  private readonly maxRotatedFiles: number;
  private readonly cacheSize: number;
  private readonly onWriteError: (message: string) => void;
  private cache: AuditEntry[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(dir: string, options: AuditLoggerOptions = {}) {
    this.dir = dir;
    this.logFile = path.join(dir, "audit.jsonl");
    this.maxFileBytes = options.maxFileBytes ?? AUDIT_MAX_FILE_BYTES;
    this.maxRotatedFiles = options.maxRotatedFiles ?? AUDIT_MAX_ROTATED_FILES;
    this.cacheSize = options.cacheSize ?? AUDIT_CACHE_SIZE;
    this.onWriteError = options.onWriteError ?? ((message) => console.warn(`[audit] ${message}`));
  }

  /** Create a logger and warm the cache from the current log file */
  static async open(dir: string, options?: AuditLoggerOptions): Promise<AuditLogger> {
    const logger = new AuditLogger(dir, options);
    await logger.loadCache();
    return logger;
  }

  /**
   * Record an entry. The cache is updated immediately; the returned promise
   * settles when the line is on disk.
   */
  log(event: AuditEvent): Promise<void> {
    const entry: AuditEntry = { ...event, id: randomUUID(), timestamp: new Date().toISOString() };
    this.cache.push(entry);
    if (this.cache.length > this.cacheSize) {
      this.cache.splice(0, this.cache.length - this.cacheSize);
    }
    this.tail = this.tail.then(() => this.write(entry));
    return this.tail;
  }

  /** Wait for every pending write */
  flush(): Promise<void> {
    return this.tail;
  }

  /** Most recent entries, newest first */
  recent(count: number): AuditEntry[] {
    return this.cache.slice(-Math.max(0, count)).reverse();
  }

  query(filter: AuditFilter = {}): AuditEntry[] {
    const matches = this.cache.filter((entry) => {
      if (filter.kind && entry.kind !== filter.kind) return false;
      if (filter.since && entry.timestamp < filter.since) return false;
      if (filter.skillId) {
        const skillId = entry.kind === "skill_exec" || entry.kind === "permission_change" ? entry.skillId : undefined;
        if (skillId !== filter.skillId) return false;
      }
      if (filter.path) {
        if (entry.kind !== "file_op") return false;
        if (entry.path !== filter.path && entry.target !== filter.path) return false;
      }
      return true;
    });
    matches.reverse();
    return filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
  }

  /** Current file plus rotated files that exist, newest first */
  async logFiles(): Promise<string[]> {
    const candidates = [this.logFile];
    for (let i = 1; i <= this.maxRotatedFiles; i++) {
      candidates.push(this.rotatedPath(i));
    }
    const existing: string[] = [];
    for (const file of candidates) {
      if (await exists(file)) existing.push(file);
    }
    return existing;
  }

  // ============== Private ==============

  private rotatedPath(index: number): string {
    return path.join(this.dir, `audit.${index}.jsonl`);
  }

  private async write(entry: AuditEntry): Promise<void> {
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await this.maybeRotate();
      await fs.appendFile(this.logFile, `${JSON.stringify(entry)}\n`, "utf-8");
    } catch (err) {
      this.onWriteError(`failed to write audit entry: ${describeError(err)}`);
    }
  }

  private async maybeRotate(): Promise<void> {
    let size: number;
    try {
      size = (await fs.stat(this.logFile)).size;
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }
    if (size < this.maxFileBytes) return;

    for (let i = this.maxRotatedFiles - 1; i >= 1; i--) {
      const from = this.rotatedPath(i);
      if (await exists(from)) {
        await fs.rename(from, this.rotatedPath(i + 1));
      }
    }
    await fs.rename(this.logFile, this.rotatedPath(1));
  }

  private async loadCache(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.logFile, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return;
      this.onWriteError(`failed to read audit log: ${describeError(err)}`);
      return;
    }
    const entries: AuditEntry[] = [];
    for (const line of content.split("\n")) {
      if (!line.trim()) continue;
      const entry = parseEntry(line);
      if (entry) entries.push(entry);
    }
    this.cache = entries.slice(-this.cacheSize);
  }
}

// ============== Helpers ==============

function parseEntry(line: string): AuditEntry | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    // Torn last line after a crash
    return undefined;
  }
  const result = AuditEntrySchema.safeParse(value);
  return result.success ? result.data : undefined;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
