/**
 * Approval queue: commands waiting for an explicit user OK.
 *
 * One queue per mode. The turn runner only appends; the host removes entries
 * when the user approves or denies them. Entries survive across turns until
 * cleared.
 */

import type { DangerLevel } from "../safety/classifier.js";

export interface PendingCommand {
  command: string;
  level: DangerLevel;
  queuedAt: number;
}

export class ApprovalQueue {
  private items: PendingCommand[] = [];

  /** Returns false when the command is already pending */
  enqueue(command: string, level: DangerLevel): boolean {
    const trimmed = command.trim();
    if (!trimmed || this.has(trimmed)) return false;
    this.items.push({ command: trimmed, level, queuedAt: Date.now() });
    return true;
  }

  list(): readonly PendingCommand[] {
    return [...this.items];
  }

  commands(): string[] {
    return this.items.map((item) => item.command);
  }

  has(command: string): boolean {
    const trimmed = command.trim();
    return this.items.some((item) => item.command === trimmed);
  }

  /** Remove by command text or 0-based position */
  remove(target: string | number): PendingCommand | undefined {
    const index =
      typeof target === "number" ? target : this.items.findIndex((item) => item.command === target.trim());
    if (index < 0 || index >= this.items.length) return undefined;
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  clear(): number {
    const count = this.items.length;
    this.items = [];
    return count;
  }

  get size(): number {
    return this.items.length;
  }
}
