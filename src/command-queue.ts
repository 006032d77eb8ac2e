/**
 * Command Queue
 *
 * Two-layer lane design:
 * - Mode Lane   (outer, maxConcurrent=1): turns for the same mode run serially, without interleaving
 * - Global Lane (inner, maxConcurrent=1): one turn at a time across all modes
 *
 * Nesting order: enqueue(modeLane, () => enqueue(GLOBAL_LANE, () => { ... }))
 * - A turn waiting on the global lane while another mode works is what the
 *   host reports as "busy"
 *
 * Lanes belong to a CommandLanes instance, one per Agent.
 */

import type { Mode } from "./session.js";

export const GLOBAL_LANE = "main";

/** `run` settles the caller's promise itself, after calling `release` */
type QueueEntry = {
  run: (release: () => void) => Promise<void>;
  enqueuedAt: number;
  onWait?: (waitMs: number, queuedAhead: number) => void;
  warnAfterMs: number;
};

type LaneState = {
  lane: string;
  active: number;
  queue: QueueEntry[];
  maxConcurrent: number;
};

export interface EnqueueOpts {
  warnAfterMs?: number;
  onWait?: (waitMs: number, queuedAhead: number) => void;
}

export interface LaneStats {
  active: number;
  queued: number;
}

export function resolveModeLane(mode: Mode): string {
  return `mode:${mode}`;
}

export class CommandLanes {
  private lanes = new Map<string, LaneState>();

  private getLaneState(lane: string): LaneState {
    const existing = this.lanes.get(lane);
    if (existing) {
      return existing;
    }
    const created: LaneState = {
      lane,
      active: 0,
      queue: [],
      maxConcurrent: 1,
    };
    this.lanes.set(lane, created);
    return created;
  }

  private drainLane(lane: string): void {
    const state = this.getLaneState(lane);

    while (state.active < state.maxConcurrent) {
      const entry = state.queue.shift();
      if (!entry) break;
      state.active += 1;

      const waitMs = Date.now() - entry.enqueuedAt;
      if (waitMs > entry.warnAfterMs && entry.onWait) {
        entry.onWait(waitMs, state.queue.length);
      }

      const release = () => {
        state.active -= 1;
        this.drainLane(lane);
      };
      void entry.run(release);
    }
  }

  setLaneConcurrency(lane: string, maxConcurrent: number): void {
    const state = this.getLaneState(lane);
    state.maxConcurrent = Math.max(1, Math.floor(maxConcurrent));
    this.drainLane(lane);
  }

  enqueue<T>(lane: string, task: () => Promise<T>, opts?: EnqueueOpts): Promise<T> {
    const state = this.getLaneState(lane);
    return new Promise<T>((resolve, reject) => {
      state.queue.push({
        run: async (release) => {
          try {
            const result = await task();
            release();
            resolve(result);
          } catch (err) {
            release();
            reject(err);
          }
        },
        enqueuedAt: Date.now(),
        warnAfterMs: opts?.warnAfterMs ?? 2_000,
        onWait: opts?.onWait,
      });
      this.drainLane(lane);
    });
  }

  stats(lane: string): LaneStats {
    const state = this.lanes.get(lane);
    return state ? { active: state.active, queued: state.queue.length } : { active: 0, queued: 0 };
  }

  /**
   * Remove an idle lane (no queue, no active tasks)
   */
  deleteLane(lane: string): boolean {
    const state = this.lanes.get(lane);
    if (!state) return false;
    if (state.active > 0 || state.queue.length > 0) return false;
    return this.lanes.delete(lane);
  }
}
