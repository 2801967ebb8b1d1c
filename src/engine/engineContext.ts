import {
  EngineCancelledError,
  EngineTimeoutError,
  errorMessage,
  toError,
} from "../lib/errors.js";
import type { EngineCallback, EngineResult } from "./types.js";

/**
 * EngineContext
 *
 * The one execution context that owns engine mutation. Work is queued and run
 * strictly one task at a time, in submission order, on its own event-loop
 * turn. Request handlers never call the engine directly:
 *
 *  - run()     posts a task and resolves with its return value
 *  - await()   posts a task that completes later through an engine callback,
 *              bridged into a promise with a deadline and an abort signal
 *  - guard()   wraps engine callbacks so a throw inside one is logged at the
 *              callback boundary instead of escaping into the engine
 *  - shutdown() stops intake and drains the queue within a grace period
 */

interface QueuedTask {
  label: string;
  execute: () => Promise<void>;
  abandon: (reason: unknown) => void;
}

export interface WaitOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export class EngineContextClosedError extends Error {
  constructor(label: string) {
    super(`Engine context is shut down; rejected "${label}"`);
    this.name = "EngineContextClosedError";
  }
}

export class EngineContext {
  private readonly queue: QueuedTask[] = [];
  private draining = false;
  /** A task is executing; cleared before its caller is woken. */
  private busy = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly name = "engine") {}

  get pending(): number {
    return this.queue.length + (this.busy ? 1 : 0);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Tasks must not themselves await another run() on the same context. */
  run<T>(label: string, work: () => T | Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new EngineContextClosedError(label));
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        label,
        execute: async () => {
          let outcome: EngineResult<T>;
          try {
            outcome = { ok: true, value: await work() };
          } catch (error) {
            outcome = { ok: false, error: toError(error) };
          }
          this.busy = false;
          if (outcome.ok) resolve(outcome.value);
          else reject(outcome.error);
        },
        abandon: reject,
      });
      this.schedule();
    });
  }

  /**
   * Posts `start` onto the context and suspends until the engine reports
   * through the callback it is handed. Completions arriving after the
   * deadline, or after the caller aborted, are dropped.
   */
  await<T>(
    label: string,
    options: WaitOptions,
    start: (done: EngineCallback<T>) => void,
  ): Promise<T> {
    const { timeoutMs, signal } = options;

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | null = null;

      const finish = (action: () => void) => {
        if (settled) return false;
        settled = true;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        action();
        return true;
      };

      const onAbort = () => {
        finish(() => reject(new EngineCancelledError(label)));
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });

      timer = setTimeout(() => {
        finish(() => reject(new EngineTimeoutError(label, timeoutMs)));
      }, timeoutMs);

      const done = this.guard<[EngineResult<T>]>(
        `${label} completion`,
        (result) => {
          const delivered = finish(() => {
            if (result.ok) resolve(result.value);
            else reject(result.error);
          });
          if (!delivered) {
            console.warn(`[${this.name}] late completion for "${label}" ignored`);
          }
        },
      );

      this.run(label, () => start(done)).catch((error: unknown) => {
        finish(() => reject(error));
      });
    });
  }

  /** Wraps an engine-invoked callback so it can never throw into the engine. */
  guard<A extends unknown[]>(label: string, callback: (...args: A) => void): (...args: A) => void {
    return (...args: A) => {
      try {
        callback(...args);
      } catch (error) {
        console.error(`[${this.name}] callback "${label}" threw:`, errorMessage(error));
      }
    };
  }

  /**
   * Shutdown handshake: refuse new work, then wait for queued work to drain.
   * Resolves true when drained, false when the grace period ran out first.
   */
  async shutdown(graceMs: number): Promise<boolean> {
    this.closed = true;
    if (this.pending === 0) return true;

    let timer: ReturnType<typeof setTimeout> | null = null;
    const drained = new Promise<boolean>((resolve) => {
      this.idleWaiters.push(() => resolve(true));
    });
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });

    const result = await Promise.race([drained, expired]);
    if (timer) clearTimeout(timer);

    if (!result) {
      const abandoned = this.queue.splice(0);
      for (const task of abandoned) {
        task.abandon(new EngineContextClosedError(task.label));
      }
      console.warn(
        `[${this.name}] shutdown grace of ${graceMs}ms expired; abandoned ${abandoned.length} task(s)`,
      );
    }
    return result;
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private schedule(): void {
    if (this.draining) return;
    this.draining = true;
    setImmediate(() => {
      void this.drain();
    });
  }

  private async drain(): Promise<void> {
    let task = this.queue.shift();
    while (task) {
      this.busy = true;
      await task.execute();
      task = this.queue.shift();
    }

    this.draining = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const wake of waiters) wake();
  }
}
