import { describe, expect, it, vi } from "vitest";
import { EngineCancelledError, EngineTimeoutError } from "../lib/errors.js";
import { EngineContext, EngineContextClosedError } from "./engineContext.js";
import type { EngineCallback } from "./types.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("EngineContext", () => {
  describe("run", () => {
    it("executes tasks one at a time in submission order", async () => {
      const context = new EngineContext("test");
      const trace: string[] = [];

      const task = (name: string, ms: number) =>
        context.run(name, async () => {
          trace.push(`${name}:start`);
          await sleep(ms);
          trace.push(`${name}:end`);
          return name;
        });

      const results = await Promise.all([task("slow", 10), task("fast", 0)]);

      expect(results).toEqual(["slow", "fast"]);
      expect(trace).toEqual(["slow:start", "slow:end", "fast:start", "fast:end"]);
    });

    it("never runs a task on the caller's turn", async () => {
      const context = new EngineContext();
      let ran = false;
      const pending = context.run("later", () => {
        ran = true;
      });

      expect(ran).toBe(false);
      await pending;
      expect(ran).toBe(true);
    });

    it("propagates a task's error and keeps draining", async () => {
      const context = new EngineContext();
      const failing = context.run("bad", () => {
        throw new Error("engine exploded");
      });
      const next = context.run("good", () => "still running");

      await expect(failing).rejects.toThrow("engine exploded");
      await expect(next).resolves.toBe("still running");
    });
  });

  describe("await", () => {
    it("resolves with the value the engine reports", async () => {
      const context = new EngineContext();
      const answer = await context.await<string>("create-answer", { timeoutMs: 100 }, (done) => {
        setTimeout(() => done({ ok: true, value: "v=0" }), 1);
      });

      expect(answer).toBe("v=0");
    });

    it("rejects with the error the engine reports", async () => {
      const context = new EngineContext();
      const pending = context.await<void>("set-remote", { timeoutMs: 100 }, (done) => {
        done({ ok: false, error: new Error("bad description") });
      });

      await expect(pending).rejects.toThrow("bad description");
    });

    it("times out and ignores a late completion", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const context = new EngineContext("test");
      let complete: EngineCallback<string> = () => undefined;

      const pending = context.await<string>("create-answer", { timeoutMs: 10 }, (done) => {
        complete = done;
      });

      await expect(pending).rejects.toThrow(EngineTimeoutError);
      await expect(pending).rejects.toThrow("create-answer did not complete within 10ms");

      complete({ ok: true, value: "too late" });
      expect(warn).toHaveBeenCalledWith('[test] late completion for "create-answer" ignored');
    });

    it("rejects as cancelled when the signal aborts", async () => {
      const context = new EngineContext();
      const controller = new AbortController();

      const pending = context.await<void>("set-remote", { timeoutMs: 1_000, signal: controller.signal }, () => {
        setTimeout(() => controller.abort(), 1);
      });

      await expect(pending).rejects.toThrow(EngineCancelledError);
      await expect(pending).rejects.toThrow("set-remote was cancelled");
    });

    it("does not start the work when the signal is already aborted", async () => {
      const context = new EngineContext();
      const controller = new AbortController();
      controller.abort();
      const start = vi.fn();

      await expect(
        context.await<void>("set-remote", { timeoutMs: 1_000, signal: controller.signal }, start),
      ).rejects.toThrow(EngineCancelledError);
      await sleep(5);
      expect(start).not.toHaveBeenCalled();
    });
  });

  describe("guard", () => {
    it("logs a throwing callback instead of letting it escape", () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
      const context = new EngineContext("test");
      const guarded = context.guard("pad-added", (stage: string) => {
        throw new Error(`no handler for ${stage}`);
      });

      expect(() => guarded("capture")).not.toThrow();
      expect(error).toHaveBeenCalledWith('[test] callback "pad-added" threw:', "no handler for capture");
    });
  });

  describe("shutdown", () => {
    it("drains queued work and then refuses new work", async () => {
      const context = new EngineContext();
      const trace: string[] = [];
      const queued = context.run("release", async () => {
        await sleep(5);
        trace.push("released");
      });

      await expect(context.shutdown(1_000)).resolves.toBe(true);
      await queued;

      expect(trace).toEqual(["released"]);
      expect(context.isClosed).toBe(true);
      await expect(context.run("late", () => undefined)).rejects.toThrow(EngineContextClosedError);
    });

    it("abandons queued work when the grace period runs out", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const context = new EngineContext();
      let unblock: () => void = () => undefined;

      const stuck = context.run(
        "stuck",
        () =>
          new Promise<void>((resolve) => {
            unblock = resolve;
          }),
      );
      const behind = context.run("behind", () => "never runs");
      await sleep(1);

      await expect(context.shutdown(10)).resolves.toBe(false);
      await expect(behind).rejects.toThrow('Engine context is shut down; rejected "behind"');
      expect(context.pending).toBe(1);

      unblock();
      await stuck;
      expect(context.pending).toBe(0);
    });

    it("resolves immediately when nothing is pending", async () => {
      const context = new EngineContext();
      await expect(context.shutdown(10)).resolves.toBe(true);
    });
  });
});
