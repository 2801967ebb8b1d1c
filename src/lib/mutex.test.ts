import { describe, expect, it } from "vitest";
import { Mutex } from "./mutex.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("Mutex", () => {
  it("runs sections one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const trace: string[] = [];

    const section = (name: string) => async () => {
      trace.push(`${name}:start`);
      await tick();
      trace.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive(section("a")),
      mutex.runExclusive(section("b")),
      mutex.runExclusive(section("c")),
    ]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(trace).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("releases the lock when a section throws", async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(mutex.isLocked).toBe(false);
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });

  it("reports whether anyone holds or waits for the lock", async () => {
    const mutex = new Mutex();
    const pending = mutex.runExclusive(tick);

    expect(mutex.isLocked).toBe(true);
    await pending;
    expect(mutex.isLocked).toBe(false);
  });
});
