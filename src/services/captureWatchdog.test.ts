import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeCaptureDevice, RecordingSink } from "../test/fakeEngine.js";
import { CaptureWatchdog, type CaptureHealth } from "./captureWatchdog.js";

const URL = "rtsp://camera.local/stream1";

const OPTIONS = {
  failureThreshold: 3,
  maxReconnectAttempts: 10,
  backoffBaseMs: 1_000,
  backoffMaxMs: 30_000,
  frameRate: 10,
};

describe("CaptureWatchdog", () => {
  let device: FakeCaptureDevice;
  let sink: RecordingSink;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    device = new FakeCaptureDevice();
    device.opened = true;
    sink = new RecordingSink();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("forwards frames at the configured cadence while healthy", async () => {
    const watchdog = new CaptureWatchdog(device, sink, URL, OPTIONS);
    watchdog.start();

    await vi.advanceTimersByTimeAsync(500);

    expect(sink.frames).toHaveLength(5);
    expect(sink.placeholders).toHaveLength(0);
    expect(watchdog.currentHealth).toBe("healthy");
    watchdog.stop();
  });

  it("repeats the last good frame while the source is failing", async () => {
    const watchdog = new CaptureWatchdog(device, sink, URL, OPTIONS);
    watchdog.start();
    await vi.advanceTimersByTimeAsync(200);
    device.failing = true;

    await vi.advanceTimersByTimeAsync(200);

    expect(sink.frames.map((f) => f.placeholder)).toEqual([false, false, true, true]);
    expect(sink.placeholders[0]?.chunks).toEqual([Buffer.from([2])]);
    expect(watchdog.snapshot().consecutiveFailures).toBe(2);
    expect(watchdog.currentHealth).toBe("healthy");
    watchdog.stop();
  });

  it("sends blank placeholders when no frame was ever read", async () => {
    device.failing = true;
    const watchdog = new CaptureWatchdog(device, sink, URL, OPTIONS);
    watchdog.start();

    await vi.advanceTimersByTimeAsync(100);

    expect(sink.placeholders).toHaveLength(1);
    expect(sink.placeholders[0]?.chunks).toEqual([]);
    watchdog.stop();
  });

  it("reconnects on a 1s, 2s, 4s schedule after the failure threshold", async () => {
    const watchdog = new CaptureWatchdog(device, sink, URL, OPTIONS);
    const reconnected = vi.fn();
    watchdog.on("reconnected", reconnected);
    watchdog.start();
    await vi.advanceTimersByTimeAsync(200);

    device.failing = true;
    device.failOpens = 2;
    // Failures at 300, 400, 500: the third releases the device.
    await vi.advanceTimersByTimeAsync(300);
    expect(device.closeCalls).toBe(1);
    expect(watchdog.currentHealth).toBe("reconnecting");
    expect(watchdog.snapshot().backoffDeadline).toBe(1_500);

    await vi.advanceTimersByTimeAsync(7_000);

    expect(device.openCalls).toEqual([1_500, 3_500, 7_500]);
    expect(watchdog.currentHealth).toBe("healthy");
    expect(watchdog.snapshot()).toEqual({ url: URL, consecutiveFailures: 0, backoffDeadline: null });
    expect(reconnected).toHaveBeenCalledTimes(1);
    watchdog.stop();
  });

  it("keeps emitting placeholders while a reconnect is pending", async () => {
    device.failing = true;
    device.failOpens = 1;
    const watchdog = new CaptureWatchdog(device, sink, URL, OPTIONS);
    watchdog.start();

    // Three failed reads, then ticks at 400..1200 during the 1s backoff.
    await vi.advanceTimersByTimeAsync(1_250);

    expect(watchdog.placeholderCount).toBe(12);
    expect(sink.frames.every((f) => f.placeholder)).toBe(true);
    watchdog.stop();
  });

  it("reports degraded after the reconnect budget and recovers on success", async () => {
    const watchdog = new CaptureWatchdog(device, sink, URL, { ...OPTIONS, maxReconnectAttempts: 2 });
    const health: CaptureHealth[] = [];
    watchdog.on("health", (detail) => health.push(detail.health));
    watchdog.start();

    device.failing = true;
    device.failOpens = 3;
    // Reconnect starts at 300; attempts at 1300 and 3300 fail.
    await vi.advanceTimersByTimeAsync(3_300);
    expect(watchdog.currentHealth).toBe("degraded");

    // Attempt at 7300 fails, attempt at 15300 succeeds.
    await vi.advanceTimersByTimeAsync(12_000);
    expect(device.openCalls).toEqual([1_300, 3_300, 7_300, 15_300]);
    expect(health).toEqual(["reconnecting", "degraded", "healthy"]);
    watchdog.stop();
  });

  it("caps the backoff delay", () => {
    const watchdog = new CaptureWatchdog(device, sink, URL, OPTIONS);

    expect([0, 1, 2, 3, 4, 5, 6].map((attempt) => watchdog.backoffDelay(attempt))).toEqual([
      1_000, 2_000, 4_000, 8_000, 16_000, 30_000, 30_000,
    ]);
  });

  it("stops pulling and cancels a pending reconnect", async () => {
    device.failing = true;
    const watchdog = new CaptureWatchdog(device, sink, URL, OPTIONS);
    watchdog.start();
    await vi.advanceTimersByTimeAsync(300);

    watchdog.stop();
    const emitted = sink.frames.length;
    await vi.advanceTimersByTimeAsync(10_000);

    expect(device.openCalls).toEqual([]);
    expect(sink.frames).toHaveLength(emitted);
  });

  it("closes the device when stopped while streaming", () => {
    const watchdog = new CaptureWatchdog(device, sink, URL, OPTIONS);
    watchdog.start();

    watchdog.stop();

    expect(device.closeCalls).toBe(1);
  });
});
