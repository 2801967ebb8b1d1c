import { BLANK_FRAME, type CaptureDevice, type Frame, type FrameSink } from "../engine/types.js";
import { errorMessage } from "../lib/errors.js";

export type CaptureHealth = "healthy" | "reconnecting" | "degraded";

/** Watchdog bookkeeping for the upstream source. */
export interface CaptureSource {
  url: string;
  consecutiveFailures: number;
  /** Epoch ms of the next reconnect attempt, null when not backing off. */
  backoffDeadline: number | null;
}

export interface WatchdogOptions {
  /** Consecutive read failures that trigger a reconnect. */
  failureThreshold: number;
  /** Failed reconnect attempts after which health turns degraded. */
  maxReconnectAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Pull cadence, frames per second. */
  frameRate: number;
}

export const DEFAULT_WATCHDOG_OPTIONS: WatchdogOptions = {
  failureThreshold: 3,
  maxReconnectAttempts: 10,
  backoffBaseMs: 1_000,
  backoffMaxMs: 30_000,
  frameRate: 15,
};

type WatchdogEvent = "health" | "reconnecting" | "reconnected";
type WatchdogHandler = (detail: { health: CaptureHealth; attempt: number }) => void;

/**
 * CaptureWatchdog
 *
 * Pulls the capture device once per frame interval and pushes what it gets
 * downstream. The pull never waits on the source: a failed read, or any tick
 * while a reconnect is pending, sends a placeholder (the last good frame, or a
 * blank one) so downstream timing stays steady.
 *
 * After `failureThreshold` consecutive failures the device is released and
 * reacquired on an exponential backoff (base, 2×base, 4×base … capped). Once
 * `maxReconnectAttempts` attempts have failed, health reports "degraded" and
 * retries continue at the capped delay; the first successful reopen restores
 * "healthy".
 */
export class CaptureWatchdog {
  private readonly options: WatchdogOptions;
  private readonly source: CaptureSource;

  private phase: "idle" | "streaming" | "reconnecting" | "stopped" = "idle";
  private health: CaptureHealth = "healthy";
  private lastGood: Frame | null = null;
  private reconnectAttempts = 0;
  private placeholders = 0;

  private ticker: ReturnType<typeof setInterval> | null = null;
  private backoffTimer: ReturnType<typeof setTimeout> | null = null;

  private eventHandlers: Map<WatchdogEvent, Set<WatchdogHandler>> = new Map();

  constructor(
    private readonly device: CaptureDevice,
    private readonly sink: FrameSink,
    url: string,
    options: Partial<WatchdogOptions> = {},
  ) {
    this.options = { ...DEFAULT_WATCHDOG_OPTIONS, ...options };
    this.source = { url, consecutiveFailures: 0, backoffDeadline: null };
  }

  // =========================================================================
  // Public API
  // =========================================================================

  /** Begins pulling. The device is expected to be open already. */
  start(): void {
    if (this.phase !== "idle") return;
    this.phase = "streaming";
    const intervalMs = Math.max(1, Math.round(1_000 / this.options.frameRate));
    this.ticker = setInterval(() => this.tick(), intervalMs);
  }

  stop(): void {
    if (this.phase === "stopped") return;
    const wasReconnecting = this.phase === "reconnecting";
    this.phase = "stopped";

    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
    if (this.backoffTimer) {
      clearTimeout(this.backoffTimer);
      this.backoffTimer = null;
    }
    // While reconnecting the device is already released.
    if (!wasReconnecting) this.closeDevice();
    this.eventHandlers.clear();
  }

  get currentHealth(): CaptureHealth {
    return this.health;
  }

  /** Placeholder frames emitted since start. */
  get placeholderCount(): number {
    return this.placeholders;
  }

  snapshot(): CaptureSource {
    return { ...this.source };
  }

  /** Delay before reconnect attempt `attempt` (0-based). */
  backoffDelay(attempt: number): number {
    const { backoffBaseMs, backoffMaxMs } = this.options;
    return Math.min(backoffBaseMs * 2 ** attempt, backoffMaxMs);
  }

  on(event: WatchdogEvent, handler: WatchdogHandler): void {
    if (!this.eventHandlers.has(event)) {
      this.eventHandlers.set(event, new Set());
    }
    this.eventHandlers.get(event)?.add(handler);
  }

  off(event: WatchdogEvent, handler: WatchdogHandler): void {
    this.eventHandlers.get(event)?.delete(handler);
  }

  // =========================================================================
  // Pull cadence
  // =========================================================================

  private tick(): void {
    if (this.phase === "reconnecting") {
      this.emitPlaceholder();
      return;
    }
    if (this.phase !== "streaming") return;

    let frame: Frame | null;
    try {
      frame = this.device.read();
    } catch (error) {
      this.onReadFailure(error);
      return;
    }

    if (!frame) return;
    this.source.consecutiveFailures = 0;
    this.lastGood = frame;
    this.deliver(frame);
  }

  private onReadFailure(error: unknown): void {
    this.source.consecutiveFailures++;
    const failures = this.source.consecutiveFailures;
    console.warn(
      `[watchdog] capture read failed (${failures}/${this.options.failureThreshold}): ${errorMessage(error)}`,
    );
    this.emitPlaceholder();

    if (failures >= this.options.failureThreshold) {
      this.beginReconnect();
    }
  }

  private emitPlaceholder(): void {
    const base = this.lastGood ?? BLANK_FRAME;
    this.placeholders++;
    this.deliver({ chunks: base.chunks, capturedAt: Date.now(), placeholder: true });
  }

  private deliver(frame: Frame): void {
    try {
      this.sink.push(frame);
    } catch (error) {
      console.error("[watchdog] frame sink rejected a frame:", errorMessage(error));
    }
  }

  // =========================================================================
  // Reconnect
  // =========================================================================

  private beginReconnect(): void {
    this.phase = "reconnecting";
    this.closeDevice();
    if (this.health === "healthy") this.setHealth("reconnecting");
    this.emit("reconnecting");
    this.scheduleAttempt();
  }

  private scheduleAttempt(): void {
    const delay = this.backoffDelay(this.reconnectAttempts);
    this.source.backoffDeadline = Date.now() + delay;
    console.log(
      `[watchdog] reconnect attempt ${this.reconnectAttempts + 1} to ${this.source.url} in ${delay}ms`,
    );

    this.backoffTimer = setTimeout(() => {
      this.backoffTimer = null;
      void this.attemptReconnect();
    }, delay);
  }

  private async attemptReconnect(): Promise<void> {
    if (this.phase !== "reconnecting") return;

    try {
      await this.device.open(this.source.url);
    } catch (error) {
      if (this.phase !== "reconnecting") return;
      this.reconnectAttempts++;
      console.warn(
        `[watchdog] reconnect attempt ${this.reconnectAttempts} failed: ${errorMessage(error)}`,
      );
      if (
        this.reconnectAttempts >= this.options.maxReconnectAttempts &&
        this.health !== "degraded"
      ) {
        console.error(
          `[watchdog] ⚠️ ${this.reconnectAttempts} reconnect attempts failed; capture degraded`,
        );
        this.setHealth("degraded");
      }
      this.scheduleAttempt();
      return;
    }

    // Stopped while the open was in flight: give the device straight back.
    if (this.phase !== "reconnecting") {
      this.closeDevice();
      return;
    }

    console.log(`[watchdog] ✅ capture reacquired after ${this.reconnectAttempts + 1} attempt(s)`);
    this.phase = "streaming";
    this.source.consecutiveFailures = 0;
    this.source.backoffDeadline = null;
    this.reconnectAttempts = 0;
    this.setHealth("healthy");
    this.emit("reconnected");
  }

  private closeDevice(): void {
    try {
      this.device.close();
    } catch (error) {
      console.warn("[watchdog] capture release failed:", errorMessage(error));
    }
  }

  private setHealth(health: CaptureHealth): void {
    if (this.health === health) return;
    this.health = health;
    this.emit("health");
  }

  private emit(event: WatchdogEvent): void {
    const detail = { health: this.health, attempt: this.reconnectAttempts };
    this.eventHandlers.get(event)?.forEach((handler) => {
      try {
        handler(detail);
      } catch (error) {
        console.error(`[watchdog] ${event} handler threw:`, errorMessage(error));
      }
    });
  }
}
