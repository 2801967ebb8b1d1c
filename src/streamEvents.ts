import { WebSocket, type RawData } from "ws";
import { errorMessage } from "./lib/errors.js";
import type { SessionCoordinator } from "./services/sessionCoordinator.js";
import type { IceCandidate, StreamEventMessage, StreamStatus } from "./types.js";

/** The slice of a `ws` connection the hub talks to. */
export interface EventClient {
  readonly readyState: number;
  send(data: string): void;
  ping(): void;
  terminate(): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData) => void): unknown;
  on(event: "pong", listener: () => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export const EVENTS_HEARTBEAT_INTERVAL_MS = 30_000;

const TRICKLE_STATES: readonly StreamStatus[] = ["ACTIVE", "DEGRADED"];

/**
 * StreamEvents
 *
 * Pushes status changes and trickled local ICE candidates to viewers over the
 * /stream/events WebSocket. Candidates generated before the answer goes out
 * travel inside the answer; only those that arrive afterwards are pushed, and
 * pushing drains them so a polling viewer does not see them twice.
 *
 * Dead connections are found with ws-level pings and terminated.
 */
export class StreamEvents {
  private readonly clients = new Map<EventClient, { alive: boolean }>();
  private heartbeat: ReturnType<typeof setInterval> | null = null;

  private readonly onStatus = ({ sessionId, status }: { sessionId: string; status: StreamStatus }) => {
    this.broadcast({ type: "status", sessionId, status });
  };

  private readonly onCandidate = ({ sessionId }: { sessionId: string; candidate: IceCandidate }) => {
    if (this.clients.size === 0 || !TRICKLE_STATES.includes(this.coordinator.status())) return;
    for (const candidate of this.coordinator.drainOutboundIce()) {
      this.broadcast({ type: "ice-candidate", sessionId, candidate });
    }
  };

  constructor(
    private readonly coordinator: SessionCoordinator,
    private readonly heartbeatIntervalMs = EVENTS_HEARTBEAT_INTERVAL_MS,
  ) {
    coordinator.on("status", this.onStatus);
    coordinator.on("ice-candidate", this.onCandidate);
  }

  get connections(): number {
    return this.clients.size;
  }

  attach(client: EventClient, remoteAddress = "unknown"): void {
    this.clients.set(client, { alive: true });
    this.startHeartbeat();
    console.log(`[events] viewer connected from ${remoteAddress} (${this.clients.size} open)`);

    const session = this.coordinator.describe();
    this.send(client, { type: "status", sessionId: session?.id, status: this.coordinator.status() });

    client.on("message", (data) => this.handleMessage(client, data));

    client.on("pong", () => {
      const entry = this.clients.get(client);
      if (entry) entry.alive = true;
    });

    client.on("close", () => {
      this.clients.delete(client);
      console.log(`[events] viewer from ${remoteAddress} disconnected (${this.clients.size} open)`);
      if (this.clients.size === 0) this.stopHeartbeat();
    });

    client.on("error", (error) => {
      console.error("[events] WebSocket error:", error.message);
    });
  }

  close(): void {
    this.stopHeartbeat();
    this.coordinator.off("status", this.onStatus);
    this.coordinator.off("ice-candidate", this.onCandidate);

    this.clients.forEach((_entry, client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.close(1000, "Server shutting down");
      }
    });
    this.clients.clear();
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private handleMessage(client: EventClient, data: RawData): void {
    let type: unknown;
    try {
      const message: unknown = JSON.parse(data.toString());
      type = typeof message === "object" && message !== null && "type" in message ? message.type : undefined;
    } catch (error) {
      console.warn("[events] failed to parse message:", errorMessage(error));
      this.send(client, { type: "error", error: "Invalid message format" });
      return;
    }

    switch (type) {
      case "ping":
        this.send(client, { type: "pong" });
        break;
      default:
        this.send(client, { type: "error", error: `Unknown message type: ${String(type)}` });
    }
  }

  private broadcast(message: StreamEventMessage): void {
    this.clients.forEach((_entry, client) => this.send(client, message));
  }

  private send(client: EventClient, message: StreamEventMessage): void {
    if (client.readyState !== WebSocket.OPEN) return;
    try {
      client.send(JSON.stringify(message));
    } catch (error) {
      console.warn("[events] send failed:", errorMessage(error));
    }
  }

  private startHeartbeat(): void {
    if (this.heartbeat) return;
    this.heartbeat = setInterval(() => {
      this.clients.forEach((entry, client) => {
        if (!entry.alive) {
          console.log("[events] terminating unresponsive viewer");
          this.clients.delete(client);
          client.terminate();
          return;
        }
        entry.alive = false;
        client.ping();
      });
      if (this.clients.size === 0) this.stopHeartbeat();
    }, this.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (!this.heartbeat) return;
    clearInterval(this.heartbeat);
    this.heartbeat = null;
  }
}
