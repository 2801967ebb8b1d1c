/**
 * Stream API — HTTP signaling surface for the bridge.
 *
 * Endpoints:
 *   POST   /stream/offer           — SDP offer in, SDP answer + local ICE out
 *   POST   /stream/ice-candidate   — one remote ICE candidate
 *   POST   /stream/stop            — tear the session down (idempotent)
 *   GET    /stream/status          — current session status
 *   GET    /stream/ice-candidates  — local ICE generated since the last drain
 *   GET    /stream/heartbeat       — SSE keep-alive, a ": ping" comment every 10s
 *   GET    /log                    — always []
 *   GET    /health, /              — service snapshot
 *
 * Everything answers JSON except the heartbeat. Failures are reported as
 * `{ success: false, error }` so viewers never have to parse an HTML page.
 */

import type { IncomingHttpHeaders } from "node:http";
import { IceApplyError, NegotiationError, errorMessage } from "./lib/errors.js";
import type { PipelineLifecycleManager } from "./services/pipelineManager.js";
import type { SessionCoordinator } from "./services/sessionCoordinator.js";
import type { RemoteCandidate } from "./types.js";

// ─────────────────────────────────────────────────────────────────────────────
// Transport shapes (satisfied by node's IncomingMessage / ServerResponse)
// ─────────────────────────────────────────────────────────────────────────────

export interface StreamRequest extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  destroy(): unknown;
}

export interface StreamResponse {
  writeHead(status: number, headers: Record<string, string | number>): unknown;
  write(chunk: string): unknown;
  end(body?: string): unknown;
  on(event: "close", listener: () => void): unknown;
}

export interface StreamApiOptions {
  /** null = reflect any origin (development default). */
  allowedOrigins: string[] | null;
  service: string;
  version: string;
  environment: string;
  heartbeatIntervalMs?: number;
  maxBodyBytes?: number;
}

export const HEARTBEAT_INTERVAL_MS = 10_000;
const MAX_BODY_BYTES = 256 * 1024;

/** The request body could not be read as the route expects. */
export class RequestBodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestBodyError";
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

async function readBody(req: StreamRequest, limit: number): Promise<string> {
  let body = "";
  for await (const chunk of req) {
    body += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    if (Buffer.byteLength(body) > limit) {
      req.destroy();
      throw new RequestBodyError("Request body too large");
    }
  }
  return body;
}

async function readJsonObject(req: StreamRequest, limit: number): Promise<Record<string, unknown>> {
  const raw = await readBody(req, limit);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new RequestBodyError("Request body must be valid JSON");
  }
  if (!isRecord(parsed)) {
    throw new RequestBodyError("Request body must be a JSON object");
  }
  return parsed;
}

async function readOfferSdp(req: StreamRequest, limit: number): Promise<string> {
  const body = await readJsonObject(req, limit);
  if (typeof body.sdp !== "string") {
    throw new RequestBodyError("SDP must be a non-empty string");
  }
  if (body.type !== undefined && body.type !== "offer") {
    throw new RequestBodyError(`expected an SDP offer, got "${String(body.type)}"`);
  }
  return body.sdp;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null | undefined {
  if (value === null || value === undefined) return value;
  return typeof value === "string" ? value : undefined;
}

function optionalIndex(value: unknown): number | null | undefined {
  if (value === null || value === undefined) return value;
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : undefined;
}

/**
 * Accepts `{ candidate: { candidate, sdpMid, sdpMLineIndex } }` and, for
 * clients that post the RTCIceCandidate fields directly, the flat form.
 */
export function parseCandidate(body: Record<string, unknown>): RemoteCandidate | null {
  const source = isRecord(body.candidate) ? body.candidate : body;
  if (typeof source.candidate !== "string") return null;
  return {
    candidate: source.candidate,
    sdpMid: optionalString(source.sdpMid),
    sdpMLineIndex: optionalIndex(source.sdpMLineIndex),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// API
// ─────────────────────────────────────────────────────────────────────────────

export class StreamApi {
  private readonly heartbeats = new Set<ReturnType<typeof setInterval>>();
  private readonly startedAt = Date.now();

  constructor(
    private readonly coordinator: SessionCoordinator,
    private readonly pipelines: PipelineLifecycleManager,
    private readonly options: StreamApiOptions,
  ) {}

  get heartbeatClients(): number {
    return this.heartbeats.size;
  }

  /**
   * Routes one request. Returns false when the path is not ours, so the
   * caller can fall through to its own 404.
   */
  handle(req: StreamRequest, res: StreamResponse): boolean {
    const method = req.method ?? "GET";
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    const origin = this.getOrigin(req);

    if (method === "OPTIONS") {
      res.writeHead(204, {
        ...this.corsHeaders(origin),
        "Access-Control-Max-Age": "86400",
      });
      res.end();
      return true;
    }

    const route = `${method} ${path}`;
    switch (route) {
      case "POST /stream/offer":
        this.respond(res, origin, () => this.handleOffer(req, res, origin));
        return true;
      case "POST /stream/ice-candidate":
        this.respond(res, origin, () => this.handleIceCandidate(req, res, origin));
        return true;
      case "POST /stream/stop":
        this.respond(res, origin, async () => {
          await this.coordinator.stop();
          this.sendJSON(res, 200, { success: true }, origin);
        });
        return true;
      case "GET /stream/status":
        this.sendJSON(res, 200, { status: this.coordinator.status() }, origin);
        return true;
      case "GET /stream/ice-candidates":
        this.sendJSON(res, 200, { candidates: this.coordinator.drainOutboundIce() }, origin);
        return true;
      case "GET /stream/heartbeat":
        this.openHeartbeat(res, origin);
        return true;
      case "GET /log":
        this.sendJSON(res, 200, [], origin);
        return true;
      case "GET /":
      case "GET /health":
        this.sendJSON(res, 200, this.healthSnapshot(), origin);
        return true;
      default:
        return false;
    }
  }

  /** Ends every open heartbeat stream. */
  close(): void {
    for (const timer of this.heartbeats) clearInterval(timer);
    this.heartbeats.clear();
  }

  // ── Handlers ───────────────────────────────────────────────────────────────

  private async handleOffer(req: StreamRequest, res: StreamResponse, origin: string): Promise<void> {
    let sdp: string;
    try {
      sdp = await readOfferSdp(req, this.maxBodyBytes);
    } catch (error) {
      if (!(error instanceof RequestBodyError)) throw error;
      const invalid = new NegotiationError("INVALID_SDP", `Invalid offer: ${error.message}`, { cause: error });
      console.warn(`[stream] ⚠️ ${invalid.message}`);
      this.sendJSON(res, 500, { success: false, error: invalid.message, code: invalid.code }, origin);
      return;
    }

    console.log("[stream] 📨 offer received");
    const result = await this.coordinator.handleOffer(sdp);
    if (!result.ok) {
      this.sendJSON(res, 500, { success: false, error: result.error.message, code: result.error.code }, origin);
      return;
    }
    this.sendJSON(res, 200, result.value, origin);
  }

  /** Unusable candidates are logged and still acknowledged. */
  private async handleIceCandidate(req: StreamRequest, res: StreamResponse, origin: string): Promise<void> {
    let candidate: RemoteCandidate | null = null;
    let problem = "Request body must include a candidate";
    try {
      candidate = parseCandidate(await readJsonObject(req, this.maxBodyBytes));
    } catch (error) {
      if (!(error instanceof RequestBodyError)) throw error;
      problem = error.message;
    }

    if (candidate) {
      this.coordinator.handleIce(candidate);
    } else {
      const failure = new IceApplyError(problem);
      console.warn(`[ice] candidate ignored: ${failure.message}`);
    }
    this.sendJSON(res, 200, { success: true }, origin);
  }

  private openHeartbeat(res: StreamResponse, origin: string): void {
    res.writeHead(200, {
      ...this.corsHeaders(origin),
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(": connected\n\n");
    console.log("[stream] SSE heartbeat client connected");

    const timer = setInterval(() => {
      res.write(": ping\n\n");
    }, this.options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS);
    this.heartbeats.add(timer);

    res.on("close", () => {
      clearInterval(timer);
      this.heartbeats.delete(timer);
      console.log("[stream] SSE heartbeat client disconnected");
    });
  }

  private healthSnapshot(): Record<string, unknown> {
    return {
      status: "healthy",
      service: this.options.service,
      version: this.options.version,
      uptime: (Date.now() - this.startedAt) / 1_000,
      environment: this.options.environment,
      stream: this.coordinator.status(),
      session: this.coordinator.describe(),
      outstandingPipelines: this.pipelines.outstandingHandles(),
      heartbeatClients: this.heartbeats.size,
      timestamp: new Date().toISOString(),
    };
  }

  // ── Plumbing ───────────────────────────────────────────────────────────────

  private get maxBodyBytes(): number {
    return this.options.maxBodyBytes ?? MAX_BODY_BYTES;
  }

  /** Runs an async handler and turns anything it throws into a JSON error. */
  private respond(res: StreamResponse, origin: string, handler: () => Promise<void>): void {
    handler().catch((error: unknown) => {
      console.error("[stream] request failed:", errorMessage(error));
      this.sendError(res, 500, errorMessage(error), origin);
    });
  }

  private getOrigin(req: StreamRequest): string {
    const header = req.headers.origin;
    const requestOrigin = typeof header === "string" ? header : undefined;
    const allowed = this.options.allowedOrigins;

    if (allowed === null) {
      return requestOrigin ?? "*";
    }
    if (requestOrigin && allowed.includes(requestOrigin)) {
      return requestOrigin;
    }
    // Header present, browser still blocks the response.
    return allowed[0] ?? "*";
  }

  private corsHeaders(origin: string): Record<string, string> {
    return {
      "Access-Control-Allow-Origin": origin,
      "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
      "Access-Control-Allow-Headers": "Content-Type",
    };
  }

  private sendJSON(res: StreamResponse, status: number, body: unknown, origin: string): void {
    const json = JSON.stringify(body);
    res.writeHead(status, {
      ...this.corsHeaders(origin),
      "Content-Type": "application/json",
      "Content-Length": Buffer.byteLength(json),
      "Cache-Control": "no-store",
    });
    res.end(json);
  }

  private sendError(res: StreamResponse, status: number, message: string, origin: string): void {
    this.sendJSON(res, status, { success: false, error: message }, origin);
  }
}
