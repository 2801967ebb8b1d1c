#!/usr/bin/env node
import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { WebSocketServer, type WebSocket } from "ws";
import { redactUrl } from "./engine/ffmpegCapture.js";
import { WeriftMediaEngine } from "./engine/weriftEngine.js";
import { loadConfig, type StreamConfig } from "./lib/config.js";
import { ConfigError, errorMessage } from "./lib/errors.js";
import { PipelineLifecycleManager } from "./services/pipelineManager.js";
import { SessionCoordinator } from "./services/sessionCoordinator.js";
import { StreamApi } from "./streamApi.js";
import { StreamEvents } from "./streamEvents.js";

const SERVICE = "rtsp-webrtc-bridge";
const VERSION = "1.0.0";

function readConfig(): StreamConfig {
  try {
    return loadConfig();
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();

// ─────────────────────────────────────────────────────────────────────────────
// Wiring
// ─────────────────────────────────────────────────────────────────────────────

const engine = new WeriftMediaEngine({
  ffmpegPath: config.ffmpegPath,
  rtspTransport: config.capture.rtspTransport,
  latencyMs: config.capture.latencyMs,
  frameRate: config.capture.frameRate,
  stallTimeoutMs: config.capture.stallTimeoutMs,
});

const pipelines = new PipelineLifecycleManager(engine);

const coordinator = new SessionCoordinator(pipelines, {
  sourceUrl: config.rtspUrl,
  stunServer: config.stunServer,
  policy: config.sessionPolicy,
  negotiationTimeoutMs: config.negotiationTimeoutMs,
  stageTimeoutMs: config.stageTimeoutMs,
  iceBufferLimit: config.iceBufferLimit,
  watchdog: {
    failureThreshold: config.capture.failureThreshold,
    maxReconnectAttempts: config.capture.maxReconnectAttempts,
    backoffBaseMs: config.capture.backoffBaseMs,
    backoffMaxMs: config.capture.backoffMaxMs,
    frameRate: config.capture.frameRate,
  },
});

const api = new StreamApi(coordinator, pipelines, {
  allowedOrigins: config.allowedOrigins,
  service: SERVICE,
  version: VERSION,
  environment: config.nodeEnv,
});

const events = new StreamEvents(coordinator);

// ─────────────────────────────────────────────────────────────────────────────
// Servers
// ─────────────────────────────────────────────────────────────────────────────

const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
  if (api.handle(req, res)) return;

  res.writeHead(404, { "Content-Type": "text/plain" });
  res.end("Not Found");
});

const wss = new WebSocketServer({
  server: httpServer,
  path: "/stream/events",
  perMessageDeflate: false,
  clientTracking: true,
});

wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
  events.attach(ws, req.socket.remoteAddress);
});

httpServer.listen(config.port, config.host, () => {
  console.log(`🚀 RTSP → WebRTC bridge started`);
  console.log(`📡 Environment: ${config.nodeEnv}`);
  console.log(`🎥 Source: ${redactUrl(config.rtspUrl)}`);
  console.log(`🧊 STUN: ${config.stunServer}`);
  console.log(`🔌 Port: ${config.port}`);
  console.log(`🔁 Session policy: ${config.sessionPolicy}`);
  console.log(`🏥 Health check: http://localhost:${config.port}/health`);
  console.log(`✅ Events channel ready on ws://localhost:${config.port}/stream/events`);
  console.log(`🌐 Listening on ${config.host}`);
});

// ─────────────────────────────────────────────────────────────────────────────
// Shutdown
// ─────────────────────────────────────────────────────────────────────────────

let shuttingDown = false;

const shutdown = () => {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log("\n🛑 Shutting down bridge...");

  setTimeout(() => {
    console.error("⚠️ Forced shutdown after timeout");
    process.exit(1);
  }, config.shutdownGraceMs).unref();

  events.close();
  api.close();

  wss.close(() => {
    console.log("✅ WebSocket server closed");
  });

  (async () => {
    console.log("📊 Stopping active session...");
    await coordinator.shutdown();
    const clean = await pipelines.shutdown(config.shutdownGraceMs);
    if (!clean) {
      console.warn(`⚠️ ${pipelines.outstandingHandles()} pipeline(s) still held after shutdown`);
    }
  })()
    .catch((error: unknown) => {
      console.error("❌ Session shutdown failed:", errorMessage(error));
    })
    .finally(() => {
      httpServer.close(() => {
        console.log("✅ HTTP server closed gracefully");
        process.exit(0);
      });
      httpServer.closeAllConnections();
    });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

process.on("uncaughtException", (error: Error) => {
  console.error("❌ Uncaught Exception:", error);
  shutdown();
});

process.on("unhandledRejection", (reason: unknown, promise: Promise<unknown>) => {
  console.error("❌ Unhandled Rejection at:", promise, "reason:", reason);
});

console.log("✅ Signal handlers registered");
