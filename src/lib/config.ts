import type { SessionPolicy } from "../types.js";
import { ConfigError } from "./errors.js";

/**
 * Runtime configuration, read once from the environment at startup.
 *
 * Only RTSP_URL is required. Everything else has a default that matches a
 * single-camera LAN deployment.
 */
export interface StreamConfig {
  rtspUrl: string;
  stunServer: string;
  port: number;
  host: string;
  /** null = reflect any origin (development default). */
  allowedOrigins: string[] | null;
  sessionPolicy: SessionPolicy;
  negotiationTimeoutMs: number;
  stageTimeoutMs: number;
  iceBufferLimit: number;
  capture: CaptureConfig;
  ffmpegPath: string;
  shutdownGraceMs: number;
  nodeEnv: string;
}

export interface CaptureConfig {
  failureThreshold: number;
  maxReconnectAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  frameRate: number;
  stallTimeoutMs: number;
  rtspTransport: "tcp" | "udp";
  latencyMs: number;
}

export const DEFAULT_STUN_SERVER = "stun:stun.l.google.com:19302";

type Env = Record<string, string | undefined>;

/**
 * Some deployments write STUN servers as `stun://host:port`; ICE agents
 * expect the URI form `stun:host:port`.
 */
export function normalizeStunUri(value: string): string {
  return value.trim().replace(/^(stuns?|turns?):\/\//, "$1:");
}

export function loadConfig(env: Env = process.env): StreamConfig {
  const problems: string[] = [];
  const fields: string[] = [];

  const int = (name: string, fallback: number, min = 0): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      problems.push(`${name} must be an integer >= ${min} (got "${raw}")`);
      fields.push(name);
      return fallback;
    }
    return value;
  };

  const rtspUrl = env.RTSP_URL?.trim() ?? "";
  if (!rtspUrl) {
    problems.push("RTSP_URL is required");
    fields.push("RTSP_URL");
  } else if (!/^rtsps?:\/\//i.test(rtspUrl)) {
    problems.push(`RTSP_URL must be an rtsp:// URL (got "${rtspUrl}")`);
    fields.push("RTSP_URL");
  }

  const policyRaw = (env.SESSION_POLICY ?? "replace").trim().toLowerCase();
  let sessionPolicy: SessionPolicy = "replace";
  if (policyRaw === "replace" || policyRaw === "reject") {
    sessionPolicy = policyRaw;
  } else {
    problems.push(`SESSION_POLICY must be "replace" or "reject" (got "${policyRaw}")`);
    fields.push("SESSION_POLICY");
  }

  const transportRaw = (env.RTSP_TRANSPORT ?? "tcp").trim().toLowerCase();
  let rtspTransport: "tcp" | "udp" = "tcp";
  if (transportRaw === "tcp" || transportRaw === "udp") {
    rtspTransport = transportRaw;
  } else {
    problems.push(`RTSP_TRANSPORT must be "tcp" or "udp" (got "${transportRaw}")`);
    fields.push("RTSP_TRANSPORT");
  }

  const allowedOrigins = env.ALLOWED_ORIGINS
    ? env.ALLOWED_ORIGINS.split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    : [];

  const config: StreamConfig = {
    rtspUrl,
    stunServer: normalizeStunUri(env.STUN_SERVER || DEFAULT_STUN_SERVER),
    port: int("PORT", 8000, 1),
    host: env.HOST?.trim() || "0.0.0.0",
    allowedOrigins: allowedOrigins.length > 0 ? allowedOrigins : null,
    sessionPolicy,
    negotiationTimeoutMs: int("NEGOTIATION_TIMEOUT_MS", 10_000, 1),
    stageTimeoutMs: int("STAGE_TIMEOUT_MS", 5_000, 1),
    iceBufferLimit: int("ICE_BUFFER_LIMIT", 32, 1),
    capture: {
      failureThreshold: int("CAPTURE_FAILURE_THRESHOLD", 3, 1),
      maxReconnectAttempts: int("CAPTURE_MAX_RECONNECTS", 10, 1),
      backoffBaseMs: int("CAPTURE_BACKOFF_BASE_MS", 1_000, 1),
      backoffMaxMs: int("CAPTURE_BACKOFF_MAX_MS", 30_000, 1),
      frameRate: int("CAPTURE_FRAME_RATE", 15, 1),
      stallTimeoutMs: int("CAPTURE_STALL_TIMEOUT_MS", 3_000, 1),
      rtspTransport,
      latencyMs: int("RTSP_LATENCY_MS", 200),
    },
    ffmpegPath: env.FFMPEG_PATH?.trim() || "ffmpeg",
    shutdownGraceMs: int("SHUTDOWN_GRACE_MS", 10_000, 1),
    nodeEnv: env.NODE_ENV || "development",
  };

  if (config.capture.backoffMaxMs < config.capture.backoffBaseMs) {
    problems.push("CAPTURE_BACKOFF_MAX_MS must be >= CAPTURE_BACKOFF_BASE_MS");
    fields.push("CAPTURE_BACKOFF_MAX_MS");
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`, fields);
  }

  return config;
}
