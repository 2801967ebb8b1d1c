/**
 * The media engine capability.
 *
 * The engine owns a stateful media graph and reports results through
 * callbacks. It is not safe for concurrent external mutation: every call on an
 * EngineGraph must be made from the EngineContext, never directly from a
 * request handler.
 */

export type StageKind =
  | "capture"
  | "depay"
  | "decode"
  | "convert"
  | "encode"
  | "packetize"
  | "transport";

export interface StageSpec {
  name: string;
  kind: StageKind;
  /** Output pad only appears once the format is negotiated at runtime. */
  dynamicOutput: boolean;
  properties?: Record<string, string | number | boolean>;
}

/** Engine-level graph states: NULL holds no resources, PAUSED is prerolled. */
export type EngineState = "NULL" | "PAUSED" | "PLAYING";

export type EngineResult<T> = { ok: true; value: T } | { ok: false; error: Error };

export type EngineCallback<T> = (result: EngineResult<T>) => void;

/** One encoded access unit, or a placeholder standing in for one. */
export interface Frame {
  /** Serialized RTP packets making up the unit; empty for a blank placeholder. */
  readonly chunks: readonly Buffer[];
  readonly capturedAt: number;
  readonly placeholder: boolean;
}

export const BLANK_FRAME: Frame = Object.freeze({
  chunks: Object.freeze([]),
  capturedAt: 0,
  placeholder: true,
});

/**
 * The capture resource behind the graph's capture stage. The watchdog pulls
 * from it at the frame cadence and releases/reacquires it on failure.
 */
export interface CaptureDevice {
  open(url: string): Promise<void>;
  /**
   * Next complete frame, or null when none arrived since the last read.
   * Throws CaptureError when the source has failed or stalled.
   */
  read(): Frame | null;
  close(): void;
}

/** Downstream of the capture stage: where pulled and placeholder frames go. */
export interface FrameSink {
  push(frame: Frame): void;
}

export const PEER_CONNECTION_STATES = ["new", "connecting", "connected", "disconnected", "failed", "closed"] as const;

export type PeerConnectionState = (typeof PEER_CONNECTION_STATES)[number];

export interface GraphOptions {
  sourceUrl: string;
  stunServer: string;
}

export interface EngineGraph {
  readonly id: string;
  readonly capture: CaptureDevice;
  readonly sink: FrameSink;

  addStage(spec: StageSpec): void;
  /** Throws when either stage is unknown or the pads are incompatible. */
  link(upstream: string, downstream: string): void;
  setState(state: EngineState): void;

  /** A stage's runtime-negotiated output pad appeared. */
  onPadAdded(listener: (stage: string) => void): void;
  onIceCandidate(listener: (mlineIndex: number, mid: string | null, candidate: string) => void): void;
  onConnectionState(listener: (state: PeerConnectionState) => void): void;

  setRemoteDescription(sdp: string, done: EngineCallback<void>): void;
  createAnswer(done: EngineCallback<string>): void;
  addIceCandidate(mlineIndex: number, mid: string | null, candidate: string, done: EngineCallback<void>): void;

  dispose(): void;
}

export interface MediaEngine {
  readonly name: string;
  createGraph(id: string, options: GraphOptions): EngineGraph;
}
