/**
 * Shared types for the stream bridge: session states, ICE candidates and the
 * JSON shapes exchanged over the signaling surface.
 */

/** Outcome of an operation that can fail in an expected, typed way. */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ─────────────────────────────────────────────────────────────────────────────
// Sessions
// ─────────────────────────────────────────────────────────────────────────────

export type SessionState =
  | "IDLE"
  | "NEGOTIATING"
  | "ACTIVE"
  | "CLOSING"
  | "CLOSED"
  | "FAILED";

/** What /stream/status reports: a session state, or DEGRADED for an active
 * session whose capture source has exhausted its reconnect budget. */
export type StreamStatus = SessionState | "DEGRADED";

/**
 * How a new offer is treated while another session is ACTIVE.
 *  - replace: tear the running session down, then negotiate the new one
 *  - reject:  answer the new offer with a BUSY negotiation error
 */
export type SessionPolicy = "replace" | "reject";

// ─────────────────────────────────────────────────────────────────────────────
// ICE
// ─────────────────────────────────────────────────────────────────────────────

export type IceDirection = "inbound" | "outbound";

export interface IceCandidate {
  mid: string | null;
  /** null when the sender only named the mid; resolved against the offer. */
  mlineIndex: number | null;
  candidateText: string;
  direction: IceDirection;
}

/** Browser-shaped candidate (RTCIceCandidateInit) as it travels over HTTP. */
export interface IceCandidateInit {
  candidate: string;
  sdpMid: string | null;
  sdpMLineIndex: number;
}

/** A candidate as a viewer may send it: either locator can be missing. */
export interface RemoteCandidate {
  candidate: string;
  sdpMid?: string | null;
  sdpMLineIndex?: number | null;
}

export function toCandidateInit(candidate: IceCandidate): IceCandidateInit {
  return {
    candidate: candidate.candidateText,
    sdpMid: candidate.mid,
    sdpMLineIndex: candidate.mlineIndex ?? 0,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Signaling payloads
// ─────────────────────────────────────────────────────────────────────────────

export interface LocalAnswer {
  sdp: string;
  type: "answer";
  ice: IceCandidateInit[];
}

/** Messages pushed to viewers over the /stream/events WebSocket. */
export interface StreamEventMessage {
  type: "status" | "ice-candidate" | "pong" | "error";
  sessionId?: string;
  status?: StreamStatus;
  candidate?: IceCandidateInit;
  error?: string;
}
