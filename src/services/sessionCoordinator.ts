import { nanoid } from "nanoid";
import type { PeerConnectionState } from "../engine/types.js";
import { EngineCancelledError, EngineTimeoutError, NegotiationError, errorMessage } from "../lib/errors.js";
import { Mutex } from "../lib/mutex.js";
import { inspectOffer, midForMLine } from "../lib/sdp.js";
import {
  err,
  ok,
  toCandidateInit,
  type IceCandidate,
  type IceCandidateInit,
  type LocalAnswer,
  type RemoteCandidate,
  type Result,
  type SessionPolicy,
  type SessionState,
  type StreamStatus,
} from "../types.js";
import type { WatchdogOptions } from "./captureWatchdog.js";
import { DEFAULT_INBOUND_LIMIT, IceCandidateMailbox } from "./iceMailbox.js";
import type { PipelineHandle, PipelineLifecycleManager } from "./pipelineManager.js";

export interface CoordinatorOptions {
  sourceUrl: string;
  stunServer: string;
  policy: SessionPolicy;
  /** Budget for the remote-description and answer waits together. */
  negotiationTimeoutMs: number;
  stageTimeoutMs: number;
  iceBufferLimit?: number;
  watchdog?: Partial<WatchdogOptions>;
}

export interface SessionInfo {
  id: string;
  state: SessionState;
  status: StreamStatus;
  createdAt: number;
  pipelineId: string | null;
  pendingOutboundIce: number;
  pendingInboundIce: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

type CoordinatorEventMap = {
  status: { sessionId: string; status: StreamStatus };
  "ice-candidate": { sessionId: string; candidate: IceCandidate };
};

type CoordinatorEvent = keyof CoordinatorEventMap;
type CoordinatorHandler<E extends CoordinatorEvent> = (payload: CoordinatorEventMap[E]) => void;

const LIVE_STATES: readonly SessionState[] = ["NEGOTIATING", "ACTIVE"];

class Session {
  state: SessionState = "IDLE";
  readonly createdAt = Date.now();
  handle: PipelineHandle | null = null;
  remoteDescription: string | null = null;
  localDescription: string | null = null;
  /** mids of the offer's m-lines, for candidates that only name a mid. */
  offerMids: Array<string | null> = [];
  readonly lock = new Mutex();
  readonly abort = new AbortController();

  constructor(
    readonly id: string,
    readonly mailbox: IceCandidateMailbox,
  ) {}
}

/**
 * SessionCoordinator
 *
 * Owns the one viewer session this bridge serves and drives it through
 * IDLE → NEGOTIATING → ACTIVE → CLOSING → CLOSED (or FAILED).
 *
 * - Offers are serialized on a slot lock, so two offers can never both hold a
 *   pipeline. A new offer replaces or is refused by a live session depending
 *   on the configured policy.
 * - Every session operation runs under that session's own lock.
 * - stop() aborts any negotiation in flight: pending engine waits reject with
 *   CANCELLED and the stop's CLOSING → CLOSED transition wins.
 * - Candidates that arrive with no session yet are parked in a slot-level
 *   mailbox and handed to the next session that starts negotiating.
 */
export class SessionCoordinator {
  private readonly sessions = new Map<string, Session>();
  private slotSessionId: string | null = null;
  private readonly slotLock = new Mutex();
  private readonly earlyIce: IceCandidateMailbox;
  private readonly eventHandlers: { [E in CoordinatorEvent]: Set<CoordinatorHandler<E>> } = {
    status: new Set(),
    "ice-candidate": new Set(),
  };

  constructor(
    private readonly pipelines: PipelineLifecycleManager,
    private readonly options: CoordinatorOptions,
  ) {
    this.earlyIce = new IceCandidateMailbox("early", this.inboundLimit);
  }

  // =========================================================================
  // Public API
  // =========================================================================

  async handleOffer(remoteSdp: string): Promise<Result<LocalAnswer, NegotiationError>> {
    return this.slotLock.runExclusive(async () => {
      const current = this.currentSession();

      if (current && LIVE_STATES.includes(current.state)) {
        if (this.options.policy === "reject") {
          const busy = new NegotiationError("BUSY", `Session ${current.id} is already ${current.state}`);
          console.warn(`[session] offer refused: ${busy.message}`);
          return err(busy);
        }
        console.log(`[session] 🔁 new offer replaces session ${current.id}`);
      }
      if (current) await this.stopSession(current);

      const session = this.createSession();
      return session.lock.runExclusive(() => this.negotiate(session, remoteSdp));
    });
  }

  /**
   * Routes a viewer candidate to the live session, or parks it until one
   * exists. Candidates for a closing or failed session belong to its
   * negotiation and are dropped. Never fails: a candidate that cannot be
   * applied is logged.
   */
  handleIce(remote: RemoteCandidate): Result<void, never> {
    if (remote.candidate.trim() === "") {
      console.log("[ice] end-of-candidates received");
      return ok(undefined);
    }

    const candidate: IceCandidate = {
      mid: remote.sdpMid ?? null,
      mlineIndex: remote.sdpMLineIndex ?? null,
      candidateText: remote.candidate,
      direction: "inbound",
    };

    const session = this.currentSession();
    if (!session) {
      console.log("[ice] no session yet; buffering candidate for the next offer");
      this.earlyIce.applyInbound(candidate);
    } else if (session.state === "IDLE" || LIVE_STATES.includes(session.state)) {
      session.mailbox.applyInbound(candidate);
    } else {
      console.log(`[ice] session ${session.id} is ${session.state}; dropping candidate`);
    }
    return ok(undefined);
  }

  async stop(): Promise<void> {
    this.earlyIce.clear();
    const session = this.currentSession();
    if (!session) return;
    await this.stopSession(session);
  }

  status(): StreamStatus {
    const session = this.currentSession();
    return session ? this.statusOf(session) : "CLOSED";
  }

  /** Local candidates generated since the last drain, in generation order. */
  drainOutboundIce(): IceCandidateInit[] {
    const session = this.currentSession();
    if (!session) return [];
    return session.mailbox.drainOutbound().map(toCandidateInit);
  }

  describe(): SessionInfo | null {
    const session = this.currentSession();
    if (!session) return null;
    return {
      id: session.id,
      state: session.state,
      status: this.statusOf(session),
      createdAt: session.createdAt,
      pipelineId: session.handle?.id ?? null,
      pendingOutboundIce: session.mailbox.pendingOutbound,
      pendingInboundIce: session.mailbox.pendingInbound,
    };
  }

  on<E extends CoordinatorEvent>(event: E, handler: CoordinatorHandler<E>): void {
    this.eventHandlers[event].add(handler);
  }

  off<E extends CoordinatorEvent>(event: E, handler: CoordinatorHandler<E>): void {
    this.eventHandlers[event].delete(handler);
  }

  async shutdown(): Promise<void> {
    console.log("[session] shutting down");
    await this.stop();
    this.eventHandlers.status.clear();
    this.eventHandlers["ice-candidate"].clear();
  }

  // =========================================================================
  // Negotiation
  // =========================================================================

  private createSession(): Session {
    const id = nanoid(12);
    const session = new Session(id, new IceCandidateMailbox(id, this.inboundLimit));
    session.mailbox.adopt(this.earlyIce.takeInbound());
    this.sessions.set(id, session);
    this.slotSessionId = id;
    console.log(`[session] ${id}: created`);
    return session;
  }

  private async negotiate(session: Session, remoteSdp: string): Promise<Result<LocalAnswer, NegotiationError>> {
    this.transition(session, "NEGOTIATING");
    session.remoteDescription = remoteSdp;

    const summary = inspectOffer(remoteSdp);
    if (typeof summary === "string") {
      return this.failNegotiation(session, new NegotiationError("INVALID_SDP", `Invalid offer: ${summary}`));
    }
    session.offerMids = summary.mids;
    if (!summary.hasVideo) {
      console.warn(`[session] ${session.id}: offer has no video m-line`);
    }

    const signal = session.abort.signal;
    const built = await this.pipelines.build(this.options.sourceUrl, {
      stunServer: this.options.stunServer,
      stageTimeoutMs: this.options.stageTimeoutMs,
      watchdog: this.options.watchdog,
      signal,
      onLocalCandidate: (candidate) => this.onLocalCandidate(session, candidate),
      onHealthChange: () => this.emit("status", { sessionId: session.id, status: this.statusOf(session) }),
      onConnectionState: (state) => this.onPeerState(session, state),
    });
    if (!built.ok) {
      const code = built.error.code === "CANCELLED" ? "CANCELLED" : "BUILD_FAILED";
      return this.failNegotiation(
        session,
        new NegotiationError(code, `Pipeline build failed: ${built.error.message}`, { cause: built.error }),
      );
    }
    const handle = built.value;
    session.handle = handle;

    const deadline = Date.now() + this.options.negotiationTimeoutMs;
    const wait = () => ({ timeoutMs: Math.max(1, deadline - Date.now()), signal });

    let answerSdp: string;
    try {
      await this.pipelines.setRemoteDescription(handle, remoteSdp, wait());
      session.mailbox.attach((candidate) => this.forwardInbound(session, candidate));

      const answer = await this.pipelines.createLocalAnswer(handle, wait());
      if (!answer.ok) throw answer.error;
      answerSdp = answer.value;

      const playing = await this.pipelines.setState(handle, "PLAYING");
      if (!playing.ok) throw playing.error;
    } catch (error) {
      return this.failNegotiation(session, this.toNegotiationError(error));
    }

    // stop() may have landed after the last engine wait resolved.
    if (signal.aborted || session.state !== "NEGOTIATING") {
      return this.failNegotiation(session, new NegotiationError("CANCELLED", "Session was stopped during negotiation"));
    }

    session.localDescription = answerSdp;
    this.transition(session, "ACTIVE");
    const ice = session.mailbox.drainOutbound().map(toCandidateInit);
    console.log(`[session] ${session.id}: ✅ answer ready with ${ice.length} candidate(s)`);
    return ok({ sdp: answerSdp, type: "answer", ice });
  }

  private async failNegotiation(
    session: Session,
    error: NegotiationError,
  ): Promise<Result<LocalAnswer, NegotiationError>> {
    session.mailbox.detach();
    const handle = session.handle;
    session.handle = null;
    if (handle) await this.pipelines.release(handle);

    // A concurrent stop owns the terminal transition.
    if (session.state === "NEGOTIATING") {
      session.mailbox.clear();
      this.transition(session, "FAILED");
    }

    if (error.code === "CANCELLED") {
      console.log(`[session] ${session.id}: negotiation cancelled`);
    } else {
      console.error(`[session] ${session.id}: ❌ negotiation failed (${error.code}): ${error.message}`);
    }
    return err(error);
  }

  private toNegotiationError(error: unknown): NegotiationError {
    if (error instanceof NegotiationError) return error;
    if (error instanceof EngineTimeoutError) {
      return new NegotiationError("TIMEOUT", error.message, { cause: error });
    }
    if (error instanceof EngineCancelledError) {
      return new NegotiationError("CANCELLED", error.message, { cause: error });
    }
    return new NegotiationError("ENGINE_FAULT", `Engine failed during negotiation: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  // =========================================================================
  // Teardown
  // =========================================================================

  private async stopSession(session: Session): Promise<void> {
    if (session.state !== "CLOSED" && session.state !== "FAILED") {
      this.transition(session, "CLOSING");
    }
    session.abort.abort();

    await session.lock.runExclusive(async () => {
      session.mailbox.clear();
      const handle = session.handle;
      session.handle = null;
      if (handle) await this.pipelines.release(handle);
      this.transition(session, "CLOSED");
    });

    this.sessions.delete(session.id);
    if (this.slotSessionId === session.id) this.slotSessionId = null;
  }

  /** The viewer went away or its transport broke. */
  private onPeerState(session: Session, state: PeerConnectionState): void {
    if (state !== "failed" && state !== "closed") return;
    if (!LIVE_STATES.includes(session.state)) return;
    console.log(`[session] ${session.id}: peer connection ${state}; closing`);
    this.stopSession(session).catch((error: unknown) => {
      console.error(`[session] ${session.id}: teardown after peer ${state} failed:`, errorMessage(error));
    });
  }

  // =========================================================================
  // ICE plumbing
  // =========================================================================

  private onLocalCandidate(session: Session, candidate: IceCandidate): void {
    if (!LIVE_STATES.includes(session.state)) return;
    session.mailbox.pushOutbound(candidate);
    this.emit("ice-candidate", { sessionId: session.id, candidate });
  }

  private forwardInbound(session: Session, candidate: IceCandidate): void {
    const handle = session.handle;
    if (!handle) return;

    const mlineIndex = this.resolveMLine(session, candidate);
    const resolved: IceCandidate = {
      ...candidate,
      mlineIndex,
      mid: candidate.mid ?? midForMLine(session.offerMids, mlineIndex),
    };
    this.pipelines
      .addIceCandidate(handle, resolved, {
        timeoutMs: this.options.negotiationTimeoutMs,
        signal: session.abort.signal,
      })
      .catch((error: unknown) => {
        console.warn(`[ice] ${session.id}: candidate not applied: ${errorMessage(error)}`);
      });
  }

  private resolveMLine(session: Session, candidate: IceCandidate): number {
    if (candidate.mlineIndex !== null) return candidate.mlineIndex;
    const index = candidate.mid === null ? -1 : session.offerMids.indexOf(candidate.mid);
    return index >= 0 ? index : 0;
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private get inboundLimit(): number {
    return this.options.iceBufferLimit ?? DEFAULT_INBOUND_LIMIT;
  }

  private currentSession(): Session | undefined {
    return this.slotSessionId ? this.sessions.get(this.slotSessionId) : undefined;
  }

  private statusOf(session: Session): StreamStatus {
    if (session.state === "ACTIVE" && session.handle?.health === "degraded") return "DEGRADED";
    return session.state;
  }

  private transition(session: Session, next: SessionState): void {
    if (session.state === next) return;
    console.log(`[session] ${session.id}: ${session.state} → ${next}`);
    session.state = next;
    this.emit("status", { sessionId: session.id, status: this.statusOf(session) });
  }

  private emit<E extends CoordinatorEvent>(event: E, payload: CoordinatorEventMap[E]): void {
    this.eventHandlers[event].forEach((handler) => {
      try {
        handler(payload);
      } catch (error) {
        console.error(`[session] ${event} handler threw:`, errorMessage(error));
      }
    });
  }
}
