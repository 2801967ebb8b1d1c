import type { IceCandidate } from "../types.js";

/** Forwards one inbound candidate into a ready pipeline. */
export type InboundSink = (candidate: IceCandidate) => void;

export const DEFAULT_INBOUND_LIMIT = 32;

/**
 * Per-session ICE candidate queues.
 *
 * Outbound: candidates the local engine generated, waiting to be handed to the
 * viewer (in the offer response, the events channel or a poll).
 * Inbound: candidates the viewer sent before the pipeline could take them.
 *
 * Both are FIFO. The inbound buffer is bounded; on overflow the oldest entry
 * is dropped and the drop is logged.
 */
export class IceCandidateMailbox {
  private outbound: IceCandidate[] = [];
  private inbound: IceCandidate[] = [];
  private sink: InboundSink | null = null;
  private dropped = 0;

  constructor(
    private readonly label: string,
    private readonly inboundLimit = DEFAULT_INBOUND_LIMIT,
  ) {}

  get pendingOutbound(): number {
    return this.outbound.length;
  }

  get pendingInbound(): number {
    return this.inbound.length;
  }

  /** Inbound candidates discarded because the buffer was full. */
  get droppedInbound(): number {
    return this.dropped;
  }

  get isAttached(): boolean {
    return this.sink !== null;
  }

  pushOutbound(candidate: IceCandidate): void {
    this.outbound.push({ ...candidate, direction: "outbound" });
  }

  /**
   * Hands over everything pending and leaves an empty queue behind. The swap
   * is a single synchronous step, so a candidate generated concurrently lands
   * either in this batch or in the next one, never both.
   */
  drainOutbound(): IceCandidate[] {
    const batch = this.outbound;
    this.outbound = [];
    return batch;
  }

  applyInbound(candidate: IceCandidate): void {
    const entry: IceCandidate = { ...candidate, direction: "inbound" };
    if (this.sink) {
      this.sink(entry);
      return;
    }
    this.buffer(entry);
  }

  /** Connects a ready pipeline and flushes the buffered backlog in order. */
  attach(sink: InboundSink): void {
    this.sink = sink;
    const backlog = this.takeInbound();
    if (backlog.length > 0) {
      console.log(`[ice] ${this.label}: applying ${backlog.length} buffered candidate(s)`);
    }
    for (const candidate of backlog) {
      sink(candidate);
    }
  }

  detach(): void {
    this.sink = null;
  }

  /** Takes ownership of candidates that were buffered somewhere else first. */
  adopt(candidates: IceCandidate[]): void {
    for (const candidate of candidates) {
      this.applyInbound(candidate);
    }
  }

  takeInbound(): IceCandidate[] {
    const backlog = this.inbound;
    this.inbound = [];
    return backlog;
  }

  clear(): void {
    this.outbound = [];
    this.inbound = [];
    this.sink = null;
  }

  private buffer(candidate: IceCandidate): void {
    this.inbound.push(candidate);
    while (this.inbound.length > this.inboundLimit) {
      const evicted = this.inbound.shift();
      this.dropped++;
      console.warn(
        `[ice] ${this.label}: inbound buffer full (${this.inboundLimit}), dropped oldest candidate`,
        evicted?.candidateText,
      );
    }
  }
}
