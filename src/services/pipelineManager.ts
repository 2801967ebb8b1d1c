import { nanoid } from "nanoid";
import { EngineContext, type WaitOptions } from "../engine/engineContext.js";
import type { EngineGraph, MediaEngine, PeerConnectionState, StageSpec } from "../engine/types.js";
import { BuildError, IceApplyError, errorMessage, toError } from "../lib/errors.js";
import { err, ok, type IceCandidate, type Result } from "../types.js";
import {
  CaptureWatchdog,
  type CaptureHealth,
  type WatchdogOptions,
} from "./captureWatchdog.js";

export type PipelineState = "NEW" | "BUILDING" | "LINKED" | "PLAYING" | "STOPPED" | "FAILED";

/**
 * Read-only view of a media graph. Sessions hold one of these; only the
 * PipelineLifecycleManager can change what is behind it.
 */
export interface PipelineHandle {
  readonly id: string;
  readonly state: PipelineState;
  readonly health: CaptureHealth;
}

export interface BuildConfig {
  stunServer: string;
  /** How long each runtime-linked stage may take to report ready. */
  stageTimeoutMs: number;
  watchdog?: Partial<WatchdogOptions>;
  /** Receives candidates the engine generates for this pipeline. */
  onLocalCandidate?: (candidate: IceCandidate) => void;
  /** Receives capture health changes for this pipeline. */
  onHealthChange?: (health: CaptureHealth) => void;
  /** Receives the peer connection's state changes for this pipeline. */
  onConnectionState?: (state: PeerConnectionState) => void;
  /** Aborting while the graph is still assembling fails the build. */
  signal?: AbortSignal;
}

/**
 * capture → depay → decode → convert → encode → packetize → transport.
 * The capture source and the decoder only expose their output once the
 * stream format is known, so those two links are made when the engine
 * reports the pad.
 */
export const PIPELINE_STAGES: readonly StageSpec[] = [
  { name: "capture", kind: "capture", dynamicOutput: true },
  { name: "depay", kind: "depay", dynamicOutput: false },
  { name: "decode", kind: "decode", dynamicOutput: true },
  { name: "convert", kind: "convert", dynamicOutput: false },
  { name: "encode", kind: "encode", dynamicOutput: false, properties: { tune: "zerolatency" } },
  { name: "packetize", kind: "packetize", dynamicOutput: false, properties: { "config-interval": 1 } },
  { name: "transport", kind: "transport", dynamicOutput: false },
];

function downstreamOf(stage: string): string {
  const index = PIPELINE_STAGES.findIndex((s) => s.name === stage);
  const next = PIPELINE_STAGES[index + 1];
  if (index < 0 || !next) throw new Error(`Stage "${stage}" has no downstream stage`);
  return next.name;
}

type LinkPhase = "waiting" | "linked";

class PipelineRecord implements PipelineHandle {
  state: PipelineState = "NEW";
  health: CaptureHealth = "healthy";
  graph: EngineGraph | null = null;
  watchdog: CaptureWatchdog | null = null;
  /** Runtime-linked stages and where their assembly stands. */
  readonly assembly = new Map<string, LinkPhase>();
  /** Set while build() waits for runtime pads. */
  cancelAssembly: ((reason: BuildError) => void) | null = null;

  constructor(
    readonly id: string,
    readonly sourceUrl: string,
    readonly config: BuildConfig,
  ) {}
}

/**
 * PipelineLifecycleManager
 *
 * Builds, links, plays and releases media graphs. Every call into the engine
 * is posted onto the EngineContext; callers get promises back and never
 * touch a graph themselves.
 */
export class PipelineLifecycleManager {
  private readonly records = new Map<string, PipelineRecord>();

  constructor(
    private readonly engine: MediaEngine,
    readonly context: EngineContext = new EngineContext(engine.name),
  ) {}

  /** Live (not yet released) handles. Zero after a clean shutdown. */
  outstandingHandles(): number {
    return this.records.size;
  }

  async build(sourceUrl: string, config: BuildConfig): Promise<Result<PipelineHandle, BuildError>> {
    const record = new PipelineRecord(`pl_${nanoid(10)}`, sourceUrl, config);
    this.records.set(record.id, record);
    record.state = "BUILDING";
    console.log(`[pipeline] ${record.id}: building for ${sourceUrl}`);

    let resolveAssembly: (result: BuildError | null) => void = () => undefined;
    const assembled = new Promise<BuildError | null>((resolve) => {
      resolveAssembly = resolve;
    });
    const stageTimers = new Map<string, ReturnType<typeof setTimeout>>();
    let settled = false;

    const onAbort = () => {
      settleAssembly(new BuildError("CANCELLED", `Build of ${record.id} was cancelled`));
    };

    const settleAssembly = (failure: BuildError | null) => {
      settled = true;
      for (const timer of stageTimers.values()) clearTimeout(timer);
      stageTimers.clear();
      record.cancelAssembly = null;
      config.signal?.removeEventListener("abort", onAbort);
      resolveAssembly(failure);
    };

    record.cancelAssembly = settleAssembly;
    if (config.signal?.aborted) {
      onAbort();
    } else {
      config.signal?.addEventListener("abort", onAbort, { once: true });
    }

    const onPadAdded = this.context.guard("pad-added", (stage: string) => {
      const phase = record.assembly.get(stage);
      if (phase !== "waiting" || !record.graph) {
        console.log(`[pipeline] ${record.id}: ignoring pad-added from "${stage}"`);
        return;
      }

      const downstream = downstreamOf(stage);
      try {
        record.graph.link(stage, downstream);
      } catch (error) {
        settleAssembly(
          new BuildError("LINK_FAILED", `Could not link ${stage} → ${downstream}: ${errorMessage(error)}`),
        );
        return;
      }

      record.assembly.set(stage, "linked");
      clearTimeout(stageTimers.get(stage));
      stageTimers.delete(stage);
      console.log(`[pipeline] ${record.id}: linked ${stage} → ${downstream}`);

      if ([...record.assembly.values()].every((p) => p === "linked")) {
        settleAssembly(null);
      }
    });

    try {
      await this.context.run(`build ${record.id}`, () => {
        const graph = this.engine.createGraph(record.id, {
          sourceUrl,
          stunServer: config.stunServer,
        });
        if (!this.records.has(record.id)) {
          graph.dispose();
          throw new BuildError("CANCELLED", `Pipeline ${record.id} was released before its graph was created`);
        }
        record.graph = graph;

        graph.onPadAdded(onPadAdded);
        graph.onIceCandidate(
          this.context.guard("ice-candidate", (mlineIndex: number, mid: string | null, candidate: string) => {
            config.onLocalCandidate?.({
              mid,
              mlineIndex,
              candidateText: candidate,
              direction: "outbound",
            });
          }),
        );
        graph.onConnectionState(
          this.context.guard("connection-state", (state: PeerConnectionState) => {
            config.onConnectionState?.(state);
          }),
        );

        for (const stage of PIPELINE_STAGES) {
          graph.addStage(stage);
        }

        // Static links, made now: anything downstream of a dynamic stage up to
        // the next dynamic stage.
        for (let i = 0; i < PIPELINE_STAGES.length - 1; i++) {
          const stage = PIPELINE_STAGES[i];
          const next = PIPELINE_STAGES[i + 1];
          if (!stage || !next) continue;
          if (stage.dynamicOutput) {
            record.assembly.set(stage.name, "waiting");
          } else {
            try {
              graph.link(stage.name, next.name);
            } catch (error) {
              throw new BuildError(
                "LINK_FAILED",
                `Could not link ${stage.name} → ${next.name}: ${errorMessage(error)}`,
              );
            }
          }
        }

        for (const stage of record.assembly.keys()) {
          if (settled) break;
          stageTimers.set(
            stage,
            setTimeout(() => {
              const missing = [...record.assembly.entries()]
                .filter(([, phase]) => phase === "waiting")
                .map(([name]) => name);
              settleAssembly(
                new BuildError(
                  "INCOMPLETE_GRAPH",
                  `Stage(s) never reported ready within ${config.stageTimeoutMs}ms: ${missing.join(", ")}`,
                  missing,
                ),
              );
            }, config.stageTimeoutMs),
          );
        }

        // Prerolling makes the capture source connect, which is what brings
        // the runtime pads up.
        graph.setState("PAUSED");
      });
    } catch (error) {
      settleAssembly(null);
      const failure =
        error instanceof BuildError
          ? error
          : new BuildError("ENGINE_FAULT", `Engine failed while building: ${errorMessage(error)}`);
      await this.fail(record, failure);
      return err(failure);
    }

    const failure = await assembled;
    if (failure) {
      await this.fail(record, failure);
      return err(failure);
    }

    record.state = "LINKED";
    console.log(`[pipeline] ${record.id}: graph linked`);
    return ok(record);
  }

  async setRemoteDescription(handle: PipelineHandle, sdp: string, wait: WaitOptions): Promise<void> {
    const graph = this.graphOf(handle);
    await this.context.await<void>(`set-remote-description ${handle.id}`, wait, (done) => {
      graph.setRemoteDescription(sdp, done);
    });
  }

  async createLocalAnswer(handle: PipelineHandle, wait: WaitOptions): Promise<Result<string, Error>> {
    let graph: EngineGraph;
    try {
      graph = this.graphOf(handle);
    } catch (error) {
      return err(toError(error));
    }

    try {
      const sdp = await this.context.await<string>(`create-answer ${handle.id}`, wait, (done) => {
        graph.createAnswer(done);
      });
      return ok(sdp);
    } catch (error) {
      return err(toError(error));
    }
  }

  async setState(handle: PipelineHandle, target: "PLAYING" | "STOPPED"): Promise<Result<void, Error>> {
    const record = this.records.get(handle.id);
    if (!record?.graph) {
      return err(new Error(`Pipeline ${handle.id} is not live`));
    }
    const graph = record.graph;

    try {
      await this.context.run(`set-state ${handle.id} ${target}`, () => {
        graph.setState(target === "PLAYING" ? "PLAYING" : "NULL");
      });
    } catch (error) {
      return err(toError(error));
    }

    if (target === "PLAYING") {
      record.state = "PLAYING";
      this.startWatchdog(record, graph);
    } else {
      record.watchdog?.stop();
      record.watchdog = null;
      record.state = "STOPPED";
    }
    console.log(`[pipeline] ${handle.id}: ${record.state}`);
    return ok(undefined);
  }

  async addIceCandidate(handle: PipelineHandle, candidate: IceCandidate, wait: WaitOptions): Promise<void> {
    let graph: EngineGraph;
    try {
      graph = this.graphOf(handle);
    } catch (error) {
      throw new IceApplyError(errorMessage(error), { cause: error });
    }

    try {
      await this.context.await<void>(`add-ice-candidate ${handle.id}`, wait, (done) => {
        graph.addIceCandidate(candidate.mlineIndex ?? 0, candidate.mid, candidate.candidateText, done);
      });
    } catch (error) {
      throw new IceApplyError(`Candidate rejected by ${handle.id}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /** Idempotent; a released or failed handle is a no-op. */
  async release(handle: PipelineHandle): Promise<void> {
    const record = this.records.get(handle.id);
    if (!record) return;
    this.records.delete(handle.id);

    record.cancelAssembly?.(new BuildError("CANCELLED", `Pipeline ${record.id} was released during build`));
    record.watchdog?.stop();
    record.watchdog = null;
    if (record.state !== "FAILED") record.state = "STOPPED";

    const graph = record.graph;
    record.graph = null;
    if (!graph) return;

    try {
      await this.context.run(`release ${handle.id}`, () => {
        graph.setState("NULL");
        graph.dispose();
      });
      console.log(`[pipeline] ${handle.id}: released`);
    } catch (error) {
      console.error(`[pipeline] ${handle.id}: release failed:`, errorMessage(error));
    }
  }

  /**
   * Releases every live pipeline, then runs the engine context's shutdown
   * handshake. Returns false when the context did not drain within graceMs.
   */
  async shutdown(graceMs: number): Promise<boolean> {
    const live = [...this.records.values()];
    await Promise.all(live.map((record) => this.release(record)));
    return this.context.shutdown(graceMs);
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private graphOf(handle: PipelineHandle): EngineGraph {
    const graph = this.records.get(handle.id)?.graph;
    if (!graph) throw new Error(`Pipeline ${handle.id} is not live`);
    return graph;
  }

  private startWatchdog(record: PipelineRecord, graph: EngineGraph): void {
    if (record.watchdog) return;
    const watchdog = new CaptureWatchdog(graph.capture, graph.sink, record.sourceUrl, record.config.watchdog);
    watchdog.on("health", ({ health }) => {
      record.health = health;
      record.config.onHealthChange?.(health);
    });
    record.watchdog = watchdog;
    watchdog.start();
  }

  private async fail(record: PipelineRecord, failure: BuildError): Promise<void> {
    if (failure.code === "CANCELLED") {
      console.log(`[pipeline] ${record.id}: build cancelled`);
    } else {
      console.error(`[pipeline] ${record.id}: build failed (${failure.code}): ${failure.message}`);
    }
    record.state = "FAILED";
    await this.release(record);
  }
}
