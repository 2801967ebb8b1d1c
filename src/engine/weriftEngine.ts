import {
  MediaStreamTrack,
  RTCIceCandidate,
  RTCPeerConnection,
  RTCRtpCodecParameters,
  RTCSessionDescription,
  RtpPacket,
} from "werift";
import { errorMessage, toError } from "../lib/errors.js";
import { FfmpegCapture, type FfmpegCaptureOptions } from "./ffmpegCapture.js";
import {
  PEER_CONNECTION_STATES,
  type EngineCallback,
  type EngineGraph,
  type EngineState,
  type Frame,
  type FrameSink,
  type GraphOptions,
  type MediaEngine,
  type PeerConnectionState,
  type StageSpec,
} from "./types.js";

const H264_CODEC = {
  mimeType: "video/H264",
  clockRate: 90_000,
  payloadType: 96,
  rtcpFeedback: [{ type: "nack" }, { type: "nack", parameter: "pli" }, { type: "goog-remb" }],
  parameters: "level-asymmetry-allowed=1;packetization-mode=1;profile-level-id=42e01f",
};

/** ffmpeg arguments implied by the encode and packetize stage properties. */
export function encoderArgs(stages: Iterable<StageSpec>): string[] {
  const args: string[] = [];
  for (const stage of stages) {
    const properties = stage.properties ?? {};
    if (stage.kind === "encode" && typeof properties.tune === "string") {
      args.push("-tune", properties.tune);
    }
    // Repeat SPS/PPS with every keyframe so late joiners can decode.
    if (stage.kind === "packetize" && Number(properties["config-interval"]) > 0) {
      args.push("-bsf:v", "dump_extra");
    }
  }
  return args;
}

/**
 * Writes pulled and placeholder frames to the outgoing video track. Sequence
 * numbers and timestamps are rewritten so a repeated frame reads as a new
 * one on the wire.
 */
export class TrackSink implements FrameSink {
  track: MediaStreamTrack | null = null;
  private sequenceNumber = 0;
  private startedAt: number | null = null;

  push(frame: Frame): void {
    const track = this.track;
    if (!track || frame.chunks.length === 0) return;

    this.startedAt ??= frame.capturedAt;
    const timestamp = Math.round((frame.capturedAt - this.startedAt) * 90) >>> 0;

    for (const chunk of frame.chunks) {
      const packet = RtpPacket.deSerialize(chunk);
      packet.header.sequenceNumber = this.sequenceNumber;
      packet.header.timestamp = timestamp;
      this.sequenceNumber = (this.sequenceNumber + 1) & 0xffff;
      track.writeRtp(packet);
    }
  }
}

class WeriftGraph implements EngineGraph {
  readonly capture: FfmpegCapture;
  readonly sink = new TrackSink();

  private readonly pc: RTCPeerConnection;
  private readonly stages = new Map<string, StageSpec>();
  private readonly links = new Set<string>();
  private readonly announced = new Set<string>();
  private state: EngineState = "NULL";

  private padListeners: Array<(stage: string) => void> = [];
  private iceListeners: Array<(mlineIndex: number, mid: string | null, candidate: string) => void> = [];
  private connectionListeners: Array<(state: PeerConnectionState) => void> = [];

  constructor(
    readonly id: string,
    private readonly options: GraphOptions,
    captureOptions: FfmpegCaptureOptions,
  ) {
    this.capture = new FfmpegCapture(captureOptions);
    this.capture.on("source-ready", () => this.announce("capture"));
    this.capture.on("output-ready", () => this.announce("decode"));

    this.pc = new RTCPeerConnection({
      codecs: { video: [new RTCRtpCodecParameters(H264_CODEC)] },
      iceServers: [{ urls: options.stunServer }],
    });

    this.pc.onIceCandidate.subscribe((candidate) => {
      if (!candidate?.candidate) return;
      for (const listener of this.iceListeners) {
        listener(candidate.sdpMLineIndex ?? 0, candidate.sdpMid ?? null, candidate.candidate);
      }
    });

    this.pc.onRemoteTransceiverAdded.subscribe((transceiver) => {
      if (transceiver.kind !== "video" || this.sink.track) return;
      const track = new MediaStreamTrack({ kind: "video" });
      Promise.resolve(transceiver.sender.replaceTrack(track)).catch((error: unknown) => {
        console.error(`[werift] ${id}: could not attach video track:`, errorMessage(error));
      });
      transceiver.setDirection("sendonly");
      this.sink.track = track;
    });

    this.pc.connectionStateChange.subscribe((state) => {
      console.log(`[werift] ${id}: peer connection ${state}`);
      const known = PEER_CONNECTION_STATES.find((value) => value === state);
      if (!known) return;
      for (const listener of this.connectionListeners) listener(known);
    });
  }

  addStage(spec: StageSpec): void {
    if (this.stages.has(spec.name)) throw new Error(`Stage "${spec.name}" already exists`);
    this.stages.set(spec.name, spec);
  }

  link(upstream: string, downstream: string): void {
    if (!this.stages.has(upstream)) throw new Error(`Unknown stage "${upstream}"`);
    if (!this.stages.has(downstream)) throw new Error(`Unknown stage "${downstream}"`);
    this.links.add(`${upstream}→${downstream}`);
  }

  setState(state: EngineState): void {
    const previous = this.state;
    this.state = state;

    if (previous === "NULL" && state !== "NULL") {
      this.capture.configureEncoder(encoderArgs(this.stages.values()));
      this.capture.open(this.options.sourceUrl).catch((error: unknown) => {
        console.error(`[werift] ${this.id}: capture did not start:`, errorMessage(error));
      });
    } else if (state === "NULL" && previous !== "NULL") {
      this.capture.close();
    }
  }

  onPadAdded(listener: (stage: string) => void): void {
    this.padListeners.push(listener);
  }

  onIceCandidate(listener: (mlineIndex: number, mid: string | null, candidate: string) => void): void {
    this.iceListeners.push(listener);
  }

  onConnectionState(listener: (state: PeerConnectionState) => void): void {
    this.connectionListeners.push(listener);
  }

  setRemoteDescription(sdp: string, done: EngineCallback<void>): void {
    this.pc.setRemoteDescription(new RTCSessionDescription(sdp, "offer")).then(
      () => done({ ok: true, value: undefined }),
      (error: unknown) => done({ ok: false, error: toError(error) }),
    );
  }

  createAnswer(done: EngineCallback<string>): void {
    this.answer().then(
      (sdp) => done({ ok: true, value: sdp }),
      (error: unknown) => done({ ok: false, error: toError(error) }),
    );
  }

  addIceCandidate(mlineIndex: number, mid: string | null, candidate: string, done: EngineCallback<void>): void {
    const init = new RTCIceCandidate({ candidate, sdpMLineIndex: mlineIndex, sdpMid: mid ?? undefined });
    Promise.resolve(this.pc.addIceCandidate(init)).then(
      () => done({ ok: true, value: undefined }),
      (error: unknown) => done({ ok: false, error: toError(error) }),
    );
  }

  dispose(): void {
    this.capture.close();
    this.sink.track = null;
    this.padListeners = [];
    this.iceListeners = [];
    this.connectionListeners = [];
    Promise.resolve(this.pc.close()).catch((error: unknown) => {
      console.warn(`[werift] ${this.id}: peer connection close failed:`, errorMessage(error));
    });
  }

  private async answer(): Promise<string> {
    const answer = await this.pc.createAnswer();
    await this.pc.setLocalDescription(answer);
    return this.pc.localDescription?.sdp ?? answer.sdp;
  }

  private announce(stage: string): void {
    if (this.announced.has(stage)) return;
    this.announced.add(stage);
    for (const listener of this.padListeners) listener(stage);
  }
}

/**
 * Media engine backed by werift for the WebRTC side and an ffmpeg child
 * process for capture, decode and H.264 encode.
 */
export class WeriftMediaEngine implements MediaEngine {
  readonly name = "werift";

  constructor(private readonly capture: FfmpegCaptureOptions) {}

  createGraph(id: string, options: GraphOptions): EngineGraph {
    return new WeriftGraph(id, options, this.capture);
  }
}
