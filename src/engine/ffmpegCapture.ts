import { createSocket, type Socket } from "node:dgram";
import type { EventEmitter } from "node:events";
import ffmpeg from "fluent-ffmpeg";
import { RtpPacket } from "werift";
import { CaptureError, errorMessage } from "../lib/errors.js";
import type { CaptureDevice, Frame } from "./types.js";

// ─────────────────────────────────────────────────────────────────────────────
// Transcoder process
// ─────────────────────────────────────────────────────────────────────────────

/** The slice of a fluent-ffmpeg command the capture drives. */
export interface TranscoderProcess extends EventEmitter {
  run(): void;
  kill(signal: NodeJS.Signals): void;
}

export interface TranscodeOptions {
  ffmpegPath: string;
  rtspTransport: "tcp" | "udp";
  latencyMs: number;
  frameRate: number;
  /** Encoder/packetizer arguments contributed by the graph's stages. */
  encoderArgs: string[];
}

export type TranscoderFactory = (url: string, target: string, options: TranscodeOptions) => TranscoderProcess;

/**
 * RTSP in, H.264 RTP out to a local port: depacketize, decode, scale to
 * yuv420p, encode with x264, packetize.
 */
export const spawnFfmpeg: TranscoderFactory = (url, target, options) => {
  return ffmpeg(url)
    .setFfmpegPath(options.ffmpegPath)
    .inputOptions([
      "-rtsp_transport", options.rtspTransport,
      "-fflags", "nobuffer",
      "-flags", "low_delay",
      "-max_delay", String(options.latencyMs * 1_000),
    ])
    .noAudio()
    .videoCodec("libx264")
    .outputOptions([
      "-preset", "ultrafast",
      "-profile:v", "baseline",
      "-pix_fmt", "yuv420p",
      "-r", String(options.frameRate),
      "-g", String(options.frameRate * 2),
      ...options.encoderArgs,
      "-payload_type", "96",
      "-f", "rtp",
    ])
    .output(target);
};

// ─────────────────────────────────────────────────────────────────────────────
// RTP receiver
// ─────────────────────────────────────────────────────────────────────────────

/** Where the transcoder's RTP output lands. */
export interface RtpReceiver {
  readonly port: number;
  onPacket(listener: (packet: Buffer) => void): void;
  close(): void;
}

class UdpRtpReceiver implements RtpReceiver {
  constructor(private readonly socket: Socket) {}

  get port(): number {
    return this.socket.address().port;
  }

  onPacket(listener: (packet: Buffer) => void): void {
    this.socket.on("message", listener);
  }

  close(): void {
    this.socket.close();
  }
}

/** Binds an ephemeral loopback UDP port. */
export function bindUdpReceiver(): Promise<RtpReceiver> {
  return new Promise((resolve, reject) => {
    const socket = createSocket("udp4");
    socket.once("error", reject);
    socket.bind(0, "127.0.0.1", () => {
      socket.off("error", reject);
      socket.on("error", (error) => {
        console.warn("[capture] RTP socket error:", error.message);
      });
      resolve(new UdpRtpReceiver(socket));
    });
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Frame assembly
// ─────────────────────────────────────────────────────────────────────────────

const RTP_HEADER_BYTES = 12;
const MAX_PACKETS_PER_FRAME = 1_024;

/**
 * Groups RTP packets into access units. The marker bit closes a unit; the
 * completed units queue FIFO up to `maxFrames`, oldest dropped first.
 */
export class RtpFrameAssembler {
  private pending: Buffer[] = [];
  private frames: Frame[] = [];
  private droppedFrames = 0;

  constructor(private readonly maxFrames: number) {}

  get queued(): number {
    return this.frames.length;
  }

  get dropped(): number {
    return this.droppedFrames;
  }

  /** Returns true when the packet completed a frame. */
  push(packet: Buffer, now = Date.now()): boolean {
    if (packet.length < RTP_HEADER_BYTES || packet.readUInt8(0) >> 6 !== 2) {
      return false;
    }

    const { header } = RtpPacket.deSerialize(packet);
    this.pending.push(packet);

    if (!header.marker) {
      if (this.pending.length > MAX_PACKETS_PER_FRAME) {
        this.pending = [];
        this.droppedFrames++;
      }
      return false;
    }

    this.frames.push({ chunks: this.pending, capturedAt: now, placeholder: false });
    this.pending = [];
    while (this.frames.length > this.maxFrames) {
      this.frames.shift();
      this.droppedFrames++;
    }
    return true;
  }

  shift(): Frame | null {
    return this.frames.shift() ?? null;
  }

  reset(): void {
    this.pending = [];
    this.frames = [];
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Capture device
// ─────────────────────────────────────────────────────────────────────────────

export interface FfmpegCaptureOptions extends Omit<TranscodeOptions, "encoderArgs"> {
  /** No RTP for this long counts as a failed read. */
  stallTimeoutMs: number;
  /** How long open() waits for the source's stream information. */
  openTimeoutMs?: number;
  maxQueuedFrames?: number;
  factory?: TranscoderFactory;
  receiver?: () => Promise<RtpReceiver>;
}

export const DEFAULT_OPEN_TIMEOUT_MS = 10_000;

type CaptureEvent = "source-ready" | "output-ready";

/** Hides credentials embedded in an RTSP URL. */
export function redactUrl(text: string): string {
  return text.replace(/(rtsps?:\/\/)[^@\s/]+@/gi, "$1***@");
}

/**
 * FfmpegCapture
 *
 * The capture resource behind a werift graph: an ffmpeg child process pulling
 * the RTSP source and a loopback UDP port collecting its RTP output.
 *
 * open() resolves once ffmpeg reports the source's stream information and
 * rejects when ffmpeg fails first. read() never blocks: it hands out the
 * oldest assembled frame, returns null between frames, and throws
 * CaptureError once ffmpeg has exited or the RTP flow has stalled.
 */
export class FfmpegCapture implements CaptureDevice {
  private process: TranscoderProcess | null = null;
  private receiver: RtpReceiver | null = null;
  private readonly assembler: RtpFrameAssembler;
  private encoderArgs: string[] = [];

  private openedAt = 0;
  private lastPacketAt = 0;
  private exitReason: string | null = null;
  private generation = 0;

  private eventHandlers: Map<CaptureEvent, Set<() => void>> = new Map();

  constructor(private readonly options: FfmpegCaptureOptions) {
    this.assembler = new RtpFrameAssembler(options.maxQueuedFrames ?? options.frameRate);
  }

  get isOpen(): boolean {
    return this.process !== null;
  }

  configureEncoder(args: string[]): void {
    this.encoderArgs = [...args];
  }

  on(event: CaptureEvent, handler: () => void): void {
    if (!this.eventHandlers.has(event)) {
      this.eventHandlers.set(event, new Set());
    }
    this.eventHandlers.get(event)?.add(handler);
  }

  async open(url: string): Promise<void> {
    this.close();
    const generation = ++this.generation;

    const receiver = await (this.options.receiver ?? bindUdpReceiver)();
    if (generation !== this.generation) {
      receiver.close();
      throw new CaptureError("capture was closed while opening");
    }

    this.receiver = receiver;
    this.exitReason = null;
    this.openedAt = Date.now();
    this.lastPacketAt = 0;
    receiver.onPacket((packet) => this.onPacket(generation, packet));

    const target = `rtp://127.0.0.1:${receiver.port}?pkt_size=1200`;
    const factory = this.options.factory ?? spawnFfmpeg;
    const command = factory(url, target, { ...this.options, encoderArgs: this.encoderArgs });
    this.process = command;

    try {
      await this.waitForSource(command, generation, url);
    } catch (error) {
      if (generation === this.generation) this.close();
      throw error;
    }
  }

  read(): Frame | null {
    if (!this.process) {
      throw new CaptureError("capture is not open");
    }
    if (this.exitReason !== null) {
      throw new CaptureError(`ffmpeg stopped: ${this.exitReason}`);
    }

    const frame = this.assembler.shift();
    if (frame) return frame;

    const idleMs = Date.now() - (this.lastPacketAt || this.openedAt);
    if (idleMs > this.options.stallTimeoutMs) {
      throw new CaptureError(`no RTP data for ${idleMs}ms`);
    }
    return null;
  }

  close(): void {
    this.generation++;
    const command = this.process;
    const receiver = this.receiver;
    this.process = null;
    this.receiver = null;
    this.assembler.reset();

    if (command) {
      try {
        command.kill("SIGKILL");
      } catch (error) {
        console.warn("[capture] could not kill ffmpeg:", errorMessage(error));
      }
    }
    receiver?.close();
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private waitForSource(command: TranscoderProcess, generation: number, url: string): Promise<void> {
    const timeoutMs = this.options.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS;

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (error: CaptureError | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) reject(error);
        else resolve();
      };

      const timer = setTimeout(() => {
        settle(new CaptureError(`${redactUrl(url)}: no stream information within ${timeoutMs}ms`));
      }, timeoutMs);

      command.on("start", (commandLine: string) => {
        console.log(`[capture] ffmpeg started: ${redactUrl(commandLine)}`);
      });

      command.on("codecData", (data: { video?: string }) => {
        if (generation !== this.generation) return;
        console.log(`[capture] source ready: ${data.video ?? "unknown video"}`);
        this.emit("source-ready");
        settle(null);
      });

      command.on("error", (error: Error) => {
        if (generation !== this.generation) return;
        this.exitReason = error.message;
        console.warn(`[capture] ffmpeg failed: ${redactUrl(error.message)}`);
        settle(new CaptureError(`ffmpeg failed: ${redactUrl(error.message)}`, { cause: error }));
      });

      command.on("end", () => {
        if (generation !== this.generation) return;
        this.exitReason = "source ended";
        console.warn("[capture] ffmpeg exited: source ended");
        settle(new CaptureError("ffmpeg exited before the source was ready"));
      });

      command.run();
    });
  }

  private onPacket(generation: number, packet: Buffer): void {
    if (generation !== this.generation) return;
    const first = this.lastPacketAt === 0;
    this.lastPacketAt = Date.now();
    try {
      this.assembler.push(packet, this.lastPacketAt);
    } catch (error) {
      console.warn("[capture] dropped malformed RTP packet:", errorMessage(error));
      return;
    }
    if (first) this.emit("output-ready");
  }

  private emit(event: CaptureEvent): void {
    this.eventHandlers.get(event)?.forEach((handler) => {
      try {
        handler();
      } catch (error) {
        console.error(`[capture] ${event} handler threw:`, errorMessage(error));
      }
    });
  }
}
