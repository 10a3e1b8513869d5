/**
 * PCM sources for impulse extraction.
 *
 * Every source yields interleaved float32 blocks, frame-aligned, at its
 * declared format. File-bound sources are decoded by `ffmpeg`; live capture
 * reads a PulseAudio/PipeWire monitor through `parec`. Decoding failures
 * surface as DecodeError from the iterator, never from `open`.
 */

import { spawn } from "child_process";
import { DecodeError, errorMessage } from "@remote-haptics/shared";

// ============================================================================
// Interfaces
// ============================================================================

export interface PcmFormat {
  sampleRate: number;
  channels: number;
}

export interface PcmStream extends AsyncIterable<Float32Array> {
  /** Stop reading; a pending iteration ends without error */
  close(): void;
}

export interface PcmSource {
  readonly format: PcmFormat;
  /** Live sources have no timeline and ignore offsets */
  readonly live: boolean;
  readonly description: string;
  open(offsetSec: number): PcmStream;
}

export const DEFAULT_PCM_FORMAT: PcmFormat = { sampleRate: 44100, channels: 2 };

// ============================================================================
// Buffered Source
// ============================================================================

/** In-memory interleaved samples */
export class BufferPcmSource implements PcmSource {
  readonly live = false;

  constructor(
    private readonly samples: Float32Array,
    readonly format: PcmFormat,
    private readonly blockFrames = 1024
  ) {}

  get description(): string {
    return `buffer frames=${this.totalFrames()}`;
  }

  private totalFrames(): number {
    return Math.floor(this.samples.length / this.format.channels);
  }

  open(offsetSec: number): PcmStream {
    const { samples, format, blockFrames } = this;
    const totalFrames = this.totalFrames();
    let closed = false;

    async function* read(): AsyncGenerator<Float32Array> {
      const startFrame = Math.round(offsetSec * format.sampleRate);
      if (!Number.isFinite(offsetSec) || offsetSec < 0 || startFrame > totalFrames) {
        throw new DecodeError(`Offset ${offsetSec}s is outside the buffer`, offsetSec);
      }
      for (let frame = startFrame; frame < totalFrames && !closed; frame += blockFrames) {
        const end = Math.min(totalFrames, frame + blockFrames);
        yield samples.slice(frame * format.channels, end * format.channels);
      }
    }

    return {
      [Symbol.asyncIterator]: read,
      close: () => {
        closed = true;
      },
    };
  }
}

// ============================================================================
// Child Process Sources
// ============================================================================

/** Turns little-endian float32 byte chunks into frame-aligned sample blocks */
export class Float32Decoder {
  private pending: Buffer = Buffer.alloc(0);
  private readonly bytesPerFrame: number;

  constructor(channels: number) {
    this.bytesPerFrame = 4 * channels;
  }

  push(chunk: Buffer): Float32Array {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const usable = data.length - (data.length % this.bytesPerFrame);
    const out = new Float32Array(usable / 4);
    for (let i = 0; i < out.length; i++) {
      out[i] = data.readFloatLE(i * 4);
    }
    this.pending = Buffer.from(data.subarray(usable));
    return out;
  }

  get pendingBytes(): number {
    return this.pending.length;
  }
}

/** Raw PCM read from a child process's stdout */
export class ProcessPcmStream implements PcmStream {
  private closed = false;
  private kill: (() => void) | null = null;

  constructor(
    private readonly command: string,
    private readonly args: string[],
    private readonly format: PcmFormat,
    private readonly offsetSec: number
  ) {}

  close(): void {
    this.closed = true;
    this.kill?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Float32Array> {
    if (this.closed) return;

    const child = spawn(this.command, this.args, { stdio: ["ignore", "pipe", "pipe"] });
    const stop = (): void => {
      if (child.exitCode === null && child.signalCode === null) child.kill("SIGTERM");
    };
    this.kill = stop;

    let stderr = "";
    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      stderr = (stderr + chunk).slice(-2000);
    });

    const exited = new Promise<{ code: number | null; error?: Error }>((resolve) => {
      child.once("error", (error) => resolve({ code: null, error }));
      child.once("close", (code) => resolve({ code }));
    });

    const decoder = new Float32Decoder(this.format.channels);
    try {
      try {
        for await (const chunk of child.stdout) {
          if (this.closed) break;
          if (!Buffer.isBuffer(chunk)) continue;
          const block = decoder.push(chunk);
          if (block.length > 0) yield block;
        }
      } catch (error) {
        if (this.closed) return;
        throw new DecodeError(`${this.command} output failed: ${errorMessage(error)}`, this.offsetSec, {
          cause: error,
        });
      }
      if (this.closed) return;

      const result = await exited;
      if (this.closed) return;
      if (result.error) {
        throw new DecodeError(`${this.command} failed to start: ${result.error.message}`, this.offsetSec, {
          cause: result.error,
        });
      }
      if (result.code !== 0) {
        const detail = stderr.trim() || "no output";
        throw new DecodeError(`${this.command} exited with code ${result.code}: ${detail}`, this.offsetSec);
      }
    } finally {
      stop();
    }
  }
}

/** Decodes a media file with ffmpeg, starting at the requested offset */
export class FfmpegPcmSource implements PcmSource {
  readonly live = false;

  constructor(
    readonly file: string,
    readonly format: PcmFormat = DEFAULT_PCM_FORMAT,
    private readonly ffmpegPath = "ffmpeg"
  ) {}

  get description(): string {
    return `ffmpeg file=${this.file}`;
  }

  open(offsetSec: number): PcmStream {
    return new ProcessPcmStream(this.ffmpegPath, ffmpegArgs(this.file, offsetSec, this.format), this.format, offsetSec);
  }
}

export function ffmpegArgs(file: string, offsetSec: number, format: PcmFormat): string[] {
  return [
    "-nostdin",
    "-hide_banner",
    "-loglevel",
    "error",
    "-ss",
    offsetSec.toFixed(3),
    "-i",
    file,
    "-vn",
    "-f",
    "f32le",
    "-acodec",
    "pcm_f32le",
    "-ac",
    String(format.channels),
    "-ar",
    String(format.sampleRate),
    "pipe:1",
  ];
}

/** Live capture of a PulseAudio/PipeWire source (usually a sink monitor) */
export class ParecPcmSource implements PcmSource {
  readonly live = true;

  constructor(
    readonly device: string | null,
    readonly format: PcmFormat = DEFAULT_PCM_FORMAT,
    private readonly parecPath = "parec"
  ) {}

  get description(): string {
    return `parec device=${this.device ?? "default"}`;
  }

  open(): PcmStream {
    return new ProcessPcmStream(this.parecPath, parecArgs(this.device, this.format), this.format, 0);
  }
}

export function parecArgs(device: string | null, format: PcmFormat): string[] {
  const args = [
    "--raw",
    "--format=float32le",
    `--rate=${format.sampleRate}`,
    `--channels=${format.channels}`,
    "--latency-msec=20",
  ];
  if (device) args.push(`--device=${device}`);
  return args;
}
