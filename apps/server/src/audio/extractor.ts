/**
 * Impulse Extractor.
 *
 * Lazily turns a PCM source into time-stamped impulses. Each pass starts at a
 * media offset; `restart` abandons the current pass (including a read that is
 * still in flight) and begins a new one without waiting for the old reader.
 */

import { DecodeError, errorMessage, type ImpulseEvent } from "@remote-haptics/shared";
import { DEFAULT_DETECTOR_OPTIONS, ImpulseDetector, type DetectorOptions } from "./impulseDetector.js";
import type { PcmSource, PcmStream } from "./pcmSource.js";

export type ChannelMode = "mix" | "split";

export interface ExtractorOptions {
  channelMode: ChannelMode;
  detector: DetectorOptions;
}

export const DEFAULT_EXTRACTOR_OPTIONS: ExtractorOptions = {
  channelMode: "mix",
  detector: DEFAULT_DETECTOR_OPTIONS,
};

/** Where the pipeline pulls impulses from: extracted audio or a replayed recording */
export interface ImpulseSource {
  /** No media timeline: offsets are ignored and the clock is anchored to the first block */
  readonly live: boolean;
  readonly offsetSec: number | null;
  /** Moves on every restart and close */
  readonly currentGeneration: number;
  readonly passStartedAt: number | null;
  restart(offsetSec: number): void;
  next(): Promise<ImpulseEvent | null>;
  close(): void;
}

interface Pass {
  generation: number;
  offsetSec: number;
  stream: PcmStream;
  iterator: AsyncIterator<Float32Array>;
  detectors: ImpulseDetector[];
  ready: ImpulseEvent[];
  ended: boolean;
  /** Wall-clock estimate of when the first sample was captured */
  startedAt: number | null;
}

export class ImpulseExtractor implements ImpulseSource, AsyncIterable<ImpulseEvent> {
  private readonly options: ExtractorOptions;
  private generation = 0;
  private pass: Pass | null = null;
  private closed = false;
  /** Offsets (ms) whose pass failed to decode */
  private readonly failedOffsets = new Set<number>();

  constructor(
    private readonly source: PcmSource,
    options: Partial<ExtractorOptions> = {}
  ) {
    this.options = { ...DEFAULT_EXTRACTOR_OPTIONS, ...options };
  }

  get live(): boolean {
    return this.source.live;
  }

  /** Offset of the current pass, or null before the first one */
  get offsetSec(): number | null {
    return this.pass?.offsetSec ?? null;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  /** When the current pass's first sample was captured; null until its first block */
  get passStartedAt(): number | null {
    return this.pass?.startedAt ?? null;
  }

  /**
   * Begin a new pass at `offsetSec`. Throws DecodeError at once when a
   * previous pass already failed at this offset.
   */
  restart(offsetSec: number): void {
    const offset = this.source.live ? 0 : Math.max(0, offsetSec);
    if (this.failedOffsets.has(offsetKey(offset))) {
      throw new DecodeError(`Source already failed to decode at ${offset}s`, offset);
    }

    this.pass?.stream.close();
    this.closed = false;
    this.generation++;

    const stream = this.source.open(offset);
    const { channelMode, detector } = this.options;
    const { sampleRate, channels } = this.source.format;
    const detectors =
      channelMode === "split"
        ? Array.from({ length: channels }, (_, channel) => new ImpulseDetector(sampleRate, detector, offset, channel))
        : [new ImpulseDetector(sampleRate, detector, offset)];

    this.pass = {
      generation: this.generation,
      offsetSec: offset,
      stream,
      iterator: stream[Symbol.asyncIterator](),
      detectors,
      ready: [],
      ended: false,
      startedAt: null,
    };
  }

  /** Next impulse of the current pass, or null at end of stream */
  async next(): Promise<ImpulseEvent | null> {
    if (this.closed) return null;
    if (!this.pass) this.restart(0);

    for (;;) {
      const pass = this.pass;
      if (!pass || this.closed) return null;

      const event = pass.ready.shift();
      if (event) return event;
      if (pass.ended) return null;

      let result: IteratorResult<Float32Array>;
      try {
        result = await pass.iterator.next();
      } catch (error) {
        if (pass.generation !== this.generation) continue;
        pass.ended = true;
        this.failedOffsets.add(offsetKey(pass.offsetSec));
        pass.stream.close();
        if (error instanceof DecodeError) throw error;
        throw new DecodeError(`Failed to read ${this.source.description}: ${errorMessage(error)}`, pass.offsetSec, {
          cause: error,
        });
      }

      // A restart happened while this read was in flight
      if (pass.generation !== this.generation) continue;

      if (result.done) {
        pass.ended = true;
        pass.ready.push(...mergeByTime(pass.detectors.map((d) => d.finish())));
      } else {
        if (pass.startedAt === null) {
          const { sampleRate, channels } = this.source.format;
          pass.startedAt = Date.now() - (result.value.length / channels / sampleRate) * 1000;
        }
        pass.ready.push(...this.detect(pass, result.value));
      }
    }
  }

  /** Stop the current pass; `next` returns null until the next restart */
  close(): void {
    this.closed = true;
    this.generation++;
    this.pass?.stream.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ImpulseEvent> {
    for (;;) {
      const event = await this.next();
      if (!event) return;
      yield event;
    }
  }

  private detect(pass: Pass, block: Float32Array): ImpulseEvent[] {
    const channels = this.source.format.channels;
    const frames = Math.floor(block.length / channels);

    if (this.options.channelMode === "mix") {
      const mono = channels === 1 ? block : mixDown(block, channels, frames);
      return pass.detectors[0]?.push(mono) ?? [];
    }

    const perChannel = pass.detectors.map((detector, channel) =>
      detector.push(deinterleave(block, channels, frames, channel))
    );
    return mergeByTime(perChannel);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function offsetKey(offsetSec: number): number {
  return Math.round(offsetSec * 1000);
}

export function mixDown(block: Float32Array, channels: number, frames: number): Float32Array {
  const mono = new Float32Array(frames);
  for (let frame = 0; frame < frames; frame++) {
    let total = 0;
    for (let channel = 0; channel < channels; channel++) {
      total += block[frame * channels + channel] ?? 0;
    }
    mono[frame] = total / channels;
  }
  return mono;
}

export function deinterleave(block: Float32Array, channels: number, frames: number, channel: number): Float32Array {
  const out = new Float32Array(frames);
  for (let frame = 0; frame < frames; frame++) {
    out[frame] = block[frame * channels + channel] ?? 0;
  }
  return out;
}

/** Stable merge of per-channel impulse lists by timestamp, then channel */
export function mergeByTime(lists: ImpulseEvent[][]): ImpulseEvent[] {
  return lists.flat().sort((a, b) => a.timestamp - b.timestamp || (a.channel ?? 0) - (b.channel ?? 0));
}
