import { describe, it, expect } from "vitest";
import { DecodeError, type ImpulseEvent } from "@remote-haptics/shared";
import { ImpulseExtractor, mergeByTime, mixDown } from "./extractor.js";
import { ImpulseDetector, rms } from "./impulseDetector.js";
import { BufferPcmSource, Float32Decoder, ProcessPcmStream, ffmpegArgs, parecArgs } from "./pcmSource.js";
import type { PcmFormat, PcmSource, PcmStream } from "./pcmSource.js";

const SAMPLE_RATE = 1000;
/** 10ms frames at 1kHz */
const FRAME = 10;

/** Mono signal with constant-amplitude bursts one frame long */
function signal(totalFrames: number, bursts: Record<number, number>): Float32Array {
  const samples = new Float32Array(totalFrames * FRAME);
  for (const [frame, level] of Object.entries(bursts)) {
    samples.fill(level, Number(frame) * FRAME, (Number(frame) + 1) * FRAME);
  }
  return samples;
}

function interleave(left: Float32Array, right: Float32Array): Float32Array {
  const out = new Float32Array(left.length * 2);
  for (let i = 0; i < left.length; i++) {
    out[i * 2] = left[i] ?? 0;
    out[i * 2 + 1] = right[i] ?? 0;
  }
  return out;
}

async function drain(extractor: ImpulseExtractor): Promise<ImpulseEvent[]> {
  const events: ImpulseEvent[] = [];
  for await (const event of extractor) events.push(event);
  return events;
}

const mono: PcmFormat = { sampleRate: SAMPLE_RATE, channels: 1 };

describe("ImpulseDetector", () => {
  it("reports isolated bursts with timestamp and magnitude", () => {
    const detector = new ImpulseDetector(SAMPLE_RATE);
    const events = [...detector.push(signal(100, { 30: 0.25, 70: 0.5 })), ...detector.finish()];

    expect(events).toEqual([
      { timestamp: 0.3, magnitude: 0.5 },
      { timestamp: 0.7, magnitude: 1 },
    ]);
  });

  it("ignores frames below the floor", () => {
    const detector = new ImpulseDetector(SAMPLE_RATE);
    const events = [...detector.push(signal(50, { 20: 0.01 })), ...detector.finish()];
    expect(events).toEqual([]);
  });

  it("enforces the minimum spacing between impulses", () => {
    // Frames 10 and 12 are both local maxima, 20ms apart
    const detector = new ImpulseDetector(SAMPLE_RATE);
    const events = [...detector.push(signal(40, { 10: 0.3, 12: 0.4 })), ...detector.finish()];
    expect(events.map((e) => e.timestamp)).toEqual([0.1]);
  });

  it("requires energy above the recent mean", () => {
    // Steady 0.2 bed with a 0.25 bump: 0.25 <= 1.5 * 0.2, only the onset fires
    const samples = new Float32Array(40 * FRAME).fill(0.2);
    samples.fill(0.25, 30 * FRAME, 31 * FRAME);
    const detector = new ImpulseDetector(SAMPLE_RATE);
    const events = [...detector.push(samples), ...detector.finish()];
    expect(events.map((e) => e.timestamp)).toEqual([0]);
  });

  it("evaluates the final frame at finish", () => {
    const detector = new ImpulseDetector(SAMPLE_RATE);
    expect(detector.push(signal(10, { 9: 0.5 }))).toEqual([]);
    expect(detector.finish()).toEqual([{ timestamp: 0.09, magnitude: 1 }]);
  });

  it("computes RMS", () => {
    expect(rms(new Float32Array([0.5, -0.5, 0.5, -0.5]))).toBe(0.5);
    expect(rms(new Float32Array(0))).toBe(0);
  });
});

describe("ImpulseExtractor", () => {
  it("yields impulses lazily and null at end of stream", async () => {
    const source = new BufferPcmSource(signal(100, { 30: 0.25, 70: 0.5 }), mono, 64);
    const extractor = new ImpulseExtractor(source);

    expect(await extractor.next()).toEqual({ timestamp: 0.3, magnitude: 0.5 });
    expect(await extractor.next()).toEqual({ timestamp: 0.7, magnitude: 1 });
    expect(await extractor.next()).toBeNull();
    expect(await extractor.next()).toBeNull();
  });

  it("restarts at an arbitrary offset with media-relative timestamps", async () => {
    const source = new BufferPcmSource(signal(100, { 30: 0.25, 70: 0.5 }), mono, 64);
    const extractor = new ImpulseExtractor(source);
    await extractor.next();

    extractor.restart(0.5);
    const events = await drain(extractor);

    expect(events).toHaveLength(1);
    expect(events[0]?.timestamp).toBeCloseTo(0.7, 9);
    expect(events[0]?.magnitude).toBe(1);
    expect(extractor.offsetSec).toBe(0.5);
  });

  it("produces strictly increasing timestamps per pass", async () => {
    const bursts: Record<number, number> = {};
    for (let frame = 10; frame < 200; frame += 15) bursts[frame] = 0.4;
    const extractor = new ImpulseExtractor(new BufferPcmSource(signal(210, bursts), mono, 37));

    const timestamps = (await drain(extractor)).map((e) => e.timestamp);
    expect(timestamps.length).toBe(13);
    for (let i = 1; i < timestamps.length; i++) {
      expect(timestamps[i]).toBeGreaterThan(timestamps[i - 1] ?? Infinity);
    }
  });

  it("splits channels and orders ties by channel", async () => {
    const left = signal(100, { 30: 0.5 });
    const right = signal(100, { 30: 0.25, 70: 0.5 });
    const source = new BufferPcmSource(interleave(left, right), { sampleRate: SAMPLE_RATE, channels: 2 }, 50);
    const extractor = new ImpulseExtractor(source, { channelMode: "split" });

    expect(await drain(extractor)).toEqual([
      { timestamp: 0.3, magnitude: 1, channel: 0 },
      { timestamp: 0.3, magnitude: 0.5, channel: 1 },
      { timestamp: 0.7, magnitude: 1, channel: 1 },
    ]);
  });

  it("mixes channels down by averaging", async () => {
    const left = signal(100, { 30: 0.5 });
    const right = signal(100, {});
    const source = new BufferPcmSource(interleave(left, right), { sampleRate: SAMPLE_RATE, channels: 2 });
    const extractor = new ImpulseExtractor(source);

    expect(await drain(extractor)).toEqual([{ timestamp: 0.3, magnitude: 0.5 }]);
  });

  it("fails with DecodeError and refuses to retry the same offset", async () => {
    const source = new BufferPcmSource(signal(100, {}), mono);
    const extractor = new ImpulseExtractor(source);

    extractor.restart(5);
    await expect(extractor.next()).rejects.toBeInstanceOf(DecodeError);
    expect(() => extractor.restart(5)).toThrow(DecodeError);

    extractor.restart(0);
    expect(await extractor.next()).toBeNull();
  });

  it("discards a read that was in flight when the pass restarted", async () => {
    const source = new ManualSource();
    const extractor = new ImpulseExtractor(source);

    extractor.restart(0);
    const pending = extractor.next();
    extractor.restart(2);

    // The first pass delivers a burst after it was superseded
    source.streams[0]?.deliver(signal(40, { 10: 0.5 }));
    source.streams[1]?.deliver(signal(40, { 20: 0.5 }));

    const event = await pending;
    expect(event?.timestamp).toBeCloseTo(2.2, 9);
    expect(source.streams[0]?.closed).toBe(true);
  });

  it("returns null after close", async () => {
    const extractor = new ImpulseExtractor(new BufferPcmSource(signal(100, { 30: 0.5 }), mono));
    extractor.close();
    expect(await extractor.next()).toBeNull();
  });
});

describe("PCM helpers", () => {
  it("decodes little-endian floats across chunk boundaries", () => {
    const bytes = Buffer.alloc(12);
    bytes.writeFloatLE(0.5, 0);
    bytes.writeFloatLE(-0.25, 4);
    bytes.writeFloatLE(1, 8);

    const decoder = new Float32Decoder(1);
    expect(Array.from(decoder.push(bytes.subarray(0, 6)))).toEqual([0.5]);
    expect(decoder.pendingBytes).toBe(2);
    expect(Array.from(decoder.push(bytes.subarray(6)))).toEqual([-0.25, 1]);
    expect(decoder.pendingBytes).toBe(0);
  });

  it("keeps whole frames for multi-channel audio", () => {
    const bytes = Buffer.alloc(12);
    bytes.writeFloatLE(0.5, 0);
    bytes.writeFloatLE(0.25, 4);
    bytes.writeFloatLE(1, 8);
    const decoder = new Float32Decoder(2);
    expect(Array.from(decoder.push(bytes))).toEqual([0.5, 0.25]);
    expect(decoder.pendingBytes).toBe(4);
  });

  it("builds decoder arguments", () => {
    const args = ffmpegArgs("song.flac", 12.5, { sampleRate: 48000, channels: 2 });
    expect(args.slice(args.indexOf("-ss"), args.indexOf("-ss") + 4)).toEqual(["-ss", "12.500", "-i", "song.flac"]);
    expect(args.at(-1)).toBe("pipe:1");
    expect(parecArgs("monitor", { sampleRate: 48000, channels: 1 })).toContain("--device=monitor");
    expect(parecArgs(null, { sampleRate: 48000, channels: 1 })).not.toContain("--device=monitor");
  });

  it("reports a missing decoder binary as DecodeError", async () => {
    const stream = new ProcessPcmStream("remote-haptics-no-such-binary", [], mono, 3);
    const read = async () => {
      for await (const block of stream) void block;
    };
    await expect(read()).rejects.toMatchObject({ name: "DecodeError", offsetSec: 3 });
  });

  it("averages interleaved channels", () => {
    expect(Array.from(mixDown(new Float32Array([1, 0, 0.5, 0.5]), 2, 2))).toEqual([0.5, 0.5]);
  });

  it("merges channel lists by time", () => {
    const merged = mergeByTime([
      [{ timestamp: 0.2, magnitude: 1, channel: 0 }],
      [
        { timestamp: 0.1, magnitude: 1, channel: 1 },
        { timestamp: 0.2, magnitude: 1, channel: 1 },
      ],
    ]);
    expect(merged.map((e) => [e.timestamp, e.channel])).toEqual([
      [0.1, 1],
      [0.2, 0],
      [0.2, 1],
    ]);
  });
});

/** Source whose streams deliver a single block when the test says so */
class ManualSource implements PcmSource {
  readonly format = mono;
  readonly live = false;
  readonly description = "manual";
  readonly streams: ManualStream[] = [];

  open(): PcmStream {
    const stream = new ManualStream();
    this.streams.push(stream);
    return stream;
  }
}

class ManualStream implements PcmStream {
  closed = false;
  private resolveBlock: ((block: Float32Array) => void) | null = null;
  private readonly block = new Promise<Float32Array>((resolve) => {
    this.resolveBlock = resolve;
  });

  deliver(block: Float32Array): void {
    this.resolveBlock?.(block);
  }

  close(): void {
    this.closed = true;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Float32Array> {
    yield await this.block;
  }
}
