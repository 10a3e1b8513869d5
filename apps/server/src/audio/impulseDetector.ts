/**
 * Streaming transient detector.
 *
 * Cuts one channel of PCM into non-overlapping frames, computes each frame's
 * RMS energy and reports local maxima that stand out from the recent energy
 * envelope. Needs one frame of lookahead, so an impulse is reported when the
 * frame after it completes (or at `finish`).
 */

import { createImpulse, type ImpulseEvent } from "@remote-haptics/shared";

export interface DetectorOptions {
  /** Frame (hop) length */
  frameMs: number;
  /** Minimum RMS for a frame to count as an impulse */
  floor: number;
  /** Frame RMS must exceed this multiple of the recent mean */
  sensitivity: number;
  /** Frames averaged for the adaptive threshold */
  historyFrames: number;
  /** Minimum gap between impulses on one channel */
  minSpacingMs: number;
  /** RMS that maps to magnitude 1 */
  referenceLevel: number;
}

export const DEFAULT_DETECTOR_OPTIONS: DetectorOptions = {
  frameMs: 10,
  floor: 0.02,
  sensitivity: 1.5,
  historyFrames: 20,
  minSpacingMs: 50,
  referenceLevel: 0.5,
};

export class ImpulseDetector {
  private readonly frameSize: number;
  private readonly frame: Float32Array;
  private fill = 0;
  private framesSeen = 0;

  /** RMS of the frame waiting for its successor */
  private candidate: number | null = null;
  private candidateIndex = 0;
  /** RMS of frames before the candidate, oldest first */
  private history: number[] = [];
  private lastImpulseAt = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly sampleRate: number,
    private readonly options: DetectorOptions = DEFAULT_DETECTOR_OPTIONS,
    private readonly startOffsetSec = 0,
    private readonly channel?: number
  ) {
    this.frameSize = Math.max(1, Math.round((sampleRate * options.frameMs) / 1000));
    this.frame = new Float32Array(this.frameSize);
  }

  push(samples: Float32Array): ImpulseEvent[] {
    const events: ImpulseEvent[] = [];
    let i = 0;
    while (i < samples.length) {
      const take = Math.min(this.frameSize - this.fill, samples.length - i);
      this.frame.set(samples.subarray(i, i + take), this.fill);
      this.fill += take;
      i += take;

      if (this.fill === this.frameSize) {
        this.fill = 0;
        const event = this.completeFrame(rms(this.frame));
        if (event) events.push(event);
      }
    }
    return events;
  }

  /** Evaluate the last complete frame against silence; partial frames are dropped */
  finish(): ImpulseEvent[] {
    const event = this.candidate === null ? null : this.evaluate(this.candidate, 0);
    this.candidate = null;
    this.fill = 0;
    return event ? [event] : [];
  }

  private completeFrame(energy: number): ImpulseEvent | null {
    let event: ImpulseEvent | null = null;
    if (this.candidate !== null) {
      event = this.evaluate(this.candidate, energy);
      this.history.push(this.candidate);
      if (this.history.length > this.options.historyFrames) {
        this.history.shift();
      }
    }
    this.candidate = energy;
    this.candidateIndex = this.framesSeen;
    this.framesSeen++;
    return event;
  }

  private evaluate(current: number, next: number): ImpulseEvent | null {
    const { floor, sensitivity, minSpacingMs, referenceLevel } = this.options;
    const prev = this.history[this.history.length - 1] ?? 0;
    const mean = this.history.length > 0 ? sum(this.history) / this.history.length : 0;
    const time = this.startOffsetSec + (this.candidateIndex * this.frameSize) / this.sampleRate;

    if (current <= prev || current < next) return null;
    if (current < floor || current <= sensitivity * mean) return null;
    if ((time - this.lastImpulseAt) * 1000 < minSpacingMs) return null;

    this.lastImpulseAt = time;
    return createImpulse(time, current / referenceLevel, this.channel);
  }
}

export function rms(samples: Float32Array): number {
  if (samples.length === 0) return 0;
  let total = 0;
  for (let i = 0; i < samples.length; i++) {
    const val = samples[i] ?? 0;
    total += val * val;
  }
  return Math.sqrt(total / samples.length);
}

function sum(values: number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}
