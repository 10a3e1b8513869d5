/**
 * Server Clock Synchronization
 *
 * Turns TIME_PING/TIME_PONG round trips into an estimate of the offset between
 * the server clock and ours, so command dispatch times (server wall-clock ms)
 * can be compared against local time.
 */

/** Number of ping samples to keep for averaging */
const SAMPLE_COUNT = 7;

/** Minimum samples before the offset is trusted */
const MIN_RELIABLE_SAMPLES = 5;

/** Maximum age of a sample before discarding (ms) */
const MAX_SAMPLE_AGE_MS = 60_000;

interface ClockSample {
  rttMs: number;
  /** serverTime - clientTime, ms */
  offsetMs: number;
  /** Client time the sample was taken */
  takenAt: number;
}

export interface ClockState {
  /** Recent samples, newest last */
  samples: readonly ClockSample[];
  averageOffsetMs: number;
  averageRttMs: number;
  isReliable: boolean;
}

export type ClockListener = (state: ClockState) => void;

const EMPTY: ClockState = Object.freeze({ samples: [], averageOffsetMs: 0, averageRttMs: 0, isReliable: false });

export class ServerClock {
  private state: ClockState = EMPTY;
  private readonly listeners = new Set<ClockListener>();

  constructor(private readonly now: () => number = Date.now) {}

  subscribe(listener: ClockListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  getState(): ClockState {
    return this.state;
  }

  isReliable(): boolean {
    return this.state.isReliable;
  }

  /** Estimated current server time */
  serverNow(): number {
    return this.now() + this.state.averageOffsetMs;
  }

  /** Convert a server timestamp to local time */
  toLocal(serverTs: number): number {
    return serverTs - this.state.averageOffsetMs;
  }

  /**
   * Fold in a TIME_PONG.
   *
   * @param t0 - local time the ping was sent
   * @param serverTs - server time it was answered
   */
  processPong(t0: number, serverTs: number): void {
    const now = this.now();
    const rttMs = Math.max(0, now - t0);

    // Assume the server stamped the pong halfway through the round trip
    const offsetMs = serverTs - (t0 + rttMs / 2);
    const sample: ClockSample = { rttMs, offsetMs, takenAt: now };

    const fresh = this.state.samples
      .filter((s) => now - s.takenAt < MAX_SAMPLE_AGE_MS)
      .slice(-(SAMPLE_COUNT - 1));
    fresh.push(sample);

    // Drop outliers: RTT at or above twice the median
    const sortedByRtt = [...fresh].sort((a, b) => a.rttMs - b.rttMs);
    const medianRtt = sortedByRtt[Math.floor(sortedByRtt.length / 2)]?.rttMs ?? rttMs;
    const valid = fresh.filter((s) => s.rttMs < medianRtt * 2);
    if (valid.length === 0) {
      valid.push(sample);
    }

    // Lower RTT samples are more accurate, so they weigh more
    let totalWeight = 0;
    let weightedOffset = 0;
    let totalRtt = 0;
    for (const s of valid) {
      const weight = 1 / (s.rttMs + 1);
      totalWeight += weight;
      weightedOffset += s.offsetMs * weight;
      totalRtt += s.rttMs;
    }

    this.state = Object.freeze({
      samples: fresh,
      averageOffsetMs: weightedOffset / totalWeight,
      averageRttMs: totalRtt / valid.length,
      isReliable: fresh.length >= MIN_RELIABLE_SAMPLES,
    });
    this.notify();
  }

  /** Forget every sample; used when the connection is re-established */
  reset(): void {
    this.state = EMPTY;
    this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }
}
