/**
 * Replays a recording through the pipeline as if its commands were impulses
 * captured live: session time 0 is anchored to the first `next` call.
 */

import { BROADCAST_TARGET, createImpulse, type DeviceTarget, type ImpulseEvent } from "@remote-haptics/shared";
import type { ImpulseSource } from "../audio/extractor.js";
import type { Recording, RecordingEntry } from "./format.js";

export class RecordingImpulseSource implements ImpulseSource {
  readonly live = true;
  private readonly entries: readonly RecordingEntry[];
  /** Channel index per non-broadcast device target */
  private readonly channels = new Map<DeviceTarget, number>();
  private generation = 0;
  private cursor = 0;
  private closed = false;
  private startedAt: number | null = null;

  constructor(recording: Recording) {
    this.entries = recording.entries;
    for (const entry of this.entries) {
      if (entry.kind === "command" && entry.deviceTarget !== BROADCAST_TARGET && !this.channels.has(entry.deviceTarget)) {
        this.channels.set(entry.deviceTarget, this.channels.size);
      }
    }
  }

  /** Channel index -> device target, for the scheduler's routes */
  routes(): Map<number, DeviceTarget> {
    return new Map([...this.channels].map(([target, channel]) => [channel, target]));
  }

  get offsetSec(): number | null {
    return this.generation === 0 ? null : 0;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  get passStartedAt(): number | null {
    return this.startedAt;
  }

  /** A recording has no media timeline: every pass replays from the top */
  restart(): void {
    this.generation++;
    this.cursor = 0;
    this.closed = false;
    this.startedAt = null;
  }

  async next(): Promise<ImpulseEvent | null> {
    if (this.closed) return null;
    if (this.generation === 0) this.restart();
    this.startedAt ??= Date.now();

    for (;;) {
      const entry = this.entries[this.cursor];
      if (!entry) return null;
      this.cursor++;

      switch (entry.kind) {
        case "command": {
          const channel = this.channels.get(entry.deviceTarget);
          return createImpulse(entry.at, entry.intensity, channel);
        }
        case "remark":
          console.log(`[replay] at=${entry.at}s ${entry.text}`);
          break;
        case "media-play":
          console.log(`[replay] at=${entry.at}s media ${entry.mediaId} plays ${entry.file} from ${entry.at + entry.offsetSec}s`);
          break;
        case "media-stop":
          console.log(`[replay] at=${entry.at}s media ${entry.mediaId} stops`);
          break;
      }
    }
  }

  close(): void {
    this.closed = true;
    this.generation++;
  }
}
