/**
 * Extraction loop feeding the scheduler.
 *
 * Pulls impulses from the extractor no further than `lookaheadSec` ahead of
 * the playhead, restarts extraction where playback lands after a seek or a
 * reconnect, and parks after end of stream or a decode failure until the
 * next restart. Live capture has no media timeline; its clock is anchored to
 * the first captured block instead.
 */

import { errorMessage, positionAt, type ImpulseEvent } from "@remote-haptics/shared";
import type { ImpulseSource } from "./audio/extractor.js";
import type { PlaybackNotification, PlaybackSource } from "./player/playbackSource.js";
import type { EventScheduler } from "./scheduler/scheduler.js";

export interface PipelineOptions {
  lookaheadSec: number;
  /** How often pacing re-reads the playhead */
  pollMs: number;
  verbose: boolean;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  lookaheadSec: 2,
  pollMs: 50,
  verbose: false,
};

export type PipelineState = "stopped" | "extracting" | "parked";

export interface PipelineStats {
  state: PipelineState;
  offsetSec: number | null;
  submitted: number;
  passes: number;
  decodeFailures: number;
}

export class HapticsPipeline {
  private readonly options: PipelineOptions;
  private running = false;
  private loop: Promise<void> | null = null;
  private unsubscribe: (() => void) | null = null;
  /** Extractor generation the loop is parked on, waiting for a restart */
  private parkedAt: number | null = null;
  private wakeUp: (() => void) | null = null;
  /** Live pass whose capture start the timeline was anchored to */
  private anchoredGeneration: number | null = null;

  private submitted = 0;
  private passes = 0;
  private decodeFailures = 0;

  constructor(
    private readonly extractor: ImpulseSource,
    private readonly playback: PlaybackSource,
    private readonly scheduler: EventScheduler,
    options: Partial<PipelineOptions> = {}
  ) {
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...options };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.unsubscribe = this.playback.subscribe((notification) => this.handlePlayback(notification));
    this.restartAt(this.playback.currentState().position);
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.extractor.close();
    this.wake();
    await this.loop;
    this.loop = null;
    console.log("[pipeline] stopped");
  }

  stats(): PipelineStats {
    return {
      state: !this.running ? "stopped" : this.isParked() ? "parked" : "extracting",
      offsetSec: this.extractor.offsetSec,
      submitted: this.submitted,
      passes: this.passes,
      decodeFailures: this.decodeFailures,
    };
  }

  // ==========================================================================
  // Restarts
  // ==========================================================================

  private handlePlayback({ change, state }: PlaybackNotification): void {
    if (!this.running || this.extractor.live) return;
    if (change === "seek") {
      // Nothing from the old pass may reach the scheduler while the seek settles
      this.extractor.close();
      this.parkedAt = this.extractor.currentGeneration;
      this.wake();
    } else if (change === "seek-complete" || change === "restored") {
      this.restartAt(state.position);
    }
  }

  private restartAt(offsetSec: number): void {
    try {
      this.extractor.restart(offsetSec);
      this.passes++;
      this.parkedAt = null;
      console.log(`[pipeline] extracting from offset=${(this.extractor.offsetSec ?? 0).toFixed(3)}s`);
    } catch (error) {
      this.decodeFailures++;
      console.error(`[pipeline] cannot restart at offset=${offsetSec.toFixed(3)}s: ${errorMessage(error)}`);
      // The previous pass belongs to a position playback has left
      this.extractor.close();
      this.parkedAt = this.extractor.currentGeneration;
    }
    this.wake();
  }

  // ==========================================================================
  // Loop
  // ==========================================================================

  private isParked(): boolean {
    return this.parkedAt === this.extractor.currentGeneration;
  }

  private async run(): Promise<void> {
    while (this.running) {
      if (this.isParked()) {
        await this.idle();
        continue;
      }

      let impulse: ImpulseEvent | null;
      try {
        impulse = await this.extractor.next();
      } catch (error) {
        this.decodeFailures++;
        console.error(`[pipeline] ${errorMessage(error)}`);
        this.park();
        continue;
      }
      // The extractor answers for whichever pass is current when it returns
      const generation = this.extractor.currentGeneration;
      if (!this.running) break;

      if (!impulse) {
        // Closed for a seek, not the end of the media
        if (this.isParked()) continue;
        if (this.options.verbose) {
          console.debug(`[pipeline] end of stream generation=${generation}`);
        }
        this.park();
        continue;
      }

      if (this.extractor.live) this.anchorLive(generation);
      if (!(await this.pace(impulse, generation))) continue;
      this.scheduler.submit(impulse);
      this.submitted++;
    }
  }

  private anchorLive(generation: number): void {
    if (this.anchoredGeneration === generation) return;
    const startedAt = this.extractor.passStartedAt;
    if (startedAt === null) return;
    this.playback.anchor?.(startedAt);
    this.anchoredGeneration = generation;
  }

  private park(): void {
    this.parkedAt = this.extractor.currentGeneration;
    this.scheduler.endOfStream();
  }

  /** Wait until the impulse is within the lookahead window; false if it went stale meanwhile */
  private async pace(impulse: ImpulseEvent, generation: number): Promise<boolean> {
    for (;;) {
      if (!this.running || generation !== this.extractor.currentGeneration) return false;
      const ahead = impulse.timestamp - positionAt(this.playback.currentState(), Date.now());
      if (ahead <= this.options.lookaheadSec) return true;
      await this.idle(this.options.pollMs);
    }
  }

  /** Sleep until woken, or for `ms` when given */
  private idle(ms?: number): Promise<void> {
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | null = null;
      const done = (): void => {
        if (timer) clearTimeout(timer);
        if (this.wakeUp === done) this.wakeUp = null;
        resolve();
      };
      if (ms !== undefined) timer = setTimeout(done, ms);
      this.wakeUp = done;
    });
  }

  private wake(): void {
    this.wakeUp?.();
  }
}
