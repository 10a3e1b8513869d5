/**
 * The playback timeline the scheduler follows.
 *
 * Implemented by the mpv tracker for file playback and by LiveClock when the
 * audio is captured live and no media timeline exists.
 */

import { positionAt, type PlaybackState } from "@remote-haptics/shared";

export type PlaybackChange =
  /** Player started a seek; the sequence moved */
  | "seek"
  /** Seek settled; `state.position` is the new playhead */
  | "seek-complete"
  /** Effective rate changed (pause, resume, speed); the sequence moved */
  | "rate"
  /** Media ended; the sequence moved */
  | "end"
  /** Player connection lost */
  | "stale"
  /** Player connection (re)established; the sequence moved */
  | "restored"
  /** Retry ceiling reached */
  | "unavailable";

export interface PlaybackNotification {
  change: PlaybackChange;
  state: PlaybackState;
}

export type PlaybackListener = (notification: PlaybackNotification) => void;

export interface PlaybackSource {
  /** Last snapshot; never blocks */
  currentState(): PlaybackState;
  /** False while the player is unreachable past its retry ceiling */
  readonly available: boolean;
  subscribe(listener: PlaybackListener): () => void;
  /** Live timelines only: position 0 is the first captured sample */
  anchor?(startedAt: number): void;
}

/** Free-running timeline for live audio: position is seconds since capture started */
export class LiveClock implements PlaybackSource {
  readonly available = true;
  private state: PlaybackState;

  constructor(startedAt: number = Date.now()) {
    this.state = Object.freeze({
      position: 0,
      rate: 1,
      sequence: 1,
      updatedAt: startedAt,
      stale: false,
    });
  }

  currentState(): PlaybackState {
    return this.state;
  }

  positionAt(now: number): number {
    return positionAt(this.state, now);
  }

  subscribe(): () => void {
    return () => undefined;
  }

  /** Re-anchor once capture delivers its first block; commands from an earlier anchor go stale */
  anchor(startedAt: number): void {
    this.state = Object.freeze({
      position: 0,
      rate: 1,
      sequence: this.state.sequence + 1,
      updatedAt: startedAt,
      stale: false,
    });
    console.log(`[live] timeline anchored lagMs=${Date.now() - startedAt}`);
  }
}
