/**
 * Playback Position Tracker.
 *
 * Keeps a frozen PlaybackState snapshot in sync with mpv over JSON-IPC.
 * The snapshot is replaced whole on every change, so readers never observe a
 * half-updated state. The sequence number moves on seeks, effective rate
 * changes, end of media and reconnects; plain position ticks leave it alone.
 */

import {
  PlayerUnavailableError,
  createDefaultPlaybackState,
  errorMessage,
  positionAt,
  type PlaybackState,
} from "@remote-haptics/shared";
import { DEFAULT_BACKOFF, backoffDelay, type BackoffOptions } from "./backoff.js";
import { MpvIpcConnection, type MpvEvent } from "./mpvIpc.js";
import type { PlaybackChange, PlaybackListener, PlaybackSource } from "./playbackSource.js";

export type TrackerStatus = "stopped" | "connecting" | "connected" | "disconnected" | "unavailable";

export interface TrackerOptions {
  socketPath: string;
  /** Consecutive failed attempts before the player is declared unavailable */
  maxRetries: number;
  backoff: BackoffOptions;
  requestTimeoutMs: number;
  verbose: boolean;
}

export const DEFAULT_TRACKER_OPTIONS: Omit<TrackerOptions, "socketPath"> = {
  maxRetries: 8,
  backoff: DEFAULT_BACKOFF,
  requestTimeoutMs: 2000,
  verbose: false,
};

/** Properties observed on every connection, keyed by observer id */
const OBSERVED_PROPERTIES = ["time-pos", "pause", "speed", "eof-reached"] as const;

export class PlaybackTracker implements PlaybackSource {
  private readonly options: TrackerOptions;
  private state: PlaybackState = createDefaultPlaybackState();
  private status: TrackerStatus = "stopped";
  private connection: MpvIpcConnection | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private attempts = 0;
  private lastError: PlayerUnavailableError | null = null;

  private paused = true;
  private speed = 1;
  private ended = false;
  private seeking = false;
  /** Latest time-pos seen while a connection is being set up */
  private pendingPosition: number | null = null;

  private readonly listeners = new Set<PlaybackListener>();

  constructor(options: Partial<TrackerOptions> & Pick<TrackerOptions, "socketPath">) {
    this.options = { ...DEFAULT_TRACKER_OPTIONS, ...options };
  }

  currentState(): PlaybackState {
    return this.state;
  }

  positionAt(now: number): number {
    return positionAt(this.state, now);
  }

  get available(): boolean {
    return this.status !== "unavailable";
  }

  getStatus(): TrackerStatus {
    return this.status;
  }

  /** Set while the retry ceiling has been reached */
  getUnavailableError(): PlayerUnavailableError | null {
    return this.lastError;
  }

  subscribe(listener: PlaybackListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  start(): void {
    if (this.status !== "stopped") return;
    this.status = "connecting";
    void this.attemptConnect();
  }

  stop(): void {
    this.status = "stopped";
    this.clearRetry();
    const connection = this.connection;
    this.connection = null;
    connection?.close();
  }

  /** Retry at once instead of waiting for the next recheck */
  reconnect(): void {
    if (this.status === "connected" || this.status === "connecting") return;
    this.clearRetry();
    this.attempts = 0;
    this.lastError = null;
    this.status = "connecting";
    void this.attemptConnect();
  }

  // ==========================================================================
  // Transport commands
  // ==========================================================================

  async seek(positionSec: number): Promise<void> {
    await this.requireConnection().command(["seek", positionSec, "absolute"]);
  }

  async setPaused(paused: boolean): Promise<void> {
    await this.requireConnection().setProperty("pause", paused);
  }

  private requireConnection(): MpvIpcConnection {
    if (!this.connection) {
      throw new PlayerUnavailableError(this.attempts);
    }
    return this.connection;
  }

  // ==========================================================================
  // Connection lifecycle
  // ==========================================================================

  private async attemptConnect(): Promise<void> {
    const connection = new MpvIpcConnection(this.options.socketPath, {
      requestTimeoutMs: this.options.requestTimeoutMs,
      verbose: this.options.verbose,
    });

    try {
      await connection.connect();
      if (this.status === "stopped") {
        connection.close();
        return;
      }
      this.connection = connection;
      connection.onEvent((event) => this.handleEvent(connection, event));
      connection.onClose(() => this.handleDisconnect(connection));

      const [position, paused, speed] = await Promise.all([
        // time-pos is unavailable until a file is loaded
        connection.getProperty("time-pos").catch(() => null),
        connection.getProperty("pause"),
        connection.getProperty("speed"),
      ]);
      this.paused = paused === true;
      this.speed = typeof speed === "number" ? speed : 1;
      this.ended = false;
      this.pendingPosition = typeof position === "number" ? position : null;

      await Promise.all(OBSERVED_PROPERTIES.map((name, index) => connection.observeProperty(index + 1, name)));

      if (this.connection !== connection) return;
      this.attempts = 0;
      this.lastError = null;
      this.status = "connected";
      this.update(
        {
          position: this.pendingPosition ?? this.state.position,
          rate: this.effectiveRate(),
          stale: false,
        },
        true
      );
      console.log(
        `[tracker] connected socket=${this.options.socketPath} position=${this.state.position.toFixed(3)} rate=${this.state.rate}`
      );
      this.notify("restored");
    } catch (error) {
      if (this.connection === connection) this.connection = null;
      connection.close();
      if (this.status === "unavailable") {
        this.scheduleRecheck();
        return;
      }
      // A drop mid-handshake already scheduled the retry
      if (this.status !== "connecting") return;
      this.scheduleRetry(error);
    }
  }

  private handleDisconnect(connection: MpvIpcConnection): void {
    if (this.connection !== connection) return;
    this.connection = null;
    if (this.status === "stopped") return;

    console.warn(`[tracker] player connection lost socket=${this.options.socketPath}`);
    this.status = "disconnected";
    this.update({ stale: true }, false);
    this.notify("stale");
    this.scheduleRetry(null);
  }

  private scheduleRetry(error: unknown): void {
    this.attempts++;
    if (this.attempts >= this.options.maxRetries) {
      if (this.status !== "unavailable") {
        this.status = "unavailable";
        this.lastError = new PlayerUnavailableError(this.attempts, { cause: error ?? undefined });
        this.update({ stale: true }, false);
        console.error(`[tracker] ${this.lastError.message}`);
        this.notify("unavailable");
      }
      this.scheduleRecheck();
      return;
    }

    this.status = "disconnected";
    const delay = backoffDelay(this.attempts - 1, this.options.backoff);
    if (error !== null) {
      console.debug(`[tracker] connect failed attempt=${this.attempts} retryInMs=${delay} error=${errorMessage(error)}`);
    }
    this.clearRetry();
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.status !== "disconnected") return;
      this.status = "connecting";
      void this.attemptConnect();
    }, delay);
  }

  /** Past the ceiling: one quiet attempt per `backoff.maxMs` until the player is back */
  private scheduleRecheck(): void {
    this.clearRetry();
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.status !== "unavailable") return;
      if (this.options.verbose) console.debug(`[tracker] retrying socket=${this.options.socketPath}`);
      void this.attemptConnect();
    }, this.options.backoff.maxMs);
  }

  private clearRetry(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  // ==========================================================================
  // Player events
  // ==========================================================================

  private handleEvent(connection: MpvIpcConnection, event: MpvEvent): void {
    if (this.connection !== connection) return;
    if (this.status !== "connected") {
      // The snapshot is published once the connection is set up
      if (event.event === "property-change") this.recordProperty(event.name, event.data);
      return;
    }

    switch (event.event) {
      case "property-change":
        this.handlePropertyChange(event.name, event.data);
        break;
      case "seek":
        this.seeking = true;
        this.ended = false;
        this.update({ rate: this.effectiveRate() }, true);
        if (this.options.verbose) console.debug(`[tracker] seek started sequence=${this.state.sequence}`);
        this.notify("seek");
        break;
      case "playback-restart":
        void this.settle(connection);
        break;
      case "end-file":
        this.markEnded();
        break;
      default:
        break;
    }
  }

  private handlePropertyChange(name: string | undefined, data: unknown): void {
    switch (name) {
      case "time-pos":
        if (typeof data === "number") this.update({ position: data }, false);
        break;
      case "pause":
        if (typeof data === "boolean") {
          this.paused = data;
          this.applyRate();
        }
        break;
      case "speed":
        if (typeof data === "number") {
          this.speed = data;
          this.applyRate();
        }
        break;
      case "eof-reached":
        if (data === true) {
          this.markEnded();
        } else if (data === false && this.ended) {
          this.ended = false;
          this.applyRate();
        }
        break;
      default:
        break;
    }
  }

  private recordProperty(name: string | undefined, data: unknown): void {
    if (name === "time-pos" && typeof data === "number") this.pendingPosition = data;
    if (name === "pause" && typeof data === "boolean") this.paused = data;
    if (name === "speed" && typeof data === "number") this.speed = data;
    if (name === "eof-reached") this.ended = data === true;
  }

  /** Read the settled playhead after a seek or file start */
  private async settle(connection: MpvIpcConnection): Promise<void> {
    const wasSeeking = this.seeking;
    this.seeking = false;
    try {
      const position = await connection.getProperty("time-pos");
      if (this.connection !== connection) return;
      // A settled seek moves the sequence again: nothing computed mid-seek survives
      this.update(typeof position === "number" ? { position } : {}, wasSeeking);
      if (this.options.verbose || wasSeeking) {
        console.debug(`[tracker] playback restarted position=${this.state.position.toFixed(3)}`);
      }
      this.notify("seek-complete");
    } catch (error) {
      console.warn(`[tracker] could not read position after restart: ${errorMessage(error)}`);
    }
  }

  private markEnded(): void {
    if (this.ended) return;
    this.ended = true;
    this.update({ rate: 0 }, true);
    console.log(`[tracker] media ended position=${this.state.position.toFixed(3)}`);
    this.notify("end");
  }

  private applyRate(): void {
    const rate = this.effectiveRate();
    if (rate === this.state.rate) return;
    this.update({ rate }, true);
    if (this.options.verbose) {
      console.debug(`[tracker] rate=${rate} sequence=${this.state.sequence}`);
    }
    this.notify("rate");
  }

  private effectiveRate(): number {
    return this.paused || this.ended ? 0 : this.speed;
  }

  // ==========================================================================
  // Snapshot
  // ==========================================================================

  private update(fields: Partial<Pick<PlaybackState, "position" | "rate" | "stale">>, bumpSequence: boolean): void {
    const now = Date.now();
    const previous = this.state;
    this.state = Object.freeze({
      position: fields.position ?? positionAt(previous, now),
      rate: fields.rate ?? previous.rate,
      sequence: previous.sequence + (bumpSequence ? 1 : 0),
      updatedAt: now,
      stale: fields.stale ?? previous.stale,
    });
  }

  private notify(change: PlaybackChange): void {
    const notification = { change, state: this.state };
    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (error) {
        console.error(`[tracker] listener failed change=${change}: ${errorMessage(error)}`);
      }
    }
  }
}
