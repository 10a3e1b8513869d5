/**
 * Event Scheduler.
 *
 * Converts impulses into haptic commands with a wall-clock dispatch time
 * derived from the current playback snapshot, and hands them to the channel
 * when they come due.
 *
 * Lifecycle per playback session: idle -> scheduling -> draining -> idle.
 * While playback is paused, stale or unavailable, impulses wait in a bounded
 * hold queue (oldest dropped on overflow). Every command remembers the
 * playback sequence it was computed against; a command whose sequence no
 * longer matches at dispatch time is discarded.
 */

import {
  BROADCAST_TARGET,
  TIMING,
  clampUnit,
  commandEndTime,
  createCommand,
  errorMessage,
  positionAt,
  type CommandId,
  type DeviceTarget,
  type HapticCommand,
  type ImpulseEvent,
  type PlaybackState,
} from "@remote-haptics/shared";
import type { PlaybackNotification, PlaybackSource } from "../player/playbackSource.js";

// ============================================================================
// Types
// ============================================================================

/** Receives commands in dispatch order */
export interface CommandSink {
  /** `preempts` names the command this one cuts short on the same target */
  dispatch(command: HapticCommand, preempts?: CommandId): void;
}

export type SchedulerState = "idle" | "scheduling" | "draining";

export type DropReason = "stale" | "late" | "overflow" | "preempted";

export interface SchedulerOptions {
  /** Impulses kept while scheduling is held */
  queueBound: number;
  /** Impulses further behind the playhead than this are dropped */
  lateToleranceSec: number;
  pulseDurationMs: number;
  /** Multiplier applied to impulse magnitude */
  intensityScale: number;
  /** Channel index -> device target; unmapped channels broadcast */
  routes: ReadonlyMap<number, DeviceTarget>;
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  queueBound: 32,
  lateToleranceSec: TIMING.LATE_TOLERANCE_SEC,
  pulseDurationMs: TIMING.PULSE_DURATION_MS,
  intensityScale: 1,
  routes: new Map(),
};

export interface SchedulerStats {
  state: SchedulerState;
  held: boolean;
  pending: number;
  queued: number;
  scheduled: number;
  dispatched: number;
  preemptions: number;
  dropped: Record<DropReason, number>;
}

interface PendingEntry {
  command: HapticCommand;
  impulse: ImpulseEvent;
  sequence: number;
}

// ============================================================================
// Scheduler
// ============================================================================

export class EventScheduler {
  private readonly options: SchedulerOptions;
  private state: SchedulerState = "idle";
  /** Sorted by dispatchTime, insertion order among equals */
  private pending: PendingEntry[] = [];
  /** Impulses waiting for playback to resume */
  private queue: ImpulseEvent[] = [];
  private timer: NodeJS.Timeout | null = null;
  /** Last command dispatched per target */
  private readonly inFlight = new Map<DeviceTarget, HapticCommand>();
  private nextCommandId = 1;
  /** Between a seek starting and the playhead settling */
  private seeking = false;
  private readonly unsubscribe: () => void;

  private scheduled = 0;
  private dispatched = 0;
  private preemptions = 0;
  private readonly dropped: Record<DropReason, number> = { stale: 0, late: 0, overflow: 0, preempted: 0 };

  constructor(
    private readonly playback: PlaybackSource,
    private readonly sink: CommandSink,
    options: Partial<SchedulerOptions> = {}
  ) {
    this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...options };
    this.unsubscribe = playback.subscribe((notification) => this.handlePlayback(notification));
  }

  getState(): SchedulerState {
    return this.state;
  }

  stats(): SchedulerStats {
    return {
      state: this.state,
      held: this.isHeld(this.playback.currentState()),
      pending: this.pending.length,
      queued: this.queue.length,
      scheduled: this.scheduled,
      dispatched: this.dispatched,
      preemptions: this.preemptions,
      dropped: { ...this.dropped },
    };
  }

  /** Commands waiting for their dispatch time */
  pendingCommands(): readonly HapticCommand[] {
    return this.pending.map((entry) => entry.command);
  }

  /** Impulses held while playback is not advancing */
  queuedImpulses(): readonly ImpulseEvent[] {
    return [...this.queue];
  }

  submit(impulse: ImpulseEvent): void {
    this.state = "scheduling";
    if (this.seeking) {
      this.dropped.stale++;
      return;
    }
    const snapshot = this.playback.currentState();
    if (this.isHeld(snapshot)) {
      this.hold(impulse);
      return;
    }
    this.schedule(impulse, snapshot);
  }

  /** The extractor reached the end of its pass */
  endOfStream(): void {
    if (this.state !== "scheduling") return;
    this.state = "draining";
    this.checkDrained();
  }

  /** Drop everything and return to idle */
  stop(): void {
    this.clearTimer();
    this.pending = [];
    this.queue = [];
    this.state = "idle";
  }

  dispose(): void {
    this.stop();
    this.unsubscribe();
  }

  // ==========================================================================
  // Scheduling
  // ==========================================================================

  private isHeld(snapshot: PlaybackState): boolean {
    return !this.playback.available || snapshot.stale || snapshot.rate === 0;
  }

  private schedule(impulse: ImpulseEvent, snapshot: PlaybackState): void {
    const now = Date.now();
    const offsetSec = (impulse.timestamp - positionAt(snapshot, now)) / snapshot.rate;
    if (offsetSec < -this.options.lateToleranceSec) {
      this.dropped.late++;
      return;
    }

    const command = createCommand({
      commandId: this.generateCommandId(),
      dispatchTime: now + Math.max(0, offsetSec) * 1000,
      intensity: clampUnit(impulse.magnitude * this.options.intensityScale),
      durationMs: this.options.pulseDurationMs,
      deviceTarget: this.route(impulse),
    });

    const entry: PendingEntry = { command, impulse, sequence: snapshot.sequence };
    const index = this.pending.findIndex((e) => e.command.dispatchTime > command.dispatchTime);
    if (index === -1) {
      this.pending.push(entry);
    } else {
      this.pending.splice(index, 0, entry);
    }
    this.scheduled++;
    this.arm();
  }

  private hold(impulse: ImpulseEvent): void {
    this.queue.push(impulse);
    while (this.queue.length > this.options.queueBound) {
      this.queue.shift();
      this.dropped.overflow++;
    }
  }

  private route(impulse: ImpulseEvent): DeviceTarget {
    if (impulse.channel === undefined) return BROADCAST_TARGET;
    return this.options.routes.get(impulse.channel) ?? BROADCAST_TARGET;
  }

  private generateCommandId(): CommandId {
    return `cmd-${this.nextCommandId++}`;
  }

  // ==========================================================================
  // Playback changes
  // ==========================================================================

  private handlePlayback({ change, state }: PlaybackNotification): void {
    switch (change) {
      case "seek":
        this.seeking = true;
        this.invalidate(change);
        break;
      case "end":
        this.invalidate(change);
        break;
      case "rate":
      case "stale":
      case "unavailable":
        this.requeue(state);
        break;
      case "restored":
        this.seeking = false;
        this.requeue(state);
        break;
      case "seek-complete":
        this.seeking = false;
        break;
    }
  }

  /** Seek or end of media: nothing computed against the old timeline survives */
  private invalidate(reason: string): void {
    const count = this.pending.length + this.queue.length;
    this.dropped.stale += count;
    this.pending = [];
    this.queue = [];
    this.clearTimer();
    if (count > 0) {
      console.log(`[scheduler] invalidated reason=${reason} dropped=${count}`);
    }
    this.checkDrained();
  }

  /** Rate or availability change: recompute pending impulses against the new snapshot */
  private requeue(snapshot: PlaybackState): void {
    const impulses = [...this.queue, ...this.pending.map((entry) => entry.impulse)].sort(
      (a, b) => a.timestamp - b.timestamp
    );
    this.pending = [];
    this.queue = [];
    this.clearTimer();

    const held = this.isHeld(snapshot);
    for (const impulse of impulses) {
      if (held) {
        this.hold(impulse);
      } else {
        this.schedule(impulse, snapshot);
      }
    }
    this.checkDrained();
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  private arm(): void {
    this.clearTimer();
    const head = this.pending[0];
    if (!head) return;
    const delay = Math.max(0, head.command.dispatchTime - Date.now());
    this.timer = setTimeout(() => this.flush(), delay);
  }

  private flush(): void {
    this.timer = null;
    const now = Date.now();
    const sequence = this.playback.currentState().sequence;

    const due: PendingEntry[] = [];
    while (this.pending[0] && this.pending[0].command.dispatchTime <= now) {
      const entry = this.pending.shift();
      if (entry) due.push(entry);
    }

    const current = due.filter((entry) => {
      if (entry.sequence === sequence) return true;
      this.dropped.stale++;
      return false;
    });

    for (const entry of this.cancelOverlapped(current)) {
      this.send(entry.command);
    }

    this.arm();
    this.checkDrained();
  }

  /** Among commands due together, an earlier one overlapped by a later one on its target is cancelled */
  private cancelOverlapped(entries: PendingEntry[]): PendingEntry[] {
    return entries.filter((entry, index) => {
      const end = commandEndTime(entry.command);
      const overlapped = entries
        .slice(index + 1)
        .some((later) => later.command.deviceTarget === entry.command.deviceTarget && later.command.dispatchTime < end);
      if (overlapped) this.dropped.preempted++;
      return !overlapped;
    });
  }

  private send(command: HapticCommand): void {
    const previous = this.inFlight.get(command.deviceTarget);
    const preempts =
      previous && commandEndTime(previous) > command.dispatchTime ? previous.commandId : undefined;
    if (preempts) this.preemptions++;

    this.inFlight.set(command.deviceTarget, command);
    this.dispatched++;
    try {
      this.sink.dispatch(command, preempts);
    } catch (error) {
      console.error(`[scheduler] dispatch failed commandId=${command.commandId}: ${errorMessage(error)}`);
    }
  }

  private checkDrained(): void {
    if (this.state === "draining" && this.pending.length === 0 && this.queue.length === 0) {
      this.state = "idle";
      console.log("[scheduler] drained");
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
