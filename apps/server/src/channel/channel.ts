/**
 * Secure Command Channel, server side.
 *
 * Implements the scheduler's CommandSink: each command goes out on every
 * active session that should receive it, in dispatch order, and is
 * acknowledged individually. A missing ack is a per-command timeout; it is
 * logged and never retried. Nothing is queued for receivers that are not
 * connected.
 */

import {
  BROADCAST_TARGET,
  CommandTimeoutError,
  TIMING,
  errorMessage,
  validateCommandAck,
  type AckStatus,
  type CommandAck,
  type CommandId,
  type HapticCommand,
  type HapticCommandPayload,
} from "@remote-haptics/shared";
import type { CommandSink } from "../scheduler/scheduler.js";
import type { Session, SessionStore } from "./sessions.js";

export interface ChannelOptions {
  ackTimeoutMs: number;
  verbose: boolean;
}

export const DEFAULT_CHANNEL_OPTIONS: ChannelOptions = {
  ackTimeoutMs: TIMING.ACK_TIMEOUT_MS,
  verbose: false,
};

export interface ChannelStats {
  sent: number;
  undeliverable: number;
  timeouts: number;
  invalidAcks: number;
  acks: Record<AckStatus, number>;
}

export interface AckEvent {
  sessionId: string;
  ack: CommandAck;
}

export type AckListener = (event: AckEvent) => void;
export type TimeoutListener = (error: CommandTimeoutError, sessionId: string) => void;

export class CommandChannel implements CommandSink {
  private readonly options: ChannelOptions;
  private readonly ackListeners = new Set<AckListener>();
  private readonly timeoutListeners = new Set<TimeoutListener>();
  private readonly counters: ChannelStats = {
    sent: 0,
    undeliverable: 0,
    timeouts: 0,
    invalidAcks: 0,
    acks: { applied: 0, expired: 0, device_error: 0, unknown_target: 0 },
  };

  constructor(
    private readonly sessions: SessionStore,
    options: Partial<ChannelOptions> = {}
  ) {
    this.options = { ...DEFAULT_CHANNEL_OPTIONS, ...options };
  }

  /** Subscribe to command acknowledgments */
  onAck(listener: AckListener): () => void {
    this.ackListeners.add(listener);
    return () => this.ackListeners.delete(listener);
  }

  /** Subscribe to per-command ack timeouts */
  onTimeout(listener: TimeoutListener): () => void {
    this.timeoutListeners.add(listener);
    return () => this.timeoutListeners.delete(listener);
  }

  stats(): ChannelStats {
    return { ...this.counters, acks: { ...this.counters.acks } };
  }

  dispatch(command: HapticCommand, preempts?: CommandId): void {
    const targets = this.sessions.sessionsFor(command.deviceTarget, BROADCAST_TARGET);
    if (targets.length === 0) {
      this.counters.undeliverable++;
      if (this.options.verbose) {
        console.debug(`[channel] no receiver for commandId=${command.commandId} target=${command.deviceTarget}`);
      }
      return;
    }

    const payload: HapticCommandPayload = preempts ? { command, preempts } : { command };
    for (const session of targets) {
      void this.deliver(session, command, payload);
    }
  }

  private async deliver(session: Session, command: HapticCommand, payload: HapticCommandPayload): Promise<void> {
    this.counters.sent++;
    if (this.options.verbose) {
      console.debug(
        `[channel] send commandId=${command.commandId} sessionId=${session.sessionId} target=${command.deviceTarget} intensity=${command.intensity.toFixed(3)}`
      );
    }

    let reply: unknown;
    try {
      reply = await session.link.request("HAPTIC_COMMAND", payload, this.options.ackTimeoutMs);
    } catch (error) {
      if (!this.sessions.has(session.sessionId)) {
        console.debug(`[channel] session closed before ack commandId=${command.commandId} sessionId=${session.sessionId}`);
        return;
      }
      const timeout = new CommandTimeoutError(command.commandId, this.options.ackTimeoutMs);
      this.counters.timeouts++;
      console.warn(`[channel] ${timeout.message} sessionId=${session.sessionId} cause=${errorMessage(error)}`);
      for (const listener of this.timeoutListeners) listener(timeout, session.sessionId);
      return;
    }

    const result = validateCommandAck(reply);
    if (!result.success) {
      this.counters.invalidAcks++;
      console.warn(`[channel] invalid ack commandId=${command.commandId} sessionId=${session.sessionId}: ${result.error}`);
      return;
    }

    const ack = result.data;
    this.sessions.recordAck(session.sessionId, ack.commandId);
    this.counters.acks[ack.status]++;
    if (ack.status !== "applied") {
      console.log(
        `[channel] ack commandId=${ack.commandId} status=${ack.status} sessionId=${session.sessionId}${ack.detail ? ` detail=${ack.detail}` : ""}`
      );
    }
    for (const listener of this.ackListeners) listener({ sessionId: session.sessionId, ack });
  }
}
