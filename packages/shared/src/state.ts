/**
 * Canonical data model for RemoteHaptics.
 *
 * Impulses and commands are immutable once created; the factory functions
 * below freeze what they return. The server owns playback state and the
 * scheduler owns commands; receivers only ever see validated copies.
 */

import { z } from "zod";

// ============================================================================
// Primitives & Common Types
// ============================================================================

/** Unique identifiers */
export const CommandIdSchema = z.string().min(1);
export const SessionIdSchema = z.string().min(1);
export const ReceiverIdSchema = z.string().min(1);
export const DeviceTargetSchema = z.string().min(1);

export type CommandId = z.infer<typeof CommandIdSchema>;
export type SessionId = z.infer<typeof SessionIdSchema>;
export type ReceiverId = z.infer<typeof ReceiverIdSchema>;
export type DeviceTarget = z.infer<typeof DeviceTargetSchema>;

/** Device target that addresses every available actuator on a receiver */
export const BROADCAST_TARGET = "broadcast";

/** Normalized 0-1 value */
export const UnitIntervalSchema = z.number().min(0).max(1);

// ============================================================================
// Impulse Events
// ============================================================================

export const ImpulseEventSchema = z.object({
  /** Media-relative seconds */
  timestamp: z.number().nonnegative(),
  magnitude: UnitIntervalSchema,
  /** Source channel index, absent for mixed-down audio */
  channel: z.number().int().nonnegative().optional(),
});
export type ImpulseEvent = Readonly<z.infer<typeof ImpulseEventSchema>>;

export function createImpulse(
  timestamp: number,
  magnitude: number,
  channel?: number
): ImpulseEvent {
  const impulse: z.infer<typeof ImpulseEventSchema> = {
    timestamp,
    magnitude: clampUnit(magnitude),
  };
  if (channel !== undefined) {
    impulse.channel = channel;
  }
  return Object.freeze(impulse);
}

// ============================================================================
// Playback State
// ============================================================================

export const PlaybackStateSchema = z.object({
  /** Media-relative seconds at `updatedAt` */
  position: z.number(),
  /** Signed playback rate, 0 while paused */
  rate: z.number(),
  /** Bumped on every seek and effective rate change */
  sequence: z.number().int().nonnegative(),
  /** Wall-clock ms when `position` was observed */
  updatedAt: z.number(),
  /** True while the player connection is down */
  stale: z.boolean(),
});
export type PlaybackState = Readonly<z.infer<typeof PlaybackStateSchema>>;

export function createDefaultPlaybackState(now: number = Date.now()): PlaybackState {
  return Object.freeze({
    position: 0,
    rate: 0,
    sequence: 0,
    updatedAt: now,
    stale: true,
  });
}

/** Position extrapolated from a snapshot to wall-clock `now` (ms) */
export function positionAt(state: PlaybackState, now: number): number {
  if (state.rate === 0) return state.position;
  return state.position + ((now - state.updatedAt) / 1000) * state.rate;
}

// ============================================================================
// Haptic Commands
// ============================================================================

export const HapticCommandSchema = z.object({
  commandId: CommandIdSchema,
  /** Wall-clock ms (server clock) at which the command should fire */
  dispatchTime: z.number(),
  intensity: UnitIntervalSchema,
  durationMs: z.number().nonnegative(),
  deviceTarget: DeviceTargetSchema,
});
export type HapticCommand = Readonly<z.infer<typeof HapticCommandSchema>>;

export function createCommand(fields: z.infer<typeof HapticCommandSchema>): HapticCommand {
  return Object.freeze({
    ...fields,
    intensity: clampUnit(fields.intensity),
    durationMs: Math.max(0, fields.durationMs),
  });
}

/** Wall-clock ms at which a command's actuation window closes */
export function commandEndTime(command: HapticCommand): number {
  return command.dispatchTime + command.durationMs;
}

/** Per-command outcome reported by a receiver */
export const AckStatusSchema = z.enum([
  "applied",
  "expired",
  "device_error",
  "unknown_target",
]);
export type AckStatus = z.infer<typeof AckStatusSchema>;

// ============================================================================
// Sessions & Devices
// ============================================================================

/** Why a device stopped responding */
export const DeviceFailureReasonSchema = z.enum(["unplugged", "permission_denied", "io"]);
export type DeviceFailureReason = z.infer<typeof DeviceFailureReasonSchema>;

export const DeviceInfoSchema = z.object({
  id: DeviceTargetSchema,
  name: z.string(),
  available: z.boolean(),
});
export type DeviceInfo = z.infer<typeof DeviceInfoSchema>;

export const SessionStateSchema = z.enum(["handshaking", "active"]);
export type SessionState = z.infer<typeof SessionStateSchema>;

// ============================================================================
// Helpers
// ============================================================================

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
