/**
 * Event schemas for the RemoteHaptics command channel.
 *
 * Events flow:
 * 1. Receiver connects over TLS and sends HELLO (acknowledged with HELLO_REPLY)
 * 2. Server pushes HAPTIC_COMMAND in dispatch order
 * 3. Receiver answers each command with a COMMAND_ACK
 *
 * TIME_PING / TIME_PONG and DEVICE_STATUS run alongside for the whole session.
 * Every event is emitted under its `type` as the socket.io event name.
 */

import { z } from "zod";
import {
  AckStatusSchema,
  CommandIdSchema,
  DeviceFailureReasonSchema,
  DeviceInfoSchema,
  DeviceTargetSchema,
  HapticCommandSchema,
  ReceiverIdSchema,
  SessionIdSchema,
} from "./state.js";

// ============================================================================
// Handshake
// ============================================================================

export const HelloPayloadSchema = z.object({
  protocolVersion: z.string().min(1),
  receiverId: ReceiverIdSchema,
  devices: z.array(DeviceInfoSchema),
});
export type HelloPayload = z.infer<typeof HelloPayloadSchema>;

export const HelloEventSchema = z.object({
  type: z.literal("HELLO"),
  payload: HelloPayloadSchema,
});
export type HelloEvent = z.infer<typeof HelloEventSchema>;

export const HelloReplySchema = z.discriminatedUnion("accepted", [
  z.object({
    type: z.literal("HELLO_REPLY"),
    accepted: z.literal(true),
    sessionId: SessionIdSchema,
    serverTs: z.number(),
  }),
  z.object({
    type: z.literal("HELLO_REPLY"),
    accepted: z.literal(false),
    reason: z.string(),
  }),
]);
export type HelloReply = z.infer<typeof HelloReplySchema>;

// ============================================================================
// Commands
// ============================================================================

export const HapticCommandPayloadSchema = z.object({
  command: HapticCommandSchema,
  /** Id of the command this one cancels on the same target */
  preempts: CommandIdSchema.optional(),
});
export type HapticCommandPayload = z.infer<typeof HapticCommandPayloadSchema>;

export const HapticCommandEventSchema = z.object({
  type: z.literal("HAPTIC_COMMAND"),
  payload: HapticCommandPayloadSchema,
});
export type HapticCommandEvent = z.infer<typeof HapticCommandEventSchema>;

export const CommandAckSchema = z.object({
  type: z.literal("COMMAND_ACK"),
  commandId: CommandIdSchema,
  status: AckStatusSchema,
  /** Optional detail for non-applied outcomes */
  detail: z.string().optional(),
});
export type CommandAck = z.infer<typeof CommandAckSchema>;

// ============================================================================
// Clock Sync
// ============================================================================

export const TimePingEventSchema = z.object({
  type: z.literal("TIME_PING"),
  payload: z.object({
    /** Receiver timestamp when the ping was sent */
    t0: z.number(),
  }),
});
export type TimePingEvent = z.infer<typeof TimePingEventSchema>;

export const TimePongEventSchema = z.object({
  type: z.literal("TIME_PONG"),
  payload: z.object({
    t0: z.number(),
    serverTs: z.number(),
  }),
});
export type TimePongEvent = z.infer<typeof TimePongEventSchema>;

// ============================================================================
// Device Status
// ============================================================================

export const DeviceStatusPayloadSchema = z.object({
  deviceTarget: DeviceTargetSchema,
  available: z.boolean(),
  reason: DeviceFailureReasonSchema.optional(),
});
export type DeviceStatusPayload = z.infer<typeof DeviceStatusPayloadSchema>;

export const DeviceStatusEventSchema = z.object({
  type: z.literal("DEVICE_STATUS"),
  payload: DeviceStatusPayloadSchema,
});
export type DeviceStatusEvent = z.infer<typeof DeviceStatusEventSchema>;

// ============================================================================
// Errors
// ============================================================================

export const ErrorEventSchema = z.object({
  type: z.literal("ERROR"),
  payload: z.object({
    code: z.string(),
    message: z.string(),
  }),
});
export type ErrorEvent = z.infer<typeof ErrorEventSchema>;

// ============================================================================
// Union Types
// ============================================================================

/** Events a receiver sends */
export const ReceiverEventSchema = z.discriminatedUnion("type", [
  HelloEventSchema,
  TimePingEventSchema,
  DeviceStatusEventSchema,
]);
export type ReceiverEvent = z.infer<typeof ReceiverEventSchema>;

/** Events the server sends */
export const ServerEventSchema = z.discriminatedUnion("type", [
  HapticCommandEventSchema,
  TimePongEventSchema,
  ErrorEventSchema,
]);
export type ServerEvent = z.infer<typeof ServerEventSchema>;

export const RECEIVER_EVENT_TYPES = ["HELLO", "TIME_PING", "DEVICE_STATUS"] as const;
export const SERVER_EVENT_TYPES = ["HAPTIC_COMMAND", "TIME_PONG", "ERROR"] as const;
