/**
 * @remote-haptics/shared
 *
 * Shared types, schemas, and utilities for RemoteHaptics.
 * This package is the single source of truth for the command channel protocol.
 */

// ============================================================================
// Version
// ============================================================================

export const VERSION = "0.1.0";

// ============================================================================
// Constants
// ============================================================================

export { PROTOCOL_VERSION, NET_DEFAULT_PORT, TIMING } from "./constants.js";

// ============================================================================
// State Exports
// ============================================================================

export {
  // Primitive schemas
  CommandIdSchema,
  SessionIdSchema,
  ReceiverIdSchema,
  DeviceTargetSchema,
  UnitIntervalSchema,
  BROADCAST_TARGET,
  // Model schemas
  ImpulseEventSchema,
  PlaybackStateSchema,
  HapticCommandSchema,
  AckStatusSchema,
  DeviceFailureReasonSchema,
  DeviceInfoSchema,
  SessionStateSchema,
  // Factory functions
  createImpulse,
  createDefaultPlaybackState,
  createCommand,
  // Helpers
  positionAt,
  commandEndTime,
  clampUnit,
} from "./state.js";

export type {
  CommandId,
  SessionId,
  ReceiverId,
  DeviceTarget,
  ImpulseEvent,
  PlaybackState,
  HapticCommand,
  AckStatus,
  DeviceFailureReason,
  DeviceInfo,
  SessionState,
} from "./state.js";

// ============================================================================
// Event Exports
// ============================================================================

export {
  HelloPayloadSchema,
  HelloEventSchema,
  HelloReplySchema,
  HapticCommandPayloadSchema,
  HapticCommandEventSchema,
  CommandAckSchema,
  TimePingEventSchema,
  TimePongEventSchema,
  DeviceStatusPayloadSchema,
  DeviceStatusEventSchema,
  ErrorEventSchema,
  ReceiverEventSchema,
  ServerEventSchema,
  RECEIVER_EVENT_TYPES,
  SERVER_EVENT_TYPES,
} from "./events.js";

export type {
  HelloPayload,
  HelloEvent,
  HelloReply,
  HapticCommandPayload,
  HapticCommandEvent,
  CommandAck,
  TimePingEvent,
  TimePongEvent,
  DeviceStatusPayload,
  DeviceStatusEvent,
  ErrorEvent,
  ReceiverEvent,
  ServerEvent,
} from "./events.js";

// ============================================================================
// Validator Exports
// ============================================================================

export {
  validateHello,
  validateHelloReply,
  validateHapticCommand,
  validateCommandAck,
  validateDeviceStatus,
  isCompatibleVersion,
  parseAddress,
  formatZodError,
} from "./validators.js";

export type { ValidationResult, HostPort } from "./validators.js";

// ============================================================================
// Error Exports
// ============================================================================

export {
  HapticsError,
  DecodeError,
  PlayerUnavailableError,
  HandshakeFailedError,
  CommandTimeoutError,
  ConnectionResetError,
  DeviceError,
  RecordingFormatError,
  isHapticsError,
  errorMessage,
} from "./errors.js";

export type { HapticsErrorCode } from "./errors.js";
