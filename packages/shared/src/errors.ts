/**
 * Error taxonomy shared by server and receiver.
 *
 * `fatal` marks errors that end their scope (a decode pass, a session);
 * everything else is absorbed with retry or backoff and logged.
 */

import type { CommandId, DeviceFailureReason, DeviceTarget } from "./state.js";

export type HapticsErrorCode =
  | "DECODE_ERROR"
  | "PLAYER_UNAVAILABLE"
  | "HANDSHAKE_FAILED"
  | "TIMEOUT"
  | "CONNECTION_RESET"
  | "DEVICE_ERROR"
  | "RECORDING_INVALID";

export class HapticsError extends Error {
  readonly code: HapticsErrorCode;
  readonly fatal: boolean;

  constructor(code: HapticsErrorCode, message: string, fatal: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HapticsError";
    this.code = code;
    this.fatal = fatal;
  }
}

/** Audio source could not be decoded from the given offset */
export class DecodeError extends HapticsError {
  readonly offsetSec: number;

  constructor(message: string, offsetSec: number, options?: { cause?: unknown }) {
    super("DECODE_ERROR", message, true, options);
    this.name = "DecodeError";
    this.offsetSec = offsetSec;
  }
}

export class PlayerUnavailableError extends HapticsError {
  readonly attempts: number;

  constructor(attempts: number, options?: { cause?: unknown }) {
    super("PLAYER_UNAVAILABLE", `Media player unreachable after ${attempts} attempts`, false, options);
    this.name = "PlayerUnavailableError";
    this.attempts = attempts;
  }
}

export class HandshakeFailedError extends HapticsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("HANDSHAKE_FAILED", message, true, options);
    this.name = "HandshakeFailedError";
  }
}

export class CommandTimeoutError extends HapticsError {
  readonly commandId: CommandId;

  constructor(commandId: CommandId, timeoutMs: number) {
    super("TIMEOUT", `No ack for ${commandId} within ${timeoutMs}ms`, false);
    this.name = "CommandTimeoutError";
    this.commandId = commandId;
  }
}

export class ConnectionResetError extends HapticsError {
  constructor(message: string, fatal = false, options?: { cause?: unknown }) {
    super("CONNECTION_RESET", message, fatal, options);
    this.name = "ConnectionResetError";
  }
}

export class DeviceError extends HapticsError {
  readonly deviceTarget: DeviceTarget;
  readonly reason: DeviceFailureReason;

  constructor(deviceTarget: DeviceTarget, reason: DeviceFailureReason, message: string, options?: { cause?: unknown }) {
    super("DEVICE_ERROR", message, false, options);
    this.name = "DeviceError";
    this.deviceTarget = deviceTarget;
    this.reason = reason;
  }
}

/** A haptics recording that cannot be parsed */
export class RecordingFormatError extends HapticsError {
  /** 1-based line number, or null for the file as a whole */
  readonly line: number | null;

  constructor(message: string, line: number | null = null) {
    super("RECORDING_INVALID", line === null ? message : `line ${line}: ${message}`, true);
    this.name = "RecordingFormatError";
    this.line = line;
  }
}

export function isHapticsError(value: unknown): value is HapticsError {
  return value instanceof HapticsError;
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
