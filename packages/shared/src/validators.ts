/**
 * Validation utilities for the RemoteHaptics protocol.
 *
 * These validators wrap zod schemas so inbound payloads are checked once at
 * the edge and rejected with a readable message instead of an exception.
 */

import { z } from "zod";
import {
  CommandAckSchema,
  DeviceStatusPayloadSchema,
  HapticCommandPayloadSchema,
  HelloPayloadSchema,
  HelloReplySchema,
  type CommandAck,
  type DeviceStatusPayload,
  type HapticCommandPayload,
  type HelloPayload,
  type HelloReply,
} from "./events.js";
import { NET_DEFAULT_PORT, PROTOCOL_VERSION } from "./constants.js";

// ============================================================================
// Result Type
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

function fromSchema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): ValidationResult<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    return {
      success: false,
      error: formatZodError(result.error),
    };
  }
  return { success: true, data: result.data };
}

// ============================================================================
// Event Validators
// ============================================================================

/** Validate a HELLO payload, including the protocol version */
export function validateHello(payload: unknown): ValidationResult<HelloPayload> {
  const result = fromSchema(HelloPayloadSchema, payload);
  if (!result.success) return result;

  if (!isCompatibleVersion(result.data.protocolVersion)) {
    return {
      success: false,
      error: `Unsupported protocol version ${result.data.protocolVersion} (expected ${PROTOCOL_VERSION})`,
    };
  }

  const ids = new Set<string>();
  for (const device of result.data.devices) {
    if (ids.has(device.id)) {
      return { success: false, error: `Duplicate device id: ${device.id}` };
    }
    ids.add(device.id);
  }

  return result;
}

export function validateHelloReply(reply: unknown): ValidationResult<HelloReply> {
  return fromSchema(HelloReplySchema, reply);
}

export function validateHapticCommand(payload: unknown): ValidationResult<HapticCommandPayload> {
  return fromSchema(HapticCommandPayloadSchema, payload);
}

export function validateCommandAck(ack: unknown): ValidationResult<CommandAck> {
  return fromSchema(CommandAckSchema, ack);
}

export function validateDeviceStatus(payload: unknown): ValidationResult<DeviceStatusPayload> {
  return fromSchema(DeviceStatusPayloadSchema, payload);
}

// ============================================================================
// Addresses
// ============================================================================

export interface HostPort {
  host: string;
  port: number;
  /** True when the value named no port and NET_DEFAULT_PORT was used */
  defaultedPort: boolean;
}

/** Parse "host:port" or a bare host; "[v6]:port" brackets are stripped */
export function parseAddress(value: string): ValidationResult<HostPort> {
  const trimmed = value.trim();
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
  let host: string;
  let portText: string | undefined;

  if (bracketed) {
    host = bracketed[1] ?? "";
    portText = bracketed[2];
  } else {
    const idx = trimmed.lastIndexOf(":");
    if (idx === -1) {
      host = trimmed;
    } else if (trimmed.indexOf(":") !== idx) {
      return { success: false, error: `Ambiguous address ${value}; write IPv6 hosts as [host]:port` };
    } else {
      host = trimmed.slice(0, idx);
      portText = trimmed.slice(idx + 1);
    }
  }

  if (host === "") {
    return { success: false, error: `Missing host in address ${value}` };
  }
  if (portText === undefined) {
    return { success: true, data: { host, port: NET_DEFAULT_PORT, defaultedPort: true } };
  }

  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port > 65535) {
    return { success: false, error: `Invalid port in address ${value}` };
  }
  return { success: true, data: { host, port, defaultedPort: false } };
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Versions are "<name>:<major>.<minor>"; peers must agree on name and major.
 */
export function isCompatibleVersion(version: string): boolean {
  const parsed = parseVersion(version);
  const ours = parseVersion(PROTOCOL_VERSION);
  if (!parsed || !ours) return false;
  return parsed.name === ours.name && parsed.major === ours.major;
}

function parseVersion(version: string): { name: string; major: number } | null {
  const match = /^([A-Za-z]+):(\d+)\.(\d+)$/.exec(version);
  if (!match) return null;
  const [, name, major] = match;
  if (name === undefined || major === undefined) return null;
  return { name, major: Number(major) };
}

export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.join(".");
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join("; ");
}
