/**
 * Socket.IO event handlers for the command channel.
 */

import type { Socket } from "socket.io";
import {
  HandshakeFailedError,
  TimePingEventSchema,
  validateDeviceStatus,
  validateHello,
  type ErrorEvent,
  type HelloReply,
  type TimePongEvent,
} from "@remote-haptics/shared";
import type { RateLimiter } from "./limits.js";
import { peerFingerprint, socketLink } from "./link.js";
import type { SessionStore } from "./sessions.js";

export interface HandlerContext {
  sessions: SessionStore;
  limiter: RateLimiter;
  handshakeTimeoutMs: number;
  verbose: boolean;
}

type AckCallback = (reply: unknown) => void;

function isAckCallback(value: unknown): value is AckCallback {
  return typeof value === "function";
}

/**
 * Register all channel handlers on a freshly connected socket.
 * The socket carries a handshaking session until HELLO is accepted.
 */
export function registerHandlers(socket: Socket, ctx: HandlerContext): void {
  const link = socketLink(socket);
  const session = ctx.sessions.openSession(link, peerFingerprint(socket));
  console.log(
    `[channel] connected socket=${socket.id} address=${link.address} sessionId=${session.sessionId}${
      session.fingerprint ? ` fingerprint=${session.fingerprint}` : ""
    }`
  );

  const handshakeTimer = setTimeout(() => {
    if (session.state === "active") return;
    failHandshake(socket, new HandshakeFailedError(`No HELLO within ${ctx.handshakeTimeoutMs}ms`));
  }, ctx.handshakeTimeoutMs);

  socket.on("HELLO", (data: unknown, ack: unknown) => {
    handleHello(socket, ctx, data, isAckCallback(ack) ? ack : undefined, () => clearTimeout(handshakeTimer));
  });

  socket.on("TIME_PING", (data: unknown) => {
    handleTimePing(socket, ctx, data);
  });

  socket.on("DEVICE_STATUS", (data: unknown) => {
    handleDeviceStatus(socket, ctx, data);
  });

  socket.on("disconnect", (reason: string) => {
    clearTimeout(handshakeTimer);
    const removed = ctx.sessions.removeByLink(socket.id);
    ctx.limiter.clearKey(socket.id);
    console.log(
      `[channel] disconnected socket=${socket.id} reason=${reason}${removed ? ` sessionId=${removed.sessionId}` : ""}`
    );
  });
}

// ============================================================================
// Handshake
// ============================================================================

function handleHello(
  socket: Socket,
  ctx: HandlerContext,
  data: unknown,
  ack: AckCallback | undefined,
  settle: () => void
): void {
  const session = ctx.sessions.getByLink(socket.id);
  if (!session || session.state === "active") {
    console.log(`[HELLO] ignored socket=${socket.id} state=${session?.state ?? "closed"}`);
    return;
  }

  const rateCheck = ctx.limiter.checkAndRecord(socket.handshake.address, "HELLO");
  if (!rateCheck.allowed) {
    settle();
    reject(socket, ack, rateCheck.error);
    return;
  }

  const result = validateHello(data);
  if (!result.success) {
    settle();
    reject(socket, ack, result.error);
    return;
  }

  const { receiverId, devices } = result.data;
  const activated = ctx.sessions.activate(socket.id, receiverId, devices);
  if (!activated) return;
  settle();

  const reply: HelloReply = {
    type: "HELLO_REPLY",
    accepted: true,
    sessionId: activated.sessionId,
    serverTs: Date.now(),
  };
  ack?.(reply);

  console.log(
    `[HELLO] accepted receiverId=${receiverId} sessionId=${activated.sessionId} devices=${devices
      .map((device) => `${device.id}${device.available ? "" : "(unavailable)"}`)
      .join(",")}`
  );
}

function reject(socket: Socket, ack: AckCallback | undefined, reason: string): void {
  const reply: HelloReply = { type: "HELLO_REPLY", accepted: false, reason };
  ack?.(reply);
  failHandshake(socket, new HandshakeFailedError(reason));
}

function failHandshake(socket: Socket, error: HandshakeFailedError): void {
  console.warn(`[HELLO] handshake failed socket=${socket.id}: ${error.message}`);
  const event: ErrorEvent = { type: "ERROR", payload: { code: error.code, message: error.message } };
  socket.emit("ERROR", event.payload);
  socket.disconnect(true);
}

// ============================================================================
// Clock Sync
// ============================================================================

const TimePingPayloadSchema = TimePingEventSchema.shape.payload;

/**
 * Answer TIME_PING with the server clock.
 * Latency is estimated as half the apparent one-way delay and kept on the session.
 */
function handleTimePing(socket: Socket, ctx: HandlerContext, data: unknown): void {
  const parsed = TimePingPayloadSchema.safeParse(data);
  if (!parsed.success) {
    // High-frequency and not critical
    return;
  }

  if (!ctx.limiter.checkAndRecord(socket.id, "TIME_PING").allowed) return;

  const { t0 } = parsed.data;
  const serverTs = Date.now();
  const latencyMs = Math.max(0, Math.round((serverTs - t0) / 2));
  ctx.sessions.updateLatency(socket.id, latencyMs);
  if (ctx.verbose) {
    console.debug(`[TIME_PING] socket=${socket.id} latencyMs=${latencyMs}`);
  }

  const pong: TimePongEvent = { type: "TIME_PONG", payload: { t0, serverTs } };
  socket.emit("TIME_PONG", pong.payload);
}

// ============================================================================
// Device Status
// ============================================================================

function handleDeviceStatus(socket: Socket, ctx: HandlerContext, data: unknown): void {
  const session = ctx.sessions.getByLink(socket.id);
  if (!session || session.state !== "active") return;

  const rateCheck = ctx.limiter.checkAndRecord(socket.id, "DEVICE_STATUS");
  if (!rateCheck.allowed) {
    console.log(`[DEVICE_STATUS] rate limited sessionId=${session.sessionId}`);
    return;
  }

  const result = validateDeviceStatus(data);
  if (!result.success) {
    console.log(`[DEVICE_STATUS] invalid payload sessionId=${session.sessionId}: ${result.error}`);
    return;
  }

  const { deviceTarget, available, reason } = result.data;
  ctx.sessions.setDeviceAvailability(session.sessionId, deviceTarget, available);
  console.log(
    `[DEVICE_STATUS] sessionId=${session.sessionId} target=${deviceTarget} available=${available}${
      reason ? ` reason=${reason}` : ""
    }`
  );
}
