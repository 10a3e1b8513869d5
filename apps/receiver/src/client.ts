/**
 * Socket.IO client for the command channel.
 * Handles TLS pinning, the HELLO handshake, reconnection, clock sync and
 * command acknowledgment.
 */

import { io, type ManagerOptions, type Socket, type SocketOptions } from "socket.io-client";
import {
  ConnectionResetError,
  ErrorEventSchema,
  HandshakeFailedError,
  PROTOCOL_VERSION,
  TIMING,
  TimePongEventSchema,
  commandEndTime,
  errorMessage,
  validateHapticCommand,
  validateHelloReply,
  type AckStatus,
  type CommandAck,
  type DeviceStatusPayload,
  type HapticsError,
  type HelloPayload,
  type ReceiverId,
  type SessionId,
  type TimePingEvent,
} from "@remote-haptics/shared";
import type { DeviceRegistry } from "./devices/registry.js";
import { ServerClock } from "./sync/clock.js";

export interface ReceiverTls {
  /** PEM the server certificate must chain to */
  ca: string;
  /** Optional client certificate whose fingerprint the server records */
  cert?: string;
  key?: string;
}

export interface ReceiverClientOptions {
  /** http(s)://host:port of the haptics server */
  url: string;
  receiverId: ReceiverId;
  /** null connects without TLS */
  tls: ReceiverTls | null;
  reconnectAttempts: number;
  reconnectDelayMs: number;
  reconnectDelayMaxMs: number;
  helloTimeoutMs: number;
  pingIntervalMs: number;
  /** 0 disables periodic device rediscovery */
  rediscoverIntervalMs: number;
  verbose: boolean;
}

export const DEFAULT_CLIENT_OPTIONS: Omit<ReceiverClientOptions, "url" | "receiverId" | "tls"> = {
  reconnectAttempts: 10,
  reconnectDelayMs: 1000,
  reconnectDelayMaxMs: 5000,
  helloTimeoutMs: TIMING.HANDSHAKE_TIMEOUT_MS,
  pingIntervalMs: TIMING.TIME_PING_MS,
  rediscoverIntervalMs: 5000,
  verbose: false,
};

export type ReceiverStatus = "disconnected" | "connecting" | "handshaking" | "active" | "failed";

export type StatusListener = (status: ReceiverStatus) => void;
export type ErrorListener = (error: HapticsError) => void;

export interface ReceiverStats {
  connects: number;
  commands: number;
  invalidCommands: number;
  acks: Record<AckStatus, number>;
}

type AckCallback = (reply: unknown) => void;

function isAckCallback(value: unknown): value is AckCallback {
  return typeof value === "function";
}

const TLS_CODE = /CERT|SELF_SIGNED|UNABLE_TO_VERIFY|ERR_TLS|ERR_SSL/;

/**
 * Search a connect_error for a certificate failure. engine.io nests the
 * underlying socket error under `description` (and `error` on the ws event).
 */
function certificateFailure(error: unknown, depth = 0): string | null {
  if (typeof error !== "object" || error === null || depth > 4) return null;
  const code: unknown = Reflect.get(error, "code");
  if (typeof code === "string" && TLS_CODE.test(code)) return code;
  const message: unknown = Reflect.get(error, "message");
  if (typeof message === "string" && /certificate/i.test(message)) return message;
  for (const key of ["description", "error", "cause"]) {
    const found = certificateFailure(Reflect.get(error, key), depth + 1);
    if (found) return found;
  }
  return null;
}

/**
 * Receiver side of the command channel.
 * One instance owns one socket and the lifecycle of the registry's devices.
 */
export class ReceiverClient {
  private readonly options: ReceiverClientOptions;
  private socket: Socket | null = null;
  private status: ReceiverStatus = "disconnected";
  private sessionId: SessionId | null = null;
  private pingInterval: ReturnType<typeof setInterval> | null = null;
  /** Resolves once the current connection is reset and accepted */
  private ready: Promise<boolean> = Promise.resolve(false);
  /** Commands are applied one at a time, in arrival order */
  private commandChain: Promise<void> = Promise.resolve();
  /** Moves on every connect and disconnect; a command belongs to the one it arrived on */
  private connection = 0;
  private unsubscribeDevices: (() => void) | null = null;

  private readonly statusListeners = new Set<StatusListener>();
  private readonly errorListeners = new Set<ErrorListener>();

  private readonly counters: ReceiverStats = {
    connects: 0,
    commands: 0,
    invalidCommands: 0,
    acks: { applied: 0, expired: 0, device_error: 0, unknown_target: 0 },
  };

  constructor(
    private readonly registry: DeviceRegistry,
    options: Pick<ReceiverClientOptions, "url" | "receiverId" | "tls"> & Partial<ReceiverClientOptions>,
    readonly clock: ServerClock = new ServerClock()
  ) {
    this.options = { ...DEFAULT_CLIENT_OPTIONS, ...options };
  }

  getStatus(): ReceiverStatus {
    return this.status;
  }

  getSessionId(): SessionId | null {
    return this.sessionId;
  }

  stats(): ReceiverStats {
    return { ...this.counters, acks: { ...this.counters.acks } };
  }

  /** Subscribe to connection status changes */
  onStatusChange(listener: StatusListener): () => void {
    this.statusListeners.add(listener);
    return () => this.statusListeners.delete(listener);
  }

  /** Subscribe to channel errors; fatal ones end the client */
  onError(listener: ErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => this.errorListeners.delete(listener);
  }

  /** Connect to the server; reconnection is automatic until the ceiling */
  connect(): void {
    if (this.socket) return;

    this.setStatus("connecting");
    const { tls } = this.options;
    const socketOptions: Partial<ManagerOptions & SocketOptions> = {
      transports: ["websocket"],
      forceNew: true,
      reconnection: true,
      reconnectionAttempts: this.options.reconnectAttempts,
      reconnectionDelay: this.options.reconnectDelayMs,
      reconnectionDelayMax: this.options.reconnectDelayMaxMs,
      ...(tls ? { ca: tls.ca, cert: tls.cert, key: tls.key, rejectUnauthorized: true } : {}),
    };
    const socket = io(this.options.url, socketOptions);
    this.socket = socket;

    this.unsubscribeDevices = this.registry.onStatus((status) => this.reportDevice(status));
    if (this.options.rediscoverIntervalMs > 0) {
      this.registry.startRediscovery(this.options.rediscoverIntervalMs);
    }
    this.registerSocketHandlers(socket);
  }

  /** Close the connection and leave every device at neutral */
  async disconnect(): Promise<void> {
    this.teardown();
    await this.registry.resetAll();
    if (this.status !== "failed") {
      this.setStatus("disconnected");
    }
  }

  private teardown(): void {
    this.stopPing();
    this.registry.stopRediscovery();
    this.unsubscribeDevices?.();
    this.unsubscribeDevices = null;
    if (this.socket) {
      const socket = this.socket;
      this.socket = null;
      socket.disconnect();
    }
    this.sessionId = null;
  }

  private registerSocketHandlers(socket: Socket): void {
    socket.on("connect", () => {
      this.connection++;
      this.counters.connects++;
      console.log(`[receiver] connected url=${this.options.url} socket=${socket.id ?? "?"}`);
      this.ready = this.handshake(socket);
    });

    socket.on("disconnect", (reason: string) => {
      this.connection++;
      this.stopPing();
      this.sessionId = null;
      this.ready = Promise.resolve(false);
      if (reason === "io client disconnect" || this.status === "failed") return;

      this.resetDevices("disconnect");
      console.warn(`[receiver] disconnected reason=${reason}, reconnecting`);
      this.setStatus("connecting");
      this.report(new ConnectionResetError(`Connection lost: ${reason}`));
      // socket.io does not reconnect by itself after a server-side close
      if (reason === "io server disconnect") socket.connect();
    });

    socket.on("connect_error", (error: Error) => {
      if (this.status === "failed") return;
      const tlsFailure = certificateFailure(error);
      if (tlsFailure) {
        this.fail(new HandshakeFailedError(`TLS verification failed: ${tlsFailure}`, { cause: error }));
        return;
      }
      console.log(`[receiver] connect_error: ${errorMessage(error)}`);
    });

    socket.io.on("reconnect_attempt", (attempt: number) => {
      if (this.options.verbose) {
        console.debug(`[receiver] reconnect attempt=${attempt}/${this.options.reconnectAttempts}`);
      }
    });

    socket.io.on("reconnect_failed", () => {
      this.fail(
        new ConnectionResetError(`Gave up after ${this.options.reconnectAttempts} reconnect attempts`, true)
      );
    });

    socket.on("HAPTIC_COMMAND", (data: unknown, ack: unknown) => {
      const callback = isAckCallback(ack) ? ack : undefined;
      const arrivedOn = this.connection;
      const ready = this.ready;
      this.commandChain = this.commandChain
        .then(() => this.handleCommand(data, callback, arrivedOn, ready))
        .catch((error: unknown) => {
          console.error(`[HAPTIC_COMMAND] handler error: ${errorMessage(error)}`);
        });
    });

    socket.on("TIME_PONG", (data: unknown) => {
      const parsed = TimePongEventSchema.shape.payload.safeParse(data);
      if (!parsed.success) return;
      this.clock.processPong(parsed.data.t0, parsed.data.serverTs);
    });

    socket.on("ERROR", (data: unknown) => {
      const parsed = ErrorEventSchema.shape.payload.safeParse(data);
      if (!parsed.success) return;
      const { code, message } = parsed.data;
      if (code === "HANDSHAKE_FAILED") {
        this.fail(new HandshakeFailedError(`Server rejected handshake: ${message}`));
        return;
      }
      console.warn(`[receiver] server error code=${code}: ${message}`);
    });
  }

  // ==========================================================================
  // Handshake
  // ==========================================================================

  /** Reset devices, then HELLO. Never rejects. */
  private async handshake(socket: Socket): Promise<boolean> {
    this.setStatus("handshaking");
    this.clock.reset();
    await this.registry.resetAll();

    const hello: HelloPayload = {
      protocolVersion: PROTOCOL_VERSION,
      receiverId: this.options.receiverId,
      devices: this.registry.list(),
    };

    let reply: unknown;
    try {
      reply = await socket.timeout(this.options.helloTimeoutMs).emitWithAck("HELLO", hello);
    } catch (error) {
      // A dropped connection retries on reconnect
      if (!socket.connected) return false;
      this.fail(
        new HandshakeFailedError(`No HELLO reply within ${this.options.helloTimeoutMs}ms`, { cause: error })
      );
      return false;
    }

    const result = validateHelloReply(reply);
    if (!result.success) {
      this.fail(new HandshakeFailedError(`Malformed HELLO reply: ${result.error}`));
      return false;
    }
    if (!result.data.accepted) {
      this.fail(new HandshakeFailedError(`Server rejected handshake: ${result.data.reason}`));
      return false;
    }
    if (this.status === "failed" || !socket.connected) return false;

    this.sessionId = result.data.sessionId;
    console.log(`[receiver] session active sessionId=${this.sessionId} receiverId=${this.options.receiverId}`);
    this.setStatus("active");
    this.startPing(socket);
    return true;
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  private async handleCommand(
    data: unknown,
    ack: AckCallback | undefined,
    arrivedOn: number,
    ready: Promise<boolean>
  ): Promise<void> {
    const accepted = await ready;
    if (!accepted || arrivedOn !== this.connection) {
      console.log("[HAPTIC_COMMAND] dropped, its session has ended");
      return;
    }

    const result = validateHapticCommand(data);
    if (!result.success) {
      this.counters.invalidCommands++;
      console.warn(`[HAPTIC_COMMAND] invalid payload: ${result.error}`);
      return;
    }
    const { command, preempts } = result.data;
    this.counters.commands++;
    if (this.options.verbose) {
      console.debug(
        `[HAPTIC_COMMAND] commandId=${command.commandId} target=${command.deviceTarget} intensity=${command.intensity}${
          preempts ? ` preempts=${preempts}` : ""
        }`
      );
    }

    let reply: CommandAck;
    if (this.clock.isReliable() && this.clock.serverNow() >= commandEndTime(command)) {
      reply = { type: "COMMAND_ACK", commandId: command.commandId, status: "expired" };
    } else {
      const outcome = await this.registry.apply(command);
      if (arrivedOn !== this.connection) {
        // The session ended mid-apply; the next one starts from neutral
        console.log(`[HAPTIC_COMMAND] commandId=${command.commandId} outlived its session, resetting devices`);
        await this.registry.resetAll();
        return;
      }
      reply = {
        type: "COMMAND_ACK",
        commandId: command.commandId,
        status: outcome.status,
        ...(outcome.detail ? { detail: outcome.detail } : {}),
      };
    }

    this.counters.acks[reply.status]++;
    if (reply.status !== "applied") {
      console.log(
        `[HAPTIC_COMMAND] commandId=${command.commandId} status=${reply.status}${reply.detail ? `: ${reply.detail}` : ""}`
      );
    }
    ack?.(reply);
  }

  // ==========================================================================
  // Devices
  // ==========================================================================

  private reportDevice(status: DeviceStatusPayload): void {
    if (this.status !== "active" || !this.socket) return;
    this.socket.emit("DEVICE_STATUS", status);
  }

  private resetDevices(why: string): void {
    this.registry.resetAll().catch((error: unknown) => {
      console.error(`[receiver] device reset on ${why} failed: ${errorMessage(error)}`);
    });
  }

  // ==========================================================================
  // Clock Sync
  // ==========================================================================

  private startPing(socket: Socket): void {
    this.stopPing();
    this.pingInterval = setInterval(() => {
      if (socket.connected) {
        const ping: TimePingEvent = { type: "TIME_PING", payload: { t0: Date.now() } };
        socket.emit("TIME_PING", ping.payload);
      }
    }, this.options.pingIntervalMs);
  }

  private stopPing(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  private fail(error: HapticsError): void {
    if (this.status === "failed") return;
    console.error(`[receiver] ${error.name}: ${error.message}`);
    this.setStatus("failed");
    this.teardown();
    this.resetDevices("failure");
    this.report(error);
  }

  private report(error: HapticsError): void {
    this.errorListeners.forEach((l) => l(error));
  }

  private setStatus(status: ReceiverStatus): void {
    if (this.status !== status) {
      this.status = status;
      this.statusListeners.forEach((l) => l(status));
    }
  }
}
