/**
 * mpv JSON-IPC connection.
 *
 * One newline-delimited JSON socket (mpv's `--input-ipc-server`). Requests
 * carry a `request_id` and are matched with their replies; everything else
 * the player writes is an event. Inbound lines are validated with zod.
 */

import { createConnection, type Socket } from "net";
import { createInterface } from "readline";
import { z } from "zod";
import { ConnectionResetError, TIMING } from "@remote-haptics/shared";

// ============================================================================
// Wire Schemas
// ============================================================================

const MpvReplySchema = z.object({
  request_id: z.number().int(),
  error: z.string(),
  data: z.unknown().optional(),
});

export const MpvEventSchema = z
  .object({
    event: z.string(),
    id: z.number().optional(),
    name: z.string().optional(),
    data: z.unknown().optional(),
    reason: z.string().optional(),
  })
  .passthrough();
export type MpvEvent = z.infer<typeof MpvEventSchema>;

export type MpvArg = string | number | boolean;

export class MpvCommandError extends Error {
  constructor(
    readonly command: string,
    readonly mpvError: string
  ) {
    super(`mpv rejected ${command}: ${mpvError}`);
    this.name = "MpvCommandError";
  }
}

interface PendingRequest {
  command: string;
  resolve: (data: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export type MpvEventListener = (event: MpvEvent) => void;
export type MpvCloseListener = () => void;

export interface MpvIpcOptions {
  requestTimeoutMs: number;
  verbose: boolean;
}

export class MpvIpcConnection {
  private socket: Socket | null = null;
  private nextRequestId = 1;
  private closed = false;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly eventListeners = new Set<MpvEventListener>();
  private readonly closeListeners = new Set<MpvCloseListener>();
  private readonly options: MpvIpcOptions;

  constructor(
    private readonly socketPath: string,
    options: Partial<MpvIpcOptions> = {}
  ) {
    this.options = { requestTimeoutMs: TIMING.ACK_TIMEOUT_MS * 2, verbose: false, ...options };
  }

  /** Subscribe to player events */
  onEvent(listener: MpvEventListener): () => void {
    this.eventListeners.add(listener);
    return () => this.eventListeners.delete(listener);
  }

  /** Subscribe to connection loss (fires once) */
  onClose(listener: MpvCloseListener): () => void {
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = createConnection(this.socketPath);
      this.socket = socket;

      const onConnectError = (error: Error) => {
        this.closed = true;
        reject(error);
      };
      socket.once("error", onConnectError);

      socket.once("connect", () => {
        socket.off("error", onConnectError);
        socket.on("error", (error) => {
          console.debug(`[mpv] socket error: ${error.message}`);
        });
        socket.once("close", () => this.handleClose());

        const lines = createInterface({ input: socket, crlfDelay: Infinity });
        lines.on("line", (line) => this.handleLine(line));
        resolve();
      });
    });
  }

  /** Send a raw command; resolves with the reply's `data` */
  command(args: MpvArg[]): Promise<unknown> {
    const socket = this.socket;
    const name = String(args[0] ?? "");
    if (!socket || this.closed) {
      return Promise.reject(new ConnectionResetError(`mpv connection is closed (${name})`));
    }

    const requestId = this.nextRequestId++;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new Error(`mpv request ${name} timed out after ${this.options.requestTimeoutMs}ms`));
      }, this.options.requestTimeoutMs);

      this.pending.set(requestId, { command: name, resolve, reject, timer });
      const line = JSON.stringify({ command: args, request_id: requestId });
      if (this.options.verbose) {
        console.debug(`[mpv] -> ${line}`);
      }
      socket.write(`${line}\n`);
    });
  }

  async getProperty(name: string): Promise<unknown> {
    return this.command(["get_property", name]);
  }

  async setProperty(name: string, value: MpvArg): Promise<void> {
    await this.command(["set_property", name, value]);
  }

  async observeProperty(id: number, name: string): Promise<void> {
    await this.command(["observe_property", id, name]);
  }

  close(): void {
    if (this.socket && !this.socket.destroyed) {
      this.socket.destroy();
    }
    this.handleClose();
  }

  private handleLine(line: string): void {
    if (line.trim() === "") return;
    if (this.options.verbose) {
      console.debug(`[mpv] <- ${line}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      console.warn(`[mpv] ignoring malformed line: ${line.slice(0, 120)}`);
      return;
    }

    const reply = MpvReplySchema.safeParse(parsed);
    if (reply.success) {
      const request = this.pending.get(reply.data.request_id);
      if (!request) return;
      this.pending.delete(reply.data.request_id);
      clearTimeout(request.timer);
      if (reply.data.error === "success") {
        request.resolve(reply.data.data ?? null);
      } else {
        request.reject(new MpvCommandError(request.command, reply.data.error));
      }
      return;
    }

    const event = MpvEventSchema.safeParse(parsed);
    if (!event.success) {
      console.warn(`[mpv] ignoring unrecognized message: ${line.slice(0, 120)}`);
      return;
    }
    for (const listener of this.eventListeners) {
      listener(event.data);
    }
  }

  private handleClose(): void {
    const wasOpen = !this.closed;
    this.closed = true;

    for (const [id, request] of this.pending) {
      clearTimeout(request.timer);
      request.reject(new ConnectionResetError(`mpv connection closed during ${request.command}`));
      this.pending.delete(id);
    }

    if (!wasOpen) return;
    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }
}
