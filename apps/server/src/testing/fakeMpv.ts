/**
 * In-process stand-in for mpv's JSON-IPC server, listening on a Unix socket.
 */

import { rmSync } from "fs";
import { createServer, type Server, type Socket } from "net";
import { tmpdir } from "os";
import { join } from "path";
import { createInterface } from "readline";

let socketCounter = 0;

export function tempSocketPath(label: string): string {
  socketCounter++;
  return join(tmpdir(), `rh-${label}-${process.pid}-${socketCounter}.sock`);
}

export class FakeMpv {
  readonly properties = new Map<string, unknown>([
    ["time-pos", 0],
    ["pause", false],
    ["speed", 1],
    ["eof-reached", false],
  ]);
  /** Every command received, in order */
  readonly received: unknown[][] = [];

  private server: Server | null = null;
  private readonly clients = new Set<Socket>();
  private readonly observed = new Map<string, number>();

  constructor(readonly socketPath: string = tempSocketPath("mpv")) {}

  get clientCount(): number {
    return this.clients.size;
  }

  start(): Promise<void> {
    rmSync(this.socketPath, { force: true });
    const server = createServer((socket) => this.accept(socket));
    this.server = server;
    return new Promise((resolve) => server.listen(this.socketPath, () => resolve()));
  }

  stop(): Promise<void> {
    this.dropClients();
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => server.close(() => resolve()));
  }

  dropClients(): void {
    for (const socket of this.clients) socket.destroy();
    this.clients.clear();
    this.observed.clear();
  }

  /** Change a property as the player would, notifying observers */
  setProperty(name: string, value: unknown): void {
    this.properties.set(name, value);
    const id = this.observed.get(name);
    if (id !== undefined) {
      this.broadcast({ event: "property-change", id, name, data: value });
    }
  }

  /** Seek sequence as mpv reports it */
  seekTo(position: number): void {
    this.broadcast({ event: "seek" });
    this.properties.set("time-pos", position);
    this.broadcast({ event: "playback-restart" });
  }

  broadcast(message: object): void {
    const line = `${JSON.stringify(message)}\n`;
    for (const socket of this.clients) socket.write(line);
  }

  private accept(socket: Socket): void {
    this.clients.add(socket);
    socket.on("close", () => this.clients.delete(socket));
    socket.on("error", () => this.clients.delete(socket));

    const lines = createInterface({ input: socket });
    lines.on("line", (line) => this.handle(socket, line));
  }

  private handle(socket: Socket, line: string): void {
    const message: unknown = JSON.parse(line);
    if (typeof message !== "object" || message === null) return;
    const command: unknown = Reflect.get(message, "command");
    const requestId: unknown = Reflect.get(message, "request_id");
    if (!Array.isArray(command)) return;

    const args: unknown[] = command;
    this.received.push(args);
    const reply = (error: string, data?: unknown) =>
      socket.write(`${JSON.stringify({ request_id: requestId, error, data })}\n`);

    const [name, first, second] = args;
    switch (name) {
      case "get_property": {
        const value = typeof first === "string" ? this.properties.get(first) : undefined;
        if (value === undefined || value === null) {
          reply("property unavailable");
        } else {
          reply("success", value);
        }
        break;
      }
      case "set_property":
        reply("success");
        if (typeof first === "string") this.setProperty(first, second);
        break;
      case "observe_property":
        reply("success");
        if (typeof first === "number" && typeof second === "string") {
          this.observed.set(second, first);
          this.broadcast({ event: "property-change", id: first, name: second, data: this.properties.get(second) });
        }
        break;
      case "seek":
        reply("success");
        if (typeof first === "number") this.seekTo(first);
        break;
      default:
        reply("invalid parameter");
    }
  }
}
