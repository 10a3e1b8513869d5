/**
 * Command channel server: HTTP(S) + Socket.IO, with a /health endpoint.
 */

import type { IncomingMessage, ServerResponse, Server as HttpServer } from "http";
import type { AddressInfo } from "net";
import { Server } from "socket.io";
import { PROTOCOL_VERSION, TIMING, VERSION } from "@remote-haptics/shared";
import { CommandChannel } from "./channel/channel.js";
import { registerHandlers } from "./channel/handlers.js";
import { RateLimiter } from "./channel/limits.js";
import { SessionStore } from "./channel/sessions.js";
import { createTransportServer, type TlsMaterial } from "./channel/tls.js";

export interface HapticsServerOptions {
  host: string;
  port: number;
  /** null serves plain HTTP */
  tls: TlsMaterial | null;
  ackTimeoutMs: number;
  handshakeTimeoutMs: number;
  verbose: boolean;
  /** Extra fields merged into the /health body */
  health?: () => Record<string, unknown>;
}

export const DEFAULT_SERVER_OPTIONS: Omit<HapticsServerOptions, "tls"> = {
  host: "127.0.0.1",
  port: 0,
  ackTimeoutMs: TIMING.ACK_TIMEOUT_MS,
  handshakeTimeoutMs: TIMING.HANDSHAKE_TIMEOUT_MS,
  verbose: false,
};

export interface HapticsServer {
  readonly httpServer: HttpServer;
  readonly io: Server;
  readonly sessions: SessionStore;
  readonly channel: CommandChannel;
  listen(): Promise<AddressInfo>;
  close(): Promise<void>;
}

export function createHapticsServer(
  options: Partial<HapticsServerOptions> & Pick<HapticsServerOptions, "tls">
): HapticsServer {
  const resolved: HapticsServerOptions = { ...DEFAULT_SERVER_OPTIONS, ...options };
  const sessions = new SessionStore();
  const limiter = new RateLimiter();
  const channel = new CommandChannel(sessions, {
    ackTimeoutMs: resolved.ackTimeoutMs,
    verbose: resolved.verbose,
  });

  const handleRequest = (req: IncomingMessage, res: ServerResponse): void => {
    // Health check endpoint
    if (req.method === "GET" && req.url === "/health") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(
        JSON.stringify({
          status: "ok",
          version: VERSION,
          protocol: PROTOCOL_VERSION,
          sessions: sessions.getSessionCount(),
          activeSessions: sessions.getActiveCount(),
          receivers: sessions.summaries(),
          channel: channel.stats(),
          ...resolved.health?.(),
        })
      );
      return;
    }

    // Socket.IO handles its own path; everything else is unknown
    if (!req.url?.startsWith("/socket.io/")) {
      res.writeHead(404);
      res.end();
    }
  };

  const httpServer = createTransportServer(resolved.tls, handleRequest);

  const io = new Server(httpServer, {
    transports: ["websocket"],
    serveClient: false,
    pingInterval: 10000,
    pingTimeout: 5000,
  });

  io.on("connection", (socket) => {
    registerHandlers(socket, {
      sessions,
      limiter,
      handshakeTimeoutMs: resolved.handshakeTimeoutMs,
      verbose: resolved.verbose,
    });
  });

  return {
    httpServer,
    io,
    sessions,
    channel,

    listen: () =>
      new Promise<AddressInfo>((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(resolved.port, resolved.host, () => {
          httpServer.off("error", reject);
          limiter.start();
          const address = httpServer.address();
          if (address === null || typeof address === "string") {
            reject(new Error(`Unexpected listen address ${String(address)}`));
            return;
          }
          console.log(
            `[server] listening on ${resolved.tls ? "https" : "http"}://${address.address}:${address.port} protocol=${PROTOCOL_VERSION}`
          );
          resolve(address);
        });
      }),

    close: () =>
      new Promise<void>((resolve) => {
        limiter.stop();
        io.close(() => {
          sessions.clear();
          console.log("[server] closed");
          resolve();
        });
      }),
  };
}
