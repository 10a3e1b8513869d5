/**
 * Transport seam between the channel and socket.io.
 */

import type { Socket } from "socket.io";
import { TLSSocket } from "tls";

export interface SessionLink {
  readonly id: string;
  readonly address: string;
  /** Emit and wait for the peer's acknowledgment; rejects on timeout */
  request(event: string, payload: unknown, timeoutMs: number): Promise<unknown>;
  send(event: string, payload: unknown): void;
  close(): void;
}

export function socketLink(socket: Socket): SessionLink {
  return {
    id: socket.id,
    address: socket.handshake.address,
    request: (event, payload, timeoutMs) => socket.timeout(timeoutMs).emitWithAck(event, payload),
    send: (event, payload) => {
      socket.emit(event, payload);
    },
    close: () => {
      socket.disconnect(true);
    },
  };
}

/** SHA-256 fingerprint of the client certificate on a TLS connection, if any */
export function peerFingerprint(socket: Socket): string | null {
  const raw = socket.request.socket;
  if (!(raw instanceof TLSSocket)) return null;
  const certificate = raw.getPeerCertificate();
  const fingerprint: unknown = Reflect.get(certificate, "fingerprint256");
  return typeof fingerprint === "string" && fingerprint !== "" ? fingerprint : null;
}
