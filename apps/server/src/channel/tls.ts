/**
 * HTTP(S) transport for the command channel.
 *
 * The server certificate is self-signed in the default deployment and
 * receivers pin it as their CA. Client certificates are requested but not
 * required; the channel records their fingerprint when one is presented.
 */

import { X509Certificate } from "crypto";
import { readFileSync } from "fs";
import { createServer as createHttpServer, type RequestListener, type Server as HttpServer } from "http";
import { createServer as createHttpsServer } from "https";
import { HandshakeFailedError, errorMessage } from "@remote-haptics/shared";

export interface TlsFiles {
  certPath: string;
  keyPath: string;
}

export interface TlsMaterial {
  cert: Buffer;
  key: Buffer;
  /** SHA-256 fingerprint of the server certificate */
  fingerprint: string;
}

export function loadTlsMaterial(files: TlsFiles): TlsMaterial {
  let cert: Buffer;
  let key: Buffer;
  try {
    cert = readFileSync(files.certPath);
    key = readFileSync(files.keyPath);
  } catch (error) {
    throw new HandshakeFailedError(`Cannot read TLS material: ${errorMessage(error)}`, { cause: error });
  }

  let fingerprint: string;
  try {
    fingerprint = new X509Certificate(cert).fingerprint256;
  } catch (error) {
    throw new HandshakeFailedError(`Invalid server certificate ${files.certPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return { cert, key, fingerprint };
}

/**
 * Create the listening server. `tls` null means plain HTTP for local development.
 */
export function createTransportServer(tls: TlsMaterial | null, handler: RequestListener): HttpServer {
  if (!tls) {
    console.warn("[tls] running without TLS; commands travel in plaintext");
    return createHttpServer(handler);
  }

  console.log(`[tls] server certificate fingerprint=${tls.fingerprint}`);
  return createHttpsServer(
    {
      cert: tls.cert,
      key: tls.key,
      requestCert: true,
      rejectUnauthorized: false,
    },
    handler
  );
}
