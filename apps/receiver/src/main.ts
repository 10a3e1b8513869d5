#!/usr/bin/env tsx
import dotenv from "dotenv";

// Load environment variables from .env in the working directory
dotenv.config();

import { readFileSync } from "fs";
import { HandshakeFailedError, errorMessage } from "@remote-haptics/shared";
import { ReceiverClient, type ReceiverTls } from "./client.js";
import { createReceiverProgram, parseReceiverConfig, type DeviceSpec } from "./config.js";
import type { HapticDevice } from "./devices/device.js";
import { DeviceRegistry } from "./devices/registry.js";
import { SimulatedDevice } from "./devices/simulated.js";
import { SysfsVibratorDevice } from "./devices/sysfs.js";

function createDevice(spec: DeviceSpec): HapticDevice {
  switch (spec.kind) {
    case "sim":
      return new SimulatedDevice(spec.id);
    case "sysfs":
      return new SysfsVibratorDevice(spec.id, spec.path);
  }
}

function readPem(path: string, what: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (error) {
    throw new HandshakeFailedError(`Cannot read ${what} ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

async function main(): Promise<void> {
  const config = parseReceiverConfig(createReceiverProgram(), process.argv.slice(2), process.env);

  let tls: ReceiverTls | null = null;
  if (config.insecure) {
    console.warn("[receiver] --insecure: server identity is not verified");
  } else {
    tls = { ca: readPem(config.caPath, "CA certificate") };
    if (config.clientCertPath && config.clientKeyPath) {
      tls.cert = readPem(config.clientCertPath, "client certificate");
      tls.key = readPem(config.clientKeyPath, "client key");
    }
  }

  const registry = new DeviceRegistry(config.devices.map(createDevice));
  for (const device of registry.list()) {
    console.log(`[devices] registered target=${device.id} name="${device.name}"`);
  }

  const client = new ReceiverClient(registry, {
    url: config.url,
    receiverId: config.receiverId,
    tls,
    reconnectAttempts: config.reconnectAttempts,
    rediscoverIntervalMs: config.rediscoverIntervalMs,
    helloTimeoutMs: config.helloTimeoutMs,
    verbose: config.verboseApi,
  });

  client.onError((error) => {
    if (error.fatal) {
      process.exitCode = 1;
    }
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[receiver] ${signal} received, shutting down`);
    await client.disconnect();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error(`[receiver] shutdown failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      });
    });
  }

  console.log(`[receiver] connecting to ${config.url} as ${config.receiverId}`);
  client.connect();
}

main().catch((error: unknown) => {
  console.error(`[receiver] fatal: ${errorMessage(error)}`);
  process.exitCode = 1;
});
