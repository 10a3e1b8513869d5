/**
 * Receiver configuration: defaults, then environment, then command-line flags.
 *
 * Environment variables (all optional, `.env` is read by main):
 *   HAPTICS_SERVER         server host:port (default 127.0.0.1:7837)
 *   HAPTICS_CA             CA the server certificate must chain to (default certs/server.crt)
 *   HAPTICS_CLIENT_CERT    client certificate PEM presented to the server
 *   HAPTICS_CLIENT_KEY     key for HAPTICS_CLIENT_CERT
 *   HAPTICS_INSECURE       "1" connects over plain HTTP
 *   HAPTICS_RECEIVER_ID    id announced in HELLO (default hostname)
 *   HAPTICS_VERBOSE_API    "1" traces channel traffic
 */

import { hostname } from "os";
import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { formatZodError, parseAddress, TIMING, VERSION } from "@remote-haptics/shared";

// ============================================================================
// Types
// ============================================================================

export type DeviceSpec = { kind: "sim"; id: string } | { kind: "sysfs"; id: string; path: string };

export interface ReceiverConfig {
  /** http(s)://host:port */
  url: string;
  receiverId: string;
  insecure: boolean;
  caPath: string;
  clientCertPath: string | null;
  clientKeyPath: string | null;
  devices: DeviceSpec[];
  reconnectAttempts: number;
  rediscoverIntervalMs: number;
  helloTimeoutMs: number;
  verboseApi: boolean;
}

// ============================================================================
// Environment
// ============================================================================

const FlagSchema = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform((value) => value === "1" || value === "true" || value === "yes");

export const ReceiverEnvSchema = z.object({
  HAPTICS_SERVER: z.string().min(1).default("127.0.0.1:7837"),
  HAPTICS_CA: z.string().min(1).default("certs/server.crt"),
  HAPTICS_CLIENT_CERT: z.string().min(1).optional(),
  HAPTICS_CLIENT_KEY: z.string().min(1).optional(),
  HAPTICS_INSECURE: FlagSchema.default("0"),
  HAPTICS_RECEIVER_ID: z.string().min(1).optional(),
  HAPTICS_VERBOSE_API: FlagSchema.default("0"),
});
export type ReceiverEnv = z.infer<typeof ReceiverEnvSchema>;

// ============================================================================
// Flags
// ============================================================================

interface ReceiverFlags {
  server?: string;
  ca?: string;
  cert?: string;
  key?: string;
  insecure?: boolean;
  id?: string;
  device: DeviceSpec[];
  reconnectAttempts: number;
  rediscoverMs: number;
  verboseApi?: boolean;
}

function nonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

/** `sim:<id>` or `sysfs:<id>=<path>` */
export function parseDeviceSpec(value: string): DeviceSpec {
  const sim = /^sim:([^=\s]+)$/.exec(value);
  if (sim?.[1] !== undefined) {
    return { kind: "sim", id: sim[1] };
  }
  const sysfs = /^sysfs:([^=\s]+)=(\S+)$/.exec(value);
  if (sysfs?.[1] !== undefined && sysfs[2] !== undefined) {
    return { kind: "sysfs", id: sysfs[1], path: sysfs[2] };
  }
  throw new InvalidArgumentError("Expected sim:<id> or sysfs:<id>=<path>.");
}

function collectDevice(value: string, previous: DeviceSpec[]): DeviceSpec[] {
  return [...previous, parseDeviceSpec(value)];
}

export function createReceiverProgram(): Command {
  return new Command()
    .name("haptics-receiver")
    .description("Receive haptic commands and drive local actuators")
    .version(VERSION)
    .option("-s, --server <host:port>", "haptics server address")
    .option("--ca <path>", "CA certificate the server must present (PEM)")
    .option("--cert <path>", "client certificate (PEM)")
    .option("--key <path>", "client private key (PEM)")
    .option("--insecure", "connect over plain HTTP (development only)")
    .option("--id <receiverId>", "receiver id announced to the server")
    .option("-d, --device <spec>", "sim:<id> or sysfs:<id>=<path> (repeatable)", collectDevice, [])
    .option("--reconnect-attempts <n>", "reconnect attempts before giving up", nonNegativeInteger, 10)
    .option("--rediscover-ms <ms>", "interval between probes of failed devices, 0 disables", nonNegativeInteger, 5000)
    .option("--verbose-api", "trace channel traffic");
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Parse `argv` (user arguments only) against `env`.
 * Throws on invalid environment values or a missing device list.
 */
export function parseReceiverConfig(program: Command, argv: readonly string[], env: NodeJS.ProcessEnv): ReceiverConfig {
  const envResult = ReceiverEnvSchema.safeParse(env);
  if (!envResult.success) {
    throw new Error(`Invalid environment: ${formatZodError(envResult.error)}`);
  }
  const fromEnv = envResult.data;

  program.parse([...argv], { from: "user" });
  const flags = program.opts<ReceiverFlags>();

  const server = flags.server ?? fromEnv.HAPTICS_SERVER;
  const address = parseAddress(server);
  if (!address.success) {
    throw new Error(address.error);
  }
  if (address.data.defaultedPort) {
    console.log(`[config] no port in ${server}, using ${address.data.port}`);
  }

  if (flags.device.length === 0) {
    throw new Error("At least one --device is required, e.g. --device sim:pad");
  }
  const ids = new Set<string>();
  for (const device of flags.device) {
    if (ids.has(device.id)) {
      throw new Error(`Duplicate device id: ${device.id}`);
    }
    ids.add(device.id);
  }

  const clientCertPath = flags.cert ?? fromEnv.HAPTICS_CLIENT_CERT ?? null;
  const clientKeyPath = flags.key ?? fromEnv.HAPTICS_CLIENT_KEY ?? null;
  if ((clientCertPath === null) !== (clientKeyPath === null)) {
    throw new Error("A client certificate needs both --cert and --key");
  }

  const insecure = flags.insecure ?? fromEnv.HAPTICS_INSECURE;
  const { host, port } = address.data;
  const authority = host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;

  return {
    url: `${insecure ? "http" : "https"}://${authority}`,
    receiverId: flags.id ?? fromEnv.HAPTICS_RECEIVER_ID ?? hostname(),
    insecure,
    caPath: flags.ca ?? fromEnv.HAPTICS_CA,
    clientCertPath,
    clientKeyPath,
    devices: flags.device,
    reconnectAttempts: flags.reconnectAttempts,
    rediscoverIntervalMs: flags.rediscoverMs,
    helloTimeoutMs: TIMING.HANDSHAKE_TIMEOUT_MS,
    verboseApi: flags.verboseApi ?? fromEnv.HAPTICS_VERBOSE_API,
  };
}
