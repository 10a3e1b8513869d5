/**
 * Server configuration: defaults, then environment, then command-line flags.
 *
 * Environment variables (all optional, `.env` is read by main):
 *   HAPTICS_LISTEN         host:port to listen on (default 127.0.0.1:7837)
 *   HAPTICS_CERT           server certificate PEM (default certs/server.crt)
 *   HAPTICS_KEY            server key PEM (default certs/server.key)
 *   HAPTICS_INSECURE       "1" serves plain HTTP
 *   HAPTICS_MPV_SOCKET     mpv IPC socket (default /tmp/mpvsocket)
 *   HAPTICS_FFMPEG         ffmpeg binary (default ffmpeg)
 *   HAPTICS_VERBOSE_API    "1" traces channel traffic
 *   HAPTICS_VERBOSE_MEDIA  "1" traces player and extraction
 *   HAPTICS_RECORD         write a recording of the session to this path
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { z } from "zod";
import { formatZodError, parseAddress, TIMING, VERSION } from "@remote-haptics/shared";
import type { ChannelMode } from "./audio/extractor.js";

// ============================================================================
// Types
// ============================================================================

export type AudioInput =
  | { kind: "file"; path: string }
  | { kind: "live"; device: string | null }
  /** Replay a haptics recording instead of extracting audio */
  | { kind: "recording"; path: string };

export interface ServerConfig {
  host: string;
  port: number;
  insecure: boolean;
  certPath: string;
  keyPath: string;
  input: AudioInput;
  mpvSocket: string;
  ffmpegPath: string;
  playerRetries: number;
  channelMode: ChannelMode;
  /** Channel index -> device target */
  routes: Map<number, string>;
  sensitivity: number;
  floor: number;
  intensityScale: number;
  pulseMs: number;
  lookaheadSec: number;
  queueBound: number;
  ackTimeoutMs: number;
  handshakeTimeoutMs: number;
  verboseApi: boolean;
  verboseMedia: boolean;
  /** Recording file for this session, or null when not recording */
  recordPath: string | null;
}

// ============================================================================
// Environment
// ============================================================================

const FlagSchema = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform((value) => value === "1" || value === "true" || value === "yes");

export const ServerEnvSchema = z.object({
  HAPTICS_LISTEN: z.string().min(1).default("127.0.0.1:7837"),
  HAPTICS_CERT: z.string().min(1).default("certs/server.crt"),
  HAPTICS_KEY: z.string().min(1).default("certs/server.key"),
  HAPTICS_INSECURE: FlagSchema.default("0"),
  HAPTICS_MPV_SOCKET: z.string().min(1).default("/tmp/mpvsocket"),
  HAPTICS_FFMPEG: z.string().min(1).default("ffmpeg"),
  HAPTICS_VERBOSE_API: FlagSchema.default("0"),
  HAPTICS_VERBOSE_MEDIA: FlagSchema.default("0"),
  HAPTICS_RECORD: z.string().min(1).optional(),
});
export type ServerEnv = z.infer<typeof ServerEnvSchema>;

// ============================================================================
// Flags
// ============================================================================

interface ServerFlags {
  listen?: string;
  cert?: string;
  key?: string;
  insecure?: boolean;
  file?: string;
  live?: boolean;
  replay?: string;
  record?: string;
  captureDevice?: string;
  mpvSocket?: string;
  ffmpeg?: string;
  playerRetries: number;
  channelMode: string;
  route: Map<number, string>;
  sensitivity: number;
  floor: number;
  intensity: number;
  pulseMs: number;
  lookahead: number;
  queueBound: number;
  ackTimeout: number;
  verboseApi?: boolean;
  verboseMedia?: boolean;
}

function positiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
}

function positiveInteger(value: string): number {
  const parsed = positiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/** Collect repeated `--route <channel>=<target>` pairs */
function collectRoute(value: string, previous: Map<number, string>): Map<number, string> {
  const match = /^(\d+)=(\S+)$/.exec(value);
  const channel = match?.[1];
  const target = match?.[2];
  if (channel === undefined || target === undefined) {
    throw new InvalidArgumentError("Expected <channel>=<target>, e.g. 0=left.");
  }
  const routes = new Map(previous);
  routes.set(Number(channel), target);
  return routes;
}

export function createServerProgram(): Command {
  return new Command()
    .name("haptics-server")
    .description("Extract impulses from audio and stream haptic commands to receivers")
    .version(VERSION)
    .option("-l, --listen <host:port>", "address to listen on")
    .option("--cert <path>", "server certificate (PEM)")
    .option("--key <path>", "server private key (PEM)")
    .option("--insecure", "serve plain HTTP (development only)")
    .option("-f, --file <path>", "media file playing in mpv")
    .option("--live", "capture live audio with parec instead of a file")
    .option("--replay <path>", "replay a haptics recording instead of extracting audio")
    .option("--record <path>", "record dispatched commands and media changes to a file")
    .option("--capture-device <name>", "PulseAudio source for --live")
    .option("--mpv-socket <path>", "mpv JSON-IPC socket")
    .option("--ffmpeg <path>", "ffmpeg binary")
    .option("--player-retries <n>", "reconnect attempts before the player is unavailable", positiveInteger, 8)
    .addOption(
      new Option("--channel-mode <mode>", "detect on the mixed signal or per channel").choices(["mix", "split"]).default("mix")
    )
    .option("--route <channel=target>", "send a channel's impulses to one device target (repeatable)", collectRoute, new Map<number, string>())
    .option("--sensitivity <ratio>", "energy over the running mean that counts as an impulse", positiveNumber, 1.5)
    .option("--floor <rms>", "minimum frame energy", positiveNumber, 0.02)
    .option("--intensity <scale>", "multiplier applied to impulse magnitude", positiveNumber, 1)
    .option("--pulse-ms <ms>", "duration of each haptic pulse", positiveInteger, TIMING.PULSE_DURATION_MS)
    .option("--lookahead <sec>", "how far extraction runs ahead of the playhead", positiveNumber, 2)
    .option("--queue-bound <n>", "impulses kept while playback is paused", positiveInteger, 32)
    .option("--ack-timeout <ms>", "per-command acknowledgment timeout", positiveInteger, TIMING.ACK_TIMEOUT_MS)
    .option("--verbose-api", "trace channel traffic")
    .option("--verbose-media", "trace player and extraction");
}

function isChannelMode(value: string): value is ChannelMode {
  return value === "mix" || value === "split";
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Parse `argv` (user arguments only) against `env`.
 * Throws on invalid environment values or missing input selection.
 */
export function parseServerConfig(program: Command, argv: readonly string[], env: NodeJS.ProcessEnv): ServerConfig {
  const envResult = ServerEnvSchema.safeParse(env);
  if (!envResult.success) {
    throw new Error(`Invalid environment: ${formatZodError(envResult.error)}`);
  }
  const fromEnv = envResult.data;

  program.parse([...argv], { from: "user" });
  const flags = program.opts<ServerFlags>();

  const listen = flags.listen ?? fromEnv.HAPTICS_LISTEN;
  const address = parseAddress(listen);
  if (!address.success) {
    throw new Error(address.error);
  }
  if (address.data.defaultedPort) {
    console.log(`[config] no port in ${listen}, using ${address.data.port}`);
  }

  let input: AudioInput;
  const selected = [flags.file, flags.live, flags.replay].filter((value) => value !== undefined).length;
  if (selected > 1) {
    throw new Error("Use only one of --file, --live or --replay");
  } else if (flags.file) {
    input = { kind: "file", path: flags.file };
  } else if (flags.live) {
    input = { kind: "live", device: flags.captureDevice ?? null };
  } else if (flags.replay) {
    input = { kind: "recording", path: flags.replay };
  } else {
    throw new Error("An audio input is required: --file <path>, --live or --replay <path>");
  }

  if (!isChannelMode(flags.channelMode)) {
    throw new Error(`Unknown channel mode ${flags.channelMode}`);
  }

  return {
    host: address.data.host,
    port: address.data.port,
    insecure: flags.insecure ?? fromEnv.HAPTICS_INSECURE,
    certPath: flags.cert ?? fromEnv.HAPTICS_CERT,
    keyPath: flags.key ?? fromEnv.HAPTICS_KEY,
    input,
    mpvSocket: flags.mpvSocket ?? fromEnv.HAPTICS_MPV_SOCKET,
    ffmpegPath: flags.ffmpeg ?? fromEnv.HAPTICS_FFMPEG,
    playerRetries: flags.playerRetries,
    channelMode: flags.channelMode,
    routes: flags.route,
    sensitivity: flags.sensitivity,
    floor: flags.floor,
    intensityScale: flags.intensity,
    pulseMs: flags.pulseMs,
    lookaheadSec: flags.lookahead,
    queueBound: flags.queueBound,
    ackTimeoutMs: flags.ackTimeout,
    handshakeTimeoutMs: TIMING.HANDSHAKE_TIMEOUT_MS,
    verboseApi: flags.verboseApi ?? fromEnv.HAPTICS_VERBOSE_API,
    verboseMedia: flags.verboseMedia ?? fromEnv.HAPTICS_VERBOSE_MEDIA,
    recordPath: flags.record ?? fromEnv.HAPTICS_RECORD ?? null,
  };
}
