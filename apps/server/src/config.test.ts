import { describe, it, expect, vi, afterEach } from "vitest";
import type { Command } from "commander";
import { createServerProgram, parseServerConfig } from "./config.js";

function program(): Command {
  return createServerProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

describe("server config", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should apply defaults", () => {
    const config = parseServerConfig(program(), ["--file", "song.flac"], {});

    expect(config).toMatchObject({
      host: "127.0.0.1",
      port: 7837,
      insecure: false,
      certPath: "certs/server.crt",
      keyPath: "certs/server.key",
      input: { kind: "file", path: "song.flac" },
      mpvSocket: "/tmp/mpvsocket",
      ffmpegPath: "ffmpeg",
      playerRetries: 8,
      channelMode: "mix",
      sensitivity: 1.5,
      floor: 0.02,
      intensityScale: 1,
      pulseMs: 120,
      lookaheadSec: 2,
      queueBound: 32,
      ackTimeoutMs: 1000,
      handshakeTimeoutMs: 5000,
      verboseApi: false,
      verboseMedia: false,
      recordPath: null,
    });
    expect(config.routes.size).toBe(0);
  });

  it("should let the environment override defaults and flags override both", () => {
    const env = {
      HAPTICS_LISTEN: "0.0.0.0:9000",
      HAPTICS_CERT: "/etc/haptics/server.crt",
      HAPTICS_VERBOSE_API: "1",
      HAPTICS_VERBOSE_MEDIA: "true",
    };

    const fromEnv = parseServerConfig(program(), ["--live"], env);
    expect(fromEnv).toMatchObject({
      host: "0.0.0.0",
      port: 9000,
      certPath: "/etc/haptics/server.crt",
      verboseApi: true,
      verboseMedia: true,
      input: { kind: "live", device: null },
    });

    const fromFlags = parseServerConfig(program(), ["--live", "--listen", "10.0.0.5:7000", "--capture-device", "monitor"], env);
    expect(fromFlags).toMatchObject({ host: "10.0.0.5", port: 7000, input: { kind: "live", device: "monitor" } });
  });

  it("should fall back to the default port with a log line", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const config = parseServerConfig(program(), ["--file", "a.wav", "--listen", "0.0.0.0"], {});

    expect(config.port).toBe(7837);
    expect(log).toHaveBeenCalledWith("[config] no port in 0.0.0.0, using 7837");
  });

  it("should collect channel routes", () => {
    const config = parseServerConfig(
      program(),
      ["--file", "a.wav", "--channel-mode", "split", "--route", "0=left", "--route", "1=right"],
      {}
    );

    expect(config.channelMode).toBe("split");
    expect([...config.routes]).toEqual([
      [0, "left"],
      [1, "right"],
    ]);
  });

  it("should require exactly one audio input", () => {
    expect(() => parseServerConfig(program(), [], {})).toThrow(
      "An audio input is required: --file <path>, --live or --replay <path>"
    );
    expect(() => parseServerConfig(program(), ["--file", "a.wav", "--live"], {})).toThrow(
      "Use only one of --file, --live or --replay"
    );
    expect(() => parseServerConfig(program(), ["--live", "--replay", "night.hrec"], {})).toThrow(
      "Use only one of --file, --live or --replay"
    );
  });

  it("should select a recording to replay and a file to record to", () => {
    const replay = parseServerConfig(program(), ["--replay", "night.hrec", "--record", "copy.hrec"], {});
    expect(replay.input).toEqual({ kind: "recording", path: "night.hrec" });
    expect(replay.recordPath).toBe("copy.hrec");

    const fromEnv = parseServerConfig(program(), ["--file", "a.wav"], { HAPTICS_RECORD: "/var/haptics/session.hrec" });
    expect(fromEnv.recordPath).toBe("/var/haptics/session.hrec");
  });

  it("should reject invalid values", () => {
    expect(() => parseServerConfig(program(), ["--file", "a.wav"], { HAPTICS_INSECURE: "maybe" })).toThrow(
      /^Invalid environment: HAPTICS_INSECURE/
    );
    expect(() => parseServerConfig(program(), ["--file", "a.wav", "--intensity", "0"], {})).toThrow(
      /Expected a positive number/
    );
    expect(() => parseServerConfig(program(), ["--file", "a.wav", "--route", "left"], {})).toThrow(
      /Expected <channel>=<target>/
    );
    expect(() => parseServerConfig(program(), ["--file", "a.wav", "--listen", "host:port"], {})).toThrow(
      "Invalid port in address host:port"
    );
  });
});
