#!/usr/bin/env tsx
import dotenv from "dotenv";

// Load environment variables from .env in the working directory
dotenv.config();

import { errorMessage } from "@remote-haptics/shared";
import { ImpulseExtractor, type ImpulseSource } from "./audio/extractor.js";
import { DEFAULT_DETECTOR_OPTIONS } from "./audio/impulseDetector.js";
import { FfmpegPcmSource, ParecPcmSource, type PcmSource } from "./audio/pcmSource.js";
import { loadTlsMaterial } from "./channel/tls.js";
import { createServerProgram, parseServerConfig } from "./config.js";
import { HapticsPipeline } from "./pipeline.js";
import { LiveClock, type PlaybackSource } from "./player/playbackSource.js";
import { PlaybackTracker } from "./player/tracker.js";
import { readRecording } from "./recording/merge.js";
import { RecordingImpulseSource } from "./recording/replay.js";
import { RecordingSink, RecordingWriter, recordPlayback } from "./recording/writer.js";
import { EventScheduler } from "./scheduler/scheduler.js";
import { createHapticsServer } from "./server.js";

async function main(): Promise<void> {
  const config = parseServerConfig(createServerProgram(), process.argv.slice(2), process.env);

  const tls = config.insecure ? null : loadTlsMaterial({ certPath: config.certPath, keyPath: config.keyPath });

  const detector = { ...DEFAULT_DETECTOR_OPTIONS, sensitivity: config.sensitivity, floor: config.floor };
  let impulses: ImpulseSource;
  let playback: PlaybackSource;
  let tracker: PlaybackTracker | null = null;
  let routes = config.routes;
  let description: string;
  if (config.input.kind === "recording") {
    const replay = new RecordingImpulseSource(await readRecording(config.input.path));
    impulses = replay;
    routes = new Map([...replay.routes(), ...config.routes]);
    playback = new LiveClock();
    description = `recording ${config.input.path}`;
  } else {
    let source: PcmSource;
    if (config.input.kind === "file") {
      source = new FfmpegPcmSource(config.input.path, undefined, config.ffmpegPath);
      tracker = new PlaybackTracker({
        socketPath: config.mpvSocket,
        maxRetries: config.playerRetries,
        verbose: config.verboseMedia,
      });
      playback = tracker;
    } else {
      source = new ParecPcmSource(config.input.device);
      playback = new LiveClock();
    }
    impulses = new ImpulseExtractor(source, { channelMode: config.channelMode, detector });
    description = source.description;
  }
  console.log(`[server] input ${description}`);

  const writer = config.recordPath ? new RecordingWriter(config.recordPath) : null;
  writer?.remark(`input ${description}`);
  const stopRecordingPlayback =
    writer && config.input.kind === "file" ? recordPlayback(playback, writer, config.input.path) : null;

  const server = createHapticsServer({
    host: config.host,
    port: config.port,
    tls,
    ackTimeoutMs: config.ackTimeoutMs,
    handshakeTimeoutMs: config.handshakeTimeoutMs,
    verbose: config.verboseApi,
    health: () => ({
      scheduler: scheduler.stats(),
      pipeline: pipeline.stats(),
      player: tracker ? { status: tracker.getStatus(), state: tracker.currentState() } : { status: "live" },
    }),
  });

  const scheduler = new EventScheduler(playback, writer ? new RecordingSink(writer, server.channel) : server.channel, {
    queueBound: config.queueBound,
    pulseDurationMs: config.pulseMs,
    intensityScale: config.intensityScale,
    routes,
  });

  const pipeline = new HapticsPipeline(impulses, playback, scheduler, {
    lookaheadSec: config.lookaheadSec,
    verbose: config.verboseMedia,
  });

  await server.listen();
  tracker?.start();
  pipeline.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[server] ${signal} received, shutting down`);
    await pipeline.stop();
    scheduler.dispose();
    tracker?.stop();
    stopRecordingPlayback?.();
    await server.close();
    await writer?.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error(`[server] shutdown failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error(`[server] fatal: ${errorMessage(error)}`);
  process.exitCode = 1;
});
