/**
 * Records a session: every dispatched command plus media play and stop
 * entries, appended to a recording file as they happen.
 */

import { createWriteStream, type WriteStream } from "fs";
import { errorMessage, type CommandId, type HapticCommand } from "@remote-haptics/shared";
import type { PlaybackSource } from "../player/playbackSource.js";
import type { CommandSink } from "../scheduler/scheduler.js";
import {
  DEFAULT_MEDIA_ID,
  RECORDING_HEADER,
  SESSION_END_PREFIX,
  SESSION_START_PREFIX,
  formatEntry,
  type RecordingEntry,
} from "./format.js";

export interface RecordingWriterOptions {
  /** Seconds between `# timestamp` comments */
  timestampIntervalSec: number;
  now: () => number;
}

const DEFAULT_WRITER_OPTIONS: RecordingWriterOptions = {
  timestampIntervalSec: 60,
  now: () => Date.now(),
};

export class RecordingWriter {
  private readonly options: RecordingWriterOptions;
  private readonly stream: WriteStream;
  private readonly startedAt: number;
  private lastTimestamp: number;
  private error: Error | null = null;
  private closing: Promise<void> | null = null;

  constructor(
    readonly path: string,
    options: Partial<RecordingWriterOptions> = {}
  ) {
    this.options = { ...DEFAULT_WRITER_OPTIONS, ...options };
    this.startedAt = this.options.now();
    this.lastTimestamp = this.startedAt;
    this.stream = createWriteStream(path, { encoding: "utf8" });
    this.stream.on("error", (error) => {
      this.error = error;
      console.error(`[recording] write failed path=${path}: ${errorMessage(error)}`);
    });
    const start = new Date(this.startedAt).toISOString();
    this.stream.write(`${RECORDING_HEADER}\n${SESSION_START_PREFIX}${start}\n`);
    console.log(`[recording] writing ${path}`);
  }

  /** Session seconds at `time` (ms since the epoch) */
  sessionTime(time: number = this.options.now()): number {
    return Math.max(0, (time - this.startedAt) / 1000);
  }

  command(command: HapticCommand): void {
    this.append({
      kind: "command",
      at: this.sessionTime(command.dispatchTime),
      intensity: command.intensity,
      durationMs: command.durationMs,
      deviceTarget: command.deviceTarget,
    });
  }

  remark(text: string): void {
    this.append({ kind: "remark", at: this.sessionTime(), text });
  }

  /** The media is at `positionSec` now */
  mediaPlay(file: string, positionSec: number, mediaId = DEFAULT_MEDIA_ID): void {
    const at = this.sessionTime();
    this.append({ kind: "media-play", at, mediaId, offsetSec: positionSec - at, file });
  }

  mediaStop(mediaId = DEFAULT_MEDIA_ID): void {
    this.append({ kind: "media-stop", at: this.sessionTime(), mediaId });
  }

  /** Write the footer and flush; rejects if any write failed */
  close(): Promise<void> {
    this.closing ??= new Promise<void>((resolve, reject) => {
      const settle = (): void => {
        if (this.error) {
          reject(this.error);
        } else {
          console.log(`[recording] closed ${this.path}`);
          resolve();
        }
      };
      if (this.stream.closed) {
        settle();
        return;
      }
      this.stream.once("close", settle);
      this.stream.end(`${SESSION_END_PREFIX}${new Date(this.options.now()).toISOString()}\n`);
    });
    return this.closing;
  }

  private append(entry: RecordingEntry): void {
    if (this.closing) return;
    const now = this.options.now();
    if (now - this.lastTimestamp >= this.options.timestampIntervalSec * 1000) {
      this.lastTimestamp = now;
      this.stream.write(`# timestamp = ${new Date(now).toISOString()}\n`);
    }
    this.stream.write(`${formatEntry(entry)}\n`);
  }
}

/** Records each command, then hands it on */
export class RecordingSink implements CommandSink {
  constructor(
    private readonly writer: RecordingWriter,
    private readonly next: CommandSink
  ) {}

  dispatch(command: HapticCommand, preempts?: CommandId): void {
    this.writer.command(command);
    this.next.dispatch(command, preempts);
  }
}

/**
 * Mirror playback into media entries: play whenever the timeline starts
 * moving from a new place, stop whenever it halts. Returns the unsubscribe.
 */
export function recordPlayback(playback: PlaybackSource, writer: RecordingWriter, file: string): () => void {
  let playing = false;
  return playback.subscribe(({ change, state }) => {
    switch (change) {
      case "restored":
      case "seek-complete":
      case "rate":
        if (state.rate > 0 && !state.stale) {
          writer.mediaPlay(file, state.position);
          playing = true;
        } else if (playing) {
          writer.mediaStop();
          playing = false;
        }
        break;
      case "end":
      case "stale":
      case "unavailable":
        if (playing) {
          writer.mediaStop();
          playing = false;
        }
        break;
      case "seek":
        break;
    }
  });
}
