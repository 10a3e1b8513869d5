/**
 * Haptics recording file format.
 *
 * Plain UTF-8 text, one entry per line, times in seconds since the session
 * started:
 *
 *   RemoteHapticsRecording:0.1
 *   @session_start:2024-05-01T20:00:00.000Z
 *   # timestamp = 2024-05-01T20:00:00.000Z
 *   0.25:media=-12.5:/media/film.mkv
 *   13.335039:0.8,120,broadcast
 *   42.1:text=free-form remark, may contain : and =
 *   60:media=@player2:stop
 *   @session_end:2024-05-01T20:01:00.000Z
 *
 * A command line is `<at>:<intensity>,<durationMs>,<target>`. A media play
 * entry's offset places the media: at session time `at` the media is at
 * `at + offset` seconds.
 */

import { RecordingFormatError, type DeviceTarget } from "@remote-haptics/shared";

export const RECORDING_HEADER = "RemoteHapticsRecording:0.1";
export const SESSION_START_PREFIX = "@session_start:";
export const SESSION_END_PREFIX = "@session_end:";
export const DEFAULT_MEDIA_ID = "DEFAULT";

const REMARK_PREFIX = "text=";
const MEDIA_PREFIX = "media=";
const MEDIA_STOP = "stop";

// ============================================================================
// Types
// ============================================================================

export type RecordingEntry =
  | { kind: "command"; at: number; intensity: number; durationMs: number; deviceTarget: DeviceTarget }
  | { kind: "remark"; at: number; text: string }
  | { kind: "media-play"; at: number; mediaId: string; offsetSec: number; file: string }
  | { kind: "media-stop"; at: number; mediaId: string };

export interface Recording {
  startedAt: Date;
  /** Absent when the writer never closed the file */
  endedAt: Date | null;
  /** Ordered by `at` */
  entries: RecordingEntry[];
}

// ============================================================================
// Formatting
// ============================================================================

/** Seconds rounded to microseconds, without trailing zeros */
export function formatSeconds(seconds: number): string {
  return String(Math.round(seconds * 1e6) / 1e6);
}

export function formatEntry(entry: RecordingEntry): string {
  const at = formatSeconds(entry.at);
  switch (entry.kind) {
    case "command":
      return `${at}:${entry.intensity},${Math.round(entry.durationMs)},${entry.deviceTarget}`;
    case "remark":
      return `${at}:${REMARK_PREFIX}${entry.text.replace(/[\r\n]+/g, " ")}`;
    case "media-play":
      return `${at}:${MEDIA_PREFIX}${mediaIdMarker(entry.mediaId)}${formatSeconds(entry.offsetSec)}:${entry.file}`;
    case "media-stop":
      return `${at}:${MEDIA_PREFIX}${mediaIdMarker(entry.mediaId)}${MEDIA_STOP}`;
  }
}

function mediaIdMarker(mediaId: string): string {
  return mediaId === DEFAULT_MEDIA_ID ? "" : `@${mediaId}:`;
}

export function serializeRecording(recording: Recording): string {
  const lines = [
    RECORDING_HEADER,
    `${SESSION_START_PREFIX}${recording.startedAt.toISOString()}`,
    ...recording.entries.map(formatEntry),
  ];
  if (recording.endedAt) {
    lines.push(`${SESSION_END_PREFIX}${recording.endedAt.toISOString()}`);
  }
  return `${lines.join("\n")}\n`;
}

/** Move an entry `seconds` later on the session timeline; a media entry keeps its media position */
export function withOffset(entry: RecordingEntry, seconds: number): RecordingEntry {
  if (entry.kind === "media-play") {
    return { ...entry, at: entry.at + seconds, offsetSec: entry.offsetSec - seconds };
  }
  return { ...entry, at: entry.at + seconds };
}

// ============================================================================
// Parsing
// ============================================================================

function parseNumber(value: string | undefined, what: string, line: number | null): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === "" || !Number.isFinite(parsed)) {
    throw new RecordingFormatError(`invalid ${what} "${value ?? ""}"`, line);
  }
  return parsed;
}

function parseDate(value: string, line: number): Date {
  const date = new Date(value.trim());
  if (Number.isNaN(date.getTime())) {
    throw new RecordingFormatError(`invalid timestamp "${value.trim()}"`, line);
  }
  return date;
}

/** Parse one entry line; `lineNumber` only labels errors */
export function parseEntry(text: string, lineNumber: number | null = null): RecordingEntry {
  const separator = text.indexOf(":");
  if (separator === -1) {
    throw new RecordingFormatError(`expected <seconds>:<content>, got "${text}"`, lineNumber);
  }
  const at = parseNumber(text.slice(0, separator), "time", lineNumber);
  if (at < 0) {
    throw new RecordingFormatError(`negative time ${at}`, lineNumber);
  }
  const content = text.slice(separator + 1);

  if (content.startsWith(REMARK_PREFIX)) {
    return { kind: "remark", at, text: content.slice(REMARK_PREFIX.length) };
  }

  if (content.startsWith(MEDIA_PREFIX)) {
    let rest = content.slice(MEDIA_PREFIX.length);
    let mediaId = DEFAULT_MEDIA_ID;
    if (rest.startsWith("@")) {
      const end = rest.indexOf(":");
      if (end === -1) throw new RecordingFormatError(`unterminated media id in "${text}"`, lineNumber);
      mediaId = rest.slice(1, end);
      rest = rest.slice(end + 1);
    }
    if (rest === MEDIA_STOP) {
      return { kind: "media-stop", at, mediaId };
    }
    const split = rest.indexOf(":");
    const file = split === -1 ? "" : rest.slice(split + 1);
    if (file === "") throw new RecordingFormatError(`media entry without a file in "${text}"`, lineNumber);
    const offsetSec = parseNumber(rest.slice(0, split), "media offset", lineNumber);
    return { kind: "media-play", at, mediaId, offsetSec, file };
  }

  const fields = content.split(",");
  if (fields.length < 3) {
    throw new RecordingFormatError(`expected <intensity>,<durationMs>,<target>, got "${content}"`, lineNumber);
  }
  const intensity = parseNumber(fields[0], "intensity", lineNumber);
  if (intensity < 0 || intensity > 1) {
    throw new RecordingFormatError(`intensity ${intensity} outside 0-1`, lineNumber);
  }
  const durationMs = parseNumber(fields[1], "duration", lineNumber);
  const deviceTarget = fields.slice(2).join(",");
  if (deviceTarget === "") throw new RecordingFormatError("empty device target", lineNumber);
  return { kind: "command", at, intensity, durationMs, deviceTarget };
}

/**
 * Parse a whole recording. Blank lines and `#` comments are skipped; a
 * missing footer leaves `endedAt` null.
 */
export function parseRecording(text: string): Recording {
  const lines = text.split(/\r?\n/);
  if (lines[0]?.trim() !== RECORDING_HEADER) {
    throw new RecordingFormatError(`first line must be ${RECORDING_HEADER}`, 1);
  }
  const startLine = lines[1] ?? "";
  if (!startLine.startsWith(SESSION_START_PREFIX)) {
    throw new RecordingFormatError(`second line must start with ${SESSION_START_PREFIX}`, 2);
  }
  const startedAt = parseDate(startLine.slice(SESSION_START_PREFIX.length), 2);

  const entries: RecordingEntry[] = [];
  let endedAt: Date | null = null;
  for (let index = 2; index < lines.length; index++) {
    const line = lines[index] ?? "";
    if (line.trim() === "" || line.startsWith("#")) continue;
    if (line.startsWith(SESSION_END_PREFIX)) {
      endedAt = parseDate(line.slice(SESSION_END_PREFIX.length), index + 1);
      break;
    }
    entries.push(parseEntry(line, index + 1));
  }

  return { startedAt, endedAt, entries: sortEntries(entries) };
}

/** Stable sort by time */
export function sortEntries(entries: readonly RecordingEntry[]): RecordingEntry[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => a.entry.at - b.entry.at || a.index - b.index)
    .map(({ entry }) => entry);
}
