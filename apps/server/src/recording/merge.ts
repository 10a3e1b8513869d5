/**
 * Reading recordings from disk and merging several into one session.
 */

import { readFile } from "fs/promises";
import { RecordingFormatError } from "@remote-haptics/shared";
import { parseRecording, sortEntries, withOffset, type Recording } from "./format.js";

/** Throws RecordingFormatError, with the offending line, on a malformed file */
export async function readRecording(path: string): Promise<Recording> {
  return parseRecording(await readFile(path, "utf8"));
}

/**
 * Merge recordings onto one timeline starting at the earliest session start.
 * Entries at the same time keep the order of `recordings`.
 */
export function mergeRecordings(recordings: readonly Recording[]): Recording {
  if (recordings.length === 0) {
    throw new RecordingFormatError("nothing to merge");
  }
  const startedAt = Math.min(...recordings.map((recording) => recording.startedAt.getTime()));

  const entries = sortEntries(
    recordings.flatMap((recording) => {
      const offsetSec = (recording.startedAt.getTime() - startedAt) / 1000;
      return recording.entries.map((entry) => withOffset(entry, offsetSec));
    })
  );

  const last = entries[entries.length - 1];
  return {
    startedAt: new Date(startedAt),
    endedAt: new Date(startedAt + (last ? last.at * 1000 : 0)),
    entries,
  };
}
