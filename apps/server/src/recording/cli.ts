/**
 * haptics-merge: combine recordings made on several machines or sessions
 * into one, aligned on their session start times.
 */

import { writeFile } from "fs/promises";
import { Command } from "commander";
import { VERSION } from "@remote-haptics/shared";
import { serializeRecording } from "./format.js";
import { mergeRecordings, readRecording } from "./merge.js";

export function createMergeProgram(): Command {
  return new Command()
    .name("haptics-merge")
    .description("Merge haptics recordings onto one timeline")
    .version(VERSION)
    .argument("<recordings...>", "recording files to merge")
    .option("-o, --output <path>", "write the merged recording here instead of stdout");
}

/** Merge the files named in `argv` (user arguments only) and return the merged text */
export async function runMerge(program: Command, argv: readonly string[]): Promise<string> {
  program.parse([...argv], { from: "user" });
  const { output } = program.opts<{ output?: string }>();

  const recordings = await Promise.all(program.args.map((path) => readRecording(path)));
  const text = serializeRecording(mergeRecordings(recordings));

  if (output) {
    await writeFile(output, text, "utf8");
    console.error(`[merge] ${recordings.length} recordings written to ${output}`);
  } else {
    process.stdout.write(text);
  }
  return text;
}
