#!/usr/bin/env tsx
import { errorMessage } from "@remote-haptics/shared";
import { createMergeProgram, runMerge } from "./recording/cli.js";

runMerge(createMergeProgram(), process.argv.slice(2)).catch((error: unknown) => {
  console.error(`[merge] ${errorMessage(error)}`);
  process.exitCode = 1;
});
