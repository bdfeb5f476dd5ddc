#!/usr/bin/env -S node --import tsx
/**
 * mathterm - term conversion CLI
 */
import { createProgram } from "./program.js";

const program = createProgram({ exit: (code) => process.exit(code) });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["convert", "check", "show", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
