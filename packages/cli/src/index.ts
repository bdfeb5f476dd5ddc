/**
 * @mathterm/cli - CLI entry point re-exports
 */
export { runConvert } from "./cmd-convert.js";
export { runCheck } from "./cmd-check.js";
export { runShow } from "./cmd-show.js";
export { runConfig } from "./cmd-config.js";
export { createProgram } from "./program.js";
export type { ProgramSettings } from "./program.js";
export { resolveInput, readInput, parseInput, CliIoError, CliUsageError } from "./input.js";
export type { InputSource, SourceText, ParsedInput } from "./input.js";
