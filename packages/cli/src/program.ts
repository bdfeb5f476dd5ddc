/**
 * The mathterm command tree. Actions hand their exit code to `exit`.
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { runConvert } from "./cmd-convert.js";
import type { ConvertOptions } from "./cmd-convert.js";
import { runCheck } from "./cmd-check.js";
import type { CheckOptions } from "./cmd-check.js";
import { runShow } from "./cmd-show.js";
import type { ShowOptions } from "./cmd-show.js";
import { runConfig } from "./cmd-config.js";
import type { CommonOptions } from "./input.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export interface ProgramSettings {
  exit: (code: number) => void;
  /** Merged under the parsed options of every command. */
  defaults?: CommonOptions;
}

// Expressions may start with a minus (`-x+1`), so expression commands keep
// unknown options as operands instead of rejecting them.
const EXPRESSION_HELP = "Expression text (or - for stdin; put -- before one that starts with -)";

export function createProgram(settings: ProgramSettings): Command {
  const defaults = settings.defaults ?? {};
  const program = new Command();

  program
    .name("mathterm")
    .description("Convert infix, prefix and postfix expressions to and from content MathML")
    .version(pkg.version);

  program
    .command("convert")
    .description("Convert an expression to content MathML, its tree, or another notation, or read content MathML back")
    .argument("[expression]", EXPRESSION_HELP)
    .allowUnknownOption()
    .option("-f, --file <path>", "Read the expression from a file")
    .option("--from <format>", "Input format: text or mathml", "text")
    .option("-g, --grammar <name>", "Grammar: auto, term, bool or list")
    .option("-t, --to <notation>", "Output: mathml, ast, infix, prefix or postfix")
    .option("--indent <n>", "Spaces per level in MathML output")
    .option("--pretty", "Human-readable error output", false)
    .action(async (expression: string | undefined, opts: ConvertOptions) => {
      settings.exit(await runConvert(expression, { ...defaults, ...opts }));
    });

  program
    .command("check")
    .description("Check the syntax of an expression without converting it")
    .argument("[expression]", EXPRESSION_HELP)
    .allowUnknownOption()
    .option("-f, --file <path>", "Read the expression from a file")
    .option("-g, --grammar <name>", "Grammar: auto, term, bool or list")
    .option("--pretty", "Human-readable output", false)
    .action(async (expression: string | undefined, opts: CheckOptions) => {
      settings.exit(await runCheck(expression, { ...defaults, ...opts }));
    });

  program
    .command("show")
    .description("Print an expression as MathML, as a tree read back from the MathML, and in every notation")
    .argument("[expression]", EXPRESSION_HELP)
    .allowUnknownOption()
    .option("-f, --file <path>", "Read the expression from a file")
    .option("-g, --grammar <name>", "Grammar: auto, term, bool or list")
    .option("--json", "Output as JSON", false)
    .option("--pretty", "Human-readable error output", false)
    .action(async (expression: string | undefined, opts: ShowOptions) => {
      settings.exit(await runShow(expression, { ...defaults, ...opts }));
    });

  program
    .command("config")
    .description("Display the effective configuration and where it was found")
    .option("--json", "Output as JSON", false)
    .option("--pretty", "Human-readable error output", false)
    .action(async (opts: CommonOptions & { json?: boolean }) => {
      settings.exit(await runConfig({ ...defaults, ...opts }));
    });

  return program;
}
