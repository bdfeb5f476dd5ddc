/**
 * mathterm config - effective configuration and where it came from
 */
import { resolveConfig } from "@mathterm/core";
import type { ResolvedConfig } from "@mathterm/core";
import { reportFailure } from "./input.js";
import type { CommonOptions } from "./input.js";

export async function runConfig(opts: CommonOptions & { json?: boolean }): Promise<number> {
  let resolved: ResolvedConfig;
  try {
    resolved = resolveConfig(opts.cwd, opts.homeDir);
  } catch (e) {
    return reportFailure(e, !!opts.pretty);
  }
  const { config } = resolved;

  if (opts.json) {
    console.log(JSON.stringify({ source: resolved.source, path: resolved.path, config }, null, 2));
    return 0;
  }

  console.log("Effective mathterm configuration");
  console.log(`  Source:   ${resolved.source}`);
  console.log(`  Path:     ${resolved.path ?? "(none)"}`);
  console.log(`  Grammar:  ${config.grammar}`);
  console.log(`  Fallback: ${config.fallback.join(", ")}`);
  console.log(`  Notation: ${config.notation}`);
  console.log(`  Indent:   ${config.indent}`);
  return 0;
}
