/**
 * tally config - effective configuration summary command
 */
import { formatDiagnostic } from "@tally/core";
import { resolveConfig, ConfigError } from "./config.js";
import type { ResolvedConfig } from "./config.js";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  let resolved: ResolvedConfig;
  try {
    resolved = resolveConfig(opts.cwd, opts.homeDir);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(formatDiagnostic({ code: "E_CONFIG", message: e.message }, !opts.json));
      return 2;
    }
    throw e;
  }
  const { config } = resolved;

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: {
            maxSteps: config.maxSteps ?? null,
            memoryLimit: config.memoryLimit,
            heapLimit: config.heapLimit,
          },
        },
        null,
        2
      )
    );
    return 0;
  }

  console.log("Effective Tally configuration");
  console.log(`  Source:       ${resolved.source}`);
  console.log(`  Path:         ${resolved.path ?? "(none)"}`);
  console.log(`  Max steps:    ${config.maxSteps ?? "(unlimited)"}`);
  console.log(`  Memory limit: ${config.memoryLimit}`);
  console.log(`  Heap limit:   ${config.heapLimit}`);
  return 0;
}
