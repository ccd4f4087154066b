/**
 * sublisp config - effective configuration summary command
 */
import { formatDiagnostic } from "@sublisp/core";
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
      console.error(formatDiagnostic({ code: "E_CONFIG", message: `${e.message} (${e.path})` }, !opts.json));
      return 4;
    }
    throw e;
  }

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: resolved.config,
        },
        null,
        2
      )
    );
    return 0;
  }

  console.log("Effective sublisp configuration");
  console.log(`  Source:    ${resolved.source}`);
  console.log(`  Path:      ${resolved.path ?? "(none)"}`);
  console.log(`  Max steps: ${resolved.config.maxSteps}`);
  console.log(`  Binding:   ${resolved.config.binding}`);
  return 0;
}
