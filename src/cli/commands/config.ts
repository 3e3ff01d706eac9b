/**
 * Config Command Handler
 *
 * Implements `stratify config`: prints the effective configuration,
 * i.e. config.json merged over the defaults.
 *
 * @module cli/commands/config
 */

import { existsSync } from "node:fs";
import { readConfig } from "../../storage/config.js";
import { CONFIG_PATH } from "../../storage/paths.js";
import { Formatter, formatter as defaultFormatter } from "../formatter.js";

export interface ConfigFlags {
  /** Alternate config file */
  config?: string;
}

/**
 * Display all configuration settings in a human-readable format.
 *
 * @returns Process exit code
 */
export async function handleConfig(flags: ConfigFlags, out: Formatter = defaultFormatter): Promise<number> {
  const configPath = flags.config ?? CONFIG_PATH;

  try {
    const config = await readConfig(configPath);

    out.header("Configuration");
    out.table([
      ["File", existsSync(configPath) ? configPath : `${configPath} (not found, using defaults)`],
      ["version", config.version],
      ["projectsDir", config.projectsDir],
      ["outputDir", config.outputDir ?? "(current directory)"],
      ["dashboard", config.dashboard],
      ["logLevel", config.logLevel],
    ]);

    return 0;
  } catch (error) {
    out.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}
