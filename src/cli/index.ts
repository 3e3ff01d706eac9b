#!/usr/bin/env node
import { Clerc, friendlyErrorPlugin, helpPlugin, notFoundPlugin, versionPlugin } from "clerc";
import pkg from "../../package.json" with { type: "json" };
import { handleAnalyze } from "./commands/analyze.js";
import { handleConfig } from "./commands/config.js";

/**
 * Main CLI entry point for stratify
 *
 * Plugins:
 * - helpPlugin / versionPlugin: `--help` and `--version`
 * - notFoundPlugin: Shows "Did you mean X?" for typos
 * - friendlyErrorPlugin: Shows friendly errors instead of stack traces
 */

Clerc.create()
  .scriptName("stratify")
  .description(pkg.description)
  .version(pkg.version)
  .use(helpPlugin())
  .use(versionPlugin())
  .use(notFoundPlugin())
  .use(friendlyErrorPlugin())

  // Command: analyze - Classify sessions and export corpus statistics
  .command("analyze", "Classify recorded sessions and export corpus statistics", {
    flags: {
      dir: {
        type: String,
        description: "Projects directory to scan for sessions",
        alias: "d",
      },
      output: {
        type: String,
        description: "Directory to write exports to",
        alias: "o",
      },
      limit: {
        type: Number,
        description: "Limit number of sessions to analyze",
        alias: "l",
      },
      dashboard: {
        type: Boolean,
        description: "Also write the dashboard workbook",
      },
      verbose: {
        type: Boolean,
        description: "Show verbose output",
        alias: "v",
      },
      config: {
        type: String,
        description: "Path to an alternate config.json",
      },
    },
  })
  .on("analyze", async (ctx) => {
    process.exitCode = await handleAnalyze(ctx.flags);
  })

  // Command: config - Show the effective configuration
  .command("config", "Show the effective configuration", {
    flags: {
      config: {
        type: String,
        description: "Path to an alternate config.json",
      },
    },
  })
  .on("config", async (ctx) => {
    process.exitCode = await handleConfig(ctx.flags);
  })

  .parse();
