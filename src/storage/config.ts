/**
 * Configuration Storage Module
 *
 * Provides type-safe read and write functions for application configuration.
 * Handles ~/.stratify/config.json with schema validation and atomic writes.
 *
 * @module storage/config
 */

import { existsSync } from "node:fs";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { ErrorCode, StratifyError, type Config } from "../core/types.js";
import { CONFIG_PATH, DEFAULT_PROJECTS_DIR } from "./paths.js";

/**
 * Schema for config.json. Every field has a default, so a partial file
 * is completed rather than rejected.
 */
export const configSchema = z.object({
  version: z.string().default("1.0.0"),
  projectsDir: z.string().min(1).default(DEFAULT_PROJECTS_DIR),
  outputDir: z.string().min(1).optional(),
  dashboard: z.boolean().default(false),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
});

/**
 * Returns the default configuration.
 *
 * - Sessions read from ~/.amplifier/projects
 * - Exports written to the current directory
 * - Dashboard sheets off, log level info
 */
export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * Reads configuration from ~/.stratify/config.json.
 *
 * If the config file doesn't exist, returns default configuration without error.
 *
 * @param configPath - Optional custom config path for testing
 * @throws StratifyError (CONFIG_INVALID) for malformed JSON or schema violations
 *
 * @example
 * const config = await readConfig();
 * console.log(config.projectsDir);
 */
export async function readConfig(configPath: string = CONFIG_PATH): Promise<Config> {
  if (!existsSync(configPath)) {
    return getDefaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, "utf8"));
  } catch (error) {
    throw new StratifyError(
      `Failed to parse config.json: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.CONFIG_INVALID,
      { path: configPath },
    );
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new StratifyError(`Invalid config.json: ${issues.join("; ")}`, ErrorCode.CONFIG_INVALID, {
      path: configPath,
      issues,
    });
  }

  return parsed.data;
}

/**
 * Writes configuration using a temporary file and rename.
 * Creates the parent directory if it doesn't exist.
 *
 * @param config - Configuration object to persist
 * @param configPath - Optional custom config path for testing
 * @throws StratifyError (FILE_WRITE_FAILED) when the write fails
 */
export async function writeConfig(config: Config, configPath: string = CONFIG_PATH): Promise<void> {
  const tempPath = `${configPath}.tmp`;

  try {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(config, null, 2));
    await rename(tempPath, configPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new StratifyError(
      `Failed to write config.json: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.FILE_WRITE_FAILED,
      { path: configPath },
    );
  }
}
