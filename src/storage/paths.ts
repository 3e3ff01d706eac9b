/**
 * Storage Path Constants
 *
 * Centralizes all file and directory paths used by stratify.
 * Tool state lives under ~/.stratify/ (override with STRATIFY_HOME).
 *
 * @module storage/paths
 */

import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Root directory for stratify's own files
 * Location: ~/.stratify/ unless STRATIFY_HOME is set
 *
 * @example "/Users/username/.stratify"
 */
export const STRATIFY_HOME = process.env.STRATIFY_HOME || join(homedir(), ".stratify");

/**
 * Configuration file path
 * Location: ~/.stratify/config.json
 *
 * Used by: storage/config.ts, config command
 */
export const CONFIG_PATH = join(STRATIFY_HOME, "config.json");

/**
 * Logs directory path
 * Location: ~/.stratify/logs/
 *
 * Used by: utils/logger.ts
 */
export const LOGS_DIR = join(STRATIFY_HOME, "logs");

/**
 * Default root scanned for recorded sessions
 * Layout: <projects>/<project>/sessions/<session-dir>/{metadata.json,transcript.jsonl}
 */
export const DEFAULT_PROJECTS_DIR = join(homedir(), ".amplifier", "projects");

/** Export file names, written to the output directory */
export const SESSION_ANALYSIS_JSON = "session_analysis.json";
export const SESSION_ANALYSIS_CSV = "session_analysis.csv";
export const DASHBOARD_XLSX = "session_dashboard.xlsx";

/** Per-session file names */
export const METADATA_FILE = "metadata.json";
export const TRANSCRIPT_FILE = "transcript.jsonl";
