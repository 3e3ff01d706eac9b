/**
 * Adapter interface for loading recorded sessions.
 * Implementations abstract away where sessions live and how their files are laid out;
 * the analysis engine only ever sees RawSession values.
 */

import type { RawSession } from '../../core/types.js';

/**
 * A session that could not be loaded.
 */
export interface SessionLoadError {
  /** Path that failed (metadata file or session directory) */
  path: string;

  /** Reason for failure */
  reason: string;
}

/**
 * Result of loading sessions from one adapter.
 */
export interface SessionLoadResult {
  sessions: RawSession[];
  errors: SessionLoadError[];
}

/**
 * Adapter interface for reading recorded sessions.
 */
export interface SessionAdapter {
  /**
   * Human-readable name of adapter (e.g., "amplifier").
   */
  name: string;

  /**
   * Check if this adapter's session store exists.
   *
   * @returns true if sessions can be read, false otherwise
   */
  isAvailable(): Promise<boolean>;

  /**
   * Load all sessions. Sessions that fail to load are reported in `errors`
   * instead of aborting the whole load.
   */
  getSessions(): Promise<SessionLoadResult>;
}
