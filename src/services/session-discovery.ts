/**
 * Session discovery service.
 *
 * Scans a projects directory for recorded sessions. A session is any
 * directory that holds a metadata.json file and whose path contains
 * "sessions" (e.g. `<projects>/<project>/sessions/<id>/metadata.json`).
 */

import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { METADATA_FILE } from '../storage/paths.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';

/**
 * Session discovery service.
 * Walks the projects directory recursively for session metadata files.
 */
export class SessionDiscoveryService {
  private projectsDir: string;
  private logger: Logger;

  /**
   * @param projectsDir - Root directory to scan
   * @param logger - Receives warnings for unreadable directories
   */
  constructor(projectsDir: string, logger: Logger = createSilentLogger()) {
    this.projectsDir = projectsDir;
    this.logger = logger;
  }

  /**
   * Find every session metadata file under the projects directory.
   *
   * @returns Absolute metadata.json paths, sorted
   *
   * @example
   * ```typescript
   * const service = new SessionDiscoveryService('/home/me/.amplifier/projects');
   * const files = await service.findSessionMetadataFiles();
   * console.log(`Found ${files.length} sessions`);
   * ```
   */
  async findSessionMetadataFiles(): Promise<string[]> {
    const found: string[] = [];
    await this.scanDirectory(this.projectsDir, found);
    return found.sort();
  }

  /**
   * Recursively scan a directory, collecting metadata files of session directories.
   * Session directories are still descended into; nested sessions count too.
   */
  private async scanDirectory(dir: string, found: string[]): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      this.logger.warn({ dir, err: error }, 'Skipping unreadable directory');
      return null;
    });
    if (!entries) {
      return;
    }

    const hasMetadata = entries.some((entry) => entry.isFile() && entry.name === METADATA_FILE);
    if (hasMetadata && dir.includes('sessions')) {
      found.push(join(dir, METADATA_FILE));
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        await this.scanDirectory(join(dir, entry.name), found);
      }
    }
  }

  /**
   * Get the projects directory path being used.
   */
  getProjectsDirectory(): string {
    return this.projectsDir;
  }

  /**
   * Check if the projects directory exists and is a directory.
   */
  async isProjectsDirAccessible(): Promise<boolean> {
    try {
      const stats = await stat(this.projectsDir);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Count sessions without parsing them.
   */
  async countSessions(): Promise<number> {
    const files = await this.findSessionMetadataFiles();
    return files.length;
  }
}
