/**
 * Session adapter for directory-per-session recordings.
 *
 * Layout: `<projects>/<project>/sessions/<session-dir>/metadata.json` next to
 * `transcript.jsonl`. A missing transcript loads as an empty message list,
 * which the analysis later excludes.
 */

import { dirname, join } from 'node:path';
import type { RawSession } from '../../core/types.js';
import { parseSessionMetadataFile } from '../../parsers/session-metadata.js';
import { parseTranscriptFile } from '../../parsers/transcript.js';
import { SessionDiscoveryService } from '../../services/session-discovery.js';
import { TRANSCRIPT_FILE } from '../../storage/paths.js';
import { createSilentLogger, type Logger } from '../../utils/logger.js';
import type { SessionAdapter, SessionLoadError, SessionLoadResult } from './SessionAdapter.js';

export class AmplifierSessionAdapter implements SessionAdapter {
  name = 'amplifier';

  private discovery: SessionDiscoveryService;
  private logger: Logger;

  constructor(projectsDir: string, logger: Logger = createSilentLogger()) {
    this.logger = logger;
    this.discovery = new SessionDiscoveryService(projectsDir, logger);
  }

  async isAvailable(): Promise<boolean> {
    return this.discovery.isProjectsDirAccessible();
  }

  async getSessions(): Promise<SessionLoadResult> {
    const metadataFiles = await this.discovery.findSessionMetadataFiles();
    this.logger.info({ count: metadataFiles.length }, 'Discovered session metadata files');

    const sessions: RawSession[] = [];
    const errors: SessionLoadError[] = [];

    for (const metadataPath of metadataFiles) {
      try {
        sessions.push(await this.loadSession(metadataPath));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn({ path: metadataPath, reason }, 'Failed to load session');
        errors.push({ path: metadataPath, reason });
      }
    }

    return { sessions, errors };
  }

  /**
   * Load one session from its metadata file and the sibling transcript.
   */
  async loadSession(metadataPath: string): Promise<RawSession> {
    const sessionDir = dirname(metadataPath);
    const metadata = await parseSessionMetadataFile(metadataPath);
    const transcript = await parseTranscriptFile(join(sessionDir, TRANSCRIPT_FILE));

    if (transcript.skippedLines > 0) {
      this.logger.debug(
        { path: sessionDir, skippedLines: transcript.skippedLines },
        'Transcript truncated at a malformed line'
      );
    }

    return {
      metadata,
      messages: transcript.messages,
      sessionDir,
      metadataPath,
    };
  }
}
