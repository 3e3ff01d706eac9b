/**
 * Session metadata parser.
 *
 * Reads a session's metadata.json record into SessionMetadata. Each field
 * defaults on its own when absent or of the wrong type; a record that is not
 * a non-empty JSON object yields null and the session is skipped.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { SessionMetadata } from '../core/types.js';

export const sessionMetadataSchema = z.object({
  session_id: z.string().catch(''),
  created: z.string().catch(''),
  name: z.string().catch('Untitled'),
  description: z.string().catch(''),
  bundle: z.string().catch(''),
  model: z.string().catch(''),
  turn_count: z.number().catch(0),
});

/**
 * Parse metadata.json content.
 *
 * @param content - Raw file content
 * @returns Normalized metadata, or null for invalid JSON, non-objects and `{}`
 *
 * @example
 * ```typescript
 * const metadata = parseSessionMetadata('{"session_id":"abc","turn_count":4}');
 * console.log(metadata?.name); // "Untitled"
 * ```
 */
export function parseSessionMetadata(content: string): SessionMetadata | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw) || Object.keys(raw).length === 0) {
    return null;
  }

  const data = sessionMetadataSchema.parse(raw);

  return {
    sessionId: data.session_id,
    created: data.created,
    name: data.name,
    description: data.description,
    bundle: data.bundle,
    model: data.model,
    turnCount: data.turn_count,
  };
}

/**
 * Read and parse a metadata.json file. A missing file yields null; other
 * read failures are thrown to the caller.
 */
export async function parseSessionMetadataFile(filePath: string): Promise<SessionMetadata | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
  return parseSessionMetadata(content);
}
