/**
 * Transcript parser for session transcript.jsonl files.
 *
 * Each line is one JSON message record:
 * `{ role, content, tool_calls: [{ tool, arguments }], timestamp }`.
 * Content is either a string or an array of typed blocks and is normalized
 * into the MessageContent variant here, so detectors never inspect raw shapes.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ContentBlock, Message, MessageContent, MessageRole, ToolCall } from '../core/types.js';

const toolCallSchema = z.object({
  tool: z.string().catch(''),
  arguments: z.unknown(),
});

/**
 * Schema for one transcript line. Fields of the wrong type fall back to
 * defaults instead of rejecting the line.
 */
export const transcriptLineSchema = z.object({
  role: z.string().catch(''),
  content: z.unknown(),
  tool_calls: z.array(z.unknown()).catch([]),
  timestamp: z.string().optional().catch(undefined),
});

export type TranscriptLine = z.infer<typeof transcriptLineSchema>;

/**
 * Parsed transcript result
 */
export interface ParsedTranscript {
  messages: Message[];

  /** The first line that was not a JSON object and the non-blank lines after it */
  skippedLines: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeRole(role: string): MessageRole {
  if (role === 'user' || role === 'assistant' || role === 'tool') {
    return role;
  }
  return 'other';
}

/**
 * Normalize a raw content value into the MessageContent variant.
 *
 * - string → text
 * - array → blocks (non-object entries are dropped)
 * - null/undefined → empty text
 * - anything else → its JSON serialization as text
 */
export function normalizeContent(content: unknown): MessageContent {
  if (typeof content === 'string') {
    return { kind: 'text', text: content };
  }

  if (Array.isArray(content)) {
    const blocks: ContentBlock[] = content.filter(isRecord).map((entry) => {
      const { type, ...payload } = entry;
      return { type: typeof type === 'string' ? type : '', payload };
    });
    return { kind: 'blocks', blocks };
  }

  if (content === null || content === undefined) {
    return { kind: 'text', text: '' };
  }

  return { kind: 'text', text: JSON.stringify(content) };
}

/**
 * Objects and strings are kept as recorded; a missing value becomes `{}` and
 * any other value its JSON text.
 */
export function normalizeArguments(args: unknown): ToolCall['arguments'] {
  if (isRecord(args) || typeof args === 'string') {
    return args;
  }
  if (args === null || args === undefined) {
    return {};
  }
  return JSON.stringify(args);
}

function normalizeToolCalls(rawCalls: unknown[]): ToolCall[] {
  const calls: ToolCall[] = [];

  for (const rawCall of rawCalls) {
    const parsed = toolCallSchema.safeParse(rawCall);
    if (parsed.success) {
      calls.push({ tool: parsed.data.tool, arguments: normalizeArguments(parsed.data.arguments) });
    }
  }

  return calls;
}

/**
 * Convert a validated transcript line into a Message.
 */
export function toMessage(line: TranscriptLine): Message {
  const message: Message = {
    role: normalizeRole(line.role),
    content: normalizeContent(line.content),
    toolCalls: normalizeToolCalls(line.tool_calls),
  };

  if (line.timestamp !== undefined) {
    message.timestamp = line.timestamp;
  }

  return message;
}

/**
 * Parse the contents of a transcript.jsonl file.
 *
 * Blank lines are ignored. Reading stops at the first line that is not a JSON
 * object: the messages before it are kept and it and every non-blank line
 * after it are counted as skipped, so message indices never shift.
 *
 * @param content - Full content of the transcript file
 *
 * @example
 * ```typescript
 * const { messages } = parseTranscript(await readFile(path, 'utf8'));
 * console.log(`Found ${messages.length} messages`);
 * ```
 */
export function parseTranscript(content: string): ParsedTranscript {
  const messages: Message[] = [];

  const lines = content.split('\n').filter((line) => line.trim().length > 0);

  for (const [index, line] of lines.entries()) {
    const parsed = parseLine(line);
    if (!parsed) {
      return { messages, skippedLines: lines.length - index };
    }
    messages.push(toMessage(parsed));
  }

  return { messages, skippedLines: 0 };
}

function parseLine(line: string): TranscriptLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }

  const parsed = transcriptLineSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Read and parse a transcript file. A missing file yields an empty transcript.
 *
 * @param filePath - Path to transcript.jsonl
 */
export async function parseTranscriptFile(filePath: string): Promise<ParsedTranscript> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { messages: [], skippedLines: 0 };
    }
    throw error;
  }
  return parseTranscript(content);
}
