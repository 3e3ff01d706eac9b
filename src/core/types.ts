/**
 * Core type definitions for stratify.
 *
 * This file establishes the domain model shared by the loader, the detectors,
 * the classifier and the aggregation layer: messages, sessions, signal records,
 * session records and the corpus summary.
 */

// =============================================================================
// Message Types
// =============================================================================

/**
 * Who produced a message. Roles the transcript format does not define are
 * kept as 'other' so positional heuristics still see them.
 */
export type MessageRole = 'user' | 'assistant' | 'tool' | 'other';

/**
 * A single typed block inside a structured message body
 * (e.g. `thinking`, `text`, `tool_call`).
 */
export interface ContentBlock {
  /** Block type as written in the transcript */
  type: string;

  /** Remaining fields of the block */
  payload: Record<string, unknown>;
}

/**
 * Message body: either plain text or an ordered sequence of typed blocks.
 */
export type MessageContent =
  | { kind: 'text'; text: string }
  | { kind: 'blocks'; blocks: ContentBlock[] };

/**
 * A tool invocation issued by the assistant.
 */
export interface ToolCall {
  /** Name of the tool (e.g., 'read_file', 'bash') */
  tool: string;

  /** Arguments passed to the tool; some recorders store them as an encoded string */
  arguments: Record<string, unknown> | string;
}

/**
 * Represents a single turn in a transcript. Index order is chronological order.
 */
export interface Message {
  role: MessageRole;

  content: MessageContent;

  /** Tool invocations issued in this turn (empty when none) */
  toolCalls: ToolCall[];

  /** ISO-8601 timestamp, when the transcript records one */
  timestamp?: string;
}

// =============================================================================
// Session Types
// =============================================================================

/**
 * Normalized contents of a session's metadata record.
 */
export interface SessionMetadata {
  sessionId: string;

  /** ISO-8601 creation timestamp ('' when unknown) */
  created: string;

  name: string;

  description: string;

  bundle: string;

  model: string;

  /** Turn count reported by the recording tool */
  turnCount: number;
}

/**
 * A session as supplied by a session adapter, before analysis.
 */
export interface RawSession {
  /** Parsed metadata, or null when the record is absent or unusable */
  metadata: SessionMetadata | null;

  /** Ordered transcript */
  messages: Message[];

  /** Directory holding the session files */
  sessionDir: string;

  /** Path of the metadata file the session was discovered through */
  metadataPath: string;
}

// =============================================================================
// Signal Records
// =============================================================================

export interface DelegationSignal {
  delegationCount: number;
  /** Candidate agent names, deduplicated in first-seen order */
  agentsUsed: string[];
  hasDelegation: boolean;
}

export interface IterationSignal {
  iterationCount: number;
  isIterative: boolean;
}

export interface ExplorationSignal {
  explorationToolCount: number;
  parallelSearches: number;
  isExploratory: boolean;
  /** Calls per exploration tool */
  toolsUsed: Record<string, number>;
}

export interface ImplementationSignal {
  writeOperations: number;
  editOperations: number;
  totalFileOps: number;
  isImplementation: boolean;
}

export interface ErrorRecoverySignal {
  errorsEncountered: number;
  recoveryAttempts: number;
  hasErrorRecovery: boolean;
  /** recoveryAttempts / errorsEncountered, 0 when there were no errors */
  recoveryRate: number;
}

export type PlanningApproach = 'planning-heavy' | 'execution-heavy' | 'balanced';

export interface PlanningExecutionSignal {
  planningMessages: number;
  executionMessages: number;
  planningRatio: number;
  approach: PlanningApproach;
}

export interface ValidationSignal {
  testRuns: number;
  codeChecks: number;
  reviews: number;
  totalValidation: number;
  hasValidation: boolean;
}

/**
 * The seven signal records produced for one session.
 */
export interface SessionPatterns {
  delegation: DelegationSignal;
  iteration: IterationSignal;
  exploration: ExplorationSignal;
  implementation: ImplementationSignal;
  errorRecovery: ErrorRecoverySignal;
  planningExecution: PlanningExecutionSignal;
  validation: ValidationSignal;
}

// =============================================================================
// Classification Types
// =============================================================================

/**
 * Approach labels in classifier priority order.
 */
export const APPROACHES = [
  'Iterative Refinement',
  'Exploratory Investigation',
  'Direct Implementation',
  'Multi-Agent Orchestration',
  'Error Recovery & Resilience',
  'Validation-Driven',
  'Simple/Conversational',
] as const;

export type Approach = (typeof APPROACHES)[number];

export const SUCCESS_INDICATORS = [
  'Files Modified',
  'Good Error Recovery',
  'Validated',
  'Substantial Work',
] as const;

export type SuccessIndicator = (typeof SUCCESS_INDICATORS)[number];

// =============================================================================
// Output Types
// =============================================================================

/**
 * The durable per-session analysis result.
 */
export interface SessionRecord {
  sessionId: string;
  parentSessionId: string;
  created: string;
  name: string;
  description: string;
  bundle: string;
  model: string;
  turnCount: number;
  messageCount: number;
  durationMinutes: number;
  /** Never empty; priority ordered */
  approaches: [Approach, ...Approach[]];
  /** Always approaches[0] */
  primaryApproach: Approach;
  patterns: SessionPatterns;
  successIndicators: SuccessIndicator[];
  /** Metadata path segment after the last `/projects/` and before `/sessions/` */
  project: string;
}

/**
 * Sessions where each raw detector gate fired.
 */
export interface PatternStatistics {
  iterativeSessions: number;
  exploratorySessions: number;
  implementationSessions: number;
  delegatedSessions: number;
  validatedSessions: number;
  errorRecoverySessions: number;
}

/**
 * Aggregate statistics over the whole corpus.
 */
export interface CorpusSummary {
  totalSessions: number;
  /** Every label of every session counted once */
  approachFrequencies: Record<string, number>;
  /** One count per session, for its primary approach */
  primaryApproachDistribution: Record<string, number>;
  averageTurns: number;
  averageDurationMinutes: number;
  patternStatistics: PatternStatistics;
  /** Sessions per creation date (YYYY-MM-DD or 'unknown'), keys ascending */
  sessionsByDate: Record<string, number>;
}

// =============================================================================
// Configuration Types
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * User configuration stored in config.json.
 */
export interface Config {
  /** Config schema version */
  version: string;

  /** Root directory scanned for session directories */
  projectsDir: string;

  /** Where exports are written; current directory when unset */
  outputDir?: string;

  /** Also write the dashboard sheets on every analyze run */
  dashboard: boolean;

  logLevel: LogLevel;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Standardized error class for stratify.
 *
 * Provides machine-readable error codes and optional context for debugging.
 */
export class StratifyError extends Error {
  /** Machine-readable error code for programmatic handling */
  code: ErrorCode;

  /** Optional additional context (e.g., which file failed) */
  context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = 'StratifyError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Enumeration of all possible error codes in stratify.
 */
export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  PROJECTS_DIR_MISSING = 'PROJECTS_DIR_MISSING',
  FILE_WRITE_FAILED = 'FILE_WRITE_FAILED',
}
