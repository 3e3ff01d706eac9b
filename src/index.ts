/**
 * Library entry point: loading, detection, classification, aggregation
 * and export, without the CLI.
 */

export * from './core/types.js';
export * from './analyzers/index.js';
export { classifyApproaches, FALLBACK_APPROACH, type ApproachClassification } from './core/classifier.js';
export {
  AnalysisEngine,
  type AnalysisResult,
  type AnalysisError,
  type AnalysisOptions,
} from './core/AnalysisEngine.js';
export type { SessionAdapter, SessionLoadResult, SessionLoadError } from './adapters/session/SessionAdapter.js';
export { AmplifierSessionAdapter } from './adapters/session/AmplifierSession.js';
export { SessionDiscoveryService } from './services/session-discovery.js';
export { analyzeSession, analyzeSessions, type SessionAnalysisResult } from './services/session-analysis.js';
export { summarizeSession, calculateDurationMinutes, deriveSuccessIndicators } from './services/session-summary.js';
export {
  aggregateCorpus,
  buildDashboardStats,
  buildTimeline,
  type DashboardStats,
  type TimelineEntry,
} from './services/corpus-aggregation.js';
export { parseTranscript, parseTranscriptFile } from './parsers/transcript.js';
export { parseSessionMetadata, parseSessionMetadataFile } from './parsers/session-metadata.js';
export { exportToJson, buildAnalysisExport, type AnalysisExport } from './reporters/json-export.js';
export { exportToCsv, buildSessionCsv } from './reporters/csv-export.js';
export { buildDashboardSheets, buildWorkbook, writeDashboard, type DashboardSheet } from './reporters/dashboard.js';
export { buildSummaryReport, type SummaryReport } from './reporters/summary-report.js';
export { readConfig, writeConfig, getDefaultConfig } from './storage/config.js';
