/**
 * Storage module exports
 */

export { writeFileAtomic, nodeFileOps } from './atomic-file.js';
export type { FileOps } from './atomic-file.js';
export { ConversationLog, EventStore, parseEventLog, readEventLog } from './event-store.js';
export type { EventLogContents, EventSink } from './event-store.js';
export {
  ManifestStore,
  allConversationsTerminal,
  countConversations,
  deriveFinalStatus,
  isTerminalExperimentStatus,
  readManifest,
} from './manifest.js';
export type { ManifestStoreOptions } from './manifest.js';
export { ImportMarkers } from './markers.js';
export type { ImportMarkerState } from './markers.js';
export { AnalyticsStore } from './analytics.js';
export type {
  AnalyticsStoreOptions,
  ExperimentProjection,
  MessageMetricsFilter,
  ProjectionCounts,
  StoredEventRow,
  StoredMessageRow,
  TurnFilter,
} from './analytics.js';
export { Importer, buildProjection, isReadyForImport, listExperimentDirectories } from './importer.js';
export type { ImportOptions, ImportOutcome, ImporterOptions } from './importer.js';
export * from './paths.js';
