/**
 * Audit Module - Public API
 *
 * Sink interface, the retrying dispatcher and the SQLite store.
 */

export { SqliteAuditSink, default } from './finding-store.js';
export type {
  DailyReport,
  DailySummary,
  FindingEvent,
  FindingStats,
  FindingStoreConfig,
  StoredQuery,
} from './finding-store.js';
export { AuditDispatcher, backoffDelay } from './audit-dispatcher.js';
export type { DispatcherConfig, DispatcherEvents, DispatcherStats } from './audit-dispatcher.js';
export { MemoryAuditSink, matchesQuery } from './audit-sink.js';
export type { AuditQuery, AuditSink } from './audit-sink.js';
