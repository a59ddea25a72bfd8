/**
 * leakguard - real-time secret and PII leak detection for local files.
 */

// Shared
export * from './shared/types.js';
export * from './shared/errors.js';

// Configuration
export {
  CONFIG_FILE_NAME,
  ConfigFileSchema,
  DEFAULT_BINARY_EXTENSIONS,
  DEFAULT_CONFIG,
  DEFAULT_EXCLUDED_DIRECTORIES,
  loadConfig,
  mergeConfig,
} from './config/config.js';
export type {
  AuditConfig,
  ConfigOverrides,
  DetectionConfig,
  ExclusionConfig,
  LeakGuardConfig,
  LoadConfigOptions,
  WorkerConfig,
} from './config/config.js';

// Detection
export {
  BUILTIN_DETECTORS,
  CHECKSUMS,
  PatternRegistry,
  luhn,
  ssn,
} from './registry/index.js';
export type {
  CandidateToken,
  Detector,
  DetectorFailure,
  RawMatch,
  RegistryOptions,
  StatisticalDetector,
  StructuralDetector,
} from './registry/index.js';
export {
  ConfidenceComposer,
  EntropyScorer,
  PatternScanner,
  maskValue,
  shannonEntropy,
} from './scanner/index.js';
export type { AnnotatedMatch, ComposerConfig, Composition, ScannerConfig } from './scanner/index.js';

// Deduplication
export { FindingDeduplicator, fingerprint, shapeNormalize } from './dedup/index.js';
export type { ReconcileResult, SnapshotFilter } from './dedup/index.js';

// Orchestration
export { FilePolicy, ScanOrchestrator } from './orchestrator/index.js';
export type { OrchestratorMetrics, ScanResult, ScanSkip } from './orchestrator/index.js';

// Audit
export { AuditDispatcher, MemoryAuditSink, SqliteAuditSink } from './audit/index.js';
export type { AuditQuery, AuditSink, DailyReport, DispatcherStats, FindingStats } from './audit/index.js';

// Monitoring
export { LeakMonitor } from './monitor/leak-monitor.js';
export type {
  ChangeSourceFactory,
  LeakMonitorOptions,
  MonitorEvents,
  MonitorHandle,
  MonitorMetrics,
} from './monitor/leak-monitor.js';
export { FsChangeSource } from './watcher/index.js';
export type { ChangeListener, ChangeSource } from './watcher/index.js';

// Dashboard
export { DashboardServer } from './dashboard/server.js';
export type { DashboardConfig } from './dashboard/server.js';
export { searchFindings } from './dashboard/finding-search.js';
