/**
 * Orchestrator Module - Public API
 */

export { ScanOrchestrator, default } from './scan-orchestrator.js';
export type {
  OrchestratorEvents,
  OrchestratorMetrics,
  OrchestratorOptions,
  ScanResult,
  ScanSkip,
  ScanStatus,
} from './scan-orchestrator.js';
export { FilePolicy } from './file-policy.js';
export type { PolicyVerdict } from './file-policy.js';
