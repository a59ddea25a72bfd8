/**
 * Dedup Module - Public API
 */

export { FindingDeduplicator, default } from './finding-deduplicator.js';
export type { ReconcileResult, SnapshotFilter } from './finding-deduplicator.js';
export { fingerprint, shapeNormalize } from './fingerprint.js';
export type { FingerprintInput } from './fingerprint.js';
