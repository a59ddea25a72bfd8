/**
 * Registry Module - Public API
 *
 * The immutable detector catalog and the matching it performs.
 */

export { PatternRegistry, default } from './pattern-registry.js';
export type { RegistryOptions } from './pattern-registry.js';

export {
  BUILTIN_DETECTORS,
  DEFAULT_ENTROPY_THRESHOLD,
  DEFAULT_MIN_TOKEN_LENGTH,
  DEFAULT_STRUCTURAL_PRIOR,
} from './catalog.js';
export { CHECKSUMS, luhn, ssn } from './validators.js';

export type {
  CandidateToken,
  ChecksumName,
  Detector,
  DetectorFailure,
  LineMatchResult,
  RawMatch,
  StatisticalDetector,
  StructuralDetector,
} from './types.js';
export { DetectorKind, Severity } from './types.js';
