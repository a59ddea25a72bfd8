/**
 * Registry Module Types
 *
 * Detectors form a sealed union tagged by `kind`. Adding a detector is a
 * catalog entry, never new control flow.
 */

import { DetectorKind, Severity } from '../shared/types.js';
import type { ColumnRange } from '../shared/types.js';

// Re-export
export { DetectorKind, Severity };

/** Checksums a structural detector may require of its matches. */
export type ChecksumName = 'luhn' | 'ssn';

interface DetectorBase {
  /** Unique detector name, used in fingerprints and findings. */
  name: string;
  description: string;
  severity: Severity;
}

export interface StructuralDetector extends DetectorBase {
  kind: DetectorKind.STRUCTURAL;
  /** RegExp source. */
  pattern: string;
  /** RegExp flags; `g` is always added. */
  flags?: string;
  /** At least one keyword must appear on the line (case-insensitive). */
  requiredContext?: readonly string[];
  /** Base confidence before context adjustments. Default 0.9. */
  prior?: number;
  validate?: ChecksumName;
}

export interface StatisticalDetector extends DetectorBase {
  kind: DetectorKind.STATISTICAL;
  /** Character class (without brackets) a candidate run is made of. */
  alphabet: string;
  /** Minimum candidate length. Default 20. */
  minLength: number;
  /** Minimum normalized entropy. Default 0.75. */
  threshold: number;
  /** Candidates without a digit are not secret-shaped. */
  requireDigit: boolean;
}

export type Detector = StructuralDetector | StatisticalDetector;

/** A match as produced by the registry. Transient, never persisted. */
export interface RawMatch {
  detectorName: string;
  detectorKind: DetectorKind;
  filePath: string;
  lineNumber: number;
  columnRange: ColumnRange;
  matchedText: string;
  /** Text before and after the match on its line, match excluded. */
  surroundingContext: {
    before: string;
    after: string;
  };
  /** Present on statistical matches only. */
  normalizedEntropy?: number;
}

/** A secret-shaped substring handed to the entropy scorer. */
export interface CandidateToken {
  token: string;
  position: {
    lineNumber: number;
    columnRange: ColumnRange;
  };
}

export interface DetectorFailure {
  detectorName: string;
  lineNumber: number;
  message: string;
}

export interface LineMatchResult {
  matches: RawMatch[];
  failures: DetectorFailure[];
}
