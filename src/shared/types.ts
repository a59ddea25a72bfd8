/**
 * Shared enums and value types used across leakguard modules.
 */

/** Type of risk a detector represents. Never altered by confidence. */
export enum Severity {
  HIGH = 'high',
  MEDIUM = 'medium',
  LOW = 'low',
}

/** How a detector recognizes a value. */
export enum DetectorKind {
  STRUCTURAL = 'structural',
  STATISTICAL = 'statistical',
}

/** Lifecycle status of a reported finding. */
export enum FindingStatus {
  ACTIVE = 'active',
  RESOLVED = 'resolved',
}

/** Per-path state of the scan pipeline. */
export enum PathState {
  IDLE = 'idle',
  READING = 'reading',
  SCANNING = 'scanning',
  DIFFING = 'diffing',
}

export type ChangeKind = 'created' | 'changed' | 'deleted';

/** A "this path changed" notification from the change source. */
export interface ChangeNotification {
  path: string;
  kind: ChangeKind;
  /** Epoch milliseconds at which the source observed the change. */
  timestamp: number;
}

/** Ordering used wherever findings are ranked by risk. */
export const SEVERITY_RANK: Record<Severity, number> = {
  [Severity.HIGH]: 0,
  [Severity.MEDIUM]: 1,
  [Severity.LOW]: 2,
};

/** Zero-based, end-exclusive column span within a line. */
export interface ColumnRange {
  start: number;
  end: number;
}

/** A finding as it crosses the system boundary. Never holds the raw value. */
export interface Finding {
  /** Stable fingerprint. */
  id: string;
  root: string;
  detectorName: string;
  severity: Severity;
  confidence: number;
  filePath: string;
  lineNumber: number;
  contextPreview: string;
  valuePreview: string;
  firstSeenAt: string;
  lastSeenAt: string;
  status: FindingStatus;
}

export type TransitionKind = 'new' | 'resolved';

export interface FindingTransition {
  kind: TransitionKind;
  finding: Finding;
  root: string;
  scanId: string;
  at: string;
}
