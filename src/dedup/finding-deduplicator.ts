/**
 * FindingDeduplicator - per-root fingerprint table.
 *
 * Decides for every surviving match whether it is a new detection, a repeat
 * of a reported one, or whether a previously reported finding has been
 * resolved. Only the root's worker mutates the table; readers get frozen
 * snapshots.
 */

import type { AnnotatedMatch } from '../scanner/pattern-scanner.js';
import { FindingStatus } from '../shared/types.js';
import type { Finding } from '../shared/types.js';
import { fingerprint, shapeNormalize } from './fingerprint.js';

interface FindingState {
  /** Frozen; replaced, never mutated. */
  finding: Readonly<Finding>;
  lastSeenScanId: string;
}

export interface ReconcileResult {
  /** Active findings of the file version, ordered by line then column. */
  findings: Readonly<Finding>[];
  /** Findings reported for the first time, or reopened, by this pass. */
  newFindings: Readonly<Finding>[];
  /** Findings that disappeared from the file in this pass. */
  resolved: Readonly<Finding>[];
}

export interface SnapshotFilter {
  filePath?: string;
  status?: FindingStatus;
}

export class FindingDeduplicator {
  readonly root: string;
  private readonly table = new Map<string, FindingState>();
  private readonly byFile = new Map<string, Set<string>>();

  constructor(root: string) {
    this.root = root;
  }

  /**
   * Reconciles one scan of `filePath` against the table.
   * Passing an empty match list resolves every active finding of the file.
   */
  reconcile(filePath: string, matches: readonly AnnotatedMatch[], scanId: string, now: Date = new Date()): ReconcileResult {
    const timestamp = now.toISOString();
    const ordinals = new Map<string, number>();
    const seen = new Set<string>();
    const findings: Readonly<Finding>[] = [];
    const newFindings: Readonly<Finding>[] = [];
    const resolved: Readonly<Finding>[] = [];

    let fileIndex = this.byFile.get(filePath);
    if (!fileIndex) {
      // Files that never held a finding stay out of the index.
      if (matches.length === 0) return { findings, newFindings, resolved };
      fileIndex = new Set();
      this.byFile.set(filePath, fileIndex);
    }

    for (const match of matches) {
      const shape = shapeNormalize(match.matchedText);
      // Ordinals follow column order, so removing the first of two same-shape
      // values on a line hands its id to the second.
      const ordinalKey = `${match.detectorName}\0${match.lineNumber}\0${shape}`;
      const ordinal = ordinals.get(ordinalKey) ?? 0;
      ordinals.set(ordinalKey, ordinal + 1);

      const id = fingerprint({
        filePath,
        detectorName: match.detectorName,
        lineNumber: match.lineNumber,
        shape,
        ordinal,
      });
      seen.add(id);
      fileIndex.add(id);

      const existing = this.table.get(id);
      const finding: Readonly<Finding> = Object.freeze({
        id,
        root: this.root,
        detectorName: match.detectorName,
        severity: match.severity,
        confidence: match.confidence,
        filePath,
        lineNumber: match.lineNumber,
        contextPreview: match.contextPreview,
        valuePreview: match.valuePreview,
        firstSeenAt: existing?.finding.firstSeenAt ?? timestamp,
        lastSeenAt: timestamp,
        status: FindingStatus.ACTIVE,
      });

      this.table.set(id, { finding, lastSeenScanId: scanId });
      findings.push(finding);

      if (!existing || existing.finding.status === FindingStatus.RESOLVED) {
        newFindings.push(finding);
      }
    }

    for (const id of fileIndex) {
      if (seen.has(id)) continue;
      const state = this.table.get(id);
      if (!state || state.finding.status !== FindingStatus.ACTIVE) continue;

      const finding: Readonly<Finding> = Object.freeze({ ...state.finding, status: FindingStatus.RESOLVED });
      this.table.set(id, { finding, lastSeenScanId: state.lastSeenScanId });
      resolved.push(finding);
    }

    return { findings, newFindings, resolved };
  }

  get(id: string): Readonly<Finding> | undefined {
    return this.table.get(id)?.finding;
  }

  /** Scan that last saw the fingerprint present. */
  lastSeenScanId(id: string): string | undefined {
    return this.table.get(id)?.lastSeenScanId;
  }

  /** Point-in-time copy of the table, ordered by file then line. */
  snapshot(filter: SnapshotFilter = {}): Readonly<Finding>[] {
    const result: Readonly<Finding>[] = [];
    for (const { finding } of this.table.values()) {
      if (filter.filePath !== undefined && finding.filePath !== filter.filePath) continue;
      if (filter.status !== undefined && finding.status !== filter.status) continue;
      result.push(finding);
    }
    return result.sort((a, b) => a.filePath.localeCompare(b.filePath) || a.lineNumber - b.lineNumber);
  }

  /** Files with at least one active finding. */
  filesWithActiveFindings(): string[] {
    const files: string[] = [];
    for (const [filePath, ids] of this.byFile) {
      for (const id of ids) {
        if (this.table.get(id)?.finding.status === FindingStatus.ACTIVE) {
          files.push(filePath);
          break;
        }
      }
    }
    return files.sort();
  }

  /** Files that have held at least one finding. */
  get fileCount(): number {
    return this.byFile.size;
  }

  get size(): number {
    return this.table.size;
  }

  get activeCount(): number {
    let count = 0;
    for (const { finding } of this.table.values()) {
      if (finding.status === FindingStatus.ACTIVE) count++;
    }
    return count;
  }
}

export default FindingDeduplicator;
