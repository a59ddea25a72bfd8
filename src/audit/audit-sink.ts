/**
 * AuditSink - pluggable persistence for finding transitions.
 *
 * A sink receives every finding the moment it becomes new or resolved.
 * Writes may be synchronous or asynchronous; a rejected or throwing
 * write is retried by the dispatcher.
 */

import type { Finding, FindingStatus, Severity } from '../shared/types.js';

/** Query filters for stored findings. */
export interface AuditQuery {
  root?: string;
  filePath?: string;
  detectorName?: string;
  severity?: Severity;
  status?: FindingStatus;
  /** lastSeenAt lower bound (inclusive, ISO). */
  since?: string;
  /** lastSeenAt upper bound (inclusive, ISO). */
  until?: string;
  limit?: number;
  offset?: number;
}

export interface AuditSink {
  record(finding: Readonly<Finding>): void | Promise<void>;
  query(filters?: AuditQuery): Finding[] | Promise<Finding[]>;
}

export function matchesQuery(finding: Readonly<Finding>, filters: AuditQuery): boolean {
  if (filters.root !== undefined && finding.root !== filters.root) return false;
  if (filters.filePath !== undefined && finding.filePath !== filters.filePath) return false;
  if (filters.detectorName !== undefined && finding.detectorName !== filters.detectorName) return false;
  if (filters.severity !== undefined && finding.severity !== filters.severity) return false;
  if (filters.status !== undefined && finding.status !== filters.status) return false;
  if (filters.since !== undefined && finding.lastSeenAt < filters.since) return false;
  if (filters.until !== undefined && finding.lastSeenAt > filters.until) return false;
  return true;
}

/** Keeps the latest version of each finding in memory. */
export class MemoryAuditSink implements AuditSink {
  private readonly findings = new Map<string, Finding>();
  /** Every record call, in order. */
  readonly history: Finding[] = [];

  record(finding: Readonly<Finding>): void {
    const copy = { ...finding };
    this.findings.set(copy.id, copy);
    this.history.push(copy);
  }

  query(filters: AuditQuery = {}): Finding[] {
    const offset = filters.offset ?? 0;
    const matched = [...this.findings.values()]
      .filter(f => matchesQuery(f, filters))
      .sort((a, b) => b.lastSeenAt.localeCompare(a.lastSeenAt));
    return matched.slice(offset, filters.limit === undefined ? undefined : offset + filters.limit);
  }
}
