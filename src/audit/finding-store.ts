/**
 * SqliteAuditSink - durable audit trail of finding transitions.
 *
 * Keeps the latest state of every finding (one row per fingerprint) and an
 * append-only history of its transitions. Neither table ever holds a raw
 * secret value: findings arrive already masked.
 *
 * Provides:
 * - Query API over stored findings
 * - Aggregated statistics, daily reports and day-by-day summaries
 * - JSONL export
 * - Retention management for the event history
 */

import type Database from 'better-sqlite3';
import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { openDatabase } from '../shared/database.js';
import { FindingStatus, Severity } from '../shared/types.js';
import type { Finding, TransitionKind } from '../shared/types.js';
import type { AuditQuery, AuditSink } from './audit-sink.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface FindingStoreConfig {
  /** Path to the SQLite database, or `:memory:`. */
  databasePath: string;
  /** Retention period for the event history in days (default: 90). */
  retentionDays?: number;
}

export interface StoredQuery extends AuditQuery {
  orderBy?: 'last_seen_at' | 'first_seen_at' | 'severity' | 'file_path';
  orderDir?: 'asc' | 'desc';
}

/** One entry of a finding's transition history. */
export interface FindingEvent {
  id: number;
  findingId: string;
  kind: TransitionKind;
  at: string;
  root: string;
  detectorName: string;
  severity: Severity;
  filePath: string;
  lineNumber: number;
}

export interface FindingStats {
  totalFindings: number;
  active: number;
  resolved: number;
  bySeverity: Record<string, number>;
  byDetector: Record<string, number>;
  byRoot: Record<string, number>;
  timeRange: {
    earliest: string;
    latest: string;
  };
}

export interface DailyReport {
  /** YYYY-MM-DD, UTC. */
  date: string;
  newFindings: number;
  resolvedFindings: number;
  bySeverity: Record<string, number>;
  byDetector: Record<string, number>;
  /** Files with the most new findings that day. */
  topFiles: Array<{ filePath: string; count: number }>;
}

export interface DailySummary {
  date: string;
  newFindings: number;
  resolvedFindings: number;
}

// ─── Row schemas ─────────────────────────────────────────────

const FindingRowSchema = z.object({
  id: z.string(),
  root: z.string(),
  detector_name: z.string(),
  severity: z.nativeEnum(Severity),
  confidence: z.number(),
  file_path: z.string(),
  line_number: z.number().int(),
  context_preview: z.string(),
  value_preview: z.string(),
  first_seen_at: z.string(),
  last_seen_at: z.string(),
  status: z.nativeEnum(FindingStatus),
});

const EventRowSchema = z.object({
  id: z.number().int(),
  finding_id: z.string(),
  kind: z.enum(['new', 'resolved']),
  at: z.string(),
  root: z.string(),
  detector_name: z.string(),
  severity: z.nativeEnum(Severity),
  file_path: z.string(),
  line_number: z.number().int(),
});

const CountRowSchema = z.object({ count: z.number() });
const GroupRowsSchema = z.array(z.object({ key: z.string(), count: z.number() }));
const RangeRowSchema = z.object({ earliest: z.string().nullable(), latest: z.string().nullable() });
const DayRowsSchema = z.array(z.object({ day: z.string(), kind: z.enum(['new', 'resolved']), count: z.number() }));
const FileRowsSchema = z.array(z.object({ file_path: z.string(), count: z.number() }));

function toFinding(row: unknown): Finding {
  const r = FindingRowSchema.parse(row);
  return {
    id: r.id,
    root: r.root,
    detectorName: r.detector_name,
    severity: r.severity,
    confidence: r.confidence,
    filePath: r.file_path,
    lineNumber: r.line_number,
    contextPreview: r.context_preview,
    valuePreview: r.value_preview,
    firstSeenAt: r.first_seen_at,
    lastSeenAt: r.last_seen_at,
    status: r.status,
  };
}

function toEvent(row: unknown): FindingEvent {
  const r = EventRowSchema.parse(row);
  return {
    id: r.id,
    findingId: r.finding_id,
    kind: r.kind,
    at: r.at,
    root: r.root,
    detectorName: r.detector_name,
    severity: r.severity,
    filePath: r.file_path,
    lineNumber: r.line_number,
  };
}

function groupToRecord(rows: unknown): Record<string, number> {
  return Object.fromEntries(GroupRowsSchema.parse(rows).map(r => [r.key, r.count]));
}

// ═══════════════════════════════════════════════════════════════
// SQLITE AUDIT SINK
// ═══════════════════════════════════════════════════════════════

export class SqliteAuditSink implements AuditSink {
  private readonly config: Required<FindingStoreConfig>;
  private readonly db: Database.Database;
  private readonly recordTx: (finding: Readonly<Finding>) => void;

  constructor(config: FindingStoreConfig) {
    this.config = {
      databasePath: config.databasePath,
      retentionDays: config.retentionDays ?? 90,
    };

    this.db = openDatabase({ dbPath: this.config.databasePath });
    this.initSchema();

    const upsertFinding = this.db.prepare(`
      INSERT INTO findings (
        id, root, detector_name, severity, confidence, file_path, line_number,
        context_preview, value_preview, first_seen_at, last_seen_at, status
      ) VALUES (
        @id, @root, @detectorName, @severity, @confidence, @filePath, @lineNumber,
        @contextPreview, @valuePreview, @firstSeenAt, @lastSeenAt, @status
      )
      ON CONFLICT(id) DO UPDATE SET
        severity = excluded.severity,
        confidence = excluded.confidence,
        line_number = excluded.line_number,
        context_preview = excluded.context_preview,
        value_preview = excluded.value_preview,
        last_seen_at = excluded.last_seen_at,
        status = excluded.status
    `);

    // A retried write of the same transition adds no second event.
    const insertEvent = this.db.prepare(`
      INSERT OR IGNORE INTO finding_events (
        finding_id, kind, at, root, detector_name, severity, file_path, line_number
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.recordTx = this.db.transaction((finding: Readonly<Finding>) => {
      upsertFinding.run({ ...finding });
      const active = finding.status === FindingStatus.ACTIVE;
      const kind: TransitionKind = active ? 'new' : 'resolved';
      insertEvent.run(
        finding.id,
        kind,
        // lastSeenAt of a resolved finding predates its resolution
        active ? finding.lastSeenAt : new Date().toISOString(),
        finding.root,
        finding.detectorName,
        finding.severity,
        finding.filePath,
        finding.lineNumber
      );
    });
  }

  /** Stores a finding transition. */
  record(finding: Readonly<Finding>): void {
    this.recordTx(finding);
  }

  /**
   * Query stored findings with filters.
   */
  query(filters: StoredQuery = {}): Finding[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (filters.root) {
      conditions.push('root = ?');
      params.push(filters.root);
    }
    if (filters.filePath) {
      conditions.push('file_path = ?');
      params.push(filters.filePath);
    }
    if (filters.detectorName) {
      conditions.push('detector_name = ?');
      params.push(filters.detectorName);
    }
    if (filters.severity) {
      conditions.push('severity = ?');
      params.push(filters.severity);
    }
    if (filters.status) {
      conditions.push('status = ?');
      params.push(filters.status);
    }
    if (filters.since) {
      conditions.push('last_seen_at >= ?');
      params.push(filters.since);
    }
    if (filters.until) {
      conditions.push('last_seen_at <= ?');
      params.push(filters.until);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const orderBy = filters.orderBy ?? 'last_seen_at';
    const orderDir = filters.orderDir === 'asc' ? 'ASC' : 'DESC';
    const limit = filters.limit ?? 100;
    const offset = filters.offset ?? 0;

    const rows = this.db
      .prepare(`
        SELECT * FROM findings
        ${whereClause}
        ORDER BY ${orderBy} ${orderDir}, id ASC
        LIMIT ? OFFSET ?
      `)
      .all(...params, limit, offset);

    return rows.map(toFinding);
  }

  /** Transition history of one finding, oldest first. */
  history(findingId: string): FindingEvent[] {
    return this.db
      .prepare('SELECT * FROM finding_events WHERE finding_id = ? ORDER BY id ASC')
      .all(findingId)
      .map(toEvent);
  }

  /**
   * Aggregated statistics over findings last seen within the period.
   */
  getStats(startTime?: string, endTime?: string): FindingStats {
    const conditions: string[] = [];
    const params: string[] = [];

    if (startTime) {
      conditions.push('last_seen_at >= ?');
      params.push(startTime);
    }
    if (endTime) {
      conditions.push('last_seen_at <= ?');
      params.push(endTime);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const count = (extra?: string): number => {
      const where = extra ? (whereClause ? `${whereClause} AND ${extra}` : `WHERE ${extra}`) : whereClause;
      return CountRowSchema.parse(this.db.prepare(`SELECT COUNT(*) as count FROM findings ${where}`).get(...params))
        .count;
    };
    const group = (column: string): Record<string, number> =>
      groupToRecord(
        this.db
          .prepare(`SELECT ${column} as key, COUNT(*) as count FROM findings ${whereClause} GROUP BY ${column}`)
          .all(...params)
      );

    const range = RangeRowSchema.parse(
      this.db
        .prepare(`SELECT MIN(first_seen_at) as earliest, MAX(last_seen_at) as latest FROM findings ${whereClause}`)
        .get(...params)
    );

    return {
      totalFindings: count(),
      active: count(`status = '${FindingStatus.ACTIVE}'`),
      resolved: count(`status = '${FindingStatus.RESOLVED}'`),
      bySeverity: group('severity'),
      byDetector: group('detector_name'),
      byRoot: group('root'),
      timeRange: {
        earliest: range.earliest ?? '',
        latest: range.latest ?? '',
      },
    };
  }

  /**
   * Transitions recorded on one UTC day (default: today).
   */
  getDailyReport(date?: string): DailyReport {
    const day = date ?? new Date().toISOString().slice(0, 10);
    const dayFilter = 'substr(at, 1, 10) = ?';

    const kindCount = (kind: TransitionKind): number =>
      CountRowSchema.parse(
        this.db.prepare(`SELECT COUNT(*) as count FROM finding_events WHERE ${dayFilter} AND kind = ?`).get(day, kind)
      ).count;

    const group = (column: string): Record<string, number> =>
      groupToRecord(
        this.db
          .prepare(`
            SELECT ${column} as key, COUNT(*) as count FROM finding_events
            WHERE ${dayFilter} AND kind = 'new' GROUP BY ${column}
          `)
          .all(day)
      );

    const topFiles = FileRowsSchema.parse(
      this.db
        .prepare(`
          SELECT file_path, COUNT(*) as count FROM finding_events
          WHERE ${dayFilter} AND kind = 'new'
          GROUP BY file_path ORDER BY count DESC, file_path ASC LIMIT 10
        `)
        .all(day)
    ).map(r => ({ filePath: r.file_path, count: r.count }));

    return {
      date: day,
      newFindings: kindCount('new'),
      resolvedFindings: kindCount('resolved'),
      bySeverity: group('severity'),
      byDetector: group('detector_name'),
      topFiles,
    };
  }

  /**
   * New and resolved counts per day over the last `days` days, oldest
   * first. Days without transitions are included with zero counts.
   */
  getSummaryStats(days: number = 7, now: Date = new Date()): DailySummary[] {
    const dates: string[] = [];
    for (let i = days - 1; i >= 0; i--) {
      const d = new Date(now);
      d.setUTCDate(d.getUTCDate() - i);
      dates.push(d.toISOString().slice(0, 10));
    }
    const first = dates[0];
    if (first === undefined) return [];

    const rows = DayRowsSchema.parse(
      this.db
        .prepare(`
          SELECT substr(at, 1, 10) as day, kind, COUNT(*) as count FROM finding_events
          WHERE substr(at, 1, 10) >= ? GROUP BY day, kind
        `)
        .all(first)
    );

    return dates.map(date => ({
      date,
      newFindings: rows.find(r => r.day === date && r.kind === 'new')?.count ?? 0,
      resolvedFindings: rows.find(r => r.day === date && r.kind === 'resolved')?.count ?? 0,
    }));
  }

  /**
   * Export findings to a JSONL file. Returns the number written.
   */
  exportToFile(filePath: string, filters: StoredQuery = {}): number {
    const findings = this.query({ ...filters, limit: filters.limit ?? 1000000 });

    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    appendFileSync(filePath, findings.map(f => JSON.stringify(f) + '\n').join(''));
    return findings.length;
  }

  /**
   * Purge history beyond the retention period, and resolved findings
   * not seen since. Returns the number of events removed.
   */
  purgeOldEvents(now: Date = new Date()): number {
    const cutoff = new Date(now);
    cutoff.setUTCDate(cutoff.getUTCDate() - this.config.retentionDays);
    const cutoffTimestamp = cutoff.toISOString();

    const purge = this.db.transaction((): number => {
      const events = this.db.prepare('DELETE FROM finding_events WHERE at < ?').run(cutoffTimestamp);
      this.db
        .prepare('DELETE FROM findings WHERE status = ? AND last_seen_at < ?')
        .run(FindingStatus.RESOLVED, cutoffTimestamp);
      return events.changes;
    });

    return purge();
  }

  getCount(): number {
    return CountRowSchema.parse(this.db.prepare('SELECT COUNT(*) as count FROM findings').get()).count;
  }

  close(): void {
    this.db.close();
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS findings (
        id TEXT PRIMARY KEY,
        root TEXT NOT NULL,
        detector_name TEXT NOT NULL,
        severity TEXT NOT NULL,
        confidence REAL NOT NULL,
        file_path TEXT NOT NULL,
        line_number INTEGER NOT NULL,
        context_preview TEXT NOT NULL,
        value_preview TEXT NOT NULL,
        first_seen_at TEXT NOT NULL,
        last_seen_at TEXT NOT NULL,
        status TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS finding_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        finding_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        at TEXT NOT NULL,
        root TEXT NOT NULL,
        detector_name TEXT NOT NULL,
        severity TEXT NOT NULL,
        file_path TEXT NOT NULL,
        line_number INTEGER NOT NULL,
        UNIQUE (finding_id, kind, at)
      );

      CREATE INDEX IF NOT EXISTS idx_findings_status ON findings(status);
      CREATE INDEX IF NOT EXISTS idx_findings_file ON findings(file_path);
      CREATE INDEX IF NOT EXISTS idx_findings_last_seen ON findings(last_seen_at);
      CREATE INDEX IF NOT EXISTS idx_events_at ON finding_events(at);
      CREATE INDEX IF NOT EXISTS idx_events_finding ON finding_events(finding_id);
    `);
  }
}

export default SqliteAuditSink;
