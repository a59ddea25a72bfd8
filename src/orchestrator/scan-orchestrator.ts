/**
 * ScanOrchestrator - per-root scan worker.
 *
 * Turns change notifications into scans:
 * 1. Queue: bounded, one entry per path, later notifications coalesce
 * 2. Read: exclusion, size and binary checks, read with a timeout
 * 3. Scan: the pattern scanner over the whole file version
 * 4. Diff: the root's deduplicator decides new and resolved findings
 *
 * Scans of one root run one at a time, so the root's fingerprint table
 * has a single writer.
 */

import pino from 'pino';
import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { resolve, sep } from 'path';
import { performance } from 'perf_hooks';

import type { ExclusionConfig, WorkerConfig } from '../config/config.js';
import { FindingDeduplicator } from '../dedup/finding-deduplicator.js';
import type { ReconcileResult } from '../dedup/finding-deduplicator.js';
import type { PatternScanner } from '../scanner/pattern-scanner.js';
import { ErrorCode, IOError, errorMessage } from '../shared/errors.js';
import { PathState } from '../shared/types.js';
import type { ChangeNotification, Finding, FindingTransition } from '../shared/types.js';
import type { DetectorFailure } from '../registry/types.js';
import { FilePolicy } from './file-policy.js';

const logger = pino({ name: 'leakguard:orchestrator', level: process.env['LOG_LEVEL'] ?? 'info' });

// ─── Types ───────────────────────────────────────────────────

export type ScanStatus = 'scanned' | 'skipped';

export interface ScanSkip {
  code: ErrorCode;
  reason: string;
}

export interface ScanResult {
  scanId: string;
  root: string;
  filePath: string;
  scannedAt: string;
  durationMs: number;
  status: ScanStatus;
  /** Present when status is 'skipped'. */
  skip?: ScanSkip;
  /** Active findings of the file after this scan. */
  findings: Readonly<Finding>[];
  newFindings: Readonly<Finding>[];
  /** Ids of findings resolved by this scan. */
  resolved: string[];
  /** Detectors isolated during this scan. */
  detectorErrors: string[];
}

export interface OrchestratorMetrics {
  scansCompleted: number;
  scansSkipped: number;
  skippedByCode: Record<string, number>;
  notificationsCoalesced: number;
  notificationsDropped: number;
  detectorErrors: number;
  /** Exceptions thrown by event listeners, caught and logged. */
  listenerErrors: number;
  queueDepth: number;
}

export interface OrchestratorOptions {
  scanner: PatternScanner;
  exclusion: ExclusionConfig;
  worker: WorkerConfig;
  /** Supplied when the table must outlive the worker. */
  deduplicator?: FindingDeduplicator;
  /**
   * Set for a worker serving a file outside every monitored root. Test-data
   * markers are then matched against the file's whole directory path.
   */
  detached?: boolean;
}

export interface OrchestratorEvents {
  'transition': (transition: FindingTransition) => void;
  'scan:complete': (result: ScanResult) => void;
  'scan:skipped': (result: ScanResult) => void;
  'detector:error': (root: string, filePath: string, failure: DetectorFailure) => void;
  'queue:full': (root: string, notification: ChangeNotification) => void;
}

interface QueueEntry {
  notification: ChangeNotification;
  waiters: Array<(result: ScanResult) => void>;
}

// ─── Scan Orchestrator Class ─────────────────────────────────

export interface ScanOrchestrator {
  on<E extends keyof OrchestratorEvents>(event: E, listener: OrchestratorEvents[E]): this;
  off<E extends keyof OrchestratorEvents>(event: E, listener: OrchestratorEvents[E]): this;
  emit<E extends keyof OrchestratorEvents>(event: E, ...args: Parameters<OrchestratorEvents[E]>): boolean;
}

export class ScanOrchestrator extends EventEmitter {
  readonly root: string;
  readonly policy: FilePolicy;
  readonly detached: boolean;
  private readonly scanner: PatternScanner;
  private readonly deduplicator: FindingDeduplicator;
  private readonly readTimeoutMs: number;
  private readonly queueCapacity: number;

  /** Insertion-ordered: first key is the next path to scan. */
  private readonly queue = new Map<string, QueueEntry>();
  /** Paths not listed here are idle. */
  private readonly states = new Map<string, PathState>();
  private draining: Promise<void> | null = null;
  private accepting = true;

  // Metrics
  private scansCompleted = 0;
  private scansSkipped = 0;
  private skippedByCode: Record<string, number> = {};
  private coalesced = 0;
  private dropped = 0;
  private detectorErrorCount = 0;
  private listenerErrors = 0;

  constructor(root: string, options: OrchestratorOptions) {
    super();
    this.root = resolve(root);
    this.scanner = options.scanner;
    this.policy = new FilePolicy(this.root, options.exclusion);
    this.deduplicator = options.deduplicator ?? new FindingDeduplicator(this.root);
    this.readTimeoutMs = options.worker.readTimeoutMs;
    this.queueCapacity = options.worker.queueCapacity;
    this.detached = options.detached ?? false;
  }

  // ─── Intake ──────────────────────────────────────────────────

  /**
   * Queues a notification. Returns false when it was dropped because the
   * queue is full or the worker is stopping.
   */
  notify(notification: ChangeNotification): boolean {
    return this.enqueue(notification);
  }

  /** Queues a notification and resolves with the scan that serves it. */
  request(notification: ChangeNotification): Promise<ScanResult> {
    return new Promise(resolvePromise => {
      if (!this.enqueue(notification, resolvePromise)) {
        const code = this.accepting ? ErrorCode.QUEUE_FULL : ErrorCode.SHUTDOWN;
        resolvePromise(this.skippedResult(resolve(this.root, notification.path), code, 'notification dropped', 0));
      }
    });
  }

  private enqueue(notification: ChangeNotification, waiter?: (result: ScanResult) => void): boolean {
    if (!this.accepting) return false;

    const path = resolve(this.root, notification.path);
    const normalized: ChangeNotification = { ...notification, path };
    const existing = this.queue.get(path);

    if (existing) {
      // Latest kind wins: a create followed by a delete scans as a delete.
      existing.notification = normalized;
      if (waiter) existing.waiters.push(waiter);
      this.coalesced++;
      return true;
    }

    if (this.queue.size >= this.queueCapacity) {
      this.dropped++;
      logger.warn({ root: this.root, path, capacity: this.queueCapacity }, 'Scan queue full, notification dropped');
      this.notifyListeners('queue:full', this.root, normalized);
      return false;
    }

    this.queue.set(path, { notification: normalized, waiters: waiter ? [waiter] : [] });
    this.schedule();
    return true;
  }

  private schedule(): void {
    if (this.draining) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.accepting && this.queue.size > 0) this.schedule();
    });
  }

  private async drain(): Promise<void> {
    // Yield once so notifications issued together coalesce before the first read.
    await new Promise<void>(resolvePromise => setImmediate(resolvePromise));

    while (this.accepting) {
      const next = this.queue.entries().next();
      if (next.done) break;
      const [path, entry] = next.value;
      this.queue.delete(path);

      let result: ScanResult;
      try {
        result = await this.process(path, entry.notification);
      } catch (error) {
        logger.error({ root: this.root, path, error: errorMessage(error) }, 'Scan failed unexpectedly');
        result = this.skippedResult(path, ErrorCode.IO_UNREADABLE, errorMessage(error), 0);
        this.recordSkip(result);
      } finally {
        this.states.delete(path);
      }

      for (const waiter of entry.waiters) waiter(result);
    }
  }

  // ─── Pipeline ────────────────────────────────────────────────

  private async process(path: string, notification: ChangeNotification): Promise<ScanResult> {
    const started = performance.now();
    const scanId = randomUUID();
    const relativePath = this.policy.relativePath(path);

    this.states.set(path, PathState.READING);

    let content: string;
    try {
      content = await this.policy.read(path, this.readTimeoutMs);
    } catch (error) {
      if (!(error instanceof IOError)) throw error;

      if (notification.kind === 'deleted' && error.details?.['errno'] === 'ENOENT') {
        return this.resolveDeleted(path, scanId, started);
      }

      const result = this.skippedResult(path, error.code, error.message, performance.now() - started, scanId);
      this.recordSkip(result);
      return result;
    }

    this.states.set(path, PathState.SCANNING);
    const scan = this.scanner.scanContent(content, path, this.detached ? path : relativePath);

    for (const failure of scan.detectorErrors) {
      this.detectorErrorCount++;
      this.notifyListeners('detector:error', this.root, path, failure);
    }

    this.states.set(path, PathState.DIFFING);
    const now = new Date();
    const reconciled = this.deduplicator.reconcile(path, scan.matches, scanId, now);

    const result: ScanResult = {
      scanId,
      root: this.root,
      filePath: path,
      scannedAt: now.toISOString(),
      durationMs: performance.now() - started,
      status: 'scanned',
      findings: reconciled.findings,
      newFindings: reconciled.newFindings,
      resolved: reconciled.resolved.map(f => f.id),
      detectorErrors: scan.detectorErrors.map(f => f.detectorName),
    };

    this.publish(result, [reconciled]);
    logger.debug(
      { root: this.root, filePath: relativePath, findings: result.findings.length, new: result.newFindings.length },
      'Scan complete'
    );
    return result;
  }

  /** A vanished path resolves its findings, and those of files beneath it. */
  private resolveDeleted(path: string, scanId: string, started: number): ScanResult {
    this.states.set(path, PathState.DIFFING);
    const now = new Date();
    const prefix = path + sep;
    const files = this.deduplicator
      .filesWithActiveFindings()
      .filter(f => f === path || f.startsWith(prefix));

    const reconciled = files.map(f => this.deduplicator.reconcile(f, [], scanId, now));

    const result: ScanResult = {
      scanId,
      root: this.root,
      filePath: path,
      scannedAt: now.toISOString(),
      durationMs: performance.now() - started,
      status: 'scanned',
      findings: [],
      newFindings: [],
      resolved: reconciled.flatMap(r => r.resolved.map(f => f.id)),
      detectorErrors: [],
    };

    this.publish(result, reconciled);
    return result;
  }

  /**
   * Announces the transitions of a diffed scan. The table has already
   * changed, so every transition must go out even if a listener throws.
   */
  private publish(result: ScanResult, reconciled: ReconcileResult[]): void {
    this.scansCompleted++;
    const announce = (kind: FindingTransition['kind'], finding: Readonly<Finding>): void => {
      this.notifyListeners('transition', { kind, finding, root: this.root, scanId: result.scanId, at: result.scannedAt });
    };

    for (const r of reconciled) {
      for (const finding of r.newFindings) announce('new', finding);
      for (const finding of r.resolved) announce('resolved', finding);
    }
    this.notifyListeners('scan:complete', result);
  }

  private notifyListeners<E extends keyof OrchestratorEvents>(
    event: E,
    ...args: Parameters<OrchestratorEvents[E]>
  ): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.listenerErrors++;
      logger.error({ root: this.root, event, error: errorMessage(error) }, 'Event listener threw');
    }
  }

  private skippedResult(
    path: string,
    code: ErrorCode,
    reason: string,
    durationMs: number,
    scanId: string = randomUUID()
  ): ScanResult {
    return {
      scanId,
      root: this.root,
      filePath: path,
      scannedAt: new Date().toISOString(),
      durationMs,
      status: 'skipped',
      skip: { code, reason },
      findings: [],
      newFindings: [],
      resolved: [],
      detectorErrors: [],
    };
  }

  private recordSkip(result: ScanResult): void {
    this.scansSkipped++;
    const code = result.skip?.code ?? 'unknown';
    this.skippedByCode[code] = (this.skippedByCode[code] ?? 0) + 1;

    const level = code === ErrorCode.IO_EXCLUDED || code === ErrorCode.IO_BINARY ? 'debug' : 'warn';
    logger[level]({ root: this.root, filePath: result.filePath, code, reason: result.skip?.reason }, 'File skipped');
    this.notifyListeners('scan:skipped', result);
  }

  // ─── Lifecycle ───────────────────────────────────────────────

  /** Resolves once the queue is empty and no scan is running. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /**
   * Stops accepting notifications, lets the in-flight scan finish and
   * answers queued requests with a SHUTDOWN skip.
   */
  async stop(): Promise<void> {
    this.accepting = false;
    if (this.draining) await this.draining;

    for (const [path, entry] of this.queue) {
      const result = this.skippedResult(path, ErrorCode.SHUTDOWN, 'worker stopped', 0);
      for (const waiter of entry.waiters) waiter(result);
    }
    this.queue.clear();
    logger.debug({ root: this.root }, 'Orchestrator stopped');
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  // ─── Queries ─────────────────────────────────────────────────

  getPathState(path: string): PathState {
    return this.states.get(resolve(this.root, path)) ?? PathState.IDLE;
  }

  getDeduplicator(): FindingDeduplicator {
    return this.deduplicator;
  }

  snapshot(): Readonly<Finding>[] {
    return this.deduplicator.snapshot();
  }

  getMetrics(): OrchestratorMetrics {
    return {
      scansCompleted: this.scansCompleted,
      scansSkipped: this.scansSkipped,
      skippedByCode: { ...this.skippedByCode },
      notificationsCoalesced: this.coalesced,
      notificationsDropped: this.dropped,
      detectorErrors: this.detectorErrorCount,
      listenerErrors: this.listenerErrors,
      queueDepth: this.queue.size,
    };
  }
}

export default ScanOrchestrator;
