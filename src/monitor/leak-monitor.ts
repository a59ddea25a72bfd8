/**
 * Leak Monitor - public entry point for scanning and watching roots.
 *
 * Provides:
 * 1. One-shot scans of whole roots
 * 2. Continuous monitoring driven by a change source
 * 3. A stream of finding transitions, also forwarded to the audit sink
 * 4. Snapshots and counters
 */

import pino from 'pino';
import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { stat } from 'fs/promises';
import { dirname, resolve, sep } from 'path';

import { AuditDispatcher } from '../audit/audit-dispatcher.js';
import type { DispatcherStats } from '../audit/audit-dispatcher.js';
import type { AuditSink } from '../audit/audit-sink.js';
import { DEFAULT_CONFIG } from '../config/config.js';
import type { LeakGuardConfig } from '../config/config.js';
import { ScanOrchestrator } from '../orchestrator/scan-orchestrator.js';
import type { OrchestratorMetrics, ScanResult } from '../orchestrator/scan-orchestrator.js';
import { PatternRegistry } from '../registry/pattern-registry.js';
import type { DetectorFailure } from '../registry/types.js';
import { PatternScanner } from '../scanner/pattern-scanner.js';
import { ErrorCode, errorMessage } from '../shared/errors.js';
import type { SinkError } from '../shared/errors.js';
import type { ChangeNotification, Finding, FindingTransition } from '../shared/types.js';
import { FsChangeSource } from '../watcher/fs-change-source.js';
import type { ChangeSource } from '../watcher/fs-change-source.js';

const logger = pino({ name: 'leakguard:monitor', level: process.env['LOG_LEVEL'] ?? 'info' });

// ─── Types ───────────────────────────────────────────────────

export type ChangeSourceFactory = (roots: readonly string[], config: LeakGuardConfig) => ChangeSource;

export interface LeakMonitorOptions {
  config?: LeakGuardConfig;
  /** Defaults to the built-in catalog with the configured thresholds. */
  registry?: PatternRegistry;
  /** Receives every transition; omitted means no audit trail. */
  sink?: AuditSink;
  /** Defaults to a recursive filesystem watcher. */
  changeSource?: ChangeSourceFactory;
  /** Upper bound on the audit flush during stop (ms). */
  shutdownFlushMs?: number;
}

export interface MonitorHandle {
  id: string;
  roots: string[];
  startedAt: string;
}

export interface MonitorTotals {
  scansCompleted: number;
  scansSkipped: number;
  findingsActive: number;
  findingsTotal: number;
  transitionsNew: number;
  transitionsResolved: number;
  detectorErrors: number;
  notificationsCoalesced: number;
  notificationsDropped: number;
  listenerErrors: number;
}

export interface MonitorMetrics {
  uptimeMs: number;
  activeHandles: number;
  totals: MonitorTotals;
  roots: Record<string, OrchestratorMetrics>;
  audit: DispatcherStats | null;
  lastScanAt: string | null;
}

export interface MonitorEvents {
  'transition': (transition: FindingTransition) => void;
  'finding:new': (finding: Readonly<Finding>, transition: FindingTransition) => void;
  'finding:resolved': (finding: Readonly<Finding>, transition: FindingTransition) => void;
  'scan:complete': (result: ScanResult) => void;
  'scan:skipped': (result: ScanResult) => void;
  'detector:error': (root: string, filePath: string, failure: DetectorFailure) => void;
  'audit:dropped': (finding: Readonly<Finding>, error: SinkError) => void;
  'monitor:start': (handle: MonitorHandle) => void;
  'monitor:stop': (handle: MonitorHandle) => void;
}

interface ActiveHandle {
  handle: MonitorHandle;
  source: ChangeSource;
}

const defaultChangeSource: ChangeSourceFactory = (roots, config) =>
  new FsChangeSource(roots, { ignoredDirectories: config.exclusion.directories });

// ─── Leak Monitor Class ──────────────────────────────────────

export interface LeakMonitor {
  on<E extends keyof MonitorEvents>(event: E, listener: MonitorEvents[E]): this;
  off<E extends keyof MonitorEvents>(event: E, listener: MonitorEvents[E]): this;
  emit<E extends keyof MonitorEvents>(event: E, ...args: Parameters<MonitorEvents[E]>): boolean;
}

export class LeakMonitor extends EventEmitter {
  readonly config: LeakGuardConfig;
  readonly registry: PatternRegistry;
  private readonly scanner: PatternScanner;
  private readonly dispatcher: AuditDispatcher | null;
  private readonly changeSourceFactory: ChangeSourceFactory;
  private readonly shutdownFlushMs: number;

  private readonly workers = new Map<string, ScanOrchestrator>();
  private readonly handles = new Map<string, ActiveHandle>();
  private readonly startTime = Date.now();

  // Metrics
  private transitionsNew = 0;
  private transitionsResolved = 0;
  private listenerErrors = 0;
  private lastScanAt: string | null = null;

  constructor(options: LeakMonitorOptions = {}) {
    super();
    this.config = options.config ?? DEFAULT_CONFIG;
    const detection = this.config.detection;

    this.registry =
      options.registry ??
      new PatternRegistry(undefined, {
        contextWindow: detection.contextWindow,
        entropyThreshold: detection.entropyThreshold,
        minTokenLength: detection.minTokenLength,
      });

    this.scanner = new PatternScanner(this.registry, {
      contextWindow: detection.contextWindow,
      minConfidence: detection.minConfidence,
      testDataMarkers: detection.testDataMarkers,
      inlineTestMarkers: detection.inlineTestMarkers,
    });

    this.dispatcher = options.sink ? new AuditDispatcher(options.sink, this.config.audit) : null;
    this.dispatcher?.on('dropped', (finding, error) => this.notifyListeners('audit:dropped', finding, error));

    this.changeSourceFactory = options.changeSource ?? defaultChangeSource;
    this.shutdownFlushMs = options.shutdownFlushMs ?? 10000;
  }

  // ─── One-shot ────────────────────────────────────────────────

  /**
   * Scans every file under the given roots once; a root may also be a
   * single file. Results are sorted by path. Findings persist across
   * calls, so a second scan reports only what changed.
   */
  async scanOnce(roots: readonly string[] = this.config.roots): Promise<ScanResult[]> {
    const results: ScanResult[] = [];

    for (const root of roots.map(r => resolve(r))) {
      let isFile: boolean;
      try {
        isFile = (await stat(root)).isFile();
      } catch (error) {
        logger.warn({ root, error: errorMessage(error) }, 'Cannot stat root');
        results.push(this.unreadableRoot(root, errorMessage(error)));
        continue;
      }

      if (isFile) {
        results.push(await this.fileWorker(root).request({ path: root, kind: 'changed', timestamp: Date.now() }));
        continue;
      }

      const worker = this.worker(root);

      let files: string[];
      try {
        files = await worker.policy.listFiles();
      } catch (error) {
        logger.warn({ root, error: errorMessage(error) }, 'Cannot list root');
        results.push(this.unreadableRoot(root, errorMessage(error)));
        continue;
      }

      // Files that held findings but are gone since the last scan.
      const listed = new Set(files);
      const vanished = worker
        .getDeduplicator()
        .filesWithActiveFindings()
        .filter(path => !listed.has(path));

      logger.info({ root, files: files.length, vanished: vanished.length }, 'Scanning root');

      const now = Date.now();
      const work: ChangeNotification[] = [
        ...files.map(path => ({ path, kind: 'changed' as const, timestamp: now })),
        ...vanished.map(path => ({ path, kind: 'deleted' as const, timestamp: now })),
      ];

      // Requests beyond the queue capacity would be dropped.
      const batchSize = Math.max(1, this.config.worker.queueCapacity);
      for (let i = 0; i < work.length; i += batchSize) {
        const batch = work.slice(i, i + batchSize);
        results.push(...(await Promise.all(batch.map(notification => worker.request(notification)))));
      }
    }

    return results.sort((a, b) => a.filePath.localeCompare(b.filePath));
  }

  // ─── Continuous ──────────────────────────────────────────────

  /** Starts watching the roots; changes are scanned as they arrive. */
  startContinuous(roots: readonly string[] = this.config.roots): MonitorHandle {
    const resolved = roots.map(r => resolve(r));
    for (const root of resolved) this.worker(root);

    const handle: MonitorHandle = {
      id: randomUUID(),
      roots: resolved,
      startedAt: new Date().toISOString(),
    };

    const source = this.changeSourceFactory(resolved, this.config);
    source.start(notification => this.route(resolved, notification));

    this.handles.set(handle.id, { handle, source });
    logger.info({ handleId: handle.id, roots: resolved }, 'Continuous monitoring started');
    this.emit('monitor:start', handle);
    return handle;
  }

  /**
   * Stops a continuous session: closes its change source, lets in-flight
   * scans finish, settles queued requests, then flushes the audit trail
   * within a bounded time.
   */
  async stop(handle: MonitorHandle): Promise<void> {
    const active = this.handles.get(handle.id);
    if (!active) {
      logger.warn({ handleId: handle.id }, 'Unknown or already stopped handle');
      return;
    }

    this.handles.delete(handle.id);
    active.source.close();

    const stillWatched = new Set([...this.handles.values()].flatMap(h => h.handle.roots));
    await Promise.all(
      handle.roots
        .filter(root => !stillWatched.has(root))
        .map(root => this.workers.get(root)?.stop())
    );

    await this.flushAudit();
    logger.info({ handleId: handle.id }, 'Continuous monitoring stopped');
    this.emit('monitor:stop', handle);
  }

  /** Stops every session and flushes the audit trail. */
  async close(): Promise<void> {
    for (const { handle } of [...this.handles.values()]) {
      await this.stop(handle);
    }
    await Promise.all([...this.workers.values()].map(w => w.stop()));
    await this.flushAudit();
  }

  /** Delivers a notification to the worker of the root that contains it. */
  notify(notification: ChangeNotification): boolean {
    return this.route(this.monitoredRoots(), notification);
  }

  // ─── Queries ─────────────────────────────────────────────────

  /** Subscribes to finding transitions; returns the unsubscribe function. */
  onTransition(listener: (transition: FindingTransition) => void): () => void {
    this.on('transition', listener);
    return () => {
      this.off('transition', listener);
    };
  }

  /** Frozen copies of the findings of one root, or of all roots. */
  snapshot(root?: string): Readonly<Finding>[] {
    if (root !== undefined) {
      return this.workers.get(resolve(root))?.snapshot() ?? [];
    }
    return [...this.workers.values()]
      .flatMap(w => w.snapshot())
      .sort((a, b) => a.filePath.localeCompare(b.filePath) || a.lineNumber - b.lineNumber);
  }

  getMetrics(): MonitorMetrics {
    const roots: Record<string, OrchestratorMetrics> = {};
    const totals: MonitorTotals = {
      scansCompleted: 0,
      scansSkipped: 0,
      findingsActive: 0,
      findingsTotal: 0,
      transitionsNew: this.transitionsNew,
      transitionsResolved: this.transitionsResolved,
      detectorErrors: 0,
      notificationsCoalesced: 0,
      notificationsDropped: 0,
      listenerErrors: this.listenerErrors,
    };

    for (const [root, worker] of this.workers) {
      const m = worker.getMetrics();
      roots[root] = m;
      totals.scansCompleted += m.scansCompleted;
      totals.scansSkipped += m.scansSkipped;
      totals.detectorErrors += m.detectorErrors;
      totals.notificationsCoalesced += m.notificationsCoalesced;
      totals.notificationsDropped += m.notificationsDropped;
      totals.listenerErrors += m.listenerErrors;
      totals.findingsActive += worker.getDeduplicator().activeCount;
      totals.findingsTotal += worker.getDeduplicator().size;
    }

    return {
      uptimeMs: Date.now() - this.startTime,
      activeHandles: this.handles.size,
      totals,
      roots,
      audit: this.dispatcher?.getStats() ?? null,
      lastScanAt: this.lastScanAt,
    };
  }

  isWatching(): boolean {
    return this.handles.size > 0;
  }

  // ─── Internals ───────────────────────────────────────────────

  /**
   * Worker of a root, created on first use. A stopped worker, or one of the
   * other kind, is replaced by a fresh one that inherits its fingerprint
   * table.
   */
  private worker(root: string, detached = false): ScanOrchestrator {
    const existing = this.workers.get(root);
    if (existing?.isAccepting && existing.detached === detached) return existing;

    const options = {
      scanner: this.scanner,
      exclusion: this.config.exclusion,
      worker: this.config.worker,
      detached,
    };
    const worker = existing
      ? new ScanOrchestrator(root, { ...options, deduplicator: existing.getDeduplicator() })
      : new ScanOrchestrator(root, options);

    worker.on('transition', transition => this.handleTransition(transition));
    worker.on('scan:complete', result => {
      this.lastScanAt = result.scannedAt;
      this.notifyListeners('scan:complete', result);
    });
    worker.on('scan:skipped', result => this.notifyListeners('scan:skipped', result));
    worker.on('detector:error', (r, filePath, failure) => this.notifyListeners('detector:error', r, filePath, failure));

    this.workers.set(root, worker);
    return worker;
  }

  /**
   * Worker for a file given as a root: the worker of a known or configured
   * root containing it, else a detached worker for its directory.
   */
  private fileWorker(filePath: string): ScanOrchestrator {
    const owner = this.ownerOf([...this.monitoredRoots(), ...this.config.roots.map(r => resolve(r))], filePath);
    return owner === undefined ? this.worker(dirname(filePath), true) : this.worker(owner);
  }

  private monitoredRoots(): string[] {
    return [...this.workers.values()].filter(w => !w.detached).map(w => w.root);
  }

  private ownerOf(roots: readonly string[], path: string): string | undefined {
    return roots
      .filter(root => path === root || path.startsWith(root + sep))
      .sort((a, b) => b.length - a.length)[0];
  }

  private route(roots: readonly string[], notification: ChangeNotification): boolean {
    const path = resolve(notification.path);
    const owner = this.ownerOf(roots, path);

    if (owner === undefined) {
      logger.debug({ path }, 'Notification outside monitored roots');
      return false;
    }
    return this.worker(owner).notify({ ...notification, path });
  }

  /** Audits first, then tells subscribers; a throwing subscriber is logged and counted. */
  private handleTransition(transition: FindingTransition): void {
    if (transition.kind === 'new') {
      this.transitionsNew++;
      logger.info(
        {
          detector: transition.finding.detectorName,
          severity: transition.finding.severity,
          filePath: transition.finding.filePath,
          lineNumber: transition.finding.lineNumber,
        },
        'New finding'
      );
    } else {
      this.transitionsResolved++;
    }

    this.dispatcher?.submit(transition.finding);
    this.notifyListeners('transition', transition);
    this.notifyListeners(transition.kind === 'new' ? 'finding:new' : 'finding:resolved', transition.finding, transition);
  }

  private notifyListeners<E extends keyof MonitorEvents>(event: E, ...args: Parameters<MonitorEvents[E]>): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.listenerErrors++;
      logger.error({ event, error: errorMessage(error) }, 'Event listener threw');
    }
  }

  private async flushAudit(): Promise<void> {
    if (!this.dispatcher) return;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>(resolvePromise => {
      timer = setTimeout(() => resolvePromise(false), this.shutdownFlushMs);
    });
    const flushed = await Promise.race([this.dispatcher.flush().then(() => true), timedOut]);
    clearTimeout(timer);

    if (!flushed) {
      logger.warn({ pending: this.dispatcher.getStats().buffered }, 'Audit flush timed out');
    }
  }

  private unreadableRoot(root: string, reason: string): ScanResult {
    return {
      scanId: randomUUID(),
      root,
      filePath: root,
      scannedAt: new Date().toISOString(),
      durationMs: 0,
      status: 'skipped',
      skip: { code: ErrorCode.IO_UNREADABLE, reason },
      findings: [],
      newFindings: [],
      resolved: [],
      detectorErrors: [],
    };
  }
}

export default LeakMonitor;
