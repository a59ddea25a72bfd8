/**
 * Dashboard Server - HTTP API for leakguard
 *
 * Provides:
 * - REST API over live findings, the audit trail and reports
 * - Live transitions over Server-Sent Events
 * - Scan and monitor control
 * - Health and Prometheus-style metrics
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import pino from 'pino';
import { z } from 'zod';

import { matchesQuery } from '../audit/audit-sink.js';
import type { AuditQuery } from '../audit/audit-sink.js';
import type { SqliteAuditSink } from '../audit/finding-store.js';
import type { LeakMonitor, MonitorHandle } from '../monitor/leak-monitor.js';
import type { ScanResult } from '../orchestrator/scan-orchestrator.js';
import { errorMessage } from '../shared/errors.js';
import { FindingStatus, Severity } from '../shared/types.js';
import type { FindingTransition } from '../shared/types.js';
import { searchFindings } from './finding-search.js';

const isProd = process.env['NODE_ENV'] === 'production';
const logger = pino({
  name: 'leakguard:dashboard',
  level: process.env['LOG_LEVEL'] ?? (isProd ? 'info' : 'debug'),
});

// ─── Configuration ───────────────────────────────────────────

export interface DashboardConfig {
  port: number;
  /** Default: 127.0.0.1 */
  host?: string;
  corsOrigins?: string[];
  /** Enable request logging (default: true) */
  requestLogging?: boolean;
  /** SSE keep-alive interval (ms). Default: 15000 */
  heartbeatMs?: number;
}

export const DEFAULT_CONFIG: DashboardConfig = {
  port: 3848,
  host: '127.0.0.1',
  corsOrigins: ['*'],
};

export interface DashboardDeps {
  monitor: LeakMonitor;
  /** Omitted means the audit and report routes answer 503. */
  store?: SqliteAuditSink;
}

// ─── Request schemas ─────────────────────────────────────────

const intParam = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const FindingFilterSchema = z.object({
  root: z.string().optional(),
  filePath: z.string().optional(),
  detector: z.string().optional(),
  severity: z.nativeEnum(Severity).optional(),
  status: z.nativeEnum(FindingStatus).optional(),
  since: z.string().optional(),
  until: z.string().optional(),
  limit: intParam(50),
  offset: intParam(0),
});

const SearchSchema = z.object({ q: z.string().default(''), limit: intParam(50) });
const DailySchema = z.object({ date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional() });
const SummarySchema = z.object({ days: z.coerce.number().int().min(1).max(366).default(7) });
const PathsBodySchema = z.object({ paths: z.array(z.string().min(1)).min(1).optional() }).default({});

type FindingFilter = z.infer<typeof FindingFilterSchema>;

function toAuditQuery(filter: FindingFilter): AuditQuery {
  const query: AuditQuery = { limit: filter.limit, offset: filter.offset };
  if (filter.root !== undefined) query.root = filter.root;
  if (filter.filePath !== undefined) query.filePath = filter.filePath;
  if (filter.detector !== undefined) query.detectorName = filter.detector;
  if (filter.severity !== undefined) query.severity = filter.severity;
  if (filter.status !== undefined) query.status = filter.status;
  if (filter.since !== undefined) query.since = filter.since;
  if (filter.until !== undefined) query.until = filter.until;
  return query;
}

function summarizeScan(results: ScanResult[]) {
  return {
    files: results.length,
    scanned: results.filter(r => r.status === 'scanned').length,
    skipped: results.filter(r => r.status === 'skipped').length,
    newFindings: results.reduce((n, r) => n + r.newFindings.length, 0),
    resolved: results.reduce((n, r) => n + r.resolved.length, 0),
  };
}

// ─── Dashboard Server Class ──────────────────────────────────

export class DashboardServer {
  private app: express.Application;
  private config: DashboardConfig;
  private monitor: LeakMonitor;
  private store: SqliteAuditSink | undefined;
  private server: Server | undefined;
  private handle: MonitorHandle | null = null;
  private readonly streams = new Set<Response>();
  private startedAt: number = 0;
  private requestCount: number = 0;
  private isShuttingDown: boolean = false;

  constructor(deps: DashboardDeps, config: Partial<DashboardConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.monitor = deps.monitor;
    this.store = deps.store;

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  // ─── Middleware ────────────────────────────────────────────

  private setupMiddleware(): void {
    this.app.use(cors({ origin: this.config.corsOrigins ?? ['*'] }));
    this.app.use(express.json());

    // Request counting and logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.requestCount++;
      if (this.config.requestLogging !== false) {
        logger.debug({ method: req.method, path: req.path }, 'Request');
      }
      next();
    });
  }

  // ─── Routes ────────────────────────────────────────────────

  private setupRoutes(): void {
    // ─── Health & Metrics ────────────────────────────────────

    this.app.get('/health', (_req, res) => {
      if (this.isShuttingDown) {
        res.status(503).json({ status: 'shutting_down' });
        return;
      }
      res.json({
        status: 'ok',
        watching: this.monitor.isWatching(),
        uptime: this.startedAt > 0 ? Date.now() - this.startedAt : 0,
        timestamp: new Date().toISOString(),
      });
    });

    this.app.get('/metrics', (_req, res) => {
      res.set('Content-Type', 'text/plain; version=0.0.4');
      res.send(this.renderMetrics());
    });

    // ─── Stats ───────────────────────────────────────────────

    this.app.get('/api/stats', (_req, res) => {
      try {
        const metrics = this.monitor.getMetrics();
        res.json({
          monitor: metrics,
          detectors: this.monitor.registry.size,
          audit: this.store ? this.store.getStats() : null,
        });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to get stats');
        res.status(500).json({ error: 'Failed to get stats' });
      }
    });

    // ─── Live Findings ───────────────────────────────────────

    this.app.get('/api/findings', (req, res) => {
      const parsed = FindingFilterSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid query', issues: parsed.error.issues });
        return;
      }

      const query = toAuditQuery(parsed.data);
      const matched = this.monitor.snapshot().filter(f => matchesQuery(f, query));
      const page = matched.slice(parsed.data.offset, parsed.data.offset + parsed.data.limit);
      res.json({ findings: page, total: matched.length, limit: parsed.data.limit, offset: parsed.data.offset });
    });

    this.app.get('/api/findings/search', (req, res) => {
      const parsed = SearchSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid query', issues: parsed.error.issues });
        return;
      }
      const hits = searchFindings(this.monitor.snapshot(), parsed.data.q, { limit: parsed.data.limit });
      res.json({ query: parsed.data.q, hits });
    });

    // ─── Audit Trail & Reports ───────────────────────────────

    this.app.get('/api/audit', (req, res) => {
      if (!this.store) {
        res.status(503).json({ error: 'Audit store not configured' });
        return;
      }
      const parsed = FindingFilterSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid query', issues: parsed.error.issues });
        return;
      }
      try {
        const findings = this.store.query(toAuditQuery(parsed.data));
        res.json({ findings, limit: parsed.data.limit, offset: parsed.data.offset });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to query audit trail');
        res.status(500).json({ error: 'Failed to query audit trail' });
      }
    });

    this.app.get('/api/audit/:id/history', (req, res) => {
      if (!this.store) {
        res.status(503).json({ error: 'Audit store not configured' });
        return;
      }
      try {
        const events = this.store.history(req.params.id);
        if (events.length === 0) {
          res.status(404).json({ error: 'Finding not found' });
          return;
        }
        res.json({ events });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to read finding history');
        res.status(500).json({ error: 'Failed to read finding history' });
      }
    });

    this.app.get('/api/report/daily', (req, res) => {
      if (!this.store) {
        res.status(503).json({ error: 'Audit store not configured' });
        return;
      }
      const parsed = DailySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Date must be YYYY-MM-DD' });
        return;
      }
      try {
        res.json(this.store.getDailyReport(parsed.data.date));
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to build daily report');
        res.status(500).json({ error: 'Failed to build daily report' });
      }
    });

    this.app.get('/api/report/summary', (req, res) => {
      if (!this.store) {
        res.status(503).json({ error: 'Audit store not configured' });
        return;
      }
      const parsed = SummarySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'days must be between 1 and 366' });
        return;
      }
      try {
        res.json({ days: this.store.getSummaryStats(parsed.data.days) });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to build summary');
        res.status(500).json({ error: 'Failed to build summary' });
      }
    });

    // ─── Live Events ─────────────────────────────────────────

    this.app.get('/api/events', (req, res) => {
      res.set({
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });
      res.flushHeaders();
      this.streams.add(res);

      const send = (event: string, data: unknown): void => {
        res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
      };

      const unsubscribe = this.monitor.onTransition((transition: FindingTransition) => send('transition', transition));
      const onSkipped = (result: ScanResult): void =>
        send('scan:skipped', { filePath: result.filePath, skip: result.skip });
      this.monitor.on('scan:skipped', onSkipped);

      const heartbeat = setInterval(() => res.write(': ping\n\n'), this.config.heartbeatMs ?? 15000);

      req.on('close', () => {
        unsubscribe();
        this.monitor.off('scan:skipped', onSkipped);
        clearInterval(heartbeat);
        this.streams.delete(res);
      });
    });

    // ─── Control ─────────────────────────────────────────────

    this.app.post('/api/scan', async (req, res) => {
      const parsed = PathsBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: 'paths must be a non-empty array of strings' });
        return;
      }
      try {
        const results = await this.monitor.scanOnce(parsed.data.paths);
        res.json({ summary: summarizeScan(results), results });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Scan failed');
        res.status(500).json({ error: 'Scan failed' });
      }
    });

    this.app.post('/api/monitor/start', (req, res) => {
      if (this.handle) {
        res.status(409).json({ error: 'Monitor already running', handle: this.handle });
        return;
      }
      const parsed = PathsBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: 'paths must be a non-empty array of strings' });
        return;
      }
      try {
        this.handle = this.monitor.startContinuous(parsed.data.paths);
        res.status(201).json({ handle: this.handle });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to start monitor');
        res.status(500).json({ error: 'Failed to start monitor' });
      }
    });

    this.app.post('/api/monitor/stop', async (_req, res) => {
      if (!this.handle) {
        res.status(409).json({ error: 'Monitor not running' });
        return;
      }
      try {
        const handle = this.handle;
        this.handle = null;
        await this.monitor.stop(handle);
        res.json({ stopped: true, handle });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to stop monitor');
        res.status(500).json({ error: 'Failed to stop monitor' });
      }
    });
  }

  /** Prometheus text exposition of the monitor counters. */
  renderMetrics(): string {
    const m = this.monitor.getMetrics();
    const uptimeMs = this.startedAt > 0 ? Date.now() - this.startedAt : 0;

    const metric = (name: string, type: 'counter' | 'gauge', help: string, value: number): string =>
      [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`, `${name} ${value}`].join('\n');

    return [
      metric('leakguard_uptime_seconds', 'gauge', 'Server uptime in seconds', Math.floor(uptimeMs / 1000)),
      metric('leakguard_http_requests_total', 'counter', 'Total HTTP requests served', this.requestCount),
      metric('leakguard_scans_total', 'counter', 'Files scanned', m.totals.scansCompleted),
      metric('leakguard_scans_skipped_total', 'counter', 'Files skipped', m.totals.scansSkipped),
      metric('leakguard_findings_active', 'gauge', 'Active findings', m.totals.findingsActive),
      metric('leakguard_findings_new_total', 'counter', 'New finding transitions', m.totals.transitionsNew),
      metric('leakguard_findings_resolved_total', 'counter', 'Resolved finding transitions', m.totals.transitionsResolved),
      metric('leakguard_detector_errors_total', 'counter', 'Detector failures', m.totals.detectorErrors),
      metric('leakguard_listener_errors_total', 'counter', 'Event listeners that threw', m.totals.listenerErrors),
      metric('leakguard_notifications_dropped_total', 'counter', 'Notifications dropped on a full queue', m.totals.notificationsDropped),
      metric('leakguard_audit_dropped_total', 'counter', 'Audit records lost', m.audit?.dropped ?? 0),
      metric('leakguard_detectors_count', 'gauge', 'Loaded detectors', this.monitor.registry.size),
    ].join('\n\n') + '\n';
  }

  // ─── Lifecycle ─────────────────────────────────────────────

  start(): Promise<void> {
    return new Promise((resolve) => {
      const host = this.config.host ?? '127.0.0.1';
      this.server = this.app.listen(this.config.port, host, () => {
        this.startedAt = Date.now();
        logger.info({ host, port: this.getPort() }, 'Dashboard server started');
        resolve();
      });
    });
  }

  /**
   * Gracefully stop the server.
   * Ends open event streams and a running monitor session, then closes.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    logger.info('Initiating graceful shutdown...');
    this.isShuttingDown = true;

    for (const stream of this.streams) stream.end();
    this.streams.clear();

    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await this.monitor.stop(handle);
    }

    await new Promise<void>((resolve, reject) => {
      // Give in-flight requests time to complete (5 seconds max)
      const forceShutdownTimeout = setTimeout(() => {
        logger.warn('Force closing server after timeout');
        server.closeAllConnections();
        resolve();
      }, 5000);

      server.close((err) => {
        clearTimeout(forceShutdownTimeout);
        if (err) {
          logger.error({ error: err.message }, 'Error during shutdown');
          reject(err);
        } else {
          logger.info('Server stopped gracefully');
          resolve();
        }
      });
    });
    this.server = undefined;
  }

  isRunning(): boolean {
    return this.server !== undefined && !this.isShuttingDown;
  }

  /** Bound port once started (resolves port 0), else the configured one. */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      const info: AddressInfo = address;
      return info.port;
    }
    return this.config.port;
  }
}

export default DashboardServer;
