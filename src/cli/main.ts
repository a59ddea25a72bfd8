#!/usr/bin/env node
/**
 * leakguard CLI
 *
 * Usage:
 *   leakguard scan --paths ./src,./config
 *   leakguard watch --paths .
 *   leakguard report --date 2026-01-31
 *   leakguard stats --days 30
 *   leakguard dashboard --port 3848
 *
 * Environment variables:
 *   LEAKGUARD_ROOTS  - Comma-separated roots (default: current directory)
 *   LEAKGUARD_DB     - Path to the audit database (default: ~/.leakguard/audit.db)
 *   LEAKGUARD_PORT   - Dashboard port (default: 3848)
 *   LOG_LEVEL        - Logging level (debug, info, warn, error)
 */

import { relative } from 'path';
import { SqliteAuditSink } from '../audit/finding-store.js';
import { loadConfig } from '../config/config.js';
import type { ConfigOverrides, LeakGuardConfig, LoadConfigOptions } from '../config/config.js';
import { DashboardServer } from '../dashboard/server.js';
import { LeakMonitor } from '../monitor/leak-monitor.js';
import { errorMessage } from '../shared/errors.js';
import { Severity } from '../shared/types.js';
import type { Finding } from '../shared/types.js';

const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  return args[idx + 1];
}

function showHelp(): void {
  console.log(`
🛡️  leakguard - secret and PII leak detection

Usage:
  leakguard <command> [options]

Commands:
  scan        Scan the roots once and exit
  watch       Scan the roots, then watch them for changes (default)
  report      Show the daily report from the audit trail
  stats       Show day-by-day statistics from the audit trail
  dashboard   Start the HTTP dashboard with live monitoring

Options:
  --paths <a,b>    Comma-separated roots (files or directories)
  --db <path>      Path to the audit database
  --port <number>  Dashboard port (default: 3848)
  --date <date>    Report date, YYYY-MM-DD (default: today, UTC)
  --days <number>  Days covered by stats (default: 7)
  --config <path>  Config file (default: ./.leakguard.json when present)
  --help           Show this help message
`);
}

const SEVERITY_ICONS: Record<Severity, string> = {
  [Severity.HIGH]: '🚨',
  [Severity.MEDIUM]: '⚠️ ',
  [Severity.LOW]: 'ℹ️ ',
};

function title(detectorName: string): string {
  return detectorName
    .split('_')
    .map(w => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

function displayFinding(finding: Readonly<Finding>): void {
  const where = relative(process.cwd(), finding.filePath) || finding.filePath;
  console.log(
    `${SEVERITY_ICONS[finding.severity]} ${title(finding.detectorName)} ` +
      `[${finding.severity}] (confidence ${Math.round(finding.confidence * 100)}%)`
  );
  console.log(`   File:    ${where}:${finding.lineNumber}`);
  console.log(`   Context: ${finding.contextPreview}`);
  console.log(`   Preview: ${finding.valuePreview}`);
}

function buildConfig(): LeakGuardConfig {
  const overrides: ConfigOverrides = {};

  const paths = getArg('paths');
  if (paths) {
    const roots = paths.split(',').map(p => p.trim()).filter(p => p.length > 0);
    if (roots.length > 0) overrides.roots = roots;
  }
  const db = getArg('db');
  if (db) overrides.audit = { databasePath: db };
  const port = getArg('port');
  if (port) overrides.dashboard = { port: Number(port) };

  const options: LoadConfigOptions = { overrides };
  const configPath = getArg('config');
  if (configPath) options.configPath = configPath;
  return loadConfig(options);
}

function openStore(config: LeakGuardConfig): SqliteAuditSink {
  return new SqliteAuditSink({
    databasePath: config.audit.databasePath,
    retentionDays: config.audit.retentionDays,
  });
}

// ─── Commands ────────────────────────────────────────────────

async function scan(config: LeakGuardConfig): Promise<number> {
  const store = openStore(config);
  const monitor = new LeakMonitor({ config, sink: store });
  monitor.on('finding:new', displayFinding);

  console.log('🔍 Scanning for secrets and PII...');
  try {
    const results = await monitor.scanOnce();
    const scanned = results.filter(r => r.status === 'scanned').length;
    const active = monitor.getMetrics().totals.findingsActive;

    const summary = `Scan complete: ${scanned} files scanned, ${results.length - scanned} skipped, ${active} active findings`;
    console.log(active === 0 ? `✅ ${summary}` : `⚠️  ${summary}`);
    return 0;
  } finally {
    await monitor.close();
    store.close();
  }
}

async function watch(config: LeakGuardConfig): Promise<number> {
  const store = openStore(config);
  const monitor = new LeakMonitor({ config, sink: store });
  monitor.on('finding:new', displayFinding);
  monitor.on('finding:resolved', finding => {
    console.log(`✅ Resolved: ${title(finding.detectorName)} in ${finding.filePath}:${finding.lineNumber}`);
  });
  monitor.on('audit:dropped', (_finding, error) => {
    console.error(`❌ Audit record lost: ${error.message}`);
  });

  console.log('🛡️  Starting leakguard...');
  for (const root of config.roots) console.log(`   Watching: ${root}`);

  console.log('🔍 Performing initial scan...');
  await monitor.scanOnce();
  const handle = monitor.startContinuous();
  console.log('✅ leakguard is now monitoring for secrets and PII');
  console.log('   Press Ctrl+C to stop\n');

  return new Promise<number>(resolve => {
    let stopping = false;
    const shutdown = (signal: string): void => {
      if (stopping) return;
      stopping = true;
      console.log(`\n${signal} received, stopping...`);
      monitor
        .stop(handle)
        .then(() => monitor.close())
        .then(() => {
          store.close();
          console.log('🛑 leakguard stopped');
          resolve(0);
        })
        .catch((err: unknown) => {
          console.error('Error during shutdown:', errorMessage(err));
          resolve(1);
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  });
}

function report(config: LeakGuardConfig): number {
  const store = openStore(config);
  try {
    const r = store.getDailyReport(getArg('date'));
    console.log(`\n📋 leakguard report - ${r.date}`);
    console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    console.log(`New findings:      ${r.newFindings}`);
    console.log(`Resolved findings: ${r.resolvedFindings}`);
    for (const severity of Object.values(Severity)) {
      console.log(`  ${severity.padEnd(16)} ${r.bySeverity[severity] ?? 0}`);
    }
    if (Object.keys(r.byDetector).length > 0) {
      console.log('\nBy detector:');
      for (const [detector, count] of Object.entries(r.byDetector)) {
        console.log(`  ${title(detector).padEnd(24)} ${count}`);
      }
    }
    if (r.topFiles.length > 0) {
      console.log('\nFiles affected:');
      for (const { filePath, count } of r.topFiles) console.log(`  ${count}  ${filePath}`);
    }
    return 0;
  } finally {
    store.close();
  }
}

function stats(config: LeakGuardConfig): number {
  const days = Number(getArg('days') ?? '7');
  if (!Number.isInteger(days) || days < 1) {
    console.error('❌ --days must be a positive integer');
    return 1;
  }

  const store = openStore(config);
  try {
    const summary = store.getSummaryStats(days);
    const totals = store.getStats();
    console.log(`\n📊 leakguard statistics - last ${days} days`);
    console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    for (const day of summary) {
      console.log(`${day.date}   +${day.newFindings}  -${day.resolvedFindings}`);
    }
    console.log(`\nActive findings:   ${totals.active}`);
    console.log(`Resolved findings: ${totals.resolved}`);
    return 0;
  } finally {
    store.close();
  }
}

async function dashboard(config: LeakGuardConfig): Promise<number> {
  const store = openStore(config);
  const monitor = new LeakMonitor({ config, sink: store });
  const server = new DashboardServer({ monitor, store }, { port: config.dashboard.port });

  await server.start();
  const port = server.getPort();
  console.log(`
🛡️  leakguard dashboard
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
Database: ${config.audit.databasePath}
Roots:    ${config.roots.join(', ')}
Mode:     ${process.env['NODE_ENV'] ?? 'development'}
`);
  console.log(`✅ Dashboard running at http://localhost:${port}`);
  console.log(`   Health check:  http://localhost:${port}/health`);
  console.log(`   Metrics:       http://localhost:${port}/metrics`);
  console.log(`   Press Ctrl+C to stop\n`);

  return new Promise<number>(resolve => {
    let stopping = false;
    const shutdown = (signal: string): void => {
      if (stopping) return;
      stopping = true;
      console.log(`\n${signal} received, shutting down gracefully...`);
      server
        .stop()
        .then(() => monitor.close())
        .then(() => {
          store.close();
          console.log('✅ Server stopped');
          resolve(0);
        })
        .catch((err: unknown) => {
          console.error('Error during shutdown:', errorMessage(err));
          resolve(1);
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGHUP', () => shutdown('SIGHUP'));
  });
}

// ─── Entry ───────────────────────────────────────────────────

async function main(): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  const first = args[0];
  const command = first !== undefined && !first.startsWith('-') ? first : 'watch';
  const config = buildConfig();

  switch (command) {
    case 'scan':
      return scan(config);
    case 'watch':
      return watch(config);
    case 'report':
      return report(config);
    case 'stats':
      return stats(config);
    case 'dashboard':
      return dashboard(config);
    default:
      console.error(`❌ Unknown command: ${command}`);
      showHelp();
      return 1;
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`❌ Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
