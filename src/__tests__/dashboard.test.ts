/**
 * Unit tests for the dashboard's search and metrics
 */

import { describe, it, expect } from 'vitest';
import { searchFindings } from '../dashboard/finding-search.js';
import { DashboardServer } from '../dashboard/server.js';
import { LeakMonitor } from '../monitor/leak-monitor.js';
import { Severity } from '../shared/types.js';
import { makeFinding } from './helpers.js';

describe('searchFindings', () => {
  const findings = [
    makeFinding({ id: 'aws' }),
    makeFinding({
      id: 'mail',
      detectorName: 'email',
      severity: Severity.LOW,
      filePath: '/repo/docs/team.md',
      contextPreview: 'contact: [op*****io]',
      valuePreview: 'op*****io',
    }),
  ];

  it('should return nothing for a blank query', () => {
    expect(searchFindings(findings, '')).toEqual([]);
    expect(searchFindings(findings, '   ')).toEqual([]);
  });

  it('should rank the closest detector name first', () => {
    const hits = searchFindings(findings, 'aws_access_key');
    expect(hits[0]?.finding.id).toBe('aws');
  });

  it('should match on file paths', () => {
    const hits = searchFindings(findings, 'team.md');
    expect(hits[0]?.finding.id).toBe('mail');
  });

  it('should honor the result limit', () => {
    expect(searchFindings(findings, 'repo', { limit: 1 })).toHaveLength(1);
  });
});

describe('DashboardServer', () => {
  it('should render monitor counters as Prometheus text', () => {
    const server = new DashboardServer({ monitor: new LeakMonitor() }, { port: 4000 });
    const text = server.renderMetrics();

    expect(text.split('\n')).toContain('leakguard_detectors_count 14');
    expect(text.split('\n')).toContain('leakguard_scans_total 0');
    expect(text.split('\n')).toContain('# TYPE leakguard_findings_active gauge');
    expect(text.endsWith('\n')).toBe(true);
  });

  it('should report the configured port until started', () => {
    const server = new DashboardServer({ monitor: new LeakMonitor() }, { port: 4000 });
    expect(server.getPort()).toBe(4000);
    expect(server.isRunning()).toBe(false);
  });
});
