/**
 * Unit tests for PatternScanner
 */

import { describe, it, expect } from 'vitest';
import { PatternScanner } from '../scanner/pattern-scanner.js';
import { PatternRegistry } from '../registry/pattern-registry.js';
import { BUILTIN_DETECTORS } from '../registry/catalog.js';
import type { Detector } from '../registry/types.js';
import { DetectorKind, Severity } from '../shared/types.js';
import { FAKE_AWS_KEY } from './helpers.js';

const CONFIG_FILE = ['# settings', 'region = us-east-1', `aws_access_key_id = ${FAKE_AWS_KEY}`].join('\n');

/** A context list whose lookup throws, to simulate a faulty detector. */
class ExplodingList extends Array<string> {
  override some(): boolean {
    throw new Error('detector exploded');
  }
}

describe('PatternScanner', () => {
  const scanner = new PatternScanner(new PatternRegistry());

  describe('Structural detection', () => {
    it('should report a masked AWS key with its line and severity', () => {
      const result = scanner.scanContent(CONFIG_FILE, '/repo/config.ini', 'config.ini');

      expect(result.matches).toHaveLength(1);
      expect(result.matches[0]).toEqual({
        detectorName: 'aws_access_key',
        detectorKind: DetectorKind.STRUCTURAL,
        filePath: '/repo/config.ini',
        lineNumber: 3,
        columnStart: 20,
        matchedText: FAKE_AWS_KEY,
        confidence: 0.9,
        severity: Severity.HIGH,
        valuePreview: 'AK****************OP',
        contextPreview: 'aws_access_key_id = [AK****************OP]',
      });
      expect(result.suppressedCount).toBe(0);
      expect(result.detectorErrors).toEqual([]);
    });

    it('should count CRLF line endings like LF', () => {
      const result = scanner.scanContent(CONFIG_FILE.replace(/\n/g, '\r\n'), '/repo/config.ini', 'config.ini');
      expect(result.matches.map(m => m.lineNumber)).toEqual([3]);
    });

    it('should suppress matches in test-data directories', () => {
      const result = scanner.scanContent(CONFIG_FILE, '/repo/fixtures/config.ini', 'fixtures/config.ini');
      expect(result.matches).toEqual([]);
      expect(result.suppressedCount).toBe(1);
    });

    it('should lower confidence next to placeholder wording', () => {
      const result = scanner.scanContent(`example_key = ${FAKE_AWS_KEY}`, '/repo/a.env', 'a.env');
      expect(result.matches.map(m => m.confidence)).toEqual([0.5]);
    });

    it('should keep credit cards that pass Luhn and drop those that fail', () => {
      const passing = scanner.scanContent('card: 4000000000000002', '/repo/a.txt', 'a.txt');
      expect(passing.matches.map(m => [m.detectorName, m.confidence])).toEqual([['credit_card', 0.75]]);

      const failing = scanner.scanContent('card: 4000000000000001', '/repo/a.txt', 'a.txt');
      expect(failing.matches).toEqual([]);
      expect(failing.suppressedCount).toBe(1);
    });
  });

  describe('Statistical detection', () => {
    it('should report a high-entropy token at full statistical confidence', () => {
      const token = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ012345';
      const result = scanner.scanContent(`token = "${token}"`, '/repo/app.ts', 'app.ts');

      expect(result.matches).toHaveLength(1);
      expect(result.matches[0]).toMatchObject({
        detectorName: 'high_entropy_string',
        detectorKind: DetectorKind.STATISTICAL,
        lineNumber: 1,
        columnStart: 9,
        confidence: 0.85,
        severity: Severity.MEDIUM,
        valuePreview: `AB${'*'.repeat(28)}45`,
        contextPreview: `token = "[AB${'*'.repeat(28)}45]"`,
      });
    });

    it('should ignore low-entropy runs', () => {
      const result = scanner.scanContent('padding = aaaaaaaaaaaaaaaaaaaaaaaaa1', '/repo/app.ts', 'app.ts');
      expect(result.matches).toEqual([]);
    });
  });

  describe('Ordering', () => {
    it('should order matches by line then column', () => {
      const content = ['b@corp.io a@corp.io', '', `key = ${FAKE_AWS_KEY}`].join('\n');
      const result = scanner.scanContent(content, '/repo/notes.md', 'notes.md');
      expect(result.matches.map(m => [m.lineNumber, m.columnStart])).toEqual([
        [1, 0],
        [1, 10],
        [3, 6],
      ]);
    });
  });

  describe('Detector isolation', () => {
    it('should isolate a failing detector and keep the others running', () => {
      const exploding: Detector = {
        kind: DetectorKind.STRUCTURAL,
        name: 'exploding',
        description: 'Always fails',
        severity: Severity.LOW,
        pattern: 'x',
        requiredContext: new ExplodingList(),
      };
      const isolated = new PatternScanner(new PatternRegistry([exploding, ...BUILTIN_DETECTORS]));

      const result = isolated.scanContent(`first line\n${CONFIG_FILE}`, '/repo/config.ini', 'config.ini');

      expect(result.detectorErrors).toEqual([
        { detectorName: 'exploding', lineNumber: 1, message: 'detector exploded' },
      ]);
      expect(result.matches.map(m => [m.detectorName, m.lineNumber])).toEqual([['aws_access_key', 4]]);
    });
  });
});
