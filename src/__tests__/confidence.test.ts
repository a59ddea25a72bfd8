/**
 * Unit tests for ConfidenceComposer
 */

import { describe, it, expect } from 'vitest';
import { ConfidenceComposer } from '../scanner/confidence.js';
import { PatternRegistry } from '../registry/pattern-registry.js';
import type { RawMatch } from '../registry/types.js';
import { DetectorKind, Severity } from '../shared/types.js';
import { FAKE_AWS_KEY } from './helpers.js';

function rawMatch(overrides: Partial<RawMatch> = {}): RawMatch {
  return {
    detectorName: 'aws_access_key',
    detectorKind: DetectorKind.STRUCTURAL,
    filePath: '/repo/config.ini',
    lineNumber: 1,
    columnRange: { start: 8, end: 28 },
    matchedText: FAKE_AWS_KEY,
    surroundingContext: { before: 'key_id = ', after: '' },
    ...overrides,
  };
}

describe('ConfidenceComposer', () => {
  const registry = new PatternRegistry();
  const composer = new ConfidenceComposer(registry);
  const context = { relativePath: 'config.ini' };

  describe('Base confidence', () => {
    it('should use the default prior for structural detectors', () => {
      expect(composer.compose(rawMatch(), context)).toEqual({
        confidence: 0.9,
        severity: Severity.HIGH,
        suppressed: false,
        reasons: [],
      });
    });

    it('should scale statistical confidence between 0.5 and 0.85', () => {
      const statistical = (normalizedEntropy: number) =>
        composer.compose(
          rawMatch({
            detectorName: 'high_entropy_string',
            detectorKind: DetectorKind.STATISTICAL,
            normalizedEntropy,
          }),
          context
        );

      expect(statistical(0.75).confidence).toBe(0.5);
      expect(statistical(0.875).confidence).toBeCloseTo(0.675, 10);
      expect(statistical(1).confidence).toBe(0.85);
      expect(statistical(1).severity).toBe(Severity.MEDIUM);
    });

    it('should suppress matches of unknown detectors', () => {
      const result = composer.compose(rawMatch({ detectorName: 'unknown' }), context);
      expect(result.suppressed).toBe(true);
      expect(result.confidence).toBe(0);
    });
  });

  describe('Context adjustments', () => {
    it('should lower confidence next to inline test markers', () => {
      const result = composer.compose(rawMatch({ surroundingContext: { before: 'example_key = ', after: '' } }), context);
      expect(result.confidence).toBe(0.5);
      expect(result.reasons).toEqual(['inline_test_marker']);
      expect(result.suppressed).toBe(false);
    });

    it('should raise confidence next to production markers', () => {
      const result = composer.compose(rawMatch({ surroundingContext: { before: 'prod_key = ', after: '' } }), context);
      expect(result.confidence).toBe(1);
      expect(result.reasons).toEqual(['production_marker']);
    });

    it('should not treat a marker inside a longer word as a marker', () => {
      const result = composer.compose(rawMatch({ surroundingContext: { before: 'contest = ', after: '' } }), context);
      expect(result.reasons).toEqual([]);
    });

    it('should keep severity regardless of confidence', () => {
      const result = composer.compose(rawMatch({ surroundingContext: { before: 'dummy = ', after: '' } }), context);
      expect(result.severity).toBe(Severity.HIGH);
    });
  });

  describe('Checksums', () => {
    const card = (matchedText: string) =>
      composer.compose(rawMatch({ detectorName: 'credit_card', matchedText, surroundingContext: { before: 'card: ', after: '' } }), context);

    it('should add a bonus when the checksum passes', () => {
      const result = card('4000000000000002');
      expect(result.confidence).toBe(0.75);
      expect(result.reasons).toEqual(['checksum_passed']);
      expect(result.suppressed).toBe(false);
    });

    it('should suppress a match whose checksum fails', () => {
      const result = card('4000000000000001');
      expect(result.confidence).toBe(0.2);
      expect(result.reasons).toEqual(['checksum_failed', 'below_minimum']);
      expect(result.suppressed).toBe(true);
    });
  });

  describe('Test data paths', () => {
    it('should recognize test-data directory segments', () => {
      expect(composer.isTestDataPath('src/tests/config.ts')).toBe(true);
      expect(composer.isTestDataPath('Fixtures/keys.json')).toBe(true);
      expect(composer.isTestDataPath('src/config.ts')).toBe(false);
      expect(composer.isTestDataPath('test.ts')).toBe(false);
    });

    it('should suppress matches under test-data directories', () => {
      const result = composer.compose(rawMatch(), { relativePath: 'fixtures/config.ini' });
      expect(result.suppressed).toBe(true);
      expect(result.confidence).toBe(0.9);
      expect(result.reasons).toEqual(['test_data_path']);
    });

    it('should honor a configured minimum confidence', () => {
      const strict = new ConfidenceComposer(registry, { minConfidence: 0.95 });
      expect(strict.compose(rawMatch(), context).suppressed).toBe(true);
    });
  });

  describe('Overlap resolution', () => {
    it('should prefer structural matches over overlapping statistical ones', () => {
      const structural = { detectorKind: DetectorKind.STRUCTURAL, lineNumber: 1, columnRange: { start: 4, end: 24 } };
      const overlapping = { detectorKind: DetectorKind.STATISTICAL, lineNumber: 1, columnRange: { start: 10, end: 40 } };
      const elsewhere = { detectorKind: DetectorKind.STATISTICAL, lineNumber: 1, columnRange: { start: 24, end: 50 } };
      const otherLine = { detectorKind: DetectorKind.STATISTICAL, lineNumber: 2, columnRange: { start: 4, end: 24 } };

      expect(composer.resolveOverlaps([structural, overlapping, elsewhere, otherLine])).toEqual([
        structural,
        elsewhere,
        otherLine,
      ]);
    });
  });
});
