/**
 * Unit tests for PatternRegistry and checksum validators
 */

import { describe, it, expect } from 'vitest';
import { PatternRegistry } from '../registry/pattern-registry.js';
import { BUILTIN_DETECTORS } from '../registry/catalog.js';
import { luhn, ssn } from '../registry/validators.js';
import type { Detector } from '../registry/types.js';
import { ConfigError } from '../shared/errors.js';
import { DetectorKind, Severity } from '../shared/types.js';
import { FAKE_AWS_KEY } from './helpers.js';

describe('PatternRegistry', () => {
  const registry = new PatternRegistry();

  describe('Catalog', () => {
    it('should load every built-in detector', () => {
      expect(registry.size).toBe(BUILTIN_DETECTORS.length);
      expect(registry.size).toBe(14);
      expect(registry.statistical().map(d => d.name)).toEqual(['high_entropy_string']);
    });

    it('should look detectors up by name', () => {
      const detector = registry.get('aws_access_key');
      expect(detector?.severity).toBe(Severity.HIGH);
      expect(detector?.kind).toBe(DetectorKind.STRUCTURAL);
      expect(registry.get('missing')).toBeUndefined();
    });

    it('should reject duplicate detector names', () => {
      const duplicate: Detector[] = [
        { kind: DetectorKind.STRUCTURAL, name: 'dup', description: 'a', severity: Severity.LOW, pattern: 'a' },
        { kind: DetectorKind.STRUCTURAL, name: 'dup', description: 'b', severity: Severity.LOW, pattern: 'b' },
      ];
      expect(() => new PatternRegistry(duplicate)).toThrow(ConfigError);
    });

    it('should skip a detector whose pattern does not compile', () => {
      const catalog: Detector[] = [
        { kind: DetectorKind.STRUCTURAL, name: 'broken', description: 'x', severity: Severity.LOW, pattern: '(' },
        { kind: DetectorKind.STRUCTURAL, name: 'word', description: 'y', severity: Severity.LOW, pattern: 'needle' },
      ];
      const partial = new PatternRegistry(catalog);
      expect(partial.size).toBe(1);
      expect(partial.get('broken')).toBeUndefined();
    });

    it('should apply entropy overrides to statistical detectors', () => {
      const tuned = new PatternRegistry(undefined, { entropyThreshold: 0.9, minTokenLength: 32 });
      const [detector] = tuned.statistical();
      expect(detector?.threshold).toBe(0.9);
      expect(detector?.minLength).toBe(32);
    });
  });

  describe('Structural matching', () => {
    it('should report line, columns and surrounding context', () => {
      const matches = registry.match(`# settings\nregion = us-east-1\naws_access_key_id = ${FAKE_AWS_KEY}`, 'config.ini');

      expect(matches).toHaveLength(1);
      expect(matches[0]).toMatchObject({
        detectorName: 'aws_access_key',
        lineNumber: 3,
        columnRange: { start: 20, end: 40 },
        matchedText: FAKE_AWS_KEY,
        surroundingContext: { before: 'aws_access_key_id = ', after: '' },
      });
    });

    it('should require context keywords where a detector declares them', () => {
      const value = 'A1b2C3d4E5'.repeat(4);

      const withContext = registry.matchLine(`aws_secret = ${value}`, 1, 'env');
      expect(withContext.matches.map(m => m.detectorName)).toContain('aws_secret_key');

      const without = registry.matchLine(`checksum = ${value}`, 1, 'env');
      expect(without.matches.map(m => m.detectorName)).not.toContain('aws_secret_key');
    });

    it('should find every occurrence on a line', () => {
      const result = registry.matchLine('a@example.org, b@example.org', 1, 'team.md');
      expect(result.matches.filter(m => m.detectorName === 'email').map(m => m.columnRange.start)).toEqual([0, 15]);
    });

    it('should bound surrounding context by the context window', () => {
      const narrow = new PatternRegistry(undefined, { contextWindow: 3 });
      expect(narrow.surroundingContext('abcdefghij', 4, 6)).toEqual({ before: 'bcd', after: 'ghi' });
    });
  });

  describe('Candidate tokens', () => {
    it('should extract secret-shaped runs that contain a digit', () => {
      const tokens = registry.candidateTokens('token = abcdefghij0123456789xyz');
      expect(tokens).toEqual([
        {
          token: 'abcdefghij0123456789xyz',
          position: { lineNumber: 1, columnRange: { start: 8, end: 31 } },
        },
      ]);
    });

    it('should ignore runs without digits or below the minimum length', () => {
      expect(registry.candidateTokens('abcdefghijklmnopqrstuvwxyz')).toEqual([]);
      expect(registry.candidateTokens('short1')).toEqual([]);
    });
  });
});

describe('Checksum validators', () => {
  it('should validate Luhn check digits', () => {
    expect(luhn('4000000000000002')).toBe(true);
    expect(luhn('4000 0000 0000 0002')).toBe(true);
    expect(luhn('4000000000000001')).toBe(false);
    expect(luhn('123')).toBe(false);
  });

  it('should apply social security number rules', () => {
    expect(ssn('123-45-6789')).toBe(true);
    expect(ssn('000-12-3456')).toBe(false);
    expect(ssn('666-12-3456')).toBe(false);
    expect(ssn('900-12-3456')).toBe(false);
    expect(ssn('123-00-4567')).toBe(false);
    expect(ssn('123-45-0000')).toBe(false);
  });
});
