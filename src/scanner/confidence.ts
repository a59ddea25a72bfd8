/**
 * Confidence Composer
 *
 * Turns a RawMatch into a calibrated confidence and a severity tier.
 * Severity classifies the type of risk and comes from the detector;
 * confidence classifies the certainty of the match.
 */

import { DEFAULT_STRUCTURAL_PRIOR } from '../registry/catalog.js';
import type { PatternRegistry } from '../registry/pattern-registry.js';
import type { Detector, RawMatch } from '../registry/types.js';
import { CHECKSUMS } from '../registry/validators.js';
import { DetectorKind, Severity } from '../shared/types.js';
import type { ColumnRange } from '../shared/types.js';

export interface ComposerConfig {
  /** Below this a match is suppressed. Default: 0.3 */
  minConfidence?: number;
  /** Subtracted when inline test markers surround a match. Default: 0.4 */
  testMarkerPenalty?: number;
  /** Path segments that designate test data; matches there are suppressed. */
  testDataMarkers?: readonly string[];
  /** Words next to a match that suggest placeholder data. */
  inlineTestMarkers?: readonly string[];
  /** Words next to a match that suggest a production value. */
  productionMarkers?: readonly string[];
  /** Added when production markers surround a match. Default: 0.1 */
  productionBoost?: number;
  /** Added when a detector's checksum passes. Default: 0.05 */
  checksumBonus?: number;
  /** Subtracted when a detector's checksum fails. Default: 0.5 */
  checksumPenalty?: number;
}

export const DEFAULT_TEST_DATA_MARKERS: readonly string[] = [
  'test', 'tests', '__tests__', 'fixtures', '__fixtures__', 'testdata',
];
export const DEFAULT_INLINE_TEST_MARKERS: readonly string[] = [
  'example', 'dummy', 'fake', 'sample', 'placeholder', 'test',
];
export const DEFAULT_PRODUCTION_MARKERS: readonly string[] = ['prod', 'production', 'live'];

/** Statistical confidence spans [STATISTICAL_FLOOR, STATISTICAL_CEILING]. */
const STATISTICAL_FLOOR = 0.5;
const STATISTICAL_CEILING = 0.85;

export interface ComposeContext {
  /** File path relative to its monitored root, `/`-separated. */
  relativePath: string;
}

export type AdjustmentReason =
  | 'test_data_path'
  | 'inline_test_marker'
  | 'production_marker'
  | 'checksum_passed'
  | 'checksum_failed'
  | 'below_minimum';

export interface Composition {
  confidence: number;
  severity: Severity;
  suppressed: boolean;
  reasons: AdjustmentReason[];
}

interface Positioned {
  detectorKind: DetectorKind;
  lineNumber: number;
  columnRange: ColumnRange;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Matches a marker that is not preceded by a letter. */
function markerRegex(markers: readonly string[]): RegExp | null {
  if (markers.length === 0) return null;
  return new RegExp(`(?<![a-z])(?:${markers.map(m => escapeRegex(m.toLowerCase())).join('|')})`);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export class ConfidenceComposer {
  private readonly registry: PatternRegistry;
  private readonly minConfidence: number;
  private readonly testMarkerPenalty: number;
  private readonly productionBoost: number;
  private readonly checksumBonus: number;
  private readonly checksumPenalty: number;
  private readonly testDataSegments: ReadonlySet<string>;
  private readonly inlineTestRegex: RegExp | null;
  private readonly productionRegex: RegExp | null;

  constructor(registry: PatternRegistry, config: ComposerConfig = {}) {
    this.registry = registry;
    this.minConfidence = config.minConfidence ?? 0.3;
    this.testMarkerPenalty = config.testMarkerPenalty ?? 0.4;
    this.productionBoost = config.productionBoost ?? 0.1;
    this.checksumBonus = config.checksumBonus ?? 0.05;
    this.checksumPenalty = config.checksumPenalty ?? 0.5;
    this.testDataSegments = new Set(
      (config.testDataMarkers ?? DEFAULT_TEST_DATA_MARKERS).map(m => m.toLowerCase())
    );
    this.inlineTestRegex = markerRegex(config.inlineTestMarkers ?? DEFAULT_INLINE_TEST_MARKERS);
    this.productionRegex = markerRegex(config.productionMarkers ?? DEFAULT_PRODUCTION_MARKERS);
  }

  /** True when any directory segment of the path is a test-data marker. */
  isTestDataPath(relativePath: string): boolean {
    const segments = relativePath.split(/[\\/]/).slice(0, -1);
    return segments.some(s => this.testDataSegments.has(s.toLowerCase()));
  }

  compose(match: RawMatch, context: ComposeContext): Composition {
    const detector = this.registry.get(match.detectorName);
    if (!detector) {
      // Unknown detectors carry no prior.
      return { confidence: 0, severity: Severity.LOW, suppressed: true, reasons: ['below_minimum'] };
    }

    const reasons: AdjustmentReason[] = [];
    let confidence = this.baseConfidence(detector, match);

    const surrounding = `${match.surroundingContext.before} ${match.surroundingContext.after}`.toLowerCase();

    if (this.inlineTestRegex?.test(surrounding)) {
      confidence -= this.testMarkerPenalty;
      reasons.push('inline_test_marker');
    }

    if (this.productionRegex?.test(surrounding)) {
      confidence += this.productionBoost;
      reasons.push('production_marker');
    }

    if (detector.kind === DetectorKind.STRUCTURAL && detector.validate) {
      if (CHECKSUMS[detector.validate](match.matchedText)) {
        confidence += this.checksumBonus;
        reasons.push('checksum_passed');
      } else {
        confidence -= this.checksumPenalty;
        reasons.push('checksum_failed');
      }
    }

    confidence = round3(clamp(confidence, 0, 1));
    let suppressed = false;

    if (this.isTestDataPath(context.relativePath)) {
      suppressed = true;
      reasons.push('test_data_path');
    }
    if (confidence < this.minConfidence) {
      suppressed = true;
      reasons.push('below_minimum');
    }

    return { confidence, severity: detector.severity, suppressed, reasons };
  }

  /**
   * Structural matches win over statistical ones on overlapping spans of the
   * same line. Structural matches are always kept.
   */
  resolveOverlaps<T extends Positioned>(matches: readonly T[]): T[] {
    const structural = matches.filter(m => m.detectorKind === DetectorKind.STRUCTURAL);

    return matches.filter(m => {
      if (m.detectorKind === DetectorKind.STRUCTURAL) return true;
      return !structural.some(
        s =>
          s.lineNumber === m.lineNumber &&
          s.columnRange.start < m.columnRange.end &&
          m.columnRange.start < s.columnRange.end
      );
    });
  }

  private baseConfidence(detector: Detector, match: RawMatch): number {
    switch (detector.kind) {
      case DetectorKind.STRUCTURAL:
        return detector.prior ?? DEFAULT_STRUCTURAL_PRIOR;
      case DetectorKind.STATISTICAL: {
        const normalized = match.normalizedEntropy ?? 0;
        const span = 1 - detector.threshold;
        const scaled = span > 0 ? clamp((normalized - detector.threshold) / span, 0, 1) : 1;
        return STATISTICAL_FLOOR + (STATISTICAL_CEILING - STATISTICAL_FLOOR) * scaled;
      }
    }
  }
}

export default ConfidenceComposer;
