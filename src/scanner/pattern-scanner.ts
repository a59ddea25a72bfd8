/**
 * PatternScanner - runs the detection pipeline over one file version.
 *
 * Each line goes through:
 * - the registry (structural matches and statistical candidates)
 * - the entropy scorer (statistical candidates)
 * - the confidence composer (priority, confidence, suppression)
 *
 * Working per line bounds context windows and gives stable line numbers.
 */

import pino from 'pino';
import { PatternRegistry } from '../registry/pattern-registry.js';
import type { DetectorFailure, RawMatch, StatisticalDetector } from '../registry/types.js';
import { errorMessage } from '../shared/errors.js';
import { DetectorKind } from '../shared/types.js';
import type { Severity } from '../shared/types.js';
import { ConfidenceComposer } from './confidence.js';
import type { ComposerConfig } from './confidence.js';
import { EntropyScorer } from './entropy.js';
import { contextPreview, maskValue } from './redaction.js';

const logger = pino({ name: 'leakguard:scanner', level: process.env['LOG_LEVEL'] ?? 'info' });

// ═══════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════

/** Configuration for the PatternScanner. */
export interface ScannerConfig extends ComposerConfig {
  /** Context characters kept on each side of a match. Default: 40 */
  contextWindow?: number;
}

/**
 * A match that survived suppression, annotated with confidence and
 * severity. `matchedText` is the raw value and must not outlive the scan.
 */
export interface AnnotatedMatch {
  detectorName: string;
  detectorKind: DetectorKind;
  filePath: string;
  lineNumber: number;
  columnStart: number;
  matchedText: string;
  confidence: number;
  severity: Severity;
  valuePreview: string;
  contextPreview: string;
}

export interface ContentScanResult {
  /** Surviving matches, ordered by line then column. */
  matches: AnnotatedMatch[];
  /** Matches dropped by the composer. */
  suppressedCount: number;
  /** Detectors isolated during this scan, first failure each. */
  detectorErrors: DetectorFailure[];
}

// ═══════════════════════════════════════════════════════════════
// PATTERN SCANNER
// ═══════════════════════════════════════════════════════════════

export class PatternScanner {
  private readonly registry: PatternRegistry;
  private readonly composer: ConfidenceComposer;
  private readonly scorers: ReadonlyMap<string, EntropyScorer>;
  private readonly contextWindow: number;

  constructor(registry: PatternRegistry, config: ScannerConfig = {}) {
    this.registry = registry;
    this.composer = new ConfidenceComposer(registry, config);
    this.contextWindow = config.contextWindow ?? 40;
    this.scorers = new Map(
      registry
        .statistical()
        .map(d => [d.name, new EntropyScorer({ threshold: d.threshold, minLength: d.minLength })] as const)
    );
  }

  getComposer(): ConfidenceComposer {
    return this.composer;
  }

  /**
   * Scans file content. A detector that fails is skipped for the rest of
   * this scan; the other detectors keep running.
   */
  scanContent(content: string, filePath: string, relativePath: string): ContentScanResult {
    const disabled = new Set<string>();
    const detectorErrors: DetectorFailure[] = [];
    const matches: AnnotatedMatch[] = [];
    let suppressedCount = 0;

    const recordFailures = (failures: DetectorFailure[]): void => {
      for (const failure of failures) {
        if (disabled.has(failure.detectorName)) continue;
        disabled.add(failure.detectorName);
        detectorErrors.push(failure);
        logger.warn(
          { detector: failure.detectorName, filePath, lineNumber: failure.lineNumber, error: failure.message },
          'Detector failed, isolating for this scan'
        );
      }
    };

    const lines = content.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? '';
      if (line.trim().length === 0) continue;
      const lineNumber = i + 1;

      const structural = this.registry.matchLine(line, lineNumber, filePath, disabled);
      recordFailures(structural.failures);

      const statistical = this.scanStatistical(line, lineNumber, filePath, disabled);
      recordFailures(statistical.failures);

      const raw = [...structural.matches, ...statistical.matches];
      if (raw.length === 0) continue;

      const spans = raw.map(m => m.columnRange);
      const prioritized = this.composer.resolveOverlaps(raw);

      for (const match of prioritized) {
        const composition = this.composer.compose(match, { relativePath });
        if (composition.suppressed) {
          suppressedCount++;
          logger.debug(
            { detector: match.detectorName, filePath, lineNumber, reasons: composition.reasons },
            'Match suppressed'
          );
          continue;
        }

        matches.push({
          detectorName: match.detectorName,
          detectorKind: match.detectorKind,
          filePath,
          lineNumber,
          columnStart: match.columnRange.start,
          matchedText: match.matchedText,
          confidence: composition.confidence,
          severity: composition.severity,
          valuePreview: maskValue(match.matchedText),
          contextPreview: contextPreview(line, match.columnRange, spans, this.contextWindow),
        });
      }
    }

    matches.sort((a, b) => a.lineNumber - b.lineNumber || a.columnStart - b.columnStart);
    return { matches, suppressedCount, detectorErrors };
  }

  /** Statistical candidates that pass their detector's entropy threshold. */
  private scanStatistical(
    line: string,
    lineNumber: number,
    filePath: string,
    disabled: ReadonlySet<string>
  ): { matches: RawMatch[]; failures: DetectorFailure[] } {
    const matches: RawMatch[] = [];
    const failures: DetectorFailure[] = [];

    for (const detector of this.registry.statistical()) {
      if (disabled.has(detector.name)) continue;
      try {
        matches.push(...this.evaluateCandidates(detector, line, lineNumber, filePath));
      } catch (error) {
        failures.push({ detectorName: detector.name, lineNumber, message: errorMessage(error) });
      }
    }

    return { matches, failures };
  }

  private evaluateCandidates(
    detector: StatisticalDetector,
    line: string,
    lineNumber: number,
    filePath: string
  ): RawMatch[] {
    const scorer = this.scorers.get(detector.name);
    if (!scorer) return [];

    const matches: RawMatch[] = [];
    for (const { token, position } of this.registry.candidateTokensInLine(line, lineNumber, detector.name)) {
      if (!scorer.isCandidateSecret(token)) continue;
      const { start, end } = position.columnRange;
      matches.push({
        detectorName: detector.name,
        detectorKind: DetectorKind.STATISTICAL,
        filePath,
        lineNumber,
        columnRange: { start, end },
        matchedText: token,
        surroundingContext: this.registry.surroundingContext(line, start, end),
        normalizedEntropy: scorer.normalized(token),
      });
    }
    return matches;
  }
}

export default PatternScanner;
