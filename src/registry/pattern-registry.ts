/**
 * PatternRegistry - immutable catalog of detectors.
 *
 * Structural detectors are evaluated here and produce RawMatches.
 * Statistical detectors only get candidate tokens extracted here; scoring
 * them is the entropy scorer's job.
 */

import pino from 'pino';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { DetectorKind } from '../shared/types.js';
import { BUILTIN_DETECTORS } from './catalog.js';
import type {
  CandidateToken,
  Detector,
  DetectorFailure,
  LineMatchResult,
  RawMatch,
  StatisticalDetector,
  StructuralDetector,
} from './types.js';

const logger = pino({ name: 'leakguard:registry', level: process.env['LOG_LEVEL'] ?? 'info' });

export interface RegistryOptions {
  /** Characters of context kept on each side of a match. Default: 40 */
  contextWindow?: number;
  /** Overrides the threshold of every statistical detector. */
  entropyThreshold?: number;
  /** Overrides the minimum token length of every statistical detector. */
  minTokenLength?: number;
}

interface CompiledStructural {
  detector: StructuralDetector;
  regex: RegExp;
}

interface CompiledStatistical {
  detector: StatisticalDetector;
  regex: RegExp;
}

export class PatternRegistry {
  private readonly detectors: ReadonlyMap<string, Detector>;
  private readonly structuralDetectors: readonly CompiledStructural[];
  private readonly statisticalDetectors: readonly CompiledStatistical[];
  private readonly contextWindow: number;

  constructor(catalog: readonly Detector[] = BUILTIN_DETECTORS, options: RegistryOptions = {}) {
    this.contextWindow = options.contextWindow ?? 40;

    const byName = new Map<string, Detector>();
    const structural: CompiledStructural[] = [];
    const statistical: CompiledStatistical[] = [];

    for (const entry of catalog) {
      if (byName.has(entry.name)) {
        throw new ConfigError(`Duplicate detector name: ${entry.name}`, { name: entry.name });
      }

      switch (entry.kind) {
        case DetectorKind.STRUCTURAL: {
          const flags = entry.flags?.includes('g') ? entry.flags : `${entry.flags ?? ''}g`;
          let regex: RegExp;
          try {
            regex = new RegExp(entry.pattern, flags);
          } catch (error) {
            logger.warn({ detector: entry.name, error: errorMessage(error) }, 'Invalid detector pattern, skipping');
            continue;
          }
          const detector = Object.freeze({ ...entry });
          byName.set(detector.name, detector);
          structural.push({ detector, regex });
          break;
        }
        case DetectorKind.STATISTICAL: {
          const detector: StatisticalDetector = Object.freeze({
            ...entry,
            threshold: options.entropyThreshold ?? entry.threshold,
            minLength: options.minTokenLength ?? entry.minLength,
          });
          let regex: RegExp;
          try {
            regex = new RegExp(`[${detector.alphabet}]{${detector.minLength},}={0,2}`, 'g');
          } catch (error) {
            logger.warn({ detector: entry.name, error: errorMessage(error) }, 'Invalid detector alphabet, skipping');
            continue;
          }
          byName.set(detector.name, detector);
          statistical.push({ detector, regex });
          break;
        }
        default: {
          const unknown: never = entry;
          throw new ConfigError('Unknown detector kind', { detector: unknown });
        }
      }
    }

    this.detectors = byName;
    this.structuralDetectors = structural;
    this.statisticalDetectors = statistical;
  }

  get size(): number {
    return this.detectors.size;
  }

  get(name: string): Detector | undefined {
    return this.detectors.get(name);
  }

  list(): Detector[] {
    return [...this.detectors.values()];
  }

  structural(): StructuralDetector[] {
    return this.structuralDetectors.map(c => c.detector);
  }

  statistical(): StatisticalDetector[] {
    return this.statisticalDetectors.map(c => c.detector);
  }

  /**
   * Runs every structural detector over every line of `text`.
   * Detectors that fail are dropped for the remaining lines.
   */
  match(text: string, filePath: string): RawMatch[] {
    const disabled = new Set<string>();
    const matches: RawMatch[] = [];
    const lines = text.split(/\r?\n/);

    lines.forEach((line, i) => {
      const result = this.matchLine(line, i + 1, filePath, disabled);
      matches.push(...result.matches);
      for (const failure of result.failures) disabled.add(failure.detectorName);
    });

    return matches;
  }

  /**
   * Runs structural detectors over a single line. A detector that throws is
   * reported as a failure and contributes no matches.
   */
  matchLine(line: string, lineNumber: number, filePath: string, disabled?: ReadonlySet<string>): LineMatchResult {
    const matches: RawMatch[] = [];
    const failures: DetectorFailure[] = [];
    if (line.length === 0) return { matches, failures };

    const lineLower = line.toLowerCase();

    for (const { detector, regex } of this.structuralDetectors) {
      if (disabled?.has(detector.name)) continue;

      try {
        if (detector.requiredContext && !detector.requiredContext.some(k => lineLower.includes(k))) {
          continue;
        }

        const found: RawMatch[] = [];
        regex.lastIndex = 0;
        let m: RegExpExecArray | null;
        while ((m = regex.exec(line)) !== null) {
          const text = m[0];
          if (text.length === 0) {
            regex.lastIndex++;
            continue;
          }
          found.push(this.buildMatch(detector, filePath, line, lineNumber, m.index, text));
        }
        matches.push(...found);
      } catch (error) {
        failures.push({ detectorName: detector.name, lineNumber, message: errorMessage(error) });
      }
    }

    return { matches, failures };
  }

  /** Secret-shaped substrings of `text` for the first statistical detector. */
  candidateTokens(text: string): CandidateToken[] {
    const first = this.statisticalDetectors[0];
    if (!first) return [];

    const tokens: CandidateToken[] = [];
    text.split(/\r?\n/).forEach((line, i) => {
      tokens.push(...this.candidateTokensInLine(line, i + 1, first.detector.name));
    });
    return tokens;
  }

  /** Secret-shaped substrings of a single line for a statistical detector. */
  candidateTokensInLine(line: string, lineNumber: number, detectorName: string): CandidateToken[] {
    const compiled = this.statisticalDetectors.find(c => c.detector.name === detectorName);
    if (!compiled || line.length === 0) return [];

    const { detector, regex } = compiled;
    const tokens: CandidateToken[] = [];
    regex.lastIndex = 0;
    let m: RegExpExecArray | null;
    while ((m = regex.exec(line)) !== null) {
      const token = m[0];
      if (detector.requireDigit && !/\d/.test(token)) continue;
      tokens.push({
        token,
        position: { lineNumber, columnRange: { start: m.index, end: m.index + token.length } },
      });
    }
    return tokens;
  }

  /** Context on each side of a span, bounded by the context window. */
  surroundingContext(line: string, start: number, end: number): RawMatch['surroundingContext'] {
    return {
      before: line.slice(Math.max(0, start - this.contextWindow), start),
      after: line.slice(end, Math.min(line.length, end + this.contextWindow)),
    };
  }

  private buildMatch(
    detector: StructuralDetector,
    filePath: string,
    line: string,
    lineNumber: number,
    start: number,
    text: string
  ): RawMatch {
    const end = start + text.length;
    return {
      detectorName: detector.name,
      detectorKind: DetectorKind.STRUCTURAL,
      filePath,
      lineNumber,
      columnRange: { start, end },
      matchedText: text,
      surroundingContext: this.surroundingContext(line, start, end),
    };
  }
}

export default PatternRegistry;
