/**
 * Scanner Module - Public API
 *
 * Entropy scoring, confidence composition and the per-line scan pipeline.
 */

export { PatternScanner, default } from './pattern-scanner.js';
export type { ScannerConfig, AnnotatedMatch, ContentScanResult } from './pattern-scanner.js';
export { EntropyScorer, shannonEntropy } from './entropy.js';
export type { EntropyOptions } from './entropy.js';
export {
  ConfidenceComposer,
  DEFAULT_INLINE_TEST_MARKERS,
  DEFAULT_PRODUCTION_MARKERS,
  DEFAULT_TEST_DATA_MARKERS,
} from './confidence.js';
export type { AdjustmentReason, ComposeContext, ComposerConfig, Composition } from './confidence.js';
export { contextPreview, maskSpans, maskValue } from './redaction.js';
