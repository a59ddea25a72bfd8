/**
 * Entropy Scorer
 *
 * Shannon entropy normalized by the most entropy a token of its length and
 * alphabet could carry, so one threshold works for every token length.
 */

import { DEFAULT_ENTROPY_THRESHOLD, DEFAULT_MIN_TOKEN_LENGTH } from '../registry/catalog.js';

export interface EntropyOptions {
  /** Minimum normalized entropy. Default: 0.75 */
  threshold?: number;
  /** Minimum token length. Default: 20 */
  minLength?: number;
}

const HEX = /^[0-9a-fA-F]+$/;

/** Shannon entropy in bits per character. */
export function shannonEntropy(token: string): number {
  if (token.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const ch of token) {
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }

  const len = token.length;
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / len;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

export class EntropyScorer {
  readonly threshold: number;
  readonly minLength: number;

  constructor(options: EntropyOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_ENTROPY_THRESHOLD;
    this.minLength = options.minLength ?? DEFAULT_MIN_TOKEN_LENGTH;
  }

  /** Bits per character, in [0, log2(alphabetSize)]. */
  score(token: string): number {
    return shannonEntropy(token);
  }

  alphabetSize(token: string): number {
    return HEX.test(token) ? 16 : 64;
  }

  maxPossibleEntropy(token: string): number {
    const distinct = Math.min(token.length, this.alphabetSize(token));
    return distinct > 1 ? Math.log2(distinct) : 0;
  }

  /** score / maxPossibleEntropy, in [0, 1]. */
  normalized(token: string): number {
    const max = this.maxPossibleEntropy(token);
    if (max === 0) return 0;
    return Math.min(1, this.score(token) / max);
  }

  isCandidateSecret(token: string): boolean {
    return token.length >= this.minLength && this.normalized(token) >= this.threshold;
  }
}

export default EntropyScorer;
