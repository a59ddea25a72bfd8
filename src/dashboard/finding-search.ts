import Fuse from 'fuse.js';
import type { Finding } from '../shared/types.js';

export interface FindingSearchOptions {
  /** 0.0 = exact, 1.0 = match anything. Default: 0.4 */
  threshold?: number;
  /** Default: 100 */
  distance?: number;
  /** Default: 2 */
  minMatchCharLength?: number;
  /** Default: 50 */
  limit?: number;
}

export interface FindingSearchHit {
  finding: Readonly<Finding>;
  /** 0 is a perfect match. */
  score: number;
}

/**
 * Fuzzy search over finding paths, detector names and masked context.
 * Only redacted fields are indexed.
 */
export function searchFindings(
  findings: readonly Readonly<Finding>[],
  query: string,
  options: FindingSearchOptions = {}
): FindingSearchHit[] {
  const trimmed = query.trim();
  if (trimmed.length === 0) return [];

  const fuse = new Fuse(findings, {
    keys: [
      { name: 'filePath', weight: 2 },
      { name: 'detectorName', weight: 2 },
      { name: 'contextPreview', weight: 1 },
    ],
    threshold: options.threshold ?? 0.4,
    distance: options.distance ?? 100,
    minMatchCharLength: options.minMatchCharLength ?? 2,
    ignoreLocation: true,
    includeScore: true,
  });

  return fuse.search(trimmed, { limit: options.limit ?? 50 }).map(r => ({ finding: r.item, score: r.score ?? 0 }));
}
