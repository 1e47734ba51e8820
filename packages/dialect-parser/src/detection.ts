import { locateColumnHeader } from './line-classifier.js';
import { splitLines } from './page-segmenter.js';
import type { DialectRegistry } from './dialects/registry.js';
import type { DialectDescriptor } from './dialects/types.js';

/** A recognised column header outweighs any number of loose name mentions. */
const HEADER_WEIGHT = 3;

export interface DialectMatch {
  dialect: DialectDescriptor;
  score: number;
  indicatorHits: number;
  headerFound: boolean;
}

export function scoreDialect(text: string, dialect: DialectDescriptor): DialectMatch {
  const upper = text.toUpperCase();

  let indicatorHits = 0;
  for (const indicator of dialect.indicators) {
    if (upper.includes(indicator.toUpperCase())) {
      indicatorHits++;
    }
  }

  const headerFound = locateColumnHeader(splitLines(text), dialect) >= 0;

  return {
    dialect,
    score: indicatorHits + (headerFound ? HEADER_WEIGHT : 0),
    indicatorHits,
    headerFound,
  };
}

/**
 * Cheap pre-check: does the text name the institution or print its column header?
 */
export function validateStatementText(text: string, dialect: DialectDescriptor): boolean {
  return scoreDialect(text, dialect).score > 0;
}

/**
 * Best-scoring dialect for the text, or null when none matches at all.
 * Ties go to the dialect registered first.
 */
export function detectDialect(text: string, registry: DialectRegistry): DialectMatch | null {
  let best: DialectMatch | null = null;

  for (const dialect of registry.values()) {
    const match = scoreDialect(text, dialect);
    if (match.score > 0 && (best === null || match.score > best.score)) {
      best = match;
    }
  }

  return best;
}
