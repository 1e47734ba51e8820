import { matchPageBoundary } from './line-classifier.js';
import type { DialectDescriptor } from './dialects/types.js';

export interface PageSection {
  /** 1-based page number, taken from the marker when it prints one */
  readonly pageNumber: number;
  /** Raw lines of the page, marker lines included */
  readonly lines: readonly string[];
}

interface OpenSection {
  pageNumber: number;
  lines: string[];
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Split raw statement text into page sections.
 *
 * A start marker opens a new section. When the dialect only prints end markers,
 * the next non-blank line after each end marker opens the next one. Lines before
 * the first marker belong to page 1: they join the first section when it is page 1
 * and form a section of their own otherwise. Text with no markers at all is a
 * single page. Concatenating every section's lines gives back the input lines.
 */
export function segmentPages(text: string, dialect: DialectDescriptor): PageSection[] {
  const lines = splitLines(text);
  const hasStartMarkers = dialect.pageMarkers.some((rule) => rule.kind === 'start');

  const sections: OpenSection[] = [];
  const preamble: string[] = [];
  let current: OpenSection | null = null;
  let nextPageNumber = 1;
  let openAfterEnd = false;

  const open = (pageNumber: number): OpenSection => {
    const section: OpenSection = { pageNumber, lines: [] };
    sections.push(section);
    nextPageNumber = pageNumber + 1;
    return section;
  };

  for (const line of lines) {
    const boundary = matchPageBoundary(line, dialect);

    if (boundary !== null && boundary.boundary === 'start') {
      const pageNumber =
        boundary.pageNumber !== null && boundary.pageNumber > 0
          ? boundary.pageNumber
          : nextPageNumber;
      current = open(pageNumber);
      current.lines.push(line);
      openAfterEnd = false;
      continue;
    }

    if (openAfterEnd && line.trim() !== '') {
      current = open(nextPageNumber);
      openAfterEnd = false;
    }

    if (current === null && !hasStartMarkers && boundary !== null) {
      current = open(1);
      current.lines.push(...preamble.splice(0));
    }

    (current?.lines ?? preamble).push(line);

    if (boundary !== null && boundary.boundary === 'end' && !hasStartMarkers) {
      if (boundary.pageNumber !== null && boundary.pageNumber > 0) {
        nextPageNumber = boundary.pageNumber + 1;
      }
      openAfterEnd = true;
    }
  }

  const first = sections[0];
  if (first === undefined) {
    return [{ pageNumber: 1, lines: preamble }];
  }
  if (first.pageNumber > 1 && preamble.some((line) => line.trim() !== '')) {
    return [{ pageNumber: 1, lines: preamble }, ...sections];
  }
  first.lines.unshift(...preamble);

  return sections;
}
