import type { DialectDefinition, DialectDescriptor, DialectPatterns } from './types.js';

function compilePatterns(definition: DialectDefinition): DialectPatterns {
  const date = definition.dateSource;

  return Object.freeze({
    datePrefix: new RegExp(`^(${date})(?![\\d/\\-.])\\s*(.*)$`),
    referenceWithDate: new RegExp(`^((?=[A-Z0-9]*\\d)[A-Z0-9]{6,})\\s*(${date})$`),
    dateFragment: new RegExp(date),
    trailingDate: new RegExp(`\\s*${date}$`),
    leadingDate: new RegExp(`^${date}\\s*`),
    pageMarkers: Object.freeze(
      definition.pageMarkers.map((rule) =>
        Object.freeze({
          rule,
          line: new RegExp(`^${rule.source}$`, 'i'),
          embedded: new RegExp(rule.source, 'i'),
          embeddedAll: new RegExp(`\\s*${rule.source}\\s*`, 'gi'),
        })
      )
    ),
  });
}

/**
 * Build an immutable descriptor from a plain definition, compiling its patterns once.
 * Only `embeddedAll` is global, and it is only ever passed to `String.prototype.replace`.
 */
export function defineDialect(definition: DialectDefinition): DialectDescriptor {
  return Object.freeze({
    ...definition,
    indicators: Object.freeze([...definition.indicators]),
    pageMarkers: Object.freeze([...definition.pageMarkers]),
    headerLabels: Object.freeze([...definition.headerLabels]),
    headerColumnOrder: Object.freeze([...definition.headerColumnOrder]),
    modeKeywords: Object.freeze([...definition.modeKeywords]),
    modeLabels: Object.freeze([...definition.modeLabels]),
    openingBalanceModes: Object.freeze([...definition.openingBalanceModes]),
    debitKeywords: Object.freeze([...definition.debitKeywords]),
    layout: Object.freeze({ ...definition.layout }),
    summaryMarkers: Object.freeze([...definition.summaryMarkers]),
    footerPhrases: Object.freeze([...definition.footerPhrases]),
    footerWords: Object.freeze([...definition.footerWords]),
    patterns: compilePatterns(definition),
  });
}
