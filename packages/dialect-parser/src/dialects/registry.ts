import type { DialectDescriptor } from './types.js';
import { HDFC_DIALECT } from './hdfc.js';
import { ICICI_DIALECT } from './icici.js';

/** Institution key → descriptor. Built once and passed explicitly into the pipeline. */
export type DialectRegistry = ReadonlyMap<string, DialectDescriptor>;

export const BUILT_IN_DIALECTS: readonly DialectDescriptor[] = Object.freeze([
  HDFC_DIALECT,
  ICICI_DIALECT,
]);

export function createDialectRegistry(
  dialects: readonly DialectDescriptor[] = BUILT_IN_DIALECTS
): DialectRegistry {
  const entries = new Map<string, DialectDescriptor>();
  for (const dialect of dialects) {
    const key = dialect.key.toLowerCase();
    if (entries.has(key)) {
      throw new Error(`Duplicate dialect key: ${dialect.key}`);
    }
    entries.set(key, dialect);
  }
  return entries;
}

export function listDialectKeys(registry: DialectRegistry): string[] {
  return [...registry.keys()];
}

export function getDialect(registry: DialectRegistry, key: string): DialectDescriptor {
  const dialect = registry.get(key.trim().toLowerCase());
  if (dialect === undefined) {
    throw new Error(
      `Unsupported dialect: ${key}. Supported: ${listDialectKeys(registry).join(', ')}`
    );
  }
  return dialect;
}
