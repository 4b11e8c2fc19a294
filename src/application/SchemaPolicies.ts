import type { SchemaPolicies } from '../domain/ports/SchemaPolicies.js';
import { sanitizeName } from '../domain/services/NameSanitizer.js';
import { classifyValue } from '../domain/services/TypeInferrer.js';
import { selectPrimaryKey } from '../domain/services/PrimaryKeyDetector.js';
import { resolveReferencedTable } from '../domain/services/ForeignKeyResolver.js';

export const defaultSchemaPolicies: SchemaPolicies = {
  sanitizeName,
  inferColumnType: classifyValue,
  selectPrimaryKey,
  resolveReferencedTable,
};

export function resolveSchemaPolicies(overrides?: Partial<SchemaPolicies>): SchemaPolicies {
  return { ...defaultSchemaPolicies, ...overrides };
}
