// Runtime validators for external data at the parse boundary.
// Upload checks are warn-only: issues are logged but don't block loads.

import { z } from 'zod';
import { SATISFACTION_MAX, SATISFACTION_MIN } from './constants';
import type { ColumnMapping } from './types';

export interface ValidationResult {
  valid: boolean;
  issues: string[];
}

function fromZodResult(result: {
  success: boolean;
  error?: { issues: Array<{ path: PropertyKey[]; message: string }> };
}): ValidationResult {
  if (result.success) return { valid: true, issues: [] };
  const issues = (result.error?.issues ?? []).map((i) => `${i.path.map(String).join('.')}: ${i.message}`);
  return { valid: false, issues };
}

// ============================================================================
// Config schemas
// ============================================================================

const canonicalFieldSchema = z.enum(['centre', 'program', 'date', 'participants', 'satisfaction', 'category']);

export const columnMappingSchema = z
  .object({
    candidate: z.string().trim().min(1).max(256),
    field: canonicalFieldSchema
  })
  .strict();

export const columnMappingsSchema = z.array(columnMappingSchema).min(1);

export const normalizationDefaultsSchema = z
  .object({
    centre: z.string().min(1).max(256),
    program: z.string().min(1).max(256),
    category: z.string().min(1).max(256),
    participants: z.number().int().nonnegative(),
    satisfaction: z.number().min(SATISFACTION_MIN).max(SATISFACTION_MAX)
  })
  .strict();

export const appConfigFieldSchemas = {
  dataPath: z.string().min(1),
  columnMappings: columnMappingsSchema,
  defaults: normalizationDefaultsSchema,
  topN: z.number().int().positive(),
  previewRows: z.number().int().positive()
};

const configPatchSchema = z
  .object({
    dataPath: appConfigFieldSchemas.dataPath.optional(),
    columnMappings: appConfigFieldSchemas.columnMappings.optional(),
    defaults: normalizationDefaultsSchema.partial().optional(),
    topN: appConfigFieldSchemas.topN.optional(),
    previewRows: appConfigFieldSchemas.previewRows.optional()
  })
  .strict();

export type ConfigPatchInput = z.infer<typeof configPatchSchema>;

/** Parse a config patch, throwing a ZodError when it does not fit the schema */
export function parseConfigPatch(data: unknown): ConfigPatchInput {
  return configPatchSchema.parse(data);
}

/** Validate a config patch (CLI `config --set` or programmatic update) */
export function validateConfigPatch(data: unknown): ValidationResult {
  return fromZodResult(configPatchSchema.safeParse(data));
}

// ============================================================================
// Upload shape
// ============================================================================

/**
 * Check that an uploaded table carries at least one column the normalizer
 * knows. A table with none still loads; every record takes the fallbacks.
 */
export function validateUploadHeaders(headers: readonly string[], mappings: readonly ColumnMapping[]): ValidationResult {
  if (headers.length === 0) {
    return { valid: false, issues: ['table has no header row'] };
  }
  const known = new Set(mappings.map((m) => m.candidate));
  if (headers.some((h) => known.has(h))) return { valid: true, issues: [] };
  return { valid: false, issues: [`no recognised columns among: ${headers.join(', ')}`] };
}
