import type { z } from 'zod';

import { DataValidationError } from '@/engine/errors';

/** Readable label for a raw catalog entry: its id when it has one, else its position. */
export function entryLabel(kind: string, raw: unknown, index: number): string {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'number') {
    return `${kind} ${raw.id}`;
  }
  return `${kind} #${index + 1}`;
}

export function formatIssues(label: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join('.');
    return field ? `${label} ${field}: ${issue.message}` : `${label}: ${issue.message}`;
  });
}

/**
 * Parse every entry of a raw catalog with `schema`, then run the cross-entry
 * uniqueness checks. Throws a single {@link DataValidationError} carrying all
 * issues; nothing is returned unless the whole catalog is clean.
 */
export function parseCatalog<T>(
  source: string,
  kind: string,
  raw: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  uniqueFields: ReadonlyArray<{ label: string; pick: (entry: T) => string | number }>,
): T[] {
  if (!Array.isArray(raw)) {
    throw new DataValidationError(source, [`${source} data must be a list`]);
  }

  const issues: string[] = [];
  const parsed: T[] = [];

  raw.forEach((entry: unknown, index) => {
    const result = schema.safeParse(entry);
    if (result.success) {
      parsed.push(result.data);
    } else {
      issues.push(...formatIssues(entryLabel(kind, entry, index), result.error));
    }
  });

  for (const field of uniqueFields) {
    const seen = new Set<string | number>();
    for (const entry of parsed) {
      const value = field.pick(entry);
      if (seen.has(value)) {
        issues.push(`Duplicate ${field.label}: ${value}`);
      }
      seen.add(value);
    }
  }

  if (issues.length > 0) {
    throw new DataValidationError(source, issues);
  }
  return parsed;
}
