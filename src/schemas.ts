import { z } from 'zod';
import type { TableSettings } from './reconcile';

export const TableSettingsSchema = z
  .object({
    tables: z.record(z.string(), z.number().int('rank must be an integer')).nullish(),
    variables: z.record(z.string(), z.array(z.string()).nullable()).nullish(),
  })
  .passthrough();

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly zodError?: z.ZodError
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validates the parsed content of a settings file. An empty file, or a missing
 * section, reads as empty settings.
 *
 * @throws ValidationError
 */
export function validateSettings(raw: unknown, source = 'settings'): TableSettings {
  const result = TableSettingsSchema.safeParse(raw ?? {});

  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const field = firstIssue.path.join('.') || 'root';
    throw new ValidationError(`Invalid ${source}: ${field} - ${firstIssue.message}`, field, result.error);
  }

  const variables: TableSettings['variables'] = {};
  for (const [category, vars] of Object.entries(result.data.variables ?? {})) {
    variables[category] = vars ?? [];
  }

  return { tables: { ...result.data.tables }, variables };
}
