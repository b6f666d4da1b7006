/**
 * Editor configuration
 *
 * Resolution order: defaults < environment (GRIDSKETCH_*) < CLI flags.
 * The merged result is validated once, before the UI starts.
 */

import { z } from 'zod';

export const DEFAULT_EXPORT_WIDTH = 79;

export const EditorConfigSchema = z.object({
  /** Directory holding `<title>.json` / `<title>.txt` */
  directory: z.string().min(1, 'Directory must not be empty'),
  /** Columns of the plain-text export */
  exportWidth: z.coerce
    .number({ invalid_type_error: 'Export width must be a number' })
    .int('Export width must be a whole number')
    .min(1, 'Export width must be at least 1')
    .max(1000, 'Export width must be at most 1000'),
  debug: z.boolean(),
});

export type EditorConfig = z.infer<typeof EditorConfigSchema>;

export interface ConfigOverrides {
  directory?: string;
  exportWidth?: string | number;
  debug?: boolean;
}

export class EditorConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EditorConfigError';
  }
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return TRUTHY.has(value.trim().toLowerCase());
}

/** @throws EditorConfigError when a value is out of range or malformed */
export function resolveEditorConfig(
  env: Record<string, string | undefined>,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd()
): EditorConfig {
  const candidate = {
    directory: overrides.directory ?? env.GRIDSKETCH_DIR ?? cwd,
    exportWidth: overrides.exportWidth ?? env.GRIDSKETCH_EXPORT_WIDTH ?? DEFAULT_EXPORT_WIDTH,
    debug: overrides.debug ?? parseFlag(env.GRIDSKETCH_DEBUG) ?? false,
  };

  const result = EditorConfigSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new EditorConfigError(`[editorConfig] Invalid configuration: ${details}`);
  }
  return result.data;
}
