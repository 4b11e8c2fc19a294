import { z } from 'zod';
import { invalidConfig } from '../errors.js';
import { DEFAULT_SAMPLE_SIZE } from '../domain/services/TypeInferrer.js';
import { DEFAULT_PRIMARY_KEY_ROW_CEILING } from '../domain/services/PrimaryKeyDetector.js';

export const DEFAULT_DATABASE_PATH = 'data.sqlite';
export const DEFAULT_BATCH_SIZE = 1000;

const positiveInt = z.number().int().positive();
const countLimit = z.number().int().nonnegative();

export const loaderConfigSchema = z.object({
  /** Directory holding the input files. */
  directory: z.string().min(1),
  /** SQLite file to create or update. Default: `data.sqlite`. */
  databasePath: z.string().min(1).default(DEFAULT_DATABASE_PATH),
  /** Drop every table about to be loaded before loading. Default: `false`. */
  dropExisting: z.boolean().default(false),
  /** Scan each file for a unique, non-empty column to use as primary key. Default: `false`. */
  detectPrimaryKeys: z.boolean().default(false),
  /** Stop reading a file after this many data rows. */
  maxRows: countLimit.optional(),
  /** Skip a file entirely when it has more data rows than this. */
  skipLargerThan: countLimit.optional(),
  /** Rows per insert transaction. Default: 1000. */
  batchSize: positiveInt.default(DEFAULT_BATCH_SIZE),
  /** Data rows sampled for type inference. Default: 1000. */
  sampleSize: positiveInt.default(DEFAULT_SAMPLE_SIZE),
  /** Files with more data rows than this are not scanned for a primary key. */
  primaryKeyRowCeiling: positiveInt.default(DEFAULT_PRIMARY_KEY_ROW_CEILING),
  /** Field delimiter, one character. Default: `,`. */
  delimiter: z.string().length(1).default(','),
  encoding: z.enum(['utf-8', 'utf8', 'latin1', 'ascii', 'utf16le']).default('utf-8'),
  /** File extension to pick up, matched case-insensitively. Default: `.csv`. */
  extension: z
    .string()
    .min(1)
    .default('.csv')
    .transform((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()),
});

/** Options as a caller writes them; everything but `directory` has a default. */
export type LoaderOptions = z.input<typeof loaderConfigSchema>;

/** Options after validation and defaults. */
export type LoaderSettings = z.output<typeof loaderConfigSchema>;

export function parseLoaderConfig(input: unknown): LoaderSettings {
  const parsed = loaderConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw invalidConfig(`Invalid loader configuration: ${issues.join('; ')}`, parsed.error.flatten());
  }
  return parsed.data;
}
