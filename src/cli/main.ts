import { parseArgs } from 'node:util';
import { z } from 'zod';
import { CsvDirectoryLoader } from '../CsvDirectoryLoader.js';
import { DEFAULT_BATCH_SIZE, DEFAULT_DATABASE_PATH } from '../config/LoaderConfig.js';
import { DEFAULT_SAMPLE_SIZE } from '../domain/services/TypeInferrer.js';
import { isLoaderError } from '../errors.js';
import type { LineWriter } from './ConsoleReporter.js';
import { ConsoleReporter } from './ConsoleReporter.js';

export const USAGE = `Usage: csv-to-sqlite [options]

Import all CSV files from a directory into a SQLite database.

Options:
  --db <path>           SQLite database file to create/use (default: ${DEFAULT_DATABASE_PATH})
  --csv-dir <dir>       Directory containing CSV files (default: csv)
  --drop                Drop existing tables before import
  --detect-pk           Try to detect a primary key column
  --max-rows <n>        Maximum rows to import per file
  --skip-large <n>      Skip files with more than this many rows
  --batch-size <n>      Rows per insert transaction (default: ${String(DEFAULT_BATCH_SIZE)})
  --sample-size <n>     Rows sampled for type inference (default: ${String(DEFAULT_SAMPLE_SIZE)})
  --delimiter <char>    Field delimiter (default: ,)
  --extension <ext>     File extension to import (default: .csv)
  -h, --help            Show this help`;

const count = z.coerce.number().int().nonnegative();

const cliSchema = z.object({
  db: z.string().default(DEFAULT_DATABASE_PATH),
  'csv-dir': z.string().default('csv'),
  drop: z.boolean().default(false),
  'detect-pk': z.boolean().default(false),
  'max-rows': count.optional(),
  'skip-large': count.optional(),
  'batch-size': z.coerce.number().int().positive().optional(),
  'sample-size': z.coerce.number().int().positive().optional(),
  delimiter: z.string().optional(),
  extension: z.string().optional(),
  help: z.boolean().default(false),
});

export interface CliIO {
  readonly out: LineWriter;
  readonly err: LineWriter;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function readArgs(argv: readonly string[]): unknown {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      db: { type: 'string' },
      'csv-dir': { type: 'string' },
      drop: { type: 'boolean' },
      'detect-pk': { type: 'boolean' },
      'max-rows': { type: 'string' },
      'skip-large': { type: 'string' },
      'batch-size': { type: 'string' },
      'sample-size': { type: 'string' },
      delimiter: { type: 'string' },
      extension: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });
  return values;
}

/**
 * Run the command line. Resolves with the process exit code: 0 on success
 * (integrity violations included), 2 for a missing directory or bad options,
 * 1 for anything else.
 */
export async function main(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  let args: z.output<typeof cliSchema>;
  try {
    const parsed = cliSchema.safeParse(readArgs(argv));
    if (!parsed.success) {
      io.err(parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('\n'));
      io.err(USAGE);
      return 2;
    }
    args = parsed.data;
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    io.err(USAGE);
    return 2;
  }

  if (args.help) {
    io.out(USAGE);
    return 0;
  }

  try {
    const loader = new CsvDirectoryLoader({
      directory: args['csv-dir'],
      databasePath: args.db,
      dropExisting: args.drop,
      detectPrimaryKeys: args['detect-pk'],
      maxRows: args['max-rows'],
      skipLargerThan: args['skip-large'],
      batchSize: args['batch-size'],
      sampleSize: args['sample-size'],
      delimiter: args.delimiter,
      extension: args.extension,
    });

    const reporter = new ConsoleReporter(io.out);
    reporter.attach(loader);
    const report = await loader.run();
    reporter.printSummary(report);
    return 0;
  } catch (error) {
    if (isLoaderError(error)) {
      io.err(error.message);
      return 2;
    }
    io.err(error instanceof Error ? (error.stack ?? error.message) : String(error));
    return 1;
  }
}
