import type { CsvDirectoryLoader } from '../CsvDirectoryLoader.js';
import type { LoadReport } from '../domain/model/LoadReport.js';

export type LineWriter = (line: string) => void;

/** Prints one line per pipeline event. */
export class ConsoleReporter {
  constructor(private readonly write: LineWriter = (line) => console.log(line)) {}

  attach(loader: CsvDirectoryLoader): void {
    loader
      .on('run:started', (e) => this.write(`Creating/opening SQLite DB at: ${e.databasePath}`))
      .on('file:skipped', (e) => this.write(`  Skipping ${e.file.fileName}: ${e.reason}`))
      .on('primaryKey:skipped', (e) => this.write(`  Skipping PK detection for '${e.tableName}': ${e.reason}`))
      .on('table:inspected', (e) => {
        const columns = e.table.columns.map((c) => `${c.name} ${c.type}`).join(', ');
        const pk = e.table.primaryKeyDetected && e.table.primaryKey ? ` [pk: ${e.table.primaryKey}]` : '';
        this.write(`Inspected '${e.table.source.fileName}' -> table '${e.table.tableName}' (${columns})${pk}`);
      })
      .on('schema:resolved', (e) => {
        for (const fk of e.foreignKeys) {
          this.write(`  Foreign key ${fk.table}.${fk.column} -> ${fk.referencedTable}.${fk.referencedColumn}`);
        }
      })
      .on('tables:dropped', (e) => this.write(`Dropped ${String(e.tableNames.length)} existing table(s)`))
      .on('table:created', (e) => this.write(`Importing -> table '${e.tableName}'`))
      .on('table:skipped', (e) => this.write(`  Skipping large file for '${e.tableName}': ${e.reason}`))
      .on('table:loaded', (e) =>
        this.write(`  Inserted ${String(e.result.rowsInserted)} of ${String(e.result.rowsRead)} rows into '${e.result.tableName}'`),
      )
      .on('index:created', (e) => this.write(`  Created index ${e.indexName} on ${e.column}`))
      .on('index:failed', (e) => this.write(`  Failed to create index on ${e.column}: ${e.error}`));
  }

  /** Final summary, with every integrity violation on its own line. */
  printSummary(report: LoadReport): void {
    const { summary, integrity } = report;

    if (summary.files === 0) {
      this.write(`No CSV files found in ${report.directory}`);
      return;
    }

    this.write('');
    if (integrity.violations.length > 0) {
      this.write('Foreign key check found violations:');
      for (const v of integrity.violations) {
        this.write(
          `  Table ${v.table} rowid=${v.rowId === null ? 'null' : String(v.rowId)} references missing parent in ${v.parent} (fk=${String(v.foreignKeyId)})`,
        );
      }
    } else {
      this.write('Foreign key check passed: no violations');
    }
    for (const failure of integrity.failures) {
      this.write(`  Could not check table ${failure.table}: ${failure.error}`);
    }

    this.write(
      `Loaded ${String(summary.tablesLoaded)} table(s), skipped ${String(summary.tablesSkipped)}, ` +
        `${String(summary.rowsInserted)} row(s) inserted in ${String(summary.elapsedMs)}ms`,
    );
  }
}
