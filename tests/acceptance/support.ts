import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import type { SqlDatabase, SqlRow, SqlValue } from '../../src/domain/ports/SqlDatabase.js';

/** A throwaway directory with a `csv/` input folder and a database path beside it. */
export class Workspace {
  readonly root: string;
  readonly csvDir: string;
  readonly databasePath: string;

  constructor() {
    this.root = mkdtempSync(join(tmpdir(), 'csv-sqlite-loader-'));
    this.csvDir = join(this.root, 'csv');
    this.databasePath = join(this.root, 'data.sqlite');
    mkdirSync(this.csvDir);
  }

  write(fileName: string, content: string): string {
    const path = join(this.csvDir, fileName);
    writeFileSync(path, content, 'utf-8');
    return path;
  }

  delete(fileName: string): void {
    rmSync(join(this.csvDir, fileName));
  }

  query(sql: string): unknown[] {
    const db = new Database(this.databasePath);
    try {
      return db.prepare(sql).all();
    } finally {
      db.close();
    }
  }

  remove(): void {
    rmSync(this.root, { recursive: true, force: true });
  }
}

/** Delegates to a real database but fails every statement matching `pattern`. */
export class FailingDatabase implements SqlDatabase {
  readonly location: string;

  constructor(
    private readonly inner: SqlDatabase,
    private readonly pattern: RegExp,
    private readonly message: string,
  ) {
    this.location = inner.location;
  }

  exec(sql: string): void {
    this.guard(sql);
    this.inner.exec(sql);
  }

  runBatch(sql: string, rows: readonly (readonly SqlValue[])[]): number {
    this.guard(sql);
    return this.inner.runBatch(sql, rows);
  }

  query(sql: string): SqlRow[] {
    this.guard(sql);
    return this.inner.query(sql);
  }

  close(): void {
    this.inner.close();
  }

  private guard(sql: string): void {
    if (this.pattern.test(sql)) throw new Error(this.message);
  }
}
