import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import { main, USAGE } from '../../../src/cli/main.js';
import type { CliIO } from '../../../src/cli/main.js';

const TEST_DIR = join(tmpdir(), 'csv-sqlite-loader-test-cli');
const CSV_DIR = join(TEST_DIR, 'csv');

beforeAll(() => {
  mkdirSync(CSV_DIR, { recursive: true });
  writeFileSync(join(CSV_DIR, 'authors.csv'), 'id,name\n1,Ada\n2,Grace\n', 'utf-8');
  writeFileSync(join(CSV_DIR, 'books.csv'), 'id,title,author_id\n1,Notes,1\n2,Compilers,2\n3,Orphan,99\n', 'utf-8');
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function capture(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

describe('main', () => {
  it('should print usage and exit 0 for --help', async () => {
    const io = capture();

    expect(await main(['--help'], io)).toBe(0);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('should exit 2 on an unknown option', async () => {
    const io = capture();

    expect(await main(['--bogus'], io)).toBe(2);
    expect(io.stderr[io.stderr.length - 1]).toBe(USAGE);
  });

  it('should exit 2 on a non-numeric row limit', async () => {
    const io = capture();

    expect(await main(['--max-rows', 'abc'], io)).toBe(2);
    expect(io.stderr[0]).toMatch(/^--max-rows: /);
  });

  it('should exit 2 when the CSV directory is missing', async () => {
    const io = capture();
    const missing = join(TEST_DIR, 'missing');

    expect(await main(['--csv-dir', missing, '--db', join(TEST_DIR, 'missing.sqlite')], io)).toBe(2);
    expect(io.stderr).toEqual([`CSV directory not found: ${missing}`]);
  });

  it('should load the directory, report violations and exit 0', async () => {
    const io = capture();
    const dbPath = join(TEST_DIR, 'cli.sqlite');

    const code = await main(['--csv-dir', CSV_DIR, '--db', dbPath, '--detect-pk', '--batch-size', '2'], io);

    expect(code).toBe(0);
    expect(io.stderr).toEqual([]);
    expect(io.stdout).toContain('  Foreign key books.author_id -> authors.id');
    expect(io.stdout).toContain('  Created index idx_books_author_id on author_id');
    expect(io.stdout).toContain('Foreign key check found violations:');
    expect(io.stdout).toContain('  Table books rowid=3 references missing parent in authors (fk=0)');

    const db = new Database(dbPath);
    try {
      expect(db.prepare('SELECT COUNT(*) AS n FROM books').get()).toEqual({ n: 3 });
    } finally {
      db.close();
    }
  });
});
