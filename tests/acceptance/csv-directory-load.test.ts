import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { CsvDirectoryLoader } from '../../src/CsvDirectoryLoader.js';
import type { CsvDirectoryLoaderConfig } from '../../src/CsvDirectoryLoader.js';
import type { EventType } from '../../src/domain/events/DomainEvents.js';
import { Workspace } from './support.js';

const ALL_EVENTS: readonly EventType[] = [
  'run:started',
  'file:discovered',
  'file:skipped',
  'table:inspected',
  'primaryKey:skipped',
  'schema:resolved',
  'tables:dropped',
  'table:created',
  'batch:inserted',
  'table:loaded',
  'table:skipped',
  'index:created',
  'index:failed',
  'integrity:checked',
  'run:completed',
  'run:failed',
];

let ws: Workspace;

beforeEach(() => {
  ws = new Workspace();
});

afterEach(() => {
  ws.remove();
});

function createLoader(options?: Partial<CsvDirectoryLoaderConfig>): CsvDirectoryLoader {
  return new CsvDirectoryLoader({ directory: ws.csvDir, databasePath: ws.databasePath, ...options });
}

function writeAuthorsAndBooks(): void {
  ws.write('authors.csv', 'id,name\n1,Ada\n2,Grace\n');
  ws.write('books.csv', 'id,title,author_id\n1,Notes,1\n2,Compilers,2\n3,Orphan,99\n');
}

// ============================================================
// Authors and books: the end-to-end pipeline
// ============================================================
describe('Loading related tables', () => {
  it('should infer keys, load every row and flag the dangling reference', async () => {
    writeAuthorsAndBooks();

    const report = await createLoader({ detectPrimaryKeys: true }).run();

    expect(report.foreignKeys).toEqual([
      { table: 'books', column: 'author_id', referencedTable: 'authors', referencedColumn: 'id' },
    ]);
    expect(report.tables).toEqual([
      { tableName: 'authors', status: 'LOADED', rowsRead: 2, rowsInserted: 2, batches: 1, indexes: [], failedIndexes: [] },
      {
        tableName: 'books',
        status: 'LOADED',
        rowsRead: 3,
        rowsInserted: 3,
        batches: 1,
        indexes: ['idx_books_author_id'],
        failedIndexes: [],
      },
    ]);
    expect(report.integrity).toEqual({
      violations: [{ table: 'books', rowId: 3, parent: 'authors', foreignKeyId: 0 }],
      failures: [],
    });
    expect(report.summary).toMatchObject({
      files: 2,
      tablesLoaded: 2,
      tablesSkipped: 0,
      rowsInserted: 5,
      violations: 1,
    });
  });

  it('should create the inferred schema in the database', async () => {
    writeAuthorsAndBooks();

    await createLoader({ detectPrimaryKeys: true }).run();

    const columns = ws.query("SELECT name, type, pk FROM pragma_table_info('books') ORDER BY cid");
    expect(columns).toEqual([
      { name: 'id', type: 'INTEGER', pk: 1 },
      { name: 'title', type: 'TEXT', pk: 0 },
      { name: 'author_id', type: 'INTEGER', pk: 0 },
    ]);
    expect(ws.query("SELECT \"table\", \"from\", \"to\" FROM pragma_foreign_key_list('books')")).toEqual([
      { table: 'authors', from: 'author_id', to: 'id' },
    ]);
    expect(ws.query("SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'books'")).toEqual([
      { name: 'idx_books_author_id' },
    ]);
    expect(ws.query('SELECT id, name FROM authors ORDER BY id')).toEqual([
      { id: 1, name: 'Ada' },
      { id: 2, name: 'Grace' },
    ]);
  });

  it('should be idempotent when primary keys are detected', async () => {
    writeAuthorsAndBooks();

    await createLoader({ detectPrimaryKeys: true }).run();
    const second = await createLoader({ detectPrimaryKeys: true }).run();

    expect(second.tables.map((t) => [t.rowsRead, t.rowsInserted])).toEqual([
      [2, 0],
      [3, 0],
    ]);
    expect(ws.query('SELECT COUNT(*) AS n FROM books')).toEqual([{ n: 3 }]);
    expect(second.integrity.violations).toHaveLength(1);
  });

  it('should check tables left in the database by an earlier run', async () => {
    writeAuthorsAndBooks();
    await createLoader({ detectPrimaryKeys: true }).run();
    ws.delete('authors.csv');
    ws.delete('books.csv');
    ws.write('people.csv', 'id,name\n1,Ada\n');

    const report = await createLoader().run();

    expect(report.tables.map((t) => t.tableName)).toEqual(['people']);
    expect(report.integrity).toEqual({
      violations: [{ table: 'books', rowId: 3, parent: 'authors', foreignKeyId: 0 }],
      failures: [],
    });
    expect(report.summary.violations).toBe(1);
  });

  it('should check a table skipped for size when it already exists', async () => {
    writeAuthorsAndBooks();
    await createLoader({ detectPrimaryKeys: true }).run();

    const report = await createLoader({ detectPrimaryKeys: true, skipLargerThan: 2 }).run();

    expect(report.tables.map((t) => [t.tableName, t.status])).toEqual([
      ['authors', 'LOADED'],
      ['books', 'SKIPPED'],
    ]);
    expect(report.integrity.violations).toEqual([{ table: 'books', rowId: 3, parent: 'authors', foreignKeyId: 0 }]);
  });

  it('should reference a plural table and pass the check when every parent exists', async () => {
    ws.write('parts.csv', 'id,widget_id\n1,10\n2,11\n');
    ws.write('widgets.csv', 'id,label\n10,Bolt\n11,Nut\n');

    const report = await createLoader({ detectPrimaryKeys: true }).run();

    expect(report.foreignKeys).toEqual([
      { table: 'parts', column: 'widget_id', referencedTable: 'widgets', referencedColumn: 'id' },
    ]);
    expect(report.integrity).toEqual({ violations: [], failures: [] });
  });

  it('should declare no constraint when the referenced table is absent', async () => {
    ws.write('parts.csv', 'id,widget_id\n1,10\n');

    const report = await createLoader({ detectPrimaryKeys: true }).run();

    expect(report.foreignKeys).toEqual([]);
    expect(ws.query("SELECT * FROM pragma_foreign_key_list('parts')")).toEqual([]);
    expect(report.tables[0]?.indexes).toEqual(['idx_parts_widget_id']);
  });

  it('should index a bare _id column without resolving it to a table', async () => {
    ws.write('events.csv', '_id,name\n1,a\n');

    const report = await createLoader().run();

    expect(report.foreignKeys).toEqual([]);
    expect(report.tables[0]?.indexes).toEqual(['idx_events__id']);
    expect(ws.query("SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'events'")).toEqual([
      { name: 'idx_events__id' },
    ]);
  });

  it('should use overridden policies', async () => {
    writeAuthorsAndBooks();

    const report = await createLoader({
      detectPrimaryKeys: true,
      policies: { resolveReferencedTable: () => undefined },
    }).run();

    expect(report.foreignKeys).toEqual([]);
    expect(report.integrity.violations).toEqual([]);
  });
});

// ============================================================
// Row shaping and type coercion
// ============================================================
describe('Row shaping', () => {
  it('should pad short rows with NULL and drop extra fields', async () => {
    ws.write('ragged.csv', 'a,b,c\n1,2\n3,4,5,6\n');

    await createLoader().run();

    expect(ws.query('SELECT a, b, c FROM ragged ORDER BY rowid')).toEqual([
      { a: 1, b: 2, c: null },
      { a: 3, b: 4, c: 5 },
    ]);
  });

  it('should store typed values and NULL for empty fields', async () => {
    ws.write('items.csv', 'code,price,label,note\n1,2,x,\n2,2.5,y,\n');

    await createLoader().run();

    expect(ws.query("SELECT name, type FROM pragma_table_info('items') ORDER BY cid")).toEqual([
      { name: 'code', type: 'INTEGER' },
      { name: 'price', type: 'REAL' },
      { name: 'label', type: 'TEXT' },
      { name: 'note', type: 'INTEGER' },
    ]);
    expect(ws.query('SELECT code, price, label, note FROM items ORDER BY rowid')).toEqual([
      { code: 1, price: 2, label: 'x', note: null },
      { code: 2, price: 2.5, label: 'y', note: null },
    ]);
  });

  it('should insert values outside the sample window as raw text', async () => {
    ws.write('counts.csv', 'n\n1\nabc\n');

    await createLoader({ sampleSize: 1 }).run();

    expect(ws.query('SELECT n, typeof(n) AS t FROM counts ORDER BY rowid')).toEqual([
      { n: 1, t: 'integer' },
      { n: 'abc', t: 'text' },
    ]);
  });

  it('should sanitize and de-duplicate column names', async () => {
    ws.write('orders.csv', 'Order Date,2nd value,,name,name\n2024-01-01,a,b,c,d\n');

    await createLoader().run();

    expect(ws.query("SELECT name FROM pragma_table_info('orders') ORDER BY cid")).toEqual([
      { name: 'Order_Date' },
      { name: '_2nd_value' },
      { name: 'col_3' },
      { name: 'name' },
      { name: 'col_5' },
    ]);
  });
});

// ============================================================
// Options
// ============================================================
describe('Load options', () => {
  it('should stop each file after maxRows rows', async () => {
    ws.write('numbers.csv', 'n\n1\n2\n3\n4\n5\n');

    const report = await createLoader({ maxRows: 2, batchSize: 1 }).run();

    expect(report.tables[0]).toMatchObject({ rowsRead: 2, rowsInserted: 2, batches: 2 });
    expect(ws.query('SELECT n FROM numbers ORDER BY rowid')).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('should skip files with more rows than skipLargerThan', async () => {
    ws.write('big.csv', 'n\n1\n2\n3\n');
    ws.write('small.csv', 'n\n1\n2\n');
    const skipped: string[] = [];

    const loader = createLoader({ skipLargerThan: 2 });
    loader.on('table:skipped', (e) => skipped.push(`${e.tableName}: ${e.reason}`));
    const report = await loader.run();

    expect(skipped).toEqual(['big: file has more than 2 rows']);
    expect(report.tables.map((t) => [t.tableName, t.status])).toEqual([
      ['big', 'SKIPPED'],
      ['small', 'LOADED'],
    ]);
    expect(report.summary).toMatchObject({ tablesLoaded: 1, tablesSkipped: 1, rowsInserted: 2 });
    expect(ws.query("SELECT name FROM sqlite_master WHERE type = 'table'")).toEqual([{ name: 'small' }]);
  });

  it('should drop existing tables before loading when asked', async () => {
    ws.write('logs.csv', 'msg\na\nb\n');
    const dropped: string[][] = [];

    await createLoader().run();
    const loader = createLoader({ dropExisting: true });
    loader.on('tables:dropped', (e) => dropped.push([...e.tableNames]));
    await loader.run();

    expect(dropped).toEqual([['logs']]);
    expect(ws.query('SELECT COUNT(*) AS n FROM logs')).toEqual([{ n: 2 }]);
  });

  it('should append rows again when a table without a key is kept', async () => {
    ws.write('logs.csv', 'msg\na\nb\n');

    await createLoader().run();
    await createLoader().run();

    expect(ws.query('SELECT COUNT(*) AS n FROM logs')).toEqual([{ n: 4 }]);
  });

  it('should skip primary key detection above the row ceiling', async () => {
    ws.write('codes.csv', 'id\n1\n2\n');
    const reasons: string[] = [];

    const loader = createLoader({ detectPrimaryKeys: true, primaryKeyRowCeiling: 1 });
    loader.on('primaryKey:skipped', (e) => reasons.push(e.reason));
    await loader.run();

    expect(reasons).toEqual(['file has more than 1 rows']);
    expect(ws.query("SELECT pk FROM pragma_table_info('codes')")).toEqual([{ pk: 0 }]);
  });

  it('should honour a custom delimiter and extension', async () => {
    ws.write('prices.tsv', 'id\tprice\n1\t9.5\n');
    ws.write('ignored.csv', 'id\n1\n');

    const report = await createLoader({ delimiter: '\t', extension: 'tsv' }).run();

    expect(report.tables.map((t) => t.tableName)).toEqual(['prices']);
    expect(ws.query('SELECT id, price FROM prices')).toEqual([{ id: 1, price: 9.5 }]);
  });
});

// ============================================================
// Run lifecycle
// ============================================================
describe('Run lifecycle', () => {
  it('should emit events in pipeline order', async () => {
    ws.write('people.csv', 'id,name\n1,Ada\n');
    const events: string[] = [];

    const loader = createLoader();
    for (const type of ALL_EVENTS) {
      loader.on(type, (e) => events.push(e.type));
    }
    await loader.run();

    expect(events).toEqual([
      'run:started',
      'file:discovered',
      'table:inspected',
      'schema:resolved',
      'table:created',
      'batch:inserted',
      'table:loaded',
      'integrity:checked',
      'run:completed',
    ]);
    expect(loader.getStatus()).toBe('COMPLETED');
  });

  it('should tag every event with the run id', async () => {
    ws.write('people.csv', 'id,name\n1,Ada\n');
    const runIds = new Set<string>();

    const loader = createLoader();
    for (const type of ALL_EVENTS) {
      loader.on(type, (e) => runIds.add(e.runId));
    }
    const report = await loader.run();

    expect([...runIds]).toEqual([loader.getRunId()]);
    expect(report.runId).toBe(loader.getRunId());
  });

  it('should refuse to run twice', async () => {
    ws.write('people.csv', 'id\n1\n');
    const loader = createLoader();

    await loader.run();

    await expect(loader.run()).rejects.toThrow("Cannot run loader from status 'COMPLETED'");
  });

  it('should fail with DIRECTORY_NOT_FOUND and create no database', async () => {
    const failures: string[] = [];
    const loader = new CsvDirectoryLoader({ directory: `${ws.csvDir}-missing`, databasePath: ws.databasePath });
    loader.on('run:failed', (e) => failures.push(e.error));

    await expect(loader.run()).rejects.toMatchObject({ code: 'DIRECTORY_NOT_FOUND' });
    expect(loader.getStatus()).toBe('FAILED');
    expect(failures).toEqual([`CSV directory not found: ${ws.csvDir}-missing`]);
    expect(existsSync(ws.databasePath)).toBe(false);
  });

  it('should complete without a database when no files match', async () => {
    ws.write('notes.txt', 'not a table');

    const loader = createLoader();
    const report = await loader.run();

    expect(report.summary).toMatchObject({ files: 0, tablesLoaded: 0, rowsInserted: 0 });
    expect(report.tables).toEqual([]);
    expect(loader.getStatus()).toBe('COMPLETED');
    expect(existsSync(ws.databasePath)).toBe(false);
  });
});
