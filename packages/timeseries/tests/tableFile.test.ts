import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { test } from 'node:test';

import { parseTableText, readKeyColumn, readTableFile, serializeTable, Table, TableParseError } from '../src';

test('serializes the key column first and quotes awkward fields', () => {
  const table = new Table(['load', 'note']);
  table.insert('2024-01-01 00:00:00+06:00', [812.5, 'peak, evening']);
  table.insert('2024-01-01 01:00:00+06:00', ['', 'said "hi"']);

  assert.equal(
    serializeTable(table),
    [
      'date_time,load,note',
      '2024-01-01 00:00:00+06:00,812.5,"peak, evening"',
      '2024-01-01 01:00:00+06:00,,"said ""hi"""',
      ''
    ].join('\n')
  );
});

test('reports malformed records instead of failing the parse', () => {
  const parsed = parseTableText(
    ['date_time,load', '2024-01-01 00:00:00+06:00,1', '2024-01-01 01:00:00+06:00', ',7'].join('\n')
  );

  assert.equal(parsed.keyColumn, 'date_time');
  assert.deepEqual(parsed.schema, ['load']);
  assert.deepEqual(parsed.records, [
    { ok: true, rowIndex: 0, key: '2024-01-01 00:00:00+06:00', values: ['1'] },
    { ok: false, rowIndex: 1, reason: 'expected 2 fields, found 1' },
    { ok: false, rowIndex: 2, reason: 'missing timestamp' }
  ]);
});

test('rejects text without a header', () => {
  assert.throws(() => parseTableText('', 'empty.csv'), TableParseError);
  assert.throws(() => parseTableText('date_time,load,load\n'), TableParseError);
});

test('reads a table file and its raw key column', async (t) => {
  const dir = await mkdtemp(path.join(tmpdir(), 'loadgrid-table-'));
  t.after(() => rm(dir, { recursive: true, force: true }));
  const file = path.join(dir, 'data.csv');
  await writeFile(
    file,
    '\ufeffdate_time,load\n2024-01-01 00:00:00+06:00,1\n2024-01-01 01:00:00+06:00,2\n2024-01-01 00:00:00+06:00,3\n',
    'utf8'
  );

  const { table, duplicates, skipped } = await readTableFile(file);
  assert.deepEqual(table.keys(), ['2024-01-01 00:00:00+06:00', '2024-01-01 01:00:00+06:00']);
  assert.equal(table.value('2024-01-01 00:00:00+06:00', 'load'), '1');
  assert.deepEqual(duplicates, [{ key: '2024-01-01 00:00:00+06:00', occurrences: 2 }]);
  assert.deepEqual(skipped, []);

  assert.deepEqual(await readKeyColumn(file), [
    '2024-01-01 00:00:00+06:00',
    '2024-01-01 01:00:00+06:00',
    '2024-01-01 00:00:00+06:00'
  ]);
});
