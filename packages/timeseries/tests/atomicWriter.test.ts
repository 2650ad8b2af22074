import assert from 'node:assert/strict';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { test, type TestContext } from 'node:test';

import { AtomicWriteError, copyFileAtomic, serializeTable, Table, writeLinesAtomic, writeTableAtomic } from '../src';

async function scratchDir(t: TestContext): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), 'loadgrid-atomic-'));
  t.after(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

test('writes a table and leaves no temporary files behind', async (t) => {
  const dir = await scratchDir(t);
  const table = new Table(['load']);
  table.insert('2024-01-01 00:00:00+06:00', [1]);
  const destination = path.join(dir, 'nested', 'out.csv');

  const result = await writeTableAtomic(destination, table);

  const content = await readFile(destination, 'utf8');
  assert.equal(content, serializeTable(table));
  assert.equal(result.bytes, Buffer.byteLength(content));
  assert.deepEqual(await readdir(path.dirname(destination)), ['out.csv']);
});

test('keeps the previous destination when the writer fails midway', async (t) => {
  const dir = await scratchDir(t);
  const destination = path.join(dir, 'out.csv');
  await writeFile(destination, 'previous\n', 'utf8');

  async function* failingLines(): AsyncGenerator<string> {
    yield 'date_time,load';
    throw new Error('disk unplugged');
  }

  await assert.rejects(writeLinesAtomic(destination, failingLines()), (error: unknown) => {
    assert.ok(error instanceof AtomicWriteError);
    assert.equal(error.destination, destination);
    assert.equal(error.message, `Failed to write ${destination}: disk unplugged`);
    return true;
  });
  assert.equal(await readFile(destination, 'utf8'), 'previous\n');
  assert.deepEqual(await readdir(dir), ['out.csv']);
});

test('copies a file over an existing destination', async (t) => {
  const dir = await scratchDir(t);
  const source = path.join(dir, 'source.csv');
  const destination = path.join(dir, 'final', 'data.csv');
  await writeFile(source, 'date_time,load\n', 'utf8');

  const result = await copyFileAtomic(source, destination);
  assert.equal(result.bytes, 15);
  assert.equal(await readFile(destination, 'utf8'), 'date_time,load\n');

  await writeFile(source, 'date_time,load,temp\n', 'utf8');
  await copyFileAtomic(source, destination);
  assert.equal(await readFile(destination, 'utf8'), 'date_time,load,temp\n');
  assert.deepEqual(await readdir(path.dirname(destination)), ['data.csv']);
});

test('settles a copy within a bounded time', async (t) => {
  const dir = await scratchDir(t);
  const source = path.join(dir, 'source.csv');
  await writeFile(source, 'x'.repeat(256 * 1024), 'utf8');

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), 2_000);
  });
  const outcome = await Promise.race([copyFileAtomic(source, path.join(dir, 'copy.csv')), deadline]);
  clearTimeout(timer);

  assert.notEqual(outcome, 'timeout');
  assert.deepEqual((await readdir(dir)).sort(), ['copy.csv', 'source.csv']);
});

test('fails without creating the destination when the source is missing', async (t) => {
  const dir = await scratchDir(t);
  const destination = path.join(dir, 'copy.csv');

  await assert.rejects(copyFileAtomic(path.join(dir, 'absent.csv'), destination), AtomicWriteError);
  assert.deepEqual(await readdir(dir), []);
});
