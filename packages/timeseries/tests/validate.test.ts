import assert from 'node:assert/strict';
import { test } from 'node:test';

import { KeyFormatError, validateTimeSeries } from '../src';

const hour = (value: number) => `2024-01-01 ${String(value).padStart(2, '0')}:00:00+06:00`;

test('counts each duplicated timestamp once with its occurrences', () => {
  const report = validateTimeSeries([hour(0), hour(1), hour(0), hour(2)]);

  assert.equal(report.totalRows, 4);
  assert.equal(report.uniqueTimestamps, 3);
  assert.equal(report.duplicates.count, 1);
  assert.deepEqual(report.duplicates.entries, [{ key: hour(0), occurrences: 2, rowIndices: [0, 2] }]);
  assert.equal(report.missing.count, 0);
  assert.equal(report.passed, false);
});

test('lists grid hours absent from the data', () => {
  const report = validateTimeSeries([hour(0), hour(1), hour(3)]);

  assert.equal(report.start, hour(0));
  assert.equal(report.end, hour(3));
  assert.equal(report.expectedCount, 4);
  assert.deepEqual(report.missing.keys, [hour(2)]);
  assert.deepEqual(report.extra.keys, []);
  assert.equal(report.passed, false);
});

test('passes an empty key stream', () => {
  const report = validateTimeSeries([]);

  assert.equal(report.totalRows, 0);
  assert.equal(report.uniqueTimestamps, 0);
  assert.equal(report.expectedCount, 0);
  assert.equal(report.start, null);
  assert.equal(report.end, null);
  assert.equal(report.duplicates.count, 0);
  assert.equal(report.missing.count, 0);
  assert.equal(report.passed, true);
});

test('reports off-grid timestamps as extra without failing', () => {
  const report = validateTimeSeries([hour(0), '2024-01-01 00:30:00+06:00', hour(1)]);

  assert.deepEqual(report.extra.keys, ['2024-01-01 00:30:00+06:00']);
  assert.equal(report.expectedCount, 2);
  assert.equal(report.passed, true);
});

test('honours a finer grid step', () => {
  const report = validateTimeSeries([hour(0), '2024-01-01 00:30:00+06:00', hour(1)], { gridStepMs: 15 * 60_000 });

  assert.deepEqual(report.missing.keys, ['2024-01-01 00:15:00+06:00', '2024-01-01 00:45:00+06:00']);
  assert.deepEqual(report.extra.keys, []);
});

test('flags keys outside a supplied range', () => {
  const report = validateTimeSeries([hour(0), hour(1), hour(2)], { range: { start: hour(1), end: hour(2) } });

  assert.deepEqual(report.outOfRange.keys, [hour(0)]);
  assert.throws(() => validateTimeSeries([hour(0)], { range: { start: 'soon', end: hour(2) } }), KeyFormatError);
});

test('sets aside unparseable keys', () => {
  const report = validateTimeSeries(['not-a-time', hour(0), hour(1)]);

  assert.deepEqual(report.invalid.entries, [{ rowIndex: 0, value: 'not-a-time' }]);
  assert.equal(report.uniqueTimestamps, 2);
  assert.equal(report.passed, true);
});

test('treats the same instant in different offsets as a duplicate', () => {
  const report = validateTimeSeries([hour(6), '2024-01-01 00:00:00Z']);

  assert.deepEqual(report.duplicates.entries, [{ key: hour(6), occurrences: 2, rowIndices: [0, 1] }]);
});
