import assert from 'node:assert/strict';
import { readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';
import { readKeyColumn, validateTimeSeries } from '@loadgrid/timeseries';
import { PreflightError } from '../src/errors';
import { runMigration } from '../src/pipeline/migration';
import { pathExists } from '../src/pipeline/preflight';
import { createScratchDir, HOLIDAY_HEADER, LOAD_HEADER, silentLogger, testConfig, writeWorkbook } from './helpers';

async function seedInputs(root: string): Promise<void> {
  await writeWorkbook(path.join(root, 'loads', 'jan.xlsx'), {
    Sheet1: [
      LOAD_HEADER,
      ['2024-01-01 00:00', 100, 'Dhaka', 110],
      ['2024-01-01 01:00', 101, 'Dhaka', 111],
      ['2024-01-01 00:30', 5, 'Dhaka', 5]
    ]
  });
  await writeWorkbook(path.join(root, 'loads', 'sub', 'feb.xlsx'), {
    Sheet1: [
      LOAD_HEADER,
      ['2024-01-01 02:00', 102, 'Dhaka', 112],
      ['2024-01-01 01:00', 999, 'Dhaka', 999]
    ]
  });
  await writeWorkbook(path.join(root, 'loads', 'all_data.xlsx'), {
    Sheet1: [LOAD_HEADER, ['2024-01-01 03:00', 1, 'Dhaka', 1]]
  });
  await writeWorkbook(path.join(root, 'holidays.xlsx'), {
    'List of Holidays': [HOLIDAY_HEADER, ['2024-01-01', 'New Year', 'Mon', 3]]
  });
  await writeFile(
    path.join(root, 'weather.csv'),
    [
      'date_time,temp,rhum,wind_gust',
      '2024-01-01 00:00:00+06:00,20.5,70,9',
      '2024-01-01 01:00:00+06:00,20,72,8',
      '2024-01-01 03:00:00+06:00,19,75,7',
      ''
    ].join('\n'),
    'utf8'
  );
}

const csv = (rows: string[][]) => rows.map((row) => `${row.join(',')}\n`).join('');

const EXPECTED_FINAL = csv([
  [
    'date_time',
    'load',
    'is_holiday',
    'holiday_type',
    'national_event_type',
    'temp',
    'dwpt',
    'rhum',
    'prcp',
    'wdir',
    'wspd',
    'pres',
    'coco',
    'forecasted_load'
  ],
  ['2024-01-01 00:00:00+06:00', '100', '1', '3', '0', '20.5', '', '70', '', '', '', '', '', '110'],
  ['2024-01-01 01:00:00+06:00', '101', '1', '3', '0', '20', '', '72', '', '', '', '', '', '111'],
  ['2024-01-01 02:00:00+06:00', '102', '1', '3', '0', '', '', '', '', '', '', '', '', '112'],
  ['2024-01-01 03:00:00+06:00', '', '', '', '', '19', '', '75', '', '', '', '', '', '']
]);

test('migrates workbooks, holidays and weather into the final table', async (t) => {
  const root = await createScratchDir(t);
  await seedInputs(root);
  const config = testConfig(root);

  const result = await runMigration(config, silentLogger());

  assert.equal(result.ok, true, result.error?.message);
  assert.deepEqual(
    result.stages.map((stage) => [stage.name, stage.status, stage.rows]),
    [
      ['merge-spreadsheets', 'done', 3],
      ['enrich-holidays', 'done', 3],
      ['merge-weather', 'done', 4],
      ['finalize', 'done', 4]
    ]
  );
  assert.equal(
    await readFile(config.paths.masterFile, 'utf8'),
    csv([
      ['date_time', 'load', 'forecasted_load'],
      ['2024-01-01 00:00:00+06:00', '100', '110'],
      ['2024-01-01 01:00:00+06:00', '101', '111'],
      ['2024-01-01 02:00:00+06:00', '102', '112']
    ])
  );
  assert.equal(await readFile(config.paths.finalFile, 'utf8'), EXPECTED_FINAL);
  assert.deepEqual(result.warnings, [
    'Step 1: Dropped 1 row(s) with an off-grid timestamp',
    'Step 1: Removed 1 duplicate row(s) across 1 timestamp(s)',
    'Step 3: Columns absent from both inputs were filled with blanks: coco, dwpt, prcp, pres, wdir, wspd',
    'Step 3: Columns outside the canonical schema were dropped: wind_gust'
  ]);
  assert.deepEqual(
    result.artifacts.map((artifact) => path.basename(artifact.path)),
    ['master-data.csv', 'master-data-enriched.csv', 'merged_master_weather.csv', 'master_data_with_forecasted.csv']
  );
});

test('skips every stage on a second run and leaves outputs byte-identical', async (t) => {
  const root = await createScratchDir(t);
  await seedInputs(root);
  const config = testConfig(root);
  const { masterFile, enrichedFile, mergedFile, finalFile } = config.paths;
  const outputs = [masterFile, enrichedFile, mergedFile, finalFile];
  const snapshot = () => Promise.all(outputs.map((file) => readFile(file)));

  await runMigration(config, silentLogger());
  const first = await snapshot();
  const again = await runMigration(config, silentLogger());

  assert.equal(again.ok, true);
  assert.deepEqual(
    again.stages.map((stage) => stage.status),
    ['skipped', 'skipped', 'skipped', 'skipped']
  );
  assert.deepEqual(await snapshot(), first);

  const forced = await runMigration(testConfig(root, { force: true }), silentLogger());
  assert.deepEqual(
    forced.stages.map((stage) => stage.status),
    ['done', 'done', 'done', 'done']
  );
  assert.deepEqual(await snapshot(), first);
});

test('stores an instant written with a different offset under a single key', async (t) => {
  const root = await createScratchDir(t);
  await seedInputs(root);
  await writeWorkbook(path.join(root, 'loads', 'sub', 'feb.xlsx'), {
    Sheet1: [
      LOAD_HEADER,
      ['2024-01-01 00:00:00+00:00', 106, 'Dhaka', 116],
      ['2024-01-01 06:00', 999, 'Dhaka', 999]
    ]
  });
  await writeFile(path.join(root, 'weather.csv'), ['date_time,temp,rhum', '2024-01-01T00:00:00Z,21,60', ''].join('\n'));
  const config = testConfig(root);

  const result = await runMigration(config, silentLogger());

  assert.equal(result.ok, true, result.error?.message);
  const masterKeys = await readKeyColumn(config.paths.masterFile);
  assert.deepEqual(masterKeys, ['2024-01-01 00:00:00+06:00', '2024-01-01 01:00:00+06:00', '2024-01-01 06:00:00+06:00']);
  assert.equal(validateTimeSeries(masterKeys).duplicates.count, 0);
  assert.ok(result.warnings.includes('Step 1: Removed 1 duplicate row(s) across 1 timestamp(s)'));

  const finalLines = (await readFile(config.paths.finalFile, 'utf8')).split('\n');
  assert.equal(finalLines[3], '2024-01-01 06:00:00+06:00,106,1,3,0,21,,60,,,,,,116');
  assert.equal(finalLines.length, 5);
});

test('rebuilds only the stages whose outputs were removed', async (t) => {
  const root = await createScratchDir(t);
  await seedInputs(root);
  const config = testConfig(root);
  await runMigration(config, silentLogger());

  await rm(config.paths.mergedFile);
  await rm(config.paths.finalFile);
  const result = await runMigration(config, silentLogger());

  assert.deepEqual(
    result.stages.map((stage) => stage.status),
    ['skipped', 'skipped', 'done', 'done']
  );
  assert.equal(await readFile(config.paths.finalFile, 'utf8'), EXPECTED_FINAL);
});

test('writes nothing during a dry run', async (t) => {
  const root = await createScratchDir(t);
  await seedInputs(root);
  const config = testConfig(root, { dryRun: true });

  const result = await runMigration(config, silentLogger());

  assert.equal(result.ok, true);
  assert.deepEqual(
    result.stages.map((stage) => stage.status),
    ['planned', 'planned', 'planned', 'planned']
  );
  assert.deepEqual(result.stages[0].plan, [
    `would read 2 workbook(s) from ${config.paths.spreadsheetDir}`,
    `would write ${config.paths.masterFile}`
  ]);
  assert.equal(await pathExists(config.paths.workDir), false);
  assert.equal(await pathExists(config.paths.outputDir), false);
});

test('refuses to start when an external input is missing', async (t) => {
  const root = await createScratchDir(t);
  await seedInputs(root);
  await rm(path.join(root, 'weather.csv'));
  const config = testConfig(root);

  const result = await runMigration(config, silentLogger());

  assert.ok(result.error instanceof PreflightError);
  assert.deepEqual(result.error.problems, [
    `Weather table not found: ${config.paths.weatherFile} (run \`loadgrid fetch-weather\` first)`
  ]);
  assert.equal(await pathExists(config.paths.masterFile), false);
});

test('fails the first stage when no workbook yields data', async (t) => {
  const root = await createScratchDir(t);
  await seedInputs(root);
  await writeWorkbook(path.join(root, 'loads', 'jan.xlsx'), { Sheet1: [LOAD_HEADER, ['n/a', 1, 'Dhaka', 1]] });
  await writeWorkbook(path.join(root, 'loads', 'sub', 'feb.xlsx'), { Sheet1: [LOAD_HEADER] });
  const config = testConfig(root);

  const result = await runMigration(config, silentLogger());

  assert.equal(result.ok, false);
  assert.equal(result.error?.message, 'Step 1 (Merge load workbooks into the master table) failed: No data extracted from the load workbooks');
  assert.deepEqual(
    result.stages.map((stage) => stage.status),
    ['failed', 'pending', 'pending', 'pending']
  );
  assert.equal(await pathExists(config.paths.masterFile), false);
});
