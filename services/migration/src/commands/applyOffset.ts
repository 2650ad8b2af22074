import {
  canonicalizeTimestamp,
  formatDelimitedLine,
  hasExplicitOffset,
  readDelimitedRows,
  writeLinesAtomic
} from '@loadgrid/timeseries';

export type ApplyOffsetResult = {
  output: string;
  rows: number;
  updated: number;
  alreadyTagged: number;
  unparseable: number;
};

/**
 * Tags first-column timestamps that carry no UTC offset with `offsetMinutes`
 * and rewrites them in canonical form. The header row and every other column
 * are copied unchanged; `output` may be the input file itself.
 */
export async function applyOffsetToFile(input: string, output: string, offsetMinutes: number): Promise<ApplyOffsetResult> {
  const [header, ...rows] = await readDelimitedRows(input);
  let updated = 0;
  let alreadyTagged = 0;
  let unparseable = 0;

  const rewritten = rows.map((fields) => {
    const [first = '', ...rest] = fields;
    if (hasExplicitOffset(first)) {
      alreadyTagged += 1;
      return fields;
    }
    const key = canonicalizeTimestamp(first, offsetMinutes);
    if (key === null) {
      unparseable += 1;
      return fields;
    }
    updated += 1;
    return [key, ...rest];
  });

  const lines = [header, ...rewritten].map((fields) => formatDelimitedLine(fields));
  const { path } = await writeLinesAtomic(output, lines);
  return { output: path, rows: rows.length, updated, alreadyTagged, unparseable };
}
