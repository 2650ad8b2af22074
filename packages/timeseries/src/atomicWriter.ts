import { randomBytes } from 'node:crypto';
import { constants, copyFile, mkdir, open, rename, rm } from 'node:fs/promises';
import path from 'node:path';

import { AtomicWriteError } from './errors';
import type { Table } from './table';
import { serializeTableLines } from './tableFile';

const FLUSH_THRESHOLD_BYTES = 64 * 1024;

export type LineSource = Iterable<string> | AsyncIterable<string>;

export type AtomicWriteResult = {
  path: string;
  bytes: number;
};

function tempPathFor(destination: string): string {
  const suffix = randomBytes(6).toString('hex');
  return path.join(path.dirname(destination), `.${path.basename(destination)}.${suffix}.tmp`);
}

/**
 * Stages content in a temporary sibling of `destination`, then renames it into
 * place. Readers only ever see the previous file or the complete new one; on
 * failure the temporary file is removed and the destination is left as it was.
 */
async function commitAtomically(
  destination: string,
  produce: (tempPath: string) => Promise<number>
): Promise<AtomicWriteResult> {
  const target = path.resolve(destination);
  const tempPath = tempPathFor(target);

  try {
    await mkdir(path.dirname(target), { recursive: true });
    const bytes = await produce(tempPath);
    await rename(tempPath, target);
    return { path: target, bytes };
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new AtomicWriteError(target, error);
  }
}

export async function writeLinesAtomic(destination: string, lines: LineSource): Promise<AtomicWriteResult> {
  return commitAtomically(destination, async (tempPath) => {
    const handle = await open(tempPath, 'wx');
    let bytes = 0;
    try {
      let pending = '';
      for await (const line of lines) {
        pending += `${line}\n`;
        if (pending.length >= FLUSH_THRESHOLD_BYTES) {
          bytes += (await handle.write(pending)).bytesWritten;
          pending = '';
        }
      }
      if (pending.length > 0) {
        bytes += (await handle.write(pending)).bytesWritten;
      }
      await handle.sync();
    } finally {
      await handle.close();
    }
    return bytes;
  });
}

export async function writeTableAtomic(destination: string, table: Table): Promise<AtomicWriteResult> {
  return writeLinesAtomic(destination, serializeTableLines(table));
}

export async function copyFileAtomic(source: string, destination: string): Promise<AtomicWriteResult> {
  return commitAtomically(destination, async (tempPath) => {
    await copyFile(source, tempPath, constants.COPYFILE_EXCL);
    const handle = await open(tempPath, 'r+');
    try {
      await handle.sync();
      return (await handle.stat()).size;
    } finally {
      await handle.close();
    }
  });
}
