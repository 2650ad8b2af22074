import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

export type PreflightCheck = {
  description: string;
  /** Resolves to a problem description, or null when the check passes. */
  check(): Promise<string | null>;
};

async function statOrNull(target: string) {
  try {
    return await stat(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export async function pathExists(target: string): Promise<boolean> {
  return (await statOrNull(target)) !== null;
}

export async function fileSize(target: string): Promise<number | null> {
  const stats = await statOrNull(target);
  return stats?.isFile() ? stats.size : null;
}

export const WORKBOOK_EXTENSION = '.xlsx';
const EXCLUDED_WORKBOOK_MARKER = 'all_data';

export function isSourceWorkbook(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return lower.endsWith(WORKBOOK_EXTENSION) && !lower.includes(EXCLUDED_WORKBOOK_MARKER) && !fileName.startsWith('~$');
}

/** Source workbooks below `directory`, recursively, in sorted path order. */
export async function listWorkbooks(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { recursive: true, withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isSourceWorkbook(entry.name))
    .map((entry) => path.join(entry.parentPath ?? entry.path, entry.name))
    .sort();
}

export function fileCheck(description: string, target: string, hint?: string): PreflightCheck {
  return {
    description,
    async check() {
      const stats = await statOrNull(target);
      if (!stats) {
        return `${description} not found: ${target}${hint ? ` (${hint})` : ''}`;
      }
      return stats.isFile() ? null : `${description} is not a file: ${target}`;
    }
  };
}

export function workbookDirectoryCheck(description: string, directory: string): PreflightCheck {
  return {
    description,
    async check() {
      const stats = await statOrNull(directory);
      if (!stats?.isDirectory()) {
        return `${description} not found: ${directory}`;
      }
      const workbooks = await listWorkbooks(directory);
      return workbooks.length > 0 ? null : `${description} contains no ${WORKBOOK_EXTENSION} workbooks: ${directory}`;
    }
  };
}

export async function runPreflightChecks(checks: readonly PreflightCheck[]): Promise<string[]> {
  const problems: string[] = [];
  for (const entry of checks) {
    const problem = await entry.check();
    if (problem) {
      problems.push(problem);
    }
  }
  return problems;
}
