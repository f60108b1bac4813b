import { readdir, stat } from 'fs/promises';
import { join, extname, normalize } from 'path';
import { STATEMENT_FILE_EXTENSIONS } from './constants.js';

export interface StatementFileInfo {
  filePath: string;
  fileName: string;
  sizeBytes: number;
}

export interface SkippedFile {
  fileName: string;
  reason: string;
}

export interface ScanResult {
  files: StatementFileInfo[];
  skipped: SkippedFile[];
  directoryPath: string;
}

/** Where a directory entry ends up in a scan */
export type EntryVerdict = { kind: 'statement' } | { kind: 'skip'; reason: string } | { kind: 'ignore' };

/**
 * Decide by name alone. Office lock files (`~$`) and dotfiles are skipped;
 * anything that is not a `.pdf` or `.txt` is not a statement at all.
 */
export function classifyStatementName(fileName: string): EntryVerdict {
  if (!STATEMENT_FILE_EXTENSIONS.includes(extname(fileName).toLowerCase())) {
    return { kind: 'ignore' };
  }
  if (fileName.startsWith('~$') || fileName.startsWith('.')) {
    return { kind: 'skip', reason: 'Temporary file (starts with ~$ or .)' };
  }
  return { kind: 'statement' };
}

/**
 * List the statements directly inside a directory (no recursion), sorted by
 * file name so runs over the same folder ingest in the same order.
 */
export async function scanStatementDirectory(directoryPath: string): Promise<ScanResult> {
  const root = normalize(directoryPath);
  const entries = await readdir(root, { withFileTypes: true });

  const result: ScanResult = { files: [], skipped: [], directoryPath: root };

  for (const entry of entries.filter((e) => e.isFile())) {
    const verdict = classifyStatementName(entry.name);
    if (verdict.kind === 'ignore') continue;
    if (verdict.kind === 'skip') {
      result.skipped.push({ fileName: entry.name, reason: verdict.reason });
      continue;
    }

    const filePath = join(root, entry.name);
    const { size } = await stat(filePath);
    if (size === 0) {
      result.skipped.push({ fileName: entry.name, reason: 'Zero-byte file' });
    } else {
      result.files.push({ filePath, fileName: entry.name, sizeBytes: size });
    }
  }

  result.files.sort((a, b) => a.fileName.localeCompare(b.fileName));
  return result;
}

const ACCESS_ERRORS: Record<string, string> = {
  ENOENT: 'Directory does not exist',
  EACCES: 'Permission denied',
  EPERM: 'Permission denied',
};

/**
 * Check that the input directory can be scanned before a run starts.
 */
export async function validateDirectory(directoryPath: string): Promise<{ valid: boolean; error?: string }> {
  const root = normalize(directoryPath);
  try {
    if (!(await stat(root)).isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${root}` };
    }
    return { valid: true };
  } catch (error) {
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : '';
    return { valid: false, error: `${ACCESS_ERRORS[code] ?? 'Cannot access directory'}: ${directoryPath}` };
  }
}
