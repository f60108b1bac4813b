import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { classifyStatementName, scanStatementDirectory, validateDirectory } from '../../src/utils/directory-scanner.js';

describe('directory-scanner', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `ledger-scan-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('validateDirectory', () => {
    it('should return valid for existing directory', async () => {
      const result = await validateDirectory(testDir);
      expect(result.valid).toBe(true);
      expect(result.error).toBeUndefined();
    });

    it('should return invalid for non-existent directory', async () => {
      const result = await validateDirectory(join(testDir, 'nonexistent'));
      expect(result.valid).toBe(false);
      expect(result.error).toContain('does not exist');
    });

    it('should return invalid for file path', async () => {
      const filePath = join(testDir, 'file.txt');
      await writeFile(filePath, 'test');
      const result = await validateDirectory(filePath);
      expect(result.valid).toBe(false);
      expect(result.error).toContain('not a directory');
    });
  });

  describe('scanStatementDirectory', () => {
    it('should find pdf and txt statements sorted by file name', async () => {
      await writeFile(join(testDir, '2024-02-statement.pdf'), 'content');
      await writeFile(join(testDir, '2024-01-statement.txt'), 'content');
      await writeFile(join(testDir, 'notes.md'), 'not a statement');

      const result = await scanStatementDirectory(testDir);

      expect(result.files.map((f) => f.fileName)).toEqual(['2024-01-statement.txt', '2024-02-statement.pdf']);
      expect(result.files[0]?.filePath).toBe(join(testDir, '2024-01-statement.txt'));
      expect(result.files[0]?.sizeBytes).toBe(7);
    });

    it('should match extensions case-insensitively', async () => {
      await writeFile(join(testDir, 'STATEMENT.PDF'), 'content');

      const result = await scanStatementDirectory(testDir);
      expect(result.files).toHaveLength(1);
    });

    it('should skip temporary and zero-byte files', async () => {
      await writeFile(join(testDir, '~$lock.pdf'), 'content');
      await writeFile(join(testDir, '.hidden.txt'), 'content');
      await writeFile(join(testDir, 'empty.txt'), '');
      await writeFile(join(testDir, 'valid.txt'), 'content');

      const result = await scanStatementDirectory(testDir);

      expect(result.files.map((f) => f.fileName)).toEqual(['valid.txt']);
      expect(result.skipped).toHaveLength(3);
      expect(result.skipped.find((s) => s.fileName === 'empty.txt')?.reason).toBe('Zero-byte file');
      expect(result.skipped.find((s) => s.fileName === '~$lock.pdf')?.reason).toBe(
        'Temporary file (starts with ~$ or .)'
      );
    });

    it('should not descend into subdirectories', async () => {
      await mkdir(join(testDir, 'archive'));
      await writeFile(join(testDir, 'archive', 'old.txt'), 'content');

      const result = await scanStatementDirectory(testDir);
      expect(result.files).toHaveLength(0);
    });
  });

  describe('classifyStatementName', () => {
    it('should tell statements, skipped files and other files apart', () => {
      expect(classifyStatementName('2024-01-statement.PDF')).toEqual({ kind: 'statement' });
      expect(classifyStatementName('.2024-01.txt')).toEqual({
        kind: 'skip',
        reason: 'Temporary file (starts with ~$ or .)',
      });
      expect(classifyStatementName('~$notes.md')).toEqual({ kind: 'ignore' });
    });
  });
});
