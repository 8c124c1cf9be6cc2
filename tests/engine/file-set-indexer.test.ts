import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  extractBankId,
  indexFileNames,
  listBankFilesByType,
  scanBankFiles,
  validateDirectory,
} from '@bankrecon/engine';

describe('file-set-indexer', () => {
  describe('extractBankId', () => {
    it('should read the 4-digit code after .B', () => {
      expect(extractBankId('X.B1234.A.CSV')).toBe('1234');
      expect(extractBankId('KUNDE.EXPORT.B0042.RETAIL.CSV.BM')).toBe('0042');
    });

    it('should reject codes that are not exactly 4 digits', () => {
      expect(extractBankId('X.B123.A.CSV')).toBeUndefined();
      expect(extractBankId('X.B12345.A.CSV')).toBeUndefined();
      expect(extractBankId('README.txt')).toBeUndefined();
    });
  });

  describe('indexFileNames', () => {
    it('should group names by bank and drop names without a code', () => {
      const index = indexFileNames(['b.B1234.Z.CSV', 'a.B1234.A.CSV', 'README.txt', 'c.B5678.A.CSV']);

      expect([...index.keys()]).toEqual(['1234', '5678']);
      expect(index.get('1234')).toEqual(['a.B1234.A.CSV', 'b.B1234.Z.CSV']);
      expect(index.get('5678')).toEqual(['c.B5678.A.CSV']);
    });

    it('should return an empty index when nothing matches', () => {
      expect(indexFileNames(['notes.txt', 'data.csv']).size).toBe(0);
    });
  });

  describe('listBankFilesByType', () => {
    const index = indexFileNames([
      'X.B1234.A.CSV',
      'X.B1234.A.CSV.BM',
      'X.B1234.OBS.CSV',
      'X.B1234.Zobs.CSV',
    ]);

    it('should select PM files and skip OBS-marked files', () => {
      expect(listBankFilesByType(index, '1234', '.CSV')).toEqual(['X.B1234.A.CSV']);
    });

    it('should select BM files by their own extension', () => {
      expect(listBankFilesByType(index, '1234', '.CSV.BM')).toEqual(['X.B1234.A.CSV.BM']);
    });

    it('should keep OBS files when asked to', () => {
      expect(listBankFilesByType(index, '1234', '.CSV', { excludeObs: false })).toEqual([
        'X.B1234.A.CSV',
        'X.B1234.OBS.CSV',
        'X.B1234.Zobs.CSV',
      ]);
    });

    it('should return nothing for an unknown bank', () => {
      expect(listBankFilesByType(index, '9999', '.CSV')).toEqual([]);
    });
  });

  describe('on disk', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = join(tmpdir(), `bank-recon-index-${Date.now()}-${Math.random().toString(16).slice(2)}`);
      await mkdir(testDir, { recursive: true });
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it('should scan files only', async () => {
      await writeFile(join(testDir, 'X.B1234.A.CSV'), 'a');
      await writeFile(join(testDir, 'X.B5678.A.CSV'), 'a');
      await writeFile(join(testDir, 'notes.txt'), 'a');
      await mkdir(join(testDir, 'old.B9999.dir'));

      const index = await scanBankFiles(testDir);

      expect([...index.keys()].sort()).toEqual(['1234', '5678']);
      expect(index.get('1234')).toEqual(['X.B1234.A.CSV']);
    });

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
});
