/**
 * Tests for File Naming
 */

import { describe, it, expect } from 'vitest';
import {
  sanitizeFilename,
  splitExtension,
  formatTimestamp,
  synthesizeStoredName,
  withCollisionSuffix,
  displayNameOf,
  classifyUpload,
} from './filename.js';

describe('sanitizeFilename', () => {
  it('keeps only the last segment of traversal payloads', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('..\\..\\secret.txt')).toBe('secret.txt');
    expect(sanitizeFilename('/var/tmp/out.json')).toBe('out.json');
  });

  it('removes control and reserved characters', () => {
    expect(sanitizeFilename('a\u0000b\u0007.txt')).toBe('ab.txt');
    expect(sanitizeFilename('re<port>:v1?.csv')).toBe('reportv1.csv');
  });

  it('strips leading dots', () => {
    expect(sanitizeFilename('.bashrc')).toBe('bashrc');
    expect(sanitizeFilename('...hidden.txt')).toBe('hidden.txt');
  });

  it('falls back when nothing survives', () => {
    expect(sanitizeFilename('..')).toBe('file');
    expect(sanitizeFilename('')).toBe('file');
    expect(sanitizeFilename('???')).toBe('file');
  });

  it('collapses whitespace runs', () => {
    expect(sanitizeFilename('monthly   sales.xlsx')).toBe('monthly sales.xlsx');
  });

  it('keeps non-ASCII letters', () => {
    expect(sanitizeFilename('données_été.csv')).toBe('données_été.csv');
  });

  it('caps length while preserving the extension', () => {
    const result = sanitizeFilename('a'.repeat(120) + '.xlsx');
    expect(result).toHaveLength(100);
    expect(result).toBe('a'.repeat(95) + '.xlsx');
  });
});

describe('splitExtension', () => {
  it('splits on the last dot', () => {
    expect(splitExtension('report.final.xlsx')).toEqual({ stem: 'report.final', ext: '.xlsx' });
  });

  it('treats dot-files as having no extension', () => {
    expect(splitExtension('.env')).toEqual({ stem: '.env', ext: '' });
    expect(splitExtension('README')).toEqual({ stem: 'README', ext: '' });
  });
});

describe('formatTimestamp', () => {
  it('produces 14 UTC digits', () => {
    expect(formatTimestamp(new Date(Date.UTC(2026, 0, 2, 3, 4, 5)))).toBe('20260102030405');
    expect(formatTimestamp(new Date(Date.UTC(2026, 11, 31, 23, 59, 59)))).toBe('20261231235959');
  });
});

describe('synthesizeStoredName', () => {
  it('prefixes the sanitized name with the timestamp', () => {
    const now = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));
    expect(synthesizeStoredName('../result.xlsx', now)).toBe('20260102030405_result.xlsx');
  });
});

describe('withCollisionSuffix', () => {
  it('inserts the counter before the extension', () => {
    expect(withCollisionSuffix('a.xlsx', 2)).toBe('a_2.xlsx');
    expect(withCollisionSuffix('README', 1)).toBe('README_1');
  });

  it('leaves the name alone for counter 0', () => {
    expect(withCollisionSuffix('a.xlsx', 0)).toBe('a.xlsx');
  });
});

describe('displayNameOf', () => {
  it('strips a timestamp prefix', () => {
    expect(displayNameOf('20260102030405_result.xlsx')).toBe('result.xlsx');
  });

  it('returns other names unchanged', () => {
    expect(displayNameOf('plain.txt')).toBe('plain.txt');
    expect(displayNameOf('2026_short.txt')).toBe('2026_short.txt');
  });
});

describe('classifyUpload', () => {
  it('classifies by extension, case-insensitively', () => {
    expect(classifyUpload('Q1.XLSX')).toBe('excel');
    expect(classifyUpload('data.csv')).toBe('csv');
    expect(classifyUpload('notes.md')).toBe('text');
    expect(classifyUpload('contract.docx')).toBe('word');
    expect(classifyUpload('scan.pdf')).toBe('pdf');
    expect(classifyUpload('blob.bin')).toBe('other');
  });
});
