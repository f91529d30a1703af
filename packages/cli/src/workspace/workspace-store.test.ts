/**
 * Tests for Workspace Store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import pino from 'pino';
import {
  DEFAULT_CONFIG_RECORD,
  InvalidPathError,
  QuotaExceededError,
  WriteFailedError,
  type ConfigRecord,
} from '@sheetbox/core';
import { WorkspaceStore } from './workspace-store.js';

const SESSION = 'user_00112233445566aa';
const OTHER = 'user_ffeeddccbbaa9988';
const silent = pino({ level: 'silent' });
const fixedNow = () => new Date(Date.UTC(2026, 4, 2, 8, 15, 30));

describe('WorkspaceStore', () => {
  let baseDir: string;
  let store: WorkspaceStore;

  beforeEach(async () => {
    baseDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'workspace-store-test-')));
    store = new WorkspaceStore({ baseDir, logger: silent, now: fixedNow });
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  describe('ensure', () => {
    it('should create the layout and a default config', async () => {
      const workspace = await store.ensure(SESSION);

      expect(workspace).toEqual({
        id: SESSION,
        root: path.join(baseDir, SESSION),
        uploads: path.join(baseDir, SESSION, 'uploads'),
        exports: path.join(baseDir, SESSION, 'exports'),
        temp: path.join(baseDir, SESSION, 'temp'),
        configPath: path.join(baseDir, SESSION, 'config.json'),
      });
      expect((await fs.readdir(workspace.root)).sort()).toEqual(['config.json', 'exports', 'temp', 'uploads']);
      expect(await store.loadConfig(SESSION)).toEqual(DEFAULT_CONFIG_RECORD);
    });

    it('should coalesce concurrent calls into one workspace', async () => {
      const results = await Promise.all(Array.from({ length: 10 }, () => store.ensure(SESSION)));

      for (const workspace of results) {
        expect(workspace).toEqual(results[0]);
      }
      expect(await fs.readdir(baseDir)).toEqual([SESSION]);
      expect((await fs.readdir(results[0].root)).sort()).toEqual(['config.json', 'exports', 'temp', 'uploads']);
    });

    it('should keep an existing config record', async () => {
      const record: ConfigRecord = { ...DEFAULT_CONFIG_RECORD, modelChoice: 'gpt-4o', credentialMaterial: 'test-secret' };
      await store.ensure(SESSION);
      await store.saveConfig(SESSION, record);
      await store.ensure(SESSION);

      expect(await store.loadConfig(SESSION)).toEqual(record);
    });

    it('should reject malformed ids before building a path', async () => {
      await expect(store.ensure('../escape')).rejects.toBeInstanceOf(InvalidPathError);
      await expect(store.ensure('user_XYZ')).rejects.toBeInstanceOf(InvalidPathError);
      expect(await fs.readdir(baseDir)).toEqual([]);
    });
  });

  describe('config', () => {
    it('should round-trip a saved record', async () => {
      const record: ConfigRecord = {
        modelChoice: 'gpt-4o-mini',
        temperature: 1.1,
        maxTokens: 800,
        credentialMaterial: 'test-secret',
        baseUrl: 'https://llm.example.test/v1',
      };
      await store.saveConfig(SESSION, record);

      expect(await store.loadConfig(SESSION)).toEqual(record);
    });

    it('should return defaults when the record is missing', async () => {
      expect(await store.loadConfig(SESSION)).toEqual(DEFAULT_CONFIG_RECORD);
    });

    it('should return defaults when the record is corrupt', async () => {
      const workspace = await store.ensure(SESSION);
      await fs.writeFile(workspace.configPath, '{not json');

      expect(await store.loadConfig(SESSION)).toEqual(DEFAULT_CONFIG_RECORD);
    });

    it('should stamp the saved file with updatedAt', async () => {
      const workspace = await store.ensure(SESSION);
      await store.saveConfig(SESSION, { ...DEFAULT_CONFIG_RECORD });

      const saved: unknown = JSON.parse(await fs.readFile(workspace.configPath, 'utf8'));
      expect(saved).toMatchObject({ updatedAt: '2026-05-02T08:15:30.000Z' });
    });

    it('should leave no temp files behind', async () => {
      const workspace = await store.ensure(SESSION);
      await Promise.all([
        store.saveConfig(SESSION, { ...DEFAULT_CONFIG_RECORD, maxTokens: 1 }),
        store.saveConfig(SESSION, { ...DEFAULT_CONFIG_RECORD, maxTokens: 2 }),
      ]);

      expect((await fs.readdir(workspace.root)).sort()).toEqual(['config.json', 'exports', 'temp', 'uploads']);
      expect([1, 2]).toContain((await store.loadConfig(SESSION)).maxTokens);
    });

    it('should create the full layout when saving a record for a new id', async () => {
      await store.saveConfig(SESSION, { ...DEFAULT_CONFIG_RECORD, maxTokens: 7 });

      const root = path.join(baseDir, SESSION);
      expect((await fs.readdir(root)).sort()).toEqual(['config.json', 'exports', 'temp', 'uploads']);
      expect((await store.loadConfig(SESSION)).maxTokens).toBe(7);
    });

    it('should refuse an invalid record', async () => {
      await expect(
        store.saveConfig(SESSION, { ...DEFAULT_CONFIG_RECORD, temperature: 9 })
      ).rejects.toBeInstanceOf(WriteFailedError);
    });
  });

  describe('listings', () => {
    it('should list exports newest first', async () => {
      const workspace = await store.ensure(SESSION);
      const older = path.join(workspace.exports, '20260101000000_old.csv');
      const newer = path.join(workspace.exports, '20260102000000_new.csv');
      await fs.writeFile(older, 'a,b\n');
      await fs.writeFile(newer, 'abc');
      await fs.utimes(older, new Date('2026-01-01T00:00:00Z'), new Date('2026-01-01T00:00:00Z'));
      await fs.utimes(newer, new Date('2026-01-02T00:00:00Z'), new Date('2026-01-02T00:00:00Z'));

      const entries = await store.listExports(SESSION);

      expect(entries.map((e) => e.name)).toEqual(['20260102000000_new.csv', '20260101000000_old.csv']);
      expect(entries[0]).toEqual({
        name: '20260102000000_new.csv',
        displayName: 'new.csv',
        path: newer,
        size: 3,
        mtime: new Date('2026-01-02T00:00:00Z'),
      });
    });

    it('should return an empty list for a missing workspace', async () => {
      expect(await store.listExports(SESSION)).toEqual([]);
      expect(await store.listUploads(SESSION)).toEqual([]);
    });
  });

  describe('uploads', () => {
    it('should store uploads under a timestamped sanitized name', async () => {
      const entry = await store.saveUpload(SESSION, '../../Q1 sales.xlsx', new Uint8Array([1, 2, 3]));

      expect(entry.name).toBe('20260502081530_Q1 sales.xlsx');
      expect(entry.displayName).toBe('Q1 sales.xlsx');
      expect(entry.kind).toBe('excel');
      expect(entry.size).toBe(3);
      expect(entry.path).toBe(path.join(baseDir, SESSION, 'uploads', '20260502081530_Q1 sales.xlsx'));
    });

    it('should not overwrite an upload with the same name', async () => {
      const first = await store.saveUpload(SESSION, 'data.csv', new Uint8Array([1]));
      const second = await store.saveUpload(SESSION, 'data.csv', new Uint8Array([2]));

      expect(first.name).toBe('20260502081530_data.csv');
      expect(second.name).toBe('20260502081530_data_1.csv');
    });

    it('should find uploads by stored or display name', async () => {
      const entry = await store.saveUpload(SESSION, 'notes.txt', new Uint8Array([65]));

      expect((await store.findUpload(SESSION, 'notes.txt'))?.path).toBe(entry.path);
      expect((await store.findUpload(SESSION, entry.name))?.kind).toBe('text');
      expect(await store.findUpload(SESSION, 'missing.txt')).toBeNull();
    });

    it('should enforce the per-upload limit', async () => {
      const limited = new WorkspaceStore({ baseDir, logger: silent, quota: { maxUploadBytes: 4 } });

      await expect(limited.saveUpload(SESSION, 'big.bin', new Uint8Array(5))).rejects.toBeInstanceOf(
        QuotaExceededError
      );
    });

    it('should enforce the per-session file count', async () => {
      const limited = new WorkspaceStore({ baseDir, logger: silent, quota: { maxFilesPerSession: 2 } });
      await limited.saveUpload(SESSION, 'a.txt', new Uint8Array(1));
      await limited.saveUpload(SESSION, 'b.txt', new Uint8Array(1));

      await expect(limited.saveUpload(SESSION, 'c.txt', new Uint8Array(1))).rejects.toBeInstanceOf(
        QuotaExceededError
      );
    });

    it('should enforce the per-session byte quota', async () => {
      const limited = new WorkspaceStore({ baseDir, logger: silent, quota: { maxSessionBytes: 10 } });
      await limited.saveUpload(SESSION, 'a.bin', new Uint8Array(6));

      await expect(limited.saveUpload(SESSION, 'b.bin', new Uint8Array(6))).rejects.toBeInstanceOf(
        QuotaExceededError
      );
    });
  });

  describe('concurrent writes', () => {
    it('should not let simultaneous uploads overrun the file count', async () => {
      const limited = new WorkspaceStore({ baseDir, logger: silent, quota: { maxFilesPerSession: 3 } });

      const results = await Promise.allSettled(
        Array.from({ length: 8 }, (_, i) => limited.saveUpload(SESSION, `f${i}.txt`, new Uint8Array(1)))
      );

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(3);
      expect(results.filter((r) => r.status === 'rejected')).toHaveLength(5);
      for (const result of results) {
        if (result.status === 'rejected') {
          expect(result.reason).toBeInstanceOf(QuotaExceededError);
        }
      }
      expect(await fs.readdir(path.join(baseDir, SESSION, 'uploads'))).toHaveLength(3);
    });

    it('should not let simultaneous writes overrun the byte quota', async () => {
      const limited = new WorkspaceStore({ baseDir, logger: silent, quota: { maxSessionBytes: 10 } });
      const workspace = await limited.ensure(SESSION);

      const results = await Promise.allSettled(
        Array.from({ length: 4 }, (_, i) =>
          limited.withinQuota(SESSION, { bytes: 4, newFile: true }, () =>
            fs.writeFile(path.join(workspace.exports, `part${i}.bin`), new Uint8Array(4))
          )
        )
      );

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'fulfilled', 'rejected', 'rejected']);
      expect(await limited.workspaceUsage(SESSION)).toEqual({ fileCount: 2, bytesUsed: 8 });
    });

    it('should count appended bytes without counting another file', async () => {
      const limited = new WorkspaceStore({
        baseDir,
        logger: silent,
        quota: { maxFilesPerSession: 1, maxSessionBytes: 10 },
      });
      await limited.saveUpload(SESSION, 'a.bin', new Uint8Array(4));

      await expect(limited.checkQuota(SESSION, { bytes: 6, newFile: false })).resolves.toBeUndefined();
      await expect(limited.checkQuota(SESSION, { bytes: 7, newFile: false })).rejects.toBeInstanceOf(
        QuotaExceededError
      );
      await expect(limited.checkQuota(SESSION, { bytes: 0, newFile: true })).rejects.toBeInstanceOf(
        QuotaExceededError
      );
    });
  });

  describe('tempPath', () => {
    it('should sanitize a supplied name', async () => {
      expect(await store.tempPath(SESSION, '../scratch.json')).toBe(
        path.join(baseDir, SESSION, 'temp', 'scratch.json')
      );
    });

    it('should generate a random name otherwise', async () => {
      const tempPath = await store.tempPath(SESSION);

      expect(path.dirname(tempPath)).toBe(path.join(baseDir, SESSION, 'temp'));
      expect(path.basename(tempPath)).toMatch(/^temp_[0-9a-f]{8}\.tmp$/);
    });
  });

  describe('purge', () => {
    it('should remove the workspace', async () => {
      await store.ensure(SESSION);

      expect(await store.purge(SESSION)).toBe(true);
      expect(await store.exists(SESSION)).toBe(false);
    });

    it('should be a no-op for a missing workspace', async () => {
      expect(await store.purge(SESSION)).toBe(false);
      expect(await store.purge(SESSION)).toBe(false);
    });

    it('should keep the workspace when the condition declines under the lock', async () => {
      await store.ensure(SESSION);

      expect(await store.purge(SESSION, { when: () => false })).toBe(false);
      expect(await store.exists(SESSION)).toBe(true);
      expect(await store.purge(SESSION, { when: () => true })).toBe(true);
      expect(await store.exists(SESSION)).toBe(false);
    });

    it('should leave other workspaces alone', async () => {
      await store.ensure(SESSION);
      await store.ensure(OTHER);
      await store.purge(SESSION);

      expect(await store.exists(OTHER)).toBe(true);
    });
  });

  describe('usage', () => {
    it('should total files and bytes across workspaces', async () => {
      await store.saveUpload(SESSION, 'a.bin', new Uint8Array(3));
      await store.saveUpload(OTHER, 'b.bin', new Uint8Array(4));
      await store.saveUpload(OTHER, 'c.bin', new Uint8Array(5));

      expect(await store.totalUsage()).toEqual({ sessionCount: 2, fileCount: 3, bytesUsed: 12 });
    });

    it('should ignore directories that are not sessions', async () => {
      await fs.mkdir(path.join(baseDir, 'lost+found'));
      await store.ensure(SESSION);

      expect((await store.listStored()).map((s) => s.id)).toEqual([SESSION]);
    });
  });
});
