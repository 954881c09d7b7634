/**
 * Unit tests for the Storage Module
 */

import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createFileStore, FsFileStore, MemoryFileStore } from '../../src/storage/index.js';

describe('Storage Module', () => {
  describe('MemoryFileStore', () => {
    let store: MemoryFileStore;

    beforeEach(() => {
      store = new MemoryFileStore({ 'seed.txt': 'seeded' });
    });

    test('should return seeded content', async () => {
      expect(await store.readText('seed.txt')).toBe('seeded');
    });

    test('should return null for missing files', async () => {
      expect(await store.readText('missing.txt')).toBeNull();
      expect(await store.exists('missing.txt')).toBe(false);
    });

    test('should overwrite on write', async () => {
      await store.writeText('seed.txt', 'replaced');

      expect(store.get('seed.txt')).toBe('replaced');
      expect(store.paths()).toEqual(['seed.txt']);
    });

    test('should clear all files', () => {
      store.clear();

      expect(store.paths()).toEqual([]);
    });
  });

  describe('FsFileStore', () => {
    let dir: string;
    const store = new FsFileStore();

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'outreach-store-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    test('should create parent directories on write', async () => {
      const path = join(dir, 'nested', 'out', 'report.txt');

      await store.writeText(path, 'hello');

      expect(await store.readText(path)).toBe('hello');
      expect(await store.exists(path)).toBe(true);
    });

    test('should return null for missing files', async () => {
      expect(await store.readText(join(dir, 'missing.json'))).toBeNull();
      expect(await store.exists(join(dir, 'missing.json'))).toBe(false);
    });
  });

  describe('createFileStore()', () => {
    test('should build the requested implementation', () => {
      expect(createFileStore({ type: 'memory' })).toBeInstanceOf(MemoryFileStore);
      expect(createFileStore()).toBeInstanceOf(FsFileStore);
    });
  });
});
