import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readdirSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createLocalBlobStore, createMemoryBlobStore, type BlobStore } from './blob-store';

function sharedBehaviour(name: string, make: () => BlobStore) {
  describe(name, () => {
    let store: BlobStore;

    beforeEach(() => {
      store = make();
    });

    it('stores and reads bytes', async () => {
      await store.put('a/b/c.bin', Buffer.from('hello'));

      expect((await store.get('a/b/c.bin'))?.toString()).toBe('hello');
      expect(await store.exists('a/b/c.bin')).toBe(true);
    });

    it('returns undefined for missing keys', async () => {
      expect(await store.get('nope')).toBeUndefined();
      expect(await store.exists('nope')).toBe(false);
    });

    it('keeps the first write for putIfAbsent', async () => {
      expect(await store.putIfAbsent('k', Buffer.from('first'))).toBe(true);
      expect(await store.putIfAbsent('k', Buffer.from('second'))).toBe(false);

      expect((await store.get('k'))?.toString()).toBe('first');
    });

    it('lets exactly one concurrent putIfAbsent win', async () => {
      const results = await Promise.all(
        ['x', 'y', 'z', 'w'].map((v) => store.putIfAbsent('race/key', Buffer.from(v))),
      );

      expect(results.filter(Boolean)).toHaveLength(1);
      const winner = ['x', 'y', 'z', 'w'][results.indexOf(true)];
      expect((await store.get('race/key'))?.toString()).toBe(winner);
    });

    it('deletes a key and a whole prefix', async () => {
      await store.put('uploads/chunks/1/0', Buffer.from('a'));
      await store.put('uploads/chunks/1/1', Buffer.from('b'));
      await store.put('uploads/chunks/2/0', Buffer.from('c'));

      await store.delete('uploads/chunks/1');
      await store.delete('never/written');

      expect(await store.exists('uploads/chunks/1/0')).toBe(false);
      expect(await store.exists('uploads/chunks/1/1')).toBe(false);
      expect(await store.exists('uploads/chunks/2/0')).toBe(true);
    });

    it('rejects keys that climb out of the store', async () => {
      await expect(store.put('../escape', Buffer.from('x'))).rejects.toThrow('Invalid blob key');
    });
  });
}

describe('Blob store', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'catalog-blobs-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  sharedBehaviour('local', () => createLocalBlobStore(dir));
  sharedBehaviour('memory', () => createMemoryBlobStore());

  it('leaves no temp files behind on disk', async () => {
    const store = createLocalBlobStore(dir);
    await store.put('f/one', Buffer.from('1'));
    await store.putIfAbsent('f/two', Buffer.from('2'));
    await store.putIfAbsent('f/two', Buffer.from('3'));

    expect(readdirSync(join(dir, 'f')).sort()).toEqual(['one', 'two']);
  });
});
