import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createDatabase, type Database } from '../db';
import { createImageLinker, indexUploads, stripExtension, widestVariant } from './image-linker';
import type { ImageVariant, VariantLabel } from '../types';

function variant(id: number, width: number): ImageVariant {
  return {
    id,
    uploadId: 1,
    variant: '256',
    path: `images/1_${width}.jpg`,
    width,
    height: width,
    checksum: `c${id}`,
    createdAt: new Date(0),
  };
}

describe('stripExtension', () => {
  it('drops only the last extension', () => {
    expect(stripExtension('photo.png')).toBe('photo');
    expect(stripExtension('archive.tar.gz')).toBe('archive.tar');
    expect(stripExtension('noext')).toBe('noext');
  });
});

describe('widestVariant', () => {
  it('prefers the widest and keeps the first on ties', () => {
    expect(widestVariant([variant(1, 256), variant(2, 1024), variant(3, 1024)])?.id).toBe(2);
    expect(widestVariant([])).toBeUndefined();
  });
});

describe('Image linker', () => {
  let db: Database;
  let seq = 0;

  /** Completed upload named `name` with the given variant widths. */
  function completedUpload(name: string, widths: Array<256 | 512 | 1024> = [256, 512, 1024]): number {
    const upload = db.createUploadIfAbsent({ checksum: `sum-${++seq}`, originalName: name, totalChunks: 1 });
    for (const width of widths) {
      const label: VariantLabel = `${width}`;
      db.insertVariantIfAbsent({
        uploadId: upload.id,
        variant: label,
        path: `images/${upload.id}_${width}.jpg`,
        width,
        height: width / 2,
        checksum: `v-${upload.id}-${width}`,
      });
    }
    db.transitionUploadStatus(upload.id, ['uploading'], 'completed');
    return upload.id;
  }

  function variantId(uploadId: number, label: VariantLabel): number | undefined {
    return db.getVariant(uploadId, label)?.id;
  }

  beforeEach(async () => {
    db = await createDatabase();
    db.upsertProducts([
      { sku: 'SKU001', name: 'Widget', price: 1 },
      { sku: 'SKU002', name: 'Gadget', price: 2 },
    ]);
  });

  afterEach(() => {
    db.close();
  });

  it('links the widest variant on an exact filename match', () => {
    const uploadId = completedUpload('photo.png');

    const tally = createImageLinker(db).link([{ sku: 'SKU001', filename: 'photo.png' }]);

    expect(tally).toEqual({ linked: 1, notFound: 0, issues: [] });
    expect(db.getProduct('SKU001')?.primaryImageId).toBe(variantId(uploadId, '1024'));
  });

  it('matches regardless of case', () => {
    const uploadId = completedUpload('Photo.png');

    const tally = createImageLinker(db).link([{ sku: 'SKU001', filename: 'photo.PNG' }]);

    expect(tally.linked).toBe(1);
    expect(db.getProduct('SKU001')?.primaryImageId).toBe(variantId(uploadId, '1024'));
  });

  it('matches without the extension', () => {
    const uploadId = completedUpload('shoe.jpeg');

    createImageLinker(db).link([{ sku: 'SKU001', filename: 'SHOE.png' }]);

    expect(db.getProduct('SKU001')?.primaryImageId).toBe(variantId(uploadId, '1024'));
  });

  it('prefers an exact match over a looser one', () => {
    completedUpload('photo.PNG');
    const exact = completedUpload('photo.png');
    completedUpload('PHOTO.png');

    createImageLinker(db).link([{ sku: 'SKU001', filename: 'photo.png' }]);

    expect(db.getProduct('SKU001')?.primaryImageId).toBe(variantId(exact, '1024'));
  });

  it('uses the newest upload when names collide', () => {
    completedUpload('dup.png');
    const newer = completedUpload('dup.png');

    createImageLinker(db).link([{ sku: 'SKU001', filename: 'dup.png' }]);

    expect(db.getProduct('SKU001')?.primaryImageId).toBe(variantId(newer, '1024'));
  });

  it('counts a miss when no completed upload matches', () => {
    const pending = db.createUploadIfAbsent({ checksum: 'in-flight', originalName: 'later.png', totalChunks: 2 });

    const tally = createImageLinker(db).link([{ sku: 'SKU002', filename: 'later.png' }]);

    expect(pending.status).toBe('uploading');
    expect(tally).toEqual({
      linked: 0,
      notFound: 1,
      issues: [
        {
          sku: 'SKU002',
          message: "Image not found for SKU 'SKU002': later.png (upload not completed or doesn't exist)",
        },
      ],
    });
    expect(db.getProduct('SKU002')?.primaryImageId).toBeNull();
  });

  it('counts a miss when the matched upload has no variants', () => {
    completedUpload('bare.png', []);

    const tally = createImageLinker(db).link([{ sku: 'SKU001', filename: 'bare.png' }]);

    expect(tally).toEqual({
      linked: 0,
      notFound: 1,
      issues: [{ sku: 'SKU001', message: 'No image variants found for upload: bare.png' }],
    });
  });

  it('does not count a link that is already in place', () => {
    completedUpload('photo.png');
    const linker = createImageLinker(db);

    linker.link([{ sku: 'SKU001', filename: 'photo.png' }], new Date(5_000));
    const again = linker.link([{ sku: 'SKU001', filename: 'photo.png' }], new Date(9_000));

    expect(again.linked).toBe(0);
    expect(db.getProduct('SKU001')?.updatedAt.getTime()).toBe(5_000);
  });

  it('ignores blank filenames', () => {
    expect(createImageLinker(db).link([{ sku: 'SKU001', filename: '  ' }])).toEqual({
      linked: 0,
      notFound: 0,
      issues: [],
    });
  });
});

describe('indexUploads', () => {
  it('resolves nothing from an empty index', () => {
    expect(indexUploads([]).resolve('photo.png')).toBeUndefined();
  });
});
