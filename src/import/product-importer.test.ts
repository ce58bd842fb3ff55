import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createDatabase, type Database } from '../db';
import { createProductImporter } from './product-importer';
import type { ImageLinker } from './image-linker';

describe('Product importer', () => {
  let db: Database;
  let dir: string;

  function csv(name: string, lines: string[]): string {
    const file = join(dir, name);
    writeFileSync(file, lines.join('\n') + '\n');
    return file;
  }

  function productCount(): unknown {
    return db.query('SELECT COUNT(*) AS n FROM products')[0].n;
  }

  function completedUpload(name: string): number {
    const upload = db.createUploadIfAbsent({ checksum: `sum-${name}`, originalName: name, totalChunks: 1 });
    db.insertVariantIfAbsent({ uploadId: upload.id, variant: '256', path: 'a', width: 256, height: 171, checksum: 'a' });
    db.insertVariantIfAbsent({ uploadId: upload.id, variant: '1024', path: 'b', width: 1024, height: 683, checksum: 'b' });
    db.transitionUploadStatus(upload.id, ['uploading'], 'completed');
    return upload.id;
  }

  beforeEach(async () => {
    db = await createDatabase();
    dir = mkdtempSync(join(tmpdir(), 'catalog-import-'));
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps the first of duplicate SKUs', async () => {
    const file = csv('dupes.csv', ['sku,name,price', 'SKU001,Widget,19.99', 'SKU001,Widget2,29.99', 'SKU002,Gadget,9.99']);

    const summary = await createProductImporter({ db }).importProducts(file);

    expect(summary).toEqual({
      success: true,
      totalRows: 3,
      importedCount: 2,
      updatedCount: 0,
      invalidCount: 0,
      duplicateCount: 1,
      imagesLinked: 0,
      imagesNotFound: 0,
      issues: ['Row 2: Duplicate SKU in CSV: SKU001'],
    });
    expect(db.getProduct('SKU001')).toMatchObject({ name: 'Widget', price: 19.99 });
    expect(db.getProduct('SKU002')).toMatchObject({ name: 'Gadget', price: 9.99 });
  });

  it('updates existing products on re-import', async () => {
    const importer = createProductImporter({ db });
    await importer.importProducts(csv('first.csv', ['sku,name,price', 'SKU001,Widget,19.99', 'SKU002,Gadget,9.99']));

    const summary = await importer.importProducts(
      csv('second.csv', ['sku,name,price', 'SKU001,Widget Pro,24.99', 'SKU003,Gizmo,5']),
    );

    expect(summary).toMatchObject({ totalRows: 2, importedCount: 1, updatedCount: 1 });
    expect(db.getProduct('SKU001')).toMatchObject({ name: 'Widget Pro', price: 24.99 });
    expect(productCount()).toBe(3);
  });

  it('is idempotent for the same file', async () => {
    const file = csv('same.csv', ['sku,name,price', 'A,Apple,1', 'B,Banana,2']);
    const importer = createProductImporter({ db });

    await importer.importProducts(file);
    const again = await importer.importProducts(file);

    expect(again).toMatchObject({ importedCount: 0, updatedCount: 2, duplicateCount: 0 });
    expect(productCount()).toBe(2);
  });

  it('counts and explains invalid rows', async () => {
    const file = csv('invalid.csv', [
      'sku,name,price',
      'A,Apple',
      ',Nameless,3',
      'B,Bad price,abc',
      'C,Negative,-1',
      'D,Free,0',
    ]);

    const summary = await createProductImporter({ db }).importProducts(file);

    expect(summary).toMatchObject({ totalRows: 5, importedCount: 1, invalidCount: 4 });
    expect(summary.issues).toEqual([
      'Row 1: Missing required columns. Expected: sku, name, price',
      'Row 2: Required fields (sku, name, price) cannot be empty',
      'Row 3: Price must be a valid non-negative number',
      'Row 4: Price must be a valid non-negative number',
    ]);
    expect(db.getProduct('D')?.price).toBe(0);
    expect(db.getProduct('C')).toBeUndefined();
  });

  it('counts blank lines as invalid rows', async () => {
    const file = csv('blank.csv', ['sku,name,price', '', 'A,Apple,1', '   ', 'A,Again,2']);

    const summary = await createProductImporter({ db }).importProducts(file);

    expect(summary).toMatchObject({ totalRows: 4, importedCount: 1, invalidCount: 2, duplicateCount: 1 });
    expect(summary.issues).toEqual([
      'Row 1: Missing required columns. Expected: sku, name, price',
      'Row 3: Missing required columns. Expected: sku, name, price',
      'Row 4: Duplicate SKU in CSV: A',
    ]);
  });

  it('reads columns by header position', async () => {
    const file = csv('reordered.csv', ['price,name,sku', '3.5,Cherry,C1']);

    await createProductImporter({ db }).importProducts(file);

    expect(db.getProduct('C1')).toMatchObject({ name: 'Cherry', price: 3.5 });
  });

  it('streams large files in batches and finds duplicates across them', async () => {
    const lines = ['sku,name,price'];
    for (let i = 0; i < 10_000; i++) lines.push(`SKU${i},Item ${i},${i % 100}.5`);
    lines.push('SKU0,Late duplicate,1');

    const summary = await createProductImporter({ db }, { batchSize: 250 }).importProducts(csv('big.csv', lines));

    expect(summary).toMatchObject({
      success: true,
      totalRows: 10_001,
      importedCount: 10_000,
      duplicateCount: 1,
      invalidCount: 0,
    });
    expect(summary.issues).toEqual(['Row 10001: Duplicate SKU in CSV: SKU0']);
    expect(productCount()).toBe(10_000);
    expect(db.getProduct('SKU9999')).toMatchObject({ name: 'Item 9999', price: 99.5 });
  });

  describe('image column', () => {
    it('links images by filename in any case, once', async () => {
      const uploadId = completedUpload('Photo.png');
      const file = csv('images.csv', ['sku,name,price,Image', 'SKU001,Widget,19.99,photo.PNG']);
      const importer = createProductImporter({ db });

      const first = await importer.importProducts(file);
      const second = await importer.importProducts(file);

      expect(first).toMatchObject({ imagesLinked: 1, imagesNotFound: 0 });
      expect(second).toMatchObject({ imagesLinked: 0, imagesNotFound: 0, updatedCount: 1 });
      expect(db.getProduct('SKU001')?.primaryImageId).toBe(db.getVariant(uploadId, '1024')?.id);
    });

    it('reports images that cannot be resolved and still imports the row', async () => {
      const file = csv('missing-image.csv', ['sku,name,price,image', 'SKU001,Widget,19.99,ghost.png', 'SKU002,Gadget,5,']);

      const summary = await createProductImporter({ db }).importProducts(file);

      expect(summary).toMatchObject({ importedCount: 2, imagesLinked: 0, imagesNotFound: 1 });
      expect(summary.issues).toEqual([
        "Image not found for SKU 'SKU001': ghost.png (upload not completed or doesn't exist)",
      ]);
      expect(db.getProduct('SKU001')?.primaryImageId).toBeNull();
    });

    it('reports image misses in row order alongside invalid rows', async () => {
      const file = csv('mixed.csv', ['sku,name,price,image', 'SKU001,Widget,19.99,ghost.png', 'SKU002,Gadget,abc,']);

      const summary = await createProductImporter({ db }).importProducts(file);

      expect(summary).toMatchObject({ totalRows: 2, importedCount: 1, invalidCount: 1, imagesNotFound: 1 });
      expect(summary.issues).toEqual([
        "Image not found for SKU 'SKU001': ghost.png (upload not completed or doesn't exist)",
        'Row 2: Price must be a valid non-negative number',
      ]);
    });

    it('ignores filenames when the header has no image column', async () => {
      completedUpload('photo.png');
      const file = csv('extra.csv', ['sku,name,price,notes', 'SKU001,Widget,1,photo.png']);

      const summary = await createProductImporter({ db }).importProducts(file);

      expect(summary.imagesLinked).toBe(0);
      expect(db.getProduct('SKU001')?.primaryImageId).toBeNull();
    });
  });

  describe('fatal errors', () => {
    it('reports a missing file', async () => {
      const summary = await createProductImporter({ db }).importProducts(join(dir, 'absent.csv'));

      expect(summary.success).toBe(false);
      expect(summary.issues).toHaveLength(1);
      expect(summary.issues[0]).toMatch(/^Fatal error: ENOENT/);
    });

    it('reports a header without the required columns', async () => {
      const summary = await createProductImporter({ db }).importProducts(csv('bad-header.csv', ['sku,name', 'A,Apple']));

      expect(summary).toMatchObject({
        success: false,
        totalRows: 0,
        issues: ['Fatal error: Missing required columns: price'],
      });
    });

    it('keeps earlier batches when a later one fails', async () => {
      let calls = 0;
      const linker: ImageLinker = {
        link() {
          calls++;
          if (calls === 2) throw new Error('link store unavailable');
          return { linked: 0, notFound: 0, issues: [] };
        },
      };
      const file = csv('partial.csv', ['sku,name,price,image', 'A,Apple,1,a.png', 'B,Banana,2,b.png', 'C,Cherry,3,c.png']);

      const summary = await createProductImporter({ db, linker }, { batchSize: 1 }).importProducts(file);

      expect(summary.success).toBe(false);
      expect(summary.issues).toEqual(['Fatal error: link store unavailable']);
      expect(summary.importedCount).toBe(1);
      expect(db.getProduct('A')).toBeDefined();
      expect(db.getProduct('B')).toBeUndefined();
      expect(db.getProduct('C')).toBeUndefined();
    });
  });
});
