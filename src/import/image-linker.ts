/**
 * Image Linker - points products at uploaded images named in the CSV
 *
 * Filenames are resolved against completed uploads by an ordered list of
 * matchers (exact, then case-insensitive, then case-insensitive without the
 * extension). When several uploads share a name the newest wins. The linked
 * variant is the widest one the upload has.
 *
 * Runs synchronously so it can share the import batch transaction.
 */

import { extname } from 'path';
import type { Database } from '../db';
import type { ImageVariant, UploadWithVariants } from '../types';
import type { ImageLinkRequest, LinkTally } from './types';
import { createLogger } from '../utils/logger';

const logger = createLogger('image-linker');

export interface FilenameMatcher {
  name: string;
  /** Normalize a filename; two names match when their keys are equal. */
  key(filename: string): string;
}

export function stripExtension(filename: string): string {
  return filename.slice(0, filename.length - extname(filename).length);
}

export const FILENAME_MATCHERS: readonly FilenameMatcher[] = [
  { name: 'exact', key: (f) => f },
  { name: 'case-insensitive', key: (f) => f.toLowerCase() },
  { name: 'basename', key: (f) => stripExtension(f).toLowerCase() },
];

/** Widest variant; the first one wins a tie. */
export function widestVariant(variants: ImageVariant[]): ImageVariant | undefined {
  let best: ImageVariant | undefined;
  for (const variant of variants) {
    if (!best || variant.width > best.width) best = variant;
  }
  return best;
}

export interface UploadIndex {
  resolve(filename: string): UploadWithVariants | undefined;
}

/** Index uploads (newest first) by every matcher's key. */
export function indexUploads(
  uploads: UploadWithVariants[],
  matchers: readonly FilenameMatcher[] = FILENAME_MATCHERS,
): UploadIndex {
  const tables = matchers.map((matcher) => {
    const table = new Map<string, UploadWithVariants>();
    for (const upload of uploads) {
      const key = matcher.key(upload.originalName);
      if (!table.has(key)) table.set(key, upload);
    }
    return { matcher, table };
  });

  return {
    resolve(filename) {
      for (const { matcher, table } of tables) {
        const hit = table.get(matcher.key(filename));
        if (hit) return hit;
      }
      return undefined;
    },
  };
}

export interface ImageLinker {
  link(requests: ImageLinkRequest[], at?: Date): LinkTally;
}

export function createImageLinker(db: Database): ImageLinker {
  return {
    link(requests, at = new Date()) {
      const tally: LinkTally = { linked: 0, notFound: 0, issues: [] };
      const pending = requests.filter((r) => r.filename.trim().length > 0);
      if (pending.length === 0) return tally;

      const index = indexUploads(db.listUploadsWithVariants('completed'));

      for (const { sku, filename } of pending) {
        const upload = index.resolve(filename);
        if (!upload) {
          tally.notFound++;
          tally.issues.push({
            sku,
            message: `Image not found for SKU '${sku}': ${filename} (upload not completed or doesn't exist)`,
          });
          continue;
        }

        const variant = widestVariant(upload.variants);
        if (!variant) {
          tally.notFound++;
          tally.issues.push({ sku, message: `No image variants found for upload: ${filename}` });
          continue;
        }

        if (db.setPrimaryImage(sku, variant.id, at)) {
          tally.linked++;
        }
      }

      logger.debug({ requested: pending.length, linked: tally.linked, notFound: tally.notFound }, 'Images linked');
      return tally;
    },
  };
}
