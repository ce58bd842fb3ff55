/**
 * Variant Generator - fixed-width JPEG renditions of an uploaded image
 *
 * Each width in VARIANT_WIDTHS yields a JPEG resized to exactly
 * (width, scaledHeight), alpha flattened onto white. Sources narrower than a
 * target are scaled up.
 */

import sharp from 'sharp';
import { createLogger } from '../utils/logger';
import { sha256Hex } from '../utils/hash';
import { variantLabel, type VariantLabel, type VariantWidth } from '../types';

const logger = createLogger('variant-generator');

export interface ImageSize {
  width: number;
  height: number;
}

export interface GeneratedVariant {
  label: VariantLabel;
  width: number;
  height: number;
  bytes: Buffer;
  /** Lowercase hex SHA-256 of `bytes` */
  checksum: string;
}

export interface VariantGenerator {
  /** Decode the header of `bytes`; throws when it is not an image sharp can read. */
  readSize(bytes: Buffer): Promise<ImageSize>;
  generate(source: Buffer, target: VariantWidth, size?: ImageSize): Promise<GeneratedVariant>;
}

export interface VariantGeneratorOptions {
  /** JPEG quality, 1-100 */
  quality?: number;
}

export function variantKey(uploadId: number, width: number): string {
  return `images/${uploadId}_${width}.jpg`;
}

export function scaledHeight(width: number, height: number, target: number): number {
  return Math.max(1, Math.round((height * target) / width));
}

export function createVariantGenerator(options: VariantGeneratorOptions = {}): VariantGenerator {
  const quality = options.quality ?? 85;

  async function readSize(bytes: Buffer): Promise<ImageSize> {
    const metadata = await sharp(bytes).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error('Unable to read image dimensions');
    }
    return { width: metadata.width, height: metadata.height };
  }

  return {
    readSize,

    async generate(source, target, size) {
      const { width, height } = size ?? (await readSize(source));
      const targetHeight = scaledHeight(width, height, target);

      const bytes = await sharp(source)
        .resize(target, targetHeight, { fit: 'fill' })
        .flatten({ background: '#ffffff' })
        .jpeg({ quality })
        .toBuffer();

      logger.debug({ target, height: targetHeight, sizeBytes: bytes.length }, 'Variant rendered');

      return {
        label: variantLabel(target),
        width: target,
        height: targetHeight,
        bytes,
        checksum: sha256Hex(bytes),
      };
    },
  };
}
