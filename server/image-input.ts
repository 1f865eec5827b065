import sharp from 'sharp';
import type { RawImage } from '@shared/schema';
import { AppError, ErrorCode } from './error-handling';

const DATA_URL_PATTERN = /^data:([a-z]+\/[a-z0-9.+-]+);base64,/i;

const FORMAT_CONTENT_TYPES: Record<string, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
  gif: 'image/gif',
  tiff: 'image/tiff',
  avif: 'image/avif',
  heif: 'image/heif',
};

export interface DecodedImage extends RawImage {
  width: number;
  height: number;
}

/** Accepts raw base64 or a data URL. */
export function decodeImagePayload(payload: string): Buffer {
  const base64 = payload.replace(DATA_URL_PATTERN, '').replace(/\s/g, '');
  return Buffer.from(base64, 'base64');
}

/**
 * Decodes the header with sharp. Empty or undecodable bytes are the one
 * input error the pipeline reports to callers.
 */
export async function validateImage(bytes: Buffer | null | undefined): Promise<DecodedImage> {
  if (!bytes || bytes.length === 0) {
    throw new AppError(ErrorCode.INVALID_INPUT, new Error('Image is empty'));
  }

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(bytes).metadata();
  } catch (error) {
    throw new AppError(
      ErrorCode.INVALID_INPUT,
      new Error(`Image could not be decoded: ${error instanceof Error ? error.message : String(error)}`)
    );
  }

  if (!metadata.width || !metadata.height) {
    throw new AppError(ErrorCode.INVALID_INPUT, new Error('Image has no dimensions'));
  }

  return {
    data: bytes,
    contentType: (metadata.format && FORMAT_CONTENT_TYPES[metadata.format]) || 'application/octet-stream',
    width: metadata.width,
    height: metadata.height,
  };
}
