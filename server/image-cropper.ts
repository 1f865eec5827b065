/**
 * Intelligent Cropper
 *
 * Crops the photo to its principal object before the experts see it.
 * Detector order is fixed: Google Vision object localization first,
 * Rekognition label instances second. Any failure falls through to the next
 * detector, and then to the uncropped original.
 */

import sharp from 'sharp';
import type { CropPreview, CropResult, NormalizedBox, ObjectSignal, RawImage, Rect } from '@shared/schema';
import { DetectorId } from '@shared/schema';
import { ErrorCode, errorMessage } from './error-handling';
import { withTimeout } from './retry-strategy';
import { validateImage } from './image-input';
import type { LazyHandle } from './lazy-handle';

export interface ObjectLocalizer {
  localizeObjects(image: Buffer, signal?: AbortSignal): Promise<ObjectSignal[]>;
}

export interface LocalizerSlot {
  id: Exclude<DetectorId, 'none'>;
  handle: LazyHandle<ObjectLocalizer>;
}

const CROP_JPEG_QUALITY = 90;

export function toPixelRect(box: NormalizedBox, imageWidth: number, imageHeight: number): Rect | null {
  const x = Math.max(0, Math.floor(box.left * imageWidth));
  const y = Math.max(0, Math.floor(box.top * imageHeight));
  const right = Math.min(imageWidth, Math.ceil((box.left + box.width) * imageWidth));
  const bottom = Math.min(imageHeight, Math.ceil((box.top + box.height) * imageHeight));
  const width = right - x;
  const height = bottom - y;
  if (width < 1 || height < 1) return null;
  return { x, y, width, height };
}

function bestBox(objects: ObjectSignal[]): NormalizedBox | null {
  let best: ObjectSignal | null = null;
  for (const obj of objects) {
    if (!obj.box) continue;
    if (!best || obj.confidence > best.confidence) best = obj;
  }
  return best?.box ?? null;
}

export class ImageCropper {
  constructor(
    private readonly localizers: LocalizerSlot[],
    private readonly timeoutMs: number
  ) {}

  async crop(image: RawImage, signal?: AbortSignal): Promise<CropResult> {
    let width: number;
    let height: number;
    try {
      ({ width, height } = await validateImage(image.data));
    } catch (error) {
      console.warn(`[Cropper] Cannot read image dimensions: ${errorMessage(error)}`);
      return { croppedImage: image, sourceDetector: DetectorId.NONE };
    }

    for (const slot of this.localizers) {
      if (signal?.aborted) break;

      const box = await this.locate(slot, image, signal);
      if (!box) continue;

      const rect = toPixelRect(box, width, height);
      if (!rect) continue;

      try {
        const data = await sharp(image.data)
          .extract({ left: rect.x, top: rect.y, width: rect.width, height: rect.height })
          .jpeg({ quality: CROP_JPEG_QUALITY })
          .toBuffer();
        console.log(`[Cropper] ${slot.id} box ${rect.width}x${rect.height} at (${rect.x},${rect.y})`);
        return {
          croppedImage: { data, contentType: 'image/jpeg' },
          sourceDetector: slot.id,
          boundingBox: rect,
        };
      } catch (error) {
        console.warn(`[Cropper] Extract failed for ${slot.id} box: ${errorMessage(error)}`);
        return { croppedImage: image, sourceDetector: DetectorId.NONE };
      }
    }

    return { croppedImage: image, sourceDetector: DetectorId.NONE };
  }

  async intelligentCropPreview(imageBytes: Buffer): Promise<CropPreview> {
    const image = await validateImage(imageBytes);
    const result = await this.crop(image);
    return {
      croppedImage: result.croppedImage.data.toString('base64'),
      service: result.sourceDetector,
      boundingBox: result.boundingBox,
    };
  }

  private async locate(slot: LocalizerSlot, image: RawImage, signal?: AbortSignal): Promise<NormalizedBox | null> {
    const acquired = slot.handle.get();
    if (!acquired.ok) return null;

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const objects = await withTimeout(
        acquired.value.localizeObjects(image.data, controller.signal),
        this.timeoutMs,
        ErrorCode.UPSTREAM_TIMEOUT
      );
      const box = bestBox(objects);
      if (!box) {
        console.log(`[Cropper] ${slot.id} found no localized object`);
      }
      return box;
    } catch (error) {
      controller.abort();
      console.warn(`[Cropper] ${slot.id} localization failed: ${errorMessage(error)}`);
      return null;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
