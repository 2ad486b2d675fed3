import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import sharp from 'sharp';
import { PHOTO_HEIGHT, PHOTO_WIDTH, errorMessage, photoFileName } from '@dossier/common';

export interface CropRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

export type PhotoMissReason = 'not_found' | 'unreadable' | 'decode_failed';

export type PhotoResult =
  | {
      status: 'found';
      dataUri: string;
      sourcePath: string;
      sourceWidth: number;
      sourceHeight: number;
      crop: CropRegion;
    }
  | {
      status: 'missing';
      reason: PhotoMissReason;
      expectedPath: string;
      error?: string;
    };

export type PhotoNormalizer = (agentName: string, photosDir: string) => Promise<PhotoResult>;

export const JPEG_QUALITY = 85;

/**
 * Centered crop to PHOTO_WIDTH:PHOTO_HEIGHT (3:4). The oversized dimension shrinks to
 * floor(other * ratio); the start offset is floor(diff / 2), so an odd leftover pixel comes
 * off the end.
 */
export const computeCropRegion = (width: number, height: number): CropRegion => {
  if (width * PHOTO_HEIGHT > height * PHOTO_WIDTH) {
    const cropWidth = Math.max(1, Math.floor((height * PHOTO_WIDTH) / PHOTO_HEIGHT));
    return { left: Math.floor((width - cropWidth) / 2), top: 0, width: cropWidth, height };
  }

  if (width * PHOTO_HEIGHT < height * PHOTO_WIDTH) {
    const cropHeight = Math.max(1, Math.floor((width * PHOTO_HEIGHT) / PHOTO_WIDTH));
    return { left: 0, top: Math.floor((height - cropHeight) / 2), width, height: cropHeight };
  }

  return { left: 0, top: 0, width, height };
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

export const normalizePhoto: PhotoNormalizer = async (agentName, photosDir) => {
  const expectedPath = join(photosDir, photoFileName(agentName));

  let source: Buffer;
  try {
    source = await readFile(expectedPath);
  } catch (error) {
    return isMissingFile(error)
      ? { status: 'missing', reason: 'not_found', expectedPath }
      : { status: 'missing', reason: 'unreadable', expectedPath, error: errorMessage(error) };
  }

  try {
    const { width, height } = await sharp(source).metadata();
    if (!width || !height) {
      return { status: 'missing', reason: 'decode_failed', expectedPath, error: 'image has no dimensions' };
    }

    const crop = computeCropRegion(width, height);
    // Upscales small sources; the frame size is fixed.
    const output = await sharp(source)
      .extract(crop)
      .resize(PHOTO_WIDTH, PHOTO_HEIGHT, { fit: 'fill', kernel: sharp.kernel.lanczos3 })
      .flatten({ background: '#ffffff' })
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer();

    return {
      status: 'found',
      dataUri: `data:image/jpeg;base64,${output.toString('base64')}`,
      sourcePath: expectedPath,
      sourceWidth: width,
      sourceHeight: height,
      crop
    };
  } catch (error) {
    return { status: 'missing', reason: 'decode_failed', expectedPath, error: errorMessage(error) };
  }
};
