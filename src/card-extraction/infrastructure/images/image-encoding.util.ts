import * as path from 'path';
import { EncodedImage } from '../../domain/ports/image-source.port';

const MIME_TYPES_BY_EXTENSION: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
};

export const SUPPORTED_MIME_TYPES = ['image/jpeg', 'image/png'];

export function mimeTypeFor(filename: string): string | null {
  return MIME_TYPES_BY_EXTENSION[path.extname(filename).toLowerCase()] ?? null;
}

export function isSupportedImage(filename: string): boolean {
  return mimeTypeFor(filename) !== null;
}

export function encodeImageBuffer(
  buffer: Buffer,
  filename: string,
  mimeType: string,
): EncodedImage {
  return {
    filename,
    mimeType,
    base64: buffer.toString('base64'),
  };
}
