import sharp from 'sharp';
import type { AvatarBitmap } from './types.js';

export const AVATAR_SIZE = 140;

/**
 * Decode avatar bytes (PNG, JPEG, WebP, GIF...) to RGBA at 140x140.
 * Returns null on any decode failure so the card falls back to the
 * placeholder circle.
 */
export async function decodeAvatar(bytes: Buffer, size = AVATAR_SIZE): Promise<AvatarBitmap | null> {
  try {
    const { data, info } = await sharp(bytes)
      .ensureAlpha()
      .resize(size, size, { fit: 'fill', kernel: 'lanczos3' })
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  } catch (err) {
    console.warn(`  [avatar] decode failed: ${err}`);
    return null;
  }
}

/** A bitmap is usable when its buffer holds exactly width x height RGBA pixels. */
export function isUsableBitmap(bitmap: AvatarBitmap): boolean {
  return (
    Number.isInteger(bitmap.width) &&
    Number.isInteger(bitmap.height) &&
    bitmap.width > 0 &&
    bitmap.height > 0 &&
    bitmap.data.length === bitmap.width * bitmap.height * 4
  );
}
