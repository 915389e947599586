import path from 'node:path';
import { fileURLToPath } from 'node:url';

const LIB_DIR = path.dirname(fileURLToPath(import.meta.url));

/** Root of this checkout (`prebuilts/ndk` inside an Android tree). */
export const PREBUILTS_NDK_DIR = path.resolve(LIB_DIR, '../..');

/** Top of the Android tree that contains this checkout. */
export const ANDROID_DIR = path.resolve(PREBUILTS_NDK_DIR, '../..');

export function androidPath(androidDir: string, ...parts: string[]): string {
  return path.join(androidDir, ...parts);
}

export function defaultPlatformsMetadataPath(androidDir: string = ANDROID_DIR): string {
  return androidPath(androidDir, 'ndk', 'meta', 'platforms.json');
}
