export const PRODUCT_FILE_PREFIX = 'products/';

function hasUnsafeObjectKeyChars(objectKey: string): boolean {
  return /[\u0000-\u001F\u007F]/.test(objectKey);
}

function hasPathConfusionSegments(objectKey: string): boolean {
  return objectKey.includes('..') || objectKey.startsWith('/') || objectKey.includes('\\') || objectKey.includes('//');
}

export function isSafeObjectKey(objectKey: string): boolean {
  if (!objectKey) return false;
  if (hasPathConfusionSegments(objectKey)) return false;
  if (hasUnsafeObjectKeyChars(objectKey)) return false;
  return true;
}

export function assertPrefix(objectKey: string, prefix: string): void {
  if (!objectKey.startsWith(prefix)) {
    throw new Error(`objectKey must start with ${prefix}`);
  }
  if (!isSafeObjectKey(objectKey)) {
    throw new Error('objectKey failed safety checks');
  }
}

export function fileNameFromObjectKey(objectKey: string): string {
  const last = objectKey.split('/').pop();
  return last && last.length > 0 ? last : 'download.bin';
}
