const FALLBACK_FILE_NAME = 'file.bin';

/**
 * Builds the storage key `{prefix}/{id}/{fileName}`. Only the last path segment
 * of the client-supplied name is kept, so a name such as `../../clip.mp4`
 * cannot escape the per-upload folder.
 */
export function buildUploadObjectKey(prefix: string, uploadFolderId: string, fileName: string): string {
  const normalizedPrefix = prefix.trim().replace(/^\/+|\/+$/g, '');
  const safeName = toSafeFileName(fileName);
  return normalizedPrefix
    ? `${normalizedPrefix}/${uploadFolderId}/${safeName}`
    : `${uploadFolderId}/${safeName}`;
}

export function toSafeFileName(fileName: string): string {
  const segments = fileName.trim().split(/[\\/]+/);
  const lastSegment = (segments[segments.length - 1] ?? '').trim();

  if (!lastSegment || lastSegment === '.' || lastSegment === '..') {
    return FALLBACK_FILE_NAME;
  }

  return lastSegment;
}

export function fileNameFromObjectKey(objectKey: string): string {
  return objectKey.substring(objectKey.lastIndexOf('/') + 1);
}
