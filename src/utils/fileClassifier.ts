import * as path from 'path';
import { minimatch } from 'minimatch';
import { ExtensionMatchMode } from '../types/VisualDataType';

const photoExts = ['jpg', 'jpeg'];
const videoExts = ['mp4'];

// Preview images written next to the originals by cameras and sync tools
const THUMBNAIL_MARKER = 'thumb';

/**
 * Split a file name into its base and extension (dot excluded)
 */
function splitName(fileName: string): { base: string; ext: string } {
  const ext = path.extname(fileName);
  return {
    base: fileName.slice(0, fileName.length - ext.length),
    ext: ext.slice(1),
  };
}

function extensionMatches(
  ext: string,
  known: string[],
  mode: ExtensionMatchMode
): boolean {
  if (mode === 'suffix') {
    const lowered = ext.toLowerCase();
    return known.includes(lowered);
  }
  // Case-sensitive containment: ".jpge" and ".xjpgx" are accepted too
  return known.some(candidate => ext.includes(candidate));
}

/**
 * Whether a directory entry is a photo candidate.
 * Thumbnails are never candidates.
 */
export function isPhotoFile(
  fileName: string,
  mode: ExtensionMatchMode = 'substring'
): boolean {
  const { base, ext } = splitName(fileName);
  return (
    extensionMatches(ext, photoExts, mode) &&
    !base.toLowerCase().includes(THUMBNAIL_MARKER)
  );
}

export function isVideoFile(
  fileName: string,
  mode: ExtensionMatchMode = 'substring'
): boolean {
  const { ext } = splitName(fileName);
  return extensionMatches(ext, videoExts, mode);
}

/**
 * Check a file name against glob ignore patterns
 */
export function isIgnored(fileName: string, patterns: string[]): boolean {
  return patterns.some(pattern => minimatch(fileName, pattern, { dot: true }));
}
