import { ExifExtractor, TagReader } from '../metadata/ExifExtractor';
import { isPhotoFile, isVideoFile } from '../utils/fileClassifier';
import {
  GeoPhotoRecord,
  PhotoRecord,
  VideoRecord,
  VisualDataRecord,
} from '../types/VisualData';
import { ExtensionMatchMode, VisualDataType } from '../types/VisualDataType';
import type { Logger } from '../logger';
import { buildGeoPhoto, buildPhoto, buildVideo } from './recordBuilders';
import { compareByFilenameDigits, compareByGpsTimestamp } from './ordering';

/**
 * How one kind of visual data is recognised, built and ordered.
 * The scan, filter and index steps around it are shared.
 */
export interface DiscoveryPolicy<T extends VisualDataRecord> {
  /** Tag returned alongside the records */
  readonly type: VisualDataType;
  /** Whether the comparator needs digits in the file name */
  readonly ordersByFilenameDigits: boolean;
  /** Whether a directory entry name is a candidate */
  accepts(fileName: string, mode: ExtensionMatchMode): boolean;
  /** Build a record, or return undefined to drop the candidate */
  build(filePath: string, log?: Logger): Promise<T | undefined>;
  compare(a: T, b: T): number;
}

/**
 * Photos ordered by the digits in their file name, no metadata read
 */
export const plainPhotoPolicy: DiscoveryPolicy<PhotoRecord> = {
  type: VisualDataType.PHOTO,
  ordersByFilenameDigits: true,
  accepts: isPhotoFile,
  build: async filePath => buildPhoto(filePath),
  compare: compareByFilenameDigits,
};

/**
 * Photos that carry a GPS position and time, ordered by GPS time
 */
export function createExifPhotoPolicy(
  reader: TagReader = ExifExtractor
): DiscoveryPolicy<GeoPhotoRecord> {
  return {
    type: VisualDataType.PHOTO,
    ordersByFilenameDigits: false,
    accepts: isPhotoFile,
    build: (filePath, log) => buildGeoPhoto(filePath, reader, log),
    compare: compareByGpsTimestamp,
  };
}

export const videoPolicy: DiscoveryPolicy<VideoRecord> = {
  type: VisualDataType.VIDEO,
  ordersByFilenameDigits: true,
  accepts: isVideoFile,
  build: async filePath => buildVideo(filePath),
  compare: compareByFilenameDigits,
};
