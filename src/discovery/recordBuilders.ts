import {
  ExifTags,
  TagReader,
  gpsAltitude,
  gpsCompass,
  gpsLatitude,
  gpsLongitude,
  gpsSpeed,
  gpsTimestamp,
  timestamp,
} from '../metadata/ExifExtractor';
import { GeoPhotoRecord, PhotoRecord, VideoRecord } from '../types/VisualData';
import { VisualDataType } from '../types/VisualDataType';
import type { Logger } from '../logger';

export function buildPhoto(filePath: string): PhotoRecord {
  return { kind: VisualDataType.PHOTO, path: filePath };
}

export function buildVideo(filePath: string): VideoRecord {
  return { kind: VisualDataType.VIDEO, path: filePath };
}

/**
 * Build a photo from its EXIF tags.
 * GPS time, latitude and longitude are required; everything else is best-effort.
 *
 * @returns The photo, or undefined when one of the required fields is missing
 */
export async function buildGeoPhoto(
  filePath: string,
  reader: TagReader,
  log?: Logger
): Promise<GeoPhotoRecord | undefined> {
  const tags = await readTags(filePath, reader, log);

  const gpsTime = gpsTimestamp(tags);
  const latitude = gpsLatitude(tags);
  const longitude = gpsLongitude(tags);
  if (gpsTime === undefined || latitude === undefined || longitude === undefined) {
    log?.debug(
      {
        file: filePath,
        hasGpsTimestamp: gpsTime !== undefined,
        hasLatitude: latitude !== undefined,
        hasLongitude: longitude !== undefined,
      },
      'Skipping photo without GPS position and time.'
    );
    return undefined;
  }

  return {
    kind: VisualDataType.PHOTO,
    path: filePath,
    gpsTimestamp: gpsTime,
    latitude,
    longitude,
    exifTimestamp: timestamp(tags),
    gpsSpeed: gpsSpeed(tags),
    gpsAltitude: gpsAltitude(tags),
    gpsCompass: gpsCompass(tags),
  };
}

async function readTags(
  filePath: string,
  reader: TagReader,
  log?: Logger
): Promise<ExifTags | undefined> {
  try {
    return await reader.allTags(filePath);
  } catch (error) {
    // A reader that throws is no different from one that found nothing
    log?.debug(
      { file: filePath, err: (error as Error).message },
      'Tag reader failed.'
    );
    return undefined;
  }
}
