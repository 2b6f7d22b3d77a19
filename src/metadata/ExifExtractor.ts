import exifr from 'exifr';
import { logger } from '../logger';

/**
 * Flat tag mapping as produced by exifr with `mergeOutput`
 */
export type ExifTags = Record<string, unknown>;

/**
 * Anything able to turn a file path into a tag mapping.
 * Implementations must not throw for unreadable files; they return undefined.
 */
export interface TagReader {
  allTags(filePath: string): Promise<ExifTags | undefined>;
}

const MPH_TO_KMH = 1.609344;
const KNOTS_TO_KMH = 1.852;

/**
 * EXIF tag reader for photos, backed by exifr
 */
export class ExifExtractor {
  /**
   * Read every TIFF, EXIF and GPS tag from an image file
   *
   * @param filePath - Path to the image file
   * @returns Tag mapping or undefined if the file carries no readable EXIF
   */
  static async allTags(filePath: string): Promise<ExifTags | undefined> {
    try {
      const data: unknown = await exifr.parse(filePath, {
        tiff: true,
        exif: true,
        gps: true,
        translateValues: false,
        // Raw date strings; revived Dates would carry the host time zone
        reviveValues: false,
        mergeOutput: true,
      });
      return isTagMapping(data) ? data : undefined;
    } catch (error) {
      logger.child({ scope: 'exif' }).debug(
        { file: filePath, err: (error as Error).message },
        'EXIF extraction failed.'
      );
      return undefined;
    }
  }
}

/**
 * Capture time from the camera clock
 */
export function timestamp(tags: ExifTags | undefined): Date | undefined {
  if (!tags) {
    return undefined;
  }
  return (
    toDate(tags.DateTimeOriginal) ??
    toDate(tags.CreateDate) ??
    toDate(tags.DateTime)
  );
}

/**
 * Capture time from the GPS receiver, built from GPSDateStamp and GPSTimeStamp (UTC)
 */
export function gpsTimestamp(tags: ExifTags | undefined): Date | undefined {
  if (!tags) {
    return undefined;
  }
  const date = toCalendarDate(tags.GPSDateStamp);
  const time = toTimeOfDay(tags.GPSTimeStamp);
  if (!date || !time) {
    return undefined;
  }
  const ms =
    Date.UTC(date.year, date.month - 1, date.day, time.hours, time.minutes) +
    Math.round(time.seconds * 1000);
  return validDate(new Date(ms));
}

export function gpsLatitude(tags: ExifTags | undefined): number | undefined {
  if (!tags) {
    return undefined;
  }
  return signedCoordinate(tags.GPSLatitude, tags.GPSLatitudeRef, 'S', 90);
}

export function gpsLongitude(tags: ExifTags | undefined): number | undefined {
  if (!tags) {
    return undefined;
  }
  return signedCoordinate(tags.GPSLongitude, tags.GPSLongitudeRef, 'W', 180);
}

/**
 * Ground speed in km/h
 */
export function gpsSpeed(tags: ExifTags | undefined): number | undefined {
  if (!tags) {
    return undefined;
  }
  const speed = toNumber(tags.GPSSpeed);
  if (speed === undefined) {
    return undefined;
  }
  switch (toRef(tags.GPSSpeedRef)) {
    case 'M':
      return speed * MPH_TO_KMH;
    case 'N':
      return speed * KNOTS_TO_KMH;
    default:
      return speed;
  }
}

/**
 * Altitude in metres; GPSAltitudeRef 1 means below sea level
 */
export function gpsAltitude(tags: ExifTags | undefined): number | undefined {
  if (!tags) {
    return undefined;
  }
  const altitude = toNumber(tags.GPSAltitude);
  if (altitude === undefined) {
    return undefined;
  }
  const ref = toNumber(tags.GPSAltitudeRef);
  return ref === 1 ? -Math.abs(altitude) : altitude;
}

/**
 * Heading in degrees, image direction first and direction of travel as fallback
 */
export function gpsCompass(tags: ExifTags | undefined): number | undefined {
  if (!tags) {
    return undefined;
  }
  const heading = toNumber(tags.GPSImgDirection) ?? toNumber(tags.GPSTrack);
  if (heading === undefined) {
    return undefined;
  }
  return ((heading % 360) + 360) % 360;
}

function isTagMapping(value: unknown): value is ExifTags {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toRef(value: unknown): string | undefined {
  return typeof value === 'string' ? value.trim().toUpperCase() : undefined;
}

/**
 * Decimal degrees from either a number or a [degrees, minutes, seconds] triple
 */
function toDegrees(value: unknown): number | undefined {
  if (!Array.isArray(value)) {
    return toNumber(value);
  }
  if (value.length === 0 || value.length > 3) {
    return undefined;
  }
  const parts = value.map(toNumber);
  let degrees = 0;
  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    if (part === undefined) {
      return undefined;
    }
    degrees += part / 60 ** i;
  }
  return degrees;
}

function signedCoordinate(
  value: unknown,
  ref: unknown,
  negativeRef: 'S' | 'W',
  limit: number
): number | undefined {
  const degrees = toDegrees(value);
  if (degrees === undefined || Math.abs(degrees) > limit) {
    return undefined;
  }
  return toRef(ref) === negativeRef ? -Math.abs(degrees) : degrees;
}

const exifDateTimePattern =
  /^(\d{4})[:-](\d{2})[:-](\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2}(?:\.\d+)?))?/;

function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return validDate(value);
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const match = value.trim().match(exifDateTimePattern);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hours = '0', minutes = '0', seconds = '0'] = match;
  const ms =
    Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hours), Number(minutes)) +
    Math.round(Number(seconds) * 1000);
  return validDate(new Date(ms));
}

function toCalendarDate(
  value: unknown
): { year: number; month: number; day: number } | undefined {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return undefined;
    }
    // Readers that revive date-only stamps place them at local midnight
    return {
      year: value.getFullYear(),
      month: value.getMonth() + 1,
      day: value.getDate(),
    };
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const match = value.trim().match(/^(\d{4})[:-](\d{2})[:-](\d{2})$/);
  if (!match) {
    return undefined;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return undefined;
  }
  return { year, month, day };
}

function toTimeOfDay(
  value: unknown
): { hours: number; minutes: number; seconds: number } | undefined {
  let parts: Array<number | undefined>;
  if (Array.isArray(value)) {
    parts = value.map(toNumber);
  } else if (typeof value === 'string') {
    parts = value.trim().split(':').map(toNumber);
  } else {
    return undefined;
  }
  if (parts.length !== 3) {
    return undefined;
  }
  const [hours, minutes, seconds] = parts;
  if (hours === undefined || minutes === undefined || seconds === undefined) {
    return undefined;
  }
  if (hours < 0 || hours > 23 || minutes < 0 || minutes > 59 || seconds < 0 || seconds >= 61) {
    return undefined;
  }
  return { hours, minutes, seconds };
}

function validDate(value: Date): Date | undefined {
  return Number.isNaN(value.getTime()) ? undefined : value;
}
