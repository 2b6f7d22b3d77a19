import { VisualDataType } from './VisualDataType';

/**
 * Fields shared by every discovered record
 */
export interface VisualDataRecord {
  readonly kind: VisualDataType;
  readonly path: string; // Absolute or caller-relative path
}

/**
 * A record placed in the ordered result; index counts from 0 with no gaps
 */
export type Indexed<T extends VisualDataRecord> = T & { readonly index: number };

/**
 * Geolocation and time metadata read from a photo's EXIF block.
 * Every field is best-effort; absent means the tag was missing or unusable.
 */
export interface PhotoMetadata {
  exifTimestamp?: Date; // Camera clock
  gpsTimestamp?: Date; // GPS receiver clock, authoritative when present
  latitude?: number; // Decimal degrees
  longitude?: number; // Decimal degrees
  gpsSpeed?: number; // km/h
  gpsAltitude?: number; // Metres, negative below sea level
  gpsCompass?: number; // Degrees in [0, 360)
}

export interface PhotoRecord extends VisualDataRecord, Readonly<PhotoMetadata> {
  readonly kind: VisualDataType.PHOTO;
}

/**
 * Photo that passed EXIF validation: the GPS trio is always present
 */
export interface GeoPhotoRecord extends PhotoRecord {
  readonly gpsTimestamp: Date;
  readonly latitude: number;
  readonly longitude: number;
}

export interface VideoRecord extends VisualDataRecord {
  readonly kind: VisualDataType.VIDEO;
}

/**
 * Ordered records of one kind, as returned by every discovery entry point
 */
export interface DiscoveryResult<T extends VisualDataRecord = PhotoRecord | VideoRecord> {
  records: Array<Indexed<T>>;
  type: VisualDataType;
}
