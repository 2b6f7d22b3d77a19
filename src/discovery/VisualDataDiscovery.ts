import { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import path from 'path';
import PQueue from 'p-queue';
import { logger as rootLogger, Logger } from '../logger';
import { TagReader } from '../metadata/ExifExtractor';
import { isIgnored } from '../utils/fileClassifier';
import {
  DiscoveryResult,
  GeoPhotoRecord,
  Indexed,
  PhotoRecord,
  VideoRecord,
  VisualDataRecord,
} from '../types/VisualData';
import {
  ExtensionMatchMode,
  MissingDigitsPolicy,
  VisualDataType,
} from '../types/VisualDataType';
import {
  DiscoveryPolicy,
  createExifPhotoPolicy,
  plainPhotoPolicy,
  videoPolicy,
} from './policies';
import { digitSortKey, sortStable } from './ordering';

export const DEFAULT_CONCURRENCY = 8;

export interface DiscoveryOptions {
  /** Extension matching, substring by default */
  matchMode?: ExtensionMatchMode;
  /** Fate of digitless names under filename-digit ordering, sorted as 0 by default */
  missingDigits?: MissingDigitsPolicy;
  /** Glob patterns matched against file names */
  ignore?: string[];
  /** Records built at the same time */
  concurrency?: number;
  logger?: Logger;
}

export interface PhotoDiscoveryOptions extends DiscoveryOptions {
  /** Read EXIF and keep only photos with GPS position and time */
  exif?: boolean;
  tagReader?: TagReader;
}

/**
 * Something that turns a directory into ordered records of one kind
 */
export interface Discoverer<T extends VisualDataRecord> {
  readonly type: VisualDataType;
  discover(directoryPath: string): Promise<DiscoveryResult<T>>;
}

/**
 * Scan one directory (no recursion) and return its records of the policy's kind,
 * ordered by the policy and indexed from 0.
 *
 * A path that is not a directory gives an empty result. Failing to list an
 * existing directory is thrown to the caller.
 */
export async function discoverVisualData<T extends VisualDataRecord>(
  directoryPath: string,
  policy: DiscoveryPolicy<T>,
  options: DiscoveryOptions = {}
): Promise<DiscoveryResult<T>> {
  const log = (options.logger ?? rootLogger).child({
    scope: 'discovery',
    type: policy.type,
  });
  const matchMode = options.matchMode ?? 'substring';
  const missingDigits = options.missingDigits ?? 'zero';
  const ignore = options.ignore ?? [];

  log.debug({ directory: directoryPath }, `Searching for ${policy.type} files.`);

  if (!(await isDirectory(directoryPath, log))) {
    return { records: [], type: policy.type };
  }

  const entries = await readdir(directoryPath, { withFileTypes: true });
  const fileNames = (await listFiles(directoryPath, entries, log))
    .sort(compareCodePoints)
    .filter(name => policy.accepts(name, matchMode))
    .filter(name => !isIgnored(name, ignore))
    .filter(
      name =>
        !(
          policy.ordersByFilenameDigits &&
          missingDigits === 'exclude' &&
          digitSortKey(name) === undefined
        )
    );

  const candidates = await buildAll(directoryPath, fileNames, policy, options, log);
  const records: Array<Indexed<T>> = sortStable(candidates, (a, b) =>
    policy.compare(a, b)
  ).map((candidate, index) => freezeRecord({ ...candidate, index }));

  log.debug(
    {
      directory: directoryPath,
      candidates: fileNames.length,
      dropped: fileNames.length - records.length,
      records: records.length,
    },
    `Discovered ${records.length} ${policy.type} files.`
  );

  return { records, type: policy.type };
}

/**
 * Bind a policy and options into a reusable discoverer
 */
export function createDiscoverer<T extends VisualDataRecord>(
  policy: DiscoveryPolicy<T>,
  options: DiscoveryOptions = {}
): Discoverer<T> {
  return {
    type: policy.type,
    discover: directoryPath => discoverVisualData(directoryPath, policy, options),
  };
}

/**
 * Photos ordered by filename digits, or GPS-validated photos ordered by GPS time
 * when `options.exif` is set
 */
export function discoverPhotos(
  directoryPath: string,
  options: PhotoDiscoveryOptions = {}
): Promise<DiscoveryResult<PhotoRecord>> {
  if (options.exif) {
    return discoverGeoPhotos(directoryPath, options);
  }
  return discoverVisualData(directoryPath, plainPhotoPolicy, options);
}

export function discoverGeoPhotos(
  directoryPath: string,
  options: PhotoDiscoveryOptions = {}
): Promise<DiscoveryResult<GeoPhotoRecord>> {
  return discoverVisualData(
    directoryPath,
    createExifPhotoPolicy(options.tagReader),
    options
  );
}

export function discoverVideos(
  directoryPath: string,
  options: DiscoveryOptions = {}
): Promise<DiscoveryResult<VideoRecord>> {
  return discoverVisualData(directoryPath, videoPolicy, options);
}

/**
 * Discover records of a type known in advance
 */
export function discoverUsingType(
  directoryPath: string,
  type: VisualDataType,
  options: PhotoDiscoveryOptions = {}
): Promise<DiscoveryResult> {
  switch (type) {
    case VisualDataType.PHOTO:
      return discoverPhotos(directoryPath, options);
    case VisualDataType.VIDEO:
      return discoverVideos(directoryPath, options);
  }
}

/**
 * Discover a sequence of unknown type: photos when any survive, videos otherwise
 */
export async function discoverSequence(
  directoryPath: string,
  options: PhotoDiscoveryOptions = {}
): Promise<DiscoveryResult> {
  const photos = await discoverPhotos(directoryPath, options);
  if (photos.records.length > 0) {
    return photos;
  }
  return discoverVideos(directoryPath, options);
}

async function isDirectory(directoryPath: string, log: Logger): Promise<boolean> {
  try {
    const stats = await stat(directoryPath);
    if (stats.isDirectory()) {
      return true;
    }
    log.debug({ directory: directoryPath }, 'Not a directory.');
    return false;
  } catch (error) {
    log.debug(
      {
        directory: directoryPath,
        code: (error as NodeJS.ErrnoException).code,
      },
      'Directory is not accessible.'
    );
    return false;
  }
}

/**
 * Names of regular files, and of symlinks that resolve to one
 */
async function listFiles(
  directoryPath: string,
  entries: Dirent[],
  log: Logger
): Promise<string[]> {
  const names: string[] = [];
  for (const entry of entries) {
    if (entry.isFile()) {
      names.push(entry.name);
    } else if (entry.isSymbolicLink()) {
      if (await isLinkToFile(path.join(directoryPath, entry.name), log)) {
        names.push(entry.name);
      }
    }
  }
  return names;
}

async function isLinkToFile(linkPath: string, log: Logger): Promise<boolean> {
  try {
    return (await stat(linkPath)).isFile();
  } catch (error) {
    log.debug(
      { file: linkPath, code: (error as NodeJS.ErrnoException).code },
      'Skipping broken symlink.'
    );
    return false;
  }
}

/**
 * Run every builder through a bounded queue; one failing build drops only its file.
 * Results keep the order of `fileNames`.
 */
async function buildAll<T extends VisualDataRecord>(
  directoryPath: string,
  fileNames: string[],
  policy: DiscoveryPolicy<T>,
  options: DiscoveryOptions,
  log: Logger
): Promise<T[]> {
  const queue = new PQueue({
    concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
  });
  const slots: Array<T | undefined> = fileNames.map(() => undefined);

  await Promise.all(
    fileNames.map((name, position) => {
      const filePath = path.join(directoryPath, name);
      return queue.add(() =>
        Promise.resolve()
          .then(() => policy.build(filePath, log))
          .then(
            record => {
              slots[position] = record;
            },
            (error: unknown) => {
              log.debug(
                { file: filePath, err: (error as Error).message },
                'Failed to build record.'
              );
            }
          )
      );
    })
  );

  return slots.filter((record): record is T => record !== undefined);
}

function freezeRecord<R extends VisualDataRecord>(record: R): R {
  Object.freeze(record);
  return record;
}

function compareCodePoints(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
