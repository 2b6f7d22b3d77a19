import fsPromises, { copyFile, mkdir, mkdtemp, rm, symlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
  createDiscoverer,
  discoverGeoPhotos,
  discoverPhotos,
  discoverSequence,
  discoverUsingType,
  discoverVideos,
  discoverVisualData,
} from '../../src/discovery/VisualDataDiscovery';
import { plainPhotoPolicy, videoPolicy } from '../../src/discovery/policies';
import { ExifTags, TagReader } from '../../src/metadata/ExifExtractor';
import { VisualDataType } from '../../src/types/VisualDataType';

const fixturesDir = path.join(__dirname, '..', 'fixtures');

// Helper to create a temporary directory for tests
async function createTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), 'visual-discover-test-'));
}

// Helper to create empty files
async function touch(dirPath: string, ...names: string[]): Promise<void> {
  await Promise.all(names.map(name => writeFile(path.join(dirPath, name), '')));
}

function gpsTags(time: [number, number, number], overrides: ExifTags = {}): ExifTags {
  return {
    GPSDateStamp: '2024:03:01',
    GPSTimeStamp: time,
    GPSLatitude: [46, 46, 12],
    GPSLatitudeRef: 'N',
    GPSLongitude: [23, 35, 24],
    GPSLongitudeRef: 'E',
    ...overrides,
  };
}

// Tag reader serving canned tags by file name
function fakeReader(tagsByName: Record<string, ExifTags | undefined>): TagReader & {
  allTags: jest.Mock<Promise<ExifTags | undefined>, [string]>;
} {
  return {
    allTags: jest.fn(async (filePath: string) => tagsByName[path.basename(filePath)]),
  };
}

describe('VisualDataDiscovery', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('plain photo discovery', () => {
    it('should order photos by the digits in their names', async () => {
      await touch(tempDir, 'img_2.jpg', 'img_10.jpg', 'img_1.jpg');

      const result = await discoverPhotos(tempDir);

      expect(result.type).toBe('photo');
      expect(result.records).toEqual([
        { kind: VisualDataType.PHOTO, path: path.join(tempDir, 'img_1.jpg'), index: 0 },
        { kind: VisualDataType.PHOTO, path: path.join(tempDir, 'img_2.jpg'), index: 1 },
        { kind: VisualDataType.PHOTO, path: path.join(tempDir, 'img_10.jpg'), index: 2 },
      ]);
    });

    it('should never include thumbnails', async () => {
      await touch(tempDir, 'img_4.jpg', 'thumb_5.jpg', 'img_6_THUMB.jpeg');

      const result = await discoverPhotos(tempDir);

      expect(result.records.map(r => path.basename(r.path))).toEqual(['img_4.jpg']);
    });

    it('should skip videos and other files', async () => {
      await touch(tempDir, 'clip_3.jpg', 'clip_3.mp4', 'notes_1.txt');

      const result = await discoverPhotos(tempDir);

      expect(result.records.map(r => path.basename(r.path))).toEqual(['clip_3.jpg']);
    });

    it('should not recurse into subdirectories', async () => {
      await touch(tempDir, 'img_1.jpg');
      await mkdir(path.join(tempDir, 'nested'));
      await touch(path.join(tempDir, 'nested'), 'img_2.jpg');
      await mkdir(path.join(tempDir, 'folder_3.jpg'));

      const result = await discoverPhotos(tempDir);

      expect(result.records.map(r => r.path)).toEqual([path.join(tempDir, 'img_1.jpg')]);
    });

    it('should follow symlinks to files but not to directories', async () => {
      await touch(tempDir, 'img_1.jpg');
      await mkdir(path.join(tempDir, 'albums'));
      await symlink(path.join(tempDir, 'img_1.jpg'), path.join(tempDir, 'link_2.jpg'));
      await symlink(path.join(tempDir, 'albums'), path.join(tempDir, 'album_3.jpg'));
      await symlink(path.join(tempDir, 'gone.jpg'), path.join(tempDir, 'broken_4.jpg'));

      const result = await discoverPhotos(tempDir);

      expect(result.records.map(r => path.basename(r.path))).toEqual(['img_1.jpg', 'link_2.jpg']);
    });

    it('should return frozen records', async () => {
      await touch(tempDir, 'img_1.jpg');

      const result = await discoverPhotos(tempDir);

      expect(Object.isFrozen(result.records[0])).toBe(true);
    });

    it('should keep name order for equal digit keys', async () => {
      await touch(tempDir, 'b_01.jpg', 'a_1.jpg', 'c_2.jpg');

      const result = await discoverPhotos(tempDir);

      expect(result.records.map(r => path.basename(r.path))).toEqual([
        'a_1.jpg',
        'b_01.jpg',
        'c_2.jpg',
      ]);
    });

    it('should sort digitless names first by default', async () => {
      await touch(tempDir, 'img_1.jpg', 'cover.jpg');

      const result = await discoverPhotos(tempDir);

      expect(result.records.map(r => path.basename(r.path))).toEqual(['cover.jpg', 'img_1.jpg']);
    });

    it('should drop digitless names when asked to', async () => {
      await touch(tempDir, 'img_1.jpg', 'cover.jpg');

      const result = await discoverPhotos(tempDir, { missingDigits: 'exclude' });

      expect(result.records.map(r => path.basename(r.path))).toEqual(['img_1.jpg']);
      expect(result.records[0].index).toBe(0);
    });

    it('should honour ignore patterns', async () => {
      await touch(tempDir, 'img_1.jpg', 'img_2.jpg', 'raw_3.jpg');

      const result = await discoverPhotos(tempDir, { ignore: ['raw_*'] });

      expect(result.records.map(r => path.basename(r.path))).toEqual(['img_1.jpg', 'img_2.jpg']);
    });

    it('should match loose extensions only in substring mode', async () => {
      await touch(tempDir, 'img_1.jpg', 'img_2.jpge', 'img_3.JPG');

      const loose = await discoverPhotos(tempDir);
      const strict = await discoverPhotos(tempDir, { matchMode: 'suffix' });

      expect(loose.records.map(r => path.basename(r.path))).toEqual(['img_1.jpg', 'img_2.jpge']);
      expect(strict.records.map(r => path.basename(r.path))).toEqual(['img_1.jpg', 'img_3.JPG']);
    });

    it('should assign contiguous indices from zero', async () => {
      const names = Array.from({ length: 12 }, (_, i) => `frame_${(i * 7) % 12}.jpg`);
      await touch(tempDir, ...names, 'thumb_99.jpg');

      const result = await discoverPhotos(tempDir, { concurrency: 3 });

      expect(result.records.map(r => r.index)).toEqual(Array.from({ length: 12 }, (_, i) => i));
      expect(result.records.map(r => path.basename(r.path))).toEqual(
        Array.from({ length: 12 }, (_, i) => `frame_${i}.jpg`)
      );
    });

    it('should return identical results on repeated runs', async () => {
      await touch(tempDir, 'img_3.jpg', 'img_1.jpg', 'x_1.jpg', 'img_20.jpeg');

      const first = await discoverPhotos(tempDir);
      const second = await discoverPhotos(tempDir);

      expect(second).toEqual(first);
      expect(second.records).not.toBe(first.records);
    });
  });

  describe('EXIF photo discovery', () => {
    it('should read GPS data from real JPEG files', async () => {
      await copyFile(path.join(fixturesDir, 'gps-equator.jpg'), path.join(tempDir, 'img_1.jpg'));
      await copyFile(path.join(fixturesDir, 'gps-morning.jpg'), path.join(tempDir, 'img_2.jpg'));
      await touch(tempDir, 'img_3.jpg');

      const result = await discoverGeoPhotos(tempDir);

      expect(result.records.map(r => [path.basename(r.path), r.index])).toEqual([
        ['img_2.jpg', 0],
        ['img_1.jpg', 1],
      ]);
      expect(result.records[0].gpsTimestamp).toEqual(new Date('2024-03-01T08:15:00Z'));
      expect(result.records[0].latitude).toBeCloseTo(46.77, 6);
      expect(result.records[0].longitude).toBeCloseTo(23.59, 6);
      expect(result.records[1].gpsTimestamp).toEqual(new Date('2024-03-01T14:29:58Z'));
      expect(result.records[1].latitude).toBe(0);
      expect(result.records[1].longitude).toBe(-78.5);
      expect(result.records[1].exifTimestamp).toEqual(new Date('2024-03-01T14:29:58Z'));
    });

    it('should order photos by GPS time regardless of names', async () => {
      await touch(tempDir, 'a_1.jpg', 'b_2.jpg');
      const reader = fakeReader({
        'a_1.jpg': gpsTags([10, 0, 5]),
        'b_2.jpg': gpsTags([10, 0, 1]),
      });

      const result = await discoverGeoPhotos(tempDir, { tagReader: reader });

      expect(result.type).toBe('photo');
      expect(result.records.map(r => [path.basename(r.path), r.index])).toEqual([
        ['b_2.jpg', 0],
        ['a_1.jpg', 1],
      ]);
      expect(result.records[0].gpsTimestamp).toEqual(new Date('2024-03-01T10:00:01Z'));
    });

    it('should drop photos missing latitude', async () => {
      await touch(tempDir, 'img_1.jpg', 'img_2.jpg');
      const reader = fakeReader({
        'img_1.jpg': gpsTags([9, 0, 0], { GPSLatitude: undefined }),
        'img_2.jpg': gpsTags([9, 0, 1]),
      });

      const result = await discoverPhotos(tempDir, { exif: true, tagReader: reader });

      expect(result.records.map(r => path.basename(r.path))).toEqual(['img_2.jpg']);
      expect(result.records[0].index).toBe(0);
    });

    it('should drop photos missing longitude or GPS time', async () => {
      await touch(tempDir, 'img_1.jpg', 'img_2.jpg', 'img_3.jpg');
      const reader = fakeReader({
        'img_1.jpg': gpsTags([9, 0, 0], { GPSLongitude: undefined }),
        'img_2.jpg': gpsTags([9, 0, 1], { GPSDateStamp: undefined }),
        'img_3.jpg': undefined,
      });

      const result = await discoverGeoPhotos(tempDir, { tagReader: reader });

      expect(result).toEqual({ records: [], type: 'photo' });
    });

    it('should keep photos on the equator', async () => {
      await touch(tempDir, 'img_1.jpg');
      const reader = fakeReader({
        'img_1.jpg': gpsTags([9, 0, 0], { GPSLatitude: 0 }),
      });

      const result = await discoverGeoPhotos(tempDir, { tagReader: reader });

      expect(result.records).toHaveLength(1);
      expect(result.records[0].latitude).toBe(0);
    });

    it('should fill optional metadata when present', async () => {
      await touch(tempDir, 'img_1.jpg');
      const reader = fakeReader({
        'img_1.jpg': gpsTags([12, 30, 0], {
          GPSLatitudeRef: 'S',
          DateTimeOriginal: '2024:03:01 14:29:58',
          GPSSpeed: 10,
          GPSSpeedRef: 'N',
          GPSAltitude: 12.5,
          GPSAltitudeRef: 1,
          GPSImgDirection: 370,
        }),
      });

      const [photo] = (await discoverGeoPhotos(tempDir, { tagReader: reader })).records;

      expect(photo.path).toBe(path.join(tempDir, 'img_1.jpg'));
      expect(photo.latitude).toBeCloseTo(-46.77, 6);
      expect(photo.longitude).toBeCloseTo(23.59, 6);
      expect(photo.gpsTimestamp).toEqual(new Date('2024-03-01T12:30:00Z'));
      expect(photo.exifTimestamp).toEqual(new Date('2024-03-01T14:29:58Z'));
      expect(photo.gpsSpeed).toBeCloseTo(18.52, 6);
      expect(photo.gpsAltitude).toBe(-12.5);
      expect(photo.gpsCompass).toBe(10);
    });

    it('should leave optional metadata absent when missing', async () => {
      await touch(tempDir, 'img_1.jpg');
      const reader = fakeReader({ 'img_1.jpg': gpsTags([12, 30, 0]) });

      const [photo] = (await discoverGeoPhotos(tempDir, { tagReader: reader })).records;

      expect(photo.exifTimestamp).toBeUndefined();
      expect(photo.gpsSpeed).toBeUndefined();
      expect(photo.gpsAltitude).toBeUndefined();
      expect(photo.gpsCompass).toBeUndefined();
    });

    it('should read tags once per candidate and never for thumbnails', async () => {
      await touch(tempDir, 'img_1.jpg', 'img_2.jpg', 'thumb_5.jpg', 'clip_3.mp4');
      const reader = fakeReader({
        'img_1.jpg': gpsTags([8, 0, 0]),
        'img_2.jpg': gpsTags([8, 0, 1]),
        'thumb_5.jpg': gpsTags([8, 0, 2]),
      });

      const result = await discoverGeoPhotos(tempDir, { tagReader: reader });

      expect(result.records).toHaveLength(2);
      expect(reader.allTags).toHaveBeenCalledTimes(2);
      expect(reader.allTags.mock.calls.map(([file]) => path.basename(file)).sort()).toEqual([
        'img_1.jpg',
        'img_2.jpg',
      ]);
    });

    it('should drop only the file whose reader throws', async () => {
      await touch(tempDir, 'img_1.jpg', 'img_2.jpg');
      const reader: TagReader = {
        allTags: async filePath => {
          if (path.basename(filePath) === 'img_1.jpg') {
            throw new Error('corrupt segment');
          }
          return gpsTags([7, 0, 0]);
        },
      };

      const result = await discoverGeoPhotos(tempDir, { tagReader: reader });

      expect(result.records.map(r => path.basename(r.path))).toEqual(['img_2.jpg']);
    });

    it('should keep name order for equal GPS times', async () => {
      await touch(tempDir, 'c_1.jpg', 'a_3.jpg', 'b_2.jpg');
      const reader = fakeReader({
        'a_3.jpg': gpsTags([7, 0, 0]),
        'b_2.jpg': gpsTags([7, 0, 0]),
        'c_1.jpg': gpsTags([6, 59, 59]),
      });

      const result = await discoverGeoPhotos(tempDir, { tagReader: reader, concurrency: 1 });

      expect(result.records.map(r => path.basename(r.path))).toEqual([
        'c_1.jpg',
        'a_3.jpg',
        'b_2.jpg',
      ]);
    });
  });

  describe('video discovery', () => {
    it('should order videos by the digits in their names', async () => {
      await touch(tempDir, 'clip_3.mp4', 'clip_3.jpg', 'clip_12.mp4', 'clip_1.mp4');

      const result = await discoverVideos(tempDir);

      expect(result.type).toBe('video');
      expect(result.records).toEqual([
        { kind: VisualDataType.VIDEO, path: path.join(tempDir, 'clip_1.mp4'), index: 0 },
        { kind: VisualDataType.VIDEO, path: path.join(tempDir, 'clip_3.mp4'), index: 1 },
        { kind: VisualDataType.VIDEO, path: path.join(tempDir, 'clip_12.mp4'), index: 2 },
      ]);
    });
  });

  describe('invalid directories', () => {
    it('should return empty results for a missing path', async () => {
      const missing = path.join(tempDir, 'does-not-exist');

      await expect(discoverPhotos(missing)).resolves.toEqual({ records: [], type: 'photo' });
      await expect(discoverVideos(missing)).resolves.toEqual({ records: [], type: 'video' });
    });

    it('should return empty results for a file path', async () => {
      await touch(tempDir, 'img_1.jpg');
      const filePath = path.join(tempDir, 'img_1.jpg');

      await expect(discoverPhotos(filePath)).resolves.toEqual({ records: [], type: 'photo' });
    });

    it('should propagate errors listing an existing directory', async () => {
      const denied = Object.assign(new Error('permission denied'), { code: 'EACCES' });
      const readdirSpy = jest.spyOn(fsPromises, 'readdir').mockRejectedValueOnce(denied);

      try {
        await expect(discoverVideos(tempDir)).rejects.toBe(denied);
      } finally {
        readdirSpy.mockRestore();
      }
    });
  });

  describe('entry points', () => {
    it('should dispatch by type', async () => {
      await touch(tempDir, 'clip_3.jpg', 'clip_3.mp4');

      const photos = await discoverUsingType(tempDir, VisualDataType.PHOTO);
      const videos = await discoverUsingType(tempDir, VisualDataType.VIDEO);

      expect(photos.records.map(r => path.basename(r.path))).toEqual(['clip_3.jpg']);
      expect(videos.records.map(r => path.basename(r.path))).toEqual(['clip_3.mp4']);
    });

    it('should prefer photos for a sequence of unknown type', async () => {
      await touch(tempDir, 'clip_3.jpg', 'clip_3.mp4');

      const result = await discoverSequence(tempDir);

      expect(result.type).toBe('photo');
      expect(result.records).toHaveLength(1);
    });

    it('should fall back to videos when no photo survives', async () => {
      await touch(tempDir, 'img_1.jpg', 'clip_2.mp4');
      const reader = fakeReader({ 'img_1.jpg': undefined });

      const result = await discoverSequence(tempDir, { exif: true, tagReader: reader });

      expect(result.type).toBe('video');
      expect(result.records.map(r => path.basename(r.path))).toEqual(['clip_2.mp4']);
    });

    it('should report video for an empty directory', async () => {
      await expect(discoverSequence(tempDir)).resolves.toEqual({ records: [], type: 'video' });
    });

    it('should bind a policy into a reusable discoverer', async () => {
      await touch(tempDir, 'img_2.jpg', 'img_1.jpg');
      const discoverer = createDiscoverer(plainPhotoPolicy, { matchMode: 'suffix' });

      const result = await discoverer.discover(tempDir);

      expect(discoverer.type).toBe('photo');
      expect(result.records.map(r => r.index)).toEqual([0, 1]);
      expect(result.records.map(r => path.basename(r.path))).toEqual(['img_1.jpg', 'img_2.jpg']);
    });

    it('should accept a policy directly', async () => {
      await touch(tempDir, 'b_20.mp4', 'a_3.mp4');

      const result = await discoverVisualData(tempDir, videoPolicy);

      expect(result.records.map(r => path.basename(r.path))).toEqual(['a_3.mp4', 'b_20.mp4']);
    });
  });
});
