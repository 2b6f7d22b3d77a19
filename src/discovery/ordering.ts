import * as path from 'path';
import { PhotoRecord, VisualDataRecord } from '../types/VisualData';

type PathRecord = Pick<VisualDataRecord, 'path'>;

/**
 * Sort key made of every decimal digit in a file's base name, in order.
 * `IMG_0042_2.jpg` gives 00422 → 422n. BigInt keeps long timestamps like
 * `20230514_101530123` exact.
 *
 * @returns The key, or undefined when the name holds no digit
 */
export function digitSortKey(filePath: string): bigint | undefined {
  const digits = path.basename(filePath).replace(/[^0-9]/g, '');
  return digits.length > 0 ? BigInt(digits) : undefined;
}

/**
 * Ascending by filename digits. Names without digits sort as key 0.
 */
export function compareByFilenameDigits(a: PathRecord, b: PathRecord): number {
  const left = digitSortKey(a.path) ?? 0n;
  const right = digitSortKey(b.path) ?? 0n;
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/**
 * Ascending by GPS time. Records missing a GPS time go last.
 */
export function compareByGpsTimestamp(
  a: Pick<PhotoRecord, 'gpsTimestamp'>,
  b: Pick<PhotoRecord, 'gpsTimestamp'>
): number {
  const left = a.gpsTimestamp?.getTime() ?? Number.POSITIVE_INFINITY;
  const right = b.gpsTimestamp?.getTime() ?? Number.POSITIVE_INFINITY;
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/**
 * Stable sort into a new array
 */
export function sortStable<T>(items: readonly T[], compare: (a: T, b: T) => number): T[] {
  return items
    .map((item, position) => ({ item, position }))
    .sort((a, b) => compare(a.item, b.item) || a.position - b.position)
    .map(entry => entry.item);
}
