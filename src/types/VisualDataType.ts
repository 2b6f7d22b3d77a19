/**
 * Kind of visual data a discovery run produces
 */
export enum VisualDataType {
  PHOTO = 'photo',
  VIDEO = 'video',
}

/**
 * How candidate extensions are matched against the known media extensions
 */
export type ExtensionMatchMode = 'substring' | 'suffix';

/**
 * What happens to a file whose name holds no digit when ordering by filename digits
 */
export type MissingDigitsPolicy = 'zero' | 'exclude';
