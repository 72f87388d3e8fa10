/**
 * @pdftoc/toc-detector
 *
 * Typography-based TOC inference, the TOC text notation and outline
 * validation.
 *
 * @packageDocumentation
 */

export { TocDetector } from './toc-detector';
export { HistogramBuilder } from './analyzers/histogram-builder';
export { NoiseFilter, PAGE_NUMBER_PATTERNS } from './filters/noise-filter';
export { HeadingClassifier, LevelClusterer } from './classifiers';
export { OutlineTreeBuilder, nestOutline, placeLevel } from './builders';
export type { LevelPlacement } from './builders';
export { TocTextCodec } from './codecs';
export { TocValidator } from './validators';
export type { TocValidationOptions } from './validators';
export { TocError, TocParseError, TocValidationError } from './errors';
export type { TocValidationIssue, TocValidationResult } from './errors';
export { CAPTION_KEYWORDS, TOC_DETECTOR } from './config/constants';
export { TextCleaner, roundToTolerance } from './utils';
export type {
  HeadingClassifierOptions,
  HistogramBuilderOptions,
  LevelClustererOptions,
  NoiseFilterOptions,
  OutlineItem,
  TocDetectionResult,
  TocDetectorOptions,
  TocParseResult,
} from './types';
