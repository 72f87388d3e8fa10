/**
 * @pdftoc/model
 *
 * Data shapes shared by the extractor, the detector and the writer.
 *
 * @packageDocumentation
 */

export type { TextSpan, SpanDocument } from './text-span';
export type {
  DocumentStatistics,
  SizeHistogramEntry,
} from './document-statistics';
export type { HeadingCandidate } from './heading-candidate';
export type { TocEntry } from './toc-entry';
