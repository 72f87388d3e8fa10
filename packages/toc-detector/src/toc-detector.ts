import type { LoggerMethods } from '@pdftoc/logger';
import type { SpanDocument } from '@pdftoc/model';

import type { TocDetectionResult, TocDetectorOptions } from './types';

import { HistogramBuilder } from './analyzers/histogram-builder';
import { OutlineTreeBuilder } from './builders';
import { HeadingClassifier, LevelClusterer } from './classifiers';
import { NoiseFilter } from './filters/noise-filter';

/**
 * TocDetector
 *
 * Infers a TOC forest from typography alone:
 * 1. HistogramBuilder: body size from the unfiltered spans
 * 2. NoiseFilter: drops running headers/footers, page numbers and captions
 * 3. HeadingClassifier: larger-or-bolder spans, same-line runs merged
 * 4. LevelClusterer: (size, bold) prominence ranks, capped by maxLevel
 * 5. OutlineTreeBuilder: reading-order nesting with the level clamp
 *
 * The stages hold configuration only, so one detector can process any number
 * of documents.
 */
export class TocDetector {
  private readonly histogramBuilder: HistogramBuilder;
  private readonly noiseFilter: NoiseFilter;
  private readonly headingClassifier: HeadingClassifier;
  private readonly levelClusterer: LevelClusterer;
  private readonly treeBuilder: OutlineTreeBuilder;

  constructor(
    private readonly logger: LoggerMethods,
    options?: TocDetectorOptions,
  ) {
    this.histogramBuilder = new HistogramBuilder(logger, options);
    this.noiseFilter = new NoiseFilter(logger, options);
    this.headingClassifier = new HeadingClassifier(logger, options);
    this.levelClusterer = new LevelClusterer(logger, options);
    this.treeBuilder = new OutlineTreeBuilder(logger);
  }

  detect(document: SpanDocument): TocDetectionResult {
    this.logger.info(
      `[TocDetector] Detecting headings in ${document.pageCount} page(s), ${document.spans.length} span(s)`,
    );

    const statistics = this.histogramBuilder.build(document.spans);
    if (!statistics) {
      this.logger.info('[TocDetector] Body size undefined, no headings');
      return { entries: [], statistics: null, candidateCount: 0 };
    }

    const spans = this.noiseFilter.filter(document);
    const headings = this.headingClassifier.classify(spans, statistics);
    const candidates = this.levelClusterer.cluster(headings, statistics);
    const entries = this.treeBuilder.build(candidates);

    this.logger.info(
      `[TocDetector] Detected ${candidates.length} heading(s), ${entries.length} top-level`,
    );

    return { entries, statistics, candidateCount: candidates.length };
  }
}
