import type { LoggerMethods, LogSink } from '@pdftoc/logger';
import type { SpanDocument, TocEntry } from '@pdftoc/model';

import type { CliOptions } from './options';

import {
  TocDetector,
  TocTextCodec,
  TocValidator,
} from '@pdftoc/toc-detector';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';

import { CliError } from './errors';
import { assertOutputPathFree, resolveOutputPath } from './output-path';

/**
 * PDF access the workflow needs (SpanExtractor)
 */
export interface SpanSource {
  extract(bytes: Uint8Array): Promise<SpanDocument>;
}

/**
 * Outline writing the workflow needs (BookmarkWriter)
 */
export interface OutlineSink {
  getPageCount(bytes: Uint8Array): Promise<number>;
  write(bytes: Uint8Array, entries: readonly TocEntry[]): Promise<Uint8Array>;
}

/**
 * Interactive review step (TocEditor)
 */
export interface TextEditor {
  edit(text: string): Promise<string>;
}

export interface PdfTocCliDependencies {
  extractor: SpanSource;
  writer: OutlineSink;
  editor: TextEditor;
  stdout: LogSink;
  stderr: LogSink;
}

/**
 * PdfTocCli
 *
 * One `pdftoc` invocation: obtain a TOC (detected, edited, or imported from a
 * text file), validate it against the document and write it as bookmarks.
 * Output-path collisions are checked before anything else touches the disk.
 */
export class PdfTocCli {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly deps: PdfTocCliDependencies,
  ) {}

  /**
   * @throws {CliError} On missing input files or an empty TOC file
   * @throws {OutputPathCollisionError} When the output path is taken
   * @throws {TocParseError} On malformed TOC text
   * @throws {TocValidationError} When the TOC does not fit the document
   */
  async run(options: CliOptions): Promise<void> {
    if (!existsSync(options.input)) {
      throw new CliError(`File not found: ${options.input}`);
    }

    const outputPath = resolveOutputPath(options);
    if (outputPath !== null) {
      assertOutputPathFree(outputPath, options);
    }

    const source = this.readPdf(options.input);

    if (outputPath === null) {
      const detected = await this.detect(source, options.maxLevel);
      if (detected.length === 0) {
        this.deps.stderr.write('No headings detected.\n');
      } else {
        this.deps.stdout.write(TocTextCodec.serialize(detected));
      }
      return;
    }

    const entries =
      options.toc === undefined
        ? await this.obtainDetected(source, options)
        : this.importToc(options.toc);
    if (entries === null) {
      return;
    }

    const totalPages = await this.deps.writer.getPageCount(source);
    new TocValidator({ totalPages }).validateOrThrow(entries);

    const output = await this.deps.writer.write(source, entries);
    this.writeOutput(outputPath, output);

    this.deps.stdout.write(
      `Wrote ${countEntries(entries)} bookmarks → ${outputPath}\n`,
    );
  }

  /**
   * Detect headings and, with `--edit`, let the user revise them
   *
   * @returns null when there is nothing to write
   */
  private async obtainDetected(
    source: Uint8Array,
    options: CliOptions,
  ): Promise<TocEntry[] | null> {
    const detected = await this.detect(source, options.maxLevel);
    if (detected.length === 0) {
      this.deps.stderr.write('No headings detected.\n');
      return null;
    }
    if (!options.edit) {
      return detected;
    }

    const edited = await this.review(detected);
    if (edited === null) {
      this.deps.stderr.write('No headings after editing. Aborted.\n');
    }
    return edited;
  }

  private async detect(
    source: Uint8Array,
    maxLevel: number | undefined,
  ): Promise<TocEntry[]> {
    const document = await this.deps.extractor.extract(source);
    return new TocDetector(this.logger, { maxLevel }).detect(document).entries;
  }

  /**
   * @returns The edited TOC, or null when the user cleared the file
   */
  private async review(entries: TocEntry[]): Promise<TocEntry[] | null> {
    const text = await this.deps.editor.edit(TocTextCodec.serialize(entries));
    const result = TocTextCodec.parse(text);
    return result.kind === 'aborted' ? null : result.entries;
  }

  private importToc(tocPath: string): TocEntry[] {
    if (!existsSync(tocPath)) {
      throw new CliError(`TOC file not found: ${tocPath}`);
    }

    let text: string;
    try {
      text = readFileSync(tocPath, 'utf-8');
    } catch (error) {
      throw CliError.fromError('Failed to read TOC file', error);
    }

    const result = TocTextCodec.parse(text);
    if (result.kind === 'aborted') {
      throw new CliError('TOC file is empty or contains no headings');
    }

    this.logger.info(
      `[PdfTocCli] Imported ${countEntries(result.entries)} heading(s) from ${tocPath}`,
    );
    return result.entries;
  }

  private readPdf(path: string): Uint8Array {
    try {
      return readFileSync(path);
    } catch (error) {
      throw CliError.fromError(`Failed to read ${path}`, error);
    }
  }

  private writeOutput(path: string, bytes: Uint8Array): void {
    try {
      writeFileSync(path, bytes);
    } catch (error) {
      throw CliError.fromError(`Failed to write ${path}`, error);
    }
  }
}

function countEntries(entries: readonly TocEntry[]): number {
  return entries.reduce(
    (count, entry) => count + 1 + countEntries(entry.children),
    0,
  );
}
