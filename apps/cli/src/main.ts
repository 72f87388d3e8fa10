import type { LoggerMethods, LogSink } from '@pdftoc/logger';

import type { PdfTocCliDependencies } from './pdf-toc-cli';

import { Logger } from '@pdftoc/logger';
import { BookmarkWriter, SpanExtractor } from '@pdftoc/pdf-parser';
import { TocValidationError } from '@pdftoc/toc-detector';

import { TocEditor } from './editor';
import { CliError, UsageError } from './errors';
import { USAGE, parseCliArgs } from './options';
import { PdfTocCli } from './pdf-toc-cli';

export interface CliStreams {
  stdout: LogSink;
  stderr: LogSink;
}

export type Collaborators = Pick<
  PdfTocCliDependencies,
  'extractor' | 'writer' | 'editor'
>;

/**
 * Real PDF reader, writer and editor
 */
export function createCollaborators(logger: LoggerMethods): Collaborators {
  return {
    extractor: new SpanExtractor(logger),
    writer: new BookmarkWriter(logger),
    editor: new TocEditor(logger),
  };
}

function describeFailure(error: unknown): string {
  if (error instanceof TocValidationError) {
    return error.getSummary();
  }
  const message = `Error: ${CliError.getErrorMessage(error)}`;
  if (error instanceof UsageError) {
    return `${message}\nRun "pdftoc --help" for usage.`;
  }
  return message;
}

/**
 * Run `pdftoc` with the given arguments
 *
 * @returns Process exit code
 */
export async function main(
  argv: string[],
  streams: CliStreams = { stdout: process.stdout, stderr: process.stderr },
  collaborators: (logger: LoggerMethods) => Collaborators = createCollaborators,
): Promise<number> {
  try {
    const command = parseCliArgs(argv);
    if (command.kind === 'help') {
      streams.stdout.write(USAGE);
      return 0;
    }

    const logger = Logger.console({
      level: command.options.debug ? 'debug' : 'warn',
      sink: streams.stderr,
    });
    const cli = new PdfTocCli(logger, {
      ...collaborators(logger),
      ...streams,
    });

    await cli.run(command.options);
    return 0;
  } catch (error) {
    streams.stderr.write(`${describeFailure(error)}\n`);
    return 1;
  }
}
