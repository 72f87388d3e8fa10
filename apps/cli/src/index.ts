/**
 * @pdftoc/cli
 *
 * The `pdftoc` command.
 *
 * @packageDocumentation
 */

export { main, createCollaborators } from './main';
export type { CliStreams, Collaborators } from './main';
export { PdfTocCli } from './pdf-toc-cli';
export type {
  OutlineSink,
  PdfTocCliDependencies,
  SpanSource,
  TextEditor,
} from './pdf-toc-cli';
export { USAGE, parseCliArgs } from './options';
export type { CliCommand, CliOptions } from './options';
export { defaultOutputPath, resolveOutputPath } from './output-path';
export {
  CliError,
  EditorError,
  OutputPathCollisionError,
  UsageError,
} from './errors';
