import { existsSync } from 'node:fs';
import { join, parse, resolve } from 'node:path';

import type { CliOptions } from './options';

import { OutputPathCollisionError } from './errors';

/**
 * `<dir>/<stem>_toc.pdf` next to the input
 */
export function defaultOutputPath(input: string): string {
  const { dir, name } = parse(input);
  return join(dir, `${name}_toc.pdf`);
}

/**
 * Where the result is written: the input with `--replace`, else `-o`, else
 * the default path. Preview runs write nothing and get null.
 */
export function resolveOutputPath(
  options: Pick<CliOptions, 'input' | 'output' | 'replace' | 'preview'>,
): string | null {
  if (options.preview) {
    return null;
  }
  if (options.replace) {
    return options.input;
  }
  return options.output ?? defaultOutputPath(options.input);
}

/**
 * @throws {OutputPathCollisionError} When the output would overwrite the
 * input or an existing file without `--replace`
 */
export function assertOutputPathFree(
  outputPath: string,
  options: Pick<CliOptions, 'input' | 'replace'>,
): void {
  if (options.replace) {
    return;
  }
  if (resolve(outputPath) === resolve(options.input)) {
    throw new OutputPathCollisionError(outputPath, 'input');
  }
  if (existsSync(outputPath)) {
    throw new OutputPathCollisionError(outputPath, 'exists');
  }
}
