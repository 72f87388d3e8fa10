import type { LoggerMethods } from '@pdftoc/logger';
import type { SpawnResult } from '@pdftoc/shared';

import type { EditorCommand } from '../config/editor';

import { spawnAsync } from '@pdftoc/shared';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { resolveEditorCommand } from '../config/editor';
import { EditorError } from '../errors';

/**
 * TocEditor
 *
 * Round-trips TOC text through the user's editor: the text is written to a
 * private temporary file, the editor runs attached to the terminal, and the
 * saved content is returned. The temporary directory is always removed.
 */
export class TocEditor {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly editor: EditorCommand = resolveEditorCommand(),
  ) {}

  /**
   * @throws {EditorError} When the editor cannot be started or exits non-zero
   */
  async edit(text: string): Promise<string> {
    const dir = mkdtempSync(join(tmpdir(), 'pdftoc-'));
    const file = join(dir, 'toc.txt');

    try {
      writeFileSync(file, text, 'utf-8');
      this.logger.debug(
        `[TocEditor] Opening ${file} with ${this.editor.command}`,
      );

      let result: SpawnResult;
      try {
        result = await spawnAsync(
          this.editor.command,
          [...this.editor.args, file],
          { stdio: 'inherit' },
        );
      } catch (error) {
        throw new EditorError(
          `Editor not found or not executable: ${this.editor.command}`,
          { cause: error },
        );
      }

      if (result.code !== 0) {
        throw new EditorError(`Editor exited with code ${result.code}`);
      }

      return readFileSync(file, 'utf-8');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }
}
