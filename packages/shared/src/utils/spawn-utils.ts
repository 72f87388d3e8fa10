import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  /**
   * Exit code. A process terminated by a signal reports 128.
   */
  code: number;

  /**
   * Signal that terminated the process, if any
   */
  signal: NodeJS.Signals | null;
}

/**
 * SpawnError
 *
 * Thrown when a command cannot be started at all (missing binary, permissions).
 */
export class SpawnError extends Error {
  constructor(
    public readonly command: string,
    options?: ErrorOptions,
  ) {
    super(
      `Failed to start "${command}": ${SpawnError.getErrorMessage(options?.cause)}`,
      options,
    );
    this.name = 'SpawnError';
  }

  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Run a command to completion and report how it exited
 *
 * Output is not captured; pass `stdio: 'inherit'` to attach interactive
 * programs such as text editors to the terminal.
 *
 * @param command - The command to execute
 * @param args - Arguments to pass to the command
 * @param options - Options forwarded to child_process.spawn
 * @returns Promise resolving to the exit code and signal
 * @throws {SpawnError} When the process cannot be started
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('vi', ['/tmp/pdftoc-abc/toc.txt'], {
 *   stdio: 'inherit',
 * });
 * if (result.code !== 0) {
 *   // editor failed
 * }
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnOptions = {},
): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, options);

    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({
        code: code ?? (signal === null ? 0 : 128),
        signal,
      });
    });

    proc.on('error', (error) => {
      reject(new SpawnError(command, { cause: error }));
    });
  });
}
