/**
 * Editor lookup for `--edit`
 */
export const EDITOR_CONFIG = {
  /**
   * Environment variables consulted in order
   */
  ENV_VARS: ['VISUAL', 'EDITOR'],

  /**
   * Editor used when none is configured
   */
  DEFAULT_EDITOR: 'vi',
} as const;

/**
 * Executable plus the arguments given in the environment variable,
 * e.g. `code --wait`
 */
export interface EditorCommand {
  command: string;
  args: string[];
}

/**
 * Resolve the editor from `$VISUAL`, then `$EDITOR`, then `vi`.
 * Blank variables are skipped.
 */
export function resolveEditorCommand(
  env: NodeJS.ProcessEnv = process.env,
): EditorCommand {
  for (const name of EDITOR_CONFIG.ENV_VARS) {
    const value = env[name]?.trim();
    if (value) {
      const [command, ...args] = value.split(/\s+/);
      return { command, args };
    }
  }
  return { command: EDITOR_CONFIG.DEFAULT_EDITOR, args: [] };
}
