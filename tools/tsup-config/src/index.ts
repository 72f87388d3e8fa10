import type { Options } from 'tsup';

/**
 * Shared tsup settings. Workspace packages export their TypeScript sources,
 * so only runnable entry points (the CLI) are bundled.
 */
export const defineConfig = (options: Options = {}): Options => {
  return {
    format: ['esm'],
    platform: 'node',
    target: 'node20',
    dts: false,
    clean: true,
    sourcemap: true,
    ...options,
  };
};
