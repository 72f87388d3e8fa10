import { defineConfig } from '../../tools/tsup-config/src';

export default defineConfig({
  entry: { cli: 'src/cli.ts' },
  noExternal: [/^@pdftoc\//],
});
