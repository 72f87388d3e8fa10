import { defineConfig } from '../../tools/vitest-config/src';

export default defineConfig();
