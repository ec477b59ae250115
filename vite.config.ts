import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';
import { builtinModules } from 'node:module';
import dts from 'vite-plugin-dts';

const resolve = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  plugins: [dts({ include: ['src'] })],
  build: {
    lib: {
      entry: {
        index: resolve('./src/index.ts'),
        cli: resolve('./src/cli.ts'),
      },
      formats: ['es'],
    },
    target: 'node20',
    rollupOptions: {
      external: [
        'codespan-napi',
        'commander',
        ...builtinModules,
        ...builtinModules.map((name) => `node:${name}`),
      ],
    },
  },
});
