import { fileURLToPath } from 'url';
import { defineConfig } from 'vite';
import dts from 'vite-plugin-dts';

export default defineConfig({
    build: {
        target: 'node20',
        lib: {
            entry: fileURLToPath(new URL('src/index.ts', import.meta.url)),
            name: 'VrpBridge',
            formats: ['es', 'cjs'],
            fileName: format => (format === 'cjs' ? 'vrp.cjs' : 'vrp.es.js'),
        },
        rollupOptions: {
            external: ['koffi', 'zod', 'child_process', 'fs', 'fs/promises', 'path', 'url'],
            output: {
                manualChunks: undefined,
            },
        },
        sourcemap: true,
        emptyOutDir: true,
    },
    plugins: [
        dts({
            insertTypesEntry: true,
            outDir: 'dist',
            exclude: ['**/*.test.ts', 'src/test/**', 'vite.config.ts', 'vitest.config.ts', 'solve-example.ts'],
        }),
    ],
});
