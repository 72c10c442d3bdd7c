import { readFile } from 'fs/promises';
import { describe, expect, it } from 'vitest';
import z from 'zod';

import viteConfig from '../vite.config';

const packageJsonSchema = z.object({
    type: z.literal('module'),
    main: z.string(),
    module: z.string(),
    exports: z.object({
        '.': z.object({ import: z.string(), require: z.string() }),
    }),
});

const bundleName = (format: 'es' | 'cjs'): string => {
    const lib = viteConfig.build?.lib;
    if (!lib || typeof lib.fileName !== 'function') {
        throw new Error('Expected a library build with computed file names');
    }
    return lib.fileName(format, 'index');
};

describe('published bundles', () => {
    it('gives the CommonJS bundle an extension Node loads as CommonJS under "type": "module"', () => {
        expect(bundleName('cjs')).toBe('vrp.cjs');
        expect(bundleName('es')).toBe('vrp.es.js');
    });

    it('points the package entry fields at the emitted bundles', async () => {
        const manifest = packageJsonSchema.parse(
            JSON.parse(await readFile(new URL('../package.json', import.meta.url), 'utf8')),
        );

        expect(manifest.main).toBe(`./dist/${bundleName('cjs')}`);
        expect(manifest.exports['.'].require).toBe(`./dist/${bundleName('cjs')}`);
        expect(manifest.module).toBe(`./dist/${bundleName('es')}`);
        expect(manifest.exports['.'].import).toBe(`./dist/${bundleName('es')}`);
    });
});
