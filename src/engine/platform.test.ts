import { describe, expect, it } from 'vitest';

import { ModelError } from '../errors';
import { catchError } from '../test/fakes';
import { resolvePlatform } from './platform';

describe('resolvePlatform', () => {
    it('relaunches on Linux through LD_LIBRARY_PATH', () => {
        expect(resolvePlatform('linux')).toMatchObject({
            name: 'Linux',
            libraryName: 'libbapcod-shared.so',
            searchPathVariable: 'LD_LIBRARY_PATH',
            dependencyLibraries: [],
        });
    });

    it('preloads the solver stack on macOS, lowest level first', () => {
        const platform = resolvePlatform('darwin');

        expect(platform.libraryName).toBe('libbapcod-shared.dylib');
        expect(platform.searchPathVariable).toBeUndefined();
        expect(platform.dependencyLibraries).toEqual([
            'libCoinUtils.0.dylib',
            'libClp.0.dylib',
            'libOsi.0.dylib',
            'libOsiClp.0.dylib',
        ]);
    });

    it('loads the DLL on Windows without touching the environment', () => {
        expect(resolvePlatform('win32')).toMatchObject({ name: 'Windows', libraryName: 'bapcod-shared.dll' });
        expect(resolvePlatform('win32').searchPathVariable).toBeUndefined();
    });

    it('rejects other platforms', () => {
        const error = catchError(() => resolvePlatform('aix'));

        expect(error).toBeInstanceOf(ModelError);
        expect(error).toMatchObject({ code: 'UNSUPPORTED_PLATFORM' });
        expect(error).toHaveProperty('message', 'The engine is only available on Windows, Linux and macOS: aix');
    });
});
