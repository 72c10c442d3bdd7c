import { describe, expect, it } from 'vitest';

import { ModelError } from '../errors';
import { catchError, FakeEngineLibrary, FakeLibraryLoader, testConfig } from '../test/fakes';
import { engineCandidates, loadEngineLibrary } from './discovery';
import { resolvePlatform } from './platform';

const LINUX_CANDIDATES = [
    '/pkg/src/engine/libbapcod-shared.so',
    '/pkg/lib/Linux/libbapcod-shared.so',
    'libbapcod-shared.so',
];

describe('engineCandidates', () => {
    it('looks beside the binding, then in the platform folder, then on the system path', () => {
        expect(engineCandidates(resolvePlatform('linux'), testConfig)).toEqual(LINUX_CANDIDATES);
        expect(engineCandidates(resolvePlatform('darwin'), testConfig)).toEqual([
            '/pkg/src/engine/libbapcod-shared.dylib',
            '/pkg/lib/Darwin/libbapcod-shared.dylib',
            'libbapcod-shared.dylib',
        ]);
    });
});

describe('loadEngineLibrary', () => {
    it('stops at the first candidate that loads', () => {
        const library = new FakeEngineLibrary('{}');
        const loader = new FakeLibraryLoader(new Map([[LINUX_CANDIDATES[1], library]]));

        const loaded = loadEngineLibrary(LINUX_CANDIDATES, loader);

        expect(loaded.libraryPath).toBe('/pkg/lib/Linux/libbapcod-shared.so');
        expect(loaded.library).toBe(library);
        expect(loader.opened).toEqual(LINUX_CANDIDATES.slice(0, 2));
    });

    it('falls back to the bare name for the system loader', () => {
        const library = new FakeEngineLibrary('{}');
        const loader = new FakeLibraryLoader(new Map([['libbapcod-shared.so', library]]));

        expect(loadEngineLibrary(LINUX_CANDIDATES, loader).libraryPath).toBe('libbapcod-shared.so');
        expect(loader.opened).toEqual(LINUX_CANDIDATES);
    });

    it('reports every failed candidate in one error', () => {
        const error = catchError(() => loadEngineLibrary(LINUX_CANDIDATES, new FakeLibraryLoader()));

        expect(error).toBeInstanceOf(ModelError);
        expect(error).toMatchObject({
            code: 'LIBRARY_NOT_FOUND',
            message: `Engine library could not be found or loaded: ${LINUX_CANDIDATES.join(', ')}`,
        });
        if (!(error instanceof ModelError) || !(error.cause instanceof AggregateError)) {
            throw new Error('Expected an aggregated cause');
        }
        expect(error.cause.errors.map(failure => String(failure))).toEqual(
            LINUX_CANDIDATES.map(candidate => `Error: cannot open ${candidate}`),
        );
    });
});
