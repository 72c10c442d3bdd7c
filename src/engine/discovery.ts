import path from 'path';

import { ModelError } from '../errors';
import { EngineConfig } from './config';
import { LibraryLoader, NativeEngineLibrary } from './native-library';
import { EnginePlatform } from './platform';

/**
 * Places to look for the engine, in order: next to the binding, in the platform
 * folder under the library root, then the bare name for the system loader to resolve.
 */
export const engineCandidates = (platform: EnginePlatform, config: EngineConfig): string[] => [
    path.join(config.bindingDir, platform.libraryName),
    path.join(config.libraryRoot, platform.name, platform.libraryName),
    platform.libraryName,
];

export interface LoadedEngine {
    readonly libraryPath: string;
    readonly library: NativeEngineLibrary;
}

export const loadEngineLibrary = (candidates: ReadonlyArray<string>, loader: LibraryLoader): LoadedEngine => {
    const failures: unknown[] = [];

    for (const candidate of candidates) {
        try {
            return { libraryPath: candidate, library: loader.open(candidate) };
        } catch (error) {
            failures.push(error);
        }
    }

    throw new ModelError('LIBRARY_NOT_FOUND', {
        detail: candidates.join(', '),
        cause: new AggregateError(failures, 'Every engine library candidate failed to load'),
    });
};
