import path from 'path';

import { ModelError } from '../errors';
import { EngineConfig } from './config';
import { LibraryLoader } from './native-library';
import { EnginePlatform } from './platform';
import { ProcessHost } from './process-host';

export const searchPathIncludes = (value: string | undefined, dir: string, delimiter: string): boolean =>
    (value ?? '')
        .split(delimiter)
        .filter(entry => entry.length > 0)
        .some(entry => path.resolve(entry) === path.resolve(dir));

export const appendSearchPath = (value: string | undefined, dir: string, delimiter: string): string =>
    value ? `${value}${delimiter}${dir}` : dir;

/**
 * Makes the engine's dependency libraries resolvable. Where the loader reads its search
 * path only at start-up, a missing entry is added and the process relaunched once; the
 * relaunched process finds the entry present and carries on. Elsewhere the dependencies
 * are preloaded one by one in the platform's order.
 */
export const prepareEnvironment = (
    platform: EnginePlatform,
    config: EngineConfig,
    host: ProcessHost,
    loader: LibraryLoader,
): void => {
    const { searchPathVariable, pathDelimiter, dependencyLibraries } = platform;
    const { dependenciesDir } = config;

    if (searchPathVariable) {
        const current = host.env[searchPathVariable];

        if (!searchPathIncludes(current, dependenciesDir, pathDelimiter)) {
            if (!config.relaunch) {
                console.warn(
                    `${searchPathVariable} does not contain ${dependenciesDir}; engine dependencies may not resolve`,
                );
            } else {
                console.info(`Adding ${dependenciesDir} to ${searchPathVariable} and relaunching`);
                try {
                    host.relaunch({
                        ...host.env,
                        [searchPathVariable]: appendSearchPath(current, dependenciesDir, pathDelimiter),
                    });
                } catch (error) {
                    throw new ModelError('RELAUNCH_FAILED', { cause: error });
                }
            }
        }
    }

    for (const library of dependencyLibraries) {
        const libraryPath = path.join(dependenciesDir, library);
        try {
            loader.preload(libraryPath);
        } catch (error) {
            throw new ModelError('DEPENDENCY_LOAD_FAILED', { detail: libraryPath, cause: error });
        }
    }
};
