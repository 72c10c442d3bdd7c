import { ModelError } from '../errors';

export type PlatformName = 'Windows' | 'Linux' | 'Darwin';

export interface EnginePlatform {
    /** Also the name of the engine folder under the library root */
    readonly name: PlatformName;
    readonly libraryName: string;
    /** Loader search-path variable that is only read at process start */
    readonly searchPathVariable?: string;
    /** Libraries to load explicitly, lowest level first, before the engine */
    readonly dependencyLibraries: ReadonlyArray<string>;
    readonly pathDelimiter: string;
}

const PLATFORMS: Partial<Record<NodeJS.Platform, EnginePlatform>> = {
    win32: {
        name: 'Windows',
        libraryName: 'bapcod-shared.dll',
        dependencyLibraries: [],
        pathDelimiter: ';',
    },
    linux: {
        name: 'Linux',
        libraryName: 'libbapcod-shared.so',
        searchPathVariable: 'LD_LIBRARY_PATH',
        dependencyLibraries: [],
        pathDelimiter: ':',
    },
    darwin: {
        name: 'Darwin',
        libraryName: 'libbapcod-shared.dylib',
        dependencyLibraries: ['libCoinUtils.0.dylib', 'libClp.0.dylib', 'libOsi.0.dylib', 'libOsiClp.0.dylib'],
        pathDelimiter: ':',
    },
};

export const resolvePlatform = (platform: NodeJS.Platform): EnginePlatform => {
    const resolved = PLATFORMS[platform];
    if (!resolved) {
        throw new ModelError('UNSUPPORTED_PLATFORM', { detail: platform });
    }
    return resolved;
};
