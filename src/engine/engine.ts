import path from 'path';

import { ModelError } from '../errors';
import { Solution } from '../solution/solution';
import { EngineConfig, loadEngineConfig } from './config';
import { engineCandidates, loadEngineLibrary, LoadedEngine } from './discovery';
import { prepareEnvironment } from './environment';
import { KoffiLibraryLoader, LibraryLoader, NativeBuffer, NativeEngineLibrary } from './native-library';
import { resolvePlatform } from './platform';
import { nodeProcessHost, ProcessHost } from './process-host';

export interface EngineOptions {
    config?: EngineConfig;
    host?: ProcessHost;
    loader?: LibraryLoader;
}

// Handles are never unloaded, so every engine shares one loader by default
const sharedLoader = new KoffiLibraryLoader();

const readResponse = (library: NativeEngineLibrary, buffer: NativeBuffer): string => {
    const text = library.readText(buffer);
    if (text.length === 0) {
        throw new Error('Engine returned an empty response');
    }
    return text;
};

const releaseResponse = (library: NativeEngineLibrary, buffer: NativeBuffer): void => {
    try {
        library.freeMemory(buffer);
    } catch (error) {
        throw new ModelError('ENGINE_CALL_FAILED', { detail: 'could not release the response', cause: error });
    }
};

/**
 * Calls the engine once with `request` and hands the response text to `consume`.
 * The response buffer belongs to the engine and is released exactly once, after
 * `consume` returns or throws. When both reading and releasing fail, the cause
 * carries both errors, reading first.
 */
export const invokeEngine = <T>(library: NativeEngineLibrary, request: string, consume: (text: string) => T): T => {
    let buffer: NativeBuffer;
    try {
        buffer = library.solveModel(request);
    } catch (error) {
        throw new ModelError('ENGINE_CALL_FAILED', { cause: error });
    }

    if (buffer === null || buffer === undefined) {
        throw new ModelError('ENGINE_CALL_FAILED', { detail: 'engine returned no response' });
    }

    let result: T;
    try {
        result = consume(readResponse(library, buffer));
    } catch (error) {
        try {
            library.freeMemory(buffer);
        } catch (releaseError) {
            throw new ModelError('ENGINE_CALL_FAILED', {
                detail: 'could not release the response',
                cause: new AggregateError([error, releaseError], 'Reading and releasing the response both failed'),
            });
        }
        throw new ModelError('ENGINE_CALL_FAILED', { cause: error });
    }

    releaseResponse(library, buffer);
    return result;
};

/**
 * Binding to the native engine: resolves the platform, prepares the loader
 * environment, loads the optional alternate backend, finds the engine library and
 * runs a single blocking request/response call.
 */
export class Engine {
    private readonly config: EngineConfig;
    private readonly host: ProcessHost;
    private readonly loader: LibraryLoader;

    constructor({ config = loadEngineConfig(), host = nodeProcessHost, loader = sharedLoader }: EngineOptions = {}) {
        this.config = config;
        this.host = host;
        this.loader = loader;
    }

    /** Loads everything the engine needs; `backendPath` is the alternate solver library, if any */
    load(backendPath = ''): LoadedEngine {
        const platform = resolvePlatform(this.host.platform);

        prepareEnvironment(platform, this.config, this.host, this.loader);

        if (backendPath !== '') {
            const resolved = path.resolve(backendPath);
            try {
                this.loader.preload(resolved);
            } catch (error) {
                throw new ModelError('BACKEND_LOAD_FAILED', { detail: resolved, cause: error });
            }
        }

        const loaded = loadEngineLibrary(engineCandidates(platform, this.config), this.loader);
        console.info(`Loaded engine library ${loaded.libraryPath}`);

        return loaded;
    }

    solve(request: string, backendPath = ''): Solution {
        const { library } = this.load(backendPath);
        return invokeEngine(library, request, text => Solution.parse(text));
    }
}
