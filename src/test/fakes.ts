import { vi } from 'vitest';

import { EngineConfig } from '../engine/config';
import { LibraryLoader, NativeBuffer, NativeEngineLibrary } from '../engine/native-library';
import { ProcessHost } from '../engine/process-host';

export const testConfig: EngineConfig = {
    bindingDir: '/pkg/src/engine',
    libraryRoot: '/pkg/lib',
    dependenciesDir: '/pkg/lib/Dependencies',
    relaunch: true,
};

/** Engine stand-in that hands out one buffer per call and refuses double releases */
export class FakeEngineLibrary implements NativeEngineLibrary {
    readonly requests: string[] = [];
    released = 0;
    private readonly buffers = new Map<symbol, string>();

    constructor(private readonly response: string) {}

    solveModel(request: string): NativeBuffer {
        this.requests.push(request);
        const buffer = Symbol('response');
        this.buffers.set(buffer, this.response);
        return buffer;
    }

    readText(buffer: NativeBuffer): string {
        const text = typeof buffer === 'symbol' ? this.buffers.get(buffer) : undefined;
        if (text === undefined) {
            throw new Error('Unknown or released buffer');
        }
        return text;
    }

    freeMemory(buffer: NativeBuffer): void {
        if (typeof buffer !== 'symbol' || !this.buffers.delete(buffer)) {
            throw new Error('Unknown or released buffer');
        }
        this.released++;
    }

    get outstanding(): number {
        return this.buffers.size;
    }
}

/** Loader that only knows the given libraries and records every load attempt */
export class FakeLibraryLoader implements LibraryLoader {
    readonly preloaded: string[] = [];
    readonly opened: string[] = [];

    constructor(
        private readonly engines: ReadonlyMap<string, NativeEngineLibrary> = new Map(),
        private readonly preloadable: ReadonlySet<string> = new Set(),
    ) {}

    preload(libraryPath: string): void {
        this.preloaded.push(libraryPath);
        if (!this.preloadable.has(libraryPath)) {
            throw new Error(`cannot open ${libraryPath}`);
        }
    }

    open(libraryPath: string): NativeEngineLibrary {
        this.opened.push(libraryPath);
        const engine = this.engines.get(libraryPath);
        if (!engine) {
            throw new Error(`cannot open ${libraryPath}`);
        }
        return engine;
    }
}

export const fakeHost = (platform: NodeJS.Platform, env: NodeJS.ProcessEnv = {}) => ({
    platform,
    env,
    relaunch: vi.fn<(env: NodeJS.ProcessEnv) => never>(),
}) satisfies ProcessHost;

/** Runs `fn` and returns what it threw */
export const catchError = (fn: () => unknown): unknown => {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected the call to throw');
};
