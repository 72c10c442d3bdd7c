import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ZodError } from 'zod';

import { ModelError } from '../errors';
import { Solution } from '../solution/solution';
import { catchError, FakeEngineLibrary, FakeLibraryLoader, fakeHost, testConfig } from '../test/fakes';
import { Engine, invokeEngine } from './engine';
import { NativeBuffer, NativeEngineLibrary } from './native-library';

const RESPONSE = JSON.stringify({ Status: { code: 2, message: 'Infeasible' } });
const ENGINE_PATH = '/pkg/lib/Linux/libbapcod-shared.so';

describe('invokeEngine', () => {
    it('hands the response to the consumer and releases it once', () => {
        const library = new FakeEngineLibrary(RESPONSE);

        const solution = invokeEngine(library, '{"Points": []}', text => Solution.parse(text));

        expect(solution.status).toBe(2);
        expect(library.requests).toEqual(['{"Points": []}']);
        expect(library.released).toBe(1);
        expect(library.outstanding).toBe(0);
    });

    it('releases the response when the consumer throws', () => {
        const library = new FakeEngineLibrary('{"Status": {"code": "x"}}');

        const error = catchError(() => invokeEngine(library, '{}', text => Solution.parse(text)));

        expect(error).toBeInstanceOf(ModelError);
        expect(error).toMatchObject({ code: 'ENGINE_CALL_FAILED' });
        expect(error).toHaveProperty('cause', expect.any(ZodError));
        expect(library.released).toBe(1);
    });

    it('releases an empty response and reports it', () => {
        const library = new FakeEngineLibrary('');

        const error = catchError(() => invokeEngine(library, '{}', text => text));

        expect(error).toMatchObject({ code: 'ENGINE_CALL_FAILED' });
        expect(error).toHaveProperty('cause.message', 'Engine returned an empty response');
        expect(library.released).toBe(1);
    });

    it('releases the response when it cannot be read', () => {
        const library = new FakeEngineLibrary(RESPONSE);
        vi.spyOn(library, 'readText').mockImplementation(() => {
            throw new Error('bad pointer');
        });

        expect(catchError(() => invokeEngine(library, '{}', text => text))).toMatchObject({
            code: 'ENGINE_CALL_FAILED',
        });
        expect(library.released).toBe(1);
    });

    it('releases nothing when the call itself fails', () => {
        const freeMemory = vi.fn<(buffer: NativeBuffer) => void>();
        const library: NativeEngineLibrary = {
            solveModel: () => {
                throw new Error('crashed');
            },
            readText: () => '',
            freeMemory,
        };

        const error = catchError(() => invokeEngine(library, '{}', text => text));

        expect(error).toMatchObject({ code: 'ENGINE_CALL_FAILED', message: 'The engine call failed' });
        expect(error).toHaveProperty('cause.message', 'crashed');
        expect(freeMemory).not.toHaveBeenCalled();
    });

    it('releases nothing when the engine returns a null pointer', () => {
        const freeMemory = vi.fn<(buffer: NativeBuffer) => void>();
        const library: NativeEngineLibrary = { solveModel: () => null, readText: () => '', freeMemory };

        expect(catchError(() => invokeEngine(library, '{}', text => text))).toMatchObject({
            code: 'ENGINE_CALL_FAILED',
            message: 'The engine call failed: engine returned no response',
        });
        expect(freeMemory).not.toHaveBeenCalled();
    });

    it('reports a failed release', () => {
        const library = new FakeEngineLibrary(RESPONSE);
        vi.spyOn(library, 'freeMemory').mockImplementation(() => {
            throw new Error('double free');
        });

        expect(catchError(() => invokeEngine(library, '{}', text => text))).toMatchObject({
            code: 'ENGINE_CALL_FAILED',
            message: 'The engine call failed: could not release the response',
        });
    });

    it('keeps the read failure when the release fails as well', () => {
        const library = new FakeEngineLibrary('not json');
        vi.spyOn(library, 'freeMemory').mockImplementation(() => {
            throw new Error('double free');
        });

        const error = catchError(() => invokeEngine(library, '{}', text => Solution.parse(text)));

        expect(error).toMatchObject({
            code: 'ENGINE_CALL_FAILED',
            message: 'The engine call failed: could not release the response',
        });
        if (!(error instanceof ModelError) || !(error.cause instanceof AggregateError)) {
            throw new Error('Expected both failures in the cause');
        }
        expect(error.cause.errors).toHaveLength(2);
        expect(error.cause.errors[0]).toBeInstanceOf(SyntaxError);
        expect(error.cause.errors[1]).toHaveProperty('message', 'double free');
        expect(library.freeMemory).toHaveBeenCalledTimes(1);
    });
});

describe('Engine', () => {
    beforeEach(() => {
        vi.spyOn(console, 'info').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    const createEngine = (library: NativeEngineLibrary, preloadable: string[] = []) => {
        const host = fakeHost('linux', { LD_LIBRARY_PATH: '/pkg/lib/Dependencies' });
        const loader = new FakeLibraryLoader(new Map([[ENGINE_PATH, library]]), new Set(preloadable));
        return { engine: new Engine({ config: testConfig, host, loader }), host, loader };
    };

    it('loads the engine and solves one request', () => {
        const library = new FakeEngineLibrary(RESPONSE);
        const { engine, host } = createEngine(library);

        const solution = engine.solve('{"request": true}');

        expect(solution.status).toBe(2);
        expect(solution.message).toBe('Infeasible');
        expect(library.requests).toEqual(['{"request": true}']);
        expect(library.outstanding).toBe(0);
        expect(host.relaunch).not.toHaveBeenCalled();
        expect(console.info).toHaveBeenCalledWith(`Loaded engine library ${ENGINE_PATH}`);
    });

    it('loads the alternate backend before the engine', () => {
        const { engine, loader } = createEngine(new FakeEngineLibrary(RESPONSE), ['/opt/cplex/libcplex.so']);

        engine.solve('{}', '/opt/cplex/libcplex.so');

        expect(loader.preloaded).toEqual(['/opt/cplex/libcplex.so']);
    });

    it('does not look for the engine when the backend fails to load', () => {
        const { engine, loader } = createEngine(new FakeEngineLibrary(RESPONSE));

        const error = catchError(() => engine.load('/opt/cplex/libcplex.so'));

        expect(error).toMatchObject({
            code: 'BACKEND_LOAD_FAILED',
            message: 'Failed to load the alternate solver backend: /opt/cplex/libcplex.so',
        });
        expect(loader.opened).toEqual([]);
    });

    it('fails on unsupported platforms before loading anything', () => {
        const loader = new FakeLibraryLoader();
        const engine = new Engine({ config: testConfig, host: fakeHost('freebsd'), loader });

        expect(catchError(() => engine.solve('{}'))).toMatchObject({ code: 'UNSUPPORTED_PLATFORM' });
        expect(loader.preloaded).toEqual([]);
        expect(loader.opened).toEqual([]);
    });

    it('surfaces a missing engine library', () => {
        const engine = new Engine({
            config: testConfig,
            host: fakeHost('linux', { LD_LIBRARY_PATH: '/pkg/lib/Dependencies' }),
            loader: new FakeLibraryLoader(),
        });

        expect(catchError(() => engine.solve('{}'))).toMatchObject({ code: 'LIBRARY_NOT_FOUND' });
    });
});
