import koffi from 'koffi';

type KoffiLib = ReturnType<typeof koffi.load>;

/** Engine-owned response pointer; only ever handed back to the engine */
export type NativeBuffer = unknown;

/** The two engine entry points plus reading the text behind a returned pointer */
export interface NativeEngineLibrary {
    solveModel(request: string): NativeBuffer;
    readText(buffer: NativeBuffer): string;
    freeMemory(buffer: NativeBuffer): void;
}

/** Opens shared libraries; both methods throw when the library cannot be loaded */
export interface LibraryLoader {
    /** Loads a library only so that later loads can resolve its symbols */
    preload(libraryPath: string): void;
    open(libraryPath: string): NativeEngineLibrary;
}

/** Loads libraries through koffi; handles stay loaded for the lifetime of the process */
export class KoffiLibraryLoader implements LibraryLoader {
    private readonly handles = new Map<string, KoffiLib>();
    private readonly engines = new Map<string, NativeEngineLibrary>();

    preload(libraryPath: string): void {
        this.load(libraryPath);
    }

    open(libraryPath: string): NativeEngineLibrary {
        const cached = this.engines.get(libraryPath);
        if (cached) {
            return cached;
        }

        const lib = this.load(libraryPath);
        const solveModel = lib.func('void *solveModel(const char *input)');
        const freeMemory = lib.func('void freeMemory(void *output)');

        const engine: NativeEngineLibrary = {
            solveModel: request => solveModel(request),
            readText: buffer => koffi.decode(buffer, 'char', -1),
            freeMemory: buffer => {
                freeMemory(buffer);
            },
        };
        this.engines.set(libraryPath, engine);

        return engine;
    }

    private load(libraryPath: string): KoffiLib {
        let lib = this.handles.get(libraryPath);
        if (!lib) {
            lib = koffi.load(libraryPath);
            this.handles.set(libraryPath, lib);
        }
        return lib;
    }
}
