import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import z from 'zod';

import { ModelError } from '../errors';

const bindingDir = path.dirname(fileURLToPath(import.meta.url));

export interface EngineConfig {
    /** Directory of the binding module, searched first for the engine */
    readonly bindingDir: string;
    /** Holds one engine folder per platform (`Linux/`, `Darwin/`, `Windows/`) */
    readonly libraryRoot: string;
    /** Third-party libraries the engine links against */
    readonly dependenciesDir: string;
    /**
     * Relaunch the process when the loader search path lacks `dependenciesDir`.
     * Turn off when the search path is set before the process starts.
     */
    readonly relaunch: boolean;
}

const engineEnvSchema = z.object({
    VRP_BRIDGE_LIB_DIR: z.string().min(1).optional(),
    VRP_BRIDGE_DEPENDENCIES_DIR: z.string().min(1).optional(),
    VRP_BRIDGE_RELAUNCH: z
        .enum(['true', 'false'])
        .default('true')
        .transform(value => value === 'true'),
});

/**
 * Nearest directory at or above `fromDir` holding a package.json. The binding sits at a
 * different depth in the sources and in the bundle, so the root is searched for.
 */
export const findPackageRoot = (fromDir: string, exists: (file: string) => boolean = existsSync): string => {
    let dir = path.resolve(fromDir);
    while (!exists(path.join(dir, 'package.json'))) {
        const parent = path.dirname(dir);
        if (parent === dir) {
            return path.resolve(fromDir);
        }
        dir = parent;
    }
    return dir;
};

export const defaultLibraryRoot = (fromDir = bindingDir, exists?: (file: string) => boolean): string =>
    path.join(findPackageRoot(fromDir, exists), 'lib');

/** Reads engine locations from the environment, falling back to `lib/` at the package root */
export const loadEngineConfig = (env: NodeJS.ProcessEnv = process.env): EngineConfig => {
    const parsed = engineEnvSchema.safeParse(env);
    if (!parsed.success) {
        const variables = parsed.error.issues.map(issue => issue.path.join('.')).join(', ');
        throw new ModelError('INVALID_CONFIGURATION', { detail: variables, cause: parsed.error });
    }

    const { VRP_BRIDGE_LIB_DIR, VRP_BRIDGE_DEPENDENCIES_DIR, VRP_BRIDGE_RELAUNCH } = parsed.data;
    const libraryRoot = path.resolve(VRP_BRIDGE_LIB_DIR ?? defaultLibraryRoot());

    return {
        bindingDir,
        libraryRoot,
        dependenciesDir: path.resolve(VRP_BRIDGE_DEPENDENCIES_DIR ?? path.join(libraryRoot, 'Dependencies')),
        relaunch: VRP_BRIDGE_RELAUNCH,
    };
};
