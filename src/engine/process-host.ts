import { spawnSync } from 'child_process';

/** The parts of the running process the engine binding depends on */
export interface ProcessHost {
    readonly platform: NodeJS.Platform;
    readonly env: NodeJS.ProcessEnv;
    /** Restarts the current program with `env`; never returns */
    relaunch(env: NodeJS.ProcessEnv): never;
}

/**
 * Node cannot replace its own image, so the relaunch runs the same script with the
 * same arguments as a child and exits with the child's status.
 */
export const nodeProcessHost: ProcessHost = {
    platform: process.platform,
    env: process.env,
    relaunch(env) {
        const result = spawnSync(process.execPath, [...process.execArgv, ...process.argv.slice(1)], {
            stdio: 'inherit',
            env,
        });

        if (result.error) {
            console.error('Failed to relaunch the process:', result.error.message);
            process.exit(1);
        }

        process.exit(result.status ?? 1);
    },
};
