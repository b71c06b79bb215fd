import { loadConfig } from './config';
import { loadBaconGraph } from './core/baconGraph';
import { BaconGraphError } from './core/errors';
import { runQuerySession } from './session/querySession';

/**
 * Load the graph named by `argv` and serve queries on stdin/stdout.
 * Resolves to the process exit code: 0 after "Goodbye", 1 on a fatal error.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    try {
        const config = loadConfig(argv, env);
        const graph = await loadBaconGraph(config);
        await runQuerySession(graph, process.stdin, process.stdout);
        return 0;
    } catch (err) {
        // Domain failures get a one-line message; anything else is a bug and
        // keeps its stack.
        if (err instanceof BaconGraphError) {
            console.error(`[BaconGraph] ${err.message}`);
        } else {
            console.error('[BaconGraph] Unexpected failure', err);
        }
        return 1;
    }
}
