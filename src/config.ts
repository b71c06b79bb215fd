import { parseArgs } from 'util';
import { z } from 'zod';
import { DEFAULT_EXPECTED_ACTORS, DEFAULT_EXPECTED_MOVIES, DEFAULT_REFERENCE_ACTOR } from './core/baconGraph';
import { ConfigError } from './core/errors';

export interface AppConfig {
    dataFile: string;
    referenceActor: string;
    expectedActors: number;
    expectedMovies: number;
}

// Blank strings are rejected before conversion; Number('') would be 0.
const hint = (fallback: number) =>
    z.string()
        .trim()
        .min(1, 'capacity hint can\'t be blank')
        .pipe(z.coerce.number().int().nonnegative())
        .default(String(fallback));

const schema = z.object({
    dataFile: z.string({ required_error: 'a data file is required' }).regex(/\S/, 'data file can\'t be blank'),
    referenceActor: z.string().regex(/\S/, 'reference actor can\'t be blank').default(DEFAULT_REFERENCE_ACTOR),
    expectedActors: hint(DEFAULT_EXPECTED_ACTORS),
    expectedMovies: hint(DEFAULT_EXPECTED_MOVIES),
});

function parseArgv(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                reference: { type: 'string' },
                actors:    { type: 'string' },
                movies:    { type: 'string' },
            },
        });
    } catch (err) {
        throw new ConfigError([err instanceof Error ? err.message : String(err)]);
    }
}

/**
 * Resolve settings from command-line arguments, falling back to environment
 * variables and then to defaults.  Arguments win over the environment.
 *
 *   bacon-graph <data-file> [--reference <name>] [--actors <n>] [--movies <n>]
 *
 *   BACON_DATA_FILE, BACON_REFERENCE_ACTOR,
 *   BACON_EXPECTED_ACTORS, BACON_EXPECTED_MOVIES
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): AppConfig {
    const { values, positionals } = parseArgv(argv);
    const result = schema.safeParse({
        dataFile:       positionals[0] ?? env.BACON_DATA_FILE,
        referenceActor: values.reference ?? env.BACON_REFERENCE_ACTOR,
        expectedActors: values.actors ?? env.BACON_EXPECTED_ACTORS,
        expectedMovies: values.movies ?? env.BACON_EXPECTED_MOVIES,
    });

    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        );
    }
    return result.data;
}
