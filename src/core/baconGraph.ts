import { InvalidArgumentError } from './errors';
import { GraphBuilder } from './graph/graphBuilder';
import { getFilmography } from './graph/graphStore';
import { BipartiteGraph, BuildStats, GraphRecord } from './graph/types';
import { loadRecordsFromFile } from './loading/dataLoader';
import { traverseFromReference, TraversalResult } from './search/baconEngine';
import {
    lookupDistance, lookupPath, renderPath,
    DistanceResult, PathStep,
} from './search/baconQuery';

export const DEFAULT_REFERENCE_ACTOR = 'Bacon, Kevin (I)';
export const DEFAULT_EXPECTED_ACTORS = 3000;
export const DEFAULT_EXPECTED_MOVIES = 1000;

export type LogFn = (message: string) => void;

export interface BaconGraphOptions {
    referenceActor?: string;
    /**
     * Capacity hints.  JavaScript maps cannot be pre-sized, so these only
     * appear next to the real counts in the load summary.
     */
    expectedActors?: number;
    expectedMovies?: number;
    log?: LogFn;
}

export interface LoadBaconGraphOptions extends BaconGraphOptions {
    dataFile: string;
}

interface ResolvedOptions {
    referenceActor: string;
    expectedActors: number;
    expectedMovies: number;
    log: LogFn;
}

const defaultLog: LogFn = message => console.log(`[BaconGraph] ${message}`);

function requireHint(value: number, label: string): number {
    if (!Number.isInteger(value) || value < 0) {
        throw new InvalidArgumentError(`Expected number of ${label} must be a non-negative integer (got ${value})`);
    }
    return value;
}

function resolveOptions(options: BaconGraphOptions): ResolvedOptions {
    const referenceActor = options.referenceActor ?? DEFAULT_REFERENCE_ACTOR;
    if (referenceActor.trim() === '') {
        throw new InvalidArgumentError("Reference actor can't be blank");
    }
    return {
        referenceActor,
        expectedActors: requireHint(options.expectedActors ?? DEFAULT_EXPECTED_ACTORS, 'actors'),
        expectedMovies: requireHint(options.expectedMovies ?? DEFAULT_EXPECTED_MOVIES, 'movies'),
        log: options.log ?? defaultLog,
    };
}

/**
 * An actor/movie graph with distances to the reference actor already
 * computed.  Construction either completes (build + BFS) or throws; there is
 * no partially usable instance.  Afterwards the object is read-only and any
 * number of queries may run against it.
 */
export class BaconGraph {
    private constructor(
        readonly referenceActor: string,
        private readonly graph: BipartiteGraph,
        private readonly traversal: TraversalResult,
    ) {}

    /**
     * Build from records already in memory.  Used by tests and by callers that
     * parse their own input format.
     */
    static fromRecords(records: Iterable<GraphRecord>, options: BaconGraphOptions = {}): BaconGraph {
        const resolved = resolveOptions(options);
        const graph = new GraphBuilder().addRecords(records).build();
        return BaconGraph.traverse(graph, resolved);
    }

    /**
     * Read a data file, build the graph and compute every actor's distance to
     * the reference actor.  Progress and timings go to `options.log`.
     *
     * @throws InvalidArgumentError        blank path or reference, negative hints.
     * @throws DataSourceError             missing or unreadable file.
     * @throws ReferenceActorNotFoundError reference actor absent from the file.
     */
    static async load(options: LoadBaconGraphOptions): Promise<BaconGraph> {
        if (options.dataFile.trim() === '') {
            throw new InvalidArgumentError("File name can't be blank");
        }
        const resolved = resolveOptions(options);
        const { log } = resolved;
        const startTime = Date.now();

        log('Reading file...');
        const builder = new GraphBuilder();
        const summary = await loadRecordsFromFile(options.dataFile, record => builder.addRecord(record));
        const graph = builder.build();

        log(`File read in ${Date.now() - startTime} milliseconds`);
        log(`Actors read: ${graph.stats.actorCount} (expected ${resolved.expectedActors})`);
        log(`Movies read: ${graph.stats.movieCount} (expected ${resolved.expectedMovies})`);
        if (summary.ignoredLines > 0 || graph.stats.skippedRecords > 0) {
            log(`Ignored ${summary.ignoredLines} unrecognised line(s), skipped ${graph.stats.skippedRecords} movie credit(s) with no actor`);
        }

        const baconGraph = BaconGraph.traverse(graph, resolved);
        log(`Total time ${Date.now() - startTime} milliseconds`);
        return baconGraph;
    }

    private static traverse(graph: BipartiteGraph, options: ResolvedOptions): BaconGraph {
        const startTime = Date.now();
        options.log('Calculating distances...');
        const traversal = traverseFromReference(graph, options.referenceActor);
        options.log(`Search done in ${Date.now() - startTime} milliseconds`);
        return new BaconGraph(options.referenceActor, graph, traversal);
    }

    get stats(): Readonly<BuildStats> {
        return this.graph.stats;
    }

    lookupDistance(actorName: string): DistanceResult {
        return lookupDistance(this.graph, this.traversal, actorName);
    }

    lookupPath(actorName: string): PathStep[] | null {
        return lookupPath(this.graph, this.traversal, actorName);
    }

    /**
     * Degrees of separation, -1 when the actor is unknown, Infinity when the
     * actor is not connected to the reference actor.
     */
    getBaconNumber(actorName: string): number {
        const result = this.lookupDistance(actorName);
        switch (result.status) {
            case 'not-found':   return -1;
            case 'unreachable': return Infinity;
            case 'reached':     return result.baconNumber;
        }
    }

    /** Rendered path such as `<a>X<a><t>M<t><a>Y<a>`, or null for an unknown actor. */
    getBaconPath(actorName: string): string | null {
        const path = this.lookupPath(actorName);
        return path ? renderPath(path) : null;
    }

    getFilmography(actorName: string): string[] {
        return getFilmography(this.graph, actorName);
    }

    /** Run the BFS again; the result is identical to the one held. */
    recomputeTraversal(): TraversalResult {
        return traverseFromReference(this.graph, this.referenceActor);
    }

    get traversalResult(): TraversalResult {
        return this.traversal;
    }
}

export function loadBaconGraph(options: LoadBaconGraphOptions): Promise<BaconGraph> {
    return BaconGraph.load(options);
}
