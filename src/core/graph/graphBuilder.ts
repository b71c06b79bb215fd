import { BaconGraphError } from '../errors';
import { BipartiteGraph, BuildStats, GraphNode, GraphRecord, NodeId, NodeKind } from './types';

interface MutableNode extends GraphNode {
    readonly neighbors: Set<NodeId>;
}

/**
 * Turns the record stream of a data file into a bipartite actor/movie graph.
 *
 * An actor record opens a context; every following movie record credits that
 * actor until the next actor record.  Movie titles are deduplicated across the
 * whole stream so two actors crediting the same title share one movie node.
 *
 * A repeated actor declaration reuses the node created by the first one and
 * makes it the current context again (first wins).  Movie records seen before
 * any actor record have nobody to attach to and are counted as skipped.
 */
export class GraphBuilder {
    private readonly nodes: MutableNode[] = [];
    private readonly actors = new Map<string, NodeId>();
    private movies: Map<string, NodeId> | null = new Map();
    private currentActor: MutableNode | null = null;
    private edgeCount = 0;
    private skippedRecords = 0;

    addRecord(record: GraphRecord): void {
        const movies = this.movies;
        if (!movies) {
            throw new BaconGraphError('GraphBuilder has already been built');
        }

        if (record.kind === 'actor') {
            this.currentActor = this.actorNode(record.name);
            return;
        }

        const actor = this.currentActor;
        if (!actor) {
            this.skippedRecords++;
            return;
        }

        const movie = this.movieNode(movies, record.name);
        // Both sides are written together so adjacency stays symmetric.
        if (!actor.neighbors.has(movie.id)) {
            actor.neighbors.add(movie.id);
            movie.neighbors.add(actor.id);
            this.edgeCount++;
        }
    }

    addRecords(records: Iterable<GraphRecord>): this {
        for (const record of records) { this.addRecord(record); }
        return this;
    }

    /**
     * Hand over the finished graph.  The movie index is dropped here; only
     * actors stay addressable by name.
     */
    build(): BipartiteGraph {
        const movies = this.movies;
        if (!movies) {
            throw new BaconGraphError('GraphBuilder.build() may only be called once');
        }
        this.movies = null;
        this.currentActor = null;

        const stats: BuildStats = {
            actorCount: this.actors.size,
            movieCount: movies.size,
            edgeCount: this.edgeCount,
            skippedRecords: this.skippedRecords,
        };

        return { nodes: this.nodes, actors: this.actors, stats };
    }

    private actorNode(name: string): MutableNode {
        const existing = this.actors.get(name);
        if (existing !== undefined) { return this.nodes[existing]; }

        const node = this.createNode('actor', name);
        this.actors.set(name, node.id);
        return node;
    }

    private movieNode(movies: Map<string, NodeId>, title: string): MutableNode {
        const existing = movies.get(title);
        if (existing !== undefined) { return this.nodes[existing]; }

        const node = this.createNode('movie', title);
        movies.set(title, node.id);
        return node;
    }

    private createNode(kind: NodeKind, name: string): MutableNode {
        const node: MutableNode = { id: this.nodes.length, kind, name, neighbors: new Set() };
        this.nodes.push(node);
        return node;
    }
}

export function buildGraph(records: Iterable<GraphRecord>): BipartiteGraph {
    return new GraphBuilder().addRecords(records).build();
}
