export type NodeKind = 'actor' | 'movie';

/** Index into `BipartiteGraph.nodes`. Stable for the lifetime of the graph. */
export type NodeId = number;

/**
 * Actor nodes only ever neighbour movie nodes and vice versa.
 * Every edge is stored on both endpoints at write time.
 */
export interface GraphNode {
    readonly id: NodeId;
    readonly kind: NodeKind;
    readonly name: string;
    readonly neighbors: ReadonlySet<NodeId>;
}

export interface BuildStats {
    actorCount: number;
    movieCount: number;
    edgeCount: number;
    /** Records that could not be applied (movie credit with no current actor). */
    skippedRecords: number;
}

export interface BipartiteGraph {
    readonly nodes: readonly GraphNode[];
    /** actor name → node id. Movie titles are not queryable after build. */
    readonly actors: ReadonlyMap<string, NodeId>;
    readonly stats: Readonly<BuildStats>;
}

export type GraphRecord =
    | { kind: 'actor'; name: string }
    | { kind: 'movie'; name: string };
