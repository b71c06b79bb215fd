import { BipartiteGraph, NodeId } from './types';

// ---------------------------------------------------------------------------
// O(1) node lookups
// ---------------------------------------------------------------------------

/**
 * Node id of the actor with exactly this display name, or undefined.
 * Names are matched verbatim: "Bacon, Kevin (I)" and "Kevin Bacon" are
 * different actors.
 */
export function findActorId(graph: BipartiteGraph, name: string): NodeId | undefined {
    return graph.actors.get(name);
}

// ---------------------------------------------------------------------------
// O(1) edge queries
// ---------------------------------------------------------------------------

/**
 * Every node sharing an edge with `id`.  For an actor these are the movies
 * they appeared in; for a movie, its cast.
 */
export function getNeighbors(graph: BipartiteGraph, id: NodeId): NodeId[] {
    return Array.from(graph.nodes[id]?.neighbors ?? []);
}

/** Movie titles credited to an actor, in the order they were first read. */
export function getFilmography(graph: BipartiteGraph, actorName: string): string[] {
    const id = findActorId(graph, actorName);
    if (id === undefined) { return []; }
    return getNeighbors(graph, id).map(movieId => graph.nodes[movieId].name);
}
