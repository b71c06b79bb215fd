import { ReferenceActorNotFoundError } from '../errors';
import { findActorId } from '../graph/graphStore';
import { BipartiteGraph, NodeId } from '../graph/types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Outcome of one BFS from the reference actor.
 *
 * A node missing from `distances` was never discovered and is unreachable.
 * `predecessors` maps every discovered node to the node one hop closer to the
 * reference actor; the reference actor itself maps to null.  The links form a
 * tree rooted at the reference actor, so every walk terminates.
 */
export interface TraversalResult {
    referenceId: NodeId;
    distances: ReadonlyMap<NodeId, number>;
    predecessors: ReadonlyMap<NodeId, NodeId | null>;
}

// ---------------------------------------------------------------------------
// BFS
// ---------------------------------------------------------------------------

/**
 * Single-source FIFO BFS from `referenceActor` over the whole bipartite graph.
 *
 * A node's distance is fixed the first time it is discovered; the queue
 * hands out nodes in non-decreasing distance order, so that first discovery
 * is along a shortest path.  Actor → movie → actor is two hops, which is why
 * every actor sits at an even distance.
 *
 * The graph is only read.  Calling this twice with the same arguments yields
 * equal results.
 *
 * Time complexity: O(nodes + edges) of the reference actor's component.
 *
 * @throws ReferenceActorNotFoundError when no actor carries that name.
 */
export function traverseFromReference(graph: BipartiteGraph, referenceActor: string): TraversalResult {
    const referenceId = findActorId(graph, referenceActor);
    if (referenceId === undefined) {
        throw new ReferenceActorNotFoundError(referenceActor);
    }

    const distances = new Map<NodeId, number>();
    const predecessors = new Map<NodeId, NodeId | null>();
    // Index-based dequeue; shift() is O(n) on large frontiers.
    const queue: NodeId[] = [referenceId];
    let head = 0;

    distances.set(referenceId, 0);
    predecessors.set(referenceId, null);

    while (head < queue.length) {
        const id = queue[head++];
        const depth = distances.get(id) ?? 0;

        for (const neighborId of graph.nodes[id].neighbors) {
            if (distances.has(neighborId)) { continue; }
            distances.set(neighborId, depth + 1);
            predecessors.set(neighborId, id);
            queue.push(neighborId);
        }
    }

    return { referenceId, distances, predecessors };
}

// ---------------------------------------------------------------------------
// Path reconstruction
// ---------------------------------------------------------------------------

/**
 * Hop count from the reference actor, or Infinity for unreached nodes.
 */
export function distanceOf(result: TraversalResult, id: NodeId): number {
    return result.distances.get(id) ?? Infinity;
}

/**
 * Walk predecessor links from `id` back to the reference actor and return the
 * chain ordered [reference, …intermediates…, id].
 *
 * An unreached node has no predecessor, so its chain is just [id].
 */
export function buildPathIds(result: TraversalResult, id: NodeId): NodeId[] {
    const path: NodeId[] = [id];
    let cur = result.predecessors.get(id) ?? null;

    while (cur !== null) {
        path.push(cur);
        cur = result.predecessors.get(cur) ?? null;
    }

    return path.reverse();
}
