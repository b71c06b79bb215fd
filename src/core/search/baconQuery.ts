import { InvalidArgumentError } from '../errors';
import { findActorId } from '../graph/graphStore';
import { NODE_MARKERS } from '../graph/markers';
import { BipartiteGraph, NodeKind } from '../graph/types';
import { buildPathIds, distanceOf, TraversalResult } from './baconEngine';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * - `not-found`   : no actor with that exact name was read.
 * - `unreachable` : the actor exists but shares no chain of movies with the
 *                   reference actor.
 * - `reached`     : `baconNumber` = hops / 2, since actor → movie → actor is
 *                   one degree of separation.
 */
export type DistanceResult =
    | { status: 'not-found' }
    | { status: 'unreachable' }
    | { status: 'reached'; baconNumber: number };

export interface PathStep {
    kind: NodeKind;
    name: string;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

function requireName(actorName: string): void {
    if (actorName.trim() === '') {
        throw new InvalidArgumentError("Actor name can't be blank");
    }
}

export function lookupDistance(
    graph: BipartiteGraph,
    traversal: TraversalResult,
    actorName: string,
): DistanceResult {
    requireName(actorName);
    const id = findActorId(graph, actorName);
    if (id === undefined) { return { status: 'not-found' }; }

    const distance = distanceOf(traversal, id);
    if (distance === Infinity) { return { status: 'unreachable' }; }
    return { status: 'reached', baconNumber: Math.floor(distance / 2) };
}

/**
 * Chain of actors and movies from the reference actor to `actorName`, or
 * null when the actor is unknown.
 *
 * An unreachable actor yields a single-step path holding only itself, so
 * check `lookupDistance` first before presenting a path as a connection.
 */
export function lookupPath(
    graph: BipartiteGraph,
    traversal: TraversalResult,
    actorName: string,
): PathStep[] | null {
    requireName(actorName);
    const id = findActorId(graph, actorName);
    if (id === undefined) { return null; }

    return buildPathIds(traversal, id).map(stepId => {
        const node = graph.nodes[stepId];
        return { kind: node.kind, name: node.name };
    });
}

/** Wrap each step in its kind's marker and join without separators. */
export function renderPath(path: readonly PathStep[]): string {
    return path.map(step => `${NODE_MARKERS[step.kind]}${step.name}${NODE_MARKERS[step.kind]}`).join('');
}
