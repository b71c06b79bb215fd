import { describe, it, expect } from 'vitest';
import { GraphBuilder, buildGraph } from './graphBuilder';
import { findActorId, getFilmography, getNeighbors } from './graphStore';
import { GraphRecord } from './types';
import { SAMPLE_RECORDS } from '../../testing/sampleCast';

describe('GraphBuilder', () => {
    it('creates one node per actor and per distinct movie title', () => {
        const graph = buildGraph(SAMPLE_RECORDS);

        expect(graph.stats).toEqual({ actorCount: 6, movieCount: 5, edgeCount: 8, skippedRecords: 0 });
        expect(graph.nodes).toHaveLength(11);
        expect(graph.nodes.filter(n => n.kind === 'actor')).toHaveLength(6);
    });

    it('keeps every edge symmetric and bipartite', () => {
        const graph = buildGraph(SAMPLE_RECORDS);

        for (const node of graph.nodes) {
            for (const neighborId of node.neighbors) {
                const neighbor = graph.nodes[neighborId];
                expect(neighbor.kind).not.toBe(node.kind);
                expect(neighbor.neighbors.has(node.id)).toBe(true);
            }
        }
    });

    it('shares a movie node between actors crediting the same title', () => {
        const graph = buildGraph([
            { kind: 'actor', name: 'X' },
            { kind: 'movie', name: 'M1' },
            { kind: 'actor', name: 'Y' },
            { kind: 'movie', name: 'M1' },
        ]);

        const x = findActorId(graph, 'X');
        const y = findActorId(graph, 'Y');
        expect(x).toBe(0);
        expect(y).toBe(2);
        expect(getNeighbors(graph, 0)).toEqual([1]);
        expect(getNeighbors(graph, 2)).toEqual([1]);
        expect(getNeighbors(graph, 1)).toEqual([0, 2]);
    });

    it('reuses the first node when an actor is declared twice', () => {
        const graph = buildGraph([
            { kind: 'actor', name: 'X' },
            { kind: 'movie', name: 'M1' },
            { kind: 'actor', name: 'Y' },
            { kind: 'movie', name: 'M2' },
            { kind: 'actor', name: 'X' },
            { kind: 'movie', name: 'M3' },
        ]);

        expect(graph.stats.actorCount).toBe(2);
        expect(findActorId(graph, 'X')).toBe(0);
        expect(getFilmography(graph, 'X')).toEqual(['M1', 'M3']);
    });

    it('skips movie records that precede any actor', () => {
        const graph = buildGraph([
            { kind: 'movie', name: 'Orphan' },
            { kind: 'actor', name: 'X' },
            { kind: 'movie', name: 'M1' },
        ]);

        expect(graph.stats).toEqual({ actorCount: 1, movieCount: 1, edgeCount: 1, skippedRecords: 1 });
        expect(graph.nodes.map(n => n.name)).toEqual(['X', 'M1']);
    });

    it('records a repeated credit as a single edge', () => {
        const graph = buildGraph([
            { kind: 'actor', name: 'X' },
            { kind: 'movie', name: 'M1' },
            { kind: 'movie', name: 'M1' },
        ]);

        expect(graph.stats.edgeCount).toBe(1);
        expect(getNeighbors(graph, 0)).toEqual([1]);
    });

    it('keeps actor names and movie titles in separate namespaces', () => {
        const records: GraphRecord[] = [
            { kind: 'actor', name: 'Same' },
            { kind: 'movie', name: 'Same' },
        ];
        const graph = buildGraph(records);

        expect(graph.nodes.map(n => [n.kind, n.name])).toEqual([['actor', 'Same'], ['movie', 'Same']]);
        expect(getNeighbors(graph, 0)).toEqual([1]);
    });

    it('refuses further records once built', () => {
        const builder = new GraphBuilder();
        builder.addRecord({ kind: 'actor', name: 'X' });
        builder.build();

        expect(() => builder.addRecord({ kind: 'actor', name: 'Y' })).toThrow('already been built');
        expect(() => builder.build()).toThrow('only be called once');
    });
});
