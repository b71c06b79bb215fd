import { NODE_MARKERS } from '../graph/markers';
import { GraphRecord } from '../graph/types';

/**
 * Parse one line of a data file.
 *
 * `<a>Name` declares an actor, `<t>Title` credits a movie to the last declared
 * actor.  The marker is stripped and the remainder kept verbatim.  Any other
 * line yields null and is skipped by the caller.
 */
export function parseRecordLine(rawLine: string): GraphRecord | null {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

    if (line.startsWith(NODE_MARKERS.actor)) {
        return { kind: 'actor', name: line.slice(NODE_MARKERS.actor.length) };
    }
    if (line.startsWith(NODE_MARKERS.movie)) {
        return { kind: 'movie', name: line.slice(NODE_MARKERS.movie.length) };
    }
    return null;
}

export function* parseRecordLines(lines: Iterable<string>): Generator<GraphRecord> {
    for (const line of lines) {
        const record = parseRecordLine(line);
        if (record) { yield record; }
    }
}
