import { createInterface } from 'readline';
import { Readable, Writable } from 'stream';
import { BaconGraph } from '../core/baconGraph';
import { renderPath } from '../core/search/baconQuery';

export function promptFor(graph: BaconGraph): string {
    return `Input the name for the actor in the format "${graph.referenceActor}". ` +
        'Press enter without providing a name to quit';
}

/**
 * Answer lines for one query.  Not-found and unreachable are ordinary answers
 * here, never errors.
 */
export function answerQuery(graph: BaconGraph, actorName: string): string[] {
    const result = graph.lookupDistance(actorName);

    switch (result.status) {
        case 'not-found':
            return [`"${actorName}" not found`];
        case 'unreachable':
            return [`"${actorName}" is not connected to ${graph.referenceActor}`];
        case 'reached': {
            const path = graph.lookupPath(actorName) ?? [];
            return [
                `"${actorName}" is ${result.baconNumber} steps away from ${graph.referenceActor}. The path is:`,
                renderPath(path),
            ];
        }
    }
}

/**
 * Read-query-print loop.  One actor name per input line; a blank line or the
 * end of input ends the session.  Resolves once "Goodbye" has been written.
 */
export async function runQuerySession(graph: BaconGraph, input: Readable, output: Writable): Promise<void> {
    const writeLine = (line = ''): void => { output.write(`${line}\n`); };
    const lines = createInterface({ input, crlfDelay: Infinity, terminal: false });

    writeLine(promptFor(graph));
    try {
        for await (const line of lines) {
            if (line.trim() === '') { break; }

            writeLine();
            for (const answer of answerQuery(graph, line)) { writeLine(answer); }
            writeLine();
            writeLine(promptFor(graph));
        }
    } finally {
        lines.close();
    }
    writeLine('Goodbye');
}
