import { open, FileHandle } from 'fs/promises';
import { createInterface } from 'readline';
import { DataSourceError } from '../errors';
import { GraphRecord } from '../graph/types';
import { parseRecordLine } from './recordParser';

export interface LoadSummary {
    linesRead: number;
    recordsRead: number;
    /** Lines carrying neither marker. */
    ignoredLines: number;
}

function errorCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Stream a data file line by line and hand every recognised record to
 * `onRecord` in file order.  The file is never held in memory as a whole;
 * the full dataset runs to millions of lines.
 *
 * @throws DataSourceError `not-found` when the path does not exist,
 *         `read-failed` for any other open or read failure.
 */
export async function loadRecordsFromFile(
    filePath: string,
    onRecord: (record: GraphRecord) => void,
): Promise<LoadSummary> {
    let handle: FileHandle;
    try {
        handle = await open(filePath, 'r');
    } catch (err) {
        if (errorCode(err) === 'ENOENT') {
            throw new DataSourceError('not-found', filePath, `File was not found: ${filePath}`);
        }
        throw new DataSourceError('read-failed', filePath, `Could not open ${filePath}: ${describe(err)}`);
    }

    const summary: LoadSummary = { linesRead: 0, recordsRead: 0, ignoredLines: 0 };
    const failure: { error?: unknown } = {};

    try {
        const stream = handle.createReadStream({ encoding: 'utf8' });
        const lines = createInterface({ input: stream, crlfDelay: Infinity });
        // Not every Node release forwards input errors through the readline
        // iterator, so the stream's own error event is what counts.
        stream.once('error', err => {
            failure.error = err;
            lines.close();
        });

        try {
            for await (const line of lines) {
                summary.linesRead++;
                const record = parseRecordLine(line);
                if (record) {
                    summary.recordsRead++;
                    onRecord(record);
                } else {
                    summary.ignoredLines++;
                }
            }
        } catch (err) {
            // Errors from onRecord propagate unchanged.
            if (failure.error === undefined) { throw err; }
        }
    } finally {
        await handle.close();
    }

    if (failure.error !== undefined) {
        throw new DataSourceError('read-failed', filePath, `Could not read ${filePath}: ${describe(failure.error)}`);
    }

    return summary;
}
