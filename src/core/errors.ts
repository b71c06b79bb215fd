/**
 * Base class for every failure raised by the library.  Query outcomes such as
 * "actor not found" are returned as data and never reach this hierarchy.
 */
export class BaconGraphError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** A caller broke a precondition: blank names, negative capacity hints. */
export class InvalidArgumentError extends BaconGraphError {}

export type DataSourceErrorCode = 'not-found' | 'read-failed';

export class DataSourceError extends BaconGraphError {
    constructor(
        readonly code: DataSourceErrorCode,
        readonly filePath: string,
        message: string,
    ) {
        super(message);
    }
}

export class ReferenceActorNotFoundError extends BaconGraphError {
    constructor(readonly referenceActor: string) {
        super(`Reference actor "${referenceActor}" was not found`);
    }
}

export class ConfigError extends BaconGraphError {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
    }
}
