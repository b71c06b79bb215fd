export { BaconGraph, loadBaconGraph, DEFAULT_REFERENCE_ACTOR } from './core/baconGraph';
export type { BaconGraphOptions, LoadBaconGraphOptions, LogFn } from './core/baconGraph';
export {
    BaconGraphError, ConfigError, DataSourceError, InvalidArgumentError, ReferenceActorNotFoundError,
} from './core/errors';
export type { DataSourceErrorCode } from './core/errors';
export { GraphBuilder, buildGraph } from './core/graph/graphBuilder';
export type { BipartiteGraph, BuildStats, GraphNode, GraphRecord, NodeId, NodeKind } from './core/graph/types';
export { parseRecordLine, parseRecordLines } from './core/loading/recordParser';
export { loadRecordsFromFile } from './core/loading/dataLoader';
export type { LoadSummary } from './core/loading/dataLoader';
export { traverseFromReference } from './core/search/baconEngine';
export type { TraversalResult } from './core/search/baconEngine';
export { lookupDistance, lookupPath, renderPath } from './core/search/baconQuery';
export type { DistanceResult, PathStep } from './core/search/baconQuery';
export { loadConfig } from './config';
export type { AppConfig } from './config';
export { answerQuery, runQuerySession } from './session/querySession';
