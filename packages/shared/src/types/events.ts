/**
 * Base interface for all typecensus events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier shared by every event of one resolver run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted once when a batch of packages is submitted. */
export interface BatchStarted extends BaseEvent {
  type: 'BatchStarted';
  payload: {
    packageCount: number;
    concurrency: number;
  };
}

/** Emitted before the first attempt of an index request. */
export interface IndexRequestStarted extends BaseEvent {
  type: 'IndexRequestStarted';
  payload: {
    /** Which index operation: project, listing or exists */
    operation: string;
    /** Package name or artifact filename */
    target: string;
  };
}

/** Emitted when an index request settles, after any retries. */
export interface IndexRequestFinished extends BaseEvent {
  type: 'IndexRequestFinished';
  payload: {
    operation: string;
    target: string;
    durationMs: number;
    success: boolean;
    retries: number;
    error?: string;
  };
}

/** Emitted when the artifact chosen for the marker check is known. */
export interface ArtifactSelected extends BaseEvent {
  type: 'ArtifactSelected';
  payload: {
    package: string;
    version: string;
    filename: string;
    kind: 'wheel' | 'sdist';
  };
}

/** Emitted when the stub lookup could not give a definitive answer. */
export interface StubLookupUndetermined extends BaseEvent {
  type: 'StubLookupUndetermined';
  payload: {
    package: string;
    stubPackage: string;
    error: string;
  };
}

export interface PackageResolved extends BaseEvent {
  type: 'PackageResolved';
  payload: {
    index: number;
    total: number;
    package: string;
    hasPyTyped: boolean;
    hasTypesPackage: boolean | null;
    durationMs: number;
  };
}

export interface PackageFailed extends BaseEvent {
  type: 'PackageFailed';
  payload: {
    index: number;
    total: number;
    package: string;
    error: string;
    cancelled: boolean;
  };
}

/** Emitted once every slot of a batch holds an outcome. */
export interface BatchFinished extends BaseEvent {
  type: 'BatchFinished';
  payload: {
    resolved: number;
    failed: number;
    cancelled: number;
    durationMs: number;
  };
}

export type TypecensusEvent =
  | BatchStarted
  | IndexRequestStarted
  | IndexRequestFinished
  | ArtifactSelected
  | StubLookupUndetermined
  | PackageResolved
  | PackageFailed
  | BatchFinished;

/**
 * Distributes a payload over the event union so callers can build one
 * event without restating the metadata fields.
 */
export type EventInit<E extends TypecensusEvent = TypecensusEvent> = E extends TypecensusEvent
  ? Pick<E, 'type' | 'payload'>
  : never;

export const EVENT_SCHEMA_VERSION = 1;

export function createEvent(runId: string, init: EventInit): TypecensusEvent {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
    ...init,
  };
}
