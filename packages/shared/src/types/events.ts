/**
 * Base interface for all pplaces events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the CLI invocation */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a scan of a root directory starts */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    root: string;
    daysToShow?: number;
    concurrency: number;
  };
}

/** Emitted for every candidate directory the inspector classified as a repository */
export interface RepositoryInspected extends BaseEvent {
  type: 'RepositoryInspected';
  payload: {
    path: string;
    branch: string;
    isDirty: boolean;
    lastCommitTime?: string;
    remoteUrl?: string;
    issueCount: number;
  };
}

/** Emitted when discovery recovers from a problem */
export interface ScanWarningRaised extends BaseEvent {
  type: 'ScanWarningRaised';
  payload: {
    kind: string;
    path: string;
    message: string;
  };
}

/** Emitted when a scan finishes */
export interface ScanCompleted extends BaseEvent {
  type: 'ScanCompleted';
  payload: {
    root: string;
    found: number;
    shown: number;
    warnings: number;
    durationMs: number;
  };
}

/** Emitted before a clone or upload is delegated to an external client */
export interface LifecycleOperationStarted extends BaseEvent {
  type: 'LifecycleOperationStarted';
  payload: {
    operation: 'clone' | 'upload';
    /** Clone URL, or the local path being uploaded */
    source: string;
    /** Clone destination, or the hosting target */
    target: string;
  };
}

/** Emitted when a clone or upload finishes, successfully or not */
export interface LifecycleOperationFinished extends BaseEvent {
  type: 'LifecycleOperationFinished';
  payload: {
    operation: 'clone' | 'upload';
    outcome: 'completed' | 'failed' | 'conflict' | 'rejected';
    exitCode?: number;
    path?: string;
    durationMs?: number;
  };
}

export type PplacesEvent =
  | ScanStarted
  | RepositoryInspected
  | ScanWarningRaised
  | ScanCompleted
  | LifecycleOperationStarted
  | LifecycleOperationFinished;

/** Current schema version of {@link PplacesEvent}. */
export const EVENT_SCHEMA_VERSION = 1;

type EventBody<T> = T extends PplacesEvent ? Pick<T, 'type' | 'payload'> : never;

/** Event type and payload, without the envelope fields. */
export type PplacesEventInput = EventBody<PplacesEvent>;

/**
 * Wraps an event body in the common envelope.
 */
export function createEvent(
  runId: string,
  input: PplacesEventInput,
  now: Date = new Date(),
): PplacesEvent {
  return {
    ...input,
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: now.toISOString(),
    runId,
  };
}
