import type { SourceMetadata } from '../ports/DataSource.js';
import type { UploadSummary } from '../model/UploadRun.js';

/** Emitted when `start()` begins reading the source. */
export interface UploadStartedEvent {
  readonly type: 'upload:started';
  readonly runId: string;
  readonly collection: string;
  readonly merge: boolean;
  readonly source: SourceMetadata;
  readonly timestamp: number;
}

/** Emitted for each row that contributed nothing to its document. */
export interface RowSkippedEvent {
  readonly type: 'row:skipped';
  readonly runId: string;
  readonly rowIndex: number;
  readonly documentId: string | null;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted after the store accepted a document. */
export interface DocumentUploadedEvent {
  readonly type: 'document:uploaded';
  readonly runId: string;
  readonly collection: string;
  readonly documentId: string;
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Emitted when the store rejected a document. */
export interface DocumentFailedEvent {
  readonly type: 'document:failed';
  readonly runId: string;
  readonly collection: string;
  readonly documentId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted once every document has been handed to the store. */
export interface UploadCompletedEvent {
  readonly type: 'upload:completed';
  readonly runId: string;
  readonly summary: UploadSummary;
  readonly timestamp: number;
}

/** Emitted when the run stops on a fatal error. */
export interface UploadFailedEvent {
  readonly type: 'upload:failed';
  readonly runId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all upload events. */
export type DomainEvent =
  | UploadStartedEvent
  | RowSkippedEvent
  | DocumentUploadedEvent
  | DocumentFailedEvent
  | UploadCompletedEvent
  | UploadFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
