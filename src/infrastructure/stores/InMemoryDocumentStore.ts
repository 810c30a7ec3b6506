import type { DocumentFields } from '../../domain/model/Document.js';
import type { DocumentStore } from '../../domain/ports/DocumentStore.js';
import { getEntry, isTypedMap, setEntry } from '../../domain/model/TypedValue.js';

/** One `uploadDocument()` call as recorded by `InMemoryDocumentStore`. */
export interface RecordedUpload {
  readonly collection: string;
  readonly documentId: string;
  readonly fields: DocumentFields;
  readonly merge: boolean;
}

function mergeFields(existing: DocumentFields, incoming: DocumentFields): DocumentFields {
  const merged: DocumentFields = { ...existing };
  for (const [key, value] of Object.entries(incoming)) {
    const current = getEntry(merged, key);
    setEntry(merged, key, isTypedMap(current) && isTypedMap(value) ? mergeFields(current, value) : value);
  }
  return merged;
}

/**
 * Non-persistent document store.
 *
 * Keeps the latest state of every document plus an ordered log of uploads.
 * With `merge`, nested maps are merged key by key and everything else is
 * replaced, as a document database merge would.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<string, Map<string, DocumentFields>>();
  private readonly log: RecordedUpload[] = [];

  uploadDocument(collection: string, documentId: string, fields: DocumentFields, merge: boolean): Promise<void> {
    this.log.push({ collection, documentId, fields, merge });

    let documents = this.collections.get(collection);
    if (!documents) {
      documents = new Map();
      this.collections.set(collection, documents);
    }

    const existing = documents.get(documentId);
    documents.set(documentId, merge && existing ? mergeFields(existing, fields) : fields);
    return Promise.resolve();
  }

  getDocument(collection: string, documentId: string): DocumentFields | null {
    return this.collections.get(collection)?.get(documentId) ?? null;
  }

  getDocumentIds(collection: string): string[] {
    return [...(this.collections.get(collection)?.keys() ?? [])];
  }

  getUploads(): readonly RecordedUpload[] {
    return this.log;
  }

  clear(): void {
    this.collections.clear();
    this.log.length = 0;
  }
}
