import { applicationDefault, getApps, initializeApp } from 'firebase-admin/app';
import { GeoPoint as FirestoreGeoPoint, getFirestore } from 'firebase-admin/firestore';
import type { DocumentData, Firestore } from 'firebase-admin/firestore';
import type { DocumentFields } from '../../domain/model/Document.js';
import { DocumentUploadError } from '../../domain/model/Errors.js';
import type { TypedValue } from '../../domain/model/TypedValue.js';
import { GeoPoint, isTypedList, isTypedMap } from '../../domain/model/TypedValue.js';
import type { DocumentStore } from '../../domain/ports/DocumentStore.js';
import type { Logger } from '../../domain/ports/Logger.js';

/** How to reach Firestore. */
export interface FirestoreConnectionOptions {
  /** Google Cloud project. Falls back to the application default credentials' project. */
  readonly projectId?: string;
  /** `host:port` of a local emulator. When set, no credentials are used. */
  readonly emulatorHost?: string;
}

function toFirestoreValue(value: TypedValue): unknown {
  if (value instanceof GeoPoint) return new FirestoreGeoPoint(value.latitude, value.longitude);
  if (value instanceof Uint8Array) return Buffer.from(value);
  if (isTypedList(value)) return value.map(toFirestoreValue);
  if (isTypedMap(value)) return toFirestoreData(value);
  return value;
}

/** Convert document fields to Firestore data: geo-points become Firestore `GeoPoint`s, bytes become `Buffer`s. */
export function toFirestoreData(fields: DocumentFields): DocumentData {
  return Object.fromEntries(Object.entries(fields).map(([key, value]) => [key, toFirestoreValue(value)]));
}

/** Document store writing through the Firebase Admin SDK. */
export class FirestoreDocumentStore implements DocumentStore {
  constructor(
    private readonly db: Firestore,
    private readonly logger: Logger,
  ) {}

  /** Initialize (or reuse) the default Firebase app and connect to its Firestore. */
  static connect(options: FirestoreConnectionOptions, logger: Logger): FirestoreDocumentStore {
    if (options.emulatorHost) {
      process.env.FIRESTORE_EMULATOR_HOST = options.emulatorHost;
      logger.info({ emulatorHost: options.emulatorHost }, 'Using the Firestore emulator');
    }

    const app =
      getApps()[0] ??
      initializeApp(
        options.emulatorHost
          ? { projectId: options.projectId }
          : { credential: applicationDefault(), projectId: options.projectId },
      );

    logger.info({ projectId: app.options.projectId ?? 'unknown' }, 'Connected to Firestore');
    return new FirestoreDocumentStore(getFirestore(app), logger);
  }

  async uploadDocument(collection: string, documentId: string, fields: DocumentFields, merge: boolean): Promise<void> {
    try {
      await this.db.collection(collection).doc(documentId).set(toFirestoreData(fields), { merge });
    } catch (error) {
      throw new DocumentUploadError(collection, documentId, { cause: error });
    }
    this.logger.debug({ collection, documentId, merge }, `Document ${documentId} uploaded to ${collection}`);
  }
}
