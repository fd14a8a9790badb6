import {
  type Firestore,
  type CollectionReference,
  type DocumentData,
  type DocumentSnapshot,
  type QueryDocumentSnapshot,
} from 'firebase-admin/firestore';
import { getFirestoreDb, getCollectionName } from '../firebase.js';
import {
  isRecord,
} from './firestore-type-guards.js';

export abstract class BaseRepository<T extends { id: string }, CreateDTO, UpdateDTO extends Record<string, unknown>> {
  protected db: Firestore;
  protected collectionName: string;

  constructor(collectionName: string, db?: Firestore) {
    this.db = db ?? getFirestoreDb();
    this.collectionName = getCollectionName(collectionName);
  }

  protected get collection(): CollectionReference<DocumentData> {
    return this.db.collection(this.collectionName);
  }

  abstract create(data: CreateDTO): Promise<T>;
  abstract findAll(): Promise<T[]>;
  protected abstract parseEntity(id: string, data: Record<string, unknown>): T | null;

  async findById(id: string): Promise<T | null> {
    const doc = await this.collection.doc(id).get();
    if (!doc.exists) {
      return null;
    }

    return this.docToEntity(doc);
  }

  async update(id: string, data: UpdateDTO): Promise<T | null> {
    const existing = await this.findById(id);
    if (!existing) {
      return null;
    }

    const updates = this.buildUpdatePayload(data);

    if (Object.keys(updates).length === 0) {
      return existing;
    }

    updates['updated_at'] = this.updateTimestamp();

    await this.collection.doc(id).update(updates);
    return this.findById(id);
  }

  protected buildUpdatePayload(data: UpdateDTO): Record<string, unknown> {
    const updates: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined) {
        updates[key] = value;
      }
    }
    return updates;
  }

  async delete(id: string): Promise<boolean> {
    const existing = await this.findById(id);
    if (!existing) {
      return false;
    }
    await this.collection.doc(id).delete();
    return true;
  }

  /** First document whose `field` equals `value`, or null. */
  protected async findOneWhere(field: string, value: string): Promise<T | null> {
    const snapshot = await this.collection.where(field, '==', value).limit(1).get();
    const doc = snapshot.docs[0];
    if (doc === undefined) {
      return null;
    }
    return this.docToEntity(doc);
  }

  protected docsToEntities(docs: QueryDocumentSnapshot<DocumentData>[]): T[] {
    return docs
      .map((doc) => this.docToEntity(doc))
      .filter((entity): entity is T => entity !== null);
  }

  protected updateTimestamp(): string {
    return new Date().toISOString();
  }

  protected createTimestamps(): { created_at: string; updated_at: string } {
    const now = new Date().toISOString();
    return { created_at: now, updated_at: now };
  }

  protected docToEntity(doc: DocumentSnapshot<DocumentData>): T | null {
    const data = doc.data();
    if (!isRecord(data)) {
      return null;
    }
    return this.parseEntity(doc.id, data);
  }
}
