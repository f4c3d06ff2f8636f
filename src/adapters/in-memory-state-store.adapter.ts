import type { IPersistableRecord } from '../interfaces/state-record.interface';
import type {
  IStateStore,
  PersistOptions,
  StoredDocument,
} from '../interfaces/state-store.interface';
import { assertCollectionName } from '../utils/assert-collection-name';

export interface InMemoryStateStoreOptions {
  /** Attribute names that must be unique per collection. */
  uniqueAttributes?: Record<string, string[]>;
}

function cloneJson(value: Record<string, unknown>): Record<string, unknown> {
  return JSON.parse(JSON.stringify(value));
}

function cloneStoredDocument(document: StoredDocument): StoredDocument {
  return {
    id: document.id,
    attributes: cloneJson(document.attributes),
    updatedAt: new Date(document.updatedAt),
  };
}

/**
 * Text form of an attribute, as Postgres `document ->> field` returns it.
 */
function textValue(
  attributes: Record<string, unknown>,
  field: string,
): string | null {
  if (!Object.prototype.hasOwnProperty.call(attributes, field)) return null;
  const value = attributes[field];
  if (value === null || value === undefined) return null;
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Process-local store. Documents are cloned on the way in and out, so callers
 * never share references with the stored copy.
 */
export class InMemoryStateStore implements IStateStore {
  private readonly collections = new Map<string, Map<string, StoredDocument>>();
  private persistCount = 0;

  constructor(private readonly options: InMemoryStateStoreOptions = {}) {}

  /** Number of persist calls, accepted or not. */
  get persistCalls(): number {
    return this.persistCount;
  }

  async persist(
    record: IPersistableRecord,
    options: PersistOptions,
  ): Promise<boolean> {
    this.persistCount++;
    assertCollectionName(record.collection);

    if (options.validate && !record.validate()) {
      return false;
    }

    const attributes = record.toAttributes();
    if (this.violatesUniqueness(record.collection, record.id, attributes)) {
      return false;
    }

    this.getCollection(record.collection).set(record.id, {
      id: record.id,
      attributes: cloneJson(attributes),
      updatedAt: new Date(),
    });
    record.markPersisted?.();
    return true;
  }

  async findOne(collection: string, id: string): Promise<StoredDocument | null> {
    assertCollectionName(collection);
    const document = this.getCollection(collection).get(id);
    return document ? cloneStoredDocument(document) : null;
  }

  async findByState(
    collection: string,
    stateField: string,
    stateValue: string,
  ): Promise<StoredDocument[]> {
    assertCollectionName(collection);

    const matches: StoredDocument[] = [];
    for (const document of this.getCollection(collection).values()) {
      if (textValue(document.attributes, stateField) === stateValue) {
        matches.push(cloneStoredDocument(document));
      }
    }
    return matches;
  }

  private violatesUniqueness(
    collection: string,
    id: string,
    attributes: Record<string, unknown>,
  ): boolean {
    const fields = this.options.uniqueAttributes?.[collection] ?? [];
    if (fields.length === 0) return false;

    for (const other of this.getCollection(collection).values()) {
      if (other.id === id) continue;
      for (const field of fields) {
        if (
          attributes[field] !== undefined &&
          other.attributes[field] === attributes[field]
        ) {
          return true;
        }
      }
    }
    return false;
  }

  private getCollection(collection: string): Map<string, StoredDocument> {
    const existing = this.collections.get(collection);
    if (existing) return existing;

    const next = new Map<string, StoredDocument>();
    this.collections.set(collection, next);
    return next;
  }
}
