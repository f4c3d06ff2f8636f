import type { IPersistableRecord } from './state-record.interface';

export interface PersistOptions {
  /** When false, the record's own validation rules are skipped. */
  validate: boolean;
}

export interface StoredDocument {
  id: string;
  attributes: Record<string, unknown>;
  updatedAt: Date;
}

export interface IStateStore {
  /**
   * Save the record. Resolves `false` when the store refuses the write
   * (validation or constraint failure). Connectivity and other faults reject.
   */
  persist(record: IPersistableRecord, options: PersistOptions): Promise<boolean>;

  /**
   * Load the stored attributes of a single document.
   */
  findOne(collection: string, id: string): Promise<StoredDocument | null>;

  /**
   * Find all documents whose `stateField` attribute equals `stateValue`.
   */
  findByState(
    collection: string,
    stateField: string,
    stateValue: string,
  ): Promise<StoredDocument[]>;
}
