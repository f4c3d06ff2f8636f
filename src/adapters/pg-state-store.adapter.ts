import { Logger } from '@nestjs/common';
import type { Pool } from 'pg';
import type { IPersistableRecord } from '../interfaces/state-record.interface';
import type {
  IStateStore,
  PersistOptions,
  StoredDocument,
} from '../interfaces/state-store.interface';
import { assertCollectionName } from '../utils/assert-collection-name';
import {
  type DocumentRow,
  isIntegrityViolation,
  toStoredDocument,
} from '../utils/document-rows';

export class PgStateStore implements IStateStore {
  private readonly logger = new Logger(PgStateStore.name);

  constructor(private readonly pool: Pool) {}

  async persist(
    record: IPersistableRecord,
    options: PersistOptions,
  ): Promise<boolean> {
    assertCollectionName(record.collection);

    if (options.validate && !record.validate()) {
      return false;
    }

    const documentJson = JSON.stringify(record.toAttributes());

    try {
      await this.pool.query(
        `INSERT INTO ${record.collection} (id, document, updated_at)
         VALUES ($1::uuid, $2::jsonb, CURRENT_TIMESTAMP)
         ON CONFLICT (id) DO UPDATE SET
           document = $2::jsonb,
           updated_at = CURRENT_TIMESTAMP`,
        [record.id, documentJson],
      );
    } catch (error) {
      if (isIntegrityViolation(error)) {
        this.logger.warn(
          `Constraint violation saving ${record.collection}/${record.id}`,
        );
        return false;
      }
      throw error;
    }

    record.markPersisted?.();
    return true;
  }

  async findOne(collection: string, id: string): Promise<StoredDocument | null> {
    assertCollectionName(collection);

    const result = await this.pool.query<DocumentRow>(
      `SELECT id, document, updated_at
       FROM ${collection}
       WHERE id = $1::uuid`,
      [id],
    );

    if (result.rows.length === 0) return null;
    return toStoredDocument(result.rows[0]);
  }

  async findByState(
    collection: string,
    stateField: string,
    stateValue: string,
  ): Promise<StoredDocument[]> {
    assertCollectionName(collection);

    const result = await this.pool.query<DocumentRow>(
      `SELECT id, document, updated_at
       FROM ${collection}
       WHERE document ->> $1 = $2`,
      [stateField, stateValue],
    );

    return result.rows.map((row) => toStoredDocument(row));
  }
}
