import { Logger } from '@nestjs/common';
import { sql, type SQL } from 'drizzle-orm';
import type { IPersistableRecord } from '../interfaces/state-record.interface';
import type {
  IStateStore,
  PersistOptions,
  StoredDocument,
} from '../interfaces/state-store.interface';
import { assertCollectionName } from '../utils/assert-collection-name';
import {
  type DocumentRow,
  isDocumentRow,
  isIntegrityViolation,
  toStoredDocument,
} from '../utils/document-rows';

/**
 * The slice of a Drizzle Postgres database (or transaction) the store uses.
 */
export interface DrizzleSqlExecutor {
  execute(query: SQL): Promise<unknown>;
}

/**
 * Extracts row array from a Drizzle execute() result.
 * Different PG drivers return different shapes:
 * - postgres-js: returns the array directly
 * - node-postgres: returns { rows: [...] }
 */
function extractRows(result: unknown): DocumentRow[] {
  let rows: unknown = [];
  if (Array.isArray(result)) {
    rows = result;
  } else if (result && typeof result === 'object' && 'rows' in result) {
    rows = result.rows;
  }
  return Array.isArray(rows) ? rows.filter(isDocumentRow) : [];
}

export class DrizzleStateStore implements IStateStore {
  private readonly logger = new Logger(DrizzleStateStore.name);

  constructor(private readonly db: DrizzleSqlExecutor) {}

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
      await this.db.execute(
        sql`INSERT INTO ${sql.raw(record.collection)} (id, document, updated_at)
            VALUES (${record.id}, ${documentJson}::jsonb, CURRENT_TIMESTAMP)
            ON CONFLICT (id) DO UPDATE SET
              document = ${documentJson}::jsonb,
              updated_at = CURRENT_TIMESTAMP`,
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
    const result = await this.db.execute(
      sql`SELECT id, document, updated_at FROM ${sql.raw(collection)} WHERE id = ${id}`,
    );

    const rows = extractRows(result);
    if (rows.length === 0) return null;
    return toStoredDocument(rows[0]);
  }

  async findByState(
    collection: string,
    stateField: string,
    stateValue: string,
  ): Promise<StoredDocument[]> {
    assertCollectionName(collection);
    const result = await this.db.execute(
      sql`SELECT id, document, updated_at FROM ${sql.raw(collection)} WHERE document ->> ${stateField} = ${stateValue}`,
    );

    return extractRows(result).map((row) => toStoredDocument(row));
  }
}
