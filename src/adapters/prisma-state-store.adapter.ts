import { Logger } from '@nestjs/common';
import type { IPersistableRecord } from '../interfaces/state-record.interface';
import type {
  IStateStore,
  PersistOptions,
  StoredDocument,
} from '../interfaces/state-store.interface';
import { assertCollectionName } from '../utils/assert-collection-name';
import {
  isDocumentRow,
  isIntegrityViolation,
  toStoredDocument,
} from '../utils/document-rows';

export interface PrismaRawExecutor {
  $queryRawUnsafe<T = unknown>(query: string, ...values: unknown[]): Promise<T>;
  $executeRawUnsafe(query: string, ...values: unknown[]): Promise<number>;
}

/**
 * Prisma reports database constraint failures as P2002/P2003/P2004 on
 * typed queries and as a raw-query error carrying the SQLSTATE otherwise.
 */
const PRISMA_CONSTRAINT_CODES = new Set(['P2002', 'P2003', 'P2004', 'P2011']);

function isConstraintFailure(error: unknown): boolean {
  if (typeof error === 'object' && error !== null) {
    const code: unknown = Reflect.get(error, 'code');
    if (typeof code === 'string' && PRISMA_CONSTRAINT_CODES.has(code)) {
      return true;
    }
    const meta: unknown = Reflect.get(error, 'meta');
    if (typeof meta === 'object' && meta !== null) {
      const dbCode: unknown = Reflect.get(meta, 'code');
      if (typeof dbCode === 'string' && dbCode.startsWith('23')) {
        return true;
      }
    }
  }
  return isIntegrityViolation(error);
}

export class PrismaStateStore implements IStateStore {
  private readonly logger = new Logger(PrismaStateStore.name);

  constructor(private readonly executor: PrismaRawExecutor) {}

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
      const affected = await this.executor.$executeRawUnsafe(
        `INSERT INTO ${record.collection} (id, document, updated_at)
         VALUES ($1::uuid, $2::jsonb, CURRENT_TIMESTAMP)
         ON CONFLICT (id) DO UPDATE SET
           document = $2::jsonb,
           updated_at = CURRENT_TIMESTAMP`,
        record.id,
        documentJson,
      );
      if (affected === 0) {
        return false;
      }
    } catch (error) {
      if (isConstraintFailure(error)) {
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

    const rows = await this.executor.$queryRawUnsafe<unknown[]>(
      `SELECT id, document, updated_at FROM ${collection} WHERE id = $1::uuid`,
      id,
    );
    const matches = rows.filter(isDocumentRow);
    if (matches.length === 0) return null;

    return toStoredDocument(matches[0]);
  }

  async findByState(
    collection: string,
    stateField: string,
    stateValue: string,
  ): Promise<StoredDocument[]> {
    assertCollectionName(collection);
    const rows = await this.executor.$queryRawUnsafe<unknown[]>(
      `SELECT id, document, updated_at FROM ${collection} WHERE document ->> $1 = $2`,
      stateField,
      stateValue,
    );

    return rows.filter(isDocumentRow).map((row) => toStoredDocument(row));
  }
}
