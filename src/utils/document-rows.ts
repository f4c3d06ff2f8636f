import type { StoredDocument } from '../interfaces/state-store.interface';

export interface DocumentRow {
  id: string;
  document: unknown;
  updated_at: Date | string;
}

const INTEGRITY_VIOLATION_CLASS = '23';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * SQLSTATE class 23: unique, foreign key, not-null and check violations.
 * Driver errors wrapped by a query builder are unwrapped through `cause`.
 */
export function isIntegrityViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string') {
    return code.startsWith(INTEGRITY_VIOLATION_CLASS);
  }
  return isIntegrityViolation(Reflect.get(error, 'cause'));
}

export function isDocumentRow(value: unknown): value is DocumentRow {
  if (!isPlainObject(value)) return false;
  const updatedAt = value.updated_at;
  return (
    typeof value.id === 'string' &&
    'document' in value &&
    (typeof updatedAt === 'string' || updatedAt instanceof Date)
  );
}

export function toStoredDocument(row: DocumentRow): StoredDocument {
  const document: unknown =
    typeof row.document === 'string' ? JSON.parse(row.document) : row.document;

  if (!isPlainObject(document)) {
    throw new Error(`Stored document ${row.id} is not a JSON object`);
  }

  return {
    id: row.id,
    attributes: document,
    updatedAt: new Date(row.updated_at),
  };
}
