import { randomUUID } from 'crypto';
import type { IPersistableRecord } from '../interfaces/state-record.interface';
import { assertCollectionName } from '../utils/assert-collection-name';

/**
 * Returns an error message, or undefined when the document is valid.
 */
export type DocumentValidator = (document: StateDocument) => string | undefined;

export interface StateDocumentInit {
  id?: string;
  attributes?: Record<string, unknown>;
  validators?: DocumentValidator[];
  /** Set for documents loaded from a store. */
  persisted?: boolean;
}

function cloneAttributes(
  attributes: Record<string, unknown>,
): Record<string, unknown> {
  return JSON.parse(JSON.stringify(attributes));
}

// Own attribute names only: `constructor` and `__proto__` are ordinary fields.
function toAttributeMap(attributes: Record<string, unknown>): Map<string, unknown> {
  return new Map(Object.entries(cloneAttributes(attributes)));
}

export class StateDocument implements IPersistableRecord {
  readonly id: string;
  readonly errors: string[] = [];
  private attributes: Map<string, unknown>;
  private readonly validators: DocumentValidator[];
  private persisted: boolean;

  constructor(
    readonly collection: string,
    init: StateDocumentInit = {},
  ) {
    assertCollectionName(collection);
    this.id = init.id ?? randomUUID();
    this.attributes = toAttributeMap(init.attributes ?? {});
    this.validators = init.validators ?? [];
    this.persisted = init.persisted ?? false;
  }

  get isNewRecord(): boolean {
    return !this.persisted;
  }

  get(field: string): unknown {
    return this.attributes.get(field);
  }

  /** Setting `undefined` removes the attribute. */
  set(field: string, value: unknown): void {
    if (value === undefined) {
      this.attributes.delete(field);
      return;
    }
    this.attributes.set(field, value);
  }

  has(field: string): boolean {
    return this.attributes.has(field);
  }

  toAttributes(): Record<string, unknown> {
    return cloneAttributes(Object.fromEntries(this.attributes));
  }

  validate(): boolean {
    this.errors.length = 0;
    for (const validator of this.validators) {
      const message = validator(this);
      if (message !== undefined) {
        this.errors.push(message);
      }
    }
    return this.errors.length === 0;
  }

  markPersisted(): void {
    this.persisted = true;
  }

  replaceAttributes(attributes: Record<string, unknown>): void {
    this.attributes = toAttributeMap(attributes);
  }
}
