/**
 * Minimal capability set the coordinator needs from an entity.
 * Values are raw: whatever the underlying document holds.
 */
export interface IStateRecord {
  get(field: string): unknown;
  set(field: string, value: unknown): void;
}

/**
 * A record a store adapter can locate and save.
 */
export interface IPersistableRecord extends IStateRecord {
  readonly id: string;
  readonly collection: string;
  toAttributes(): Record<string, unknown>;
  /** Runs the record's own validation rules. */
  validate(): boolean;
  /** Called by stores after a successful write. */
  markPersisted?(): void;
}
