/**
 * Thrown by a store to signal that it refused a save. Treated exactly like a
 * `false` result from `persist`: the state write is rolled back.
 */
export class PersistenceRejectedError extends Error {
  constructor(
    public readonly collection: string,
    public readonly recordId: string,
    reason: string,
  ) {
    super(`Store rejected ${collection}/${recordId}: ${reason}`);
    this.name = 'PersistenceRejectedError';
  }
}
