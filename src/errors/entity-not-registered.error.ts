export class EntityNotRegisteredError extends Error {
  constructor(public readonly collection: string) {
    super(`No state entity registered for collection "${collection}".`);
    this.name = 'EntityNotRegisteredError';
  }
}
