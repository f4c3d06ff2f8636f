export class InvalidCollectionNameError extends Error {
  constructor(public readonly collection: string) {
    super(
      `Invalid collection name "${collection}". Only alphanumeric characters and underscores are allowed.`,
    );
    this.name = 'InvalidCollectionNameError';
  }
}
