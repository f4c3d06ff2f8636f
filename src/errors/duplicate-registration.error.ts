export class DuplicateRegistrationError extends Error {
  constructor(
    public readonly collection: string,
    public readonly class1: string,
    public readonly class2: string,
  ) {
    super(
      `Duplicate state entity collection "${collection}". ` +
        `Both ${class1} and ${class2} are registered with the same collection.`,
    );
    this.name = 'DuplicateRegistrationError';
  }
}
