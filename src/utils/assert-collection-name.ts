import { InvalidCollectionNameError } from '../errors/invalid-collection-name.error';
import { COLLECTION_NAME_REGEX } from '../state-persistence.constants';

export function assertCollectionName(collection: string): void {
  if (!COLLECTION_NAME_REGEX.test(collection)) {
    throw new InvalidCollectionNameError(collection);
  }
}
