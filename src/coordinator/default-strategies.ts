import { PersistenceRejectedError } from '../errors/persistence-rejected.error';
import type {
  EnsureInitialStateStrategy,
  ReadStateStrategy,
  StateCoordinatorStrategies,
  WriteStateStrategy,
  WriteStateWithoutPersistenceStrategy,
} from '../interfaces/state-coordinator.interface';
import { isBlank } from '../utils/is-blank';

export const readState: ReadStateStrategy = (record, { stateField }) => {
  const raw = record.get(stateField);
  if (raw === null || raw === undefined) return undefined;
  return String(raw);
};

export const ensureInitialState: EnsureInitialStateStrategy = (
  record,
  supplier,
  { stateField },
) => {
  if (!isBlank(record.get(stateField))) {
    return false;
  }

  const initial = supplier(record);
  record.set(
    stateField,
    initial === null || initial === undefined ? '' : String(initial),
  );
  return true;
};

/**
 * Writes the target, then saves with validation skipped. A refused save puts
 * the exact previous raw value back.
 */
export const writeState: WriteStateStrategy = async (
  record,
  targetState,
  { stateField, store, faultPolicy },
) => {
  const previousValue = record.get(stateField);
  const state = String(targetState);
  record.set(stateField, state);

  let persisted: boolean;
  try {
    persisted = await store.persist(record, { validate: false });
  } catch (error) {
    if (!(error instanceof PersistenceRejectedError)) {
      if (faultPolicy === 'revert') {
        record.set(stateField, previousValue);
      }
      throw error;
    }
    persisted = false;
  }

  if (!persisted) {
    record.set(stateField, previousValue);
    return { status: 'rolled_back', previousValue, attemptedState: state };
  }

  return { status: 'committed', state };
};

export const writeStateWithoutPersistence: WriteStateWithoutPersistenceStrategy =
  (record, targetState, { stateField }) => {
    record.set(stateField, String(targetState));
  };

export const DEFAULT_STRATEGIES: StateCoordinatorStrategies = {
  readState,
  ensureInitialState,
  writeState,
  writeStateWithoutPersistence,
};
