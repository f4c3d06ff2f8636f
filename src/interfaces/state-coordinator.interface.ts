import type { IPersistableRecord, IStateRecord } from './state-record.interface';
import type { IStateStore } from './state-store.interface';
import type { InitialStateSupplier } from './state-machine-definition.interface';

export interface CommittedOutcome {
  status: 'committed';
  state: string;
}

export interface RolledBackOutcome {
  status: 'rolled_back';
  /** Exact raw value the field held before the write. */
  previousValue: unknown;
  attemptedState: string;
}

export type WriteOutcome = CommittedOutcome | RolledBackOutcome;

/**
 * What happens to the in-memory field when the store throws something other
 * than a rejection. `propagate` leaves the target value in place, `revert`
 * restores the previous raw value. The error is rethrown either way.
 */
export type FaultPolicy = 'propagate' | 'revert';

export interface StateFieldContext {
  stateField: string;
  store: IStateStore;
  faultPolicy: FaultPolicy;
}

export type ReadStateStrategy = (
  record: IStateRecord,
  context: StateFieldContext,
) => string | undefined;

export type EnsureInitialStateStrategy = (
  record: IStateRecord,
  supplier: InitialStateSupplier,
  context: StateFieldContext,
) => boolean;

export type WriteStateStrategy = (
  record: IPersistableRecord,
  targetState: string,
  context: StateFieldContext,
) => Promise<WriteOutcome>;

export type WriteStateWithoutPersistenceStrategy = (
  record: IStateRecord,
  targetState: string,
  context: StateFieldContext,
) => void;

export interface StateCoordinatorStrategies {
  readState: ReadStateStrategy;
  /** Returns true when an initial state was written. */
  ensureInitialState: EnsureInitialStateStrategy;
  writeState: WriteStateStrategy;
  writeStateWithoutPersistence: WriteStateWithoutPersistenceStrategy;
}

export interface StateWriteListener {
  initialized?(record: IStateRecord, state: string): void;
  committed?(record: IStateRecord, fromValue: unknown, state: string): void;
  rolledBack?(record: IStateRecord, outcome: RolledBackOutcome): void;
  deferred?(record: IStateRecord, fromValue: unknown, state: string): void;
}

export interface StateCoordinatorOptions {
  stateField: string;
  store: IStateStore;
  initialState: InitialStateSupplier;
  faultPolicy?: FaultPolicy;
  strategies?: Partial<StateCoordinatorStrategies>;
  listener?: StateWriteListener;
}
