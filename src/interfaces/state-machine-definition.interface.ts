import type { IStateRecord } from './state-record.interface';

export type TransitionGuard = (record: IStateRecord) => boolean;
export type TransitionCallback = (record: IStateRecord) => void | Promise<void>;

/**
 * Supplies the designated initial state, optionally from record data.
 * Must be deterministic for a given record snapshot.
 */
export type InitialStateSupplier = (
  record: IStateRecord,
) => string | null | undefined;

export interface EventTransition {
  /** Source state(s). `'*'` matches any state. */
  from: string | string[];
  to: string;
  guard?: TransitionGuard;
  /** Runs once the new state has been written (and committed, for durable events). */
  after?: TransitionCallback | TransitionCallback[];
}

export interface StateMachineDefinition {
  initial: string | InitialStateSupplier;
  states: string[];
  events?: Record<string, EventTransition | EventTransition[]>;
}
