import type { WriteOutcome } from './state-coordinator.interface';

export type TransitionStatus =
  | 'committed'
  | 'rolled_back'
  | 'deferred'
  | 'not_permitted';

export interface TransitionResult {
  status: TransitionStatus;
  event: string;
  fromState: string;
  /** Null when the event was not permitted. */
  toState: string | null;
  /** Present for durable events that reached the store. */
  outcome?: WriteOutcome;
}
