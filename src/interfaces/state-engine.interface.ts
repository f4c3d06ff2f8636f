import type { IStateRecord } from './state-record.interface';
import type { StateMachineDefinition } from './state-machine-definition.interface';

export interface ResolveTargetInput {
  definition: StateMachineDefinition;
  currentState: string;
  event: string;
  record: IStateRecord;
}

export interface ResolvedTransition {
  fromState: string;
  toState: string;
  index: number;
}

export interface IStateMachineEngine {
  /**
   * Pick the transition `event` takes from `currentState`, or null when the
   * event is not permitted (unknown event, wrong source state, failed guard).
   */
  resolveTarget(input: ResolveTargetInput): ResolvedTransition | null;
}
