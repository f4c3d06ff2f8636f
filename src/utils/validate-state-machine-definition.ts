import type {
  EventTransition,
  StateMachineDefinition,
} from '../interfaces/state-machine-definition.interface';

export const ANY_STATE = '*';

export function toArray<T>(value?: T | T[]): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function assertKnownState(
  label: string,
  states: Set<string>,
  state: string,
  eventName: string,
): void {
  if (!states.has(state)) {
    throw new Error(
      `State machine ${label}: event "${eventName}" references unknown state "${state}"`,
    );
  }
}

export function validateStateMachineDefinition(
  label: string,
  definition: StateMachineDefinition,
): void {
  if (!Array.isArray(definition.states) || definition.states.length === 0) {
    throw new Error(`State machine ${label}: at least one state is required`);
  }

  const states = new Set<string>();
  for (const state of definition.states) {
    if (typeof state !== 'string' || state.trim().length === 0) {
      throw new Error(`State machine ${label}: state names must be non-empty strings`);
    }
    if (states.has(state)) {
      throw new Error(`State machine ${label}: duplicate state "${state}"`);
    }
    states.add(state);
  }

  if (typeof definition.initial === 'string' && !states.has(definition.initial)) {
    throw new Error(
      `State machine ${label}: initial state "${definition.initial}" does not exist`,
    );
  }

  if (typeof definition.initial !== 'string' && typeof definition.initial !== 'function') {
    throw new Error(
      `State machine ${label}: initial must be a state name or a supplier function`,
    );
  }

  for (const [eventName, input] of Object.entries(definition.events ?? {})) {
    const transitions: EventTransition[] = toArray(input);
    if (transitions.length === 0) {
      throw new Error(`State machine ${label}: event "${eventName}" has no transitions`);
    }

    for (const transition of transitions) {
      for (const from of toArray(transition.from)) {
        if (from !== ANY_STATE) {
          assertKnownState(label, states, from, eventName);
        }
      }
      assertKnownState(label, states, transition.to, eventName);
    }
  }
}
