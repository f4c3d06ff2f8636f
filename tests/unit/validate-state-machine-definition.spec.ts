import type { StateMachineDefinition } from '../../src/interfaces/state-machine-definition.interface';
import {
  toArray,
  validateStateMachineDefinition,
} from '../../src/utils/validate-state-machine-definition';

function definition(
  overrides: Partial<StateMachineDefinition> = {},
): StateMachineDefinition {
  return {
    initial: 'pending',
    states: ['pending', 'opened', 'closed'],
    events: {
      open: { from: 'pending', to: 'opened' },
      close: [{ from: ['pending', 'opened'], to: 'closed' }],
    },
    ...overrides,
  };
}

describe('validateStateMachineDefinition', () => {
  it('should accept a well-formed definition', () => {
    expect(() => validateStateMachineDefinition('tickets', definition())).not.toThrow();
  });

  it('should accept an initial-state supplier and wildcard sources', () => {
    expect(() =>
      validateStateMachineDefinition(
        'tickets',
        definition({
          initial: () => 'pending',
          events: { reset: { from: '*', to: 'pending' } },
        }),
      ),
    ).not.toThrow();
  });

  it('should require at least one state', () => {
    expect(() =>
      validateStateMachineDefinition('tickets', definition({ states: [] })),
    ).toThrow('State machine tickets: at least one state is required');
  });

  it('should reject blank state names', () => {
    expect(() =>
      validateStateMachineDefinition('tickets', definition({ states: ['pending', ' '] })),
    ).toThrow('State machine tickets: state names must be non-empty strings');
  });

  it('should reject duplicate states', () => {
    expect(() =>
      validateStateMachineDefinition(
        'tickets',
        definition({ states: ['pending', 'opened', 'closed', 'opened'] }),
      ),
    ).toThrow('State machine tickets: duplicate state "opened"');
  });

  it('should reject an unknown initial state', () => {
    expect(() =>
      validateStateMachineDefinition('tickets', definition({ initial: 'draft' })),
    ).toThrow('State machine tickets: initial state "draft" does not exist');
  });

  it('should reject unknown source and target states', () => {
    expect(() =>
      validateStateMachineDefinition(
        'tickets',
        definition({ events: { open: { from: 'draft', to: 'opened' } } }),
      ),
    ).toThrow('State machine tickets: event "open" references unknown state "draft"');

    expect(() =>
      validateStateMachineDefinition(
        'tickets',
        definition({ events: { open: { from: 'pending', to: 'archived' } } }),
      ),
    ).toThrow('State machine tickets: event "open" references unknown state "archived"');
  });

  it('should reject an event with no transitions', () => {
    expect(() =>
      validateStateMachineDefinition('tickets', definition({ events: { open: [] } })),
    ).toThrow('State machine tickets: event "open" has no transitions');
  });
});

describe('toArray', () => {
  it('should normalise undefined, single values and arrays', () => {
    expect(toArray<string>(undefined)).toEqual([]);
    expect(toArray('a')).toEqual(['a']);
    expect(toArray(['a', 'b'])).toEqual(['a', 'b']);
  });
});
