import StateMachine from 'javascript-state-machine';
import type {
  EventTransition,
  StateMachineDefinition,
} from '../interfaces/state-machine-definition.interface';
import type {
  IStateMachineEngine,
  ResolveTargetInput,
  ResolvedTransition,
} from '../interfaces/state-engine.interface';
import { isBlank } from '../utils/is-blank';
import { toArray } from '../utils/validate-state-machine-definition';

interface CompiledTransition {
  name: string;
  index: number;
  to: string;
  guard?: EventTransition['guard'];
}

interface CompiledEvents {
  transitions: Array<{ name: string; from: string | string[]; to: string }>;
  byEvent: Map<string, CompiledTransition[]>;
}

/**
 * Resolves event targets with `javascript-state-machine`. Each event
 * transition is compiled to a uniquely named machine transition so that
 * multi-source events and guards can be checked one rule at a time.
 */
export class JavascriptStateMachineEngine implements IStateMachineEngine {
  private readonly compiled = new WeakMap<StateMachineDefinition, CompiledEvents>();

  resolveTarget(input: ResolveTargetInput): ResolvedTransition | null {
    const { transitions, byEvent } = this.compile(input.definition);
    const candidates = byEvent.get(input.event);
    // The machine cannot be initialised in a blank state.
    if (!candidates || isBlank(input.currentState)) return null;

    const fsm = new StateMachine({
      init: input.currentState,
      transitions,
    });

    for (const candidate of candidates) {
      if (!fsm.can(candidate.name)) continue;
      if (candidate.guard && !candidate.guard(input.record)) continue;

      return {
        fromState: input.currentState,
        toState: candidate.to,
        index: candidate.index,
      };
    }

    return null;
  }

  private compile(definition: StateMachineDefinition): CompiledEvents {
    const cached = this.compiled.get(definition);
    if (cached) return cached;

    let counter = 0;
    const compiled: CompiledEvents = { transitions: [], byEvent: new Map() };

    for (const [eventName, input] of Object.entries(definition.events ?? {})) {
      const rules = toArray(input).map((rule, index) => {
        const name = `tr${counter++}`;
        compiled.transitions.push({ name, from: rule.from, to: rule.to });
        return { name, index, to: rule.to, guard: rule.guard };
      });
      compiled.byEvent.set(eventName, rules);
    }

    this.compiled.set(definition, compiled);
    return compiled;
  }
}
