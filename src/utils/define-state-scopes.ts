import { Logger } from '@nestjs/common';
import type { StoredDocument } from '../interfaces/state-store.interface';

export type StateScope = () => Promise<StoredDocument[]>;

export type StateScopeQuery = (stateValue: string) => Promise<StoredDocument[]>;

const logger = new Logger('StateScopes');

/**
 * Collects every property name reachable from `target`, own and inherited.
 */
export function collectMemberNames(target: object): Set<string> {
  const names = new Set<string>();
  let current: object | null = target;
  while (current) {
    for (const name of Object.getOwnPropertyNames(current)) {
      names.add(name);
    }
    current = Object.getPrototypeOf(current);
  }
  return names;
}

/**
 * Builds one finder per declared state. A state whose name is already taken
 * by an existing member is skipped, not shadowed.
 */
export function defineStateScopes(
  states: readonly string[],
  query: StateScopeQuery,
  reserved: ReadonlySet<string> = new Set<string>(),
): Record<string, StateScope> {
  const scopes: Record<string, StateScope> = {};

  for (const state of states) {
    if (reserved.has(state) || Object.prototype.hasOwnProperty.call(scopes, state)) {
      logger.warn(`Skipping scope "${state}": name already defined`);
      continue;
    }
    scopes[state] = () => query(state);
  }

  return scopes;
}
