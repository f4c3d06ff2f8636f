import { SetMetadata } from '@nestjs/common';
import { STATE_ENTITY_METADATA } from '../state-persistence.constants';
import { deriveCollectionName } from '../utils/derive-collection-name';
import type { DocumentValidator } from '../documents/state-document';
import type { StateCoordinatorStrategies } from '../interfaces/state-coordinator.interface';
import type { StateMachineDefinition } from '../interfaces/state-machine-definition.interface';

export interface StateEntityOptions {
  /** Collection name. If omitted, derived from class name. */
  collection?: string;
  /** Attribute holding the state. If omitted, the module default applies. */
  stateField?: string;
  definition: StateMachineDefinition;
  validators?: DocumentValidator[];
  /** Replaces individual coordinator operations for this entity only. */
  strategies?: Partial<StateCoordinatorStrategies>;
}

export interface StateEntityMetadata {
  collection: string;
  stateField?: string;
  definition: StateMachineDefinition;
  validators: DocumentValidator[];
  strategies: Partial<StateCoordinatorStrategies>;
}

export function StateEntity(options: StateEntityOptions): ClassDecorator {
  return (target: Function) => {
    const metadata: StateEntityMetadata = {
      collection: options.collection ?? deriveCollectionName(target.name),
      stateField: options.stateField,
      definition: options.definition,
      validators: options.validators ?? [],
      strategies: options.strategies ?? {},
    };
    SetMetadata(STATE_ENTITY_METADATA, metadata)(target);
  };
}
