import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { FaultPolicy } from './state-coordinator.interface';
import type { IStateMachineEngine } from './state-engine.interface';
import type { IStateStore } from './state-store.interface';

export interface StatePersistenceModuleOptions {
  /** Store adapter instance implementing IStateStore */
  store: IStateStore;
  /** Optional transition resolver override */
  engine?: IStateMachineEngine;

  /** Field holding the state when an entity does not name one. Default: 'state' */
  defaultStateField?: string;

  /** In-memory handling of store faults during a durable write. Default: 'propagate' */
  faultPolicy?: FaultPolicy;

  /** Publish state events through EventEmitter2. Default: true */
  emitEvents?: boolean;
}

export interface ResolvedStatePersistenceOptions {
  defaultStateField: string;
  faultPolicy: FaultPolicy;
  emitEvents: boolean;
}

export interface StatePersistenceModuleAsyncOptions
  extends Pick<ModuleMetadata, 'imports'>,
    Pick<FactoryProvider<StatePersistenceModuleOptions>, 'useFactory' | 'inject'> {}
