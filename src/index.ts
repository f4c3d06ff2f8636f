// Module
export { StatePersistenceModule } from './state-persistence.module';

// Coordinator
export { StateCoordinator } from './coordinator/state-coordinator';
export {
  DEFAULT_STRATEGIES,
  readState,
  ensureInitialState,
  writeState,
  writeStateWithoutPersistence,
} from './coordinator/default-strategies';

// Services
export { StatePersistenceService } from './services/state-persistence.service';
export { StateEntityRegistry } from './services/state-entity-registry.service';
export type { RegisteredStateEntity } from './services/state-entity-registry.service';

// Decorators
export { StateEntity } from './decorators/state-entity.decorator';
export type {
  StateEntityOptions,
  StateEntityMetadata,
} from './decorators/state-entity.decorator';

// Documents
export { StateDocument } from './documents/state-document';
export type {
  DocumentValidator,
  StateDocumentInit,
} from './documents/state-document';

// Engines
export { JavascriptStateMachineEngine } from './engines/javascript-state-machine.engine';

// Interfaces
export type {
  IStateRecord,
  IPersistableRecord,
} from './interfaces/state-record.interface';
export type {
  IStateStore,
  PersistOptions,
  StoredDocument,
} from './interfaces/state-store.interface';
export type {
  CommittedOutcome,
  RolledBackOutcome,
  WriteOutcome,
  FaultPolicy,
  StateFieldContext,
  ReadStateStrategy,
  EnsureInitialStateStrategy,
  WriteStateStrategy,
  WriteStateWithoutPersistenceStrategy,
  StateCoordinatorStrategies,
  StateCoordinatorOptions,
  StateWriteListener,
} from './interfaces/state-coordinator.interface';
export type {
  EventTransition,
  InitialStateSupplier,
  StateMachineDefinition,
  TransitionCallback,
  TransitionGuard,
} from './interfaces/state-machine-definition.interface';
export type {
  IStateMachineEngine,
  ResolveTargetInput,
  ResolvedTransition,
} from './interfaces/state-engine.interface';
export type {
  TransitionResult,
  TransitionStatus,
} from './interfaces/transition-result.interface';
export type {
  StatePersistenceModuleOptions,
  StatePersistenceModuleAsyncOptions,
} from './interfaces/state-persistence-module-options.interface';

// Adapters
export { PgStateStore } from './adapters/pg-state-store.adapter';
export {
  DrizzleStateStore,
  DrizzleSqlExecutor,
} from './adapters/drizzle-state-store.adapter';
export {
  PrismaStateStore,
  PrismaRawExecutor,
} from './adapters/prisma-state-store.adapter';
export {
  InMemoryStateStore,
  InMemoryStateStoreOptions,
} from './adapters/in-memory-state-store.adapter';

// Errors
export { PersistenceRejectedError } from './errors/persistence-rejected.error';
export { EntityNotRegisteredError } from './errors/entity-not-registered.error';
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';
export { InvalidCollectionNameError } from './errors/invalid-collection-name.error';

// Events
export { StateEventType } from './events/state-event-type.enum';
export type {
  StateInitializedEvent,
  StateCommittedEvent,
  StateRolledBackEvent,
  StateDeferredEvent,
} from './events/state-events';

// Utilities
export { isBlank } from './utils/is-blank';
export { defineStateScopes } from './utils/define-state-scopes';
export type { StateScope, StateScopeQuery } from './utils/define-state-scopes';
export { validateStateMachineDefinition } from './utils/validate-state-machine-definition';

// CLI
export { generateMigration } from './cli/generate-migration';

// Constants
export {
  STATE_PERSISTENCE_OPTIONS,
  STATE_STORE,
  STATE_ENGINE,
  STATE_ENTITY_METADATA,
  DEFAULT_STATE_FIELD,
  DEFAULT_FAULT_POLICY,
} from './state-persistence.constants';
