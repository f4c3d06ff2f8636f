import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { StateEntityRegistry } from './state-entity-registry.service';
import { StateCoordinator } from '../coordinator/state-coordinator';
import { StateDocument, type StateDocumentInit } from '../documents/state-document';
import { JavascriptStateMachineEngine } from '../engines/javascript-state-machine.engine';
import { StateEventType } from '../events/state-event-type.enum';
import type {
  StateCommittedEvent,
  StateDeferredEvent,
  StateInitializedEvent,
  StateRolledBackEvent,
} from '../events/state-events';
import type { StateWriteListener } from '../interfaces/state-coordinator.interface';
import type { IStateMachineEngine } from '../interfaces/state-engine.interface';
import type { ResolvedStatePersistenceOptions } from '../interfaces/state-persistence-module-options.interface';
import type {
  IPersistableRecord,
  IStateRecord,
} from '../interfaces/state-record.interface';
import type { IStateStore } from '../interfaces/state-store.interface';
import type { TransitionResult } from '../interfaces/transition-result.interface';
import {
  STATE_ENGINE,
  STATE_PERSISTENCE_OPTIONS,
  STATE_STORE,
} from '../state-persistence.constants';
import {
  collectMemberNames,
  defineStateScopes,
  type StateScope,
} from '../utils/define-state-scopes';
import { toInitialStateSupplier } from '../utils/initial-state';
import { isBlank } from '../utils/is-blank';
import { toArray } from '../utils/validate-state-machine-definition';

function recordIdOf(record: IStateRecord): string | null {
  const id: unknown = Reflect.get(record, 'id');
  return typeof id === 'string' ? id : null;
}

function rawToState(raw: unknown): string | null {
  return raw === null || raw === undefined ? null : String(raw);
}

@Injectable()
export class StatePersistenceService {
  private readonly logger = new Logger(StatePersistenceService.name);
  private readonly engine: IStateMachineEngine;
  private readonly coordinators = new Map<string, StateCoordinator>();
  private readonly scopeCache = new Map<string, Record<string, StateScope>>();

  constructor(
    private readonly registry: StateEntityRegistry,
    @Inject(STATE_STORE) private readonly store: IStateStore,
    private readonly eventEmitter: EventEmitter2,
    @Inject(STATE_PERSISTENCE_OPTIONS)
    private readonly options: ResolvedStatePersistenceOptions,
    @Optional() @Inject(STATE_ENGINE) engine?: IStateMachineEngine,
  ) {
    this.engine = engine ?? new JavascriptStateMachineEngine();
  }

  coordinatorFor(collection: string): StateCoordinator {
    const cached = this.coordinators.get(collection);
    if (cached) return cached;

    const registration = this.registry.getOrThrow(collection);
    const coordinator = new StateCoordinator({
      stateField: registration.stateField ?? this.options.defaultStateField,
      store: this.store,
      initialState: toInitialStateSupplier(registration.definition),
      faultPolicy: this.options.faultPolicy,
      strategies: registration.strategies,
      listener: this.options.emitEvents
        ? this.createListener(collection)
        : undefined,
    });
    this.coordinators.set(collection, coordinator);
    return coordinator;
  }

  /**
   * New, unsaved document carrying the entity's validation rules.
   */
  build(collection: string, init: Omit<StateDocumentInit, 'validators'> = {}): StateDocument {
    const registration = this.registry.getOrThrow(collection);
    return new StateDocument(collection, {
      ...init,
      validators: registration.validators,
    });
  }

  currentState(collection: string, record: IStateRecord): string | undefined {
    return this.coordinatorFor(collection).readState(record);
  }

  ensureInitialState(collection: string, record: IStateRecord): void {
    this.coordinatorFor(collection).ensureInitialState(record);
  }

  /**
   * One validation attempt: the initial state is filled in first, every time.
   */
  validate(collection: string, record: IPersistableRecord): boolean {
    this.ensureInitialState(collection, record);
    return record.validate();
  }

  async save(collection: string, record: IPersistableRecord): Promise<boolean> {
    this.ensureInitialState(collection, record);
    const saved = await this.store.persist(record, { validate: true });
    if (!saved) {
      this.logger.warn(`Save refused for ${collection}/${record.id}`);
    }
    return saved;
  }

  /**
   * Replaces the document's attributes with the stored copy.
   * Returns false when nothing is stored under its id.
   */
  async reload(collection: string, document: StateDocument): Promise<boolean> {
    const stored = await this.store.findOne(collection, document.id);
    if (!stored) return false;

    document.replaceAttributes(stored.attributes);
    document.markPersisted();
    return true;
  }

  /**
   * Fires `event` and persists the new state immediately. `after` callbacks
   * run only when the store commits.
   */
  async fire(
    collection: string,
    record: IPersistableRecord,
    event: string,
  ): Promise<TransitionResult> {
    const resolved = this.resolve(collection, record, event);
    if (resolved.status === 'not_permitted') return resolved;

    const outcome = await this.coordinatorFor(collection).writeState(
      record,
      resolved.toState,
    );

    if (outcome.status === 'committed') {
      await this.runAfterCallbacks(collection, record, event, resolved.index);
    }

    return {
      status: outcome.status,
      event,
      fromState: resolved.fromState,
      toState: resolved.toState,
      outcome,
    };
  }

  /**
   * Fires `event` without saving; the caller persists later.
   */
  async fireDeferred(
    collection: string,
    record: IStateRecord,
    event: string,
  ): Promise<TransitionResult> {
    const resolved = this.resolve(collection, record, event);
    if (resolved.status === 'not_permitted') return resolved;

    this.coordinatorFor(collection).writeStateWithoutPersistence(
      record,
      resolved.toState,
    );
    await this.runAfterCallbacks(collection, record, event, resolved.index);

    return {
      status: 'deferred',
      event,
      fromState: resolved.fromState,
      toState: resolved.toState,
    };
  }

  /**
   * One finder per declared state, keyed by state name.
   */
  scopes(collection: string): Record<string, StateScope> {
    const cached = this.scopeCache.get(collection);
    if (cached) return cached;

    const registration = this.registry.getOrThrow(collection);
    const stateField = this.coordinatorFor(collection).stateField;
    const scopes = defineStateScopes(
      registration.definition.states,
      (state) => this.store.findByState(collection, stateField, state),
      collectMemberNames(registration.targetClass),
    );
    this.scopeCache.set(collection, scopes);
    return scopes;
  }

  private resolve(
    collection: string,
    record: IStateRecord,
    event: string,
  ):
    | (TransitionResult & { status: 'not_permitted' })
    | { status: 'resolved'; fromState: string; toState: string; index: number } {
    const registration = this.registry.getOrThrow(collection);
    const stored = this.currentState(collection, record);
    const fromState =
      stored === undefined || isBlank(stored)
        ? (toInitialStateSupplier(registration.definition)(record) ?? '')
        : stored;

    if (isBlank(fromState)) {
      this.logger.warn(
        `Event "${event}" ignored on ${collection}/${recordIdOf(record) ?? 'new'}: no current or initial state`,
      );
      return { status: 'not_permitted', event, fromState: '', toState: null };
    }

    const transition = this.engine.resolveTarget({
      definition: registration.definition,
      currentState: fromState,
      event,
      record,
    });

    if (!transition) {
      this.logger.debug(
        `Event "${event}" not permitted from "${fromState}" on ${collection}/${recordIdOf(record) ?? 'new'}`,
      );
      return { status: 'not_permitted', event, fromState, toState: null };
    }

    return {
      status: 'resolved',
      fromState,
      toState: transition.toState,
      index: transition.index,
    };
  }

  private async runAfterCallbacks(
    collection: string,
    record: IStateRecord,
    event: string,
    index: number,
  ): Promise<void> {
    const { definition } = this.registry.getOrThrow(collection);
    const transition = toArray(definition.events?.[event])[index];
    for (const callback of toArray(transition?.after)) {
      await callback(record);
    }
  }

  private createListener(collection: string): StateWriteListener {
    return {
      initialized: (record, state) => {
        this.eventEmitter.emit(StateEventType.INITIALIZED, {
          collection,
          recordId: recordIdOf(record),
          state,
          timestamp: new Date(),
        } satisfies StateInitializedEvent);
      },
      committed: (record, fromValue, state) => {
        this.eventEmitter.emit(StateEventType.COMMITTED, {
          collection,
          recordId: recordIdOf(record),
          fromState: rawToState(fromValue),
          toState: state,
          timestamp: new Date(),
        } satisfies StateCommittedEvent);
      },
      rolledBack: (record, outcome) => {
        this.eventEmitter.emit(StateEventType.ROLLED_BACK, {
          collection,
          recordId: recordIdOf(record),
          restoredState: rawToState(outcome.previousValue),
          attemptedState: outcome.attemptedState,
          timestamp: new Date(),
        } satisfies StateRolledBackEvent);
      },
      deferred: (record, fromValue, state) => {
        this.eventEmitter.emit(StateEventType.DEFERRED, {
          collection,
          recordId: recordIdOf(record),
          fromState: rawToState(fromValue),
          toState: state,
          timestamp: new Date(),
        } satisfies StateDeferredEvent);
      },
    };
  }
}
