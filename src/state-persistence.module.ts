import { DynamicModule, Module, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { StatePersistenceService } from './services/state-persistence.service';
import { StateEntityRegistry } from './services/state-entity-registry.service';
import type {
  ResolvedStatePersistenceOptions,
  StatePersistenceModuleAsyncOptions,
  StatePersistenceModuleOptions,
} from './interfaces/state-persistence-module-options.interface';
import {
  STATE_PERSISTENCE_MODULE_OPTIONS,
  STATE_PERSISTENCE_OPTIONS,
  STATE_STORE,
  STATE_ENGINE,
  DEFAULT_STATE_FIELD,
  DEFAULT_FAULT_POLICY,
} from './state-persistence.constants';
import { JavascriptStateMachineEngine } from './engines/javascript-state-machine.engine';

function resolveOptions(
  options: StatePersistenceModuleOptions,
): ResolvedStatePersistenceOptions {
  return {
    defaultStateField: options.defaultStateField ?? DEFAULT_STATE_FIELD,
    faultPolicy: options.faultPolicy ?? DEFAULT_FAULT_POLICY,
    emitEvents: options.emitEvents ?? true,
  };
}

@Module({})
export class StatePersistenceModule {
  static forRoot(options: StatePersistenceModuleOptions): DynamicModule {
    return StatePersistenceModule.create([], {
      provide: STATE_PERSISTENCE_MODULE_OPTIONS,
      useValue: options,
    });
  }

  static forRootAsync(options: StatePersistenceModuleAsyncOptions): DynamicModule {
    return StatePersistenceModule.create(options.imports ?? [], {
      provide: STATE_PERSISTENCE_MODULE_OPTIONS,
      useFactory: options.useFactory,
      inject: options.inject ?? [],
    });
  }

  private static create(
    imports: NonNullable<StatePersistenceModuleAsyncOptions['imports']>,
    optionsProvider: Provider,
  ): DynamicModule {
    return {
      module: StatePersistenceModule,
      imports: [DiscoveryModule, EventEmitterModule.forRoot(), ...imports],
      providers: [
        optionsProvider,
        {
          provide: STATE_PERSISTENCE_OPTIONS,
          useFactory: resolveOptions,
          inject: [STATE_PERSISTENCE_MODULE_OPTIONS],
        },
        {
          provide: STATE_STORE,
          useFactory: (options: StatePersistenceModuleOptions) => options.store,
          inject: [STATE_PERSISTENCE_MODULE_OPTIONS],
        },
        {
          provide: STATE_ENGINE,
          useFactory: (options: StatePersistenceModuleOptions) =>
            options.engine ?? new JavascriptStateMachineEngine(),
          inject: [STATE_PERSISTENCE_MODULE_OPTIONS],
        },
        StateEntityRegistry,
        StatePersistenceService,
      ],
      exports: [
        StatePersistenceService,
        StateEntityRegistry,
        STATE_STORE,
        STATE_ENGINE,
      ],
      global: true,
    };
  }
}
