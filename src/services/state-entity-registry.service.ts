import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { EntityNotRegisteredError } from '../errors/entity-not-registered.error';
import { STATE_ENTITY_METADATA } from '../state-persistence.constants';
import type { StateEntityMetadata } from '../decorators/state-entity.decorator';
import { assertCollectionName } from '../utils/assert-collection-name';
import { validateStateMachineDefinition } from '../utils/validate-state-machine-definition';

export interface RegisteredStateEntity extends StateEntityMetadata {
  targetClass: Function;
}

@Injectable()
export class StateEntityRegistry implements OnModuleInit {
  private readonly logger = new Logger(StateEntityRegistry.name);
  private readonly registrations = new Map<string, RegisteredStateEntity>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
  ) {}

  onModuleInit(): void {
    const providers = this.discoveryService.getProviders();
    for (const wrapper of providers) {
      if (!wrapper.metatype) continue;

      const metadata = this.reflector.get<StateEntityMetadata | undefined>(
        STATE_ENTITY_METADATA,
        wrapper.metatype,
      );

      if (metadata) {
        this.register(metadata, wrapper.metatype);
        this.logger.log(
          `Registered state entity: ${wrapper.metatype.name} -> ${metadata.collection}`,
        );
      }
    }
  }

  register(metadata: StateEntityMetadata, targetClass: Function): void {
    const existing = this.registrations.get(metadata.collection);
    if (existing) {
      throw new DuplicateRegistrationError(
        metadata.collection,
        existing.targetClass.name,
        targetClass.name,
      );
    }
    assertCollectionName(metadata.collection);
    validateStateMachineDefinition(metadata.collection, metadata.definition);
    this.registrations.set(metadata.collection, { ...metadata, targetClass });
  }

  get(collection: string): RegisteredStateEntity | undefined {
    return this.registrations.get(collection);
  }

  getAll(): RegisteredStateEntity[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(collection: string): RegisteredStateEntity {
    const registration = this.registrations.get(collection);
    if (!registration) {
      throw new EntityNotRegisteredError(collection);
    }
    return registration;
  }
}
