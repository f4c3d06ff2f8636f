import { DiscoveryService, Reflector } from '@nestjs/core';
import { StateEntityRegistry } from '../src/services/state-entity-registry.service';
import type { IStateStore } from '../src/interfaces/state-store.interface';

export function createMockRegistry(): StateEntityRegistry {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  return new StateEntityRegistry(mockDiscovery, mockReflector);
}

export function createMockStore(persistResult = true): jest.Mocked<IStateStore> {
  return {
    persist: jest.fn().mockResolvedValue(persistResult),
    findOne: jest.fn().mockResolvedValue(null),
    findByState: jest.fn().mockResolvedValue([]),
  };
}
