import type {
  InitialStateSupplier,
  StateMachineDefinition,
} from '../interfaces/state-machine-definition.interface';

export function toInitialStateSupplier(
  definition: StateMachineDefinition,
): InitialStateSupplier {
  const { initial } = definition;
  return typeof initial === 'string' ? () => initial : initial;
}
