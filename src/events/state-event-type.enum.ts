export enum StateEventType {
  INITIALIZED = 'state.initialized',
  COMMITTED = 'state.committed',
  ROLLED_BACK = 'state.rolled_back',
  DEFERRED = 'state.deferred',
}
