export interface StateInitializedEvent {
  collection: string;
  recordId: string | null;
  state: string;
  timestamp: Date;
}

export interface StateCommittedEvent {
  collection: string;
  recordId: string | null;
  fromState: string | null;
  toState: string;
  timestamp: Date;
}

export interface StateRolledBackEvent {
  collection: string;
  recordId: string | null;
  restoredState: string | null;
  attemptedState: string;
  timestamp: Date;
}

export interface StateDeferredEvent {
  collection: string;
  recordId: string | null;
  fromState: string | null;
  toState: string;
  timestamp: Date;
}
