export const STATE_PERSISTENCE_OPTIONS = 'STATE_PERSISTENCE_OPTIONS';
export const STATE_STORE = 'STATE_STORE';
export const STATE_ENGINE = 'STATE_ENGINE';
export const STATE_ENTITY_METADATA = 'STATE_ENTITY_METADATA';

export const DEFAULT_STATE_FIELD = 'state';
export const DEFAULT_FAULT_POLICY = 'propagate';
export const COLLECTION_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Raw options as passed to forRoot/forRootAsync. */
export const STATE_PERSISTENCE_MODULE_OPTIONS = 'STATE_PERSISTENCE_MODULE_OPTIONS';
