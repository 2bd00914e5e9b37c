// Storage defaults (user can override via WorldOptions.initial_capacity)
export const DEFAULT_STORAGE_CAPACITY = 64;
export const DEFAULT_ENTITY_CAPACITY = 64;
export const GROWTH_FACTOR = 2;

// Sparse slot marker for "no dense row"
export const ABSENT = -1;

// Entity generation
export const INITIAL_GENERATION = 0;

// Storage event log is opt-in
export const DEFAULT_TRACK_EVENTS = false;

// Name of the optional wrapper recognised by the field classifier
export const OPTION_TYPE_NAME = "Option";
