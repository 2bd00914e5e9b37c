export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

//=========================================================
// World
//=========================================================

export enum ECS_ERROR {
  EID_MAX_INDEX_OVERFLOW = "EID_MAX_INDEX_OVERFLOW",
  EID_MAX_GEN_OVERFLOW = "EID_MAX_GEN_OVERFLOW",
  COMPONENT_NOT_REGISTERED = "COMPONENT_NOT_REGISTERED",
  COMPONENT_ALREADY_REGISTERED = "COMPONENT_ALREADY_REGISTERED",
  ENTITY_NOT_ALIVE = "ENTITY_NOT_ALIVE",
  ENTITY_CANT_DESTROY_DEAD = "ENTITY_CANT_DESTROY_DEAD",
  STORAGE_BORROW_CONFLICT = "STORAGE_BORROW_CONFLICT",
  BORROW_ALREADY_RELEASED = "BORROW_ALREADY_RELEASED",
  ENTITY_BUILDER_FINISHED = "ENTITY_BUILDER_FINISHED",
}

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}

//=========================================================
// Component groups
//=========================================================

export enum GROUP_ERROR {
  UNSUPPORTED_SHAPE = "UNSUPPORTED_SHAPE",
  EMPTY_GROUP = "EMPTY_GROUP",
  DUPLICATE_FIELD = "DUPLICATE_FIELD",
  INVALID_FIELD_TYPE = "INVALID_FIELD_TYPE",
  INVALID_RECORD = "INVALID_RECORD",
  MISSING_REQUIRED_COMPONENT = "MISSING_REQUIRED_COMPONENT",
}

/**
 * Schema-definition failures and broken runtime invariants.
 * Never operational: these point at a mistake in the calling code.
 */
export class GroupError extends AppError {
  constructor(
    public readonly category: GROUP_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, false, context);
  }
}

export function is_group_error(error: unknown): error is GroupError {
  return error instanceof GroupError;
}

//=========================================================
// Storage
//=========================================================

export enum STORAGE_ERROR {
  ENTITY_NOT_ALIVE = "ENTITY_NOT_ALIVE",
}

export class StorageError extends AppError {
  constructor(
    public readonly category: STORAGE_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

/** A required or present optional field could not be written during update. */
export class UpdateError extends AppError {
  constructor(
    public readonly field: string,
    public readonly component: string,
    public readonly storage_error: StorageError,
  ) {
    super(
      `failed to update field "${field}" (${component}): ${storage_error.message}`,
      true,
      { field, component, ...storage_error.context },
    );
  }
}

//=========================================================
// Lookup
//=========================================================

export enum LOOKUP_ERROR {
  NO_MATCH = "NO_MATCH",
  AMBIGUOUS = "AMBIGUOUS",
}

export class LookupError extends AppError {
  constructor(
    public readonly category: LOOKUP_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}
