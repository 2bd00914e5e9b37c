import { describe, expect, it } from "vitest";
import {
  AppError,
  ECSError,
  ECS_ERROR,
  GroupError,
  GROUP_ERROR,
  is_ecs_error,
  is_group_error,
  LookupError,
  LOOKUP_ERROR,
  StorageError,
  STORAGE_ERROR,
  UpdateError,
} from "../error";

describe("ECSError", () => {
  //=========================================================
  // Construction & properties
  //=========================================================

  it("stores the category", () => {
    const err = new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE);
    expect(err.category).toBe(ECS_ERROR.ENTITY_NOT_ALIVE);
  });

  it("uses category as default message when message is omitted", () => {
    const err = new ECSError(ECS_ERROR.COMPONENT_NOT_REGISTERED);
    expect(err.message).toBe(ECS_ERROR.COMPONENT_NOT_REGISTERED);
  });

  it("uses provided message when given", () => {
    const err = new ECSError(ECS_ERROR.EID_MAX_INDEX_OVERFLOW, "index exceeded limit");
    expect(err.message).toBe("index exceeded limit");
  });

  it("is always operational", () => {
    const err = new ECSError(ECS_ERROR.STORAGE_BORROW_CONFLICT);
    expect(err.is_operational).toBe(true);
  });

  it("context is undefined when not provided", () => {
    const err = new ECSError(ECS_ERROR.BORROW_ALREADY_RELEASED);
    expect(err.context).toBeUndefined();
  });

  it("stores provided context", () => {
    const err = new ECSError(ECS_ERROR.STORAGE_BORROW_CONFLICT, "conflict", {
      component: "Position",
      access: "write",
    });
    expect(err.context).toEqual({ component: "Position", access: "write" });
  });

  it("sets name to ECSError", () => {
    const err = new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE);
    expect(err.name).toBe("ECSError");
  });

  //=========================================================
  // Inheritance
  //=========================================================

  it("is an instance of AppError and Error", () => {
    const err = new ECSError(ECS_ERROR.COMPONENT_ALREADY_REGISTERED);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toBeInstanceOf(Error);
  });

  it("all ECS_ERROR enum members are distinct strings", () => {
    const values = Object.values(ECS_ERROR);
    expect(new Set(values).size).toBe(values.length);
  });

  //=========================================================
  // is_ecs_error guard
  //=========================================================

  it("is_ecs_error returns true for ECSError instances", () => {
    expect(is_ecs_error(new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE))).toBe(true);
  });

  it("is_ecs_error returns false for other values", () => {
    expect(is_ecs_error(new Error("plain"))).toBe(false);
    expect(is_ecs_error(new GroupError(GROUP_ERROR.EMPTY_GROUP))).toBe(false);
    expect(is_ecs_error(null)).toBe(false);
    expect(is_ecs_error({})).toBe(false);
  });
});

describe("GroupError", () => {
  it("is never operational", () => {
    const err = new GroupError(GROUP_ERROR.MISSING_REQUIRED_COMPONENT);
    expect(err.is_operational).toBe(false);
    expect(err.message).toBe(GROUP_ERROR.MISSING_REQUIRED_COMPONENT);
    expect(err.name).toBe("GroupError");
  });

  it("is_group_error tells group errors apart", () => {
    expect(is_group_error(new GroupError(GROUP_ERROR.DUPLICATE_FIELD))).toBe(true);
    expect(is_group_error(new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE))).toBe(false);
  });
});

describe("UpdateError", () => {
  const storage_error = new StorageError(
    STORAGE_ERROR.ENTITY_NOT_ALIVE,
    "entity 3@1 is not alive",
    { entity: 3 },
  );

  it("names the field and component in its message", () => {
    const err = new UpdateError("health", "Health", storage_error);
    expect(err.message).toBe('failed to update field "health" (Health): entity 3@1 is not alive');
  });

  it("keeps the storage error and merges its context", () => {
    const err = new UpdateError("health", "Health", storage_error);
    expect(err.storage_error).toBe(storage_error);
    expect(err.context).toEqual({ field: "health", component: "Health", entity: 3 });
    expect(err.is_operational).toBe(true);
  });
});

describe("LookupError", () => {
  it("is operational and defaults its message to the category", () => {
    const err = new LookupError(LOOKUP_ERROR.NO_MATCH);
    expect(err.is_operational).toBe(true);
    expect(err.message).toBe("NO_MATCH");
    expect(err.name).toBe("LookupError");
  });
});
