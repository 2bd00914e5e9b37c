import { describe, expect, it } from "vitest";
import { canonical_type_name, ComponentRegistry } from "../component_registry";
import { as_component_id } from "../component";
import { ECS_ERROR, ECSError } from "utils/error";

describe("ComponentRegistry", () => {
  //=========================================================
  // Registration
  //=========================================================

  it("register increments count", () => {
    const reg = new ComponentRegistry();
    expect(reg.count).toBe(0);

    reg.register("Position");
    expect(reg.count).toBe(1);

    reg.register("Health");
    expect(reg.count).toBe(2);
  });

  it("register returns sequential IDs", () => {
    const reg = new ComponentRegistry();
    const a = reg.register("A");
    const b = reg.register("B");
    const c = reg.register("C");

    // ComponentDef is a branded number, so we can compare directly
    expect(a + 1).toBe(b);
    expect(b + 1).toBe(c);
  });

  it("register rejects a second registration of the same type", () => {
    const reg = new ComponentRegistry();
    reg.register("Vec<u8>");

    try {
      reg.register("Vec< u8 >");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ECSError);
      if (!(error instanceof ECSError)) return;
      expect(error.category).toBe(ECS_ERROR.COMPONENT_ALREADY_REGISTERED);
      expect(error.message).toBe("component Vec<u8> is already registered");
    }
  });

  //=========================================================
  // Lookup
  //=========================================================

  it("lookup resolves any spelling of the registered type", () => {
    const reg = new ComponentRegistry();
    const def = reg.register("HashMap<String, u32>");

    const info = reg.lookup("HashMap< String,u32 >");
    expect(info.def).toBe(def);
    expect(info.name).toBe("HashMap<String, u32>");
    expect(reg.has("HashMap<String,u32>")).toBe(true);
  });

  it("lookup throws for an unregistered type", () => {
    const reg = new ComponentRegistry();
    expect(() => reg.lookup("Missing")).toThrow("component Missing is not registered");
    expect(reg.has("Missing")).toBe(false);
  });

  it("get throws for an unregistered ID", () => {
    const reg = new ComponentRegistry();
    expect(() => reg.get(as_component_id(999))).toThrow("component #999 is not registered");
  });

  //=========================================================
  // Clone functions
  //=========================================================

  it("defaults to a deep structured clone", () => {
    const reg = new ComponentRegistry();
    const def = reg.register<{ pos: { x: number } }>("Body");
    const info = reg.get(def);

    const original = { pos: { x: 1 } };
    const copy = info.clone(original);

    expect(copy).toEqual(original);
    expect(copy).not.toBe(original);
  });

  it("uses the clone function it was given", () => {
    const reg = new ComponentRegistry();
    const def = reg.register<number[]>("Stack", { clone: (v) => [...v, 0] });

    expect(reg.get(def).clone([1])).toEqual([1, 0]);
  });
});

describe("canonical_type_name", () => {
  it("normalizes spacing", () => {
    expect(canonical_type_name("Option< Vec<u8> >")).toBe("Option<Vec<u8>>");
    expect(canonical_type_name("&'a  str")).toBe("&'a str");
  });
});
