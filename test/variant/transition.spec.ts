import { describe, it, expect } from "vitest";
import {
  defineCycle,
  defineTable,
  isSimpleCycle,
  stepTable,
  stepTableN,
  validateTable,
  type TransitionTable,
} from "../../src/variant/transition";
import { VariantDefinitionError } from "../../src/variant/errors";

type Light = "Red" | "Green" | "Yellow";

describe("defineCycle", () => {
  const lights = defineCycle<Light>("Light", ["Red", "Green", "Yellow"]);

  it("maps each tag to the next one in order and wraps around", () => {
    expect(stepTable(lights, "Red")).toBe("Green");
    expect(stepTable(lights, "Green")).toBe("Yellow");
    expect(stepTable(lights, "Yellow")).toBe("Red");
  });

  it("returns to the start after one lap", () => {
    for (const tag of lights.tags) {
      expect(stepTableN(lights, tag, lights.tags.length)).toBe(tag);
    }
  });

  it("is a simple cycle", () => {
    expect(isSimpleCycle(lights)).toBe(true);
  });

  it("gives every tag a successor", () => {
    expect(validateTable(lights).valid).toBe(true);
  });

  it("rejects a tag listed twice", () => {
    expect(() => defineCycle("Twice", ["A", "B", "A"])).toThrow(VariantDefinitionError);
    expect(() => defineCycle("Twice", ["A", "B", "A"])).toThrow("Tag listed twice in cycle: A");
  });

  it("treats a single tag as a cycle onto itself", () => {
    const solo = defineCycle("Solo", ["Only"]);
    expect(stepTable(solo, "Only")).toBe("Only");
    expect(isSimpleCycle(solo)).toBe(true);
  });
});

describe("defineTable", () => {
  it("follows the successor map", () => {
    const door = defineTable("Door", { Open: "Closed", Closed: "Locked", Locked: "Closed" });
    expect(door.tags).toEqual(["Open", "Closed", "Locked"]);
    expect(stepTableN(door, "Open", 3)).toBe("Closed");
  });

  it("knows a table with a dead-end loop is not a simple cycle", () => {
    const door = defineTable("Door", { Open: "Closed", Closed: "Locked", Locked: "Closed" });
    expect(isSimpleCycle(door)).toBe(false);
  });

  it("knows two separate loops are not a simple cycle", () => {
    const pairs = defineTable("Pairs", { A: "B", B: "A", C: "D", D: "C" });
    expect(isSimpleCycle(pairs)).toBe(false);
  });
});

describe("validateTable", () => {
  it("reports successors outside the tag set", () => {
    const broken: TransitionTable<string> = {
      name: "Broken",
      tags: ["A", "B"],
      next: (tag) => (tag === "A" ? "B" : "Z"),
    };
    const result = validateTable(broken);
    expect(result.valid).toBe(false);
    expect(result.errors.map(e => e.message)).toEqual(["Tag without successor: B"]);
  });
});

describe("stepTableN", () => {
  const lights = defineCycle<Light>("Light", ["Red", "Green", "Yellow"]);

  it("does nothing for zero steps", () => {
    expect(stepTableN(lights, "Green", 0)).toBe("Green");
  });

  it("rejects negative and fractional step counts", () => {
    expect(() => stepTableN(lights, "Red", -1)).toThrow(RangeError);
    expect(() => stepTableN(lights, "Red", 1.5)).toThrow(RangeError);
  });
});
