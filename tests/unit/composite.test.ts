import { describe, it, expect } from "vitest";
import { InheritanceResolver } from "../../src/resolver/inheritance.js";
import { MultiCategoryResolver } from "../../src/resolver/multi-category.js";
import { compositeName, generateUnits, unitIdentityKey } from "../../src/generator/composite.js";
import type { PropertyDefinition } from "../../src/schema/types.js";
import { createRegistry } from "../fixtures/schema.js";

const composer = new MultiCategoryResolver(new InheritanceResolver(createRegistry()));

function fieldNames(names: string[]) {
  return generateUnits(composer.resolve(names)).map((u) => ({
    category: u.category,
    properties: u.properties.map((p) => p.name),
    subobjects: u.subobjects.map((s) => s.name),
  }));
}

describe("Composite generator", () => {
  it("creates one unit per category in composed order", () => {
    expect(fieldNames(["Person", "Employee"])).toEqual([
      {
        category: "Person",
        properties: ["Has name", "Has email", "Has phone"],
        subobjects: ["Address"],
      },
      {
        category: "Employee",
        properties: ["Has employee ID", "Has department", "Has skill"],
        subobjects: [],
      },
    ]);
  });

  it("moves shared fields into the first unit", () => {
    expect(fieldNames(["Book", "Person", "Employee"])).toEqual([
      {
        category: "Book",
        properties: ["Has title", "Has author", "Has ISBN", "Has name", "Has email", "Has phone"],
        subobjects: ["Address"],
      },
      { category: "Person", properties: [], subobjects: [] },
      {
        category: "Employee",
        properties: ["Has employee ID", "Has department", "Has skill"],
        subobjects: [],
      },
    ]);
  });

  it("renders each name in exactly one unit", () => {
    const units = generateUnits(composer.resolve(["Volunteer", "Book", "Novel", "Employee"]));
    const names = units.flatMap((u) => u.properties.map((p) => p.name));
    expect(new Set(names).size).toBe(names.length);
  });

  it("gives every unit a distinct identity key", () => {
    const units = generateUnits(composer.resolve(["Book", "Person", "Employee"]));
    for (const unit of units) {
      expect(unit.identityKey).toMatch(new RegExp(`^${unit.category}#[0-9a-f]{12}$`));
    }
    expect(new Set(units.map((u) => u.identityKey)).size).toBe(3);
  });

  it("keys units by category and field set", () => {
    const title: PropertyDefinition = {
      name: "Has title",
      datatype: "Text",
      required: true,
      multiple: false,
    };
    const empty = unitIdentityKey("Book", [], []);
    expect(unitIdentityKey("Book", [], [])).toBe(empty);
    expect(unitIdentityKey("Book", [title], [])).not.toBe(empty);
    expect(unitIdentityKey("Novel", [], []).slice(6)).not.toBe(empty.slice(5));
  });

  describe("compositeName", () => {
    it("does not depend on selection order", () => {
      expect(compositeName(["Person", "Employee"])).toBe("Employee+Person");
      expect(compositeName(["Employee", "Person"])).toBe("Employee+Person");
    });

    it("sorts by code unit and drops duplicates", () => {
      expect(compositeName(["book", "Novel", "Book", "Novel"])).toBe("Book+Novel+book");
    });

    it("names a single category after itself", () => {
      expect(compositeName(["Book"])).toBe("Book");
    });
  });
});
