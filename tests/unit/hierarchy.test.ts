import { describe, it, expect } from "vitest";
import { getHierarchyData } from "../../src/resolver/hierarchy.js";
import { createRegistry } from "../fixtures/schema.js";

describe("Hierarchy data", () => {
  const registry = createRegistry();

  it("lists the category and its ancestors as nodes", () => {
    const data = getHierarchyData(registry, "Novel");
    expect(data.rootCategory).toBe("Category:Novel");
    expect(data.nodes).toEqual({
      "Category:Novel": { title: "Category:Novel", parents: ["Category:Book"] },
      "Category:Book": { title: "Category:Book", parents: [] },
    });
  });

  it("attributes properties to the nearest declaring category", () => {
    expect(getHierarchyData(registry, "Novel").inheritedProperties).toEqual([
      { propertyTitle: "Property:Has author", sourceCategory: "Category:Novel", required: true },
      { propertyTitle: "Property:Has genre", sourceCategory: "Category:Novel", required: true },
      { propertyTitle: "Property:Has series", sourceCategory: "Category:Novel", required: false },
      { propertyTitle: "Property:Has title", sourceCategory: "Category:Book", required: true },
      { propertyTitle: "Property:Has ISBN", sourceCategory: "Category:Book", required: false },
    ]);
  });

  it("reports the promoted flag for a property a child re-declares", () => {
    const email = getHierarchyData(registry, "Employee").inheritedProperties.find(
      (p) => p.propertyTitle === "Property:Has email"
    );
    expect(email).toEqual({
      propertyTitle: "Property:Has email",
      sourceCategory: "Category:Employee",
      required: true,
    });
  });

  it("returns an empty structure for an unknown category", () => {
    expect(getHierarchyData(registry, "Ghost")).toEqual({
      rootCategory: "Category:Ghost",
      nodes: {},
      inheritedProperties: [],
    });
  });
});
