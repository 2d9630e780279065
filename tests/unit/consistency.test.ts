import { describe, it, expect } from "vitest";
import { checkSchema } from "../../src/schema/consistency.js";
import { validateSchemaDocument } from "../../src/schema/loader.js";
import { DATATYPES } from "../../src/schema/types.js";
import { brokenDocument, testDocument } from "../fixtures/schema.js";

describe("Schema consistency", () => {
  it("accepts a consistent document", () => {
    expect(checkSchema(testDocument)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("reports broken inheritance and dangling references", () => {
    const report = checkSchema(brokenDocument);
    expect(report.valid).toBe(false);
    expect(report.errors).toEqual([
      "Loop A: Cyclic inheritance: Loop A -> Loop B -> Loop A",
      "Loop B: Cyclic inheritance: Loop B -> Loop A -> Loop B",
      'Orphan: Unknown category "Missing" (parent of "Orphan")',
      'Category "Widget": unknown property "Has mystery"',
      'Category "Gadget": unknown subobject "Ghost group"',
    ]);
    expect(report.warnings).toEqual([
      `Property "Has color": unknown datatype "Colour" (expected one of ${DATATYPES.join(", ")}); Page is used`,
    ]);
  });

  it("warns about repeated declarations and unknown range categories", () => {
    const report = checkSchema(
      validateSchemaDocument({
        properties: { "Has owner": { datatype: "Page", rangeCategory: "Nobody" } },
        subobjects: { Pair: { properties: ["Has owner", "Has owner"] } },
        categories: { Thing: { properties: ["Has owner", "Has owner"] } },
      })
    );
    expect(report.valid).toBe(true);
    expect(report.warnings).toEqual([
      'Property "Has owner": range category "Nobody" is not defined',
      'Subobject "Pair": property "Has owner" declared more than once',
      'Category "Thing": property "Has owner" declared more than once',
    ]);
  });
});
