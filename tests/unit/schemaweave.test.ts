import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SchemaWeave, loadConfig, validateConfig } from "../../src/index.js";
import { ConfigError, UnknownCategoryError } from "../../src/schema/errors.js";
import { testDocument } from "../fixtures/schema.js";

describe("SchemaWeave", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  describe("validateConfig", () => {
    it("resolves relative paths against the config directory", () => {
      expect(validateConfig({ schema: "./schema", output: { dir: "wiki" } }, "/project")).toEqual({
        schema: "/project/schema",
        output: { dir: "/project/wiki" },
      });
    });

    it("normalizes an inline schema", () => {
      const config = validateConfig({ schema: { categories: { Book: {} } } });
      expect(config.schema).toEqual({
        schemaVersion: "1.0",
        properties: {},
        subobjects: {},
        categories: { Book: { properties: [], subobjects: [] } },
      });
    });

    it("rejects invalid config", () => {
      expect(() => validateConfig({ output: {} })).toThrow(ConfigError);
      expect(() => validateConfig({ output: {} })).toThrow(/^Invalid config: schema: /);
      expect(() => validateConfig({ schema: "x", extra: true })).toThrow(ConfigError);
    });
  });

  it("reports a missing config file", async () => {
    await expect(loadConfig("/nonexistent/schemaweave.config.js")).rejects.toThrow(
      "Config file not found: /nonexistent/schemaweave.config.js"
    );
  });

  describe("facade", () => {
    const sw = new SchemaWeave(testDocument, { separator: "," });

    it("resolves and composes", () => {
      expect(sw.resolve("Novel").ancestors).toEqual(["Book"]);
      expect(sw.compose(["Person", "Employee"]).categories).toEqual(["Person", "Employee"]);
      expect(() => sw.resolve("Ghost")).toThrow(UnknownCategoryError);
    });

    it("generates with the configured separator", () => {
      const employee = sw
        .generate(["Person", "Employee"])
        .find((a) => a.title === "Template:Unit/Employee+Person/Employee");
      expect(employee?.body).toContain("{{#set:Has skill={{{skill|}}}|+sep=,}}");
    });

    it("checks the loaded document", () => {
      expect(sw.check().valid).toBe(true);
    });

    it("returns hierarchy data", () => {
      expect(Object.keys(sw.hierarchy("Novel").nodes)).toEqual(["Category:Novel", "Category:Book"]);
    });

    it("validates page data per unit", () => {
      const results = sw.validate(["Person", "Employee"], {
        Person: { name: "Ada", email: "ada@example.org" },
        Employee: { employee_id: "E-1", skill: "go,rust" },
      });
      expect(results.map((r) => [r.category, r.result.success])).toEqual([
        ["Person", true],
        ["Employee", true],
      ]);
      expect(results[1].result.data?.skill).toEqual(["go", "rust"]);
    });

    it("writes artifacts to the output directory", () => {
      dir = mkdtempSync(join(tmpdir(), "schemaweave-"));
      const first = sw.write(["Person", "Employee"], { dir, displayStubs: true });
      expect(first.written).toHaveLength(6);

      const second = sw.write(["Person", "Employee"], { dir, displayStubs: true });
      expect(second.written).toEqual([]);
      expect(second.unchanged).toHaveLength(6);
    });

    it("keeps one selection's templates intact when another is written", () => {
      dir = mkdtempSync(join(tmpdir(), "schemaweave-"));
      const personOnly = join(dir, "Template/Unit/Person/Person.wiki");
      sw.write(["Person"], { dir, displayStubs: true });
      const before = readFileSync(personOnly, "utf-8");
      expect(before).toContain("{{#set:Has name={{{name|}}}}}");

      const second = sw.write(["Book", "Person", "Employee"], { dir, displayStubs: true });
      expect(second.skipped).toEqual([]);
      expect(second.unchanged).toEqual([
        join(dir, "Template/Subobject/Address.wiki"),
        join(dir, "Template/Person/display.wiki"),
      ]);
      expect(readFileSync(personOnly, "utf-8")).toBe(before);
      expect(readFileSync(join(dir, "Template/Unit/Book+Employee+Person/Person.wiki"), "utf-8")).not.toContain(
        "#set:"
      );
    });

    it("fills a display stub from the full schema even when its unit is empty", () => {
      dir = mkdtempSync(join(tmpdir(), "schemaweave-"));
      sw.write(["Book", "Person", "Employee"], { dir, displayStubs: true });
      const stub = readFileSync(join(dir, "Template/Person/display.wiki"), "utf-8");
      expect(stub).toContain("{{#if:{{{name|}}}|");
      expect(stub).toContain("{{#if:{{{email|}}}|");
      expect(stub).toContain("{{#if:{{{phone|}}}|");
    });

    it("exports the document with sorted keys", () => {
      expect(Object.keys(sw.export().categories)).toEqual([
        "Book",
        "Department",
        "Employee",
        "Novel",
        "Person",
        "Volunteer",
      ]);
      expect(sw.export({ includeInherited: true }).categories["Novel"].properties.map((p) => p.name)).toEqual([
        "Has title",
        "Has author",
        "Has ISBN",
        "Has genre",
        "Has series",
      ]);
    });
  });

  it("loads the schema from a path in the config", async () => {
    dir = mkdtempSync(join(tmpdir(), "schemaweave-"));
    writeFileSync(join(dir, "schema.yaml"), "categories:\n  Book: {}\n");
    const sw = await SchemaWeave.fromConfig(validateConfig({ schema: "schema.yaml" }, dir));
    expect(sw.resolve("Book").name).toBe("Book");
    expect(sw.output).toEqual({});
  });
});
