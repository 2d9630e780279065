import { describe, it, expect } from "vitest";
import {
  createTemplates,
  renderCompositeForm,
  renderDisplayStub,
  renderSubobjectTemplate,
  renderUnitTemplate,
} from "../../src/generator/templates.js";
import type { DisplaySpec, GenerationUnit, SubobjectDefinition } from "../../src/schema/types.js";

const NOTICE = "<!-- AUTO-GENERATED by schemaweave. Regenerate instead of editing. -->";

const address: SubobjectDefinition = {
  name: "Address",
  required: true,
  label: "Postal address",
  properties: [
    { name: "Has street", datatype: "Text", required: true, multiple: false },
    { name: "Has city", datatype: "Text", required: false, multiple: false },
  ],
};

const person: GenerationUnit = {
  category: "Person",
  identityKey: "Person#0123456789ab",
  properties: [
    { name: "Has skill", datatype: "Text", required: false, multiple: true },
    { name: "Has name", datatype: "Text", required: true, multiple: false, label: "Full name" },
  ],
  subobjects: [address],
};

const employee: GenerationUnit = {
  category: "Employee",
  identityKey: "Employee#ba9876543210",
  properties: [{ name: "Has employee ID", datatype: "Text", required: true, multiple: false }],
  subobjects: [],
};

const personDisplay: DisplaySpec = {
  category: "Person",
  header: [],
  sections: [],
  properties: person.properties,
};

const STUB_HEAD = [
  "<noinclude>",
  "<!-- DISPLAY TEMPLATE STUB created by schemaweave. Safe to edit; never overwritten. -->",
  "<!-- Layout for pages in [[Category:Person]]. -->",
  "</noinclude><includeonly>",
];

describe("Templates", () => {
  describe("renderUnitTemplate", () => {
    it("guards every annotation and marks multi-value separators", () => {
      expect(renderUnitTemplate(person)).toBe(
        [
          "<noinclude>",
          NOTICE,
          "<!-- Unit: Person#0123456789ab -->",
          "Stores data for [[:Category:Person]].",
          "</noinclude><includeonly>",
          "{{#if:{{{skill|}}}|{{#set:Has skill={{{skill|}}}|+sep=;}}}}",
          "{{#if:{{{name|}}}|{{#set:Has name={{{name|}}}}}}}",
          "[[Category:Person]]",
          "</includeonly>",
        ].join("\n")
      );
    });

    it("uses the configured separator", () => {
      expect(renderUnitTemplate(person, { separator: "," })).toContain(
        "{{#set:Has skill={{{skill|}}}|+sep=,}}"
      );
    });
  });

  describe("renderSubobjectTemplate", () => {
    it("emits one subobject only when some value is present", () => {
      expect(renderSubobjectTemplate(address)).toBe(
        [
          "<noinclude>",
          NOTICE,
          'Stores one "Postal address" subobject.',
          "</noinclude><includeonly>",
          "{{#if:{{{street|}}}{{{city|}}}|{{#subobject:",
          " |Has street={{{street|}}}",
          " |Has city={{{city|}}}",
          "}}}}",
          "</includeonly>",
        ].join("\n")
      );
    });
  });

  describe("renderCompositeForm", () => {
    it("renders one section per unit under the composite name", () => {
      const lines = renderCompositeForm([person, employee]).split("\n");
      expect(lines).toEqual([
        "<noinclude>",
        NOTICE,
        "Creates a page in [[:Category:Person]], [[:Category:Employee]].",
        "</noinclude><includeonly>",
        "{{{info|create title=Create Employee+Person}}}",
        "<!-- Unit: Person#0123456789ab -->",
        "{{{for template|Unit/Employee+Person/Person}}}",
        '{| class="formtable"',
        "! skill:",
        "| {{{field|skill|property=Has skill|input type=text|size=60|list|delimiter=;}}}",
        "|-",
        "! Full name:",
        "| {{{field|name|property=Has name|input type=text|size=60|mandatory=true}}}",
        "|-",
        "|}",
        "{{{end template}}}",
        "{{{for template|Subobject/Address|multiple|label=Postal address|minimum instances=1}}}",
        '{| class="formtable"',
        "! street:",
        "| {{{field|street|property=Has street|input type=text|size=60|mandatory=true}}}",
        "|-",
        "! city:",
        "| {{{field|city|property=Has city|input type=text|size=60}}}",
        "|-",
        "|}",
        "{{{end template}}}",
        "<!-- Unit: Employee#ba9876543210 -->",
        "{{{for template|Unit/Employee+Person/Employee}}}",
        '{| class="formtable"',
        "! employee ID:",
        "| {{{field|employee_id|property=Has employee ID|input type=text|size=60|mandatory=true}}}",
        "|-",
        "|}",
        "{{{end template}}}",
        "{{{standard input|save}}} {{{standard input|cancel}}}",
        "</includeonly>",
      ]);
    });

    it("names the form the same for either unit order", () => {
      const a = renderCompositeForm([person, employee]).split("\n")[4];
      const b = renderCompositeForm([employee, person]).split("\n")[4];
      expect(a).toBe(b);
    });

    it("omits the table for a unit with no properties", () => {
      const empty: GenerationUnit = { ...employee, properties: [] };
      const lines = renderCompositeForm([empty]).split("\n");
      expect(lines.slice(5, 8)).toEqual([
        "<!-- Unit: Employee#ba9876543210 -->",
        "{{{for template|Unit/Employee/Employee}}}",
        "{{{end template}}}",
      ]);
    });
  });

  describe("renderDisplayStub", () => {
    it("falls back to a Details section with every property sorted by name", () => {
      expect(renderDisplayStub(personDisplay)).toBe(
        [
          ...STUB_HEAD,
          "== Details ==",
          '<div class="sw-section">',
          "  {{#if:{{{name|}}}|",
          '    <div class="sw-row">',
          "      <span class=\"sw-label\">'''Full name:'''</span>",
          '      <span class="sw-value">{{{name}}}</span>',
          "    </div>",
          "  }}",
          "  {{#if:{{{skill|}}}|",
          '    <div class="sw-row">',
          "      <span class=\"sw-label\">'''skill:'''</span>",
          '      <span class="sw-value">{{{skill}}}</span>',
          "    </div>",
          "  }}",
          "</div>",
          "</includeonly>",
        ].join("\n")
      );
    });

    it("renders the header and configured sections instead of Details", () => {
      const spec: DisplaySpec = {
        ...personDisplay,
        header: ["Has name"],
        sections: [{ name: "Skills", category: "Person", properties: ["Has skill"] }],
      };
      expect(renderDisplayStub(spec)).toBe(
        [
          ...STUB_HEAD,
          '<div class="sw-header">',
          "  {{#if:{{{name|}}}|",
          '    <h1 class="sw-header-field">{{{name}}}</h1>',
          "  }}",
          "</div>",
          "== Skills ==",
          '<div class="sw-section">',
          "  {{#if:{{{skill|}}}|",
          '    <div class="sw-row">',
          "      <span class=\"sw-label\">'''skill:'''</span>",
          '      <span class="sw-value">{{{skill}}}</span>',
          "    </div>",
          "  }}",
          "</div>",
          "</includeonly>",
        ].join("\n")
      );
    });

    it("sorts section rows and labels properties missing from the schema by name", () => {
      const spec: DisplaySpec = {
        ...personDisplay,
        sections: [{ name: "Contact", category: "Person", properties: ["Has phone", "Has name"] }],
      };
      const labels = renderDisplayStub(spec)
        .split("\n")
        .filter((l) => l.includes("sw-label"))
        .map((l) => l.trim());
      expect(labels).toEqual([
        "<span class=\"sw-label\">'''Full name:'''</span>",
        "<span class=\"sw-label\">'''phone:'''</span>",
      ]);
    });
  });

  describe("createTemplates", () => {
    it("overrides selected renderers", () => {
      const templates = createTemplates({ display: (spec) => `display ${spec.category}` });
      expect(templates.display(personDisplay)).toBe("display Person");
      expect(templates.unit(person, { separator: ";" })).toBe(renderUnitTemplate(person));
    });
  });
});
