/**
 * Default + user-definable artifact templates.
 * Templates turn generation units into wiki markup: semantic templates that
 * store values, subobject templates, one composite creation form, and
 * editable display stubs.
 */

import type {
  DisplaySpec,
  GenerationUnit,
  PropertyDefinition,
  SubobjectDefinition,
} from "../schema/types.js";
import {
  DEFAULT_SEPARATOR,
  inputDefinition,
  propertyToLabel,
  propertyToParameter,
} from "./inputs.js";
import { compositeName } from "./composite.js";
import { compareNames } from "../resolver/multi-category.js";

export interface RenderOptions {
  /** Marker between values of multi-value properties */
  separator: string;
}

export const defaultRenderOptions: RenderOptions = { separator: DEFAULT_SEPARATOR };

export interface ArtifactTemplates {
  /** Semantic template storing one unit's properties */
  unit: (unit: GenerationUnit, opts: RenderOptions) => string;
  /** Template storing one subobject instance */
  subobject: (subobject: SubobjectDefinition, opts: RenderOptions) => string;
  /** Composite creation form over every unit of a selection */
  form: (units: GenerationUnit[], opts: RenderOptions) => string;
  /** Editable display stub for one category */
  display: (spec: DisplaySpec) => string;
}

const GENERATED_NOTICE = "<!-- AUTO-GENERATED by schemaweave. Regenerate instead of editing. -->";

/**
 * A unit's fields depend on the whole selection, so its template is scoped
 * to the selection: "Unit/Employee+Person/Person".
 */
export function unitTemplateName(selection: string, category: string): string {
  return `Unit/${selection}/${category}`;
}

export function displayTemplateName(category: string): string {
  return `${category}/display`;
}

export function subobjectTemplateName(subobject: string): string {
  return `Subobject/${subobject}`;
}

/** Only emit the annotation when a value is present */
function guardedSet(property: PropertyDefinition, opts: RenderOptions): string {
  const param = propertyToParameter(property.name);
  const sep = property.multiple ? `|+sep=${opts.separator}` : "";
  return `{{#if:{{{${param}|}}}|{{#set:${property.name}={{{${param}|}}}${sep}}}}}`;
}

function subobjectAssignment(property: PropertyDefinition, opts: RenderOptions): string {
  const param = propertyToParameter(property.name);
  const sep = property.multiple ? `|+sep=${opts.separator}` : "";
  return ` |${property.name}={{{${param}|}}}${sep}`;
}

function formField(property: PropertyDefinition, opts: RenderOptions): string[] {
  const param = propertyToParameter(property.name);
  const label = property.label ?? propertyToLabel(property.name);
  return [
    `! ${label}:`,
    `| {{{field|${param}|property=${property.name}|${inputDefinition(property, opts.separator)}}}}`,
    "|-",
  ];
}

function renderUnit(unit: GenerationUnit, opts: RenderOptions): string {
  const lines: string[] = [
    "<noinclude>",
    GENERATED_NOTICE,
    `<!-- Unit: ${unit.identityKey} -->`,
    `Stores data for [[:Category:${unit.category}]].`,
    "</noinclude><includeonly>",
  ];

  for (const property of unit.properties) {
    lines.push(guardedSet(property, opts));
  }

  lines.push(`[[Category:${unit.category}]]`);
  lines.push("</includeonly>");
  return lines.join("\n");
}

function renderSubobject(subobject: SubobjectDefinition, opts: RenderOptions): string {
  const lines: string[] = [
    "<noinclude>",
    GENERATED_NOTICE,
    `Stores one "${subobject.label ?? subobject.name}" subobject.`,
    "</noinclude><includeonly>",
  ];

  if (subobject.properties.length > 0) {
    const anyValue = subobject.properties
      .map((p) => `{{{${propertyToParameter(p.name)}|}}}`)
      .join("");
    lines.push(`{{#if:${anyValue}|{{#subobject:`);
    for (const property of subobject.properties) {
      lines.push(subobjectAssignment(property, opts));
    }
    lines.push("}}}}");
  }

  lines.push("</includeonly>");
  return lines.join("\n");
}

function renderForm(units: GenerationUnit[], opts: RenderOptions): string {
  const formName = compositeName(units.map((u) => u.category));
  const categories = units.map((u) => `[[:Category:${u.category}]]`).join(", ");
  const lines: string[] = [
    "<noinclude>",
    GENERATED_NOTICE,
    `Creates a page in ${categories}.`,
    "</noinclude><includeonly>",
    `{{{info|create title=Create ${formName}}}}`,
  ];

  for (const unit of units) {
    lines.push(`<!-- Unit: ${unit.identityKey} -->`);
    lines.push(`{{{for template|${unitTemplateName(formName, unit.category)}}}}`);
    if (unit.properties.length > 0) {
      lines.push('{| class="formtable"');
      for (const property of unit.properties) {
        lines.push(...formField(property, opts));
      }
      lines.push("|}");
    }
    lines.push("{{{end template}}}");

    for (const subobject of unit.subobjects) {
      const min = subobject.required ? "|minimum instances=1" : "";
      lines.push(
        `{{{for template|${subobjectTemplateName(subobject.name)}|multiple|label=${subobject.label ?? subobject.name}${min}}}}`
      );
      if (subobject.properties.length > 0) {
        lines.push('{| class="formtable"');
        for (const property of subobject.properties) {
          lines.push(...formField(property, opts));
        }
        lines.push("|}");
      }
      lines.push("{{{end template}}}");
    }
  }

  lines.push("{{{standard input|save}}} {{{standard input|cancel}}}");
  lines.push("</includeonly>");
  return lines.join("\n");
}

function displayRow(param: string, label: string): string[] {
  return [
    `  {{#if:{{{${param}|}}}|`,
    '    <div class="sw-row">',
    `      <span class="sw-label">'''${label}:'''</span>`,
    `      <span class="sw-value">{{{${param}}}}</span>`,
    "    </div>",
    "  }}",
  ];
}

function displaySection(title: string, names: string[], spec: DisplaySpec): string[] {
  const lines = [`== ${title} ==`, '<div class="sw-section">'];
  for (const name of [...new Set(names)].sort(compareNames)) {
    const label = spec.properties.find((p) => p.name === name)?.label ?? propertyToLabel(name);
    lines.push(...displayRow(propertyToParameter(name), label));
  }
  lines.push("</div>");
  return lines;
}

function renderDisplay(spec: DisplaySpec): string {
  const lines: string[] = [
    "<noinclude>",
    "<!-- DISPLAY TEMPLATE STUB created by schemaweave. Safe to edit; never overwritten. -->",
    `<!-- Layout for pages in [[Category:${spec.category}]]. -->`,
    "</noinclude><includeonly>",
  ];

  if (spec.header.length > 0) {
    lines.push('<div class="sw-header">');
    for (const name of spec.header) {
      const param = propertyToParameter(name);
      lines.push(`  {{#if:{{{${param}|}}}|`);
      lines.push(`    <h1 class="sw-header-field">{{{${param}}}}</h1>`);
      lines.push("  }}");
    }
    lines.push("</div>");
  }

  if (spec.sections.length > 0) {
    for (const section of spec.sections) {
      lines.push(...displaySection(section.name, section.properties, spec));
    }
  } else {
    lines.push(...displaySection("Details", spec.properties.map((p) => p.name), spec));
  }

  lines.push("</includeonly>");
  return lines.join("\n");
}

export const defaultTemplates: ArtifactTemplates = {
  unit: renderUnit,
  subobject: renderSubobject,
  form: renderForm,
  display: renderDisplay,
};

/** Create a template set from partial overrides */
export function createTemplates(overrides: Partial<ArtifactTemplates>): ArtifactTemplates {
  return { ...defaultTemplates, ...overrides };
}

export function renderUnitTemplate(
  unit: GenerationUnit,
  opts: RenderOptions = defaultRenderOptions
): string {
  return renderUnit(unit, opts);
}

export function renderSubobjectTemplate(
  subobject: SubobjectDefinition,
  opts: RenderOptions = defaultRenderOptions
): string {
  return renderSubobject(subobject, opts);
}

export function renderCompositeForm(
  units: GenerationUnit[],
  opts: RenderOptions = defaultRenderOptions
): string {
  return renderForm(units, opts);
}

export function renderDisplayStub(spec: DisplaySpec): string {
  return renderDisplay(spec);
}
