/**
 * Cross-reference checks over a whole schema document.
 * Resolution tolerates some of these (an unregistered property falls back to
 * Page); `check` reports them so authors can fix the document.
 */

import type { SchemaDocument } from "./loader.js";
import { DATATYPES, isDatatype } from "./types.js";
import { SchemaRegistry } from "./registry.js";
import { InheritanceResolver } from "../resolver/inheritance.js";

export interface CheckReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function duplicates(names: string[]): string[] {
  return names.filter((name, i) => names.indexOf(name) !== i);
}

export function checkSchema(document: SchemaDocument): CheckReport {
  const errors: string[] = [];
  const warnings: string[] = [];
  const registry = new SchemaRegistry(document);

  // Parents and cycles
  errors.push(...new InheritanceResolver(registry).validateAll(registry.getCategoryNames()));

  for (const [name, def] of Object.entries(document.properties)) {
    if (def.datatype !== undefined && !isDatatype(def.datatype)) {
      warnings.push(
        `Property "${name}": unknown datatype "${def.datatype}" (expected one of ${DATATYPES.join(", ")}); Page is used`
      );
    }
    if (def.rangeCategory !== undefined && !registry.hasCategory(def.rangeCategory)) {
      warnings.push(`Property "${name}": range category "${def.rangeCategory}" is not defined`);
    }
  }

  for (const [name, def] of Object.entries(document.subobjects)) {
    for (const p of def.properties) {
      if (!registry.getProperty(p.name)) {
        errors.push(`Subobject "${name}": unknown property "${p.name}"`);
      }
    }
    for (const dup of duplicates(def.properties.map((p) => p.name))) {
      warnings.push(`Subobject "${name}": property "${dup}" declared more than once`);
    }
  }

  for (const [name, def] of Object.entries(document.categories)) {
    for (const p of def.properties) {
      if (!registry.getProperty(p.name)) {
        errors.push(`Category "${name}": unknown property "${p.name}"`);
      }
    }
    for (const s of def.subobjects) {
      if (!registry.getSubobject(s.name)) {
        errors.push(`Category "${name}": unknown subobject "${s.name}"`);
      }
    }
    for (const dup of duplicates(def.properties.map((p) => p.name))) {
      warnings.push(`Category "${name}": property "${dup}" declared more than once`);
    }
    for (const dup of duplicates(def.subobjects.map((s) => s.name))) {
      warnings.push(`Category "${name}": subobject "${dup}" declared more than once`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}
