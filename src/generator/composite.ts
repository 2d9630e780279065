/**
 * Composite generator: slice a composed schema into one generation unit per
 * category.
 *
 * Fields declared by two or more selected categories are placed in the first
 * unit only; every other field stays with its owner. Each name therefore
 * lands in exactly one unit and renders as exactly one form field.
 */

import hash from "object-hash";
import type {
  ComposedSchema,
  GenerationUnit,
  PropertyDefinition,
  SubobjectDefinition,
} from "../schema/types.js";
import { compareNames } from "../resolver/multi-category.js";

/** Joins category names in a composite artifact name */
export const COMPOSITE_SEPARATOR = "+";

/** Same selection, same name, whatever order it was resolved in */
export function compositeName(categoryNames: string[]): string {
  return [...new Set(categoryNames)].sort(compareNames).join(COMPOSITE_SEPARATOR);
}

/**
 * Identity of one template instance on a page: the category plus a short
 * hash over the field set it renders.
 */
export function unitIdentityKey(
  category: string,
  properties: PropertyDefinition[],
  subobjects: SubobjectDefinition[]
): string {
  const digest = hash(
    {
      category,
      properties: properties.map((p) => p.name),
      subobjects: subobjects.map((s) => s.name),
    },
    { algorithm: "sha1", encoding: "hex" }
  );
  return `${category}#${digest.slice(0, 12)}`;
}

function isShared(contributors: Record<string, string[]>, name: string): boolean {
  return (contributors[name]?.length ?? 0) > 1;
}

export function generateUnits(composed: ComposedSchema): GenerationUnit[] {
  const slots: Array<Omit<GenerationUnit, "identityKey">> = composed.sections.map((section) => ({
    category: section.category,
    properties: [],
    subobjects: [],
  }));
  if (slots.length === 0) return [];

  composed.sections.forEach((section, index) => {
    for (const p of section.properties) {
      const target = isShared(composed.propertyContributors, p.name) ? 0 : index;
      slots[target].properties.push(p);
    }
    for (const s of section.subobjects) {
      const target = isShared(composed.subobjectContributors, s.name) ? 0 : index;
      slots[target].subobjects.push(s);
    }
  });

  return slots.map((slot) => ({
    category: slot.category,
    identityKey: unitIdentityKey(slot.category, slot.properties, slot.subobjects),
    properties: slot.properties,
    subobjects: slot.subobjects,
  }));
}
