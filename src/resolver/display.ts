/**
 * Display layout of a category, merged along its parent chain.
 *
 * Sections are applied root first. A section name seen again extends the
 * earlier section with the properties it does not list yet, and is credited
 * to the more specific category. The nearest category with a header wins.
 */

import type { DisplaySpec, SchemaStore } from "../schema/types.js";
import { InheritanceResolver } from "./inheritance.js";

function uniqueNames(names: string[]): string[] {
  return [...new Set(names.map((n) => n.trim()).filter((n) => n !== ""))];
}

export function buildDisplaySpec(store: SchemaStore, categoryName: string): DisplaySpec {
  const resolver = new InheritanceResolver(store);
  const effective = resolver.resolve(categoryName);
  const rootFirst = resolver.ancestors(categoryName).reverse();

  const sections: DisplaySpec["sections"] = [];
  let header: string[] = [];

  for (const name of rootFirst) {
    const display = store.getSchema(name)?.display;
    if (!display) continue;

    const ownHeader = uniqueNames(display.header ?? []);
    if (ownHeader.length > 0) header = ownHeader;

    for (const section of display.sections ?? []) {
      const properties = uniqueNames(section.properties);
      // An empty section would override nothing
      if (properties.length === 0) continue;

      const existing = sections.find((s) => s.name === section.name);
      if (existing) {
        existing.properties.push(...properties.filter((p) => !existing.properties.includes(p)));
        existing.category = name;
      } else {
        sections.push({ name: section.name, category: name, properties });
      }
    }
  }

  const spec: DisplaySpec = {
    category: effective.name,
    header,
    sections,
    properties: effective.properties,
  };
  if (effective.label !== undefined) spec.label = effective.label;
  return spec;
}
