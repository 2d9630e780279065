/**
 * Compose several independently inherited category schemas into one
 * deduplicated schema.
 *
 * Categories are processed in the order given. The first category that
 * declares a property (or subobject) owns it; later declarations are dropped
 * from their own section but still feed the required/optional merge, so a
 * later "required" promotes the owner's copy.
 */

import type {
  ComposedSchema,
  ComposedSection,
  EffectiveSchema,
  PropertyDefinition,
  SubobjectDefinition,
} from "../schema/types.js";
import { EmptySelectionError } from "../schema/errors.js";
import type { CategoryResolver } from "./inheritance.js";
import { DeclarationMerger, type MergedEntry } from "./merge.js";

/** Code-unit order, independent of locale */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Alphabetical default order for selections made without an explicit order */
export function sortSelection(categoryNames: string[]): string[] {
  return [...categoryNames].sort(compareNames);
}

function uniqueInOrder(names: string[]): string[] {
  return names.filter((name, i) => names.indexOf(name) === i);
}

function sourceMaps<T extends { name: string }>(
  entries: MergedEntry<T>[]
): { sources: Record<string, string>; contributors: Record<string, string[]> } {
  const sources: Record<string, string> = {};
  const contributors: Record<string, string[]> = {};
  for (const e of entries) {
    sources[e.value.name] = e.owner;
    contributors[e.value.name] = e.contributors;
  }
  return { sources, contributors };
}

export class MultiCategoryResolver {
  constructor(private readonly categories: CategoryResolver) {}

  resolve(categoryNames: string[]): ComposedSchema {
    const selection = uniqueInOrder(categoryNames);
    if (selection.length === 0) {
      throw new EmptySelectionError();
    }

    // Resolve everything up front: one unknown category fails the whole request
    const effective: EffectiveSchema[] = selection.map((name) => this.categories.resolve(name));

    const properties = new DeclarationMerger<PropertyDefinition>("property", "composition");
    const subobjects = new DeclarationMerger<SubobjectDefinition>("subobject", "composition");

    for (const schema of effective) {
      for (const p of schema.properties) properties.add(schema.name, p);
      for (const s of schema.subobjects) subobjects.add(schema.name, s);
    }

    const mergedProperties = properties.finish();
    const mergedSubobjects = subobjects.finish();

    const sections: ComposedSection[] = selection.map((category) => ({
      category,
      properties: mergedProperties.entries
        .filter((e) => e.owner === category)
        .map((e) => e.value),
      subobjects: mergedSubobjects.entries
        .filter((e) => e.owner === category)
        .map((e) => e.value),
    }));

    const props = sourceMaps(mergedProperties.entries);
    const subs = sourceMaps(mergedSubobjects.entries);

    return {
      categories: selection,
      sections,
      propertySources: props.sources,
      subobjectSources: subs.sources,
      propertyContributors: props.contributors,
      subobjectContributors: subs.contributors,
      warnings: [
        ...effective.flatMap((schema) => schema.warnings),
        ...mergedProperties.warnings,
        ...mergedSubobjects.warnings,
      ],
    };
  }
}
