/**
 * Wire formatting for multi-category requests.
 * Flags are integers (1/0) so clients that compare strictly see stable types.
 */

import type { ComposedSchema, SchemaStore } from "../schema/types.js";
import { InheritanceResolver } from "../resolver/inheritance.js";
import { MultiCategoryResolver } from "../resolver/multi-category.js";
import { compositeName } from "../generator/composite.js";

export type Flag = 0 | 1;

export interface FormattedEntry {
  name: string;
  title: string;
  required: Flag;
  shared: Flag;
  sources: string[];
}

export interface FormattedComposition {
  categories: string[];
  formName: string;
  properties: FormattedEntry[];
  subobjects: FormattedEntry[];
  warnings: string[];
}

const CATEGORY_PREFIX = /^category:/i;

/** " Category:Person " → "Person" */
export function stripCategoryPrefix(name: string): string {
  return name.trim().replace(CATEGORY_PREFIX, "").trim();
}

function flag(value: boolean): Flag {
  return value ? 1 : 0;
}

function formatEntries(
  entries: Array<{ name: string; required: boolean }>,
  contributors: Record<string, string[]>,
  namespace: "Property" | "Subobject"
): FormattedEntry[] {
  const ordered = [...entries.filter((e) => e.required), ...entries.filter((e) => !e.required)];
  return ordered.map((e) => {
    const sources = contributors[e.name] ?? [];
    return {
      name: e.name,
      title: `${namespace}:${e.name}`,
      required: flag(e.required),
      shared: flag(sources.length > 1),
      sources: [...sources],
    };
  });
}

export function formatComposed(composed: ComposedSchema): FormattedComposition {
  return {
    categories: [...composed.categories],
    formName: compositeName(composed.categories),
    properties: formatEntries(
      composed.sections.flatMap((s) => s.properties),
      composed.propertyContributors,
      "Property"
    ),
    subobjects: formatEntries(
      composed.sections.flatMap((s) => s.subobjects),
      composed.subobjectContributors,
      "Subobject"
    ),
    warnings: composed.warnings.map((w) => w.message),
  };
}

/** Resolve a raw list of (possibly prefixed) category names and format the result */
export function handleMultiCategoryRequest(
  store: SchemaStore,
  rawNames: string[]
): FormattedComposition {
  const names = rawNames.map(stripCategoryPrefix).filter((name) => name !== "");
  const resolver = new MultiCategoryResolver(new InheritanceResolver(store));
  return formatComposed(resolver.resolve(names));
}
