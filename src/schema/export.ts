/**
 * Schema export: the loaded document written back out with every map sorted
 * by name, so two exports of the same schema compare equal line by line.
 *
 * With `includeInherited`, each category lists its effective fields
 * instead of its own declarations. Categories that cannot be resolved keep
 * their raw declarations.
 */

import { stringify as stringifyYaml } from "yaml";
import type { SchemaDocument, SchemaFormat } from "./loader.js";
import { isSchemaWeaveError } from "./errors.js";
import { SchemaRegistry } from "./registry.js";
import { InheritanceResolver } from "../resolver/inheritance.js";
import { compareNames } from "../resolver/multi-category.js";

export interface ExportOptions {
  /** Expand every category through its parent chain */
  includeInherited?: boolean;
}

type CategoryEntry = SchemaDocument["categories"][string];

function sortedEntries<T>(map: Record<string, T>, project: (value: T, name: string) => T): Record<string, T> {
  const out: Record<string, T> = {};
  for (const name of Object.keys(map).sort(compareNames)) {
    out[name] = project(map[name], name);
  }
  return out;
}

/** Fixed key order, absent keys left out */
function category(def: CategoryEntry): CategoryEntry {
  return {
    ...(def.parent !== undefined ? { parent: def.parent } : {}),
    ...(def.label !== undefined ? { label: def.label } : {}),
    ...(def.description !== undefined ? { description: def.description } : {}),
    properties: def.properties.map((p) => ({ name: p.name, required: p.required })),
    subobjects: def.subobjects.map((s) => ({ name: s.name, required: s.required })),
    ...(def.display !== undefined ? { display: def.display } : {}),
  };
}

export function exportSchema(document: SchemaDocument, options: ExportOptions = {}): SchemaDocument {
  const resolver = options.includeInherited
    ? new InheritanceResolver(new SchemaRegistry(document))
    : undefined;

  const expand = (def: CategoryEntry, name: string): CategoryEntry => {
    if (!resolver) return category(def);
    try {
      const effective = resolver.resolve(name);
      return category({
        ...def,
        properties: effective.properties.map((p) => ({ name: p.name, required: p.required })),
        subobjects: effective.subobjects.map((s) => ({ name: s.name, required: s.required })),
      });
    } catch (e) {
      if (!isSchemaWeaveError(e)) throw e;
      return category(def);
    }
  };

  return {
    schemaVersion: document.schemaVersion,
    properties: sortedEntries(document.properties, (p) => p),
    subobjects: sortedEntries(document.subobjects, (s) => s),
    categories: sortedEntries(document.categories, expand),
  };
}

/** Serialize an exported document */
export function formatSchema(document: SchemaDocument, format: SchemaFormat = "yaml"): string {
  return format === "json" ? `${JSON.stringify(document, null, 2)}\n` : stringifyYaml(document);
}
