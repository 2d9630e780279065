/**
 * Schema-to-schema comparison.
 * Compares two schema documents section by section and returns a structured
 * diff of added, removed, modified and unchanged names.
 */

import deepEqual from "fast-deep-equal";
import type { SchemaDocument } from "./loader.js";
import { compareNames } from "../resolver/multi-category.js";

export interface FieldChange {
  field: string;
  old: unknown;
  new: unknown;
}

export interface ModifiedEntry {
  name: string;
  changes: FieldChange[];
}

export interface SectionDiff {
  added: string[];
  removed: string[];
  modified: ModifiedEntry[];
  unchanged: string[];
}

export type SchemaSection = "categories" | "properties" | "subobjects";

export type SchemaDiff = Record<SchemaSection, SectionDiff> & {
  /** True when any section has added, removed or modified entries */
  changed: boolean;
};

/** Diff two definitions field by field */
export function diffFields(
  oldDef: Record<string, unknown>,
  newDef: Record<string, unknown>
): FieldChange[] {
  const changes: FieldChange[] = [];
  const allKeys = [...new Set([...Object.keys(oldDef), ...Object.keys(newDef)])].sort(compareNames);
  for (const key of allKeys) {
    const oldVal = oldDef[key];
    const newVal = newDef[key];
    if (!deepEqual(oldVal, newVal)) {
      changes.push({ field: key, old: oldVal, new: newVal });
    }
  }
  return changes;
}

function fields(def: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(def));
}

function diffSection<T extends object>(
  oldEntries: Record<string, T>,
  newEntries: Record<string, T>
): SectionDiff {
  const diff: SectionDiff = { added: [], removed: [], modified: [], unchanged: [] };
  const names = [...new Set([...Object.keys(oldEntries), ...Object.keys(newEntries)])].sort(
    compareNames
  );

  for (const name of names) {
    // Own keys only; names like "constructor" must not match Object.prototype
    const oldDef = Object.hasOwn(oldEntries, name) ? oldEntries[name] : undefined;
    const newDef = Object.hasOwn(newEntries, name) ? newEntries[name] : undefined;
    if (oldDef === undefined) {
      diff.added.push(name);
    } else if (newDef === undefined) {
      diff.removed.push(name);
    } else if (deepEqual(oldDef, newDef)) {
      diff.unchanged.push(name);
    } else {
      diff.modified.push({ name, changes: diffFields(fields(oldDef), fields(newDef)) });
    }
  }
  return diff;
}

export function compareSchemas(oldDoc: SchemaDocument, newDoc: SchemaDocument): SchemaDiff {
  const categories = diffSection(oldDoc.categories, newDoc.categories);
  const properties = diffSection(oldDoc.properties, newDoc.properties);
  const subobjects = diffSection(oldDoc.subobjects, newDoc.subobjects);
  const changed = [categories, properties, subobjects].some(
    (s) => s.added.length > 0 || s.removed.length > 0 || s.modified.length > 0
  );
  return { categories, properties, subobjects, changed };
}
