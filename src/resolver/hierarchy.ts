/**
 * Hierarchy view of one category for visualization: its ancestor nodes and
 * every property it inherits, attributed to the nearest declaring category.
 */

import type { SchemaStore } from "../schema/types.js";
import { InheritanceResolver } from "./inheritance.js";

export interface HierarchyNode {
  title: string;
  parents: string[];
}

export interface InheritedProperty {
  propertyTitle: string;
  sourceCategory: string;
  required: boolean;
}

export interface HierarchyData {
  rootCategory: string;
  nodes: Record<string, HierarchyNode>;
  inheritedProperties: InheritedProperty[];
}

export function categoryTitle(name: string): string {
  return `Category:${name}`;
}

export function propertyTitle(name: string): string {
  return `Property:${name}`;
}

/**
 * Nodes for the category and each ancestor. Properties are listed from the
 * category upward, required before optional at each level; the required
 * flag is the effective one after promotion.
 */
export function getHierarchyData(store: SchemaStore, categoryName: string): HierarchyData {
  const result: HierarchyData = {
    rootCategory: categoryTitle(categoryName),
    nodes: {},
    inheritedProperties: [],
  };
  if (!store.getSchema(categoryName)) {
    return result;
  }

  const resolver = new InheritanceResolver(store);
  const effective = resolver.resolve(categoryName);
  const requiredByName = new Map(effective.properties.map((p): [string, boolean] => [p.name, p.required]));
  const seen = new Set<string>();

  for (const name of resolver.ancestors(categoryName)) {
    const schema = store.getSchema(name);
    if (!schema) continue;

    result.nodes[categoryTitle(name)] = {
      title: categoryTitle(name),
      parents: schema.parent !== undefined ? [categoryTitle(schema.parent)] : [],
    };

    const ordered = [
      ...schema.properties.filter((p) => p.required),
      ...schema.properties.filter((p) => !p.required),
    ];
    for (const decl of ordered) {
      if (seen.has(decl.name)) continue;
      seen.add(decl.name);
      result.inheritedProperties.push({
        propertyTitle: propertyTitle(decl.name),
        sourceCategory: categoryTitle(name),
        required: requiredByName.get(decl.name) ?? decl.required,
      });
    }
  }

  return result;
}
