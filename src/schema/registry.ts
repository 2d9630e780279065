/**
 * Schema registry: O(1) lookups for categories, properties and subobjects.
 * Built once from a loaded schema document; serves as the SchemaStore the
 * resolvers read from.
 */

import type {
  CategorySchema,
  PropertyInfo,
  SchemaStore,
  SubobjectInfo,
} from "./types.js";
import type { SchemaDocument } from "./loader.js";

export class SchemaRegistry implements SchemaStore {
  private categories = new Map<string, CategorySchema>();
  private properties = new Map<string, PropertyInfo>();
  private subobjects = new Map<string, SubobjectInfo>();

  constructor(document: SchemaDocument) {
    for (const [name, def] of Object.entries(document.properties)) {
      this.properties.set(name, { name, ...def });
    }
    for (const [name, def] of Object.entries(document.subobjects)) {
      this.subobjects.set(name, {
        name,
        label: def.label,
        description: def.description,
        properties: def.properties.map((p) => ({ ...p })),
      });
    }
    for (const [name, def] of Object.entries(document.categories)) {
      this.categories.set(name, {
        name,
        parent: def.parent,
        label: def.label,
        description: def.description,
        properties: def.properties.map((p) => ({ ...p })),
        subobjects: def.subobjects.map((s) => ({ ...s })),
        display: def.display && {
          header: def.display.header && [...def.display.header],
          sections: def.display.sections?.map((s) => ({ name: s.name, properties: [...s.properties] })),
        },
      });
    }
  }

  getSchema(categoryName: string): CategorySchema | undefined {
    return this.categories.get(categoryName);
  }

  getProperty(propertyName: string): PropertyInfo | undefined {
    return this.properties.get(propertyName);
  }

  getSubobject(subobjectName: string): SubobjectInfo | undefined {
    return this.subobjects.get(subobjectName);
  }

  /** Check if a category exists in the schema */
  hasCategory(name: string): boolean {
    return this.categories.has(name);
  }

  /** All category names, in document order */
  getCategoryNames(): string[] {
    return [...this.categories.keys()];
  }
}
