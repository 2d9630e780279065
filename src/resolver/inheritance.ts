/**
 * Single-parent inheritance: merge a category's schema with every ancestor.
 *
 * The chain is walked upward from the requested category, then merged from
 * the root down, so ancestor fields come first and each level appends what
 * it adds. Nothing is cached; every call reads the store afresh.
 */

import type {
  CategorySchema,
  EffectiveSchema,
  PropertyDeclaration,
  PropertyDefinition,
  PropertyInfo,
  PromotionWarning,
  SchemaStore,
  SubobjectDeclaration,
  SubobjectDefinition,
} from "../schema/types.js";
import { toDatatype } from "../schema/types.js";
import {
  CyclicInheritanceError,
  UnknownCategoryError,
  isSchemaWeaveError,
} from "../schema/errors.js";
import { DeclarationMerger, type MergedEntry } from "./merge.js";

/** Anything that can turn a category name into its effective schema */
export interface CategoryResolver {
  resolve(categoryName: string): EffectiveSchema;
}

type RegistryDetails = Pick<
  PropertyDefinition,
  "label" | "description" | "allowedValues" | "rangeCategory"
>;

function registryDetails(info: PropertyInfo | undefined): RegistryDetails {
  const details: RegistryDetails = {};
  if (info?.label !== undefined) details.label = info.label;
  if (info?.description !== undefined) details.description = info.description;
  if (info?.allowedValues !== undefined) details.allowedValues = [...info.allowedValues];
  if (info?.rangeCategory !== undefined) details.rangeCategory = info.rangeCategory;
  return details;
}

function declaredIn<T extends { name: string }>(entries: MergedEntry<T>[]): Record<string, string> {
  const map: Record<string, string> = {};
  for (const e of entries) {
    map[e.value.name] = e.owner;
  }
  return map;
}

export class InheritanceResolver implements CategoryResolver {
  constructor(private readonly store: SchemaStore) {}

  /** The category followed by its parent, grandparent, and so on */
  ancestors(categoryName: string): string[] {
    return this.chain(categoryName).map((c) => c.name);
  }

  /** True when `ancestor` appears above `categoryName` in its parent chain */
  isAncestorOf(ancestor: string, categoryName: string): boolean {
    return this.ancestors(categoryName).slice(1).includes(ancestor);
  }

  /** One message per category that cannot be resolved */
  validateAll(categoryNames: string[]): string[] {
    const errors: string[] = [];
    for (const name of categoryNames) {
      try {
        this.chain(name);
      } catch (e) {
        if (!isSchemaWeaveError(e)) throw e;
        errors.push(`${name}: ${e.message}`);
      }
    }
    return errors;
  }

  resolve(categoryName: string): EffectiveSchema {
    const chain = this.chain(categoryName);
    const self = chain[0];
    const rootFirst = [...chain].reverse();

    const properties = new DeclarationMerger<PropertyDefinition>("property", "inheritance");
    const subobjects = new DeclarationMerger<SubobjectDefinition>("subobject", "inheritance");
    const nestedWarnings: PromotionWarning[] = [];

    for (const level of rootFirst) {
      for (const decl of level.properties) {
        properties.add(level.name, this.defineProperty(decl));
      }
      for (const decl of level.subobjects) {
        if (subobjects.has(decl.name)) {
          subobjects.add(level.name, { name: decl.name, required: decl.required, properties: [] });
          continue;
        }
        const { definition, warnings } = this.defineSubobject(decl, categoryName);
        subobjects.add(level.name, definition);
        nestedWarnings.push(...warnings);
      }
    }

    const mergedProperties = properties.finish(categoryName);
    const mergedSubobjects = subobjects.finish(categoryName);

    const effective: EffectiveSchema = {
      name: self.name,
      ancestors: rootFirst.slice(0, -1).map((c) => c.name),
      properties: mergedProperties.entries.map((e) => e.value),
      subobjects: mergedSubobjects.entries.map((e) => e.value),
      propertyDeclaredIn: declaredIn(mergedProperties.entries),
      subobjectDeclaredIn: declaredIn(mergedSubobjects.entries),
      warnings: [...mergedProperties.warnings, ...mergedSubobjects.warnings, ...nestedWarnings],
    };
    if (self.parent !== undefined) effective.parent = self.parent;
    if (self.label !== undefined) effective.label = self.label;
    if (self.description !== undefined) effective.description = self.description;
    return effective;
  }

  /** Walk up the parent links; self first */
  private chain(categoryName: string): CategorySchema[] {
    const schema = this.store.getSchema(categoryName);
    if (!schema) {
      throw new UnknownCategoryError(categoryName);
    }

    const chain: CategorySchema[] = [schema];
    const seen = new Set<string>([schema.name]);
    let current = schema;

    while (current.parent !== undefined) {
      const parentName = current.parent;
      if (seen.has(parentName)) {
        throw new CyclicInheritanceError([...chain.map((c) => c.name), parentName]);
      }
      const parent = this.store.getSchema(parentName);
      if (!parent) {
        throw new UnknownCategoryError(parentName, current.name);
      }
      seen.add(parentName);
      chain.push(parent);
      current = parent;
    }

    return chain;
  }

  private defineProperty(decl: PropertyDeclaration): PropertyDefinition {
    const info = this.store.getProperty(decl.name);
    return {
      name: decl.name,
      datatype: toDatatype(info?.datatype),
      required: decl.required,
      multiple: info?.multiple ?? false,
      ...registryDetails(info),
    };
  }

  private defineSubobject(
    decl: SubobjectDeclaration,
    categoryName: string
  ): { definition: SubobjectDefinition; warnings: PromotionWarning[] } {
    const info = this.store.getSubobject(decl.name);
    const group = new DeclarationMerger<PropertyDefinition>("property", "inheritance");
    for (const p of info?.properties ?? []) {
      group.add(decl.name, this.defineProperty(p));
    }
    const merged = group.finish(categoryName);

    const definition: SubobjectDefinition = {
      name: decl.name,
      required: decl.required,
      properties: merged.entries.map((e) => e.value),
    };
    if (info?.label !== undefined) definition.label = info.label;

    return {
      definition,
      warnings: merged.warnings.map((w) => ({ ...w, subobject: decl.name })),
    };
  }
}
