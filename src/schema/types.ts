/**
 * Schema definition types for schemaweave.
 *
 * Categories, properties and subobjects are declared in a schema document
 * (JSON or YAML) and served to the resolvers through a SchemaStore.
 * Everything the resolvers return is a plain value object: computed per
 * request, never mutated afterwards.
 */

import type { SchemaDocumentInput } from "./loader.js";

/** Datatypes a property can carry */
export const DATATYPES = [
  "Page",
  "Text",
  "Number",
  "Boolean",
  "Date",
  "Email",
  "URL",
  "Telephone number",
  "Code",
  "Quantity",
  "Temperature",
  "Geographic coordinate",
] as const;

export type Datatype = (typeof DATATYPES)[number];

/** Datatype assumed when a property is missing from the registry or names an unknown type */
export const FALLBACK_DATATYPE: Datatype = "Page";

export function isDatatype(value: unknown): value is Datatype {
  return DATATYPES.some((d) => d === value);
}

/** Normalize a raw datatype string, falling back to Page */
export function toDatatype(value: string | undefined): Datatype {
  return isDatatype(value) ? value : FALLBACK_DATATYPE;
}

// ── Registry entries (wiki-global) ──

/** A property as registered once for the whole wiki */
export interface PropertyInfo {
  name: string;
  datatype?: string;
  multiple?: boolean;
  label?: string;
  description?: string;
  /** Closed list of values; rendered as a dropdown */
  allowedValues?: string[];
  /** For Page-typed properties: category the target pages belong to */
  rangeCategory?: string;
}

/** A named, reusable group of properties */
export interface SubobjectInfo {
  name: string;
  label?: string;
  description?: string;
  properties: PropertyDeclaration[];
}

// ── Category schemas (as declared) ──

export interface PropertyDeclaration {
  name: string;
  required: boolean;
}

export interface SubobjectDeclaration {
  name: string;
  required: boolean;
}

/** A named group of properties on a category's display template */
export interface DisplaySection {
  name: string;
  properties: string[];
}

/** How pages of a category are laid out */
export interface DisplayConfig {
  /** Properties shown as page headings */
  header?: string[];
  sections?: DisplaySection[];
}

export interface CategorySchema {
  name: string;
  parent?: string;
  label?: string;
  description?: string;
  properties: PropertyDeclaration[];
  subobjects: SubobjectDeclaration[];
  display?: DisplayConfig;
}

/** Read-only lookup the resolvers depend on */
export interface SchemaStore {
  getSchema(categoryName: string): CategorySchema | undefined;
  getProperty(propertyName: string): PropertyInfo | undefined;
  getSubobject(subobjectName: string): SubobjectInfo | undefined;
}

// ── Resolved schemas ──

export interface PropertyDefinition {
  name: string;
  datatype: Datatype;
  required: boolean;
  multiple: boolean;
  label?: string;
  description?: string;
  allowedValues?: string[];
  rangeCategory?: string;
}

export interface SubobjectDefinition {
  name: string;
  required: boolean;
  label?: string;
  properties: PropertyDefinition[];
}

export type DefinitionKind = "property" | "subobject";

export interface PromotionWarning {
  kind: DefinitionKind;
  name: string;
  /** Where the conflict was found */
  scope: "inheritance" | "composition";
  /** Category the warning belongs to (the resolved category, or the owner in a composition) */
  category: string;
  /** Set for a property inside a subobject group */
  subobject?: string;
  optionalIn: string[];
  requiredIn: string[];
  message: string;
}

export interface EffectiveSchema {
  name: string;
  parent?: string;
  label?: string;
  description?: string;
  /** Root first, excluding the category itself */
  ancestors: string[];
  properties: PropertyDefinition[];
  subobjects: SubobjectDefinition[];
  /** Name → chain member that first declared it */
  propertyDeclaredIn: Record<string, string>;
  subobjectDeclaredIn: Record<string, string>;
  warnings: PromotionWarning[];
}

export interface ComposedSection {
  category: string;
  properties: PropertyDefinition[];
  subobjects: SubobjectDefinition[];
}

export interface ComposedSchema {
  /** Input order, duplicates removed */
  categories: string[];
  sections: ComposedSection[];
  /** Name → owning category */
  propertySources: Record<string, string>;
  subobjectSources: Record<string, string>;
  /** Name → every selected category declaring it, in selection order */
  propertyContributors: Record<string, string[]>;
  subobjectContributors: Record<string, string[]>;
  warnings: PromotionWarning[];
}

// ── Generation ──

export interface GenerationUnit {
  category: string;
  /** Unique per template instance on a page: `<category>#<hash>` */
  identityKey: string;
  properties: PropertyDefinition[];
  subobjects: SubobjectDefinition[];
}

/** Display layout of one category after merging its chain */
export interface DisplaySpec {
  category: string;
  label?: string;
  header: string[];
  /** Merged sections; `category` is the most specific chain member defining each */
  sections: Array<DisplaySection & { category: string }>;
  /** Every effective property, for labels and the fallback section */
  properties: PropertyDefinition[];
}

export type ArtifactKind = "template" | "subobject-template" | "form" | "display";

export interface Artifact {
  kind: ArtifactKind;
  /** Wiki page title, e.g. "Form:Employee+Person" */
  title: string;
  /** Output path relative to the output directory */
  path: string;
  /** Identity key of the unit the artifact was generated from, or the form name */
  id: string;
  body: string;
}

// ── Config ──

export interface OutputConfig {
  /** Where generated artifacts are written */
  dir?: string;
  /** Marker between values of multi-value properties */
  separator?: string;
  /** Also emit editable display stubs */
  displayStubs?: boolean;
}

export interface SchemaWeaveConfig {
  /** Path to a schema file or directory, or an inline document */
  schema: string | SchemaDocumentInput;
  output?: OutputConfig;
}

/** Helper to define a config with full type inference */
export function defineConfig(config: SchemaWeaveConfig): SchemaWeaveConfig {
  return config;
}
