/**
 * schemaweave: category schemas in, wiki templates and forms out.
 * Public API facade.
 */

import { existsSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import { SchemaRegistry } from "./schema/registry.js";
import { loadSchema, schemaDocumentSchema, type SchemaDocument } from "./schema/loader.js";
import { ConfigError } from "./schema/errors.js";
import { checkSchema, type CheckReport } from "./schema/consistency.js";
import { compileUnitValidator, type ValidationResult } from "./schema/validator.js";
import { exportSchema, type ExportOptions } from "./schema/export.js";
import { InheritanceResolver } from "./resolver/inheritance.js";
import { MultiCategoryResolver } from "./resolver/multi-category.js";
import { getHierarchyData, type HierarchyData } from "./resolver/hierarchy.js";
import { buildDisplaySpec } from "./resolver/display.js";
import { generateUnits } from "./generator/composite.js";
import { generateArtifacts } from "./generator/artifacts.js";
import { DEFAULT_SEPARATOR } from "./generator/inputs.js";
import type { ArtifactTemplates } from "./generator/templates.js";
import { writeArtifacts, type WriteSummary } from "./generator/renderer.js";
import type {
  Artifact,
  ComposedSchema,
  DisplaySpec,
  EffectiveSchema,
  OutputConfig,
} from "./schema/types.js";

// Re-export types
export { defineConfig, DATATYPES, FALLBACK_DATATYPE } from "./schema/types.js";
export type {
  SchemaWeaveConfig,
  OutputConfig,
  Datatype,
  PropertyInfo,
  SubobjectInfo,
  PropertyDeclaration,
  SubobjectDeclaration,
  CategorySchema,
  SchemaStore,
  PropertyDefinition,
  SubobjectDefinition,
  PromotionWarning,
  EffectiveSchema,
  ComposedSection,
  ComposedSchema,
  GenerationUnit,
  DisplayConfig,
  DisplaySection,
  DisplaySpec,
  Artifact,
  ArtifactKind,
} from "./schema/types.js";
export * from "./schema/errors.js";
export {
  parseSchema,
  loadSchema,
  loadSchemaFile,
  loadSchemaDir,
  mergeDocuments,
  validateSchemaDocument,
} from "./schema/loader.js";
export type { SchemaDocument, SchemaDocumentInput, SchemaFormat } from "./schema/loader.js";
export { SchemaRegistry } from "./schema/registry.js";
export { checkSchema } from "./schema/consistency.js";
export type { CheckReport } from "./schema/consistency.js";
export { compareSchemas } from "./schema/diff.js";
export type { SchemaDiff, SectionDiff, ModifiedEntry, FieldChange } from "./schema/diff.js";
export { exportSchema, formatSchema } from "./schema/export.js";
export type { ExportOptions } from "./schema/export.js";
export { compileUnitValidator } from "./schema/validator.js";
export type { CompiledUnitValidator, ValidationResult } from "./schema/validator.js";
export { InheritanceResolver } from "./resolver/inheritance.js";
export type { CategoryResolver } from "./resolver/inheritance.js";
export { MultiCategoryResolver, sortSelection } from "./resolver/multi-category.js";
export { getHierarchyData } from "./resolver/hierarchy.js";
export type { HierarchyData, HierarchyNode, InheritedProperty } from "./resolver/hierarchy.js";
export { buildDisplaySpec } from "./resolver/display.js";
export { generateUnits, compositeName, unitIdentityKey } from "./generator/composite.js";
export { generateArtifacts, artifactPath } from "./generator/artifacts.js";
export type { GenerateOptions } from "./generator/artifacts.js";
export {
  createTemplates,
  defaultTemplates,
  renderUnitTemplate,
  renderSubobjectTemplate,
  renderCompositeForm,
  renderDisplayStub,
  unitTemplateName,
  displayTemplateName,
} from "./generator/templates.js";
export type { ArtifactTemplates, RenderOptions } from "./generator/templates.js";
export { inputType, inputDefinition, propertyToParameter, DEFAULT_SEPARATOR } from "./generator/inputs.js";
export { computeSyncHash, renderArtifact, writeArtifact, writeArtifacts } from "./generator/renderer.js";
export type { WriteSummary, WriteResult, WriteOptions } from "./generator/renderer.js";
export {
  stripCategoryPrefix,
  formatComposed,
  handleMultiCategoryRequest,
} from "./api/format.js";
export type { FormattedComposition, FormattedEntry } from "./api/format.js";

// ── Config ──

const outputConfigSchema = z
  .object({
    dir: z.string().min(1).optional(),
    separator: z.string().min(1).optional(),
    displayStubs: z.boolean().optional(),
  })
  .strict();

const configSchema = z
  .object({
    schema: z.union([z.string().min(1), schemaDocumentSchema]),
    output: outputConfigSchema.optional(),
  })
  .strict();

/** Validated config; an inline schema is already normalized */
export type ResolvedConfig = z.infer<typeof configSchema>;

export const CONFIG_FILES = [
  "schemaweave.config.js",
  "schemaweave.config.mjs",
  "schemaweave.config.ts",
];

/** Validate a config object; relative paths resolve against `baseDir` */
export function validateConfig(raw: unknown, baseDir: string = process.cwd()): ResolvedConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid config: ${result.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ")}`
    );
  }
  const config = result.data;
  const absolute = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));
  return {
    schema: typeof config.schema === "string" ? absolute(config.schema) : config.schema,
    output: {
      ...config.output,
      ...(config.output?.dir !== undefined ? { dir: absolute(config.output.dir) } : {}),
    },
  };
}

/** Import a config module and return its default export */
async function importConfig(p: string): Promise<unknown> {
  try {
    const mod = await import(pathToFileURL(p).href);
    return mod.default ?? mod;
  } catch (e) {
    if (p.endsWith(".ts")) {
      throw new ConfigError(
        `Cannot import TypeScript config "${p}" directly. ` +
          `Either compile it to .js first, or run with tsx: npx tsx node_modules/.bin/schemaweave <command>`,
        e
      );
    }
    throw new ConfigError(`Failed to load config "${p}"`, e);
  }
}

/** Load config from a schemaweave config file */
export async function loadConfig(configPath?: string): Promise<ResolvedConfig> {
  const paths = configPath ? [resolve(configPath)] : CONFIG_FILES.map((f) => resolve(f));

  for (const p of paths) {
    if (existsSync(p)) {
      return validateConfig(await importConfig(p), dirname(p));
    }
  }

  throw new ConfigError(
    configPath
      ? `Config file not found: ${resolve(configPath)}`
      : "No schemaweave config file found. Run `schemaweave init` to create one."
  );
}

// ── Facade ──

export interface GenerateCallOptions {
  displayStubs?: boolean;
  templates?: ArtifactTemplates;
}

export interface UnitValidation {
  category: string;
  result: ValidationResult;
}

/** Main schemaweave class: high-level API */
export class SchemaWeave {
  readonly registry: SchemaRegistry;
  readonly resolver: InheritanceResolver;
  private readonly composer: MultiCategoryResolver;

  constructor(
    readonly document: SchemaDocument,
    readonly output: OutputConfig = {}
  ) {
    this.registry = new SchemaRegistry(document);
    this.resolver = new InheritanceResolver(this.registry);
    this.composer = new MultiCategoryResolver(this.resolver);
  }

  /** Build from a validated config, loading the schema from disk when it is a path */
  static async fromConfig(config: ResolvedConfig): Promise<SchemaWeave> {
    const document =
      typeof config.schema === "string" ? await loadSchema(config.schema) : config.schema;
    return new SchemaWeave(document, config.output ?? {});
  }

  get separator(): string {
    return this.output.separator ?? DEFAULT_SEPARATOR;
  }

  /** Effective schema of one category */
  resolve(categoryName: string): EffectiveSchema {
    return this.resolver.resolve(categoryName);
  }

  /** Composed schema of several categories, in the order given */
  compose(categoryNames: string[]): ComposedSchema {
    return this.composer.resolve(categoryNames);
  }

  /** Display layout of one category */
  display(categoryName: string): DisplaySpec {
    return buildDisplaySpec(this.registry, categoryName);
  }

  /** Every artifact for a selection; display stubs cover each category's full schema */
  generate(categoryNames: string[], opts: GenerateCallOptions = {}): Artifact[] {
    const composed = this.compose(categoryNames);
    const withStubs = opts.displayStubs ?? this.output.displayStubs ?? false;
    return generateArtifacts(composed, {
      separator: this.separator,
      displays: withStubs ? composed.categories.map((c) => this.display(c)) : [],
      templates: opts.templates,
    });
  }

  hierarchy(categoryName: string): HierarchyData {
    return getHierarchyData(this.registry, categoryName);
  }

  check(): CheckReport {
    return checkSchema(this.document);
  }

  /** The loaded document with sorted keys, optionally expanded through inheritance */
  export(opts: ExportOptions = {}): SchemaDocument {
    return exportSchema(this.document, opts);
  }

  /** Validate submitted page data, keyed by category, against each unit of a selection */
  validate(categoryNames: string[], data: Record<string, unknown>): UnitValidation[] {
    return generateUnits(this.compose(categoryNames)).map((unit) => ({
      category: unit.category,
      result: compileUnitValidator(unit, this.separator).validate(data[unit.category] ?? {}),
    }));
  }

  /** Generate and write artifacts to the output directory */
  write(
    categoryNames: string[],
    opts: GenerateCallOptions & { dir?: string; force?: boolean } = {}
  ): WriteSummary {
    const dir = opts.dir ?? this.output.dir ?? "./wiki";
    return writeArtifacts(this.generate(categoryNames, opts), resolve(dir), { force: opts.force });
  }
}
