/**
 * Load schema documents from JSON/YAML strings, files or directories.
 * Every document passes through the zod schema below before the registry
 * sees it, so malformed declarations are rejected at the edge.
 */

import { readFileSync, existsSync, statSync } from "node:fs";
import { extname, resolve } from "node:path";
import { glob } from "glob";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { PropertyDeclaration } from "./types.js";
import { InvalidSchemaError, SchemaParseError } from "./errors.js";

const nameSchema = z.string().trim().min(1);

/** A declaration is a bare name (optional) or `{ name, required }` */
const declarationSchema = z.union([
  nameSchema.transform((name): PropertyDeclaration => ({ name, required: false })),
  z
    .object({ name: nameSchema, required: z.boolean().optional() })
    .strict()
    .transform((d): PropertyDeclaration => ({ name: d.name, required: d.required ?? false })),
]);

/** Ordered declarations, or the `{ required: [...], optional: [...] }` shorthand */
const declarationListSchema = z.union([
  z.array(declarationSchema),
  z
    .object({
      required: z.array(nameSchema).optional(),
      optional: z.array(nameSchema).optional(),
    })
    .strict()
    .transform((lists): PropertyDeclaration[] => [
      ...(lists.required ?? []).map((name) => ({ name, required: true })),
      ...(lists.optional ?? []).map((name) => ({ name, required: false })),
    ]),
]);

const propertyInfoSchema = z
  .object({
    datatype: z.string().optional(),
    multiple: z.boolean().optional(),
    label: z.string().optional(),
    description: z.string().optional(),
    allowedValues: z.array(z.coerce.string()).optional(),
    rangeCategory: z.string().optional(),
  })
  .strict();

const subobjectInfoSchema = z
  .object({
    label: z.string().optional(),
    description: z.string().optional(),
    properties: declarationListSchema.default([]),
  })
  .strict();

const displaySchema = z
  .object({
    header: z.array(nameSchema).optional(),
    sections: z
      .array(
        z
          .object({ name: nameSchema, properties: z.array(nameSchema).default([]) })
          .strict()
      )
      .optional(),
  })
  .strict();

const categorySchema = z
  .object({
    parent: nameSchema.optional(),
    label: z.string().optional(),
    description: z.string().optional(),
    properties: declarationListSchema.default([]),
    subobjects: declarationListSchema.default([]),
    display: displaySchema.optional(),
  })
  .strict();

export const schemaDocumentSchema = z
  .object({
    schemaVersion: z.coerce.string().default("1.0"),
    properties: z.record(propertyInfoSchema).default({}),
    subobjects: z.record(subobjectInfoSchema).default({}),
    categories: z.record(categorySchema).default({}),
  })
  .strict();

/** Validated, normalized schema document */
export type SchemaDocument = z.infer<typeof schemaDocumentSchema>;
/** What authors write */
export type SchemaDocumentInput = z.input<typeof schemaDocumentSchema>;

export type SchemaFormat = "json" | "yaml";

/** Validate an already-parsed value as a schema document */
export function validateSchemaDocument(data: unknown, source?: string): SchemaDocument {
  const result = schemaDocumentSchema.safeParse(data);
  if (result.success) {
    return result.data;
  }
  throw new InvalidSchemaError(
    result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    source
  );
}

/** JSON documents start with `{` or `[`; anything else is read as YAML */
export function detectFormat(content: string): SchemaFormat {
  const first = content.trimStart().charAt(0);
  return first === "{" || first === "[" ? "json" : "yaml";
}

/** Parse and validate a schema document from a string */
export function parseSchema(content: string, format?: SchemaFormat, source?: string): SchemaDocument {
  if (content.trim() === "") {
    throw new SchemaParseError(`Empty schema content${source ? ` in ${source}` : ""}`, { source });
  }

  const fmt = format ?? detectFormat(content);
  let data: unknown;
  try {
    data = fmt === "json" ? JSON.parse(content) : parseYaml(content);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new SchemaParseError(
      `Invalid ${fmt === "json" ? "JSON" : "YAML"}${source ? ` in ${source}` : ""}: ${reason}`,
      { source, format: fmt },
      e
    );
  }

  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    throw new SchemaParseError(
      `Schema document must be an object${source ? ` (${source})` : ""}`,
      { source, format: fmt }
    );
  }

  return validateSchemaDocument(data, source);
}

function formatFromPath(filePath: string): SchemaFormat | undefined {
  const ext = extname(filePath).toLowerCase();
  if (ext === ".json") return "json";
  if (ext === ".yaml" || ext === ".yml") return "yaml";
  return undefined;
}

/** Load a single schema file */
export function loadSchemaFile(filePath: string): SchemaDocument {
  const abs = resolve(filePath);
  if (!existsSync(abs)) {
    throw new SchemaParseError(`File not found: ${abs}`, { source: abs });
  }
  return parseSchema(readFileSync(abs, "utf-8"), formatFromPath(abs), abs);
}

/**
 * Merge documents in order. A name defined in several documents keeps the
 * definition from the last one.
 */
export function mergeDocuments(documents: SchemaDocument[]): SchemaDocument {
  const merged: SchemaDocument = {
    schemaVersion: "1.0",
    properties: {},
    subobjects: {},
    categories: {},
  };
  for (const doc of documents) {
    merged.schemaVersion = doc.schemaVersion;
    Object.assign(merged.properties, doc.properties);
    Object.assign(merged.subobjects, doc.subobjects);
    Object.assign(merged.categories, doc.categories);
  }
  return merged;
}

/** Load every JSON/YAML schema file under a directory, merged in path order */
export async function loadSchemaDir(directory: string): Promise<SchemaDocument> {
  const files = (
    await glob("**/*.{json,yaml,yml}", { cwd: resolve(directory), absolute: true, nodir: true })
  ).sort();

  const docs: SchemaDocument[] = [];
  const errors: Array<{ file: string; error: string }> = [];

  for (const file of files) {
    try {
      docs.push(loadSchemaFile(file));
    } catch (e) {
      errors.push({
        file,
        error: e instanceof Error ? e.message : String(e),
      });
    }
  }

  if (errors.length > 0) {
    console.warn(
      `Warning: ${errors.length} schema file(s) skipped:\n` +
        errors.map((e) => `  ${e.file}: ${e.error}`).join("\n")
    );
  }

  return mergeDocuments(docs);
}

/** Load a schema file, or every schema file under a directory */
export async function loadSchema(source: string): Promise<SchemaDocument> {
  const abs = resolve(source);
  if (existsSync(abs) && statSync(abs).isDirectory()) {
    return loadSchemaDir(abs);
  }
  return loadSchemaFile(abs);
}
