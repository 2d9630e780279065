/**
 * Compiles generation units into Zod validators for submitted page data.
 * Keys are template parameter names; values arrive as form strings and come
 * out typed (numbers, booleans, split multi-value lists).
 */

import { z, type ZodObject, type ZodRawShape } from "zod";
import type { Datatype, GenerationUnit, PropertyDefinition, SubobjectDefinition } from "./types.js";
import { DEFAULT_SEPARATOR, propertyToParameter } from "../generator/inputs.js";

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const TRUTHY = new Set(["true", "yes", "1", "on"]);
const FALSY = new Set(["false", "no", "0", "off"]);

function numberValue(): z.ZodTypeAny {
  return z
    .string()
    .trim()
    .regex(NUMERIC, "Expected a number")
    .transform((v) => Number(v));
}

/** Zod schema for one value of the given datatype */
function datatypeToZod(datatype: Datatype): z.ZodTypeAny {
  const typeMap: Record<Datatype, () => z.ZodTypeAny> = {
    Page: () => z.string().trim().min(1),
    Text: () => z.string(),
    Number: numberValue,
    Boolean: () =>
      z
        .string()
        .trim()
        .toLowerCase()
        .refine((v) => TRUTHY.has(v) || FALSY.has(v), "Expected yes or no")
        .transform((v) => TRUTHY.has(v)),
    Date: () => z.string().trim().date(),
    Email: () => z.string().trim().email(),
    URL: () => z.string().trim().url(),
    "Telephone number": () => z.string().trim().regex(/^\+?[\d\s().-]+$/, "Invalid telephone number"),
    Code: () => z.string(),
    Quantity: () => z.string().trim().min(1),
    Temperature: numberValue,
    "Geographic coordinate": () => z.string().trim().min(1),
  };
  return typeMap[datatype]();
}

function valueToZod(def: PropertyDefinition): z.ZodTypeAny {
  const allowed = def.allowedValues;
  if (allowed && allowed.length > 0) {
    return z
      .string()
      .trim()
      .refine((v) => allowed.includes(v), `Expected one of: ${allowed.join(", ")}`);
  }
  return datatypeToZod(def.datatype);
}

/** Blank form values count as absent */
function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

function propertyToZod(def: PropertyDefinition, separator: string): z.ZodTypeAny {
  let schema: z.ZodTypeAny = valueToZod(def);

  if (def.multiple) {
    schema = z
      .string()
      .transform((v) =>
        v
          .split(separator)
          .map((part) => part.trim())
          .filter((part) => part !== "")
      )
      .pipe(z.array(schema).min(1));
  }

  if (!def.required) {
    schema = schema.optional();
  }

  return z.preprocess(blankToUndefined, schema);
}

function buildPropertiesShape(properties: PropertyDefinition[], separator: string): ZodRawShape {
  const shape: ZodRawShape = {};
  for (const def of properties) {
    shape[propertyToParameter(def.name)] = propertyToZod(def, separator);
  }
  return shape;
}

function subobjectToZod(def: SubobjectDefinition, separator: string): z.ZodTypeAny {
  const instance = z.object(buildPropertiesShape(def.properties, separator)).strict();
  const list = z.array(instance);
  return def.required ? list.min(1) : list.optional();
}

export interface ValidationResult {
  success: boolean;
  data?: Record<string, unknown>;
  error?: string;
}

export interface CompiledUnitValidator {
  category: string;
  schema: ZodObject<ZodRawShape>;
  validate: (data: unknown) => ValidationResult;
}

/** Compile a generation unit into a validator for one template instance */
export function compileUnitValidator(
  unit: GenerationUnit,
  separator: string = DEFAULT_SEPARATOR
): CompiledUnitValidator {
  const shape = buildPropertiesShape(unit.properties, separator);
  for (const sub of unit.subobjects) {
    shape[propertyToParameter(sub.name)] = subobjectToZod(sub, separator);
  }
  const schema = z.object(shape).strict();

  return {
    category: unit.category,
    schema,
    validate(data: unknown) {
      const result = schema.safeParse(data);
      if (result.success) {
        return { success: true, data: result.data };
      }
      return {
        success: false,
        error: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      };
    },
  };
}
