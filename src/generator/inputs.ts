/**
 * Map resolved properties to form inputs and template parameter names.
 * Priority: allowed values → Page references → datatype defaults.
 */

import type { Datatype, PropertyDefinition } from "../schema/types.js";

export type InputType = "text" | "number" | "datepicker" | "checkbox" | "textarea" | "dropdown" | "combobox";

export const DEFAULT_SEPARATOR = ";";

const INPUT_BY_DATATYPE: Record<Datatype, InputType> = {
  Page: "combobox",
  Text: "text",
  Number: "number",
  Boolean: "checkbox",
  Date: "datepicker",
  Email: "text",
  URL: "text",
  "Telephone number": "text",
  Code: "textarea",
  Quantity: "text",
  Temperature: "number",
  "Geographic coordinate": "text",
};

const SIZED_DATATYPES = new Set<Datatype>(["Text", "Email", "URL", "Telephone number"]);

/** "Has birth date" → "birth_date" */
export function propertyToParameter(propertyName: string): string {
  const stripped = propertyName.startsWith("Has ") ? propertyName.slice(4) : propertyName;
  return stripped.replace(/:/g, "_").trim().toLowerCase().replace(/ /g, "_");
}

/** "Has birth date" → "birth date" */
export function propertyToLabel(propertyName: string): string {
  return propertyName.startsWith("Has ") ? propertyName.slice(4) : propertyName;
}

export function inputType(property: PropertyDefinition): InputType {
  if (property.allowedValues && property.allowedValues.length > 0) return "dropdown";
  return INPUT_BY_DATATYPE[property.datatype];
}

/** Ordered `key=value` parameters; a null value renders as a bare flag */
export function inputParameters(
  property: PropertyDefinition,
  separator: string = DEFAULT_SEPARATOR
): Array<[string, string | null]> {
  const params: Array<[string, string | null]> = [];

  if (SIZED_DATATYPES.has(property.datatype)) {
    params.push(["size", "60"]);
  }
  if (property.datatype === "Code") {
    params.push(["rows", "10"], ["cols", "80"]);
  }

  if (property.allowedValues && property.allowedValues.length > 0) {
    params.push(["values", property.allowedValues.map((v) => v.trim()).join(",")]);
  } else if (property.datatype === "Page" && property.rangeCategory !== undefined) {
    params.push(["values from category", property.rangeCategory], ["autocomplete", "on"]);
  }

  if (property.multiple) {
    params.push(["list", null], ["delimiter", separator]);
  }
  if (property.required) {
    params.push(["mandatory", "true"]);
  }

  return params;
}

/** e.g. `input type=text|size=60|mandatory=true` */
export function inputDefinition(
  property: PropertyDefinition,
  separator: string = DEFAULT_SEPARATOR
): string {
  const params = inputParameters(property, separator)
    .filter(([, value]) => value !== "")
    .map(([key, value]) => (value === null ? `|${key}` : `|${key}=${value}`))
    .join("");
  return `input type=${inputType(property)}${params}`;
}
