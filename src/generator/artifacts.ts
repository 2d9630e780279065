/**
 * Turn a composed schema into the full set of wiki pages for one selection.
 */

import type { Artifact, ArtifactKind, ComposedSchema, DisplaySpec } from "../schema/types.js";
import { UnsafeOutputPathError } from "../schema/errors.js";
import { DEFAULT_SEPARATOR } from "./inputs.js";
import { compositeName, generateUnits } from "./composite.js";
import {
  defaultTemplates,
  displayTemplateName,
  subobjectTemplateName,
  unitTemplateName,
  type ArtifactTemplates,
} from "./templates.js";

export interface GenerateOptions {
  separator?: string;
  /** One display stub per spec, usually one per selected category */
  displays?: DisplaySpec[];
  templates?: ArtifactTemplates;
}

/**
 * "Template:Subobject/Address" → "Template/Subobject/Address.wiki".
 * Titles with empty, `.` or `..` segments are rejected.
 */
export function artifactPath(title: string): string {
  const segments = title.replace(":", "/").split("/");
  for (const segment of segments) {
    const trimmed = segment.trim();
    if (trimmed === "" || trimmed === "." || trimmed === ".." || segment.includes("\\")) {
      throw new UnsafeOutputPathError(title, `invalid path segment "${segment}"`);
    }
  }
  return `${segments.join("/")}.wiki`;
}

function artifact(kind: ArtifactKind, title: string, id: string, body: string): Artifact {
  return { kind, title, path: artifactPath(title), id, body };
}

export function generateArtifacts(
  composed: ComposedSchema,
  options: GenerateOptions = {}
): Artifact[] {
  const templates = options.templates ?? defaultTemplates;
  const opts = { separator: options.separator ?? DEFAULT_SEPARATOR };
  const units = generateUnits(composed);
  const formName = compositeName(composed.categories);
  const artifacts: Artifact[] = [];

  for (const unit of units) {
    artifacts.push(
      artifact(
        "template",
        `Template:${unitTemplateName(formName, unit.category)}`,
        unit.identityKey,
        templates.unit(unit, opts)
      )
    );
  }

  for (const unit of units) {
    for (const subobject of unit.subobjects) {
      const name = subobjectTemplateName(subobject.name);
      artifacts.push(
        artifact("subobject-template", `Template:${name}`, name, templates.subobject(subobject, opts))
      );
    }
  }

  artifacts.push(artifact("form", `Form:${formName}`, formName, templates.form(units, opts)));

  for (const spec of options.displays ?? []) {
    const name = displayTemplateName(spec.category);
    artifacts.push(artifact("display", `Template:${name}`, name, templates.display(spec)));
  }

  return artifacts;
}
