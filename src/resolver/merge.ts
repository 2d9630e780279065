/**
 * Requirement lattice and the ordered, deduplicating merge shared by both
 * resolvers.
 *
 * `optional < required`; merging takes the max. A name declared optional
 * somewhere and required somewhere else ends up required and yields one
 * PromotionWarning. Properties and subobjects go through the same code.
 */

import type { DefinitionKind, PromotionWarning } from "../schema/types.js";

export type Requirement = "optional" | "required";

export function toRequirement(required: boolean): Requirement {
  return required ? "required" : "optional";
}

/** Lattice join */
export function maxRequirement(a: Requirement, b: Requirement): Requirement {
  return a === "required" || b === "required" ? "required" : "optional";
}

/** One declaration of a name, attributed to the category that made it */
export interface Declaration {
  source: string;
  required: boolean;
}

export interface RequirementMerge {
  required: boolean;
  optionalIn: string[];
  requiredIn: string[];
}

const EMPTY_MERGE: RequirementMerge = { required: false, optionalIn: [], requiredIn: [] };

function pushUnique(list: string[], value: string): string[] {
  return list.includes(value) ? list : [...list, value];
}

/** Fold the declarations of a single name */
export function mergeRequirement(declarations: Declaration[]): RequirementMerge {
  return declarations.reduce<RequirementMerge>(
    (acc, d) => ({
      required:
        maxRequirement(toRequirement(acc.required), toRequirement(d.required)) === "required",
      optionalIn: d.required ? acc.optionalIn : pushUnique(acc.optionalIn, d.source),
      requiredIn: d.required ? pushUnique(acc.requiredIn, d.source) : acc.requiredIn,
    }),
    EMPTY_MERGE
  );
}

export function promotionWarning(
  kind: DefinitionKind,
  name: string,
  scope: PromotionWarning["scope"],
  category: string,
  merge: RequirementMerge
): PromotionWarning | undefined {
  if (merge.optionalIn.length === 0 || merge.requiredIn.length === 0) return undefined;
  return {
    kind,
    name,
    scope,
    category,
    optionalIn: merge.optionalIn,
    requiredIn: merge.requiredIn,
    message:
      `${kind} "${name}" promoted to required ` +
      `(optional in ${merge.optionalIn.join(", ")}; required in ${merge.requiredIn.join(", ")})`,
  };
}

export interface MergedEntry<T> {
  value: T;
  /** Source of the first declaration: the owner */
  owner: string;
  /** Every distinct source that declared the name, in declaration order */
  contributors: string[];
}

export interface MergeResult<T> {
  entries: MergedEntry<T>[];
  warnings: PromotionWarning[];
}

/**
 * Collects declarations in order. The first declaration of a name fixes its
 * position, value and owner; later ones only feed the requirement merge.
 */
export class DeclarationMerger<T extends { name: string; required: boolean }> {
  private order: string[] = [];
  private first = new Map<string, { value: T; owner: string }>();
  private declarations = new Map<string, Declaration[]>();

  constructor(
    private readonly kind: DefinitionKind,
    private readonly scope: PromotionWarning["scope"]
  ) {}

  /** Returns true when the name was seen for the first time */
  add(source: string, value: T): boolean {
    const decl: Declaration = { source, required: value.required };
    const existing = this.declarations.get(value.name);
    if (existing) {
      existing.push(decl);
      return false;
    }
    this.order.push(value.name);
    this.first.set(value.name, { value, owner: source });
    this.declarations.set(value.name, [decl]);
    return true;
  }

  has(name: string): boolean {
    return this.declarations.has(name);
  }

  /**
   * @param warnFor - category a warning is filed under; defaults to the owner
   */
  finish(warnFor?: string): MergeResult<T> {
    const entries: MergedEntry<T>[] = [];
    const warnings: PromotionWarning[] = [];

    for (const name of this.order) {
      const first = this.first.get(name);
      const decls = this.declarations.get(name);
      if (!first || !decls) continue;

      const merge = mergeRequirement(decls);
      entries.push({
        value: { ...first.value, required: merge.required },
        owner: first.owner,
        contributors: decls.reduce<string[]>((acc, d) => pushUnique(acc, d.source), []),
      });

      const warning = promotionWarning(this.kind, name, this.scope, warnFor ?? first.owner, merge);
      if (warning) warnings.push(warning);
    }

    return { entries, warnings };
  }
}
