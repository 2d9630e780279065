/**
 * Error taxonomy.
 * Fatal conditions are thrown and abort the whole request; promotion
 * warnings are returned as values alongside a successful result.
 */

export enum ErrorCode {
  // Resolution (E001–E099)
  UNKNOWN_CATEGORY = "E001",
  CYCLIC_INHERITANCE = "E002",
  EMPTY_SELECTION = "E003",

  // Schema documents (E100–E199)
  SCHEMA_PARSE_FAILED = "E100",
  INVALID_SCHEMA_STRUCTURE = "E101",

  // Configuration (E200–E299)
  CONFIGURATION_ERROR = "E200",

  // Output (E300–E399)
  UNSAFE_OUTPUT_PATH = "E300",
}

export const EXIT_CODES = {
  [ErrorCode.UNKNOWN_CATEGORY]: 10,
  [ErrorCode.CYCLIC_INHERITANCE]: 11,
  [ErrorCode.EMPTY_SELECTION]: 12,
  [ErrorCode.SCHEMA_PARSE_FAILED]: 20,
  [ErrorCode.INVALID_SCHEMA_STRUCTURE]: 21,
  [ErrorCode.CONFIGURATION_ERROR]: 30,
  [ErrorCode.UNSAFE_OUTPUT_PATH]: 40,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  context?: Record<string, unknown>;
}

export abstract class SchemaWeaveError extends Error {
  readonly errorCode: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    errorCode: ErrorCode;
    context?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.name = this.constructor.name;
    this.errorCode = params.errorCode;
    this.context = params.context;
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      context: this.context,
    };
  }

  getExitCode(): number {
    return getExitCode(this.errorCode);
  }
}

export class UnknownCategoryError extends SchemaWeaveError {
  readonly category: string;
  /** Set when the missing category was reached as someone's parent */
  readonly referencedBy?: string;

  constructor(category: string, referencedBy?: string) {
    super({
      message: referencedBy
        ? `Unknown category "${category}" (parent of "${referencedBy}")`
        : `Unknown category "${category}"`,
      errorCode: ErrorCode.UNKNOWN_CATEGORY,
      context: { category, referencedBy },
    });
    this.category = category;
    this.referencedBy = referencedBy;
  }
}

export class CyclicInheritanceError extends SchemaWeaveError {
  /** The chain as walked, ending with the repeated category */
  readonly chain: string[];

  constructor(chain: string[]) {
    super({
      message: `Cyclic inheritance: ${chain.join(" -> ")}`,
      errorCode: ErrorCode.CYCLIC_INHERITANCE,
      context: { chain },
    });
    this.chain = chain;
  }
}

export class EmptySelectionError extends SchemaWeaveError {
  constructor() {
    super({
      message: "No categories selected",
      errorCode: ErrorCode.EMPTY_SELECTION,
    });
  }
}

export class SchemaParseError extends SchemaWeaveError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super({ message, errorCode: ErrorCode.SCHEMA_PARSE_FAILED, context, cause });
  }
}

export class InvalidSchemaError extends SchemaWeaveError {
  readonly issues: string[];

  constructor(issues: string[], source?: string) {
    super({
      message: `Invalid schema${source ? ` in ${source}` : ""}: ${issues.join("; ")}`,
      errorCode: ErrorCode.INVALID_SCHEMA_STRUCTURE,
      context: { issues, source },
    });
    this.issues = issues;
  }
}

export class ConfigError extends SchemaWeaveError {
  constructor(message: string, cause?: unknown) {
    super({ message, errorCode: ErrorCode.CONFIGURATION_ERROR, cause });
  }
}

/** An artifact title that would resolve outside the output directory */
export class UnsafeOutputPathError extends SchemaWeaveError {
  constructor(title: string, reason: string) {
    super({
      message: `Unsafe artifact title "${title}": ${reason}`,
      errorCode: ErrorCode.UNSAFE_OUTPUT_PATH,
      context: { title },
    });
  }
}

export function isSchemaWeaveError(e: unknown): e is SchemaWeaveError {
  return e instanceof SchemaWeaveError;
}
