// src/core/errors.ts
// Error taxonomy for archive loading. Every error is fatal to the enclosing load.

/**
 * Diagnostic context attached to load errors.
 */
export interface ErrorContext {
  /** Archive being read ("constants", "data") */
  archive?: string;
  /** Byte offset inside the archive's instruction stream */
  offset?: number;
  /** Container record name */
  record?: string;
  /** Qualified type name */
  typeName?: string;
  /** Attribute name */
  attribute?: string;
}

export type LoadErrorCode =
  | "RECORD_NOT_FOUND"
  | "MALFORMED_ARCHIVE"
  | "UNRESOLVED_TYPE"
  | "TYPE_RECONCILIATION"
  | "MISSING_ATTRIBUTE"
  | "UNINITIALIZED_ATTRIBUTE"
  | "UNSUPPORTED_FORMAT"
  | "INVALID_CONFIG";

export class ArchiveLoadError extends Error {
  constructor(
    message: string,
    public readonly code: LoadErrorCode,
    public readonly context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ArchiveLoadError";
  }
}

export class RecordNotFoundError extends ArchiveLoadError {
  constructor(public readonly record: string) {
    super(`Record not found in container: ${record}`, "RECORD_NOT_FOUND", { record });
    this.name = "RecordNotFoundError";
  }
}

export class MalformedArchiveError extends ArchiveLoadError {
  constructor(detail: string, context: ErrorContext = {}) {
    super(formatMalformed(detail, context), "MALFORMED_ARCHIVE", context);
    this.name = "MalformedArchiveError";
  }
}

export class UnresolvedTypeError extends ArchiveLoadError {
  constructor(public readonly typeName: string, reason: string, cause?: unknown) {
    super(`Cannot resolve type '${typeName}': ${reason}`, "UNRESOLVED_TYPE", { typeName }, { cause });
    this.name = "UnresolvedTypeError";
  }
}

export class TypeReconciliationError extends ArchiveLoadError {
  constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly actual: string,
    typeName?: string
  ) {
    super(
      `Recorded state at ${path} is a ${actual}, which does not fit declared type '${expected}'` +
        (typeName ? ` (restoring '${typeName}')` : ""),
      "TYPE_RECONCILIATION",
      { typeName }
    );
    this.name = "TypeReconciliationError";
  }
}

export class MissingAttributeError extends ArchiveLoadError {
  constructor(public readonly attribute: string, public readonly typeName: string) {
    super(
      `State for '${typeName}' has no entry for attribute '${attribute}'`,
      "MISSING_ATTRIBUTE",
      { typeName, attribute }
    );
    this.name = "MissingAttributeError";
  }
}

export class UninitializedAttributeError extends ArchiveLoadError {
  constructor(
    public readonly attribute: string,
    public readonly declaredType: string,
    public readonly typeName: string
  ) {
    super(
      `The field '${attribute}' of '${typeName}' was left uninitialized after restoration, ` +
        `but expected a value of type '${declaredType}'`,
      "UNINITIALIZED_ATTRIBUTE",
      { typeName, attribute }
    );
    this.name = "UninitializedAttributeError";
  }
}

export class UnsupportedFormatError extends ArchiveLoadError {
  constructor(message: string) {
    super(message, "UNSUPPORTED_FORMAT");
    this.name = "UnsupportedFormatError";
  }
}

export class ConfigError extends ArchiveLoadError {
  constructor(public readonly problems: string[]) {
    super(`Invalid loader configuration: ${problems.join("; ")}`, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

function formatMalformed(detail: string, context: ErrorContext): string {
  const where: string[] = [];
  if (context.archive !== undefined) where.push(`archive '${context.archive}'`);
  if (context.offset !== undefined) where.push(`offset ${context.offset}`);
  if (context.typeName !== undefined) where.push(`type '${context.typeName}'`);
  return where.length > 0 ? `Malformed archive (${where.join(", ")}): ${detail}` : `Malformed archive: ${detail}`;
}
