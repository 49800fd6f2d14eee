import type { NamespaceNodeType } from "../../types/namespace";

export type NamespaceFailureKind =
  | "NotFound"
  | "ParentNotFound"
  | "DuplicateName"
  | "ForbiddenOperation"
  | "OriginalLocationMissing"
  | "IndexOutOfRange"
  | "InvalidQuery"
  | "InvalidInput";

export type NotFoundFailure =
  | {
      kind: "NotFound";
      target: "path";
      path: string;
      /** First segment that did not resolve, null when the path had no segments. */
      segment: string | null;
      depth: number;
    }
  | {
      kind: "NotFound";
      target: NamespaceNodeType;
      path: string;
      name: string;
    }
  | {
      kind: "NotFound";
      target: "entry";
      id: string;
    };

export interface ParentNotFoundFailure {
  kind: "ParentNotFound";
  path: string;
  segment: string | null;
  depth: number;
}

export interface DuplicateNameFailure {
  kind: "DuplicateName";
  path: string;
  name: string;
  nodeType: NamespaceNodeType;
}

export interface ForbiddenOperationFailure {
  kind: "ForbiddenOperation";
  operation: "delete-root" | "create-reserved-name";
  path: string;
  name: string;
}

export interface OriginalLocationMissingFailure {
  kind: "OriginalLocationMissing";
  originalPath: string;
  parentPath: string;
}

export interface IndexOutOfRangeFailure {
  kind: "IndexOutOfRange";
  index: number;
  size: number;
}

export interface InvalidQueryFailure {
  kind: "InvalidQuery";
  reason: "no-criteria";
}

export interface InvalidInputFailure {
  kind: "InvalidInput";
  field: string;
  reason: "empty" | "contains-separator";
}

export type NamespaceFailure =
  | NotFoundFailure
  | ParentNotFoundFailure
  | DuplicateNameFailure
  | ForbiddenOperationFailure
  | OriginalLocationMissingFailure
  | IndexOutOfRangeFailure
  | InvalidQueryFailure
  | InvalidInputFailure;

export type Result<T> = { ok: true; value: T } | { ok: false; error: NamespaceFailure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: NamespaceFailure): Result<T> {
  return { ok: false, error };
}

/**
 * Raised only when the tree or the recycle bin is found in a state the
 * engine could not have produced itself, e.g. an entry whose recorded path
 * has no parent or a snapshot that does not describe a tree.
 */
export class NamespaceCorruptionError extends Error {
  public readonly code = "E_NAMESPACE_CORRUPT";
  public override readonly name = "NamespaceCorruptionError";

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

export function isNamespaceCorruptionError(error: unknown): error is NamespaceCorruptionError {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error as NamespaceCorruptionError).name === "NamespaceCorruptionError"
  );
}
