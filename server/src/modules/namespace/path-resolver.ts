import type { FolderNode } from "../../types/namespace";
import { fail, ok, type Result } from "./namespace.errors";
import { PATH_SEPARATOR, ROOT_NAME } from "./node";

export function splitPath(path: string): string[] {
  return path.split(PATH_SEPARATOR).filter((segment) => segment.length > 0);
}

export function joinPath(segments: readonly string[]): string {
  return `${PATH_SEPARATOR}${segments.join(PATH_SEPARATOR)}`;
}

/** Canonical form of a path: leading slash, no empty segments. */
export function normalizePath(path: string): string {
  return joinPath(splitPath(path));
}

export function childPath(parentPath: string, name: string): string {
  return joinPath([...splitPath(parentPath), name]);
}

/** Returns null for paths with fewer than two segments, which have no parent. */
export function parentPathOf(path: string): string | null {
  const segments = splitPath(path);
  if (segments.length < 2) {
    return null;
  }
  return joinPath(segments.slice(0, -1));
}

export function lastSegmentOf(path: string): string | null {
  const segments = splitPath(path);
  return segments.length > 0 ? segments[segments.length - 1] : null;
}

export function isRootPath(path: string): boolean {
  const segments = splitPath(path);
  return segments.length === 1 && segments[0] === ROOT_NAME;
}

/**
 * Walks folder names from the root. Only child folders take part in
 * resolution; files are looked up by name in the folder this returns.
 */
export function resolveFolder(root: FolderNode, path: string): Result<FolderNode> {
  const segments = splitPath(path);

  if (segments.length === 0) {
    return fail({ kind: "NotFound", target: "path", path, segment: null, depth: 0 });
  }

  if (segments[0] !== root.name) {
    return fail({ kind: "NotFound", target: "path", path, segment: segments[0], depth: 0 });
  }

  let current = root;
  for (let depth = 1; depth < segments.length; depth += 1) {
    const segment = segments[depth];
    const next = current.children.find((child) => child.name === segment);

    if (!next) {
      return fail({ kind: "NotFound", target: "path", path, segment, depth });
    }

    current = next;
  }

  return ok(current);
}
