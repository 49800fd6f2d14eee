import type { FileMetadataInput, FileNode, FolderNode, NamespaceNode } from "../../types/namespace";
import { fail, ok, type Result } from "./namespace.errors";

export const ROOT_NAME = "root";
export const PATH_SEPARATOR = "/";

export function createFolderNode(name: string): FolderNode {
  return {
    name,
    type: "folder",
    children: [],
    files: []
  };
}

export function createFileNode(name: string, metadata: FileMetadataInput = {}): FileNode {
  return {
    name,
    type: "file",
    author: metadata.author ?? "",
    fileType: (metadata.fileType ?? "").trim().toLowerCase(),
    tags: normalizeTags(metadata.tags),
    createdDate: metadata.createdDate ?? new Date().toISOString()
  };
}

/**
 * Splits the comma-separated tag form into trimmed, non-empty terms.
 * Arrays go through the same cleanup; order and duplicates are kept.
 */
export function parseTags(input: string): string[] {
  return normalizeTags(input.split(","));
}

function normalizeTags(tags: string[] | string | undefined): string[] {
  if (tags === undefined) {
    return [];
  }

  if (typeof tags === "string") {
    return parseTags(tags);
  }

  return tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
}

export function validateName(name: string, field: string): Result<string> {
  if (name.trim().length === 0) {
    return fail({ kind: "InvalidInput", field, reason: "empty" });
  }

  if (name.includes(PATH_SEPARATOR)) {
    return fail({ kind: "InvalidInput", field, reason: "contains-separator" });
  }

  return ok(name);
}

export function cloneNode<T extends NamespaceNode>(node: T): T;
export function cloneNode(node: NamespaceNode): NamespaceNode {
  if (node.type === "file") {
    return { ...node, tags: [...node.tags] };
  }

  return {
    name: node.name,
    type: "folder",
    children: node.children.map((child) => cloneNode(child)),
    files: node.files.map((file) => cloneNode(file))
  };
}

/** Counts the node itself plus every descendant folder and file. */
export function countNodes(node: NamespaceNode): number {
  if (node.type === "file") {
    return 1;
  }

  let total = 1 + node.files.length;
  for (const child of node.children) {
    total += countNodes(child);
  }
  return total;
}

export function sortFolderByName(folder: FolderNode): FolderNode {
  return {
    ...folder,
    children: [...folder.children]
      .sort((a, b) => a.name.localeCompare(b.name, "en"))
      .map((child) => sortFolderByName(child)),
    files: [...folder.files].sort((a, b) => a.name.localeCompare(b.name, "en"))
  };
}
