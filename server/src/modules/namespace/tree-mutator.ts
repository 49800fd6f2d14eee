import type {
  DetachedItem,
  FileLocation,
  FileMetadataInput,
  FileNode,
  FolderNode
} from "../../types/namespace";
import { NamespaceCorruptionError, fail, ok, type Result } from "./namespace.errors";
import { ROOT_NAME, createFileNode, createFolderNode, validateName } from "./node";
import {
  childPath,
  isRootPath,
  lastSegmentOf,
  normalizePath,
  parentPathOf,
  resolveFolder,
  splitPath
} from "./path-resolver";

export interface CreatedFolder {
  folder: FolderNode;
  path: string;
}

export interface AddedFile {
  file: FileNode;
  path: string;
}

function compareNames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function binarySearchByName(sortedFiles: readonly FileNode[], name: string): FileNode | undefined {
  let low = 0;
  let high = sortedFiles.length - 1;

  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    const order = compareNames(sortedFiles[mid].name, name);

    if (order === 0) {
      return sortedFiles[mid];
    }

    if (order < 0) {
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return undefined;
}

/**
 * Structural edits on a tree rooted at a single folder. Every method leaves
 * the tree untouched when it returns a failure.
 */
export class TreeMutator {
  constructor(private readonly root: FolderNode) {}

  public createFolder(parentPath: string, folderName: string): Result<CreatedFolder> {
    const validName = validateName(folderName, "folderName");
    if (!validName.ok) {
      return validName;
    }

    if (isRootPath(parentPath) && folderName === ROOT_NAME) {
      return fail({
        kind: "ForbiddenOperation",
        operation: "create-reserved-name",
        path: normalizePath(parentPath),
        name: folderName
      });
    }

    const parent = this.resolveParent(parentPath);
    if (!parent.ok) {
      return parent;
    }

    if (parent.value.children.some((child) => child.name === folderName)) {
      return fail({
        kind: "DuplicateName",
        path: normalizePath(parentPath),
        name: folderName,
        nodeType: "folder"
      });
    }

    const folder = createFolderNode(folderName);
    parent.value.children.push(folder);

    return ok({ folder, path: childPath(parentPath, folderName) });
  }

  public deleteFolder(parentPath: string, folderName: string): Result<DetachedItem<FolderNode>> {
    const segments = splitPath(parentPath);
    if (folderName === ROOT_NAME && (segments.length === 0 || isRootPath(parentPath))) {
      return fail({
        kind: "ForbiddenOperation",
        operation: "delete-root",
        path: normalizePath(parentPath),
        name: folderName
      });
    }

    const validName = validateName(folderName, "folderName");
    if (!validName.ok) {
      return validName;
    }

    const parent = this.resolveParent(parentPath);
    if (!parent.ok) {
      return parent;
    }

    const index = parent.value.children.findIndex((child) => child.name === folderName);
    if (index === -1) {
      return fail({
        kind: "NotFound",
        target: "folder",
        path: normalizePath(parentPath),
        name: folderName
      });
    }

    const [item] = parent.value.children.splice(index, 1);
    return ok({ item, originalPath: childPath(parentPath, folderName) });
  }

  public addFile(
    parentPath: string,
    fileName: string,
    metadata: FileMetadataInput = {}
  ): Result<AddedFile> {
    const validName = validateName(fileName, "fileName");
    if (!validName.ok) {
      return validName;
    }

    const parent = this.resolveParent(parentPath);
    if (!parent.ok) {
      return parent;
    }

    if (parent.value.files.some((file) => file.name === fileName)) {
      return fail({
        kind: "DuplicateName",
        path: normalizePath(parentPath),
        name: fileName,
        nodeType: "file"
      });
    }

    const file = createFileNode(fileName, metadata);
    parent.value.files.push(file);

    return ok({ file, path: childPath(parentPath, fileName) });
  }

  public deleteFile(parentPath: string, fileName: string): Result<DetachedItem<FileNode>> {
    const validName = validateName(fileName, "fileName");
    if (!validName.ok) {
      return validName;
    }

    const parent = this.resolveParent(parentPath);
    if (!parent.ok) {
      return parent;
    }

    const index = parent.value.files.findIndex((file) => file.name === fileName);
    if (index === -1) {
      return fail({
        kind: "NotFound",
        target: "file",
        path: normalizePath(parentPath),
        name: fileName
      });
    }

    const [item] = parent.value.files.splice(index, 1);
    return ok({ item, originalPath: childPath(parentPath, fileName) });
  }

  /**
   * Re-attaches a detached item under the parent recorded in its original
   * path. Only the immediate parent is looked up; a missing ancestor
   * anywhere above it surfaces the same way.
   */
  public restore(detached: DetachedItem): Result<DetachedItem> {
    const { item, originalPath } = detached;
    const parentPath = parentPathOf(originalPath);

    if (parentPath === null || lastSegmentOf(originalPath) !== item.name) {
      throw new NamespaceCorruptionError(
        `Recorded path "${originalPath}" does not locate an item named "${item.name}".`
      );
    }

    const parent = resolveFolder(this.root, parentPath);
    if (!parent.ok) {
      return fail({ kind: "OriginalLocationMissing", originalPath, parentPath });
    }

    const siblings: ReadonlyArray<{ name: string }> =
      item.type === "folder" ? parent.value.children : parent.value.files;

    if (siblings.some((sibling) => sibling.name === item.name)) {
      return fail({
        kind: "DuplicateName",
        path: parentPath,
        name: item.name,
        nodeType: item.type
      });
    }

    if (item.type === "folder") {
      parent.value.children.push(item);
    } else {
      parent.value.files.push(item);
    }

    return ok({ item, originalPath: normalizePath(originalPath) });
  }

  public lookupFile(parentPath: string, fileName: string): Result<FileLocation> {
    const validName = validateName(fileName, "fileName");
    if (!validName.ok) {
      return validName;
    }

    const parent = this.resolveParent(parentPath);
    if (!parent.ok) {
      return parent;
    }

    const sorted = [...parent.value.files].sort((a, b) => compareNames(a.name, b.name));
    const file = binarySearchByName(sorted, fileName);

    if (!file) {
      return fail({
        kind: "NotFound",
        target: "file",
        path: normalizePath(parentPath),
        name: fileName
      });
    }

    return ok({ file, fullPath: childPath(parentPath, fileName) });
  }

  private resolveParent(parentPath: string): Result<FolderNode> {
    const resolved = resolveFolder(this.root, parentPath);
    if (resolved.ok) {
      return resolved;
    }

    const failure = resolved.error;
    if (failure.kind === "NotFound" && failure.target === "path") {
      return fail({
        kind: "ParentNotFound",
        path: failure.path,
        segment: failure.segment,
        depth: failure.depth
      });
    }

    return resolved;
  }
}
