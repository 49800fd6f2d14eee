import type { FastifyBaseLogger } from "fastify";
import type {
  FileLocation,
  FileMetadataInput,
  FileNode,
  FolderNode,
  NamespaceNode,
  NamespaceNodeType,
  NamespaceState,
  RecycleBinListing,
  RecycleBinRef,
  SearchCriteria,
  SearchMatch,
  TreeChangeAction,
  TreeChangeEvent
} from "../../types/namespace";
import { NamespaceCorruptionError, ok, type Result } from "./namespace.errors";
import { ROOT_NAME, cloneNode, countNodes, createFolderNode, sortFolderByName } from "./node";
import { lastSegmentOf, parentPathOf } from "./path-resolver";
import { RecycleBin } from "./recycle-bin";
import { searchTree } from "./search";
import { TreeMutator } from "./tree-mutator";

export type TreeChangeListener = (event: TreeChangeEvent) => void;

export interface NamespaceServiceOptions {
  log: FastifyBaseLogger;
}

export interface TreeOptions {
  sortByName?: boolean;
}

export interface RecycleBinItemSummary {
  id: string;
  name: string;
  type: NamespaceNodeType;
  originalPath: string;
}

export interface NamespaceStats {
  liveNodes: number;
  binnedNodes: number;
  binEntries: number;
}

function assertUniqueNames(folder: FolderNode, path: string): void {
  const folderNames = new Set<string>();
  for (const child of folder.children) {
    if (folderNames.has(child.name)) {
      throw new NamespaceCorruptionError(`Folder "${path}" holds two folders named "${child.name}".`);
    }
    folderNames.add(child.name);
    assertUniqueNames(child, `${path}/${child.name}`);
  }

  const fileNames = new Set<string>();
  for (const file of folder.files) {
    if (fileNames.has(file.name)) {
      throw new NamespaceCorruptionError(`Folder "${path}" holds two files named "${file.name}".`);
    }
    fileNames.add(file.name);
  }
}

/**
 * Sole owner of the live tree and the recycle bin. Every operation runs
 * synchronously to completion, so the two structures change together or
 * not at all.
 */
export class NamespaceService {
  private root: FolderNode = createFolderNode(ROOT_NAME);
  private mutator = new TreeMutator(this.root);
  private bin = new RecycleBin(this.mutator);
  private readonly listeners = new Set<TreeChangeListener>();
  private readonly log: FastifyBaseLogger;

  constructor(options: NamespaceServiceOptions) {
    this.log = options.log.child({ module: "namespace-service" });
  }

  public getTree(options: TreeOptions = {}): FolderNode {
    const snapshot = cloneNode(this.root);
    return options.sortByName ? sortFolderByName(snapshot) : snapshot;
  }

  public createFolder(parentPath: string, folderName: string): Result<{ folder: FolderNode; path: string }> {
    const created = this.mutator.createFolder(parentPath, folderName);
    if (!created.ok) {
      return created;
    }

    this.emit("folder-created", created.value.path, "folder");
    return ok({ folder: cloneNode(created.value.folder), path: created.value.path });
  }

  public deleteFolder(parentPath: string, folderName: string): Result<RecycleBinListing> {
    const detached = this.mutator.deleteFolder(parentPath, folderName);
    if (!detached.ok) {
      return detached;
    }

    return ok(this.moveToBin(detached.value.item, detached.value.originalPath, "folder-deleted"));
  }

  public addFile(
    parentPath: string,
    fileName: string,
    metadata: FileMetadataInput = {}
  ): Result<{ file: FileNode; path: string }> {
    const added = this.mutator.addFile(parentPath, fileName, metadata);
    if (!added.ok) {
      return added;
    }

    this.emit("file-added", added.value.path, "file");
    return ok({ file: cloneNode(added.value.file), path: added.value.path });
  }

  public deleteFile(parentPath: string, fileName: string): Result<RecycleBinListing> {
    const detached = this.mutator.deleteFile(parentPath, fileName);
    if (!detached.ok) {
      return detached;
    }

    return ok(this.moveToBin(detached.value.item, detached.value.originalPath, "file-deleted"));
  }

  public lookupFile(parentPath: string, fileName: string): Result<FileLocation> {
    const located = this.mutator.lookupFile(parentPath, fileName);
    if (!located.ok) {
      return located;
    }

    return ok({ file: cloneNode(located.value.file), fullPath: located.value.fullPath });
  }

  public search(criteria: SearchCriteria): Result<SearchMatch[]> {
    return searchTree(this.root, criteria);
  }

  public listRecycleBin(): RecycleBinListing[] {
    return this.bin.list();
  }

  public restoreFromRecycleBin(ref: RecycleBinRef): Result<RecycleBinItemSummary> {
    const restored = this.bin.restore(ref);
    if (!restored.ok) {
      return restored;
    }

    const summary = this.summarize(restored.value);
    this.log.info(
      { event: "bin-restore", id: summary.id, path: summary.originalPath },
      "Item restored from recycle bin"
    );
    this.emit("item-restored", summary.originalPath, summary.type);
    return ok(summary);
  }

  public permanentlyDelete(ref: RecycleBinRef): Result<RecycleBinItemSummary> {
    const purged = this.bin.purge(ref);
    if (!purged.ok) {
      return purged;
    }

    const summary = this.summarize(purged.value);
    this.log.info(
      { event: "bin-purge", id: summary.id, path: summary.originalPath },
      "Item permanently deleted"
    );
    this.emit("item-purged", summary.originalPath, summary.type);
    return ok(summary);
  }

  public emptyRecycleBin(): number {
    const discarded = this.bin.empty();
    this.log.info({ event: "bin-empty", discarded }, "Recycle bin emptied");
    this.emit("bin-emptied", "", "bin");
    return discarded;
  }

  public stats(): NamespaceStats {
    return {
      liveNodes: countNodes(this.root),
      binnedNodes: this.bin.getEntries().reduce((total, entry) => total + countNodes(entry.item), 0),
      binEntries: this.bin.size
    };
  }

  public exportState(): NamespaceState {
    return {
      root: cloneNode(this.root),
      recycleBin: this.bin.getEntries().map((entry) => ({ ...entry, item: cloneNode(entry.item) })),
      sequence: this.bin.lastSequence
    };
  }

  /** Replaces the whole state. Throws NamespaceCorruptionError and keeps the current state when the input breaks a tree invariant. */
  public importState(state: NamespaceState): void {
    if (state.root.name !== ROOT_NAME) {
      throw new NamespaceCorruptionError(`Imported root is named "${state.root.name}".`);
    }
    assertUniqueNames(state.root, `/${ROOT_NAME}`);

    for (const entry of state.recycleBin) {
      if (parentPathOf(entry.originalPath) === null) {
        throw new NamespaceCorruptionError(
          `Recycle bin entry ${entry.id} has no parent in "${entry.originalPath}".`
        );
      }
      if (lastSegmentOf(entry.originalPath) !== entry.item.name) {
        throw new NamespaceCorruptionError(
          `Recycle bin entry ${entry.id} holds "${entry.item.name}" but records "${entry.originalPath}".`
        );
      }
      if (entry.item.type === "folder") {
        assertUniqueNames(entry.item, entry.originalPath);
      }
    }

    const root = cloneNode(state.root);
    const mutator = new TreeMutator(root);
    const bin = new RecycleBin(mutator);
    bin.replaceEntries(
      state.recycleBin.map((entry) => ({ ...entry, item: cloneNode(entry.item) })),
      state.sequence
    );

    this.root = root;
    this.mutator = mutator;
    this.bin = bin;

    this.log.info(
      { event: "state-imported", binEntries: bin.size },
      "Namespace state replaced"
    );
    this.emit("state-imported", `/${ROOT_NAME}`, "folder");
  }

  public onChange(listener: TreeChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private moveToBin(item: NamespaceNode, originalPath: string, action: TreeChangeAction): RecycleBinListing {
    const { index, entry } = this.bin.moveIn({ item, originalPath });
    const listing: RecycleBinListing = {
      index,
      id: entry.id,
      name: item.name,
      type: item.type,
      originalPath,
      sequence: entry.sequence,
      deletedAt: entry.deletedAt,
      itemCount: countNodes(item)
    };

    this.log.info(
      { event: "bin-move-in", id: entry.id, path: originalPath, itemCount: listing.itemCount },
      "Item moved to recycle bin"
    );
    this.emit(action, originalPath, item.type);
    return listing;
  }

  private summarize(entry: { id: string; item: NamespaceNode; originalPath: string }): RecycleBinItemSummary {
    return {
      id: entry.id,
      name: entry.item.name,
      type: entry.item.type,
      originalPath: entry.originalPath
    };
  }

  private emit(action: TreeChangeAction, path: string, type: TreeChangeEvent["type"]): void {
    const event: TreeChangeEvent = { action, path, type, timestamp: Date.now() };

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.error({ err: error, action, path }, "Tree change listener failed");
      }
    }
  }
}
