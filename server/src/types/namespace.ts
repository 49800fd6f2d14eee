export type NamespaceNodeType = "folder" | "file";

export interface FileNode {
  name: string;
  type: "file";
  author: string;
  fileType: string;
  tags: string[];
  createdDate: string;
}

export interface FolderNode {
  name: string;
  type: "folder";
  children: FolderNode[];
  files: FileNode[];
}

export type NamespaceNode = FolderNode | FileNode;

export interface FileMetadataInput {
  author?: string;
  fileType?: string;
  /** Either a list of tags or the comma-separated form accepted at the boundary. */
  tags?: string[] | string;
  createdDate?: string;
}

export interface DetachedItem<T extends NamespaceNode = NamespaceNode> {
  item: T;
  originalPath: string;
}

export interface RecycleBinEntry {
  id: string;
  item: NamespaceNode;
  originalPath: string;
  sequence: number;
  deletedAt: string;
}

export type RecycleBinRef = { index: number } | { id: string };

export interface RecycleBinListing {
  index: number;
  id: string;
  name: string;
  type: NamespaceNodeType;
  originalPath: string;
  sequence: number;
  deletedAt: string;
  itemCount: number;
}

export interface SearchCriteria {
  name?: string;
  author?: string;
  tags?: string;
  fileType?: string;
}

export interface SearchMatch {
  name: string;
  type: NamespaceNodeType;
  fullPath: string;
  author?: string;
  fileType?: string;
  tags?: string[];
}

export interface FileLocation {
  file: FileNode;
  fullPath: string;
}

export type TreeChangeAction =
  | "folder-created"
  | "folder-deleted"
  | "file-added"
  | "file-deleted"
  | "item-restored"
  | "item-purged"
  | "bin-emptied"
  | "state-imported";

export interface TreeChangeEvent {
  action: TreeChangeAction;
  path: string;
  type: NamespaceNodeType | "bin";
  timestamp: number;
}

export interface NamespaceState {
  root: FolderNode;
  recycleBin: RecycleBinEntry[];
  sequence: number;
}
