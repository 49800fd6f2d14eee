import type { FileNode, FolderNode, SearchCriteria, SearchMatch } from "../../types/namespace";
import { fail, ok, type Result } from "./namespace.errors";
import { parseTags } from "./node";
import { joinPath } from "./path-resolver";

interface NormalizedCriteria {
  name?: string;
  author?: string;
  fileType?: string;
  tags?: string[];
}

function supplied(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim().toLowerCase();
  return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeCriteria(criteria: SearchCriteria): NormalizedCriteria {
  const tags = criteria.tags !== undefined ? parseTags(criteria.tags.toLowerCase()) : [];

  return {
    name: supplied(criteria.name),
    author: supplied(criteria.author),
    fileType: supplied(criteria.fileType),
    tags: tags.length > 0 ? tags : undefined
  };
}

function hasAnyCriterion(criteria: NormalizedCriteria): boolean {
  return (
    criteria.name !== undefined ||
    criteria.author !== undefined ||
    criteria.fileType !== undefined ||
    criteria.tags !== undefined
  );
}

function folderMatches(folder: FolderNode, criteria: NormalizedCriteria): boolean {
  // Folders carry no metadata, so any metadata criterion rules them out.
  if (criteria.author !== undefined || criteria.fileType !== undefined || criteria.tags !== undefined) {
    return false;
  }
  return criteria.name !== undefined && folder.name.toLowerCase().includes(criteria.name);
}

function fileMatches(file: FileNode, criteria: NormalizedCriteria): boolean {
  if (criteria.name !== undefined && !file.name.toLowerCase().includes(criteria.name)) {
    return false;
  }

  if (criteria.author !== undefined && !file.author.toLowerCase().includes(criteria.author)) {
    return false;
  }

  if (criteria.fileType !== undefined && file.fileType.toLowerCase() !== criteria.fileType) {
    return false;
  }

  if (criteria.tags !== undefined) {
    const fileTags = new Set(file.tags.map((tag) => tag.toLowerCase()));
    if (!criteria.tags.some((tag) => fileTags.has(tag))) {
      return false;
    }
  }

  return true;
}

/**
 * Pre-order walk of the live tree: a folder, then its files in stored
 * order, then each child folder in stored order.
 */
export function searchTree(root: FolderNode, criteria: SearchCriteria): Result<SearchMatch[]> {
  const normalized = normalizeCriteria(criteria);

  if (!hasAnyCriterion(normalized)) {
    return fail({ kind: "InvalidQuery", reason: "no-criteria" });
  }

  const matches: SearchMatch[] = [];

  const visit = (folder: FolderNode, segments: string[]): void => {
    if (folderMatches(folder, normalized)) {
      matches.push({ name: folder.name, type: "folder", fullPath: joinPath(segments) });
    }

    for (const file of folder.files) {
      if (fileMatches(file, normalized)) {
        matches.push({
          name: file.name,
          type: "file",
          fullPath: joinPath([...segments, file.name]),
          author: file.author,
          fileType: file.fileType,
          tags: [...file.tags]
        });
      }
    }

    for (const child of folder.children) {
      visit(child, [...segments, child.name]);
    }
  };

  visit(root, [root.name]);
  return ok(matches);
}
