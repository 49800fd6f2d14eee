import { v4 as uuidv4 } from "uuid";
import type {
  DetachedItem,
  RecycleBinEntry,
  RecycleBinListing,
  RecycleBinRef
} from "../../types/namespace";
import { fail, ok, type Result } from "./namespace.errors";
import { countNodes } from "./node";
import type { TreeMutator } from "./tree-mutator";

export interface MovedIn {
  index: number;
  entry: RecycleBinEntry;
}

/**
 * Ordered store of detached items. Positions follow insertion order and
 * shift down whenever an earlier entry leaves the bin; entry ids never
 * change, so callers holding on to an entry across calls should use them.
 */
export class RecycleBin {
  private entries: RecycleBinEntry[] = [];
  private sequence = 0;

  constructor(private readonly mutator: TreeMutator) {}

  public get size(): number {
    return this.entries.length;
  }

  public get lastSequence(): number {
    return this.sequence;
  }

  public list(): RecycleBinListing[] {
    return this.entries.map((entry, index) => ({
      index,
      id: entry.id,
      name: entry.item.name,
      type: entry.item.type,
      originalPath: entry.originalPath,
      sequence: entry.sequence,
      deletedAt: entry.deletedAt,
      itemCount: countNodes(entry.item)
    }));
  }

  public getEntries(): readonly RecycleBinEntry[] {
    return this.entries;
  }

  public moveIn(detached: DetachedItem): MovedIn {
    this.sequence += 1;

    const entry: RecycleBinEntry = {
      id: uuidv4(),
      item: detached.item,
      originalPath: detached.originalPath,
      sequence: this.sequence,
      deletedAt: new Date().toISOString()
    };

    this.entries.push(entry);
    return { index: this.entries.length - 1, entry };
  }

  public restore(ref: RecycleBinRef): Result<RecycleBinEntry> {
    const position = this.locate(ref);
    if (!position.ok) {
      return position;
    }

    const entry = this.entries[position.value];
    const restored = this.mutator.restore(entry);
    if (!restored.ok) {
      return restored;
    }

    this.entries.splice(position.value, 1);
    return ok(entry);
  }

  public purge(ref: RecycleBinRef): Result<RecycleBinEntry> {
    const position = this.locate(ref);
    if (!position.ok) {
      return position;
    }

    const [entry] = this.entries.splice(position.value, 1);
    return ok(entry);
  }

  /** Drops every entry and returns how many were discarded. */
  public empty(): number {
    const discarded = this.entries.length;
    this.entries = [];
    return discarded;
  }

  public replaceEntries(entries: RecycleBinEntry[], sequence: number): void {
    this.entries = [...entries];
    this.sequence = Math.max(
      sequence,
      ...entries.map((entry) => entry.sequence),
      0
    );
  }

  private locate(ref: RecycleBinRef): Result<number> {
    if ("id" in ref) {
      const index = this.entries.findIndex((entry) => entry.id === ref.id);
      if (index === -1) {
        return fail({ kind: "NotFound", target: "entry", id: ref.id });
      }
      return ok(index);
    }

    if (!Number.isInteger(ref.index) || ref.index < 0 || ref.index >= this.entries.length) {
      return fail({ kind: "IndexOutOfRange", index: ref.index, size: this.entries.length });
    }

    return ok(ref.index);
  }
}
