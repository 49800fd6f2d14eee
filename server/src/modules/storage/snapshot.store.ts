import DatabaseConstructor from "better-sqlite3";
import type { Database as BetterSqliteDatabase, Statement } from "better-sqlite3";
import fs from "node:fs/promises";
import path from "node:path";
import type { NamespaceState } from "../../types/namespace";
import { NamespaceStateSchema } from "../namespace/namespace.schemas";
import { NamespaceCorruptionError } from "../namespace/namespace.errors";

const SNAPSHOT_KEY = "namespace";
const IN_MEMORY = ":memory:";

interface SnapshotRow {
  payload: string;
  saved_at: string;
}

type PreparedStatements = {
  selectSnapshot: Statement<[string], SnapshotRow>;
  upsertSnapshot: Statement<[string, string, string]>;
};

export function parseSnapshot(payload: string): NamespaceState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    throw new NamespaceCorruptionError("Stored snapshot is not valid JSON.", error);
  }

  const result = NamespaceStateSchema.safeParse(parsed);
  if (!result.success) {
    throw new NamespaceCorruptionError(
      `Stored snapshot does not describe a namespace: ${result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
        .join("; ")}`,
      result.error
    );
  }

  return result.data;
}

/**
 * Keeps the latest namespace state as a single JSON row. The engine stays
 * memory-resident; this store only reloads it on start.
 */
export class SnapshotStore {
  private db: BetterSqliteDatabase | null = null;
  private statements: PreparedStatements | null = null;
  private readonly initPromise: Promise<void>;

  constructor(private readonly dbPath: string) {
    this.initPromise = this.initialize();
  }

  async load(): Promise<NamespaceState | null> {
    await this.ensureInitialized();
    const row = this.getStatements().selectSnapshot.get(SNAPSHOT_KEY);
    return row ? parseSnapshot(row.payload) : null;
  }

  async save(state: NamespaceState): Promise<void> {
    await this.ensureInitialized();
    this.getStatements().upsertSnapshot.run(
      SNAPSHOT_KEY,
      JSON.stringify(state),
      new Date().toISOString()
    );
  }

  async close(): Promise<void> {
    await this.ensureInitialized();
    this.getDb().close();
    this.db = null;
    this.statements = null;
  }

  private async initialize(): Promise<void> {
    if (this.dbPath !== IN_MEMORY) {
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
    }

    const db = new DatabaseConstructor(this.dbPath);
    db.pragma("journal_mode = WAL");

    this.db = db;
    this.createSchema(db);
    this.statements = this.prepareStatements(db);
  }

  private getDb(): BetterSqliteDatabase {
    if (!this.db) {
      throw new Error("SnapshotStore is not initialized");
    }
    return this.db;
  }

  private getStatements(): PreparedStatements {
    if (!this.statements) {
      throw new Error("SnapshotStore statements are not prepared");
    }
    return this.statements;
  }

  private async ensureInitialized(): Promise<void> {
    await this.initPromise;
  }

  private createSchema(db: BetterSqliteDatabase): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS namespace_snapshots (
        key TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        saved_at TEXT NOT NULL
      );
    `);
  }

  private prepareStatements(db: BetterSqliteDatabase): PreparedStatements {
    return {
      selectSnapshot: db.prepare(`
        SELECT payload, saved_at
        FROM namespace_snapshots
        WHERE key = ?
      `),
      upsertSnapshot: db.prepare(`
        INSERT INTO namespace_snapshots (key, payload, saved_at)
        VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET payload = excluded.payload, saved_at = excluded.saved_at
      `)
    };
  }
}
