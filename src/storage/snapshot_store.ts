/**
 * @fileoverview Named workbench snapshots in SQLite
 *
 * Each row holds one serialized WorkbenchSnapshot under a caller-chosen
 * name. Saving under an existing name replaces it. Loads go through the same
 * validation as file imports.
 *
 * @packageDocumentation
 */

import { mkdirSync } from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { ValidationError } from '../core/errors.js';
import { deserializeSnapshot, serializeSnapshot, type WorkbenchSnapshot } from '../persistence/snapshot.js';
import { logDebug } from '../telemetry/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export interface StoredSnapshotInfo {
  name: string;
  /** ISO timestamp of the last save */
  savedAt: string;
  version: number;
  atoms: number;
  links: number;
  tasks: number;
  sizeBytes: number;
}

export interface SnapshotStoreOptions {
  /** Clock for `savedAt`; tests pin it */
  now?: () => Date;
}

interface SnapshotRow {
  name: string;
  saved_at: string;
  version: number;
  atoms: number;
  links: number;
  tasks: number;
  size_bytes: number;
}

interface PayloadRow {
  payload: string;
}

// ============================================================================
// STORE
// ============================================================================

export class SnapshotStore {
  private readonly now: () => Date;

  private readonly stmtUpsert: Database.Statement<[string, string, number, number, number, number, number, string]>;
  private readonly stmtLoad: Database.Statement<[string], PayloadRow>;
  private readonly stmtInfo: Database.Statement<[string], SnapshotRow>;
  private readonly stmtList: Database.Statement<[], SnapshotRow>;
  private readonly stmtDelete: Database.Statement<[string]>;

  constructor(private readonly db: Database.Database, options: SnapshotStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.ensureTable();

    this.stmtUpsert = this.db.prepare<[string, string, number, number, number, number, number, string]>(`
      INSERT INTO workbench_snapshots (name, saved_at, version, atoms, links, tasks, size_bytes, payload)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET
        saved_at = excluded.saved_at,
        version = excluded.version,
        atoms = excluded.atoms,
        links = excluded.links,
        tasks = excluded.tasks,
        size_bytes = excluded.size_bytes,
        payload = excluded.payload
    `);

    this.stmtLoad = this.db.prepare<[string], PayloadRow>(`
      SELECT payload FROM workbench_snapshots WHERE name = ?
    `);

    this.stmtInfo = this.db.prepare<[string], SnapshotRow>(`
      SELECT name, saved_at, version, atoms, links, tasks, size_bytes
      FROM workbench_snapshots WHERE name = ?
    `);

    this.stmtList = this.db.prepare<[], SnapshotRow>(`
      SELECT name, saved_at, version, atoms, links, tasks, size_bytes
      FROM workbench_snapshots
      ORDER BY saved_at DESC, name ASC
    `);

    this.stmtDelete = this.db.prepare<[string]>(`
      DELETE FROM workbench_snapshots WHERE name = ?
    `);
  }

  /**
   * Open (creating if needed) a database file. `:memory:` opens a private
   * in-memory database.
   */
  static open(dbPath: string, options: SnapshotStoreOptions = {}): SnapshotStore {
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
    return new SnapshotStore(db, options);
  }

  private ensureTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS workbench_snapshots (
        name TEXT PRIMARY KEY,
        saved_at TEXT NOT NULL,
        version INTEGER NOT NULL,
        atoms INTEGER NOT NULL,
        links INTEGER NOT NULL,
        tasks INTEGER NOT NULL,
        size_bytes INTEGER NOT NULL,
        payload TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_workbench_snapshots_saved_at ON workbench_snapshots(saved_at);
    `);
  }

  async save(name: string, snapshot: WorkbenchSnapshot): Promise<StoredSnapshotInfo> {
    assertName(name);
    const payload = serializeSnapshot(snapshot);
    const savedAt = this.now().toISOString();
    this.stmtUpsert.run(
      name,
      savedAt,
      snapshot.version,
      snapshot.graph.atoms.length,
      snapshot.graph.links.length,
      snapshot.scheduler.tasks.length,
      Buffer.byteLength(payload, 'utf8'),
      payload,
    );
    logDebug('[storage] snapshot saved', { name, savedAt });
    return this.requireInfo(name);
  }

  /**
   * The named snapshot, validated; undefined when no such name exists.
   */
  async load(name: string): Promise<WorkbenchSnapshot | undefined> {
    const row = this.stmtLoad.get(name);
    return row ? deserializeSnapshot(row.payload) : undefined;
  }

  async info(name: string): Promise<StoredSnapshotInfo | undefined> {
    const row = this.stmtInfo.get(name);
    return row ? toInfo(row) : undefined;
  }

  /** Most recently saved first */
  async list(): Promise<StoredSnapshotInfo[]> {
    return this.stmtList.all().map(toInfo);
  }

  async delete(name: string): Promise<boolean> {
    return this.stmtDelete.run(name).changes > 0;
  }

  close(): void {
    this.db.close();
  }

  private requireInfo(name: string): StoredSnapshotInfo {
    const row = this.stmtInfo.get(name);
    if (!row) {
      throw new ValidationError('snapshot.name', 'a stored snapshot', name);
    }
    return toInfo(row);
  }
}

function assertName(name: string): void {
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new ValidationError('snapshot.name', 'a non-empty name', JSON.stringify(name));
  }
}

function toInfo(row: SnapshotRow): StoredSnapshotInfo {
  return {
    name: row.name,
    savedAt: row.saved_at,
    version: row.version,
    atoms: row.atoms,
    links: row.links,
    tasks: row.tasks,
    sizeBytes: row.size_bytes,
  };
}
