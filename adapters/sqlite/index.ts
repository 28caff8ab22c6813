import type { ChangeConnection, ChangeSource, Tenant } from "@labframe/notify-core";
import type { Adapter, Health } from "../types";
import { openDb, openReadonly, type DB } from "./db";

/**
 * Change source over one project database. The change marker is the highest
 * rowid of `_sample_param_value`; topics are parameter names.
 */
export class SqliteChangeSource implements ChangeSource, Adapter {
  public readonly name = "sqlite";

  constructor(
    readonly tenant: Tenant,
    readonly path: string,
  ) {}

  open(): SqliteChangeConnection {
    return new SqliteChangeConnection(openReadonly(this.path));
  }

  async health(): Promise<Health> {
    try {
      const conn = this.open();
      try {
        return { ok: true, detail: `marker ${conn.currentChangeMarker()}` };
      } finally {
        conn.close();
      }
    } catch (err) {
      return { ok: false, detail: err instanceof Error ? err.message : String(err) };
    }
  }
}

export class SqliteChangeConnection implements ChangeConnection {
  constructor(private readonly db: DB) {}

  currentChangeMarker(): number {
    const row = this.db
      .prepare<[], { max: number }>(`SELECT IFNULL(MAX(rowid), 0) AS max FROM _sample_param_value`)
      .get();
    return row?.max ?? 0;
  }

  topicsChangedSince(marker: number): string[] {
    const rows = this.db
      .prepare<[number], { name: string }>(
        `SELECT DISTINCT d.name AS name
         FROM _sample_param_value AS spv
         JOIN _param_def AS d ON d.param_id = spv.param_id
         WHERE spv.rowid > ?
         ORDER BY d.name`,
      )
      .all(marker);
    return rows.map(r => r.name);
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Minimal write side of a project database: parameter definitions, samples
 * and recorded values. Each recorded value advances the change marker.
 */
export class ParameterStore {
  private readonly db: DB;

  constructor(dbOrPath: DB | string) {
    this.db = openDb(dbOrPath);
  }

  /** Insert or look up a parameter by name; returns its id. */
  defineParameter(name: string, unitSymbol?: string): number {
    const row = this.db
      .prepare<[string, string | null], { param_id: number }>(
        `INSERT INTO _param_def (name, unit_symbol) VALUES (?, ?)
         ON CONFLICT(name) DO UPDATE SET unit_symbol = COALESCE(excluded.unit_symbol, unit_symbol)
         RETURNING param_id`,
      )
      .get(name, unitSymbol ?? null);
    if (!row) throw new Error(`failed to define parameter ${name}`);
    return row.param_id;
  }

  createSample(preparedOn: string, authorName?: string): number {
    const res = this.db
      .prepare(`INSERT INTO _sample (prepared_on, author_name) VALUES (?, ?)`)
      .run(preparedOn, authorName ?? null);
    return Number(res.lastInsertRowid);
  }

  /** Record a value for a sample; returns the new change marker. */
  recordValue(sampleId: number, parameter: string, value: unknown, recordedAt = new Date()): number {
    const paramId = this.defineParameter(parameter);
    const res = this.db
      .prepare(
        `INSERT INTO _sample_param_value (sample_id, param_id, value_json, recorded_at) VALUES (?, ?, ?, ?)`,
      )
      .run(sampleId, paramId, JSON.stringify(value), recordedAt.toISOString());
    return Number(res.lastInsertRowid);
  }

  close(): void {
    this.db.close();
  }
}
