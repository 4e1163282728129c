// src/atlas/store.ts
import fs from "node:fs";
import Database from "better-sqlite3";
import { QueryExecutionError, StoreUnavailableError } from "./errors.js";
import { sqlResolvePolarity } from "./polarity.js";
import type { CompiledPredicate, PredictionRow, SqlParam, StoredColumn } from "./types.js";

export const PREDICTION_COLUMNS: readonly StoredColumn[] = [
  "AC", "PMID", "UniProtKB_accessions", "Has_Mechanism", "Mechanism_Probability",
  "Autoregulatory_Type", "Type_Confidence", "Polarity", "Title", "Abstract",
  "Journal", "Authors", "Year", "Month", "Source", "Protein_Name", "Gene_Name",
  "Protein_ID", "OS",
];

export const POLARITY_FUNCTION = "resolve_polarity";

const SELECT_LIST = PREDICTION_COLUMNS.join(", ");

export type GroupRow = { label: string | number | null; n: number };

export interface SelectOptions {
  orderBy: string;
  limit?: number;
  offset?: number;
}

export interface GroupOptions {
  orderBy: string;
  limit?: number;
}

/**
 * One read-only connection to the annotation store. Every read takes a
 * compiled predicate; the store adds nothing to it but fixed SQL.
 */
export class RecordStore {
  private readonly cursors = new Set<Iterator<PredictionRow>>();

  private constructor(
    private readonly db: Database.Database,
    readonly table: string,
    readonly dbPath: string
  ) {}

  /** Open and verify a store file. Throws StoreUnavailableError instead of serving partial data. */
  static open(dbPath: string, table = "predictions"): RecordStore {
    if (!fs.existsSync(dbPath)) {
      throw new StoreUnavailableError(`Database not found: ${dbPath}`, dbPath);
    }
    let db: Database.Database;
    try {
      db = new Database(dbPath, { readonly: true, fileMustExist: true });
    } catch (e: unknown) {
      throw new StoreUnavailableError(`Cannot open database ${dbPath}`, dbPath, { cause: e });
    }
    try {
      return RecordStore.fromDatabase(db, table, dbPath);
    } catch (e: unknown) {
      db.close();
      throw e;
    }
  }

  /** Wrap an already open connection (used by tools that build their own database). */
  static fromDatabase(db: Database.Database, table = "predictions", dbPath = db.name): RecordStore {
    let columns: string[];
    try {
      columns = db
        .prepare<[string], { name: string }>("SELECT name FROM pragma_table_info(?)")
        .all(table)
        .map(r => r.name);
    } catch (e: unknown) {
      throw new StoreUnavailableError(`Cannot read schema of ${dbPath}`, dbPath, { cause: e });
    }
    if (!columns.length) {
      throw new StoreUnavailableError(`Table '${table}' not found in ${dbPath}`, dbPath);
    }
    const missing = PREDICTION_COLUMNS.filter(c => !columns.includes(c));
    if (missing.length) {
      throw new StoreUnavailableError(`Table '${table}' is missing columns: ${missing.join(", ")}`, dbPath);
    }
    db.function(POLARITY_FUNCTION, { deterministic: true }, sqlResolvePolarity);
    return new RecordStore(db, table, dbPath);
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (e: unknown) {
      console.error(`[atlas:store] ${operation} failed:`, e instanceof Error ? e.message : e);
      throw new QueryExecutionError(operation, { cause: e });
    }
  }

  count(predicate: CompiledPredicate): number {
    return this.run("count", () => {
      const row = this.db
        .prepare<SqlParam[], { n: number }>(`SELECT COUNT(*) AS n FROM ${this.table} WHERE ${predicate.where}`)
        .get(...predicate.params);
      return row?.n ?? 0;
    });
  }

  select(predicate: CompiledPredicate, opts: SelectOptions): PredictionRow[] {
    const { sql, params } = this.selectSql(predicate, opts);
    return this.run("fetch", () => this.db.prepare<SqlParam[], PredictionRow>(sql).all(...params));
  }

  /**
   * Lazily step through every matching row; nothing is materialized. The
   * statement is prepared before this returns, so a bad query throws here
   * rather than partway through a stream.
   */
  iterate(predicate: CompiledPredicate, opts: SelectOptions): Generator<PredictionRow> {
    const { sql, params } = this.selectSql(predicate, opts);
    const iter = this.run("export", () => this.db.prepare<SqlParam[], PredictionRow>(sql).iterate(...params));
    const step = () => this.run("export", () => iter.next());
    const cursors = this.cursors;
    cursors.add(iter);
    return (function* () {
      try {
        for (let next = step(); !next.done; next = step()) yield next.value;
      } finally {
        // Releases the statement when a consumer stops early
        cursors.delete(iter);
        iter.return?.();
      }
    })();
  }

  private selectSql(predicate: CompiledPredicate, opts: SelectOptions): { sql: string; params: SqlParam[] } {
    let sql = `SELECT ${SELECT_LIST} FROM ${this.table} WHERE ${predicate.where} ORDER BY ${opts.orderBy}`;
    const params: SqlParam[] = [...predicate.params];
    if (opts.limit !== undefined) {
      sql += " LIMIT ? OFFSET ?";
      params.push(opts.limit, opts.offset ?? 0);
    }
    return { sql, params };
  }

  groupCount(labelExpr: string, predicate: CompiledPredicate, opts: GroupOptions): GroupRow[] {
    let sql = `SELECT ${labelExpr} AS label, COUNT(*) AS n FROM ${this.table} WHERE ${predicate.where} GROUP BY ${labelExpr} ORDER BY ${opts.orderBy}`;
    const params: SqlParam[] = [...predicate.params];
    if (opts.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(opts.limit);
    }
    return this.run("stats", () => this.db.prepare<SqlParam[], GroupRow>(sql).all(...params));
  }

  findByAccession(accession: string): PredictionRow | undefined {
    return this.run("lookup", () =>
      this.db
        .prepare<[string], PredictionRow>(`SELECT ${SELECT_LIST} FROM ${this.table} WHERE AC = ?`)
        .get(accession)
    );
  }

  /** Ends any cursor still streaming, then closes the connection. */
  close(): void {
    for (const cursor of this.cursors) cursor.return?.();
    this.cursors.clear();
    if (this.db.open) this.db.close();
  }
}
