// src/atlas/session.ts
import type { Writable } from "node:stream";
import { parseAccession } from "./accession.js";
import type { AccessionParts } from "./accession.js";
import { countRecords } from "./count_service.js";
import { exportRecords } from "./export_service.js";
import { buildFilterSpec, EMPTY_FILTER } from "./filter_spec.js";
import type { FilterWarning } from "./filter_spec.js";
import { loadFilterOptions } from "./options_service.js";
import { fetchPage } from "./page_fetcher.js";
import * as paging from "./pagination.js";
import { projectRow } from "./projection.js";
import { compileFilter } from "./query_compiler.js";
import type { FilterInputT } from "./schemas.js";
import { groupStats, summarize } from "./stats_service.js";
import type { StatsSummary } from "./stats_service.js";
import type { RecordStore } from "./store.js";
import type {
  DisplayRecord,
  FilterOptions,
  FilterSpecification,
  GroupCount,
  PageState,
  QuerySnapshot,
  StatsDimension,
} from "./types.js";

export interface SessionSettings {
  defaultPageSize: number;
  journalTopN: number;
  optionTopN: number;
}

export interface SessionView {
  sessionId: string;
  revision: number;
  filters: { fingerprint: string; clauses: number };
  page: PageState & { maxPage: number; pageCount: number; offset: number };
  status: string;
  message: string;
  rows: DisplayRecord[];
  warnings: FilterWarning[];
}

export interface Revisioned<T> {
  sessionId: string;
  revision: number;
  result: T;
}

export interface LookupResult {
  record: DisplayRecord | null;
  parts: AccessionParts | null;
}

/* =========================================================================
 * One client's browse state over its own store connection.
 *
 * Every read goes through snapshot(): the filter is compiled once and the
 * same predicate is handed to count, page, stats and export, so the four
 * can never disagree. A failed read leaves filter and page state as they were.
 * ========================================================================= */

export class BrowseSession {
  private spec: FilterSpecification = EMPTY_FILTER;
  private pageState: PageState;
  private revision = 0;
  private warnings: FilterWarning[] = [];
  private countedFor: string | null = null;
  private cachedOptions: FilterOptions | null = null;
  private readonly exports = new Set<AbortController>();
  lastActive = Date.now();

  constructor(
    readonly id: string,
    private readonly store: RecordStore,
    private readonly settings: SessionSettings
  ) {
    this.pageState = paging.initialPageState(settings.defaultPageSize);
  }

  get filter(): FilterSpecification {
    return this.spec;
  }

  get page(): PageState {
    return this.pageState;
  }

  get currentRevision(): number {
    return this.revision;
  }

  touch(now = Date.now()): void {
    this.lastActive = now;
  }

  private snapshot(): QuerySnapshot {
    this.revision += 1;
    return Object.freeze({ revision: this.revision, spec: this.spec, predicate: compileFilter(this.spec) });
  }

  private wrap<T>(snapshot: QuerySnapshot, result: T): Revisioned<T> {
    return { sessionId: this.id, revision: snapshot.revision, result };
  }

  /* ----------------------------- filters ----------------------------- */

  /** Replace the filter. A changed filter sends the page back to 1. */
  applyFilters(input: FilterInputT): FilterWarning[] {
    const { spec, warnings } = buildFilterSpec(input, { types: this.options().types });
    for (const w of warnings) console.warn(`[atlas:session] ${this.id}: ${w.message}`);
    this.warnings = warnings;
    this.setSpec(spec);
    return warnings;
  }

  resetFilters(): void {
    this.warnings = [];
    this.setSpec(EMPTY_FILTER);
  }

  private setSpec(spec: FilterSpecification): void {
    if (spec.fingerprint === this.spec.fingerprint) return;
    this.spec = spec;
    this.pageState = paging.resetPage(this.pageState);
  }

  /* ---------------------------- pagination --------------------------- */

  nextPage(): PageState {
    // Bounds come from the current filter's count, not a previous one
    if (this.countedFor !== this.spec.fingerprint) this.recount(this.snapshot());
    this.pageState = paging.nextPage(this.pageState);
    return this.pageState;
  }

  previousPage(): PageState {
    this.pageState = paging.previousPage(this.pageState);
    return this.pageState;
  }

  resetPage(): PageState {
    this.pageState = paging.resetPage(this.pageState);
    return this.pageState;
  }

  setPageSize(pageSize: number): PageState {
    this.pageState = paging.setPageSize(this.pageState, pageSize);
    return this.pageState;
  }

  private recount(snapshot: QuerySnapshot): number {
    const total = countRecords(this.store, snapshot);
    this.pageState = paging.reconcile(this.pageState, total);
    this.countedFor = snapshot.spec.fingerprint;
    return total;
  }

  /* ------------------------------ reads ------------------------------ */

  view(): SessionView {
    const snapshot = this.snapshot();
    const total = countRecords(this.store, snapshot);
    const state = paging.reconcile(this.pageState, total);
    const { offset, rows } = fetchPage(this.store, snapshot, state);

    // Commit only once both reads succeeded
    this.pageState = state;
    this.countedFor = snapshot.spec.fingerprint;

    return {
      sessionId: this.id,
      revision: snapshot.revision,
      filters: { fingerprint: snapshot.spec.fingerprint, clauses: snapshot.predicate.clauses.length },
      page: {
        ...state,
        maxPage: paging.maxPage(total, state.pageSize),
        pageCount: Math.ceil(total / state.pageSize),
        offset,
      },
      status: paging.pageStatus(state),
      message: pageMessage(offset, rows.length, total),
      rows,
      warnings: this.warnings,
    };
  }

  stats(dimension: StatsDimension): Revisioned<GroupCount[]> {
    const snapshot = this.snapshot();
    return this.wrap(snapshot, groupStats(this.store, snapshot, dimension, this.settings));
  }

  summary(): Revisioned<StatsSummary> {
    const snapshot = this.snapshot();
    return this.wrap(snapshot, summarize(this.store, snapshot, this.settings));
  }

  /** Filter choices; computed on first use and kept for the session's lifetime. */
  options(): FilterOptions {
    if (!this.cachedOptions) this.cachedOptions = loadFilterOptions(this.store, this.settings);
    return this.cachedOptions;
  }

  /** Exact, whole-identifier match; independent of the current filter. */
  lookup(accession: string): LookupResult {
    const ac = accession.trim();
    const row = ac ? this.store.findByAccession(ac) : undefined;
    return { record: row ? projectRow(row, 1) : null, parts: parseAccession(ac) };
  }

  async exportTo(out: Writable): Promise<Revisioned<number>> {
    const snapshot = this.snapshot();
    const controller = new AbortController();
    this.exports.add(controller);
    try {
      return this.wrap(snapshot, await exportRecords(this.store, snapshot, out, controller.signal));
    } finally {
      this.exports.delete(controller);
    }
  }

  get exporting(): boolean {
    return this.exports.size > 0;
  }

  /** Aborts any export still streaming, then releases the connection. */
  close(): void {
    for (const controller of this.exports) controller.abort();
    this.exports.clear();
    this.store.close();
  }
}

const fmt = (n: number) => n.toLocaleString("en-US");

export function pageMessage(offset: number, shown: number, total: number): string {
  if (total === 0) return "No records match the current filters";
  return `Showing ${fmt(offset + 1)}–${fmt(offset + shown)} of ${fmt(total)} matching records`;
}
