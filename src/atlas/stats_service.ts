// src/atlas/stats_service.ts
import { countRecords } from "./count_service.js";
import { narrowPredicate, numericExpr } from "./query_compiler.js";
import { POLARITY_FUNCTION } from "./store.js";
import type { RecordStore } from "./store.js";
import type { GroupCount, QuerySnapshot, StatsDimension } from "./types.js";

export interface StatsSettings {
  journalTopN: number;
}

interface DimensionQuery {
  label: string;
  /** Conditions ANDed onto the snapshot predicate, never replacing it. */
  only?: string[];
  orderBy: string;
  topN?: boolean;
}

const YEAR = numericExpr("Year");

const DIMENSIONS: Record<StatsDimension, DimensionQuery> = {
  source: {
    label: "COALESCE(NULLIF(trim(Source), ''), 'Unknown')",
    orderBy: "n DESC, label",
  },
  type: {
    label: "Autoregulatory_Type",
    only: [
      "Autoregulatory_Type IS NOT NULL",
      "trim(Autoregulatory_Type) <> ''",
      "lower(trim(Autoregulatory_Type)) NOT IN ('none', 'non-autoregulatory')",
    ],
    orderBy: "n DESC, label",
  },
  year: {
    label: YEAR,
    only: [`${YEAR} IS NOT NULL`],
    orderBy: "label ASC",
  },
  journal: {
    label: "Journal",
    only: ["Journal IS NOT NULL", "trim(Journal) <> ''"],
    orderBy: "n DESC, label",
    topN: true,
  },
  hasMechanism: {
    label: "COALESCE(NULLIF(trim(Has_Mechanism), ''), 'Unknown')",
    orderBy: "n DESC, label",
  },
  polarity: {
    label: `COALESCE(${POLARITY_FUNCTION}(Polarity, Autoregulatory_Type), 'none')`,
    orderBy: "n DESC, label",
  },
};

export function groupStats(
  store: RecordStore,
  snapshot: QuerySnapshot,
  dimension: StatsDimension,
  settings: StatsSettings
): GroupCount[] {
  const q = DIMENSIONS[dimension];
  const predicate = narrowPredicate(snapshot.predicate, ...(q.only ?? []));
  const rows = store.groupCount(q.label, predicate, {
    orderBy: q.orderBy,
    limit: q.topN ? settings.journalTopN : undefined,
  });
  return rows.map(r => ({ label: String(r.label), count: r.n }));
}

export type StatsSummary = { totalCount: number } & Record<StatsDimension, GroupCount[]>;

export const STATS_DIMENSIONS: readonly StatsDimension[] = [
  "source", "type", "year", "journal", "hasMechanism", "polarity",
];

/** Every dashboard figure for one snapshot. */
export function summarize(store: RecordStore, snapshot: QuerySnapshot, settings: StatsSettings): StatsSummary {
  return {
    totalCount: countRecords(store, snapshot),
    source: groupStats(store, snapshot, "source", settings),
    type: groupStats(store, snapshot, "type", settings),
    year: groupStats(store, snapshot, "year", settings),
    journal: groupStats(store, snapshot, "journal", settings),
    hasMechanism: groupStats(store, snapshot, "hasMechanism", settings),
    polarity: groupStats(store, snapshot, "polarity", settings),
  };
}
