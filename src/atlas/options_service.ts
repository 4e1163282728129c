// src/atlas/options_service.ts
import { ALL, EMPTY_FILTER, MONTH_DOMAIN } from "./filter_spec.js";
import { PAGE_SIZE_OPTIONS } from "./config.js";
import { compileFilter, narrowPredicate, numericExpr } from "./query_compiler.js";
import { POLARITY_DOMAIN } from "./taxonomy.js";
import type { RecordStore } from "./store.js";
import type { FilterOptions } from "./types.js";

export interface OptionSettings {
  optionTopN: number;
}

const present = (col: string) => [`${col} IS NOT NULL`, `trim(${col}) <> ''`];

/**
 * The choices a client offers for each filter, drawn from the whole store
 * rather than the current selection.
 */
export function loadFilterOptions(store: RecordStore, settings: OptionSettings): FilterOptions {
  const everything = compileFilter(EMPTY_FILTER);
  const labels = (expr: string, only: string[], orderBy: string, limit?: number) =>
    store
      .groupCount(expr, narrowPredicate(everything, ...only), { orderBy, limit })
      .map(r => String(r.label));

  const year = numericExpr("Year");
  return {
    journals: labels("Journal", present("Journal"), "n DESC, label", settings.optionTopN),
    organisms: labels("OS", present("OS"), "n DESC, label", settings.optionTopN),
    types: labels("Autoregulatory_Type", present("Autoregulatory_Type"), "label"),
    years: labels(year, [`${year} IS NOT NULL`], "label DESC").map(Number),
    months: MONTH_DOMAIN,
    polarity: POLARITY_DOMAIN,
    sources: [ALL, ...labels("Source", present("Source"), "label")],
    pageSizes: PAGE_SIZE_OPTIONS,
  };
}
