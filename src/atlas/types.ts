// src/atlas/types.ts

export type SqlParam = string | number;

export type MatchMode = "contains" | "exact";

export type PolaritySymbol = "+" | "–" | "±";

/** One row of the `predictions` relation, as stored. */
export interface PredictionRow {
  AC: string;
  PMID: string | null;
  UniProtKB_accessions: string | null;
  Has_Mechanism: string | null;
  Mechanism_Probability: number | null;
  Autoregulatory_Type: string | null;
  Type_Confidence: number | null;
  Polarity: string | null;
  Title: string | null;
  Abstract: string | null;
  Journal: string | null;
  Authors: string | null;
  Year: number | string | null;
  Month: string | null;
  Source: string | null;
  Protein_Name: string | null;
  Gene_Name: string | null;
  Protein_ID: string | null;
  OS: string | null;
}

export type StoredColumn = keyof PredictionRow;

/* =========================================================================
 * Filter slots: one variant per way a criterion compiles
 * ========================================================================= */

export interface SetSlot {
  kind: "set";
  column: string;
  values: string[];
  /** Every value the column can hold; a selection covering it is no constraint. */
  domain?: readonly string[];
}

export interface TextSlot {
  kind: "text";
  columns: string[];
  value: string;
  mode: MatchMode;
}

export interface RangeSlot {
  kind: "range";
  column: string;
  from?: number;
  to?: number;
}

export interface CategorySlot {
  kind: "category";
  column: string;
  value: string;
  defaultValue: string;
}

export interface DelimitedListSlot {
  kind: "delimitedList";
  column: string;
  value: string;
  mode: MatchMode;
  delimiter: string;
}

export type FilterSlot = SetSlot | TextSlot | RangeSlot | CategorySlot | DelimitedListSlot;

export type SlotName =
  | "search"
  | "types"
  | "polarity"
  | "year"
  | "months"
  | "source"
  | "hasMechanism"
  | "journals"
  | "organisms"
  | "author"
  | "proteinName"
  | "geneName"
  | "proteinId"
  | "pmid"
  | "uniprot"
  | "accession";

export interface FilterSpecification {
  readonly slots: Readonly<Partial<Record<SlotName, FilterSlot>>>;
  readonly matchMode: MatchMode;
  readonly fingerprint: string;
}

export interface CompiledPredicate {
  readonly where: string;
  readonly params: readonly SqlParam[];
  readonly clauses: readonly string[];
}

/** The predicate built once per interaction and shared by count, page, stats and export. */
export interface QuerySnapshot {
  readonly revision: number;
  readonly spec: FilterSpecification;
  readonly predicate: CompiledPredicate;
}

/* =========================================================================
 * Pagination
 * ========================================================================= */

export interface PageState {
  readonly page: number;
  readonly pageSize: number;
  readonly totalCount: number;
}

/* =========================================================================
 * Derived polarity
 * ========================================================================= */

export type PolarityResolution =
  | { kind: "symbol"; symbol: string; origin: "persisted" | "derived"; key?: string }
  | { kind: "none" }
  | { kind: "unrecognized"; label: string; normalized: string };

/* =========================================================================
 * Projection
 * ========================================================================= */

export interface DisplayCell {
  text: string;
  full: string | null;
  truncated: boolean;
  href?: string;
}

export interface OntologyDescription {
  key: string;
  path: string;
  definition: string;
  synonyms: string[];
  antonyms: string[];
  related: string[];
}

export interface DisplayRecord {
  rowNumber: number;
  cells: Record<string, DisplayCell>;
  polarity: PolarityResolution;
  ontology?: OntologyDescription;
}

export type StatsDimension = "source" | "type" | "year" | "journal" | "hasMechanism" | "polarity";

export interface GroupCount {
  label: string;
  count: number;
}

export interface FilterOptions {
  journals: string[];
  organisms: string[];
  types: string[];
  years: number[];
  months: readonly string[];
  polarity: readonly string[];
  sources: string[];
  pageSizes: readonly number[];
}
