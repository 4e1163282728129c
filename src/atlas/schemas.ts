// src/atlas/schemas.ts
import { z } from "zod";
import { PAGE_SIZE_OPTIONS, isPageSize } from "./config.js";

// JSON-RPC callers may send a PMID or year as a number; free-text fields take
// it as text.
const LooseText = z.union([z.string(), z.number(), z.boolean()]).transform(v => String(v));

const LooseList = z
  .union([LooseText, z.array(LooseText)])
  .transform(v => (Array.isArray(v) ? v : [v]));

// Malformed year bounds are dropped later, never rejected here.
const LooseBound = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const MatchModeSchema = z.enum(["contains", "exact"]);

export const FilterInput = z.object({
  search: LooseText.optional(),
  matchMode: MatchModeSchema.optional(),
  types: LooseList.optional(),
  polarity: LooseList.optional(),
  yearFrom: LooseBound.optional(),
  yearTo: LooseBound.optional(),
  months: LooseList.optional(),
  source: LooseText.optional(),
  hasMechanism: LooseText.optional(),
  journals: LooseList.optional(),
  organisms: LooseList.optional(),
  author: LooseText.optional(),
  proteinName: LooseText.optional(),
  geneName: LooseText.optional(),
  proteinId: LooseText.optional(),
  pmid: LooseText.optional(),
  uniprot: LooseText.optional(),
  accession: LooseText.optional(),
});

export type FilterInputT = z.infer<typeof FilterInput>;

export const SessionRef = z.object({
  sessionId: z.string().min(1),
});

export const FilterRequest = SessionRef.merge(FilterInput);

export const PageAction = SessionRef.extend({
  action: z.enum(["next", "previous", "reset"]),
});

export const PageSizeRequest = SessionRef.extend({
  pageSize: z.coerce.number().int().refine(isPageSize, {
    message: `pageSize must be one of ${PAGE_SIZE_OPTIONS.join(", ")}`,
  }),
});

export const StatsRequest = SessionRef.extend({
  dimension: z.enum(["source", "type", "year", "journal", "hasMechanism", "polarity"]),
});

export const LookupRequest = SessionRef.extend({
  accession: LooseText,
});

export const TaxonomyResolve = z.object({
  label: LooseText.optional(),
  polarity: LooseText.optional(),
});

export const TaxonomyDescribe = z.object({
  label: LooseText,
});

export const EmptyInput = z.object({});
