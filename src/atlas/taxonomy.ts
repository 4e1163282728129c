// src/atlas/taxonomy.ts
import fs from "node:fs";
import { z } from "zod";
import type { OntologyDescription, PolaritySymbol } from "./types.js";

export const POLARITY_DOMAIN: readonly PolaritySymbol[] = ["+", "–", "±"];

export type MechanismGroup = "Enzymatic Self-Modification" | "Expression Control";

export interface MechanismTaxonomyEntry {
  key: string;
  polarity: PolaritySymbol;
  group: MechanismGroup;
  aliases: string[];
}

// Keys are already in normalized form (letters only, title case).
export const MECHANISM_TAXONOMY: readonly MechanismTaxonomyEntry[] = [
  { key: "Autophosphorylation", polarity: "+", group: "Enzymatic Self-Modification", aliases: [] },
  { key: "Autocatalytic",       polarity: "+", group: "Enzymatic Self-Modification", aliases: ["Autocatalysis"] },
  { key: "Autoubiquitination",  polarity: "–", group: "Enzymatic Self-Modification", aliases: [] },
  { key: "Autolysis",           polarity: "–", group: "Enzymatic Self-Modification", aliases: [] },
  { key: "Autoregulation",      polarity: "±", group: "Expression Control",          aliases: [] },
  { key: "Autoinhibition",      polarity: "–", group: "Expression Control",          aliases: [] },
  { key: "Autoinducer",         polarity: "+", group: "Expression Control",          aliases: ["Autoinduction"] },
];

/** Labels meaning "no mechanism", compared after normalization. */
export const NON_MECHANISM_LABELS: ReadonlySet<string> = new Set(["None", "Nonautoregulatory"]);

export const NON_MECHANISM_DISPLAY = "non-autoregulatory";

const BY_KEY = new Map<string, MechanismTaxonomyEntry>();
for (const entry of MECHANISM_TAXONOMY) {
  BY_KEY.set(entry.key, entry);
  for (const alias of entry.aliases) BY_KEY.set(alias, entry);
}

/** Strip everything but letters, then title-case: "auto-catalysis " → "Autocatalysis". */
export function normalizeMechanismLabel(raw: string): string {
  const letters = raw.replace(/[^A-Za-z]/g, "");
  if (!letters) return "";
  return letters.charAt(0).toUpperCase() + letters.slice(1).toLowerCase();
}

export function isNonMechanismLabel(raw: string | null | undefined): boolean {
  if (raw === null || raw === undefined) return true;
  const normalized = normalizeMechanismLabel(raw);
  return normalized === "" || NON_MECHANISM_LABELS.has(normalized);
}

export function lookupMechanism(raw: string): MechanismTaxonomyEntry | undefined {
  return BY_KEY.get(normalizeMechanismLabel(raw));
}

/* =========================================================================
 * Ontology descriptions (data/ontology.json)
 * ========================================================================= */

const OntologyFile = z.object({
  root: z.string(),
  entries: z.record(z.object({
    definition: z.string(),
    synonyms: z.array(z.string()),
    antonyms: z.array(z.string()),
    related: z.array(z.string()),
  })),
});

type OntologyFileT = z.infer<typeof OntologyFile>;

// Sources run from src/atlas under vitest and from dist/src/atlas once compiled.
const ONTOLOGY_CANDIDATES = ["../../data/ontology.json", "../../../data/ontology.json"];

let ontologyCache: OntologyFileT | null = null;

function loadOntology(): OntologyFileT {
  if (ontologyCache) return ontologyCache;
  for (const rel of ONTOLOGY_CANDIDATES) {
    const url = new URL(rel, import.meta.url);
    if (!fs.existsSync(url)) continue;
    ontologyCache = OntologyFile.parse(JSON.parse(fs.readFileSync(url, "utf8")));
    return ontologyCache;
  }
  throw new Error(`taxonomy: ontology.json not found (tried ${ONTOLOGY_CANDIDATES.join(", ")})`);
}

export function ontologyPath(key: string): string {
  const root = loadOntology().root;
  const entry = BY_KEY.get(key);
  return entry ? `${root} → ${entry.group} → ${entry.key}` : root;
}

export function describeMechanism(raw: string): OntologyDescription | null {
  const entry = lookupMechanism(raw);
  if (!entry) return null;
  const info = loadOntology().entries[entry.key];
  if (!info) return null;
  return {
    key: entry.key,
    path: ontologyPath(entry.key),
    definition: info.definition,
    synonyms: info.synonyms,
    antonyms: info.antonyms,
    related: info.related,
  };
}
