// src/atlas/accession.ts
// Record accessions look like PREFIX-{SourceCode}-{PMID|UNKNOWN}-{Counter}, e.g. SOORENA-U-10022145-1.

export const DEFAULT_ACCESSION_PREFIX = "SOORENA";
export const UNKNOWN_PMID = "UNKNOWN";

const SOURCE_CODES: Record<string, string> = {
  UniProt: "U",
  Predicted: "P",
  "Non-UniProt": "P",
  OmniPath: "O",
  SIGNOR: "S",
  Signor: "S",
  TRRUST: "T",
  ORegAnno: "R",
  HTRIdb: "H",
};

const ACCESSION_RE = /^([A-Za-z][A-Za-z0-9]*)-([A-Za-z])-(\d+|UNKNOWN)-([1-9]\d*)$/;

export interface AccessionParts {
  prefix: string;
  sourceCode: string;
  pmid: string;
  counter: number;
}

export function sourceCode(source: string | null | undefined): string {
  const s = (source ?? "").trim();
  if (!s || s === "Unknown") return "X";
  return SOURCE_CODES[s] ?? s.charAt(0);
}

/** Missing or placeholder PMIDs ("", "-", "nan", "None") become UNKNOWN. */
export function sanitizePmid(pmid: string | number | null | undefined): string {
  const s = pmid === null || pmid === undefined ? "" : String(pmid).trim();
  if (!s || s === "-" || s === "nan" || s === "None") return UNKNOWN_PMID;
  return s;
}

export function formatAccession(parts: AccessionParts): string {
  return `${parts.prefix}-${parts.sourceCode}-${parts.pmid}-${parts.counter}`;
}

export function parseAccession(ac: string): AccessionParts | null {
  const m = ACCESSION_RE.exec(ac.trim());
  if (!m) return null;
  return { prefix: m[1], sourceCode: m[2], pmid: m[3], counter: Number(m[4]) };
}

/**
 * Assign accessions in input order. The counter restarts at 1 for every
 * distinct (source code, PMID) pair, so the same publication contributing
 * two records from one source yields ...-1 and ...-2.
 */
export function assignAccessions(
  rows: ReadonlyArray<{ pmid: string | number | null | undefined; source: string | null | undefined }>,
  prefix = DEFAULT_ACCESSION_PREFIX
): string[] {
  const counters = new Map<string, number>();
  return rows.map(row => {
    const code = sourceCode(row.source);
    const pmid = sanitizePmid(row.pmid);
    const key = `${code}\u0000${pmid}`;
    const counter = (counters.get(key) ?? 0) + 1;
    counters.set(key, counter);
    return formatAccession({ prefix, sourceCode: code, pmid, counter });
  });
}
