// src/atlas/polarity.ts
import { isNonMechanismLabel, lookupMechanism, normalizeMechanismLabel } from "./taxonomy.js";
import type { PolarityResolution } from "./types.js";

export const UNRECOGNIZED = "unrecognized";

/**
 * Resolve the polarity of one record.
 *
 * A persisted, non-blank polarity wins and is returned as stored (trimmed),
 * except that a legacy ASCII "-" reads as "–".
 * Otherwise the mechanism label is normalized and looked up in the taxonomy.
 * Non-mechanism labels yield `none`; labels the taxonomy does not know yield
 * `unrecognized` rather than a guessed symbol.
 */
export function resolvePolarity(
  persisted: string | null | undefined,
  rawLabel: string | null | undefined
): PolarityResolution {
  const stored = typeof persisted === "string" ? persisted.trim() : "";
  if (stored) return { kind: "symbol", symbol: stored === "-" ? "–" : stored, origin: "persisted" };

  if (isNonMechanismLabel(rawLabel)) return { kind: "none" };
  const label = rawLabel ?? "";

  const entry = lookupMechanism(label);
  if (!entry) {
    return { kind: "unrecognized", label: label.trim(), normalized: normalizeMechanismLabel(label) };
  }
  return { kind: "symbol", symbol: entry.polarity, origin: "derived", key: entry.key };
}

/** Text form used by the SQL function, projection and export: symbol, "unrecognized", or null. */
export function polarityValue(resolution: PolarityResolution): string | null {
  switch (resolution.kind) {
    case "symbol": return resolution.symbol;
    case "unrecognized": return UNRECOGNIZED;
    case "none": return null;
  }
}

/** Adapter for `db.function(...)`: SQLite hands over whatever the cells hold. */
export function sqlResolvePolarity(persisted: unknown, rawLabel: unknown): string | null {
  return polarityValue(resolvePolarity(
    typeof persisted === "string" ? persisted : null,
    typeof rawLabel === "string" ? rawLabel : null
  ));
}
