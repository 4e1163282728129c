// src/atlas/config.ts
import { z } from "zod";

export const PAGE_SIZE_OPTIONS = [25, 50, 100] as const;

export type PageSize = (typeof PAGE_SIZE_OPTIONS)[number];

export function isPageSize(n: number): n is PageSize {
  return PAGE_SIZE_OPTIONS.some(size => size === n);
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8788),
  ATLAS_DB_PATH: z.string().min(1).default("data/predictions.db"),
  ATLAS_TABLE: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "ATLAS_TABLE must be a plain SQL identifier").default("predictions"),
  ATLAS_DEFAULT_PAGE_SIZE: z.coerce.number().int().refine(isPageSize, {
    message: `ATLAS_DEFAULT_PAGE_SIZE must be one of ${PAGE_SIZE_OPTIONS.join(", ")}`,
  }).default(50),
  ATLAS_SESSION_IDLE_MS: z.coerce.number().int().min(1000).default(30 * 60 * 1000),
  ATLAS_JOURNAL_TOP_N: z.coerce.number().int().min(1).max(500).default(20),
  ATLAS_OPTION_TOP_N: z.coerce.number().int().min(1).max(1000).default(100),
});

export interface AtlasConfig {
  port: number;
  dbPath: string;
  table: string;
  defaultPageSize: PageSize;
  sessionIdleMs: number;
  journalTopN: number;
  optionTopN: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AtlasConfig {
  // Blank variables fall back to defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const p = EnvSchema.parse(present);
  return {
    port: p.PORT,
    dbPath: p.ATLAS_DB_PATH,
    table: p.ATLAS_TABLE,
    defaultPageSize: p.ATLAS_DEFAULT_PAGE_SIZE,
    sessionIdleMs: p.ATLAS_SESSION_IDLE_MS,
    journalTopN: p.ATLAS_JOURNAL_TOP_N,
    optionTopN: p.ATLAS_OPTION_TOP_N,
  };
}
