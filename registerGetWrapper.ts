/*
 * registerGetWrapper.ts
 *
 * REST-style GET access to the atlas tools. Attaches `/api/:toolName`,
 * gathers query parameters (repeated keys and `key[]` as arrays), validates
 * them with the tool's zod schema and answers JSON. Values stay text; the
 * schema coerces the fields that are numeric.
 *
 *   registerGetWrapper(app, tools);
 *   // http://localhost:8788/api/records.filter?sessionId=...&types[]=Autolysis&yearFrom=2010
 */

import type { Express, Request, Response } from 'express';
import type { Tool } from './src/server/tools.js';
import { toHttpFailure } from './src/server/error_map.js';

export type QueryValue = string | QueryValue[] | { [key: string]: QueryValue };

// Text is never turned into numbers here: PMIDs and search terms longer than
// 2^53 or written as "1.50" must reach the filter unchanged.
// Commas are not split: free-text values (titles, accession lists) contain them.
export function coerceValue(value: unknown): QueryValue {
  if (Array.isArray(value)) return value.map(coerceValue);
  if (value !== null && typeof value === 'object') {
    const out: { [key: string]: QueryValue } = {};
    for (const [k, v] of Object.entries(value)) out[k] = coerceValue(v);
    return out;
  }
  return typeof value === 'string' ? value.trim() : String(value);
}

/** Express `req.query` into tool arguments. */
export function parseQuery(query: Request['query']): Record<string, QueryValue> {
  const result: Record<string, QueryValue> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (key.endsWith('[]')) {
      const coerced = coerceValue(value);
      result[key.slice(0, -2)] = Array.isArray(coerced) ? coerced : [coerced];
    } else {
      result[key] = coerceValue(value);
    }
  }
  return result;
}

export function registerGetWrapper(app: Express, tools: Tool[], prefix = '/api'): void {
  app.get(`${prefix}/:toolName`, async (req: Request, res: Response) => {
    const { toolName } = req.params;
    const tool = tools.find(t => t.name === toolName);
    if (!tool) {
      res.status(404).json({ error: `Unknown tool: ${toolName}` });
      return;
    }
    try {
      const result = await tool.handler(parseQuery(req.query));
      res.json(result);
    } catch (e: unknown) {
      const failure = toHttpFailure(e);
      res.status(failure.status).json(failure.body);
    }
  });
}
