// src/server/tools.ts
import { z } from "zod";
import { resolvePolarity, polarityValue } from "../atlas/polarity.js";
import {
  EmptyInput,
  FilterRequest,
  LookupRequest,
  PageAction,
  PageSizeRequest,
  SessionRef,
  StatsRequest,
  TaxonomyDescribe,
  TaxonomyResolve,
} from "../atlas/schemas.js";
import type { SessionManager } from "../atlas/session_manager.js";
import { describeMechanism, isNonMechanismLabel, lookupMechanism, normalizeMechanismLabel } from "../atlas/taxonomy.js";

export type Tool = {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  handler: (args: unknown) => Promise<unknown>;
};

/** Bind a handler to its schema: raw arguments are parsed before the handler sees them. */
export function defineTool<S extends z.ZodTypeAny>(def: {
  name: string;
  description: string;
  inputSchema: S;
  handler: (args: z.infer<S>) => unknown;
}): Tool {
  return {
    name: def.name,
    description: def.description,
    inputSchema: def.inputSchema,
    handler: async (raw: unknown) => def.handler(def.inputSchema.parse(raw)),
  };
}

export function buildTools(manager: SessionManager): Tool[] {
  const tools: Tool[] = [];

  // -------- Sessions --------
  tools.push(defineTool({
    name: "session.open",
    description: "Open a browse session with no filters; returns its first page",
    inputSchema: EmptyInput,
    handler: () => manager.open().view(),
  }));

  tools.push(defineTool({
    name: "session.close",
    description: "Close a browse session and release its connection",
    inputSchema: SessionRef,
    handler: ({ sessionId }) => ({ sessionId, closed: manager.close(sessionId) }),
  }));

  // -------- Records --------
  tools.push(defineTool({
    name: "records.view",
    description: "Current page of records under the session's filters",
    inputSchema: SessionRef,
    handler: ({ sessionId }) => manager.get(sessionId).view(),
  }));

  tools.push(defineTool({
    name: "records.filter",
    description: "Replace the session's filters and return the first page",
    inputSchema: FilterRequest,
    handler: ({ sessionId, ...filters }) => {
      const session = manager.get(sessionId);
      session.applyFilters(filters);
      return session.view();
    },
  }));

  tools.push(defineTool({
    name: "records.resetFilters",
    description: "Clear every filter",
    inputSchema: SessionRef,
    handler: ({ sessionId }) => {
      const session = manager.get(sessionId);
      session.resetFilters();
      return session.view();
    },
  }));

  tools.push(defineTool({
    name: "records.page",
    description: "Move to the next or previous page, or back to the first",
    inputSchema: PageAction,
    handler: ({ sessionId, action }) => {
      const session = manager.get(sessionId);
      if (action === "next") session.nextPage();
      else if (action === "previous") session.previousPage();
      else session.resetPage();
      return session.view();
    },
  }));

  tools.push(defineTool({
    name: "records.pageSize",
    description: "Change the page size (25, 50 or 100); returns to page 1",
    inputSchema: PageSizeRequest,
    handler: ({ sessionId, pageSize }) => {
      const session = manager.get(sessionId);
      session.setPageSize(pageSize);
      return session.view();
    },
  }));

  tools.push(defineTool({
    name: "records.stats",
    description: "Grouped counts of the filtered records along one dimension",
    inputSchema: StatsRequest,
    handler: ({ sessionId, dimension }) => manager.get(sessionId).stats(dimension),
  }));

  tools.push(defineTool({
    name: "records.summary",
    description: "Total count and every breakdown of the filtered records",
    inputSchema: SessionRef,
    handler: ({ sessionId }) => manager.get(sessionId).summary(),
  }));

  tools.push(defineTool({
    name: "records.options",
    description: "Choices available for each filter",
    inputSchema: SessionRef,
    handler: ({ sessionId }) => ({ sessionId, result: manager.get(sessionId).options() }),
  }));

  tools.push(defineTool({
    name: "records.lookup",
    description: "Fetch one record by its exact accession",
    inputSchema: LookupRequest,
    handler: ({ sessionId, accession }) => manager.get(sessionId).lookup(accession),
  }));

  // -------- Taxonomy --------
  tools.push(defineTool({
    name: "taxonomy.resolve",
    description: "Resolve the polarity of a mechanism label, honouring a persisted value",
    inputSchema: TaxonomyResolve,
    handler: ({ label, polarity }) => {
      const resolution = resolvePolarity(polarity, label);
      return { value: polarityValue(resolution), resolution };
    },
  }));

  tools.push(defineTool({
    name: "taxonomy.describe",
    description: "Taxonomy entry and ontology description of a mechanism label",
    inputSchema: TaxonomyDescribe,
    handler: ({ label }) => {
      const entry = lookupMechanism(label);
      return {
        label,
        normalized: normalizeMechanismLabel(label),
        mechanism: !isNonMechanismLabel(label),
        entry: entry ?? null,
        ontology: describeMechanism(label),
      };
    },
  }));

  return tools;
}
