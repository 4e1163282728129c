// src/server/app.ts
import express from "express";
import type { Express, Request, Response } from "express";
import bodyParser from "body-parser";
import cors from "cors";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { registerGetWrapper } from "../../registerGetWrapper.js";
import { exportFileName } from "../atlas/export_service.js";
import { EMPTY_FILTER } from "../atlas/filter_spec.js";
import { compileFilter } from "../atlas/query_compiler.js";
import { SessionRef } from "../atlas/schemas.js";
import type { BrowseSession } from "../atlas/session.js";
import type { SessionManager } from "../atlas/session_manager.js";
import type { RecordStore } from "../atlas/store.js";
import { RPC_INTERNAL, toHttpFailure, toRpcFailure } from "./error_map.js";
import { buildTools } from "./tools.js";
import type { Tool } from "./tools.js";

type RpcId = string | number | null;

// -------- JSON-RPC helpers --------
function ok(id: RpcId, result: unknown) { return { jsonrpc: "2.0", id, result }; }
function err(id: RpcId, code: number, message: string, data?: unknown) {
  return { jsonrpc: "2.0", id, error: { code, message, data } };
}

const RpcRequest = z.object({
  id: z.union([z.string(), z.number()]),
  method: z.string().min(1),
  params: z
    .object({
      name: z.string().optional(),
      arguments: z.unknown().optional(),
    })
    .optional(),
});

export interface AppDeps {
  manager: SessionManager;
  /** Opens a short-lived connection for the health check. */
  probe: () => RecordStore;
}

function describeTools(tools: Tool[]) {
  return tools.map(t => ({
    name: t.name,
    description: t.description,
    inputSchema: zodToJsonSchema(t.inputSchema, { $refStrategy: "none" }),
  }));
}

export function createApp({ manager, probe }: AppDeps): Express {
  const tools = buildTools(manager);
  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: "1mb" }));

  app.post("/rpc", async (req: Request, res: Response) => {
    const parsed = RpcRequest.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(err(null, -32600, "Invalid Request"));
      return;
    }
    const { id, method, params } = parsed.data;

    if (method === "tools/list") {
      res.json(ok(id, { tools: describeTools(tools) }));
      return;
    }

    if (method === "tools/call") {
      const name = params?.name;
      const tool = tools.find(t => t.name === name);
      if (!tool) {
        res.json(err(id, -32601, `Unknown tool: ${name ?? ""}`));
        return;
      }
      try {
        const result = await tool.handler(params?.arguments ?? {});
        res.json(ok(id, { content: result }));
      } catch (e: unknown) {
        const failure = toRpcFailure(e);
        if (failure.code === RPC_INTERNAL) console.error(`[atlas:server] ${name ?? ""} failed:`, e);
        res.json(err(id, failure.code, failure.message, failure.data));
      }
      return;
    }

    res.json(err(id, -32601, `Method not found: ${method}`));
  });

  registerGetWrapper(app, tools);

  // ---- CSV download of the session's current filter ----
  app.get("/export", async (req: Request, res: Response) => {
    let session: BrowseSession;
    try {
      const { sessionId } = SessionRef.parse(req.query);
      session = manager.get(sessionId);
    } catch (e: unknown) {
      const failure = toHttpFailure(e);
      res.status(failure.status).json(failure.body);
      return;
    }

    res.setHeader("Content-Type", "text/csv; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="${exportFileName()}"`);
    try {
      const { revision, result } = await session.exportTo(res);
      console.log(`[atlas:server] exported ${result} rows for ${session.id} (revision ${revision})`);
    } catch (e: unknown) {
      console.error(`[atlas:server] export for ${session.id} failed:`, e instanceof Error ? e.message : e);
      if (!res.headersSent) {
        const failure = toHttpFailure(e);
        res.removeHeader("Content-Disposition");
        res.status(failure.status).json(failure.body);
      } else {
        res.destroy();
      }
    }
  });

  app.get("/health", (_req: Request, res: Response) => {
    try {
      const store = probe();
      try {
        res.json({ ok: true, sessions: manager.size, records: store.count(compileFilter(EMPTY_FILTER)) });
      } finally {
        store.close();
      }
    } catch (e: unknown) {
      const failure = toHttpFailure(e);
      res.status(failure.status === 500 ? 503 : failure.status).json({ ok: false, ...failure.body });
    }
  });

  return app;
}
