/**
 * Autoregulatory Atlas browse service
 * -----------------------------------
 * Serves filtered, paginated views, statistics and CSV exports over the
 * literature-derived autoregulatory mechanism annotations in one SQLite file.
 *
 * HOW TO USE
 * 1) `npm install`
 * 2) Point ATLAS_DB_PATH at the predictions database (default data/predictions.db)
 * 3) `npm run build && npm start`
 * 4) JSON-RPC at POST http://<host>:8788/rpc, GET wrappers at /api/<tool>,
 *    CSV at /export?sessionId=<id>
 */

import { z } from "zod";
import { loadConfig } from "./src/atlas/config.js";
import type { AtlasConfig } from "./src/atlas/config.js";
import { EMPTY_FILTER } from "./src/atlas/filter_spec.js";
import { compileFilter } from "./src/atlas/query_compiler.js";
import { SessionManager } from "./src/atlas/session_manager.js";
import { RecordStore } from "./src/atlas/store.js";
import { createApp } from "./src/server/app.js";

function readConfig(): AtlasConfig {
  try {
    return loadConfig();
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      console.error(`[atlas:server] invalid configuration: ${e.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    } else {
      console.error("[atlas:server] invalid configuration:", e);
    }
    process.exit(1);
  }
}

const config = readConfig();
const connect = () => RecordStore.open(config.dbPath, config.table);

// -------- Verify the store before serving --------
try {
  const probe = connect();
  const total = probe.count(compileFilter(EMPTY_FILTER));
  probe.close();
  console.log(`[atlas:store] ${config.dbPath}: ${total} records in '${config.table}'`);
} catch (e: unknown) {
  console.error(`[atlas:store] cannot serve: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
}

const manager = new SessionManager(connect, {
  defaultPageSize: config.defaultPageSize,
  journalTopN: config.journalTopN,
  optionTopN: config.optionTopN,
  idleMs: config.sessionIdleMs,
});
manager.startSweeper();

const app = createApp({ manager, probe: connect });
const server = app.listen(config.port, () =>
  console.log(`[atlas:server] listening on http://localhost:${config.port}/rpc`)
);

function shutdown(signal: string) {
  console.log(`[atlas:server] ${signal}: closing ${manager.size} sessions`);
  manager.closeAll();
  server.close(() => process.exit(0));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
