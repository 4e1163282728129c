// src/atlas/count_service.ts
import type { RecordStore } from "./store.js";
import type { QuerySnapshot } from "./types.js";

export function countRecords(store: RecordStore, snapshot: QuerySnapshot): number {
  return store.count(snapshot.predicate);
}
