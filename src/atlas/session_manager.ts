// src/atlas/session_manager.ts
import { v4 as uuidv4 } from "uuid";
import { UnknownSessionError } from "./errors.js";
import { BrowseSession } from "./session.js";
import type { SessionSettings } from "./session.js";
import type { RecordStore } from "./store.js";

export type StoreFactory = () => RecordStore;

export interface SessionManagerOptions extends SessionSettings {
  idleMs: number;
}

/** Owns every open session; each one gets a connection of its own. */
export class SessionManager {
  private readonly sessions = new Map<string, BrowseSession>();
  private sweeper: NodeJS.Timeout | null = null;

  constructor(
    private readonly connect: StoreFactory,
    private readonly options: SessionManagerOptions
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  open(): BrowseSession {
    const id = uuidv4();
    const session = new BrowseSession(id, this.connect(), this.options);
    this.sessions.set(id, session);
    console.log(`[atlas:session] opened ${id} (${this.sessions.size} active)`);
    return session;
  }

  /** Look up a session and mark it active. */
  get(id: string): BrowseSession {
    const session = this.sessions.get(id);
    if (!session) throw new UnknownSessionError(id);
    session.touch();
    return session;
  }

  close(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    this.sessions.delete(id);
    try {
      session.close();
      console.log(`[atlas:session] closed ${id} (${this.sessions.size} active)`);
    } catch (e: unknown) {
      console.error(`[atlas:session] failed to close ${id}:`, e instanceof Error ? e.message : e);
    }
    return true;
  }

  closeAll(): void {
    this.stopSweeper();
    for (const id of [...this.sessions.keys()]) this.close(id);
  }

  /** Close sessions idle for longer than idleMs; returns their ids. A running export counts as activity. */
  sweep(now = Date.now()): string[] {
    const expired = [...this.sessions.values()]
      .filter(s => !s.exporting && now - s.lastActive > this.options.idleMs)
      .map(s => s.id);
    for (const id of expired) {
      console.warn(`[atlas:session] ${id} idle for over ${this.options.idleMs}ms, closing`);
      this.close(id);
    }
    return expired;
  }

  startSweeper(intervalMs = Math.min(this.options.idleMs, 60_000)): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (!this.sweeper) return;
    clearInterval(this.sweeper);
    this.sweeper = null;
  }
}
