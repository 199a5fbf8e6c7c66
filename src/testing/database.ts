import { openSqlite, type SqliteHandle } from "../database/sqlite/client";
import { runMigrations } from "../database/sqlite/migrate";

/** Fresh in-memory catalog with every migration applied. */
export function openMemoryDatabase(): SqliteHandle {
  const handle = openSqlite(":memory:");
  runMigrations(handle.db);
  return handle;
}

export interface ManualClock {
  now: () => Date;
  advance(ms: number): void;
  set(iso: string): void;
}

export function manualClock(startIso = "2026-01-01T08:00:00.000Z"): ManualClock {
  let current = Date.parse(startIso);
  return {
    now: () => new Date(current),
    advance(ms) { current += ms; },
    set(iso) { current = Date.parse(iso); }
  };
}
