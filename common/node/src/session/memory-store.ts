/**
 * In-memory session store.
 *
 * Process-lifetime and non-durable: sessions are lost on restart. It is the
 * default store until a durable one is configured. Data is copied on the way
 * in and out, so concurrent requests never share a session object.
 * Expired sessions are purged on write once any of them is due.
 */

import { randomUUID } from "node:crypto";
import { TTLCache } from "../cache/ttl-cache.js";
import type { SessionRecord, SessionStore } from "./store.js";

export class MemoryStore implements SessionStore {
  private readonly records: TTLCache<Record<string, unknown>>;

  constructor(params: { maxEntries?: number; clock?: { now(): number } } = {}) {
    this.records = new TTLCache({ maxEntries: params.maxEntries, clock: params.clock });
  }

  async load(id: string): Promise<SessionRecord | null> {
    const entry = this.records.get(id);
    if (!entry.found) return null;
    return { id, data: structuredClone(entry.value), expiresAt: entry.expiresAt };
  }

  async save(record: SessionRecord): Promise<string> {
    this.records.purgeIfDue();
    const id = record.id ?? this.newId();
    this.records.set({ key: id, value: structuredClone(record.data), expiresAt: record.expiresAt });
    return id;
  }

  async delete(id: string): Promise<void> {
    this.records.invalidate(id);
  }

  /** Number of stored sessions, expired ones included until the next purge. */
  get size(): number {
    return this.records.size;
  }

  private newId(): string {
    let id = randomUUID();
    while (this.records.has(id)) id = randomUUID();
    return id;
  }
}
