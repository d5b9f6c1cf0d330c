/**
 * Session store contract.
 *
 * The session stage only wires a store into the pipeline; storage semantics
 * belong to the store. Implementations must keep distinct sessions isolated
 * under concurrent load/save, but need no cross-key transactions.
 */

export interface SessionRecord {
  /** Unset for a session that has never been saved; the store assigns one */
  id?: string;
  data: Record<string, unknown>;
  /** Unix ms; unset means no expiry */
  expiresAt?: number;
}

export interface SessionStore {
  /** Returns null for unknown or expired ids. */
  load(id: string): Promise<SessionRecord | null>;
  /** Persists the record and returns the id it is stored under. */
  save(record: SessionRecord): Promise<string>;
  delete(id: string): Promise<void>;
}
