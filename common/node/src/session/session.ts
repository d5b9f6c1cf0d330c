/**
 * Request-scoped session.
 *
 * Holds the session data for one request and tracks whether it changed, so
 * the session stage writes back only what was modified.
 */

import type { z } from "zod";

export class Session {
  private readonly data: Map<string, unknown>;
  private currentId: string | undefined;
  private modified = false;
  private cycled = false;
  private flushed = false;

  /** Unix ms at which the stored record expires, if any. */
  public readonly expiresAt?: number;

  constructor(params: { id?: string; data?: Record<string, unknown>; expiresAt?: number } = {}) {
    this.currentId = params.id;
    this.data = new Map(Object.entries(params.data ?? {}));
    this.expiresAt = params.expiresAt;
  }

  /** Identifier of the stored record; undefined for a session never saved. */
  get id(): string | undefined {
    return this.currentId;
  }

  get isModified(): boolean {
    return this.modified;
  }

  get isCycled(): boolean {
    return this.cycled;
  }

  get isFlushed(): boolean {
    return this.flushed;
  }

  get size(): number {
    return this.data.size;
  }

  get(key: string): unknown {
    return this.data.get(key);
  }

  /** Reads a value and validates it; undefined when absent or invalid. */
  getParsed<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    if (!this.data.has(key)) return undefined;
    const parsed = schema.safeParse(this.data.get(key));
    return parsed.success ? parsed.data : undefined;
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  /**
   * Stores a value. Objects always mark the session modified: a value read
   * with get() and changed in place is only saved once it is set again.
   */
  set(key: string, value: unknown): this {
    const isObject = typeof value === "object" && value !== null;
    if (isObject || this.data.get(key) !== value || !this.data.has(key)) {
      this.modified = true;
    }
    this.data.set(key, value);
    return this;
  }

  delete(key: string): boolean {
    const existed = this.data.delete(key);
    if (existed) this.modified = true;
    return existed;
  }

  clear(): void {
    if (this.data.size > 0) this.modified = true;
    this.data.clear();
  }

  keys(): string[] {
    return [...this.data.keys()];
  }

  /**
   * Issues a new identifier for this session, keeping its data. Use when the
   * privilege level changes (login, logout).
   */
  cycleId(): void {
    this.cycled = true;
    this.modified = true;
  }

  /** Deletes the session from the store and clears the client's cookie. */
  flush(): void {
    this.data.clear();
    this.flushed = true;
    this.modified = true;
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.data);
  }

  /** @internal Called by the session stage once the record is saved. */
  assignId(id: string | undefined): void {
    this.currentId = id;
  }
}
