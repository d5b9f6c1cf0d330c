/**
 * Session stage.
 *
 * Before delegating, resolves the session for the request from its cookie
 * and attaches it under SESSION_KEY. After the inner stage answers, writes a
 * modified session back to the store and sets, rotates or clears the
 * session cookie on the response.
 *
 * Store errors propagate to the caller unchanged.
 */

import { parse, serialize, type SerializeOptions } from "cookie";
import { z } from "zod";
import {
  ExtensionKey,
  PipelineError,
  type HttpResponse,
  type SessionConfig,
  type Request,
  type Service,
} from "@strata/core";
import { resolveLogger, type Logger, type LoggerFactory } from "../logger.js";
import { MemoryStore } from "./memory-store.js";
import { Session } from "./session.js";
import type { SessionStore } from "./store.js";

const SERVICE_NAME = "strata-common:session";

export const SESSION_KEY = new ExtensionKey<Session>("session");

const SessionIdSchema = z.string().regex(/^[A-Za-z0-9_-]{1,128}$/);

/** Cookie attributes the stage lets callers override. */
export type SessionCookieOptions = Pick<
  SerializeOptions,
  "domain" | "path" | "secure" | "httpOnly" | "sameSite"
>;

export interface SessionMiddlewareOptions {
  /** Defaults to a fresh MemoryStore shared by every service this layer builds */
  store?: SessionStore;
  /** Cookie carrying the session id. Default: "id" */
  cookieName?: string;
  cookie?: SessionCookieOptions;
  /** Idle lifetime; refreshed on every save. Unset: no expiry (browser-session cookie) */
  ttlMs?: number;
  /** Clock for session expiry; also drives the default MemoryStore */
  clock?: { now(): number };
  loggerFactory?: LoggerFactory;
}

const systemClock = { now: () => Date.now() };

const defaultCookieOptions: SessionCookieOptions = {
  path: "/",
  httpOnly: true,
  secure: true,
  sameSite: "strict",
};

/** Returns the session attached by the session stage. */
export function getSession(request: Request): Session {
  const session = request.extensions.get(SESSION_KEY);
  if (!session) {
    throw new PipelineError({
      code: "INTERNAL_ERROR",
      message: `${SERVICE_NAME}:getSession - Session middleware is not installed`,
    });
  }
  return session;
}

export class SessionManager<B> implements Service<Request, HttpResponse<B>> {
  private readonly inner: Service<Request, HttpResponse<B>>;
  private readonly store: SessionStore;
  private readonly cookieName: string;
  private readonly cookieOptions: SessionCookieOptions;
  private readonly ttlMs?: number;
  private readonly clock: { now(): number };
  private readonly log: Logger;

  constructor(params: {
    inner: Service<Request, HttpResponse<B>>;
    store: SessionStore;
    cookieName?: string;
    cookie?: SessionCookieOptions;
    ttlMs?: number;
    clock?: { now(): number };
    loggerFactory?: LoggerFactory;
  }) {
    this.inner = params.inner;
    this.store = params.store;
    this.cookieName = params.cookieName ?? "id";
    this.cookieOptions = { ...defaultCookieOptions, ...params.cookie };
    this.ttlMs = params.ttlMs;
    this.clock = params.clock ?? systemClock;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  ready(signal?: AbortSignal): Promise<void> {
    return this.inner.ready(signal);
  }

  async call(request: Request, signal?: AbortSignal): Promise<HttpResponse<B>> {
    const session = await this.loadSession(request);
    const loadedId = session.id;
    request.extensions.set(SESSION_KEY, session);

    const response = await this.inner.call(request, signal);

    await this.persist(session, loadedId, response);
    return response;
  }

  // ── Private ────────────────────────────────────────────────────────

  private async loadSession(request: Request): Promise<Session> {
    const header = request.headers.get("cookie");
    const raw = header ? parse(header)[this.cookieName] : undefined;
    if (raw === undefined) {
      return new Session();
    }

    const id = SessionIdSchema.safeParse(raw);
    if (!id.success) {
      this.log.debug?.({ path: request.path }, `${SERVICE_NAME}:loadSession - Ignoring malformed session id`);
      return new Session();
    }

    const record = await this.store.load(id.data);
    if (!record) {
      this.log.debug?.({ path: request.path }, `${SERVICE_NAME}:loadSession - Unknown or expired session`);
      return new Session();
    }
    return new Session({ id: id.data, data: record.data, expiresAt: record.expiresAt });
  }

  private async persist(
    session: Session,
    loadedId: string | undefined,
    response: HttpResponse<B>
  ): Promise<void> {
    if (session.isFlushed) {
      if (loadedId !== undefined) {
        await this.store.delete(loadedId);
        response.headers.append("set-cookie", this.expiredCookie());
        this.log.debug?.({}, `${SERVICE_NAME}:persist - Session flushed`);
      }
      session.assignId(undefined);
      return;
    }

    if (!session.isModified) return;

    if (session.isCycled && loadedId !== undefined) {
      await this.store.delete(loadedId);
      session.assignId(undefined);
    }

    // Without a TTL a loaded session keeps the expiry it was stored with.
    const expiresAt = this.ttlMs !== undefined ? this.clock.now() + this.ttlMs : session.expiresAt;
    const id = await this.store.save({ id: session.id, data: session.toJSON(), expiresAt });
    session.assignId(id);

    response.headers.append("set-cookie", this.sessionCookie(id));
    this.log.debug?.(
      { rotated: loadedId !== undefined && loadedId !== id },
      `${SERVICE_NAME}:persist - Session saved`
    );
  }

  private sessionCookie(id: string): string {
    return serialize(this.cookieName, id, {
      ...this.cookieOptions,
      ...(this.ttlMs !== undefined ? { maxAge: Math.floor(this.ttlMs / 1000) } : {}),
    });
  }

  private expiredCookie(): string {
    return serialize(this.cookieName, "", {
      ...this.cookieOptions,
      maxAge: 0,
      expires: new Date(0),
    });
  }
}

/**
 * Layer attaching a session to every request. Without a store, one
 * MemoryStore is created here and shared by every service the layer builds.
 */
export function sessionLayer(
  options: SessionMiddlewareOptions = {}
): <B>(inner: Service<Request, HttpResponse<B>>) => SessionManager<B> {
  const clock = options.clock ?? systemClock;
  const store = options.store ?? new MemoryStore({ clock });
  return (inner) =>
    new SessionManager({
      inner,
      store,
      cookieName: options.cookieName,
      cookie: options.cookie,
      ttlMs: options.ttlMs,
      clock,
      loggerFactory: options.loggerFactory,
    });
}

/** Session layer configured from the `middlewares.session` config section. */
export function sessionLayerFromConfig(
  config: SessionConfig,
  options: Omit<SessionMiddlewareOptions, "cookieName" | "ttlMs"> = {}
): <B>(inner: Service<Request, HttpResponse<B>>) => SessionManager<B> {
  return sessionLayer({
    ...options,
    cookieName: config.cookieName,
    ttlMs: config.ttlSeconds !== undefined ? config.ttlSeconds * 1000 : undefined,
    cookie: { ...options.cookie, secure: config.secure },
  });
}
