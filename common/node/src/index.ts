// Logging
export {
  createNodeJSLogger,
  resolveLogger,
  type Logger,
  type LoggerFactory,
  type LogLevel,
  type LogMethod,
} from "./logger.js";

// Utilities
export { toError } from "./utils.js";

// Adapters
export {
  wrapError,
  intoCanonicalResponse,
  IntoResponse,
  IntoError,
  intoResponseLayer,
  intoErrorLayer,
} from "./middleware.js";

// Conditional composition
export { Either, optionLayer, enabledFromConfig, type EitherBranch } from "./either.js";

// Sessions
export { Session } from "./session/session.js";
export { MemoryStore } from "./session/memory-store.js";
export type { SessionRecord, SessionStore } from "./session/store.js";
export {
  SESSION_KEY,
  SessionManager,
  getSession,
  sessionLayer,
  sessionLayerFromConfig,
  type SessionCookieOptions,
  type SessionMiddlewareOptions,
} from "./session/session-middleware.js";

// Live reload
export { Reloader, type ReloaderState } from "./live-reload/reloader.js";
export {
  LiveReload,
  DEFAULT_LIVE_RELOAD_PREFIX,
  isHtmlResponse,
  liveReloadScript,
  type LiveReloadOptions,
} from "./live-reload/live-reload.js";
export {
  LiveReloadMiddleware,
  liveReloadLayer,
  type LiveReloadConfigSource,
  type LiveReloadService,
} from "./live-reload/live-reload-middleware.js";

// Root handler
export { RootHandlerBuilder, BoxedHandler } from "./root-handler.js";

// Configuration
export { loadConfig, parseBooleanEnv, type LoadConfigParams } from "./config.js";

// Cache
export { TTLCache, type CacheEntry, type TTLCacheConfig } from "./cache/ttl-cache.js";
