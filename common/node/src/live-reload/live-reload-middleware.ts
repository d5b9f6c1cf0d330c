/**
 * Live reloading for development.
 *
 * The reload stage is composed behind the error and response adapters and
 * the whole chain sits in an Either: when disabled, requests go straight to
 * the next stage and the reload stage is never built. Either way the layer
 * yields the same type.
 *
 * Enable it from config with
 *
 *   { "middlewares": { "liveReload": { "enabled": true } } }
 *
 * and call `middleware.reloader.reload()` once a rebuild completes.
 */

import type { Handler, HttpBody, Request, Response } from "@strata/core";
import { Either, enabledFromConfig, optionLayer } from "../either.js";
import { IntoError, IntoResponse } from "../middleware.js";
import { LiveReload, type LiveReloadOptions } from "./live-reload.js";
import { Reloader } from "./reloader.js";

/** Static type of a handler wrapped by LiveReloadMiddleware, enabled or not. */
export type LiveReloadService<S extends Handler> = Either<IntoError<Response, Request>, S, Request, Response>;

/** Config shape read by fromConfig; values are checked, not trusted. */
export interface LiveReloadConfigSource {
  middlewares?: { liveReload?: { enabled?: unknown } };
}

export class LiveReloadMiddleware {
  public readonly enabled: boolean;
  public readonly reloader: Reloader;
  private readonly options: LiveReloadOptions;

  private constructor(enabled: boolean, options: LiveReloadOptions) {
    this.enabled = enabled;
    this.reloader = options.reloader ?? new Reloader({ loggerFactory: options.loggerFactory });
    this.options = { ...options, reloader: this.reloader };
  }

  /** Always enabled. */
  static create(options: LiveReloadOptions = {}): LiveReloadMiddleware {
    return LiveReloadMiddleware.withEnabled(true, options);
  }

  /** Enabled only if `middlewares.liveReload.enabled` is `true`; disabled when missing or malformed. */
  static fromConfig(
    config: LiveReloadConfigSource | undefined,
    options: LiveReloadOptions = {}
  ): LiveReloadMiddleware {
    return LiveReloadMiddleware.withEnabled(
      enabledFromConfig(config?.middlewares?.liveReload?.enabled),
      options
    );
  }

  static withEnabled(enabled: boolean, options: LiveReloadOptions = {}): LiveReloadMiddleware {
    return new LiveReloadMiddleware(enabled, options);
  }

  layer<S extends Handler>(inner: S): LiveReloadService<S> {
    const chain = this.enabled
      ? (service: S) =>
          new IntoError<Response, Request>(
            new IntoResponse<HttpBody, Request>(new LiveReload(service, this.options))
          )
      : undefined;
    return optionLayer<S, IntoError<Response, Request>, Request, Response>(chain)(inner);
  }
}

/** Layer form of LiveReloadMiddleware. */
export function liveReloadLayer(
  middleware: LiveReloadMiddleware
): <S extends Handler>(inner: S) => LiveReloadService<S> {
  return (inner) => middleware.layer(inner);
}
