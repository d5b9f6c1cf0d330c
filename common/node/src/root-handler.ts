/**
 * RootHandlerBuilder — composes the application's middleware around its
 * root handler.
 *
 * Each layer added with middleware() is wrapped in the response and error
 * adapters, so foreign stages can be added as they are and the built
 * handler always speaks the canonical Request/Response/PipelineError types.
 * The first middleware added is the innermost.
 */

import {
  PipelineError,
  oneshot,
  type Handler,
  type HttpBody,
  type HttpResponse,
  type Layer,
  type Request,
  type Response,
  type Service,
} from "@strata/core";
import { IntoError, IntoResponse } from "./middleware.js";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";

const SERVICE_NAME = "strata-common:root-handler";

/** Built pipeline: a canonical handler plus a one-call convenience. */
export class BoxedHandler implements Handler {
  private readonly inner: Handler;

  constructor(inner: Handler) {
    this.inner = inner;
  }

  ready(signal?: AbortSignal): Promise<void> {
    return this.inner.ready(signal);
  }

  call(request: Request, signal?: AbortSignal): Promise<Response> {
    return this.inner.call(request, signal);
  }

  /** Awaits readiness, then calls once. */
  handle(request: Request, signal?: AbortSignal): Promise<Response> {
    return oneshot(this.inner, request, signal);
  }
}

export class RootHandlerBuilder {
  private handler: Handler;
  private layers = 0;
  private built = false;
  private readonly log: Logger;

  constructor(root: Handler, params: { loggerFactory?: LoggerFactory } = {}) {
    this.handler = root;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  /**
   * Wraps the current handler with `layer` (must be called before build).
   */
  middleware<B extends HttpBody>(layer: Layer<Handler, Service<Request, HttpResponse<B>>>): this {
    if (this.built) {
      throw new PipelineError({
        code: "INTERNAL_ERROR",
        message: `${SERVICE_NAME}:middleware - Cannot add middleware after build`,
      });
    }
    this.handler = new IntoError<Response, Request>(
      new IntoResponse<B, Request>(layer(this.handler))
    );
    this.layers++;
    return this;
  }

  build(): BoxedHandler {
    this.built = true;
    this.log.debug?.({ layers: this.layers }, `${SERVICE_NAME}:build - Pipeline built`);
    return new BoxedHandler(this.handler);
  }
}
