/**
 * Adapters that bring foreign stages into the canonical shape.
 *
 * Foreign stages may produce any body satisfying the HttpBody contract and
 * may fail with any error. IntoResponse boxes the body into the opaque Body;
 * IntoError normalizes failures into PipelineError. Both are structural:
 * they introduce no suspension of their own and never drop or duplicate the
 * outcome of a call.
 */

import {
  Body,
  PipelineError,
  mapBodyErrors,
  mapResponseBody,
  type HttpBody,
  type HttpResponse,
  type Request,
  type Response,
  type Service,
} from "@strata/core";
import { toError } from "./utils.js";

// ── Error normalization ─────────────────────────────────────────────

/**
 * Single normalization point for errors crossing from foreign stage code
 * into framework code.
 *
 * A PipelineError passes through unchanged, so an error is wrapped at most
 * once however many adapters it crosses. Any other Error becomes the cause
 * of a MIDDLEWARE_WRAPPED error.
 */
export function wrapError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  return PipelineError.middlewareWrapped(toError(err));
}

// ── Response adapter ────────────────────────────────────────────────

/**
 * Converts a response carrying any HttpBody into the canonical Response.
 * Status and headers are left untouched; body failures surface as the same
 * PipelineError shape IntoError produces.
 */
export function intoCanonicalResponse<B extends HttpBody>(response: HttpResponse<B>): Response {
  return mapResponseBody(response, (body) => Body.wrapper(mapBodyErrors(body, wrapError)));
}

export class IntoResponse<B extends HttpBody, Req = Request> implements Service<Req, Response> {
  private readonly inner: Service<Req, HttpResponse<B>>;

  constructor(inner: Service<Req, HttpResponse<B>>) {
    this.inner = inner;
  }

  ready(signal?: AbortSignal): Promise<void> {
    return this.inner.ready(signal);
  }

  async call(request: Req, signal?: AbortSignal): Promise<Response> {
    return intoCanonicalResponse(await this.inner.call(request, signal));
  }
}

/** Layer form of IntoResponse; generic over the inner body and request types. */
export function intoResponseLayer(): <B extends HttpBody, Req = Request>(
  inner: Service<Req, HttpResponse<B>>
) => IntoResponse<B, Req> {
  return (inner) => new IntoResponse(inner);
}

// ── Error adapter ───────────────────────────────────────────────────

export class IntoError<Res, Req = Request> implements Service<Req, Res> {
  private readonly inner: Service<Req, Res>;

  constructor(inner: Service<Req, Res>) {
    this.inner = inner;
  }

  async ready(signal?: AbortSignal): Promise<void> {
    try {
      await this.inner.ready(signal);
    } catch (err) {
      throw wrapError(err);
    }
  }

  async call(request: Req, signal?: AbortSignal): Promise<Res> {
    try {
      return await this.inner.call(request, signal);
    } catch (err) {
      throw wrapError(err);
    }
  }
}

/** Layer form of IntoError; generic over the inner response and request types. */
export function intoErrorLayer(): <Res, Req = Request>(
  inner: Service<Req, Res>
) => IntoError<Res, Req> {
  return (inner) => new IntoError(inner);
}
