/**
 * Canonical response types.
 *
 * HttpResponse is generic over its body so foreign stages can produce their
 * own body types; the framework works with Response, whose body is the
 * opaque Body.
 */

import { Body } from "./body.js";
import type { HeadersLike } from "./request.js";

export interface HttpResponse<B = Body> {
  status: number;
  headers: Headers;
  body: B;
}

/** Canonical response: the body is always an opaque Body. */
export type Response = HttpResponse<Body>;

export function createResponse(init: {
  status?: number;
  headers?: HeadersLike;
  body?: Body;
} = {}): Response {
  return {
    status: init.status ?? 200,
    headers: new Headers(init.headers),
    body: init.body ?? Body.empty(),
  };
}

export function textResponse(text: string, status = 200): Response {
  return createResponse({
    status,
    headers: { "content-type": "text/plain; charset=utf-8" },
    body: Body.fixed(text),
  });
}

export function htmlResponse(html: string, status = 200): Response {
  return createResponse({
    status,
    headers: { "content-type": "text/html; charset=utf-8" },
    body: Body.fixed(html),
  });
}

/** Replaces the body, leaving status and headers untouched. */
export function mapResponseBody<A, B>(
  response: HttpResponse<A>,
  fn: (body: A) => B
): HttpResponse<B> {
  return { status: response.status, headers: response.headers, body: fn(response.body) };
}
