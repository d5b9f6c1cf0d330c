/**
 * Processing-unit contract shared by every stage and by the pipeline itself.
 *
 * A Service exposes a readiness check and a call. Callers await `ready()`
 * before each `call()`; one call is made per readiness check. This is a
 * contract between caller and stage and is not enforced at runtime.
 */

import type { Request } from "./request.js";
import type { Response } from "./response.js";

export interface Service<Req, Res> {
  /**
   * Backpressure check. Resolves once the service can accept a call,
   * rejects if it never will.
   */
  ready(signal?: AbortSignal): Promise<void>;

  /**
   * Consumes the request and settles with exactly one outcome: a response or
   * an error. Stages suspending on I/O stop waiting when `signal` aborts.
   */
  call(request: Req, signal?: AbortSignal): Promise<Res>;
}

/** Wraps an inner service into an outer one. */
export type Layer<In, Out> = (inner: In) => Out;

/** Framework-facing handler: canonical request in, canonical response out. */
export type Handler = Service<Request, Response>;

/** Always-ready service backed by a function. */
export class ServiceFn<Req, Res> implements Service<Req, Res> {
  private readonly fn: (request: Req, signal?: AbortSignal) => Promise<Res>;

  constructor(fn: (request: Req, signal?: AbortSignal) => Promise<Res>) {
    this.fn = fn;
  }

  async ready(): Promise<void> {}

  call(request: Req, signal?: AbortSignal): Promise<Res> {
    return this.fn(request, signal);
  }
}

export function serviceFn<Req, Res>(
  fn: (request: Req, signal?: AbortSignal) => Promise<Res>
): ServiceFn<Req, Res> {
  return new ServiceFn(fn);
}

/** Awaits readiness, then makes exactly one call. */
export async function oneshot<Req, Res>(
  service: Service<Req, Res>,
  request: Req,
  signal?: AbortSignal
): Promise<Res> {
  await service.ready(signal);
  return service.call(request, signal);
}
