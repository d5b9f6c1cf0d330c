/**
 * Reload stage.
 *
 * Serves two endpoints under a prefix and injects a small client script
 * into HTML responses:
 *   GET <prefix>/long-poll  parks until the reloader fires, then answers
 *   GET <prefix>/back-up    answers at once; lets the client detect a restarted server
 *
 * The script long-polls; when the poll answers it reloads the page, and when
 * the poll fails (server restarting) it retries back-up until the server
 * answers, then reloads.
 */

import {
  Body,
  requestPathname,
  type HttpBody,
  type HttpResponse,
  type Request,
  type Service,
} from "@strata/core";
import { resolveLogger, type Logger, type LoggerFactory } from "../logger.js";
import { Reloader } from "./reloader.js";

const SERVICE_NAME = "strata-common:live-reload";

export const DEFAULT_LIVE_RELOAD_PREFIX = "/_strata-livereload";

export interface LiveReloadOptions {
  /** Shared signal; a new Reloader is created when omitted */
  reloader?: Reloader;
  /** Path prefix of the endpoints. Default: /_strata-livereload */
  prefix?: string;
  /** Client retry interval while the server is down, in ms. Default: 1000 */
  retryIntervalMs?: number;
  /** Which responses get the script. Default: content-type text/html */
  shouldInject?: (response: HttpResponse<HttpBody>) => boolean;
  loggerFactory?: LoggerFactory;
}

export function isHtmlResponse(response: HttpResponse<HttpBody>): boolean {
  const contentType = response.headers.get("content-type");
  return contentType !== null && contentType.toLowerCase().startsWith("text/html");
}

export function liveReloadScript(prefix: string, retryIntervalMs: number): string {
  const p = JSON.stringify(prefix);
  return (
    `<script data-live-reload>(function(){` +
    `var p=${p};` +
    `function up(){fetch(p+"/back-up").then(function(){location.reload()},function(){setTimeout(up,${retryIntervalMs})})}` +
    `fetch(p+"/long-poll").then(function(r){if(r.ok){location.reload()}else{up()}},up)` +
    `})();</script>`
  );
}

async function* appendChunk(body: HttpBody, tail: Uint8Array): AsyncGenerator<Uint8Array, void, undefined> {
  yield* body;
  yield tail;
}

function endpointResponse(text: string): HttpResponse<HttpBody> {
  return {
    status: 200,
    headers: new Headers({
      "content-type": "text/plain; charset=utf-8",
      "cache-control": "no-store",
    }),
    body: Body.fixed(text),
  };
}

export class LiveReload<B extends HttpBody> implements Service<Request, HttpResponse<HttpBody>> {
  private readonly inner: Service<Request, HttpResponse<B>>;
  private readonly reloader: Reloader;
  private readonly prefix: string;
  private readonly script: Uint8Array;
  private readonly shouldInject: (response: HttpResponse<HttpBody>) => boolean;
  private readonly log: Logger;

  constructor(inner: Service<Request, HttpResponse<B>>, options: LiveReloadOptions = {}) {
    this.inner = inner;
    this.reloader = options.reloader ?? new Reloader({ loggerFactory: options.loggerFactory });
    this.prefix = (options.prefix ?? DEFAULT_LIVE_RELOAD_PREFIX).replace(/\/+$/, "");
    this.script = new TextEncoder().encode(
      liveReloadScript(this.prefix, options.retryIntervalMs ?? 1000)
    );
    this.shouldInject = options.shouldInject ?? isHtmlResponse;
    this.log = resolveLogger(options.loggerFactory, SERVICE_NAME);
  }

  ready(signal?: AbortSignal): Promise<void> {
    return this.inner.ready(signal);
  }

  async call(request: Request, signal?: AbortSignal): Promise<HttpResponse<HttpBody>> {
    const path = requestPathname(request);

    if (path === `${this.prefix}/long-poll`) {
      this.log.debug?.({ waiting: this.reloader.waiting }, `${SERVICE_NAME}:call - Long-poll parked`);
      await this.reloader.waitForReload(signal);
      return endpointResponse("reload");
    }

    if (path === `${this.prefix}/back-up`) {
      return endpointResponse("ok");
    }

    const response = await this.inner.call(request, signal);
    if (!this.shouldInject(response)) {
      return response;
    }

    response.headers.delete("content-length");
    return {
      status: response.status,
      headers: response.headers,
      body: appendChunk(response.body, this.script),
    };
  }
}
