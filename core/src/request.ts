/**
 * Canonical request and its extensible context.
 */

import { Body } from "./body.js";

/**
 * Typed key into a request's extensions. Each key owns the values stored
 * under it, so reads come back with the key's type.
 */
export class ExtensionKey<T> {
  public readonly name: string;
  private readonly values = new WeakMap<Extensions, T>();

  constructor(name: string) {
    this.name = name;
  }

  /** @internal */
  read(ext: Extensions): T | undefined {
    return this.values.get(ext);
  }

  /** @internal */
  write(ext: Extensions, value: T): void {
    this.values.set(ext, value);
  }

  /** @internal */
  remove(ext: Extensions): boolean {
    return this.values.delete(ext);
  }

  /** @internal */
  contains(ext: Extensions): boolean {
    return this.values.has(ext);
  }
}

/** Per-request context that stages use to hand data to inner stages. */
export class Extensions {
  private readonly names = new Set<string>();

  get<T>(key: ExtensionKey<T>): T | undefined {
    return key.read(this);
  }

  set<T>(key: ExtensionKey<T>, value: T): void {
    key.write(this, value);
    this.names.add(key.name);
  }

  has<T>(key: ExtensionKey<T>): boolean {
    return key.contains(this);
  }

  delete<T>(key: ExtensionKey<T>): boolean {
    this.names.delete(key.name);
    return key.remove(this);
  }

  /** Names of the keys currently set (for logging). */
  keys(): string[] {
    return [...this.names];
  }
}

export type HeadersLike = ConstructorParameters<typeof Headers>[0];

export interface Request {
  method: string;
  /** Path including any query string. */
  path: string;
  headers: Headers;
  body: Body;
  extensions: Extensions;
}

export function createRequest(init: {
  method?: string;
  path?: string;
  headers?: HeadersLike;
  body?: Body;
} = {}): Request {
  return {
    method: init.method ?? "GET",
    path: init.path ?? "/",
    headers: new Headers(init.headers),
    body: init.body ?? Body.empty(),
    extensions: new Extensions(),
  };
}

/** Path without its query string. */
export function requestPathname(request: Request): string {
  const q = request.path.indexOf("?");
  return q === -1 ? request.path : request.path.slice(0, q);
}
