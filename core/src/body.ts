/**
 * Opaque response body.
 *
 * A Body is a type-erased producer of byte chunks. Any value satisfying the
 * HttpBody contract (an async iterable of Uint8Array chunks whose iteration
 * may throw) can be boxed into one, so stages with different body types
 * converge on a single canonical shape.
 */

import { PipelineError } from "./errors.js";

/** Foreign body contract: produces byte chunks, may fail while producing them. */
export type HttpBody = AsyncIterable<Uint8Array>;

type BodyInner =
  | { kind: "fixed"; data: Uint8Array }
  | { kind: "streaming"; stream: HttpBody };

const encoder = new TextEncoder();

export class Body implements AsyncIterable<Uint8Array> {
  private readonly inner: BodyInner;
  private consumed = false;

  private constructor(inner: BodyInner) {
    this.inner = inner;
  }

  static empty(): Body {
    return new Body({ kind: "fixed", data: new Uint8Array(0) });
  }

  static fixed(data: string | Uint8Array): Body {
    return new Body({
      kind: "fixed",
      data: typeof data === "string" ? encoder.encode(data) : data,
    });
  }

  static streaming(stream: HttpBody): Body {
    return new Body({ kind: "streaming", stream });
  }

  /** Boxes any foreign body. An existing Body is returned as is. */
  static wrapper(body: HttpBody): Body {
    if (body instanceof Body) return body;
    return Body.streaming(body);
  }

  /** Exact length in bytes when known up front. */
  sizeHint(): number | undefined {
    return this.inner.kind === "fixed" ? this.inner.data.byteLength : undefined;
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    if (this.consumed) {
      throw new PipelineError({
        code: "BODY_CONSUMED",
        message: "Body has already been consumed",
      });
    }
    this.consumed = true;

    if (this.inner.kind === "fixed") {
      if (this.inner.data.byteLength > 0) yield this.inner.data;
      return;
    }
    yield* this.inner.stream;
  }

  async intoBytes(): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    let total = 0;
    for await (const chunk of this) {
      chunks.push(chunk);
      total += chunk.byteLength;
    }
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      out.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return out;
  }

  async intoText(): Promise<string> {
    return new TextDecoder().decode(await this.intoBytes());
  }
}

/**
 * Forwards every chunk of `body` unchanged and rewrites a failure raised
 * while producing them through `mapErr`.
 */
export async function* mapBodyErrors(
  body: HttpBody,
  mapErr: (err: unknown) => Error
): AsyncGenerator<Uint8Array, void, undefined> {
  try {
    yield* body;
  } catch (err) {
    throw mapErr(err);
  }
}
