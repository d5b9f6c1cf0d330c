/**
 * Conditional composition.
 *
 * An Either holds one of two services and implements the service contract
 * by delegating to whichever branch it holds. optionLayer builds one from an
 * optional layer: with a layer the wrapped chain runs (left), without one
 * requests go straight to the next stage (right). The branch is picked once
 * at construction; the static type is the same either way.
 */

import type { Layer, Service } from "@strata/core";

export type EitherBranch<A, B> =
  | { kind: "left"; service: A }
  | { kind: "right"; service: B };

export class Either<A extends Service<Req, Res>, B extends Service<Req, Res>, Req = unknown, Res = unknown>
  implements Service<Req, Res>
{
  public readonly branch: EitherBranch<A, B>;

  private constructor(branch: EitherBranch<A, B>) {
    this.branch = branch;
  }

  static left<A extends Service<Req, Res>, B extends Service<Req, Res>, Req, Res>(
    service: A
  ): Either<A, B, Req, Res> {
    return new Either<A, B, Req, Res>({ kind: "left", service });
  }

  static right<A extends Service<Req, Res>, B extends Service<Req, Res>, Req, Res>(
    service: B
  ): Either<A, B, Req, Res> {
    return new Either<A, B, Req, Res>({ kind: "right", service });
  }

  get isLeft(): boolean {
    return this.branch.kind === "left";
  }

  ready(signal?: AbortSignal): Promise<void> {
    return this.branch.service.ready(signal);
  }

  call(request: Req, signal?: AbortSignal): Promise<Res> {
    return this.branch.service.call(request, signal);
  }
}

/**
 * Turns an optional layer into a layer that always yields an Either.
 * Without a layer the inner chain is never constructed nor invoked.
 */
export function optionLayer<S extends Service<Req, Res>, T extends Service<Req, Res>, Req, Res>(
  layer: Layer<S, T> | undefined
): Layer<S, Either<T, S, Req, Res>> {
  return (inner) =>
    layer ? Either.left<T, S, Req, Res>(layer(inner)) : Either.right<T, S, Req, Res>(inner);
}

/**
 * Reads an enablement flag from untrusted configuration. Only the boolean
 * `true` enables; anything else, including a missing value, disables.
 */
export function enabledFromConfig(value: unknown): boolean {
  return value === true;
}
