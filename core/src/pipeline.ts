/**
 * Layer composition.
 *
 * Layers wrap an inner service; composing them nests the services so that a
 * request passes the layers in construction order on the way in and in
 * reverse order on the way out.
 */

import type { Layer } from "./service.js";

/** Layer that returns its inner service untouched. */
export function identityLayer<S>(inner: S): S {
  return inner;
}

/**
 * Composes two layers, outermost first:
 *   stack(a, b)(s)  →  a(b(s))
 *
 * Nest calls for longer chains: stack(a, stack(b, c)).
 */
export function stack<S, T, U>(outer: Layer<T, U>, inner: Layer<S, T>): Layer<S, U> {
  return (service) => outer(inner(service));
}

/**
 * Composes same-typed layers around a core service.
 *
 * Execution order follows array order:
 *   [l0, l1, l2] + core  →  l0( l1( l2( core ) ) )
 *
 * So l0 runs first (outermost), core runs last (innermost).
 */
export function buildPipeline<S>(params: { layers: Layer<S, S>[]; core: S }): S {
  return params.layers.reduceRight((next, layer) => layer(next), params.core);
}
