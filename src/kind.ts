/**
 * @module
 * Type-level encoding of higher-kinded host effects. A host effect such as
 * `IO`, `Task` or `ResultAsync<_, E>` is described by a `TypeLambda` whose
 * `type` member refers to `this["A"]`; `Kind<F, A>` applies it to `A`.
 *
 * @example
 * ```typescript
 * interface ArrayLambda extends TypeLambda {
 *   readonly type: Array<this["A"]>;
 * }
 *
 * type Numbers = Kind<ArrayLambda, number>; // Array<number>
 * ```
 */

export interface TypeLambda {
  readonly A: unknown;
  readonly type: unknown;
}

export type Kind<F extends TypeLambda, A> = F extends {
  readonly type: unknown;
}
  ? (F & { readonly A: A })["type"]
  : { readonly F: F; readonly A: A };

export declare const URI: unique symbol;

/**
 * Base of every capability interface. The optional `[URI]` member is never
 * set; it lets the compiler infer `F` from a capability value such as
 * `MonadError<IOLambda, unknown>` passed where `Monad<F>` is expected.
 */
export interface TypeClass<F extends TypeLambda> {
  readonly [URI]?: F;
}
