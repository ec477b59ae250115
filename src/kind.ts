/**
 * Registry of type constructors usable as effect vocabularies or as
 * interpretation targets. Each module adds its own entry by declaration
 * merging:
 *
 * ```ts
 * declare module './kind.js' {
 *   interface Kinds<A> {
 *     Thunk: Thunk<A>;
 *   }
 * }
 * ```
 */
export interface Kinds<A> {}

export type URI = keyof Kinds<unknown>;

export type Kind<F extends URI, A> = Kinds<A>[F];

/** What a target must support for `runFree` to interpret into it. */
export interface ExecutionContext<F extends URI> {
  readonly URI: F;
  lift<A>(a: A): Kind<F, A>;
  sequence<A, B>(fa: Kind<F, A>, f: (a: A) => Kind<F, B>): Kind<F, B>;
}

/** Natural transformation `F ~> G`, uniform over the result type. */
export interface Translator<F extends URI, G extends URI> {
  apply<A>(fa: Kind<F, A>): Kind<G, A>;
}
