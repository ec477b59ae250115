/**
 * Stack-safe description of a sequential pure computation.
 *
 * Nothing here runs until `run` is called. `run` reduces the description in a
 * single loop, re-associating left-nested binds to the right, so the depth of
 * the call stack does not depend on the number of sequenced steps.
 */

export type Computation<A> = Done<A> | Delayed<A> | Bind<A>;

export type Done<A> = { readonly tag: 'Done'; readonly value: A };

export type Delayed<A> = { readonly tag: 'Delayed'; readonly thunk: () => A };

/**
 * `sub` followed by `k`. The intermediate type is only visible to whoever
 * opens the node.
 */
export type Bind<A> = {
  readonly tag: 'Bind';
  readonly open: <R>(
    use: <X>(sub: Computation<X>, k: (x: X) => Computation<A>) => R
  ) => R;
};

export const done = <A>(value: A): Computation<A> => ({ tag: 'Done', value });

export const delay = <A>(thunk: () => A): Computation<A> => ({
  tag: 'Delayed',
  thunk,
});

export const bind = <X, A>(
  sub: Computation<X>,
  k: (x: X) => Computation<A>
): Computation<A> => ({ tag: 'Bind', open: (use) => use(sub, k) });

export const map = <A, B>(
  computation: Computation<A>,
  f: (a: A) => B
): Computation<B> => bind(computation, (a) => done(f(a)));

/** Defers building a computation until it is reduced. */
export const suspend = <A>(thunk: () => Computation<A>): Computation<A> =>
  bind(done(undefined), thunk);

export function run<A>(computation: Computation<A>): A {
  let current = computation;

  while (true) {
    switch (current.tag) {
      case 'Done':
        return current.value;
      case 'Delayed':
        return current.thunk();
      case 'Bind':
        current = current.open<Computation<A>>((sub, k) => {
          switch (sub.tag) {
            case 'Done':
              return k(sub.value);
            case 'Delayed':
              return k(sub.thunk());
            case 'Bind':
              // ((y >>= g) >>= k) becomes (y >>= (a => g(a) >>= k))
              return sub.open<Computation<A>>((y, g) =>
                bind(y, (a) => bind(g(a), k))
              );
          }
        });
    }
  }
}
