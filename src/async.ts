import { SystemError } from './error.js';
import * as Par from './par.js';

/**
 * Same shape as `Computation`, but the suspended leaf is work for the
 * parallel executor, and running produces a `Par` instead of a value.
 */
export type AsyncComputation<A> = Done<A> | Suspend<A> | Bind<A>;

export type Done<A> = { readonly tag: 'Done'; readonly value: A };

export type Suspend<A> = { readonly tag: 'Suspend'; readonly resume: Par.Par<A> };

export type Bind<A> = {
  readonly tag: 'Bind';
  readonly open: <R>(
    use: <X>(
      sub: AsyncComputation<X>,
      k: (x: X) => AsyncComputation<A>
    ) => R
  ) => R;
};

export const done = <A>(value: A): AsyncComputation<A> => ({
  tag: 'Done',
  value,
});

export const suspend = <A>(resume: Par.Par<A>): AsyncComputation<A> => ({
  tag: 'Suspend',
  resume,
});

export const bind = <X, A>(
  sub: AsyncComputation<X>,
  k: (x: X) => AsyncComputation<A>
): AsyncComputation<A> => ({ tag: 'Bind', open: (use) => use(sub, k) });

export const map = <A, B>(
  computation: AsyncComputation<A>,
  f: (a: A) => B
): AsyncComputation<B> => bind(computation, (a) => done(f(a)));

/**
 * Rewrites until the program is `Done`, `Suspend`, or a bind whose left side
 * is a `Suspend`.
 */
export function step<A>(computation: AsyncComputation<A>): AsyncComputation<A> {
  let current = computation;

  while (current.tag === 'Bind') {
    const next = current.open<AsyncComputation<A> | null>((sub, k) => {
      switch (sub.tag) {
        case 'Done':
          return k(sub.value);
        case 'Suspend':
          return null;
        case 'Bind':
          return sub.open<AsyncComputation<A>>((y, g) =>
            bind(y, (a) => bind(g(a), k))
          );
      }
    });
    if (!next) return current;
    current = next;
  }

  return current;
}

export function run<A>(computation: AsyncComputation<A>): Par.Par<A> {
  const stepped = step(computation);
  switch (stepped.tag) {
    case 'Done':
      return Par.unit(stepped.value);
    case 'Suspend':
      return stepped.resume;
    case 'Bind':
      return stepped.open<Par.Par<A>>((sub, k) => {
        if (sub.tag !== 'Suspend') {
          throw SystemError.invariantViolation('async run', sub.tag);
        }
        return Par.flatMap(sub.resume, (a) => run(k(a)));
      });
  }
}
