import type { ExecutionContext, Kind, Translator, URI } from './kind.js';
import { SystemError } from './error.js';

/**
 * A program over the effect vocabulary `F`: a trampoline whose suspended leaf
 * is an operation of `F` instead of a thunk. It is plain data and may be
 * interpreted any number of times, by any interpreter.
 */
export type Free<F extends URI, A> = Done<A> | Effect<F, A> | Bind<F, A>;

export type Done<A> = { readonly tag: 'Done'; readonly value: A };

export type Effect<F extends URI, A> = {
  readonly tag: 'Effect';
  readonly op: Kind<F, A>;
};

export type Bind<F extends URI, A> = {
  readonly tag: 'Bind';
  readonly open: <R>(
    use: <X>(sub: Free<F, X>, k: (x: X) => Free<F, A>) => R
  ) => R;
};

export const done = <A>(value: A): Done<A> => ({ tag: 'Done', value });

export const effect = <F extends URI, A>(op: Kind<F, A>): Free<F, A> => ({
  tag: 'Effect',
  op,
});

export const bind = <F extends URI, X, A>(
  sub: Free<F, X>,
  k: (x: X) => Free<F, A>
): Free<F, A> => ({ tag: 'Bind', open: (use) => use(sub, k) });

export const map = <F extends URI, A, B>(
  program: Free<F, A>,
  f: (a: A) => B
): Free<F, B> => bind(program, (a): Free<F, B> => done(f(a)));

/**
 * Returns either `Done`, `Effect`, or a bind whose left side is an `Effect`.
 * Left-nested binds are re-associated on the way; effects keep their order.
 */
export function step<F extends URI, A>(program: Free<F, A>): Free<F, A> {
  let current = program;

  while (current.tag === 'Bind') {
    const next = current.open<Free<F, A> | null>((sub, k) => {
      switch (sub.tag) {
        case 'Done':
          return k(sub.value);
        case 'Effect':
          return null;
        case 'Bind':
          return sub.open<Free<F, A>>((y, g) =>
            bind(y, (a) => bind(g(a), k))
          );
      }
    });
    if (!next) return current;
    current = next;
  }

  return current;
}

/**
 * Interprets `program` in the target `G`: every operation goes through
 * `translator`, and the rest of the program is chained with the target's own
 * `sequence`.
 */
export function runFree<F extends URI, G extends URI, A>(
  program: Free<F, A>,
  translator: Translator<F, G>,
  context: ExecutionContext<G>
): Kind<G, A> {
  const stepped = step(program);
  switch (stepped.tag) {
    case 'Done':
      return context.lift(stepped.value);
    case 'Effect':
      return translator.apply(stepped.op);
    case 'Bind':
      return stepped.open(
        <X>(sub: Free<F, X>, k: (x: X) => Free<F, A>): Kind<G, A> => {
          if (sub.tag !== 'Effect') {
            throw SystemError.invariantViolation('runFree', sub.tag);
          }
          return context.sequence<X, A>(translator.apply(sub.op), (x) =>
            runFree(k(x), translator, context)
          );
        }
      );
  }
}

/** Swaps the vocabulary of a program, one operation at a time. */
export function translate<F extends URI, G extends URI, A>(
  program: Free<F, A>,
  translator: Translator<F, G>
): Free<G, A> {
  const stepped = step(program);
  switch (stepped.tag) {
    case 'Done':
      return stepped;
    case 'Effect':
      return effect<G, A>(translator.apply(stepped.op));
    case 'Bind':
      return stepped.open(
        <X>(sub: Free<F, X>, k: (x: X) => Free<F, A>): Free<G, A> => {
          if (sub.tag !== 'Effect') {
            throw SystemError.invariantViolation('translate', sub.tag);
          }
          return bind(effect<G, X>(translator.apply(sub.op)), (x) =>
            translate(k(x), translator)
          );
        }
      );
  }
}

export function runTrampoline<A>(program: Free<'Thunk', A>): A {
  let current = program;

  while (true) {
    const stepped = step(current);
    switch (stepped.tag) {
      case 'Done':
        return stepped.value;
      case 'Effect':
        return stepped.op();
      case 'Bind':
        current = stepped.open<Free<'Thunk', A>>((sub, k) => {
          if (sub.tag !== 'Effect') {
            throw SystemError.invariantViolation('runTrampoline', sub.tag);
          }
          return k(sub.op());
        });
    }
  }
}
