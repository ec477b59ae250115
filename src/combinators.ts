import type { URI } from './kind.js';
import { bind, done, map, type Free } from './free.js';

export const skip = <F extends URI, A>(program: Free<F, A>): Free<F, void> =>
  map(program, () => undefined);

export const product = <F extends URI, A, B>(
  left: Free<F, A>,
  right: Free<F, B>
): Free<F, [A, B]> =>
  bind(left, (a): Free<F, [A, B]> => map(right, (b): [A, B] => [a, b]));

/** Runs programs left to right, collecting their results. */
export const all = <F extends URI, A>(
  programs: readonly Free<F, A>[]
): Free<F, A[]> =>
  fold<F, Free<F, A>, A[]>(programs, [], (results, program) =>
    map(program, (a) => [...results, a])
  );

export const replicate = <F extends URI, A>(
  n: number,
  program: Free<F, A>
): Free<F, A[]> => all(Array.from({ length: Math.max(n, 0) }, () => program));

/** Like `replicate`, discarding results. */
export const times = <F extends URI, A>(
  n: number,
  program: Free<F, A>
): Free<F, void> => {
  if (n <= 0) return done(undefined);
  return bind(program, () => times(n - 1, program));
};

export const forever = <F extends URI, A, B = never>(
  program: Free<F, A>
): Free<F, B> => bind(program, () => forever<F, A, B>(program));

/** Runs `program` only when `condition` holds, reporting whether it ran. */
export const when = <F extends URI, A>(
  condition: boolean,
  program: Free<F, A>
): Free<F, boolean> => {
  if (!condition) return done(false);
  return map(program, () => true);
};

/** Repeats `program` for as long as `condition` of its result yields true. */
export const doWhile = <F extends URI, A>(
  program: Free<F, A>,
  condition: (a: A) => Free<F, boolean>
): Free<F, void> =>
  bind(program, (a) =>
    bind(condition(a), (ok): Free<F, void> => {
      if (!ok) return done(undefined);
      return doWhile(program, condition);
    })
  );

export const fold = <F extends URI, T, B>(
  items: readonly T[],
  initial: B,
  f: (acc: B, item: T) => Free<F, B>
): Free<F, B> => {
  const go = (index: number, acc: B): Free<F, B> => {
    if (index >= items.length) return done(acc);
    return bind(f(acc, items[index]), (next) => go(index + 1, next));
  };
  return go(0, initial);
};

export const forEach = <F extends URI, T>(
  items: readonly T[],
  f: (item: T) => Free<F, unknown>
): Free<F, void> =>
  fold<F, T, void>(items, undefined, (_, item) => skip(f(item)));
