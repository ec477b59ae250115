import { setImmediate } from 'node:timers/promises';
import type { ExecutionContext } from './kind.js';

/**
 * A unit of work for the parallel executor. Nothing starts until the
 * function is called; each call starts the work anew.
 */
export type Par<A> = () => Promise<A>;

declare module './kind.js' {
  interface Kinds<A> {
    Par: Par<A>;
  }
}

export const unit =
  <A>(a: A): Par<A> =>
  () =>
    Promise.resolve(a);

/** Runs `f` on the calling turn once started; a throw becomes a rejection. */
export const delay =
  <A>(f: () => A): Par<A> =>
  () =>
    new Promise<A>((resolve) => resolve(f()));

/** Starts `par` on a later turn of the event loop. */
export const fork =
  <A>(par: Par<A>): Par<A> =>
  async () => {
    await setImmediate();
    return await par();
  };

export const lazyUnit = <A>(f: () => A): Par<A> => fork(delay(f));

/** Work that completes when `register` calls back. */
export const fromCallback =
  <A>(register: (callback: (a: A) => void) => void): Par<A> =>
  () =>
    new Promise<A>((resolve) => register(resolve));

export const flatMap =
  <A, B>(par: Par<A>, f: (a: A) => Par<B>): Par<B> =>
  () =>
    par().then((a) => f(a)());

export const map = <A, B>(par: Par<A>, f: (a: A) => B): Par<B> =>
  flatMap(par, (a) => unit(f(a)));

export const map2 =
  <A, B, C>(left: Par<A>, right: Par<B>, f: (a: A, b: B) => C): Par<C> =>
  async () => {
    const [a, b] = await Promise.all([left(), right()]);
    return f(a, b);
  };

export const run = <A>(par: Par<A>): Promise<A> => par();

export const parContext: ExecutionContext<'Par'> = {
  URI: 'Par',
  lift: unit,
  // continue on the executor instead of on the caller's turn
  sequence: (fa, f) => fork(flatMap(fa, f)),
};
