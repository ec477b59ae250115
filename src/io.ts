import type { Translator } from './kind.js';
import { bind, effect, runFree, type Free } from './free.js';
import * as Par from './par.js';

/** General purpose effectful program: every effect is executor work. */
export type IO<A> = Free<'Par', A>;

/** Synchronous effect, run on the executor when reached. */
export const io = <A>(thunk: () => A): IO<A> =>
  effect<'Par', A>(Par.delay(thunk));

/** Asynchronous effect that completes once `register` calls back. */
export const ioAsync = <A>(
  register: (callback: (a: A) => void) => void
): IO<A> => effect<'Par', A>(Par.fromCallback(register));

const parToPar: Translator<'Par', 'Par'> = { apply: (par) => par };

export const runIO = <A>(program: IO<A>): Par.Par<A> =>
  runFree(program, parToPar, Par.parContext);

/** Mutable cell whose reads and writes happen only as IO effects. */
export class IORef<A> {
  constructor(private value: A) {}

  get(): IO<A> {
    return io(() => this.value);
  }

  set(value: A): IO<A> {
    return io(() => {
      this.value = value;
      return value;
    });
  }

  modify(f: (a: A) => A): IO<A> {
    return bind(this.get(), (a) => this.set(f(a)));
  }
}

/** A fresh cell for every run of the resulting program. */
export const ref = <A>(initial: A): IO<IORef<A>> =>
  io(() => new IORef(initial));
