import type { ExecutionContext } from '../kind.js';
import { bind, done, run, type Computation } from '../trampoline.js';

/** Simulated console: lines still to be read, and lines printed so far. */
export type Buffers = {
  readonly input: readonly string[];
  readonly output: readonly string[];
};

export const buffers = (
  input: readonly string[] = [],
  output: readonly string[] = []
): Buffers => ({ input, output });

/**
 * State transition over `Buffers`. The transition returns a trampolined
 * computation, so chaining any number of them stays stack safe.
 */
export type ConsoleState<A> = (
  buffers: Buffers
) => Computation<readonly [A, Buffers]>;

declare module '../kind.js' {
  interface Kinds<A> {
    ConsoleState: ConsoleState<A>;
  }
}

export const stateContext: ExecutionContext<'ConsoleState'> = {
  URI: 'ConsoleState',
  lift: (a) => (buffers) => done([a, buffers] as const),
  sequence: (fa, f) => (buffers) =>
    bind(fa(buffers), ([a, next]) => f(a)(next)),
};

export const runState = <A>(
  state: ConsoleState<A>,
  initial: Buffers
): readonly [A, Buffers] => run(state(initial));
