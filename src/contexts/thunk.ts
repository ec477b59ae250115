import type { ExecutionContext } from '../kind.js';

export type Thunk<A> = () => A;

declare module '../kind.js' {
  interface Kinds<A> {
    Thunk: Thunk<A>;
  }
}

/**
 * Immediate execution. Sequencing nests calls, so a long program interpreted
 * here grows the stack; `runTrampoline` runs thunk programs in constant stack.
 */
export const thunkContext: ExecutionContext<'Thunk'> = {
  URI: 'Thunk',
  lift: (a) => () => a,
  sequence: (fa, f) => () => f(fa())(),
};
