import { SystemError } from './error.js';

export const identity = <T>(x: T): T => x;

export function unreachable(msg?: string | SystemError): never {
  if (!msg) throw new Error('Unreachable');
  if (msg instanceof SystemError) throw msg;
  throw new Error(msg);
}

export const range = (start: number, end: number): number[] =>
  Array.from({ length: Math.max(end - start + 1, 0) }, (_, i) => start + i);
