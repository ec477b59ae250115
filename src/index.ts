export type { ExecutionContext, Kind, Kinds, Translator, URI } from './kind.js';
export * as Trampoline from './trampoline.js';
export * as Async from './async.js';
export * as Free from './free.js';
export * as Par from './par.js';
export * from './combinators.js';
export * from './contexts/thunk.js';
export * from './contexts/state.js';
export * from './contexts/reader.js';
export * from './console/vocabulary.js';
export * from './console/interpreters.js';
export * from './io.js';
export * from './demos.js';
export { SystemError, ErrorType } from './error.js';
export { register, inject, Injectable } from './injector.js';
