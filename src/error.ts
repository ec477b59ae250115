import { Diagnostic } from 'codespan-napi';
import { inject, Injectable } from './injector.js';

export enum ErrorType {
  UNKNOWN,
  INVARIANT_VIOLATION,
  INCOMPLETE_TRANSLATOR,
  UNTRANSLATABLE_EFFECT,
  END_OF_INPUT,
  UNKNOWN_DEMO,
  INVALID_INTERPRETER,
}

type Options = {
  cause?: unknown;
  data?: Record<string, unknown>;
  notes?: string[];
};

const fatalErrors = new Set([
  ErrorType.INVARIANT_VIOLATION,
  ErrorType.INCOMPLETE_TRANSLATOR,
  ErrorType.UNTRANSLATABLE_EFFECT,
]);

export class SystemError extends Error {
  data: Record<string, unknown>;
  readonly type: ErrorType;
  private notes: string[];
  private constructor(type: ErrorType, msg: string, options: Options = {}) {
    super(msg, { cause: options.cause });
    this.data = options.data ?? {};
    this.type = type;
    this.notes = options.notes ?? [];
  }

  get code(): string {
    return ErrorType[this.type];
  }

  /**
   * Defects in an interpreter or in the core itself.
   * Never recovered from, unlike end of input or a bad CLI argument.
   */
  isFatal(): boolean {
    return fatalErrors.has(this.type);
  }

  toObject(): Record<string, unknown> {
    return {
      type: this.code,
      message: this.message,
      data: this.data,
      notes: this.notes,
    };
  }

  withCause(cause: unknown): SystemError {
    this.cause = cause;
    return this;
  }

  print(): SystemError {
    const fileMap = inject(Injectable.FileMap);
    const diag = this.diagnostic();
    diag.emitStd(fileMap);
    return this;
  }

  /** Programs carry no source text, so diagnostics have no labels. */
  diagnostic(): Diagnostic {
    const diag = Diagnostic.error();
    diag.withMessage(this.message);
    diag.withCode(this.code);
    diag.withNotes(this.notes);
    return diag;
  }

  static unknown(): SystemError {
    const msg = 'Unknown error';
    return new SystemError(ErrorType.UNKNOWN, msg);
  }

  static invariantViolation(driver: string, shape: string): SystemError {
    const msg = `${driver} reached a program shape that stepping eliminates`;
    const notes: string[] = [];
    const options = { notes, data: { driver, shape } };

    notes.push(`after step, a bind node had a "${shape}" node on its left`);
    notes.push('this is a bug in the interpreter core, not in the program');

    return new SystemError(ErrorType.INVARIANT_VIOLATION, msg, options);
  }

  static incompleteTranslator(
    vocabulary: string,
    missing: string[]
  ): SystemError {
    const list = missing.map((name) => `"${name}"`).join(', ');
    const msg = `Translator for ${vocabulary} is missing cases: ${list}`;
    const notes: string[] = [];
    const options = { notes, data: { vocabulary, missing } };

    notes.push(
      `A translator must handle every ${vocabulary} operation, so no effect is skipped`
    );

    return new SystemError(ErrorType.INCOMPLETE_TRANSLATOR, msg, options);
  }

  static untranslatableEffect(vocabulary: string, op: unknown): SystemError {
    const tag =
      typeof op === 'object' && op !== null && 'tag' in op
        ? String(op.tag)
        : String(op);
    const msg = `No ${vocabulary} translation for operation "${tag}"`;
    const options = { data: { vocabulary, tag } };

    return new SystemError(ErrorType.UNTRANSLATABLE_EFFECT, msg, options);
  }

  static endOfInput(): SystemError {
    const msg = 'Unexpected end of input';
    return new SystemError(ErrorType.END_OF_INPUT, msg);
  }

  static unknownDemo(name: string, known: string[]): SystemError {
    const msg = `Unknown demo "${name}"`;
    const notes: string[] = [];
    const options = { notes, data: { name } };

    notes.push(`Available demos: ${known.join(', ')}`);

    return new SystemError(ErrorType.UNKNOWN_DEMO, msg, options);
  }

  static invalidInterpreter(name: string, known: string[]): SystemError {
    const msg = `Unknown interpreter "${name}"`;
    const notes: string[] = [];
    const options = { notes, data: { name } };

    notes.push(`Expected one of: ${known.join(', ')}`);

    return new SystemError(ErrorType.INVALID_INTERPRETER, msg, options);
  }
}
