/**
 * Notation compile errors
 *
 * Every failure while compiling a corpus is fatal. Errors are raised without a
 * location by the lexer and parser, then located by the compiler.
 */

export type NotationErrorKind =
  | 'InvalidIdentifier'
  | 'InvalidEscape'
  | 'UnterminatedEscape'
  | 'InvalidCodepoint'
  | 'MissingValue'
  | 'MissingDeprecationMessage'
  | 'DanglingDeprecation'
  | 'DuplicateDeprecation'
  | 'MalformedModifierAnnotation'
  | 'UnexpectedDeclaration'
  | 'DuplicateDefinition'
  | 'AliasToNonexistentSymbol'
  | 'AliasToNonexistentVariant'
  | 'AliasToAlias';

export class NotationError extends Error {
  readonly kind: NotationErrorKind;
  readonly reason: string;
  readonly file?: string;
  readonly line?: number;

  constructor(kind: NotationErrorKind, reason: string, file?: string, line?: number) {
    super(line === undefined ? reason : `${file ?? '<input>'}:${line}: ${reason}`);
    this.name = 'NotationError';
    this.kind = kind;
    this.reason = reason;
    this.file = file;
    this.line = line;
  }

  /**
   * Attach a source location, keeping one that is already set
   */
  at(file: string, line: number): NotationError {
    if (this.line !== undefined) return this;
    return new NotationError(this.kind, this.reason, file, line);
  }
}

export function isNotationError(error: unknown): error is NotationError {
  return error instanceof NotationError;
}
