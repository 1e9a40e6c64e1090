/** Base class of every error raised while translating a source text */
export class InterpreterError extends Error {
  constructor(public readonly from: string, message: string) {
    super(`${from}: ${message}`);
    this.name = new.target.name;
  }
}

/** unrecognized character or unterminated comment */
export class LexicalError extends InterpreterError {
  constructor(message: string) {
    super("Lexer", message);
  }
}

/** token stream does not match the grammar */
export class ParseError extends InterpreterError {
  constructor(message: string) {
    super("Parser", message);
  }
}

/** duplicate identifier or unknown type in the declarations */
export class SemanticError extends InterpreterError {
  constructor(message: string) {
    super("SemanticAnalyzer", message);
  }
}

/** reference to a variable that is undeclared or has no value yet */
export class NameError extends InterpreterError {
  constructor(message: string, from = "Interpreter") {
    super(from, message);
  }
}

export class ArithmeticError extends InterpreterError {
  constructor(message: string) {
    super("Interpreter", message);
  }
}

export class InternalError extends InterpreterError {
  constructor(message: string) {
    super("Internal", message);
  }
}

export type ErrorClass = new (message: string) => InterpreterError;
