import type {
  Block,
  Compound,
  Expression,
  Program,
  Statement,
  Type,
  Var,
  VarDecl,
} from "./ast.ts";
import { InternalError, ParseError } from "./errors.ts";
import type { Lexer } from "./lexer.ts";
import { showToken, type Token, TokenType } from "./token.ts";
import { err } from "./utils.ts";

/**Parser */
export class Parser {
  private lexer: Lexer;
  constructor(lexer: Lexer) {
    this.lexer = lexer;
  }

  /** program : PROGRAM variable SEMI block DOT, followed by the end of input */
  public parse = (): Program => {
    this.lexer.nextToken();
    const program = this.program();
    this.eat(TokenType.EOF);
    return program;
  };

  /** expr, followed by the end of input */
  public parseExpression = (): Expression => {
    this.lexer.nextToken();
    const expr = this.expr();
    this.eat(TokenType.EOF);
    return expr;
  };

  private peek = (): TokenType => this.lexer.currentToken().type;

  private eat = (type: TokenType): Token => {
    const tok = this.lexer.currentToken();
    if (tok.type !== type) {
      return err(
        ParseError,
        `Expected ${type}, found ${showToken(tok)} at offset ${tok.pos}`,
      );
    }
    this.lexer.nextToken();
    return tok;
  };

  private program = (): Program => {
    this.eat(TokenType.PROGRAM);
    const { name, token } = this.variable();
    this.eat(TokenType.SEMI);
    const block = this.block();
    this.eat(TokenType.DOT);
    return { type: "Program", name, token, block };
  };

  private block = (): Block => {
    const declarations = this.declarations();
    const { body } = this.compoundStatement();
    return { type: "Block", declarations, statements: body };
  };

  // VAR (variable_declaration SEMI)+ | empty
  private declarations = (): VarDecl[] => {
    const declarations: VarDecl[] = [];
    if (this.peek() !== TokenType.VAR) return declarations;

    this.eat(TokenType.VAR);
    do {
      declarations.push(...this.variableDeclaration());
      this.eat(TokenType.SEMI);
    } while (this.peek() === TokenType.ID);
    return declarations;
  };

  // ID (COMMA ID)* COLON type_spec
  private variableDeclaration = (): VarDecl[] => {
    const variables = [this.variable()];
    while (this.peek() === TokenType.COMMA) {
      this.eat(TokenType.COMMA);
      variables.push(this.variable());
    }
    this.eat(TokenType.COLON);
    const typeSpec = this.typeSpec();
    return variables.map((variable): VarDecl => ({
      type: "VarDecl",
      variable,
      typeSpec: { ...typeSpec },
    }));
  };

  private typeSpec = (): Type => {
    const token = this.lexer.currentToken();
    switch (token.type) {
      case TokenType.INTEGER: {
        this.eat(TokenType.INTEGER);
        return { type: "Type", token, name: "INTEGER" };
      }
      case TokenType.REAL: {
        this.eat(TokenType.REAL);
        return { type: "Type", token, name: "REAL" };
      }
      default:
        return err(
          ParseError,
          `Expected INTEGER or REAL, found ${
            showToken(token)
          } at offset ${token.pos}`,
        );
    }
  };

  private compoundStatement = (): Compound => {
    this.eat(TokenType.BEGIN);
    const body = this.statementList();
    this.eat(TokenType.END);
    return { type: "Compound", body };
  };

  private statementList = (): Statement[] => {
    const statements = [this.statement()];
    while (this.peek() === TokenType.SEMI) {
      this.eat(TokenType.SEMI);
      statements.push(this.statement());
    }
    return statements;
  };

  private statement = (): Statement => {
    switch (this.peek()) {
      case TokenType.BEGIN:
        return this.compoundStatement();
      case TokenType.ID: {
        const left = this.variable();
        this.eat(TokenType.ASSIGN);
        const right = this.expr();
        return { type: "Assign", left, right };
      }
      default:
        return { type: "NoOp" };
    }
  };

  private variable = (): Var => {
    const token = this.eat(TokenType.ID);
    return { type: "Var", token, name: String(token.value) };
  };

  private expr = (): Expression => {
    let left = this.term();
    while (
      this.peek() === TokenType.PLUS ||
      this.peek() === TokenType.MINUS
    ) {
      const op = this.eat(this.peek());
      const right = this.term();
      left = { type: "BinOp", op, left, right };
    }
    return left;
  };

  private term = (): Expression => {
    let left = this.factor();
    while (
      this.peek() === TokenType.MULTIPLY ||
      this.peek() === TokenType.INTEGER_DIVIDE ||
      this.peek() === TokenType.FLOAT_DIVIDE
    ) {
      const op = this.eat(this.peek());
      const right = this.factor();
      left = { type: "BinOp", op, left, right };
    }
    return left;
  };

  private factor = (): Expression => {
    const token = this.lexer.currentToken();

    switch (token.type) {
      case TokenType.PLUS:
      case TokenType.MINUS: {
        const op = this.eat(token.type);
        const argument = this.factor();
        return { type: "UnaryOp", op, argument };
      }
      case TokenType.INTEGER_CONST:
      case TokenType.REAL_CONST: {
        this.eat(token.type);
        if (typeof token.value !== "number") {
          return err(InternalError, `Numeric token without a value`);
        }
        return { type: "Num", token, value: token.value };
      }
      case TokenType.LPAREN: {
        this.eat(TokenType.LPAREN);
        const expr = this.expr();
        this.eat(TokenType.RPAREN);
        return expr;
      }
      case TokenType.ID:
        return this.variable();
      default:
        return err(
          ParseError,
          `Expected an expression, found ${
            showToken(token)
          } at offset ${token.pos}`,
        );
    }
  };
}
