import { Clause, Literal, mkConst, mkFunApp, mkVar, NodeKind, Term } from './ast';
import { createClause } from './resolution';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * Token types for the lexer.
 */
export enum TokenKind {
  IDENTIFIER = 'IDENTIFIER',

  NOT = 'NOT', // ¬ ! ~
  OR = 'OR', // | ∨ (separates the literals of a clause)
  BOTTOM = 'BOTTOM', // ⊥ (the empty clause)

  LPAREN = 'LPAREN', // (
  RPAREN = 'RPAREN', // )
  COMMA = 'COMMA', // ,

  EOF = 'EOF',
}

export interface Token {
  kind: TokenKind;
  value: string;
  pos: number;
}

/**
 * Represents malformed literal or clause text.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly pos: number,
    public readonly input: string
  ) {
    super(`${message} at position ${pos} in '${input}'`);
    this.name = 'ParseError';
  }
}

const SINGLE_CHAR_TOKENS: Record<string, TokenKind> = {
  '(': TokenKind.LPAREN,
  ')': TokenKind.RPAREN,
  ',': TokenKind.COMMA,
  '¬': TokenKind.NOT,
  '!': TokenKind.NOT,
  '~': TokenKind.NOT,
  '|': TokenKind.OR,
  '∨': TokenKind.OR,
  '⊥': TokenKind.BOTTOM,
};

export class Lexer {
  private pos = 0;
  private current = '';
  constructor(private readonly input: string) {
    this.advance();
  }

  private advance(): void {
    this.current =
      this.pos < this.input.length ? this.input.charAt(this.pos++) : '';
  }
  private skipWs(): void {
    while (this.current && /\s/.test(this.current)) this.advance();
  }

  private readIdentifier(): string {
    let out = '';
    while (this.current && /[A-Za-z0-9_']/.test(this.current)) {
      out += this.current;
      this.advance();
    }
    return out;
  }

  public nextToken(): Token {
    this.skipWs();
    if (!this.current)
      return { kind: TokenKind.EOF, value: '', pos: this.input.length };
    const start = this.pos - 1;

    const single = SINGLE_CHAR_TOKENS[this.current];
    if (single !== undefined) {
      const value = this.current;
      this.advance();
      return { kind: single, value, pos: start };
    }

    if (/[A-Za-z0-9_]/.test(this.current)) {
      return { kind: TokenKind.IDENTIFIER, value: this.readIdentifier(), pos: start };
    }

    throw new ParseError(
      `Unexpected character '${this.current}'`,
      start,
      this.input
    );
  }
}

export class Parser {
  private current = 0;
  private readonly tokens: Token[] = [];

  constructor(
    lexer: Lexer,
    private readonly input: string
  ) {
    let t;
    do {
      t = lexer.nextToken();
      this.tokens.push(t);
    } while (t.kind !== TokenKind.EOF);
  }

  private peek(): Token {
    return (
      this.tokens[this.current] ?? {
        kind: TokenKind.EOF,
        value: '',
        pos: this.input.length,
      }
    );
  }

  private advance(): Token {
    const tok = this.peek();
    if (tok.kind !== TokenKind.EOF) this.current++;
    return tok;
  }

  private match(...k: TokenKind[]): boolean {
    return k.includes(this.peek().kind);
  }

  private fail(message: string): never {
    throw new ParseError(message, this.peek().pos, this.input);
  }

  private expect(kind: TokenKind): Token {
    if (!this.match(kind)) {
      const tok = this.peek();
      this.fail(
        tok.kind === TokenKind.EOF
          ? `Expected ${kind} but input ended`
          : `Expected ${kind} but found '${tok.value}'`
      );
    }
    return this.advance();
  }

  public expectEnd(): void {
    if (!this.match(TokenKind.EOF)) {
      this.fail(`Unexpected '${this.peek().value}'`);
    }
  }

  /**
   * clause := '⊥' | <empty> | literal (OR literal)*
   */
  public parseClause(): Literal[] {
    if (this.match(TokenKind.EOF)) return [];
    if (this.match(TokenKind.BOTTOM)) {
      this.advance();
      return [];
    }

    const literals = [this.parseLiteral()];
    while (this.match(TokenKind.OR)) {
      this.advance();
      literals.push(this.parseLiteral());
    }
    return literals;
  }

  /**
   * literal := NOT* atom. Each negation marker toggles the polarity.
   */
  public parseLiteral(): Literal {
    let negated = false;
    while (this.match(TokenKind.NOT)) {
      this.advance();
      negated = !negated;
    }
    return { atom: this.parseAtom(), negated };
  }

  /**
   * atom := IDENTIFIER ('(' term (',' term)* ')')?. A bare name in predicate
   * position is a 0-ary predicate, so `p` is never a variable here.
   */
  public parseAtom(): Term {
    const t = this.parseTerm();
    return t.kind === NodeKind.Var ? mkConst(t.name) : t;
  }

  public parseTerm(): Term {
    if (!this.match(TokenKind.IDENTIFIER)) {
      this.fail(
        this.match(TokenKind.EOF)
          ? 'Expected term but input ended'
          : `Expected term but found '${this.peek().value}'`
      );
    }
    const id = this.advance().value;

    if (this.match(TokenKind.LPAREN)) {
      this.advance();
      const args: Term[] = [this.parseTerm()];
      while (this.match(TokenKind.COMMA)) {
        this.advance();
        args.push(this.parseTerm());
      }
      this.expect(TokenKind.RPAREN);
      return mkFunApp(id, args);
    }

    return looksLikeVariable(id) ? mkVar(id) : mkConst(id);
  }
}

function parser(input: string): Parser {
  return new Parser(new Lexer(input), input);
}

/**
 * Parses a single term such as `father(x)`.
 */
export function parseTerm(input: string): Term {
  const p = parser(input);
  const t = p.parseTerm();
  p.expectEnd();
  return t;
}

/**
 * Parses a single, possibly negated, literal such as `¬Parent(x, y)`.
 */
export function parseLiteral(input: string): Literal {
  const p = parser(input);
  const l = p.parseLiteral();
  p.expectEnd();
  return l;
}

/**
 * Parses a clause, either as text with literals separated by `|` or `∨`, or
 * as a list of literal texts.
 */
export function parseClause(input: string | readonly string[]): Clause {
  let literals: Literal[];
  if (typeof input === 'string') {
    const p = parser(input);
    literals = p.parseClause();
    p.expectEnd();
  } else {
    literals = input.map(parseLiteral);
  }

  const clause = createClause(literals);
  debugLogger.trace(LogComponent.PARSE, `Parsed clause: ${clause.key}`);
  return clause;
}

/**
 * Return `true` if the identifier should be treated as a *variable* by
 * syntactic convention: a single lowercase letter, optionally primed as
 * `renameApart` leaves it (`x'`, `y''`).
 */
export function looksLikeVariable(name: string): boolean {
  return /^[a-z]'*$/.test(name);
}
