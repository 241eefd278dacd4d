import { EngineInvocationError } from '../errors.js';

export type Expr =
  | { kind: 'ident'; name: string }
  | { kind: 'call'; name: string; args: Expr[] }
  | { kind: 'literal'; value: unknown };

export type Statement =
  | { kind: 'assign'; targets: string[]; expr: Expr }
  | { kind: 'clear'; names: string[] }
  | { kind: 'expr'; expr: Expr };

type Token =
  | { kind: 'ident'; text: string }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'punct'; text: '(' | ')' | '[' | ']' | ',' | '=' | ';' };

const NUMBER = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENT = /^[A-Za-z][A-Za-z0-9_]*/;

function syntaxError(source: string, detail: string): EngineInvocationError {
  return new EngineInvocationError(`Parse error: ${detail}\nstatement: ${source}`);
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      i++;
      continue;
    }
    if (ch === '(' || ch === ')' || ch === '[' || ch === ']' || ch === ',' || ch === '=' || ch === ';') {
      tokens.push({ kind: 'punct', text: ch });
      i++;
      continue;
    }
    if (ch === "'") {
      // Quotes inside a string are doubled: 'it''s'
      let value = '';
      let j = i + 1;
      for (;;) {
        if (j >= source.length) throw syntaxError(source, 'unterminated string');
        if (source[j] === "'") {
          if (source[j + 1] === "'") {
            value += "'";
            j += 2;
            continue;
          }
          break;
        }
        value += source[j];
        j++;
      }
      tokens.push({ kind: 'string', value });
      i = j + 1;
      continue;
    }
    const rest = source.slice(i);
    const num = NUMBER.exec(rest);
    if (num) {
      tokens.push({ kind: 'number', value: Number(num[0]) });
      i += num[0].length;
      continue;
    }
    const id = IDENT.exec(rest);
    if (id) {
      tokens.push({ kind: 'ident', text: id[0] });
      i += id[0].length;
      continue;
    }
    throw syntaxError(source, `unexpected character '${ch}'`);
  }
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  private peek(offset = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private isPunct(tok: Token | undefined, text: string): boolean {
    return tok?.kind === 'punct' && tok.text === text;
  }

  private expectPunct(text: string) {
    const tok = this.peek();
    if (!this.isPunct(tok, text)) {
      throw syntaxError(this.source, `expected '${text}'`);
    }
    this.pos++;
  }

  private expectIdent(): string {
    const tok = this.peek();
    if (tok?.kind !== 'ident') throw syntaxError(this.source, 'expected a name');
    this.pos++;
    return tok.text;
  }

  private finish() {
    if (this.isPunct(this.peek(), ';')) this.pos++;
    if (this.pos !== this.tokens.length) {
      throw syntaxError(this.source, 'unexpected trailing input');
    }
  }

  statement(): Statement {
    const first = this.peek();
    if (!first) throw syntaxError(this.source, 'empty statement');

    if (first.kind === 'ident' && first.text === 'clear' && !this.isPunct(this.peek(1), '(') && !this.isPunct(this.peek(1), '=')) {
      this.pos++;
      const names: string[] = [];
      while (this.peek()?.kind === 'ident') names.push(this.expectIdent());
      this.finish();
      return { kind: 'clear', names };
    }

    if (this.isPunct(first, '[') && this.hasAssignmentAfterBracket()) {
      this.pos++;
      const targets = [this.expectIdent()];
      while (this.isPunct(this.peek(), ',')) {
        this.pos++;
        targets.push(this.expectIdent());
      }
      this.expectPunct(']');
      this.expectPunct('=');
      const expr = this.expr();
      if (expr.kind === 'literal') {
        throw syntaxError(this.source, 'multiple assignment needs a function call');
      }
      this.finish();
      return { kind: 'assign', targets, expr };
    }

    if (first.kind === 'ident' && this.isPunct(this.peek(1), '=')) {
      this.pos += 2;
      const expr = this.expr();
      this.finish();
      return { kind: 'assign', targets: [first.text], expr };
    }

    const expr = this.expr();
    this.finish();
    return { kind: 'expr', expr };
  }

  expression(): Expr {
    const expr = this.expr();
    this.finish();
    return expr;
  }

  private hasAssignmentAfterBracket(): boolean {
    for (let i = this.pos; i < this.tokens.length; i++) {
      if (this.isPunct(this.tokens[i], ']')) return this.isPunct(this.tokens[i + 1], '=');
    }
    return false;
  }

  private expr(): Expr {
    const tok = this.peek();
    if (!tok) throw syntaxError(this.source, 'expected an expression');

    if (tok.kind === 'number' || tok.kind === 'string') {
      this.pos++;
      return { kind: 'literal', value: tok.value };
    }

    if (this.isPunct(tok, '[')) {
      this.pos++;
      const values: number[] = [];
      while (!this.isPunct(this.peek(), ']')) {
        const el = this.peek();
        if (el?.kind !== 'number') throw syntaxError(this.source, 'array literals hold numbers only');
        values.push(el.value);
        this.pos++;
        if (this.isPunct(this.peek(), ',')) this.pos++;
      }
      this.pos++;
      return { kind: 'literal', value: Float64Array.from(values) };
    }

    if (tok.kind === 'ident') {
      this.pos++;
      if (tok.text === 'true' || tok.text === 'false') {
        return { kind: 'literal', value: tok.text === 'true' };
      }
      if (!this.isPunct(this.peek(), '(')) return { kind: 'ident', name: tok.text };
      this.pos++;
      const args: Expr[] = [];
      if (!this.isPunct(this.peek(), ')')) {
        args.push(this.expr());
        while (this.isPunct(this.peek(), ',')) {
          this.pos++;
          args.push(this.expr());
        }
      }
      this.expectPunct(')');
      return { kind: 'call', name: tok.text, args };
    }

    throw syntaxError(this.source, 'expected an expression');
  }
}

export function parseStatement(source: string): Statement {
  return new Parser(source, tokenize(source)).statement();
}

export function parseExpression(source: string): Expr {
  return new Parser(source, tokenize(source)).expression();
}
