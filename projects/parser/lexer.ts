import { colors } from '../utils/debug';
import { Iter } from '../utils/iter';
import { LexError } from './errors';

export enum TokenKind {
  Whitespace = 'WHITE_SPACE',
  LineComment = 'EOL_COMMENT',
  BlockComment = 'BLOCK_COMMENT',
  Semicolon = 'SEMICOLON',
  Identifier = 'IDENTIFIER',
  Keyword = 'KEYWORD',
  IntegerLiteral = 'INTEGER_LITERAL',
  FloatLiteral = 'FLOAT_LITERAL',
  CharLiteral = 'CHARACTER_LITERAL',
  OpenQuote = 'OPEN_QUOTE',
  CloseQuote = 'CLOSING_QUOTE',
  StringText = 'REGULAR_STRING_PART',
  EscapeSequence = 'ESCAPE_SEQUENCE',
  ShortTemplateStart = 'SHORT_TEMPLATE_ENTRY_START',
  LongTemplateStart = 'LONG_TEMPLATE_ENTRY_START',
  LongTemplateEnd = 'LONG_TEMPLATE_ENTRY_END',
  Operator = 'OPERATOR',
}


const TRIVIA_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.Whitespace,
  TokenKind.LineComment,
  TokenKind.BlockComment,
  TokenKind.Semicolon,
]);

export function isTriviaKind(kind: TokenKind): boolean {
  return TRIVIA_KINDS.has(kind);
}

export type Span = { from: number; to: number };

export class Lexeme {
  readonly token: TokenKind;
  readonly span: Span;
  readonly substr: string;
  constructor(token: TokenKind, span: Span, substr: string) {
    this.token = token;
    this.span = span;
    this.substr = substr;
  }

  /**
   * One operator token spanning `parts`, for operators such as `>=` that
   * are lexed in pieces so that `>` can close type arguments.
   */
  static glue(parts: readonly Lexeme[]): Lexeme {
    const [first] = parts;
    const last = parts[parts.length - 1];
    if (first === undefined || last === undefined) {
      throw new Error('Lexeme.glue: no tokens');
    }
    return new Lexeme(
      TokenKind.Operator,
      { from: first.span.from, to: last.span.to },
      parts.map((p) => p.substr).join('')
    );
  }

  toString() {
    return (
      colors.green(`<${this.token}>`) +
      this.substr +
      colors.green(`</${this.token}>`)
    );
  }
}

export const HARD_KEYWORDS: ReadonlySet<string> = new Set([
  'as',
  'break',
  'class',
  'continue',
  'do',
  'else',
  'false',
  'for',
  'fun',
  'if',
  'in',
  'interface',
  'is',
  'null',
  'object',
  'package',
  'return',
  'super',
  'this',
  'throw',
  'true',
  'try',
  'typealias',
  'typeof',
  'val',
  'var',
  'when',
  'while',
]);

// longest first
const OPERATORS = [
  '===',
  '!==',
  '..<',
  '->',
  '::',
  '..',
  '++',
  '--',
  '&&',
  '||',
  '!!',
  '!=',
  '==',
  '<=',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '+',
  '-',
  '*',
  '/',
  '%',
  '=',
  '<',
  '>',
  '!',
  '?',
  '.',
  ',',
  ':',
  '(',
  ')',
  '[',
  ']',
  '@',
];

const WHITESPACE = /[ \t\r\n\f]+/y;
const LINE_COMMENT = /\/\/[^\r\n]*/y;
const IDENTIFIER = /[\p{L}_][\p{L}\p{Nd}_]*/uy;
const BACKTICK_IDENTIFIER = /`[^`\r\n]+`/y;
const NEGATED_KEYWORD = /!(?:in|is)(?![\p{L}\p{Nd}_])/uy;
const HEX_LITERAL = /0[xX][0-9a-fA-F][0-9a-fA-F_]*(?:[uU]L?|L)?/y;
const BIN_LITERAL = /0[bB][01][01_]*(?:[uU]L?|L)?/y;
const FLOAT_LITERAL =
  /\d[\d_]*(?:\.\d[\d_]*(?:[eE][+-]?\d[\d_]*)?[fF]?|[eE][+-]?\d[\d_]*[fF]?|[fF])/y;
const INT_LITERAL = /\d[\d_]*(?:[uU]L?|L)?/y;
const CHAR_LITERAL = /'(?:\\u[0-9a-fA-F]{4}|\\.|[^'\\\r\n])'/y;
const ESCAPE = /\\(?:u[0-9a-fA-F]{4}|[tbnr'"\\$])/y;
const STRING_TEXT = /(?:[^"\\$\r\n]|\$(?![\p{L}_{]))+/uy;
const RAW_STRING_TEXT = /(?:[^"$]|"(?!"")|"(?=""")|\$(?![\p{L}_{]))+/uy;
const RAW_STRING_CLOSE = /"""(?!")/y;

type Mode =
  | { kind: 'code'; braces: number }
  | { kind: 'string'; raw: boolean };

/**
 * Splits source text into tokens, whitespace and comments included.
 *
 * String literals are lexed with a mode stack, so `${...}` templates can
 * nest strings and braces to any depth.
 */
export class Lexer extends Iter<Lexeme> {
  static tokenize(source: string): Lexeme[] {
    return new Lexer(source).toArray();
  }

  private source: string;
  private pos = 0;
  private modes: Mode[] = [{ kind: 'code', braces: 0 }];
  private pending: Lexeme[] = [];

  constructor(source: string) {
    super();
    this.source = source;
  }

  next(): IteratorResult<Lexeme> {
    const pending = this.pending.shift();
    if (pending) {
      return { done: false, value: pending };
    }
    if (this.pos >= this.source.length) {
      if (this.modes.length > 1) {
        throw new LexError('unterminated string literal', this.pos);
      }
      return { done: true, value: undefined };
    }
    const mode = this.modes[this.modes.length - 1];
    const value =
      mode.kind === 'code' ? this.lexCode(mode) : this.lexString(mode.raw);
    return { done: false, value };
  }

  private match(pattern: RegExp, at = this.pos): string | null {
    pattern.lastIndex = at;
    const result = pattern.exec(this.source);
    return result ? result[0] : null;
  }

  private token(kind: TokenKind, substr: string): Lexeme {
    const from = this.pos;
    this.pos += substr.length;
    return new Lexeme(kind, { from, to: this.pos }, substr);
  }

  private lexCode(mode: { kind: 'code'; braces: number }): Lexeme {
    const ch = this.source[this.pos];
    let text: string | null;
    if ((text = this.match(WHITESPACE))) {
      return this.token(TokenKind.Whitespace, text);
    }
    if ((text = this.match(LINE_COMMENT))) {
      return this.token(TokenKind.LineComment, text);
    }
    if (this.source.startsWith('/*', this.pos)) {
      return this.token(TokenKind.BlockComment, this.blockComment());
    }
    if (this.source.startsWith('"""', this.pos)) {
      this.modes.push({ kind: 'string', raw: true });
      return this.token(TokenKind.OpenQuote, '"""');
    }
    if (ch === '"') {
      this.modes.push({ kind: 'string', raw: false });
      return this.token(TokenKind.OpenQuote, '"');
    }
    if (ch === "'") {
      if ((text = this.match(CHAR_LITERAL))) {
        return this.token(TokenKind.CharLiteral, text);
      }
      throw new LexError('malformed character literal', this.pos);
    }
    if ((text = this.match(BACKTICK_IDENTIFIER))) {
      return this.token(TokenKind.Identifier, text);
    }
    if ((text = this.match(NEGATED_KEYWORD))) {
      return this.token(TokenKind.Keyword, text);
    }
    if ((text = this.match(IDENTIFIER))) {
      const kind = HARD_KEYWORDS.has(text)
        ? TokenKind.Keyword
        : TokenKind.Identifier;
      return this.token(kind, text);
    }
    if (ch >= '0' && ch <= '9') {
      return this.number();
    }
    if (ch === ';') {
      return this.token(TokenKind.Semicolon, ';');
    }
    if (ch === '{') {
      mode.braces++;
      return this.token(TokenKind.Operator, '{');
    }
    if (ch === '}') {
      if (mode.braces === 0 && this.modes.length > 1) {
        this.modes.pop();
        return this.token(TokenKind.LongTemplateEnd, '}');
      }
      mode.braces = Math.max(mode.braces - 1, 0);
      return this.token(TokenKind.Operator, '}');
    }
    const op = OPERATORS.find((o) => this.source.startsWith(o, this.pos));
    if (op !== undefined) {
      return this.token(TokenKind.Operator, op);
    }
    throw new LexError(`unexpected character '${ch}'`, this.pos);
  }

  private number(): Lexeme {
    const hexOrBin = this.match(HEX_LITERAL) ?? this.match(BIN_LITERAL);
    if (hexOrBin) {
      return this.token(TokenKind.IntegerLiteral, hexOrBin);
    }
    const float = this.match(FLOAT_LITERAL);
    if (float) {
      return this.token(TokenKind.FloatLiteral, float);
    }
    const int = this.match(INT_LITERAL);
    if (int) {
      return this.token(TokenKind.IntegerLiteral, int);
    }
    throw new LexError('malformed number', this.pos);
  }

  private blockComment(): string {
    let depth = 0;
    let at = this.pos;
    while (at < this.source.length) {
      if (this.source.startsWith('/*', at)) {
        depth++;
        at += 2;
      } else if (this.source.startsWith('*/', at)) {
        depth--;
        at += 2;
        if (depth === 0) {
          return this.source.slice(this.pos, at);
        }
      } else {
        at++;
      }
    }
    throw new LexError('unterminated comment', this.pos);
  }

  private lexString(raw: boolean): Lexeme {
    const ch = this.source[this.pos];
    if (raw) {
      if (this.match(RAW_STRING_CLOSE)) {
        this.modes.pop();
        return this.token(TokenKind.CloseQuote, '"""');
      }
    } else {
      if (ch === '"') {
        this.modes.pop();
        return this.token(TokenKind.CloseQuote, '"');
      }
      if (ch === '\\') {
        const escape = this.match(ESCAPE);
        if (!escape) {
          throw new LexError('illegal escape sequence', this.pos);
        }
        return this.token(TokenKind.EscapeSequence, escape);
      }
      if (ch === '\n' || ch === '\r') {
        throw new LexError('unterminated string literal', this.pos);
      }
    }
    if (this.source.startsWith('${', this.pos)) {
      this.modes.push({ kind: 'code', braces: 0 });
      return this.token(TokenKind.LongTemplateStart, '${');
    }
    const name = ch === '$' ? this.match(IDENTIFIER, this.pos + 1) : null;
    if (name !== null) {
      const start = this.token(TokenKind.ShortTemplateStart, '$');
      const kind = HARD_KEYWORDS.has(name)
        ? TokenKind.Keyword
        : TokenKind.Identifier;
      this.pending.push(this.token(kind, name));
      return start;
    }
    const text = this.match(raw ? RAW_STRING_TEXT : STRING_TEXT);
    if (text === null) {
      throw new LexError('unterminated string literal', this.pos);
    }
    return this.token(TokenKind.StringText, text);
  }
}
