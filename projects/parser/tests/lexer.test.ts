import { LexError } from '../errors';
import {
  HARD_KEYWORDS,
  isTriviaKind,
  Lexeme,
  Lexer,
  TokenKind,
} from '../lexer';

function lex(source: string): [TokenKind, string][] {
  return Lexer.tokenize(source).map((t) => [t.token, t.substr]);
}

describe('Lexer', () => {
  it('should keep whitespace and tell keywords from identifiers', () => {
    expect(lex('val x = 1')).toEqual([
      [TokenKind.Keyword, 'val'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.Identifier, 'x'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.Operator, '='],
      [TokenKind.Whitespace, ' '],
      [TokenKind.IntegerLiteral, '1'],
    ]);
  });

  it('should record the span of each token', () => {
    const [, , name] = Lexer.tokenize('val xy');
    expect(name.span).toEqual({ from: 4, to: 6 });
  });

  it('should glue tokens lexed apart into one operator', () => {
    const glued = Lexeme.glue(Lexer.tokenize('?.'));
    expect(glued.token).toEqual(TokenKind.Operator);
    expect(glued.substr).toEqual('?.');
    expect(glued.span).toEqual({ from: 0, to: 2 });
  });

  it('should print a token inside its kind', () => {
    expect(Lexer.tokenize('x')[0].toString()).toEqual(
      '<IDENTIFIER>x</IDENTIFIER>'
    );
  });

  it('should treat soft keywords as identifiers', () => {
    expect(lex('data open')).toEqual([
      [TokenKind.Identifier, 'data'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.Identifier, 'open'],
    ]);
    expect(HARD_KEYWORDS.has('val')).toBe(true);
    expect(HARD_KEYWORDS.has('data')).toBe(false);
  });

  it('should take the longest operator', () => {
    expect(lex('a?.b ?: c..<d')).toEqual([
      [TokenKind.Identifier, 'a'],
      [TokenKind.Operator, '?'],
      [TokenKind.Operator, '.'],
      [TokenKind.Identifier, 'b'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.Operator, '?'],
      [TokenKind.Operator, ':'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.Identifier, 'c'],
      [TokenKind.Operator, '..<'],
      [TokenKind.Identifier, 'd'],
    ]);
    expect(lex('x->-1')).toEqual([
      [TokenKind.Identifier, 'x'],
      [TokenKind.Operator, '->'],
      [TokenKind.Operator, '-'],
      [TokenKind.IntegerLiteral, '1'],
    ]);
  });

  it('should lex negated keywords only as whole words', () => {
    expect(lex('!is T')).toEqual([
      [TokenKind.Keyword, '!is'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.Identifier, 'T'],
    ]);
    expect(lex('!isEmpty')).toEqual([
      [TokenKind.Operator, '!'],
      [TokenKind.Identifier, 'isEmpty'],
    ]);
  });

  it('should lex number forms', () => {
    expect(lex('0xFF 1.5f 10L 1e3 0b1010 7u')).toEqual([
      [TokenKind.IntegerLiteral, '0xFF'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.FloatLiteral, '1.5f'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.IntegerLiteral, '10L'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.FloatLiteral, '1e3'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.IntegerLiteral, '0b1010'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.IntegerLiteral, '7u'],
    ]);
  });

  it('should not take a range for a float', () => {
    expect(lex('1..2')).toEqual([
      [TokenKind.IntegerLiteral, '1'],
      [TokenKind.Operator, '..'],
      [TokenKind.IntegerLiteral, '2'],
    ]);
  });

  it('should lex comments, nested block comments included', () => {
    expect(lex('/* a /* b */ c */// d\n;')).toEqual([
      [TokenKind.BlockComment, '/* a /* b */ c */'],
      [TokenKind.LineComment, '// d'],
      [TokenKind.Whitespace, '\n'],
      [TokenKind.Semicolon, ';'],
    ]);
  });

  it('should split string templates into parts', () => {
    expect(lex('"a$b${c}\\n"')).toEqual([
      [TokenKind.OpenQuote, '"'],
      [TokenKind.StringText, 'a'],
      [TokenKind.ShortTemplateStart, '$'],
      [TokenKind.Identifier, 'b'],
      [TokenKind.LongTemplateStart, '${'],
      [TokenKind.Identifier, 'c'],
      [TokenKind.LongTemplateEnd, '}'],
      [TokenKind.EscapeSequence, '\\n'],
      [TokenKind.CloseQuote, '"'],
    ]);
  });

  it('should track braces inside templates', () => {
    expect(lex('"${ {x} }"')).toEqual([
      [TokenKind.OpenQuote, '"'],
      [TokenKind.LongTemplateStart, '${'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.Operator, '{'],
      [TokenKind.Identifier, 'x'],
      [TokenKind.Operator, '}'],
      [TokenKind.Whitespace, ' '],
      [TokenKind.LongTemplateEnd, '}'],
      [TokenKind.CloseQuote, '"'],
    ]);
  });

  it('should keep a lone dollar sign as text', () => {
    expect(lex('"$ 1"')).toEqual([
      [TokenKind.OpenQuote, '"'],
      [TokenKind.StringText, '$ 1'],
      [TokenKind.CloseQuote, '"'],
    ]);
  });

  it('should lex raw strings up to the last quote of the closing run', () => {
    expect(lex('"""a"b"""')).toEqual([
      [TokenKind.OpenQuote, '"""'],
      [TokenKind.StringText, 'a"b'],
      [TokenKind.CloseQuote, '"""'],
    ]);
  });

  it('should lex character literals and backtick names', () => {
    expect(lex("'a' '\\n' `my name`")).toEqual([
      [TokenKind.CharLiteral, "'a'"],
      [TokenKind.Whitespace, ' '],
      [TokenKind.CharLiteral, "'\\n'"],
      [TokenKind.Whitespace, ' '],
      [TokenKind.Identifier, '`my name`'],
    ]);
  });

  it('should classify trivia', () => {
    expect(isTriviaKind(TokenKind.Whitespace)).toBe(true);
    expect(isTriviaKind(TokenKind.Semicolon)).toBe(true);
    expect(isTriviaKind(TokenKind.BlockComment)).toBe(true);
    expect(isTriviaKind(TokenKind.Operator)).toBe(false);
  });

  describe('errors', () => {
    test.each<[string, string, number]>([
      ['"abc', 'unterminated string literal', 4],
      ['"a\nb"', 'unterminated string literal', 2],
      ["'ab'", 'malformed character literal', 0],
      ['x # y', "unexpected character '#'", 2],
      ['"\\q"', 'illegal escape sequence', 1],
      ['/* x', 'unterminated comment', 0],
    ])('should reject %j', (source, description, offset) => {
      expect(() => Lexer.tokenize(source)).toThrow(
        new LexError(description, offset)
      );
    });

    it('should describe the error with its offset', () => {
      expect(new LexError('unterminated comment', 3).message).toEqual(
        'LexError: unterminated comment at offset 3'
      );
    });
  });
});
