import { Writer } from '../../ast/writer';
import { LexError, ParseError, UnsupportedConstructError } from '../errors';
import { KotlinParser } from '../parser';

function parseError(source: string, fileName?: string): ParseError {
  try {
    KotlinParser.parseFile(source, { fileName });
  } catch (e) {
    if (e instanceof ParseError) {
      return e;
    }
    throw e;
  }
  throw new Error(`expected ${JSON.stringify(source)} not to parse`);
}

describe('KotlinParser', () => {
  describe('parseFile', () => {
    it('should build a file node', () => {
      const { file } = KotlinParser.parseFile('val x = 1');
      expect(file.name).toEqual('KotlinFile');
      expect(file.fields.declarations.map((d) => d.name)).toEqual([
        'PropertyDeclaration',
      ]);
    });

    it('should return an empty extras map when asked not to keep extras', () => {
      const { file, extrasMap } = KotlinParser.parseFile('val x = 1 // c', {
        extras: false,
      });
      expect(extrasMap.size).toEqual(0);
      expect(Writer.write(file, extrasMap)).toEqual('val x=1');
    });

    it('should accept an empty file', () => {
      const { file, extrasMap } = KotlinParser.parseFile('');
      expect(file.fields.declarations).toEqual([]);
      expect(Writer.write(file, extrasMap)).toEqual('');
    });
  });

  describe('parseScript', () => {
    it('should accept top level statements', () => {
      const source = 'println("hi")\nval x = 1';
      const { script, extrasMap } = KotlinParser.parseScript(source);
      expect(script.name).toEqual('KotlinScript');
      expect(script.fields.statements.map((s) => s.name)).toEqual([
        'CallExpression',
        'PropertyDeclaration',
      ]);
      expect(Writer.write(script, extrasMap)).toEqual(source);
    });

    it('should require statements to be separated', () => {
      expect(() => KotlinParser.parseScript('f() 1')).toThrow(
        new ParseError([
          { description: 'expected a newline or semicolon', offset: 4 },
        ])
      );
    });
  });

  describe('errors', () => {
    it('should report syntax errors with their offsets', () => {
      const error = parseError('val = 1');
      expect(error.errors).toEqual([
        { description: 'expected an identifier', offset: 4 },
      ]);
      expect(error.message).toEqual(
        'ParseError: 1 syntax error(s)\n  <input>:4: expected an identifier'
      );
    });

    it('should name the file in the message', () => {
      expect(parseError('val = 1', 'Main.kt').message).toEqual(
        'ParseError: 1 syntax error(s)\n  Main.kt:4: expected an identifier'
      );
    });

    it('should pass lexer errors through', () => {
      expect(() => KotlinParser.parseFile('val s = "abc')).toThrow(
        new LexError('unterminated string literal', 12)
      );
    });

    test.each<[string, string, number]>([
      ['val x: ((Int)) = 1', 'parenthesized type', 8],
      ['val x: Int?? = null', 'nested nullable type', 7],
      ['val (a) = p', 'destructuring declaration with a single variable', 0],
    ])('should reject %j as unsupported', (source, construct, offset) => {
      expect(() => KotlinParser.parseFile(source)).toThrow(
        new UnsupportedConstructError(construct, offset)
      );
    });
  });

  describe('parseResult', () => {
    it('should wrap a parsed file in ok', () => {
      const result = KotlinParser.parseResult('val x = 1');
      expect(
        result.match(
          ({ file, extrasMap }) => Writer.write(file, extrasMap),
          (e) => e.message
        )
      ).toEqual('val x = 1');
    });

    it('should wrap front end errors in err', () => {
      const result = KotlinParser.parseResult('val = 1');
      expect(result.isErr()).toBe(true);
      expect(
        result.match(
          () => null,
          (e) => e instanceof ParseError
        )
      ).toBe(true);
      const unsupported = KotlinParser.parseResult('val (a) = p');
      expect(
        unsupported.match(
          () => null,
          (e) => (e instanceof UnsupportedConstructError ? e.construct : null)
        )
      ).toEqual('destructuring declaration with a single variable');
    });
  });
});
