import { err, ok, Result } from 'neverthrow';
import { MutableExtrasMap } from '../ast/extras-map';
import type { KotlinFile, KotlinScript } from '../ast/nodes';
import { log } from '../utils/debug';
import { Converter } from './converter';
import { ConverterWithExtras } from './converter-with-extras';
import { LexError, ParseError, UnsupportedConstructError } from './errors';
import { SourceForm, SyntaxParser } from './kotlin-parser';
import { RawNode } from './raw-tree';

export type ParseOptions = {
  /**
   * Whether to capture whitespace, comments and semicolons in the extras
   * map. Defaults to true. When false the returned map is empty.
   */
  extras?: boolean;
  /**
   * Used in error messages.
   */
  fileName?: string;
};

export type ParseOutput = { file: KotlinFile; extrasMap: MutableExtrasMap };

export type ScriptParseOutput = {
  script: KotlinScript;
  extrasMap: MutableExtrasMap;
};

export type FrontEndError = LexError | ParseError | UnsupportedConstructError;

function isFrontEndError(e: unknown): e is FrontEndError {
  return (
    e instanceof LexError ||
    e instanceof ParseError ||
    e instanceof UnsupportedConstructError
  );
}

function convert<T>(
  source: string,
  form: SourceForm,
  options: ParseOptions,
  run: (converter: Converter, raw: RawNode) => T
): { root: T; extrasMap: MutableExtrasMap } {
  const { extras = true, fileName } = options;
  const raw = SyntaxParser.parse(source, form, fileName);
  if (!extras) {
    return { root: run(new Converter(), raw), extrasMap: new MutableExtrasMap() };
  }
  const converter = new ConverterWithExtras();
  const root = run(converter, raw);
  const extrasMap = converter.collectExtras(raw);
  log(`parsed ${fileName ?? '<input>'} as a ${form}`);
  return { root, extrasMap };
}

export class KotlinParser {
  /**
   * Parses a Kotlin source file.
   *
   * @throws LexError, ParseError or UnsupportedConstructError
   */
  static parseFile(source: string, options: ParseOptions = {}): ParseOutput {
    const { root, extrasMap } = convert(source, 'file', options, (c, raw) =>
      c.convertFile(raw)
    );
    return { file: root, extrasMap };
  }

  /**
   * Parses a Kotlin script, whose top level holds statements as well as
   * declarations.
   */
  static parseScript(
    source: string,
    options: ParseOptions = {}
  ): ScriptParseOutput {
    const { root, extrasMap } = convert(source, 'script', options, (c, raw) =>
      c.convertScript(raw)
    );
    return { script: root, extrasMap };
  }

  static parseResult(
    source: string,
    options: ParseOptions = {}
  ): Result<ParseOutput, FrontEndError> {
    try {
      return ok(KotlinParser.parseFile(source, options));
    } catch (e) {
      if (isFrontEndError(e)) {
        return err(e);
      }
      throw e;
    }
  }
}
