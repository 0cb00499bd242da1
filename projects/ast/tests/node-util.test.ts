import { KotlinParser } from '../../parser/parser';
import { makeSemicolon, makeWhitespace } from '../builders';
import { isKeywordText, keywordDisplayName } from '../keywords';
import {
  annotationSetsOf,
  blankLines,
  containsNewline,
  containsSemicolon,
  hasModifier,
  isClass,
  isCompanion,
  isEnum,
  isInterface,
  isObject,
} from '../node-util';
import { assertKind } from './ast-util';

function classes(source: string) {
  const { file } = KotlinParser.parseFile(source);
  return file.fields.declarations.map((d) => assertKind(d, 'ClassDeclaration'));
}

describe('class queries', () => {
  const [enumClass, iface, obj, annotated] = classes(
    'enum class E { A }\ninterface I\nobject O\n@Ann data class D(val a: Int)\n'
  );

  it('should tell class kinds apart', () => {
    expect([enumClass, iface, obj].map(isClass)).toEqual([true, false, false]);
    expect(isEnum(enumClass)).toBe(true);
    expect(isInterface(iface)).toBe(true);
    expect(isObject(obj)).toBe(true);
    expect(isCompanion(obj)).toBe(false);
  });

  it('should find modifiers and annotations', () => {
    const { modifiers } = annotated.fields;
    expect(hasModifier(modifiers, 'data')).toBe(true);
    expect(hasModifier(modifiers, 'enum')).toBe(false);
    expect(annotationSetsOf(modifiers)).toHaveLength(1);
    expect(annotationSetsOf(null)).toEqual([]);
  });

  it('should recognize a companion object', () => {
    const [outer] = classes('class C {\n    companion object\n}');
    const [companion] = outer.fields.classBody?.fields.declarations ?? [];
    expect(isCompanion(assertKind(companion, 'ClassDeclaration'))).toBe(true);
  });
});

describe('extras queries', () => {
  it('should count blank lines', () => {
    expect(blankLines(makeWhitespace(' '))).toEqual(0);
    expect(blankLines(makeWhitespace('\n'))).toEqual(0);
    expect(blankLines(makeWhitespace('\n\n\n  '))).toEqual(2);
  });

  it('should look for newlines and semicolons', () => {
    expect(containsNewline([makeWhitespace(' '), makeSemicolon()])).toBe(
      false
    );
    expect(containsNewline([makeWhitespace(' \n')])).toBe(true);
    expect(containsSemicolon([makeSemicolon()])).toBe(true);
  });
});

describe('keywords', () => {
  it('should name keywords for dumps', () => {
    expect(isKeywordText('val')).toBe(true);
    expect(isKeywordText('value1')).toBe(false);
    expect(keywordDisplayName('!is')).toEqual('NotIs');
    expect(keywordDisplayName('=')).toEqual('Equal');
  });
});
