import {
  makeAnnotatedExpression,
  makeAnnotation,
  makeAnnotationSet,
  makeBinaryExpression,
  makeBlockExpression,
  makeCallExpression,
  makeClassBody,
  makeClassDeclaration,
  makeComment,
  makeEnumEntry,
  makeFunctionDeclaration,
  makeFunctionParams,
  makeGetter,
  makeKeyword,
  makeLambdaExpression,
  makePrefixUnaryExpression,
  makePropertyDeclaration,
  makeModifiers,
  makeNameExpression,
  makeSemicolon,
  makeSimpleType,
  makeTypeArg,
  makeTypeArgs,
  makeTypeRef,
  makeValueArgs,
  makeVariable,
  makeWhitespace,
} from '../builders';
import { UnrecognizedNodeError } from '../errors';
import { MutableExtrasMap } from '../extras-map';
import type { ClassDeclaration, FunctionDeclaration } from '../nodes';
import { isNonSymbol, Writer } from '../writer';
import { bogusNode, file, int, property, script } from './ast-util';

function fun(name: string): FunctionDeclaration {
  return makeFunctionDeclaration({
    modifiers: null,
    funKeyword: makeKeyword('fun'),
    typeParams: null,
    receiverTypeRef: null,
    name: makeNameExpression(name),
    params: makeFunctionParams({ elements: [], trailingComma: null }),
    typeRef: null,
    postModifiers: [],
    equals: null,
    body: makeBlockExpression({ statements: [] }),
  });
}

function simpleClass(name: string): ClassDeclaration {
  return makeClassDeclaration({
    modifiers: null,
    classDeclarationKeyword: makeKeyword('class'),
    name: makeNameExpression(name),
    typeParams: null,
    primaryConstructor: null,
    classParents: null,
    typeConstraintSet: null,
    classBody: null,
  });
}

describe('isNonSymbol', () => {
  it('should accept letters, digits and underscores', () => {
    expect(['a', 'Z', '7', '_', 'é'].map(isNonSymbol)).toEqual([
      true,
      true,
      true,
      true,
      true,
    ]);
  });
  it('should reject symbols, blanks and nothing', () => {
    expect(['=', ' ', '\n', '@', undefined].map(isNonSymbol)).toEqual([
      false,
      false,
      false,
      false,
      false,
    ]);
  });
});

describe('Writer', () => {
  describe('without extras', () => {
    it('should separate words with a space', () => {
      expect(Writer.write(property('x', int('1')))).toEqual('val x=1');
    });

    it('should keep > and = apart', () => {
      const listOfInt = makeTypeRef({
        lPar: null,
        modifiers: null,
        type: makeSimpleType({
          qualifiers: [],
          name: makeNameExpression('List'),
          typeArgs: makeTypeArgs({
            elements: [
              makeTypeArg({
                modifiers: null,
                typeRef: makeTypeRef({
                  lPar: null,
                  modifiers: null,
                  type: makeSimpleType({
                    qualifiers: [],
                    name: makeNameExpression('Int'),
                    typeArgs: null,
                  }),
                  rPar: null,
                }),
                asterisk: false,
              }),
            ],
            trailingComma: null,
          }),
        }),
        rPar: null,
      });
      const node = makePropertyDeclaration({
        ...property('x', int('1')).fields,
        variables: [
          makeVariable({ name: makeNameExpression('x'), typeRef: listOfInt }),
        ],
      });
      expect(Writer.write(node)).toEqual('val x:List<Int> =1');
    });

    it('should put declarations after the first on new lines', () => {
      expect(
        Writer.write(file(property('a', int('1')), property('b', int('2'))))
      ).toEqual('val a=1\nval b=2');
    });

    it('should end enum entries with a semicolon before declarations', () => {
      const entry = (name: string) =>
        makeEnumEntry({
          modifiers: null,
          name: makeNameExpression(name),
          args: null,
          classBody: null,
        });
      const node = makeClassDeclaration({
        ...simpleClass('E').fields,
        modifiers: makeModifiers({ elements: [makeKeyword('enum')] }),
        classBody: makeClassBody({
          enumEntries: [entry('A'), entry('B')],
          declarations: [fun('f')],
        }),
      });
      expect(Writer.write(node)).toEqual('enum class E{A,B;fun f(){}}');
    });

    it('should separate a modifier-like name from a following declaration', () => {
      expect(
        Writer.write(script(makeNameExpression('open'), simpleClass('C')))
      ).toEqual('open;\nclass C');
    });

    it('should keep a lambda from becoming a trailing lambda', () => {
      const call = makeCallExpression({
        expression: makeNameExpression('f'),
        typeArgs: null,
        args: makeValueArgs({ elements: [], trailingComma: null }),
        lambdaArg: null,
      });
      const lambda = makeLambdaExpression({ params: null, lambdaBody: null });
      expect(Writer.write(script(call, lambda))).toEqual('f();\n{}');
    });

    it('should start an accessor after an initializer on a new line', () => {
      const node = makePropertyDeclaration({
        ...property('x', int('1')).fields,
        accessors: [
          makeGetter({
            modifiers: null,
            getKeyword: makeKeyword('get'),
            lPar: null,
            rPar: null,
            typeRef: null,
            equals: null,
            body: null,
          }),
        ],
      });
      expect(Writer.write(node)).toEqual('val x=1\nget');
    });

    it('should keep an annotation on the whole binary expression', () => {
      const node = makeAnnotatedExpression({
        annotationSets: [
          makeAnnotationSet({
            atSymbol: makeKeyword('@'),
            target: null,
            colon: null,
            lBracket: null,
            annotations: [
              makeAnnotation({
                type: makeSimpleType({
                  qualifiers: [],
                  name: makeNameExpression('Ann'),
                  typeArgs: null,
                }),
                args: null,
              }),
            ],
            rBracket: null,
          }),
        ],
        expression: makeBinaryExpression({
          lhs: makeNameExpression('a'),
          operator: makeKeyword('+'),
          rhs: makeNameExpression('b'),
        }),
      });
      expect(Writer.write(node)).toEqual('@Ann\n a+b');
    });

    it('should keep repeated minus signs apart', () => {
      const node = makePrefixUnaryExpression({
        operator: makeKeyword('-'),
        expression: makePrefixUnaryExpression({
          operator: makeKeyword('-'),
          expression: makeNameExpression('x'),
        }),
      });
      expect(Writer.write(node)).toEqual('- -x');
    });

    it('should throw on an unknown node kind', () => {
      expect(() => Writer.write(bogusNode())).toThrow(UnrecognizedNodeError);
      expect(() => Writer.write(bogusNode())).toThrow(
        'Writer: unrecognized node Bogus'
      );
    });
  });

  describe('with extras', () => {
    it('should not add a line break where the extras hold one', () => {
      const a = property('a', int('1'));
      const b = property('b', int('2'));
      const extras = new MutableExtrasMap();
      extras.setBefore(b, [makeWhitespace('\n\n')]);
      expect(Writer.write(file(a, b), extras)).toEqual('val a=1\n\nval b=2');
    });

    it('should not add a line break after a semicolon', () => {
      const a = property('a', int('1'));
      const b = property('b', int('2'));
      const extras = new MutableExtrasMap();
      extras.setAfter(a, [makeSemicolon()]);
      extras.setBefore(b, [makeWhitespace(' ')]);
      expect(Writer.write(file(a, b), extras)).toEqual('val a=1; val b=2');
    });

    it('should trust whitespace from the extras as a separator', () => {
      const a = property('a', int('1'));
      const b = property('b', int('2'));
      const extras = new MutableExtrasMap();
      extras.setBefore(b, [makeWhitespace(' ')]);
      expect(Writer.write(file(a, b), extras)).toEqual('val a=1 val b=2');
      expect(Writer.write(file(a, b))).toEqual('val a=1\nval b=2');
    });

    it('should write within extras before the closing delimiter', () => {
      const node = fun('f');
      const extras = new MutableExtrasMap();
      if (node.fields.body !== null) {
        extras.setWithin(node.fields.body, [
          makeWhitespace(' '),
          makeComment({ text: '// c', startsLine: false, endsLine: true }),
          makeWhitespace('\n'),
        ]);
      }
      expect(Writer.write(node, extras)).toEqual('fun f(){ // c\n}');
    });

    it('should write within extras of nodes without a delimiter last', () => {
      const node = property('x', int('1'));
      const extras = new MutableExtrasMap();
      extras.setWithin(node, [makeWhitespace(' ')]);
      extras.setBefore(node.fields.variables[0], [makeWhitespace('  ')]);
      expect(Writer.write(node, extras)).toEqual('val  x=1 ');
    });

    it('should ignore extras of nodes that are not in the tree', () => {
      const extras = new MutableExtrasMap();
      extras.setBefore(property('x'), [makeWhitespace('\n')]);
      expect(Writer.write(property('x'), extras)).toEqual('val x');
    });
  });
});
