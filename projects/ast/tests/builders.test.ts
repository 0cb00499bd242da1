import {
  makeGetter,
  makeLambdaParam,
  makeLambdaParamVariable,
  makeSetter,
  makeImportAlias,
  makeImportDirective,
  makeKeyword,
  makeNameExpression,
  makePropertyDeclaration,
  makeTypeArg,
  makeVariable,
  makeWhenBranch,
  makeWhenCondition,
  makeWhitespace,
  makeEscapeStringEntry,
  makeTemplateStringEntry,
  makeConstantLiteralExpression,
  makeBlockExpression,
} from '../builders';
import { InvariantError } from '../errors';
import type {
  Getter,
  LambdaParam,
  PropertyDeclaration,
  Setter,
} from '../nodes';
import { int, property, typeRef } from './ast-util';

function destructuring(
  fields: Partial<PropertyDeclaration['fields']>
): PropertyDeclaration {
  return makePropertyDeclaration({
    modifiers: null,
    valOrVarKeyword: makeKeyword('val'),
    typeParams: null,
    receiverTypeRef: null,
    lPar: makeKeyword('('),
    variables: [
      makeVariable({ name: makeNameExpression('a'), typeRef: null }),
      makeVariable({ name: makeNameExpression('b'), typeRef: null }),
    ],
    trailingComma: null,
    rPar: makeKeyword(')'),
    typeConstraintSet: null,
    equals: makeKeyword('='),
    initializer: makeNameExpression('pair'),
    propertyDelegate: null,
    accessors: [],
    ...fields,
  });
}

function getter(): Getter {
  return makeGetter({
    modifiers: null,
    getKeyword: makeKeyword('get'),
    lPar: null,
    rPar: null,
    typeRef: null,
    equals: null,
    body: null,
  });
}

function setter(fields: Partial<Setter['fields']> = {}): Setter {
  return makeSetter({
    modifiers: null,
    setKeyword: makeKeyword('set'),
    params: null,
    equals: null,
    body: null,
    ...fields,
  });
}

function lambdaParam(fields: Partial<LambdaParam['fields']>): LambdaParam {
  return makeLambdaParam({
    lPar: null,
    variables: [
      makeLambdaParamVariable({
        modifiers: null,
        name: makeNameExpression('a'),
        typeRef: null,
      }),
    ],
    trailingComma: null,
    rPar: null,
    colon: null,
    destructTypeRef: null,
    ...fields,
  });
}

describe('node builders', () => {
  describe('PropertyDeclaration', () => {
    it('accepts a single ungrouped variable', () => {
      const node = property('x', int('1'));
      expect(node.name).toEqual('PropertyDeclaration');
      expect(node.fields.variables).toHaveLength(1);
    });
    it('accepts grouped destructuring', () => {
      expect(destructuring({}).fields.variables).toHaveLength(2);
    });
    it('rejects two variables without grouping parentheses', () => {
      expect(() => destructuring({ lPar: null, rPar: null })).toThrow(
        new InvariantError(
          { name: 'PropertyDeclaration' },
          'multiple variables require grouping parentheses'
        )
      );
    });
    it('rejects an unpaired parenthesis', () => {
      expect(() => destructuring({ rPar: null })).toThrow(
        'PropertyDeclaration: lPar and rPar must be paired'
      );
    });
    it('rejects no variables at all', () => {
      expect(() => destructuring({ variables: [] })).toThrow(
        'PropertyDeclaration: at least one variable required'
      );
    });
    it('rejects a delegate together with an initializer', () => {
      const node = property('x', int('1'));
      expect(() =>
        makePropertyDeclaration({
          ...node.fields,
          propertyDelegate: {
            name: 'PropertyDelegate',
            fields: { byKeyword: makeKeyword('by'), expression: int('2') },
          },
        })
      ).toThrow(
        'PropertyDeclaration: a property cannot have both a delegate and an initializer'
      );
    });
    it('rejects an initializer without equals', () => {
      const node = property('x', int('1'));
      expect(() =>
        makePropertyDeclaration({ ...node.fields, equals: null })
      ).toThrow('PropertyDeclaration: equals and initializer must be paired');
    });
  });

  describe('accessors', () => {
    it('rejects a setter body without parameters', () => {
      expect(() =>
        setter({ equals: makeKeyword('='), body: int('1') })
      ).toThrow('Setter: params and body must be paired');
    });
    it('accepts a bare setter', () => {
      expect(setter().fields.body).toBeNull();
    });
    it('rejects two getters on one property', () => {
      expect(() =>
        makePropertyDeclaration({
          ...property('x').fields,
          accessors: [getter(), getter()],
        })
      ).toThrow('PropertyDeclaration: at most one getter allowed');
    });
    it('rejects two setters on one property', () => {
      expect(() =>
        makePropertyDeclaration({
          ...property('x').fields,
          accessors: [getter(), setter(), setter()],
        })
      ).toThrow('PropertyDeclaration: at most one setter allowed');
    });
  });

  describe('LambdaParam', () => {
    it('rejects a colon without a destructuring type', () => {
      expect(() =>
        lambdaParam({
          lPar: makeKeyword('('),
          rPar: makeKeyword(')'),
          colon: makeKeyword(':'),
        })
      ).toThrow('LambdaParam: colon and destructuring type must be paired');
    });
    it('rejects a destructuring type without parentheses', () => {
      expect(() =>
        lambdaParam({
          colon: makeKeyword(':'),
          destructTypeRef: typeRef('Pair'),
        })
      ).toThrow(
        'LambdaParam: a destructuring type requires grouping parentheses'
      );
    });
    it('accepts a grouped destructuring type', () => {
      const param = lambdaParam({
        lPar: makeKeyword('('),
        rPar: makeKeyword(')'),
        colon: makeKeyword(':'),
        destructTypeRef: typeRef('Pair'),
      });
      expect(param.fields.destructTypeRef).toEqual(typeRef('Pair'));
    });
  });

  describe('WhenBranch', () => {
    const condition = makeWhenCondition({
      operator: null,
      expression: int('1'),
      typeRef: null,
    });
    it('rejects a branch with conditions that is also an else branch', () => {
      expect(() =>
        makeWhenBranch({
          whenConditions: [condition],
          trailingComma: null,
          elseKeyword: makeKeyword('else'),
          body: int('2'),
        })
      ).toThrow('WhenBranch: a branch with conditions cannot be an else branch');
    });
    it('rejects a branch with neither conditions nor else', () => {
      expect(() =>
        makeWhenBranch({
          whenConditions: [],
          trailingComma: null,
          elseKeyword: null,
          body: int('2'),
        })
      ).toThrow(
        'WhenBranch: a branch without conditions must be an else branch'
      );
    });
    it('accepts an else branch', () => {
      const branch = makeWhenBranch({
        whenConditions: [],
        trailingComma: null,
        elseKeyword: makeKeyword('else'),
        body: int('2'),
      });
      expect(branch.fields.elseKeyword).toEqual(makeKeyword('else'));
    });
  });

  describe('WhenCondition', () => {
    it('takes only a type after is', () => {
      expect(() =>
        makeWhenCondition({
          operator: makeKeyword('is'),
          expression: int('1'),
          typeRef: null,
        })
      ).toThrow('WhenCondition: a type condition takes a type only');
      expect(
        makeWhenCondition({
          operator: makeKeyword('!is'),
          expression: null,
          typeRef: typeRef('String'),
        }).fields.typeRef
      ).toEqual(typeRef('String'));
    });
    it('takes only an expression after in', () => {
      expect(() =>
        makeWhenCondition({
          operator: makeKeyword('in'),
          expression: null,
          typeRef: typeRef('String'),
        })
      ).toThrow(
        'WhenCondition: an expression or range condition takes an expression only'
      );
    });
  });

  describe('leaf payloads', () => {
    it('rejects an empty name', () => {
      expect(() => makeNameExpression('')).toThrow(
        'NameExpression: a name cannot be empty'
      );
    });
    test.each(['', 'x', ' x '])('rejects whitespace %j', (text) => {
      expect(() => makeWhitespace(text)).toThrow(InvariantError);
    });
    it('accepts blank text as whitespace', () => {
      expect(makeWhitespace('\n  \t').fields.text).toEqual('\n  \t');
    });
    it('requires escapes to start with a backslash', () => {
      expect(() => makeEscapeStringEntry({ text: 'n' })).toThrow(
        'EscapeStringEntry: escape sequences start with a backslash'
      );
    });
    it('allows only names and this in short templates', () => {
      expect(() =>
        makeTemplateStringEntry({
          expression: makeConstantLiteralExpression({
            text: '1',
            form: 'int',
          }),
          short: true,
        })
      ).toThrow(
        'TemplateStringEntry: a short template can only wrap a name or this'
      );
      expect(
        makeTemplateStringEntry({
          expression: makeBlockExpression({ statements: [] }),
          short: false,
        }).fields.short
      ).toBe(false);
    });
  });

  describe('other kinds', () => {
    it('rejects a star projection with a type', () => {
      expect(() =>
        makeTypeArg({
          modifiers: null,
          typeRef: typeRef('Int'),
          asterisk: true,
        })
      ).toThrow('TypeArg: a star projection has no type or modifiers');
    });
    it('rejects a type argument with neither a type nor a star', () => {
      expect(() =>
        makeTypeArg({ modifiers: null, typeRef: null, asterisk: false })
      ).toThrow('TypeArg: a type argument needs a type');
    });
    it('rejects an aliased wildcard import', () => {
      expect(() =>
        makeImportDirective({
          importKeyword: makeKeyword('import'),
          names: [makeNameExpression('kotlin')],
          wildcard: true,
          importAlias: makeImportAlias({ name: makeNameExpression('k') }),
        })
      ).toThrow('ImportDirective: a wildcard import cannot be aliased');
    });
    it('rejects a getter body without parentheses', () => {
      expect(() =>
        makeGetter({
          modifiers: null,
          getKeyword: makeKeyword('get'),
          lPar: null,
          rPar: null,
          typeRef: null,
          equals: makeKeyword('='),
          body: int('1'),
        })
      ).toThrow('Getter: a getter body requires parentheses');
    });
    it('records the offending node on the error', () => {
      let caught: unknown = null;
      try {
        makeNameExpression('');
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(InvariantError);
      if (caught instanceof InvariantError) {
        expect(caught.node).toEqual({
          name: 'NameExpression',
          fields: { text: '' },
        });
      }
    });
  });
});
