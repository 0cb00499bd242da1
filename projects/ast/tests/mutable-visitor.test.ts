import { makeKeyword, makeNameExpression, makeWhitespace } from '../builders';
import { InvariantError, UnrecognizedNodeError } from '../errors';
import { MutableExtrasMap } from '../extras-map';
import { MutableVisitor } from '../mutable-visitor';
import type { NodePath } from '../node-path';
import type { ASTNode } from '../nodes';
import { Writer } from '../writer';
import { KotlinParser } from '../../parser/parser';
import { assertKind, bogusNode, file, int, property } from './ast-util';

function rename(from: string, to: string) {
  return ({ node }: NodePath): ASTNode =>
    node.name === 'NameExpression' && node.fields.text === from
      ? makeNameExpression(to)
      : node;
}

describe('MutableVisitor', () => {
  it('should return the same tree when nothing changes', () => {
    const tree = file(property('x', int('1')), property('y'));
    expect(MutableVisitor.traverse(tree)).toBe(tree);
    expect(
      MutableVisitor.traverse(tree, {
        preVisit: (p) => p.node,
        postVisit: (p) => p.node,
      })
    ).toBe(tree);
  });

  it('should rebuild only the changed branch', () => {
    const x = property('x', int('1'));
    const y = property('y');
    const tree = file(x, y);
    const result = assertKind(
      MutableVisitor.traverse(tree, { postVisit: rename('x', 'a') }),
      'KotlinFile'
    );
    expect(result).not.toBe(tree);
    expect(Writer.write(result)).toEqual('val a=1\nval y');
    const [newX, newY] = result.fields.declarations;
    expect(newX).not.toBe(x);
    expect(newY).toBe(y);
    expect(assertKind(newX, 'PropertyDeclaration').fields.initializer).toBe(
      x.fields.initializer
    );
  });

  it('should visit the children of a node replaced before visiting', () => {
    const visited: string[] = [];
    const result = MutableVisitor.traverse(file(property('x', int('1'))), {
      preVisit: ({ node }) => {
        if (node.name === 'PropertyDeclaration') {
          return property('y', int('2'));
        }
        return node;
      },
      postVisit: (path) => {
        visited.push(path.toString());
        return path.node;
      },
    });
    expect(Writer.write(result)).toEqual('val y=2');
    expect(visited).toEqual([
      'KotlinFile > PropertyDeclaration > Keyword',
      'KotlinFile > PropertyDeclaration > Variable > NameExpression',
      'KotlinFile > PropertyDeclaration > Variable',
      'KotlinFile > PropertyDeclaration > Keyword',
      'KotlinFile > PropertyDeclaration > ConstantLiteralExpression',
      'KotlinFile > PropertyDeclaration',
      'KotlinFile',
    ]);
  });

  it('should move extras to the replacement nodes', () => {
    const x = property('x', int('1'));
    const name = x.fields.variables[0].fields.name;
    const extras = new MutableExtrasMap();
    extras.setBefore(name, [makeWhitespace('  ')]);
    extras.setAfter(x, [makeWhitespace('\n')]);
    const result = MutableVisitor.traverse(x, {
      postVisit: rename('x', 'longer'),
      extrasMap: extras,
    });
    const renamed = assertKind(result, 'PropertyDeclaration');
    expect(extras.has(name)).toBe(false);
    expect(extras.has(x)).toBe(false);
    expect(extras.before(renamed.fields.variables[0].fields.name)).toEqual([
      makeWhitespace('  '),
    ]);
    expect(extras.after(renamed)).toEqual([makeWhitespace('\n')]);
    expect(Writer.write(renamed, extras)).toEqual('val  longer=1\n');
  });

  it('should rebuild an anonymous function', () => {
    const { file: parsed, extrasMap } = KotlinParser.parseFile(
      'val f = fun(x: Int) = x'
    );
    const result = assertKind(
      MutableVisitor.traverse(parsed, {
        extrasMap,
        postVisit: rename('x', 'y'),
      }),
      'KotlinFile'
    );
    const declaration = assertKind(
      result.fields.declarations[0],
      'PropertyDeclaration'
    );
    const anonymous = assertKind(
      declaration.fields.initializer,
      'AnonymousFunctionExpression'
    );
    expect(anonymous.fields.function.fields.body).toEqual(
      makeNameExpression('y')
    );
    expect(Writer.write(result, extrasMap)).toEqual('val f = fun(y: Int) = y');
  });

  it('should accept a keyword that fits the slot', () => {
    const result = MutableVisitor.traverse(property('x', int('1')), {
      postVisit: ({ node }) =>
        node.name === 'Keyword' && node.fields.text === 'val'
          ? makeKeyword('var')
          : node,
    });
    expect(Writer.write(result)).toEqual('var x=1');
  });

  it('should reject a node that does not fit the slot', () => {
    const replaceName = ({ node }: NodePath): ASTNode =>
      node.name === 'NameExpression' ? int('1') : node;
    expect(() =>
      MutableVisitor.traverse(property('x'), { postVisit: replaceName })
    ).toThrow(
      new InvariantError(
        { name: 'Variable' },
        'ConstantLiteralExpression cannot take the place of NameExpression'
      )
    );
    const replaceVal = ({ node }: NodePath): ASTNode =>
      node.name === 'Keyword' ? makeKeyword('fun') : node;
    expect(() =>
      MutableVisitor.traverse(property('x'), { postVisit: replaceVal })
    ).toThrow("PropertyDeclaration: 'fun' cannot take the place of 'val'");
  });

  it('should throw on an unknown node kind', () => {
    expect(() => MutableVisitor.traverse(bogusNode())).toThrow(
      UnrecognizedNodeError
    );
    expect(() => MutableVisitor.traverse(bogusNode())).toThrow(
      'MutableVisitor: unrecognized node Bogus'
    );
  });
});
