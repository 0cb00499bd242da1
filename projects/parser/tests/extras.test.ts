import {
  makeComment,
  makeNameExpression,
  makeSemicolon,
  makeWhitespace,
} from '../../ast/builders';
import { Dumper } from '../../ast/dumper';
import { MutableVisitor } from '../../ast/mutable-visitor';
import type { NodePath } from '../../ast/node-path';
import type { ASTNode } from '../../ast/nodes';
import { Writer } from '../../ast/writer';
import { assertKind } from '../../ast/tests/ast-util';
import { Converter } from '../converter';
import { SyntaxParser } from '../kotlin-parser';
import { KotlinParser } from '../parser';
import { RawKind, RawNode } from '../raw-tree';

function onlyProperty(source: string) {
  const { file, extrasMap } = KotlinParser.parseFile(source);
  const [declaration] = file.fields.declarations;
  return {
    file,
    extrasMap,
    property: assertKind(declaration, 'PropertyDeclaration'),
  };
}

describe('extras placement', () => {
  it('should put a trailing comment after the declaration value', () => {
    const source = 'val x = "" // x is empty';
    const { file, extrasMap, property } = onlyProperty(source);
    const { initializer } = property.fields;
    expect(initializer?.name).toEqual('StringLiteralExpression');
    if (initializer) {
      expect(extrasMap.after(initializer)).toEqual([
        makeWhitespace(' '),
        makeComment({
          text: '// x is empty',
          startsLine: false,
          endsLine: true,
        }),
      ]);
    }
    expect(Dumper.dump(file, { extrasMap })).toEqual(
      [
        'Node.KotlinFile',
        '  Node.Declaration.PropertyDeclaration',
        '    Node.Keyword.Val',
        '    Node.Variable',
        '      BEFORE: Node.Extra.Whitespace',
        '      Node.Expression.NameExpression',
        '    BEFORE: Node.Extra.Whitespace',
        '    Node.Keyword.Equal',
        '    BEFORE: Node.Extra.Whitespace',
        '    Node.Expression.StringLiteralExpression',
        '    AFTER: Node.Extra.Whitespace',
        '    AFTER: Node.Extra.Comment',
      ].join('\n')
    );
    expect(Writer.write(file, extrasMap)).toEqual(source);
  });

  it('should keep a comment inside an empty block', () => {
    const source = 'fun setup() {\n    // do something\n}';
    const { file, extrasMap } = KotlinParser.parseFile(source);
    const fun = assertKind(file.fields.declarations[0], 'FunctionDeclaration');
    const block = assertKind(fun.fields.body, 'BlockExpression');
    expect(extrasMap.within(block)).toEqual([
      makeWhitespace('\n    '),
      makeComment({
        text: '// do something',
        startsLine: true,
        endsLine: true,
      }),
      makeWhitespace('\n'),
    ]);
    expect(Writer.write(file, extrasMap)).toEqual(source);
    expect(Writer.write(file)).toEqual('fun setup(){}');
  });

  it('should place a block comment between tokens before the next node', () => {
    const { extrasMap, property } = onlyProperty('val x = /* one */ 1');
    const { initializer } = property.fields;
    expect(initializer).not.toBeNull();
    if (initializer) {
      expect(extrasMap.before(initializer)).toEqual([
        makeWhitespace(' '),
        makeComment({ text: '/* one */', startsLine: false, endsLine: false }),
        makeWhitespace(' '),
      ]);
    }
  });

  it('should split a run at its last semicolon', () => {
    const { file, extrasMap } = KotlinParser.parseFile('val x = 1; val y = 2');
    const [first, second] = file.fields.declarations;
    expect(extrasMap.after(first)).toEqual([makeSemicolon()]);
    expect(extrasMap.before(second)).toEqual([makeWhitespace(' ')]);
  });

  it('should keep trivia around the only declaration', () => {
    const source = '\n\n// top\nval x = 1\n';
    const { file, extrasMap } = KotlinParser.parseFile(source);
    expect(Writer.write(file, extrasMap)).toEqual(source);
  });

  it('should give extras to the last node built from an element', () => {
    const source = 'val f = fun() {}';
    const reported: string[] = [];
    new Converter((node, raw) => {
      if (raw instanceof RawNode && raw.kind === RawKind.Fun) {
        reported.push(node.name);
      }
    }).convertFile(SyntaxParser.parse(source));
    expect(reported).toEqual([
      'FunctionDeclaration',
      'AnonymousFunctionExpression',
    ]);

    const { extrasMap, property } = onlyProperty(source);
    const anonymous = assertKind(
      property.fields.initializer,
      'AnonymousFunctionExpression'
    );
    expect(extrasMap.before(anonymous)).toEqual([makeWhitespace(' ')]);
    expect(extrasMap.has(anonymous.fields.function)).toBe(false);
  });

  it('should follow nodes renamed by a mutable visitor', () => {
    const { file, extrasMap } = KotlinParser.parseFile('val x = 1; val y = 2');
    const names: Record<string, string> = { x: 'a', y: 'b' };
    const renamed = MutableVisitor.traverse(file, {
      extrasMap,
      postVisit: ({ node }: NodePath): ASTNode => {
        if (node.name === 'NameExpression' && names[node.fields.text]) {
          return makeNameExpression(names[node.fields.text]);
        }
        return node;
      },
    });
    expect(Writer.write(renamed, extrasMap)).toEqual('val a = 1; val b = 2');
  });
});
