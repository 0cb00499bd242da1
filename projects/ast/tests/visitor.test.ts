import { NodePath } from '../node-path';
import type { ASTNode } from '../nodes';
import { preorderIter, Visitor } from '../visitor';
import { file, int, property } from './ast-util';

class DepthCounter extends Visitor {
  deepest = 0;

  protected visit(path: NodePath) {
    this.deepest = Math.max(this.deepest, path.depth);
    super.visit(path);
  }
}

describe('Visitor', () => {
  const tree = file(property('x', int('1'), 'Int'));

  it('should visit nodes in pre-order', () => {
    const visited: string[] = [];
    Visitor.traverse(tree, (path) => visited.push(path.node.name));
    expect(visited).toEqual([
      'KotlinFile',
      'PropertyDeclaration',
      'Keyword',
      'Variable',
      'NameExpression',
      'TypeRef',
      'SimpleType',
      'NameExpression',
      'Keyword',
      'ConstantLiteralExpression',
    ]);
  });

  it('should give every node its path from the root', () => {
    const paths: string[] = [];
    Visitor.traverse(tree, (path) => {
      if (path.node.name === 'SimpleType') {
        paths.push(path.toString());
        expect(path.depth).toEqual(4);
        expect(path.root().node).toBe(tree);
        expect(path.ancestors().toArray().map((n) => n.name)).toEqual([
          'TypeRef',
          'Variable',
          'PropertyDeclaration',
          'KotlinFile',
        ]);
      }
    });
    expect(paths).toEqual([
      'KotlinFile > PropertyDeclaration > Variable > TypeRef > SimpleType',
    ]);
  });

  it('should start the root path without a parent', () => {
    const path = NodePath.root(tree);
    expect(path.parent).toBeNull();
    expect(path.depth).toEqual(0);
    expect(path.ancestors().toArray()).toEqual([]);
    expect(path.toString()).toEqual('KotlinFile');
  });

  it('should let subclasses override visit', () => {
    const counter = new DepthCounter();
    counter.traverse(tree);
    expect(counter.deepest).toEqual(5);
  });
});

describe('preorderIter', () => {
  it('should yield the same order as the visitor', () => {
    const tree = file(property('a', int('1')), property('b'));
    const visited: ASTNode[] = [];
    Visitor.traverse(tree, (path) => visited.push(path.node));
    expect([...preorderIter(tree)]).toEqual(visited);
    expect([...preorderIter(tree)].map((n) => n.name)).toEqual([
      'KotlinFile',
      'PropertyDeclaration',
      'Keyword',
      'Variable',
      'NameExpression',
      'Keyword',
      'ConstantLiteralExpression',
      'PropertyDeclaration',
      'Keyword',
      'Variable',
      'NameExpression',
    ]);
  });
});
