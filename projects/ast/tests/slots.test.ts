import { makeKeyword, makeNameExpression } from '../builders';
import { UnrecognizedNodeError } from '../errors';
import type { ASTNode } from '../nodes';
import { childNodes, slotNodes } from '../slots';
import {
  bogusNode,
  file,
  int,
  property,
  slotMismatches,
} from './ast-util';

function names(nodes: readonly ASTNode[]): string[] {
  return nodes.map((n) => n.name);
}

describe('slots', () => {
  describe('slotNodes', () => {
    it('should return nothing for null and scalar values', () => {
      expect(slotNodes(null)).toEqual([]);
      expect(slotNodes('text')).toEqual([]);
      expect(slotNodes(true)).toEqual([]);
    });
    it('should wrap a single node', () => {
      const name = makeNameExpression('a');
      expect(slotNodes(name)).toEqual([name]);
    });
    it('should return lists as they are', () => {
      const list = [makeNameExpression('a'), makeNameExpression('b')];
      expect(slotNodes(list)).toBe(list);
    });
  });

  describe('childNodes', () => {
    it('should list children in source order', () => {
      const node = property('x', int('1'), 'Int');
      expect(names(childNodes(node))).toEqual([
        'Keyword',
        'Variable',
        'Keyword',
        'ConstantLiteralExpression',
      ]);
      expect(childNodes(node)[0]).toEqual(makeKeyword('val'));
    });
    it('should skip absent fields', () => {
      expect(childNodes(property('x'))).toHaveLength(2);
    });
    it('should return nothing for leaves', () => {
      expect(childNodes(makeKeyword('val'))).toEqual([]);
      expect(childNodes(int('1'))).toEqual([]);
    });
    it('should throw on an unknown node kind', () => {
      expect(() => childNodes(bogusNode())).toThrow(
        new UnrecognizedNodeError(bogusNode(), 'childNodes')
      );
      expect(() => childNodes(bogusNode())).toThrow(
        'childNodes: unrecognized node Bogus'
      );
    });
  });

  it('should cover every node-holding field of a built tree', () => {
    const tree = file(property('x', int('1'), 'Int'), property('y'));
    expect(slotMismatches(tree)).toEqual([]);
  });
});
