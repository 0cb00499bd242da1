import { iter, Iter } from '../utils/iter';
import type { ASTNode } from './nodes';

/**
 * A node together with the chain of nodes leading to it from the root.
 */
export class NodePath<T extends ASTNode = ASTNode> {
  readonly node: T;
  readonly parent: NodePath | null;
  readonly depth: number;

  private constructor(node: T, parent: NodePath | null) {
    this.node = node;
    this.parent = parent;
    this.depth = parent === null ? 0 : parent.depth + 1;
  }

  static root<T extends ASTNode>(node: T): NodePath<T> {
    return new NodePath(node, null);
  }

  childPathOf<C extends ASTNode>(child: C): NodePath<C> {
    return new NodePath(child, this);
  }

  /**
   * Ancestor nodes, nearest first.
   */
  ancestors(): Iter<ASTNode> {
    return iter(this.ancestorPaths()).map((p) => p.node);
  }

  private *ancestorPaths(): Generator<NodePath> {
    for (let p = this.parent; p !== null; p = p.parent) {
      yield p;
    }
  }

  root(): NodePath {
    let p: NodePath = this;
    while (p.parent !== null) {
      p = p.parent;
    }
    return p;
  }

  toString(): string {
    return [...this.ancestors().toArray().reverse(), this.node]
      .map((n) => n.name)
      .join(' > ');
  }
}
