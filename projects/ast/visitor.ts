import { NodePath } from './node-path';
import type { ASTNode } from './nodes';
import { childNodes } from './slots';

/**
 * Read-only depth-first pre-order traversal.
 *
 * Subclasses override `visit` to act on each node and call
 * `visitChildren` to continue into its children.
 */
export class Visitor {
  static traverse(root: ASTNode, callback: (path: NodePath) => void) {
    new CallbackVisitor(callback).traverse(root);
  }

  traverse(root: ASTNode) {
    this.visit(NodePath.root(root));
  }

  protected visit(path: NodePath) {
    this.visitChildren(path);
  }

  protected visitChildren(path: NodePath) {
    for (const child of childNodes(path.node)) {
      this.visit(path.childPathOf(child));
    }
  }
}

class CallbackVisitor extends Visitor {
  private callback: (path: NodePath) => void;

  constructor(callback: (path: NodePath) => void) {
    super();
    this.callback = callback;
  }

  protected visit(path: NodePath) {
    this.callback(path);
    super.visit(path);
  }
}

/**
 * All nodes under and including `root`, in pre-order.
 */
export function* preorderIter(root: ASTNode): Generator<ASTNode> {
  yield root;
  for (const child of childNodes(root)) {
    yield* preorderIter(child);
  }
}
