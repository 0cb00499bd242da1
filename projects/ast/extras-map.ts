import { log } from '../utils/debug';
import type { ASTNode, Extra } from './nodes';

/**
 * Whitespace, comments, semicolons and trailing commas found around and
 * inside nodes, keyed by node identity.
 *
 * A map belongs to the tree it was built against. Looking up nodes of
 * another tree finds nothing.
 */
export interface ExtrasMap {
  before(node: ASTNode): readonly Extra[];
  within(node: ASTNode): readonly Extra[];
  after(node: ASTNode): readonly Extra[];
}

type Position = 'before' | 'within' | 'after';
type Entry = { [P in Position]: Extra[] };

export class MutableExtrasMap implements ExtrasMap {
  private entries: Map<ASTNode, Entry> = new Map();

  before(node: ASTNode): readonly Extra[] {
    return this.entries.get(node)?.before ?? [];
  }

  within(node: ASTNode): readonly Extra[] {
    return this.entries.get(node)?.within ?? [];
  }

  after(node: ASTNode): readonly Extra[] {
    return this.entries.get(node)?.after ?? [];
  }

  setBefore(node: ASTNode, extras: readonly Extra[]) {
    this.set(node, 'before', extras);
  }

  setWithin(node: ASTNode, extras: readonly Extra[]) {
    this.set(node, 'within', extras);
  }

  setAfter(node: ASTNode, extras: readonly Extra[]) {
    this.set(node, 'after', extras);
  }

  private set(node: ASTNode, position: Position, extras: readonly Extra[]) {
    let entry = this.entries.get(node);
    if (!entry) {
      entry = { before: [], within: [], after: [] };
      this.entries.set(node, entry);
    }
    entry[position] = [...extras];
  }

  has(node: ASTNode): boolean {
    return this.entries.has(node);
  }

  delete(node: ASTNode) {
    this.entries.delete(node);
  }

  /**
   * Hands every extra recorded for `from` over to `to`.
   */
  moveExtras(from: ASTNode, to: ASTNode) {
    if (from === to) {
      return;
    }
    const entry = this.entries.get(from);
    if (!entry) {
      return;
    }
    log('moving extras from', from.name, 'to', to.name);
    this.entries.delete(from);
    this.entries.set(to, entry);
  }

  get size(): number {
    return this.entries.size;
  }
}
