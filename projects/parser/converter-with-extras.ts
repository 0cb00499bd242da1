import {
  makeComment,
  makeSemicolon,
  makeTrailingComma,
  makeWhitespace,
} from '../ast/builders';
import { MutableExtrasMap } from '../ast/extras-map';
import type { ASTNode, Extra } from '../ast/nodes';
import { log } from '../utils/debug';
import { Converter } from './converter';
import { TokenKind } from './lexer';
import { isTrivia, RawElement, RawNode, RawToken } from './raw-tree';

function isLineBreak(token: RawToken | undefined): boolean {
  return (
    token !== undefined &&
    token.token === TokenKind.Whitespace &&
    token.substr.includes('\n')
  );
}

function leavesOf(raw: RawNode, out: RawToken[] = []): RawToken[] {
  for (const child of raw.children) {
    if (child instanceof RawNode) {
      leavesOf(child, out);
    } else {
      out.push(child);
    }
  }
  return out;
}

/**
 * A converter that also places every piece of trivia in an extras map, so
 * that writing the converted tree reproduces the source text.
 *
 * Each run of trivia between two significant siblings goes:
 *
 * - up to its last semicolon after the previous node and the rest before
 *   the next, when both produced nodes;
 * - otherwise before the next node;
 * - otherwise after the previous node, except that when only a closing
 *   token follows, whatever comes after the first line break is kept within
 *   the parent so that it stays on the closing token's line;
 * - otherwise within the nearest enclosing node.
 */
export class ConverterWithExtras extends Converter {
  private produced: Map<RawElement, ASTNode> = new Map();
  private extrasMap = new MutableExtrasMap();
  private leafIndex: Map<RawToken, number> = new Map();
  private leaves: RawToken[] = [];

  protected onNode(node: ASTNode, raw: RawElement | null) {
    super.onNode(node, raw);
    if (raw !== null) {
      // the outermost node built from an element wins
      this.produced.set(raw, node);
    }
  }

  /**
   * Places the trivia of `raw`, which must already have been converted by
   * this converter.
   */
  collectExtras(raw: RawNode): MutableExtrasMap {
    const root = this.produced.get(raw);
    if (root === undefined) {
      throw new Error(`ConverterWithExtras: ${raw.kind} was not converted`);
    }
    this.extrasMap = new MutableExtrasMap();
    this.leaves = leavesOf(raw);
    this.leafIndex = new Map(this.leaves.map((leaf, i) => [leaf, i]));
    this.walk(raw, root);
    log('placed extras on', this.extrasMap.size, 'nodes');
    return this.extrasMap;
  }

  private walk(raw: RawNode, owner: ASTNode) {
    const { children } = raw;
    let lastSignificant = -1;
    children.forEach((child, i) => {
      if (!isTrivia(child)) {
        lastSignificant = i;
      }
    });
    let i = 0;
    while (i < children.length) {
      const child = children[i];
      if (!isTrivia(child)) {
        if (child instanceof RawNode) {
          this.walk(child, this.produced.get(child) ?? owner);
        }
        i++;
        continue;
      }
      const run: RawToken[] = [];
      let j = i;
      for (; j < children.length; j++) {
        const element = children[j];
        if (!isTrivia(element)) {
          break;
        }
        run.push(element);
      }
      const prev: RawElement | undefined = children[i - 1];
      const next: RawElement | undefined = children[j];
      this.place(run, prev, next, j >= lastSignificant, owner);
      i = j;
    }
  }

  private place(
    run: RawToken[],
    prev: RawElement | undefined,
    next: RawElement | undefined,
    closing: boolean,
    owner: ASTNode
  ) {
    const prevNode = prev && this.produced.get(prev);
    const nextNode = next && this.produced.get(next);
    const extras = run.map((token) => this.extra(token));
    if (prevNode && nextNode) {
      let lastSemicolon = -1;
      run.forEach((token, i) => {
        if (token.token === TokenKind.Semicolon) {
          lastSemicolon = i;
        }
      });
      if (lastSemicolon >= 0) {
        this.append(prevNode, 'after', extras.slice(0, lastSemicolon + 1));
        this.append(nextNode, 'before', extras.slice(lastSemicolon + 1));
        return;
      }
    }
    if (nextNode) {
      this.append(nextNode, 'before', extras);
      return;
    }
    if (prevNode) {
      const lineBreak = closing ? run.findIndex((t) => isLineBreak(t)) : -1;
      if (lineBreak >= 0) {
        this.append(prevNode, 'after', extras.slice(0, lineBreak + 1));
        this.append(owner, 'within', extras.slice(lineBreak + 1));
      } else {
        this.append(prevNode, 'after', extras);
      }
      return;
    }
    this.append(owner, 'within', extras);
  }

  private append(
    node: ASTNode,
    position: 'before' | 'within' | 'after',
    extras: readonly Extra[]
  ) {
    if (extras.length === 0) {
      return;
    }
    switch (position) {
      case 'before':
        this.extrasMap.setBefore(node, [
          ...this.extrasMap.before(node),
          ...extras,
        ]);
        return;
      case 'within':
        this.extrasMap.setWithin(node, [
          ...this.extrasMap.within(node),
          ...extras,
        ]);
        return;
      case 'after':
        this.extrasMap.setAfter(node, [
          ...this.extrasMap.after(node),
          ...extras,
        ]);
        return;
    }
  }

  private extra(token: RawToken): Extra {
    switch (token.token) {
      case TokenKind.Whitespace:
        return makeWhitespace(token.substr);
      case TokenKind.LineComment:
        return makeComment({
          text: token.substr,
          startsLine: this.startsLine(token),
          endsLine: true,
        });
      case TokenKind.BlockComment:
        return makeComment({
          text: token.substr,
          startsLine: this.startsLine(token),
          endsLine: this.endsLine(token),
        });
      case TokenKind.Semicolon:
        return makeSemicolon();
    }
    if (token.substr === ',') {
      return makeTrailingComma();
    }
    throw new Error(
      `ConverterWithExtras: '${token.substr}' at offset ${token.span.from} is not trivia`
    );
  }

  /**
   * The nearest leaf in direction `step` that is not a stretch of spaces
   * within the same line.
   */
  private lineNeighbour(token: RawToken, step: 1 | -1): RawToken | undefined {
    const index = this.leafIndex.get(token);
    if (index === undefined) {
      return undefined;
    }
    let at = index + step;
    let leaf = this.leaves[at];
    while (
      leaf !== undefined &&
      leaf.token === TokenKind.Whitespace &&
      !leaf.substr.includes('\n')
    ) {
      at += step;
      leaf = this.leaves[at];
    }
    return leaf;
  }

  private startsLine(token: RawToken): boolean {
    const prev = this.lineNeighbour(token, -1);
    return prev === undefined || isLineBreak(prev);
  }

  private endsLine(token: RawToken): boolean {
    const next = this.lineNeighbour(token, 1);
    return next === undefined || isLineBreak(next);
  }
}
