import type { ExtrasMap } from './extras-map';
import { keywordDisplayName } from './keywords';
import type { NodePath } from './node-path';
import { isDeclaration, isExpression, isExtra, isType } from './node-util';
import type { ASTNode, Extra, FieldValue } from './nodes';
import { Visitor } from './visitor';

export type DumpOptions = {
  extrasMap?: ExtrasMap;
  /**
   * Adds the scalar fields of each node, e.g. `{text="x"}`.
   */
  verbose?: boolean;
};

type ExtraPosition = 'BEFORE' | 'WITHIN' | 'AFTER';

/**
 * Qualified name of a node kind as it appears in dumps.
 */
export function qualifiedName(node: ASTNode): string {
  if (node.name === 'Keyword') {
    return `Node.Keyword.${keywordDisplayName(node.fields.text)}`;
  }
  if (isExtra(node)) {
    return `Node.Extra.${node.name}`;
  }
  if (isDeclaration(node)) {
    return `Node.Declaration.${node.name}`;
  }
  if (isExpression(node)) {
    return `Node.Expression.${node.name}`;
  }
  if (isType(node)) {
    return `Node.Type.${node.name}`;
  }
  return `Node.${node.name}`;
}

const ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
};

function escape(s: string): string {
  return s.replace(/[\\"\n\r\t\b]/g, (ch) => ESCAPES[ch] ?? ch);
}

function attributes(node: ASTNode): string {
  const fields: Readonly<Record<string, FieldValue>> = node.fields;
  const attrs = Object.entries(fields)
    .filter(
      (entry): entry is [string, string | boolean] =>
        typeof entry[1] === 'string' || typeof entry[1] === 'boolean'
    )
    .map(([key, value]) => `${key}="${escape(String(value))}"`);
  return attrs.length > 0 ? `{${attrs.join(', ')}}` : '';
}

/**
 * Structural dump of a tree, one node per line, indented two spaces per
 * level. Extras show up as `BEFORE:`, `WITHIN:` and `AFTER:` lines.
 */
export class Dumper extends Visitor {
  static dump(root: ASTNode, options: DumpOptions = {}): string {
    return new Dumper(options).dump(root);
  }

  private extrasMap: ExtrasMap | undefined;
  private verbose: boolean;
  private lines: string[] = [];

  constructor(options: DumpOptions = {}) {
    super();
    this.extrasMap = options.extrasMap;
    this.verbose = options.verbose ?? false;
  }

  dump(root: ASTNode): string {
    this.lines = [];
    this.traverse(root);
    return this.lines.join('\n');
  }

  protected visit(path: NodePath) {
    const { node, depth } = path;
    const isRoot = path.parent === null;
    if (this.extrasMap && !isRoot) {
      this.writeExtras(this.extrasMap.before(node), depth, 'BEFORE');
    }
    this.writeLine(node, depth);
    super.visit(path);
    if (this.extrasMap) {
      this.writeExtras(this.extrasMap.within(node), depth + 1, 'WITHIN');
      if (!isRoot) {
        this.writeExtras(this.extrasMap.after(node), depth, 'AFTER');
      }
    }
  }

  private writeExtras(
    extras: readonly Extra[],
    depth: number,
    position: ExtraPosition
  ) {
    for (const extra of extras) {
      this.writeLine(extra, depth, `${position}: `);
    }
  }

  private writeLine(node: ASTNode, depth: number, prefix = '') {
    const attrs = this.verbose ? attributes(node) : '';
    this.lines.push(
      `${'  '.repeat(depth)}${prefix}${qualifiedName(node)}${attrs}`
    );
  }
}
