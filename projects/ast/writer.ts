import type { ExtrasMap } from './extras-map';
import { unrecognized } from './errors';
import { MODIFIER_KEYWORDS } from './keywords';
import { NodePath } from './node-path';
import {
  containsNewline,
  containsSemicolon,
  isAccessor,
  isDeclaration,
  isStatement,
} from './node-util';
import type { ASTNode, Extra, NameExpression } from './nodes';
import { Visitor } from './visitor';

/**
 * Decides whether a space goes between the last character written and the
 * first character of the next token.
 */
export type SpaceCriterion = (
  last: string | undefined,
  next: string | undefined
) => boolean;

/**
 * Decides whether a line break goes before the node at `path`.
 */
export type NewlineCriterion = (path: NodePath) => boolean;

/**
 * Decides whether a `;` goes after the list element at `path`, given the
 * element that follows it.
 */
export type SeparatorCriterion = (
  path: NodePath,
  next: ASTNode | undefined
) => boolean;

const NON_SYMBOL = /^[\p{L}\p{Nd}_]$/u;

export function isNonSymbol(ch: string | undefined): boolean {
  return ch !== undefined && NON_SYMBOL.test(ch);
}

const modifierNames: ReadonlySet<string> = new Set(MODIFIER_KEYWORDS);

function first<T>(list: readonly T[]): T | undefined {
  return list[0];
}

function isStatementOwner(node: ASTNode | undefined): boolean {
  return (
    node?.name === 'BlockExpression' ||
    node?.name === 'LambdaBody' ||
    node?.name === 'KotlinScript'
  );
}

export const defaultSpaceCriteria: readonly SpaceCriterion[] = [
  (last, next) => last === '>' && next === '=',
  (last, next) => isNonSymbol(last) && isNonSymbol(next),
  (last, next) => last === '-' && next === '-',
  (last, next) => last === '+' && next === '+',
  (last, next) => isNonSymbol(last) && next === '@',
];

export const defaultNewlineCriteria: readonly NewlineCriterion[] = [
  // statements after the first in a block, lambda or script
  ({ node, parent }) => {
    const owner = parent?.node;
    return (
      (owner?.name === 'BlockExpression' ||
        owner?.name === 'LambdaBody' ||
        owner?.name === 'KotlinScript') &&
      isStatement(node) &&
      first(owner.fields.statements) !== node
    );
  },
  // declarations after the first in a file or class body
  ({ node, parent }) => {
    const owner = parent?.node;
    return (
      (owner?.name === 'KotlinFile' || owner?.name === 'ClassBody') &&
      isDeclaration(node) &&
      first(owner.fields.declarations) !== node
    );
  },
  ({ node, parent }) => {
    const owner = parent?.node;
    return (
      owner?.name === 'WhenExpression' &&
      node.name === 'WhenBranch' &&
      first(owner.fields.whenBranches) !== node
    );
  },
  // an accessor must not continue the expression before it
  ({ node, parent }) => {
    const owner = parent?.node;
    if (owner?.name !== 'PropertyDeclaration' || !isAccessor(node)) {
      return false;
    }
    const [firstAccessor, secondAccessor] = owner.fields.accessors;
    if (firstAccessor === node) {
      return (
        owner.fields.initializer !== null ||
        owner.fields.propertyDelegate !== null
      );
    }
    return secondAccessor === node && firstAccessor.fields.equals !== null;
  },
  // keeps the annotation from applying to the left operand only
  ({ node, parent }) =>
    parent?.node.name === 'AnnotatedExpression' &&
    (node.name === 'BinaryExpression' || node.name === 'BinaryTypeExpression'),
];

export const defaultSeparatorCriteria: readonly SeparatorCriterion[] = [
  // a name spelled like a modifier would otherwise modify the declaration
  ({ node, parent }, next) =>
    node.name === 'NameExpression' &&
    modifierNames.has(node.fields.text) &&
    next !== undefined &&
    isDeclaration(next) &&
    isStatementOwner(parent?.node),
  // a lambda on its own would otherwise become the call's trailing lambda
  ({ node }, next) =>
    node.name === 'CallExpression' &&
    node.fields.lambdaArg === null &&
    next?.name === 'LambdaExpression',
];

/**
 * Turns a tree back into source text.
 *
 * With the extras map captured at parse time the output reproduces the
 * input exactly. Without it, spaces, line breaks and semicolons are
 * inserted where leaving them out would change how the text parses.
 */
export class Writer extends Visitor {
  static write(root: ASTNode, extrasMap?: ExtrasMap): string {
    return new Writer(extrasMap).write(root);
  }

  protected heuristicSpaceCriteria: SpaceCriterion[] = [
    ...defaultSpaceCriteria,
  ];
  protected heuristicNewlineCriteria: NewlineCriterion[] = [
    ...defaultNewlineCriteria,
  ];
  protected heuristicSeparatorCriteria: SeparatorCriterion[] = [
    ...defaultSeparatorCriteria,
  ];

  private extrasMap: ExtrasMap | undefined;
  private out = '';
  private extrasSinceLastNonSymbol: Extra[] = [];
  private nextHeuristicWhitespace = '';
  private lastAppendedToken = '';
  private withinWritten: Set<NodePath> = new Set();

  constructor(extrasMap?: ExtrasMap) {
    super();
    this.extrasMap = extrasMap;
  }

  write(root: ASTNode): string {
    this.out = '';
    this.extrasSinceLastNonSymbol = [];
    this.nextHeuristicWhitespace = '';
    this.lastAppendedToken = '';
    this.withinWritten = new Set();
    this.traverse(root);
    return this.out;
  }

  protected append(str: string) {
    const last = this.lastAppendedToken.slice(-1) || undefined;
    const next = str.charAt(0) || undefined;
    const needsSpace = this.heuristicSpaceCriteria.some((criterion) =>
      criterion(last, next)
    );
    if (needsSpace) {
      this.doAppend(' ');
    }
    this.doAppend(str);
  }

  protected doAppend(str: string) {
    if (str === '') {
      return;
    }
    this.out += str;
    this.lastAppendedToken = str;
  }

  protected visit(path: NodePath) {
    this.writeExtras(this.extrasMap?.before(path.node));
    this.writeHeuristicNewline(path);
    this.writeHeuristicSpace();
    this.writeNode(path);
    if (!this.withinWritten.has(path)) {
      this.writeExtrasWithin(path);
    }
    this.writeExtras(this.extrasMap?.after(path.node));
  }

  private writeHeuristicNewline(path: NodePath) {
    const needsNewline = this.heuristicNewlineCriteria.some((criterion) =>
      criterion(path)
    );
    if (needsNewline && !this.separatedByExtras()) {
      this.append('\n');
    }
  }

  private writeHeuristicSpace() {
    if (
      this.nextHeuristicWhitespace === ' ' &&
      this.extrasSinceLastNonSymbol.length === 0
    ) {
      this.append(' ');
    }
    this.nextHeuristicWhitespace = '';
    this.extrasSinceLastNonSymbol = [];
  }

  private writeHeuristicSeparator(path: NodePath, next: ASTNode | undefined) {
    if (
      this.heuristicSeparatorCriteria.some((needsSemicolon) =>
        needsSemicolon(path, next)
      ) &&
      !containsSemicolon(this.extrasSinceLastNonSymbol)
    ) {
      this.append(';');
    }
  }

  /**
   * Whitespace taken from an extras map is trusted as a separator, even
   * within one line, since it is what the parsed source had there.
   */
  private separatedByExtras(): boolean {
    return (
      containsNewline(this.extrasSinceLastNonSymbol) ||
      containsSemicolon(this.extrasSinceLastNonSymbol) ||
      this.extrasSinceLastNonSymbol.some((e) => e.name === 'Whitespace')
    );
  }

  private writeExtras(extras: readonly Extra[] | undefined) {
    if (!extras) {
      return;
    }
    for (const extra of extras) {
      this.append(extra.fields.text);
    }
    this.extrasSinceLastNonSymbol.push(...extras);
  }

  private writeExtrasWithin(path: NodePath) {
    this.withinWritten.add(path);
    this.writeExtras(this.extrasMap?.within(path.node));
  }

  /**
   * Writes the node's within extras, then its closing delimiter.
   */
  private close(path: NodePath, delimiter: string) {
    this.writeExtrasWithin(path);
    this.append(delimiter);
  }

  private children(path: NodePath, ...nodes: (ASTNode | null)[]) {
    for (const node of nodes) {
      if (node !== null) {
        this.visit(path.childPathOf(node));
      }
    }
  }

  private list(path: NodePath, nodes: readonly ASTNode[], separator = '') {
    nodes.forEach((node, index) => {
      const childPath = path.childPathOf(node);
      this.visit(childPath);
      if (index < nodes.length - 1) {
        this.append(separator);
      }
      this.writeHeuristicSeparator(childPath, nodes[index + 1]);
    });
  }

  /**
   * Writes `prefix` and `node` when `node` is present.
   */
  private prefixed(path: NodePath, prefix: string, node: ASTNode | null) {
    if (node !== null) {
      this.append(prefix);
      this.children(path, node);
    }
  }

  private label(path: NodePath, label: NameExpression | null) {
    if (label !== null) {
      this.doAppend('@');
      this.children(path, label);
    }
  }

  private writeNode(path: NodePath) {
    const node = path.node;
    switch (node.name) {
      case 'KotlinFile': {
        const f = node.fields;
        this.list(path, f.annotationSets);
        this.children(path, f.packageDirective, f.importDirectives);
        this.list(path, f.declarations);
        return;
      }
      case 'KotlinScript': {
        const f = node.fields;
        this.list(path, f.annotationSets);
        this.children(path, f.packageDirective, f.importDirectives);
        this.list(path, f.statements);
        return;
      }
      case 'PackageDirective':
        this.children(path, node.fields.modifiers, node.fields.packageKeyword);
        this.list(path, node.fields.names, '.');
        return;
      case 'ImportDirectives':
        this.list(path, node.fields.elements);
        return;
      case 'ImportDirective':
        this.children(path, node.fields.importKeyword);
        this.list(path, node.fields.names, '.');
        if (node.fields.wildcard) {
          this.append('.*');
        }
        this.children(path, node.fields.importAlias);
        return;
      case 'ImportAlias':
        this.append('as');
        this.children(path, node.fields.name);
        return;
      case 'ClassDeclaration': {
        const f = node.fields;
        this.children(
          path,
          f.modifiers,
          f.classDeclarationKeyword,
          f.name,
          f.typeParams,
          f.primaryConstructor,
          f.classParents,
          f.typeConstraintSet,
          f.classBody
        );
        return;
      }
      case 'ClassParents':
        this.append(':');
        this.list(path, node.fields.elements, ',');
        return;
      case 'CallConstructorParent':
        this.children(path, node.fields.type, node.fields.args);
        return;
      case 'DelegatedTypeParent':
        this.children(
          path,
          node.fields.type,
          node.fields.byKeyword,
          node.fields.expression
        );
        return;
      case 'TypeParent':
        this.children(path, node.fields.type);
        return;
      case 'PrimaryConstructor':
        this.children(
          path,
          node.fields.modifiers,
          node.fields.constructorKeyword,
          node.fields.params
        );
        return;
      case 'ClassBody': {
        const { enumEntries, declarations } = node.fields;
        this.append('{');
        this.list(path, enumEntries, ',');
        if (
          enumEntries.length > 0 &&
          declarations.length > 0 &&
          !containsSemicolon(this.extrasSinceLastNonSymbol)
        ) {
          this.append(';');
        }
        this.list(path, declarations);
        this.close(path, '}');
        return;
      }
      case 'EnumEntry':
        this.children(
          path,
          node.fields.modifiers,
          node.fields.name,
          node.fields.args,
          node.fields.classBody
        );
        return;
      case 'InitDeclaration':
        this.children(path, node.fields.modifiers);
        this.append('init');
        this.children(path, node.fields.block);
        return;
      case 'FunctionDeclaration': {
        const f = node.fields;
        this.children(path, f.modifiers, f.funKeyword, f.typeParams);
        if (f.receiverTypeRef !== null) {
          this.children(path, f.receiverTypeRef);
          this.append('.');
        }
        this.children(path, f.name, f.params);
        this.prefixed(path, ':', f.typeRef);
        this.list(path, f.postModifiers);
        this.children(path, f.equals, f.body);
        return;
      }
      case 'FunctionParams':
      case 'FunctionTypeParams':
      case 'ValueArgs':
        this.append('(');
        this.list(path, node.fields.elements, ',');
        this.children(path, node.fields.trailingComma);
        this.close(path, ')');
        return;
      case 'FunctionParam': {
        const f = node.fields;
        this.children(path, f.modifiers, f.valOrVarKeyword, f.name);
        this.prefixed(path, ':', f.typeRef);
        this.children(path, f.equals, f.defaultValue);
        return;
      }
      case 'PropertyDeclaration': {
        const f = node.fields;
        this.children(path, f.modifiers, f.valOrVarKeyword, f.typeParams);
        if (f.receiverTypeRef !== null) {
          this.children(path, f.receiverTypeRef);
          this.append('.');
        }
        this.children(path, f.lPar);
        this.list(path, f.variables, ',');
        this.children(
          path,
          f.trailingComma,
          f.rPar,
          f.typeConstraintSet,
          f.equals,
          f.initializer,
          f.propertyDelegate
        );
        this.list(path, f.accessors);
        return;
      }
      case 'PropertyDelegate':
        this.children(path, node.fields.byKeyword, node.fields.expression);
        return;
      case 'Getter': {
        const f = node.fields;
        this.children(path, f.modifiers, f.getKeyword, f.lPar, f.rPar);
        this.prefixed(path, ':', f.typeRef);
        this.children(path, f.equals, f.body);
        return;
      }
      case 'Setter': {
        const f = node.fields;
        this.children(path, f.modifiers, f.setKeyword, f.params);
        this.children(path, f.equals, f.body);
        return;
      }
      case 'Variable':
        this.children(path, node.fields.name);
        this.prefixed(path, ':', node.fields.typeRef);
        return;
      case 'TypeAliasDeclaration':
        this.children(path, node.fields.modifiers);
        this.append('typealias');
        this.children(path, node.fields.name, node.fields.typeParams);
        this.prefixed(path, '=', node.fields.typeRef);
        return;
      case 'SecondaryConstructorDeclaration': {
        const f = node.fields;
        this.children(path, f.modifiers, f.constructorKeyword, f.params);
        this.prefixed(path, ':', f.delegationCall);
        this.children(path, f.block);
        return;
      }
      case 'DelegationCall':
        this.children(path, node.fields.target, node.fields.args);
        return;
      case 'TypeParams':
      case 'TypeArgs':
        this.append('<');
        this.list(path, node.fields.elements, ',');
        this.children(path, node.fields.trailingComma);
        this.close(path, '>');
        return;
      case 'TypeParam':
        this.children(path, node.fields.modifiers, node.fields.name);
        this.prefixed(path, ':', node.fields.typeRef);
        return;
      case 'FunctionType': {
        const f = node.fields;
        this.children(
          path,
          f.contextReceivers,
          f.functionTypeReceiver,
          f.params
        );
        this.prefixed(path, '->', f.returnTypeRef);
        return;
      }
      case 'ContextReceivers':
        this.append('context');
        this.append('(');
        this.list(path, node.fields.elements, ',');
        this.children(path, node.fields.trailingComma);
        this.close(path, ')');
        return;
      case 'ContextReceiver':
        this.children(path, node.fields.typeRef);
        return;
      case 'FunctionTypeReceiver':
        this.children(path, node.fields.typeRef);
        this.append('.');
        return;
      case 'FunctionTypeParam':
        if (node.fields.name !== null) {
          this.children(path, node.fields.name);
          this.append(':');
        }
        this.children(path, node.fields.typeRef);
        return;
      case 'SimpleType':
        for (const qualifier of node.fields.qualifiers) {
          this.children(path, qualifier);
          this.append('.');
        }
        this.children(path, node.fields.name, node.fields.typeArgs);
        return;
      case 'SimpleTypeQualifier':
        this.children(path, node.fields.name, node.fields.typeArgs);
        return;
      case 'NullableType':
        this.children(
          path,
          node.fields.lPar,
          node.fields.modifiers,
          node.fields.type,
          node.fields.rPar
        );
        this.append('?');
        return;
      case 'DynamicType':
        this.append('dynamic');
        return;
      case 'TypeArg':
        this.children(path, node.fields.modifiers);
        if (node.fields.asterisk) {
          this.append('*');
        }
        this.children(path, node.fields.typeRef);
        return;
      case 'TypeRef':
        this.children(
          path,
          node.fields.lPar,
          node.fields.modifiers,
          node.fields.type,
          node.fields.rPar
        );
        return;
      case 'ValueArg':
        if (node.fields.name !== null) {
          this.children(path, node.fields.name);
          this.append('=');
        }
        if (node.fields.asterisk) {
          this.append('*');
        }
        this.children(path, node.fields.expression);
        return;
      case 'ExpressionContainer':
        this.children(path, node.fields.expression);
        return;
      case 'IfExpression':
        this.children(path, node.fields.ifKeyword);
        this.append('(');
        this.children(path, node.fields.condition);
        this.append(')');
        this.children(path, node.fields.body);
        this.prefixed(path, 'else', node.fields.elseBody);
        return;
      case 'TryExpression':
        this.append('try');
        this.children(path, node.fields.block);
        this.list(path, node.fields.catchClauses);
        this.prefixed(path, 'finally', node.fields.finallyBlock);
        return;
      case 'CatchClause':
        this.children(
          path,
          node.fields.catchKeyword,
          node.fields.params,
          node.fields.block
        );
        return;
      case 'ForExpression':
        this.children(path, node.fields.forKeyword);
        this.append('(');
        this.children(path, node.fields.loopParam);
        this.prefixed(path, 'in', node.fields.loopRange);
        this.append(')');
        this.children(path, node.fields.body);
        return;
      case 'WhileExpression':
        this.children(path, node.fields.whileKeyword);
        this.append('(');
        this.children(path, node.fields.condition);
        this.append(')');
        this.children(path, node.fields.body);
        return;
      case 'DoWhileExpression':
        this.append('do');
        this.children(path, node.fields.body, node.fields.whileKeyword);
        this.append('(');
        this.children(path, node.fields.condition);
        this.append(')');
        return;
      case 'BinaryExpression':
      case 'BinaryInfixExpression':
      case 'BinaryTypeExpression':
        this.children(
          path,
          node.fields.lhs,
          node.fields.operator,
          node.fields.rhs
        );
        return;
      case 'PrefixUnaryExpression':
        this.children(path, node.fields.operator, node.fields.expression);
        return;
      case 'PostfixUnaryExpression':
        this.children(path, node.fields.expression, node.fields.operator);
        return;
      case 'CallableReferenceExpression':
        this.children(path, node.fields.lhs);
        this.prefixed(path, '::', node.fields.rhs);
        return;
      case 'ClassLiteralExpression':
        this.children(path, node.fields.lhs);
        this.append('::');
        this.append('class');
        return;
      case 'ExpressionReceiver':
        this.children(path, node.fields.expression);
        return;
      case 'TypeReceiver':
        this.children(path, node.fields.type);
        return;
      case 'ParenthesizedExpression':
        this.append('(');
        this.children(path, node.fields.expression);
        this.close(path, ')');
        return;
      case 'StringLiteralExpression': {
        const quote = node.fields.raw ? '"""' : '"';
        this.append(quote);
        this.list(path, node.fields.entries);
        this.close(path, quote);
        return;
      }
      case 'LiteralStringEntry':
      case 'EscapeStringEntry':
        this.doAppend(node.fields.text);
        return;
      case 'TemplateStringEntry':
        if (node.fields.short) {
          this.doAppend('$');
          this.children(path, node.fields.expression);
        } else {
          this.doAppend('${');
          this.children(path, node.fields.expression);
          this.close(path, '}');
        }
        return;
      case 'ConstantLiteralExpression':
        this.append(node.fields.text);
        return;
      case 'LambdaExpression':
        this.append('{');
        if (node.fields.params !== null) {
          this.children(path, node.fields.params);
          this.append('->');
        }
        this.children(path, node.fields.lambdaBody);
        this.close(path, '}');
        return;
      case 'LambdaParams':
        this.list(path, node.fields.elements, ',');
        this.children(path, node.fields.trailingComma);
        return;
      case 'LambdaParam': {
        const f = node.fields;
        this.children(path, f.lPar);
        this.list(path, f.variables, ',');
        this.children(path, f.trailingComma, f.rPar);
        this.children(path, f.colon, f.destructTypeRef);
        return;
      }
      case 'LambdaParamVariable':
        this.children(path, node.fields.modifiers, node.fields.name);
        this.prefixed(path, ':', node.fields.typeRef);
        return;
      case 'LambdaBody':
        this.list(path, node.fields.statements);
        return;
      case 'BlockExpression':
        this.append('{');
        this.list(path, node.fields.statements);
        this.close(path, '}');
        return;
      case 'ThisExpression':
        this.append('this');
        this.label(path, node.fields.label);
        return;
      case 'SuperExpression':
        this.append('super');
        if (node.fields.typeArgTypeRef !== null) {
          this.append('<');
          this.children(path, node.fields.typeArgTypeRef);
          this.close(path, '>');
        }
        this.label(path, node.fields.label);
        return;
      case 'WhenExpression': {
        const f = node.fields;
        this.children(path, f.whenKeyword, f.lPar, f.expression, f.rPar);
        this.append('{');
        this.list(path, f.whenBranches);
        this.close(path, '}');
        return;
      }
      case 'WhenBranch': {
        const f = node.fields;
        this.list(path, f.whenConditions, ',');
        this.children(path, f.trailingComma, f.elseKeyword);
        this.prefixed(path, '->', f.body);
        return;
      }
      case 'WhenCondition':
        this.children(
          path,
          node.fields.operator,
          node.fields.expression,
          node.fields.typeRef
        );
        return;
      case 'ObjectLiteralExpression':
        this.children(path, node.fields.declaration);
        return;
      case 'ThrowExpression':
        this.prefixed(path, 'throw', node.fields.expression);
        return;
      case 'ReturnExpression':
        this.append('return');
        this.label(path, node.fields.label);
        this.children(path, node.fields.expression);
        return;
      case 'ContinueExpression':
        this.append('continue');
        this.label(path, node.fields.label);
        return;
      case 'BreakExpression':
        this.append('break');
        this.label(path, node.fields.label);
        return;
      case 'CollectionLiteralExpression':
        this.append('[');
        this.list(path, node.fields.expressions, ',');
        this.children(path, node.fields.trailingComma);
        this.close(path, ']');
        return;
      case 'NameExpression':
        this.append(node.fields.text);
        return;
      case 'LabeledExpression':
        this.children(path, node.fields.label);
        this.doAppend('@');
        this.children(path, node.fields.expression);
        return;
      case 'AnnotatedExpression':
        this.list(path, node.fields.annotationSets);
        this.children(path, node.fields.expression);
        return;
      case 'CallExpression': {
        const f = node.fields;
        this.children(path, f.expression, f.typeArgs, f.args, f.lambdaArg);
        return;
      }
      case 'LambdaArg':
        this.list(path, node.fields.annotationSets);
        if (node.fields.label !== null) {
          this.children(path, node.fields.label);
          this.doAppend('@');
        }
        this.children(path, node.fields.expression);
        return;
      case 'ArrayAccessExpression':
        this.children(path, node.fields.expression);
        this.append('[');
        this.list(path, node.fields.indices, ',');
        this.children(path, node.fields.trailingComma);
        this.close(path, ']');
        return;
      case 'AnonymousFunctionExpression':
        this.children(path, node.fields.function);
        return;
      case 'PropertyExpression':
        this.children(path, node.fields.declaration);
        return;
      case 'Modifiers':
        this.list(path, node.fields.elements);
        return;
      case 'AnnotationSet': {
        const f = node.fields;
        this.children(path, f.atSymbol, f.target, f.colon, f.lBracket);
        this.list(path, f.annotations);
        this.children(path, f.rBracket);
        return;
      }
      case 'Annotation': {
        this.children(path, node.fields.type, node.fields.args);
        const parent = path.parent?.node;
        if (
          parent?.name === 'AnnotationSet' &&
          parent.fields.rBracket === null
        ) {
          this.nextHeuristicWhitespace = ' ';
        }
        return;
      }
      case 'TypeConstraintSet':
        this.children(
          path,
          node.fields.whereKeyword,
          node.fields.constraints
        );
        return;
      case 'TypeConstraints':
        this.list(path, node.fields.elements, ',');
        return;
      case 'TypeConstraint':
        this.list(path, node.fields.annotationSets);
        this.children(path, node.fields.name);
        this.prefixed(path, ':', node.fields.typeRef);
        return;
      case 'Contract':
        this.children(
          path,
          node.fields.contractKeyword,
          node.fields.contractEffects
        );
        return;
      case 'ContractEffects':
        this.append('[');
        this.list(path, node.fields.elements, ',');
        this.children(path, node.fields.trailingComma);
        this.close(path, ']');
        return;
      case 'ContractEffect':
        this.children(path, node.fields.expression);
        return;
      case 'Keyword':
      case 'Whitespace':
      case 'Comment':
      case 'Semicolon':
      case 'TrailingComma':
        this.append(node.fields.text);
        return;
      default:
        return unrecognized(node, 'Writer');
    }
  }
}
