import type {
  Accessor,
  ASTNode,
  AnnotationSet,
  ClassDeclaration,
  ClassParent,
  Declaration,
  DoubleColonReceiver,
  Expression,
  Extra,
  Keyword,
  KeywordText,
  Modifier,
  ModifierKeywordText,
  Modifiers,
  NodeByName,
  NodeName,
  PostModifier,
  Statement,
  StringEntry,
  Type,
  Whitespace,
} from './nodes';
import { isModifierKeywordText } from './keywords';

export type Guard<T extends ASTNode> = (node: ASTNode) => node is T;

/**
 * Guard for a single node kind.
 */
export function is<N extends NodeName>(name: N): Guard<NodeByName<N>> {
  return (node): node is NodeByName<N> => node.name === name;
}

function categoryGuard<T extends ASTNode>(members: {
  readonly [N in T['name']]: true;
}): Guard<T> {
  const names: ReadonlySet<string> = new Set(Object.keys(members));
  return (node): node is T => names.has(node.name);
}

/**
 * Guard for a keyword node whose text passes `textGuard`.
 */
export function keywordOf<T extends KeywordText>(
  textGuard: (text: string) => text is T
): Guard<Keyword<T>> {
  return (node): node is Keyword<T> =>
    node.name === 'Keyword' && textGuard(node.fields.text);
}

/**
 * Guard for a keyword node spelled as one of `texts`.
 */
export function keywordGuard<T extends KeywordText>(
  ...texts: T[]
): Guard<Keyword<T>> {
  return keywordOf((text: string): text is T =>
    texts.some((t) => t === text)
  );
}

export const isDeclaration = categoryGuard<Declaration>({
  ClassDeclaration: true,
  InitDeclaration: true,
  FunctionDeclaration: true,
  PropertyDeclaration: true,
  TypeAliasDeclaration: true,
  SecondaryConstructorDeclaration: true,
});

export const isExpression = categoryGuard<Expression>({
  IfExpression: true,
  TryExpression: true,
  ForExpression: true,
  WhileExpression: true,
  DoWhileExpression: true,
  BinaryExpression: true,
  BinaryInfixExpression: true,
  PrefixUnaryExpression: true,
  PostfixUnaryExpression: true,
  BinaryTypeExpression: true,
  CallableReferenceExpression: true,
  ClassLiteralExpression: true,
  ParenthesizedExpression: true,
  StringLiteralExpression: true,
  ConstantLiteralExpression: true,
  LambdaExpression: true,
  ThisExpression: true,
  SuperExpression: true,
  WhenExpression: true,
  ObjectLiteralExpression: true,
  ThrowExpression: true,
  ReturnExpression: true,
  ContinueExpression: true,
  BreakExpression: true,
  CollectionLiteralExpression: true,
  NameExpression: true,
  LabeledExpression: true,
  AnnotatedExpression: true,
  CallExpression: true,
  ArrayAccessExpression: true,
  AnonymousFunctionExpression: true,
  PropertyExpression: true,
  BlockExpression: true,
});

export function isStatement(node: ASTNode): node is Statement {
  return isDeclaration(node) || isExpression(node);
}

export const isType = categoryGuard<Type>({
  SimpleType: true,
  FunctionType: true,
  NullableType: true,
  DynamicType: true,
});

export const isClassParent = categoryGuard<ClassParent>({
  CallConstructorParent: true,
  DelegatedTypeParent: true,
  TypeParent: true,
});

export const isAccessor = categoryGuard<Accessor>({
  Getter: true,
  Setter: true,
});

export const isStringEntry = categoryGuard<StringEntry>({
  LiteralStringEntry: true,
  EscapeStringEntry: true,
  TemplateStringEntry: true,
});

export const isDoubleColonReceiver = categoryGuard<DoubleColonReceiver>({
  ExpressionReceiver: true,
  TypeReceiver: true,
});

export const isPostModifier = categoryGuard<PostModifier>({
  TypeConstraintSet: true,
  Contract: true,
});

export const isExtra = categoryGuard<Extra>({
  Whitespace: true,
  Comment: true,
  Semicolon: true,
  TrailingComma: true,
});

export function isModifier(node: ASTNode): node is Modifier {
  return (
    node.name === 'AnnotationSet' ||
    (node.name === 'Keyword' && isModifierKeywordText(node.fields.text))
  );
}

export function isKeyword(node: ASTNode): node is Keyword {
  return node.name === 'Keyword';
}

/**
 * Whether `modifiers` carries the keyword modifier `text`.
 */
export function hasModifier(
  modifiers: Modifiers | null,
  text: ModifierKeywordText
): boolean {
  return (
    modifiers?.fields.elements.some(
      (m) => m.name === 'Keyword' && m.fields.text === text
    ) ?? false
  );
}

export function annotationSetsOf(modifiers: Modifiers | null): AnnotationSet[] {
  return (modifiers?.fields.elements ?? []).filter(
    (m): m is AnnotationSet => m.name === 'AnnotationSet'
  );
}

export function isClass(decl: ClassDeclaration): boolean {
  return decl.fields.classDeclarationKeyword.fields.text === 'class';
}

export function isObject(decl: ClassDeclaration): boolean {
  return decl.fields.classDeclarationKeyword.fields.text === 'object';
}

export function isInterface(decl: ClassDeclaration): boolean {
  return decl.fields.classDeclarationKeyword.fields.text === 'interface';
}

export function isCompanion(decl: ClassDeclaration): boolean {
  return isObject(decl) && hasModifier(decl.fields.modifiers, 'companion');
}

export function isEnum(decl: ClassDeclaration): boolean {
  return isClass(decl) && hasModifier(decl.fields.modifiers, 'enum');
}

/**
 * Number of blank lines a whitespace run holds: one less than its line breaks.
 */
export function blankLines(ws: Whitespace): number {
  const breaks = ws.fields.text.split('\n').length - 1;
  return Math.max(breaks - 1, 0);
}

export function containsNewline(extras: readonly Extra[]): boolean {
  return extras.some(
    (e) => e.name === 'Whitespace' && e.fields.text.includes('\n')
  );
}

export function containsSemicolon(extras: readonly Extra[]): boolean {
  return extras.some((e) => e.name === 'Semicolon');
}
