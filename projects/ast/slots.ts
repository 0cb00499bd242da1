import { UnrecognizedNodeError } from './errors';
import type { ASTNode, ChildKey, FieldValue, NodeName } from './nodes';

type SlotTable = { readonly [N in NodeName]: readonly ChildKey<N>[] };

/**
 * The fields of each node kind that hold child nodes, in source order.
 */
export const SLOTS: SlotTable = {
  KotlinFile: [
    'annotationSets',
    'packageDirective',
    'importDirectives',
    'declarations',
  ],
  KotlinScript: [
    'annotationSets',
    'packageDirective',
    'importDirectives',
    'statements',
  ],
  PackageDirective: ['modifiers', 'packageKeyword', 'names'],
  ImportDirectives: ['elements'],
  ImportDirective: ['importKeyword', 'names', 'importAlias'],
  ImportAlias: ['name'],
  ClassDeclaration: [
    'modifiers',
    'classDeclarationKeyword',
    'name',
    'typeParams',
    'primaryConstructor',
    'classParents',
    'typeConstraintSet',
    'classBody',
  ],
  ClassParents: ['elements'],
  CallConstructorParent: ['type', 'args'],
  DelegatedTypeParent: ['type', 'byKeyword', 'expression'],
  TypeParent: ['type'],
  PrimaryConstructor: ['modifiers', 'constructorKeyword', 'params'],
  ClassBody: ['enumEntries', 'declarations'],
  EnumEntry: ['modifiers', 'name', 'args', 'classBody'],
  InitDeclaration: ['modifiers', 'block'],
  FunctionDeclaration: [
    'modifiers',
    'funKeyword',
    'typeParams',
    'receiverTypeRef',
    'name',
    'params',
    'typeRef',
    'postModifiers',
    'equals',
    'body',
  ],
  FunctionParams: ['elements', 'trailingComma'],
  FunctionParam: [
    'modifiers',
    'valOrVarKeyword',
    'name',
    'typeRef',
    'equals',
    'defaultValue',
  ],
  PropertyDeclaration: [
    'modifiers',
    'valOrVarKeyword',
    'typeParams',
    'receiverTypeRef',
    'lPar',
    'variables',
    'trailingComma',
    'rPar',
    'typeConstraintSet',
    'equals',
    'initializer',
    'propertyDelegate',
    'accessors',
  ],
  PropertyDelegate: ['byKeyword', 'expression'],
  Getter: [
    'modifiers',
    'getKeyword',
    'lPar',
    'rPar',
    'typeRef',
    'equals',
    'body',
  ],
  Setter: ['modifiers', 'setKeyword', 'params', 'equals', 'body'],
  Variable: ['name', 'typeRef'],
  TypeAliasDeclaration: ['modifiers', 'name', 'typeParams', 'typeRef'],
  SecondaryConstructorDeclaration: [
    'modifiers',
    'constructorKeyword',
    'params',
    'delegationCall',
    'block',
  ],
  DelegationCall: ['target', 'args'],
  TypeParams: ['elements', 'trailingComma'],
  TypeParam: ['modifiers', 'name', 'typeRef'],
  FunctionType: [
    'contextReceivers',
    'functionTypeReceiver',
    'params',
    'returnTypeRef',
  ],
  ContextReceivers: ['elements', 'trailingComma'],
  ContextReceiver: ['typeRef'],
  FunctionTypeReceiver: ['typeRef'],
  FunctionTypeParams: ['elements', 'trailingComma'],
  FunctionTypeParam: ['name', 'typeRef'],
  SimpleType: ['qualifiers', 'name', 'typeArgs'],
  SimpleTypeQualifier: ['name', 'typeArgs'],
  NullableType: ['lPar', 'modifiers', 'type', 'rPar'],
  DynamicType: [],
  TypeArgs: ['elements', 'trailingComma'],
  TypeArg: ['modifiers', 'typeRef'],
  TypeRef: ['lPar', 'modifiers', 'type', 'rPar'],
  ValueArgs: ['elements', 'trailingComma'],
  ValueArg: ['name', 'expression'],
  ExpressionContainer: ['expression'],
  IfExpression: ['ifKeyword', 'condition', 'body', 'elseBody'],
  TryExpression: ['block', 'catchClauses', 'finallyBlock'],
  CatchClause: ['catchKeyword', 'params', 'block'],
  ForExpression: ['forKeyword', 'loopParam', 'loopRange', 'body'],
  WhileExpression: ['whileKeyword', 'condition', 'body'],
  DoWhileExpression: ['body', 'whileKeyword', 'condition'],
  BinaryExpression: ['lhs', 'operator', 'rhs'],
  BinaryInfixExpression: ['lhs', 'operator', 'rhs'],
  PrefixUnaryExpression: ['operator', 'expression'],
  PostfixUnaryExpression: ['expression', 'operator'],
  BinaryTypeExpression: ['lhs', 'operator', 'rhs'],
  CallableReferenceExpression: ['lhs', 'rhs'],
  ClassLiteralExpression: ['lhs'],
  ExpressionReceiver: ['expression'],
  TypeReceiver: ['type'],
  ParenthesizedExpression: ['expression'],
  StringLiteralExpression: ['entries'],
  LiteralStringEntry: [],
  EscapeStringEntry: [],
  TemplateStringEntry: ['expression'],
  ConstantLiteralExpression: [],
  LambdaExpression: ['params', 'lambdaBody'],
  LambdaParams: ['elements', 'trailingComma'],
  LambdaParam: [
    'lPar',
    'variables',
    'trailingComma',
    'rPar',
    'colon',
    'destructTypeRef',
  ],
  LambdaParamVariable: ['modifiers', 'name', 'typeRef'],
  LambdaBody: ['statements'],
  ThisExpression: ['label'],
  SuperExpression: ['typeArgTypeRef', 'label'],
  WhenExpression: [
    'whenKeyword',
    'lPar',
    'expression',
    'rPar',
    'whenBranches',
  ],
  WhenBranch: ['whenConditions', 'trailingComma', 'elseKeyword', 'body'],
  WhenCondition: ['operator', 'expression', 'typeRef'],
  ObjectLiteralExpression: ['declaration'],
  ThrowExpression: ['expression'],
  ReturnExpression: ['label', 'expression'],
  ContinueExpression: ['label'],
  BreakExpression: ['label'],
  CollectionLiteralExpression: ['expressions', 'trailingComma'],
  NameExpression: [],
  LabeledExpression: ['label', 'expression'],
  AnnotatedExpression: ['annotationSets', 'expression'],
  CallExpression: ['expression', 'typeArgs', 'args', 'lambdaArg'],
  LambdaArg: ['annotationSets', 'label', 'expression'],
  ArrayAccessExpression: ['expression', 'indices', 'trailingComma'],
  AnonymousFunctionExpression: ['function'],
  PropertyExpression: ['declaration'],
  BlockExpression: ['statements'],
  Modifiers: ['elements'],
  AnnotationSet: [
    'atSymbol',
    'target',
    'colon',
    'lBracket',
    'annotations',
    'rBracket',
  ],
  Annotation: ['type', 'args'],
  TypeConstraintSet: ['whereKeyword', 'constraints'],
  TypeConstraints: ['elements'],
  TypeConstraint: ['annotationSets', 'name', 'typeRef'],
  Contract: ['contractKeyword', 'contractEffects'],
  ContractEffects: ['elements', 'trailingComma'],
  ContractEffect: ['expression'],
  Keyword: [],
  Whitespace: [],
  Comment: [],
  Semicolon: [],
  TrailingComma: [],
};

/**
 * The nodes held by one field value: none, one, or a list.
 */
export function slotNodes(value: FieldValue): readonly ASTNode[] {
  if (value === null || typeof value !== 'object') {
    return [];
  }
  if ('name' in value) {
    return [value];
  }
  return value;
}

/**
 * The direct children of `node` in source order.
 */
export function childNodes(node: ASTNode): ASTNode[] {
  if (!Object.prototype.hasOwnProperty.call(SLOTS, node.name)) {
    throw new UnrecognizedNodeError(node, 'childNodes');
  }
  const slots: readonly string[] = SLOTS[node.name];
  const fields: Readonly<Record<string, FieldValue>> = node.fields;
  const children: ASTNode[] = [];
  for (const slot of slots) {
    children.push(...slotNodes(fields[slot]));
  }
  return children;
}
