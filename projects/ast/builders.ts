import type {
  AnnotatedExpression,
  Annotation,
  AnnotationSet,
  AnonymousFunctionExpression,
  ArrayAccessExpression,
  ASTNode,
  BinaryExpression,
  BinaryInfixExpression,
  BinaryTypeExpression,
  BlockExpression,
  BreakExpression,
  CallableReferenceExpression,
  CallConstructorParent,
  CallExpression,
  CatchClause,
  ClassBody,
  ClassDeclaration,
  ClassLiteralExpression,
  ClassParents,
  CollectionLiteralExpression,
  Comment,
  ConstantLiteralExpression,
  ContextReceiver,
  ContextReceivers,
  ContinueExpression,
  Contract,
  ContractEffect,
  ContractEffects,
  DelegatedTypeParent,
  DelegationCall,
  DoWhileExpression,
  DynamicType,
  EnumEntry,
  EscapeStringEntry,
  ExpressionContainer,
  ExpressionReceiver,
  ForExpression,
  FunctionDeclaration,
  FunctionParam,
  FunctionParams,
  FunctionType,
  FunctionTypeParam,
  FunctionTypeParams,
  FunctionTypeReceiver,
  Getter,
  IfExpression,
  ImportAlias,
  ImportDirective,
  ImportDirectives,
  InitDeclaration,
  Keyword,
  KeywordText,
  KotlinFile,
  KotlinScript,
  LabeledExpression,
  LambdaArg,
  LambdaBody,
  LambdaExpression,
  LambdaParam,
  LambdaParams,
  LambdaParamVariable,
  LiteralStringEntry,
  Modifiers,
  NameExpression,
  NullableType,
  ObjectLiteralExpression,
  PackageDirective,
  ParenthesizedExpression,
  PostfixUnaryExpression,
  PrefixUnaryExpression,
  PrimaryConstructor,
  PropertyDeclaration,
  PropertyDelegate,
  PropertyExpression,
  ReturnExpression,
  SecondaryConstructorDeclaration,
  Semicolon,
  Setter,
  SimpleType,
  SimpleTypeQualifier,
  StringLiteralExpression,
  SuperExpression,
  TemplateStringEntry,
  ThisExpression,
  ThrowExpression,
  TrailingComma,
  TryExpression,
  TypeAliasDeclaration,
  TypeArg,
  TypeArgs,
  TypeConstraint,
  TypeConstraints,
  TypeConstraintSet,
  TypeParam,
  TypeParams,
  TypeParent,
  TypeReceiver,
  TypeRef,
  ValueArg,
  ValueArgs,
  Variable,
  WhenBranch,
  WhenCondition,
  WhenExpression,
  WhileExpression,
  Whitespace,
} from './nodes';
import { InvariantError } from './errors';

function check(node: ASTNode, condition: boolean, message: string) {
  if (!condition) {
    throw new InvariantError(node, message);
  }
}

function pairedOrAbsent(
  node: ASTNode,
  a: unknown,
  b: unknown,
  message: string
) {
  check(node, (a === null) === (b === null), message);
}

function validate(node: ASTNode): void {
  switch (node.name) {
    case 'PropertyDeclaration': {
      const f = node.fields;
      check(node, f.variables.length > 0, 'at least one variable required');
      pairedOrAbsent(node, f.lPar, f.rPar, 'lPar and rPar must be paired');
      if (f.variables.length > 1) {
        check(
          node,
          f.lPar !== null,
          'multiple variables require grouping parentheses'
        );
      } else {
        check(
          node,
          f.lPar === null,
          'a single variable must not be grouped in parentheses'
        );
      }
      check(
        node,
        f.trailingComma === null || f.lPar !== null,
        'trailing comma requires grouping parentheses'
      );
      pairedOrAbsent(
        node,
        f.equals,
        f.initializer,
        'equals and initializer must be paired'
      );
      check(
        node,
        f.propertyDelegate === null || f.initializer === null,
        'a property cannot have both a delegate and an initializer'
      );
      const getters = f.accessors.filter((a) => a.name === 'Getter').length;
      const setters = f.accessors.length - getters;
      check(node, getters <= 1, 'at most one getter allowed');
      check(node, setters <= 1, 'at most one setter allowed');
      return;
    }
    case 'Getter': {
      const f = node.fields;
      pairedOrAbsent(node, f.lPar, f.rPar, 'lPar and rPar must be paired');
      check(
        node,
        f.body === null || f.lPar !== null,
        'a getter body requires parentheses'
      );
      check(node, f.equals === null || f.body !== null, 'equals needs a body');
      return;
    }
    case 'Setter': {
      const f = node.fields;
      pairedOrAbsent(node, f.params, f.body, 'params and body must be paired');
      check(node, f.equals === null || f.body !== null, 'equals needs a body');
      return;
    }
    case 'FunctionDeclaration':
      check(
        node,
        node.fields.equals === null || node.fields.body !== null,
        'equals needs a body'
      );
      return;
    case 'FunctionParam':
      pairedOrAbsent(
        node,
        node.fields.equals,
        node.fields.defaultValue,
        'equals and default value must be paired'
      );
      return;
    case 'WhenBranch': {
      const f = node.fields;
      if (f.whenConditions.length > 0) {
        check(
          node,
          f.elseKeyword === null,
          'a branch with conditions cannot be an else branch'
        );
      } else {
        check(
          node,
          f.elseKeyword !== null,
          'a branch without conditions must be an else branch'
        );
        check(
          node,
          f.trailingComma === null,
          'an else branch cannot have a trailing comma'
        );
      }
      return;
    }
    case 'WhenCondition': {
      const { operator, expression, typeRef } = node.fields;
      const text = operator?.fields.text;
      if (text === 'is' || text === '!is') {
        check(
          node,
          typeRef !== null && expression === null,
          'a type condition takes a type only'
        );
      } else {
        check(
          node,
          expression !== null && typeRef === null,
          'an expression or range condition takes an expression only'
        );
      }
      return;
    }
    case 'TemplateStringEntry': {
      const { expression, short } = node.fields;
      if (short) {
        check(
          node,
          expression.name === 'NameExpression' ||
            (expression.name === 'ThisExpression' &&
              expression.fields.label === null),
          'a short template can only wrap a name or this'
        );
      }
      return;
    }
    case 'EscapeStringEntry':
      check(
        node,
        node.fields.text.startsWith('\\'),
        'escape sequences start with a backslash'
      );
      return;
    case 'TypeArg': {
      const f = node.fields;
      if (f.asterisk) {
        check(
          node,
          f.typeRef === null && f.modifiers === null,
          'a star projection has no type or modifiers'
        );
      } else {
        check(node, f.typeRef !== null, 'a type argument needs a type');
      }
      return;
    }
    case 'LambdaParam': {
      const f = node.fields;
      check(node, f.variables.length > 0, 'at least one variable required');
      pairedOrAbsent(node, f.lPar, f.rPar, 'lPar and rPar must be paired');
      check(
        node,
        f.variables.length === 1 || f.lPar !== null,
        'multiple variables require grouping parentheses'
      );
      check(
        node,
        f.trailingComma === null || f.lPar !== null,
        'trailing comma requires grouping parentheses'
      );
      pairedOrAbsent(
        node,
        f.colon,
        f.destructTypeRef,
        'colon and destructuring type must be paired'
      );
      check(
        node,
        f.colon === null || f.lPar !== null,
        'a destructuring type requires grouping parentheses'
      );
      return;
    }
    case 'WhenExpression': {
      const f = node.fields;
      pairedOrAbsent(node, f.lPar, f.rPar, 'lPar and rPar must be paired');
      pairedOrAbsent(node, f.lPar, f.expression, 'a subject needs parentheses');
      return;
    }
    case 'NullableType':
    case 'TypeRef':
      pairedOrAbsent(
        node,
        node.fields.lPar,
        node.fields.rPar,
        'lPar and rPar must be paired'
      );
      return;
    case 'ImportDirective':
      check(
        node,
        !node.fields.wildcard || node.fields.importAlias === null,
        'a wildcard import cannot be aliased'
      );
      check(node, node.fields.names.length > 0, 'an import needs a name');
      return;
    case 'NameExpression':
      check(node, node.fields.text.length > 0, 'a name cannot be empty');
      return;
    case 'Whitespace':
      check(
        node,
        /^\s+$/.test(node.fields.text),
        'whitespace must be non-empty blank text'
      );
      return;
    default:
      return;
  }
}

function checked<T extends ASTNode>(node: T): T {
  validate(node);
  return node;
}

export function makeKeyword<T extends KeywordText>(text: T): Keyword<T> {
  return { name: 'Keyword', fields: { text } };
}

export function makeKotlinFile(fields: KotlinFile['fields']): KotlinFile {
  return checked({ name: 'KotlinFile', fields });
}

export function makeKotlinScript(fields: KotlinScript['fields']): KotlinScript {
  return checked({ name: 'KotlinScript', fields });
}

export function makePackageDirective(
  fields: PackageDirective['fields']
): PackageDirective {
  return checked({ name: 'PackageDirective', fields });
}

export function makeImportDirectives(
  fields: ImportDirectives['fields']
): ImportDirectives {
  return checked({ name: 'ImportDirectives', fields });
}

export function makeImportDirective(
  fields: ImportDirective['fields']
): ImportDirective {
  return checked({ name: 'ImportDirective', fields });
}

export function makeImportAlias(fields: ImportAlias['fields']): ImportAlias {
  return checked({ name: 'ImportAlias', fields });
}

export function makeClassDeclaration(
  fields: ClassDeclaration['fields']
): ClassDeclaration {
  return checked({ name: 'ClassDeclaration', fields });
}

export function makeClassParents(fields: ClassParents['fields']): ClassParents {
  return checked({ name: 'ClassParents', fields });
}

export function makeCallConstructorParent(
  fields: CallConstructorParent['fields']
): CallConstructorParent {
  return checked({ name: 'CallConstructorParent', fields });
}

export function makeDelegatedTypeParent(
  fields: DelegatedTypeParent['fields']
): DelegatedTypeParent {
  return checked({ name: 'DelegatedTypeParent', fields });
}

export function makeTypeParent(fields: TypeParent['fields']): TypeParent {
  return checked({ name: 'TypeParent', fields });
}

export function makePrimaryConstructor(
  fields: PrimaryConstructor['fields']
): PrimaryConstructor {
  return checked({ name: 'PrimaryConstructor', fields });
}

export function makeClassBody(fields: ClassBody['fields']): ClassBody {
  return checked({ name: 'ClassBody', fields });
}

export function makeEnumEntry(fields: EnumEntry['fields']): EnumEntry {
  return checked({ name: 'EnumEntry', fields });
}

export function makeInitDeclaration(
  fields: InitDeclaration['fields']
): InitDeclaration {
  return checked({ name: 'InitDeclaration', fields });
}

export function makeFunctionDeclaration(
  fields: FunctionDeclaration['fields']
): FunctionDeclaration {
  return checked({ name: 'FunctionDeclaration', fields });
}

export function makeFunctionParams(
  fields: FunctionParams['fields']
): FunctionParams {
  return checked({ name: 'FunctionParams', fields });
}

export function makeFunctionParam(
  fields: FunctionParam['fields']
): FunctionParam {
  return checked({ name: 'FunctionParam', fields });
}

export function makePropertyDeclaration(
  fields: PropertyDeclaration['fields']
): PropertyDeclaration {
  return checked({ name: 'PropertyDeclaration', fields });
}

export function makePropertyDelegate(
  fields: PropertyDelegate['fields']
): PropertyDelegate {
  return checked({ name: 'PropertyDelegate', fields });
}

export function makeGetter(fields: Getter['fields']): Getter {
  return checked({ name: 'Getter', fields });
}

export function makeSetter(fields: Setter['fields']): Setter {
  return checked({ name: 'Setter', fields });
}

export function makeVariable(fields: Variable['fields']): Variable {
  return checked({ name: 'Variable', fields });
}

export function makeTypeAliasDeclaration(
  fields: TypeAliasDeclaration['fields']
): TypeAliasDeclaration {
  return checked({ name: 'TypeAliasDeclaration', fields });
}

export function makeSecondaryConstructorDeclaration(
  fields: SecondaryConstructorDeclaration['fields']
): SecondaryConstructorDeclaration {
  return checked({ name: 'SecondaryConstructorDeclaration', fields });
}

export function makeDelegationCall(
  fields: DelegationCall['fields']
): DelegationCall {
  return checked({ name: 'DelegationCall', fields });
}

export function makeTypeParams(fields: TypeParams['fields']): TypeParams {
  return checked({ name: 'TypeParams', fields });
}

export function makeTypeParam(fields: TypeParam['fields']): TypeParam {
  return checked({ name: 'TypeParam', fields });
}

export function makeFunctionType(fields: FunctionType['fields']): FunctionType {
  return checked({ name: 'FunctionType', fields });
}

export function makeContextReceivers(
  fields: ContextReceivers['fields']
): ContextReceivers {
  return checked({ name: 'ContextReceivers', fields });
}

export function makeContextReceiver(
  fields: ContextReceiver['fields']
): ContextReceiver {
  return checked({ name: 'ContextReceiver', fields });
}

export function makeFunctionTypeReceiver(
  fields: FunctionTypeReceiver['fields']
): FunctionTypeReceiver {
  return checked({ name: 'FunctionTypeReceiver', fields });
}

export function makeFunctionTypeParams(
  fields: FunctionTypeParams['fields']
): FunctionTypeParams {
  return checked({ name: 'FunctionTypeParams', fields });
}

export function makeFunctionTypeParam(
  fields: FunctionTypeParam['fields']
): FunctionTypeParam {
  return checked({ name: 'FunctionTypeParam', fields });
}

export function makeSimpleType(fields: SimpleType['fields']): SimpleType {
  return checked({ name: 'SimpleType', fields });
}

export function makeSimpleTypeQualifier(
  fields: SimpleTypeQualifier['fields']
): SimpleTypeQualifier {
  return checked({ name: 'SimpleTypeQualifier', fields });
}

export function makeNullableType(fields: NullableType['fields']): NullableType {
  return checked({ name: 'NullableType', fields });
}

export function makeDynamicType(): DynamicType {
  return { name: 'DynamicType', fields: {} };
}

export function makeTypeArgs(fields: TypeArgs['fields']): TypeArgs {
  return checked({ name: 'TypeArgs', fields });
}

export function makeTypeArg(fields: TypeArg['fields']): TypeArg {
  return checked({ name: 'TypeArg', fields });
}

export function makeTypeRef(fields: TypeRef['fields']): TypeRef {
  return checked({ name: 'TypeRef', fields });
}

export function makeValueArgs(fields: ValueArgs['fields']): ValueArgs {
  return checked({ name: 'ValueArgs', fields });
}

export function makeValueArg(fields: ValueArg['fields']): ValueArg {
  return checked({ name: 'ValueArg', fields });
}

export function makeExpressionContainer(
  fields: ExpressionContainer['fields']
): ExpressionContainer {
  return checked({ name: 'ExpressionContainer', fields });
}

export function makeIfExpression(fields: IfExpression['fields']): IfExpression {
  return checked({ name: 'IfExpression', fields });
}

export function makeTryExpression(
  fields: TryExpression['fields']
): TryExpression {
  return checked({ name: 'TryExpression', fields });
}

export function makeCatchClause(fields: CatchClause['fields']): CatchClause {
  return checked({ name: 'CatchClause', fields });
}

export function makeForExpression(
  fields: ForExpression['fields']
): ForExpression {
  return checked({ name: 'ForExpression', fields });
}

export function makeWhileExpression(
  fields: WhileExpression['fields']
): WhileExpression {
  return checked({ name: 'WhileExpression', fields });
}

export function makeDoWhileExpression(
  fields: DoWhileExpression['fields']
): DoWhileExpression {
  return checked({ name: 'DoWhileExpression', fields });
}

export function makeBinaryExpression(
  fields: BinaryExpression['fields']
): BinaryExpression {
  return checked({ name: 'BinaryExpression', fields });
}

export function makeBinaryInfixExpression(
  fields: BinaryInfixExpression['fields']
): BinaryInfixExpression {
  return checked({ name: 'BinaryInfixExpression', fields });
}

export function makePrefixUnaryExpression(
  fields: PrefixUnaryExpression['fields']
): PrefixUnaryExpression {
  return checked({ name: 'PrefixUnaryExpression', fields });
}

export function makePostfixUnaryExpression(
  fields: PostfixUnaryExpression['fields']
): PostfixUnaryExpression {
  return checked({ name: 'PostfixUnaryExpression', fields });
}

export function makeBinaryTypeExpression(
  fields: BinaryTypeExpression['fields']
): BinaryTypeExpression {
  return checked({ name: 'BinaryTypeExpression', fields });
}

export function makeCallableReferenceExpression(
  fields: CallableReferenceExpression['fields']
): CallableReferenceExpression {
  return checked({ name: 'CallableReferenceExpression', fields });
}

export function makeClassLiteralExpression(
  fields: ClassLiteralExpression['fields']
): ClassLiteralExpression {
  return checked({ name: 'ClassLiteralExpression', fields });
}

export function makeExpressionReceiver(
  fields: ExpressionReceiver['fields']
): ExpressionReceiver {
  return checked({ name: 'ExpressionReceiver', fields });
}

export function makeTypeReceiver(fields: TypeReceiver['fields']): TypeReceiver {
  return checked({ name: 'TypeReceiver', fields });
}

export function makeParenthesizedExpression(
  fields: ParenthesizedExpression['fields']
): ParenthesizedExpression {
  return checked({ name: 'ParenthesizedExpression', fields });
}

export function makeStringLiteralExpression(
  fields: StringLiteralExpression['fields']
): StringLiteralExpression {
  return checked({ name: 'StringLiteralExpression', fields });
}

export function makeLiteralStringEntry(
  fields: LiteralStringEntry['fields']
): LiteralStringEntry {
  return checked({ name: 'LiteralStringEntry', fields });
}

export function makeEscapeStringEntry(
  fields: EscapeStringEntry['fields']
): EscapeStringEntry {
  return checked({ name: 'EscapeStringEntry', fields });
}

export function makeTemplateStringEntry(
  fields: TemplateStringEntry['fields']
): TemplateStringEntry {
  return checked({ name: 'TemplateStringEntry', fields });
}

export function makeConstantLiteralExpression(
  fields: ConstantLiteralExpression['fields']
): ConstantLiteralExpression {
  return checked({ name: 'ConstantLiteralExpression', fields });
}

export function makeLambdaExpression(
  fields: LambdaExpression['fields']
): LambdaExpression {
  return checked({ name: 'LambdaExpression', fields });
}

export function makeLambdaParams(fields: LambdaParams['fields']): LambdaParams {
  return checked({ name: 'LambdaParams', fields });
}

export function makeLambdaParam(fields: LambdaParam['fields']): LambdaParam {
  return checked({ name: 'LambdaParam', fields });
}

export function makeLambdaParamVariable(
  fields: LambdaParamVariable['fields']
): LambdaParamVariable {
  return checked({ name: 'LambdaParamVariable', fields });
}

export function makeLambdaBody(fields: LambdaBody['fields']): LambdaBody {
  return checked({ name: 'LambdaBody', fields });
}

export function makeThisExpression(
  fields: ThisExpression['fields']
): ThisExpression {
  return checked({ name: 'ThisExpression', fields });
}

export function makeSuperExpression(
  fields: SuperExpression['fields']
): SuperExpression {
  return checked({ name: 'SuperExpression', fields });
}

export function makeWhenExpression(
  fields: WhenExpression['fields']
): WhenExpression {
  return checked({ name: 'WhenExpression', fields });
}

export function makeWhenBranch(fields: WhenBranch['fields']): WhenBranch {
  return checked({ name: 'WhenBranch', fields });
}

export function makeWhenCondition(
  fields: WhenCondition['fields']
): WhenCondition {
  return checked({ name: 'WhenCondition', fields });
}

export function makeObjectLiteralExpression(
  fields: ObjectLiteralExpression['fields']
): ObjectLiteralExpression {
  return checked({ name: 'ObjectLiteralExpression', fields });
}

export function makeThrowExpression(
  fields: ThrowExpression['fields']
): ThrowExpression {
  return checked({ name: 'ThrowExpression', fields });
}

export function makeReturnExpression(
  fields: ReturnExpression['fields']
): ReturnExpression {
  return checked({ name: 'ReturnExpression', fields });
}

export function makeContinueExpression(
  fields: ContinueExpression['fields']
): ContinueExpression {
  return checked({ name: 'ContinueExpression', fields });
}

export function makeBreakExpression(
  fields: BreakExpression['fields']
): BreakExpression {
  return checked({ name: 'BreakExpression', fields });
}

export function makeCollectionLiteralExpression(
  fields: CollectionLiteralExpression['fields']
): CollectionLiteralExpression {
  return checked({ name: 'CollectionLiteralExpression', fields });
}

export function makeNameExpression(text: string): NameExpression {
  return checked({ name: 'NameExpression', fields: { text } });
}

export function makeLabeledExpression(
  fields: LabeledExpression['fields']
): LabeledExpression {
  return checked({ name: 'LabeledExpression', fields });
}

export function makeAnnotatedExpression(
  fields: AnnotatedExpression['fields']
): AnnotatedExpression {
  return checked({ name: 'AnnotatedExpression', fields });
}

export function makeCallExpression(
  fields: CallExpression['fields']
): CallExpression {
  return checked({ name: 'CallExpression', fields });
}

export function makeLambdaArg(fields: LambdaArg['fields']): LambdaArg {
  return checked({ name: 'LambdaArg', fields });
}

export function makeArrayAccessExpression(
  fields: ArrayAccessExpression['fields']
): ArrayAccessExpression {
  return checked({ name: 'ArrayAccessExpression', fields });
}

export function makeAnonymousFunctionExpression(
  fields: AnonymousFunctionExpression['fields']
): AnonymousFunctionExpression {
  return checked({ name: 'AnonymousFunctionExpression', fields });
}

export function makePropertyExpression(
  fields: PropertyExpression['fields']
): PropertyExpression {
  return checked({ name: 'PropertyExpression', fields });
}

export function makeBlockExpression(
  fields: BlockExpression['fields']
): BlockExpression {
  return checked({ name: 'BlockExpression', fields });
}

export function makeModifiers(fields: Modifiers['fields']): Modifiers {
  return checked({ name: 'Modifiers', fields });
}

export function makeAnnotationSet(
  fields: AnnotationSet['fields']
): AnnotationSet {
  return checked({ name: 'AnnotationSet', fields });
}

export function makeAnnotation(fields: Annotation['fields']): Annotation {
  return checked({ name: 'Annotation', fields });
}

export function makeTypeConstraintSet(
  fields: TypeConstraintSet['fields']
): TypeConstraintSet {
  return checked({ name: 'TypeConstraintSet', fields });
}

export function makeTypeConstraints(
  fields: TypeConstraints['fields']
): TypeConstraints {
  return checked({ name: 'TypeConstraints', fields });
}

export function makeTypeConstraint(
  fields: TypeConstraint['fields']
): TypeConstraint {
  return checked({ name: 'TypeConstraint', fields });
}

export function makeContract(fields: Contract['fields']): Contract {
  return checked({ name: 'Contract', fields });
}

export function makeContractEffects(
  fields: ContractEffects['fields']
): ContractEffects {
  return checked({ name: 'ContractEffects', fields });
}

export function makeContractEffect(
  fields: ContractEffect['fields']
): ContractEffect {
  return checked({ name: 'ContractEffect', fields });
}

export function makeWhitespace(text: string): Whitespace {
  return checked({ name: 'Whitespace', fields: { text } });
}

export function makeComment(fields: Comment['fields']): Comment {
  return checked({ name: 'Comment', fields });
}

export function makeSemicolon(): Semicolon {
  return { name: 'Semicolon', fields: { text: ';' } };
}

export function makeTrailingComma(): TrailingComma {
  return { name: 'TrailingComma', fields: { text: ',' } };
}
