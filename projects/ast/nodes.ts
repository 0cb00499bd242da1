import type keywordNames from './keywords.json';

/**
 * Every keyword and operator spelling a Keyword node can carry.
 */
export type KeywordText = keyof typeof keywordNames;

export type ValOrVarText = 'val' | 'var';
export type ClassDeclarationKeywordText = 'class' | 'object' | 'interface';
export type DelegationTargetText = 'this' | 'super';
export type AnnotationTargetText =
  | 'field'
  | 'file'
  | 'property'
  | 'get'
  | 'set'
  | 'receiver'
  | 'param'
  | 'setparam'
  | 'delegate';
export type BinaryOperatorText =
  | '*'
  | '/'
  | '%'
  | '+'
  | '-'
  | 'in'
  | '!in'
  | '>'
  | '>='
  | '<'
  | '<='
  | '=='
  | '!='
  | '==='
  | '!=='
  | '='
  | '*='
  | '/='
  | '%='
  | '+='
  | '-='
  | '||'
  | '&&'
  | '?:'
  | '..'
  | '..<'
  | '.'
  | '?.';
export type PrefixOperatorText = '+' | '-' | '++' | '--' | '!';
export type PostfixOperatorText = '++' | '--' | '!!';
export type BinaryTypeOperatorText = 'as' | 'as?' | 'is' | '!is';
export type WhenTypeOperatorText = 'is' | '!is';
export type WhenRangeOperatorText = 'in' | '!in';
export type WhenConditionOperatorText =
  | WhenTypeOperatorText
  | WhenRangeOperatorText;
export type ModifierKeywordText =
  | 'abstract'
  | 'final'
  | 'open'
  | 'annotation'
  | 'sealed'
  | 'data'
  | 'override'
  | 'lateinit'
  | 'inner'
  | 'enum'
  | 'companion'
  | 'value'
  | 'private'
  | 'protected'
  | 'public'
  | 'internal'
  | 'in'
  | 'out'
  | 'noinline'
  | 'crossinline'
  | 'vararg'
  | 'reified'
  | 'tailrec'
  | 'operator'
  | 'infix'
  | 'inline'
  | 'external'
  | 'suspend'
  | 'const'
  | 'fun'
  | 'actual'
  | 'expect';

type NodeOf<N extends string, F> = {
  readonly name: N;
  readonly fields: Readonly<F>;
};

export type Keyword<T extends KeywordText = KeywordText> = NodeOf<
  'Keyword',
  { text: T }
>;

// Containers

export type KotlinFile = NodeOf<
  'KotlinFile',
  {
    annotationSets: readonly AnnotationSet[];
    packageDirective: PackageDirective | null;
    importDirectives: ImportDirectives | null;
    declarations: readonly Declaration[];
  }
>;

export type KotlinScript = NodeOf<
  'KotlinScript',
  {
    annotationSets: readonly AnnotationSet[];
    packageDirective: PackageDirective | null;
    importDirectives: ImportDirectives | null;
    statements: readonly Statement[];
  }
>;

export type PackageDirective = NodeOf<
  'PackageDirective',
  {
    modifiers: Modifiers | null;
    packageKeyword: Keyword<'package'>;
    names: readonly NameExpression[];
  }
>;

export type ImportDirectives = NodeOf<
  'ImportDirectives',
  { elements: readonly ImportDirective[] }
>;

export type ImportDirective = NodeOf<
  'ImportDirective',
  {
    importKeyword: Keyword<'import'>;
    names: readonly NameExpression[];
    wildcard: boolean;
    importAlias: ImportAlias | null;
  }
>;

export type ImportAlias = NodeOf<'ImportAlias', { name: NameExpression }>;

// Declarations

export type ClassDeclaration = NodeOf<
  'ClassDeclaration',
  {
    modifiers: Modifiers | null;
    classDeclarationKeyword: Keyword<ClassDeclarationKeywordText>;
    name: NameExpression | null;
    typeParams: TypeParams | null;
    primaryConstructor: PrimaryConstructor | null;
    classParents: ClassParents | null;
    typeConstraintSet: TypeConstraintSet | null;
    classBody: ClassBody | null;
  }
>;

export type ClassParents = NodeOf<
  'ClassParents',
  { elements: readonly ClassParent[] }
>;

export type CallConstructorParent = NodeOf<
  'CallConstructorParent',
  { type: SimpleType; args: ValueArgs }
>;

export type DelegatedTypeParent = NodeOf<
  'DelegatedTypeParent',
  { type: SimpleType; byKeyword: Keyword<'by'>; expression: Expression }
>;

export type TypeParent = NodeOf<'TypeParent', { type: SimpleType }>;

export type PrimaryConstructor = NodeOf<
  'PrimaryConstructor',
  {
    modifiers: Modifiers | null;
    constructorKeyword: Keyword<'constructor'> | null;
    params: FunctionParams;
  }
>;

export type ClassBody = NodeOf<
  'ClassBody',
  {
    enumEntries: readonly EnumEntry[];
    declarations: readonly Declaration[];
  }
>;

export type EnumEntry = NodeOf<
  'EnumEntry',
  {
    modifiers: Modifiers | null;
    name: NameExpression;
    args: ValueArgs | null;
    classBody: ClassBody | null;
  }
>;

export type InitDeclaration = NodeOf<
  'InitDeclaration',
  { modifiers: Modifiers | null; block: BlockExpression }
>;

export type FunctionDeclaration = NodeOf<
  'FunctionDeclaration',
  {
    modifiers: Modifiers | null;
    funKeyword: Keyword<'fun'>;
    typeParams: TypeParams | null;
    receiverTypeRef: TypeRef | null;
    // absent on anonymous functions
    name: NameExpression | null;
    params: FunctionParams | null;
    typeRef: TypeRef | null;
    postModifiers: readonly PostModifier[];
    equals: Keyword<'='> | null;
    body: Expression | null;
  }
>;

export type FunctionParams = NodeOf<
  'FunctionParams',
  {
    elements: readonly FunctionParam[];
    trailingComma: Keyword<','> | null;
  }
>;

export type FunctionParam = NodeOf<
  'FunctionParam',
  {
    modifiers: Modifiers | null;
    valOrVarKeyword: Keyword<ValOrVarText> | null;
    name: NameExpression;
    typeRef: TypeRef | null;
    equals: Keyword<'='> | null;
    defaultValue: Expression | null;
  }
>;

export type PropertyDeclaration = NodeOf<
  'PropertyDeclaration',
  {
    modifiers: Modifiers | null;
    valOrVarKeyword: Keyword<ValOrVarText>;
    typeParams: TypeParams | null;
    receiverTypeRef: TypeRef | null;
    lPar: Keyword<'('> | null;
    // more than one is destructuring
    variables: readonly Variable[];
    trailingComma: Keyword<','> | null;
    rPar: Keyword<')'> | null;
    typeConstraintSet: TypeConstraintSet | null;
    equals: Keyword<'='> | null;
    initializer: Expression | null;
    propertyDelegate: PropertyDelegate | null;
    accessors: readonly Accessor[];
  }
>;

export type PropertyDelegate = NodeOf<
  'PropertyDelegate',
  { byKeyword: Keyword<'by'>; expression: Expression }
>;

export type Getter = NodeOf<
  'Getter',
  {
    modifiers: Modifiers | null;
    getKeyword: Keyword<'get'>;
    lPar: Keyword<'('> | null;
    rPar: Keyword<')'> | null;
    typeRef: TypeRef | null;
    equals: Keyword<'='> | null;
    body: Expression | null;
  }
>;

export type Setter = NodeOf<
  'Setter',
  {
    modifiers: Modifiers | null;
    setKeyword: Keyword<'set'>;
    params: FunctionParams | null;
    equals: Keyword<'='> | null;
    body: Expression | null;
  }
>;

export type Variable = NodeOf<
  'Variable',
  { name: NameExpression; typeRef: TypeRef | null }
>;

export type TypeAliasDeclaration = NodeOf<
  'TypeAliasDeclaration',
  {
    modifiers: Modifiers | null;
    name: NameExpression;
    typeParams: TypeParams | null;
    typeRef: TypeRef;
  }
>;

export type SecondaryConstructorDeclaration = NodeOf<
  'SecondaryConstructorDeclaration',
  {
    modifiers: Modifiers | null;
    constructorKeyword: Keyword<'constructor'>;
    params: FunctionParams;
    delegationCall: DelegationCall | null;
    block: BlockExpression | null;
  }
>;

export type DelegationCall = NodeOf<
  'DelegationCall',
  { target: Keyword<DelegationTargetText>; args: ValueArgs }
>;

export type TypeParams = NodeOf<
  'TypeParams',
  { elements: readonly TypeParam[]; trailingComma: Keyword<','> | null }
>;

export type TypeParam = NodeOf<
  'TypeParam',
  {
    modifiers: Modifiers | null;
    name: NameExpression;
    typeRef: TypeRef | null;
  }
>;

// Types

export type FunctionType = NodeOf<
  'FunctionType',
  {
    contextReceivers: ContextReceivers | null;
    functionTypeReceiver: FunctionTypeReceiver | null;
    params: FunctionTypeParams;
    returnTypeRef: TypeRef;
  }
>;

export type ContextReceivers = NodeOf<
  'ContextReceivers',
  { elements: readonly ContextReceiver[]; trailingComma: Keyword<','> | null }
>;

export type ContextReceiver = NodeOf<'ContextReceiver', { typeRef: TypeRef }>;

export type FunctionTypeReceiver = NodeOf<
  'FunctionTypeReceiver',
  { typeRef: TypeRef }
>;

export type FunctionTypeParams = NodeOf<
  'FunctionTypeParams',
  {
    elements: readonly FunctionTypeParam[];
    trailingComma: Keyword<','> | null;
  }
>;

export type FunctionTypeParam = NodeOf<
  'FunctionTypeParam',
  { name: NameExpression | null; typeRef: TypeRef }
>;

export type SimpleType = NodeOf<
  'SimpleType',
  {
    qualifiers: readonly SimpleTypeQualifier[];
    name: NameExpression;
    typeArgs: TypeArgs | null;
  }
>;

export type SimpleTypeQualifier = NodeOf<
  'SimpleTypeQualifier',
  { name: NameExpression; typeArgs: TypeArgs | null }
>;

export type NullableType = NodeOf<
  'NullableType',
  {
    lPar: Keyword<'('> | null;
    modifiers: Modifiers | null;
    type: Type;
    rPar: Keyword<')'> | null;
  }
>;

export type DynamicType = NodeOf<'DynamicType', {}>;

export type TypeArgs = NodeOf<
  'TypeArgs',
  { elements: readonly TypeArg[]; trailingComma: Keyword<','> | null }
>;

export type TypeArg = NodeOf<
  'TypeArg',
  { modifiers: Modifiers | null; typeRef: TypeRef | null; asterisk: boolean }
>;

export type TypeRef = NodeOf<
  'TypeRef',
  {
    lPar: Keyword<'('> | null;
    modifiers: Modifiers | null;
    type: Type;
    rPar: Keyword<')'> | null;
  }
>;

// Arguments

export type ValueArgs = NodeOf<
  'ValueArgs',
  { elements: readonly ValueArg[]; trailingComma: Keyword<','> | null }
>;

export type ValueArg = NodeOf<
  'ValueArg',
  { name: NameExpression | null; asterisk: boolean; expression: Expression }
>;

export type ExpressionContainer = NodeOf<
  'ExpressionContainer',
  { expression: Expression }
>;

// Expressions

export type IfExpression = NodeOf<
  'IfExpression',
  {
    ifKeyword: Keyword<'if'>;
    condition: Expression;
    body: ExpressionContainer;
    elseBody: ExpressionContainer | null;
  }
>;

export type TryExpression = NodeOf<
  'TryExpression',
  {
    block: BlockExpression;
    catchClauses: readonly CatchClause[];
    finallyBlock: BlockExpression | null;
  }
>;

export type CatchClause = NodeOf<
  'CatchClause',
  {
    catchKeyword: Keyword<'catch'>;
    params: FunctionParams;
    block: BlockExpression;
  }
>;

export type ForExpression = NodeOf<
  'ForExpression',
  {
    forKeyword: Keyword<'for'>;
    loopParam: LambdaParam;
    loopRange: ExpressionContainer;
    body: ExpressionContainer;
  }
>;

export type WhileExpression = NodeOf<
  'WhileExpression',
  {
    whileKeyword: Keyword<'while'>;
    condition: ExpressionContainer;
    body: ExpressionContainer;
  }
>;

export type DoWhileExpression = NodeOf<
  'DoWhileExpression',
  {
    body: ExpressionContainer;
    whileKeyword: Keyword<'while'>;
    condition: ExpressionContainer;
  }
>;

export type BinaryExpression = NodeOf<
  'BinaryExpression',
  { lhs: Expression; operator: Keyword<BinaryOperatorText>; rhs: Expression }
>;

export type BinaryInfixExpression = NodeOf<
  'BinaryInfixExpression',
  { lhs: Expression; operator: NameExpression; rhs: Expression }
>;

export type PrefixUnaryExpression = NodeOf<
  'PrefixUnaryExpression',
  { operator: Keyword<PrefixOperatorText>; expression: Expression }
>;

export type PostfixUnaryExpression = NodeOf<
  'PostfixUnaryExpression',
  { expression: Expression; operator: Keyword<PostfixOperatorText> }
>;

export type BinaryTypeExpression = NodeOf<
  'BinaryTypeExpression',
  {
    lhs: Expression;
    operator: Keyword<BinaryTypeOperatorText>;
    rhs: TypeRef;
  }
>;

export type CallableReferenceExpression = NodeOf<
  'CallableReferenceExpression',
  { lhs: DoubleColonReceiver | null; rhs: NameExpression }
>;

export type ClassLiteralExpression = NodeOf<
  'ClassLiteralExpression',
  { lhs: DoubleColonReceiver | null }
>;

export type ExpressionReceiver = NodeOf<
  'ExpressionReceiver',
  { expression: Expression }
>;

export type TypeReceiver = NodeOf<'TypeReceiver', { type: SimpleType }>;

export type ParenthesizedExpression = NodeOf<
  'ParenthesizedExpression',
  { expression: Expression }
>;

export type StringLiteralExpression = NodeOf<
  'StringLiteralExpression',
  { entries: readonly StringEntry[]; raw: boolean }
>;

export type LiteralStringEntry = NodeOf<'LiteralStringEntry', { text: string }>;

export type EscapeStringEntry = NodeOf<'EscapeStringEntry', { text: string }>;

export type TemplateStringEntry = NodeOf<
  'TemplateStringEntry',
  { expression: Expression; short: boolean }
>;

export type ConstantForm = 'boolean' | 'char' | 'int' | 'float' | 'null';

export type ConstantLiteralExpression = NodeOf<
  'ConstantLiteralExpression',
  { text: string; form: ConstantForm }
>;

export type LambdaExpression = NodeOf<
  'LambdaExpression',
  { params: LambdaParams | null; lambdaBody: LambdaBody | null }
>;

export type LambdaParams = NodeOf<
  'LambdaParams',
  { elements: readonly LambdaParam[]; trailingComma: Keyword<','> | null }
>;

export type LambdaParam = NodeOf<
  'LambdaParam',
  {
    lPar: Keyword<'('> | null;
    variables: readonly LambdaParamVariable[];
    trailingComma: Keyword<','> | null;
    rPar: Keyword<')'> | null;
    colon: Keyword<':'> | null;
    destructTypeRef: TypeRef | null;
  }
>;

export type LambdaParamVariable = NodeOf<
  'LambdaParamVariable',
  { modifiers: Modifiers | null; name: NameExpression; typeRef: TypeRef | null }
>;

export type LambdaBody = NodeOf<
  'LambdaBody',
  { statements: readonly Statement[] }
>;

export type ThisExpression = NodeOf<
  'ThisExpression',
  { label: NameExpression | null }
>;

export type SuperExpression = NodeOf<
  'SuperExpression',
  { typeArgTypeRef: TypeRef | null; label: NameExpression | null }
>;

export type WhenExpression = NodeOf<
  'WhenExpression',
  {
    whenKeyword: Keyword<'when'>;
    lPar: Keyword<'('> | null;
    expression: Expression | null;
    rPar: Keyword<')'> | null;
    whenBranches: readonly WhenBranch[];
  }
>;

export type WhenBranch = NodeOf<
  'WhenBranch',
  {
    whenConditions: readonly WhenCondition[];
    trailingComma: Keyword<','> | null;
    elseKeyword: Keyword<'else'> | null;
    body: Expression;
  }
>;

export type WhenCondition = NodeOf<
  'WhenCondition',
  {
    operator: Keyword<WhenConditionOperatorText> | null;
    expression: Expression | null;
    typeRef: TypeRef | null;
  }
>;

export type ObjectLiteralExpression = NodeOf<
  'ObjectLiteralExpression',
  { declaration: ClassDeclaration }
>;

export type ThrowExpression = NodeOf<
  'ThrowExpression',
  { expression: Expression }
>;

export type ReturnExpression = NodeOf<
  'ReturnExpression',
  { label: NameExpression | null; expression: Expression | null }
>;

export type ContinueExpression = NodeOf<
  'ContinueExpression',
  { label: NameExpression | null }
>;

export type BreakExpression = NodeOf<
  'BreakExpression',
  { label: NameExpression | null }
>;

export type CollectionLiteralExpression = NodeOf<
  'CollectionLiteralExpression',
  { expressions: readonly Expression[]; trailingComma: Keyword<','> | null }
>;

export type NameExpression = NodeOf<'NameExpression', { text: string }>;

export type LabeledExpression = NodeOf<
  'LabeledExpression',
  { label: NameExpression; expression: Expression }
>;

export type AnnotatedExpression = NodeOf<
  'AnnotatedExpression',
  { annotationSets: readonly AnnotationSet[]; expression: Expression }
>;

export type CallExpression = NodeOf<
  'CallExpression',
  {
    expression: Expression;
    typeArgs: TypeArgs | null;
    args: ValueArgs | null;
    lambdaArg: LambdaArg | null;
  }
>;

export type LambdaArg = NodeOf<
  'LambdaArg',
  {
    annotationSets: readonly AnnotationSet[];
    label: NameExpression | null;
    expression: LambdaExpression;
  }
>;

export type ArrayAccessExpression = NodeOf<
  'ArrayAccessExpression',
  {
    expression: Expression;
    indices: readonly Expression[];
    trailingComma: Keyword<','> | null;
  }
>;

export type AnonymousFunctionExpression = NodeOf<
  'AnonymousFunctionExpression',
  { function: FunctionDeclaration }
>;

export type PropertyExpression = NodeOf<
  'PropertyExpression',
  { declaration: PropertyDeclaration }
>;

export type BlockExpression = NodeOf<
  'BlockExpression',
  { statements: readonly Statement[] }
>;

// Modifiers

export type Modifiers = NodeOf<'Modifiers', { elements: readonly Modifier[] }>;

export type AnnotationSet = NodeOf<
  'AnnotationSet',
  {
    atSymbol: Keyword<'@'>;
    target: Keyword<AnnotationTargetText> | null;
    colon: Keyword<':'> | null;
    lBracket: Keyword<'['> | null;
    annotations: readonly Annotation[];
    rBracket: Keyword<']'> | null;
  }
>;

export type Annotation = NodeOf<
  'Annotation',
  { type: SimpleType; args: ValueArgs | null }
>;

export type TypeConstraintSet = NodeOf<
  'TypeConstraintSet',
  { whereKeyword: Keyword<'where'>; constraints: TypeConstraints }
>;

export type TypeConstraints = NodeOf<
  'TypeConstraints',
  { elements: readonly TypeConstraint[] }
>;

export type TypeConstraint = NodeOf<
  'TypeConstraint',
  {
    annotationSets: readonly AnnotationSet[];
    name: NameExpression;
    typeRef: TypeRef;
  }
>;

export type Contract = NodeOf<
  'Contract',
  { contractKeyword: Keyword<'contract'>; contractEffects: ContractEffects }
>;

export type ContractEffects = NodeOf<
  'ContractEffects',
  { elements: readonly ContractEffect[]; trailingComma: Keyword<','> | null }
>;

export type ContractEffect = NodeOf<
  'ContractEffect',
  { expression: Expression }
>;

// Extras

export type Whitespace = NodeOf<'Whitespace', { text: string }>;

export type Comment = NodeOf<
  'Comment',
  { text: string; startsLine: boolean; endsLine: boolean }
>;

export type Semicolon = NodeOf<'Semicolon', { text: string }>;

export type TrailingComma = NodeOf<'TrailingComma', { text: string }>;

// Categories

export type Declaration =
  | ClassDeclaration
  | InitDeclaration
  | FunctionDeclaration
  | PropertyDeclaration
  | TypeAliasDeclaration
  | SecondaryConstructorDeclaration;

export type Expression =
  | IfExpression
  | TryExpression
  | ForExpression
  | WhileExpression
  | DoWhileExpression
  | BinaryExpression
  | BinaryInfixExpression
  | PrefixUnaryExpression
  | PostfixUnaryExpression
  | BinaryTypeExpression
  | CallableReferenceExpression
  | ClassLiteralExpression
  | ParenthesizedExpression
  | StringLiteralExpression
  | ConstantLiteralExpression
  | LambdaExpression
  | ThisExpression
  | SuperExpression
  | WhenExpression
  | ObjectLiteralExpression
  | ThrowExpression
  | ReturnExpression
  | ContinueExpression
  | BreakExpression
  | CollectionLiteralExpression
  | NameExpression
  | LabeledExpression
  | AnnotatedExpression
  | CallExpression
  | ArrayAccessExpression
  | AnonymousFunctionExpression
  | PropertyExpression
  | BlockExpression;

export type Statement = Declaration | Expression;

export type Type = SimpleType | FunctionType | NullableType | DynamicType;

export type ClassParent =
  | CallConstructorParent
  | DelegatedTypeParent
  | TypeParent;

export type Accessor = Getter | Setter;

export type StringEntry =
  | LiteralStringEntry
  | EscapeStringEntry
  | TemplateStringEntry;

export type DoubleColonReceiver = ExpressionReceiver | TypeReceiver;

export type Modifier = AnnotationSet | Keyword<ModifierKeywordText>;

export type PostModifier = TypeConstraintSet | Contract;

export type Extra = Whitespace | Comment | Semicolon | TrailingComma;

export type ASTNode =
  | KotlinFile
  | KotlinScript
  | PackageDirective
  | ImportDirectives
  | ImportDirective
  | ImportAlias
  | Declaration
  | ClassParents
  | ClassParent
  | PrimaryConstructor
  | ClassBody
  | EnumEntry
  | FunctionParams
  | FunctionParam
  | PropertyDelegate
  | Accessor
  | Variable
  | DelegationCall
  | TypeParams
  | TypeParam
  | Type
  | ContextReceivers
  | ContextReceiver
  | FunctionTypeReceiver
  | FunctionTypeParams
  | FunctionTypeParam
  | SimpleTypeQualifier
  | TypeArgs
  | TypeArg
  | TypeRef
  | ValueArgs
  | ValueArg
  | ExpressionContainer
  | Expression
  | CatchClause
  | DoubleColonReceiver
  | StringEntry
  | LambdaParams
  | LambdaParam
  | LambdaParamVariable
  | LambdaBody
  | WhenBranch
  | WhenCondition
  | LambdaArg
  | Modifiers
  | AnnotationSet
  | Annotation
  | TypeConstraintSet
  | TypeConstraints
  | TypeConstraint
  | Contract
  | ContractEffects
  | ContractEffect
  | Keyword
  | Extra;

export type NodeName = ASTNode['name'];
export type NodeByName<N extends NodeName> = Extract<ASTNode, { name: N }>;
export type NodeFields<N extends NodeName> = NodeByName<N>['fields'];

/**
 * Any value a node field can hold.
 */
export type FieldValue =
  | ASTNode
  | readonly ASTNode[]
  | string
  | boolean
  | null;

/**
 * The field names of a node kind that hold child nodes.
 */
export type ChildKey<N extends NodeName> = {
  [K in keyof NodeFields<N>]-?: NodeFields<N>[K] extends
    | ASTNode
    | readonly ASTNode[]
    | null
    ? K
    : never;
}[keyof NodeFields<N>];
