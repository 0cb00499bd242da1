import {
  makeAnnotatedExpression,
  makeAnnotation,
  makeAnnotationSet,
  makeAnonymousFunctionExpression,
  makeArrayAccessExpression,
  makeBinaryExpression,
  makeBinaryInfixExpression,
  makeBinaryTypeExpression,
  makeBlockExpression,
  makeBreakExpression,
  makeCallConstructorParent,
  makeCallExpression,
  makeCallableReferenceExpression,
  makeCatchClause,
  makeClassBody,
  makeClassDeclaration,
  makeClassLiteralExpression,
  makeClassParents,
  makeCollectionLiteralExpression,
  makeConstantLiteralExpression,
  makeContextReceiver,
  makeContextReceivers,
  makeContinueExpression,
  makeContract,
  makeContractEffect,
  makeContractEffects,
  makeDelegatedTypeParent,
  makeDelegationCall,
  makeDoWhileExpression,
  makeDynamicType,
  makeEnumEntry,
  makeEscapeStringEntry,
  makeExpressionContainer,
  makeExpressionReceiver,
  makeForExpression,
  makeFunctionDeclaration,
  makeFunctionParam,
  makeFunctionParams,
  makeFunctionType,
  makeFunctionTypeParam,
  makeFunctionTypeParams,
  makeFunctionTypeReceiver,
  makeGetter,
  makeIfExpression,
  makeImportAlias,
  makeImportDirective,
  makeImportDirectives,
  makeInitDeclaration,
  makeKeyword,
  makeKotlinFile,
  makeKotlinScript,
  makeLabeledExpression,
  makeLambdaArg,
  makeLambdaBody,
  makeLambdaExpression,
  makeLambdaParam,
  makeLambdaParamVariable,
  makeLambdaParams,
  makeLiteralStringEntry,
  makeModifiers,
  makeNameExpression,
  makeNullableType,
  makeObjectLiteralExpression,
  makePackageDirective,
  makeParenthesizedExpression,
  makePostfixUnaryExpression,
  makePrefixUnaryExpression,
  makePrimaryConstructor,
  makePropertyDeclaration,
  makePropertyDelegate,
  makePropertyExpression,
  makeReturnExpression,
  makeSecondaryConstructorDeclaration,
  makeSetter,
  makeSimpleType,
  makeSimpleTypeQualifier,
  makeStringLiteralExpression,
  makeSuperExpression,
  makeTemplateStringEntry,
  makeThisExpression,
  makeThrowExpression,
  makeTryExpression,
  makeTypeAliasDeclaration,
  makeTypeArg,
  makeTypeArgs,
  makeTypeConstraint,
  makeTypeConstraintSet,
  makeTypeConstraints,
  makeTypeParam,
  makeTypeParams,
  makeTypeParent,
  makeTypeReceiver,
  makeTypeRef,
  makeValueArg,
  makeValueArgs,
  makeVariable,
  makeWhenBranch,
  makeWhenCondition,
  makeWhenExpression,
  makeWhileExpression,
} from '../ast/builders';
import {
  isAnnotationTargetText,
  isBinaryOperatorText,
  isBinaryTypeOperatorText,
  isClassDeclarationKeywordText,
  isDelegationTargetText,
  isModifierKeywordText,
  isPostfixOperatorText,
  isPrefixOperatorText,
  isValOrVarText,
  isWhenConditionOperatorText,
} from '../ast/keywords';
import type {
  Accessor,
  Annotation,
  AnnotationSet,
  ASTNode,
  BlockExpression,
  CatchClause,
  ClassBody,
  ClassDeclaration,
  ClassParent,
  ClassParents,
  ConstantForm,
  Declaration,
  DoubleColonReceiver,
  EnumEntry,
  Expression,
  ExpressionContainer,
  FunctionDeclaration,
  FunctionParam,
  FunctionParams,
  FunctionType,
  FunctionTypeParam,
  ImportDirective,
  Keyword,
  KeywordText,
  KotlinFile,
  KotlinScript,
  LambdaExpression,
  LambdaParam,
  LambdaParamVariable,
  LambdaParams,
  Modifier,
  Modifiers,
  NameExpression,
  PostModifier,
  PropertyDeclaration,
  SimpleType,
  SimpleTypeQualifier,
  Statement,
  StringEntry,
  Type,
  TypeArg,
  TypeArgs,
  TypeConstraintSet,
  TypeParam,
  TypeParams,
  TypeRef,
  ValueArg,
  ValueArgs,
  Variable,
  WhenBranch,
  WhenCondition,
} from '../ast/nodes';
import { log } from '../utils/debug';
import { UnsupportedConstructError } from './errors';
import { TokenKind } from './lexer';
import { isTrivia, RawElement, RawKind, RawNode, RawToken } from './raw-tree';

/**
 * The significant children of a raw node, consumed front to back.
 */
class Children {
  readonly owner: RawNode;
  private elements: RawElement[];
  private index = 0;

  constructor(owner: RawNode) {
    this.owner = owner;
    this.elements = owner.children.filter((child) => !isTrivia(child));
  }

  peek(n = 0): RawElement | undefined {
    return this.elements[this.index + n];
  }

  done(): boolean {
    return this.index >= this.elements.length;
  }

  atToken(text: string, n = 0): boolean {
    const element = this.peek(n);
    return element instanceof RawToken && element.substr === text;
  }

  atTokenKind(kind: TokenKind): boolean {
    const element = this.peek();
    return element instanceof RawToken && element.token === kind;
  }

  atNode(...kinds: RawKind[]): boolean {
    const element = this.peek();
    return element instanceof RawNode && kinds.includes(element.kind);
  }

  next(): RawElement {
    const element = this.peek();
    if (element === undefined) {
      throw this.mismatch('another child');
    }
    this.index++;
    return element;
  }

  token(text?: string): RawToken {
    const element = this.peek();
    if (
      !(element instanceof RawToken) ||
      (text !== undefined && element.substr !== text)
    ) {
      throw this.mismatch(text === undefined ? 'a token' : `'${text}'`);
    }
    this.index++;
    return element;
  }

  optionalToken(text: string): RawToken | null {
    return this.atToken(text) ? this.token(text) : null;
  }

  node(kind: RawKind): RawNode {
    const element = this.peek();
    if (!(element instanceof RawNode) || element.kind !== kind) {
      throw this.mismatch(kind);
    }
    this.index++;
    return element;
  }

  optionalNode(kind: RawKind): RawNode | null {
    return this.atNode(kind) ? this.node(kind) : null;
  }

  end() {
    if (!this.done()) {
      throw this.mismatch('no more children');
    }
  }

  mismatch(expected: string): Error {
    const found = this.peek();
    const what =
      found === undefined
        ? 'nothing'
        : found instanceof RawNode
        ? found.kind
        : `'${found.substr}'`;
    return new Error(
      `Converter: expected ${expected} in ${this.owner.kind} at offset ${this.owner.offset}, found ${what}`
    );
  }
}

/**
 * Called for every node the converter builds, children before parents,
 * with the raw element it came from. Nodes that have no counterpart in the
 * raw tree are reported with `null`.
 */
export type NodeListener = (node: ASTNode, raw: RawElement | null) => void;

/**
 * Builds the typed node model from the raw tree.
 *
 * Tokens the writer regenerates by itself, such as `(` after `if`, are
 * consumed without producing nodes. Trivia is skipped entirely.
 */
export class Converter {
  private listener: NodeListener | undefined;

  constructor(listener?: NodeListener) {
    this.listener = listener;
  }

  protected onNode(node: ASTNode, raw: RawElement | null) {
    this.listener?.(node, raw);
  }

  private emit<T extends ASTNode>(node: T, raw: RawElement | null): T {
    this.onNode(node, raw);
    return node;
  }

  private children(raw: RawNode, kind: RawKind): Children {
    if (raw.kind !== kind) {
      throw new Error(
        `Converter: expected ${kind} at offset ${raw.offset}, found ${raw.kind}`
      );
    }
    return new Children(raw);
  }

  private unsupported(raw: RawNode): never {
    const construct = raw.role ?? raw.kind;
    log(`unsupported construct "${construct}" at offset ${raw.offset}`);
    throw new UnsupportedConstructError(construct, raw.offset);
  }

  // Tokens

  private keyword<T extends KeywordText>(c: Children, text: T): Keyword<T> {
    return this.emit(makeKeyword(text), c.token(text));
  }

  private optionalKeyword<T extends KeywordText>(
    c: Children,
    text: T
  ): Keyword<T> | null {
    const token = c.optionalToken(text);
    return token ? this.emit(makeKeyword(text), token) : null;
  }

  private keywordOf<T extends KeywordText>(
    c: Children,
    guard: (text: string) => text is T
  ): Keyword<T> {
    const token = c.token();
    const text = token.substr;
    if (!guard(text)) {
      throw c.mismatch(`a keyword, not '${text}'`);
    }
    return this.emit(makeKeyword(text), token);
  }

  private name(c: Children): NameExpression {
    if (!c.atTokenKind(TokenKind.Identifier)) {
      throw c.mismatch('an identifier');
    }
    const token = c.token();
    return this.emit(makeNameExpression(token.substr), token);
  }

  private optionalName(c: Children): NameExpression | null {
    return c.atTokenKind(TokenKind.Identifier) ? this.name(c) : null;
  }

  private label(c: Children): NameExpression | null {
    return c.optionalToken('@') ? this.name(c) : null;
  }

  /**
   * Elements separated by commas, up to `close` or the end of `c`. A comma
   * with nothing after it is the list's trailing comma.
   */
  private commaSeparated<T>(
    c: Children,
    close: string | null,
    element: () => T
  ): { elements: T[]; trailingComma: Keyword<','> | null } {
    const elements: T[] = [];
    let trailingComma: Keyword<','> | null = null;
    const atEnd = () => c.done() || (close !== null && c.atToken(close));
    while (!atEnd()) {
      if (c.atToken(',')) {
        const comma = c.token(',');
        if (atEnd()) {
          trailingComma = this.emit(makeKeyword(','), comma);
        }
        continue;
      }
      elements.push(element());
    }
    return { elements, trailingComma };
  }

  // Files

  convertFile(raw: RawNode): KotlinFile {
    const c = this.children(raw, RawKind.File);
    const header = this.header(c);
    const declarations: Declaration[] = [];
    while (!c.done()) {
      declarations.push(this.declaration(c.next()));
    }
    return this.emit(makeKotlinFile({ ...header, declarations }), raw);
  }

  convertScript(raw: RawNode): KotlinScript {
    const c = this.children(raw, RawKind.Script);
    const header = this.header(c);
    const statements: Statement[] = [];
    while (!c.done()) {
      statements.push(this.statement(c.next()));
    }
    return this.emit(makeKotlinScript({ ...header, statements }), raw);
  }

  private header(c: Children) {
    const annotationSets = this.annotationSets(c);
    const packageRaw = c.optionalNode(RawKind.PackageDirective);
    const packageDirective = packageRaw
      ? this.packageDirective(packageRaw)
      : null;
    const importsRaw = c.optionalNode(RawKind.ImportList);
    const importDirectives = importsRaw ? this.importList(importsRaw) : null;
    return { annotationSets, packageDirective, importDirectives };
  }

  private packageDirective(raw: RawNode) {
    const c = this.children(raw, RawKind.PackageDirective);
    const packageKeyword = this.keyword(c, 'package');
    const names = [this.name(c)];
    while (c.optionalToken('.')) {
      names.push(this.name(c));
    }
    c.end();
    return this.emit(
      makePackageDirective({ modifiers: null, packageKeyword, names }),
      raw
    );
  }

  private importList(raw: RawNode) {
    const c = this.children(raw, RawKind.ImportList);
    const elements: ImportDirective[] = [];
    while (!c.done()) {
      elements.push(this.importDirective(c.node(RawKind.ImportDirective)));
    }
    return this.emit(makeImportDirectives({ elements }), raw);
  }

  private importDirective(raw: RawNode) {
    const c = this.children(raw, RawKind.ImportDirective);
    const importKeyword = this.keyword(c, 'import');
    const names = [this.name(c)];
    let wildcard = false;
    while (c.optionalToken('.')) {
      if (c.optionalToken('*')) {
        wildcard = true;
        break;
      }
      names.push(this.name(c));
    }
    let importAlias = null;
    const aliasRaw = c.optionalNode(RawKind.ImportAlias);
    if (aliasRaw) {
      const alias = this.children(aliasRaw, RawKind.ImportAlias);
      alias.token('as');
      const name = this.name(alias);
      alias.end();
      importAlias = this.emit(makeImportAlias({ name }), aliasRaw);
    }
    c.end();
    return this.emit(
      makeImportDirective({ importKeyword, names, wildcard, importAlias }),
      raw
    );
  }

  // Declarations

  private declaration(raw: RawElement): Declaration {
    if (raw instanceof RawNode) {
      switch (raw.kind) {
        case RawKind.Class:
          return this.classDeclaration(raw);
        case RawKind.Fun:
          return this.functionDeclaration(raw);
        case RawKind.Property:
          return this.propertyDeclaration(raw);
        case RawKind.TypeAlias:
          return this.typeAlias(raw);
        case RawKind.Init:
          return this.initDeclaration(raw);
        case RawKind.SecondaryConstructor:
          return this.secondaryConstructor(raw);
        case RawKind.Unsupported:
          return this.unsupported(raw);
      }
    }
    throw new Error(
      `Converter: expected a declaration, found ${describe(raw)}`
    );
  }

  private statement(raw: RawElement): Statement {
    if (raw instanceof RawNode) {
      switch (raw.kind) {
        case RawKind.Class:
          return isObjectLiteral(raw)
            ? this.expression(raw)
            : this.classDeclaration(raw);
        case RawKind.Fun:
          return isAnonymousFunction(raw)
            ? this.expression(raw)
            : this.functionDeclaration(raw);
        case RawKind.Property:
          return this.propertyDeclaration(raw);
        case RawKind.TypeAlias:
          return this.typeAlias(raw);
      }
    }
    return this.expression(raw);
  }

  private modifiers(c: Children): Modifiers | null {
    const raw = c.optionalNode(RawKind.Modifiers);
    if (!raw) {
      return null;
    }
    const mc = new Children(raw);
    const elements: Modifier[] = [];
    while (!mc.done()) {
      if (mc.atNode(RawKind.AnnotationSet)) {
        elements.push(this.annotationSet(mc.node(RawKind.AnnotationSet)));
      } else {
        elements.push(this.keywordOf(mc, isModifierKeywordText));
      }
    }
    return this.emit(makeModifiers({ elements }), raw);
  }

  private annotationSets(c: Children): AnnotationSet[] {
    const sets: AnnotationSet[] = [];
    while (c.atNode(RawKind.AnnotationSet)) {
      sets.push(this.annotationSet(c.node(RawKind.AnnotationSet)));
    }
    return sets;
  }

  private annotationSet(raw: RawNode): AnnotationSet {
    const c = this.children(raw, RawKind.AnnotationSet);
    const atSymbol = this.keyword(c, '@');
    let target = null;
    let colon = null;
    if (c.atToken(':', 1)) {
      target = this.keywordOf(c, isAnnotationTargetText);
      colon = this.keyword(c, ':');
    }
    const lBracket = this.optionalKeyword(c, '[');
    const annotations: Annotation[] = [];
    while (c.atNode(RawKind.Annotation)) {
      const entry = c.node(RawKind.Annotation);
      const ec = new Children(entry);
      const type = this.simpleType(ec.node(RawKind.UserType));
      const args = this.optionalValueArgs(ec);
      ec.end();
      annotations.push(this.emit(makeAnnotation({ type, args }), entry));
    }
    const rBracket = this.optionalKeyword(c, ']');
    c.end();
    return this.emit(
      makeAnnotationSet({
        atSymbol,
        target,
        colon,
        lBracket,
        annotations,
        rBracket,
      }),
      raw
    );
  }

  private classDeclaration(raw: RawNode): ClassDeclaration {
    const c = this.children(raw, RawKind.Class);
    const modifiers = this.modifiers(c);
    const classDeclarationKeyword = this.keywordOf(
      c,
      isClassDeclarationKeywordText
    );
    const name = this.optionalName(c);
    const typeParams = this.optionalTypeParams(c);
    let primaryConstructor = null;
    const constructorRaw = c.optionalNode(RawKind.PrimaryConstructor);
    if (constructorRaw) {
      const pc = new Children(constructorRaw);
      primaryConstructor = this.emit(
        makePrimaryConstructor({
          modifiers: this.modifiers(pc),
          constructorKeyword: this.optionalKeyword(pc, 'constructor'),
          params: this.functionParams(pc.node(RawKind.ValueParams)),
        }),
        constructorRaw
      );
      pc.end();
    }
    const parentsRaw = c.optionalNode(RawKind.ClassParents);
    const classParents = parentsRaw ? this.classParents(parentsRaw) : null;
    const typeConstraintSet = this.optionalTypeConstraintSet(c);
    const bodyRaw = c.optionalNode(RawKind.ClassBody);
    const classBody = bodyRaw ? this.classBody(bodyRaw) : null;
    c.end();
    return this.emit(
      makeClassDeclaration({
        modifiers,
        classDeclarationKeyword,
        name,
        typeParams,
        primaryConstructor,
        classParents,
        typeConstraintSet,
        classBody,
      }),
      raw
    );
  }

  private classParents(raw: RawNode): ClassParents {
    const c = this.children(raw, RawKind.ClassParents);
    c.token(':');
    const elements = [this.classParent(c.next())];
    while (c.optionalToken(',')) {
      elements.push(this.classParent(c.next()));
    }
    c.end();
    return this.emit(makeClassParents({ elements }), raw);
  }

  private classParent(raw: RawElement): ClassParent {
    if (!(raw instanceof RawNode)) {
      throw new Error(`Converter: expected a supertype, found ${describe(raw)}`);
    }
    const c = new Children(raw);
    const type = this.simpleType(c.node(RawKind.UserType));
    let parent: ClassParent;
    switch (raw.kind) {
      case RawKind.CallConstructorParent:
        parent = makeCallConstructorParent({
          type,
          args: this.valueArgs(c.node(RawKind.ValueArgs)),
        });
        break;
      case RawKind.DelegatedTypeParent:
        parent = makeDelegatedTypeParent({
          type,
          byKeyword: this.keyword(c, 'by'),
          expression: this.expression(c.next()),
        });
        break;
      case RawKind.TypeParent:
        parent = makeTypeParent({ type });
        break;
      default:
        throw c.mismatch('a supertype entry');
    }
    c.end();
    return this.emit(parent, raw);
  }

  private classBody(raw: RawNode): ClassBody {
    const c = this.children(raw, RawKind.ClassBody);
    c.token('{');
    const enumEntries: EnumEntry[] = [];
    while (c.atNode(RawKind.EnumEntry)) {
      enumEntries.push(this.enumEntry(c.node(RawKind.EnumEntry)));
      c.optionalToken(',');
    }
    const declarations: Declaration[] = [];
    while (!c.atToken('}')) {
      declarations.push(this.declaration(c.next()));
    }
    c.token('}');
    c.end();
    return this.emit(makeClassBody({ enumEntries, declarations }), raw);
  }

  private enumEntry(raw: RawNode): EnumEntry {
    const c = this.children(raw, RawKind.EnumEntry);
    const modifiers = this.modifiers(c);
    const name = this.name(c);
    const args = this.optionalValueArgs(c);
    const bodyRaw = c.optionalNode(RawKind.ClassBody);
    const classBody = bodyRaw ? this.classBody(bodyRaw) : null;
    c.end();
    return this.emit(makeEnumEntry({ modifiers, name, args, classBody }), raw);
  }

  private initDeclaration(raw: RawNode) {
    const c = this.children(raw, RawKind.Init);
    const modifiers = this.modifiers(c);
    c.token('init');
    const block = this.block(c.node(RawKind.Block));
    c.end();
    return this.emit(makeInitDeclaration({ modifiers, block }), raw);
  }

  private secondaryConstructor(raw: RawNode) {
    const c = this.children(raw, RawKind.SecondaryConstructor);
    const modifiers = this.modifiers(c);
    const constructorKeyword = this.keyword(c, 'constructor');
    const params = this.functionParams(c.node(RawKind.ValueParams));
    let delegationCall = null;
    if (c.optionalToken(':')) {
      const callRaw = c.node(RawKind.DelegationCall);
      const dc = new Children(callRaw);
      const target = this.keywordOf(dc, isDelegationTargetText);
      const args = this.valueArgs(dc.node(RawKind.ValueArgs));
      dc.end();
      delegationCall = this.emit(makeDelegationCall({ target, args }), callRaw);
    }
    const blockRaw = c.optionalNode(RawKind.Block);
    const block = blockRaw ? this.block(blockRaw) : null;
    c.end();
    return this.emit(
      makeSecondaryConstructorDeclaration({
        modifiers,
        constructorKeyword,
        params,
        delegationCall,
        block,
      }),
      raw
    );
  }

  private receiverTypeRef(c: Children): TypeRef | null {
    const raw = c.optionalNode(RawKind.TypeRef);
    if (!raw) {
      return null;
    }
    const typeRef = this.typeRef(raw);
    c.token('.');
    return typeRef;
  }

  private functionDeclaration(raw: RawNode): FunctionDeclaration {
    const c = this.children(raw, RawKind.Fun);
    const modifiers = this.modifiers(c);
    const funKeyword = this.keyword(c, 'fun');
    const typeParams = this.optionalTypeParams(c);
    const receiverTypeRef = this.receiverTypeRef(c);
    const name = this.optionalName(c);
    const paramsRaw = c.optionalNode(RawKind.ValueParams);
    const params = paramsRaw ? this.functionParams(paramsRaw) : null;
    const typeRef = c.optionalToken(':')
      ? this.typeRef(c.node(RawKind.TypeRef))
      : null;
    const postModifiers: PostModifier[] = [];
    for (;;) {
      const constraints = this.optionalTypeConstraintSet(c);
      if (constraints) {
        postModifiers.push(constraints);
        continue;
      }
      const contractRaw = c.optionalNode(RawKind.Contract);
      if (!contractRaw) {
        break;
      }
      postModifiers.push(this.contract(contractRaw));
    }
    const equals = this.optionalKeyword(c, '=');
    let body: Expression | null = null;
    if (equals) {
      body = this.expression(c.next());
    } else {
      const blockRaw = c.optionalNode(RawKind.Block);
      body = blockRaw ? this.block(blockRaw) : null;
    }
    c.end();
    return this.emit(
      makeFunctionDeclaration({
        modifiers,
        funKeyword,
        typeParams,
        receiverTypeRef,
        name,
        params,
        typeRef,
        postModifiers,
        equals,
        body,
      }),
      raw
    );
  }

  private functionParams(raw: RawNode): FunctionParams {
    const c = this.children(raw, RawKind.ValueParams);
    c.token('(');
    const { elements, trailingComma } = this.commaSeparated(c, ')', () =>
      this.functionParam(c.node(RawKind.ValueParam))
    );
    c.token(')');
    c.end();
    return this.emit(makeFunctionParams({ elements, trailingComma }), raw);
  }

  private functionParam(raw: RawNode): FunctionParam {
    const c = this.children(raw, RawKind.ValueParam);
    const modifiers = this.modifiers(c);
    const valOrVarKeyword =
      c.atToken('val') || c.atToken('var')
        ? this.keywordOf(c, isValOrVarText)
        : null;
    const name = this.name(c);
    const typeRef = c.optionalToken(':')
      ? this.typeRef(c.node(RawKind.TypeRef))
      : null;
    const equals = this.optionalKeyword(c, '=');
    const defaultValue = equals ? this.expression(c.next()) : null;
    c.end();
    return this.emit(
      makeFunctionParam({
        modifiers,
        valOrVarKeyword,
        name,
        typeRef,
        equals,
        defaultValue,
      }),
      raw
    );
  }

  private propertyDeclaration(raw: RawNode): PropertyDeclaration {
    const c = this.children(raw, RawKind.Property);
    const modifiers = this.modifiers(c);
    const valOrVarKeyword = this.keywordOf(c, isValOrVarText);
    const typeParams = this.optionalTypeParams(c);
    const receiverTypeRef = this.receiverTypeRef(c);
    let lPar = null;
    let rPar = null;
    let trailingComma = null;
    let variables: Variable[];
    if (c.atToken('(')) {
      const count = raw.children.filter(
        (child) => child instanceof RawNode && child.kind === RawKind.Variable
      ).length;
      if (count === 1) {
        log(`single-variable destructuring at offset ${raw.offset}`);
        throw new UnsupportedConstructError(
          'destructuring declaration with a single variable',
          raw.offset
        );
      }
      lPar = this.keyword(c, '(');
      const list = this.commaSeparated(c, ')', () =>
        this.variable(c.node(RawKind.Variable))
      );
      variables = list.elements;
      trailingComma = list.trailingComma;
      rPar = this.keyword(c, ')');
    } else {
      const name = this.name(c);
      const typeRef = c.optionalToken(':')
        ? this.typeRef(c.node(RawKind.TypeRef))
        : null;
      variables = [this.emit(makeVariable({ name, typeRef }), null)];
    }
    const typeConstraintSet = this.optionalTypeConstraintSet(c);
    const equals = this.optionalKeyword(c, '=');
    const initializer = equals ? this.expression(c.next()) : null;
    let propertyDelegate = null;
    const delegateRaw = c.optionalNode(RawKind.PropertyDelegate);
    if (delegateRaw) {
      const dc = new Children(delegateRaw);
      const byKeyword = this.keyword(dc, 'by');
      const expression = this.expression(dc.next());
      dc.end();
      propertyDelegate = this.emit(
        makePropertyDelegate({ byKeyword, expression }),
        delegateRaw
      );
    }
    const accessors: Accessor[] = [];
    while (c.atNode(RawKind.Getter, RawKind.Setter)) {
      accessors.push(this.accessor(c.next()));
    }
    c.end();
    return this.emit(
      makePropertyDeclaration({
        modifiers,
        valOrVarKeyword,
        typeParams,
        receiverTypeRef,
        lPar,
        variables,
        trailingComma,
        rPar,
        typeConstraintSet,
        equals,
        initializer,
        propertyDelegate,
        accessors,
      }),
      raw
    );
  }

  private variable(raw: RawNode): Variable {
    const c = this.children(raw, RawKind.Variable);
    const name = this.name(c);
    const typeRef = c.optionalToken(':')
      ? this.typeRef(c.node(RawKind.TypeRef))
      : null;
    c.end();
    return this.emit(makeVariable({ name, typeRef }), raw);
  }

  private accessor(raw: RawElement): Accessor {
    if (!(raw instanceof RawNode)) {
      throw new Error(`Converter: expected an accessor, found ${describe(raw)}`);
    }
    const c = new Children(raw);
    const modifiers = this.modifiers(c);
    if (raw.kind === RawKind.Getter) {
      const getKeyword = this.keyword(c, 'get');
      const lPar = this.optionalKeyword(c, '(');
      const rPar = this.optionalKeyword(c, ')');
      const typeRef = c.optionalToken(':')
        ? this.typeRef(c.node(RawKind.TypeRef))
        : null;
      const { equals, body } = this.accessorBody(c);
      c.end();
      return this.emit(
        makeGetter({ modifiers, getKeyword, lPar, rPar, typeRef, equals, body }),
        raw
      );
    }
    const setKeyword = this.keyword(c, 'set');
    const paramsRaw = c.optionalNode(RawKind.ValueParams);
    const params = paramsRaw ? this.functionParams(paramsRaw) : null;
    const { equals, body } = this.accessorBody(c);
    c.end();
    return this.emit(
      makeSetter({ modifiers, setKeyword, params, equals, body }),
      raw
    );
  }

  private accessorBody(c: Children) {
    const equals = this.optionalKeyword(c, '=');
    if (equals) {
      return { equals, body: this.expression(c.next()) };
    }
    const blockRaw = c.optionalNode(RawKind.Block);
    return { equals, body: blockRaw ? this.block(blockRaw) : null };
  }

  private typeAlias(raw: RawNode) {
    const c = this.children(raw, RawKind.TypeAlias);
    const modifiers = this.modifiers(c);
    c.token('typealias');
    const name = this.name(c);
    const typeParams = this.optionalTypeParams(c);
    c.token('=');
    const typeRef = this.typeRef(c.node(RawKind.TypeRef));
    c.end();
    return this.emit(
      makeTypeAliasDeclaration({ modifiers, name, typeParams, typeRef }),
      raw
    );
  }

  private optionalTypeParams(c: Children): TypeParams | null {
    const raw = c.optionalNode(RawKind.TypeParams);
    if (!raw) {
      return null;
    }
    const tc = new Children(raw);
    tc.token('<');
    const { elements, trailingComma } = this.commaSeparated(tc, '>', () =>
      this.typeParam(tc.node(RawKind.TypeParam))
    );
    tc.token('>');
    tc.end();
    return this.emit(makeTypeParams({ elements, trailingComma }), raw);
  }

  private typeParam(raw: RawNode): TypeParam {
    const c = this.children(raw, RawKind.TypeParam);
    const modifiers = this.modifiers(c);
    const name = this.name(c);
    const typeRef = c.optionalToken(':')
      ? this.typeRef(c.node(RawKind.TypeRef))
      : null;
    c.end();
    return this.emit(makeTypeParam({ modifiers, name, typeRef }), raw);
  }

  private optionalTypeConstraintSet(c: Children): TypeConstraintSet | null {
    const raw = c.optionalNode(RawKind.TypeConstraintSet);
    if (!raw) {
      return null;
    }
    const sc = new Children(raw);
    const whereKeyword = this.keyword(sc, 'where');
    const listRaw = sc.node(RawKind.TypeConstraints);
    sc.end();
    const lc = new Children(listRaw);
    const { elements } = this.commaSeparated(lc, null, () => {
      const constraintRaw = lc.node(RawKind.TypeConstraint);
      const cc = new Children(constraintRaw);
      const annotationSets = this.annotationSets(cc);
      const name = this.name(cc);
      cc.token(':');
      const typeRef = this.typeRef(cc.node(RawKind.TypeRef));
      cc.end();
      return this.emit(
        makeTypeConstraint({ annotationSets, name, typeRef }),
        constraintRaw
      );
    });
    const constraints = this.emit(makeTypeConstraints({ elements }), listRaw);
    return this.emit(makeTypeConstraintSet({ whereKeyword, constraints }), raw);
  }

  private contract(raw: RawNode) {
    const c = this.children(raw, RawKind.Contract);
    const contractKeyword = this.keyword(c, 'contract');
    const effectsRaw = c.node(RawKind.ContractEffects);
    c.end();
    const ec = new Children(effectsRaw);
    ec.token('[');
    const { elements, trailingComma } = this.commaSeparated(ec, ']', () => {
      const effectRaw = ec.node(RawKind.ContractEffect);
      const fc = new Children(effectRaw);
      const expression = this.expression(fc.next());
      fc.end();
      return this.emit(makeContractEffect({ expression }), effectRaw);
    });
    ec.token(']');
    ec.end();
    const contractEffects = this.emit(
      makeContractEffects({ elements, trailingComma }),
      effectsRaw
    );
    return this.emit(makeContract({ contractKeyword, contractEffects }), raw);
  }

  // Types

  private typeRef(raw: RawNode): TypeRef {
    const c = this.children(raw, RawKind.TypeRef);
    const lPar = this.optionalKeyword(c, '(');
    const modifiers = this.modifiers(c);
    const type = this.type(c.next());
    const rPar = this.optionalKeyword(c, ')');
    c.end();
    return this.emit(makeTypeRef({ lPar, modifiers, type, rPar }), raw);
  }

  private type(raw: RawElement): Type {
    if (raw instanceof RawNode) {
      switch (raw.kind) {
        case RawKind.UserType:
          return this.simpleType(raw);
        case RawKind.NullableType: {
          const c = new Children(raw);
          const lPar = this.optionalKeyword(c, '(');
          const modifiers = this.modifiers(c);
          const type = this.type(c.next());
          const rPar = this.optionalKeyword(c, ')');
          c.token('?');
          c.end();
          return this.emit(
            makeNullableType({ lPar, modifiers, type, rPar }),
            raw
          );
        }
        case RawKind.FunctionType:
          return this.functionType(raw);
        case RawKind.DynamicType:
          return this.emit(makeDynamicType(), raw);
        case RawKind.Unsupported:
          return this.unsupported(raw);
      }
    }
    throw new Error(`Converter: expected a type, found ${describe(raw)}`);
  }

  private simpleType(raw: RawNode): SimpleType {
    const c = this.children(raw, RawKind.UserType);
    const qualifiers: SimpleTypeQualifier[] = [];
    while (c.atNode(RawKind.TypeQualifier)) {
      const qualifierRaw = c.node(RawKind.TypeQualifier);
      const qc = new Children(qualifierRaw);
      const name = this.name(qc);
      const typeArgs = this.optionalTypeArgs(qc);
      qc.end();
      qualifiers.push(
        this.emit(makeSimpleTypeQualifier({ name, typeArgs }), qualifierRaw)
      );
      c.token('.');
    }
    const name = this.name(c);
    const typeArgs = this.optionalTypeArgs(c);
    c.end();
    return this.emit(makeSimpleType({ qualifiers, name, typeArgs }), raw);
  }

  private optionalTypeArgs(c: Children): TypeArgs | null {
    const raw = c.optionalNode(RawKind.TypeArgs);
    if (!raw) {
      return null;
    }
    const ac = new Children(raw);
    ac.token('<');
    const { elements, trailingComma } = this.commaSeparated(ac, '>', () =>
      this.typeArg(ac.node(RawKind.TypeArg))
    );
    ac.token('>');
    ac.end();
    return this.emit(makeTypeArgs({ elements, trailingComma }), raw);
  }

  private typeArg(raw: RawNode): TypeArg {
    const c = this.children(raw, RawKind.TypeArg);
    if (c.optionalToken('*')) {
      c.end();
      return this.emit(
        makeTypeArg({ modifiers: null, typeRef: null, asterisk: true }),
        raw
      );
    }
    const modifiers = this.modifiers(c);
    const typeRef = this.typeRef(c.node(RawKind.TypeRef));
    c.end();
    return this.emit(makeTypeArg({ modifiers, typeRef, asterisk: false }), raw);
  }

  private functionType(raw: RawNode): FunctionType {
    const c = this.children(raw, RawKind.FunctionType);
    let contextReceivers = null;
    const contextRaw = c.optionalNode(RawKind.ContextReceivers);
    if (contextRaw) {
      const cc = new Children(contextRaw);
      cc.token('context');
      cc.token('(');
      const { elements, trailingComma } = this.commaSeparated(cc, ')', () => {
        const receiverRaw = cc.node(RawKind.ContextReceiver);
        const rc = new Children(receiverRaw);
        const typeRef = this.typeRef(rc.node(RawKind.TypeRef));
        rc.end();
        return this.emit(makeContextReceiver({ typeRef }), receiverRaw);
      });
      cc.token(')');
      cc.end();
      contextReceivers = this.emit(
        makeContextReceivers({ elements, trailingComma }),
        contextRaw
      );
    }
    let functionTypeReceiver = null;
    const receiverRaw = c.optionalNode(RawKind.FunctionTypeReceiver);
    if (receiverRaw) {
      const rc = new Children(receiverRaw);
      const typeRef = this.typeRef(rc.node(RawKind.TypeRef));
      rc.token('.');
      rc.end();
      functionTypeReceiver = this.emit(
        makeFunctionTypeReceiver({ typeRef }),
        receiverRaw
      );
    }
    const paramsRaw = c.node(RawKind.FunctionTypeParams);
    const pc = new Children(paramsRaw);
    pc.token('(');
    const { elements, trailingComma } = this.commaSeparated(pc, ')', () =>
      this.functionTypeParam(pc.node(RawKind.FunctionTypeParam))
    );
    pc.token(')');
    pc.end();
    const params = this.emit(
      makeFunctionTypeParams({ elements, trailingComma }),
      paramsRaw
    );
    c.token('->');
    const returnTypeRef = this.typeRef(c.node(RawKind.TypeRef));
    c.end();
    return this.emit(
      makeFunctionType({
        contextReceivers,
        functionTypeReceiver,
        params,
        returnTypeRef,
      }),
      raw
    );
  }

  private functionTypeParam(raw: RawNode): FunctionTypeParam {
    const c = this.children(raw, RawKind.FunctionTypeParam);
    let name = null;
    if (c.atToken(':', 1)) {
      name = this.name(c);
      c.token(':');
    }
    const typeRef = this.typeRef(c.node(RawKind.TypeRef));
    c.end();
    return this.emit(makeFunctionTypeParam({ name, typeRef }), raw);
  }

  // Arguments

  private optionalValueArgs(c: Children): ValueArgs | null {
    const raw = c.optionalNode(RawKind.ValueArgs);
    return raw ? this.valueArgs(raw) : null;
  }

  private valueArgs(raw: RawNode): ValueArgs {
    const c = this.children(raw, RawKind.ValueArgs);
    c.token('(');
    const { elements, trailingComma } = this.commaSeparated(c, ')', () =>
      this.valueArg(c.node(RawKind.ValueArg))
    );
    c.token(')');
    c.end();
    return this.emit(makeValueArgs({ elements, trailingComma }), raw);
  }

  private valueArg(raw: RawNode): ValueArg {
    const c = this.children(raw, RawKind.ValueArg);
    let name = null;
    if (c.atToken('=', 1)) {
      name = this.name(c);
      c.token('=');
    }
    const asterisk = c.optionalToken('*') !== null;
    const expression = this.expression(c.next());
    c.end();
    return this.emit(makeValueArg({ name, asterisk, expression }), raw);
  }

  // Expressions

  private container(raw: RawElement): ExpressionContainer {
    const expression = this.expression(raw);
    return this.emit(makeExpressionContainer({ expression }), null);
  }

  private block(raw: RawNode): BlockExpression {
    const c = this.children(raw, RawKind.Block);
    c.token('{');
    const statements: Statement[] = [];
    while (!c.atToken('}')) {
      statements.push(this.statement(c.next()));
    }
    c.token('}');
    c.end();
    return this.emit(makeBlockExpression({ statements }), raw);
  }

  private expression(raw: RawElement): Expression {
    if (raw instanceof RawToken) {
      return this.tokenExpression(raw);
    }
    switch (raw.kind) {
      case RawKind.If:
        return this.ifExpression(raw);
      case RawKind.Try:
        return this.tryExpression(raw);
      case RawKind.For:
        return this.forExpression(raw);
      case RawKind.While:
        return this.whileExpression(raw);
      case RawKind.DoWhile:
        return this.doWhileExpression(raw);
      case RawKind.Binary:
      case RawKind.BinaryInfix:
      case RawKind.BinaryType:
        return this.binaryExpression(raw);
      case RawKind.Prefix: {
        const c = new Children(raw);
        const operator = this.keywordOf(c, isPrefixOperatorText);
        const expression = this.expression(c.next());
        c.end();
        return this.emit(
          makePrefixUnaryExpression({ operator, expression }),
          raw
        );
      }
      case RawKind.Postfix: {
        const c = new Children(raw);
        const expression = this.expression(c.next());
        const operator = this.keywordOf(c, isPostfixOperatorText);
        c.end();
        return this.emit(
          makePostfixUnaryExpression({ expression, operator }),
          raw
        );
      }
      case RawKind.CallableReference:
      case RawKind.ClassLiteral:
        return this.doubleColonExpression(raw);
      case RawKind.Parenthesized: {
        const c = new Children(raw);
        c.token('(');
        const expression = this.expression(c.next());
        c.token(')');
        c.end();
        return this.emit(makeParenthesizedExpression({ expression }), raw);
      }
      case RawKind.StringTemplate:
        return this.stringTemplate(raw);
      case RawKind.Lambda:
        return this.lambda(raw);
      case RawKind.This:
      case RawKind.Super:
        return this.thisOrSuper(raw);
      case RawKind.When:
        return this.whenExpression(raw);
      case RawKind.Throw:
      case RawKind.Return:
      case RawKind.Continue:
      case RawKind.Break:
        return this.jump(raw);
      case RawKind.CollectionLiteral: {
        const c = new Children(raw);
        c.token('[');
        const { elements, trailingComma } = this.commaSeparated(c, ']', () =>
          this.expression(c.next())
        );
        c.token(']');
        c.end();
        return this.emit(
          makeCollectionLiteralExpression({
            expressions: elements,
            trailingComma,
          }),
          raw
        );
      }
      case RawKind.Labeled: {
        const c = new Children(raw);
        const label = this.name(c);
        c.token('@');
        const expression = this.expression(c.next());
        c.end();
        return this.emit(makeLabeledExpression({ label, expression }), raw);
      }
      case RawKind.Annotated: {
        const c = new Children(raw);
        const annotationSets = this.annotationSets(c);
        const expression = this.expression(c.next());
        c.end();
        return this.emit(
          makeAnnotatedExpression({ annotationSets, expression }),
          raw
        );
      }
      case RawKind.Call:
        return this.callExpression(raw);
      case RawKind.ArrayAccess: {
        const c = new Children(raw);
        const expression = this.expression(c.next());
        c.token('[');
        const { elements, trailingComma } = this.commaSeparated(c, ']', () =>
          this.expression(c.next())
        );
        c.token(']');
        c.end();
        return this.emit(
          makeArrayAccessExpression({
            expression,
            indices: elements,
            trailingComma,
          }),
          raw
        );
      }
      case RawKind.Block:
        return this.block(raw);
      case RawKind.Fun:
        return this.emit(
          makeAnonymousFunctionExpression({
            function: this.functionDeclaration(raw),
          }),
          raw
        );
      case RawKind.Class:
        return this.emit(
          makeObjectLiteralExpression({
            declaration: this.classDeclaration(raw),
          }),
          raw
        );
      case RawKind.Property:
        return this.emit(
          makePropertyExpression({
            declaration: this.propertyDeclaration(raw),
          }),
          raw
        );
      case RawKind.Unsupported:
        return this.unsupported(raw);
    }
    throw new Error(
      `Converter: expected an expression, found ${describe(raw)}`
    );
  }

  private tokenExpression(token: RawToken): Expression {
    const constant = (form: ConstantForm) =>
      this.emit(
        makeConstantLiteralExpression({ text: token.substr, form }),
        token
      );
    switch (token.token) {
      case TokenKind.Identifier:
        return this.emit(makeNameExpression(token.substr), token);
      case TokenKind.IntegerLiteral:
        return constant('int');
      case TokenKind.FloatLiteral:
        return constant('float');
      case TokenKind.CharLiteral:
        return constant('char');
      case TokenKind.Keyword:
        switch (token.substr) {
          case 'true':
          case 'false':
            return constant('boolean');
          case 'null':
            return constant('null');
          case 'this':
            return this.emit(makeThisExpression({ label: null }), token);
        }
    }
    throw new Error(`Converter: expected an expression, found ${describe(token)}`);
  }

  private ifExpression(raw: RawNode) {
    const c = new Children(raw);
    const ifKeyword = this.keyword(c, 'if');
    c.token('(');
    const condition = this.expression(c.next());
    c.token(')');
    const body = this.container(c.next());
    const elseBody = c.optionalToken('else') ? this.container(c.next()) : null;
    c.end();
    return this.emit(
      makeIfExpression({ ifKeyword, condition, body, elseBody }),
      raw
    );
  }

  private tryExpression(raw: RawNode) {
    const c = new Children(raw);
    c.token('try');
    const block = this.block(c.node(RawKind.Block));
    const catchClauses: CatchClause[] = [];
    while (c.atNode(RawKind.Catch)) {
      const clauseRaw = c.node(RawKind.Catch);
      const cc = new Children(clauseRaw);
      const catchKeyword = this.keyword(cc, 'catch');
      const params = this.functionParams(cc.node(RawKind.ValueParams));
      const clauseBlock = this.block(cc.node(RawKind.Block));
      cc.end();
      catchClauses.push(
        this.emit(
          makeCatchClause({ catchKeyword, params, block: clauseBlock }),
          clauseRaw
        )
      );
    }
    const finallyBlock = c.optionalToken('finally')
      ? this.block(c.node(RawKind.Block))
      : null;
    c.end();
    return this.emit(
      makeTryExpression({ block, catchClauses, finallyBlock }),
      raw
    );
  }

  private forExpression(raw: RawNode) {
    const c = new Children(raw);
    const forKeyword = this.keyword(c, 'for');
    c.token('(');
    const loopParam = this.lambdaParam(c.node(RawKind.LambdaParam));
    c.token('in');
    const loopRange = this.container(c.next());
    c.token(')');
    const body = this.container(c.next());
    c.end();
    return this.emit(
      makeForExpression({ forKeyword, loopParam, loopRange, body }),
      raw
    );
  }

  private whileExpression(raw: RawNode) {
    const c = new Children(raw);
    const whileKeyword = this.keyword(c, 'while');
    c.token('(');
    const condition = this.container(c.next());
    c.token(')');
    const body = this.container(c.next());
    c.end();
    return this.emit(
      makeWhileExpression({ whileKeyword, condition, body }),
      raw
    );
  }

  private doWhileExpression(raw: RawNode) {
    const c = new Children(raw);
    c.token('do');
    const body = this.container(c.next());
    const whileKeyword = this.keyword(c, 'while');
    c.token('(');
    const condition = this.container(c.next());
    c.token(')');
    c.end();
    return this.emit(
      makeDoWhileExpression({ body, whileKeyword, condition }),
      raw
    );
  }

  private binaryExpression(raw: RawNode): Expression {
    const c = new Children(raw);
    const lhs = this.expression(c.next());
    let result: Expression;
    switch (raw.kind) {
      case RawKind.BinaryInfix: {
        const operator = this.name(c);
        result = makeBinaryInfixExpression({
          lhs,
          operator,
          rhs: this.expression(c.next()),
        });
        break;
      }
      case RawKind.BinaryType: {
        const operator = this.keywordOf(c, isBinaryTypeOperatorText);
        result = makeBinaryTypeExpression({
          lhs,
          operator,
          rhs: this.typeRef(c.node(RawKind.TypeRef)),
        });
        break;
      }
      default: {
        const operator = this.keywordOf(c, isBinaryOperatorText);
        result = makeBinaryExpression({
          lhs,
          operator,
          rhs: this.expression(c.next()),
        });
      }
    }
    c.end();
    return this.emit(result, raw);
  }

  private doubleColonExpression(raw: RawNode): Expression {
    const c = new Children(raw);
    const lhs = c.atToken('::') ? null : this.receiver(c.next());
    c.token('::');
    if (raw.kind === RawKind.ClassLiteral) {
      c.token('class');
      c.end();
      return this.emit(makeClassLiteralExpression({ lhs }), raw);
    }
    const rhs = this.name(c);
    c.end();
    return this.emit(makeCallableReferenceExpression({ lhs, rhs }), raw);
  }

  private receiver(raw: RawElement): DoubleColonReceiver {
    if (raw instanceof RawNode && raw.kind === RawKind.UserType) {
      return this.emit(makeTypeReceiver({ type: this.simpleType(raw) }), null);
    }
    return this.emit(
      makeExpressionReceiver({ expression: this.expression(raw) }),
      null
    );
  }

  private stringTemplate(raw: RawNode): Expression {
    const c = new Children(raw);
    const open = c.token();
    const entries: StringEntry[] = [];
    while (!c.atTokenKind(TokenKind.CloseQuote)) {
      const element = c.next();
      if (element instanceof RawToken) {
        entries.push(
          this.emit(
            element.token === TokenKind.EscapeSequence
              ? makeEscapeStringEntry({ text: element.substr })
              : makeLiteralStringEntry({ text: element.substr }),
            element
          )
        );
        continue;
      }
      const ec = new Children(element);
      const short = element.kind === RawKind.ShortTemplate;
      ec.token(short ? '$' : '${');
      const expression = this.expression(ec.next());
      if (!short) {
        ec.token('}');
      }
      ec.end();
      entries.push(
        this.emit(makeTemplateStringEntry({ expression, short }), element)
      );
    }
    c.token();
    c.end();
    return this.emit(
      makeStringLiteralExpression({ entries, raw: open.substr === '"""' }),
      raw
    );
  }

  private lambda(raw: RawNode): LambdaExpression {
    const c = this.children(raw, RawKind.Lambda);
    c.token('{');
    let params: LambdaParams | null = null;
    const paramsRaw = c.optionalNode(RawKind.LambdaParams);
    if (paramsRaw) {
      const pc = new Children(paramsRaw);
      const { elements, trailingComma } = this.commaSeparated(pc, null, () =>
        this.lambdaParam(pc.node(RawKind.LambdaParam))
      );
      params = this.emit(
        makeLambdaParams({ elements, trailingComma }),
        paramsRaw
      );
    }
    if (c.optionalToken('->') && params === null) {
      params = this.emit(
        makeLambdaParams({ elements: [], trailingComma: null }),
        null
      );
    }
    let lambdaBody = null;
    const bodyRaw = c.optionalNode(RawKind.LambdaBody);
    if (bodyRaw) {
      const bc = new Children(bodyRaw);
      const statements: Statement[] = [];
      while (!bc.done()) {
        statements.push(this.statement(bc.next()));
      }
      lambdaBody = this.emit(makeLambdaBody({ statements }), bodyRaw);
    }
    c.token('}');
    c.end();
    return this.emit(makeLambdaExpression({ params, lambdaBody }), raw);
  }

  private lambdaParam(raw: RawNode): LambdaParam {
    const c = this.children(raw, RawKind.LambdaParam);
    const lPar = this.optionalKeyword(c, '(');
    let variables: LambdaParamVariable[];
    let trailingComma = null;
    let rPar = null;
    let colon = null;
    let destructTypeRef = null;
    if (lPar) {
      const list = this.commaSeparated(c, ')', () =>
        this.lambdaParamVariable(c.node(RawKind.LambdaParamVariable))
      );
      variables = list.elements;
      trailingComma = list.trailingComma;
      rPar = this.keyword(c, ')');
      colon = this.optionalKeyword(c, ':');
      if (colon) {
        destructTypeRef = this.typeRef(c.node(RawKind.TypeRef));
      }
    } else {
      variables = [
        this.lambdaParamVariable(c.node(RawKind.LambdaParamVariable)),
      ];
    }
    c.end();
    return this.emit(
      makeLambdaParam({
        lPar,
        variables,
        trailingComma,
        rPar,
        colon,
        destructTypeRef,
      }),
      raw
    );
  }

  private lambdaParamVariable(raw: RawNode): LambdaParamVariable {
    const c = this.children(raw, RawKind.LambdaParamVariable);
    const modifiers = this.modifiers(c);
    const name = this.name(c);
    const typeRef = c.optionalToken(':')
      ? this.typeRef(c.node(RawKind.TypeRef))
      : null;
    c.end();
    return this.emit(
      makeLambdaParamVariable({ modifiers, name, typeRef }),
      raw
    );
  }

  private thisOrSuper(raw: RawNode): Expression {
    const c = new Children(raw);
    if (raw.kind === RawKind.This) {
      c.token('this');
      const label = this.label(c);
      c.end();
      return this.emit(makeThisExpression({ label }), raw);
    }
    c.token('super');
    let typeArgTypeRef = null;
    if (c.optionalToken('<')) {
      typeArgTypeRef = this.typeRef(c.node(RawKind.TypeRef));
      c.token('>');
    }
    const label = this.label(c);
    c.end();
    return this.emit(makeSuperExpression({ typeArgTypeRef, label }), raw);
  }

  private whenExpression(raw: RawNode): Expression {
    const c = new Children(raw);
    const whenKeyword = this.keyword(c, 'when');
    const lPar = this.optionalKeyword(c, '(');
    const expression = lPar ? this.expression(c.next()) : null;
    const rPar = lPar ? this.keyword(c, ')') : null;
    c.token('{');
    const whenBranches: WhenBranch[] = [];
    while (c.atNode(RawKind.WhenBranch)) {
      whenBranches.push(this.whenBranch(c.node(RawKind.WhenBranch)));
    }
    c.token('}');
    c.end();
    return this.emit(
      makeWhenExpression({ whenKeyword, lPar, expression, rPar, whenBranches }),
      raw
    );
  }

  private whenBranch(raw: RawNode): WhenBranch {
    const c = new Children(raw);
    const elseKeyword = this.optionalKeyword(c, 'else');
    let whenConditions: WhenCondition[] = [];
    let trailingComma = null;
    if (!elseKeyword) {
      const list = this.commaSeparated(c, '->', () =>
        this.whenCondition(c.node(RawKind.WhenCondition))
      );
      whenConditions = list.elements;
      trailingComma = list.trailingComma;
    }
    c.token('->');
    const body = this.expression(c.next());
    c.end();
    return this.emit(
      makeWhenBranch({ whenConditions, trailingComma, elseKeyword, body }),
      raw
    );
  }

  private whenCondition(raw: RawNode): WhenCondition {
    const c = new Children(raw);
    const operator = ['in', '!in', 'is', '!is'].some((text) => c.atToken(text))
      ? this.keywordOf(c, isWhenConditionOperatorText)
      : null;
    let expression = null;
    let typeRef = null;
    if (operator?.fields.text === 'is' || operator?.fields.text === '!is') {
      typeRef = this.typeRef(c.node(RawKind.TypeRef));
    } else {
      expression = this.expression(c.next());
    }
    c.end();
    return this.emit(
      makeWhenCondition({ operator, expression, typeRef }),
      raw
    );
  }

  private jump(raw: RawNode): Expression {
    const c = new Children(raw);
    c.token();
    if (raw.kind === RawKind.Throw) {
      const expression = this.expression(c.next());
      c.end();
      return this.emit(makeThrowExpression({ expression }), raw);
    }
    const label = this.label(c);
    if (raw.kind === RawKind.Return) {
      const expression = c.done() ? null : this.expression(c.next());
      c.end();
      return this.emit(makeReturnExpression({ label, expression }), raw);
    }
    c.end();
    return this.emit(
      raw.kind === RawKind.Continue
        ? makeContinueExpression({ label })
        : makeBreakExpression({ label }),
      raw
    );
  }

  private callExpression(raw: RawNode): Expression {
    const c = new Children(raw);
    const expression = this.expression(c.next());
    const typeArgs = this.optionalTypeArgs(c);
    const args = this.optionalValueArgs(c);
    let lambdaArg = null;
    const lambdaRaw = c.optionalNode(RawKind.LambdaArg);
    if (lambdaRaw) {
      const lc = new Children(lambdaRaw);
      const annotationSets = this.annotationSets(lc);
      let label = null;
      if (lc.atToken('@', 1)) {
        label = this.name(lc);
        lc.token('@');
      }
      const lambda = this.lambda(lc.node(RawKind.Lambda));
      lc.end();
      lambdaArg = this.emit(
        makeLambdaArg({ annotationSets, label, expression: lambda }),
        lambdaRaw
      );
    }
    c.end();
    return this.emit(
      makeCallExpression({ expression, typeArgs, args, lambdaArg }),
      raw
    );
  }
}

function describe(raw: RawElement): string {
  return raw instanceof RawNode
    ? `${raw.kind} at offset ${raw.offset}`
    : `'${raw.substr}' at offset ${raw.span.from}`;
}

function significant(raw: RawNode): RawElement[] {
  return raw.children.filter((child) => !isTrivia(child));
}

/**
 * `object : Base {}` and `object {}` in expression position.
 */
function isObjectLiteral(raw: RawNode): boolean {
  const [first, second] = significant(raw);
  return (
    first instanceof RawToken &&
    first.substr === 'object' &&
    !(second instanceof RawToken && second.token === TokenKind.Identifier)
  );
}

function isAnonymousFunction(raw: RawNode): boolean {
  const [first, second] = significant(raw);
  return (
    first instanceof RawToken &&
    first.substr === 'fun' &&
    second instanceof RawNode &&
    second.kind === RawKind.ValueParams
  );
}
