import { log } from '../utils/debug';
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
  makeContextReceiver,
  makeContextReceivers,
  makeContinueExpression,
  makeContract,
  makeContractEffect,
  makeContractEffects,
  makeDelegatedTypeParent,
  makeDelegationCall,
  makeDoWhileExpression,
  makeEnumEntry,
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
  makeKotlinFile,
  makeKotlinScript,
  makeLabeledExpression,
  makeLambdaArg,
  makeLambdaBody,
  makeLambdaExpression,
  makeLambdaParam,
  makeLambdaParamVariable,
  makeLambdaParams,
  makeModifiers,
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
} from './builders';
import { InvariantError, unrecognized } from './errors';
import type { MutableExtrasMap } from './extras-map';
import { NodePath } from './node-path';
import {
  Guard,
  is,
  isAccessor,
  isClassParent,
  isDeclaration,
  isDoubleColonReceiver,
  isExpression,
  isModifier,
  isPostModifier,
  isStatement,
  isStringEntry,
  isType,
  keywordGuard,
  keywordOf,
} from './node-util';
import type { ASTNode } from './nodes';
import {
  isAnnotationTargetText,
  isBinaryOperatorText,
  isBinaryTypeOperatorText,
  isPostfixOperatorText,
  isPrefixOperatorText,
} from './keywords';

const isAnnotation = is('Annotation');
const isAnnotationSet = is('AnnotationSet');
const isAnnotationTarget = keywordOf(isAnnotationTargetText);
const isAt = keywordGuard('@');
const isBinaryOperator = keywordOf(isBinaryOperatorText);
const isBinaryTypeOperator = keywordOf(isBinaryTypeOperatorText);
const isBlockExpression = is('BlockExpression');
const isByKeyword = keywordGuard('by');
const isCatchClause = is('CatchClause');
const isCatchKeyword = keywordGuard('catch');
const isClassBody = is('ClassBody');
const isClassDeclaration = is('ClassDeclaration');
const isClassDeclarationKeyword = keywordGuard('class', 'object', 'interface');
const isClassParents = is('ClassParents');
const isColon = keywordGuard(':');
const isComma = keywordGuard(',');
const isConstructorKeyword = keywordGuard('constructor');
const isContextReceiver = is('ContextReceiver');
const isContextReceivers = is('ContextReceivers');
const isContractEffect = is('ContractEffect');
const isContractEffects = is('ContractEffects');
const isContractKeyword = keywordGuard('contract');
const isDelegationCall = is('DelegationCall');
const isDelegationTarget = keywordGuard('this', 'super');
const isElseKeyword = keywordGuard('else');
const isEnumEntry = is('EnumEntry');
const isEquals = keywordGuard('=');
const isExpressionContainer = is('ExpressionContainer');
const isForKeyword = keywordGuard('for');
const isFunKeyword = keywordGuard('fun');
const isFunctionDeclaration = is('FunctionDeclaration');
const isFunctionParam = is('FunctionParam');
const isFunctionParams = is('FunctionParams');
const isFunctionTypeParam = is('FunctionTypeParam');
const isFunctionTypeParams = is('FunctionTypeParams');
const isFunctionTypeReceiver = is('FunctionTypeReceiver');
const isGetKeyword = keywordGuard('get');
const isIfKeyword = keywordGuard('if');
const isImportAlias = is('ImportAlias');
const isImportDirective = is('ImportDirective');
const isImportDirectives = is('ImportDirectives');
const isImportKeyword = keywordGuard('import');
const isLBracket = keywordGuard('[');
const isLPar = keywordGuard('(');
const isLambdaArg = is('LambdaArg');
const isLambdaBody = is('LambdaBody');
const isLambdaExpression = is('LambdaExpression');
const isLambdaParam = is('LambdaParam');
const isLambdaParamVariable = is('LambdaParamVariable');
const isLambdaParams = is('LambdaParams');
const isModifiers = is('Modifiers');
const isNameExpression = is('NameExpression');
const isPackageDirective = is('PackageDirective');
const isPackageKeyword = keywordGuard('package');
const isPostfixOperator = keywordOf(isPostfixOperatorText);
const isPrefixOperator = keywordOf(isPrefixOperatorText);
const isPrimaryConstructor = is('PrimaryConstructor');
const isPropertyDeclaration = is('PropertyDeclaration');
const isPropertyDelegate = is('PropertyDelegate');
const isRBracket = keywordGuard(']');
const isRPar = keywordGuard(')');
const isSetKeyword = keywordGuard('set');
const isSimpleType = is('SimpleType');
const isSimpleTypeQualifier = is('SimpleTypeQualifier');
const isTypeArg = is('TypeArg');
const isTypeArgs = is('TypeArgs');
const isTypeConstraint = is('TypeConstraint');
const isTypeConstraintSet = is('TypeConstraintSet');
const isTypeConstraints = is('TypeConstraints');
const isTypeParam = is('TypeParam');
const isTypeParams = is('TypeParams');
const isTypeRef = is('TypeRef');
const isValOrVar = keywordGuard('val', 'var');
const isValueArg = is('ValueArg');
const isValueArgs = is('ValueArgs');
const isVariable = is('Variable');
const isWhenBranch = is('WhenBranch');
const isWhenCondition = is('WhenCondition');
const isWhenConditionOperator = keywordGuard('is', '!is', 'in', '!in');
const isWhenKeyword = keywordGuard('when');
const isWhereKeyword = keywordGuard('where');
const isWhileKeyword = keywordGuard('while');

/**
 * Called with the path of each node; returns the node to put in its place.
 */
export type MutationHook = (path: NodePath) => ASTNode;

export type MutableVisitorOptions = {
  /**
   * Runs before the node's children are rebuilt.
   */
  preVisit?: MutationHook;
  /**
   * Runs on the node after its children are rebuilt.
   */
  postVisit?: MutationHook;
  /**
   * Extras of replaced nodes are moved to their replacements.
   */
  extrasMap?: MutableExtrasMap;
};

export type Rebuilt<T> = { readonly node: T; readonly changed: boolean };

const identity: MutationHook = (path) => path.node;

/**
 * Depth-first rebuild of a tree. Nodes whose subtree did not change are
 * reused as they are, so extras keyed on them stay valid.
 */
export class MutableVisitor {
  private preVisit: MutationHook;
  private postVisit: MutationHook;
  private extrasMap: MutableExtrasMap | undefined;

  constructor(options: MutableVisitorOptions = {}) {
    this.preVisit = options.preVisit ?? identity;
    this.postVisit = options.postVisit ?? identity;
    this.extrasMap = options.extrasMap;
  }

  static traverse(root: ASTNode, options: MutableVisitorOptions = {}): ASTNode {
    return new MutableVisitor(options).traverse(root);
  }

  traverse(root: ASTNode): ASTNode {
    return this.visit(NodePath.root(root)).node;
  }

  protected visit(path: NodePath): Rebuilt<ASTNode> {
    const original = path.node;
    const pre = this.preVisit(path);
    const prePath = pre === original ? path : replacePath(path, pre);
    const children = this.rebuildChildren(prePath);
    const postPath =
      children.node === pre ? prePath : replacePath(path, children.node);
    const post = this.postVisit(postPath);
    if (post === original) {
      return { node: original, changed: false };
    }
    if (this.extrasMap) {
      this.extrasMap.moveExtras(original, post);
    }
    return { node: post, changed: true };
  }

  private child<T extends ASTNode>(
    parent: NodePath,
    value: T,
    fits: Guard<T>
  ): Rebuilt<T> {
    const { node, changed } = this.visit(parent.childPathOf(value));
    if (!fits(node)) {
      throw new InvariantError(
        parent.node,
        `${describe(node)} cannot take the place of ${describe(value)}`
      );
    }
    return { node, changed };
  }

  private optional<T extends ASTNode>(
    parent: NodePath,
    value: T | null,
    fits: Guard<T>
  ): Rebuilt<T | null> {
    if (value === null) {
      return { node: null, changed: false };
    }
    return this.child(parent, value, fits);
  }

  private list<T extends ASTNode>(
    parent: NodePath,
    values: readonly T[],
    fits: Guard<T>
  ): Rebuilt<readonly T[]> {
    const rebuilt = values.map((value) => this.child(parent, value, fits));
    if (!rebuilt.some((r) => r.changed)) {
      return { node: values, changed: false };
    }
    return { node: rebuilt.map((r) => r.node), changed: true };
  }

  private rebuild<T extends ASTNode>(
    original: T,
    parts: readonly Rebuilt<unknown>[],
    make: () => T
  ): Rebuilt<T> {
    if (!parts.some((part) => part.changed)) {
      return { node: original, changed: false };
    }
    log('rebuilding', original.name);
    return { node: make(), changed: true };
  }

  private rebuildChildren(path: NodePath): Rebuilt<ASTNode> {
    const node = path.node;
    switch (node.name) {
      case 'DynamicType':
      case 'LiteralStringEntry':
      case 'EscapeStringEntry':
      case 'ConstantLiteralExpression':
      case 'NameExpression':
      case 'Keyword':
      case 'Whitespace':
      case 'Comment':
      case 'Semicolon':
      case 'TrailingComma':
        return { node, changed: false };
      case 'KotlinFile': {
        const f = node.fields;
        const annotationSets = this.list(
          path,
          f.annotationSets,
          isAnnotationSet
        );
        const packageDirective = this.optional(
          path,
          f.packageDirective,
          isPackageDirective
        );
        const importDirectives = this.optional(
          path,
          f.importDirectives,
          isImportDirectives
        );
        const declarations = this.list(path, f.declarations, isDeclaration);
        return this.rebuild(
          node,
          [annotationSets, packageDirective, importDirectives, declarations],
          () =>
            makeKotlinFile({
              ...f,
              annotationSets: annotationSets.node,
              packageDirective: packageDirective.node,
              importDirectives: importDirectives.node,
              declarations: declarations.node,
            })
        );
      }
      case 'KotlinScript': {
        const f = node.fields;
        const annotationSets = this.list(
          path,
          f.annotationSets,
          isAnnotationSet
        );
        const packageDirective = this.optional(
          path,
          f.packageDirective,
          isPackageDirective
        );
        const importDirectives = this.optional(
          path,
          f.importDirectives,
          isImportDirectives
        );
        const statements = this.list(path, f.statements, isStatement);
        return this.rebuild(
          node,
          [annotationSets, packageDirective, importDirectives, statements],
          () =>
            makeKotlinScript({
              ...f,
              annotationSets: annotationSets.node,
              packageDirective: packageDirective.node,
              importDirectives: importDirectives.node,
              statements: statements.node,
            })
        );
      }
      case 'PackageDirective': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const packageKeyword = this.child(
          path,
          f.packageKeyword,
          isPackageKeyword
        );
        const names = this.list(path, f.names, isNameExpression);
        return this.rebuild(node, [modifiers, packageKeyword, names], () =>
          makePackageDirective({
            ...f,
            modifiers: modifiers.node,
            packageKeyword: packageKeyword.node,
            names: names.node,
          })
        );
      }
      case 'ImportDirectives': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isImportDirective);
        return this.rebuild(node, [elements], () =>
          makeImportDirectives({ ...f, elements: elements.node })
        );
      }
      case 'ImportDirective': {
        const f = node.fields;
        const importKeyword = this.child(
          path,
          f.importKeyword,
          isImportKeyword
        );
        const names = this.list(path, f.names, isNameExpression);
        const importAlias = this.optional(path, f.importAlias, isImportAlias);
        return this.rebuild(node, [importKeyword, names, importAlias], () =>
          makeImportDirective({
            ...f,
            importKeyword: importKeyword.node,
            names: names.node,
            importAlias: importAlias.node,
          })
        );
      }
      case 'ImportAlias': {
        const f = node.fields;
        const name = this.child(path, f.name, isNameExpression);
        return this.rebuild(node, [name], () =>
          makeImportAlias({ ...f, name: name.node })
        );
      }
      case 'ClassDeclaration': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const classDeclarationKeyword = this.child(
          path,
          f.classDeclarationKeyword,
          isClassDeclarationKeyword
        );
        const name = this.optional(path, f.name, isNameExpression);
        const typeParams = this.optional(path, f.typeParams, isTypeParams);
        const primaryConstructor = this.optional(
          path,
          f.primaryConstructor,
          isPrimaryConstructor
        );
        const classParents = this.optional(
          path,
          f.classParents,
          isClassParents
        );
        const typeConstraintSet = this.optional(
          path,
          f.typeConstraintSet,
          isTypeConstraintSet
        );
        const classBody = this.optional(path, f.classBody, isClassBody);
        return this.rebuild(
          node,
          [
            modifiers,
            classDeclarationKeyword,
            name,
            typeParams,
            primaryConstructor,
            classParents,
            typeConstraintSet,
            classBody,
          ],
          () =>
            makeClassDeclaration({
              ...f,
              modifiers: modifiers.node,
              classDeclarationKeyword: classDeclarationKeyword.node,
              name: name.node,
              typeParams: typeParams.node,
              primaryConstructor: primaryConstructor.node,
              classParents: classParents.node,
              typeConstraintSet: typeConstraintSet.node,
              classBody: classBody.node,
            })
        );
      }
      case 'ClassParents': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isClassParent);
        return this.rebuild(node, [elements], () =>
          makeClassParents({ ...f, elements: elements.node })
        );
      }
      case 'CallConstructorParent': {
        const f = node.fields;
        const type = this.child(path, f.type, isSimpleType);
        const args = this.child(path, f.args, isValueArgs);
        return this.rebuild(node, [type, args], () =>
          makeCallConstructorParent({ ...f, type: type.node, args: args.node })
        );
      }
      case 'DelegatedTypeParent': {
        const f = node.fields;
        const type = this.child(path, f.type, isSimpleType);
        const byKeyword = this.child(path, f.byKeyword, isByKeyword);
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [type, byKeyword, expression], () =>
          makeDelegatedTypeParent({
            ...f,
            type: type.node,
            byKeyword: byKeyword.node,
            expression: expression.node,
          })
        );
      }
      case 'TypeParent': {
        const f = node.fields;
        const type = this.child(path, f.type, isSimpleType);
        return this.rebuild(node, [type], () =>
          makeTypeParent({ ...f, type: type.node })
        );
      }
      case 'PrimaryConstructor': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const constructorKeyword = this.optional(
          path,
          f.constructorKeyword,
          isConstructorKeyword
        );
        const params = this.child(path, f.params, isFunctionParams);
        return this.rebuild(node, [modifiers, constructorKeyword, params], () =>
          makePrimaryConstructor({
            ...f,
            modifiers: modifiers.node,
            constructorKeyword: constructorKeyword.node,
            params: params.node,
          })
        );
      }
      case 'ClassBody': {
        const f = node.fields;
        const enumEntries = this.list(path, f.enumEntries, isEnumEntry);
        const declarations = this.list(path, f.declarations, isDeclaration);
        return this.rebuild(node, [enumEntries, declarations], () =>
          makeClassBody({
            ...f,
            enumEntries: enumEntries.node,
            declarations: declarations.node,
          })
        );
      }
      case 'EnumEntry': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const name = this.child(path, f.name, isNameExpression);
        const args = this.optional(path, f.args, isValueArgs);
        const classBody = this.optional(path, f.classBody, isClassBody);
        return this.rebuild(node, [modifiers, name, args, classBody], () =>
          makeEnumEntry({
            ...f,
            modifiers: modifiers.node,
            name: name.node,
            args: args.node,
            classBody: classBody.node,
          })
        );
      }
      case 'InitDeclaration': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const block = this.child(path, f.block, isBlockExpression);
        return this.rebuild(node, [modifiers, block], () =>
          makeInitDeclaration({
            ...f,
            modifiers: modifiers.node,
            block: block.node,
          })
        );
      }
      case 'FunctionDeclaration': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const funKeyword = this.child(path, f.funKeyword, isFunKeyword);
        const typeParams = this.optional(path, f.typeParams, isTypeParams);
        const receiverTypeRef = this.optional(
          path,
          f.receiverTypeRef,
          isTypeRef
        );
        const name = this.optional(path, f.name, isNameExpression);
        const params = this.optional(path, f.params, isFunctionParams);
        const typeRef = this.optional(path, f.typeRef, isTypeRef);
        const postModifiers = this.list(path, f.postModifiers, isPostModifier);
        const equals = this.optional(path, f.equals, isEquals);
        const body = this.optional(path, f.body, isExpression);
        return this.rebuild(
          node,
          [
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
          ],
          () =>
            makeFunctionDeclaration({
              ...f,
              modifiers: modifiers.node,
              funKeyword: funKeyword.node,
              typeParams: typeParams.node,
              receiverTypeRef: receiverTypeRef.node,
              name: name.node,
              params: params.node,
              typeRef: typeRef.node,
              postModifiers: postModifiers.node,
              equals: equals.node,
              body: body.node,
            })
        );
      }
      case 'FunctionParams': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isFunctionParam);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        return this.rebuild(node, [elements, trailingComma], () =>
          makeFunctionParams({
            ...f,
            elements: elements.node,
            trailingComma: trailingComma.node,
          })
        );
      }
      case 'FunctionParam': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const valOrVarKeyword = this.optional(
          path,
          f.valOrVarKeyword,
          isValOrVar
        );
        const name = this.child(path, f.name, isNameExpression);
        const typeRef = this.optional(path, f.typeRef, isTypeRef);
        const equals = this.optional(path, f.equals, isEquals);
        const defaultValue = this.optional(path, f.defaultValue, isExpression);
        return this.rebuild(
          node,
          [modifiers, valOrVarKeyword, name, typeRef, equals, defaultValue],
          () =>
            makeFunctionParam({
              ...f,
              modifiers: modifiers.node,
              valOrVarKeyword: valOrVarKeyword.node,
              name: name.node,
              typeRef: typeRef.node,
              equals: equals.node,
              defaultValue: defaultValue.node,
            })
        );
      }
      case 'PropertyDeclaration': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const valOrVarKeyword = this.child(path, f.valOrVarKeyword, isValOrVar);
        const typeParams = this.optional(path, f.typeParams, isTypeParams);
        const receiverTypeRef = this.optional(
          path,
          f.receiverTypeRef,
          isTypeRef
        );
        const lPar = this.optional(path, f.lPar, isLPar);
        const variables = this.list(path, f.variables, isVariable);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        const rPar = this.optional(path, f.rPar, isRPar);
        const typeConstraintSet = this.optional(
          path,
          f.typeConstraintSet,
          isTypeConstraintSet
        );
        const equals = this.optional(path, f.equals, isEquals);
        const initializer = this.optional(path, f.initializer, isExpression);
        const propertyDelegate = this.optional(
          path,
          f.propertyDelegate,
          isPropertyDelegate
        );
        const accessors = this.list(path, f.accessors, isAccessor);
        return this.rebuild(
          node,
          [
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
          ],
          () =>
            makePropertyDeclaration({
              ...f,
              modifiers: modifiers.node,
              valOrVarKeyword: valOrVarKeyword.node,
              typeParams: typeParams.node,
              receiverTypeRef: receiverTypeRef.node,
              lPar: lPar.node,
              variables: variables.node,
              trailingComma: trailingComma.node,
              rPar: rPar.node,
              typeConstraintSet: typeConstraintSet.node,
              equals: equals.node,
              initializer: initializer.node,
              propertyDelegate: propertyDelegate.node,
              accessors: accessors.node,
            })
        );
      }
      case 'PropertyDelegate': {
        const f = node.fields;
        const byKeyword = this.child(path, f.byKeyword, isByKeyword);
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [byKeyword, expression], () =>
          makePropertyDelegate({
            ...f,
            byKeyword: byKeyword.node,
            expression: expression.node,
          })
        );
      }
      case 'Getter': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const getKeyword = this.child(path, f.getKeyword, isGetKeyword);
        const lPar = this.optional(path, f.lPar, isLPar);
        const rPar = this.optional(path, f.rPar, isRPar);
        const typeRef = this.optional(path, f.typeRef, isTypeRef);
        const equals = this.optional(path, f.equals, isEquals);
        const body = this.optional(path, f.body, isExpression);
        return this.rebuild(
          node,
          [modifiers, getKeyword, lPar, rPar, typeRef, equals, body],
          () =>
            makeGetter({
              ...f,
              modifiers: modifiers.node,
              getKeyword: getKeyword.node,
              lPar: lPar.node,
              rPar: rPar.node,
              typeRef: typeRef.node,
              equals: equals.node,
              body: body.node,
            })
        );
      }
      case 'Setter': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const setKeyword = this.child(path, f.setKeyword, isSetKeyword);
        const params = this.optional(path, f.params, isFunctionParams);
        const equals = this.optional(path, f.equals, isEquals);
        const body = this.optional(path, f.body, isExpression);
        return this.rebuild(
          node,
          [modifiers, setKeyword, params, equals, body],
          () =>
            makeSetter({
              ...f,
              modifiers: modifiers.node,
              setKeyword: setKeyword.node,
              params: params.node,
              equals: equals.node,
              body: body.node,
            })
        );
      }
      case 'Variable': {
        const f = node.fields;
        const name = this.child(path, f.name, isNameExpression);
        const typeRef = this.optional(path, f.typeRef, isTypeRef);
        return this.rebuild(node, [name, typeRef], () =>
          makeVariable({ ...f, name: name.node, typeRef: typeRef.node })
        );
      }
      case 'TypeAliasDeclaration': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const name = this.child(path, f.name, isNameExpression);
        const typeParams = this.optional(path, f.typeParams, isTypeParams);
        const typeRef = this.child(path, f.typeRef, isTypeRef);
        return this.rebuild(node, [modifiers, name, typeParams, typeRef], () =>
          makeTypeAliasDeclaration({
            ...f,
            modifiers: modifiers.node,
            name: name.node,
            typeParams: typeParams.node,
            typeRef: typeRef.node,
          })
        );
      }
      case 'SecondaryConstructorDeclaration': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const constructorKeyword = this.child(
          path,
          f.constructorKeyword,
          isConstructorKeyword
        );
        const params = this.child(path, f.params, isFunctionParams);
        const delegationCall = this.optional(
          path,
          f.delegationCall,
          isDelegationCall
        );
        const block = this.optional(path, f.block, isBlockExpression);
        return this.rebuild(
          node,
          [modifiers, constructorKeyword, params, delegationCall, block],
          () =>
            makeSecondaryConstructorDeclaration({
              ...f,
              modifiers: modifiers.node,
              constructorKeyword: constructorKeyword.node,
              params: params.node,
              delegationCall: delegationCall.node,
              block: block.node,
            })
        );
      }
      case 'DelegationCall': {
        const f = node.fields;
        const target = this.child(path, f.target, isDelegationTarget);
        const args = this.child(path, f.args, isValueArgs);
        return this.rebuild(node, [target, args], () =>
          makeDelegationCall({ ...f, target: target.node, args: args.node })
        );
      }
      case 'TypeParams': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isTypeParam);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        return this.rebuild(node, [elements, trailingComma], () =>
          makeTypeParams({
            ...f,
            elements: elements.node,
            trailingComma: trailingComma.node,
          })
        );
      }
      case 'TypeParam': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const name = this.child(path, f.name, isNameExpression);
        const typeRef = this.optional(path, f.typeRef, isTypeRef);
        return this.rebuild(node, [modifiers, name, typeRef], () =>
          makeTypeParam({
            ...f,
            modifiers: modifiers.node,
            name: name.node,
            typeRef: typeRef.node,
          })
        );
      }
      case 'FunctionType': {
        const f = node.fields;
        const contextReceivers = this.optional(
          path,
          f.contextReceivers,
          isContextReceivers
        );
        const functionTypeReceiver = this.optional(
          path,
          f.functionTypeReceiver,
          isFunctionTypeReceiver
        );
        const params = this.child(path, f.params, isFunctionTypeParams);
        const returnTypeRef = this.child(path, f.returnTypeRef, isTypeRef);
        return this.rebuild(
          node,
          [contextReceivers, functionTypeReceiver, params, returnTypeRef],
          () =>
            makeFunctionType({
              ...f,
              contextReceivers: contextReceivers.node,
              functionTypeReceiver: functionTypeReceiver.node,
              params: params.node,
              returnTypeRef: returnTypeRef.node,
            })
        );
      }
      case 'ContextReceivers': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isContextReceiver);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        return this.rebuild(node, [elements, trailingComma], () =>
          makeContextReceivers({
            ...f,
            elements: elements.node,
            trailingComma: trailingComma.node,
          })
        );
      }
      case 'ContextReceiver': {
        const f = node.fields;
        const typeRef = this.child(path, f.typeRef, isTypeRef);
        return this.rebuild(node, [typeRef], () =>
          makeContextReceiver({ ...f, typeRef: typeRef.node })
        );
      }
      case 'FunctionTypeReceiver': {
        const f = node.fields;
        const typeRef = this.child(path, f.typeRef, isTypeRef);
        return this.rebuild(node, [typeRef], () =>
          makeFunctionTypeReceiver({ ...f, typeRef: typeRef.node })
        );
      }
      case 'FunctionTypeParams': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isFunctionTypeParam);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        return this.rebuild(node, [elements, trailingComma], () =>
          makeFunctionTypeParams({
            ...f,
            elements: elements.node,
            trailingComma: trailingComma.node,
          })
        );
      }
      case 'FunctionTypeParam': {
        const f = node.fields;
        const name = this.optional(path, f.name, isNameExpression);
        const typeRef = this.child(path, f.typeRef, isTypeRef);
        return this.rebuild(node, [name, typeRef], () =>
          makeFunctionTypeParam({
            ...f,
            name: name.node,
            typeRef: typeRef.node,
          })
        );
      }
      case 'SimpleType': {
        const f = node.fields;
        const qualifiers = this.list(path, f.qualifiers, isSimpleTypeQualifier);
        const name = this.child(path, f.name, isNameExpression);
        const typeArgs = this.optional(path, f.typeArgs, isTypeArgs);
        return this.rebuild(node, [qualifiers, name, typeArgs], () =>
          makeSimpleType({
            ...f,
            qualifiers: qualifiers.node,
            name: name.node,
            typeArgs: typeArgs.node,
          })
        );
      }
      case 'SimpleTypeQualifier': {
        const f = node.fields;
        const name = this.child(path, f.name, isNameExpression);
        const typeArgs = this.optional(path, f.typeArgs, isTypeArgs);
        return this.rebuild(node, [name, typeArgs], () =>
          makeSimpleTypeQualifier({
            ...f,
            name: name.node,
            typeArgs: typeArgs.node,
          })
        );
      }
      case 'NullableType': {
        const f = node.fields;
        const lPar = this.optional(path, f.lPar, isLPar);
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const type = this.child(path, f.type, isType);
        const rPar = this.optional(path, f.rPar, isRPar);
        return this.rebuild(node, [lPar, modifiers, type, rPar], () =>
          makeNullableType({
            ...f,
            lPar: lPar.node,
            modifiers: modifiers.node,
            type: type.node,
            rPar: rPar.node,
          })
        );
      }
      case 'TypeArgs': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isTypeArg);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        return this.rebuild(node, [elements, trailingComma], () =>
          makeTypeArgs({
            ...f,
            elements: elements.node,
            trailingComma: trailingComma.node,
          })
        );
      }
      case 'TypeArg': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const typeRef = this.optional(path, f.typeRef, isTypeRef);
        return this.rebuild(node, [modifiers, typeRef], () =>
          makeTypeArg({
            ...f,
            modifiers: modifiers.node,
            typeRef: typeRef.node,
          })
        );
      }
      case 'TypeRef': {
        const f = node.fields;
        const lPar = this.optional(path, f.lPar, isLPar);
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const type = this.child(path, f.type, isType);
        const rPar = this.optional(path, f.rPar, isRPar);
        return this.rebuild(node, [lPar, modifiers, type, rPar], () =>
          makeTypeRef({
            ...f,
            lPar: lPar.node,
            modifiers: modifiers.node,
            type: type.node,
            rPar: rPar.node,
          })
        );
      }
      case 'ValueArgs': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isValueArg);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        return this.rebuild(node, [elements, trailingComma], () =>
          makeValueArgs({
            ...f,
            elements: elements.node,
            trailingComma: trailingComma.node,
          })
        );
      }
      case 'ValueArg': {
        const f = node.fields;
        const name = this.optional(path, f.name, isNameExpression);
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [name, expression], () =>
          makeValueArg({ ...f, name: name.node, expression: expression.node })
        );
      }
      case 'ExpressionContainer': {
        const f = node.fields;
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [expression], () =>
          makeExpressionContainer({ ...f, expression: expression.node })
        );
      }
      case 'IfExpression': {
        const f = node.fields;
        const ifKeyword = this.child(path, f.ifKeyword, isIfKeyword);
        const condition = this.child(path, f.condition, isExpression);
        const body = this.child(path, f.body, isExpressionContainer);
        const elseBody = this.optional(path, f.elseBody, isExpressionContainer);
        return this.rebuild(node, [ifKeyword, condition, body, elseBody], () =>
          makeIfExpression({
            ...f,
            ifKeyword: ifKeyword.node,
            condition: condition.node,
            body: body.node,
            elseBody: elseBody.node,
          })
        );
      }
      case 'TryExpression': {
        const f = node.fields;
        const block = this.child(path, f.block, isBlockExpression);
        const catchClauses = this.list(path, f.catchClauses, isCatchClause);
        const finallyBlock = this.optional(
          path,
          f.finallyBlock,
          isBlockExpression
        );
        return this.rebuild(node, [block, catchClauses, finallyBlock], () =>
          makeTryExpression({
            ...f,
            block: block.node,
            catchClauses: catchClauses.node,
            finallyBlock: finallyBlock.node,
          })
        );
      }
      case 'CatchClause': {
        const f = node.fields;
        const catchKeyword = this.child(path, f.catchKeyword, isCatchKeyword);
        const params = this.child(path, f.params, isFunctionParams);
        const block = this.child(path, f.block, isBlockExpression);
        return this.rebuild(node, [catchKeyword, params, block], () =>
          makeCatchClause({
            ...f,
            catchKeyword: catchKeyword.node,
            params: params.node,
            block: block.node,
          })
        );
      }
      case 'ForExpression': {
        const f = node.fields;
        const forKeyword = this.child(path, f.forKeyword, isForKeyword);
        const loopParam = this.child(path, f.loopParam, isLambdaParam);
        const loopRange = this.child(path, f.loopRange, isExpressionContainer);
        const body = this.child(path, f.body, isExpressionContainer);
        return this.rebuild(
          node,
          [forKeyword, loopParam, loopRange, body],
          () =>
            makeForExpression({
              ...f,
              forKeyword: forKeyword.node,
              loopParam: loopParam.node,
              loopRange: loopRange.node,
              body: body.node,
            })
        );
      }
      case 'WhileExpression': {
        const f = node.fields;
        const whileKeyword = this.child(path, f.whileKeyword, isWhileKeyword);
        const condition = this.child(path, f.condition, isExpressionContainer);
        const body = this.child(path, f.body, isExpressionContainer);
        return this.rebuild(node, [whileKeyword, condition, body], () =>
          makeWhileExpression({
            ...f,
            whileKeyword: whileKeyword.node,
            condition: condition.node,
            body: body.node,
          })
        );
      }
      case 'DoWhileExpression': {
        const f = node.fields;
        const body = this.child(path, f.body, isExpressionContainer);
        const whileKeyword = this.child(path, f.whileKeyword, isWhileKeyword);
        const condition = this.child(path, f.condition, isExpressionContainer);
        return this.rebuild(node, [body, whileKeyword, condition], () =>
          makeDoWhileExpression({
            ...f,
            body: body.node,
            whileKeyword: whileKeyword.node,
            condition: condition.node,
          })
        );
      }
      case 'BinaryExpression': {
        const f = node.fields;
        const lhs = this.child(path, f.lhs, isExpression);
        const operator = this.child(path, f.operator, isBinaryOperator);
        const rhs = this.child(path, f.rhs, isExpression);
        return this.rebuild(node, [lhs, operator, rhs], () =>
          makeBinaryExpression({
            ...f,
            lhs: lhs.node,
            operator: operator.node,
            rhs: rhs.node,
          })
        );
      }
      case 'BinaryInfixExpression': {
        const f = node.fields;
        const lhs = this.child(path, f.lhs, isExpression);
        const operator = this.child(path, f.operator, isNameExpression);
        const rhs = this.child(path, f.rhs, isExpression);
        return this.rebuild(node, [lhs, operator, rhs], () =>
          makeBinaryInfixExpression({
            ...f,
            lhs: lhs.node,
            operator: operator.node,
            rhs: rhs.node,
          })
        );
      }
      case 'PrefixUnaryExpression': {
        const f = node.fields;
        const operator = this.child(path, f.operator, isPrefixOperator);
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [operator, expression], () =>
          makePrefixUnaryExpression({
            ...f,
            operator: operator.node,
            expression: expression.node,
          })
        );
      }
      case 'PostfixUnaryExpression': {
        const f = node.fields;
        const expression = this.child(path, f.expression, isExpression);
        const operator = this.child(path, f.operator, isPostfixOperator);
        return this.rebuild(node, [expression, operator], () =>
          makePostfixUnaryExpression({
            ...f,
            expression: expression.node,
            operator: operator.node,
          })
        );
      }
      case 'BinaryTypeExpression': {
        const f = node.fields;
        const lhs = this.child(path, f.lhs, isExpression);
        const operator = this.child(path, f.operator, isBinaryTypeOperator);
        const rhs = this.child(path, f.rhs, isTypeRef);
        return this.rebuild(node, [lhs, operator, rhs], () =>
          makeBinaryTypeExpression({
            ...f,
            lhs: lhs.node,
            operator: operator.node,
            rhs: rhs.node,
          })
        );
      }
      case 'CallableReferenceExpression': {
        const f = node.fields;
        const lhs = this.optional(path, f.lhs, isDoubleColonReceiver);
        const rhs = this.child(path, f.rhs, isNameExpression);
        return this.rebuild(node, [lhs, rhs], () =>
          makeCallableReferenceExpression({
            ...f,
            lhs: lhs.node,
            rhs: rhs.node,
          })
        );
      }
      case 'ClassLiteralExpression': {
        const f = node.fields;
        const lhs = this.optional(path, f.lhs, isDoubleColonReceiver);
        return this.rebuild(node, [lhs], () =>
          makeClassLiteralExpression({ ...f, lhs: lhs.node })
        );
      }
      case 'ExpressionReceiver': {
        const f = node.fields;
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [expression], () =>
          makeExpressionReceiver({ ...f, expression: expression.node })
        );
      }
      case 'TypeReceiver': {
        const f = node.fields;
        const type = this.child(path, f.type, isSimpleType);
        return this.rebuild(node, [type], () =>
          makeTypeReceiver({ ...f, type: type.node })
        );
      }
      case 'ParenthesizedExpression': {
        const f = node.fields;
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [expression], () =>
          makeParenthesizedExpression({ ...f, expression: expression.node })
        );
      }
      case 'StringLiteralExpression': {
        const f = node.fields;
        const entries = this.list(path, f.entries, isStringEntry);
        return this.rebuild(node, [entries], () =>
          makeStringLiteralExpression({ ...f, entries: entries.node })
        );
      }
      case 'TemplateStringEntry': {
        const f = node.fields;
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [expression], () =>
          makeTemplateStringEntry({ ...f, expression: expression.node })
        );
      }
      case 'LambdaExpression': {
        const f = node.fields;
        const params = this.optional(path, f.params, isLambdaParams);
        const lambdaBody = this.optional(path, f.lambdaBody, isLambdaBody);
        return this.rebuild(node, [params, lambdaBody], () =>
          makeLambdaExpression({
            ...f,
            params: params.node,
            lambdaBody: lambdaBody.node,
          })
        );
      }
      case 'LambdaParams': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isLambdaParam);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        return this.rebuild(node, [elements, trailingComma], () =>
          makeLambdaParams({
            ...f,
            elements: elements.node,
            trailingComma: trailingComma.node,
          })
        );
      }
      case 'LambdaParam': {
        const f = node.fields;
        const lPar = this.optional(path, f.lPar, isLPar);
        const variables = this.list(path, f.variables, isLambdaParamVariable);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        const rPar = this.optional(path, f.rPar, isRPar);
        const colon = this.optional(path, f.colon, isColon);
        const destructTypeRef = this.optional(
          path,
          f.destructTypeRef,
          isTypeRef
        );
        return this.rebuild(
          node,
          [lPar, variables, trailingComma, rPar, colon, destructTypeRef],
          () =>
            makeLambdaParam({
              ...f,
              lPar: lPar.node,
              variables: variables.node,
              trailingComma: trailingComma.node,
              rPar: rPar.node,
              colon: colon.node,
              destructTypeRef: destructTypeRef.node,
            })
        );
      }
      case 'LambdaParamVariable': {
        const f = node.fields;
        const modifiers = this.optional(path, f.modifiers, isModifiers);
        const name = this.child(path, f.name, isNameExpression);
        const typeRef = this.optional(path, f.typeRef, isTypeRef);
        return this.rebuild(node, [modifiers, name, typeRef], () =>
          makeLambdaParamVariable({
            ...f,
            modifiers: modifiers.node,
            name: name.node,
            typeRef: typeRef.node,
          })
        );
      }
      case 'LambdaBody': {
        const f = node.fields;
        const statements = this.list(path, f.statements, isStatement);
        return this.rebuild(node, [statements], () =>
          makeLambdaBody({ ...f, statements: statements.node })
        );
      }
      case 'ThisExpression': {
        const f = node.fields;
        const label = this.optional(path, f.label, isNameExpression);
        return this.rebuild(node, [label], () =>
          makeThisExpression({ ...f, label: label.node })
        );
      }
      case 'SuperExpression': {
        const f = node.fields;
        const typeArgTypeRef = this.optional(path, f.typeArgTypeRef, isTypeRef);
        const label = this.optional(path, f.label, isNameExpression);
        return this.rebuild(node, [typeArgTypeRef, label], () =>
          makeSuperExpression({
            ...f,
            typeArgTypeRef: typeArgTypeRef.node,
            label: label.node,
          })
        );
      }
      case 'WhenExpression': {
        const f = node.fields;
        const whenKeyword = this.child(path, f.whenKeyword, isWhenKeyword);
        const lPar = this.optional(path, f.lPar, isLPar);
        const expression = this.optional(path, f.expression, isExpression);
        const rPar = this.optional(path, f.rPar, isRPar);
        const whenBranches = this.list(path, f.whenBranches, isWhenBranch);
        return this.rebuild(
          node,
          [whenKeyword, lPar, expression, rPar, whenBranches],
          () =>
            makeWhenExpression({
              ...f,
              whenKeyword: whenKeyword.node,
              lPar: lPar.node,
              expression: expression.node,
              rPar: rPar.node,
              whenBranches: whenBranches.node,
            })
        );
      }
      case 'WhenBranch': {
        const f = node.fields;
        const whenConditions = this.list(
          path,
          f.whenConditions,
          isWhenCondition
        );
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        const elseKeyword = this.optional(path, f.elseKeyword, isElseKeyword);
        const body = this.child(path, f.body, isExpression);
        return this.rebuild(
          node,
          [whenConditions, trailingComma, elseKeyword, body],
          () =>
            makeWhenBranch({
              ...f,
              whenConditions: whenConditions.node,
              trailingComma: trailingComma.node,
              elseKeyword: elseKeyword.node,
              body: body.node,
            })
        );
      }
      case 'WhenCondition': {
        const f = node.fields;
        const operator = this.optional(
          path,
          f.operator,
          isWhenConditionOperator
        );
        const expression = this.optional(path, f.expression, isExpression);
        const typeRef = this.optional(path, f.typeRef, isTypeRef);
        return this.rebuild(node, [operator, expression, typeRef], () =>
          makeWhenCondition({
            ...f,
            operator: operator.node,
            expression: expression.node,
            typeRef: typeRef.node,
          })
        );
      }
      case 'ObjectLiteralExpression': {
        const f = node.fields;
        const declaration = this.child(path, f.declaration, isClassDeclaration);
        return this.rebuild(node, [declaration], () =>
          makeObjectLiteralExpression({ ...f, declaration: declaration.node })
        );
      }
      case 'ThrowExpression': {
        const f = node.fields;
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [expression], () =>
          makeThrowExpression({ ...f, expression: expression.node })
        );
      }
      case 'ReturnExpression': {
        const f = node.fields;
        const label = this.optional(path, f.label, isNameExpression);
        const expression = this.optional(path, f.expression, isExpression);
        return this.rebuild(node, [label, expression], () =>
          makeReturnExpression({
            ...f,
            label: label.node,
            expression: expression.node,
          })
        );
      }
      case 'ContinueExpression': {
        const f = node.fields;
        const label = this.optional(path, f.label, isNameExpression);
        return this.rebuild(node, [label], () =>
          makeContinueExpression({ ...f, label: label.node })
        );
      }
      case 'BreakExpression': {
        const f = node.fields;
        const label = this.optional(path, f.label, isNameExpression);
        return this.rebuild(node, [label], () =>
          makeBreakExpression({ ...f, label: label.node })
        );
      }
      case 'CollectionLiteralExpression': {
        const f = node.fields;
        const expressions = this.list(path, f.expressions, isExpression);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        return this.rebuild(node, [expressions, trailingComma], () =>
          makeCollectionLiteralExpression({
            ...f,
            expressions: expressions.node,
            trailingComma: trailingComma.node,
          })
        );
      }
      case 'LabeledExpression': {
        const f = node.fields;
        const label = this.child(path, f.label, isNameExpression);
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [label, expression], () =>
          makeLabeledExpression({
            ...f,
            label: label.node,
            expression: expression.node,
          })
        );
      }
      case 'AnnotatedExpression': {
        const f = node.fields;
        const annotationSets = this.list(
          path,
          f.annotationSets,
          isAnnotationSet
        );
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [annotationSets, expression], () =>
          makeAnnotatedExpression({
            ...f,
            annotationSets: annotationSets.node,
            expression: expression.node,
          })
        );
      }
      case 'CallExpression': {
        const f = node.fields;
        const expression = this.child(path, f.expression, isExpression);
        const typeArgs = this.optional(path, f.typeArgs, isTypeArgs);
        const args = this.optional(path, f.args, isValueArgs);
        const lambdaArg = this.optional(path, f.lambdaArg, isLambdaArg);
        return this.rebuild(node, [expression, typeArgs, args, lambdaArg], () =>
          makeCallExpression({
            ...f,
            expression: expression.node,
            typeArgs: typeArgs.node,
            args: args.node,
            lambdaArg: lambdaArg.node,
          })
        );
      }
      case 'LambdaArg': {
        const f = node.fields;
        const annotationSets = this.list(
          path,
          f.annotationSets,
          isAnnotationSet
        );
        const label = this.optional(path, f.label, isNameExpression);
        const expression = this.child(path, f.expression, isLambdaExpression);
        return this.rebuild(node, [annotationSets, label, expression], () =>
          makeLambdaArg({
            ...f,
            annotationSets: annotationSets.node,
            label: label.node,
            expression: expression.node,
          })
        );
      }
      case 'ArrayAccessExpression': {
        const f = node.fields;
        const expression = this.child(path, f.expression, isExpression);
        const indices = this.list(path, f.indices, isExpression);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        return this.rebuild(node, [expression, indices, trailingComma], () =>
          makeArrayAccessExpression({
            ...f,
            expression: expression.node,
            indices: indices.node,
            trailingComma: trailingComma.node,
          })
        );
      }
      case 'AnonymousFunctionExpression': {
        const f = node.fields;
        const fn = this.child(path, f.function, isFunctionDeclaration);
        return this.rebuild(node, [fn], () =>
          makeAnonymousFunctionExpression({ ...f, function: fn.node })
        );
      }
      case 'PropertyExpression': {
        const f = node.fields;
        const declaration = this.child(
          path,
          f.declaration,
          isPropertyDeclaration
        );
        return this.rebuild(node, [declaration], () =>
          makePropertyExpression({ ...f, declaration: declaration.node })
        );
      }
      case 'BlockExpression': {
        const f = node.fields;
        const statements = this.list(path, f.statements, isStatement);
        return this.rebuild(node, [statements], () =>
          makeBlockExpression({ ...f, statements: statements.node })
        );
      }
      case 'Modifiers': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isModifier);
        return this.rebuild(node, [elements], () =>
          makeModifiers({ ...f, elements: elements.node })
        );
      }
      case 'AnnotationSet': {
        const f = node.fields;
        const atSymbol = this.child(path, f.atSymbol, isAt);
        const target = this.optional(path, f.target, isAnnotationTarget);
        const colon = this.optional(path, f.colon, isColon);
        const lBracket = this.optional(path, f.lBracket, isLBracket);
        const annotations = this.list(path, f.annotations, isAnnotation);
        const rBracket = this.optional(path, f.rBracket, isRBracket);
        return this.rebuild(
          node,
          [atSymbol, target, colon, lBracket, annotations, rBracket],
          () =>
            makeAnnotationSet({
              ...f,
              atSymbol: atSymbol.node,
              target: target.node,
              colon: colon.node,
              lBracket: lBracket.node,
              annotations: annotations.node,
              rBracket: rBracket.node,
            })
        );
      }
      case 'Annotation': {
        const f = node.fields;
        const type = this.child(path, f.type, isSimpleType);
        const args = this.optional(path, f.args, isValueArgs);
        return this.rebuild(node, [type, args], () =>
          makeAnnotation({ ...f, type: type.node, args: args.node })
        );
      }
      case 'TypeConstraintSet': {
        const f = node.fields;
        const whereKeyword = this.child(path, f.whereKeyword, isWhereKeyword);
        const constraints = this.child(path, f.constraints, isTypeConstraints);
        return this.rebuild(node, [whereKeyword, constraints], () =>
          makeTypeConstraintSet({
            ...f,
            whereKeyword: whereKeyword.node,
            constraints: constraints.node,
          })
        );
      }
      case 'TypeConstraints': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isTypeConstraint);
        return this.rebuild(node, [elements], () =>
          makeTypeConstraints({ ...f, elements: elements.node })
        );
      }
      case 'TypeConstraint': {
        const f = node.fields;
        const annotationSets = this.list(
          path,
          f.annotationSets,
          isAnnotationSet
        );
        const name = this.child(path, f.name, isNameExpression);
        const typeRef = this.child(path, f.typeRef, isTypeRef);
        return this.rebuild(node, [annotationSets, name, typeRef], () =>
          makeTypeConstraint({
            ...f,
            annotationSets: annotationSets.node,
            name: name.node,
            typeRef: typeRef.node,
          })
        );
      }
      case 'Contract': {
        const f = node.fields;
        const contractKeyword = this.child(
          path,
          f.contractKeyword,
          isContractKeyword
        );
        const contractEffects = this.child(
          path,
          f.contractEffects,
          isContractEffects
        );
        return this.rebuild(node, [contractKeyword, contractEffects], () =>
          makeContract({
            ...f,
            contractKeyword: contractKeyword.node,
            contractEffects: contractEffects.node,
          })
        );
      }
      case 'ContractEffects': {
        const f = node.fields;
        const elements = this.list(path, f.elements, isContractEffect);
        const trailingComma = this.optional(path, f.trailingComma, isComma);
        return this.rebuild(node, [elements, trailingComma], () =>
          makeContractEffects({
            ...f,
            elements: elements.node,
            trailingComma: trailingComma.node,
          })
        );
      }
      case 'ContractEffect': {
        const f = node.fields;
        const expression = this.child(path, f.expression, isExpression);
        return this.rebuild(node, [expression], () =>
          makeContractEffect({ ...f, expression: expression.node })
        );
      }
      default:
        return unrecognized(node, 'MutableVisitor');
    }
  }
}

function replacePath(path: NodePath, node: ASTNode): NodePath {
  return path.parent ? path.parent.childPathOf(node) : NodePath.root(node);
}

function describe(node: ASTNode): string {
  return node.name === 'Keyword' ? `'${node.fields.text}'` : node.name;
}
