import { colors } from '../utils/debug';
import { isTriviaKind, Lexeme, TokenKind } from './lexer';

export enum RawKind {
  File = 'FILE',
  Script = 'SCRIPT',
  PackageDirective = 'PACKAGE_DIRECTIVE',
  ImportList = 'IMPORT_LIST',
  ImportDirective = 'IMPORT_DIRECTIVE',
  ImportAlias = 'IMPORT_ALIAS',
  Class = 'CLASS',
  ClassParents = 'SUPER_TYPE_LIST',
  CallConstructorParent = 'SUPER_TYPE_CALL_ENTRY',
  DelegatedTypeParent = 'DELEGATED_SUPER_TYPE_ENTRY',
  TypeParent = 'SUPER_TYPE_ENTRY',
  PrimaryConstructor = 'PRIMARY_CONSTRUCTOR',
  ClassBody = 'CLASS_BODY',
  EnumEntry = 'ENUM_ENTRY',
  Init = 'CLASS_INITIALIZER',
  Fun = 'FUN',
  ValueParams = 'VALUE_PARAMETER_LIST',
  ValueParam = 'VALUE_PARAMETER',
  Property = 'PROPERTY',
  PropertyDelegate = 'PROPERTY_DELEGATE',
  Getter = 'PROPERTY_GETTER',
  Setter = 'PROPERTY_SETTER',
  Variable = 'DESTRUCTURING_DECLARATION_ENTRY',
  TypeAlias = 'TYPEALIAS',
  SecondaryConstructor = 'SECONDARY_CONSTRUCTOR',
  DelegationCall = 'CONSTRUCTOR_DELEGATION_CALL',
  TypeParams = 'TYPE_PARAMETER_LIST',
  TypeParam = 'TYPE_PARAMETER',
  TypeConstraintSet = 'TYPE_CONSTRAINT_SET',
  TypeConstraints = 'TYPE_CONSTRAINT_LIST',
  TypeConstraint = 'TYPE_CONSTRAINT',
  Contract = 'CONTRACT',
  ContractEffects = 'CONTRACT_EFFECT_LIST',
  ContractEffect = 'CONTRACT_EFFECT',
  TypeRef = 'TYPE_REFERENCE',
  UserType = 'USER_TYPE',
  TypeQualifier = 'USER_TYPE_QUALIFIER',
  NullableType = 'NULLABLE_TYPE',
  FunctionType = 'FUNCTION_TYPE',
  FunctionTypeReceiver = 'FUNCTION_TYPE_RECEIVER',
  FunctionTypeParams = 'FUNCTION_TYPE_PARAMETER_LIST',
  FunctionTypeParam = 'FUNCTION_TYPE_PARAMETER',
  ContextReceivers = 'CONTEXT_RECEIVER_LIST',
  ContextReceiver = 'CONTEXT_RECEIVER',
  DynamicType = 'DYNAMIC_TYPE',
  TypeArgs = 'TYPE_ARGUMENT_LIST',
  TypeArg = 'TYPE_PROJECTION',
  Modifiers = 'MODIFIER_LIST',
  AnnotationSet = 'ANNOTATION',
  Annotation = 'ANNOTATION_ENTRY',
  ValueArgs = 'VALUE_ARGUMENT_LIST',
  ValueArg = 'VALUE_ARGUMENT',
  If = 'IF',
  Try = 'TRY',
  Catch = 'CATCH',
  For = 'FOR',
  While = 'WHILE',
  DoWhile = 'DO_WHILE',
  Binary = 'BINARY_EXPRESSION',
  BinaryInfix = 'INFIX_EXPRESSION',
  BinaryType = 'BINARY_WITH_TYPE',
  Prefix = 'PREFIX_EXPRESSION',
  Postfix = 'POSTFIX_EXPRESSION',
  CallableReference = 'CALLABLE_REFERENCE_EXPRESSION',
  ClassLiteral = 'CLASS_LITERAL_EXPRESSION',
  Parenthesized = 'PARENTHESIZED',
  StringTemplate = 'STRING_TEMPLATE',
  ShortTemplate = 'SHORT_STRING_TEMPLATE_ENTRY',
  LongTemplate = 'LONG_STRING_TEMPLATE_ENTRY',
  Lambda = 'LAMBDA_EXPRESSION',
  LambdaParams = 'LAMBDA_PARAMETER_LIST',
  LambdaParam = 'LAMBDA_PARAMETER',
  LambdaParamVariable = 'LAMBDA_PARAMETER_VARIABLE',
  LambdaBody = 'LAMBDA_BODY',
  This = 'THIS_EXPRESSION',
  Super = 'SUPER_EXPRESSION',
  When = 'WHEN',
  WhenBranch = 'WHEN_ENTRY',
  WhenCondition = 'WHEN_CONDITION',
  Throw = 'THROW',
  Return = 'RETURN',
  Continue = 'CONTINUE',
  Break = 'BREAK',
  CollectionLiteral = 'COLLECTION_LITERAL_EXPRESSION',
  Labeled = 'LABELED_EXPRESSION',
  Annotated = 'ANNOTATED_EXPRESSION',
  Call = 'CALL_EXPRESSION',
  LambdaArg = 'LAMBDA_ARGUMENT',
  ArrayAccess = 'ARRAY_ACCESS_EXPRESSION',
  Block = 'BLOCK',
  Error = 'ERROR_ELEMENT',
  Unsupported = 'UNSUPPORTED',
}

export class RawToken extends Lexeme {
  /**
   * Whitespace, comments, semicolons and dangling commas.
   */
  readonly trivia: boolean;
  constructor(lexeme: Lexeme, trivia = isTriviaKind(lexeme.token)) {
    super(lexeme.token, lexeme.span, lexeme.substr);
    this.trivia = trivia;
  }
}

export class RawNode {
  readonly kind: RawKind;
  readonly children: readonly RawElement[];
  /**
   * Which slot of its parent this node fills, where the kind alone does not
   * tell.
   */
  readonly role: string | null;
  constructor(
    kind: RawKind,
    children: readonly RawElement[],
    role: string | null = null
  ) {
    this.kind = kind;
    this.children = children;
    this.role = role;
  }

  get offset(): number {
    const first: RawElement | undefined = this.children[0];
    if (first === undefined) {
      return 0;
    }
    return first instanceof RawNode ? first.offset : first.span.from;
  }

  /**
   * The source text this node covers.
   */
  text(): string {
    return this.children
      .map((child) => (child instanceof RawNode ? child.text() : child.substr))
      .join('');
  }

  toString(indent = ''): string {
    const role = this.role ? colors.blue(` (${this.role})`) : '';
    const lines = [`${indent}${colors.bold(this.kind)}${role}`];
    for (const child of this.children) {
      lines.push(
        child instanceof RawNode
          ? child.toString(indent + '  ')
          : `${indent}  ${child.toString()}`
      );
    }
    return lines.join('\n');
  }
}

export type RawElement = RawNode | RawToken;

export function isTrivia(element: RawElement): element is RawToken {
  return element instanceof RawToken && element.trivia;
}

/**
 * A node under construction. Trivia met before its first token is kept
 * apart as `leading` and ends up in whichever node the marker is added to.
 */
export class Marker {
  leading: RawToken[] = [];
  children: RawElement[] = [];
}

export type Parsed = { leading: RawToken[]; element: RawElement };

export type Snapshot = { cursor: number; pos: number };

/**
 * Feeds significant tokens to a parser and assembles the lossless raw tree.
 *
 * Trivia is attached lazily: it goes into whatever node is being built when
 * the next significant token is consumed. A node therefore never starts or
 * ends with trivia unless a trailing comment is bound to it.
 */
export class TreeBuilder {
  private tokens: Lexeme[];
  private significant: number[] = [];
  private cursor = 0;
  private pos = 0;

  constructor(tokens: Lexeme[]) {
    this.tokens = tokens;
    tokens.forEach((token, index) => {
      if (!isTriviaKind(token.token)) {
        this.significant.push(index);
      }
    });
  }

  peek(n = 0): Lexeme | undefined {
    const index = this.significant[this.cursor + n];
    return index === undefined ? undefined : this.tokens[index];
  }

  eof(): boolean {
    return this.peek() === undefined;
  }

  /**
   * Offset of the next significant token, or the end of input.
   */
  offset(): number {
    const next = this.peek();
    if (next) {
      return next.span.from;
    }
    const last = this.tokens[this.tokens.length - 1];
    return last ? last.span.to : 0;
  }

  private gap(n: number): Lexeme[] {
    const prev = this.significant[this.cursor + n - 1] ?? -1;
    const next = this.significant[this.cursor + n] ?? this.tokens.length;
    return this.tokens.slice(prev + 1, next);
  }

  /**
   * Whether a line break separates the `n`th upcoming token from the one
   * before it.
   */
  newlineBefore(n = 0): boolean {
    return this.gap(n).some(
      (t) =>
        t.token === TokenKind.LineComment ||
        (t.token === TokenKind.Whitespace && t.substr.includes('\n'))
    );
  }

  semicolonBefore(n = 0): boolean {
    return this.gap(n).some((t) => t.token === TokenKind.Semicolon);
  }

  separatedBefore(n = 0): boolean {
    return this.newlineBefore(n) || this.semicolonBefore(n);
  }

  /**
   * Whether the `n`th upcoming token directly follows the one before it.
   */
  adjacent(n = 0): boolean {
    return this.gap(n).length === 0;
  }

  mark(): Marker {
    return new Marker();
  }

  private takeTrivia(marker: Marker, until: number) {
    const trivia: RawToken[] = [];
    while (this.pos < until) {
      trivia.push(new RawToken(this.tokens[this.pos++]));
    }
    if (marker.children.length === 0) {
      marker.leading.push(...trivia);
    } else {
      marker.children.push(...trivia);
    }
  }

  private take(marker: Marker, count: number, trivia: boolean): RawToken {
    const first = this.significant[this.cursor];
    const last = this.significant[this.cursor + count - 1];
    if (first === undefined || last === undefined) {
      throw new Error('TreeBuilder: advanced past end of input');
    }
    this.takeTrivia(marker, first);
    const parts = this.tokens.slice(first, last + 1);
    const lexeme = count === 1 ? parts[0] : Lexeme.glue(parts);
    const token = new RawToken(lexeme, trivia);
    marker.children.push(token);
    this.cursor += count;
    this.pos = last + 1;
    return token;
  }

  /**
   * Moves the next significant token into `marker`.
   */
  advance(marker: Marker): RawToken {
    return this.take(marker, 1, false);
  }

  /**
   * Moves the next `count` adjacent tokens into `marker` as one token, for
   * operators such as `?.` and `>=` that are lexed in pieces.
   */
  advanceGlued(marker: Marker, count: number): RawToken {
    return this.take(marker, count, false);
  }

  /**
   * Moves the next significant token into `marker`, flagged as trivia.
   */
  advanceAsTrivia(marker: Marker): RawToken {
    return this.take(marker, 1, true);
  }

  /**
   * The next significant token as a standalone element.
   */
  token(): Parsed {
    const marker = this.mark();
    const element = this.advance(marker);
    return { leading: marker.leading, element };
  }

  add(marker: Marker, parsed: Parsed) {
    if (marker.children.length === 0) {
      marker.leading.push(...parsed.leading);
    } else {
      marker.children.push(...parsed.leading);
    }
    marker.children.push(parsed.element);
  }

  done(marker: Marker, kind: RawKind, role: string | null = null): Parsed {
    if (marker.children.length === 0) {
      throw new Error(`TreeBuilder: empty ${kind}`);
    }
    return {
      leading: marker.leading,
      element: new RawNode(kind, marker.children, role),
    };
  }

  /**
   * Moves everything gathered by `other` into `marker`.
   */
  absorb(marker: Marker, other: Marker) {
    if (marker.children.length === 0) {
      marker.leading.push(...other.leading);
    } else {
      marker.children.push(...other.leading);
    }
    marker.children.push(...other.children);
  }

  /**
   * Starts a node whose first child is the already parsed `first`.
   */
  precede(first: Parsed): Marker {
    const marker = this.mark();
    marker.leading = first.leading;
    marker.children.push(first.element);
    return marker;
  }

  /**
   * Gives `parsed` a role in its parent.
   */
  withRole(parsed: Parsed, role: string): Parsed {
    const { element } = parsed;
    if (!(element instanceof RawNode)) {
      return parsed;
    }
    return {
      leading: parsed.leading,
      element: new RawNode(element.kind, element.children, role),
    };
  }

  /**
   * Pulls a comment that ends the current line into `marker`.
   */
  bindTrailingComment(marker: Marker) {
    let at = this.pos;
    const first = this.tokens[at];
    if (
      first?.token === TokenKind.Whitespace &&
      !first.substr.includes('\n')
    ) {
      at++;
    }
    if (this.tokens[at]?.token === TokenKind.LineComment) {
      this.takeTrivia(marker, at + 1);
    }
  }

  /**
   * Finishes the root node, taking all remaining trivia into it.
   */
  finish(marker: Marker, kind: RawKind): RawNode {
    this.takeTrivia(marker, this.tokens.length);
    return new RawNode(kind, [...marker.leading, ...marker.children]);
  }

  snapshot(): Snapshot {
    return { cursor: this.cursor, pos: this.pos };
  }

  restore(snapshot: Snapshot) {
    this.cursor = snapshot.cursor;
    this.pos = snapshot.pos;
  }
}
