import { isAnnotationTargetText, isModifierKeywordText } from '../ast/keywords';
import { log } from '../utils/debug';
import { ParseError, SyntaxErrorEntry } from './errors';
import { Lexeme, Lexer, TokenKind } from './lexer';
import {
  Marker,
  Parsed,
  RawKind,
  RawNode,
  TreeBuilder,
} from './raw-tree';

class SyntaxFailure extends Error {
  description: string;
  offset: number;
  constructor(description: string, offset: number) {
    super(`${description} at offset ${offset}`);
    this.description = description;
    this.offset = offset;
  }
}

type ModifierContext =
  | 'declaration'
  | 'accessor'
  | 'parameter'
  | 'typeParameter'
  | 'typeArgument'
  | 'type';

type DeclarationContext = 'file' | 'class' | 'statement';

type TypeMode = 'normal' | 'receiver';

export type SourceForm = 'file' | 'script';

const DECLARATION_KEYWORDS: ReadonlySet<string> = new Set([
  'class',
  'interface',
  'object',
  'fun',
  'val',
  'var',
  'typealias',
]);

const ASSIGNMENT_OPERATORS = ['=', '+=', '-=', '*=', '/=', '%='];
const EQUALITY_OPERATORS = ['===', '!==', '==', '!='];
// `>=` before `>`, which would otherwise match its first half
const COMPARISON_OPERATORS = ['<=', '>=', '<', '>'];
const RANGE_OPERATORS = ['..<', '..'];
const ADDITIVE_OPERATORS = ['+', '-'];
const MULTIPLICATIVE_OPERATORS = ['*', '/', '%'];
const PREFIX_OPERATORS = ['++', '--', '+', '-', '!'];
const POSTFIX_OPERATORS = ['++', '--', '!!'];

// operators the lexer splits into pieces
const GLUED: Readonly<Record<string, readonly string[]>> = {
  '?.': ['?', '.'],
  '?:': ['?', ':'],
  '>=': ['>', '='],
  'as?': ['as', '?'],
};

/**
 * Recursive descent parser producing the lossless raw tree.
 *
 * Each method parses one construct starting at the current token and
 * returns it as a `Parsed` element. Failures inside a statement or
 * declaration are recorded and skipped, and all of them are raised together
 * once the input is consumed.
 */
export class SyntaxParser {
  static parse(
    source: string,
    form: SourceForm = 'file',
    fileName?: string
  ): RawNode {
    const parser = new SyntaxParser(Lexer.tokenize(source));
    const root = form === 'file' ? parser.file() : parser.script();
    if (parser.errors.length > 0) {
      throw new ParseError(parser.errors, fileName);
    }
    return root;
  }

  private b: TreeBuilder;
  private errors: SyntaxErrorEntry[] = [];
  private trailingLambdas = true;

  constructor(tokens: Lexeme[]) {
    this.b = new TreeBuilder(tokens);
  }

  // Token tests

  private at(text: string, n = 0): boolean {
    const t = this.b.peek(n);
    return (
      t !== undefined &&
      t.substr === text &&
      (t.token === TokenKind.Keyword ||
        t.token === TokenKind.Operator ||
        t.token === TokenKind.Identifier)
    );
  }

  private atKind(kind: TokenKind, n = 0): boolean {
    return this.b.peek(n)?.token === kind;
  }

  private atIdentifier(n = 0): boolean {
    return this.atKind(TokenKind.Identifier, n);
  }

  /**
   * Matches an operator that may be lexed in pieces, returning how many
   * tokens it spans.
   */
  private atOperator(op: string): number {
    const parts = GLUED[op];
    if (parts === undefined) {
      return this.at(op) ? 1 : 0;
    }
    const matches = parts.every(
      (part, i) => this.at(part, i) && (i === 0 || this.b.adjacent(i))
    );
    return matches ? parts.length : 0;
  }

  private atAnyOperator(ops: readonly string[]): number {
    for (const op of ops) {
      const count = this.atOperator(op);
      if (count > 0) {
        return count;
      }
    }
    return 0;
  }

  private fail(description: string): never {
    throw new SyntaxFailure(description, this.b.offset());
  }

  private error(description: string) {
    this.errors.push({ description, offset: this.b.offset() });
  }

  private expect(m: Marker, text: string) {
    if (!this.at(text)) {
      this.fail(`expected '${text}'`);
    }
    this.b.advance(m);
  }

  private expectKind(m: Marker, kind: TokenKind, what: string) {
    if (!this.atKind(kind)) {
      this.fail(`expected ${what}`);
    }
    this.b.advance(m);
  }

  private expectIdentifier(m: Marker) {
    this.expectKind(m, TokenKind.Identifier, 'an identifier');
  }

  /**
   * Runs `parse`, rewinding and returning null if it fails.
   */
  private speculate<T>(parse: () => T): T | null {
    const snapshot = this.b.snapshot();
    const errorCount = this.errors.length;
    try {
      return parse();
    } catch (e) {
      if (!(e instanceof SyntaxFailure)) {
        throw e;
      }
      this.b.restore(snapshot);
      this.errors.length = errorCount;
      return null;
    }
  }

  /**
   * Whether `parse` would succeed here. Never consumes anything.
   */
  private lookahead(parse: () => unknown): boolean {
    const snapshot = this.b.snapshot();
    const errorCount = this.errors.length;
    const matched = this.speculate(() => {
      parse();
      return true;
    });
    this.b.restore(snapshot);
    this.errors.length = errorCount;
    return matched === true;
  }

  private withTrailingLambdas<T>(allowed: boolean, parse: () => T): T {
    const saved = this.trailingLambdas;
    this.trailingLambdas = allowed;
    try {
      return parse();
    } finally {
      this.trailingLambdas = saved;
    }
  }

  /**
   * Parses one statement or declaration into `m`. On failure the error is
   * recorded and the tokens up to the next statement boundary are kept in
   * an error node.
   */
  private recovering(m: Marker, parse: () => Parsed) {
    const snapshot = this.b.snapshot();
    try {
      this.b.add(m, parse());
    } catch (e) {
      if (!(e instanceof SyntaxFailure)) {
        throw e;
      }
      this.b.restore(snapshot);
      this.errors.push({ description: e.description, offset: e.offset });
      log(`recovering from "${e.description}" at offset ${e.offset}`);
      const skipped = this.skipToBoundary();
      if (skipped) {
        this.b.add(m, skipped);
      }
    }
  }

  private skipToBoundary(): Parsed | null {
    const m = this.b.mark();
    let depth = 0;
    while (!this.b.eof()) {
      if (m.children.length > 0 && depth === 0) {
        if (this.b.separatedBefore() || this.at('}')) {
          break;
        }
      }
      if (this.at('{')) {
        depth++;
      } else if (this.at('}') && depth > 0) {
        depth--;
      }
      this.b.advance(m);
    }
    return m.children.length > 0 ? this.b.done(m, RawKind.Error) : null;
  }

  /**
   * Index of the `)` closing the `(` at `n`, or -1.
   */
  private matchingParen(n: number): number {
    let depth = 0;
    for (let i = n; this.b.peek(i) !== undefined; i++) {
      if (this.at('(', i)) {
        depth++;
      } else if (this.at(')', i)) {
        depth--;
        if (depth === 0) {
          return i;
        }
      }
    }
    return -1;
  }

  private startsFunctionType(n = 0): boolean {
    if (!this.at('(', n)) {
      return false;
    }
    const close = this.matchingParen(n);
    return close >= 0 && this.at('->', close + 1);
  }

  // Files

  file(): RawNode {
    const m = this.b.mark();
    this.header(m);
    while (!this.b.eof()) {
      this.recovering(m, () => this.topLevelDeclaration());
    }
    return this.b.finish(m, RawKind.File);
  }

  script(): RawNode {
    const m = this.b.mark();
    this.header(m);
    this.statementsInto(m, () => false);
    return this.b.finish(m, RawKind.Script);
  }

  private header(m: Marker) {
    while (
      this.at('@') &&
      this.at('file', 1) &&
      this.at(':', 2) &&
      this.b.adjacent(1)
    ) {
      this.recovering(m, () => this.annotationSet());
    }
    if (this.at('package')) {
      this.recovering(m, () => this.packageDirective());
    }
    if (this.at('import')) {
      this.recovering(m, () => this.importList());
    }
  }

  private packageDirective(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    this.qualifiedName(m);
    return this.b.done(m, RawKind.PackageDirective);
  }

  private qualifiedName(m: Marker) {
    this.expectIdentifier(m);
    while (this.at('.') && this.atIdentifier(1) && !this.b.newlineBefore()) {
      this.b.advance(m);
      this.b.advance(m);
    }
  }

  private importList(): Parsed {
    const m = this.b.mark();
    while (this.at('import')) {
      this.b.add(m, this.importDirective());
    }
    return this.b.done(m, RawKind.ImportList);
  }

  private importDirective(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    this.expectIdentifier(m);
    while (this.at('.') && !this.b.newlineBefore()) {
      this.b.advance(m);
      if (this.at('*')) {
        this.b.advance(m);
        break;
      }
      this.expectIdentifier(m);
    }
    if (this.at('as') && !this.b.newlineBefore()) {
      const alias = this.b.mark();
      this.b.advance(alias);
      this.expectIdentifier(alias);
      this.b.add(m, this.b.done(alias, RawKind.ImportAlias));
    }
    return this.b.done(m, RawKind.ImportDirective);
  }

  private topLevelDeclaration(): Parsed {
    const declaration = this.declaration('file');
    if (declaration === null) {
      return this.fail('expected a declaration');
    }
    return declaration;
  }

  // Modifiers

  private startsDeclaration(n: number): boolean {
    const t = this.b.peek(n);
    if (t === undefined) {
      return false;
    }
    if (t.token === TokenKind.Keyword) {
      return DECLARATION_KEYWORDS.has(t.substr);
    }
    if (t.token === TokenKind.Operator) {
      return t.substr === '@';
    }
    return t.substr === 'constructor' || this.atModifier('declaration', n);
  }

  private atModifier(context: ModifierContext, n = 0): boolean {
    const t = this.b.peek(n);
    const next = this.b.peek(n + 1);
    if (t === undefined || next === undefined) {
      return false;
    }
    const text = t.substr;
    if (!isModifierKeywordText(text)) {
      return false;
    }
    const soft = t.token === TokenKind.Identifier;
    const nextIsName = next.token === TokenKind.Identifier;
    switch (context) {
      case 'declaration':
        if (text === 'fun') {
          return this.at('interface', n + 1);
        }
        return soft && this.startsDeclaration(n + 1);
      case 'accessor':
        return (
          soft &&
          (this.at('get', n + 1) ||
            this.at('set', n + 1) ||
            this.at('@', n + 1) ||
            this.atModifier('accessor', n + 1))
        );
      case 'parameter':
        return (
          soft &&
          (nextIsName ||
            this.at('val', n + 1) ||
            this.at('var', n + 1) ||
            this.at('@', n + 1))
        );
      case 'typeParameter':
        return (
          (text === 'in' || text === 'out' || text === 'reified') &&
          (nextIsName || this.at('@', n + 1))
        );
      case 'typeArgument':
        return (
          (text === 'in' || text === 'out') &&
          (nextIsName || this.at('(', n + 1) || this.at('@', n + 1))
        );
      case 'type':
        return text === 'suspend' && soft && (this.at('(', n + 1) || nextIsName);
    }
  }

  private modifierList(context: ModifierContext): Parsed | null {
    const m = this.b.mark();
    for (;;) {
      if (this.at('@')) {
        this.b.add(m, this.annotationSet());
      } else if (this.atModifier(context)) {
        this.b.advance(m);
      } else {
        break;
      }
    }
    return m.children.length > 0 ? this.b.done(m, RawKind.Modifiers) : null;
  }

  private annotationSet(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    const target = this.b.peek();
    if (
      target !== undefined &&
      target.token === TokenKind.Identifier &&
      isAnnotationTargetText(target.substr) &&
      this.b.adjacent() &&
      this.at(':', 1) &&
      this.b.adjacent(1)
    ) {
      this.b.advance(m);
      this.b.advance(m);
    }
    if (this.at('[') && this.b.adjacent()) {
      this.b.advance(m);
      while (!this.at(']')) {
        this.b.add(m, this.annotation());
      }
      this.b.advance(m);
    } else {
      this.b.add(m, this.annotation());
    }
    return this.b.done(m, RawKind.AnnotationSet);
  }

  private annotation(): Parsed {
    const m = this.b.mark();
    this.b.add(m, this.userType('normal'));
    if (this.at('(') && this.b.adjacent()) {
      this.b.add(m, this.valueArgs());
    }
    return this.b.done(m, RawKind.Annotation);
  }

  // Declarations

  /**
   * Parses a declaration, or returns null in statement context when the
   * tokens start an expression instead.
   */
  private declaration(context: DeclarationContext): Parsed | null {
    const snapshot = this.b.snapshot();
    const m = this.b.mark();
    const modifiers = this.modifierList('declaration');
    if (modifiers) {
      this.b.add(m, modifiers);
    }
    const t = this.b.peek();
    const text =
      t !== undefined &&
      (t.token === TokenKind.Keyword || t.token === TokenKind.Identifier)
        ? t.substr
        : '';
    switch (text) {
      case 'class':
      case 'interface':
        return this.classDeclaration(m, hasModifier(modifiers, 'enum'));
      case 'object':
        if (context !== 'statement' || modifiers || this.atIdentifier(1)) {
          return this.classDeclaration(m, false);
        }
        break;
      case 'fun':
        if (context !== 'statement' || !this.at('(', 1)) {
          return this.functionDeclaration(m);
        }
        break;
      case 'val':
      case 'var':
        if (t?.token === TokenKind.Keyword) {
          return this.propertyDeclaration(m);
        }
        break;
      case 'typealias':
        return this.typeAlias(m);
      case 'constructor':
        if (context === 'class') {
          return this.secondaryConstructor(m);
        }
        break;
      case 'init':
        if (context === 'class' && this.at('{', 1)) {
          return this.initDeclaration(m);
        }
        break;
    }
    if (context === 'statement') {
      this.b.restore(snapshot);
      return null;
    }
    return this.fail('expected a declaration');
  }

  private classDeclaration(m: Marker, isEnum: boolean): Parsed {
    const isObject = this.at('object');
    this.b.advance(m);
    if (this.atIdentifier()) {
      this.b.advance(m);
    }
    if (this.at('<')) {
      this.b.add(m, this.typeParams());
    }
    if (!isObject) {
      const constructor = this.primaryConstructor();
      if (constructor) {
        this.b.add(m, constructor);
      }
    }
    if (this.at(':')) {
      this.b.add(m, this.classParents());
    }
    if (this.at('where')) {
      this.b.add(m, this.typeConstraintSet());
    }
    if (this.at('{')) {
      this.b.add(m, this.classBody(isEnum));
    }
    this.b.bindTrailingComment(m);
    return this.b.done(m, RawKind.Class);
  }

  private primaryConstructor(): Parsed | null {
    if (this.at('(')) {
      const m = this.b.mark();
      this.b.add(m, this.valueParams());
      return this.b.done(m, RawKind.PrimaryConstructor);
    }
    return this.speculate(() => {
      const m = this.b.mark();
      const modifiers = this.modifierList('declaration');
      if (modifiers) {
        this.b.add(m, modifiers);
      }
      this.expect(m, 'constructor');
      this.b.add(m, this.valueParams());
      return this.b.done(m, RawKind.PrimaryConstructor);
    });
  }

  private classParents(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    this.b.add(m, this.classParent());
    while (this.at(',')) {
      this.b.advance(m);
      this.b.add(m, this.classParent());
    }
    return this.b.done(m, RawKind.ClassParents);
  }

  private classParent(): Parsed {
    const m = this.b.mark();
    this.b.add(m, this.userType('normal'));
    if (this.at('(') && !this.b.newlineBefore()) {
      this.b.add(m, this.valueArgs());
      return this.b.done(m, RawKind.CallConstructorParent);
    }
    if (this.at('by')) {
      this.b.advance(m);
      this.b.add(
        m,
        this.withTrailingLambdas(false, () => this.expression())
      );
      return this.b.done(m, RawKind.DelegatedTypeParent);
    }
    return this.b.done(m, RawKind.TypeParent);
  }

  private classBody(isEnum: boolean): Parsed {
    return this.withTrailingLambdas(true, () => {
      const m = this.b.mark();
      this.expect(m, '{');
      if (isEnum) {
        this.enumEntries(m);
      }
      while (!this.at('}') && !this.b.eof()) {
        this.recovering(m, () => this.memberDeclaration());
      }
      this.expect(m, '}');
      return this.b.done(m, RawKind.ClassBody);
    });
  }

  private memberDeclaration(): Parsed {
    const declaration = this.declaration('class');
    if (declaration === null) {
      return this.fail('expected a member declaration');
    }
    return declaration;
  }

  private atEnumEntry(): boolean {
    if (this.atIdentifier()) {
      return !this.atModifier('declaration') && !this.at('init');
    }
    if (!this.at('@')) {
      return false;
    }
    // annotations on an entry rather than on a member
    return this.lookahead(() => {
      this.modifierList('declaration');
      if (!this.atIdentifier() || this.atModifier('declaration')) {
        this.fail('not an enum entry');
      }
    });
  }

  private enumEntries(m: Marker) {
    while (this.atEnumEntry()) {
      this.b.add(m, this.enumEntry());
      if (!this.at(',')) {
        return;
      }
      if (this.at('}', 1) || !this.lookaheadEnumEntry()) {
        // a dangling comma after the last entry
        this.b.advanceAsTrivia(m);
        return;
      }
      this.b.advance(m);
    }
  }

  private lookaheadEnumEntry(): boolean {
    return this.lookahead(() => {
      const m = this.b.mark();
      this.b.advance(m);
      if (!this.atEnumEntry()) {
        this.fail('not an enum entry');
      }
    });
  }

  private enumEntry(): Parsed {
    const m = this.b.mark();
    const modifiers = this.modifierList('declaration');
    if (modifiers) {
      this.b.add(m, modifiers);
    }
    this.expectIdentifier(m);
    if (this.at('(')) {
      this.b.add(m, this.valueArgs());
    }
    if (this.at('{')) {
      this.b.add(m, this.classBody(false));
    }
    return this.b.done(m, RawKind.EnumEntry);
  }

  private initDeclaration(m: Marker): Parsed {
    this.b.advance(m);
    this.b.add(m, this.block());
    this.b.bindTrailingComment(m);
    return this.b.done(m, RawKind.Init);
  }

  private secondaryConstructor(m: Marker): Parsed {
    this.b.advance(m);
    this.b.add(m, this.valueParams());
    if (this.at(':')) {
      this.b.advance(m);
      const call = this.b.mark();
      if (!this.at('this') && !this.at('super')) {
        this.fail("expected 'this' or 'super'");
      }
      this.b.advance(call);
      this.b.add(call, this.valueArgs());
      this.b.add(m, this.b.done(call, RawKind.DelegationCall));
    }
    if (this.at('{')) {
      this.b.add(m, this.block());
    }
    this.b.bindTrailingComment(m);
    return this.b.done(m, RawKind.SecondaryConstructor);
  }

  /**
   * The receiver type of an extension, up to but excluding the `.` before
   * the name.
   */
  private receiverType(): Parsed | null {
    return this.speculate(() => {
      const type = this.typeRef('receiver');
      if (!this.at('.')) {
        this.fail("expected '.'");
      }
      return this.b.withRole(type, 'receiver');
    });
  }

  private functionDeclaration(m: Marker): Parsed {
    this.b.advance(m);
    if (this.at('<')) {
      this.b.add(m, this.typeParams());
    }
    if (!this.at('(')) {
      const receiver = this.receiverType();
      if (receiver) {
        this.b.add(m, receiver);
        this.b.advance(m);
      }
      if (this.atIdentifier()) {
        this.b.advance(m);
      }
    }
    this.b.add(m, this.valueParams());
    if (this.at(':')) {
      this.b.advance(m);
      this.b.add(m, this.typeRef());
    }
    for (;;) {
      if (this.at('where')) {
        this.b.add(m, this.typeConstraintSet());
      } else if (this.at('contract') && this.at('[', 1)) {
        this.b.add(m, this.contract());
      } else {
        break;
      }
    }
    if (this.at('=')) {
      this.b.advance(m);
      this.b.add(m, this.expression());
    } else if (this.at('{')) {
      this.b.add(m, this.block());
    }
    this.b.bindTrailingComment(m);
    return this.b.done(m, RawKind.Fun);
  }

  private valueParams(): Parsed {
    return this.withTrailingLambdas(true, () => {
      const m = this.b.mark();
      this.expect(m, '(');
      this.commaList(m, ')', () => this.valueParam());
      this.expect(m, ')');
      return this.b.done(m, RawKind.ValueParams);
    });
  }

  private valueParam(): Parsed {
    const m = this.b.mark();
    const modifiers = this.modifierList('parameter');
    if (modifiers) {
      this.b.add(m, modifiers);
    }
    if (this.at('val') || this.at('var')) {
      this.b.advance(m);
    }
    this.expectIdentifier(m);
    if (this.at(':')) {
      this.b.advance(m);
      this.b.add(m, this.typeRef());
    }
    if (this.at('=')) {
      this.b.advance(m);
      this.b.add(m, this.expression());
    }
    return this.b.done(m, RawKind.ValueParam);
  }

  /**
   * Items separated by commas up to `close`. A comma right before `close`
   * is kept as an ordinary token; the converter tells it apart by position.
   */
  private commaList(m: Marker, close: string, item: () => Parsed) {
    while (!this.at(close)) {
      this.b.add(m, item());
      if (!this.at(',')) {
        return;
      }
      this.b.advance(m);
    }
  }

  private propertyDeclaration(m: Marker): Parsed {
    this.b.advance(m);
    if (this.at('<')) {
      this.b.add(m, this.typeParams());
    }
    if (!this.at('(')) {
      const receiver = this.receiverType();
      if (receiver) {
        this.b.add(m, receiver);
        this.b.advance(m);
      }
    }
    if (this.at('(')) {
      this.b.advance(m);
      this.commaList(m, ')', () => this.variable());
      this.expect(m, ')');
    } else {
      this.expectIdentifier(m);
      if (this.at(':')) {
        this.b.advance(m);
        this.b.add(m, this.typeRef());
      }
    }
    if (this.at('where')) {
      this.b.add(m, this.typeConstraintSet());
    }
    if (this.at('=')) {
      this.b.advance(m);
      this.b.add(m, this.expression());
    } else if (this.at('by')) {
      const delegate = this.b.mark();
      this.b.advance(delegate);
      this.b.add(delegate, this.expression());
      this.b.add(m, this.b.done(delegate, RawKind.PropertyDelegate));
    }
    for (let i = 0; i < 2; i++) {
      const accessor = this.accessor();
      if (accessor === null) {
        break;
      }
      this.b.add(m, accessor);
    }
    this.b.bindTrailingComment(m);
    return this.b.done(m, RawKind.Property);
  }

  private variable(): Parsed {
    const m = this.b.mark();
    this.expectIdentifier(m);
    if (this.at(':')) {
      this.b.advance(m);
      this.b.add(m, this.typeRef());
    }
    return this.b.done(m, RawKind.Variable);
  }

  private accessor(): Parsed | null {
    return this.speculate(() => {
      const m = this.b.mark();
      const modifiers = this.modifierList('accessor');
      if (modifiers) {
        this.b.add(m, modifiers);
      }
      const isGetter = this.at('get');
      if (!isGetter && !this.at('set')) {
        this.fail('expected an accessor');
      }
      this.b.advance(m);
      if (this.at('(')) {
        if (isGetter) {
          this.b.advance(m);
          this.expect(m, ')');
          if (this.at(':')) {
            this.b.advance(m);
            this.b.add(m, this.typeRef());
          }
        } else {
          this.b.add(m, this.valueParams());
        }
        if (this.at('=')) {
          this.b.advance(m);
          this.b.add(m, this.expression());
        } else if (this.at('{')) {
          this.b.add(m, this.block());
        } else {
          this.fail('expected an accessor body');
        }
      } else if (
        !this.b.eof() &&
        !this.b.separatedBefore() &&
        !this.at('}')
      ) {
        this.fail('expected an accessor');
      }
      return this.b.done(m, isGetter ? RawKind.Getter : RawKind.Setter);
    });
  }

  private typeAlias(m: Marker): Parsed {
    this.b.advance(m);
    this.expectIdentifier(m);
    if (this.at('<')) {
      this.b.add(m, this.typeParams());
    }
    this.expect(m, '=');
    this.b.add(m, this.typeRef());
    this.b.bindTrailingComment(m);
    return this.b.done(m, RawKind.TypeAlias);
  }

  private typeParams(): Parsed {
    const m = this.b.mark();
    this.expect(m, '<');
    this.commaList(m, '>', () => this.typeParam());
    this.expect(m, '>');
    return this.b.done(m, RawKind.TypeParams);
  }

  private typeParam(): Parsed {
    const m = this.b.mark();
    const modifiers = this.modifierList('typeParameter');
    if (modifiers) {
      this.b.add(m, modifiers);
    }
    this.expectIdentifier(m);
    if (this.at(':')) {
      this.b.advance(m);
      this.b.add(m, this.typeRef());
    }
    return this.b.done(m, RawKind.TypeParam);
  }

  private typeConstraintSet(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    const constraints = this.b.mark();
    this.b.add(constraints, this.typeConstraint());
    while (this.at(',')) {
      this.b.advance(constraints);
      this.b.add(constraints, this.typeConstraint());
    }
    this.b.add(m, this.b.done(constraints, RawKind.TypeConstraints));
    return this.b.done(m, RawKind.TypeConstraintSet);
  }

  private typeConstraint(): Parsed {
    const m = this.b.mark();
    while (this.at('@')) {
      this.b.add(m, this.annotationSet());
    }
    this.expectIdentifier(m);
    this.expect(m, ':');
    this.b.add(m, this.typeRef());
    return this.b.done(m, RawKind.TypeConstraint);
  }

  private contract(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    const effects = this.b.mark();
    this.expect(effects, '[');
    this.commaList(effects, ']', () => {
      const effect = this.b.mark();
      this.b.add(effect, this.expression());
      return this.b.done(effect, RawKind.ContractEffect);
    });
    this.expect(effects, ']');
    this.b.add(m, this.b.done(effects, RawKind.ContractEffects));
    return this.b.done(m, RawKind.Contract);
  }

  // Types

  typeRef(mode: TypeMode = 'normal'): Parsed {
    if (this.at('(') && !this.startsFunctionType()) {
      const m = this.b.mark();
      this.b.advance(m);
      const modifiers = this.modifierList('type');
      if (modifiers) {
        this.b.add(m, modifiers);
      }
      this.b.add(m, this.type('normal'));
      this.expect(m, ')');
      if (!this.at('?') || !this.b.adjacent()) {
        return this.b.done(m, RawKind.TypeRef);
      }
      this.b.advance(m);
      const outer = this.b.mark();
      const nullable = this.b.done(m, RawKind.NullableType);
      this.b.add(outer, this.nullableSuffix(nullable));
      return this.b.done(outer, RawKind.TypeRef);
    }
    const m = this.b.mark();
    const modifiers = this.modifierList('type');
    if (modifiers) {
      this.b.add(m, modifiers);
    }
    this.b.add(m, this.type(mode));
    return this.b.done(m, RawKind.TypeRef);
  }

  private nullableSuffix(type: Parsed): Parsed {
    if (!this.at('?') || !this.b.adjacent()) {
      return type;
    }
    const m = this.b.precede(type);
    while (this.at('?') && this.b.adjacent()) {
      this.b.advance(m);
    }
    return this.b.done(m, RawKind.Unsupported, 'nested nullable type');
  }

  private type(mode: TypeMode): Parsed {
    if (this.at('(')) {
      if (this.startsFunctionType()) {
        return this.functionType(null, null);
      }
      const m = this.b.mark();
      this.b.add(m, this.typeRef());
      return this.b.done(m, RawKind.Unsupported, 'parenthesized type');
    }
    if (this.at('context') && this.at('(', 1)) {
      return this.functionType(this.contextReceivers(), null);
    }
    let result: Parsed;
    if (this.at('dynamic') && !this.at('.', 1)) {
      const m = this.b.mark();
      this.b.advance(m);
      result = this.b.done(m, RawKind.DynamicType);
    } else {
      result = this.userType(mode);
    }
    if (this.at('?') && this.b.adjacent()) {
      const m = this.b.precede(result);
      this.b.advance(m);
      result = this.nullableSuffix(this.b.done(m, RawKind.NullableType));
    }
    if (this.at('.') && this.startsFunctionType(1)) {
      const receiverRef = this.b.done(this.b.precede(result), RawKind.TypeRef);
      const receiver = this.b.precede(receiverRef);
      this.b.advance(receiver);
      return this.functionType(
        null,
        this.b.done(receiver, RawKind.FunctionTypeReceiver)
      );
    }
    return result;
  }

  private contextReceivers(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    this.expect(m, '(');
    this.commaList(m, ')', () => {
      const receiver = this.b.mark();
      this.b.add(receiver, this.typeRef());
      return this.b.done(receiver, RawKind.ContextReceiver);
    });
    this.expect(m, ')');
    return this.b.done(m, RawKind.ContextReceivers);
  }

  private functionType(
    contextReceivers: Parsed | null,
    receiver: Parsed | null
  ): Parsed {
    const m = this.b.mark();
    if (contextReceivers) {
      this.b.add(m, contextReceivers);
    }
    if (receiver) {
      this.b.add(m, receiver);
    }
    const params = this.b.mark();
    this.expect(params, '(');
    this.commaList(params, ')', () => this.functionTypeParam());
    this.expect(params, ')');
    this.b.add(m, this.b.done(params, RawKind.FunctionTypeParams));
    this.expect(m, '->');
    this.b.add(m, this.typeRef());
    return this.b.done(m, RawKind.FunctionType);
  }

  private functionTypeParam(): Parsed {
    const m = this.b.mark();
    if (this.atIdentifier() && this.at(':', 1)) {
      this.b.advance(m);
      this.b.advance(m);
    }
    this.b.add(m, this.typeRef());
    return this.b.done(m, RawKind.FunctionTypeParam);
  }

  private userType(mode: TypeMode): Parsed {
    const m = this.b.mark();
    let segment = this.typeSegment();
    while (
      this.at('.') &&
      this.atIdentifier(1) &&
      (mode === 'normal' ||
        this.at('.', 2) ||
        this.at('<', 2) ||
        this.at('?', 2))
    ) {
      this.b.add(m, this.b.done(segment, RawKind.TypeQualifier));
      this.b.advance(m);
      segment = this.typeSegment();
    }
    this.b.absorb(m, segment);
    return this.b.done(m, RawKind.UserType);
  }

  private typeSegment(): Marker {
    const m = this.b.mark();
    this.expectIdentifier(m);
    if (this.at('<')) {
      this.b.add(m, this.typeArgs());
    }
    return m;
  }

  private typeArgs(): Parsed {
    const m = this.b.mark();
    this.expect(m, '<');
    this.commaList(m, '>', () => this.typeArg());
    this.expect(m, '>');
    return this.b.done(m, RawKind.TypeArgs);
  }

  private typeArg(): Parsed {
    const m = this.b.mark();
    if (this.at('*')) {
      this.b.advance(m);
    } else {
      const modifiers = this.modifierList('typeArgument');
      if (modifiers) {
        this.b.add(m, modifiers);
      }
      this.b.add(m, this.typeRef());
    }
    return this.b.done(m, RawKind.TypeArg);
  }

  // Statements

  private statementsInto(m: Marker, end: () => boolean) {
    let first = true;
    while (!end() && !this.b.eof()) {
      if (!first && !this.b.separatedBefore()) {
        this.error('expected a newline or semicolon');
      }
      first = false;
      this.recovering(m, () => this.statement());
    }
  }

  private statement(): Parsed {
    const declaration = this.declaration('statement');
    if (declaration) {
      return declaration;
    }
    if (this.at('@')) {
      const annotated = this.speculate(() => this.annotatedStatement());
      if (annotated) {
        return annotated;
      }
    }
    return this.expression();
  }

  /**
   * Annotations on a line of their own apply to the whole statement below.
   */
  private annotatedStatement(): Parsed {
    const m = this.b.mark();
    while (this.at('@')) {
      this.b.add(m, this.annotationSet());
    }
    if (!this.b.newlineBefore()) {
      this.fail('expected a newline');
    }
    this.b.add(m, this.expression());
    return this.b.done(m, RawKind.Annotated);
  }

  private block(): Parsed {
    return this.withTrailingLambdas(true, () => {
      const m = this.b.mark();
      this.expect(m, '{');
      this.statementsInto(m, () => this.at('}'));
      this.expect(m, '}');
      return this.b.done(m, RawKind.Block);
    });
  }

  private controlStructureBody(): Parsed {
    return this.at('{') ? this.block() : this.expression();
  }

  // Expressions

  expression(): Parsed {
    const lhs = this.disjunction();
    const count = this.atAnyOperator(ASSIGNMENT_OPERATORS);
    if (count === 0 || this.b.separatedBefore()) {
      return lhs;
    }
    const m = this.b.precede(lhs);
    this.b.advanceGlued(m, count);
    this.b.add(m, this.expression());
    return this.b.done(m, RawKind.Binary);
  }

  private binaryLevel(
    ops: readonly string[],
    operand: () => Parsed,
    crossesNewline = false
  ): Parsed {
    let lhs = operand();
    for (;;) {
      const count = this.atAnyOperator(ops);
      if (
        count === 0 ||
        this.b.semicolonBefore() ||
        (!crossesNewline && this.b.newlineBefore())
      ) {
        return lhs;
      }
      const m = this.b.precede(lhs);
      this.b.advanceGlued(m, count);
      this.b.add(m, operand());
      lhs = this.b.done(m, RawKind.Binary);
    }
  }

  private disjunction(): Parsed {
    return this.binaryLevel(['||'], () => this.conjunction(), true);
  }

  private conjunction(): Parsed {
    return this.binaryLevel(['&&'], () => this.equality(), true);
  }

  private equality(): Parsed {
    return this.binaryLevel(EQUALITY_OPERATORS, () => this.comparison());
  }

  private comparison(): Parsed {
    return this.binaryLevel(COMPARISON_OPERATORS, () => this.namedCheck());
  }

  private namedCheck(): Parsed {
    let lhs = this.elvis();
    while (!this.b.separatedBefore()) {
      if (this.at('is') || this.at('!is')) {
        const m = this.b.precede(lhs);
        this.b.advance(m);
        this.b.add(m, this.typeRef());
        lhs = this.b.done(m, RawKind.BinaryType);
      } else if (this.at('in') || this.at('!in')) {
        const m = this.b.precede(lhs);
        this.b.advance(m);
        this.b.add(m, this.elvis());
        lhs = this.b.done(m, RawKind.Binary);
      } else {
        break;
      }
    }
    return lhs;
  }

  private elvis(): Parsed {
    return this.binaryLevel(['?:'], () => this.infix(), true);
  }

  private infix(): Parsed {
    let lhs = this.range();
    while (this.atIdentifier() && !this.b.separatedBefore()) {
      const m = this.b.precede(lhs);
      this.b.advance(m);
      this.b.add(m, this.range());
      lhs = this.b.done(m, RawKind.BinaryInfix);
    }
    return lhs;
  }

  private range(): Parsed {
    return this.binaryLevel(RANGE_OPERATORS, () => this.additive());
  }

  private additive(): Parsed {
    return this.binaryLevel(ADDITIVE_OPERATORS, () => this.multiplicative());
  }

  private multiplicative(): Parsed {
    return this.binaryLevel(MULTIPLICATIVE_OPERATORS, () => this.asExpression());
  }

  private asExpression(): Parsed {
    let lhs = this.prefix();
    for (;;) {
      const count = this.atOperator('as?') || this.atOperator('as');
      if (count === 0 || this.b.semicolonBefore()) {
        return lhs;
      }
      const m = this.b.precede(lhs);
      this.b.advanceGlued(m, count);
      this.b.add(m, this.typeRef());
      lhs = this.b.done(m, RawKind.BinaryType);
    }
  }

  private prefix(): Parsed {
    if (PREFIX_OPERATORS.some((op) => this.at(op))) {
      const m = this.b.mark();
      this.b.advance(m);
      this.b.add(m, this.prefix());
      return this.b.done(m, RawKind.Prefix);
    }
    if (this.at('@')) {
      const m = this.b.mark();
      while (this.at('@')) {
        this.b.add(m, this.annotationSet());
      }
      this.b.add(m, this.prefix());
      return this.b.done(m, RawKind.Annotated);
    }
    if (this.atIdentifier() && this.at('@', 1) && this.b.adjacent(1)) {
      const m = this.b.mark();
      this.b.advance(m);
      this.b.advance(m);
      this.b.add(m, this.prefix());
      return this.b.done(m, RawKind.Labeled);
    }
    return this.postfix();
  }

  private postfix(): Parsed {
    let result = this.primary();
    for (;;) {
      if (this.b.semicolonBefore()) {
        return result;
      }
      const dot = this.atOperator('?.') || (this.at('.') ? 1 : 0);
      if (dot > 0) {
        const m = this.b.precede(result);
        this.b.advanceGlued(m, dot);
        this.b.add(m, this.memberSelector());
        result = this.b.done(m, RawKind.Binary);
        continue;
      }
      if (this.b.newlineBefore()) {
        return result;
      }
      if (POSTFIX_OPERATORS.some((op) => this.at(op))) {
        const m = this.b.precede(result);
        this.b.advance(m);
        result = this.b.done(m, RawKind.Postfix);
      } else if (this.at('[')) {
        result = this.arrayAccess(result);
      } else if (this.at('::')) {
        result = this.callableReference(result);
      } else if (this.at('?') && this.b.adjacent() && this.at('::', 1)) {
        const m = this.b.precede(result);
        this.b.advance(m);
        this.b.advance(m);
        if (this.at('class') || this.atIdentifier()) {
          this.b.advance(m);
        }
        result = this.b.done(m, RawKind.Unsupported, 'nullable class literal');
      } else {
        const call = this.callSuffix(result);
        if (call === null) {
          return result;
        }
        result = call;
      }
    }
  }

  private memberSelector(): Parsed {
    if (!this.atIdentifier()) {
      this.fail('expected a member name');
    }
    let result = this.b.token();
    while (!this.b.semicolonBefore()) {
      const call = this.callSuffix(result);
      if (call === null) {
        break;
      }
      result = call;
    }
    return result;
  }

  private arrayAccess(target: Parsed): Parsed {
    return this.withTrailingLambdas(true, () => {
      const m = this.b.precede(target);
      this.b.advance(m);
      this.commaList(m, ']', () => this.expression());
      this.expect(m, ']');
      return this.b.done(m, RawKind.ArrayAccess);
    });
  }

  private callableReference(lhs: Parsed | null): Parsed {
    const m = lhs ? this.b.precede(lhs) : this.b.mark();
    this.b.advance(m);
    if (this.at('class')) {
      this.b.advance(m);
      return this.b.done(m, RawKind.ClassLiteral);
    }
    this.expectIdentifier(m);
    return this.b.done(m, RawKind.CallableReference);
  }

  private callSuffix(callee: Parsed): Parsed | null {
    if (this.b.separatedBefore()) {
      return null;
    }
    let typeArgs: Parsed | null = null;
    if (this.at('<')) {
      typeArgs = this.speculate(() => {
        const args = this.typeArgs();
        if (this.b.newlineBefore() || !(this.at('(') || this.at('{'))) {
          this.fail('not a call');
        }
        return args;
      });
    }
    let args: Parsed | null = null;
    if (this.at('(') && !this.b.separatedBefore()) {
      args = this.valueArgs();
    }
    let lambda: Parsed | null = null;
    if (this.trailingLambdas && !this.b.semicolonBefore()) {
      const sameLine = !this.b.newlineBefore();
      if ((args !== null || sameLine) && this.atLambdaArgument()) {
        lambda = this.lambdaArgument();
      }
    }
    if (typeArgs === null && args === null && lambda === null) {
      return null;
    }
    const m = this.b.precede(callee);
    for (const part of [typeArgs, args, lambda]) {
      if (part) {
        this.b.add(m, part);
      }
    }
    return this.b.done(m, RawKind.Call);
  }

  private atLambdaArgument(): boolean {
    if (this.at('{')) {
      return true;
    }
    if (this.atIdentifier() && this.at('@', 1) && this.b.adjacent(1)) {
      return this.at('{', 2);
    }
    if (!this.at('@')) {
      return false;
    }
    return this.lookahead(() => {
      while (this.at('@')) {
        this.annotationSet();
      }
      if (!this.at('{')) {
        this.fail("expected '{'");
      }
    });
  }

  private lambdaArgument(): Parsed {
    const m = this.b.mark();
    while (this.at('@')) {
      this.b.add(m, this.annotationSet());
    }
    if (this.atIdentifier()) {
      this.b.advance(m);
      this.b.advance(m);
    }
    this.b.add(m, this.lambda());
    return this.b.done(m, RawKind.LambdaArg);
  }

  private valueArgs(): Parsed {
    return this.withTrailingLambdas(true, () => {
      const m = this.b.mark();
      this.expect(m, '(');
      this.commaList(m, ')', () => this.valueArg());
      this.expect(m, ')');
      return this.b.done(m, RawKind.ValueArgs);
    });
  }

  private valueArg(): Parsed {
    const m = this.b.mark();
    if (this.atIdentifier() && this.at('=', 1)) {
      this.b.advance(m);
      this.b.advance(m);
    }
    if (this.at('*')) {
      this.b.advance(m);
    }
    this.b.add(m, this.expression());
    return this.b.done(m, RawKind.ValueArg);
  }

  private primary(): Parsed {
    const t = this.b.peek();
    if (t === undefined) {
      return this.fail('unexpected end of input');
    }
    switch (t.token) {
      case TokenKind.Identifier:
        return this.typeReceiver() ?? this.b.token();
      case TokenKind.IntegerLiteral:
      case TokenKind.FloatLiteral:
      case TokenKind.CharLiteral:
        return this.b.token();
      case TokenKind.OpenQuote:
        return this.stringTemplate();
      case TokenKind.Keyword:
        return this.keywordExpression(t.substr);
      case TokenKind.Operator:
        return this.punctuationExpression(t.substr);
      default:
        return this.fail(`unexpected '${t.substr}'`);
    }
  }

  /**
   * `Foo<Bar>::class` and similar: a type with arguments before `::`.
   */
  private typeReceiver(): Parsed | null {
    if (!this.at('<', 1) && !this.at('.', 1)) {
      return null;
    }
    const type = this.speculate(() => {
      const parsed = this.userType('normal');
      if (!this.at('::') || !hasTypeArgs(parsed)) {
        this.fail('not a type receiver');
      }
      return parsed;
    });
    return type ? this.callableReference(type) : null;
  }

  private keywordExpression(text: string): Parsed {
    switch (text) {
      case 'true':
      case 'false':
      case 'null':
        return this.b.token();
      case 'this':
        return this.thisExpression();
      case 'super':
        return this.superExpression();
      case 'if':
        return this.ifExpression();
      case 'when':
        return this.whenExpression();
      case 'try':
        return this.tryExpression();
      case 'for':
        return this.forExpression();
      case 'while':
        return this.whileExpression();
      case 'do':
        return this.doWhileExpression();
      case 'throw':
        return this.jump(RawKind.Throw);
      case 'return':
        return this.jump(RawKind.Return);
      case 'continue':
        return this.jump(RawKind.Continue);
      case 'break':
        return this.jump(RawKind.Break);
      case 'object':
        return this.classDeclaration(this.b.mark(), false);
      case 'fun':
        return this.functionDeclaration(this.b.mark());
      default:
        return this.fail(`unexpected '${text}'`);
    }
  }

  private punctuationExpression(text: string): Parsed {
    switch (text) {
      case '(':
        return this.parenthesized();
      case '{':
        return this.lambda();
      case '[':
        return this.collectionLiteral();
      case '::':
        return this.callableReference(null);
      case '.':
        if (this.atKind(TokenKind.IntegerLiteral, 1) && this.b.adjacent(1)) {
          const m = this.b.mark();
          this.b.advance(m);
          this.b.advance(m);
          return this.b.done(
            m,
            RawKind.Unsupported,
            'float literal without integer part'
          );
        }
        return this.fail("unexpected '.'");
      default:
        return this.fail(`unexpected '${text}'`);
    }
  }

  private parenthesized(): Parsed {
    return this.withTrailingLambdas(true, () => {
      const m = this.b.mark();
      this.b.advance(m);
      this.b.add(m, this.expression());
      this.expect(m, ')');
      return this.b.done(m, RawKind.Parenthesized);
    });
  }

  private collectionLiteral(): Parsed {
    return this.withTrailingLambdas(true, () => {
      const m = this.b.mark();
      this.b.advance(m);
      this.commaList(m, ']', () => this.expression());
      this.expect(m, ']');
      return this.b.done(m, RawKind.CollectionLiteral);
    });
  }

  private label(m: Marker) {
    if (this.at('@') && this.b.adjacent() && this.b.adjacent(1)) {
      this.b.advance(m);
      this.expectIdentifier(m);
    }
  }

  private thisExpression(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    this.label(m);
    return this.b.done(m, RawKind.This);
  }

  private superExpression(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    if (this.at('<') && this.b.adjacent()) {
      this.b.advance(m);
      this.b.add(m, this.typeRef());
      this.expect(m, '>');
    }
    this.label(m);
    return this.b.done(m, RawKind.Super);
  }

  private startsJumpOperand(): boolean {
    if (this.b.eof() || this.b.separatedBefore()) {
      return false;
    }
    if (this.atKind(TokenKind.LongTemplateEnd)) {
      return false;
    }
    return ![')', ']', '}', ',', '->', 'else'].some((text) => this.at(text));
  }

  private jump(kind: RawKind): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    if (kind === RawKind.Throw) {
      this.b.add(m, this.expression());
      return this.b.done(m, kind);
    }
    this.label(m);
    if (kind === RawKind.Return && this.startsJumpOperand()) {
      this.b.add(m, this.expression());
    }
    return this.b.done(m, kind);
  }

  /**
   * A loop or branch body that is just `;` has no node to hold it.
   */
  private emptyBody(m: Marker, what: string): Parsed | null {
    if (!this.b.semicolonBefore()) {
      return null;
    }
    log(`${what} with an empty body at offset ${this.b.offset()}`);
    return this.b.done(m, RawKind.Unsupported, `${what} with an empty body`);
  }

  private parenthesizedCondition(m: Marker) {
    this.withTrailingLambdas(true, () => {
      this.expect(m, '(');
      this.b.add(m, this.expression());
      this.expect(m, ')');
    });
  }

  private ifExpression(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    this.parenthesizedCondition(m);
    const empty = this.emptyBody(m, 'if');
    if (empty) {
      return empty;
    }
    this.b.add(m, this.controlStructureBody());
    if (this.at('else') && !this.at('->', 1)) {
      this.b.advance(m);
      const emptyElse = this.emptyBody(m, 'else');
      if (emptyElse) {
        return emptyElse;
      }
      this.b.add(m, this.controlStructureBody());
    }
    return this.b.done(m, RawKind.If);
  }

  private whenExpression(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    if (this.at('(')) {
      this.b.advance(m);
      if (this.at('val') || this.at('var')) {
        this.b.add(m, this.propertyDeclaration(this.b.mark()));
      } else {
        this.b.add(m, this.expression());
      }
      this.expect(m, ')');
    }
    this.expect(m, '{');
    while (!this.at('}') && !this.b.eof()) {
      this.recovering(m, () => this.whenBranch());
    }
    this.expect(m, '}');
    return this.b.done(m, RawKind.When);
  }

  private whenBranch(): Parsed {
    const m = this.b.mark();
    if (this.at('else')) {
      this.b.advance(m);
    } else {
      this.commaList(m, '->', () => this.whenCondition());
    }
    this.expect(m, '->');
    this.b.add(m, this.controlStructureBody());
    return this.b.done(m, RawKind.WhenBranch);
  }

  private whenCondition(): Parsed {
    const m = this.b.mark();
    if (this.at('in') || this.at('!in')) {
      this.b.advance(m);
      this.b.add(m, this.expression());
    } else if (this.at('is') || this.at('!is')) {
      this.b.advance(m);
      this.b.add(m, this.typeRef());
    } else {
      this.b.add(m, this.expression());
    }
    return this.b.done(m, RawKind.WhenCondition);
  }

  private tryExpression(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    this.b.add(m, this.block());
    while (this.at('catch')) {
      const clause = this.b.mark();
      this.b.advance(clause);
      this.b.add(clause, this.valueParams());
      this.b.add(clause, this.block());
      this.b.add(m, this.b.done(clause, RawKind.Catch));
    }
    if (this.at('finally')) {
      this.b.advance(m);
      this.b.add(m, this.block());
    }
    return this.b.done(m, RawKind.Try);
  }

  private forExpression(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    this.expect(m, '(');
    this.b.add(m, this.lambdaParam());
    this.expect(m, 'in');
    this.b.add(m, this.expression());
    this.expect(m, ')');
    const empty = this.emptyBody(m, 'for');
    if (empty) {
      return empty;
    }
    this.b.add(m, this.controlStructureBody());
    return this.b.done(m, RawKind.For);
  }

  private whileExpression(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    this.parenthesizedCondition(m);
    const empty = this.emptyBody(m, 'while');
    if (empty) {
      return empty;
    }
    this.b.add(m, this.controlStructureBody());
    return this.b.done(m, RawKind.While);
  }

  private doWhileExpression(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    this.b.add(m, this.controlStructureBody());
    this.expect(m, 'while');
    this.parenthesizedCondition(m);
    return this.b.done(m, RawKind.DoWhile);
  }

  private lambda(): Parsed {
    return this.withTrailingLambdas(true, () => {
      const m = this.b.mark();
      this.expect(m, '{');
      if (this.at('->')) {
        this.b.advance(m);
      } else {
        const params = this.speculate(() => {
          const parsed = this.lambdaParams();
          if (!this.at('->')) {
            this.fail("expected '->'");
          }
          return parsed;
        });
        if (params) {
          this.b.add(m, params);
          this.b.advance(m);
        }
      }
      const body = this.b.mark();
      this.statementsInto(body, () => this.at('}'));
      if (body.children.length > 0) {
        this.b.add(m, this.b.done(body, RawKind.LambdaBody));
      }
      this.expect(m, '}');
      return this.b.done(m, RawKind.Lambda);
    });
  }

  private lambdaParams(): Parsed {
    const m = this.b.mark();
    this.commaList(m, '->', () => this.lambdaParam());
    return this.b.done(m, RawKind.LambdaParams);
  }

  private lambdaParam(): Parsed {
    const m = this.b.mark();
    if (this.at('(')) {
      this.b.advance(m);
      this.commaList(m, ')', () => this.lambdaParamVariable());
      this.expect(m, ')');
      if (this.at(':')) {
        this.b.advance(m);
        this.b.add(m, this.typeRef());
      }
    } else {
      this.b.add(m, this.lambdaParamVariable());
    }
    return this.b.done(m, RawKind.LambdaParam);
  }

  private lambdaParamVariable(): Parsed {
    const m = this.b.mark();
    const modifiers = this.modifierList('parameter');
    if (modifiers) {
      this.b.add(m, modifiers);
    }
    this.expectIdentifier(m);
    if (this.at(':')) {
      this.b.advance(m);
      this.b.add(m, this.typeRef());
    }
    return this.b.done(m, RawKind.LambdaParamVariable);
  }

  private stringTemplate(): Parsed {
    const m = this.b.mark();
    this.b.advance(m);
    while (!this.atKind(TokenKind.CloseQuote)) {
      if (this.atKind(TokenKind.ShortTemplateStart)) {
        const entry = this.b.mark();
        this.b.advance(entry);
        this.b.advance(entry);
        this.b.add(m, this.b.done(entry, RawKind.ShortTemplate));
      } else if (this.atKind(TokenKind.LongTemplateStart)) {
        const entry = this.b.mark();
        this.b.advance(entry);
        this.b.add(
          entry,
          this.withTrailingLambdas(true, () => this.expression())
        );
        this.expectKind(entry, TokenKind.LongTemplateEnd, "'}'");
        this.b.add(m, this.b.done(entry, RawKind.LongTemplate));
      } else if (
        this.atKind(TokenKind.StringText) ||
        this.atKind(TokenKind.EscapeSequence)
      ) {
        this.b.advance(m);
      } else {
        this.fail('unterminated string template');
      }
    }
    this.b.advance(m);
    return this.b.done(m, RawKind.StringTemplate);
  }
}

function hasModifier(modifiers: Parsed | null, text: string): boolean {
  const element = modifiers?.element;
  return (
    element instanceof RawNode &&
    element.children.some(
      (child) => !(child instanceof RawNode) && child.substr === text
    )
  );
}

function hasTypeArgs(parsed: Parsed): boolean {
  const { element } = parsed;
  if (!(element instanceof RawNode)) {
    return false;
  }
  return element.children.some(
    (child) =>
      child instanceof RawNode &&
      (child.kind === RawKind.TypeArgs ||
        hasTypeArgs({ leading: [], element: child }))
  );
}
