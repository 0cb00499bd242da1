import keywordNames from './keywords.json';
import type {
  AnnotationTargetText,
  BinaryOperatorText,
  BinaryTypeOperatorText,
  ClassDeclarationKeywordText,
  DelegationTargetText,
  KeywordText,
  ModifierKeywordText,
  PostfixOperatorText,
  PrefixOperatorText,
  ValOrVarText,
  WhenConditionOperatorText,
} from './nodes';

const keywordTable: Readonly<Record<KeywordText, string>> = keywordNames;

export function isKeywordText(text: string): text is KeywordText {
  return Object.prototype.hasOwnProperty.call(keywordTable, text);
}

/**
 * The name a keyword is listed under in dumps, e.g. `Equal` for `=`.
 */
export function keywordDisplayName(text: KeywordText): string {
  return keywordTable[text];
}

function textGuard<T extends KeywordText>(texts: readonly T[]) {
  const set: ReadonlySet<string> = new Set(texts);
  return (text: string): text is T => set.has(text);
}

export const MODIFIER_KEYWORDS: readonly ModifierKeywordText[] = [
  'abstract',
  'final',
  'open',
  'annotation',
  'sealed',
  'data',
  'override',
  'lateinit',
  'inner',
  'enum',
  'companion',
  'value',
  'private',
  'protected',
  'public',
  'internal',
  'in',
  'out',
  'noinline',
  'crossinline',
  'vararg',
  'reified',
  'tailrec',
  'operator',
  'infix',
  'inline',
  'external',
  'suspend',
  'const',
  'fun',
  'actual',
  'expect',
];
export const isModifierKeywordText = textGuard(MODIFIER_KEYWORDS);

export const isAnnotationTargetText = textGuard<AnnotationTargetText>([
  'field',
  'file',
  'property',
  'get',
  'set',
  'receiver',
  'param',
  'setparam',
  'delegate',
]);

export const isPrefixOperatorText = textGuard<PrefixOperatorText>([
  '+',
  '-',
  '++',
  '--',
  '!',
]);

export const isPostfixOperatorText = textGuard<PostfixOperatorText>([
  '++',
  '--',
  '!!',
]);

export const isBinaryTypeOperatorText = textGuard<BinaryTypeOperatorText>([
  'as',
  'as?',
  'is',
  '!is',
]);

export const isBinaryOperatorText = textGuard<BinaryOperatorText>([
  '*',
  '/',
  '%',
  '+',
  '-',
  'in',
  '!in',
  '>',
  '>=',
  '<',
  '<=',
  '==',
  '!=',
  '===',
  '!==',
  '=',
  '*=',
  '/=',
  '%=',
  '+=',
  '-=',
  '||',
  '&&',
  '?:',
  '..',
  '..<',
  '.',
  '?.',
]);

export const isValOrVarText = textGuard<ValOrVarText>(['val', 'var']);

export const isClassDeclarationKeywordText =
  textGuard<ClassDeclarationKeywordText>(['class', 'object', 'interface']);

export const isDelegationTargetText = textGuard<DelegationTargetText>([
  'this',
  'super',
]);

export const isWhenConditionOperatorText =
  textGuard<WhenConditionOperatorText>(['in', '!in', 'is', '!is']);
