export * from './ast/nodes';
export * from './ast/builders';
export * from './ast/node-util';
export * from './ast/keywords';
export { SLOTS, childNodes, slotNodes } from './ast/slots';
export { InvariantError, UnrecognizedNodeError } from './ast/errors';
export { MutableExtrasMap } from './ast/extras-map';
export type { ExtrasMap } from './ast/extras-map';
export { NodePath } from './ast/node-path';
export { Visitor, preorderIter } from './ast/visitor';
export { MutableVisitor } from './ast/mutable-visitor';
export type {
  MutableVisitorOptions,
  MutationHook,
  Rebuilt,
} from './ast/mutable-visitor';
export {
  Writer,
  defaultNewlineCriteria,
  defaultSeparatorCriteria,
  defaultSpaceCriteria,
} from './ast/writer';
export { Dumper, qualifiedName } from './ast/dumper';
export type { DumpOptions } from './ast/dumper';
export { KotlinParser } from './parser/parser';
export type {
  FrontEndError,
  ParseOptions,
  ParseOutput,
  ScriptParseOutput,
} from './parser/parser';
export {
  LexError,
  ParseError,
  UnsupportedConstructError,
} from './parser/errors';
export type { SyntaxErrorEntry } from './parser/errors';
export { logger, useColors } from './utils/debug';
