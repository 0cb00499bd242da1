import {
  makeConstantLiteralExpression,
  makeKeyword,
  makeKotlinFile,
  makeKotlinScript,
  makeNameExpression,
  makePropertyDeclaration,
  makeSimpleType,
  makeTypeRef,
  makeVariable,
} from '../builders';
import { is } from '../node-util';
import { SLOTS } from '../slots';
import { preorderIter } from '../visitor';
import type {
  ASTNode,
  ConstantLiteralExpression,
  Declaration,
  Expression,
  KotlinFile,
  KotlinScript,
  NodeByName,
  NodeName,
  PropertyDeclaration,
  Statement,
  TypeRef,
} from '../nodes';

export function int(text: string): ConstantLiteralExpression {
  return makeConstantLiteralExpression({ text, form: 'int' });
}

export function typeRef(typeName: string): TypeRef {
  return makeTypeRef({
    lPar: null,
    modifiers: null,
    type: makeSimpleType({
      qualifiers: [],
      name: makeNameExpression(typeName),
      typeArgs: null,
    }),
    rPar: null,
  });
}

export function property(
  varName: string,
  initializer: Expression | null = null,
  typeName: string | null = null
): PropertyDeclaration {
  return makePropertyDeclaration({
    modifiers: null,
    valOrVarKeyword: makeKeyword('val'),
    typeParams: null,
    receiverTypeRef: null,
    lPar: null,
    variables: [
      makeVariable({
        name: makeNameExpression(varName),
        typeRef: typeName === null ? null : typeRef(typeName),
      }),
    ],
    trailingComma: null,
    rPar: null,
    typeConstraintSet: null,
    equals: initializer === null ? null : makeKeyword('='),
    initializer,
    propertyDelegate: null,
    accessors: [],
  });
}

export function file(...declarations: Declaration[]): KotlinFile {
  return makeKotlinFile({
    annotationSets: [],
    packageDirective: null,
    importDirectives: null,
    declarations,
  });
}

export function script(...statements: Statement[]): KotlinScript {
  return makeKotlinScript({
    annotationSets: [],
    packageDirective: null,
    importDirectives: null,
    statements,
  });
}

export function assertKind<N extends NodeName>(
  node: ASTNode | null | undefined,
  name: N
): NodeByName<N> {
  if (!node || !is(name)(node)) {
    throw new Error(`expected ${name}, found ${node?.name ?? node}`);
  }
  return node;
}

/**
 * A node of a kind the model does not have.
 */
export function bogusNode(): ASTNode {
  return JSON.parse('{"name": "Bogus", "fields": {}}');
}

/**
 * Field keys that hold nodes but are missing from the slot table, and
 * slot names that are not field keys, for every node under `root`.
 */
export function slotMismatches(root: ASTNode): string[] {
  const problems: string[] = [];
  for (const node of preorderIter(root)) {
    const slots: readonly string[] = SLOTS[node.name];
    const fields: Readonly<Record<string, unknown>> = node.fields;
    for (const [key, value] of Object.entries(fields)) {
      const holdsNodes =
        Array.isArray(value) || (typeof value === 'object' && value !== null);
      if (holdsNodes && !slots.includes(key)) {
        problems.push(`${node.name}.${key} is not a slot`);
      }
    }
    for (const slot of slots) {
      if (!(slot in fields)) {
        problems.push(`${node.name}.${slot} is not a field`);
      }
    }
  }
  return problems;
}
