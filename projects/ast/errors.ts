/**
 * Thrown when a node is built with a field combination its kind does not allow.
 */
export class InvariantError extends Error {
  node: { name: string };
  constructor(node: { name: string }, message: string) {
    super(`${node.name}: ${message}`);
    this.name = 'InvariantError';
    this.node = node;
  }
}

/**
 * Thrown by a traversal that meets a node kind it has no case for.
 */
export class UnrecognizedNodeError extends Error {
  node: unknown;
  constructor(node: unknown, where: string) {
    super(`${where}: unrecognized node ${describe(node)}`);
    this.name = 'UnrecognizedNodeError';
    this.node = node;
  }
}

function describe(node: unknown): string {
  if (typeof node === 'object' && node !== null && 'name' in node) {
    return String(node.name);
  }
  return JSON.stringify(node) ?? String(node);
}

export function unrecognized(node: never, where: string): never {
  throw new UnrecognizedNodeError(node, where);
}
