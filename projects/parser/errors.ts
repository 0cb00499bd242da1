export class LexError extends Error {
  offset: number;
  description: string;
  constructor(description: string, offset: number) {
    super();
    this.description = description;
    this.offset = offset;
  }
  get message() {
    return `LexError: ${this.description} at offset ${this.offset}`;
  }
}

export type SyntaxErrorEntry = { description: string; offset: number };

/**
 * All syntax errors found in one input, in source order.
 */
export class ParseError extends Error {
  errors: SyntaxErrorEntry[];
  fileName: string;
  constructor(errors: SyntaxErrorEntry[], fileName = '<input>') {
    super();
    this.errors = errors;
    this.fileName = fileName;
  }
  get message() {
    const lines = this.errors.map(
      ({ description, offset }) => `  ${this.fileName}:${offset}: ${description}`
    );
    return `ParseError: ${this.errors.length} syntax error(s)\n${lines.join(
      '\n'
    )}`;
  }
}

/**
 * Raised for source the parser recognizes but the node model does not
 * represent. Callers working through many inputs may skip them.
 */
export class UnsupportedConstructError extends Error {
  construct: string;
  offset: number | null;
  constructor(construct: string, offset: number | null = null) {
    super();
    this.construct = construct;
    this.offset = offset;
  }
  get message() {
    const at = this.offset === null ? '' : ` at offset ${this.offset}`;
    return `UnsupportedConstructError: ${this.construct}${at}`;
  }
}
