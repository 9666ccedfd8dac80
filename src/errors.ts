// EUI-48 parse error codes and ParseError class

export const ERR_EMPTY     = "ERR_EMPTY";
export const ERR_LENGTH    = "ERR_LENGTH";
export const ERR_DIGIT     = "ERR_DIGIT";
export const ERR_SEPARATOR = "ERR_SEPARATOR";

export type ParseErrorCode =
  | typeof ERR_EMPTY
  | typeof ERR_LENGTH
  | typeof ERR_DIGIT
  | typeof ERR_SEPARATOR;

/** Where and how an input diverged from the grammar of its style. */
export interface ParseErrorDetail {
  /** Count the grammar wanted (groups, or digits in a group or in total) */
  expected?: number;
  /** Count actually present */
  found?: number;
  /** Offset of the offending character in the input */
  position?: number;
  /** Zero-based index of the offending group */
  group?: number;
}

export class ParseError extends Error {
  readonly code: ParseErrorCode;
  readonly input: string;
  readonly expected?: number;
  readonly found?: number;
  readonly position?: number;
  readonly group?: number;

  constructor(code: ParseErrorCode, input: string, msg?: string, detail: ParseErrorDetail = {}) {
    super(msg || code);
    this.code = code;
    this.input = input;
    this.expected = detail.expected;
    this.found = detail.found;
    this.position = detail.position;
    this.group = detail.group;
    this.name = "ParseError";
  }
}

export function isParseError(err: unknown): err is ParseError {
  return err instanceof ParseError;
}
