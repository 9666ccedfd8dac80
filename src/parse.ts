// EUI-48 parser: separator-based style detection, one strict grammar per style

import {
  Eui48, ParseStyle,
  HEX_DIGITS, HEX_PREFIX,
  SEP_COLON, SEP_HYPHEN, SEP_DOT,
  OCTET_GROUPS, OCTET_DIGITS, DOT_GROUPS, DOT_DIGITS,
} from "./constants";
import {
  ParseError,
  ERR_EMPTY, ERR_LENGTH, ERR_DIGIT, ERR_SEPARATOR,
} from "./errors";
import { parseLog } from "./log";

export interface ParseOptions {
  /** Strip surrounding whitespace before parsing. Off by default, so such input is rejected. */
  trim?: boolean;
}

// ────────── helpers ──────────

/** Value of a hex digit code unit, or -1 when it is not one. */
export function hexValue(cu: number): number {
  if (cu >= 0x30 && cu <= 0x39) return cu - 0x30;
  if (cu >= 0x41 && cu <= 0x46) return cu - 0x37;
  if (cu >= 0x61 && cu <= 0x66) return cu - 0x57;
  return -1;
}

function reject(err: ParseError): ParseError {
  parseLog("rejected %o: %s (%s)", err.input, err.code, err.message);
  return err;
}

function invalidChar(input: string, pos: number): ParseError {
  return reject(new ParseError(
    ERR_DIGIT, input,
    `invalid character ${JSON.stringify(input[pos])} at offset ${pos}`,
    { position: pos },
  ));
}

function separatorStyle(ch: string): ParseStyle | null {
  switch (ch) {
    case SEP_COLON:  return "colon";
    case SEP_HYPHEN: return "hyphen";
    case SEP_DOT:    return "dot";
    default:         return null;
  }
}

/** Decode 12 already-validated hex digits. */
function octetsFromHex(hex: string): Eui48 {
  const o = (i: number): number =>
    (hexValue(hex.charCodeAt(2 * i)) << 4) | hexValue(hex.charCodeAt(2 * i + 1));
  return [o(0), o(1), o(2), o(3), o(4), o(5)];
}

function hasHexPrefix(input: string): boolean {
  return input.length >= HEX_PREFIX.length
    && input[0] === HEX_PREFIX[0]
    && input[1].toLowerCase() === HEX_PREFIX[1];
}

// ────────── style detection ──────────

/**
 * Select the grammar for `input` from the separators it contains.
 * Throws ERR_SEPARATOR when more than one kind of separator appears.
 */
export function detectStyle(input: string): ParseStyle {
  let style: ParseStyle = "bare";
  let sep: string | null = null;
  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    const s = separatorStyle(ch);
    if (s === null) continue;
    if (sep === null) {
      sep = ch;
      style = s;
    } else if (ch !== sep) {
      throw reject(new ParseError(
        ERR_SEPARATOR, input,
        `mixed separators ${JSON.stringify(sep)} and ${JSON.stringify(ch)} at offset ${i}`,
        { position: i },
      ));
    }
  }
  return style;
}

// ────────── grammars ──────────

function parseSeparated(input: string, sep: string, groups: number, digits: number): Eui48 {
  for (let i = 0; i < input.length; i++) {
    if (input[i] !== sep && hexValue(input.charCodeAt(i)) < 0) throw invalidChar(input, i);
  }
  const parts = input.split(sep);
  if (parts.length !== groups) {
    throw reject(new ParseError(
      ERR_LENGTH, input,
      `expected ${groups} groups, found ${parts.length}`,
      { expected: groups, found: parts.length },
    ));
  }
  let off = 0;
  for (let g = 0; g < parts.length; g++) {
    const n = parts[g].length;
    if (n !== digits) {
      throw reject(new ParseError(
        ERR_LENGTH, input,
        `group ${g}: expected ${digits} hex digits, found ${n}`,
        { expected: digits, found: n, group: g, position: off },
      ));
    }
    off += n + sep.length;
  }
  return octetsFromHex(parts.join(""));
}

function parseBare(input: string): Eui48 {
  const start = hasHexPrefix(input) ? HEX_PREFIX.length : 0;
  for (let i = start; i < input.length; i++) {
    if (hexValue(input.charCodeAt(i)) < 0) throw invalidChar(input, i);
  }
  const n = input.length - start;
  if (n !== HEX_DIGITS) {
    throw reject(new ParseError(
      ERR_LENGTH, input,
      `expected ${HEX_DIGITS} hex digits, found ${n}`,
      { expected: HEX_DIGITS, found: n },
    ));
  }
  return octetsFromHex(input.slice(start));
}

/** Parse `input` with the grammar of a known style, skipping detection. */
export function parseAs(input: string, style: ParseStyle): Eui48 {
  switch (style) {
    case "colon":  return parseSeparated(input, SEP_COLON, OCTET_GROUPS, OCTET_DIGITS);
    case "hyphen": return parseSeparated(input, SEP_HYPHEN, OCTET_GROUPS, OCTET_DIGITS);
    case "dot":    return parseSeparated(input, SEP_DOT, DOT_GROUPS, DOT_DIGITS);
    case "bare":   return parseBare(input);
  }
}

// ────────── public parser API ──────────

/** Parse any supported notation into its six octets. */
export function parseOctets(text: string, options: ParseOptions = {}): Eui48 {
  const input = options.trim ? text.trim() : text;
  if (input.length === 0) throw reject(new ParseError(ERR_EMPTY, input, "empty input"));
  const style = detectStyle(input);
  const octets = parseAs(input, style);
  parseLog("parsed %o as %s", input, style);
  return octets;
}
