// EUI-48 value type

import { Eui48, EUI48_LEN, MacAddressFormat } from "./constants";
import { isParseError } from "./errors";
import {
  formatOctets, toCanonical, toHexString, toDotString, toHexadecimal,
} from "./format";
import { ParseOptions, parseOctets } from "./parse";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME  = 0x01000193;

/**
 * An immutable IEEE EUI-48 (MAC-48) address.
 *
 * Two instances with the same octets are interchangeable: `equals`, `compare`
 * and `hashCode` look only at the octets, and the value keeps no trace of the
 * notation it was parsed from. Use {@link MacAddressMap} / {@link MacAddressSet}
 * to key collections by address.
 */
export class MacAddress {
  private readonly eui: Eui48;

  private constructor(eui: Eui48) {
    this.eui = Object.freeze(eui);
    Object.freeze(this);
  }

  // ────────── construction ──────────

  /** Wrap six octets verbatim. Each value is reduced to its low 8 bits. */
  static fromOctets(octets: Eui48): MacAddress {
    const b = (i: number): number => octets[i] & 0xff;
    return new MacAddress([b(0), b(1), b(2), b(3), b(4), b(5)]);
  }

  /** `00:00:00:00:00:00` */
  static zero(): MacAddress {
    return ZERO;
  }

  /** `FF:FF:FF:FF:FF:FF` */
  static broadcast(): MacAddress {
    return BROADCAST;
  }

  /**
   * Parse colon (`01:02:03:0A:0B:0F`), hyphen (`01-02-03-0A-0B-0F`),
   * dot (`0102.030A.0B0F`) or bare hex (`0x01020304050F`, `01020304050F`)
   * notation, in any letter case.
   *
   * @throws ParseError
   */
  static parse(text: string, options?: ParseOptions): MacAddress {
    return new MacAddress(parseOctets(text, options));
  }

  /** Like {@link MacAddress.parse}, but returns undefined instead of throwing. */
  static tryParse(text: string, options?: ParseOptions): MacAddress | undefined {
    try {
      return MacAddress.parse(text, options);
    } catch (err) {
      if (isParseError(err)) return undefined;
      throw err;
    }
  }

  static isValid(text: string, options?: ParseOptions): boolean {
    return MacAddress.tryParse(text, options) !== undefined;
  }

  /** Lexicographic octet order, for `Array.prototype.sort`. */
  static compare(a: MacAddress, b: MacAddress): number {
    for (let i = 0; i < EUI48_LEN; i++) {
      if (a.eui[i] !== b.eui[i]) return a.eui[i] < b.eui[i] ? -1 : 1;
    }
    return 0;
  }

  // ────────── accessors ──────────

  get octets(): Eui48 {
    return this.eui;
  }

  /** A mutable copy of the octets. */
  toOctets(): [number, number, number, number, number, number] {
    return [...this.eui];
  }

  toBytes(): Buffer {
    return Buffer.from(this.eui);
  }

  /** The address as a 48-bit unsigned integer, octet 0 most significant. */
  toNumber(): number {
    let n = 0;
    for (const b of this.eui) n = n * 256 + b;
    return n;
  }

  isZero(): boolean {
    return this.eui.every(b => b === 0);
  }

  isBroadcast(): boolean {
    return this.eui.every(b => b === 0xff);
  }

  // ────────── formatting ──────────

  toCanonical(): string {
    return toCanonical(this.eui);
  }

  toHexString(): string {
    return toHexString(this.eui);
  }

  toDotString(): string {
    return toDotString(this.eui);
  }

  toHexadecimal(): string {
    return toHexadecimal(this.eui);
  }

  format(style: MacAddressFormat): string {
    return formatOctets(this.eui, style);
  }

  toString(): string {
    return this.toCanonical();
  }

  toJSON(): string {
    return this.toCanonical();
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return `MacAddress(${JSON.stringify(this.toCanonical())})`;
  }

  // ────────── equality, order, hash ──────────

  equals(other: MacAddress): boolean {
    return MacAddress.compare(this, other) === 0;
  }

  compare(other: MacAddress): number {
    return MacAddress.compare(this, other);
  }

  /** 32-bit FNV-1a over the octets. */
  hashCode(): number {
    let h = FNV_OFFSET;
    for (const b of this.eui) {
      h ^= b;
      h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
  }
}

const ZERO = MacAddress.fromOctets([0, 0, 0, 0, 0, 0]);
const BROADCAST = MacAddress.fromOctets([0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);

/** @see MacAddress.parse */
export function parse(text: string, options?: ParseOptions): MacAddress {
  return MacAddress.parse(text, options);
}
