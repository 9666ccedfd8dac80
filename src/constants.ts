// EUI-48 constants

/** Octets in an EUI-48 address */
export const EUI48_LEN = 6;

/** The six octets of an address, in transmission order */
export type Eui48 = readonly [number, number, number, number, number, number];

/** Hex digits in the bare form */
export const HEX_DIGITS = EUI48_LEN * 2;

/** Prefix accepted (either case) by the bare form and emitted by toHexadecimal() */
export const HEX_PREFIX = "0x";

/** Separator characters and the style each one selects */
export const SEP_COLON  = ":";
export const SEP_HYPHEN = "-";
export const SEP_DOT    = ".";

/** Group layout per separated style */
export const OCTET_GROUPS  = 6;
export const OCTET_DIGITS  = 2;
export const DOT_GROUPS    = 3;
export const DOT_DIGITS    = 4;

/** Textual notations recognised by the parser */
export type ParseStyle = "colon" | "hyphen" | "dot" | "bare";

/** Renderings produced by the formatter */
export type MacAddressFormat = "canonical" | "hex-string" | "dot" | "hexadecimal";

export const MAC_ADDRESS_FORMATS: readonly MacAddressFormat[] = [
  "canonical",
  "hex-string",
  "dot",
  "hexadecimal",
];
