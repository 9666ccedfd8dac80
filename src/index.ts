// eui48-mac: public API

export { ParseError, isParseError } from "./errors";
export {
  ERR_EMPTY,
  ERR_LENGTH,
  ERR_DIGIT,
  ERR_SEPARATOR,
} from "./errors";
export type { ParseErrorCode, ParseErrorDetail } from "./errors";

export { EUI48_LEN, MAC_ADDRESS_FORMATS } from "./constants";
export type { Eui48, MacAddressFormat, ParseStyle } from "./constants";

export { MacAddress, parse } from "./mac-address";
export { MacAddressMap, MacAddressSet } from "./collections";
export { detectStyle, parseAs } from "./parse";
export type { ParseOptions } from "./parse";
export { formatOctets } from "./format";
export {
  MacAddressSchema,
  MacAddressStringSchema,
  MacOctetsSchema,
} from "./schema";
export type { MacAddressInput } from "./schema";
