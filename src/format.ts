// EUI-48 formatter: uppercase digits, two per octet

import {
  Eui48, MacAddressFormat,
  HEX_PREFIX, SEP_COLON, SEP_HYPHEN, SEP_DOT,
} from "./constants";

export function hexOctet(b: number): string {
  return b.toString(16).toUpperCase().padStart(2, "0");
}

/** `12:34:56:AB:CD:EF` */
export function toCanonical(o: Eui48): string {
  return o.map(hexOctet).join(SEP_COLON);
}

/** `12-34-56-AB-CD-EF` */
export function toHexString(o: Eui48): string {
  return o.map(hexOctet).join(SEP_HYPHEN);
}

/** `1234.56AB.CDEF` */
export function toDotString(o: Eui48): string {
  return [
    hexOctet(o[0]) + hexOctet(o[1]),
    hexOctet(o[2]) + hexOctet(o[3]),
    hexOctet(o[4]) + hexOctet(o[5]),
  ].join(SEP_DOT);
}

/** `0x123456ABCDEF`: the prefix is always present and stays lowercase. */
export function toHexadecimal(o: Eui48): string {
  return HEX_PREFIX + o.map(hexOctet).join("");
}

export function formatOctets(o: Eui48, style: MacAddressFormat): string {
  switch (style) {
    case "canonical":   return toCanonical(o);
    case "hex-string":  return toHexString(o);
    case "dot":         return toDotString(o);
    case "hexadecimal": return toHexadecimal(o);
  }
}
