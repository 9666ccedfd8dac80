import { z } from "zod";
import { isParseError } from "./errors";
import { MacAddress } from "./mac-address";

/* =========================
 * Serialized forms
 * ========================= */

function tryDecode(text: string, ctx: z.RefinementCtx): MacAddress | undefined {
  try {
    return MacAddress.parse(text);
  } catch (err) {
    if (!isParseError(err)) throw err;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err.message,
      params: { code: err.code },
    });
    return undefined;
  }
}

/** Any notation `parse` accepts; the output is the input string unchanged. */
export const MacAddressStringSchema = z.string().superRefine((text, ctx) => {
  tryDecode(text, ctx);
});

/** Any notation `parse` accepts, decoded to a MacAddress. */
export const MacAddressSchema = z.string().transform((text, ctx) => {
  const mac = tryDecode(text, ctx);
  return mac ?? z.NEVER;
});

const OctetSchema = z.number().int().min(0).max(255);

/** Six octets as a JSON array, decoded to a MacAddress. */
export const MacOctetsSchema = z
  .tuple([OctetSchema, OctetSchema, OctetSchema, OctetSchema, OctetSchema, OctetSchema])
  .transform(octets => MacAddress.fromOctets(octets));

export type MacAddressInput = z.input<typeof MacAddressSchema>;
