// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Hex = `0x${string}`;

/** Opaque 8-byte token correlating an in-flight payload build; equality only. */
export type PayloadId = Brand<Hex, "PayloadId">;

const PAYLOAD_ID_RE = /^0x[0-9a-f]{16}$/;

export const isPayloadId = (s: string): s is PayloadId => PAYLOAD_ID_RE.test(s);

export const asPayloadId = (s: string): PayloadId => {
  const lower = s.toLowerCase();
  if (!isPayloadId(lower)) throw new RangeError(`payload id must be 8 bytes of hex, got ${s}`);
  return lower;
};
