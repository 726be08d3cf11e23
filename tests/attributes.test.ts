import { sha256 } from "@noble/hashes/sha256";
import { describe, expect, it } from "vitest";
import {
  decodePayloadAttributes,
  decodePayloadId,
  encodePayloadAttributes,
} from "../src/codec/envelopeJson";
import { uint64BE } from "../src/codec/quantity";
import { payloadAttributesFromJson, payloadAttributesToJson } from "../src/codec/text";
import { JsonDecodeError } from "../src/errors";
import { type PayloadAttributes, payloadIdFor, payloadIdFromBytes } from "../src/model/attributes";
import { isPayloadId } from "../src/types/brands";
import { bytesToHex, concatBytes } from "../src/utils/bytes";
import { filled, mkWithdrawal } from "./helpers/payload";

const parent = filled(32, 0x01);

const mkAttributes = (overrides: Partial<PayloadAttributes> = {}): PayloadAttributes => ({
  timestamp: 0x0102n,
  prevRandao: filled(32, 0x02),
  suggestedFeeRecipient: filled(20, 0x03),
  ...overrides,
});

const expectedId = (...parts: Uint8Array[]) => {
  const preimage = concatBytes([parent, uint64BE(0x0102n), filled(32, 0x02), filled(20, 0x03), ...parts]);
  return bytesToHex(sha256(preimage).subarray(0, 8));
};

// rlp([[0, 0, 20 zero bytes, 0]])
const ONE_ZERO_WITHDRAWAL_RLP = Uint8Array.of(0xd9, 0xd8, 0x80, 0x80, 0x94, ...new Uint8Array(20), 0x80);

describe("payload id", () => {
  it("hashes parent, timestamp, randao and recipient", () => {
    const id = payloadIdFor(parent, mkAttributes());
    expect(id).toBe(expectedId());
    expect(isPayloadId(id)).toBe(true);
  });

  it("appends the rlp of the withdrawals when present", () => {
    const id = payloadIdFor(parent, mkAttributes({ withdrawals: [mkWithdrawal()] }));
    expect(id).toBe(expectedId(ONE_ZERO_WITHDRAWAL_RLP));
  });

  it("tells absent withdrawals from an empty list", () => {
    const empty = payloadIdFor(parent, mkAttributes({ withdrawals: [] }));
    expect(empty).toBe(expectedId(Uint8Array.of(0xc0)));
    expect(empty).not.toBe(payloadIdFor(parent, mkAttributes()));
  });

  it("appends the parent beacon block root", () => {
    const root = filled(32, 0x04);
    expect(payloadIdFor(parent, mkAttributes({ parentBeaconBlockRoot: root }))).toBe(expectedId(root));
  });

  it("is stable", () => {
    expect(payloadIdFor(parent, mkAttributes())).toBe(payloadIdFor(parent, mkAttributes()));
  });

  it("renders ids as lowercase hex", () => {
    expect(payloadIdFromBytes(Uint8Array.of(0, 1, 2, 3, 0xab, 0xcd, 0xef, 0xff))).toBe("0x00010203abcdefff");
    expect(decodePayloadId("0x00010203ABCDEFFF")).toBe("0x00010203abcdefff");
  });

  it("rejects ids of the wrong length", () => {
    expect(() => decodePayloadId("0x0102")).toThrow(JsonDecodeError);
    expect(() => payloadIdFromBytes(new Uint8Array(7))).toThrow(RangeError);
  });
});

describe("payload attributes JSON", () => {
  it("omits absent optional fields", () => {
    expect(encodePayloadAttributes(mkAttributes())).toEqual({
      timestamp: "0x102",
      prevRandao: `0x${"02".repeat(32)}`,
      suggestedFeeRecipient: `0x${"03".repeat(20)}`,
    });
  });

  it("round-trips every field", () => {
    const attributes = mkAttributes({
      withdrawals: [mkWithdrawal({ index: 4n, amount: 32n })],
      parentBeaconBlockRoot: filled(32, 0x09),
    });
    expect(payloadAttributesFromJson(payloadAttributesToJson(attributes))).toEqual(attributes);
  });

  it("keeps an empty withdrawal list", () => {
    const decoded = decodePayloadAttributes(encodePayloadAttributes(mkAttributes({ withdrawals: [] })));
    expect(decoded.withdrawals).toEqual([]);
    expect("parentBeaconBlockRoot" in decoded).toBe(false);
  });
});
