import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  decodeExecutionPayloadSsz,
  decodePayloadV1Ssz,
  decodePayloadV2Ssz,
  decodePayloadV3Ssz,
  encodeExecutionPayloadSsz,
  encodePayloadV1Ssz,
  encodePayloadV2Ssz,
  encodePayloadV3Ssz,
  withdrawalSsz,
} from "../src/codec/payloadSsz";
import { readUint32LE, writeUint32LE } from "../src/codec/quantity";
import { deserialize, serialize } from "../src/codec/ssz";
import { SszDecodeError } from "../src/errors";
import { fromV2 } from "../src/model/payload";
import { arbPayloadV3 } from "./helpers/arbitraries";
import { filled, mkPayloadV1, mkPayloadV2, mkPayloadV3, mkWithdrawal } from "./helpers/payload";
import { oracleV1, oracleV2, oracleV3 } from "./helpers/sszOracle";

const decodeError = (fn: () => unknown): SszDecodeError => {
  try {
    fn();
  } catch (err) {
    if (err instanceof SszDecodeError) return err;
    throw err;
  }
  throw new Error("expected an SszDecodeError");
};

describe("payload layouts", () => {
  it("has fixed parts of 548, 552 and 568 bytes", () => {
    expect(encodePayloadV1Ssz(mkPayloadV1()).length).toBe(548);
    expect(encodePayloadV2Ssz(mkPayloadV2()).length).toBe(552);
    expect(encodePayloadV3Ssz(mkPayloadV3()).length).toBe(568);
    expect(serialize(withdrawalSsz, mkWithdrawal()).length).toBe(44);
  });

  it("points variable fields into the tail in declaration order", () => {
    const out = encodePayloadV1Ssz(
      mkPayloadV1({ extraData: Uint8Array.of(0xaa, 0xbb), transactions: [Uint8Array.of(1, 2, 3)] }),
    );
    expect(out.length).toBe(557);
    expect(readUint32LE(out, 436)).toBe(548);
    expect(readUint32LE(out, 504)).toBe(550);
    expect([...out.subarray(548, 550)]).toEqual([0xaa, 0xbb]);
    // transactions: one offset, then the body
    expect(readUint32LE(out, 550)).toBe(4);
    expect([...out.subarray(554)]).toEqual([1, 2, 3]);
  });

  it("appends withdrawals after the base fields", () => {
    const out = encodePayloadV2Ssz(mkPayloadV2({ withdrawals: [mkWithdrawal({ index: 9n })] }));
    expect(readUint32LE(out, 548)).toBe(552);
    expect(out.length).toBe(596);
    expect(out[552]).toBe(9);
  });

  it("keeps chain-specific fields in every version", () => {
    const inner = mkPayloadV1({ difficulty: 17n, nonce: filled(8, 0x42) });
    const v2 = mkPayloadV2({ payloadInner: inner });
    const v3 = mkPayloadV3({ payloadInner: v2, blobGasUsed: 131072n, excessBlobGas: 3n });
    expect(decodePayloadV1Ssz(encodePayloadV1Ssz(inner))).toEqual(inner);
    expect(decodePayloadV2Ssz(encodePayloadV2Ssz(v2))).toEqual(v2);
    expect(decodePayloadV3Ssz(encodePayloadV3Ssz(v3))).toEqual(v3);
  });

  it("round-trips arbitrary V3 payloads", () => {
    fc.assert(
      fc.property(arbPayloadV3, (p) => {
        expect(decodePayloadV3Ssz(encodePayloadV3Ssz(p))).toEqual(p);
      }),
      { numRuns: 50 },
    );
  });

  it("dispatches on the version the caller names", () => {
    const p = fromV2(mkPayloadV2({ withdrawals: [mkWithdrawal({ amount: 32n })] }));
    expect(decodeExecutionPayloadSsz("v2", encodeExecutionPayloadSsz(p))).toEqual(p);
  });
});

describe("reference encoding", () => {
  it("matches the reference containers byte for byte", () => {
    fc.assert(
      fc.property(arbPayloadV3, (p) => {
        const v2 = p.payloadInner;
        expect(encodePayloadV1Ssz(v2.payloadInner)).toEqual(oracleV1(v2.payloadInner));
        expect(encodePayloadV2Ssz(v2)).toEqual(oracleV2(v2));
        expect(encodePayloadV3Ssz(p)).toEqual(oracleV3(p));
      }),
      { numRuns: 25 },
    );
  });
});

describe("decode failures", () => {
  it("rejects a buffer shorter than the fixed part", () => {
    const err = decodeError(() => decodePayloadV1Ssz(new Uint8Array(100)));
    expect(err.code).toBe("SSZ_LENGTH");
    expect(err.field).toBe("ExecutionPayloadV1.receiptsRoot");
  });

  it("rejects a first offset that does not end the fixed part", () => {
    const out = encodePayloadV1Ssz(mkPayloadV1({ extraData: filled(4, 1) }));
    writeUint32LE(out, 436, 549);
    const err = decodeError(() => decodePayloadV1Ssz(out));
    expect(err.code).toBe("SSZ_OFFSET");
    expect(err.field).toBe("ExecutionPayloadV1.extraData");
  });

  it("rejects an all-zero head", () => {
    const err = decodeError(() => decodePayloadV1Ssz(new Uint8Array(548)));
    expect(err.code).toBe("SSZ_OFFSET");
    expect(err.field).toBe("ExecutionPayloadV1.extraData");
  });

  it("rejects decreasing offsets", () => {
    const out = encodePayloadV1Ssz(mkPayloadV1({ extraData: filled(4, 1) }));
    writeUint32LE(out, 504, 547);
    const err = decodeError(() => decodePayloadV1Ssz(out));
    expect(err.code).toBe("SSZ_OFFSET");
    expect(err.field).toBe("ExecutionPayloadV1.transactions");
  });

  it("rejects an offset past the end", () => {
    const out = encodePayloadV1Ssz(mkPayloadV1());
    writeUint32LE(out, 504, 600);
    const err = decodeError(() => decodePayloadV1Ssz(out));
    expect(err.code).toBe("SSZ_OFFSET");
    expect(err.field).toBe("ExecutionPayloadV1.transactions");
  });

  it("rejects trailing bytes after a fixed-size container", () => {
    const err = decodeError(() => deserialize(withdrawalSsz, new Uint8Array(45), "Withdrawal"));
    expect(err.code).toBe("SSZ_LENGTH");
    expect(err.field).toBe("Withdrawal.amount");
  });

  it("rejects a withdrawal list that is not a whole number of elements", () => {
    const good = encodePayloadV2Ssz(mkPayloadV2());
    const out = new Uint8Array(good.length + 10);
    out.set(good);
    const err = decodeError(() => decodePayloadV2Ssz(out));
    expect(err.code).toBe("SSZ_LENGTH");
    expect(err.field).toBe("ExecutionPayloadV2.withdrawals");
  });

  it("names the transaction whose offset is out of order", () => {
    const out = encodePayloadV1Ssz(
      mkPayloadV1({ transactions: [Uint8Array.of(1), Uint8Array.of(2)] }),
    );
    // transactions start at 548: offsets 8 and 9, then the bodies
    writeUint32LE(out, 552, 7);
    const err = decodeError(() => decodePayloadV1Ssz(out));
    expect(err.code).toBe("SSZ_OFFSET");
    expect(err.field).toBe("ExecutionPayloadV1.transactions[1]");
  });
});
