import { describe, expect, it } from "vitest";
import { decodePayloadStatus, encodePayloadStatus } from "../src/codec/envelopeJson";
import { payloadStatusFromJson, payloadStatusToJson } from "../src/codec/text";
import { JsonDecodeError } from "../src/errors";
import {
  ACCEPTED,
  SYNCING,
  VALID,
  formatPayloadStatus,
  formatStatus,
  invalid,
  isAccepted,
  isInvalid,
  isSyncing,
  isValid,
  payloadStatus,
  validationError,
  withLatestValidHash,
} from "../src/model/status";
import { filled } from "./helpers/payload";

describe("payload status JSON", () => {
  it("writes all three keys for INVALID", () => {
    expect(payloadStatusToJson(payloadStatus(invalid("Failed to decode block")))).toBe(
      '{"status":"INVALID","latestValidHash":null,"validationError":"Failed to decode block"}',
    );
  });

  it("writes null validationError for the other statuses", () => {
    const hash = filled(32, 0x0f);
    expect(encodePayloadStatus(payloadStatus(VALID, hash))).toEqual({
      status: "VALID",
      latestValidHash: `0x${"0f".repeat(32)}`,
      validationError: null,
    });
    expect(encodePayloadStatus(payloadStatus(SYNCING)).validationError).toBeNull();
    expect(encodePayloadStatus(payloadStatus(ACCEPTED)).status).toBe("ACCEPTED");
  });

  it("reads SYNCING without validationError", () => {
    expect(payloadStatusFromJson('{"status":"SYNCING","latestValidHash":null}')).toEqual(
      payloadStatus(SYNCING),
    );
  });

  it("treats a missing latestValidHash as null", () => {
    expect(decodePayloadStatus({ status: "ACCEPTED" })).toEqual(payloadStatus(ACCEPTED));
  });

  it("reads INVALID with its error and hash", () => {
    const s = decodePayloadStatus({
      status: "INVALID",
      latestValidHash: `0x${"aa".repeat(32)}`,
      validationError: "bad block",
    });
    expect(s).toEqual(payloadStatus(invalid("bad block"), filled(32, 0xaa)));
  });

  it("ignores validationError outside INVALID", () => {
    expect(decodePayloadStatus({ status: "VALID", latestValidHash: null, validationError: null })).toEqual(
      payloadStatus(VALID),
    );
  });

  it("requires validationError for INVALID", () => {
    expect(() => decodePayloadStatus({ status: "INVALID", latestValidHash: null })).toThrow(JsonDecodeError);
  });

  it("rejects unknown statuses", () => {
    expect(() => decodePayloadStatus({ status: "INVALID_BLOCK_HASH", latestValidHash: null })).toThrow(
      JsonDecodeError,
    );
  });
});

describe("payload status helpers", () => {
  it("classifies", () => {
    expect(isValid(payloadStatus(VALID))).toBe(true);
    expect(isInvalid(payloadStatus(invalid("x")))).toBe(true);
    expect(isSyncing(payloadStatus(SYNCING))).toBe(true);
    expect(isAccepted(payloadStatus(ACCEPTED))).toBe(true);
    expect(isValid(payloadStatus(SYNCING))).toBe(false);
  });

  it("exposes the validation error only for INVALID", () => {
    expect(validationError(invalid("x"))).toBe("x");
    expect(validationError(VALID)).toBeNull();
  });

  it("formats for logs", () => {
    expect(formatStatus(invalid("gas limit"))).toBe("INVALID: gas limit");
    expect(formatStatus(SYNCING)).toBe("SYNCING");
    expect(formatPayloadStatus(payloadStatus(VALID))).toBe(
      "PayloadStatus { status: VALID, latestValidHash: null }",
    );
    expect(formatPayloadStatus(withLatestValidHash(payloadStatus(VALID), filled(2, 1)))).toBe(
      "PayloadStatus { status: VALID, latestValidHash: 0x0101 }",
    );
  });
});
