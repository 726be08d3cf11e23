import { sha256 } from "@noble/hashes/sha256";
import * as rlp from "rlp";
import { uint64BE } from "../codec/quantity";
import { type PayloadId, asPayloadId } from "../types/brands";
import { bytesToHex, concatBytes } from "../utils/bytes";
import type { Withdrawal } from "./payload";

/** Attributes of a payload build started by a fork choice update. */
export type PayloadAttributes = {
  timestamp: bigint;
  prevRandao: Uint8Array;
  suggestedFeeRecipient: Uint8Array;
  /** Present from V2 on; `[]` and absent are different requests. */
  withdrawals?: Withdrawal[];
  parentBeaconBlockRoot?: Uint8Array;
};

export const payloadIdFromBytes = (bytes: Uint8Array): PayloadId => asPayloadId(bytesToHex(bytes));

const withdrawalsRlp = (ws: readonly Withdrawal[]): Uint8Array =>
  rlp.encode(ws.map((w) => [w.index, w.validatorIndex, w.address, w.amount]));

/**
 * Identifier of the build for `attributes` on top of `parentHash`: the first
 * 8 bytes of sha256(parent ‖ timestamp(BE) ‖ randao ‖ recipient
 * [‖ rlp(withdrawals)] [‖ parent beacon root]).
 */
export const payloadIdFor = (parentHash: Uint8Array, attributes: PayloadAttributes): PayloadId => {
  const parts = [
    parentHash,
    uint64BE(attributes.timestamp),
    attributes.prevRandao,
    attributes.suggestedFeeRecipient,
  ];
  if (attributes.withdrawals) parts.push(withdrawalsRlp(attributes.withdrawals));
  if (attributes.parentBeaconBlockRoot) parts.push(attributes.parentBeaconBlockRoot);
  return payloadIdFromBytes(sha256(concatBytes(parts)).subarray(0, 8));
};
