import type { BlobsBundle } from "./bundle";
import type { ExecutionPayloadV1, ExecutionPayloadV2, ExecutionPayloadV3, Withdrawal } from "./payload";

/**
 * `executionPayload` of a `getPayloadV2` response: V1 before Shanghai,
 * V2 (with withdrawals) from Shanghai on.
 */
export type ExecutionPayloadFieldV2 =
  | { version: "v1"; payload: ExecutionPayloadV1 }
  | { version: "v2"; payload: ExecutionPayloadV2 };

export const fieldV2IntoV1 = (f: ExecutionPayloadFieldV2): ExecutionPayloadV1 =>
  f.version === "v1" ? f.payload : f.payload.payloadInner;

/** Input of `newPayloadV2`, which may or may not carry withdrawals. */
export type ExecutionPayloadInputV2 = {
  executionPayload: ExecutionPayloadV1;
  withdrawals?: Withdrawal[];
};

export type ExecutionPayloadEnvelopeV2 = {
  executionPayload: ExecutionPayloadFieldV2;
  /** Expected value to the fee recipient, in wei. */
  blockValue: bigint;
};

export const envelopeV2IntoV1 = (e: ExecutionPayloadEnvelopeV2): ExecutionPayloadV1 =>
  fieldV2IntoV1(e.executionPayload);

export type ExecutionPayloadEnvelopeV3 = {
  executionPayload: ExecutionPayloadV3;
  blockValue: bigint;
  blobsBundle: BlobsBundle;
  /** Whether the execution side suggests using this payload over a builder's. */
  shouldOverrideBuilder: boolean;
};

export type ExecutionPayloadEnvelopeV4 = ExecutionPayloadEnvelopeV3 & {
  executionRequests: Uint8Array[];
};

export type ExecutionPayloadBodyV1 = {
  transactions: Uint8Array[];
  /** `null` before Shanghai. */
  withdrawals: Withdrawal[] | null;
};

/** Bodies by hash or range; `null` for unknown blocks. */
export type ExecutionPayloadBodiesV1 = (ExecutionPayloadBodyV1 | null)[];
