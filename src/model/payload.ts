/* ── execution payload records ───────────────────────────────
   Each version holds its parent by value (`payloadInner`) and appends its own
   fields after the parent's, in both the binary and the JSON encoding.
   ─────────────────────────────────────────────────────────── */

export const BYTES_PER_HASH = 32;
export const BYTES_PER_ADDRESS = 20;
export const BYTES_PER_LOGS_BLOOM = 256;
export const BYTES_PER_NONCE = 8;

export type Withdrawal = {
  index: bigint;
  validatorIndex: bigint;
  address: Uint8Array;
  /** gwei */
  amount: bigint;
};

export type ExecutionPayloadV1 = {
  parentHash: Uint8Array;
  feeRecipient: Uint8Array;
  stateRoot: Uint8Array;
  receiptsRoot: Uint8Array;
  logsBloom: Uint8Array;
  prevRandao: Uint8Array;
  blockNumber: bigint;
  gasLimit: bigint;
  gasUsed: bigint;
  timestamp: bigint;
  extraData: Uint8Array;
  baseFeePerGas: bigint;
  /** Computed by the producer; carried as opaque data. */
  blockHash: Uint8Array;
  /** Enveloped encoded transactions. */
  transactions: Uint8Array[];
  /** Chain-specific. */
  difficulty: bigint;
  /** Chain-specific, 8 bytes. */
  nonce: Uint8Array;
};

export type ExecutionPayloadV2 = {
  payloadInner: ExecutionPayloadV1;
  withdrawals: Withdrawal[];
};

export type ExecutionPayloadV3 = {
  payloadInner: ExecutionPayloadV2;
  blobGasUsed: bigint;
  excessBlobGas: bigint;
};

export type ExecutionPayloadV4 = {
  payloadInner: ExecutionPayloadV3;
  /** Opaque typed request blobs. */
  executionRequests: Uint8Array[];
};

export type BlockNumHash = { number: bigint; hash: Uint8Array };

/* ── per-version projections ─────────────────────────────── */

export const v1BlockNumHash = (p: ExecutionPayloadV1): BlockNumHash => ({
  number: p.blockNumber,
  hash: p.blockHash,
});

export const v2Timestamp = (p: ExecutionPayloadV2): bigint => p.payloadInner.timestamp;

export const v3Timestamp = (p: ExecutionPayloadV3): bigint =>
  p.payloadInner.payloadInner.timestamp;

export const v3Withdrawals = (p: ExecutionPayloadV3): Withdrawal[] => p.payloadInner.withdrawals;

/* ── polymorphic payload ─────────────────────────────────── */

export type ExecutionPayload =
  | { version: "v1"; payload: ExecutionPayloadV1 }
  | { version: "v2"; payload: ExecutionPayloadV2 }
  | { version: "v3"; payload: ExecutionPayloadV3 };

export type PayloadVersion = ExecutionPayload["version"];

export const fromV1 = (payload: ExecutionPayloadV1): ExecutionPayload => ({ version: "v1", payload });
export const fromV2 = (payload: ExecutionPayloadV2): ExecutionPayload => ({ version: "v2", payload });
export const fromV3 = (payload: ExecutionPayloadV3): ExecutionPayload => ({ version: "v3", payload });

/**
 * The base record of any version. The result is the object held inside `p`,
 * so writes through it are visible through `p`.
 */
export const asV1 = (p: ExecutionPayload): ExecutionPayloadV1 => {
  switch (p.version) {
    case "v1":
      return p.payload;
    case "v2":
      return p.payload.payloadInner;
    case "v3":
      return p.payload.payloadInner.payloadInner;
  }
};

export const asV2 = (p: ExecutionPayload): ExecutionPayloadV2 | undefined => {
  switch (p.version) {
    case "v1":
      return undefined;
    case "v2":
      return p.payload;
    case "v3":
      return p.payload.payloadInner;
  }
};

export const asV3 = (p: ExecutionPayload): ExecutionPayloadV3 | undefined =>
  p.version === "v3" ? p.payload : undefined;

/** Drops everything above the base record. */
export const intoV1 = (p: ExecutionPayload): ExecutionPayloadV1 => asV1(p);

/** Absent for V1, present (possibly empty) from V2 on. */
export const payloadWithdrawals = (p: ExecutionPayload): Withdrawal[] | undefined =>
  asV2(p)?.withdrawals;

export const payloadTimestamp = (p: ExecutionPayload): bigint => asV1(p).timestamp;
export const payloadParentHash = (p: ExecutionPayload): Uint8Array => asV1(p).parentHash;
export const payloadBlockHash = (p: ExecutionPayload): Uint8Array => asV1(p).blockHash;
export const payloadBlockNumber = (p: ExecutionPayload): bigint => asV1(p).blockNumber;
export const payloadBlockNumHash = (p: ExecutionPayload): BlockNumHash => v1BlockNumHash(asV1(p));
export const payloadPrevRandao = (p: ExecutionPayload): Uint8Array => asV1(p).prevRandao;
