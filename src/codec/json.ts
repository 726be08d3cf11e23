/**
 * Engine API JSON for execution payloads.
 *
 * Extended versions are flattened: a V2 document is the V1 keys followed by
 * `withdrawals`, a V3 document adds `blobGasUsed` and `excessBlobGas`, and so on.
 * V2 and newer reject unknown keys; V1 drops them.
 */

import * as v from "valibot";
import { JsonDecodeError } from "../errors";
import { logger } from "../logging";
import {
  BYTES_PER_ADDRESS,
  BYTES_PER_HASH,
  BYTES_PER_LOGS_BLOOM,
  BYTES_PER_NONCE,
  type ExecutionPayload,
  type ExecutionPayloadV1,
  type ExecutionPayloadV2,
  type ExecutionPayloadV3,
  type ExecutionPayloadV4,
  type Withdrawal,
  fromV1,
  fromV2,
  fromV3,
} from "../model/payload";
import type { Hex } from "../types/brands";
import { bytesToHex, fixedBytesToHex, hexToBytes } from "../utils/bytes";
import { QUANTITY_RE, U256_MAX, U64_MAX, fromQuantity, toQuantity } from "./quantity";

/* ── scalar schemas ──────────────────────────────────────── */

export const fixedHex = (bytes: number) =>
  v.pipe(
    v.string(),
    v.regex(
      new RegExp(`^0[xX][0-9a-fA-F]{${bytes * 2}}$`),
      `expected ${bytes} bytes of 0x-prefixed hex`,
    ),
    v.transform(hexToBytes),
  );

export const dataHex = v.pipe(
  v.string(),
  v.regex(/^0[xX](?:[0-9a-fA-F]{2})*$/, "expected 0x-prefixed even-length hex"),
  v.transform(hexToBytes),
);

const quantity = (max: bigint, label: string) =>
  v.pipe(
    v.string(),
    v.regex(QUANTITY_RE, "expected 0x-prefixed hex quantity"),
    v.transform(fromQuantity),
    v.maxValue(max, `${label} out of range`),
  );

export const u64 = quantity(U64_MAX, "uint64");
export const u256 = quantity(U256_MAX, "uint256");
export const hash32 = fixedHex(BYTES_PER_HASH);
export const address = fixedHex(BYTES_PER_ADDRESS);

/** Runs `schema` over `doc`, turning valibot issues into a `JsonDecodeError`. */
export const parseWith = <S extends v.GenericSchema>(
  schema: S,
  doc: unknown,
  target: string,
): v.InferOutput<S> => {
  const result = v.safeParse(schema, doc);
  if (result.success) return result.output;
  throw JsonDecodeError.fromIssues(target, result.issues);
};

/* ── document shapes ─────────────────────────────────────── */

export type WithdrawalJson = { index: Hex; validatorIndex: Hex; address: Hex; amount: Hex };

export type PayloadV1Json = {
  parentHash: Hex;
  feeRecipient: Hex;
  stateRoot: Hex;
  receiptsRoot: Hex;
  logsBloom: Hex;
  prevRandao: Hex;
  blockNumber: Hex;
  gasLimit: Hex;
  gasUsed: Hex;
  timestamp: Hex;
  extraData: Hex;
  baseFeePerGas: Hex;
  blockHash: Hex;
  transactions: Hex[];
  difficulty: Hex;
  nonce: Hex;
};

export type PayloadV2Json = PayloadV1Json & { withdrawals: WithdrawalJson[] };
export type PayloadV3Json = PayloadV2Json & { blobGasUsed: Hex; excessBlobGas: Hex };
export type PayloadV4Json = PayloadV3Json & { executionRequests: Hex[] };
export type ExecutionPayloadJson = PayloadV1Json | PayloadV2Json | PayloadV3Json;

/* ── withdrawals ─────────────────────────────────────────── */

export const withdrawalSchema = v.object({
  index: u64,
  validatorIndex: u64,
  address,
  amount: u64,
});

export const encodeWithdrawal = (w: Withdrawal): WithdrawalJson => ({
  index: toQuantity(w.index),
  validatorIndex: toQuantity(w.validatorIndex),
  address: fixedBytesToHex(w.address, BYTES_PER_ADDRESS),
  amount: toQuantity(w.amount),
});

export const withdrawalsSchema = v.array(withdrawalSchema);

/* ── V1 ──────────────────────────────────────────────────── */

export const payloadV1Entries = {
  parentHash: hash32,
  feeRecipient: address,
  stateRoot: hash32,
  receiptsRoot: hash32,
  logsBloom: fixedHex(BYTES_PER_LOGS_BLOOM),
  prevRandao: hash32,
  blockNumber: u64,
  gasLimit: u64,
  gasUsed: u64,
  timestamp: u64,
  extraData: dataHex,
  baseFeePerGas: u256,
  blockHash: hash32,
  transactions: v.array(dataHex),
  // chain-specific, always written, absent reads as zero
  difficulty: v.optional(u256),
  nonce: v.optional(fixedHex(BYTES_PER_NONCE)),
};

const payloadV1Schema = v.object(payloadV1Entries);

export type PayloadV1Doc = v.InferOutput<typeof payloadV1Schema>;

/** Builds the base record from any document carrying the V1 keys. */
export const v1FromDoc = (d: PayloadV1Doc): ExecutionPayloadV1 => ({
  parentHash: d.parentHash,
  feeRecipient: d.feeRecipient,
  stateRoot: d.stateRoot,
  receiptsRoot: d.receiptsRoot,
  logsBloom: d.logsBloom,
  prevRandao: d.prevRandao,
  blockNumber: d.blockNumber,
  gasLimit: d.gasLimit,
  gasUsed: d.gasUsed,
  timestamp: d.timestamp,
  extraData: d.extraData,
  baseFeePerGas: d.baseFeePerGas,
  blockHash: d.blockHash,
  transactions: d.transactions,
  difficulty: d.difficulty ?? 0n,
  nonce: d.nonce ?? new Uint8Array(BYTES_PER_NONCE),
});

export const encodePayloadV1 = (p: ExecutionPayloadV1): PayloadV1Json => ({
  parentHash: fixedBytesToHex(p.parentHash, BYTES_PER_HASH),
  feeRecipient: fixedBytesToHex(p.feeRecipient, BYTES_PER_ADDRESS),
  stateRoot: fixedBytesToHex(p.stateRoot, BYTES_PER_HASH),
  receiptsRoot: fixedBytesToHex(p.receiptsRoot, BYTES_PER_HASH),
  logsBloom: fixedBytesToHex(p.logsBloom, BYTES_PER_LOGS_BLOOM),
  prevRandao: fixedBytesToHex(p.prevRandao, BYTES_PER_HASH),
  blockNumber: toQuantity(p.blockNumber),
  gasLimit: toQuantity(p.gasLimit),
  gasUsed: toQuantity(p.gasUsed),
  timestamp: toQuantity(p.timestamp),
  extraData: bytesToHex(p.extraData),
  baseFeePerGas: toQuantity(p.baseFeePerGas),
  blockHash: fixedBytesToHex(p.blockHash, BYTES_PER_HASH),
  transactions: p.transactions.map(bytesToHex),
  difficulty: toQuantity(p.difficulty),
  nonce: fixedBytesToHex(p.nonce, BYTES_PER_NONCE),
});

export const decodePayloadV1 = (doc: unknown): ExecutionPayloadV1 =>
  v1FromDoc(parseWith(payloadV1Schema, doc, "ExecutionPayloadV1"));

/* ── V2 ──────────────────────────────────────────────────── */

const payloadV2Entries = { ...payloadV1Entries, withdrawals: withdrawalsSchema };
const payloadV2Schema = v.strictObject(payloadV2Entries);

export const encodePayloadV2 = (p: ExecutionPayloadV2): PayloadV2Json => ({
  ...encodePayloadV1(p.payloadInner),
  withdrawals: p.withdrawals.map(encodeWithdrawal),
});

const v2FromDoc = (d: v.InferOutput<typeof payloadV2Schema>): ExecutionPayloadV2 => ({
  payloadInner: v1FromDoc(d),
  withdrawals: d.withdrawals,
});

export const decodePayloadV2 = (doc: unknown): ExecutionPayloadV2 =>
  v2FromDoc(parseWith(payloadV2Schema, doc, "ExecutionPayloadV2"));

/* ── V3 ──────────────────────────────────────────────────── */

const payloadV3Entries = { ...payloadV2Entries, blobGasUsed: u64, excessBlobGas: u64 };
export const payloadV3Schema = v.strictObject(payloadV3Entries);

export const encodePayloadV3 = (p: ExecutionPayloadV3): PayloadV3Json => ({
  ...encodePayloadV2(p.payloadInner),
  blobGasUsed: toQuantity(p.blobGasUsed),
  excessBlobGas: toQuantity(p.excessBlobGas),
});

export const v3FromDoc = (d: v.InferOutput<typeof payloadV3Schema>): ExecutionPayloadV3 => ({
  payloadInner: v2FromDoc(d),
  blobGasUsed: d.blobGasUsed,
  excessBlobGas: d.excessBlobGas,
});

export const decodePayloadV3 = (doc: unknown): ExecutionPayloadV3 =>
  v3FromDoc(parseWith(payloadV3Schema, doc, "ExecutionPayloadV3"));

/* ── V4 ──────────────────────────────────────────────────── */

const payloadV4Schema = v.strictObject({ ...payloadV3Entries, executionRequests: v.array(dataHex) });

export const encodePayloadV4 = (p: ExecutionPayloadV4): PayloadV4Json => ({
  ...encodePayloadV3(p.payloadInner),
  executionRequests: p.executionRequests.map(bytesToHex),
});

export const decodePayloadV4 = (doc: unknown): ExecutionPayloadV4 => {
  const d = parseWith(payloadV4Schema, doc, "ExecutionPayloadV4");
  return { payloadInner: v3FromDoc(d), executionRequests: d.executionRequests };
};

/* ── untagged resolution ─────────────────────────────────── */

export type Candidate<T> = { readonly name: string; readonly decode: (doc: unknown) => T };

/**
 * Decodes an untagged document with the first candidate that accepts it.
 *
 * Candidates are tried in the given order and the order is part of the
 * contract: payload resolvers list the most featured shape first, so a
 * document with V3 keys is never cut down to V2 or V1. The flip side is that
 * a document meant as an older shape is taken as a newer one whenever it
 * happens to carry every key the newer one requires, and that a document
 * whose newer keys fail to parse can still be accepted by the non-strict V1
 * shape, which drops them. Whether that is forward compatibility or an
 * ambiguity is left open; the order is kept as is.
 */
export const resolveUntagged = <T>(
  target: string,
  doc: unknown,
  candidates: readonly Candidate<T>[],
): T => {
  for (const c of candidates) {
    try {
      return c.decode(doc);
    } catch (err) {
      if (!(err instanceof JsonDecodeError)) throw err;
      logger.debug({ target, candidate: c.name, code: err.code, issues: err.issues }, "untagged candidate rejected");
    }
  }
  throw new JsonDecodeError(
    "JSON_NO_VARIANT",
    target,
    [],
    `data did not match any variant of untagged ${target}`,
  );
};

const EXECUTION_PAYLOAD_CANDIDATES: readonly Candidate<ExecutionPayload>[] = [
  { name: "V3", decode: (doc) => fromV3(decodePayloadV3(doc)) },
  { name: "V2", decode: (doc) => fromV2(decodePayloadV2(doc)) },
  { name: "V1", decode: (doc) => fromV1(decodePayloadV1(doc)) },
];

/** V3, then V2, then V1; see `resolveUntagged`. */
export const decodeExecutionPayload = (doc: unknown): ExecutionPayload =>
  resolveUntagged("ExecutionPayload", doc, EXECUTION_PAYLOAD_CANDIDATES);

export const encodeExecutionPayload = (p: ExecutionPayload): ExecutionPayloadJson => {
  switch (p.version) {
    case "v1":
      return encodePayloadV1(p.payload);
    case "v2":
      return encodePayloadV2(p.payload);
    case "v3":
      return encodePayloadV3(p.payload);
  }
};

/* ── text ────────────────────────────────────────────────── */

export const toJson = (doc: unknown): string => JSON.stringify(doc);

export const parseJson = (text: string, target = "document"): unknown => {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new JsonDecodeError("JSON_SYNTAX", target, [], err instanceof Error ? err.message : String(err));
  }
};

/** Parses `text` and hands the document to `decode`. */
export const fromJson = <T>(text: string, decode: (doc: unknown) => T): T => decode(parseJson(text));
