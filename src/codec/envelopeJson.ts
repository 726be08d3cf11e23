import * as v from "valibot";
import type { PayloadAttributes } from "../model/attributes";
import {
  BYTES_PER_BLOB,
  BYTES_PER_COMMITMENT,
  BYTES_PER_PROOF,
  type BlobsBundle,
  bundleLength,
} from "../model/bundle";
import type {
  ExecutionPayloadBodiesV1,
  ExecutionPayloadBodyV1,
  ExecutionPayloadEnvelopeV2,
  ExecutionPayloadEnvelopeV3,
  ExecutionPayloadEnvelopeV4,
  ExecutionPayloadFieldV2,
  ExecutionPayloadInputV2,
} from "../model/envelope";
import { BYTES_PER_ADDRESS, BYTES_PER_HASH } from "../model/payload";
import {
  type PayloadStatus,
  type PayloadStatusEnum,
  type PayloadStatusKind,
  invalid,
  validationError,
} from "../model/status";
import { type Hex, type PayloadId, asPayloadId } from "../types/brands";
import { bytesToHex, fixedBytesToHex } from "../utils/bytes";
import {
  type Candidate,
  type PayloadV1Json,
  type PayloadV2Json,
  type PayloadV3Json,
  type WithdrawalJson,
  address,
  dataHex,
  decodePayloadV1,
  decodePayloadV2,
  encodePayloadV1,
  encodePayloadV2,
  encodePayloadV3,
  encodeWithdrawal,
  fixedHex,
  hash32,
  parseWith,
  payloadV1Entries,
  payloadV3Schema,
  resolveUntagged,
  u256,
  u64,
  v1FromDoc,
  v3FromDoc,
  withdrawalsSchema,
} from "./json";
import { toQuantity } from "./quantity";

/* ── executionPayload of getPayloadV2 ────────────────────── */

const FIELD_V2_CANDIDATES: readonly Candidate<ExecutionPayloadFieldV2>[] = [
  { name: "V2", decode: (doc) => ({ version: "v2", payload: decodePayloadV2(doc) }) },
  { name: "V1", decode: (doc) => ({ version: "v1", payload: decodePayloadV1(doc) }) },
];

export const decodePayloadFieldV2 = (doc: unknown): ExecutionPayloadFieldV2 =>
  resolveUntagged("ExecutionPayloadFieldV2", doc, FIELD_V2_CANDIDATES);

export const encodePayloadFieldV2 = (f: ExecutionPayloadFieldV2): PayloadV1Json | PayloadV2Json =>
  f.version === "v1" ? encodePayloadV1(f.payload) : encodePayloadV2(f.payload);

/* ── newPayloadV2 input ──────────────────────────────────── */

export type PayloadInputV2Json = PayloadV1Json & { withdrawals?: WithdrawalJson[] };

const payloadInputV2Schema = v.strictObject({
  ...payloadV1Entries,
  withdrawals: v.optional(withdrawalsSchema),
});

/** `withdrawals` is written only when present; `[]` is kept as `[]`. */
export const encodePayloadInputV2 = (input: ExecutionPayloadInputV2): PayloadInputV2Json => {
  const doc: PayloadInputV2Json = encodePayloadV1(input.executionPayload);
  if (input.withdrawals) doc.withdrawals = input.withdrawals.map(encodeWithdrawal);
  return doc;
};

export const decodePayloadInputV2 = (doc: unknown): ExecutionPayloadInputV2 => {
  const d = parseWith(payloadInputV2Schema, doc, "ExecutionPayloadInputV2");
  const input: ExecutionPayloadInputV2 = { executionPayload: v1FromDoc(d) };
  if (d.withdrawals) input.withdrawals = d.withdrawals;
  return input;
};

/* ── blobs bundle ────────────────────────────────────────── */

export type BlobsBundleJson = { commitments: Hex[]; proofs: Hex[]; blobs: Hex[] };

const blobsBundleSchema = v.pipe(
  v.object({
    commitments: v.array(fixedHex(BYTES_PER_COMMITMENT)),
    proofs: v.array(fixedHex(BYTES_PER_PROOF)),
    blobs: v.array(fixedHex(BYTES_PER_BLOB)),
  }),
  v.check(
    (b) => b.proofs.length === b.commitments.length && b.blobs.length === b.commitments.length,
    "commitments, proofs and blobs differ in length",
  ),
);

export const encodeBlobsBundle = (b: BlobsBundle): BlobsBundleJson => {
  bundleLength(b);
  return {
    commitments: b.commitments.map((c) => fixedBytesToHex(c, BYTES_PER_COMMITMENT)),
    proofs: b.proofs.map((p) => fixedBytesToHex(p, BYTES_PER_PROOF)),
    blobs: b.blobs.map((blob) => fixedBytesToHex(blob, BYTES_PER_BLOB)),
  };
};

export const decodeBlobsBundle = (doc: unknown): BlobsBundle => {
  const d = parseWith(blobsBundleSchema, doc, "BlobsBundle");
  return { commitments: d.commitments, proofs: d.proofs, blobs: d.blobs };
};

/* ── getPayload envelopes ────────────────────────────────── */

export type EnvelopeV2Json = {
  executionPayload: PayloadV1Json | PayloadV2Json;
  blockValue: Hex;
};

export type EnvelopeV3Json = {
  executionPayload: PayloadV3Json;
  blockValue: Hex;
  blobsBundle: BlobsBundleJson;
  shouldOverrideBuilder: boolean;
};

export type EnvelopeV4Json = EnvelopeV3Json & { executionRequests: Hex[] };

const envelopeV2Schema = v.object({ executionPayload: v.unknown(), blockValue: u256 });

export const encodeEnvelopeV2 = (e: ExecutionPayloadEnvelopeV2): EnvelopeV2Json => ({
  executionPayload: encodePayloadFieldV2(e.executionPayload),
  blockValue: toQuantity(e.blockValue),
});

export const decodeEnvelopeV2 = (doc: unknown): ExecutionPayloadEnvelopeV2 => {
  const d = parseWith(envelopeV2Schema, doc, "ExecutionPayloadEnvelopeV2");
  return { executionPayload: decodePayloadFieldV2(d.executionPayload), blockValue: d.blockValue };
};

const envelopeV3Entries = {
  executionPayload: payloadV3Schema,
  blockValue: u256,
  blobsBundle: blobsBundleSchema,
  shouldOverrideBuilder: v.boolean(),
};

const envelopeV3Schema = v.object(envelopeV3Entries);
const envelopeV4Schema = v.object({ ...envelopeV3Entries, executionRequests: v.array(dataHex) });

const envelopeV3FromDoc = (d: v.InferOutput<typeof envelopeV3Schema>): ExecutionPayloadEnvelopeV3 => ({
  executionPayload: v3FromDoc(d.executionPayload),
  blockValue: d.blockValue,
  blobsBundle: {
    commitments: d.blobsBundle.commitments,
    proofs: d.blobsBundle.proofs,
    blobs: d.blobsBundle.blobs,
  },
  shouldOverrideBuilder: d.shouldOverrideBuilder,
});

export const encodeEnvelopeV3 = (e: ExecutionPayloadEnvelopeV3): EnvelopeV3Json => ({
  executionPayload: encodePayloadV3(e.executionPayload),
  blockValue: toQuantity(e.blockValue),
  blobsBundle: encodeBlobsBundle(e.blobsBundle),
  shouldOverrideBuilder: e.shouldOverrideBuilder,
});

export const decodeEnvelopeV3 = (doc: unknown): ExecutionPayloadEnvelopeV3 =>
  envelopeV3FromDoc(parseWith(envelopeV3Schema, doc, "ExecutionPayloadEnvelopeV3"));

export const encodeEnvelopeV4 = (e: ExecutionPayloadEnvelopeV4): EnvelopeV4Json => ({
  ...encodeEnvelopeV3(e),
  executionRequests: e.executionRequests.map(bytesToHex),
});

export const decodeEnvelopeV4 = (doc: unknown): ExecutionPayloadEnvelopeV4 => {
  const d = parseWith(envelopeV4Schema, doc, "ExecutionPayloadEnvelopeV4");
  return { ...envelopeV3FromDoc(d), executionRequests: d.executionRequests };
};

/* ── payload status ──────────────────────────────────────── */

export type PayloadStatusJson = {
  status: PayloadStatusKind;
  latestValidHash: Hex | null;
  validationError: string | null;
};

const statusEntries = {
  latestValidHash: v.nullish(hash32),
  validationError: v.nullish(v.string()),
};

// `validationError` is required exactly when the status is INVALID.
const payloadStatusSchema = v.variant("status", [
  v.object({ ...statusEntries, status: v.literal("VALID") }),
  v.object({ ...statusEntries, status: v.literal("INVALID"), validationError: v.string() }),
  v.object({ ...statusEntries, status: v.literal("SYNCING") }),
  v.object({ ...statusEntries, status: v.literal("ACCEPTED") }),
]);

export const encodePayloadStatus = (s: PayloadStatus): PayloadStatusJson => ({
  status: s.status.status,
  latestValidHash: s.latestValidHash ? fixedBytesToHex(s.latestValidHash, BYTES_PER_HASH) : null,
  validationError: validationError(s.status),
});

export const decodePayloadStatus = (doc: unknown): PayloadStatus => {
  const d = parseWith(payloadStatusSchema, doc, "PayloadStatus");
  const status: PayloadStatusEnum =
    d.status === "INVALID" ? invalid(d.validationError) : { status: d.status };
  return { status, latestValidHash: d.latestValidHash ?? null };
};

/* ── payload attributes ──────────────────────────────────── */

export type PayloadAttributesJson = {
  timestamp: Hex;
  prevRandao: Hex;
  suggestedFeeRecipient: Hex;
  withdrawals?: WithdrawalJson[];
  parentBeaconBlockRoot?: Hex;
};

const payloadAttributesSchema = v.object({
  timestamp: u64,
  prevRandao: hash32,
  suggestedFeeRecipient: address,
  withdrawals: v.optional(withdrawalsSchema),
  parentBeaconBlockRoot: v.optional(hash32),
});

export const encodePayloadAttributes = (a: PayloadAttributes): PayloadAttributesJson => {
  const doc: PayloadAttributesJson = {
    timestamp: toQuantity(a.timestamp),
    prevRandao: fixedBytesToHex(a.prevRandao, BYTES_PER_HASH),
    suggestedFeeRecipient: fixedBytesToHex(a.suggestedFeeRecipient, BYTES_PER_ADDRESS),
  };
  if (a.withdrawals) doc.withdrawals = a.withdrawals.map(encodeWithdrawal);
  if (a.parentBeaconBlockRoot) doc.parentBeaconBlockRoot = fixedBytesToHex(a.parentBeaconBlockRoot, BYTES_PER_HASH);
  return doc;
};

export const decodePayloadAttributes = (doc: unknown): PayloadAttributes => {
  const d = parseWith(payloadAttributesSchema, doc, "PayloadAttributes");
  const attributes: PayloadAttributes = {
    timestamp: d.timestamp,
    prevRandao: d.prevRandao,
    suggestedFeeRecipient: d.suggestedFeeRecipient,
  };
  if (d.withdrawals) attributes.withdrawals = d.withdrawals;
  if (d.parentBeaconBlockRoot) attributes.parentBeaconBlockRoot = d.parentBeaconBlockRoot;
  return attributes;
};

/* ── payload bodies ──────────────────────────────────────── */

export type PayloadBodyV1Json = {
  transactions: Hex[];
  withdrawals: WithdrawalJson[] | null;
};

const payloadBodyV1Schema = v.object({
  transactions: v.array(dataHex),
  withdrawals: v.nullish(withdrawalsSchema),
});

const payloadBodiesV1Schema = v.array(v.nullable(payloadBodyV1Schema));

const bodyFromDoc = (d: v.InferOutput<typeof payloadBodyV1Schema>): ExecutionPayloadBodyV1 => ({
  transactions: d.transactions,
  withdrawals: d.withdrawals ?? null,
});

export const encodePayloadBodyV1 = (b: ExecutionPayloadBodyV1): PayloadBodyV1Json => ({
  transactions: b.transactions.map(bytesToHex),
  withdrawals: b.withdrawals ? b.withdrawals.map(encodeWithdrawal) : null,
});

export const decodePayloadBodyV1 = (doc: unknown): ExecutionPayloadBodyV1 =>
  bodyFromDoc(parseWith(payloadBodyV1Schema, doc, "ExecutionPayloadBodyV1"));

export const encodePayloadBodiesV1 = (bodies: ExecutionPayloadBodiesV1): (PayloadBodyV1Json | null)[] =>
  bodies.map((b) => (b ? encodePayloadBodyV1(b) : null));

export const decodePayloadBodiesV1 = (doc: unknown): ExecutionPayloadBodiesV1 =>
  parseWith(payloadBodiesV1Schema, doc, "ExecutionPayloadBodiesV1").map((b) =>
    b ? bodyFromDoc(b) : null,
  );

/* ── payload id ──────────────────────────────────────────── */

const payloadIdSchema = v.pipe(
  v.string(),
  v.regex(/^0[xX][0-9a-fA-F]{16}$/, "expected 8 bytes of 0x-prefixed hex"),
  v.transform(asPayloadId),
);

export const encodePayloadId = (id: PayloadId): Hex => id;

export const decodePayloadId = (doc: unknown): PayloadId => parseWith(payloadIdSchema, doc, "PayloadId");
