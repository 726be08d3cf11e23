import { SszDecodeError } from "../errors";
import {
  BYTES_PER_BLOB,
  BYTES_PER_COMMITMENT,
  BYTES_PER_PROOF,
  type BlobsBundle,
  bundleLength,
} from "../model/bundle";
import {
  BYTES_PER_ADDRESS,
  BYTES_PER_HASH,
  BYTES_PER_LOGS_BLOOM,
  BYTES_PER_NONCE,
  type ExecutionPayload,
  type ExecutionPayloadV1,
  type ExecutionPayloadV2,
  type ExecutionPayloadV3,
  type PayloadVersion,
  type Withdrawal,
} from "../model/payload";
import { readUint32LE, writeUint32LE } from "./quantity";
import {
  BYTES_PER_LENGTH_OFFSET,
  type FieldLayout,
  type FieldSink,
  type FieldSource,
  type SszType,
  byteList,
  byteVector,
  container,
  deserialize,
  list,
  serialize,
  uint256,
  uint64,
} from "./ssz";

const hash32 = byteVector(BYTES_PER_HASH);
const address = byteVector(BYTES_PER_ADDRESS);
const logsBloom = byteVector(BYTES_PER_LOGS_BLOOM);
const nonce = byteVector(BYTES_PER_NONCE);
const transactions = list(byteList);

/* ── withdrawal ──────────────────────────────────────────── */

export const withdrawalSsz = container<Withdrawal>({
  fields: [
    ["index", uint64],
    ["validatorIndex", uint64],
    ["address", address],
    ["amount", uint64],
  ],
  write: (s, w) => {
    s.append(uint64, w.index);
    s.append(uint64, w.validatorIndex);
    s.append(address, w.address);
    s.append(uint64, w.amount);
  },
  read: (f) => ({
    index: f.next(uint64),
    validatorIndex: f.next(uint64),
    address: f.next(address),
    amount: f.next(uint64),
  }),
});

const withdrawals = list(withdrawalSsz);

/* ── V1: base record ─────────────────────────────────────── */

const PAYLOAD_V1_FIELDS: FieldLayout = [
  ["parentHash", hash32],
  ["feeRecipient", address],
  ["stateRoot", hash32],
  ["receiptsRoot", hash32],
  ["logsBloom", logsBloom],
  ["prevRandao", hash32],
  ["blockNumber", uint64],
  ["gasLimit", uint64],
  ["gasUsed", uint64],
  ["timestamp", uint64],
  ["extraData", byteList],
  ["baseFeePerGas", uint256],
  ["blockHash", hash32],
  ["transactions", transactions],
  ["difficulty", uint256],
  ["nonce", nonce],
];

// Shared with every extended version: their containers start with these fields.
const writeV1Fields = (s: FieldSink, p: ExecutionPayloadV1) => {
  s.append(hash32, p.parentHash);
  s.append(address, p.feeRecipient);
  s.append(hash32, p.stateRoot);
  s.append(hash32, p.receiptsRoot);
  s.append(logsBloom, p.logsBloom);
  s.append(hash32, p.prevRandao);
  s.append(uint64, p.blockNumber);
  s.append(uint64, p.gasLimit);
  s.append(uint64, p.gasUsed);
  s.append(uint64, p.timestamp);
  s.append(byteList, p.extraData);
  s.append(uint256, p.baseFeePerGas);
  s.append(hash32, p.blockHash);
  s.append(transactions, p.transactions);
  s.append(uint256, p.difficulty);
  s.append(nonce, p.nonce);
};

const readV1Fields = (f: FieldSource): ExecutionPayloadV1 => ({
  parentHash: f.next(hash32),
  feeRecipient: f.next(address),
  stateRoot: f.next(hash32),
  receiptsRoot: f.next(hash32),
  logsBloom: f.next(logsBloom),
  prevRandao: f.next(hash32),
  blockNumber: f.next(uint64),
  gasLimit: f.next(uint64),
  gasUsed: f.next(uint64),
  timestamp: f.next(uint64),
  extraData: f.next(byteList),
  baseFeePerGas: f.next(uint256),
  blockHash: f.next(hash32),
  transactions: f.next(transactions),
  difficulty: f.next(uint256),
  nonce: f.next(nonce),
});

export const payloadV1Ssz = container<ExecutionPayloadV1>({
  fields: PAYLOAD_V1_FIELDS,
  write: writeV1Fields,
  read: readV1Fields,
});

/* ── V2: V1 + withdrawals ────────────────────────────────── */

const PAYLOAD_V2_FIELDS: FieldLayout = [...PAYLOAD_V1_FIELDS, ["withdrawals", withdrawals]];

const writeV2Fields = (s: FieldSink, p: ExecutionPayloadV2) => {
  writeV1Fields(s, p.payloadInner);
  s.append(withdrawals, p.withdrawals);
};

const readV2Fields = (f: FieldSource): ExecutionPayloadV2 => ({
  payloadInner: readV1Fields(f),
  withdrawals: f.next(withdrawals),
});

export const payloadV2Ssz = container<ExecutionPayloadV2>({
  fields: PAYLOAD_V2_FIELDS,
  write: writeV2Fields,
  read: readV2Fields,
});

/* ── V3: V2 + blob gas ───────────────────────────────────── */

export const payloadV3Ssz = container<ExecutionPayloadV3>({
  fields: [...PAYLOAD_V2_FIELDS, ["blobGasUsed", uint64], ["excessBlobGas", uint64]],
  write: (s, p) => {
    writeV2Fields(s, p.payloadInner);
    s.append(uint64, p.blobGasUsed);
    s.append(uint64, p.excessBlobGas);
  },
  read: (f) => ({
    payloadInner: readV2Fields(f),
    blobGasUsed: f.next(uint64),
    excessBlobGas: f.next(uint64),
  }),
});

export const encodePayloadV1Ssz = (p: ExecutionPayloadV1): Uint8Array => serialize(payloadV1Ssz, p);
export const encodePayloadV2Ssz = (p: ExecutionPayloadV2): Uint8Array => serialize(payloadV2Ssz, p);
export const encodePayloadV3Ssz = (p: ExecutionPayloadV3): Uint8Array => serialize(payloadV3Ssz, p);

export const decodePayloadV1Ssz = (bytes: Uint8Array): ExecutionPayloadV1 =>
  deserialize(payloadV1Ssz, bytes, "ExecutionPayloadV1");
export const decodePayloadV2Ssz = (bytes: Uint8Array): ExecutionPayloadV2 =>
  deserialize(payloadV2Ssz, bytes, "ExecutionPayloadV2");
export const decodePayloadV3Ssz = (bytes: Uint8Array): ExecutionPayloadV3 =>
  deserialize(payloadV3Ssz, bytes, "ExecutionPayloadV3");

export const encodeExecutionPayloadSsz = (p: ExecutionPayload): Uint8Array => {
  switch (p.version) {
    case "v1":
      return encodePayloadV1Ssz(p.payload);
    case "v2":
      return encodePayloadV2Ssz(p.payload);
    case "v3":
      return encodePayloadV3Ssz(p.payload);
  }
};

/** The binary form carries no version tag; the caller names it. */
export const decodeExecutionPayloadSsz = (
  version: PayloadVersion,
  bytes: Uint8Array,
): ExecutionPayload => {
  switch (version) {
    case "v1":
      return { version, payload: decodePayloadV1Ssz(bytes) };
    case "v2":
      return { version, payload: decodePayloadV2Ssz(bytes) };
    case "v3":
      return { version, payload: decodePayloadV3Ssz(bytes) };
  }
};

/* ── blobs bundle ────────────────────────────────────────── */

const commitment = byteVector(BYTES_PER_COMMITMENT);
const proof = byteVector(BYTES_PER_PROOF);
const blob = byteVector(BYTES_PER_BLOB);
const commitments = list(commitment);
const proofs = list(proof);
const blobs = list(blob);

const BUNDLE_HEAD = 3 * BYTES_PER_LENGTH_OFFSET;

// Well-formed bytes may still describe sequences of different lengths.
const aligned = (b: BlobsBundle): BlobsBundle => {
  if (b.proofs.length !== b.commitments.length || b.blobs.length !== b.commitments.length)
    throw new SszDecodeError(
      "SSZ_LENGTH",
      "BlobsBundle",
      `${b.commitments.length} commitments, ${b.proofs.length} proofs, ${b.blobs.length} blobs`,
    );
  return b;
};

/** General container form of the bundle. */
export const blobsBundleSsz: SszType<BlobsBundle> = container<BlobsBundle>({
  fields: [
    ["commitments", commitments],
    ["proofs", proofs],
    ["blobs", blobs],
  ],
  write: (s, b) => {
    bundleLength(b);
    s.append(commitments, b.commitments);
    s.append(proofs, b.proofs);
    s.append(blobs, b.blobs);
  },
  read: (f) =>
    aligned({
      commitments: f.next(commitments),
      proofs: f.next(proofs),
      blobs: f.next(blobs),
    }),
});

/*
 * Specialized bundle codec. Every element is fixed-size, so the layout is three
 * offsets followed by three flat runs of equal-width elements; the bytes must
 * stay identical to `blobsBundleSsz`.
 */
export const encodeBlobsBundleSsz = (b: BlobsBundle): Uint8Array => {
  const n = bundleLength(b);
  const commitmentsEnd = BUNDLE_HEAD + n * BYTES_PER_COMMITMENT;
  const proofsEnd = commitmentsEnd + n * BYTES_PER_PROOF;
  const out = new Uint8Array(proofsEnd + n * BYTES_PER_BLOB);
  writeUint32LE(out, 0, BUNDLE_HEAD);
  writeUint32LE(out, 4, commitmentsEnd);
  writeUint32LE(out, 8, proofsEnd);
  const runs: [Uint8Array[], number, number][] = [
    [b.commitments, BUNDLE_HEAD, BYTES_PER_COMMITMENT],
    [b.proofs, commitmentsEnd, BYTES_PER_PROOF],
    [b.blobs, proofsEnd, BYTES_PER_BLOB],
  ];
  for (const [items, start, width] of runs)
    items.forEach((item, i) => {
      if (item.length !== width)
        throw new RangeError(`expected ${width}-byte bundle element, got ${item.length} bytes`);
      out.set(item, start + i * width);
    });
  return out;
};

const splitRun = (bytes: Uint8Array, width: number, path: string): Uint8Array[] => {
  if (bytes.length % width !== 0)
    throw new SszDecodeError(
      "SSZ_LENGTH",
      path,
      `${bytes.length} bytes is not a multiple of the ${width}-byte element size`,
    );
  const out: Uint8Array[] = [];
  for (let at = 0; at < bytes.length; at += width) out.push(bytes.slice(at, at + width));
  return out;
};

export const decodeBlobsBundleSsz = (bytes: Uint8Array): BlobsBundle => {
  if (bytes.length < BUNDLE_HEAD)
    throw new SszDecodeError(
      "SSZ_LENGTH",
      "BlobsBundle.commitments",
      `needs ${BUNDLE_HEAD} bytes, buffer has ${bytes.length}`,
    );
  const [c, p, b] = [0, 4, 8].map((at) => readUint32LE(bytes, at));
  if (c !== BUNDLE_HEAD)
    throw new SszDecodeError(
      "SSZ_OFFSET",
      "BlobsBundle.commitments",
      `first offset ${c} does not match fixed part length ${BUNDLE_HEAD}`,
    );
  if (p < c || p > bytes.length)
    throw new SszDecodeError("SSZ_OFFSET", "BlobsBundle.proofs", `offset ${p} outside [${c}, ${bytes.length}]`);
  if (b < p || b > bytes.length)
    throw new SszDecodeError("SSZ_OFFSET", "BlobsBundle.blobs", `offset ${b} outside [${p}, ${bytes.length}]`);
  return aligned({
    commitments: splitRun(bytes.subarray(c, p), BYTES_PER_COMMITMENT, "BlobsBundle.commitments"),
    proofs: splitRun(bytes.subarray(p, b), BYTES_PER_PROOF, "BlobsBundle.proofs"),
    blobs: splitRun(bytes.subarray(b), BYTES_PER_BLOB, "BlobsBundle.blobs"),
  });
};
