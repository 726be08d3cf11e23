import {
  ByteListType,
  ByteVectorType,
  ContainerType,
  ListCompositeType,
  UintBigintType,
} from "@chainsafe/ssz";
import type { BlobsBundle } from "../../src/model/bundle";
import type { ExecutionPayloadV1, ExecutionPayloadV2, ExecutionPayloadV3 } from "../../src/model/payload";

// Reference container definitions; limits only bound the reference library.
const uint64 = new UintBigintType(8);
const uint256 = new UintBigintType(32);
const bytes32 = new ByteVectorType(32);
const bytes20 = new ByteVectorType(20);

const withdrawal = new ContainerType({
  index: uint64,
  validatorIndex: uint64,
  address: bytes20,
  amount: uint64,
});

const v1Fields = {
  parentHash: bytes32,
  feeRecipient: bytes20,
  stateRoot: bytes32,
  receiptsRoot: bytes32,
  logsBloom: new ByteVectorType(256),
  prevRandao: bytes32,
  blockNumber: uint64,
  gasLimit: uint64,
  gasUsed: uint64,
  timestamp: uint64,
  extraData: new ByteListType(32),
  baseFeePerGas: uint256,
  blockHash: bytes32,
  transactions: new ListCompositeType(new ByteListType(1 << 30), 1 << 20),
  difficulty: uint256,
  nonce: new ByteVectorType(8),
};

const v2Fields = { ...v1Fields, withdrawals: new ListCompositeType(withdrawal, 16) };

export const OraclePayloadV1 = new ContainerType(v1Fields);
export const OraclePayloadV2 = new ContainerType(v2Fields);
export const OraclePayloadV3 = new ContainerType({
  ...v2Fields,
  blobGasUsed: uint64,
  excessBlobGas: uint64,
});

export const OracleBlobsBundle = new ContainerType({
  commitments: new ListCompositeType(new ByteVectorType(48), 4096),
  proofs: new ListCompositeType(new ByteVectorType(48), 4096),
  blobs: new ListCompositeType(new ByteVectorType(131072), 4096),
});

export const oracleV1 = (p: ExecutionPayloadV1): Uint8Array => OraclePayloadV1.serialize(p);

export const oracleV2 = (p: ExecutionPayloadV2): Uint8Array =>
  OraclePayloadV2.serialize({ ...p.payloadInner, withdrawals: p.withdrawals });

export const oracleV3 = (p: ExecutionPayloadV3): Uint8Array =>
  OraclePayloadV3.serialize({
    ...p.payloadInner.payloadInner,
    withdrawals: p.payloadInner.withdrawals,
    blobGasUsed: p.blobGasUsed,
    excessBlobGas: p.excessBlobGas,
  });

export const oracleBundle = (b: BlobsBundle): Uint8Array => OracleBlobsBundle.serialize(b);
