import fc from "fast-check";
import type { ExecutionPayloadV3 } from "../../src/model/payload";

const bytes = (max: number) => fc.uint8Array({ maxLength: max });
const fixed = (n: number) => fc.uint8Array({ minLength: n, maxLength: n });
const u64 = fc.bigUintN(64);
const u256 = fc.bigUintN(256);

const arbWithdrawal = fc.record({ index: u64, validatorIndex: u64, address: fixed(20), amount: u64 });

export const arbPayloadV3: fc.Arbitrary<ExecutionPayloadV3> = fc
  .record({
    parentHash: fixed(32),
    feeRecipient: fixed(20),
    stateRoot: fixed(32),
    receiptsRoot: fixed(32),
    logsBloom: fixed(256),
    prevRandao: fixed(32),
    blockNumber: u64,
    gasLimit: u64,
    gasUsed: u64,
    timestamp: u64,
    extraData: bytes(32),
    baseFeePerGas: u256,
    blockHash: fixed(32),
    transactions: fc.array(bytes(64), { maxLength: 4 }),
    difficulty: u256,
    nonce: fixed(8),
  })
  .chain((inner) =>
    fc.record({
      payloadInner: fc.record({
        payloadInner: fc.constant(inner),
        withdrawals: fc.array(arbWithdrawal, { maxLength: 4 }),
      }),
      blobGasUsed: u64,
      excessBlobGas: u64,
    }),
  );
