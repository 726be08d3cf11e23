export * from "./types/brands";
export * from "./errors";
export { type Config, config, loadConfig } from "./config";
export { type ILogger, logger, makeLogger } from "./logging";

export * from "./model/payload";
export * from "./model/bundle";
export * from "./model/status";
export * from "./model/attributes";
export * from "./model/envelope";

export { U256_MAX, U64_MAX, fromQuantity, toQuantity } from "./codec/quantity";
export { type SszType, deserialize, serialize } from "./codec/ssz";
export * from "./codec/payloadSsz";
export {
  type Candidate,
  type ExecutionPayloadJson,
  type PayloadV1Json,
  type PayloadV2Json,
  type PayloadV3Json,
  type PayloadV4Json,
  type WithdrawalJson,
  decodeExecutionPayload,
  decodePayloadV1,
  decodePayloadV2,
  decodePayloadV3,
  decodePayloadV4,
  encodeExecutionPayload,
  encodePayloadV1,
  encodePayloadV2,
  encodePayloadV3,
  encodePayloadV4,
  encodeWithdrawal,
  fromJson,
  parseJson,
  resolveUntagged,
  toJson,
} from "./codec/json";
export * from "./codec/envelopeJson";
export * from "./codec/text";
