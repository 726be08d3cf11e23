import type { PayloadAttributes } from "../model/attributes";
import type {
  ExecutionPayloadEnvelopeV2,
  ExecutionPayloadEnvelopeV3,
  ExecutionPayloadEnvelopeV4,
  ExecutionPayloadInputV2,
} from "../model/envelope";
import type { ExecutionPayload, ExecutionPayloadV1, ExecutionPayloadV2, ExecutionPayloadV3 } from "../model/payload";
import type { PayloadStatus } from "../model/status";
import {
  decodeEnvelopeV2,
  decodeEnvelopeV3,
  decodeEnvelopeV4,
  decodePayloadAttributes,
  decodePayloadInputV2,
  decodePayloadStatus,
  encodeEnvelopeV2,
  encodeEnvelopeV3,
  encodeEnvelopeV4,
  encodePayloadAttributes,
  encodePayloadInputV2,
  encodePayloadStatus,
} from "./envelopeJson";
import {
  decodeExecutionPayload,
  decodePayloadV1,
  decodePayloadV2,
  decodePayloadV3,
  encodeExecutionPayload,
  encodePayloadV1,
  encodePayloadV2,
  encodePayloadV3,
  fromJson,
  toJson,
} from "./json";

/* Text entry points: parse then decode, encode then stringify. */

export const payloadV1FromJson = (text: string): ExecutionPayloadV1 => fromJson(text, decodePayloadV1);
export const payloadV1ToJson = (p: ExecutionPayloadV1): string => toJson(encodePayloadV1(p));

export const payloadV2FromJson = (text: string): ExecutionPayloadV2 => fromJson(text, decodePayloadV2);
export const payloadV2ToJson = (p: ExecutionPayloadV2): string => toJson(encodePayloadV2(p));

export const payloadV3FromJson = (text: string): ExecutionPayloadV3 => fromJson(text, decodePayloadV3);
export const payloadV3ToJson = (p: ExecutionPayloadV3): string => toJson(encodePayloadV3(p));

export const executionPayloadFromJson = (text: string): ExecutionPayload =>
  fromJson(text, decodeExecutionPayload);
export const executionPayloadToJson = (p: ExecutionPayload): string => toJson(encodeExecutionPayload(p));

export const payloadInputV2FromJson = (text: string): ExecutionPayloadInputV2 =>
  fromJson(text, decodePayloadInputV2);
export const payloadInputV2ToJson = (input: ExecutionPayloadInputV2): string =>
  toJson(encodePayloadInputV2(input));

export const envelopeV2FromJson = (text: string): ExecutionPayloadEnvelopeV2 => fromJson(text, decodeEnvelopeV2);
export const envelopeV2ToJson = (e: ExecutionPayloadEnvelopeV2): string => toJson(encodeEnvelopeV2(e));

export const envelopeV3FromJson = (text: string): ExecutionPayloadEnvelopeV3 => fromJson(text, decodeEnvelopeV3);
export const envelopeV3ToJson = (e: ExecutionPayloadEnvelopeV3): string => toJson(encodeEnvelopeV3(e));

export const envelopeV4FromJson = (text: string): ExecutionPayloadEnvelopeV4 => fromJson(text, decodeEnvelopeV4);
export const envelopeV4ToJson = (e: ExecutionPayloadEnvelopeV4): string => toJson(encodeEnvelopeV4(e));

export const payloadStatusFromJson = (text: string): PayloadStatus => fromJson(text, decodePayloadStatus);
export const payloadStatusToJson = (s: PayloadStatus): string => toJson(encodePayloadStatus(s));

export const payloadAttributesFromJson = (text: string): PayloadAttributes =>
  fromJson(text, decodePayloadAttributes);
export const payloadAttributesToJson = (a: PayloadAttributes): string => toJson(encodePayloadAttributes(a));
