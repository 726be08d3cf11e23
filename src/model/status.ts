import { bytesToHex } from "../utils/bytes";

export type PayloadStatusEnum =
  | { status: "VALID" }
  | { status: "INVALID"; validationError: string }
  | { status: "SYNCING" }
  | { status: "ACCEPTED" };

export type PayloadStatusKind = PayloadStatusEnum["status"];

/** Result of processing a payload or a fork choice update. */
export type PayloadStatus = {
  status: PayloadStatusEnum;
  /** Most recent valid block in the branch of the payload, if known. */
  latestValidHash: Uint8Array | null;
};

export const VALID: PayloadStatusEnum = { status: "VALID" };
export const SYNCING: PayloadStatusEnum = { status: "SYNCING" };
export const ACCEPTED: PayloadStatusEnum = { status: "ACCEPTED" };
export const invalid = (validationError: string): PayloadStatusEnum => ({
  status: "INVALID",
  validationError,
});

export const payloadStatus = (
  status: PayloadStatusEnum,
  latestValidHash: Uint8Array | null = null,
): PayloadStatus => ({ status, latestValidHash });

export const withLatestValidHash = (s: PayloadStatus, hash: Uint8Array | null): PayloadStatus => ({
  ...s,
  latestValidHash: hash,
});

export const validationError = (s: PayloadStatusEnum): string | null =>
  s.status === "INVALID" ? s.validationError : null;

export const isValid = (s: PayloadStatus) => s.status.status === "VALID";
export const isInvalid = (s: PayloadStatus) => s.status.status === "INVALID";
export const isSyncing = (s: PayloadStatus) => s.status.status === "SYNCING";
export const isAccepted = (s: PayloadStatus) => s.status.status === "ACCEPTED";

export const formatStatus = (s: PayloadStatusEnum): string =>
  s.status === "INVALID" ? `INVALID: ${s.validationError}` : s.status;

export const formatPayloadStatus = (s: PayloadStatus): string =>
  `PayloadStatus { status: ${formatStatus(s.status)}, latestValidHash: ${
    s.latestValidHash ? bytesToHex(s.latestValidHash) : "null"
  } }`;
