import type { BaseIssue } from "valibot";
import { getDotPath } from "valibot";

export type SszErrorCode = "SSZ_LENGTH" | "SSZ_OFFSET";
export type JsonErrorCode =
  | "JSON_SYNTAX"
  | "JSON_SHAPE"
  | "JSON_UNKNOWN_FIELD"
  | "JSON_NO_VARIANT";
export type CodecErrorCode = SszErrorCode | JsonErrorCode;

/** Recoverable decode failure: the caller should reject the input. */
export class CodecError extends Error {
  constructor(
    readonly code: CodecErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "CodecError";
  }
}

export class SszDecodeError extends CodecError {
  constructor(
    code: SszErrorCode,
    /** Dotted path of the offending field, e.g. `ExecutionPayloadV2.withdrawals[3]`. */
    readonly field: string,
    detail: string,
  ) {
    super(code, `${field}: ${detail}`);
    this.name = "SszDecodeError";
  }
}

export interface JsonIssue {
  readonly path: string | null;
  readonly message: string;
}

export class JsonDecodeError extends CodecError {
  constructor(
    code: JsonErrorCode,
    /** Name of the shape being decoded. */
    readonly target: string,
    readonly issues: readonly JsonIssue[],
    detail?: string,
  ) {
    super(code, `${target}: ${detail ?? describe(issues)}`);
    this.name = "JsonDecodeError";
  }

  static fromIssues(target: string, issues: readonly BaseIssue<unknown>[]): JsonDecodeError {
    // strict objects report an unknown key as an issue expecting `never`
    const unknownKey = issues.some((i) => i.kind === "schema" && i.expected === "never");
    return new JsonDecodeError(
      unknownKey ? "JSON_UNKNOWN_FIELD" : "JSON_SHAPE",
      target,
      issues.map((i) => ({ path: getDotPath(i), message: i.message })),
    );
  }
}

const describe = (issues: readonly JsonIssue[]): string =>
  issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");

/**
 * Contract violation on a blobs bundle (mismatched sequences, or taking more
 * than it holds). Not a `CodecError`: callers are expected to check lengths.
 */
export class BundleInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BundleInvariantError";
  }
}
