// src/core/chain/errors.ts

/**
 * Categories of path verification failure
 */
export type ChainErrorCode =
  | "UNKNOWN_AUTHORITY"
  | "EXPIRED"
  | "NOT_AUTHORIZED_TO_SIGN"
  | "TOO_MANY_INTERMEDIATES"
  | "INCOMPATIBLE_USAGE"
  | "NAME_MISMATCH"
  | "CA_NOT_AUTHORIZED_FOR_NAME"
  | "HOSTNAME_MISMATCH"
  | "OTHER";

export class ChainVerificationError extends Error {
  readonly code: ChainErrorCode;
  /** Underlying diagnostic, e.g. which certificate failed and why */
  readonly detail: string;
  /** Host name for HOSTNAME_MISMATCH */
  readonly host?: string;

  constructor(code: ChainErrorCode, detail: string = "", host?: string) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = "ChainVerificationError";
    this.code = code;
    this.detail = detail;
    this.host = host;
  }
}

/**
 * Human-readable reason for a path verification failure
 */
export function describeVerificationError(error: unknown): string {
  if (!(error instanceof ChainVerificationError)) {
    return error instanceof Error ? error.message : String(error);
  }

  switch (error.code) {
    case "UNKNOWN_AUTHORITY":
      return "certificate signed by unknown authority";
    case "EXPIRED":
      return "certificate has expired or is not yet valid";
    case "NOT_AUTHORIZED_TO_SIGN":
      return "certificate is not authorized to sign other certificates";
    case "TOO_MANY_INTERMEDIATES":
      return "too many intermediates for path length constraint";
    case "INCOMPATIBLE_USAGE":
      return "certificate specifies an incompatible key usage";
    case "NAME_MISMATCH":
      return "issuer name does not match subject";
    case "CA_NOT_AUTHORIZED_FOR_NAME":
      return "CA is not authorized for this name";
    case "HOSTNAME_MISMATCH":
      return `certificate is not valid for ${error.host ?? ""}`;
    case "OTHER":
      return error.detail || error.message;
  }
}
