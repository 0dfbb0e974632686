// src/core/fingerprint.ts

import { createHash } from "crypto";
import { X509Certificate } from "@peculiar/x509";
import { bytesToHex, hexToBytes, toUint8Array } from "../utils/encoding";

/**
 * Number of bytes in a SHA-256 fingerprint
 */
export const FINGERPRINT_SIZE = 32;

/**
 * 64 hex characters without separators
 */
const RAW_HEX_PATTERN = /^[0-9A-Fa-f]{64}$/;

/**
 * 32 hex pairs joined by one separator, the same one throughout
 */
const SEPARATED_PATTERN =
  /^[0-9A-Fa-f]{2}(?::[0-9A-Fa-f]{2}){31}$|^[0-9A-Fa-f]{2}(?:-[0-9A-Fa-f]{2}){31}$|^[0-9A-Fa-f]{2}(?: [0-9A-Fa-f]{2}){31}$/;

/**
 * Thrown when a fingerprint string or byte array is malformed
 */
export class FingerprintParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FingerprintParseError";
  }
}

/**
 * SHA-256 digest of a certificate's DER encoding, used as its identity
 */
export class Fingerprint {
  private readonly data: Uint8Array;
  private readonly text: string;

  private constructor(data: Uint8Array) {
    this.data = data;
    this.text = bytesToHex(data, ":");
  }

  /**
   * Parse a fingerprint from either 64 contiguous hex characters or 32 hex pairs
   * separated consistently by ":", "-" or " ".
   *
   * Inputs that are merely close (a doubled separator, mixed separators, a
   * trailing separator) are rejected rather than normalized.
   */
  static parse(input: string): Fingerprint {
    const trimmed = input.trim();
    if (trimmed === "") {
      throw new FingerprintParseError("empty fingerprint");
    }

    let hex: string;
    if (RAW_HEX_PATTERN.test(trimmed)) {
      hex = trimmed;
    } else if (SEPARATED_PATTERN.test(trimmed)) {
      hex = trimmed.replace(/[: -]/g, "");
    } else {
      throw new FingerprintParseError(
        "invalid fingerprint format: must be 64 hex chars or 32 hex pairs with consistent separator",
      );
    }

    return new Fingerprint(hexToBytes(hex));
  }

  /**
   * Create a fingerprint from exactly 32 raw bytes (copied)
   */
  static fromRawBytes(bytes: ArrayBuffer | ArrayBufferView): Fingerprint {
    const view = toUint8Array(bytes);
    if (view.length !== FINGERPRINT_SIZE) {
      throw new FingerprintParseError(
        `fingerprint must be ${FINGERPRINT_SIZE} bytes, got ${view.length}`,
      );
    }
    return new Fingerprint(Uint8Array.from(view));
  }

  /**
   * SHA-256 over the certificate's raw DER bytes
   */
  static fromCertificate(cert: X509Certificate): Fingerprint {
    const digest = createHash("sha256").update(toUint8Array(cert.rawData)).digest();
    return new Fingerprint(new Uint8Array(digest));
  }

  bytes(): Uint8Array {
    return Uint8Array.from(this.data);
  }

  equals(other: Fingerprint): boolean {
    return this.text === other.text;
  }

  isZero(): boolean {
    return this.data.every((b) => b === 0);
  }

  /**
   * Abbreviated form: the first `octets` pairs followed by "...".
   * Returns "" for octets <= 0 and the full string when octets covers every byte.
   */
  truncate(octets: number): string {
    if (octets <= 0) {
      return "";
    }
    if (octets >= FINGERPRINT_SIZE) {
      return this.text;
    }
    return bytesToHex(this.data.subarray(0, octets), ":") + "...";
  }

  /**
   * Canonical "AA:BB:...:FF" form
   */
  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }
}
