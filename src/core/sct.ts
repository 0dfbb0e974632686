// src/core/sct.ts

import { X509Certificate } from "@peculiar/x509";
import { AsnConvert, OctetString } from "@peculiar/asn1-schema";
import { SCT, SCTSource } from "./truststore/types";
import { readUint16BE, readUint64BE, toUint8Array } from "../utils/encoding";

/**
 * OID of the embedded SCT list extension (RFC 6962 section 3.3)
 */
export const id_sctList = "1.3.6.1.4.1.11129.2.4.2";

/** SCT v1 is encoded as version 0 */
const SCT_VERSION_V1 = 0;
const LOG_ID_OFFSET = 1;
const LOG_ID_SIZE = 32;
const TIMESTAMP_OFFSET = 33;
/** version(1) + log_id(32) + timestamp(8) + extensions length(2) + signature(2+) */
const SCT_MIN_SIZE = 45;
const LENGTH_PREFIX_SIZE = 2;

export class SCTParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SCTParseError";
  }
}

/**
 * Parse one serialized SignedCertificateTimestamp.
 * Only the version, log ID and timestamp are read; extensions and the
 * signature are left uninterpreted.
 */
export function parseSCT(data: ArrayBuffer | ArrayBufferView, source: SCTSource): SCT {
  const bytes = toUint8Array(data);

  if (bytes.length < SCT_MIN_SIZE) {
    throw new SCTParseError(`SCT too short: ${bytes.length} bytes`);
  }
  if (bytes[0] !== SCT_VERSION_V1) {
    throw new SCTParseError(`unsupported SCT version: ${bytes[0]}`);
  }

  const logId = bytes.slice(LOG_ID_OFFSET, LOG_ID_OFFSET + LOG_ID_SIZE);
  const timestampMs = readUint64BE(bytes, TIMESTAMP_OFFSET);

  return Object.freeze({
    timestamp: new Date(timestampMs),
    logId,
    source,
  });
}

/**
 * Parse the SCTs a server sent in the TLS signed_certificate_timestamp extension.
 * Malformed entries are skipped.
 */
export function extractTlsSCTs(blobs: Iterable<ArrayBuffer | ArrayBufferView>): SCT[] {
  const scts: SCT[] = [];
  for (const blob of blobs) {
    try {
      scts.push(parseSCT(blob, "tls"));
    } catch (error) {
      if (!(error instanceof SCTParseError)) {
        throw error;
      }
    }
  }
  return scts;
}

/**
 * Walk a TLS-encoded SignedCertificateTimestampList:
 * a 2-byte total length followed by [2-byte length][entry] records.
 * Malformed entries are skipped; a truncated list stops the walk.
 */
export function parseSCTList(list: Uint8Array, source: SCTSource): SCT[] {
  if (list.length < LENGTH_PREFIX_SIZE) {
    return [];
  }

  const listLength = readUint16BE(list, 0);
  const end = LENGTH_PREFIX_SIZE + listLength;
  if (list.length < end) {
    return [];
  }

  const scts: SCT[] = [];
  let offset = LENGTH_PREFIX_SIZE;

  while (offset < end) {
    if (offset + LENGTH_PREFIX_SIZE > list.length) {
      break;
    }
    const entryLength = readUint16BE(list, offset);
    offset += LENGTH_PREFIX_SIZE;

    if (offset + entryLength > list.length) {
      break;
    }
    const entry = list.subarray(offset, offset + entryLength);
    offset += entryLength;

    try {
      scts.push(parseSCT(entry, source));
    } catch (error) {
      if (!(error instanceof SCTParseError)) {
        throw error;
      }
    }
  }

  return scts;
}

/**
 * Extract SCTs embedded in a certificate's SCT list extension
 */
export function extractEmbeddedSCTs(cert: X509Certificate): SCT[] {
  const scts: SCT[] = [];

  for (const ext of cert.extensions) {
    if (ext.type !== id_sctList) {
      continue;
    }

    // The extension value is an OCTET STRING wrapping the TLS-encoded list
    let list: Uint8Array;
    try {
      list = toUint8Array(AsnConvert.parse(ext.value, OctetString).buffer);
    } catch (error) {
      console.warn(
        "Could not decode SCT list extension:",
        error instanceof Error ? error.message : String(error),
      );
      continue;
    }

    scts.push(...parseSCTList(list, "embedded"));
  }

  return scts;
}

/**
 * All SCTs for a chain: those from the TLS handshake first, then those embedded
 * in the leaf certificate
 */
export function collectSCTs(
  leaf: X509Certificate,
  tlsBlobs: Iterable<ArrayBuffer | ArrayBufferView> = [],
): SCT[] {
  return [...extractTlsSCTs(tlsBlobs), ...extractEmbeddedSCTs(leaf)];
}
