// src/core/chain/verify.ts

import * as asn1js from "asn1js";
import * as pkijs from "pkijs";
import {
  X509Certificate,
  BasicConstraintsExtension,
  ExtendedKeyUsageExtension,
  SubjectAlternativeNameExtension,
} from "@peculiar/x509";
import { checkCertificateValidity, getDnsNames } from "../certificate";
import { Fingerprint } from "../fingerprint";
import { ChainVerificationError } from "./errors";

pkijs.setEngine("trustvet", new pkijs.CryptoEngine({ name: "trustvet", crypto }));

/** id-kp-serverAuth */
const SERVER_AUTH = "1.3.6.1.5.5.7.3.1";
/** anyExtendedKeyUsage */
const ANY_EXTENDED_KEY_USAGE = "2.5.29.37.0";

/**
 * Message of the plain Error the chain engine throws when an issuer lookup
 * finds nothing
 */
const NO_ISSUER_MESSAGE = "No valid certificate paths found";

export interface PathVerificationOptions {
  /** Time at which every certificate on the path must be valid */
  date: Date;
  /** Host name the leaf must cover; unchecked when absent */
  hostname?: string;
  /** Upper bound on intermediates in the verified path */
  maxIntermediates: number;
}

export type PathVerificationResult =
  | { isValid: true; chain: X509Certificate[] }
  | { isValid: false; error: ChainVerificationError };

function normalizeHost(name: string): string {
  return name.trim().toLowerCase().replace(/\.$/, "");
}

/**
 * Match a host against a SAN DNS pattern; a wildcard covers exactly one
 * leftmost label
 */
export function matchHostname(pattern: string, host: string): boolean {
  const p = normalizeHost(pattern);
  const h = normalizeHost(host);
  if (p === "" || h === "") {
    return false;
  }
  if (!p.startsWith("*.")) {
    return p === h;
  }
  const suffix = p.substring(1);
  const firstDot = h.indexOf(".");
  return firstDot > 0 && h.substring(firstDot) === suffix;
}

function verifyHostname(leaf: X509Certificate, hostname: string): boolean {
  if (getDnsNames(leaf).some((name) => matchHostname(name, hostname))) {
    return true;
  }
  const san = leaf.getExtension(SubjectAlternativeNameExtension);
  if (!san) {
    return false;
  }
  return san.names.items.some((name) => name.type === "ip" && name.value === hostname.trim());
}

function hasServerAuthUsage(cert: X509Certificate): boolean {
  const eku = cert.getExtension(ExtendedKeyUsageExtension);
  if (!eku) {
    return true;
  }
  return eku.usages.some((usage) => {
    const oid = String(usage);
    return oid === SERVER_AUTH || oid === ANY_EXTENDED_KEY_USAGE;
  });
}

function toPkijs(cert: X509Certificate): pkijs.Certificate {
  const asn1 = asn1js.fromBER(cert.rawData);
  if (asn1.offset === -1) {
    throw new Error(`Failed to decode certificate ${cert.subject}`);
  }
  return new pkijs.Certificate({ schema: asn1.result });
}

/**
 * OID of the first critical extension the chain engine has no parser for
 */
function unhandledCriticalExtension(cert: pkijs.Certificate): string | undefined {
  const extension = (cert.extensions ?? []).find((ext) => ext.critical && !ext.parsedValue);
  return extension?.extnID;
}

/**
 * Map a failed engine result onto a verification error.
 *
 * The engine folds every CA check of a path into one code (14), so an
 * unhandled critical extension is looked up again on the CA certificates to
 * report it as such.
 */
function classifyEngineFailure(
  result: pkijs.CertificateChainValidationEngineVerifyResult,
  cas: readonly pkijs.Certificate[],
  all: readonly X509Certificate[],
  date: Date,
): ChainVerificationError {
  switch (result.resultCode) {
    case 8: {
      const reasons = all.map((cert) => ({ cert, validity: checkCertificateValidity(cert, date) }));
      const expired = reasons.find((r) => !r.validity.isValid);
      return new ChainVerificationError(
        "EXPIRED",
        expired ? `${expired.cert.subject}: ${expired.validity.reason}` : result.resultMessage,
      );
    }
    case 3:
    case 4:
    case 7:
    case 14: {
      for (const ca of cas) {
        const oid = unhandledCriticalExtension(ca);
        if (oid) {
          return new ChainVerificationError("OTHER", `unhandled critical extension ${oid}`);
        }
      }
      return new ChainVerificationError("NOT_AUTHORIZED_TO_SIGN", result.resultMessage);
    }
    case 6:
      return new ChainVerificationError("OTHER", result.resultMessage);
    case 10:
      return new ChainVerificationError("NAME_MISMATCH", result.resultMessage);
    case 21:
    case 41:
    case 42:
      return new ChainVerificationError("CA_NOT_AUTHORIZED_FOR_NAME", result.resultMessage);
    case 9:
    case pkijs.ChainValidationCode.noPath:
    case pkijs.ChainValidationCode.noValidPath:
      return new ChainVerificationError("UNKNOWN_AUTHORITY", result.resultMessage);
    case pkijs.ChainValidationCode.unknown:
      if (result.resultMessage === NO_ISSUER_MESSAGE) {
        return new ChainVerificationError("UNKNOWN_AUTHORITY", result.resultMessage);
      }
      return new ChainVerificationError("OTHER", result.resultMessage);
    default:
      return new ChainVerificationError("OTHER", result.resultMessage);
  }
}

/**
 * Checks on a path the engine has already verified: extended key usage
 * below the anchor, path length constraints, and critical extensions on the
 * leaf (the engine only inspects those of CA certificates)
 */
function checkVerifiedPath(
  chain: readonly X509Certificate[],
  leaf: pkijs.Certificate,
  maxIntermediates: number,
): ChainVerificationError | null {
  const leafExtension = unhandledCriticalExtension(leaf);
  if (leafExtension) {
    return new ChainVerificationError("OTHER", `unhandled critical extension ${leafExtension}`);
  }

  for (const cert of chain.slice(0, -1)) {
    if (!hasServerAuthUsage(cert)) {
      return new ChainVerificationError("INCOMPATIBLE_USAGE", cert.subject);
    }
  }

  for (let i = 1; i < chain.length; i++) {
    const basicConstraints = chain[i].getExtension(BasicConstraintsExtension);
    const below = i - 1;
    if (basicConstraints?.pathLength !== undefined && below > basicConstraints.pathLength) {
      return new ChainVerificationError(
        "TOO_MANY_INTERMEDIATES",
        `${chain[i].subject} allows ${basicConstraints.pathLength}, path has ${below}`,
      );
    }
  }

  const intermediates = chain.length - 2;
  if (intermediates > maxIntermediates) {
    return new ChainVerificationError("OTHER", `no path within ${maxIntermediates} intermediates`);
  }

  return null;
}

/**
 * Build and verify a path from the leaf through the supplied intermediates to
 * one of the trust anchors.
 *
 * Path building, signatures, validity periods, CA basic constraints, key usage
 * and name constraints are checked by the PKI.js chain validation engine at
 * `date`. The host name is checked first; extended key usage, path length
 * constraints and the intermediate limit are checked on the verified path.
 */
export async function verifyPath(
  leaf: X509Certificate,
  intermediates: readonly X509Certificate[],
  anchors: readonly X509Certificate[],
  options: PathVerificationOptions,
): Promise<PathVerificationResult> {
  if (options.hostname && !verifyHostname(leaf, options.hostname)) {
    return {
      isValid: false,
      error: new ChainVerificationError("HOSTNAME_MISMATCH", "", options.hostname),
    };
  }

  // A leaf that is itself trusted needs no path
  const leafFingerprint = Fingerprint.fromCertificate(leaf);
  if (anchors.some((anchor) => Fingerprint.fromCertificate(anchor).equals(leafFingerprint))) {
    return { isValid: true, chain: [leaf] };
  }

  const originals = new Map<pkijs.Certificate, X509Certificate>();
  const convert = (cert: X509Certificate): pkijs.Certificate => {
    const converted = toPkijs(cert);
    originals.set(converted, cert);
    return converted;
  };

  const trustedCerts = anchors.map(convert);
  const certs = intermediates.map(convert);
  const endEntity = convert(leaf);

  // The end-entity certificate goes last
  const engine = new pkijs.CertificateChainValidationEngine({
    trustedCerts,
    certs: [...certs, endEntity],
    crls: [],
    checkDate: options.date,
  });
  const result = await engine.verify();

  if (!result.result) {
    return {
      isValid: false,
      error: classifyEngineFailure(
        result,
        [...certs, ...trustedCerts],
        [leaf, ...intermediates, ...anchors],
        options.date,
      ),
    };
  }

  const chain: X509Certificate[] = [];
  for (const cert of result.certificatePath ?? []) {
    const original = originals.get(cert);
    if (!original) {
      return {
        isValid: false,
        error: new ChainVerificationError("OTHER", "verified path holds an unknown certificate"),
      };
    }
    chain.push(original);
  }

  const violation = checkVerifiedPath(chain, endEntity, options.maxIntermediates);
  if (violation) {
    return { isValid: false, error: violation };
  }

  return { isValid: true, chain };
}
