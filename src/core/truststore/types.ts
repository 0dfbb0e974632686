// src/core/truststore/types.ts

import { X509Certificate } from "@peculiar/x509";

/**
 * Supported platforms, in the order they are listed to users
 */
export const PLATFORMS = [
  "ios",
  "ipados",
  "macos",
  "tvos",
  "visionos",
  "watchos",
  "android",
  "chrome",
  "windows",
] as const;

export type Platform = (typeof PLATFORMS)[number];

/**
 * Normalize a platform name (case-insensitive). Returns null for unknown names.
 */
export function parsePlatform(name: string): Platform | null {
  const normalized = name.trim().toLowerCase();
  return PLATFORMS.find((p) => p === normalized) ?? null;
}

/**
 * One trust-store snapshot: a platform and a version ("17.4", "14", "current")
 */
export interface PlatformVersion {
  platform: Platform;
  version: string;
}

/**
 * Date constraints attached to a root CA within one store
 */
export interface Constraints {
  /** Leaf certificates with a notBefore after this date are not trusted (Windows) */
  notBeforeMax?: Date;
  /** The CA is wholly distrusted after this date (Windows) */
  distrustDate?: Date;
  /** At least one SCT must be at or before this date (Chrome) */
  sctNotAfter?: Date;
}

export function isEmptyConstraints(constraints: Constraints): boolean {
  return (
    constraints.notBeforeMax === undefined &&
    constraints.distrustDate === undefined &&
    constraints.sctNotAfter === undefined
  );
}

/**
 * Where a Signed Certificate Timestamp was obtained
 */
export type SCTSource = "tls" | "embedded";

/**
 * Signed Certificate Timestamp (RFC 6962)
 */
export interface SCT {
  /** When the certificate was logged */
  readonly timestamp: Date;
  /** 32-byte CT log identifier */
  readonly logId: Uint8Array;
  readonly source: SCTSource;
}

/**
 * Certificate chain as presented by a server
 */
export interface CertChain {
  endpoint: string;
  leaf: X509Certificate;
  /** Intermediates exactly as the server sent them, in order */
  intermediates: readonly X509Certificate[];
  /** SCTs from the TLS extension and from the leaf certificate */
  scts: readonly SCT[];
}

/**
 * Outcome of validating one chain against one store
 */
export interface TrustResult {
  readonly platform: PlatformVersion;
  readonly trusted: boolean;
  /** Display name of the root CA that anchored the chain */
  readonly matchedCA: string;
  /** Leaf first, root last; present when path verification succeeded */
  readonly verifiedChain?: readonly X509Certificate[];
  /** Why the chain is not trusted; empty when trusted */
  readonly failureReason: string;
}

/**
 * Complete result of checking one endpoint
 */
export interface ValidationReport {
  endpoint: string;
  timestamp: Date;
  toolVersion: string;
  chain: CertChain;
  results: readonly TrustResult[];
  allPassed: boolean;
}
