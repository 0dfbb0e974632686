// src/core/truststore/store.ts

import { X509Certificate } from "@peculiar/x509";
import { Fingerprint } from "../fingerprint";
import { Constraints, Platform, PlatformVersion, isEmptyConstraints } from "./types";

const NO_CONSTRAINTS: Constraints = Object.freeze({});

/**
 * A root CA entry as it is added to a store
 */
export interface StoreEntry {
  fingerprint: Fingerprint;
  constraints?: Constraints;
}

/**
 * Root CAs trusted by one platform version. Immutable once constructed.
 */
export class Store {
  readonly platform: Platform;
  readonly version: string;
  readonly fingerprints: readonly Fingerprint[];
  private readonly constraints: ReadonlyMap<string, Constraints>;

  constructor(platform: Platform, version: string, entries: readonly StoreEntry[]) {
    const fingerprints: Fingerprint[] = [];
    const seen = new Set<string>();
    const constraints = new Map<string, Constraints>();

    for (const entry of entries) {
      const key = entry.fingerprint.toString();
      if (!seen.has(key)) {
        seen.add(key);
        fingerprints.push(entry.fingerprint);
      }
      if (entry.constraints && !isEmptyConstraints(entry.constraints)) {
        constraints.set(key, Object.freeze({ ...entry.constraints }));
      }
    }

    this.platform = platform;
    this.version = version;
    this.fingerprints = Object.freeze(fingerprints);
    this.constraints = constraints;
    Object.freeze(this);
  }

  get platformVersion(): PlatformVersion {
    return { platform: this.platform, version: this.version };
  }

  /**
   * Constraints for a root CA; the empty constraint when it has none
   */
  constraintFor(fingerprint: Fingerprint): Constraints {
    return this.constraints.get(fingerprint.toString()) ?? NO_CONSTRAINTS;
  }
}

/**
 * Parsed root certificates keyed by fingerprint.
 * A fingerprint listed by a store but absent here is a known root whose
 * certificate bytes are unavailable.
 */
export class CertificateRegistry {
  private readonly certs: ReadonlyMap<string, X509Certificate>;

  constructor(certificates: Iterable<readonly [Fingerprint, X509Certificate]> = []) {
    const certs = new Map<string, X509Certificate>();
    for (const [fingerprint, cert] of certificates) {
      certs.set(fingerprint.toString(), cert);
    }
    this.certs = certs;
    Object.freeze(this);
  }

  /**
   * Build a registry keyed by each certificate's computed fingerprint
   */
  static fromCertificates(certificates: Iterable<X509Certificate>): CertificateRegistry {
    const entries: [Fingerprint, X509Certificate][] = [];
    for (const cert of certificates) {
      entries.push([Fingerprint.fromCertificate(cert), cert]);
    }
    return new CertificateRegistry(entries);
  }

  get(fingerprint: Fingerprint): X509Certificate | null {
    return this.certs.get(fingerprint.toString()) ?? null;
  }

  get size(): number {
    return this.certs.size;
  }
}

/**
 * Everything loaded from the persisted trust-store records, shared read-only by
 * the filter and the validation engine
 */
export interface TrustStoreSnapshot {
  readonly stores: readonly Store[];
  readonly registry: CertificateRegistry;
}
