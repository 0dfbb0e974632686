// src/core/truststore/loader.ts

import { X509Certificate } from "@peculiar/x509";
import { z } from "zod";
import { getCertificateDisplayName, parseCertificatePEM } from "../certificate";
import { Fingerprint } from "../fingerprint";
import { CertificateRegistry, Store, StoreEntry, TrustStoreSnapshot } from "./store";
import { Constraints, PLATFORMS, Platform } from "./types";

/**
 * Raised when persisted trust-store records cannot be loaded
 */
export class TrustStoreLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TrustStoreLoadError";
  }
}

const fingerprintSchema = z.string().transform((value, ctx) => {
  try {
    return Fingerprint.parse(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

/** RFC 3339 timestamp, or empty/absent for "no constraint" */
const optionalDateSchema = z
  .union([z.string().datetime({ offset: true }), z.literal("")])
  .optional()
  .transform((value) => (value ? new Date(value) : undefined));

const platformSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(PLATFORMS));

/**
 * One persisted root certificate: its fingerprint and PEM text
 */
export const certificateRecordSchema = z.object({
  fingerprint: fingerprintSchema,
  pem: z.string().min(1),
});

/**
 * One root CA listed in one platform version's store
 */
export const storeEntryRecordSchema = z.object({
  platform: platformSchema,
  version: z.string().trim().min(1),
  fingerprint: fingerprintSchema,
  notBeforeMax: optionalDateSchema,
  distrustDate: optionalDateSchema,
  sctNotAfter: optionalDateSchema,
});

export type CertificateRecord = z.input<typeof certificateRecordSchema>;
export type StoreEntryRecord = z.input<typeof storeEntryRecordSchema>;

export interface TrustStoreRecords {
  certificates: readonly CertificateRecord[];
  entries: readonly StoreEntryRecord[];
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function loadCertificates(records: readonly CertificateRecord[]): CertificateRegistry {
  const entries: [Fingerprint, X509Certificate][] = [];

  records.forEach((record, index) => {
    const parsed = certificateRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new TrustStoreLoadError(`certificate record ${index}: ${describeIssues(parsed.error)}`);
    }

    const { fingerprint, pem } = parsed.data;
    let cert: X509Certificate;
    try {
      cert = parseCertificatePEM(pem);
    } catch (error) {
      throw new TrustStoreLoadError(
        `certificate ${fingerprint.toString()}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const actual = Fingerprint.fromCertificate(cert);
    if (!actual.equals(fingerprint)) {
      throw new TrustStoreLoadError(
        `certificate ${fingerprint.toString()}: PEM hashes to ${actual.toString()}`,
      );
    }

    entries.push([fingerprint, cert]);
  });

  return new CertificateRegistry(entries);
}

function loadStores(records: readonly StoreEntryRecord[]): Store[] {
  // Keyed by platform and version, in first-seen order
  const groups = new Map<string, { platform: Platform; version: string; entries: StoreEntry[] }>();

  records.forEach((record, index) => {
    const parsed = storeEntryRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new TrustStoreLoadError(`store entry ${index}: ${describeIssues(parsed.error)}`);
    }

    const { platform, version, fingerprint, notBeforeMax, distrustDate, sctNotAfter } =
      parsed.data;
    const constraints: Constraints = {};
    if (notBeforeMax) constraints.notBeforeMax = notBeforeMax;
    if (distrustDate) constraints.distrustDate = distrustDate;
    if (sctNotAfter) constraints.sctNotAfter = sctNotAfter;

    const key = `${platform}\u0000${version}`;
    let group = groups.get(key);
    if (!group) {
      group = { platform, version, entries: [] };
      groups.set(key, group);
    }
    group.entries.push({ fingerprint, constraints });
  });

  return Array.from(groups.values(), (g) => new Store(g.platform, g.version, g.entries));
}

/**
 * Build the immutable trust-store snapshot from persisted records.
 * Store entries sharing a platform and version aggregate into one Store.
 */
export function loadTrustStore(records: TrustStoreRecords): TrustStoreSnapshot {
  const registry = loadCertificates(records.certificates);
  const stores = loadStores(records.entries);

  const unavailable = new Set<string>();
  for (const store of stores) {
    for (const fingerprint of store.fingerprints) {
      if (!registry.get(fingerprint)) {
        unavailable.add(fingerprint.toString());
      }
    }
  }
  if (unavailable.size > 0) {
    console.warn(`Trust store lists ${unavailable.size} root(s) without certificate data`);
  }

  return Object.freeze({ stores: Object.freeze(stores), registry });
}

/**
 * One row of a trust-store listing
 */
export interface StoreListEntry {
  platform: Platform;
  version: string;
  fingerprint: Fingerprint;
  /** Root CA display name, or "-" when its certificate is unavailable */
  issuer: string;
  constraints: Constraints;
}

/**
 * Flatten stores into one row per root CA
 */
export function listStoreEntries(
  stores: readonly Store[],
  registry: CertificateRegistry,
): StoreListEntry[] {
  const rows: StoreListEntry[] = [];
  for (const store of stores) {
    for (const fingerprint of store.fingerprints) {
      const cert = registry.get(fingerprint);
      rows.push({
        platform: store.platform,
        version: store.version,
        fingerprint,
        issuer: cert ? getCertificateDisplayName(cert) || "-" : "-",
        constraints: store.constraintFor(fingerprint),
      });
    }
  }
  return rows;
}
