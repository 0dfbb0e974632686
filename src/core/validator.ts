// src/core/validator.ts

import { X509Certificate } from "@peculiar/x509";
import { getCertificateDisplayName } from "./certificate";
import { verifyPath } from "./chain/verify";
import { describeVerificationError } from "./chain/errors";
import { Fingerprint } from "./fingerprint";
import { filterStores } from "./filter/matcher";
import { parseFilter } from "./filter/parser";
import { CertificateRegistry, Store, TrustStoreSnapshot } from "./truststore/store";
import { CertChain, Constraints, TrustResult, isEmptyConstraints } from "./truststore/types";
import { formatDate } from "../utils/encoding";

/**
 * Options for validating a chain against trust stores
 */
export interface ValidationOptions {
  /** Clock used for CA distrust dates and certificate validity (default: wall-clock time) */
  now?: () => Date;
  /** Host name the leaf certificate must cover (default: not checked) */
  hostname?: string;
  /** Upper bound on intermediates in the verified path (default: 10) */
  maxIntermediates?: number;
}

/**
 * Default options for validation
 */
export const DEFAULT_VALIDATION_OPTIONS: Required<Omit<ValidationOptions, "hostname">> = {
  now: () => new Date(),
  maxIntermediates: 10,
};

/**
 * Raised when a filter selects no trust stores
 */
export class NoMatchingStoresError extends Error {
  constructor(message: string = "no trust stores match filter") {
    super(message);
    this.name = "NoMatchingStoresError";
  }
}

/**
 * Check a chain against a root CA's date constraints.
 * Returns the first violation (issuance cutoff, then distrust date, then SCT
 * deadline), or null when all hold.
 */
export function checkConstraints(
  chain: CertChain,
  constraints: Constraints,
  now: Date,
): string | null {
  if (isEmptyConstraints(constraints)) {
    return null;
  }

  const { notBeforeMax, distrustDate, sctNotAfter } = constraints;

  if (notBeforeMax && chain.leaf.notBefore.getTime() > notBeforeMax.getTime()) {
    return `certificate issued after trust cutoff (${formatDate(chain.leaf.notBefore)} > ${formatDate(notBeforeMax)})`;
  }

  // Evaluated at validation time, not issuance time
  if (distrustDate && now.getTime() > distrustDate.getTime()) {
    return `CA distrusted since ${formatDate(distrustDate)}`;
  }

  if (sctNotAfter) {
    if (chain.scts.length === 0) {
      return `SCT required but none found (deadline: ${formatDate(sctNotAfter)})`;
    }
    const hasTimelySCT = chain.scts.some(
      (sct) => sct.timestamp.getTime() <= sctNotAfter.getTime(),
    );
    if (!hasTimelySCT) {
      return `all SCTs issued after deadline (${formatDate(sctNotAfter)})`;
    }
  }

  return null;
}

function failure(store: Store, reason: string): TrustResult {
  return Object.freeze({
    platform: store.platformVersion,
    trusted: false,
    matchedCA: "",
    failureReason: reason,
  });
}

/**
 * Validate a chain against one store
 */
export async function validateAgainstStore(
  chain: CertChain,
  store: Store,
  registry: CertificateRegistry,
  options: ValidationOptions = {},
): Promise<TrustResult> {
  const opts = { ...DEFAULT_VALIDATION_OPTIONS, ...options };

  // Resolve the store's roots, remembering the ones without certificate data
  const anchors: X509Certificate[] = [];
  const missing = new Set<string>();
  for (const fingerprint of store.fingerprints) {
    const cert = registry.get(fingerprint);
    if (cert) {
      anchors.push(cert);
    } else {
      missing.add(fingerprint.toString());
    }
  }

  if (anchors.length === 0) {
    return failure(store, "no valid root certificates in trust store");
  }

  const now = opts.now();
  const verification = await verifyPath(chain.leaf, chain.intermediates, anchors, {
    date: now,
    hostname: opts.hostname,
    maxIntermediates: opts.maxIntermediates,
  });

  if (!verification.isValid) {
    // Only the last certificate the server sent is considered here
    const last = chain.intermediates[chain.intermediates.length - 1];
    if (last) {
      const fingerprint = Fingerprint.fromCertificate(last);
      if (missing.has(fingerprint.toString())) {
        return failure(
          store,
          `chain roots at known CA (fingerprint ${fingerprint.toString()}) but certificate data unavailable`,
        );
      }
    }
    return failure(store, describeVerificationError(verification.error));
  }

  const verifiedChain = verification.chain;
  const root = verifiedChain[verifiedChain.length - 1];
  const matchedCA = getCertificateDisplayName(root);

  const violation = checkConstraints(
    chain,
    store.constraintFor(Fingerprint.fromCertificate(root)),
    now,
  );
  if (violation) {
    return Object.freeze({
      platform: store.platformVersion,
      trusted: false,
      matchedCA,
      verifiedChain: Object.freeze(verifiedChain),
      failureReason: violation,
    });
  }

  return Object.freeze({
    platform: store.platformVersion,
    trusted: true,
    matchedCA,
    verifiedChain: Object.freeze(verifiedChain),
    failureReason: "",
  });
}

/**
 * Validate a chain against every store concurrently.
 *
 * Each store is checked by its own task and all tasks are awaited together;
 * results come back in store order. A failure in one store, including an
 * unexpected exception, is recorded in that store's result only.
 */
export async function validateChain(
  chain: CertChain,
  stores: readonly Store[],
  registry: CertificateRegistry,
  options: ValidationOptions = {},
): Promise<TrustResult[]> {
  return Promise.all(
    stores.map(async (store) => {
      try {
        return await validateAgainstStore(chain, store, registry, options);
      } catch (error) {
        return failure(
          store,
          `validation error: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }),
  );
}

/**
 * Select stores with an optional filter expression and validate the chain
 * against them.
 *
 * Throws FilterParseError for a bad expression and NoMatchingStoresError when
 * nothing is selected; both happen before any chain verification.
 */
export async function validate(
  chain: CertChain,
  snapshot: TrustStoreSnapshot,
  filterExpression?: string,
  options: ValidationOptions = {},
): Promise<TrustResult[]> {
  const filter = filterExpression === undefined ? null : parseFilter(filterExpression);
  const stores = filterStores(snapshot.stores, filter);

  if (stores.length === 0) {
    throw new NoMatchingStoresError();
  }

  return validateChain(chain, stores, snapshot.registry, options);
}
