// src/core/report.ts

import { extractIssuerCommonName, extractSubject } from "./certificate";
import { Fingerprint } from "./fingerprint";
import { CertChain, TrustResult, ValidationReport } from "./truststore/types";
import { compareVersions } from "./version";
import { formatTimestamp } from "../utils/encoding";

/**
 * Results ordered by platform name, then version ascending ("current" last).
 * Returns a new array.
 */
export function sortResults(results: readonly TrustResult[]): TrustResult[] {
  return [...results].sort((a, b) => {
    if (a.platform.platform !== b.platform.platform) {
      return a.platform.platform < b.platform.platform ? -1 : 1;
    }
    return compareVersions(a.platform.version, b.platform.version);
  });
}

export interface ReportOptions {
  toolVersion?: string;
  /** Report timestamp (default: now) */
  timestamp?: Date;
}

/**
 * Assemble the report for one endpoint; results are sorted for display
 */
export function buildValidationReport(
  chain: CertChain,
  results: readonly TrustResult[],
  options: ReportOptions = {},
): ValidationReport {
  return {
    endpoint: chain.endpoint,
    timestamp: options.timestamp ?? new Date(),
    toolVersion: options.toolVersion ?? "dev",
    chain,
    results: sortResults(results),
    allPassed: results.every((r) => r.trusted),
  };
}

interface JsonCertificate {
  subject: string;
  issuer: string;
  expires: string;
  fingerprint_sha256: string;
}

interface JsonResult {
  platform: string;
  version: string;
  trusted: boolean;
  matched_ca?: string;
  failure_reason?: string;
}

interface JsonReport {
  endpoint: string;
  timestamp: string;
  tool_version: string;
  certificate: JsonCertificate;
  results: JsonResult[];
  all_passed: boolean;
}

/**
 * Plain JSON-serializable form of a report (snake_case keys, UTC timestamps)
 */
export function toJsonReport(report: ValidationReport): JsonReport {
  const leaf = report.chain.leaf;
  return {
    endpoint: report.endpoint,
    timestamp: formatTimestamp(report.timestamp),
    tool_version: report.toolVersion,
    certificate: {
      subject: extractSubject(leaf).commonName ?? "",
      issuer: extractIssuerCommonName(leaf),
      expires: formatTimestamp(leaf.notAfter),
      fingerprint_sha256: Fingerprint.fromCertificate(leaf).toString(),
    },
    results: report.results.map((r) => {
      const row: JsonResult = {
        platform: r.platform.platform,
        version: r.platform.version,
        trusted: r.trusted,
      };
      if (r.matchedCA) row.matched_ca = r.matchedCA;
      if (r.failureReason) row.failure_reason = r.failureReason;
      return row;
    }),
    all_passed: report.allPassed,
  };
}

export function formatReportJSON(report: ValidationReport): string {
  return JSON.stringify(toJsonReport(report), null, 2);
}
