import { Fingerprint, FingerprintParseError, FINGERPRINT_SIZE } from "./core/fingerprint";
import { CURRENT_VERSION, compareVersions, isCurrentVersion } from "./core/version";
import {
  Store,
  CertificateRegistry,
  TrustStoreSnapshot,
  loadTrustStore,
  listStoreEntries,
  TrustStoreLoadError,
  TrustStoreRecords,
  StoreListEntry,
  PLATFORMS,
  Platform,
  PlatformVersion,
  Constraints,
  SCT,
  SCTSource,
  CertChain,
  TrustResult,
  ValidationReport,
  parsePlatform,
} from "./core/truststore";
import {
  parseFilter,
  matchFilter,
  filterStores,
  evaluateOperator,
  Filter,
  FilterParseError,
  Operator,
} from "./core/filter";
import {
  parseSCT,
  parseSCTList,
  extractTlsSCTs,
  extractEmbeddedSCTs,
  collectSCTs,
  SCTParseError,
} from "./core/sct";
import { verifyPath, PathVerificationOptions, PathVerificationResult } from "./core/chain/verify";
import {
  ChainVerificationError,
  ChainErrorCode,
  describeVerificationError,
} from "./core/chain/errors";
import {
  validate,
  validateChain,
  validateAgainstStore,
  checkConstraints,
  ValidationOptions,
  DEFAULT_VALIDATION_OPTIONS,
  NoMatchingStoresError,
} from "./core/validator";
import { sortResults, buildValidationReport, toJsonReport, formatReportJSON } from "./core/report";
import { parseCertificatePEM, getCertificateDisplayName } from "./core/certificate";

export {
  // Fingerprints
  Fingerprint,
  FingerprintParseError,
  FINGERPRINT_SIZE,

  // Versions
  CURRENT_VERSION,
  compareVersions,
  isCurrentVersion,

  // Trust stores
  Store,
  CertificateRegistry,
  TrustStoreSnapshot,
  loadTrustStore,
  listStoreEntries,
  TrustStoreLoadError,
  TrustStoreRecords,
  StoreListEntry,
  PLATFORMS,
  Platform,
  PlatformVersion,
  Constraints,
  SCT,
  SCTSource,
  CertChain,
  TrustResult,
  ValidationReport,
  parsePlatform,

  // Filters
  parseFilter,
  matchFilter,
  filterStores,
  evaluateOperator,
  Filter,
  FilterParseError,
  Operator,

  // Signed Certificate Timestamps
  parseSCT,
  parseSCTList,
  extractTlsSCTs,
  extractEmbeddedSCTs,
  collectSCTs,
  SCTParseError,

  // Path verification
  verifyPath,
  PathVerificationOptions,
  PathVerificationResult,
  ChainVerificationError,
  ChainErrorCode,
  describeVerificationError,

  // Validation
  validate,
  validateChain,
  validateAgainstStore,
  checkConstraints,
  ValidationOptions,
  DEFAULT_VALIDATION_OPTIONS,
  NoMatchingStoresError,

  // Reports
  sortResults,
  buildValidationReport,
  toJsonReport,
  formatReportJSON,

  // Certificate utilities
  parseCertificatePEM,
  getCertificateDisplayName,
};
