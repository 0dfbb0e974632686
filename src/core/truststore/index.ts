// src/core/truststore/index.ts

export { Store, StoreEntry, CertificateRegistry, TrustStoreSnapshot } from "./store";
export {
  loadTrustStore,
  listStoreEntries,
  TrustStoreLoadError,
  TrustStoreRecords,
  CertificateRecord,
  StoreEntryRecord,
  StoreListEntry,
} from "./loader";
export {
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
  isEmptyConstraints,
} from "./types";
