import { X509Certificate } from "@peculiar/x509";
import {
  CertChain,
  Fingerprint,
  TrustResult,
  TrustStoreSnapshot,
  buildValidationReport,
  collectSCTs,
  loadTrustStore,
  validate,
} from "../../src";
import {
  NOW,
  TestCA,
  buildSCT,
  buildSCTList,
  createIntermediateCA,
  createLeaf,
  createRootCA,
  wrapSCTList,
} from "../helpers/certificates";

const now = () => NOW;

function trustedBy(results: readonly TrustResult[]): string[] {
  return results.map((r) => `${r.platform.platform}/${r.platform.version}:${r.trusted}`);
}

describe("validate (end to end)", () => {
  let root: TestCA;
  let intermediate: TestCA;
  let leaf: X509Certificate;
  let chain: CertChain;
  let rootFp: string;

  function snapshotOf(
    entries: {
      platform: string;
      version: string;
      fingerprint: string;
      distrustDate?: string;
      sctNotAfter?: string;
    }[],
    certificates: X509Certificate[] = [root.cert],
  ): TrustStoreSnapshot {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    try {
      return loadTrustStore({
        certificates: certificates.map((cert) => ({
          fingerprint: Fingerprint.fromCertificate(cert).toString(),
          pem: cert.toString("pem"),
        })),
        entries,
      });
    } finally {
      warn.mockRestore();
    }
  }

  beforeAll(async () => {
    root = await createRootCA("CN=E2E Root, O=Example Trust Services");
    intermediate = await createIntermediateCA("CN=E2E Intermediate", root);
    leaf = await createLeaf(intermediate);
    chain = {
      endpoint: "www.example.test:443",
      leaf,
      intermediates: [intermediate.cert],
      scts: collectSCTs(leaf),
    };
    rootFp = Fingerprint.fromCertificate(root.cert).toString();
  });

  it("should trust a chain anchored at a store root", async () => {
    const snapshot = snapshotOf([{ platform: "ios", version: "18", fingerprint: rootFp }]);

    const [result] = await validate(chain, snapshot, undefined, { now });

    expect(result.trusted).toBe(true);
    expect(result.matchedCA).toBe("E2E Root");
    expect(result.failureReason).toBe("");
  });

  it("should diagnose a server-sent root whose certificate data is unavailable", async () => {
    const unrelated = await createRootCA("CN=E2E Unrelated Root");
    const unrelatedFp = Fingerprint.fromCertificate(unrelated.cert).toString();
    const snapshot = snapshotOf(
      [
        { platform: "android", version: "14", fingerprint: unrelatedFp },
        { platform: "android", version: "14", fingerprint: rootFp },
      ],
      [unrelated.cert],
    );
    const withRoot: CertChain = { ...chain, intermediates: [intermediate.cert, root.cert] };

    const [result] = await validate(withRoot, snapshot, "android", { now });

    expect(result.trusted).toBe(false);
    expect(result.failureReason).toBe(
      `chain roots at known CA (fingerprint ${rootFp}) but certificate data unavailable`,
    );
  });

  it("should not apply the missing-root diagnosis when the server omits the root", async () => {
    const unrelated = await createRootCA("CN=E2E Unrelated Root");
    const snapshot = snapshotOf(
      [
        {
          platform: "android",
          version: "14",
          fingerprint: Fingerprint.fromCertificate(unrelated.cert).toString(),
        },
        { platform: "android", version: "14", fingerprint: rootFp },
      ],
      [unrelated.cert],
    );

    const [result] = await validate(chain, snapshot, "android", { now });

    expect(result.failureReason).toBe("certificate signed by unknown authority");
  });

  it("should distrust a CA whose distrust date has passed", async () => {
    const snapshot = snapshotOf([
      {
        platform: "windows",
        version: "current",
        fingerprint: rootFp,
        distrustDate: "2025-04-01T00:00:00Z",
      },
    ]);

    const [before] = await validate(chain, snapshot, "windows", {
      now: () => new Date("2025-03-01T00:00:00Z"),
    });
    const [after] = await validate(chain, snapshot, "windows", { now });

    expect(before.trusted).toBe(true);
    expect(after.trusted).toBe(false);
    expect(after.failureReason).toBe("CA distrusted since 2025-04-01");
  });

  it("should require an SCT before the deadline when one is set", async () => {
    const snapshot = snapshotOf([
      {
        platform: "chrome",
        version: "current",
        fingerprint: rootFp,
        sctNotAfter: "2025-02-01T00:00:00Z",
      },
    ]);

    const [withoutSCT] = await validate(chain, snapshot, "chrome", { now });
    expect(withoutSCT.trusted).toBe(false);
    expect(withoutSCT.failureReason).toBe("SCT required but none found (deadline: 2025-02-01)");

    const loggedLeaf = await createLeaf(intermediate, {
      sctListExtension: wrapSCTList(
        buildSCTList([buildSCT(new Date("2025-01-01T00:05:00Z"))]),
      ),
    });
    const logged: CertChain = { ...chain, leaf: loggedLeaf, scts: collectSCTs(loggedLeaf) };

    const [withSCT] = await validate(logged, snapshot, "chrome", { now });
    expect(withSCT.trusted).toBe(true);
  });

  it("should isolate a store without resolvable roots from its siblings", async () => {
    const orphan = "0F".repeat(32);
    const snapshot = snapshotOf([
      { platform: "ios", version: "17", fingerprint: rootFp },
      { platform: "ios", version: "18", fingerprint: orphan },
      { platform: "android", version: "14", fingerprint: rootFp },
      { platform: "macos", version: "14", fingerprint: rootFp },
    ]);

    const results = await validate(chain, snapshot, undefined, { now });

    expect(trustedBy(results)).toEqual([
      "ios/17:true",
      "ios/18:false",
      "android/14:true",
      "macos/14:true",
    ]);
    expect(results[1].failureReason).toBe("no valid root certificates in trust store");
  });

  it("should validate only the stores a filter selects", async () => {
    const snapshot = snapshotOf([
      { platform: "ios", version: "16", fingerprint: rootFp },
      { platform: "ios", version: "18", fingerprint: rootFp },
      { platform: "android", version: "14", fingerprint: rootFp },
    ]);

    const results = await validate(chain, snapshot, "ios>=17", { now });

    expect(trustedBy(results)).toEqual(["ios/18:true"]);
  });

  it("should build a sorted report from the results", async () => {
    const snapshot = snapshotOf([
      { platform: "windows", version: "current", fingerprint: rootFp },
      { platform: "android", version: "14", fingerprint: rootFp },
    ]);

    const results = await validate(chain, snapshot, undefined, { now });
    const report = buildValidationReport(chain, results, { timestamp: NOW });

    expect(report.allPassed).toBe(true);
    expect(trustedBy(report.results)).toEqual(["android/14:true", "windows/current:true"]);
  });
});
