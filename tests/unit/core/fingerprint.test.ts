import { Fingerprint, FingerprintParseError } from "../../../src/core/fingerprint";
import { createRootCA } from "../../helpers/certificates";
import { createHash } from "crypto";

// Bytes 0x00..0x1F
const RAW = Array.from({ length: 32 }, (_, i) => i.toString(16).padStart(2, "0").toUpperCase()).join(
  "",
);
const PAIRS = RAW.match(/../g) ?? [];
const CANONICAL = PAIRS.join(":");

describe("Fingerprint", () => {
  describe("parse", () => {
    it("should accept 64 contiguous hex characters", () => {
      expect(Fingerprint.parse(RAW).toString()).toBe(CANONICAL);
    });

    it("should accept lowercase hex", () => {
      expect(Fingerprint.parse(RAW.toLowerCase()).toString()).toBe(CANONICAL);
    });

    it.each([":", "-", " "])("should accept pairs separated by %j", (sep) => {
      expect(Fingerprint.parse(PAIRS.join(sep)).toString()).toBe(CANONICAL);
    });

    it("should trim surrounding whitespace", () => {
      expect(Fingerprint.parse(`  ${CANONICAL}\n`).toString()).toBe(CANONICAL);
    });

    it("should be a fixed point through its canonical form", () => {
      for (const input of [RAW, PAIRS.join("-"), PAIRS.join(" ").toLowerCase()]) {
        const once = Fingerprint.parse(input);
        const twice = Fingerprint.parse(once.toString());
        expect(twice.equals(once)).toBe(true);
      }
    });

    it("should reject empty input", () => {
      expect(() => Fingerprint.parse("   ")).toThrow("empty fingerprint");
    });

    const malformed: [string, string][] = [
      ["mixed separators", [...PAIRS.slice(0, 16)].join(":") + "-" + PAIRS.slice(16).join(":")],
      ["doubled separator", PAIRS.slice(0, 2).join("::") + ":" + PAIRS.slice(2).join(":")],
      ["leading separator", ":" + CANONICAL],
      ["trailing separator", CANONICAL + ":"],
      ["31 pairs", PAIRS.slice(1).join(":")],
      ["33 pairs", CANONICAL + ":20"],
      ["63 hex chars", RAW.slice(1)],
      ["non-hex character", "G" + RAW.slice(1)],
      ["single-character group", "0:" + PAIRS.slice(1).join(":")],
    ];

    it.each(malformed)("should reject %s", (_name, input) => {
      expect(() => Fingerprint.parse(input)).toThrow(FingerprintParseError);
    });
  });

  describe("fromRawBytes", () => {
    it("should accept exactly 32 bytes", () => {
      const bytes = Uint8Array.from({ length: 32 }, (_, i) => i);
      expect(Fingerprint.fromRawBytes(bytes).toString()).toBe(CANONICAL);
    });

    it("should reject other lengths", () => {
      expect(() => Fingerprint.fromRawBytes(new Uint8Array(31))).toThrow(
        "fingerprint must be 32 bytes, got 31",
      );
    });

    it("should copy its input", () => {
      const bytes = new Uint8Array(32);
      const fp = Fingerprint.fromRawBytes(bytes);
      bytes[0] = 0xff;
      expect(fp.isZero()).toBe(true);
      fp.bytes()[1] = 0xff;
      expect(fp.isZero()).toBe(true);
    });
  });

  describe("truncate", () => {
    const fp = Fingerprint.parse(RAW);

    it("should abbreviate to the requested number of octets", () => {
      expect(fp.truncate(4)).toBe("00:01:02:03...");
    });

    it("should return an empty string for zero or negative counts", () => {
      expect(fp.truncate(0)).toBe("");
      expect(fp.truncate(-3)).toBe("");
    });

    it("should return the full form when the count covers every octet", () => {
      expect(fp.truncate(32)).toBe(CANONICAL);
      expect(fp.truncate(100)).toBe(CANONICAL);
    });
  });

  describe("fromCertificate", () => {
    it("should hash the DER encoding with SHA-256", async () => {
      const { cert } = await createRootCA("CN=Fingerprint Test Root");
      const expected = createHash("sha256")
        .update(Buffer.from(cert.rawData))
        .digest("hex")
        .toUpperCase();

      expect(Fingerprint.fromCertificate(cert).toString().replace(/:/g, "")).toBe(expected);
    });
  });

  it("should compare byte-exactly", () => {
    const a = Fingerprint.parse(RAW);
    const b = Fingerprint.parse(RAW.slice(0, 62) + "20");
    expect(a.equals(Fingerprint.parse(CANONICAL))).toBe(true);
    expect(a.equals(b)).toBe(false);
  });
});
