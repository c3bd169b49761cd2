import { compareVersions, isNewerVersion, parseVersion } from "./version";

describe("plugin versions", () => {
  describe("parseVersion", () => {
    it("should parse timestamp tokens with or without a separator", () => {
      expect(parseVersion("20260201_000000")).toEqual([20260201000000]);
      expect(parseVersion("20260201-000000")).toEqual([20260201000000]);
      expect(parseVersion("20260201000000")).toEqual([20260201000000]);
    });

    it("should parse dotted numeric versions", () => {
      expect(parseVersion("v1.4.2")).toEqual([1, 4, 2]);
      expect(parseVersion("2_0")).toEqual([2, 0]);
    });

    it("should reject malformed tokens", () => {
      expect(parseVersion("latest")).toBeNull();
      expect(parseVersion("1.x")).toBeNull();
      expect(parseVersion("")).toBeNull();
    });
  });

  describe("compareVersions", () => {
    it("should order timestamps by their value", () => {
      expect(compareVersions("20260201_000000", "20251231_235959")).toBeGreaterThan(0);
      expect(compareVersions("20251231_235959", "20260201_000000")).toBeLessThan(0);
      expect(compareVersions("20260201_000000", "20260201000000")).toBe(0);
    });

    it("should compare dotted versions segment by segment", () => {
      expect(compareVersions("1.10.0", "1.9.9")).toBe(1);
      expect(compareVersions("1.2", "1.2.0")).toBe(0);
    });

    it("should never rank a malformed token above a well-formed one", () => {
      expect(compareVersions("zzz", "20200101_000000")).toBe(-1);
      expect(compareVersions("20200101_000000", "zzz")).toBe(1);
      expect(compareVersions("", "0")).toBe(-1);
    });

    it("should fall back to string order when neither side parses", () => {
      expect(compareVersions("beta", "alpha")).toBe(1);
      expect(compareVersions("alpha", "alpha")).toBe(0);
    });
  });

  it("should report strictly newer versions only", () => {
    expect(isNewerVersion("20260301_000000", "20260201_000000")).toBe(true);
    expect(isNewerVersion("20260201_000000", "20260201_000000")).toBe(false);
  });
});
