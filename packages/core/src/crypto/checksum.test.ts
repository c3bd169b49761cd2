import { digestsEqual, sha256Hex } from "./checksum";

describe("checksum", () => {
  describe("sha256Hex", () => {
    it("should hash the empty string to the well-known digest", () => {
      expect(sha256Hex("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
    });

    it("should hash buffers and equivalent strings identically", () => {
      expect(sha256Hex(Buffer.from("abc", "utf8"))).toBe(sha256Hex("abc"));
      expect(sha256Hex("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
    });

    it("should change when a single byte changes", () => {
      const original = Buffer.from("module.exports = {};", "utf8");
      const tampered = Buffer.from(original);
      tampered[0] = 0x4e;

      expect(sha256Hex(tampered)).not.toBe(sha256Hex(original));
    });
  });

  describe("digestsEqual", () => {
    it("should compare digests case-insensitively", () => {
      expect(digestsEqual("ABCDEF", "abcdef")).toBe(true);
      expect(digestsEqual("abcdef", "abcdee")).toBe(false);
    });

    it("should reject digests of different length or with non-hex characters", () => {
      expect(digestsEqual("abcdef", "abcd")).toBe(false);
      expect(digestsEqual("abc", "abc")).toBe(false);
      expect(digestsEqual("zz", "zz")).toBe(false);
    });
  });
});
