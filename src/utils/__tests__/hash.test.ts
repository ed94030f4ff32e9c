import { createHash } from "node:crypto";

import { checksum, defaultChecksumAlgorithm, isSupportedAlgorithm } from "../hash.js";

describe("hash", () => {
  const data = Buffer.from("foobar", "utf8");

  it("uses md5 by default", () => {
    const expected = createHash("md5").update(data).digest("hex");
    expect(defaultChecksumAlgorithm).toBe("md5");
    expect(checksum(data)).toBe(expected);
  });
  it("can calculate sha256 hash", () => {
    const expected = createHash("sha256").update(data).digest("hex");
    expect(checksum(data, "sha256")).toBe(expected);
  });
  it("knows which algorithms are available", () => {
    expect(isSupportedAlgorithm("sha256")).toBe(true);
    expect(isSupportedAlgorithm("no-such-hash")).toBe(false);
  });
});
