import { describe, it, expect } from "vitest";
import {
  buildChecksumPayload,
  computeBookChecksum,
  formatChecksumNumber,
  normalizeChecksum,
  roundHalfEven,
} from "../checksum";
import { IPriceLevel } from "../../types/orderbook.types";

function lvl(price: number, size: number): IPriceLevel {
  return { price, size, orderCount: 1 };
}

describe("checksum", () => {
  describe("roundHalfEven", () => {
    it("rounds ties to the even neighbour", () => {
      expect(roundHalfEven(2.5)).toBe(2);
      expect(roundHalfEven(3.5)).toBe(4);
      expect(roundHalfEven(0.5)).toBe(0);
    });

    it("rounds everything else to the nearest integer", () => {
      expect(roundHalfEven(100.4)).toBe(100);
      expect(roundHalfEven(100.6)).toBe(101);
      expect(roundHalfEven(7)).toBe(7);
    });
  });

  it("formats numbers without a fractional part", () => {
    expect(formatChecksumNumber(1.5)).toBe("2");
    expect(formatChecksumNumber(99.9)).toBe("100");
  });

  it("builds bids then asks with a colon after every value", () => {
    const payload = buildChecksumPayload([lvl(100, 5), lvl(99, 3)], [lvl(101, 2)]);
    expect(payload).toBe("100:5:99:3:101:2:");
  });

  it("uses at most 25 levels per side", () => {
    const bids = Array.from({ length: 30 }, (_, i) => lvl(1000 - i, 1));
    const payload = buildChecksumPayload(bids, []);
    expect(payload.split(":").length - 1).toBe(50);
    expect(payload.startsWith("1000:1:999:1:")).toBe(true);
    expect(payload.endsWith("976:1:")).toBe(true);
  });

  it("computes the unsigned CRC32 of the payload", () => {
    expect(computeBookChecksum([lvl(100, 5), lvl(99, 3)], [lvl(101, 2)])).toBe(2284997975);
    expect(computeBookChecksum([], [])).toBe(0);
  });

  it("normalizes signed exchange checksums to unsigned", () => {
    expect(normalizeChecksum(-2009969321)).toBe(2284997975);
    expect(normalizeChecksum(698363197)).toBe(698363197);
  });
});
