import * as CRC32 from "crc-32";
import { IPriceLevel } from "../types/orderbook.types";
import { CHECKSUM_DEPTH } from "../utils/constants";

/** Round to the nearest integer, ties to even. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function formatChecksumNumber(value: number): string {
  return roundHalfEven(value).toFixed(0);
}

/**
 * "px:sz:" for the top bids (best first) followed by the top asks (best first).
 * Every pair keeps its trailing colon.
 */
export function buildChecksumPayload(
  bids: readonly IPriceLevel[],
  asks: readonly IPriceLevel[],
  depth = CHECKSUM_DEPTH
): string {
  let payload = "";
  for (const level of bids.slice(0, depth)) {
    payload += `${formatChecksumNumber(level.price)}:${formatChecksumNumber(level.size)}:`;
  }
  for (const level of asks.slice(0, depth)) {
    payload += `${formatChecksumNumber(level.price)}:${formatChecksumNumber(level.size)}:`;
  }
  return payload;
}

/** Unsigned CRC32 over the UTF-8 payload. */
export function computeBookChecksum(
  bids: readonly IPriceLevel[],
  asks: readonly IPriceLevel[],
  depth = CHECKSUM_DEPTH
): number {
  return CRC32.str(buildChecksumPayload(bids, asks, depth)) >>> 0;
}

/** The exchange sends checksums as signed 32-bit integers. */
export function normalizeChecksum(value: number): number {
  return value >>> 0;
}
