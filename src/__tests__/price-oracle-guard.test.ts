/**
 * Price Oracle Guard Tests
 * Staleness window, round consistency and fail-closed behaviour
 */

import { StalePriceError } from "../errors";
import { createEngineLogger } from "../logger";
import { createEngineMetrics } from "../metrics";
import { PriceOracleGuard, STALE_TIMEOUT, checkRoundData } from "../price-oracle-guard";
import { MockAggregatorV3, addr, catchError } from "./helpers/mocks";

const NOW = 1_700_000_000;
const PRICE = 2000n * 10n ** 8n;

function round(overrides: Partial<{ roundId: bigint; answer: bigint; updatedAt: bigint; answeredInRound: bigint }> = {}) {
  return { roundId: 5n, answer: PRICE, updatedAt: BigInt(NOW), answeredInRound: 5n, ...overrides };
}

describe("PriceOracleGuard", () => {
  describe("STALE_TIMEOUT", () => {
    it("should be three hours", () => {
      expect(STALE_TIMEOUT).toBe(10_800);
    });
  });

  describe("checkRoundData", () => {
    it("should accept a fresh, consistent round", () => {
      expect(checkRoundData(round(), NOW)).toBeNull();
    });

    it("should reject a feed that never answered", () => {
      expect(checkRoundData(round({ updatedAt: 0n }), NOW)).toBe("never-answered");
    });

    it("should reject an answer carried forward from an older round", () => {
      expect(checkRoundData(round({ answeredInRound: 4n }), NOW)).toBe("stale-round");
    });

    it("should accept a reading exactly at the staleness boundary", () => {
      expect(checkRoundData(round({ updatedAt: BigInt(NOW - STALE_TIMEOUT) }), NOW)).toBeNull();
    });

    it("should reject a reading one second past the boundary", () => {
      expect(checkRoundData(round({ updatedAt: BigInt(NOW - STALE_TIMEOUT - 1) }), NOW)).toBe("timeout");
    });

    it("should reject a reading stamped after the current time", () => {
      expect(checkRoundData(round({ updatedAt: BigInt(NOW + 1) }), NOW)).toBe("future-update");
      expect(checkRoundData(round({ updatedAt: BigInt(NOW + 1_000_000) }), NOW)).toBe("future-update");
    });

    it("should truncate a fractional clock to whole seconds", () => {
      expect(checkRoundData(round(), NOW + 0.75)).toBeNull();
      expect(checkRoundData(round({ updatedAt: BigInt(NOW - STALE_TIMEOUT) }), NOW + 0.5)).toBeNull();
      expect(checkRoundData(round({ updatedAt: BigInt(NOW - STALE_TIMEOUT) }), NOW + 1.5)).toBe("timeout");
    });

    it("should reject non-positive answers", () => {
      expect(checkRoundData(round({ answer: 0n }), NOW)).toBe("non-positive-price");
      expect(checkRoundData(round({ answer: -1n }), NOW)).toBe("non-positive-price");
    });
  });

  describe("latestRoundData", () => {
    let now: number;
    let feed: MockAggregatorV3;
    let guard: PriceOracleGuard;
    let metrics: ReturnType<typeof createEngineMetrics>;

    beforeEach(() => {
      now = NOW;
      feed = new MockAggregatorV3(addr(11), 8, PRICE, () => now);
      metrics = createEngineMetrics();
      guard = new PriceOracleGuard(() => now, createEngineLogger("oracle-test"), metrics);
    });

    it("should return the full quote with the feed's decimals", () => {
      const quote = guard.latestRoundData(feed);
      expect(quote).toEqual({
        feed: addr(11),
        roundId: 1n,
        price: PRICE,
        startedAt: BigInt(NOW),
        updatedAt: BigInt(NOW),
        answeredInRound: 1n,
        decimals: 8,
      });
    });

    it("should throw StalePriceError once the feed ages out", () => {
      now = NOW + STALE_TIMEOUT + 1;
      expect(() => guard.latestRoundData(feed)).toThrow(StalePriceError);
    });

    it("should carry the feed and reason on the error", () => {
      feed.setRoundData({ answeredInRound: 0n });
      const err = catchError(() => guard.latestRoundData(feed));
      expect(err).toBeInstanceOf(StalePriceError);
      expect(err).toMatchObject({ feed: addr(11), reason: "stale-round", code: "STALE_PRICE" });
    });

    it("should count rejections per feed", async () => {
      feed.setRoundData({ updatedAt: 0n });
      expect(() => guard.latestRoundData(feed)).toThrow(StalePriceError);
      expect(() => guard.latestRoundData(feed)).toThrow(StalePriceError);

      const metric = await metrics.stalePriceRejectionsTotal.get();
      expect(metric.values).toHaveLength(1);
      expect(metric.values[0].value).toBe(2);
      expect(metric.values[0].labels).toEqual({ feed: addr(11) });
    });

    it("should reject a future timestamp as a stale price", () => {
      feed.setRoundData({ updatedAt: BigInt(NOW + 1_000_000) });
      const err = catchError(() => guard.latestRoundData(feed));
      expect(err).toBeInstanceOf(StalePriceError);
      expect(err).toMatchObject({ reason: "future-update" });
    });

    it("should accept a clock that reports fractional seconds", () => {
      const fractional = new PriceOracleGuard(() => NOW + 0.25, createEngineLogger("oracle-test"));
      expect(fractional.latestRoundData(feed).price).toBe(PRICE);
    });

    it("should never cache: a new round is seen immediately", () => {
      feed.setAnswer(1800n * 10n ** 8n);
      expect(guard.latestRoundData(feed).price).toBe(1800n * 10n ** 8n);
    });
  });
});
