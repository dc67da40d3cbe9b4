/**
 * Stable Engine - Price Oracle Guard
 *
 * Wraps aggregator-style feeds and fails closed: any doubt about the
 * freshness or consistency of a reading halts the caller. There are no
 * price-sanity heuristics and no fallback source.
 */

import { StalePriceError, StalePriceReason } from "./errors";
import { Logger } from "./logger";
import { EngineMetrics } from "./metrics";
import { Clock, PriceFeed, PriceQuote } from "./types";

/** Maximum tolerated age of a reading: 3 hours */
export const STALE_TIMEOUT = 3 * 60 * 60;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Returns the reason a reading must be rejected, or null if it is usable.
 * A reading exactly STALE_TIMEOUT seconds old is still fresh; one stamped
 * after `now` is not. Fractional clock values are truncated to whole seconds.
 */
export function checkRoundData(
  round: { roundId: bigint; answer: bigint; updatedAt: bigint; answeredInRound: bigint },
  now: number,
  timeout: number = STALE_TIMEOUT,
): StalePriceReason | null {
  const current = BigInt(Math.floor(now));
  if (round.updatedAt === 0n) return "never-answered";
  if (round.answeredInRound < round.roundId) return "stale-round";
  if (round.updatedAt > current) return "future-update";
  if (current - round.updatedAt > BigInt(timeout)) return "timeout";
  if (round.answer <= 0n) return "non-positive-price";
  return null;
}

export class PriceOracleGuard {
  readonly staleTimeout = STALE_TIMEOUT;

  constructor(
    private readonly clock: Clock,
    private readonly logger: Logger,
    private readonly metrics?: EngineMetrics,
  ) {}

  /** Fetch a fresh reading from `feed` and reject it if stale or inconsistent. */
  latestRoundData(feed: PriceFeed): PriceQuote {
    const round = feed.latestRoundData();
    const reason = checkRoundData(round, this.clock(), this.staleTimeout);

    if (reason) {
      this.logger.warn(
        `Rejected reading from ${feed.address}: ${reason} ` +
          `(round=${round.roundId}, answeredIn=${round.answeredInRound}, updatedAt=${round.updatedAt})`,
      );
      this.metrics?.stalePriceRejectionsTotal.inc({ feed: feed.address });
      throw new StalePriceError(feed.address, reason);
    }

    return {
      feed: feed.address,
      roundId: round.roundId,
      price: round.answer,
      startedAt: round.startedAt,
      updatedAt: round.updatedAt,
      answeredInRound: round.answeredInRound,
      decimals: feed.decimals(),
    };
  }
}
