/**
 * Stable Engine - Error Types
 *
 * Every failure of an engine operation surfaces as one of these classes.
 * All are terminal for the triggering call and leave the ledgers untouched.
 */

import type { HealthFactor } from "./health-factor";

export type EngineErrorCode =
  | "INVALID_ARGUMENT"
  | "UNSUPPORTED_ASSET"
  | "CONFIGURATION_ERROR"
  | "TRANSFER_FAILED"
  | "HEALTH_FACTOR_BROKEN"
  | "HEALTH_FACTOR_OK"
  | "HEALTH_FACTOR_NOT_IMPROVED"
  | "STALE_PRICE"
  | "REENTRANT_CALL"
  | "LEDGER_INVARIANT";

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends EngineError {
  readonly code = "INVALID_ARGUMENT";

  constructor(
    public readonly argument: string,
    public readonly reason: string,
  ) {
    super(`Invalid argument ${argument}: ${reason}`);
  }
}

export class UnsupportedAssetError extends EngineError {
  readonly code = "UNSUPPORTED_ASSET";

  constructor(public readonly asset: string) {
    super(`Asset ${asset} has no registered price feed`);
  }
}

export class ConfigurationError extends EngineError {
  readonly code = "CONFIGURATION_ERROR";
}

export class TransferFailedError extends EngineError {
  readonly code = "TRANSFER_FAILED";

  constructor(
    public readonly token: string,
    public readonly action: string,
    public readonly underlying?: unknown,
  ) {
    const detail = underlying instanceof Error ? `: ${underlying.message}` : "";
    super(`Transfer failed on ${token} (${action})${detail}`);
  }
}

export class HealthFactorBrokenError extends EngineError {
  readonly code = "HEALTH_FACTOR_BROKEN";

  constructor(
    public readonly account: string,
    public readonly healthFactor: bigint,
  ) {
    super(`Health factor of ${account} broken: ${healthFactor}`);
  }
}

export class HealthFactorOkError extends EngineError {
  readonly code = "HEALTH_FACTOR_OK";

  constructor(
    public readonly account: string,
    public readonly healthFactor: HealthFactor,
  ) {
    super(
      `Health factor of ${account} is ok ` +
        `(${healthFactor.kind === "ratio" ? healthFactor.value : healthFactor.kind}); nothing to liquidate`,
    );
  }
}

export class HealthFactorNotImprovedError extends EngineError {
  readonly code = "HEALTH_FACTOR_NOT_IMPROVED";

  constructor(
    public readonly account: string,
    public readonly startingHealthFactor: bigint,
    public readonly endingHealthFactor: bigint,
  ) {
    super(
      `Liquidation did not improve health factor of ${account}: ` +
        `${startingHealthFactor} -> ${endingHealthFactor}`,
    );
  }
}

export type StalePriceReason =
  | "never-answered"
  | "stale-round"
  | "future-update"
  | "timeout"
  | "non-positive-price";

export class StalePriceError extends EngineError {
  readonly code = "STALE_PRICE";

  constructor(
    public readonly feed: string,
    public readonly reason: StalePriceReason,
  ) {
    super(`Stale price from feed ${feed} (${reason})`);
  }
}

export class ReentrantCallError extends EngineError {
  readonly code = "REENTRANT_CALL";

  constructor(
    public readonly operation: string,
    public readonly inProgress: string,
  ) {
    super(`Reentrant call to ${operation} while ${inProgress} is in progress`);
  }
}

/** Ledger underflow. Callers must pre-validate; reaching this is a bug. */
export class LedgerInvariantViolation extends EngineError {
  readonly code = "LEDGER_INVARIANT";
}
