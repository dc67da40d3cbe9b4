/**
 * In-process stand-ins for the engine's collaborators: an aggregator-style
 * price feed, a plain fungible token, and an owner-gated debt token.
 */

import { Clock, DebtToken, FungibleAsset, PriceFeed, RoundData } from "../../types";

/** Digit-only addresses are their own checksum form. */
export function addr(n: number): string {
  return "0x" + n.toString().padStart(40, "0");
}

export type FailureMode = "return-false" | "throw";
export type TokenMethod = "transfer" | "transferFrom" | "mint" | "burn";

export class MockAggregatorV3 implements PriceFeed {
  private round: RoundData;

  constructor(
    readonly address: string,
    private readonly feedDecimals: number,
    answer: bigint,
    private readonly clock: Clock,
  ) {
    const now = BigInt(clock());
    this.round = { roundId: 1n, answer, startedAt: now, updatedAt: now, answeredInRound: 1n };
  }

  /** New round answered now */
  setAnswer(answer: bigint): void {
    const roundId = this.round.roundId + 1n;
    const now = BigInt(this.clock());
    this.round = { roundId, answer, startedAt: now, updatedAt: now, answeredInRound: roundId };
  }

  setRoundData(round: Partial<RoundData>): void {
    this.round = { ...this.round, ...round };
  }

  latestRoundData(): RoundData {
    return { ...this.round };
  }

  decimals(): number {
    return this.feedDecimals;
  }
}

export class MockERC20 implements FungibleAsset {
  protected balances = new Map<string, bigint>();
  private failures = new Map<TokenMethod, FailureMode>();
  readonly calls: string[] = [];
  /** Runs inside transfer/transferFrom before balances move */
  onTransfer?: () => void;

  /** @param operator account whose balance `transfer` and `burn` spend */
  constructor(
    readonly address: string,
    protected readonly operator: string,
  ) {}

  failOn(method: TokenMethod, mode: FailureMode): void {
    this.failures.set(method, mode);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  /** Test faucet */
  give(account: string, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  transferFrom(from: string, to: string, amount: bigint): boolean {
    this.calls.push(`transferFrom:${amount}`);
    if (this.injected("transferFrom")) return false;
    this.onTransfer?.();
    return this.move(from, to, amount);
  }

  transfer(to: string, amount: bigint): boolean {
    this.calls.push(`transfer:${amount}`);
    if (this.injected("transfer")) return false;
    this.onTransfer?.();
    return this.move(this.operator, to, amount);
  }

  /** true when a failure is configured and its mode is return-false */
  protected injected(method: TokenMethod): boolean {
    const mode = this.failures.get(method);
    if (mode === "throw") throw new Error(`${method} reverted`);
    return mode === "return-false";
  }

  private move(from: string, to: string, amount: bigint): boolean {
    const balance = this.balanceOf(from);
    if (balance < amount) return false;
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }
}

export class MockDebtToken extends MockERC20 implements DebtToken {
  totalSupply = 0n;

  mint(to: string, amount: bigint): boolean {
    this.calls.push(`mint:${amount}`);
    if (this.injected("mint")) return false;
    this.give(to, amount);
    this.totalSupply += amount;
    return true;
  }

  burn(amount: bigint): void {
    this.calls.push(`burn:${amount}`);
    if (this.injected("burn")) throw new Error("burn: injected failure");
    const balance = this.balanceOf(this.operator);
    if (balance < amount) throw new Error("burn: amount exceeds balance");
    this.balances.set(this.operator, balance - amount);
    this.totalSupply -= amount;
  }
}

/** Error thrown by `fn`, or undefined when it returns normally */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
