/**
 * Stable Engine - Collateral Ledger
 *
 * Per-user, per-asset deposited collateral in raw token units. Every change
 * is paired with a queued transfer in the same AtomicScope.
 */

import { AtomicScope } from "./atomic-scope";
import { InvalidArgumentError, LedgerInvariantViolation } from "./errors";
import { AssetRegistry } from "./registry";
import { TransferAdapter } from "./transfer-adapter";

export type CollateralSnapshot = ReadonlyMap<string, ReadonlyMap<string, bigint>>;

export class CollateralLedger {
  /** user → asset → amount */
  private balances = new Map<string, Map<string, bigint>>();

  constructor(
    private readonly registry: AssetRegistry,
    private readonly transfers: TransferAdapter,
  ) {}

  balanceOf(user: string, asset: string): bigint {
    return this.balances.get(user)?.get(this.registry.get(asset).address) ?? 0n;
  }

  /** Users that ever deposited, in first-deposit order */
  holders(): string[] {
    return [...this.balances.keys()];
  }

  /** Sum of all users' balances of `asset` */
  totalOf(asset: string): bigint {
    const address = this.registry.get(asset).address;
    let total = 0n;
    for (const perAsset of this.balances.values()) {
      total += perAsset.get(address) ?? 0n;
    }
    return total;
  }

  /** Credit `user`, then pull `amount` from them into custody. */
  deposit(user: string, asset: string, amount: bigint, scope: AtomicScope): void {
    if (amount <= 0n) {
      throw new InvalidArgumentError("amount", "must be greater than zero");
    }
    const collateral = this.registry.get(asset);

    let perAsset = this.balances.get(user);
    if (!perAsset) {
      perAsset = new Map();
      this.balances.set(user, perAsset);
    }
    perAsset.set(collateral.address, (perAsset.get(collateral.address) ?? 0n) + amount);

    scope.enqueue(this.transfers.pull(collateral.token, user, amount));
  }

  /**
   * Debit `from`, then push `amount` from custody to `to`.
   * Serves both redemption (from == to) and liquidation seizure.
   */
  withdraw(from: string, to: string, asset: string, amount: bigint, scope: AtomicScope): void {
    if (amount <= 0n) {
      throw new InvalidArgumentError("amount", "must be greater than zero");
    }
    const collateral = this.registry.get(asset);
    const current = this.balances.get(from)?.get(collateral.address) ?? 0n;
    if (amount > current) {
      throw new LedgerInvariantViolation(
        `Collateral underflow: ${from} holds ${current} of ${collateral.address}, debit of ${amount}`,
      );
    }

    // Guarded above: a debit never exceeds the balance, so the entry exists
    const perAsset = this.balances.get(from);
    perAsset?.set(collateral.address, current - amount);

    scope.enqueue(this.transfers.push(collateral.token, to, amount));
  }

  snapshot(): CollateralSnapshot {
    const copy = new Map<string, ReadonlyMap<string, bigint>>();
    for (const [user, perAsset] of this.balances) {
      copy.set(user, new Map(perAsset));
    }
    return copy;
  }

  restore(snapshot: CollateralSnapshot): void {
    const balances = new Map<string, Map<string, bigint>>();
    for (const [user, perAsset] of snapshot) {
      balances.set(user, new Map(perAsset));
    }
    this.balances = balances;
  }
}
