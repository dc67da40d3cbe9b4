/**
 * Stable Engine - Debt Ledger
 *
 * Per-user minted debt (18 decimals). Mirrors, but never replaces, the debt
 * token's own supply accounting.
 */

import { AtomicScope } from "./atomic-scope";
import { InvalidArgumentError, LedgerInvariantViolation } from "./errors";
import { TransferAdapter } from "./transfer-adapter";
import { DebtToken } from "./types";

export type DebtSnapshot = ReadonlyMap<string, bigint>;

export class DebtLedger {
  private minted = new Map<string, bigint>();

  constructor(
    private readonly token: DebtToken,
    private readonly transfers: TransferAdapter,
  ) {}

  debtOf(user: string): bigint {
    return this.minted.get(user) ?? 0n;
  }

  /** Sum of all recorded debt */
  total(): bigint {
    let total = 0n;
    for (const debt of this.minted.values()) total += debt;
    return total;
  }

  holders(): string[] {
    return [...this.minted.keys()];
  }

  /** Record `amount` of new debt for `user`, then mint it to them. */
  mintDebt(user: string, amount: bigint, scope: AtomicScope): void {
    if (amount <= 0n) {
      throw new InvalidArgumentError("amount", "must be greater than zero");
    }
    this.minted.set(user, this.debtOf(user) + amount);
    scope.enqueue(this.transfers.mint(this.token, user, amount));
  }

  /**
   * Pull `amount` debt tokens from `payer`, burn them, and reduce the debt
   * recorded for `onBehalf`. Payer and debtor differ during liquidation.
   */
  burnDebt(onBehalf: string, payer: string, amount: bigint, scope: AtomicScope): void {
    if (amount <= 0n) {
      throw new InvalidArgumentError("amount", "must be greater than zero");
    }
    const current = this.debtOf(onBehalf);
    if (amount > current) {
      throw new LedgerInvariantViolation(`Debt underflow: ${onBehalf} owes ${current}, burn of ${amount}`);
    }

    this.minted.set(onBehalf, current - amount);
    scope.enqueue(this.transfers.pull(this.token, payer, amount));
    scope.enqueue(this.transfers.burn(this.token, amount));
  }

  snapshot(): DebtSnapshot {
    return new Map(this.minted);
  }

  restore(snapshot: DebtSnapshot): void {
    this.minted = new Map(snapshot);
  }
}
