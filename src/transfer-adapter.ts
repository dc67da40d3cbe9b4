/**
 * Stable Engine - Transfer Adapter
 *
 * The one place that talks to token collaborators. Normalizes both failure
 * styles (a `false` return and a thrown fault) into TransferFailedError and
 * packages every call as a queued Interaction with its compensation.
 */

import { TransferFailedError } from "./errors";
import { Interaction } from "./atomic-scope";
import { DebtToken, FungibleAsset } from "./types";

/** Run a collaborator call; anything but `true` (or a clean void) is a failure. */
export function expectSuccess(token: string, action: string, call: () => boolean | void): void {
  let ok: boolean | void;
  try {
    ok = call();
  } catch (err) {
    throw new TransferFailedError(token, action, err);
  }
  if (ok === false) {
    throw new TransferFailedError(token, action);
  }
}

export class TransferAdapter {
  /** @param custody address that holds deposited collateral and pulled debt tokens */
  constructor(readonly custody: string) {}

  /** Pull `amount` from `from` into custody. Undo: send it back. */
  pull(token: FungibleAsset, from: string, amount: bigint): Interaction {
    const label = `transferFrom(${from}, custody, ${amount}) on ${token.address}`;
    return {
      label,
      phase: "inbound",
      run: () => expectSuccess(token.address, label, () => token.transferFrom(from, this.custody, amount)),
      undo: () => expectSuccess(token.address, `refund ${from}`, () => token.transfer(from, amount)),
    };
  }

  /** Send `amount` from custody to `to`. */
  push(token: FungibleAsset, to: string, amount: bigint): Interaction {
    const label = `transfer(${to}, ${amount}) on ${token.address}`;
    return {
      label,
      phase: "outbound",
      run: () => expectSuccess(token.address, label, () => token.transfer(to, amount)),
    };
  }

  /** Mint debt tokens to `to`. No undo: no engine operation queues an outbound push after a mint. */
  mint(token: DebtToken, to: string, amount: bigint): Interaction {
    const label = `mint(${to}, ${amount}) on ${token.address}`;
    return {
      label,
      phase: "supply",
      run: () => expectSuccess(token.address, label, () => token.mint(to, amount)),
    };
  }

  /** Burn debt tokens held by custody. Undo: re-mint them into custody. */
  burn(token: DebtToken, amount: bigint): Interaction {
    const label = `burn(${amount}) on ${token.address}`;
    return {
      label,
      phase: "supply",
      run: () => expectSuccess(token.address, label, () => token.burn(amount)),
      undo: () => expectSuccess(token.address, "re-mint into custody", () => token.mint(this.custody, amount)),
    };
  }
}
