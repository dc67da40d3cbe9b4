/**
 * Stable Engine - Atomic Scope & Reentrancy Guard
 *
 * Ledger effects are applied immediately by the caller; external
 * interactions are queued here and only run on commit, after every check
 * has passed. Interactions run in phase order (inbound pulls, then debt
 * supply changes, then outbound pushes). If one fails, the ones that
 * already ran are undone in reverse order.
 *
 * Usage:
 *   const result = guard.run("redeemCollateral", () => {
 *     const scope = new AtomicScope(logger);
 *     ledger.withdraw(user, user, asset, amount, scope);
 *     risk.assertHealthy(user);
 *     scope.commit();
 *   });
 */

import { ReentrantCallError } from "./errors";
import { Logger } from "./logger";

export type InteractionPhase = "inbound" | "supply" | "outbound";

const PHASE_ORDER: Record<InteractionPhase, number> = {
  inbound: 0,
  supply: 1,
  outbound: 2,
};

export interface Interaction {
  label: string;
  phase: InteractionPhase;
  run(): void;
  /** Compensating action; absent for outbound pushes and mints */
  undo?(): void;
}

export class AtomicScope {
  private readonly queue: Interaction[] = [];
  private committed = false;

  constructor(private readonly logger: Logger) {}

  enqueue(interaction: Interaction): void {
    if (this.committed) {
      throw new Error(`AtomicScope: cannot enqueue "${interaction.label}" after commit`);
    }
    this.queue.push(interaction);
  }

  /** Labels of queued interactions, in execution order */
  get pending(): string[] {
    return this.ordered().map((i) => i.label);
  }

  /**
   * Execute every queued interaction. On failure, undo the completed ones
   * and rethrow the original error.
   */
  commit(): void {
    if (this.committed) {
      throw new Error("AtomicScope: already committed");
    }
    this.committed = true;

    const done: Interaction[] = [];
    for (const interaction of this.ordered()) {
      try {
        interaction.run();
      } catch (err) {
        this.compensate(done, interaction.label);
        throw err;
      }
      done.push(interaction);
    }
  }

  private ordered(): Interaction[] {
    // Array.prototype.sort is stable, so enqueue order is kept within a phase
    return [...this.queue].sort((a, b) => PHASE_ORDER[a.phase] - PHASE_ORDER[b.phase]);
  }

  private compensate(done: Interaction[], failed: string): void {
    for (const interaction of [...done].reverse()) {
      if (!interaction.undo) {
        this.logger.error(`Cannot undo "${interaction.label}" after "${failed}" failed`);
        continue;
      }
      try {
        interaction.undo();
        this.logger.warn(`Undid "${interaction.label}" after "${failed}" failed`);
      } catch (err) {
        this.logger.error(
          `Compensation for "${interaction.label}" failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  }
}

/**
 * Non-reentrant guard: an in-progress flag set before any collaborator is
 * called and released in `finally`.
 */
export class ExclusiveGuard {
  private inProgress: string | null = null;

  get active(): string | null {
    return this.inProgress;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.inProgress !== null) {
      throw new ReentrantCallError(operation, this.inProgress);
    }
    this.inProgress = operation;
    try {
      return fn();
    } finally {
      this.inProgress = null;
    }
  }
}
