/**
 * Health factor as a sum type. A position without debt is unconstrained;
 * everything else is an 18-decimal ratio.
 */

import { ethers } from "ethers";
import { MAX_UINT256, MIN_HEALTH_FACTOR } from "./calculator";

export type HealthFactor =
  | { kind: "unconstrained" }
  | { kind: "ratio"; value: bigint };

export const UNCONSTRAINED: HealthFactor = Object.freeze({ kind: "unconstrained" as const });

export function ratio(value: bigint): HealthFactor {
  return { kind: "ratio", value };
}

/** Negative if a < b, zero if equal, positive if a > b. Unconstrained sorts above every ratio. */
export function compareHealthFactors(a: HealthFactor, b: HealthFactor): number {
  if (a.kind === "unconstrained") return b.kind === "unconstrained" ? 0 : 1;
  if (b.kind === "unconstrained") return -1;
  if (a.value === b.value) return 0;
  return a.value < b.value ? -1 : 1;
}

export function isHealthy(hf: HealthFactor): boolean {
  return hf.kind === "unconstrained" || hf.value >= MIN_HEALTH_FACTOR;
}

/** Fixed-point projection; unconstrained maps to the largest uint256. */
export function toFixedPoint(hf: HealthFactor): bigint {
  return hf.kind === "unconstrained" ? MAX_UINT256 : hf.value;
}

export function formatHealthFactor(hf: HealthFactor): string {
  return hf.kind === "unconstrained" ? "∞" : ethers.formatEther(hf.value);
}
