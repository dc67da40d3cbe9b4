// Stable Engine - public surface
// Collateral/debt ledger, health-factor risk model, liquidation protocol
// and price-staleness guard for an overcollateralized stable-value token.

export * from "./calculator";
export * from "./errors";
export * from "./types";
export * from "./health-factor";
export * from "./config";
export * from "./logger";
export * from "./metrics";
export * from "./registry";
export * from "./price-oracle-guard";
export * from "./atomic-scope";
export * from "./transfer-adapter";
export * from "./collateral-ledger";
export * from "./debt-ledger";
export * from "./risk-engine";
export * from "./liquidation-protocol";
export * from "./engine";
export * from "./monitor";
