/**
 * Strategy engine converts indicator snapshots into edge-triggered signals.
 */
export * from "./types";
export * from "./strategyEngine";
export * from "./strategies/MaCrossoverStrategy";
export * from "./strategies/RsiThresholdStrategy";
