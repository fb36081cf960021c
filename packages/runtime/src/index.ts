export * from "./types";
export * from "./loop/runTick";
export * from "./symbolPipeline";
export * from "./tradingSession";
