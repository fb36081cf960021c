export * from "./sma";
export * from "./rsi";
export * from "./indicatorEngine";
