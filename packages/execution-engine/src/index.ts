export { PaperAccount } from "./paperAccount";
export type { PaperAccountSnapshot, ClosedTrade } from "./paperAccount";
export * from "./sizing";
export * from "./paperBroker";
