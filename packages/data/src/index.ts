export * from "./types";
export * from "./errors";
export * from "./symbols";
export * from "./rateLimiter";
export * from "./retry";
export * from "./simulatedProvider";
export * from "./polledHttpProvider";
export * from "./tickSubscription";
export * from "./createTickProvider";
