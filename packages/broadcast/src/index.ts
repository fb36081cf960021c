export * from "./types";
export * from "./boundedQueue";
export * from "./clientSession";
export * from "./snapshotStore";
export * from "./broadcastHub";
export * from "./reconnectBackoff";
