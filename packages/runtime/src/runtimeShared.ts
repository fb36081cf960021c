import { createLogger } from "@papertape/core";

export const runtimeLogger = createLogger("runtime");

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
