import type { Clock, ProviderConfig } from "@papertape/core";
import {
	PolledHttpProviderOptions,
	PolledHttpTickProvider,
} from "./polledHttpProvider";
import { SimulatedTickProvider } from "./simulatedProvider";
import type { TickProvider } from "./types";

export interface CreateTickProviderOptions {
	clock?: Clock;
	polledHttp?: Omit<PolledHttpProviderOptions, "clock">;
}

export const createTickProvider = (
	config: ProviderConfig,
	options: CreateTickProviderOptions = {}
): TickProvider => {
	switch (config.type) {
		case "simulated":
			return new SimulatedTickProvider(config, options.clock);
		case "polled_http":
			return new PolledHttpTickProvider(config, {
				...options.polledHttp,
				clock: options.clock,
			});
		default: {
			const unsupported: never = config;
			throw new Error(`Unsupported provider ${JSON.stringify(unsupported)}`);
		}
	}
};
