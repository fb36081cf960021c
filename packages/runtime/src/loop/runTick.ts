import { buildTickMessage } from "@papertape/core";
import type { TickInput, TickResult } from "../types";

/**
 * One tick through the four stages, in order. The broker stage is the only
 * await; it queues behind whatever other symbols have already submitted.
 */
export const runTick = async (input: TickInput): Promise<TickResult> => {
	const { tick } = input;
	const indicators = input.indicatorEngine.update(tick);
	const signal = input.strategyEngine.evaluate(tick, indicators);
	const execution = await input.broker.submit(signal, tick.price);

	const message = buildTickMessage({
		symbol: tick.symbol,
		price: tick.price,
		timestamp: tick.timestamp,
		indicators,
		signal,
		account: execution.account,
	});
	if (input.signal?.aborted) {
		return { indicators, signal, execution, message, published: false };
	}
	input.hub.publish(message);

	return { indicators, signal, execution, message, published: true };
};
