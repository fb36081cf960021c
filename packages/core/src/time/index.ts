/** Source of UTC epoch milliseconds; injectable so tests can pin time. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const toIsoTimestamp = (timestamp: number): string =>
	new Date(timestamp).toISOString();
