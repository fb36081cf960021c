/** Arithmetic mean of the last `period` values, or null until that many exist. */
export function sma(values: readonly number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}

	let sum = 0;
	for (let i = values.length - period; i < values.length; i += 1) {
		sum += values[i] ?? 0;
	}
	return sum / period;
}
