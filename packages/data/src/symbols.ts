export type Exchange = "SH" | "SZ";

export interface QuoteSymbol {
	code: string;
	exchange: Exchange;
}

const CODE_RE = /^\d{6}$/;

/**
 * Accepts `600000.SH`, `SH600000`, `sh600000` and bare `600000`. A bare code
 * starting with 6 is Shanghai, anything else Shenzhen.
 */
export const parseQuoteSymbol = (symbol: string): QuoteSymbol => {
	const value = symbol.trim().toUpperCase();

	const prefix = value.slice(0, 2);
	if ((prefix === "SH" || prefix === "SZ") && CODE_RE.test(value.slice(2))) {
		return { code: value.slice(2), exchange: prefix };
	}

	const suffix = value.slice(-3);
	if (
		(suffix === ".SH" || suffix === ".SZ") &&
		CODE_RE.test(value.slice(0, -3))
	) {
		return {
			code: value.slice(0, -3),
			exchange: suffix === ".SH" ? "SH" : "SZ",
		};
	}

	if (CODE_RE.test(value)) {
		return { code: value, exchange: value.startsWith("6") ? "SH" : "SZ" };
	}

	throw new Error(`Unsupported A-share symbol format: ${symbol}`);
};

export const canonicalSymbol = (symbol: string): string => {
	const { code, exchange } = parseQuoteSymbol(symbol);
	return `${code}.${exchange}`;
};

/** Upstream security id: `1.<code>` for Shanghai, `0.<code>` for Shenzhen. */
export const toSecId = (symbol: string): string => {
	const { code, exchange } = parseQuoteSymbol(symbol);
	return `${exchange === "SH" ? 1 : 0}.${code}`;
};
