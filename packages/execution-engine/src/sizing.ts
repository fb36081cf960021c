import type { SizingPolicyConfig } from "@papertape/core";

export interface SizingInput {
	cash: number;
	price: number;
	lotSize: number;
}

/** Decides how many units a BUY should acquire. */
export interface SizingPolicy {
	readonly type: SizingPolicyConfig["type"];
	quantityFor(input: SizingInput): number;
}

export const floorToLot = (quantity: number, lotSize: number): number => {
	if (quantity <= 0 || lotSize <= 0) {
		return 0;
	}
	return Math.floor(quantity / lotSize) * lotSize;
};

export class FractionOfCashSizing implements SizingPolicy {
	readonly type = "fraction_of_cash" as const;

	constructor(private readonly fraction: number) {
		if (!(fraction > 0 && fraction <= 1)) {
			throw new Error("Sizing fraction must be within (0, 1]");
		}
	}

	quantityFor({ cash, price, lotSize }: SizingInput): number {
		return floorToLot((cash * this.fraction) / price, lotSize);
	}
}

export class FixedQuantitySizing implements SizingPolicy {
	readonly type = "fixed_quantity" as const;

	constructor(private readonly quantity: number) {
		if (!(quantity > 0)) {
			throw new Error("Fixed order quantity must be > 0");
		}
	}

	quantityFor({ lotSize }: SizingInput): number {
		return floorToLot(this.quantity, lotSize);
	}
}

export const createSizingPolicy = (config: SizingPolicyConfig): SizingPolicy =>
	config.type === "fixed_quantity"
		? new FixedQuantitySizing(config.quantity)
		: new FractionOfCashSizing(config.fraction);
