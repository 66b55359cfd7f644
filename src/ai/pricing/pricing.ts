// ---------------------------------------------------------------------------
// Pricing Table
//
// Advisory cost estimation: dollars per million tokens, keyed by model
// display name.  Unknown models resolve to the default entry.
// ---------------------------------------------------------------------------

export interface PricingEntry {
	readonly inputPricePerMillion: number;
	readonly outputPricePerMillion: number;
}

const entry = (input: number, output: number): PricingEntry =>
	Object.freeze({ inputPricePerMillion: input, outputPricePerMillion: output });

export const PRICING: Readonly<Record<string, PricingEntry>> = Object.freeze({
	Opus: entry(15.0, 75.0),
	Sonnet: entry(3.0, 15.0),
	Haiku: entry(0.8, 4.0),
});

export const DEFAULT_PRICING: PricingEntry = entry(3.0, 15.0);

export function getPricing(modelName: string): PricingEntry {
	return Object.hasOwn(PRICING, modelName)
		? PRICING[modelName]
		: DEFAULT_PRICING;
}

export function computeCost(
	inputTokens: number,
	outputTokens: number,
	pricing: PricingEntry,
): number {
	return (
		(inputTokens / 1_000_000) * pricing.inputPricePerMillion +
		(outputTokens / 1_000_000) * pricing.outputPricePerMillion
	);
}
