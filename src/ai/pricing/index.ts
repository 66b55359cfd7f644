export {
	computeCost,
	DEFAULT_PRICING,
	getPricing,
	PRICING,
	type PricingEntry,
} from './pricing.js';
