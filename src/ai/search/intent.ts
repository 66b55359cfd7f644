// ---------------------------------------------------------------------------
// Search Intent Classifier
//
// Phrase triggers, checked in list order.  They are kept specific so that
// ordinary conversation does not start a web search.
// ---------------------------------------------------------------------------

export const SEARCH_TRIGGERS: readonly string[] = Object.freeze([
	'search for',
	'search about',
	'look up',
	'google',
	'find online',
	"what's the latest",
	'latest news',
	'current price',
	'weather in',
	'search the web',
	'look online',
	'web search',
]);

export function hasSearchIntent(
	message: string,
	triggers: readonly string[] = SEARCH_TRIGGERS,
): boolean {
	const lower = message.toLowerCase();
	return triggers.some((trigger) => lower.includes(trigger));
}

const stripQuotes = (text: string): string =>
	text.replace(/^"+|"+$/g, '').replace(/^'+|'+$/g, '');

/**
 * The text after the first trigger (in list order) that leaves a
 * non-empty query. Falls back to the whole message, which is what an
 * explicit search command relies on.
 */
export function extractQuery(
	message: string,
	triggers: readonly string[] = SEARCH_TRIGGERS,
): string {
	const lower = message.toLowerCase();
	for (const trigger of triggers) {
		const idx = lower.indexOf(trigger);
		if (idx === -1) continue;
		const query = stripQuotes(message.slice(idx + trigger.length).trim());
		if (query) return query;
	}
	return message;
}
