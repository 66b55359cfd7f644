export {
	extractQuery,
	hasSearchIntent,
	SEARCH_TRIGGERS,
} from './intent.js';
export {
	createDuckDuckGoSearchProvider,
	createSearchResolver,
	DEFAULT_MAX_RESULTS,
	formatSearchResult,
	formatSearchResults,
	type SearchProvider,
	type SearchResolution,
	type SearchResolver,
	type SearchResolverOptions,
	type SearchResult,
	sourceDomain,
} from './web-search.js';
