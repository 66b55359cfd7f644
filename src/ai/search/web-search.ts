// ---------------------------------------------------------------------------
// Search Augmentation Resolver
//
// Fetches web results for a query and renders them as a context block
// for the outbound request.  Resolution never throws: a provider failure
// or an empty result set both come back as SEARCH_UNAVAILABLE.
// ---------------------------------------------------------------------------

import ddg from 'duck-duck-scrape';
import {
	createSearchUnavailableError,
	type ParleyError,
	toError,
} from '../../errors/index.js';
import { getDefaultLogger, type Logger } from '../../logger.js';
import { CONTEXT_SEPARATOR } from '../session/augmentation.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SearchResult {
	readonly title: string;
	readonly url: string;
	readonly snippet: string;
}

export interface SearchProvider {
	readonly name: string;
	readonly search: (
		query: string,
		maxResults: number,
	) => Promise<readonly SearchResult[]>;
}

export type SearchResolution =
	| {
			readonly ok: true;
			readonly query: string;
			readonly results: readonly SearchResult[];
			readonly context: string;
	  }
	| { readonly ok: false; readonly query: string; readonly error: ParleyError };

export interface SearchResolverOptions {
	readonly provider: SearchProvider;
	readonly maxResults?: number;
	readonly logger?: Logger;
}

export interface SearchResolver {
	readonly resolve: (query: string) => Promise<SearchResolution>;
}

export const DEFAULT_MAX_RESULTS = 5;

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export const formatSearchResult = (result: SearchResult): string =>
	`Title: ${result.title}\nURL: ${result.url}\nSnippet: ${result.snippet}`;

export const formatSearchResults = (results: readonly SearchResult[]): string =>
	results.map(formatSearchResult).join(CONTEXT_SEPARATOR);

/** Host of a result URL without scheme or leading `www.`. */
export const sourceDomain = (url: string): string =>
	url.replace(/^https?:\/\/(www\.)?/, '').split('/')[0];

// ---------------------------------------------------------------------------
// DuckDuckGo provider
// ---------------------------------------------------------------------------

const stripMarkup = (html: string): string =>
	html
		.replace(/<[^>]+>/g, '')
		.replace(/\s+/g, ' ')
		.trim();

export function createDuckDuckGoSearchProvider(): SearchProvider {
	const search = async (
		query: string,
		maxResults: number,
	): Promise<readonly SearchResult[]> => {
		const response = await ddg.search(query, {
			safeSearch: ddg.SafeSearchType.MODERATE,
		});
		if (response.noResults) return [];

		return response.results.slice(0, maxResults).map((r) =>
			Object.freeze({
				title: r.title,
				url: r.url,
				snippet: stripMarkup(r.description),
			}),
		);
	};

	return Object.freeze({ name: 'duckduckgo', search });
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

export function createSearchResolver(
	options: SearchResolverOptions,
): SearchResolver {
	const { provider } = options;
	const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
	const logger = options.logger ?? getDefaultLogger().child('search');

	const resolve = async (query: string): Promise<SearchResolution> => {
		logger.debug('searching', { provider: provider.name, query, maxResults });

		let results: readonly SearchResult[];
		try {
			results = (await provider.search(query, maxResults)).slice(
				0,
				maxResults,
			);
		} catch (error) {
			logger.warn('search provider failed', {
				query,
				message: toError(error).message,
			});
			return Object.freeze({
				ok: false as const,
				query,
				error: createSearchUnavailableError(query, {
					cause: error,
					reason: 'provider',
				}),
			});
		}

		if (results.length === 0) {
			return Object.freeze({
				ok: false as const,
				query,
				error: createSearchUnavailableError(query, { reason: 'no-results' }),
			});
		}

		return Object.freeze({
			ok: true as const,
			query,
			results,
			context: formatSearchResults(results),
		});
	};

	return Object.freeze({ resolve });
}
