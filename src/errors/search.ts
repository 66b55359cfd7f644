// ---------------------------------------------------------------------------
// Search Errors
// ---------------------------------------------------------------------------

import type { ParleyError } from './base.js';
import { createParleyError, isParleyError } from './base.js';

export const createSearchUnavailableError = (
	query: string,
	options: { cause?: unknown; reason?: 'no-results' | 'provider' } = {},
): ParleyError =>
	createParleyError(
		options.reason === 'no-results'
			? `No results found for: ${query}`
			: `Search failed for: ${query}`,
		{
			name: 'SearchUnavailableError',
			code: 'SEARCH_UNAVAILABLE',
			statusCode: 503,
			cause: options.cause,
			metadata: { query, reason: options.reason ?? 'provider' },
		},
	);

export const isSearchUnavailableError = (value: unknown): value is ParleyError =>
	isParleyError(value) && value.code === 'SEARCH_UNAVAILABLE';
