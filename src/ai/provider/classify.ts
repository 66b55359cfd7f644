// ---------------------------------------------------------------------------
// Service Error Classification
//
// Turns whatever the transport threw into one provider error.  Status
// codes and SDK error classes are authoritative; message text is a
// best-effort fallback and anything else is unclassified.
// ---------------------------------------------------------------------------

import {
	createAuthenticationError,
	createConnectivityError,
	createRateLimitedError,
	createServiceOverloadedError,
	createUnclassifiedRemoteError,
	isProviderError,
	type ProviderError,
	toError,
} from '../../errors/index.js';

const statusOf = (error: unknown): number | undefined => {
	if (
		typeof error === 'object' &&
		error !== null &&
		'status' in error &&
		typeof error.status === 'number'
	) {
		return error.status;
	}
	return undefined;
};

const CONNECTIVITY_NAMES = new Set([
	'APIConnectionError',
	'APIConnectionTimeoutError',
	'FetchError',
	'AbortError',
	'TimeoutError',
]);

const CONNECTIVITY_CODES = new Set([
	'ECONNREFUSED',
	'ECONNRESET',
	'ENOTFOUND',
	'ETIMEDOUT',
	'EAI_AGAIN',
]);

const codeOf = (error: Error): string | undefined =>
	'code' in error && typeof error.code === 'string' ? error.code : undefined;

export function classifyServiceError(
	error: unknown,
	provider: string,
): ProviderError {
	if (isProviderError(error)) return error;

	const err = toError(error);
	const message = err.message;
	const status = statusOf(error);
	const options = { cause: error, status };

	if (status === 401) return createAuthenticationError(provider, message, options);
	if (status === 429) return createRateLimitedError(provider, message, options);
	if (status === 529) {
		return createServiceOverloadedError(provider, message, options);
	}
	if (
		CONNECTIVITY_NAMES.has(err.name) ||
		CONNECTIVITY_CODES.has(codeOf(err) ?? '')
	) {
		return createConnectivityError(provider, message, options);
	}

	const lower = message.toLowerCase();
	if (lower.includes('401') || lower.includes('authentication')) {
		return createAuthenticationError(provider, message, options);
	}
	if (lower.includes('429') || lower.includes('rate limit')) {
		return createRateLimitedError(provider, message, options);
	}
	if (lower.includes('overloaded') || lower.includes('529')) {
		return createServiceOverloadedError(provider, message, options);
	}
	if (lower.includes('connection') || lower.includes('timeout')) {
		return createConnectivityError(provider, message, options);
	}

	return createUnclassifiedRemoteError(provider, message, options);
}
