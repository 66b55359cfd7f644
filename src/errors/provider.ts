// ---------------------------------------------------------------------------
// Provider Errors
//
// Failures of the remote AI service, classified once at the client
// boundary.  Each carries a short user-facing title and, where one is
// known, an actionable hint.
// ---------------------------------------------------------------------------

import type { ParleyError } from './base.js';
import { createParleyError, isParleyError } from './base.js';

export type ProviderErrorKind =
	| 'authentication'
	| 'rate-limited'
	| 'overloaded'
	| 'connectivity'
	| 'unclassified';

export type ProviderError = ParleyError & {
	readonly provider: string;
	readonly kind: ProviderErrorKind;
	readonly title: string;
	readonly hint?: string;
};

interface ProviderErrorOptions {
	readonly cause?: unknown;
	readonly status?: number;
	readonly metadata?: Record<string, unknown>;
}

const KIND_CODES: Readonly<Record<ProviderErrorKind, string>> = Object.freeze(
	{
		authentication: 'PROVIDER_AUTHENTICATION',
		'rate-limited': 'PROVIDER_RATE_LIMITED',
		overloaded: 'PROVIDER_OVERLOADED',
		connectivity: 'PROVIDER_CONNECTIVITY',
		unclassified: 'PROVIDER_UNCLASSIFIED',
	},
);

const KIND_NAMES: Readonly<Record<ProviderErrorKind, string>> = Object.freeze(
	{
		authentication: 'AuthenticationError',
		'rate-limited': 'RateLimitedError',
		overloaded: 'ServiceOverloadedError',
		connectivity: 'ConnectivityError',
		unclassified: 'UnclassifiedRemoteError',
	},
);

const createProviderError = (
	provider: string,
	kind: ProviderErrorKind,
	message: string,
	display: { readonly title: string; readonly hint?: string },
	defaultStatus: number,
	options: ProviderErrorOptions,
): ProviderError => {
	const err = createParleyError(message, {
		name: KIND_NAMES[kind],
		code: KIND_CODES[kind],
		statusCode: options.status ?? defaultStatus,
		cause: options.cause,
		metadata: { ...options.metadata, provider },
	}) as ProviderError;

	Object.defineProperties(err, {
		provider: { value: provider, writable: false, enumerable: true },
		kind: { value: kind, writable: false, enumerable: true },
		title: { value: display.title, writable: false, enumerable: true },
		hint: { value: display.hint, writable: false, enumerable: true },
	});

	return err;
};

export const createAuthenticationError = (
	provider: string,
	message: string,
	options: ProviderErrorOptions = {},
): ProviderError =>
	createProviderError(
		provider,
		'authentication',
		message,
		{
			title: 'Invalid API key',
			hint: 'Check your .env file: the key may be expired or incorrect.',
		},
		401,
		options,
	);

export const createRateLimitedError = (
	provider: string,
	message: string,
	options: ProviderErrorOptions = {},
): ProviderError =>
	createProviderError(
		provider,
		'rate-limited',
		message,
		{
			title: 'Rate limited',
			hint: 'Too many requests. Wait a moment and try again.',
		},
		429,
		options,
	);

export const createServiceOverloadedError = (
	provider: string,
	message: string,
	options: ProviderErrorOptions = {},
): ProviderError =>
	createProviderError(
		provider,
		'overloaded',
		message,
		{
			title: 'Service overloaded',
			hint: 'The API is busy right now. Try again in a few seconds.',
		},
		529,
		options,
	);

export const createConnectivityError = (
	provider: string,
	message: string,
	options: ProviderErrorOptions = {},
): ProviderError =>
	createProviderError(
		provider,
		'connectivity',
		message,
		{
			title: 'Connection failed',
			hint: 'Check your internet connection and try again.',
		},
		503,
		options,
	);

export const createUnclassifiedRemoteError = (
	provider: string,
	message: string,
	options: ProviderErrorOptions = {},
): ProviderError =>
	createProviderError(
		provider,
		'unclassified',
		message,
		{ title: 'Something went wrong', hint: `Details: ${message}` },
		502,
		options,
	);

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isProviderError = (value: unknown): value is ProviderError =>
	isParleyError(value) &&
	value.code.startsWith('PROVIDER_') &&
	'kind' in value &&
	typeof value.kind === 'string';

export const isAuthenticationError = (value: unknown): value is ProviderError =>
	isProviderError(value) && value.kind === 'authentication';

export const isRateLimitedError = (value: unknown): value is ProviderError =>
	isProviderError(value) && value.kind === 'rate-limited';

export const isServiceOverloadedError = (
	value: unknown,
): value is ProviderError =>
	isProviderError(value) && value.kind === 'overloaded';

export const isConnectivityError = (value: unknown): value is ProviderError =>
	isProviderError(value) && value.kind === 'connectivity';

export const isUnclassifiedRemoteError = (
	value: unknown,
): value is ProviderError =>
	isProviderError(value) && value.kind === 'unclassified';
