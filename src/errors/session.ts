// ---------------------------------------------------------------------------
// Session Errors
// ---------------------------------------------------------------------------

import type { ParleyError } from './base.js';
import { createParleyError, isParleyError } from './base.js';

export const createCorruptedSaveFileError = (
	path: string,
	options: { cause?: unknown } = {},
): ParleyError =>
	createParleyError(`Saved session is corrupted: ${path}`, {
		name: 'CorruptedSaveFileError',
		code: 'SESSION_CORRUPTED',
		statusCode: 422,
		cause: options.cause,
		metadata: { path },
	});

export const createExchangeInFlightError = (): ParleyError =>
	createParleyError('An exchange is already in progress', {
		name: 'ExchangeInFlightError',
		code: 'EXCHANGE_IN_FLIGHT',
		statusCode: 409,
	});

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isCorruptedSaveFileError = (value: unknown): value is ParleyError =>
	isParleyError(value) && value.code === 'SESSION_CORRUPTED';

export const isExchangeInFlightError = (value: unknown): value is ParleyError =>
	isParleyError(value) && value.code === 'EXCHANGE_IN_FLIGHT';
