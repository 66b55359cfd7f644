import { describe, expect, it } from 'vitest';
import {
	createAuthenticationError,
	createConfigValidationError,
	createCorruptedSaveFileError,
	createExchangeInFlightError,
	createFileNotFoundError,
	createFileTooLargeError,
	createFileUnreadableError,
	createMissingCredentialError,
	createParleyError,
	createPermissionDeniedError,
	createSearchUnavailableError,
	createUnclassifiedRemoteError,
	isAttachmentError,
	isConfigError,
	isConfigValidationError,
	isCorruptedSaveFileError,
	isExchangeInFlightError,
	isFileNotFoundError,
	isMissingCredentialError,
	isParleyError,
	isProviderError,
	isSearchUnavailableError,
	toError,
	wrapError,
} from '../src/errors/index.js';

// ===========================================================================
// createParleyError
// ===========================================================================

describe('createParleyError', () => {
	it('should apply defaults', () => {
		const err = createParleyError('boom');

		expect(err).toBeInstanceOf(Error);
		expect(err.name).toBe('ParleyError');
		expect(err.code).toBe('PARLEY_ERROR');
		expect(err.statusCode).toBe(500);
		expect(err.metadata).toEqual({});
	});

	it('should keep the cause and serialise it in toJSON', () => {
		const cause = new Error('root');
		const err = createParleyError('outer', {
			code: 'X',
			metadata: { a: 1 },
			cause,
		});

		expect(err.cause).toBe(cause);
		const json = err.toJSON();
		expect(json.code).toBe('X');
		expect(json.message).toBe('outer');
		expect(json.metadata).toEqual({ a: 1 });
		expect(json.cause).toEqual({ name: 'Error', message: 'root' });
	});

	it('should make code read-only', () => {
		const err = createParleyError('x', { code: 'A' });
		expect(() => {
			Object.assign(err, { code: 'B' });
		}).toThrow();
		expect(err.code).toBe('A');
	});
});

// ===========================================================================
// Utilities
// ===========================================================================

describe('isParleyError', () => {
	it('should reject plain errors and non-errors', () => {
		expect(isParleyError(new Error('plain'))).toBe(false);
		expect(isParleyError({ code: 'X', statusCode: 1 })).toBe(false);
		expect(isParleyError(undefined)).toBe(false);
	});

	it('should accept factory output', () => {
		expect(isParleyError(createExchangeInFlightError())).toBe(true);
	});
});

describe('toError / wrapError', () => {
	it('should normalise thrown values', () => {
		const err = new Error('same');
		expect(toError(err)).toBe(err);
		expect(toError('text').message).toBe('text');
		expect(toError(42).message).toBe('42');
	});

	it('should wrap a cause with an optional code', () => {
		const cause = new Error('inner');
		const wrapped = wrapError('outer', cause, 'WRAPPED');
		expect(wrapped.code).toBe('WRAPPED');
		expect(wrapped.cause).toBe(cause);
	});
});

// ===========================================================================
// Provider errors
// ===========================================================================

describe('provider errors', () => {
	it('should carry a title, hint and provider', () => {
		const err = createAuthenticationError('anthropic', 'bad key');

		expect(err.kind).toBe('authentication');
		expect(err.code).toBe('PROVIDER_AUTHENTICATION');
		expect(err.statusCode).toBe(401);
		expect(err.title).toBe('Invalid API key');
		expect(err.hint).toBe(
			'Check your .env file: the key may be expired or incorrect.',
		);
		expect(err.metadata.provider).toBe('anthropic');
		expect(isProviderError(err)).toBe(true);
	});

	it('should put the raw message in the unclassified hint', () => {
		const err = createUnclassifiedRemoteError('anthropic', 'odd failure');
		expect(err.title).toBe('Something went wrong');
		expect(err.hint).toBe('Details: odd failure');
		expect(err.statusCode).toBe(502);
	});

	it('should prefer an explicit status', () => {
		const err = createUnclassifiedRemoteError('anthropic', 'x', { status: 500 });
		expect(err.statusCode).toBe(500);
	});
});

// ===========================================================================
// Attachment errors
// ===========================================================================

describe('attachment errors', () => {
	it('should describe a missing file', () => {
		const err = createFileNotFoundError('src/a.ts');
		expect(err.message).toBe('File not found: src/a.ts');
		expect(err.path).toBe('src/a.ts');
		expect(isFileNotFoundError(err)).toBe(true);
		expect(isAttachmentError(err)).toBe(true);
	});

	it('should format size and limit for an oversized file', () => {
		const err = createFileTooLargeError('big.bin', 123456, 100_000);
		expect(err.message).toBe('File too large: big.bin (123,456 bytes)');
		expect(err.hint).toBe(
			'Max file size is 100KB. Try a smaller file or split it up.',
		);
		expect(err.metadata).toEqual({
			size: 123456,
			maxSize: 100_000,
			path: 'big.bin',
		});
	});

	it('should choose the unreadable hint by cause', () => {
		expect(createFileUnreadableError('x.png').hint).toBe(
			'This looks like a binary file. Only text files are supported.',
		);
		expect(createFileUnreadableError('x.txt', { binary: false }).hint).toBe(
			'The file could not be read.',
		);
	});

	it('should flag paths outside the project root', () => {
		const err = createPermissionDeniedError('../x', { outsideRoot: true });
		expect(err.message).toBe('Access denied: ../x');
		expect(err.metadata.outsideRoot).toBe(true);
		expect(err.hint).toBe('Only files inside the project root can be attached.');
	});
});

// ===========================================================================
// Config, search and session errors
// ===========================================================================

describe('config errors', () => {
	it('should name the missing variable', () => {
		const err = createMissingCredentialError('ANTHROPIC_API_KEY');
		expect(err.message).toBe('API key not found (ANTHROPIC_API_KEY)');
		expect(isMissingCredentialError(err)).toBe(true);
		expect(isConfigError(err)).toBe(true);
	});

	it('should summarise validation issues', () => {
		const one = createConfigValidationError([
			{ path: 'contextLimit', message: 'contextLimit must be at least 1' },
		]);
		expect(one.message).toBe(
			'Invalid configuration: contextLimit must be at least 1',
		);

		const two = createConfigValidationError([
			{ path: 'a', message: 'a bad' },
			{ path: 'b', message: 'b bad' },
		]);
		expect(two.message).toBe('Invalid configuration: 2 validation errors');
		expect(two.issues).toHaveLength(2);
		expect(isConfigValidationError(two)).toBe(true);
	});
});

describe('search and session errors', () => {
	it('should word search failures by reason', () => {
		const none = createSearchUnavailableError('cats', { reason: 'no-results' });
		expect(none.message).toBe('No results found for: cats');
		expect(none.metadata).toEqual({ query: 'cats', reason: 'no-results' });

		const failed = createSearchUnavailableError('cats');
		expect(failed.message).toBe('Search failed for: cats');
		expect(failed.metadata.reason).toBe('provider');
		expect(isSearchUnavailableError(failed)).toBe(true);
	});

	it('should identify session errors', () => {
		const corrupted = createCorruptedSaveFileError('chat_x.json');
		expect(corrupted.message).toBe('Saved session is corrupted: chat_x.json');
		expect(isCorruptedSaveFileError(corrupted)).toBe(true);
		expect(isExchangeInFlightError(corrupted)).toBe(false);
		expect(isExchangeInFlightError(createExchangeInFlightError())).toBe(true);
	});
});
