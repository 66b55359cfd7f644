// ---------------------------------------------------------------------------
// ParleyError: base interface, factory, type guard, and utilities
// ---------------------------------------------------------------------------

/**
 * The ParleyError interface describes the shape of every error produced by
 * Parley.  Consumers discriminate errors via the `code` field and the
 * type-guard functions exported from sibling modules.
 */
export interface ParleyError extends Error {
	/** Machine-readable error code (e.g. "PROVIDER_RATE_LIMITED"). */
	readonly code: string;
	/** HTTP-style status hint. */
	readonly statusCode: number;
	/** Arbitrary structured context attached to the error. */
	readonly metadata: Record<string, unknown>;
	/** Return a plain-object representation suitable for logging / serialisation. */
	readonly toJSON: () => Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Options type shared by all factory helpers
// ---------------------------------------------------------------------------

export interface ParleyErrorOptions {
	readonly name?: string;
	readonly code?: string;
	readonly statusCode?: number;
	readonly cause?: unknown;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Base factory
// ---------------------------------------------------------------------------

const describeCause = (cause: unknown): unknown => {
	if (cause instanceof Error) {
		return { name: cause.name, message: cause.message };
	}
	return cause;
};

/**
 * Create a `ParleyError`: a plain `Error` object augmented with structured
 * fields.  This is the only place in the codebase where `new Error` is used
 * to build a domain error.
 */
export const createParleyError = (
	message: string,
	options: ParleyErrorOptions = {},
): ParleyError => {
	const err = new Error(message, { cause: options.cause }) as Error & {
		code: string;
		statusCode: number;
		metadata: Record<string, unknown>;
		toJSON: () => Record<string, unknown>;
	};

	err.name = options.name ?? 'ParleyError';
	const code = options.code ?? 'PARLEY_ERROR';
	const statusCode = options.statusCode ?? 500;
	const metadata = { ...options.metadata };

	Object.defineProperties(err, {
		code: { value: code, writable: false, enumerable: true },
		statusCode: { value: statusCode, writable: false, enumerable: true },
		metadata: { value: metadata, writable: false, enumerable: true },
		toJSON: {
			value: (): Record<string, unknown> => ({
				name: err.name,
				code,
				message: err.message,
				statusCode,
				metadata,
				cause: describeCause(err.cause),
				stack: err.stack,
			}),
			writable: false,
			enumerable: false,
		},
	});

	return err;
};

// ---------------------------------------------------------------------------
// Base type guard
// ---------------------------------------------------------------------------

/**
 * Type-guard that checks whether a value is a `ParleyError`.
 * Uses duck-typing on the `code` field rather than `instanceof`.
 */
export const isParleyError = (value: unknown): value is ParleyError =>
	value instanceof Error &&
	'code' in value &&
	typeof value.code === 'string' &&
	'statusCode' in value &&
	typeof value.statusCode === 'number' &&
	'toJSON' in value &&
	typeof value.toJSON === 'function';

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

/**
 * Normalise an unknown thrown value into a proper `Error` instance.
 * If it is already an `Error`, returns it directly.
 */
export const toError = (value: unknown): Error => {
	if (value instanceof Error) return value;
	if (typeof value === 'string') return new Error(value);
	return new Error(String(value));
};

/**
 * Wrap an unknown cause in a `ParleyError` with an optional error code.
 * The original value is attached as `cause` for chaining.
 */
export const wrapError = (
	message: string,
	cause: unknown,
	code?: string,
): ParleyError => createParleyError(message, { cause, code });
