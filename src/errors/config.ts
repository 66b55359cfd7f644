// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

import type { ParleyError } from './base.js';
import { createParleyError, isParleyError } from './base.js';

export interface ConfigIssue {
	readonly path: string;
	readonly message: string;
}

export const createMissingCredentialError = (
	variable: string,
): ParleyError =>
	createParleyError(`API key not found (${variable})`, {
		name: 'MissingCredentialError',
		code: 'CONFIG_MISSING_CREDENTIAL',
		statusCode: 401,
		metadata: { variable },
	});

export const createConfigValidationError = (
	issues: readonly ConfigIssue[],
	options: { cause?: unknown } = {},
): ParleyError & { readonly issues: readonly ConfigIssue[] } => {
	const summary =
		issues.length === 1
			? issues[0].message
			: `${issues.length} validation errors`;

	const frozenIssues = Object.freeze([...issues]);

	const err = createParleyError(`Invalid configuration: ${summary}`, {
		name: 'ConfigValidationError',
		code: 'CONFIG_VALIDATION',
		statusCode: 400,
		cause: options.cause,
		metadata: { issues: frozenIssues },
	}) as ParleyError & { readonly issues: readonly ConfigIssue[] };

	Object.defineProperty(err, 'issues', {
		value: frozenIssues,
		writable: false,
		enumerable: true,
	});

	return err;
};

export const createConfigParseError = (
	configPath: string,
	options: { cause?: unknown } = {},
): ParleyError =>
	createParleyError(`Failed to parse configuration file: ${configPath}`, {
		name: 'ConfigParseError',
		code: 'CONFIG_PARSE',
		statusCode: 400,
		cause: options.cause,
		metadata: { configPath },
	});

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isConfigError = (value: unknown): value is ParleyError =>
	isParleyError(value) && value.code.startsWith('CONFIG_');

export const isMissingCredentialError = (value: unknown): value is ParleyError =>
	isParleyError(value) && value.code === 'CONFIG_MISSING_CREDENTIAL';

export const isConfigValidationError = (
	value: unknown,
): value is ParleyError & { readonly issues: readonly ConfigIssue[] } =>
	isParleyError(value) && value.code === 'CONFIG_VALIDATION';

export const isConfigParseError = (value: unknown): value is ParleyError =>
	isParleyError(value) && value.code === 'CONFIG_PARSE';
