// ---------------------------------------------------------------------------
// Error barrel: re-exports all error factories, type guards, and utilities
// ---------------------------------------------------------------------------

export {
	type AttachmentError,
	createFileNotFoundError,
	createFileTooLargeError,
	createFileUnreadableError,
	createPermissionDeniedError,
	isAttachmentError,
	isFileNotFoundError,
	isFileTooLargeError,
	isFileUnreadableError,
	isPermissionDeniedError,
} from './attachment.js';
export {
	createParleyError,
	isParleyError,
	type ParleyError,
	type ParleyErrorOptions,
	toError,
	wrapError,
} from './base.js';
export {
	type ConfigIssue,
	createConfigParseError,
	createConfigValidationError,
	createMissingCredentialError,
	isConfigError,
	isConfigParseError,
	isConfigValidationError,
	isMissingCredentialError,
} from './config.js';
export {
	createAuthenticationError,
	createConnectivityError,
	createRateLimitedError,
	createServiceOverloadedError,
	createUnclassifiedRemoteError,
	isAuthenticationError,
	isConnectivityError,
	isProviderError,
	isRateLimitedError,
	isServiceOverloadedError,
	isUnclassifiedRemoteError,
	type ProviderError,
	type ProviderErrorKind,
} from './provider.js';
export {
	createSearchUnavailableError,
	isSearchUnavailableError,
} from './search.js';
export {
	createCorruptedSaveFileError,
	createExchangeInFlightError,
	isCorruptedSaveFileError,
	isExchangeInFlightError,
} from './session.js';
