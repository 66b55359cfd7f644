// ---------------------------------------------------------------------------
// Attachment Errors
// ---------------------------------------------------------------------------

import type { ParleyError } from './base.js';
import { createParleyError, isParleyError } from './base.js';

export type AttachmentError = ParleyError & {
	readonly path: string;
	readonly hint: string;
};

const createAttachmentError = (
	path: string,
	message: string,
	options: {
		name: string;
		code: string;
		statusCode: number;
		hint: string;
		cause?: unknown;
		metadata?: Record<string, unknown>;
	},
): AttachmentError => {
	const err = createParleyError(message, {
		name: options.name,
		code: options.code,
		statusCode: options.statusCode,
		cause: options.cause,
		metadata: { ...options.metadata, path },
	}) as AttachmentError;

	Object.defineProperties(err, {
		path: { value: path, writable: false, enumerable: true },
		hint: { value: options.hint, writable: false, enumerable: true },
	});

	return err;
};

export const createFileNotFoundError = (
	path: string,
	options: { cause?: unknown } = {},
): AttachmentError =>
	createAttachmentError(path, `File not found: ${path}`, {
		name: 'FileNotFoundError',
		code: 'ATTACHMENT_NOT_FOUND',
		statusCode: 404,
		hint: 'Paths are relative to the project root. Example: @file src/lib.ts',
		cause: options.cause,
	});

export const createFileTooLargeError = (
	path: string,
	size: number,
	maxSize: number,
): AttachmentError =>
	createAttachmentError(
		path,
		`File too large: ${path} (${size.toLocaleString('en-US')} bytes)`,
		{
			name: 'FileTooLargeError',
			code: 'ATTACHMENT_TOO_LARGE',
			statusCode: 413,
			hint: `Max file size is ${Math.round(maxSize / 1000)}KB. Try a smaller file or split it up.`,
			metadata: { size, maxSize },
		},
	);

export const createFileUnreadableError = (
	path: string,
	options: { cause?: unknown; binary?: boolean } = {},
): AttachmentError =>
	createAttachmentError(path, `Can't read ${path}`, {
		name: 'FileUnreadableError',
		code: 'ATTACHMENT_UNREADABLE',
		statusCode: 415,
		hint:
			options.binary === false
				? 'The file could not be read.'
				: 'This looks like a binary file. Only text files are supported.',
		cause: options.cause,
	});

export const createPermissionDeniedError = (
	path: string,
	options: { cause?: unknown; outsideRoot?: boolean } = {},
): AttachmentError =>
	createAttachmentError(path, `Access denied: ${path}`, {
		name: 'PermissionDeniedError',
		code: 'ATTACHMENT_PERMISSION_DENIED',
		statusCode: 403,
		hint: options.outsideRoot
			? 'Only files inside the project root can be attached.'
			: "You don't have permission to read this file.",
		cause: options.cause,
		metadata: { outsideRoot: options.outsideRoot === true },
	});

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isAttachmentError = (value: unknown): value is AttachmentError =>
	isParleyError(value) && value.code.startsWith('ATTACHMENT_');

export const isFileNotFoundError = (value: unknown): value is AttachmentError =>
	isParleyError(value) && value.code === 'ATTACHMENT_NOT_FOUND';

export const isFileTooLargeError = (value: unknown): value is AttachmentError =>
	isParleyError(value) && value.code === 'ATTACHMENT_TOO_LARGE';

export const isFileUnreadableError = (
	value: unknown,
): value is AttachmentError =>
	isParleyError(value) && value.code === 'ATTACHMENT_UNREADABLE';

export const isPermissionDeniedError = (
	value: unknown,
): value is AttachmentError =>
	isParleyError(value) && value.code === 'ATTACHMENT_PERMISSION_DENIED';
