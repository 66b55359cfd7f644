// ---------------------------------------------------------------------------
// File Attachment Resolver
//
// Detects `@file <path>` references in raw input and loads each file as a
// labelled context block.  Paths are confined to the project root; every
// file is resolved independently so one failure never aborts the batch.
// ---------------------------------------------------------------------------

import { readFileSync, realpathSync, statSync } from 'node:fs';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import {
	type AttachmentError,
	createFileNotFoundError,
	createFileTooLargeError,
	createFileUnreadableError,
	createPermissionDeniedError,
} from '../../errors/index.js';
import { getDefaultLogger, type Logger } from '../../logger.js';
import { CONTEXT_SEPARATOR } from '../session/augmentation.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FileReferences {
	/** Paths in the order they appear. */
	readonly paths: readonly string[];
	/** Input with every `@file <path>` token removed, trimmed. */
	readonly cleanMessage: string;
}

export interface FileAttachment {
	/** The path as the user wrote it. */
	readonly path: string;
	readonly absolutePath: string;
	readonly content: string;
	readonly size: number;
	readonly lineCount: number;
}

export type AttachmentResult =
	| { readonly ok: true; readonly attachment: FileAttachment }
	| { readonly ok: false; readonly error: AttachmentError };

export interface AttachmentOptions {
	readonly projectRoot: string;
	/** Byte ceiling per file. Default: 100 000 */
	readonly maxFileSize?: number;
	readonly logger?: Logger;
}

export interface AttachmentBatch {
	/** Joined context blocks, or `null` when no file loaded. */
	readonly context: string | null;
	readonly attachments: readonly FileAttachment[];
	readonly failures: readonly AttachmentError[];
}

export const DEFAULT_MAX_FILE_SIZE = 100_000;

// ---------------------------------------------------------------------------
// Reference extraction
// ---------------------------------------------------------------------------

const REFERENCE_PATTERN = /@file\s+(\S+)/g;
const REFERENCE_TOKEN_PATTERN = /@file\s+\S+\s*/g;

export function extractFileReferences(input: string): FileReferences {
	const paths = [...input.matchAll(REFERENCE_PATTERN)].map((m) => m[1]);
	return Object.freeze({
		paths: Object.freeze(paths),
		cleanMessage: input.replace(REFERENCE_TOKEN_PATTERN, '').trim(),
	});
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

const errnoCode = (error: unknown): string | undefined =>
	typeof error === 'object' &&
	error !== null &&
	'code' in error &&
	typeof error.code === 'string'
		? error.code
		: undefined;

const isAccessDenied = (error: unknown): boolean => {
	const code = errnoCode(error);
	return code === 'EACCES' || code === 'EPERM';
};

const isInside = (root: string, target: string): boolean => {
	const rel = relative(root, target);
	return !(rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel));
};

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Decoded text, or `undefined` for content that is not UTF-8 text. */
const decodeText = (bytes: Uint8Array): string | undefined => {
	if (bytes.includes(0)) return undefined;
	try {
		return utf8.decode(bytes);
	} catch {
		return undefined;
	}
};

export const countLines = (content: string): number =>
	content.split('\n').length;

const failed = (error: AttachmentError): AttachmentResult =>
	Object.freeze({ ok: false as const, error });

/**
 * Load one referenced file. Relative paths resolve against the project
 * root; anything resolving outside it is refused.
 */
export function readAttachment(
	path: string,
	options: AttachmentOptions,
): AttachmentResult {
	const root = resolve(options.projectRoot);
	const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
	const absolutePath = resolve(root, path);

	if (!isInside(root, absolutePath)) {
		return failed(createPermissionDeniedError(path, { outsideRoot: true }));
	}

	let size: number;
	try {
		const stat = statSync(absolutePath);
		if (!stat.isFile()) return failed(createFileNotFoundError(path));
		size = stat.size;
	} catch (error) {
		return failed(
			isAccessDenied(error)
				? createPermissionDeniedError(path, { cause: error })
				: createFileNotFoundError(path, { cause: error }),
		);
	}

	// Symlinks inside the root may still point outside it.
	if (!isInside(realpathSync(root), realpathSync(absolutePath))) {
		return failed(createPermissionDeniedError(path, { outsideRoot: true }));
	}

	if (size > maxFileSize) {
		return failed(createFileTooLargeError(path, size, maxFileSize));
	}

	let bytes: Uint8Array;
	try {
		bytes = readFileSync(absolutePath);
	} catch (error) {
		return failed(
			isAccessDenied(error)
				? createPermissionDeniedError(path, { cause: error })
				: createFileUnreadableError(path, { cause: error, binary: false }),
		);
	}

	const content = decodeText(bytes);
	if (content === undefined) {
		return failed(createFileUnreadableError(path, { binary: true }));
	}

	return Object.freeze({
		ok: true as const,
		attachment: Object.freeze({
			path,
			absolutePath,
			content,
			size,
			lineCount: countLines(content),
		}),
	});
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

export const formatAttachment = (attachment: FileAttachment): string =>
	`[File: ${attachment.path} (${attachment.lineCount} lines)]\n\n${attachment.content}`;

export function resolveFileAttachments(
	paths: readonly string[],
	options: AttachmentOptions,
): AttachmentBatch {
	const logger = options.logger ?? getDefaultLogger().child('files');
	const attachments: FileAttachment[] = [];
	const failures: AttachmentError[] = [];

	for (const path of paths) {
		const result = readAttachment(path, options);
		if (result.ok) {
			attachments.push(result.attachment);
			logger.debug('attached file', {
				path,
				lines: result.attachment.lineCount,
			});
		} else {
			failures.push(result.error);
			logger.info('attachment failed', { path, code: result.error.code });
		}
	}

	return Object.freeze({
		context:
			attachments.length > 0
				? attachments.map(formatAttachment).join(CONTEXT_SEPARATOR)
				: null,
		attachments: Object.freeze(attachments),
		failures: Object.freeze(failures),
	});
}
