/**
 * Parley: Tab Completion
 *
 * Completes command names at the start of the line and project-relative
 * paths after `@file `.
 */

import { type Dirent, existsSync, readdirSync, statSync } from 'node:fs';
import { basename, dirname, relative, resolve } from 'node:path';

export interface CompleterOptions {
	readonly commandNames: () => readonly string[];
	readonly projectRoot: string;
}

export type CompleterResult = [string[], string];

const EXCLUDED_DIRS = new Set(['node_modules', '.git', 'dist', 'coverage']);

const FILE_REFERENCE_TAIL = /@file\s+(\S*)$/;

/**
 * Matching entries for a partial path, relative to `root` with `/`
 * separators; directories end in `/`.
 */
export function completeFilePath(partial: string, root: string): string[] {
	const partialPath = resolve(root, partial);
	let searchDir: string;
	let prefix: string;

	if (
		partial === '' ||
		(partial.endsWith('/') &&
			existsSync(partialPath) &&
			statSync(partialPath).isDirectory())
	) {
		searchDir = partialPath;
		prefix = '';
	} else {
		searchDir = dirname(partialPath);
		prefix = basename(partialPath).toLowerCase();
	}

	if (!existsSync(searchDir)) return [];

	let entries: Dirent[];
	try {
		entries = readdirSync(searchDir, { withFileTypes: true });
	} catch {
		return [];
	}

	return entries
		.filter(
			(entry) =>
				!EXCLUDED_DIRS.has(entry.name) &&
				!entry.name.startsWith('.') &&
				entry.name.toLowerCase().startsWith(prefix),
		)
		.map((entry) => {
			const rel = relative(root, resolve(searchDir, entry.name)).replace(
				/\\/g,
				'/',
			);
			return entry.isDirectory() ? `${rel}/` : rel;
		})
		.sort();
}

export function createCompleter(
	options: CompleterOptions,
): (line: string) => CompleterResult {
	return (line: string): CompleterResult => {
		const fileMatch = FILE_REFERENCE_TAIL.exec(line);
		if (fileMatch) {
			const partial = fileMatch[1];
			return [completeFilePath(partial, options.projectRoot), partial];
		}

		if (line.includes(' ')) return [[], line];

		const lower = line.toLowerCase();
		const hits = options
			.commandNames()
			.filter((name) => name.startsWith(lower));
		return [hits, line];
	};
}
