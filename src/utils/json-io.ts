/**
 * Safe JSON I/O
 *
 * Read/write JSON and text files, creating parent directories on write.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Read and parse a JSON file. Returns undefined if the file doesn't exist
 * and throws the parser's error for invalid JSON; callers validate the shape.
 */
export function readJsonFile(path: string): unknown {
	if (!existsSync(path)) return undefined;
	return JSON.parse(readFileSync(path, 'utf-8'));
}

/**
 * Write a value as pretty-printed JSON. Creates parent directories if needed.
 */
export function writeJsonFile(path: string, data: unknown): void {
	writeTextFile(path, `${JSON.stringify(data, null, 2)}\n`);
}

export function writeTextFile(path: string, text: string): void {
	mkdirSync(dirname(path), { recursive: true });
	writeFileSync(path, text, 'utf-8');
}
