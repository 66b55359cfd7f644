// ---------------------------------------------------------------------------
// Session persistence: save files and Markdown export
//
// A save file is a JSON snapshot of the ledger plus the active theme.
// Loading is lenient field-by-field: a bad field takes its default and a
// malformed turn is dropped, but a file that is not a JSON object is
// reported as corrupted.
// ---------------------------------------------------------------------------

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { findModelPreset } from '../../config/presets.js';
import { createCorruptedSaveFileError } from '../../errors/index.js';
import { getDefaultLogger, type Logger } from '../../logger.js';
import { writeJsonFile, writeTextFile } from '../../utils/json-io.js';
import type { SessionSnapshot, Turn } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SessionFile {
	/** `YYYYMMDD_HHMMSS`, local time. */
	readonly timestamp: string;
	/** Model display name. */
	readonly model: string;
	/** Persona text; empty when none. */
	readonly systemPrompt: string;
	readonly theme: string;
	readonly totalInputTokens: number;
	readonly totalOutputTokens: number;
	readonly totalCostUsd: number;
	readonly lastInputTokens: number;
	readonly conversation: readonly Turn[];
}

export interface SavedSessionSummary {
	readonly fileName: string;
	readonly path: string;
	/** `null` when the file could not be read. */
	readonly model: string | null;
	readonly exchanges: number | null;
}

export interface SaveOptions {
	readonly dir: string;
	readonly theme: string;
	readonly now?: Date;
	readonly logger?: Logger;
}

export interface ExportOptions {
	readonly dir: string;
	readonly now?: Date;
	readonly logger?: Logger;
}

export const SAVED_CHATS_DIR = 'saved_chats';

export const savedChatsDir = (dataDir: string): string =>
	join(dataDir, SAVED_CHATS_DIR);

// ---------------------------------------------------------------------------
// Timestamps
// ---------------------------------------------------------------------------

const pad = (n: number): string => String(n).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time. */
export const fileTimestamp = (date: Date): string =>
	`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
	`${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

/** `YYYY-MM-DD HH:MM` in local time. */
export const displayTimestamp = (date: Date): string =>
	`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
	`${pad(date.getHours())}:${pad(date.getMinutes())}`;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const turnSchema = z.object({
	role: z.enum(['user', 'assistant']),
	content: z.string(),
});

const count = z.number().int().nonnegative().catch(0);

const sessionFileSchema = z.object({
	timestamp: z.string().catch(''),
	model: z.string().catch(''),
	systemPrompt: z.string().catch(''),
	theme: z.string().catch(''),
	totalInputTokens: count,
	totalOutputTokens: count,
	totalCostUsd: z.number().nonnegative().catch(0),
	lastInputTokens: count,
	conversation: z
		.array(z.unknown())
		.catch([])
		.transform((items) =>
			items.flatMap((item) => {
				const turn = turnSchema.safeParse(item);
				return turn.success ? [Object.freeze(turn.data)] : [];
			}),
		),
});

/**
 * Parse the text of a save file. Throws `SESSION_CORRUPTED` when it is not
 * JSON or not an object.
 */
export function parseSessionFile(text: string, path = '<memory>'): SessionFile {
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		throw createCorruptedSaveFileError(path, { cause: error });
	}
	if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
		throw createCorruptedSaveFileError(path);
	}

	const parsed = sessionFileSchema.parse(raw);
	return Object.freeze({
		...parsed,
		conversation: Object.freeze(parsed.conversation),
	});
}

export function loadSession(path: string): SessionFile {
	let text: string;
	try {
		text = readFileSync(path, 'utf-8');
	} catch (error) {
		throw createCorruptedSaveFileError(path, { cause: error });
	}
	return parseSessionFile(text, path);
}

/**
 * Build the snapshot to restore from a save file. The model is taken
 * from the file only when its name is a known preset; the response depth
 * is never saved and stays as it is.
 */
export function snapshotFromSessionFile(
	file: SessionFile,
	current: SessionSnapshot,
): SessionSnapshot {
	const preset = findModelPreset(file.model);
	return Object.freeze({
		turns: file.conversation,
		totalInputTokens: file.totalInputTokens,
		totalOutputTokens: file.totalOutputTokens,
		totalCostUsd: file.totalCostUsd,
		lastInputTokens: file.lastInputTokens,
		model: preset
			? Object.freeze({ name: preset.name, id: preset.id })
			: current.model,
		persona: file.systemPrompt,
		depth: current.depth,
	});
}

// ---------------------------------------------------------------------------
// Save / list
// ---------------------------------------------------------------------------

/** `<stem><ext>`, or `<stem>_2<ext>`, `_3`, … when the name is taken. */
const availablePath = (dir: string, stem: string, ext: string): string => {
	let path = join(dir, `${stem}${ext}`);
	for (let n = 2; existsSync(path); n++) {
		path = join(dir, `${stem}_${n}${ext}`);
	}
	return path;
};

export function toSessionFile(
	snapshot: SessionSnapshot,
	theme: string,
	now: Date,
): SessionFile {
	return Object.freeze({
		timestamp: fileTimestamp(now),
		model: snapshot.model.name,
		systemPrompt: snapshot.persona,
		theme,
		totalInputTokens: snapshot.totalInputTokens,
		totalOutputTokens: snapshot.totalOutputTokens,
		totalCostUsd: snapshot.totalCostUsd,
		lastInputTokens: snapshot.lastInputTokens,
		conversation: snapshot.turns,
	});
}

/**
 * Write `chat_<timestamp>.json` into `dir`, never replacing an existing
 * save. Returns the path written, or `undefined` for an empty conversation.
 */
export function saveSession(
	snapshot: SessionSnapshot,
	options: SaveOptions,
): string | undefined {
	const logger = options.logger ?? getDefaultLogger().child('persistence');
	if (snapshot.turns.length === 0) return undefined;

	const file = toSessionFile(snapshot, options.theme, options.now ?? new Date());
	const path = availablePath(options.dir, `chat_${file.timestamp}`, '.json');
	writeJsonFile(path, file);
	logger.info('session saved', { path, turns: file.conversation.length });
	return path;
}

/** Saved sessions, newest first. */
export function listSavedSessions(dir: string): readonly SavedSessionSummary[] {
	if (!existsSync(dir)) return [];

	const fileNames = readdirSync(dir)
		.filter((name) => name.endsWith('.json'))
		.sort()
		.reverse();

	return Object.freeze(
		fileNames.map((fileName) => {
			const path = join(dir, fileName);
			try {
				const file = loadSession(path);
				return Object.freeze({
					fileName,
					path,
					model: file.model || 'Unknown',
					exchanges: Math.floor(file.conversation.length / 2),
				});
			} catch {
				return Object.freeze({ fileName, path, model: null, exchanges: null });
			}
		}),
	);
}

// ---------------------------------------------------------------------------
// Markdown export
// ---------------------------------------------------------------------------

export function renderTranscript(snapshot: SessionSnapshot, now: Date): string {
	const lines = [
		'# Parley Export',
		'',
		`**Model:** ${snapshot.model.name}  `,
		`**Date:** ${displayTimestamp(now)}  `,
		`**Messages:** ${Math.floor(snapshot.turns.length / 2)} exchanges  `,
		`**Cost:** $${snapshot.totalCostUsd.toFixed(4)}`,
		'',
		'---',
		'',
	];

	for (const turn of snapshot.turns) {
		lines.push(
			turn.role === 'user' ? '**You:**' : '**Assistant:**',
			'',
			turn.content,
			'',
			'---',
			'',
		);
	}

	return lines.join('\n');
}

/**
 * Write `chat_<timestamp>.md` into `dir`. Returns the path written, or
 * `undefined` for an empty conversation.
 */
export function exportTranscript(
	snapshot: SessionSnapshot,
	options: ExportOptions,
): string | undefined {
	const logger = options.logger ?? getDefaultLogger().child('persistence');
	if (snapshot.turns.length === 0) return undefined;

	const now = options.now ?? new Date();
	const path = availablePath(options.dir, `chat_${fileTimestamp(now)}`, '.md');
	writeTextFile(path, renderTranscript(snapshot, now));
	logger.info('transcript exported', { path });
	return path;
}
