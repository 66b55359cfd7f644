// ---------------------------------------------------------------------------
// Configuration: engine tunables, environment, and user preferences
// ---------------------------------------------------------------------------
//
// `defineEngineConfig` validates a plain object and returns a frozen,
// fully-resolved `EngineConfig`.  Preferences live in `config.json` and
// are parsed field-by-field: an invalid field falls back to its default
// without discarding the others.
// ---------------------------------------------------------------------------

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import {
	createConfigParseError,
	createConfigValidationError,
	createMissingCredentialError,
} from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../logger.js';
import { readJsonFile, writeJsonFile } from '../utils/json-io.js';
import {
	DEFAULT_DEPTH,
	DEFAULT_MODEL,
	findDepthPreset,
	findModelPreset,
} from './presets.js';
import { type EngineConfigInput, validateEngineConfig } from './schema.js';

export type { EngineConfigInput, ValidationIssue } from './schema.js';

// ---------------------------------------------------------------------------
// Engine config
// ---------------------------------------------------------------------------

export interface EngineConfig {
	readonly contextLimit: number;
	readonly triggerRatio: number;
	readonly targetRatio: number;
	readonly maxFileSize: number;
	readonly maxSearchResults: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
	contextLimit: 180_000,
	triggerRatio: 0.85,
	targetRatio: 0.7,
	maxFileSize: 100_000,
	maxSearchResults: 5,
});

/**
 * Resolve engine tunables, applying defaults. Throws a
 * `CONFIG_VALIDATION` error listing every out-of-range field.
 */
export function defineEngineConfig(input: EngineConfigInput = {}): EngineConfig {
	const issues = validateEngineConfig(input);
	if (issues.length > 0) {
		throw createConfigValidationError(issues);
	}
	return Object.freeze({
		contextLimit: input.contextLimit ?? DEFAULT_ENGINE_CONFIG.contextLimit,
		triggerRatio: input.triggerRatio ?? DEFAULT_ENGINE_CONFIG.triggerRatio,
		targetRatio: input.targetRatio ?? DEFAULT_ENGINE_CONFIG.targetRatio,
		maxFileSize: input.maxFileSize ?? DEFAULT_ENGINE_CONFIG.maxFileSize,
		maxSearchResults:
			input.maxSearchResults ?? DEFAULT_ENGINE_CONFIG.maxSearchResults,
	});
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export interface Environment {
	readonly apiKey: string;
	readonly logLevel: LogLevel;
	readonly dataDir: string;
}

const API_KEY_VARIABLES = ['ANTHROPIC_API_KEY', 'api_key'] as const;

/**
 * Read the credential, log level and data directory from the process
 * environment, falling back to `.env` in the project root. Variables
 * already set win over the file. A missing credential is the one fatal
 * startup error.
 */
export function loadEnvironment(
	projectRoot: string,
	env: NodeJS.ProcessEnv = process.env,
): Environment {
	const envPath = join(projectRoot, '.env');
	const fromFile: Readonly<Record<string, string>> = existsSync(envPath)
		? parseDotenv(readFileSync(envPath))
		: {};
	const lookup = (name: string): string | undefined => {
		const value = (env[name] ?? fromFile[name])?.trim();
		return value ? value : undefined;
	};

	const apiKey = API_KEY_VARIABLES.map(lookup).find(
		(value): value is string => value !== undefined,
	);
	if (!apiKey) {
		throw createMissingCredentialError(API_KEY_VARIABLES[0]);
	}

	const rawLevel = lookup('PARLEY_LOG_LEVEL')?.toLowerCase();
	const logLevel: LogLevel =
		rawLevel !== undefined && isLogLevel(rawLevel) ? rawLevel : 'warn';

	const home = lookup('PARLEY_HOME');
	const dataDir = home ? resolve(projectRoot, home) : projectRoot;

	return Object.freeze({ apiKey, logLevel, dataDir });
}

// ---------------------------------------------------------------------------
// Preferences
// ---------------------------------------------------------------------------

export interface Preferences {
	/** Model display name. */
	readonly model: string;
	/** Response-depth preset name. */
	readonly brain: string;
	readonly theme: string;
}

export const DEFAULT_THEME = 'ocean';

export const DEFAULT_PREFERENCES: Preferences = Object.freeze({
	model: DEFAULT_MODEL.name,
	brain: DEFAULT_DEPTH.name,
	theme: DEFAULT_THEME,
});

const preferencesSchema = z.object({
	model: z
		.string()
		.refine((name) => findModelPreset(name) !== undefined)
		.catch(DEFAULT_PREFERENCES.model),
	brain: z
		.string()
		.refine((name) => findDepthPreset(name) !== undefined)
		.catch(DEFAULT_PREFERENCES.brain),
	theme: z.string().min(1).catch(DEFAULT_PREFERENCES.theme),
});

export const preferencesPath = (dataDir: string): string =>
	join(dataDir, 'config.json');

/**
 * Parse raw preferences. Missing or invalid fields take their defaults;
 * a non-object yields the defaults outright.
 */
export function parsePreferences(raw: unknown): Preferences {
	if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
		return DEFAULT_PREFERENCES;
	}
	return Object.freeze(preferencesSchema.parse(raw));
}

/**
 * Missing file: defaults. A file that is not valid JSON throws
 * `CONFIG_PARSE` so it is not silently overwritten.
 */
export function loadPreferences(path: string): Preferences {
	let raw: unknown;
	try {
		raw = readJsonFile(path);
	} catch (error) {
		throw createConfigParseError(path, { cause: error });
	}
	return parsePreferences(raw);
}

export function savePreferences(path: string, prefs: Preferences): void {
	writeJsonFile(path, {
		model: prefs.model,
		brain: prefs.brain,
		theme: prefs.theme,
	});
}
