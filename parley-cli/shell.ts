/**
 * Parley: Shell
 *
 * Owns the interactive session around the engine: the active theme, the
 * send paths (plain, with attachments, with web search) and the input
 * dispatcher. Dispatch order is command, then `@file` references, then
 * search intent, then a plain send.
 */

import {
	extractFileReferences,
	resolveFileAttachments,
} from '../src/ai/files/index.js';
import {
	extractQuery,
	hasSearchIntent,
	type SearchResolver,
} from '../src/ai/search/index.js';
import {
	composeMessage,
	composeSearchMessage,
	type ExchangeDriver,
	type SessionLedger,
} from '../src/ai/session/index.js';
import {
	type EngineConfig,
	type Preferences,
	preferencesPath,
	savePreferences,
} from '../src/config/settings.js';
import { getDefaultLogger, type Logger } from '../src/logger.js';
import {
	type CommandRegistry,
	createCommandRegistry,
} from './command-registry.js';
import { createShellCommands } from './commands.js';
import type { ShellIO } from './io.js';
import { resolveTheme, type ThemeDefinition } from './themes.js';
import {
	createColors,
	renderAssistantHeader,
	renderError,
	renderSearchResults,
	renderSessionSummary,
	renderStatusLine,
	renderUsage,
	renderWarning,
	type TermColors,
} from './ui.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ShellOptions {
	readonly io: ShellIO;
	readonly ledger: SessionLedger;
	readonly driver: ExchangeDriver;
	readonly search: SearchResolver;
	readonly projectRoot: string;
	readonly dataDir: string;
	readonly engine: EngineConfig;
	/** Initial theme key; unknown keys fall back to the default theme. */
	readonly theme: string;
	readonly colorEnabled?: boolean;
	readonly now?: () => Date;
	readonly logger?: Logger;
	/** Called after a picker changes model, depth or theme. Default: write config.json. */
	readonly onPreferencesChange?: (prefs: Preferences) => void;
	/** Receives replies the ledger flagged to be spoken aloud. */
	readonly onSpokenReply?: (text: string) => void;
}

export interface ShellContext {
	readonly io: ShellIO;
	readonly ledger: SessionLedger;
	readonly projectRoot: string;
	readonly dataDir: string;
	readonly engine: EngineConfig;
	readonly logger: Logger;
	readonly now: () => Date;
	readonly registry: CommandRegistry;
	readonly colors: TermColors;
	readonly theme: ThemeDefinition;
	readonly setTheme: (theme: ThemeDefinition) => void;
	readonly persistPreferences: () => void;
	readonly send: (storedMessage: string, requestMessage?: string) => Promise<void>;
	readonly sendWithSearch: (message: string) => Promise<void>;
	readonly sessionSummary: () => string;
}

export type ShellTurn = 'continue' | 'quit';

export interface Shell {
	readonly handle: (input: string) => Promise<ShellTurn>;
	readonly context: ShellContext;
	readonly statusLine: () => string;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createShell(options: ShellOptions): Shell {
	const { io, ledger, driver, search, projectRoot, dataDir, engine } = options;
	const logger = options.logger ?? getDefaultLogger().child('shell');
	const now = options.now ?? (() => new Date());
	const registry = createCommandRegistry();

	let theme = resolveTheme(options.theme);
	let colors = createColors(theme, { enabled: options.colorEnabled });

	const setTheme = (next: ThemeDefinition): void => {
		theme = next;
		colors = createColors(next, { enabled: options.colorEnabled });
	};

	const persistPreferences = (): void => {
		const prefs: Preferences = {
			model: ledger.model.name,
			brain: ledger.depth.name,
			theme: theme.key,
		};
		if (options.onPreferencesChange) {
			options.onPreferencesChange(prefs);
		} else {
			savePreferences(preferencesPath(dataDir), prefs);
		}
	};

	// -- Send paths -----------------------------------------------------------

	const send = async (
		storedMessage: string,
		requestMessage?: string,
	): Promise<void> => {
		let streaming = false;
		const override =
			requestMessage !== undefined && requestMessage !== storedMessage
				? requestMessage
				: undefined;

		const outcome = await driver.send(storedMessage, override, {
			onNotice: (message) => io.print(renderWarning(message, colors)),
			onFragment: (text) => {
				if (!streaming) {
					streaming = true;
					io.write(renderAssistantHeader(colors));
				}
				io.write(text);
			},
		});
		if (streaming) io.print();

		if (!outcome.ok) {
			io.print(renderError(outcome.error.title, outcome.error.hint, colors));
			return;
		}

		io.print(
			renderUsage(ledger.model.name, outcome.usage, outcome.session, colors),
		);
		if (outcome.speakReply) {
			if (options.onSpokenReply) {
				options.onSpokenReply(outcome.response);
			} else {
				logger.debug('spoken reply requested without a voice handler');
			}
		}
	};

	const sendWithSearch = async (message: string): Promise<void> => {
		const query = extractQuery(message);
		io.print(
			`  ${colors.accent('Searching the web for:')} ${colors.bold(query)}`,
		);

		const resolution = await search.resolve(query);
		if (resolution.ok) {
			io.print(renderSearchResults(resolution.results, colors));
		} else if (resolution.error.metadata.reason === 'no-results') {
			io.print(renderWarning('No results found.', colors));
		} else {
			io.print(
				renderError('Search failed', resolution.error.message, colors),
			);
		}

		const composed = composeSearchMessage(
			message,
			query,
			resolution.ok ? resolution.context : null,
		);
		await send(composed.storedMessage, composed.requestMessage);
	};

	/** Returns false when the input carries no `@file` reference. */
	const sendWithFiles = async (input: string): Promise<boolean> => {
		const { paths, cleanMessage } = extractFileReferences(input);
		if (paths.length === 0) return false;

		const batch = resolveFileAttachments(paths, {
			projectRoot,
			maxFileSize: engine.maxFileSize,
			logger,
		});
		for (const attachment of batch.attachments) {
			io.print(
				`  ${colors.accent('Loaded:')} ${colors.bold(attachment.path)} ${colors.dim(`(${attachment.lineCount} lines)`)}`,
			);
		}
		for (const failure of batch.failures) {
			io.print(renderError(failure.message, failure.hint, colors));
		}

		if (batch.context !== null) {
			const composed = composeMessage(cleanMessage, batch.context);
			await send(composed.storedMessage, composed.requestMessage);
		} else if (cleanMessage) {
			await send(cleanMessage);
		} else {
			io.print(
				renderWarning('No files loaded and no message to send.', colors),
			);
		}
		return true;
	};

	// -- Status and summary ---------------------------------------------------

	const statusLine = (): string =>
		renderStatusLine(
			{
				model: ledger.model.name,
				depthName: ledger.depth.name,
				maxTokens: ledger.depth.maxTokens,
				persona: ledger.persona,
				themeName: theme.name,
			},
			colors,
		);

	const sessionSummary = (): string =>
		renderSessionSummary(
			{
				exchanges: ledger.exchangeCount,
				model: ledger.model.name,
				themeName: theme.name,
				totalInputTokens: ledger.totalInputTokens,
				totalOutputTokens: ledger.totalOutputTokens,
				totalCostUsd: ledger.totalCostUsd,
			},
			colors,
		);

	// -- Context and commands -------------------------------------------------

	const context: ShellContext = Object.freeze({
		io,
		ledger,
		projectRoot,
		dataDir,
		engine,
		logger,
		now,
		registry,
		get colors() {
			return colors;
		},
		get theme() {
			return theme;
		},
		setTheme,
		persistPreferences,
		send,
		sendWithSearch,
		sessionSummary,
	});

	registry.registerAll(createShellCommands(context));

	// -- Dispatcher -----------------------------------------------------------

	const handle = async (input: string): Promise<ShellTurn> => {
		if (input.trim() === '') return 'continue';

		const command = registry.get(input);
		if (command) {
			const result = await command.execute();
			if (result?.quit) return 'quit';
		} else if (!(await sendWithFiles(input))) {
			if (hasSearchIntent(input)) {
				await sendWithSearch(input);
			} else {
				await send(input);
			}
		}

		io.print(statusLine());
		return 'continue';
	};

	return Object.freeze({ handle, context, statusLine });
}
