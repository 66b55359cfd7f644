/**
 * Parley: Shell Commands
 *
 * Pickers for model, depth, persona and theme; search; and the session
 * commands (clear, save, load, export, help, quit).
 */

import { basename } from 'node:path';
import {
	exportTranscript,
	listSavedSessions,
	loadSession,
	saveSession,
	type SessionFile,
	savedChatsDir,
	snapshotFromSessionFile,
} from '../src/ai/session/index.js';
import {
	DEPTH_PRESETS,
	MODEL_PRESETS,
	PERSONA_PRESETS,
} from '../src/config/presets.js';
import { isCorruptedSaveFileError } from '../src/errors/index.js';
import type { CommandDefinition } from './command-registry.js';
import { showPicker } from './picker.js';
import type { ShellContext } from './shell.js';
import { getTheme, THEMES } from './themes.js';
import {
	type HelpEntry,
	renderError,
	renderHelp,
	renderInfo,
	renderSuccess,
	renderTable,
	renderWarning,
	truncate,
} from './ui.js';

const PERSONA_DETAIL_LENGTH = 50;

/** Help lines for input forms that are not commands. */
const INPUT_FORMS: readonly HelpEntry[] = [
	{ usage: '@file <path>', description: 'attach a file to your message' },
	{ usage: '"""', description: 'multi-line input mode' },
];

export function createShellCommands(
	ctx: ShellContext,
): readonly CommandDefinition[] {
	const { io, ledger } = ctx;
	const errorLine = (message: string): string =>
		`  ${ctx.colors.error(message)}`;

	// -- Pickers --------------------------------------------------------------

	const switchModel = async (): Promise<undefined> => {
		const idx = await showPicker(
			MODEL_PRESETS.map((m) => ({
				label: m.name,
				detail: m.description,
				current: m.name === ledger.model.name,
			})),
			io,
			{ title: 'Pick a Model', colors: ctx.colors },
		);
		if (idx < 0) {
			io.print(renderInfo('Cancelled, keeping current model.', ctx.colors));
			return undefined;
		}
		const preset = MODEL_PRESETS[idx];
		ledger.setModel({ name: preset.name, id: preset.id });
		io.print(renderSuccess(`Model set to: ${preset.name}`, ctx.colors));
		ctx.persistPreferences();
		return undefined;
	};

	const pickDepth = async (): Promise<undefined> => {
		const idx = await showPicker(
			DEPTH_PRESETS.map((d) => ({
				label: d.name,
				detail: `${d.maxTokens} tokens: ${d.bestFor}`,
				current: d.name === ledger.depth.name,
			})),
			io,
			{ title: 'Pick Response Depth', detailHeader: 'Best for', colors: ctx.colors },
		);
		if (idx < 0) {
			io.print(renderInfo('Cancelled.', ctx.colors));
			return undefined;
		}
		const preset = DEPTH_PRESETS[idx];
		ledger.setDepth({ name: preset.name, maxTokens: preset.maxTokens });
		io.print(
			renderSuccess(
				`Response depth: ${preset.name} (${preset.maxTokens} tokens)`,
				ctx.colors,
			),
		);
		ctx.persistPreferences();
		return undefined;
	};

	const pickPersona = async (): Promise<undefined> => {
		const idx = await showPicker(
			PERSONA_PRESETS.map((p) => ({
				label: p.name,
				detail:
					p.prompt === null
						? 'Write your own instructions'
						: p.prompt
							? truncate(p.prompt, PERSONA_DETAIL_LENGTH)
							: 'Default assistant, no special instructions',
				current: p.prompt === ledger.persona,
			})),
			io,
			{ title: 'Pick a Persona', colors: ctx.colors },
		);
		if (idx < 0) {
			io.print(renderInfo('Cancelled, keeping current persona.', ctx.colors));
			return undefined;
		}

		const preset = PERSONA_PRESETS[idx];
		if (preset.prompt === null) {
			const custom = (await io.ask('Enter your custom persona > ')).trim();
			if (!custom) {
				io.print(
					renderInfo('Cancelled, keeping current persona.', ctx.colors),
				);
				return undefined;
			}
			ledger.setPersona(custom);
			io.print(renderSuccess(`Persona set to: ${custom}`, ctx.colors));
		} else if (preset.prompt) {
			ledger.setPersona(preset.prompt);
			io.print(renderSuccess(`Persona set to: ${preset.name}`, ctx.colors));
		} else {
			ledger.setPersona('');
			io.print(`  ${ctx.colors.strong('warning', '-> Persona reset to default')}`);
		}
		return undefined;
	};

	const pickTheme = async (): Promise<undefined> => {
		const idx = await showPicker(
			THEMES.map((t) => ({
				label: t.name,
				detail: t.description,
				current: t.key === ctx.theme.key,
			})),
			io,
			{ title: 'Pick a Theme', detailHeader: 'Style', colors: ctx.colors },
		);
		if (idx < 0) {
			io.print(renderInfo('Cancelled.', ctx.colors));
			return undefined;
		}
		ctx.setTheme(THEMES[idx]);
		io.print(renderSuccess(`Theme set to: ${THEMES[idx].name}`, ctx.colors));
		ctx.persistPreferences();
		return undefined;
	};

	// -- Conversation ---------------------------------------------------------

	const search = async (): Promise<undefined> => {
		const query = (await io.ask('Search > ')).trim();
		if (query) await ctx.sendWithSearch(`search for ${query}`);
		return undefined;
	};

	const clear = async (): Promise<undefined> => {
		const removed = ledger.clear();
		io.print(
			`${renderSuccess('Conversation cleared!', ctx.colors)} ${ctx.colors.dim(`(${removed} exchanges removed)`)}`,
		);
		return undefined;
	};

	// -- Persistence ----------------------------------------------------------

	const save = async (): Promise<undefined> => {
		const path = saveSession(ledger.snapshot(), {
			dir: savedChatsDir(ctx.dataDir),
			theme: ctx.theme.key,
			now: ctx.now(),
			logger: ctx.logger,
		});
		io.print(
			path
				? renderSuccess(`Saved to: ${basename(path)}`, ctx.colors)
				: renderWarning('Nothing to save - conversation is empty.', ctx.colors),
		);
		return undefined;
	};

	const load = async (): Promise<undefined> => {
		const saved = listSavedSessions(savedChatsDir(ctx.dataDir));
		if (saved.length === 0) {
			io.print(renderWarning('No saved conversations found.', ctx.colors));
			return undefined;
		}

		io.print();
		io.print(
			renderTable(
				[
					{ header: '#', style: ctx.colors.bold },
					{ header: 'File', style: ctx.colors.bold },
					{ header: 'Model', style: ctx.colors.dim },
					{ header: 'Messages', style: ctx.colors.dim },
				],
				saved.map((s, i) => [
					String(i + 1),
					s.fileName,
					s.model ?? '?',
					s.exchanges === null ? '?' : String(s.exchanges),
				]),
				{ title: 'Saved Conversations', colors: ctx.colors, headerRole: 'success' },
			),
		);

		const answer = (await io.ask('Enter number (or empty to cancel) > ')).trim();
		if (!answer) {
			io.print(renderInfo('Load cancelled.', ctx.colors));
			return undefined;
		}
		const num = Number(answer);
		if (!Number.isInteger(num)) {
			io.print(errorLine('Please enter a number.'));
			return undefined;
		}
		const entry = saved[num - 1];
		if (num < 1 || entry === undefined) {
			io.print(errorLine('Invalid number.'));
			return undefined;
		}

		let file: SessionFile;
		try {
			file = loadSession(entry.path);
		} catch (error) {
			if (!isCorruptedSaveFileError(error)) throw error;
			io.print(
				renderError(error.message, 'The file is not a valid save file.', ctx.colors),
			);
			return undefined;
		}

		ledger.restore(snapshotFromSessionFile(file, ledger.snapshot()));
		const savedTheme = getTheme(file.theme);
		if (savedTheme) ctx.setTheme(savedTheme);

		io.print(
			`${renderSuccess(`Loaded ${entry.fileName}`, ctx.colors)} ${ctx.colors.dim(`(${ledger.exchangeCount} exchanges restored)`)}`,
		);
		return undefined;
	};

	const exportChat = async (): Promise<undefined> => {
		const path = exportTranscript(ledger.snapshot(), {
			dir: savedChatsDir(ctx.dataDir),
			now: ctx.now(),
			logger: ctx.logger,
		});
		io.print(
			path
				? renderSuccess(`Exported to: ${basename(path)}`, ctx.colors)
				: renderWarning('Nothing to export - conversation is empty.', ctx.colors),
		);
		return undefined;
	};

	// -- Meta -----------------------------------------------------------------

	const help = async (): Promise<undefined> => {
		const entries: HelpEntry[] = ctx.registry.getAll().map((c) => ({
			usage: c.usage ?? c.name,
			description: c.description,
		}));
		io.print(renderHelp([...entries, ...INPUT_FORMS], ctx.colors));
		return undefined;
	};

	const quit = async (): Promise<{ quit: true }> => {
		io.print(ctx.sessionSummary());
		return { quit: true };
	};

	return [
		{ name: 'switch_model', description: 'change the AI model', execute: switchModel },
		{ name: 'brain', description: 'change response depth', execute: pickDepth },
		{ name: 'persona', description: "set the assistant's personality", execute: pickPersona },
		{ name: 'theme', description: 'change color theme', execute: pickTheme },
		{ name: 'search', description: 'search the web and ask about it', execute: search },
		{ name: 'clear', description: 'start a fresh conversation', execute: clear },
		{ name: 'save', description: 'save conversation to file', execute: save },
		{ name: 'load', description: 'load a saved conversation', execute: load },
		{ name: 'export', description: 'export chat as markdown', execute: exportChat },
		{ name: 'help', description: 'show this help', execute: help },
		{
			name: 'quit',
			aliases: ['exit', 'q'],
			usage: 'quit/exit/q',
			description: 'exit the chat',
			execute: quit,
		},
	];
}
