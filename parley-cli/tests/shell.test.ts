import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import {
	createSearchResolver,
	type SearchResult,
} from '../../src/ai/search/index.js';
import {
	createContextBudgetMonitor,
	createExchangeDriver,
	createSessionLedger,
} from '../../src/ai/session/index.js';
import {
	DEFAULT_ENGINE_CONFIG,
	type Preferences,
} from '../../src/config/settings.js';
import {
	createFakeChatClient,
	createFakeSearchProvider,
	createTempDir,
	createTestLogger,
	httpError,
	removeTempDir,
	type ScriptedReply,
} from '../../tests/utils/fakes.js';
import { createShell } from '../shell.js';
import { createScriptedIO } from './scripted-io.js';

// ---------------------------------------------------------------------------
// Harness
// ---------------------------------------------------------------------------

const JAN_5 = new Date(2024, 0, 5, 9, 3, 7);

const REPLY: ScriptedReply = {
	fragments: ['Hi', ' there'],
	usage: { inputTokens: 1234, outputTokens: 56 },
};

const STATUS_LINE =
	'  Model: Sonnet  |  Brain: Standard (1024 tokens)  |  Persona: None  |  Theme: Ocean';

const dirs: string[] = [];

afterEach(() => {
	for (const dir of dirs.splice(0)) removeTempDir(dir);
});

interface HarnessOptions {
	readonly replies?: readonly ScriptedReply[];
	readonly answers?: readonly string[];
	readonly search?: readonly SearchResult[] | Error;
	readonly persistPreferences?: boolean;
	readonly onSpokenReply?: (text: string) => void;
}

const setup = (options: HarnessOptions = {}) => {
	const root = createTempDir();
	dirs.push(root);
	const { logger } = createTestLogger();
	const io = createScriptedIO(options.answers);
	const ledger = createSessionLedger({
		model: { name: 'Sonnet', id: 'claude-sonnet-4-20250514' },
		depth: { name: 'Standard', maxTokens: 1024 },
	});
	const client = createFakeChatClient(options.replies ?? []);
	const provider = createFakeSearchProvider(options.search ?? []);
	const prefs: Preferences[] = [];

	const shell = createShell({
		io,
		ledger,
		driver: createExchangeDriver({
			ledger,
			client,
			budget: createContextBudgetMonitor({ contextLimit: 180_000, logger }),
			logger,
		}),
		search: createSearchResolver({ provider, logger }),
		projectRoot: root,
		dataDir: root,
		engine: DEFAULT_ENGINE_CONFIG,
		theme: 'ocean',
		colorEnabled: false,
		now: () => JAN_5,
		logger,
		onPreferencesChange: options.persistPreferences
			? undefined
			: (p) => prefs.push(p),
		onSpokenReply: options.onSpokenReply,
	});

	const lastRequest = () => client.requests[client.requests.length - 1];

	return { root, io, ledger, client, provider, prefs, shell, lastRequest };
};

// ===========================================================================
// Dispatch
// ===========================================================================

describe('shell dispatch', () => {
	it('should ignore blank input', async () => {
		const { io, shell } = setup();

		expect(await shell.handle('   ')).toBe('continue');
		expect(io.output).toBe('');
	});

	it('should stream a plain message and print usage and status', async () => {
		const { io, ledger, shell, lastRequest } = setup({ replies: [REPLY] });

		expect(await shell.handle('hello')).toBe('continue');

		expect(lastRequest().messages).toEqual([{ role: 'user', content: 'hello' }]);
		expect(io.output.startsWith('\n  Assistant\nHi there\n')).toBe(true);
		expect(io.lines).toContain('  This msg  1,234      56  $0.0045');
		expect(io.lines.at(-2)).toBe(STATUS_LINE);
		expect(ledger.exchangeCount).toBe(1);
	});

	it('should print the classified error and keep the ledger clean', async () => {
		const { io, ledger, shell } = setup({
			replies: [{ error: httpError(401, 'invalid x-api-key') }],
		});

		await shell.handle('hello');

		expect(io.lines.slice(0, 2)).toEqual([
			'  ✖ Invalid API key',
			'    Check your .env file: the key may be expired or incorrect.',
		]);
		expect(ledger.turnCount).toBe(0);
	});

	it('should run commands case-insensitively and stop on quit', async () => {
		const { io, shell } = setup();

		expect(await shell.handle('QUIT')).toBe('quit');
		expect(io.output).toBe('  Goodbye!\n');
	});

	it('should hand a flagged reply to the voice handler', async () => {
		const spoken: string[] = [];
		const { ledger, shell } = setup({
			replies: [REPLY],
			onSpokenReply: (text) => spoken.push(text),
		});
		ledger.requestSpokenReply();

		await shell.handle('read this out');

		expect(spoken).toEqual(['Hi there']);
	});
});

// ===========================================================================
// Web search
// ===========================================================================

describe('shell web search', () => {
	const CATS: readonly SearchResult[] = [
		{ title: 'Cats', url: 'https://www.cats.test/a', snippet: 'meow' },
	];

	it('should search on intent and send the results with the question', async () => {
		const { io, ledger, provider, shell, lastRequest } = setup({
			replies: [REPLY],
			search: CATS,
		});

		await shell.handle('search for cats');

		expect(provider.calls).toEqual([{ query: 'cats', maxResults: 5 }]);
		expect(io.lines).toContain('  Searching the web for: cats');
		expect(io.lines).toContain('  1  Cats   cats.test');
		expect(lastRequest().messages[0].content).toBe(
			'search for cats\n\n[Web search results for: cats]\n\n' +
				'Title: Cats\nURL: https://www.cats.test/a\nSnippet: meow\n\n' +
				'Use the above web search results to help answer my question. ' +
				'Cite sources when relevant.',
		);
		expect(ledger.turns[0].content).toBe('search for cats');
	});

	it('should send the plain message when nothing is found', async () => {
		const { io, shell, lastRequest } = setup({ replies: [REPLY], search: [] });

		await shell.handle('look up zzzz');

		expect(io.lines).toContain('  No results found.');
		expect(lastRequest().messages[0].content).toBe('look up zzzz');
	});

	it('should report a provider failure and still send', async () => {
		const { io, shell, lastRequest } = setup({
			replies: [REPLY],
			search: new Error('offline'),
		});

		await shell.handle('google cats');

		expect(io.lines).toContain('  ✖ Search failed');
		expect(io.lines).toContain('    Search failed for: cats');
		expect(lastRequest().messages[0].content).toBe('google cats');
	});

	it('should prompt for a query with the search command', async () => {
		const { provider, shell } = setup({
			replies: [REPLY],
			search: CATS,
			answers: ['rust editions'],
		});

		await shell.handle('search');

		expect(provider.calls[0].query).toBe('rust editions');
	});
});

// ===========================================================================
// File attachments
// ===========================================================================

describe('shell file attachments', () => {
	it('should send file contents but store only the message', async () => {
		const { root, io, ledger, shell, lastRequest } = setup({ replies: [REPLY] });
		writeFileSync(join(root, 'a.txt'), 'alpha');

		await shell.handle('@file a.txt explain');

		expect(io.lines[0]).toBe('  Loaded: a.txt (1 lines)');
		expect(lastRequest().messages[0].content).toBe(
			'[File: a.txt (1 lines)]\n\nalpha\n\n---\n\nexplain',
		);
		expect(ledger.turns[0].content).toBe('explain');
	});

	it('should store a placeholder when only a file is given', async () => {
		const { root, ledger, shell } = setup({ replies: [REPLY] });
		writeFileSync(join(root, 'a.txt'), 'alpha');

		await shell.handle('@file a.txt');

		expect(ledger.turns[0].content).toBe('Explain this code.');
	});

	it('should send the message plainly when no file loads', async () => {
		const { io, shell, lastRequest } = setup({ replies: [REPLY] });

		await shell.handle('@file nope.txt hello');

		expect(io.lines.slice(0, 2)).toEqual([
			'  ✖ File not found: nope.txt',
			'    Paths are relative to the project root. Example: @file src/lib.ts',
		]);
		expect(lastRequest().messages[0].content).toBe('hello');
	});

	it('should warn when there is nothing to send', async () => {
		const { io, client, shell } = setup();

		await shell.handle('@file nope.txt');

		expect(io.lines).toContain('  No files loaded and no message to send.');
		expect(client.requests).toHaveLength(0);
	});
});

// ===========================================================================
// Pickers
// ===========================================================================

describe('shell pickers', () => {
	it('should switch model and persist preferences', async () => {
		const { io, ledger, prefs, shell } = setup({ answers: ['3'] });

		await shell.handle('switch_model');

		expect(ledger.model).toEqual({
			name: 'Haiku',
			id: 'claude-haiku-4-5-20251001',
		});
		expect(io.lines).toContain('  -> Model set to: Haiku');
		expect(prefs).toEqual([{ model: 'Haiku', brain: 'Standard', theme: 'ocean' }]);
	});

	it('should keep the model when the picker is cancelled', async () => {
		const { io, ledger, prefs, shell } = setup({ answers: [''] });

		await shell.handle('switch_model');

		expect(ledger.model.name).toBe('Sonnet');
		expect(io.lines).toContain('  Cancelled, keeping current model.');
		expect(prefs).toEqual([]);
	});

	it('should change the response depth', async () => {
		const { io, ledger, shell } = setup({ answers: ['1'] });

		await shell.handle('brain');

		expect(ledger.depth).toEqual({ name: 'Minimal', maxTokens: 128 });
		expect(io.lines).toContain('  -> Response depth: Minimal (128 tokens)');
	});

	it('should set preset, custom and default personas', async () => {
		const { io, ledger, prefs, shell } = setup({
			answers: ['4', '8', 'Talk like a pirate', '1'],
		});

		await shell.handle('persona');
		expect(ledger.persona).toBe(
			'Be very concise. Use bullet points. No fluff. Get straight to the point.',
		);
		expect(io.lines).toContain('  -> Persona set to: Concise Mode');

		await shell.handle('persona');
		expect(ledger.persona).toBe('Talk like a pirate');
		expect(io.prompts).toContain('Enter your custom persona > ');

		await shell.handle('persona');
		expect(ledger.persona).toBe('');
		expect(io.lines).toContain('  -> Persona reset to default');
		expect(prefs).toEqual([]);
	});

	it('should switch theme and show it in the status line', async () => {
		const { io, prefs, shell } = setup({ answers: ['6'] });

		await shell.handle('theme');

		expect(shell.context.theme.key).toBe('dracula');
		expect(io.lines).toContain('  -> Theme set to: Dracula');
		expect(shell.statusLine().endsWith('Theme: Dracula')).toBe(true);
		expect(prefs[0].theme).toBe('dracula');
	});

	it('should write config.json without a preferences hook', async () => {
		const { root, shell } = setup({
			answers: ['5'],
			persistPreferences: true,
		});

		await shell.handle('theme');

		expect(JSON.parse(readFileSync(join(root, 'config.json'), 'utf-8'))).toEqual({
			model: 'Sonnet',
			brain: 'Standard',
			theme: 'monochrome',
		});
	});
});

// ===========================================================================
// Session commands
// ===========================================================================

describe('shell session commands', () => {
	it('should clear the conversation', async () => {
		const { io, ledger, shell } = setup({ replies: [REPLY] });
		await shell.handle('hello');

		await shell.handle('clear');

		expect(ledger.turnCount).toBe(0);
		expect(io.lines).toContain('  -> Conversation cleared! (1 exchanges removed)');
	});

	it('should refuse to save or export an empty conversation', async () => {
		const { io, shell } = setup();

		await shell.handle('save');
		await shell.handle('export');

		expect(io.lines).toContain('  Nothing to save - conversation is empty.');
		expect(io.lines).toContain('  Nothing to export - conversation is empty.');
	});

	it('should save, export and load a conversation', async () => {
		const { root, io, ledger, shell } = setup({ replies: [REPLY] });
		await shell.handle('hello');

		await shell.handle('save');
		await shell.handle('export');

		expect(io.lines).toContain('  -> Saved to: chat_20240105_090307.json');
		expect(io.lines).toContain('  -> Exported to: chat_20240105_090307.md');
		expect(existsSync(join(root, 'saved_chats', 'chat_20240105_090307.md'))).toBe(
			true,
		);

		await shell.handle('clear');
		io.answer('1');
		await shell.handle('load');

		expect(io.lines).toContain('  Saved Conversations');
		expect(io.lines).toContain('  1  chat_20240105_090307.json  Sonnet  1');
		expect(io.lines).toContain(
			'  -> Loaded chat_20240105_090307.json (1 exchanges restored)',
		);
		expect(ledger.turns).toEqual([
			{ role: 'user', content: 'hello' },
			{ role: 'assistant', content: 'Hi there' },
		]);
		expect(ledger.totalInputTokens).toBe(1234);
	});

	it('should say when there is nothing to load', async () => {
		const { io, shell } = setup();

		await shell.handle('load');

		expect(io.lines).toContain('  No saved conversations found.');
	});

	it('should reject bad load choices', async () => {
		const { io, ledger, shell } = setup({ replies: [REPLY] });
		await shell.handle('hello');
		await shell.handle('save');
		const before = ledger.snapshot();

		io.answer('abc', '7', '');
		await shell.handle('load');
		await shell.handle('load');
		await shell.handle('load');

		expect(io.lines).toContain('  Please enter a number.');
		expect(io.lines).toContain('  Invalid number.');
		expect(io.lines).toContain('  Load cancelled.');
		expect(ledger.snapshot()).toEqual(before);
	});

	it('should report a corrupted save file', async () => {
		const { root, io, shell } = setup({ replies: [REPLY] });
		await shell.handle('hello');
		await shell.handle('save');
		const broken = join(root, 'saved_chats', 'chat_20240101_000000.json');
		writeFileSync(broken, 'garbage');

		io.answer('2');
		await shell.handle('load');

		expect(io.lines).toContain('  2  chat_20240101_000000.json  ?       ?');
		expect(io.lines).toContain(`  ✖ Saved session is corrupted: ${broken}`);
		expect(io.lines).toContain('    The file is not a valid save file.');
	});

	it('should list every command in help', async () => {
		const { io, shell } = setup();

		await shell.handle('help');

		expect(io.lines[0]).toBe('  Commands');
		expect(io.lines).toContain(`  ${'quit/exit/q'.padEnd(12)}  - exit the chat`);
		expect(io.lines).toContain(
			`  ${'@file <path>'.padEnd(12)}  - attach a file to your message`,
		);
	});

	it('should print a summary on quit after exchanges', async () => {
		const { io, shell } = setup({ replies: [REPLY] });
		await shell.handle('hello');

		await shell.handle('exit');

		expect(io.lines).toContain('  Session Summary');
		expect(io.lines).toContain('  Tokens used  1,234 in + 56 out');
		expect(io.lines.at(-2)).toBe('  Goodbye!');
	});
});
