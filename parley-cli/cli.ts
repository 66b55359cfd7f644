#!/usr/bin/env node
/**
 * Parley: terminal chat client
 *
 * Entry point: loads the environment and preferences, wires the engine
 * and runs the REPL until quit, Ctrl-C or end of input.
 */

import { createInterface } from 'node:readline';
import { createAnthropicClient } from '../src/ai/provider/index.js';
import {
	createDuckDuckGoSearchProvider,
	createSearchResolver,
} from '../src/ai/search/index.js';
import {
	createContextBudgetMonitor,
	createExchangeDriver,
	createSessionLedger,
} from '../src/ai/session/index.js';
import {
	DEFAULT_DEPTH,
	DEFAULT_MODEL,
	findDepthPreset,
	findModelPreset,
} from '../src/config/presets.js';
import {
	DEFAULT_PREFERENCES,
	defineEngineConfig,
	type Environment,
	loadEnvironment,
	loadPreferences,
	type Preferences,
	preferencesPath,
} from '../src/config/settings.js';
import {
	isConfigParseError,
	isMissingCredentialError,
	toError,
} from '../src/errors/index.js';
import {
	createConsoleTransport,
	createLogger,
	type Logger,
	setDefaultLogger,
} from '../src/logger.js';
import { createCompleter } from './completer.js';
import { createReadlineIO } from './io.js';
import { createLineCollector, MULTILINE_FENCE } from './multiline.js';
import { createShell, type Shell } from './shell.js';
import { DEFAULT_THEME_KEY, resolveTheme } from './themes.js';
import {
	createColors,
	renderBanner,
	renderError,
	renderInfo,
	renderSetupPanel,
	renderWarning,
} from './ui.js';

const PROMPT = 'You > ';
const CONTINUATION_PROMPT = '... > ';

/** A broken config.json is reported and replaced on the next picker change. */
function readPreferences(path: string, logger: Logger): Preferences {
	try {
		return loadPreferences(path);
	} catch (error) {
		if (!isConfigParseError(error)) throw error;
		logger.warn('ignoring unreadable preferences', { path });
		const colors = createColors(resolveTheme(DEFAULT_THEME_KEY));
		console.error(
			renderWarning(`${error.message}; using defaults.`, colors),
		);
		return DEFAULT_PREFERENCES;
	}
}

async function main(): Promise<number> {
	const projectRoot = process.cwd();

	let env: Environment;
	try {
		env = loadEnvironment(projectRoot);
	} catch (error) {
		if (!isMissingCredentialError(error)) throw error;
		const colors = createColors(resolveTheme(DEFAULT_THEME_KEY));
		console.error(renderSetupPanel('ANTHROPIC_API_KEY', colors));
		return 1;
	}

	const logger = createLogger({
		context: 'parley',
		level: env.logLevel,
		transports: [createConsoleTransport()],
	});
	setDefaultLogger(logger);

	const prefs = readPreferences(preferencesPath(env.dataDir), logger);
	const engine = defineEngineConfig();
	const model = findModelPreset(prefs.model) ?? DEFAULT_MODEL;
	const depth = findDepthPreset(prefs.brain) ?? DEFAULT_DEPTH;

	const ledger = createSessionLedger({
		model: { name: model.name, id: model.id },
		depth: { name: depth.name, maxTokens: depth.maxTokens },
	});
	const driver = createExchangeDriver({
		ledger,
		client: createAnthropicClient({ apiKey: env.apiKey }),
		budget: createContextBudgetMonitor({
			contextLimit: engine.contextLimit,
			triggerRatio: engine.triggerRatio,
			targetRatio: engine.targetRatio,
		}),
	});
	const search = createSearchResolver({
		provider: createDuckDuckGoSearchProvider(),
		maxResults: engine.maxSearchResults,
	});

	const rl = createInterface({
		input: process.stdin,
		output: process.stdout,
		terminal: true,
		completer: createCompleter({
			commandNames: () => shell.context.registry.names(),
			projectRoot,
		}),
	});
	const closed = new Promise<null>((resolve) => {
		rl.once('close', () => resolve(null));
	});
	rl.on('SIGINT', () => rl.close());

	const io = createReadlineIO(rl);
	const shell: Shell = createShell({
		io,
		ledger,
		driver,
		search,
		projectRoot,
		dataDir: env.dataDir,
		engine,
		theme: prefs.theme,
		logger: logger.child('shell'),
	});

	io.print(renderBanner(shell.context.colors));
	io.print(shell.statusLine());

	const collector = createLineCollector();
	const nextLine = (prompt: string): Promise<string | null> =>
		Promise.race([io.ask(prompt), closed]);

	for (;;) {
		const line = await nextLine(
			collector.collecting ? CONTINUATION_PROMPT : PROMPT,
		);
		if (line === null) {
			io.print();
			io.print(shell.context.sessionSummary());
			break;
		}

		const entry = collector.feed(line);
		if (entry.kind === 'opened') {
			io.print(
				renderInfo(
					`Multi-line mode. Type ${MULTILINE_FENCE} on its own line to send.`,
					shell.context.colors,
				),
			);
			continue;
		}
		if (entry.kind === 'pending' || !entry.text.trim()) continue;

		try {
			if ((await shell.handle(entry.text)) === 'quit') break;
		} catch (error) {
			const err = toError(error);
			logger.error('unhandled error in shell', err);
			io.print(
				renderError('Something went wrong', err.message, shell.context.colors),
			);
		}
		io.print(shell.context.colors.dim('─'.repeat(60)));
	}

	rl.close();
	return 0;
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error('Fatal error:', error);
		process.exit(1);
	},
);
