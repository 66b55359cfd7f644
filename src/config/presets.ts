// ---------------------------------------------------------------------------
// Presets: models, response depths, personas, and base instructions
//
// Read-only tables, frozen at module load.
// ---------------------------------------------------------------------------

export interface ModelPreset {
	/** Display name, also the pricing key. */
	readonly name: string;
	readonly id: string;
	readonly description: string;
}

export interface DepthPreset {
	readonly name: string;
	readonly maxTokens: number;
	readonly bestFor: string;
}

export interface PersonaPreset {
	readonly name: string;
	/** `null` means the user writes a custom persona. */
	readonly prompt: string | null;
}

export const MODEL_PRESETS: readonly ModelPreset[] = Object.freeze([
	Object.freeze({
		name: 'Opus',
		id: 'claude-opus-4-20250514',
		description: 'Most powerful, slowest',
	}),
	Object.freeze({
		name: 'Sonnet',
		id: 'claude-sonnet-4-20250514',
		description: 'Balanced speed & quality',
	}),
	Object.freeze({
		name: 'Haiku',
		id: 'claude-haiku-4-5-20251001',
		description: 'Fastest, cheapest',
	}),
]);

export const DEPTH_PRESETS: readonly DepthPreset[] = Object.freeze([
	Object.freeze({
		name: 'Minimal',
		maxTokens: 128,
		bestFor: 'One-liners, yes/no, definitions',
	}),
	Object.freeze({
		name: 'Concise',
		maxTokens: 512,
		bestFor: 'Short explanations, quick help',
	}),
	Object.freeze({
		name: 'Standard',
		maxTokens: 1024,
		bestFor: 'Normal conversations, Q&A',
	}),
	Object.freeze({
		name: 'Detailed',
		maxTokens: 2048,
		bestFor: 'Thorough explanations, code generation',
	}),
	Object.freeze({
		name: 'Maximum',
		maxTokens: 4096,
		bestFor: 'Long-form content, full documents',
	}),
]);

export const PERSONA_PRESETS: readonly PersonaPreset[] = Object.freeze([
	Object.freeze({ name: 'Reset to Default', prompt: '' }),
	Object.freeze({
		name: 'Programming Tutor',
		prompt:
			'You are a friendly programming tutor for beginners. Explain concepts simply with examples.',
	}),
	Object.freeze({
		name: 'Senior Developer',
		prompt:
			'You are a senior software developer doing code reviews. Be thorough, suggest improvements, and catch bugs.',
	}),
	Object.freeze({
		name: 'Concise Mode',
		prompt:
			'Be very concise. Use bullet points. No fluff. Get straight to the point.',
	}),
	Object.freeze({
		name: 'Creative Writer',
		prompt:
			'You are a creative writer. Use vivid language, metaphors, and storytelling in your responses.',
	}),
	Object.freeze({
		name: "Explain Like I'm 5",
		prompt:
			"Explain everything as if I'm 5 years old. Use simple words, analogies, and fun examples.",
	}),
	Object.freeze({
		name: 'Debug Expert',
		prompt:
			'You are a debugging expert. Analyze code carefully, find bugs, explain root causes, and suggest fixes step by step.',
	}),
	Object.freeze({ name: 'Custom', prompt: null }),
]);

export const DEFAULT_MODEL: ModelPreset = MODEL_PRESETS[1];
export const DEFAULT_DEPTH: DepthPreset = DEPTH_PRESETS[2];

export const findModelPreset = (name: string): ModelPreset | undefined =>
	MODEL_PRESETS.find((m) => m.name === name);

export const findDepthPreset = (name: string): DepthPreset | undefined =>
	DEPTH_PRESETS.find((d) => d.name === name);

// ---------------------------------------------------------------------------
// Base instructions
// ---------------------------------------------------------------------------

/**
 * Fixed system text sent with every exchange. The active persona, when
 * set, is appended after a blank line.
 */
export const BASE_INSTRUCTIONS = [
	'Never start your response with a title or heading. Jump straight into the answer.',
	'',
	"IMPORTANT: You are running inside 'Parley', a terminal chat client. " +
		'You are NOT running in a browser or API playground. ' +
		'When the user asks about your capabilities, how to do something, or asks for help, ' +
		'answer based on the actual features of this app listed below.',
	'',
	'FEATURES THE USER CAN USE (type these as their message):',
	'- switch_model: change between Opus, Sonnet, and Haiku models',
	'- brain: change response depth (128 to 4096 tokens)',
	'- persona: pick a personality preset or write a custom system prompt',
	'- theme: switch between color themes (Ocean, Sunset, Forest, Neon, Monochrome, Dracula)',
	'- search: search the web, results are fed to you as context',
	'- save / load: save the conversation to a JSON file or load a saved one',
	'- export: export the chat as a readable Markdown file',
	'- clear: clear the conversation history and start fresh',
	'- help: show all commands',
	"- @file <path>: attach a local file (e.g. '@file src/lib.ts explain this'). " +
		'The file contents are sent to you so you can read, review, explain, or debug code',
	'- """: enter multi-line input mode for pasting code blocks or long text',
	'- quit / exit / q: exit with a session summary showing tokens and cost',
	'',
	"The user's preferences (model, brain mode, theme) are saved automatically between sessions. " +
		'When asked about files or sharing code, mention the @file command. ' +
		'When asked about searching, mention the search command or trigger phrases.',
].join('\n');

/**
 * Compose the system prompt: base instructions, then the persona (if any)
 * separated by a blank line.
 */
export const buildSystemPrompt = (
	persona: string,
	baseInstructions: string = BASE_INSTRUCTIONS,
): string => (persona ? `${baseInstructions}\n\n${persona}` : baseInstructions);
