// ---------------------------------------------------------------------------
// Session Ledger
//
// The authoritative record of the conversation: ordered turns, running
// token/cost totals, and the active model, persona and response depth.
// Only the exchange driver appends turns during a session.
// ---------------------------------------------------------------------------

import type {
	DepthSelection,
	ExchangeUsage,
	ModelSelection,
	SessionLedger,
	SessionLedgerOptions,
	SessionSnapshot,
	Turn,
	TurnRole,
} from './types.js';

const freezeTurn = (role: TurnRole, content: string): Turn =>
	Object.freeze({ role, content });

export function createSessionLedger(
	options: SessionLedgerOptions,
): SessionLedger {
	let turns: Turn[] = [];
	let totalInputTokens = 0;
	let totalOutputTokens = 0;
	let totalCostUsd = 0;
	let lastInputTokens = 0;
	let model: ModelSelection = Object.freeze({ ...options.model });
	let depth: DepthSelection = Object.freeze({ ...options.depth });
	let persona = options.persona ?? '';
	let speakReply = false;

	const appendUser = (content: string): void => {
		turns.push(freezeTurn('user', content));
	};

	const appendAssistant = (content: string): void => {
		turns.push(freezeTurn('assistant', content));
	};

	const rollbackUser = (): boolean => {
		if (turns.at(-1)?.role !== 'user') return false;
		turns.pop();
		return true;
	};

	const replaceTurns = (next: readonly Turn[]): void => {
		turns = next.map((t) => freezeTurn(t.role, t.content));
	};

	const recordUsage = (usage: ExchangeUsage): void => {
		lastInputTokens = usage.inputTokens;
		totalInputTokens += usage.inputTokens;
		totalOutputTokens += usage.outputTokens;
		totalCostUsd += usage.costUsd;
	};

	const consumeSpokenReply = (): boolean => {
		const requested = speakReply;
		speakReply = false;
		return requested;
	};

	const clear = (): number => {
		const removed = Math.floor(turns.length / 2);
		turns = [];
		return removed;
	};

	const snapshot = (): SessionSnapshot =>
		Object.freeze({
			turns: Object.freeze([...turns]),
			totalInputTokens,
			totalOutputTokens,
			totalCostUsd,
			lastInputTokens,
			model,
			persona,
			depth,
		});

	const restore = (snap: SessionSnapshot): void => {
		replaceTurns(snap.turns);
		totalInputTokens = snap.totalInputTokens;
		totalOutputTokens = snap.totalOutputTokens;
		totalCostUsd = snap.totalCostUsd;
		lastInputTokens = snap.lastInputTokens;
		model = Object.freeze({ ...snap.model });
		depth = Object.freeze({ ...snap.depth });
		persona = snap.persona;
	};

	return Object.freeze({
		appendUser,
		appendAssistant,
		rollbackUser,
		replaceTurns,
		recordUsage,
		setModel: (next: ModelSelection): void => {
			model = Object.freeze({ ...next });
		},
		setPersona: (next: string): void => {
			persona = next;
		},
		setDepth: (next: DepthSelection): void => {
			depth = Object.freeze({ ...next });
		},
		requestSpokenReply: (): void => {
			speakReply = true;
		},
		consumeSpokenReply,
		clear,
		snapshot,
		restore,
		get turns(): readonly Turn[] {
			return Object.freeze([...turns]);
		},
		get turnCount() {
			return turns.length;
		},
		get exchangeCount() {
			return Math.floor(turns.length / 2);
		},
		get totalInputTokens() {
			return totalInputTokens;
		},
		get totalOutputTokens() {
			return totalOutputTokens;
		},
		get totalCostUsd() {
			return totalCostUsd;
		},
		get lastInputTokens() {
			return lastInputTokens;
		},
		get model() {
			return model;
		},
		get persona() {
			return persona;
		},
		get depth() {
			return depth;
		},
		get speakReply() {
			return speakReply;
		},
	});
}
