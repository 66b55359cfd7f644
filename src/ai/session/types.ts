// ---------------------------------------------------------------------------
// Session Types
// ---------------------------------------------------------------------------

export type TurnRole = 'user' | 'assistant';

export interface Turn {
	readonly role: TurnRole;
	readonly content: string;
}

export interface ModelSelection {
	/** Display name, also the pricing key. */
	readonly name: string;
	readonly id: string;
}

export interface DepthSelection {
	readonly name: string;
	/** Max output tokens per reply. */
	readonly maxTokens: number;
}

export interface ExchangeUsage {
	readonly inputTokens: number;
	readonly outputTokens: number;
	readonly costUsd: number;
}

export interface SessionTotals {
	readonly totalInputTokens: number;
	readonly totalOutputTokens: number;
	readonly totalCostUsd: number;
}

/** Plain, serialisable copy of every ledger field. */
export interface SessionSnapshot extends SessionTotals {
	readonly turns: readonly Turn[];
	readonly lastInputTokens: number;
	readonly model: ModelSelection;
	readonly persona: string;
	readonly depth: DepthSelection;
}

export interface SessionLedger {
	readonly appendUser: (content: string) => void;
	readonly appendAssistant: (content: string) => void;
	/** Remove the trailing user turn. Returns false when the tail is not a user turn. */
	readonly rollbackUser: () => boolean;
	/** Replace the whole turn sequence. Used by eviction. */
	readonly replaceTurns: (turns: readonly Turn[]) => void;
	/** Record a completed exchange's usage and cost. */
	readonly recordUsage: (usage: ExchangeUsage) => void;
	readonly setModel: (model: ModelSelection) => void;
	readonly setPersona: (persona: string) => void;
	readonly setDepth: (depth: DepthSelection) => void;
	/** Ask for the next successful reply to be spoken aloud. */
	readonly requestSpokenReply: () => void;
	/** Read and reset the spoken-reply flag. */
	readonly consumeSpokenReply: () => boolean;
	/** Drop all turns, keeping totals. Returns the number of exchanges removed. */
	readonly clear: () => number;
	readonly snapshot: () => SessionSnapshot;
	readonly restore: (snapshot: SessionSnapshot) => void;
	readonly turns: readonly Turn[];
	readonly turnCount: number;
	/** Completed (user, assistant) pairs. */
	readonly exchangeCount: number;
	readonly totalInputTokens: number;
	readonly totalOutputTokens: number;
	readonly totalCostUsd: number;
	/** Input tokens reported by the most recent completed exchange. */
	readonly lastInputTokens: number;
	readonly model: ModelSelection;
	readonly persona: string;
	readonly depth: DepthSelection;
	readonly speakReply: boolean;
}

export interface SessionLedgerOptions {
	readonly model: ModelSelection;
	readonly depth: DepthSelection;
	readonly persona?: string;
}
