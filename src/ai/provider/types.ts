// ---------------------------------------------------------------------------
// Chat Service Types
// ---------------------------------------------------------------------------

import type { Turn } from '../session/types.js';

export interface ChatRequest {
	readonly model: string;
	readonly maxOutputTokens: number;
	readonly systemPrompt: string;
	readonly messages: readonly Turn[];
}

export interface TextFragmentEvent {
	readonly type: 'text';
	readonly text: string;
}

/** Final record of a stream; the only source of token counts. */
export interface UsageEvent {
	readonly type: 'usage';
	readonly inputTokens: number;
	readonly outputTokens: number;
}

export type StreamEvent = TextFragmentEvent | UsageEvent;

/**
 * A streaming chat backend. The returned iterable is ordered, finite and
 * single-use: text fragments in arrival order, then one usage event.
 * Failures surface as classified provider errors.
 */
export interface ChatServiceClient {
	readonly name: string;
	readonly stream: (request: ChatRequest) => AsyncIterable<StreamEvent>;
}
