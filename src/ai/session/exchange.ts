// ---------------------------------------------------------------------------
// Streaming Exchange Driver
//
// Runs one request/response cycle against the chat service:
//
//   idle → trimming → dispatched → streaming → completed
//                                  streaming → failed → rolled-back
//
// The user turn is appended before dispatch and removed again on any
// failure, so the ledger only ever reflects confirmed exchanges.
// ---------------------------------------------------------------------------

import { BASE_INSTRUCTIONS, buildSystemPrompt } from '../../config/presets.js';
import {
	createExchangeInFlightError,
	createUnclassifiedRemoteError,
	type ProviderError,
} from '../../errors/index.js';
import { getDefaultLogger, type Logger } from '../../logger.js';
import { computeCost, getPricing, type PricingEntry } from '../pricing/index.js';
import { classifyServiceError } from '../provider/classify.js';
import type {
	ChatRequest,
	ChatServiceClient,
	UsageEvent,
} from '../provider/types.js';
import type { ContextBudgetMonitor } from './budget.js';
import type {
	ExchangeUsage,
	SessionLedger,
	SessionTotals,
	Turn,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ExchangeState =
	| 'idle'
	| 'trimming'
	| 'dispatched'
	| 'streaming'
	| 'completed'
	| 'failed'
	| 'rolled-back';

export interface ExchangeHooks {
	/** Called once per text fragment, in arrival order. */
	readonly onFragment?: (text: string) => void;
	/** One-line notices such as eviction reports. */
	readonly onNotice?: (message: string) => void;
}

export interface ExchangeSuccess {
	readonly ok: true;
	readonly response: string;
	readonly usage: ExchangeUsage;
	readonly session: SessionTotals;
	/** The consumed spoken-reply hand-off flag. */
	readonly speakReply: boolean;
	readonly pairsTrimmed: number;
}

export interface ExchangeFailure {
	readonly ok: false;
	readonly error: ProviderError;
	readonly pairsTrimmed: number;
}

export type ExchangeOutcome = ExchangeSuccess | ExchangeFailure;

export interface ExchangeDriverOptions {
	readonly ledger: SessionLedger;
	readonly client: ChatServiceClient;
	readonly budget: ContextBudgetMonitor;
	readonly baseInstructions?: string;
	readonly pricing?: (modelName: string) => PricingEntry;
	readonly logger?: Logger;
}

export interface ExchangeDriver {
	readonly send: (
		visibleMessage: string,
		requestMessageOverride?: string,
		hooks?: ExchangeHooks,
	) => Promise<ExchangeOutcome>;
	readonly state: ExchangeState;
	readonly busy: boolean;
}

interface StreamedReply {
	readonly response: string;
	readonly inputTokens: number;
	readonly outputTokens: number;
}

export const trimNotice = (pairs: number): string =>
	`Memory trimmed: removed ${pairs} oldest exchanges to stay within context limit.`;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createExchangeDriver(
	options: ExchangeDriverOptions,
): ExchangeDriver {
	const { ledger, client, budget } = options;
	const baseInstructions = options.baseInstructions ?? BASE_INSTRUCTIONS;
	const pricingFor = options.pricing ?? getPricing;
	const logger = options.logger ?? getDefaultLogger().child('exchange');

	let state: ExchangeState = 'idle';
	let busy = false;

	const transition = (next: ExchangeState): void => {
		logger.debug(`${state} -> ${next}`);
		state = next;
	};

	const outboundMessages = (
		turns: readonly Turn[],
		override: string | undefined,
	): readonly Turn[] => {
		if (override === undefined || turns.length === 0) return turns;
		const last = turns[turns.length - 1];
		return [...turns.slice(0, -1), { role: last.role, content: override }];
	};

	/** Opens the stream itself so a synchronous throw from the client rejects. */
	const consumeStream = async (
		request: ChatRequest,
		hooks: ExchangeHooks,
	): Promise<StreamedReply> => {
		const chunks: string[] = [];
		let usage: UsageEvent | undefined;

		for await (const event of client.stream(request)) {
			if (event.type === 'text') {
				chunks.push(event.text);
				hooks.onFragment?.(event.text);
			} else {
				usage = event;
			}
		}

		if (!usage) {
			throw createUnclassifiedRemoteError(
				client.name,
				'Stream ended without usage metadata',
			);
		}

		return {
			response: chunks.join(''),
			inputTokens: usage.inputTokens,
			outputTokens: usage.outputTokens,
		};
	};

	const run = async (
		visibleMessage: string,
		override: string | undefined,
		hooks: ExchangeHooks,
	): Promise<ExchangeOutcome> => {
		transition('trimming');
		const pairsTrimmed = budget.check(ledger);
		if (pairsTrimmed > 0) {
			hooks.onNotice?.(trimNotice(pairsTrimmed));
		}

		ledger.appendUser(visibleMessage);
		transition('dispatched');

		const request: ChatRequest = {
			model: ledger.model.id,
			maxOutputTokens: ledger.depth.maxTokens,
			systemPrompt: buildSystemPrompt(ledger.persona, baseInstructions),
			messages: outboundMessages(ledger.turns, override),
		};

		transition('streaming');
		const streamed = await consumeStream(request, hooks).then(
			(result) => ({ ok: true as const, result }),
			(error: unknown) => ({ ok: false as const, error }),
		);

		if (!streamed.ok) {
			transition('failed');
			const classified = classifyServiceError(streamed.error, client.name);
			ledger.rollbackUser();
			ledger.consumeSpokenReply();
			transition('rolled-back');
			logger.warn('exchange failed', {
				code: classified.code,
				message: classified.message,
			});
			return Object.freeze({
				ok: false as const,
				error: classified,
				pairsTrimmed,
			});
		}

		const { response, inputTokens, outputTokens } = streamed.result;
		const costUsd = computeCost(
			inputTokens,
			outputTokens,
			pricingFor(ledger.model.name),
		);
		const usage: ExchangeUsage = Object.freeze({
			inputTokens,
			outputTokens,
			costUsd,
		});

		ledger.appendAssistant(response);
		ledger.recordUsage(usage);
		transition('completed');

		logger.info('exchange completed', { ...usage });

		return Object.freeze({
			ok: true as const,
			response,
			usage,
			session: Object.freeze({
				totalInputTokens: ledger.totalInputTokens,
				totalOutputTokens: ledger.totalOutputTokens,
				totalCostUsd: ledger.totalCostUsd,
			}),
			speakReply: ledger.consumeSpokenReply(),
			pairsTrimmed,
		});
	};

	const send = async (
		visibleMessage: string,
		requestMessageOverride?: string,
		hooks: ExchangeHooks = {},
	): Promise<ExchangeOutcome> => {
		if (busy) throw createExchangeInFlightError();
		busy = true;
		try {
			return await run(visibleMessage, requestMessageOverride, hooks);
		} finally {
			busy = false;
		}
	};

	return Object.freeze({
		send,
		get state() {
			return state;
		},
		get busy() {
			return busy;
		},
	});
}
