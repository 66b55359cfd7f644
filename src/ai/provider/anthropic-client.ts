// ---------------------------------------------------------------------------
// Anthropic Chat Client
//
// Adapts the Messages streaming API to `ChatServiceClient`: text deltas
// become fragment events and the final message's usage becomes the
// closing usage event.  Every failure leaves here classified.
// ---------------------------------------------------------------------------

import Anthropic from '@anthropic-ai/sdk';
import { getDefaultLogger, type Logger } from '../../logger.js';
import { classifyServiceError } from './classify.js';
import type { ChatRequest, ChatServiceClient, StreamEvent } from './types.js';

// ---------------------------------------------------------------------------
// The slice of the SDK this client relies on
// ---------------------------------------------------------------------------

export interface MessageStreamEventLike {
	readonly type: string;
	readonly delta?: unknown;
}

export interface MessageStreamLike
	extends AsyncIterable<MessageStreamEventLike> {
	finalMessage(): Promise<{
		readonly usage: {
			readonly input_tokens: number;
			readonly output_tokens: number;
		};
	}>;
}

export interface MessagesApiLike {
	stream(params: {
		model: string;
		max_tokens: number;
		system: string;
		messages: Array<{ role: 'user' | 'assistant'; content: string }>;
	}): MessageStreamLike;
}

export interface AnthropicClientOptions {
	readonly apiKey: string;
	/** Replaces the SDK's `messages` API, e.g. with an in-process fake. */
	readonly messages?: MessagesApiLike;
	readonly logger?: Logger;
}

const PROVIDER_NAME = 'anthropic';

const textDelta = (event: MessageStreamEventLike): string | undefined => {
	if (event.type !== 'content_block_delta') return undefined;
	const { delta } = event;
	if (
		typeof delta === 'object' &&
		delta !== null &&
		'type' in delta &&
		delta.type === 'text_delta' &&
		'text' in delta &&
		typeof delta.text === 'string'
	) {
		return delta.text;
	}
	return undefined;
};

export function createAnthropicClient(
	options: AnthropicClientOptions,
): ChatServiceClient {
	const messages: MessagesApiLike =
		options.messages ?? new Anthropic({ apiKey: options.apiKey }).messages;
	const logger = options.logger ?? getDefaultLogger().child('anthropic');

	async function* stream(request: ChatRequest): AsyncGenerator<StreamEvent> {
		logger.debug('opening stream', {
			model: request.model,
			maxOutputTokens: request.maxOutputTokens,
			messageCount: request.messages.length,
		});

		try {
			const response = messages.stream({
				model: request.model,
				max_tokens: request.maxOutputTokens,
				system: request.systemPrompt,
				messages: request.messages.map((m) => ({
					role: m.role,
					content: m.content,
				})),
			});

			for await (const event of response) {
				const text = textDelta(event);
				if (text) yield Object.freeze({ type: 'text' as const, text });
			}

			const final = await response.finalMessage();
			yield Object.freeze({
				type: 'usage' as const,
				inputTokens: final.usage.input_tokens,
				outputTokens: final.usage.output_tokens,
			});
		} catch (error) {
			const classified = classifyServiceError(error, PROVIDER_NAME);
			logger.warn('stream failed', {
				code: classified.code,
				status: classified.statusCode,
			});
			throw classified;
		}
	}

	return Object.freeze({ name: PROVIDER_NAME, stream });
}
