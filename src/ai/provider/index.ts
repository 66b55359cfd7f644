export {
	type AnthropicClientOptions,
	createAnthropicClient,
	type MessagesApiLike,
	type MessageStreamEventLike,
	type MessageStreamLike,
} from './anthropic-client.js';
export { classifyServiceError } from './classify.js';
export type {
	ChatRequest,
	ChatServiceClient,
	StreamEvent,
	TextFragmentEvent,
	UsageEvent,
} from './types.js';
